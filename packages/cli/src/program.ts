import { Command } from 'commander';
import { version } from '../package.json';
import { registerPipelineCommands } from './commands/pipeline';
import { registerVerifyCommand } from './commands/verify';
import type { CliDependencies } from './context';

export const name = '@foundry/cli';

export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command();

  program
    .name('foundry')
    .description('Test, build, sign and publish Go packages from metadata.json')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--verbose', 'Enable verbose logging')
    .option('--branch <name>', 'Branch to check out after cloning')
    .option('--workdir <path>', 'Persistent workspace directory (a temp dir is used otherwise)')
    .option('--descriptor <path>', 'Path to the package descriptor (default: ./metadata.json)')
    .option('--log-file <path>', 'Append pipeline events as JSON lines to this file');

  registerPipelineCommands(program, deps);
  registerVerifyCommand(program, deps);

  return program;
}
