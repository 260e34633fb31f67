import { Command } from 'commander';
import path from 'path';
import { PipelineOrchestrator, PipelineRequest } from '@foundry/core';
import { isUserError } from '@foundry/shared';
import { OutputRenderer } from '../output/renderer';
import { buildContext, CliDependencies, GlobalOptions } from '../context';

type StageSwitches = Omit<PipelineRequest, 'descriptorPath'>;

const STAGE_COMMANDS: Array<{ name: string; description: string; switches: StageSwitches }> = [
  {
    name: 'test',
    description: 'Check out the package, sync its dependencies and run its tests',
    switches: { build: false, sign: false, publish: false },
  },
  {
    name: 'build',
    description: 'Test, then cross-compile every target and render extras',
    switches: { build: true, sign: false, publish: false },
  },
  {
    name: 'sign',
    description: 'Build, then sign and verify every artifact',
    switches: { build: true, sign: true, publish: false },
  },
  {
    name: 'publish',
    description: 'Build, sign and hand the artifacts to the publisher',
    switches: { build: true, sign: true, publish: true },
  },
];

async function runPipeline(program: Command, deps: CliDependencies, switches: StageSwitches) {
  const globalOpts = program.opts<GlobalOptions>();
  const renderer = new OutputRenderer(!!globalOpts.json);
  const ctx = buildContext(globalOpts, deps);

  if (globalOpts.verbose) {
    const enabled = Object.entries(switches).filter(([, on]) => on).map(([stage]) => stage);
    renderer.log(`Run ${ctx.runId}: checkout, test${enabled.map((s) => `, ${s}`).join('')}`);
  }

  const outcome = await new PipelineOrchestrator(ctx).run({
    ...switches,
    descriptorPath: globalOpts.descriptor ? path.resolve(ctx.cwd, globalOpts.descriptor) : undefined,
  });
  renderer.renderOutcome(outcome);

  if (outcome.state === 'Failed') {
    process.exitCode = isUserError(outcome.error) ? 2 : 1;
  }
}

export function registerPipelineCommands(program: Command, deps: CliDependencies = {}) {
  for (const { name, description, switches } of STAGE_COMMANDS) {
    program
      .command(name)
      .description(description)
      .action(async () => {
        await runPipeline(program, deps, switches);
      });
  }

  program
    .command('run')
    .description('Run the pipeline with explicit stage switches')
    .option('--build', 'Cross-compile targets and render extras')
    .option('--sign', 'Sign and verify artifacts (requires --build)')
    .option('--publish', 'Publish artifacts (requires --build)')
    .action(async (options: { build?: boolean; sign?: boolean; publish?: boolean }) => {
      await runPipeline(program, deps, {
        build: !!options.build,
        sign: !!options.sign,
        publish: !!options.publish,
      });
    });
}
