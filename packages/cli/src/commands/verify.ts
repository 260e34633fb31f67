import { Command } from 'commander';
import path from 'path';
import { verifyArtifacts } from '@foundry/core';
import { OutputRenderer } from '../output/renderer';
import { buildContext, CliDependencies, GlobalOptions } from '../context';

export function registerVerifyCommand(program: Command, deps: CliDependencies = {}) {
  program
    .command('verify')
    .argument('<artifacts...>', 'Artifacts whose detached signatures to check')
    .description('Verify the signatures of existing artifacts')
    .action(async (artifacts: string[]) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);
      const ctx = buildContext(globalOpts, deps);

      const results = await verifyArtifacts(
        ctx,
        artifacts,
        globalOpts.descriptor ? path.resolve(ctx.cwd, globalOpts.descriptor) : undefined,
      );
      renderer.renderVerification(results);

      if (results.some((r) => !r.ok)) {
        process.exitCode = 1;
      }
    });
}
