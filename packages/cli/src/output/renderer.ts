import pc from 'picocolors';
import { AppError, ProcessError } from '@foundry/shared';
import type { ArtifactVerification, PipelineOutcome } from '@foundry/core';
import { printTable } from './index';

const OUTPUT_TAIL_LINES = 20;

/** Flattens an error and its causes, outermost first */
export function errorChain(error: unknown): string[] {
  const chain: string[] = [];
  let current: unknown = error;
  while (current !== undefined && chain.length < 10) {
    if (current instanceof Error) {
      chain.push(`${current.name}: ${current.message}`);
      current = current.cause;
    } else {
      chain.push(String(current));
      current = undefined;
    }
  }
  return chain;
}

function processOutput(error: unknown): string | undefined {
  let current: unknown = error;
  while (current instanceof Error) {
    if (current instanceof ProcessError && current.output) return current.output;
    current = current.cause;
  }
  return undefined;
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  renderOutcome(outcome: PipelineOutcome): void {
    if (this.isJson) {
      console.log(
        JSON.stringify(
          {
            state: outcome.state,
            failedStage: outcome.failedStage,
            result: outcome.result,
            error: outcome.error
              ? { code: outcome.error.code, message: outcome.error.message, chain: errorChain(outcome.error) }
              : undefined,
          },
          null,
          2,
        ),
      );
      return;
    }

    if (outcome.state === 'Done') {
      this.renderSuccess(outcome);
    } else {
      this.renderFailure(outcome);
    }
  }

  renderVerification(results: ArtifactVerification[]): void {
    if (this.isJson) {
      console.log(JSON.stringify({ results }, null, 2));
      return;
    }

    printTable(
      results.map((r) => ({
        Artifact: r.artifact,
        Status: r.ok ? pc.green('verified') : pc.red('failed'),
        Detail: r.error ?? '',
      })),
    );
    const failed = results.filter((r) => !r.ok).length;
    if (failed === 0) {
      console.log(pc.green(`✅ ${results.length} signature(s) verified.`));
    } else {
      console.log(pc.red(`❌ ${failed} of ${results.length} signature(s) failed verification.`));
    }
  }

  private renderSuccess(outcome: PipelineOutcome): void {
    const { result } = outcome;
    console.log(`\n${pc.green('✅ Pipeline succeeded.')}`);
    if (result.package) {
      console.log(`  Package: ${result.package}${result.version ? ` ${result.version}` : ''}`);
    }
    this.renderArtifacts(outcome);
  }

  private renderFailure(outcome: PipelineOutcome): void {
    console.log(`\n${pc.red(`❌ Pipeline failed at stage ${outcome.failedStage ?? 'unknown'}.`)}`);

    if (outcome.error) {
      const [head, ...causes] = errorChain(outcome.error);
      console.log(`  ${pc.bold('Error:')} ${head}`);
      causes.forEach((cause) => console.log(`  ${pc.gray('caused by')} ${cause}`));

      const output = processOutput(outcome.error);
      if (output) {
        const lines = output.trimEnd().split('\n');
        console.log(pc.bold('\nOutput:'));
        if (lines.length > OUTPUT_TAIL_LINES) {
          console.log(pc.gray(`  ... ${lines.length - OUTPUT_TAIL_LINES} earlier line(s) omitted`));
        }
        lines.slice(-OUTPUT_TAIL_LINES).forEach((line) => console.log(`  ${line}`));
      }
      if (outcome.error instanceof AppError && outcome.error.code === 'ResolutionError') {
        console.log(pc.bold('\nNext steps:'));
        console.log(`  - Set ${pc.cyan('signing.email')} in metadata.json or ${pc.cyan('user.email')} in ~/.foundry/config.yaml.`);
      }
    }

    this.renderArtifacts(outcome);
  }

  private renderArtifacts(outcome: PipelineOutcome): void {
    const { result } = outcome;
    const sections: Array<[string, string[]]> = [
      ['Binaries', result.binaries],
      ['Extras', result.extras],
      ['Signatures', result.signatures],
      ['Published', result.published],
    ];
    for (const [title, files] of sections) {
      if (files.length === 0) continue;
      console.log(pc.bold(`\n${title}:`));
      files.forEach((file) => console.log(`  - ${file}`));
    }
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(pc.gray(message));
    }
  }
}
