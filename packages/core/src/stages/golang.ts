import path from 'path';
import { pathExists } from 'fs-extra';
import { Logger, SilentLogger } from '@foundry/shared';
import { CommandRunner, mergeEnv, runOrThrow } from '@foundry/exec';
import { Workspace, binDir, moduleCachePath } from '../workspace/manager';

export const COMPILER_NAME = 'gox';
export const COMPILER_MODULE = 'github.com/mitchellh/gox@latest';

/**
 * Runs the Go toolchain against the isolated environment of a workspace.
 */
export class GoToolchain {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger = new SilentLogger(),
    private readonly program = 'go',
  ) {}

  env(workspace: Workspace): Record<string, string> {
    return mergeEnv(workspace.env, {
      GOMODCACHE: moduleCachePath(workspace),
      GOBIN: binDir(workspace),
    });
  }

  async syncDependencies(workspace: Workspace, sourceDir: string): Promise<void> {
    await this.logger.info('Downloading module dependencies');
    const result = await runOrThrow(
      this.runner,
      { program: this.program, args: ['mod', 'download'], cwd: sourceDir, env: this.env(workspace) },
      'Dependency sync',
    );
    if (result.output) await this.logger.debug(result.output);
  }

  /** Returns the test output, which is also logged */
  async runTests(workspace: Workspace, sourceDir: string): Promise<string> {
    await this.logger.info('Running tests');
    const result = await runOrThrow(
      this.runner,
      { program: this.program, args: ['test', '-v', './...'], cwd: sourceDir, env: this.env(workspace) },
      'Tests',
    );
    if (result.output) await this.logger.info(result.output);
    return result.output;
  }

  /** Path of the cross-compiler, installed into the workspace when absent */
  async ensureCompiler(workspace: Workspace): Promise<string> {
    const compiler = path.join(binDir(workspace), COMPILER_NAME);
    if (await pathExists(compiler)) return compiler;

    await this.logger.info(`Installing ${COMPILER_MODULE}`);
    await runOrThrow(
      this.runner,
      {
        program: this.program,
        args: ['install', COMPILER_MODULE],
        cwd: workspace.root,
        env: this.env(workspace),
      },
      `Installing ${COMPILER_NAME}`,
    );
    return compiler;
  }
}
