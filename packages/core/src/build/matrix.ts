import path from 'path';
import { move, pathExists } from 'fs-extra';
import {
  BuildTarget,
  FileIOError,
  Logger,
  PackageDescriptor,
  PartialBuildError,
  SilentLogger,
} from '@foundry/shared';
import { CommandRunner, mergeEnv, runOrThrow } from '@foundry/exec';
import { Workspace, moduleCachePath } from '../workspace/manager';
import { binaryName } from './naming';

export interface BuildLayout {
  /** Checked-out package; the compiler runs and writes here */
  sourceDir: string;
  /** Caller's directory that receives the finished binaries */
  outputDir: string;
  /** Path of the cross-compiler executable */
  compiler: string;
}

/**
 * Expands the descriptor's target list into one compiler invocation per target.
 * Targets run strictly in order and the first failure ends the matrix.
 */
export class BuildMatrixExecutor {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger = new SilentLogger(),
  ) {}

  targetEnv(workspace: Workspace, target: BuildTarget): Record<string, string> {
    return mergeEnv(
      workspace.env,
      { GOMODCACHE: moduleCachePath(workspace) },
      target.flags,
      target.cgo ? { CGO_ENABLED: '1' } : undefined,
    );
  }

  compilerArgs(target: BuildTarget): string[] {
    return [...(target.cgo ? ['-cgo'] : []), `-osarch=${target.name}`, './...'];
  }

  async build(
    workspace: Workspace,
    descriptor: PackageDescriptor,
    layout: BuildLayout,
  ): Promise<string[]> {
    const targets = descriptor.buildInfo.targets;

    for (const [index, target] of targets.entries()) {
      await this.logger.info(`Building ${target.name} (${index + 1}/${targets.length})`);
      for (const [key, value] of Object.entries(target.flags)) {
        await this.logger.debug(`Build flag: ${key}=${value}`);
      }

      const result = await runOrThrow(
        this.runner,
        {
          program: layout.compiler,
          args: this.compilerArgs(target),
          cwd: layout.sourceDir,
          env: this.targetEnv(workspace, target),
        },
        `Build for target ${target.name}`,
      );
      if (result.output) {
        await this.logger.debug(result.output);
      }
    }

    // The compiler's exit status is not trusted for multi-target runs
    const built = targets.map((target) =>
      path.join(layout.sourceDir, binaryName(descriptor.package, target.name)),
    );
    const missing: string[] = [];
    for (const binary of built) {
      if (!(await pathExists(binary))) missing.push(binary);
    }
    if (missing.length > 0) {
      throw new PartialBuildError(missing);
    }

    const collected: string[] = [];
    for (const binary of built) {
      const destination = path.join(layout.outputDir, path.basename(binary));
      try {
        await move(binary, destination, { overwrite: true });
      } catch (error: unknown) {
        throw new FileIOError(binary, `Failed to collect binary ${binary}`, {
          cause: error,
          details: { destination, collected },
        });
      }
      collected.push(destination);
    }
    return collected;
  }
}
