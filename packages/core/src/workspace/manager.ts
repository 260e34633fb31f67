import * as fs from 'fs/promises';
import path from 'path';
import { dir, DirectoryResult } from 'tmp-promise';
import { ensureDir } from 'fs-extra';
import { FileIOError, Logger, SilentLogger, UsageError } from '@foundry/shared';

/**
 * An isolated working directory plus the Go environment rooted inside it.
 */
export interface Workspace {
  root: string;
  /** Isolated GOPATH (`<root>/go`) */
  envRoot: string;
  /** Base environment overlay for every subprocess in the run */
  env: Record<string, string>;
  /** True when the caller supplied the path and owns its cleanup */
  persistent: boolean;
}

const GOPATH_DIRS = ['src', 'bin', 'pkg'];

/** Keeps module cache entries writable so the workspace can be deleted */
const GOFLAGS = '-modcacherw';

/** Where a package is cloned inside the workspace */
export function checkoutPath(workspace: Workspace, packageName: string): string {
  return path.join(workspace.envRoot, 'src', ...packageName.split('/').filter(Boolean));
}

/** Module cache kept inside the workspace so runs never share downloads */
export function moduleCachePath(workspace: Workspace): string {
  return path.join(workspace.envRoot, 'pkg', 'mod');
}

export function binDir(workspace: Workspace): string {
  return path.join(workspace.envRoot, 'bin');
}

/**
 * Sole owner of temporary directories for a run.
 * A self-allocated directory is removed on release; a caller-supplied one is kept.
 */
export class WorkspaceManager {
  private current?: Workspace;
  private tmp?: DirectoryResult;

  constructor(private readonly logger: Logger = new SilentLogger()) {}

  get workspace(): Workspace | undefined {
    return this.current;
  }

  async acquire(explicitPath?: string): Promise<Workspace> {
    if (this.current) {
      throw new UsageError(`Workspace already acquired at ${this.current.root}`);
    }

    let root: string;
    let persistent: boolean;
    if (explicitPath) {
      root = path.resolve(explicitPath);
      await ensureDir(root);
      persistent = true;
      await this.logger.debug(`Using workspace ${root}`);
    } else {
      this.tmp = await dir({ prefix: 'foundry-', unsafeCleanup: true });
      root = this.tmp.path;
      persistent = false;
      await this.logger.debug(`Created temp workspace ${root}`);
    }

    const envRoot = path.join(root, 'go');
    for (const sub of GOPATH_DIRS) {
      await ensureDir(path.join(envRoot, sub));
    }

    this.current = { root, envRoot, env: { GOPATH: envRoot, GOFLAGS }, persistent };
    return this.current;
  }

  async release(): Promise<void> {
    const workspace = this.current;
    const tmp = this.tmp;
    this.current = undefined;
    this.tmp = undefined;

    if (!workspace || workspace.persistent || !tmp) return;
    try {
      await makeWritable(workspace.root);
      await tmp.cleanup();
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new FileIOError(workspace.root, `Failed to remove workspace ${workspace.root}: ${message}`, {
        cause: error,
      });
    }
    await this.logger.debug(`Removed temp workspace ${workspace.root}`);
  }
}

// Module cache directories written without -modcacherw are 0555
async function makeWritable(dir: string): Promise<void> {
  await fs.chmod(dir, 0o755);
  const entries = await fs.readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.isDirectory()) {
      await makeWritable(path.join(dir, entry.name));
    }
  }
}
