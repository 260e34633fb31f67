import path from 'path';
import { ensureDir, pathExists } from 'fs-extra';
import { ConfigError, Logger, SilentLogger } from '@foundry/shared';
import { CommandRunner, runOrThrow } from '@foundry/exec';
import { Workspace } from '../workspace/manager';

const DEFAULT_HOST = 'github.com';

/**
 * SSH clone URL for a package locator: `host/owner/repo` becomes
 * `git@host:owner/repo.git`. Locators without a dotted host live on GitHub.
 */
export function gitSshUrl(packageName: string): string {
  const segments = packageName.split('/').filter(Boolean);
  if (segments.length === 0) {
    throw new ConfigError(`Cannot derive a repository URL from package "${packageName}"`);
  }
  const [first, ...rest] = segments;
  const [host, repoPath] = first.includes('.') && rest.length > 0 ? [first, rest] : [DEFAULT_HOST, segments];
  return `git@${host}:${repoPath.join('/')}.git`;
}

export class GitCheckout {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger = new SilentLogger(),
    private readonly program = 'git',
  ) {}

  /**
   * Clones into `destination`, then switches branch when one is given.
   * An existing clone (a reused workspace) is fetched instead of cloned again.
   */
  async checkout(workspace: Workspace, url: string, destination: string, branch?: string): Promise<void> {
    if (await pathExists(path.join(destination, '.git'))) {
      await this.logger.info(`Fetching ${url} into existing checkout`);
      await runOrThrow(
        this.runner,
        { program: this.program, args: ['fetch', 'origin'], cwd: destination, env: workspace.env },
        `Fetching ${url}`,
      );
    } else {
      await ensureDir(path.dirname(destination));
      await this.logger.info(`Cloning ${url}`);
      await runOrThrow(
        this.runner,
        {
          program: this.program,
          args: ['clone', url, destination],
          cwd: path.dirname(destination),
          env: workspace.env,
        },
        `Cloning ${url}`,
      );
    }

    if (branch) {
      await this.logger.info(`Checking out branch ${branch}`);
      await runOrThrow(
        this.runner,
        { program: this.program, args: ['checkout', branch], cwd: destination, env: workspace.env },
        `Checking out branch ${branch}`,
      );
    }
  }
}
