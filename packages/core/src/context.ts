import { randomUUID } from 'crypto';
import os from 'os';
import { ConsoleLogger, Logger } from '@foundry/shared';
import { CommandRunner, ExecaCommandRunner } from '@foundry/exec';

/**
 * Everything one pipeline run needs to know about its surroundings.
 * Replaces process-wide flags; nothing reads ambient state after creation.
 */
export interface ExecutionContext {
  runId: string;
  /** Caller's original working directory; collected artifacts land here */
  cwd: string;
  /** Home directory holding the per-user config */
  homeDir: string;
  verbose: boolean;
  /** Branch to check out after cloning */
  branch?: string;
  /** Persistent workspace path; a temp dir is used when unset */
  workDir?: string;
  logger: Logger;
  runner: CommandRunner;
}

export function createExecutionContext(
  overrides: Partial<ExecutionContext> = {},
): ExecutionContext {
  const verbose = overrides.verbose ?? false;
  const logger = overrides.logger ?? new ConsoleLogger({ verbose });
  return {
    runId: overrides.runId ?? randomUUID(),
    cwd: overrides.cwd ?? process.cwd(),
    homeDir: overrides.homeDir ?? os.homedir(),
    verbose,
    branch: overrides.branch,
    workDir: overrides.workDir,
    logger,
    runner: overrides.runner ?? new ExecaCommandRunner({ logger }),
  };
}
