import path from 'path';
import { ConsoleLogger, JsonlLogger, Logger, SilentLogger } from '@foundry/shared';
import { CommandRunner } from '@foundry/exec';
import { createExecutionContext, ExecutionContext } from '@foundry/core';

export type GlobalOptions = {
  json?: boolean;
  verbose?: boolean;
  branch?: string;
  workdir?: string;
  descriptor?: string;
  logFile?: string;
};

/** Seams for tests; production leaves them unset */
export interface CliDependencies {
  runner?: CommandRunner;
  cwd?: string;
  homeDir?: string;
}

export function createLogger(opts: GlobalOptions, cwd: string): Logger {
  const verbose = !!opts.verbose;
  if (opts.logFile) {
    return new JsonlLogger(path.resolve(cwd, opts.logFile), { verbose });
  }
  // keep stdout parseable in JSON mode
  if (opts.json && !verbose) {
    return new SilentLogger();
  }
  return new ConsoleLogger({ verbose });
}

export function buildContext(opts: GlobalOptions, deps: CliDependencies = {}): ExecutionContext {
  const cwd = deps.cwd ?? process.cwd();
  return createExecutionContext({
    cwd,
    homeDir: deps.homeDir,
    verbose: !!opts.verbose,
    branch: opts.branch,
    workDir: opts.workdir ? path.resolve(cwd, opts.workdir) : undefined,
    logger: createLogger(opts, cwd),
    runner: deps.runner,
  });
}
