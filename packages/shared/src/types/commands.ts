/**
 * A single invocation of an external program.
 * Arguments are passed verbatim; no shell is involved.
 */
export interface CommandRequest {
  /** Program name (resolved on PATH) or absolute path */
  program: string;
  /** Argument list */
  args: string[];
  /** Working directory for the child process */
  cwd: string;
  /**
   * Variables layered on top of the inherited process environment.
   * The parent environment itself is never modified.
   */
  env?: Record<string, string>;
}

/**
 * Outcome of a command that ran to completion.
 * A non-zero exit code is a result, not an exception.
 */
export interface CommandResult {
  exitCode: number;
  /** Interleaved stdout and stderr */
  output: string;
  durationMs: number;
}
