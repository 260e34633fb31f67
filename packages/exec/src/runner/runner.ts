import { execa } from 'execa';
import {
  CommandRequest,
  CommandResult,
  Logger,
  ProcessError,
  SilentLogger,
} from '@foundry/shared';

/**
 * Runs one external program to completion.
 * Every stage goes through this seam, so tests can substitute a fake.
 */
export interface CommandRunner {
  run(req: CommandRequest): Promise<CommandResult>;
}

export interface ExecaCommandRunnerOptions {
  logger?: Logger;
}

export class ExecaCommandRunner implements CommandRunner {
  private readonly logger: Logger;

  constructor(options: ExecaCommandRunnerOptions = {}) {
    this.logger = options.logger ?? new SilentLogger();
  }

  async run(req: CommandRequest): Promise<CommandResult> {
    await this.logger.debug(`$ ${[req.program, ...req.args].join(' ')} (cwd: ${req.cwd})`);

    const start = Date.now();
    const result = await execa(req.program, req.args, {
      cwd: req.cwd,
      env: req.env,
      extendEnv: true,
      all: true,
      reject: false,
      stdin: 'ignore',
    });
    const durationMs = Date.now() - start;

    // execa leaves the exit code unset on spawn failures and signal kills
    if (typeof result.exitCode !== 'number') {
      const reason = result.signal ? `terminated by ${result.signal}` : 'failed to start';
      throw new ProcessError(`Process ${reason}: ${req.program}`, {
        output: result.all ?? '',
        details: { program: req.program, args: req.args, cwd: req.cwd },
      });
    }

    return {
      exitCode: result.exitCode,
      output: result.all ?? '',
      durationMs,
    };
  }
}

/**
 * Runs a command and converts a non-zero exit into a ProcessError
 * carrying the captured output.
 */
export async function runOrThrow(
  runner: CommandRunner,
  req: CommandRequest,
  description: string,
): Promise<CommandResult> {
  const result = await runner.run(req);
  if (result.exitCode !== 0) {
    throw new ProcessError(`${description} failed with exit code ${result.exitCode}`, {
      exitCode: result.exitCode,
      output: result.output,
      details: { command: [req.program, ...req.args].join(' '), cwd: req.cwd, output: result.output },
    });
  }
  return result;
}
