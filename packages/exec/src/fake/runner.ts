import type { CommandRequest, CommandResult } from '@foundry/shared';
import type { CommandRunner } from '../runner/runner';

export type FakeCommandReply = Partial<Omit<CommandResult, 'durationMs'>>;

export type FakeCommandHandler = (
  req: CommandRequest,
) => FakeCommandReply | undefined | Promise<FakeCommandReply | undefined>;

/**
 * In-process stand-in for external tools.
 * Records every request; the handler may create files to mimic side effects.
 */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: CommandRequest[] = [];

  constructor(private readonly handler?: FakeCommandHandler) {}

  async run(req: CommandRequest): Promise<CommandResult> {
    this.calls.push(req);
    const reply: FakeCommandReply = (await this.handler?.(req)) ?? {};
    return {
      exitCode: reply.exitCode ?? 0,
      output: reply.output ?? '',
      durationMs: 0,
    };
  }

  /** Requests whose program name (or path basename) matches */
  callsTo(program: string): CommandRequest[] {
    return this.calls.filter(
      (call) => call.program === program || call.program.endsWith(`/${program}`),
    );
  }
}
