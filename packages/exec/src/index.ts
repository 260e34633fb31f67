export const name = '@foundry/exec';

export { ExecaCommandRunner, runOrThrow } from './runner/runner';
export type { CommandRunner, ExecaCommandRunnerOptions } from './runner/runner';
export { FakeCommandRunner } from './fake/runner';
export type { FakeCommandHandler, FakeCommandReply } from './fake/runner';
export { mergeEnv } from './env';
