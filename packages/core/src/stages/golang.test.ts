import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ProcessError } from '@foundry/shared';
import { FakeCommandRunner } from '@foundry/exec';
import { Workspace } from '../workspace/manager';
import { COMPILER_MODULE, GoToolchain } from './golang';

describe('GoToolchain', () => {
  let tmpDir: string;
  let workspace: Workspace;
  let sourceDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'foundry-go-test-'));
    workspace = {
      root: tmpDir,
      envRoot: path.join(tmpDir, 'go'),
      env: { GOPATH: path.join(tmpDir, 'go') },
      persistent: true,
    };
    sourceDir = path.join(workspace.envRoot, 'src', 'acme', 'widget');
    await fs.mkdir(sourceDir, { recursive: true });
    await fs.mkdir(path.join(workspace.envRoot, 'bin'), { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('keeps every Go location inside the workspace', () => {
    expect(new GoToolchain(new FakeCommandRunner()).env(workspace)).toEqual({
      GOPATH: workspace.envRoot,
      GOMODCACHE: path.join(workspace.envRoot, 'pkg', 'mod'),
      GOBIN: path.join(workspace.envRoot, 'bin'),
    });
  });

  it('downloads modules in the checkout', async () => {
    const runner = new FakeCommandRunner();
    await new GoToolchain(runner).syncDependencies(workspace, sourceDir);

    expect(runner.calls[0].program).toBe('go');
    expect(runner.calls[0].args).toEqual(['mod', 'download']);
    expect(runner.calls[0].cwd).toBe(sourceDir);
  });

  it('runs the test suite verbosely and returns its output', async () => {
    const runner = new FakeCommandRunner(() => ({ output: 'ok  \tacme/widget\t0.01s' }));
    const output = await new GoToolchain(runner).runTests(workspace, sourceDir);

    expect(runner.calls[0].args).toEqual(['test', '-v', './...']);
    expect(output).toBe('ok  \tacme/widget\t0.01s');
  });

  it('fails the tests on a non-zero exit', async () => {
    const runner = new FakeCommandRunner(() => ({ exitCode: 1, output: 'FAIL acme/widget' }));
    const error = await new GoToolchain(runner).runTests(workspace, sourceDir).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProcessError);
    if (!(error instanceof ProcessError)) return;
    expect(error.message).toBe('Tests failed with exit code 1');
    expect(error.output).toBe('FAIL acme/widget');
  });

  it('installs the cross-compiler when it is absent', async () => {
    const runner = new FakeCommandRunner();
    const compiler = await new GoToolchain(runner).ensureCompiler(workspace);

    expect(compiler).toBe(path.join(workspace.envRoot, 'bin', 'gox'));
    expect(runner.calls.map((c) => c.args)).toEqual([['install', COMPILER_MODULE]]);
  });

  it('reuses an installed cross-compiler', async () => {
    await fs.writeFile(path.join(workspace.envRoot, 'bin', 'gox'), '');
    const runner = new FakeCommandRunner();

    await new GoToolchain(runner).ensureCompiler(workspace);

    expect(runner.calls).toHaveLength(0);
  });
});
