import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { pathExists } from 'fs-extra';
import {
  FileIOError,
  PackageDescriptor,
  PackageDescriptorSchema,
  PartialBuildError,
  ProcessError,
} from '@foundry/shared';
import { FakeCommandRunner, FakeCommandHandler } from '@foundry/exec';
import { Workspace } from '../workspace/manager';
import { BuildMatrixExecutor, BuildLayout } from './matrix';

/** Mimics gox: writes `<prefix>_<os>_<arch>` into the working directory */
function writeBinary(prefix: string): FakeCommandHandler {
  return async (req) => {
    const osarch = req.args.find((arg) => arg.startsWith('-osarch='));
    if (!osarch) return undefined;
    const [goos, goarch] = osarch.slice('-osarch='.length).split('/');
    await fs.writeFile(path.join(req.cwd, `${prefix}_${goos}_${goarch}`), 'binary');
    return { output: `--> ${goos}/${goarch}: acme/widget` };
  };
}

describe('BuildMatrixExecutor', () => {
  let tmpDir: string;
  let workspace: Workspace;
  let layout: BuildLayout;

  function descriptorWith(targets: Array<{ name: string; cgo?: boolean; flags?: Record<string, string> }>): PackageDescriptor {
    return PackageDescriptorSchema.parse({
      package: 'acme/widget',
      version: '1.2.3',
      buildInfo: { targets },
    });
  }

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'foundry-matrix-test-'));
    workspace = {
      root: tmpDir,
      envRoot: path.join(tmpDir, 'go'),
      env: { GOPATH: path.join(tmpDir, 'go') },
      persistent: true,
    };
    layout = {
      sourceDir: path.join(tmpDir, 'go', 'src', 'acme', 'widget'),
      outputDir: path.join(tmpDir, 'out'),
      compiler: path.join(tmpDir, 'go', 'bin', 'gox'),
    };
    await fs.mkdir(layout.sourceDir, { recursive: true });
    await fs.mkdir(layout.outputDir, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('invokes the compiler once per target, in order, and collects binaries', async () => {
    const runner = new FakeCommandRunner(writeBinary('widget'));
    const executor = new BuildMatrixExecutor(runner);

    const binaries = await executor.build(
      workspace,
      descriptorWith([{ name: 'linux/amd64' }, { name: 'darwin/arm64' }]),
      layout,
    );

    expect(runner.calls.map((c) => c.args)).toEqual([
      ['-osarch=linux/amd64', './...'],
      ['-osarch=darwin/arm64', './...'],
    ]);
    expect(runner.calls.every((c) => c.program === layout.compiler && c.cwd === layout.sourceDir)).toBe(true);
    expect(binaries).toEqual([
      path.join(layout.outputDir, 'widget_linux_amd64'),
      path.join(layout.outputDir, 'widget_darwin_arm64'),
    ]);
    expect(await pathExists(binaries[0])).toBe(true);
    expect(await pathExists(path.join(layout.sourceDir, 'widget_linux_amd64'))).toBe(false);
  });

  it('builds a per-target environment overlay', async () => {
    const runner = new FakeCommandRunner(writeBinary('widget'));
    const executor = new BuildMatrixExecutor(runner);

    await executor.build(
      workspace,
      descriptorWith([
        { name: 'linux/amd64', flags: { GOAMD64: 'v3' } },
        { name: 'linux/arm64', cgo: true },
      ]),
      layout,
    );

    expect(runner.calls[0].env).toEqual({
      GOPATH: workspace.envRoot,
      GOMODCACHE: path.join(workspace.envRoot, 'pkg', 'mod'),
      GOAMD64: 'v3',
    });
    expect(runner.calls[1].env).toEqual({
      GOPATH: workspace.envRoot,
      GOMODCACHE: path.join(workspace.envRoot, 'pkg', 'mod'),
      CGO_ENABLED: '1',
    });
    expect(runner.calls[1].args).toEqual(['-cgo', '-osarch=linux/arm64', './...']);
    // flags never leak from one target into the next
    expect(runner.calls[1].env).not.toHaveProperty('GOAMD64');
  });

  it('stops at the first failing target', async () => {
    const build = writeBinary('widget');
    const runner = new FakeCommandRunner(async (req) => {
      if (req.args.includes('-osarch=windows/amd64')) {
        return { exitCode: 1, output: 'build failed' };
      }
      return build(req);
    });
    const executor = new BuildMatrixExecutor(runner);

    const error = await executor
      .build(
        workspace,
        descriptorWith([{ name: 'linux/amd64' }, { name: 'windows/amd64' }, { name: 'darwin/arm64' }]),
        layout,
      )
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProcessError);
    if (!(error instanceof ProcessError)) return;
    expect(error.message).toBe('Build for target windows/amd64 failed with exit code 1');
    expect(error.output).toBe('build failed');
    expect(runner.calls).toHaveLength(2);
    // nothing is collected when the matrix aborts
    expect(await fs.readdir(layout.outputDir)).toEqual([]);
  });

  it('reports a PartialBuildError when a binary is missing despite success', async () => {
    const build = writeBinary('widget');
    const runner = new FakeCommandRunner(async (req) =>
      req.args.includes('-osarch=darwin/arm64') ? { output: 'silently skipped' } : build(req),
    );
    const executor = new BuildMatrixExecutor(runner);

    const error = await executor
      .build(workspace, descriptorWith([{ name: 'linux/amd64' }, { name: 'darwin/arm64' }]), layout)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PartialBuildError);
    if (!(error instanceof PartialBuildError)) return;
    expect(error.missing).toEqual([path.join(layout.sourceDir, 'widget_darwin_arm64')]);
    expect(await fs.readdir(layout.outputDir)).toEqual([]);
  });

  it('aborts remaining moves on the first collection failure and keeps earlier ones', async () => {
    const runner = new FakeCommandRunner(writeBinary('widget'));
    const executor = new BuildMatrixExecutor(runner);
    // a directory in the way cannot be replaced by a file
    await fs.mkdir(path.join(layout.outputDir, 'widget_darwin_arm64', 'occupied'), { recursive: true });

    const error = await executor
      .build(
        workspace,
        descriptorWith([{ name: 'linux/amd64' }, { name: 'darwin/arm64' }, { name: 'windows/amd64' }]),
        layout,
      )
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FileIOError);
    expect(await pathExists(path.join(layout.outputDir, 'widget_linux_amd64'))).toBe(true);
    expect(await pathExists(path.join(layout.sourceDir, 'widget_windows_amd64'))).toBe(true);
    expect(await pathExists(path.join(layout.outputDir, 'widget_windows_amd64'))).toBe(false);
  });

  it('does nothing for an empty target list', async () => {
    const runner = new FakeCommandRunner();
    const executor = new BuildMatrixExecutor(runner);

    expect(await executor.build(workspace, descriptorWith([]), layout)).toEqual([]);
    expect(runner.calls).toHaveLength(0);
  });
});
