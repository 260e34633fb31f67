import path from 'path';
import { pathExists } from 'fs-extra';
import {
  Logger,
  PackageDescriptor,
  StageError,
  UsageError,
  UserConfig,
  VerificationError,
} from '@foundry/shared';
import { ExecutionContext } from '../context';
import { DESCRIPTOR_FILENAME, MetadataLoader } from '../config/loader';
import { Workspace, WorkspaceManager, checkoutPath } from '../workspace/manager';
import { GitCheckout, gitSshUrl } from '../stages/vcs';
import { GoToolchain } from '../stages/golang';
import { CommandPublisher, Publisher } from '../stages/publish';
import { BuildMatrixExecutor } from '../build/matrix';
import { ExtrasGenerator } from '../build/extras';
import { SigningEngine } from '../signing/engine';
import { resolveSigning } from '../signing/resolver';
import { PipelineOutcome, PipelineRequest, PipelineResult, StageName } from './types';

const EVENT_SCHEMA_VERSION = 1;

export interface PipelineDependencies {
  workspaces: WorkspaceManager;
  checkout: GitCheckout;
  toolchain: GoToolchain;
  matrix: BuildMatrixExecutor;
  extras: ExtrasGenerator;
  publisher: Publisher;
  createSigner: (program: string) => SigningEngine;
}

/** State shared between stages of one run */
interface RunState {
  descriptor?: PackageDescriptor;
  userConfig: UserConfig;
  workspace?: Workspace;
  sourceDir?: string;
}

/**
 * Drives a release through Init, Checkout, DependencySync, Test and the
 * optional Build, Sign and Publish stages, strictly in that order.
 * The first failing stage ends the run; the workspace is always released,
 * and a release that fails turns a successful run into a `Cleanup` failure.
 */
export class PipelineOrchestrator {
  private readonly logger: Logger;
  private readonly deps: PipelineDependencies;
  private current: StageName = 'Init';

  constructor(
    private readonly ctx: ExecutionContext,
    deps: Partial<PipelineDependencies> = {},
  ) {
    this.logger = ctx.logger;
    const runner = ctx.runner;
    this.deps = {
      workspaces: deps.workspaces ?? new WorkspaceManager(this.logger),
      checkout: deps.checkout ?? new GitCheckout(runner, this.logger),
      toolchain: deps.toolchain ?? new GoToolchain(runner, this.logger),
      matrix: deps.matrix ?? new BuildMatrixExecutor(runner, this.logger),
      extras: deps.extras ?? new ExtrasGenerator(this.logger),
      publisher: deps.publisher ?? new CommandPublisher(runner, this.logger),
      createSigner:
        deps.createSigner ?? ((program: string) => new SigningEngine(runner, program, this.logger)),
    };
  }

  async run(request: PipelineRequest): Promise<PipelineOutcome> {
    const result: PipelineResult = { binaries: [], extras: [], signatures: [], published: [] };
    const state: RunState = { userConfig: {} };

    await this.logger.log({
      ...this.eventBase(),
      type: 'RunStarted',
      payload: {
        build: request.build,
        sign: request.sign,
        publish: request.publish,
        branch: this.ctx.branch,
      },
    });

    let failure: { stage: StageName; error: StageError } | undefined;
    try {
      await this.stage('Init', () => this.init(request, state, result));
      await this.stage('Checkout', () => this.checkout(state, result));
      await this.stage('DependencySync', () =>
        this.deps.toolchain.syncDependencies(this.requireWorkspace(state), this.requireSource(state)),
      );
      await this.stage('Test', async () => {
        await this.deps.toolchain.runTests(this.requireWorkspace(state), this.requireSource(state));
      });
      if (request.build) {
        await this.stage('Build', () => this.build(state, result));
      }
      if (request.sign) {
        await this.stage('Sign', () => this.sign(state, result));
      }
      if (request.publish) {
        await this.stage('Publish', () => this.publish(state, result));
      }
    } catch (error: unknown) {
      const stageError = error instanceof StageError ? error : new StageError(this.current, error);
      failure = { stage: this.current, error: stageError };
    }

    const cleanupError = await this.releaseWorkspace();
    if (cleanupError && failure) {
      await this.logger.error(cleanupError, 'Workspace cleanup failed after an earlier stage failure');
    } else if (cleanupError) {
      failure = { stage: 'Cleanup', error: cleanupError };
    }

    const outcome: PipelineOutcome = failure
      ? { state: 'Failed', result, failedStage: failure.stage, error: failure.error }
      : { state: 'Done', result };

    await this.logger.log({
      ...this.eventBase(),
      type: 'RunFinished',
      payload: {
        status: outcome.state === 'Done' ? 'success' : 'failure',
        state: outcome.state,
        binaries: result.binaries,
      },
    });
    return outcome;
  }

  private async stage(name: StageName, body: () => Promise<void>): Promise<void> {
    this.current = name;
    const start = Date.now();
    const stageLogger = this.logger.child({ stage: name });
    await this.logger.log({ ...this.eventBase(), type: 'StageStarted', payload: { stage: name } });
    await stageLogger.debug('started');

    try {
      await body();
    } catch (error: unknown) {
      const stageError = new StageError(name, error);
      await this.failed(stageLogger, stageError, Date.now() - start);
      throw stageError;
    }

    await stageLogger.debug('finished');
    await this.logger.log({
      ...this.eventBase(),
      type: 'StageFinished',
      payload: { stage: name, durationMs: Date.now() - start },
    });
  }

  private async init(request: PipelineRequest, state: RunState, result: PipelineResult): Promise<void> {
    if ((request.sign || request.publish) && !request.build) {
      throw new UsageError('Signing and publishing require the build stage');
    }

    const descriptorPath = request.descriptorPath ?? path.join(this.ctx.cwd, DESCRIPTOR_FILENAME);
    const descriptor = MetadataLoader.loadDescriptor(descriptorPath);
    state.descriptor = descriptor;
    if (request.sign) {
      state.userConfig = MetadataLoader.loadUserConfig(this.ctx.homeDir);
    }

    const workspace = await this.deps.workspaces.acquire(this.ctx.workDir);
    state.workspace = workspace;

    result.workDir = workspace.root;
    result.envRoot = workspace.envRoot;
    result.package = descriptor.package;
    result.version = descriptor.version;
    result.gitPath = gitSshUrl(descriptor.package);
  }

  private async checkout(state: RunState, result: PipelineResult): Promise<void> {
    const workspace = this.requireWorkspace(state);
    const descriptor = this.requireDescriptor(state);
    const sourceDir = checkoutPath(workspace, descriptor.package);

    await this.deps.checkout.checkout(workspace, gitSshUrl(descriptor.package), sourceDir, this.ctx.branch);
    state.sourceDir = sourceDir;

    // The checked-out tree's own descriptor describes what actually gets built
    const checkedOut = path.join(sourceDir, DESCRIPTOR_FILENAME);
    if (await pathExists(checkedOut)) {
      await this.logger.debug(`Using descriptor from checkout: ${checkedOut}`);
      state.descriptor = MetadataLoader.loadDescriptor(checkedOut);
      result.version = state.descriptor.version;
    }
  }

  private async build(state: RunState, result: PipelineResult): Promise<void> {
    const workspace = this.requireWorkspace(state);
    const descriptor = this.requireDescriptor(state);
    const sourceDir = this.requireSource(state);

    const compiler = await this.deps.toolchain.ensureCompiler(workspace);
    result.binaries = await this.deps.matrix.build(workspace, descriptor, {
      sourceDir,
      outputDir: this.ctx.cwd,
      compiler,
    });
    result.extras = await this.deps.extras.generate(descriptor, {
      sourceDir,
      outputDir: this.ctx.cwd,
    });
  }

  private async sign(state: RunState, result: PipelineResult): Promise<void> {
    const descriptor = this.requireDescriptor(state);
    const { program, identity } = resolveSigning(descriptor.signing, state.userConfig);
    const signer = this.deps.createSigner(program);
    const artifacts = [...result.binaries, ...result.extras];

    for (const artifact of artifacts) {
      result.signatures.push(await signer.sign(artifact, identity, descriptor.options));
    }
    for (const artifact of artifacts) {
      const verification = await signer.verify(artifact, descriptor.options);
      if (!verification.ok) {
        throw new VerificationError(
          `Signature for ${path.basename(artifact)} did not verify: ${verification.error ?? 'unknown error'}`,
        );
      }
    }
  }

  private async publish(state: RunState, result: PipelineResult): Promise<void> {
    const files = [...result.binaries, ...result.extras, ...result.signatures];
    result.published = await this.deps.publisher.publish(files, this.requireDescriptor(state), this.ctx.cwd);
  }

  private async failed(stageLogger: Logger, stageError: StageError, durationMs: number): Promise<void> {
    await stageLogger.trace(
      {
        ...this.eventBase(),
        type: 'StageFailed',
        payload: {
          stage: stageError.stage,
          durationMs,
          errorCode: stageError.code,
          message: stageError.message,
        },
      },
      stageError.message,
    );
  }

  /** Always runs; a failure here fails an otherwise successful run */
  private async releaseWorkspace(): Promise<StageError | undefined> {
    const start = Date.now();
    try {
      await this.deps.workspaces.release();
      return undefined;
    } catch (error: unknown) {
      const stageError = new StageError('Cleanup', error);
      await this.failed(this.logger.child({ stage: 'Cleanup' }), stageError, Date.now() - start);
      return stageError;
    }
  }

  private eventBase() {
    return {
      schemaVersion: EVENT_SCHEMA_VERSION,
      timestamp: new Date().toISOString(),
      runId: this.ctx.runId,
    };
  }

  private requireDescriptor(state: RunState): PackageDescriptor {
    if (!state.descriptor) throw new UsageError('Descriptor has not been loaded');
    return state.descriptor;
  }

  private requireWorkspace(state: RunState): Workspace {
    if (!state.workspace) throw new UsageError('Workspace has not been acquired');
    return state.workspace;
  }

  private requireSource(state: RunState): string {
    if (!state.sourceDir) throw new UsageError('Package has not been checked out');
    return state.sourceDir;
  }
}
