export const name = '@foundry/core';

export { createExecutionContext } from './context';
export type { ExecutionContext } from './context';
export { MetadataLoader, DESCRIPTOR_FILENAME } from './config/loader';
export { WorkspaceManager, checkoutPath, moduleCachePath, binDir } from './workspace/manager';
export type { Workspace } from './workspace/manager';
export { BuildMatrixExecutor } from './build/matrix';
export type { BuildLayout } from './build/matrix';
export { ExtrasGenerator, renderTemplate, EXECUTABLE_MODE, REGULAR_MODE } from './build/extras';
export type { ExtrasLayout } from './build/extras';
export { binaryName, binaryPrefix, parsePlatform } from './build/naming';
export type { Platform } from './build/naming';
export { SigningEngine, signatureFile, trustStoreArgs, SIGNATURE_SUFFIX } from './signing/engine';
export type { VerificationResult } from './signing/engine';
export { resolveSigning, resolveSigningProgram } from './signing/resolver';
export type { ResolvedSigning } from './signing/resolver';
export { verifyArtifacts } from './signing/verify';
export type { ArtifactVerification } from './signing/verify';
export { GitCheckout, gitSshUrl } from './stages/vcs';
export { GoToolchain, COMPILER_MODULE, COMPILER_NAME } from './stages/golang';
export { CommandPublisher } from './stages/publish';
export type { Publisher } from './stages/publish';
export { PipelineOrchestrator } from './pipeline/orchestrator';
export type { PipelineDependencies } from './pipeline/orchestrator';
export type {
  PipelineOutcome,
  PipelineRequest,
  PipelineResult,
  PipelineState,
  StageName,
} from './pipeline/types';
