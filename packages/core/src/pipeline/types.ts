import type { StageError } from '@foundry/shared';

/** `Cleanup` is the workspace release that closes every run */
export type StageName =
  | 'Init'
  | 'Checkout'
  | 'DependencySync'
  | 'Test'
  | 'Build'
  | 'Sign'
  | 'Publish'
  | 'Cleanup';

export type PipelineState = StageName | 'Done' | 'Failed';

export interface PipelineRequest {
  build: boolean;
  sign: boolean;
  publish: boolean;
  /** Defaults to `metadata.json` in the caller's working directory */
  descriptorPath?: string;
}

/**
 * Everything the run produced so far. Filled stage by stage and returned
 * whether the run succeeded or not.
 */
export interface PipelineResult {
  workDir?: string;
  envRoot?: string;
  package?: string;
  version?: string;
  gitPath?: string;
  binaries: string[];
  extras: string[];
  signatures: string[];
  published: string[];
}

export interface PipelineOutcome {
  state: 'Done' | 'Failed';
  result: PipelineResult;
  /** Absent on success */
  failedStage?: StageName;
  error?: StageError;
}
