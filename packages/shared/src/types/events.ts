/**
 * Base interface for all pipeline events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the pipeline run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted when a pipeline run starts.
 */
export interface RunStarted extends BaseEvent {
  type: 'RunStarted';
  payload: {
    /** Stages the caller enabled */
    build: boolean;
    sign: boolean;
    publish: boolean;
    branch?: string;
  };
}

/** Emitted when a stage begins */
export interface StageStarted extends BaseEvent {
  type: 'StageStarted';
  payload: {
    stage: string;
  };
}

/** Emitted when a stage completes successfully */
export interface StageFinished extends BaseEvent {
  type: 'StageFinished';
  payload: {
    stage: string;
    durationMs: number;
  };
}

/** Emitted when a stage fails; the run ends right after */
export interface StageFailed extends BaseEvent {
  type: 'StageFailed';
  payload: {
    stage: string;
    durationMs: number;
    errorCode: string;
    message: string;
  };
}

/**
 * Emitted once per run, after the workspace has been released.
 */
export interface RunFinished extends BaseEvent {
  type: 'RunFinished';
  payload: {
    status: 'success' | 'failure';
    /** Last state reached by the state machine */
    state: string;
    binaries: string[];
  };
}

export type PipelineEvent = RunStarted | StageStarted | StageFinished | StageFailed | RunFinished;

export type PipelineEventType = PipelineEvent['type'];
