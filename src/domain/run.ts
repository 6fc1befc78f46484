/**
 * Run domain model.
 *
 * A PipelineRun is one invocation of the Controller: it walks the fixed
 * stage order, appending a StageResult per executed stage.
 */

import type { ArtifactSlot } from './artifact';
import type { PipelineError, TypedError } from './errors';

/** Pipeline stages in their canonical execution order. */
export const STAGE_ORDER = ['collect', 'explain', 'report'] as const;

export type StageName = (typeof STAGE_ORDER)[number];

/** Execution mode of a run. */
export type ExecutionMode = 'mock' | 'live';

/** Run lifecycle states. */
export enum RunState {
  Pending = 'pending',
  Collecting = 'collecting',
  Explaining = 'explaining',
  Reporting = 'reporting',
  Complete = 'complete',
  Failed = 'failed',
}

/** The in-progress state a run is in while a stage executes. */
export const STAGE_RUN_STATE: Record<StageName, RunState> = {
  collect: RunState.Collecting,
  explain: RunState.Explaining,
  report: RunState.Reporting,
};

/**
 * Valid state transitions for runs.
 *
 * A run may begin at a later stage (single-stage CLI commands) and may
 * complete after any stage, but never moves backwards.
 */
export const VALID_RUN_TRANSITIONS: Record<RunState, RunState[]> = {
  [RunState.Pending]: [RunState.Collecting, RunState.Explaining, RunState.Reporting, RunState.Failed],
  [RunState.Collecting]: [RunState.Explaining, RunState.Complete, RunState.Failed],
  [RunState.Explaining]: [RunState.Reporting, RunState.Complete, RunState.Failed],
  [RunState.Reporting]: [RunState.Complete, RunState.Failed],
  [RunState.Complete]: [],
  [RunState.Failed]: [],
};

export enum StageStatus {
  Succeeded = 'succeeded',
  Failed = 'failed',
}

/** Outcome of one stage. Appended to the run history, never mutated. */
export interface StageResult {
  readonly stage: StageName;
  readonly status: StageStatus;
  /** Slot read as input, if the stage has one. */
  readonly input?: ArtifactSlot;
  /** Slots committed by the stage; empty when it failed. */
  readonly outputs: readonly ArtifactSlot[];
  readonly error?: TypedError;
  readonly startedAt: string;
  readonly completedAt: string;
  readonly durationMs: number;
}

export interface RunFailure {
  stage: StageName;
  error: TypedError;
}

export interface PipelineRun {
  id: string;
  projectId: string;
  mode: ExecutionMode;
  createdAt: string;
  state: RunState;
  failure?: RunFailure;
}

/** What Controller.run() returns once the run is terminal. */
export interface RunResult {
  run: PipelineRun;
  history: StageResult[];
  /** Absolute paths of the artifacts committed by this run. */
  artifacts: Partial<Record<ArtifactSlot, string>>;
  /** First fatal stage result with the original error object. */
  failure?: { result: StageResult; error: PipelineError };
}

/** Input for Controller.run(). */
export interface RunRequest {
  projectId: string;
  mode: ExecutionMode;
  outputDir: string;
  /** Stages to execute; always run in canonical order. Defaults to all. */
  stages?: readonly StageName[];
  /** External cancellation, e.g. wired to SIGINT by the CLI. */
  signal?: AbortSignal;
}
