/**
 * Pipeline Controller: the orchestration core.
 *
 * Runs the requested stages in canonical order (collect → explain → report).
 * Each stage's input is read through the store before it starts and its
 * outputs are committed before the next one begins, so a later stage only
 * ever sees artifacts committed by an earlier one. The first fatal stage
 * error halts the run; the failed StageResult and the original error are
 * returned to the caller.
 */

import { v4 as uuid } from 'uuid';
import { ArtifactEntry, ArtifactSlot } from '../domain/artifact';
import {
  ArtifactValidationError,
  CancellationError,
  ConfigurationError,
  StorageError,
  TypedError,
  toPipelineError,
} from '../domain/errors';
import {
  PipelineRun,
  RunRequest,
  RunResult,
  RunState,
  STAGE_ORDER,
  STAGE_RUN_STATE,
  StageName,
  StageResult,
  StageStatus,
} from '../domain/run';
import { AdapterStrategy } from '../invocation/types';
import { Logger, logger as rootLogger } from '../logger';
import { ExecutionModeManager } from '../mode/mode-manager';
import { createDefaultStages } from '../stages';
import { FileArtifactStore } from '../storage/file-store';
import { ArtifactStore } from '../storage/store';
import { CancellationToken, Stage, StageContext } from './stage';
import { transitionRunState } from './state-machine';

/** Controller configuration. */
export interface ControllerConfig {
  /** Bound on concurrent sub-tasks inside a stage. */
  concurrency: number;
}

export const DEFAULT_CONTROLLER_CONFIG: ControllerConfig = {
  concurrency: 4,
};

export interface ControllerDependencies {
  modeManager: ExecutionModeManager;
  /** Stage implementations; defaults to collect, explain and report. */
  stages?: readonly Stage[];
  /** Opens the store for an output directory. */
  openStore?: (outputDir: string) => ArtifactStore;
  logger?: Logger;
}

export class PipelineController {
  private readonly config: ControllerConfig;
  private readonly stages: ReadonlyMap<StageName, Stage>;
  private readonly openStore: (outputDir: string) => ArtifactStore;
  private readonly logger: Logger;
  /** Runs currently executing, with their cancellation reason once canceled. */
  private readonly activeRuns = new Map<string, { canceled: boolean; reason?: string }>();

  constructor(
    private readonly deps: ControllerDependencies,
    config?: Partial<ControllerConfig>,
  ) {
    this.config = { ...DEFAULT_CONTROLLER_CONFIG, ...config };
    if (!Number.isInteger(this.config.concurrency) || this.config.concurrency < 1) {
      throw new ConfigurationError(`Concurrency must be a positive integer, got ${this.config.concurrency}`, {
        concurrency: this.config.concurrency,
      });
    }
    const stages = deps.stages ?? createDefaultStages();
    this.stages = new Map(stages.map((stage) => [stage.name, stage]));
    this.logger = deps.logger ?? rootLogger;
    this.openStore = deps.openStore ?? ((dir) => new FileArtifactStore(dir, { logger: this.logger }));
  }

  /**
   * Request cancellation of an active run. It takes effect at the next
   * stage or sub-task boundary; in-flight external calls finish first.
   * Returns false when no such run is active.
   */
  cancel(runId: string, reason?: string): boolean {
    const entry = this.activeRuns.get(runId);
    if (!entry) return false;
    entry.canceled = true;
    entry.reason = reason;
    return true;
  }

  /**
   * Execute a run to completion or first failure.
   *
   * Throws ConfigurationError, before any stage starts, when the request
   * itself is unusable. Everything that goes wrong inside a stage is
   * reported through the returned RunResult instead.
   */
  async run(request: RunRequest): Promise<RunResult> {
    const plan = this.plan(request);
    const projectId = request.projectId.trim();
    const store = await this.prepareStore(request.outputDir);
    const strategy = this.deps.modeManager.resolve(request.mode, { projectId });

    const run: PipelineRun = {
      id: `run_${uuid()}`,
      projectId,
      mode: request.mode,
      createdAt: new Date().toISOString(),
      state: RunState.Pending,
    };
    const cancellation: { canceled: boolean; reason?: string } = { canceled: false };
    this.activeRuns.set(run.id, cancellation);

    const onAbort = (): void => {
      this.cancel(run.id, abortReason(request.signal));
    };
    if (request.signal?.aborted) onAbort();
    request.signal?.addEventListener('abort', onAbort, { once: true });

    const log = this.logger.child({ runId: run.id, projectId, mode: run.mode });
    log.info('Run started', { stages: plan.map((stage) => stage.name), outputDir: store.directory });

    try {
      return await this.execute(run, plan, store, strategy, cancellation, log);
    } finally {
      request.signal?.removeEventListener('abort', onAbort);
      this.activeRuns.delete(run.id);
    }
  }

  private async execute(
    run: PipelineRun,
    plan: readonly Stage[],
    store: ArtifactStore,
    strategy: AdapterStrategy,
    cancellation: CancellationToken,
    log: Logger,
  ): Promise<RunResult> {
    const history: StageResult[] = [];
    const artifacts: Partial<Record<ArtifactSlot, string>> = {};

    for (const stage of plan) {
      const startedAt = new Date().toISOString();
      const stageLog = log.child({ stage: stage.name });
      this.transition(run, STAGE_RUN_STATE[stage.name]);

      try {
        if (cancellation.canceled) throw new CancellationError(cancellation.reason);

        const input = stage.input ? await store.readEntry(stage.input) : undefined;
        const context: StageContext = {
          runId: run.id,
          projectId: run.projectId,
          strategy,
          concurrency: this.config.concurrency,
          cancellation,
          logger: stageLog,
        };
        stageLog.info('Stage started', { input: stage.input });

        const outputs = await stage.execute(input, context);
        assertDeclaredOutputs(stage, outputs);
        const committed = await store.commit(outputs);
        Object.assign(artifacts, committed);

        const result = this.stageResult(stage, StageStatus.Succeeded, startedAt, outputs.map((entry) => entry.slot));
        history.push(result);
        stageLog.info('Stage succeeded', { outputs: result.outputs, durationMs: result.durationMs });
      } catch (err) {
        const error = toPipelineError(err, stage.name);
        const typed: TypedError = { ...error.typedError, stage: stage.name, runId: run.id };
        const result = this.stageResult(stage, StageStatus.Failed, startedAt, [], typed);
        history.push(result);

        this.transition(run, RunState.Failed);
        run.failure = { stage: stage.name, error: typed };
        stageLog.error('Stage failed', { code: typed.code, error: error.message, durationMs: result.durationMs });
        return { run, history, artifacts, failure: { result, error } };
      }
    }

    this.transition(run, RunState.Complete);
    log.info('Run complete', { artifacts: Object.keys(artifacts) });
    return { run, history, artifacts };
  }

  /** Validate the request and resolve the stages to run, in canonical order. */
  private plan(request: RunRequest): Stage[] {
    if (!request.projectId.trim()) {
      throw new ConfigurationError('A project id is required', { field: 'projectId' });
    }
    const requested = request.stages ?? STAGE_ORDER;
    if (requested.length === 0) {
      throw new ConfigurationError('At least one stage must be requested');
    }
    const unknown = requested.filter((name) => !STAGE_ORDER.includes(name));
    if (unknown.length > 0) {
      throw new ConfigurationError(`Unknown stage(s): ${unknown.join(', ')}`, { stages: unknown });
    }
    // each stage reads only what the one before it committed
    const positions = STAGE_ORDER.flatMap((name, index) => (requested.includes(name) ? [index] : []));
    const gap = positions.some((position, index) => index > 0 && position !== positions[index - 1] + 1);
    if (gap) {
      const ordered = positions.map((position) => STAGE_ORDER[position]);
      throw new ConfigurationError(`Requested stages must be consecutive, got ${ordered.join(', ')}`, {
        stages: ordered,
      });
    }

    return STAGE_ORDER.filter((name) => requested.includes(name)).map((name) => {
      const stage = this.stages.get(name);
      if (!stage) {
        throw new ConfigurationError(`No implementation registered for the ${name} stage`, { stage: name });
      }
      return stage;
    });
  }

  private async prepareStore(outputDir: string): Promise<ArtifactStore> {
    if (!outputDir.trim()) {
      throw new ConfigurationError('An output directory is required', { field: 'outputDir' });
    }
    const store = this.openStore(outputDir);
    try {
      await store.ensureWritable();
    } catch (err) {
      if (err instanceof StorageError) {
        throw new ConfigurationError(err.message, { outputDir });
      }
      throw err;
    }
    return store;
  }

  private transition(run: PipelineRun, target: RunState): void {
    const result = transitionRunState(run.state, target);
    if (!result.success || !result.newState) {
      throw new ControllerError(
        result.error ?? {
          code: 'RUN.INVALID_TRANSITION',
          message: `Invalid run state transition: ${run.state} -> ${target}`,
          retryable: false,
          suggestedFixes: [],
        },
      );
    }
    run.state = result.newState;
  }

  private stageResult(
    stage: Stage,
    status: StageStatus,
    startedAt: string,
    outputs: ArtifactSlot[],
    error?: TypedError,
  ): StageResult {
    const completedAt = new Date().toISOString();
    return {
      stage: stage.name,
      status,
      input: stage.input,
      outputs,
      error,
      startedAt,
      completedAt,
      durationMs: new Date(completedAt).getTime() - new Date(startedAt).getTime(),
    };
  }
}

/** A stage may only emit the slots it declares, each exactly once. */
function assertDeclaredOutputs(stage: Stage, outputs: readonly ArtifactEntry[]): void {
  const emitted = outputs.map((entry) => entry.slot);
  const undeclared = emitted.filter((slot) => !stage.outputs.includes(slot));
  const missing = stage.outputs.filter((slot) => !emitted.includes(slot));
  const duplicated = emitted.filter((slot, index) => emitted.indexOf(slot) !== index);
  if (undeclared.length > 0 || missing.length > 0 || duplicated.length > 0) {
    throw new ArtifactValidationError(
      'ARTIFACT.UNEXPECTED_OUTPUT',
      undeclared[0] ?? missing[0] ?? duplicated[0] ?? stage.outputs.join(','),
      `${stage.name} stage emitted [${emitted.join(', ')}], declared [${stage.outputs.join(', ')}]`,
      { emitted, declared: [...stage.outputs] },
    );
  }
}

function abortReason(signal: AbortSignal | undefined): string {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason.message;
  return typeof reason === 'string' ? reason : 'aborted';
}

/** Controller invariant violated (a bug, not a stage failure). */
export class ControllerError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ControllerError';
  }
}
