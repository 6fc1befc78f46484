/**
 * Stage contract.
 *
 * A stage reads at most one input slot and returns its output entries; it
 * never touches the store itself. The Controller reads the input, commits
 * the outputs and records the StageResult.
 */

import { ArtifactEntry, ArtifactSlot } from '../domain/artifact';
import { ArtifactValidationError, CancellationError } from '../domain/errors';
import { StageName } from '../domain/run';
import { AdapterStrategy } from '../invocation/types';
import { Logger } from '../logger';

/** Cooperative cancellation, read at stage and sub-task boundaries. */
export interface CancellationToken {
  readonly canceled: boolean;
  readonly reason?: string;
}

export function throwIfCanceled(token: CancellationToken): void {
  if (token.canceled) throw new CancellationError(token.reason);
}

/** Execution context provided by the Controller. */
export interface StageContext {
  runId: string;
  projectId: string;
  /** Resolved once per run; the only route to external services. */
  strategy: AdapterStrategy;
  /** Bound on concurrent sub-tasks inside the stage. */
  concurrency: number;
  cancellation: CancellationToken;
  logger: Logger;
}

export interface Stage {
  readonly name: StageName;
  readonly input?: ArtifactSlot;
  readonly outputs: readonly ArtifactSlot[];
  execute(input: ArtifactEntry | undefined, context: StageContext): Promise<ArtifactEntry[]>;
}

/** The input entry did not come from the slot the stage declares. */
export function unexpectedInput(stage: StageName, expected: ArtifactSlot | undefined, input: ArtifactEntry | undefined): ArtifactValidationError {
  const found = input?.slot ?? 'none';
  return new ArtifactValidationError(
    'ARTIFACT.UNEXPECTED_INPUT',
    expected ?? found,
    `${stage} stage expects ${expected ?? 'no'} input, received ${found}`,
    { expected: expected ?? null, found },
  );
}

/** Fail when a stage's input belongs to another project than the run. */
export function assertSameProject(stage: StageName, slot: ArtifactSlot, artifactProject: string, runProject: string): void {
  if (artifactProject !== runProject) {
    throw new ArtifactValidationError(
      'ARTIFACT.PROJECT_MISMATCH',
      slot,
      `${stage} stage input ${slot} belongs to project ${artifactProject}, not ${runProject}`,
      { artifactProject, runProject },
    );
  }
}
