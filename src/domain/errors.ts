/**
 * Typed error model for machine-actionable error handling.
 *
 * Every failure the pipeline surfaces is a PipelineError subclass carrying a
 * serializable TypedError. StageResults and the CLI report the typed form;
 * the class decides the exit code.
 */

import type { StageName } from './run';

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'CONFIG'
  | 'ARTIFACT'
  | 'EXTERNAL'
  | 'STORAGE'
  | 'RUN'
  | 'STAGE';

/** Typed suggested fix an operator (or agent) can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure recorded in StageResults. */
export interface TypedError {
  /** Namespaced error code (e.g., "EXTERNAL.HTTP.TRANSIENT"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Stage that failed, once the Controller attributes the error. */
  stage?: StageName;
  runId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  stage?: StageName;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    stage: params.stage,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Process exit codes of the CLI. */
export enum ExitCode {
  Success = 0,
  StageFailure = 1,
  InvalidInput = 2,
}

/** Base class of every error the pipeline raises on purpose. */
export abstract class PipelineError extends Error {
  public readonly typedError: TypedError;
  public abstract readonly exitCode: ExitCode;

  constructor(typedError: TypedError, options?: { cause?: unknown }) {
    super(typedError.message, options);
    this.typedError = typedError;
  }
}

/** Bad flags or environment, detected before any stage runs. */
export class ConfigurationError extends PipelineError {
  public readonly exitCode = ExitCode.InvalidInput;

  constructor(message: string, details?: Record<string, unknown>) {
    super(
      createTypedError({
        code: 'CONFIG.INVALID',
        message,
        details,
        suggestedFixes: [
          { type: 'FIX_CONFIGURATION', params: details ?? {}, description: 'Correct the flag or environment variable and re-run' },
        ],
      }),
    );
    this.name = 'ConfigurationError';
  }
}

export type ArtifactErrorCode =
  | 'ARTIFACT.MISSING'
  | 'ARTIFACT.MALFORMED'
  | 'ARTIFACT.SCHEMA'
  | 'ARTIFACT.SCHEMA_VERSION'
  | 'ARTIFACT.PROJECT_MISMATCH'
  | 'ARTIFACT.UNEXPECTED_INPUT'
  | 'ARTIFACT.UNEXPECTED_OUTPUT';

/** Missing or malformed input/output artifact. */
export class ArtifactValidationError extends PipelineError {
  public readonly exitCode = ExitCode.InvalidInput;
  public readonly slot: string;

  constructor(code: ArtifactErrorCode, slot: string, message: string, details?: Record<string, unknown>) {
    const fixes: SuggestedFix[] =
      code === 'ARTIFACT.MISSING' || code === 'ARTIFACT.SCHEMA_VERSION'
        ? [{ type: 'RUN_PRODUCING_STAGE', params: { slot }, description: `Re-run the stage that produces "${slot}"` }]
        : [];
    super(createTypedError({ code, message, details: { slot, ...details }, suggestedFixes: fixes }));
    this.name = 'ArtifactValidationError';
    this.slot = slot;
  }
}

/** Failure of an external service call (cloud API, model endpoint, subprocess). */
export class ExternalServiceError extends PipelineError {
  public readonly exitCode = ExitCode.StageFailure;
  /** Whether the failure class is transient (worth retrying). */
  public readonly transient: boolean;
  public readonly statusCode?: number;
  public readonly attempts: number;

  constructor(params: {
    code: string;
    message: string;
    transient: boolean;
    target: string;
    statusCode?: number;
    attempts?: number;
    cause?: unknown;
  }) {
    const fixes: SuggestedFix[] = [];
    if (params.statusCode === 401 || params.statusCode === 403) {
      fixes.push({ type: 'CHECK_CREDENTIALS', params: { statusCode: params.statusCode }, description: 'Verify application-default credentials and IAM permissions' });
    } else if (params.transient) {
      fixes.push({ type: 'WAIT_AND_RETRY', params: {}, description: 'Transient failure. Retry later or raise --max-attempts.' });
    }
    super(
      createTypedError({
        code: params.code,
        message: params.message,
        retryable: params.transient,
        details: { target: params.target, statusCode: params.statusCode, attempts: params.attempts ?? 1 },
        suggestedFixes: fixes,
      }),
      { cause: params.cause },
    );
    this.name = 'ExternalServiceError';
    this.transient = params.transient;
    this.statusCode = params.statusCode;
    this.attempts = params.attempts ?? 1;
  }

  /** Copy of this error recording how many attempts were made. */
  withAttempts(attempts: number): ExternalServiceError {
    return new ExternalServiceError({
      code: this.typedError.code,
      message: this.message,
      transient: this.transient,
      target: String(this.typedError.details?.target ?? ''),
      statusCode: this.statusCode,
      attempts,
      cause: this.cause,
    });
  }
}

/** Durable-storage failure. */
export class StorageError extends PipelineError {
  public readonly exitCode = ExitCode.StageFailure;

  constructor(message: string, path: string, cause?: unknown) {
    super(
      createTypedError({
        code: 'STORAGE.IO',
        message,
        retryable: true,
        details: { path },
        suggestedFixes: [{ type: 'CHECK_OUTPUT_DIR', params: { path }, description: 'Check free space and permissions of the output directory' }],
      }),
      { cause },
    );
    this.name = 'StorageError';
  }
}

/** The run was aborted by a cancellation signal. */
export class CancellationError extends PipelineError {
  public readonly exitCode = ExitCode.StageFailure;

  constructor(reason?: string) {
    super(
      createTypedError({
        code: 'RUN.CANCELED',
        message: reason ? `Run canceled: ${reason}` : 'Run canceled',
        details: reason ? { reason } : undefined,
      }),
    );
    this.name = 'CancellationError';
  }
}

/** A stage threw something that is not a PipelineError. */
export class UnexpectedStageError extends PipelineError {
  public readonly exitCode = ExitCode.StageFailure;

  constructor(stage: StageName, cause: unknown) {
    super(
      createTypedError({
        code: 'STAGE.UNEXPECTED',
        message: `Unexpected error in ${stage} stage: ${cause instanceof Error ? cause.message : String(cause)}`,
        stage,
      }),
      { cause },
    );
    this.name = 'UnexpectedStageError';
  }
}

/** Normalize anything thrown inside a stage into a PipelineError. */
export function toPipelineError(err: unknown, stage: StageName): PipelineError {
  return err instanceof PipelineError ? err : new UnexpectedStageError(stage, err);
}

/** Exit code for any thrown value; non-pipeline errors count as stage failures. */
export function exitCodeFor(err: unknown): ExitCode {
  return err instanceof PipelineError ? err.exitCode : ExitCode.StageFailure;
}

/**
 * Classify an HTTP status from an external API.
 *
 * - 408, 429 and 5xx: transient, retried with backoff.
 * - every other 4xx (bad request, auth, not found): fatal.
 */
export function isTransientStatus(statusCode: number): boolean {
  return statusCode === 408 || statusCode === 429 || statusCode >= 500;
}

/** ExternalServiceError for a non-2xx HTTP response. */
export function externalHttpError(target: string, statusCode: number, body: string): ExternalServiceError {
  const transient = isTransientStatus(statusCode);
  const label = statusCode === 429 ? 'rate limited' : `HTTP ${statusCode}`;
  return new ExternalServiceError({
    code: transient ? 'EXTERNAL.HTTP.TRANSIENT' : 'EXTERNAL.HTTP.FATAL',
    message: `${target} ${label}${body ? `: ${body.slice(0, 200)}` : ''}`,
    transient,
    target,
    statusCode,
  });
}

/**
 * Mask a secret value, keeping only the last 4 characters.
 * Secrets shorter than 8 characters are fully masked.
 */
export function maskSecret(secret: string): string {
  if (!secret || secret.length < 8) return '****';
  return '*'.repeat(secret.length - 4) + secret.slice(-4);
}

/** Replace every occurrence of each secret in a message with its masked form. */
export function maskSecretsInMessage(message: string, secrets: string[]): string {
  let result = message;
  for (const secret of secrets) {
    if (secret && secret.length > 0) {
      // split/join avoids regex escaping of token characters
      result = result.split(secret).join(maskSecret(secret));
    }
  }
  return result;
}
