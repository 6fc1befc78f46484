/**
 * Invocation Adapter: the live path to external services.
 *
 * Every call is bounded by a per-attempt timeout. Transient failures
 * (timeouts, network errors, 408/429/5xx) are retried with capped
 * exponential backoff; anything else fails on the first attempt. Exhausting
 * the attempt ceiling is fatal to the calling stage.
 */

import { ExternalServiceError } from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';
import { BackoffPolicy, DEFAULT_BACKOFF, computeBackoff, sleep as defaultSleep } from './backoff';
import {
  AdapterStrategy,
  InvocationRequest,
  InvocationResponse,
  Transports,
  describeRequest,
} from './types';

/** Retry and timeout policy of the adapter. */
export interface InvocationConfig {
  /** Deadline of a single attempt. */
  timeoutMs: number;
  /** Total attempts per call, including the first. */
  maxAttempts: number;
  backoff: BackoffPolicy;
}

export const DEFAULT_INVOCATION_CONFIG: InvocationConfig = {
  timeoutMs: 30_000,
  maxAttempts: 3,
  backoff: DEFAULT_BACKOFF,
};

export interface InvocationAdapterOptions {
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export class InvocationAdapter implements AdapterStrategy {
  public readonly mode = 'live';
  public readonly config: InvocationConfig;
  private readonly logger: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(
    private readonly transports: Transports,
    config: Partial<InvocationConfig> = {},
    options: InvocationAdapterOptions = {},
  ) {
    this.config = { ...DEFAULT_INVOCATION_CONFIG, ...config };
    if (!Number.isInteger(this.config.maxAttempts) || this.config.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${this.config.maxAttempts}`);
    }
    this.logger = (options.logger ?? rootLogger).child({ component: 'invocation' });
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  async invoke(request: InvocationRequest): Promise<InvocationResponse> {
    const target = describeRequest(request);
    const { maxAttempts } = this.config;
    let lastError: ExternalServiceError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await this.attempt(request, target);
      } catch (err) {
        const error = classifyFailure(err, target);
        if (!error.transient) {
          throw error.withAttempts(attempt);
        }
        lastError = error;

        if (attempt < maxAttempts) {
          const delay = computeBackoff(this.config.backoff, attempt, this.random);
          this.logger.warn('Transient failure, retrying', {
            target,
            attempt,
            maxAttempts,
            delayMs: delay,
            error: error.message,
          });
          await this.sleep(delay);
        }
      }
    }

    throw new ExternalServiceError({
      code: 'EXTERNAL.RETRIES_EXHAUSTED',
      message: `${target} failed after ${maxAttempts} attempts: ${lastError?.message ?? 'unknown error'}`,
      transient: true,
      target,
      statusCode: lastError?.statusCode,
      attempts: maxAttempts,
      cause: lastError,
    });
  }

  /** One attempt under the timeout. The transport sees an aborted signal on expiry. */
  private attempt(request: InvocationRequest, target: string): Promise<InvocationResponse> {
    const { timeoutMs } = this.config;
    const controller = new AbortController();

    return new Promise<InvocationResponse>((resolve, reject) => {
      const timer = setTimeout(() => {
        controller.abort();
        reject(
          new ExternalServiceError({
            code: 'EXTERNAL.TIMEOUT',
            message: `${target} timed out after ${timeoutMs}ms`,
            transient: true,
            target,
          }),
        );
      }, timeoutMs);

      this.dispatch(request, controller.signal)
        .then((response) => {
          clearTimeout(timer);
          resolve(response);
        })
        .catch((err: unknown) => {
          clearTimeout(timer);
          reject(err);
        });
    });
  }

  private dispatch(request: InvocationRequest, signal: AbortSignal): Promise<InvocationResponse> {
    switch (request.kind) {
      case 'cloud':
        if (!this.transports.cloud) return Promise.reject(missingTransport(request.kind));
        return this.transports.cloud(request, signal);
      case 'model':
        if (!this.transports.model) return Promise.reject(missingTransport(request.kind));
        return this.transports.model(request, signal);
      case 'process':
        if (!this.transports.process) return Promise.reject(missingTransport(request.kind));
        return this.transports.process(request, signal);
    }
  }
}

function missingTransport(kind: InvocationRequest['kind']): ExternalServiceError {
  return new ExternalServiceError({
    code: 'EXTERNAL.NO_TRANSPORT',
    message: `No ${kind} transport configured for live mode`,
    transient: false,
    target: kind,
  });
}

/**
 * Map anything a transport throws onto an ExternalServiceError.
 * fetch reports connection failures as a TypeError; those are transient.
 */
export function classifyFailure(err: unknown, target: string): ExternalServiceError {
  if (err instanceof ExternalServiceError) return err;
  if (err instanceof TypeError && err.message === 'fetch failed') {
    return new ExternalServiceError({
      code: 'EXTERNAL.NETWORK',
      message: `${target} network error: ${describeCause(err)}`,
      transient: true,
      target,
      cause: err,
    });
  }
  return new ExternalServiceError({
    code: 'EXTERNAL.FAILED',
    message: `${target} failed: ${err instanceof Error ? err.message : String(err)}`,
    transient: false,
    target,
    cause: err,
  });
}

function describeCause(err: Error): string {
  const cause = err.cause;
  return cause instanceof Error ? cause.message : err.message;
}
