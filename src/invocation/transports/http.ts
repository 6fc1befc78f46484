/**
 * Shared HTTP plumbing for the live transports.
 */

import { ZodType, ZodTypeDef } from 'zod';
import { ExternalServiceError, externalHttpError, maskSecretsInMessage } from '../../domain/errors';

export type FetchFn = typeof fetch;

export interface JsonRequest {
  /** Label used in errors, e.g. "storage.buckets.list". */
  target: string;
  url: string;
  method: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
  signal: AbortSignal;
  /** Values to mask in any error message built from a response. */
  secrets?: string[];
}

/**
 * Send a JSON request and parse the JSON reply.
 *
 * Non-2xx responses become ExternalServiceErrors classified by status.
 * Connection failures propagate as fetch's TypeError for the adapter to
 * classify.
 */
export async function fetchJson(fetchFn: FetchFn, request: JsonRequest): Promise<unknown> {
  const res = await fetchFn(request.url, {
    method: request.method,
    headers: {
      Accept: 'application/json',
      ...(request.body === undefined ? {} : { 'Content-Type': 'application/json' }),
      ...request.headers,
    },
    body: request.body === undefined ? undefined : JSON.stringify(request.body),
    signal: request.signal,
  });

  if (!res.ok) {
    const text = await res.text().catch(() => '');
    throw externalHttpError(request.target, res.status, maskSecretsInMessage(text, request.secrets ?? []));
  }

  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    throw malformedResponse(request.target, `non-JSON body (HTTP ${res.status}): ${text.slice(0, 200)}`);
  }
}

/** Validate a response body, failing fatally when the service returned an unexpected shape. */
export function parseResponse<T>(schema: ZodType<T, ZodTypeDef, unknown>, body: unknown, target: string): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw malformedResponse(target, `${where}${issue?.message ?? 'invalid response'}`);
  }
  return result.data;
}

export function malformedResponse(target: string, detail: string): ExternalServiceError {
  return new ExternalServiceError({
    code: 'EXTERNAL.MALFORMED_RESPONSE',
    message: `${target} returned an unexpected response: ${detail}`,
    transient: false,
    target,
  });
}
