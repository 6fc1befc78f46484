/**
 * External invocation request/response model.
 *
 * Everything the pipeline asks of the outside world is one of three
 * request kinds. Stages never talk to a transport directly; they go through
 * an AdapterStrategy, which is either the live Invocation Adapter or the
 * mock fixture strategy.
 */

import type { ExecutionMode } from '../domain/run';

/** A Google Cloud REST call. */
export interface CloudRequest {
  kind: 'cloud';
  /** API method name, e.g. "storage.buckets.list". Mock fixtures are keyed on it. */
  operation: string;
  /** Optional sub-key (bucket name, page token) distinguishing calls to one operation. */
  resource?: string;
  method: 'GET' | 'POST';
  url: string;
  body?: unknown;
}

/** A generative-model completion. */
export interface ModelRequest {
  kind: 'model';
  /** What the completion is for, e.g. "explain:storage-bucket". Mock fixtures are keyed on it. */
  purpose: string;
  systemPrompt: string;
  prompt: string;
}

/** An out-of-process tool invocation. */
export interface ProcessRequest {
  kind: 'process';
  command: string;
  args: string[];
}

export type InvocationRequest = CloudRequest | ModelRequest | ProcessRequest;

export interface CloudResponse {
  kind: 'cloud';
  body: unknown;
}

export interface ModelResponse {
  kind: 'model';
  text: string;
}

export interface ProcessResponse {
  kind: 'process';
  stdout: string;
  stderr: string;
}

export type InvocationResponse = CloudResponse | ModelResponse | ProcessResponse;

export type CloudTransport = (request: CloudRequest, signal: AbortSignal) => Promise<CloudResponse>;
export type ModelTransport = (request: ModelRequest, signal: AbortSignal) => Promise<ModelResponse>;
export type ProcessTransport = (request: ProcessRequest, signal: AbortSignal) => Promise<ProcessResponse>;

export interface Transports {
  cloud?: CloudTransport;
  model?: ModelTransport;
  process?: ProcessTransport;
}

/**
 * How a run reaches external services. Resolved once per run by the
 * Execution Mode Manager and passed explicitly to every stage.
 */
export interface AdapterStrategy {
  readonly mode: ExecutionMode;
  invoke(request: InvocationRequest): Promise<InvocationResponse>;
}

/** Short label for logs and error messages. */
export function describeRequest(request: InvocationRequest): string {
  switch (request.kind) {
    case 'cloud':
      return request.resource ? `${request.operation}(${request.resource})` : request.operation;
    case 'model':
      return `model:${request.purpose}`;
    case 'process':
      return `process:${request.command}`;
  }
}
