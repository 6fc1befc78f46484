import { ExternalServiceError } from '../domain/errors';
import {
  AdapterStrategy,
  CloudRequest,
  InvocationRequest,
  InvocationResponse,
  ModelRequest,
  ProcessRequest,
  ProcessResponse,
  describeRequest,
} from './types';

function mismatch(request: InvocationRequest, response: InvocationResponse): ExternalServiceError {
  const target = describeRequest(request);
  return new ExternalServiceError({
    code: 'EXTERNAL.RESPONSE_KIND',
    message: `${target} answered with a ${response.kind} response`,
    transient: false,
    target,
  });
}

/** Issue a cloud call and return the decoded JSON body. */
export async function callCloud(strategy: AdapterStrategy, request: Omit<CloudRequest, 'kind'>): Promise<unknown> {
  const full: CloudRequest = { kind: 'cloud', ...request };
  const response = await strategy.invoke(full);
  if (response.kind !== 'cloud') throw mismatch(full, response);
  return response.body;
}

/** Issue a model call and return the completion text. */
export async function callModel(strategy: AdapterStrategy, request: Omit<ModelRequest, 'kind'>): Promise<string> {
  const full: ModelRequest = { kind: 'model', ...request };
  const response = await strategy.invoke(full);
  if (response.kind !== 'model') throw mismatch(full, response);
  return response.text;
}

export async function callProcess(
  strategy: AdapterStrategy,
  request: Omit<ProcessRequest, 'kind'>,
): Promise<Omit<ProcessResponse, 'kind'>> {
  const full: ProcessRequest = { kind: 'process', ...request };
  const response = await strategy.invoke(full);
  if (response.kind !== 'process') throw mismatch(full, response);
  return { stdout: response.stdout, stderr: response.stderr };
}
