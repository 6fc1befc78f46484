/**
 * Assembly of the live Invocation Adapter from settings.
 */

import { Settings } from '../config/settings';
import { Logger } from '../logger';
import { InvocationAdapter, InvocationConfig } from './adapter';
import { AccessTokenProvider, createGoogleCloudTransport, googleAccessTokenProvider } from './transports/google-cloud';
import { FetchFn } from './transports/http';
import { createOllamaTransport, createVertexGeminiTransport } from './transports/model';
import { ProcessRunner, createProcessTransport } from './transports/process';
import { ModelTransport } from './types';

export interface LiveAdapterOptions {
  settings: Settings;
  /** The audited project; hosts Vertex AI calls unless GCP_PROJECT_ID says otherwise. */
  projectId: string;
  config?: Partial<InvocationConfig>;
  fetch?: FetchFn;
  tokens?: AccessTokenProvider;
  runProcess?: ProcessRunner;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  logger?: Logger;
}

export function createLiveAdapter(options: LiveAdapterOptions): InvocationAdapter {
  const { settings } = options;
  const tokens = options.tokens ?? googleAccessTokenProvider();

  return new InvocationAdapter(
    {
      cloud: createGoogleCloudTransport({ tokens, fetch: options.fetch }),
      model: createModelTransport(options, tokens),
      process: createProcessTransport(options.runProcess),
    },
    {
      timeoutMs: settings.timeoutMs,
      maxAttempts: settings.maxAttempts,
      ...options.config,
    },
    { logger: options.logger, sleep: options.sleep, random: options.random },
  );
}

function createModelTransport(options: LiveAdapterOptions, tokens: AccessTokenProvider): ModelTransport {
  const { settings } = options;
  const generation = { temperature: settings.temperature, maxOutputTokens: settings.maxOutputTokens };

  if (settings.aiProvider === 'ollama') {
    return createOllamaTransport({
      ...generation,
      endpoint: settings.ollamaEndpoint,
      model: settings.ollamaModel,
      fetch: options.fetch,
    });
  }
  return createVertexGeminiTransport({
    ...generation,
    projectId: settings.gcpProjectId ?? options.projectId,
    location: settings.vertexLocation,
    model: settings.vertexModel,
    tokens,
    fetch: options.fetch,
  });
}
