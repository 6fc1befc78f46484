/**
 * Environment-driven settings.
 *
 * Parsed once per CLI invocation. Unset and empty variables fall back to
 * defaults; anything present but invalid is a ConfigurationError.
 */

import { z } from 'zod';
import { ConfigurationError } from '../domain/errors';

export const AI_PROVIDERS = ['gemini', 'ollama'] as const;
export type AiProvider = (typeof AI_PROVIDERS)[number];

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

const positiveInt = z.coerce.number().int().positive();

const EnvSchema = z.object({
  GCP_PROJECT_ID: z.string().optional(),
  GCP_ORGANIZATION_ID: z.string().regex(/^\d+$/, 'must be a numeric organization id').optional(),
  VERTEX_AI_LOCATION: z.string().regex(/^[a-z0-9-]+$/, 'must be a region name such as us-central1').default('us-central1'),
  VERTEX_AI_MODEL: z.string().default('gemini-1.5-flash'),
  AI_PROVIDER: z.preprocess(
    (value) => (typeof value === 'string' ? value.toLowerCase() : value),
    z.enum(AI_PROVIDERS).default('gemini'),
  ),
  OLLAMA_MODEL: z.string().default('llama3'),
  OLLAMA_ENDPOINT: z.string().url().default('http://localhost:11434'),
  AI_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.2),
  AI_MAX_OUTPUT_TOKENS: positiveInt.default(8192),
  DATA_DIR: z.string().default('data'),
  AUDIT_MAX_ATTEMPTS: positiveInt.max(10).default(3),
  AUDIT_TIMEOUT_MS: positiveInt.default(30_000),
  AUDIT_CONCURRENCY: positiveInt.max(32).default(4),
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' ? value.toLowerCase() : value),
    z.enum(LOG_LEVELS).default('info'),
  ),
});

export interface Settings {
  /** Project that hosts Vertex AI calls; defaults to the audited project. */
  gcpProjectId?: string;
  /** Organization whose Security Command Center findings are collected; unset skips them. */
  organizationId?: string;
  vertexLocation: string;
  vertexModel: string;
  aiProvider: AiProvider;
  ollamaModel: string;
  ollamaEndpoint: string;
  temperature: number;
  maxOutputTokens: number;
  dataDir: string;
  maxAttempts: number;
  timeoutMs: number;
  concurrency: number;
  logLevel: (typeof LOG_LEVELS)[number];
}

/** Read settings from an environment map. */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const present: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key]?.trim();
    if (value) present[key] = value;
  }

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid environment: ${problems.join('; ')}`, { issues: problems });
  }

  const values = result.data;
  return {
    gcpProjectId: values.GCP_PROJECT_ID,
    organizationId: values.GCP_ORGANIZATION_ID,
    vertexLocation: values.VERTEX_AI_LOCATION,
    vertexModel: values.VERTEX_AI_MODEL,
    aiProvider: values.AI_PROVIDER,
    ollamaModel: values.OLLAMA_MODEL,
    ollamaEndpoint: values.OLLAMA_ENDPOINT,
    temperature: values.AI_TEMPERATURE,
    maxOutputTokens: values.AI_MAX_OUTPUT_TOKENS,
    dataDir: values.DATA_DIR,
    maxAttempts: values.AUDIT_MAX_ATTEMPTS,
    timeoutMs: values.AUDIT_TIMEOUT_MS,
    concurrency: values.AUDIT_CONCURRENCY,
    logLevel: values.LOG_LEVEL,
  };
}
