/**
 * Mock adapter strategy: answers every request from fixture data.
 *
 * Fixture files live in one directory:
 *   cloud.json    response bodies keyed by operation, or "operation:resource"
 *   model.json    completion text keyed by purpose
 *   process.json  optional, stdout keyed by command
 *
 * The string `{{projectId}}` anywhere in a fixture key or value is replaced
 * with the run's project id.
 */

import { readFileSync } from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError, ExternalServiceError } from '../domain/errors';
import {
  AdapterStrategy,
  InvocationRequest,
  InvocationResponse,
  describeRequest,
} from '../invocation/types';

/** Fixtures shipped with the package; resolves from both src/ and dist/. */
export const DEFAULT_FIXTURES_DIR = path.resolve(__dirname, '..', '..', 'fixtures', 'mock');

const MockFixturesSchema = z.object({
  cloud: z.record(z.unknown()),
  model: z.record(z.string()),
  process: z.record(z.string()).default({}),
});
export type MockFixtures = z.infer<typeof MockFixturesSchema>;

const PROJECT_PLACEHOLDER = '{{projectId}}';

function readFixtureFile(dir: string, name: string, optional: boolean): unknown {
  const file = path.join(dir, name);
  let raw: string;
  try {
    raw = readFileSync(file, 'utf8');
  } catch (err) {
    if (optional && err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
    throw new ConfigurationError(`Cannot read mock fixture ${file}: ${err instanceof Error ? err.message : String(err)}`, { path: file });
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Mock fixture ${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`, { path: file });
  }
}

export function loadMockFixtures(dir: string = DEFAULT_FIXTURES_DIR): MockFixtures {
  const result = MockFixturesSchema.safeParse({
    cloud: readFixtureFile(dir, 'cloud.json', false),
    model: readFixtureFile(dir, 'model.json', false),
    process: readFixtureFile(dir, 'process.json', true),
  });
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(`Invalid mock fixtures in ${dir}: ${issue?.path.join('.')}: ${issue?.message}`, { path: dir });
  }
  return result.data;
}

/** Replace the project placeholder in every string of a JSON value. */
export function substituteProject(value: unknown, projectId: string): unknown {
  if (typeof value === 'string') return value.split(PROJECT_PLACEHOLDER).join(projectId);
  if (Array.isArray(value)) return value.map((item) => substituteProject(item, projectId));
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = substituteProject(item, projectId);
    }
    return out;
  }
  return value;
}

export class MockStrategy implements AdapterStrategy {
  public readonly mode = 'mock';
  private readonly cloud: Map<string, unknown>;
  private readonly model: Map<string, string>;
  private readonly process: Map<string, string>;

  constructor(fixtures: MockFixtures, private readonly projectId: string) {
    this.cloud = this.index(fixtures.cloud);
    this.model = this.index(fixtures.model);
    this.process = this.index(fixtures.process);
  }

  async invoke(request: InvocationRequest): Promise<InvocationResponse> {
    switch (request.kind) {
      case 'cloud': {
        const key = request.resource ? `${request.operation}:${request.resource}` : request.operation;
        if (!this.cloud.has(key)) throw this.missing(request, key);
        // substitution also yields a fresh copy, so callers cannot mutate the fixture
        return { kind: 'cloud', body: substituteProject(this.cloud.get(key), this.projectId) };
      }
      case 'model': {
        const text = this.model.get(request.purpose);
        if (text === undefined) throw this.missing(request, request.purpose);
        return { kind: 'model', text: this.fill(text) };
      }
      case 'process': {
        const stdout = this.process.get(request.command);
        if (stdout === undefined) throw this.missing(request, request.command);
        return { kind: 'process', stdout: this.fill(stdout), stderr: '' };
      }
    }
  }

  private fill(text: string): string {
    return text.split(PROJECT_PLACEHOLDER).join(this.projectId);
  }

  private index<T>(record: Record<string, T>): Map<string, T> {
    return new Map<string, T>(Object.entries(record).map(([key, value]) => [this.fill(key), value]));
  }

  private missing(request: InvocationRequest, key: string): ExternalServiceError {
    return new ExternalServiceError({
      code: 'EXTERNAL.MOCK.NO_FIXTURE',
      message: `No mock fixture for ${request.kind} request "${key}"`,
      transient: false,
      target: describeRequest(request),
    });
  }
}
