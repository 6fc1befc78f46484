import { mkdtempSync, rmSync } from 'fs';
import os from 'os';
import path from 'path';
import { ArtifactEntry, ArtifactSlot } from '../src/domain/artifact';
import { StageName } from '../src/domain/run';
import { CancellationToken, Stage, StageContext } from '../src/engine/stage';
import { AdapterStrategy, InvocationRequest, InvocationResponse } from '../src/invocation/types';
import { LogEntry, Logger, createLogger, setLogHandler } from '../src/logger';

/** Route log output into an array for the rest of the test file. */
export function captureLogs(): LogEntry[] {
  const entries: LogEntry[] = [];
  setLogHandler((entry) => {
    entries.push(entry);
  });
  return entries;
}

export function makeTempDir(): string {
  return mkdtempSync(path.join(os.tmpdir(), 'cloud-audit-test-'));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export const testLogger: Logger = createLogger({ component: 'test' });

export const notCanceled: CancellationToken = { canceled: false };

/** Strategy answering from a handler function, recording every request. */
export function fakeStrategy(
  handler: (request: InvocationRequest) => InvocationResponse | Promise<InvocationResponse>,
): AdapterStrategy & { requests: InvocationRequest[] } {
  const requests: InvocationRequest[] = [];
  return {
    mode: 'mock',
    requests,
    async invoke(request) {
      requests.push(request);
      return handler(request);
    },
  };
}

export function stageContext(overrides: Partial<StageContext> = {}): StageContext {
  return {
    runId: 'run_test',
    projectId: 'demo-1',
    strategy: fakeStrategy(() => {
      throw new Error('no external calls expected');
    }),
    concurrency: 4,
    cancellation: notCanceled,
    logger: testLogger,
    ...overrides,
  };
}

/** A stage whose behaviour is supplied by the test. */
export function scriptedStage(
  name: StageName,
  input: ArtifactSlot | undefined,
  outputs: ArtifactSlot[],
  execute: (input: ArtifactEntry | undefined, context: StageContext) => Promise<ArtifactEntry[]>,
): Stage & { calls: number } {
  const stage = {
    name,
    input,
    outputs,
    calls: 0,
    async execute(entry: ArtifactEntry | undefined, context: StageContext): Promise<ArtifactEntry[]> {
      stage.calls++;
      return execute(entry, context);
    },
  };
  return stage;
}
