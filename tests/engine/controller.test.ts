import { existsSync, readFileSync, writeFileSync } from 'fs';
import path from 'path';
import { ResourceCollector } from '../../src/collectors';
import { ArtifactEntry } from '../../src/domain/artifact';
import {
  ArtifactValidationError,
  CancellationError,
  ConfigurationError,
  ExternalServiceError,
  UnexpectedStageError,
} from '../../src/domain/errors';
import { RunState, StageStatus } from '../../src/domain/run';
import { PipelineController } from '../../src/engine/controller';
import { ExecutionModeManager } from '../../src/mode/mode-manager';
import { CollectStage } from '../../src/stages/collect';
import { FileArtifactStore } from '../../src/storage/file-store';
import { captureLogs, makeTempDir, removeDir, scriptedStage } from '../helpers';

const collectedEntry: ArtifactEntry = { slot: 'collected', payload: { projectId: 'demo-1', resources: [] } };
const explainedEntry: ArtifactEntry = { slot: 'explained', payload: { projectId: 'demo-1', findings: [] } };

function modeManager(): ExecutionModeManager {
  return new ExecutionModeManager({ fixtures: { cloud: {}, model: {}, process: {} } });
}

function pipeline() {
  const collect = scriptedStage('collect', undefined, ['collected'], async () => [collectedEntry]);
  const explain = scriptedStage('explain', 'collected', ['explained'], async () => [explainedEntry]);
  const report = scriptedStage('report', 'explained', ['report-markdown', 'report-html'], async () => [
    { slot: 'report-markdown', payload: '# Report\n' },
    { slot: 'report-html', payload: '<p>Report</p>\n' },
  ]);
  return { collect, explain, report };
}

describe('PipelineController', () => {
  let dir: string;

  beforeAll(() => {
    captureLogs();
  });

  beforeEach(() => {
    dir = makeTempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  test('runs every stage in order and commits each output', async () => {
    const inputs: Array<string | undefined> = [];
    const collect = scriptedStage('collect', undefined, ['collected'], async (input) => {
      inputs.push(input?.slot);
      return [collectedEntry];
    });
    const explain = scriptedStage('explain', 'collected', ['explained'], async (input) => {
      inputs.push(input?.slot);
      expect(input).toEqual(collectedEntry);
      return [explainedEntry];
    });
    const { report } = pipeline();
    const controller = new PipelineController({ modeManager: modeManager(), stages: [report, explain, collect] });

    const result = await controller.run({ projectId: 'demo-1', mode: 'mock', outputDir: dir });

    expect(result.failure).toBeUndefined();
    expect(result.run.state).toBe(RunState.Complete);
    expect(result.run.id).toMatch(/^run_[0-9a-f-]{36}$/);
    expect(result.history.map((entry) => [entry.stage, entry.status])).toEqual([
      ['collect', StageStatus.Succeeded],
      ['explain', StageStatus.Succeeded],
      ['report', StageStatus.Succeeded],
    ]);
    expect(inputs).toEqual([undefined, 'collected']);
    expect(result.artifacts).toEqual({
      collected: path.join(dir, 'collected.json'),
      explained: path.join(dir, 'explained.json'),
      'report-markdown': path.join(dir, 'audit.md'),
      'report-html': path.join(dir, 'audit.html'),
    });
    await expect(new FileArtifactStore(dir).read('report-markdown')).resolves.toBe('# Report\n');
  });

  test('halts at the first failing stage', async () => {
    const { collect, report } = pipeline();
    const failure = new ExternalServiceError({
      code: 'EXTERNAL.RETRIES_EXHAUSTED',
      message: 'model:explain:project failed after 3 attempts',
      transient: true,
      target: 'model:explain:project',
      attempts: 3,
    });
    const explain = scriptedStage('explain', 'collected', ['explained'], async () => {
      throw failure;
    });
    const controller = new PipelineController({ modeManager: modeManager(), stages: [collect, explain, report] });

    const result = await controller.run({ projectId: 'demo-1', mode: 'mock', outputDir: dir });

    expect(result.run.state).toBe(RunState.Failed);
    expect(report.calls).toBe(0);
    expect(result.history.map((entry) => entry.status)).toEqual([StageStatus.Succeeded, StageStatus.Failed]);
    expect(result.failure?.error).toBe(failure);
    expect(result.failure?.result.error).toMatchObject({
      code: 'EXTERNAL.RETRIES_EXHAUSTED',
      stage: 'explain',
      runId: result.run.id,
      retryable: true,
    });
    expect(result.run.failure?.stage).toBe('explain');
    expect(existsSync(path.join(dir, 'collected.json'))).toBe(true);
    expect(existsSync(path.join(dir, 'explained.json'))).toBe(false);
  });

  test('a partial run reads its input from earlier runs', async () => {
    await new FileArtifactStore(dir).write('explained', { projectId: 'demo-1', findings: [] });
    const { collect, explain, report } = pipeline();
    const controller = new PipelineController({ modeManager: modeManager(), stages: [collect, explain, report] });

    const result = await controller.run({ projectId: 'demo-1', mode: 'mock', outputDir: dir, stages: ['report'] });

    expect(result.run.state).toBe(RunState.Complete);
    expect(collect.calls + explain.calls).toBe(0);
    expect(report.calls).toBe(1);
    expect(Object.keys(result.artifacts)).toEqual(['report-markdown', 'report-html']);
  });

  test('a missing input artifact fails the stage without running it', async () => {
    const { collect, explain, report } = pipeline();
    const controller = new PipelineController({ modeManager: modeManager(), stages: [collect, explain, report] });

    const result = await controller.run({ projectId: 'demo-1', mode: 'mock', outputDir: dir, stages: ['explain'] });

    expect(explain.calls).toBe(0);
    expect(result.failure?.error).toBeInstanceOf(ArtifactValidationError);
    expect(result.failure?.error.exitCode).toBe(2);
    expect(result.failure?.result.error?.code).toBe('ARTIFACT.MISSING');
  });

  test('requested stages run in canonical order', async () => {
    const { collect, explain } = pipeline();
    const controller = new PipelineController({ modeManager: modeManager(), stages: [explain, collect] });

    const result = await controller.run({ projectId: 'demo-1', mode: 'mock', outputDir: dir, stages: ['explain', 'collect'] });

    expect(result.run.state).toBe(RunState.Complete);
    expect(result.history.map((entry) => entry.stage)).toEqual(['collect', 'explain']);
  });

  test('a failing collector fails the run and keeps the previous inventory', async () => {
    const store = new FileArtifactStore(dir);
    const location = await store.write('collected', {
      projectId: 'demo-1',
      resources: [{ id: 'projects/demo-1', type: 'project', name: 'demo-1', iamBindings: [], metadata: {} }],
    });
    const before = readFileSync(location, 'utf8');

    const healthy: ResourceCollector = {
      category: 'healthy',
      collect: async () => [{ id: 'sa/a', type: 'service-account', name: 'a@x', iamBindings: [], metadata: {} }],
    };
    const broken: ResourceCollector = {
      category: 'broken',
      collect: async () => {
        throw new ExternalServiceError({
          code: 'EXTERNAL.HTTP.FATAL',
          message: 'cloud:storage.buckets.list HTTP 403',
          transient: false,
          target: 'cloud:storage.buckets.list',
          statusCode: 403,
        });
      },
    };
    const controller = new PipelineController({
      modeManager: modeManager(),
      stages: [new CollectStage([healthy, broken])],
    });

    const result = await controller.run({ projectId: 'demo-1', mode: 'mock', outputDir: dir, stages: ['collect'] });

    expect(result.run.state).toBe(RunState.Failed);
    expect(result.failure?.result.error?.code).toBe('EXTERNAL.HTTP.FATAL');
    expect(result.failure?.error.exitCode).toBe(1);
    expect(result.artifacts).toEqual({});
    expect(readFileSync(location, 'utf8')).toBe(before);
  });

  test('undeclared outputs are rejected before anything is committed', async () => {
    const collect = scriptedStage('collect', undefined, ['collected'], async () => [collectedEntry, explainedEntry]);
    const controller = new PipelineController({ modeManager: modeManager(), stages: [collect] });

    const result = await controller.run({ projectId: 'demo-1', mode: 'mock', outputDir: dir, stages: ['collect'] });

    expect(result.failure?.result.error?.code).toBe('ARTIFACT.UNEXPECTED_OUTPUT');
    expect(result.failure?.error.message).toBe('collect stage emitted [collected, explained], declared [collected]');
    expect(existsSync(path.join(dir, 'collected.json'))).toBe(false);
  });

  test('unexpected exceptions are wrapped with the stage name', async () => {
    const collect = scriptedStage('collect', undefined, ['collected'], async () => {
      throw new TypeError('cannot read properties of undefined');
    });
    const controller = new PipelineController({ modeManager: modeManager(), stages: [collect] });

    const result = await controller.run({ projectId: 'demo-1', mode: 'mock', outputDir: dir, stages: ['collect'] });

    expect(result.failure?.error).toBeInstanceOf(UnexpectedStageError);
    expect(result.failure?.error.message).toBe('Unexpected error in collect stage: cannot read properties of undefined');
  });

  test('passes the run context to each stage', async () => {
    const collect = scriptedStage('collect', undefined, ['collected'], async (_input, context) => {
      expect(context.projectId).toBe('demo-1');
      expect(context.concurrency).toBe(2);
      expect(context.strategy.mode).toBe('mock');
      expect(context.runId).toMatch(/^run_/);
      return [collectedEntry];
    });
    const controller = new PipelineController({ modeManager: modeManager(), stages: [collect] }, { concurrency: 2 });

    const result = await controller.run({ projectId: ' demo-1 ', mode: 'mock', outputDir: dir, stages: ['collect'] });
    expect(result.failure).toBeUndefined();
    expect(result.run.projectId).toBe('demo-1');
  });

  describe('cancellation', () => {
    test('an aborted signal stops the run at the next stage boundary', async () => {
      const abort = new AbortController();
      const { explain, report } = pipeline();
      const collect = scriptedStage('collect', undefined, ['collected'], async () => {
        abort.abort('interrupted');
        return [collectedEntry];
      });
      const controller = new PipelineController({ modeManager: modeManager(), stages: [collect, explain, report] });

      const result = await controller.run({ projectId: 'demo-1', mode: 'mock', outputDir: dir, signal: abort.signal });

      expect(explain.calls).toBe(0);
      expect(result.history.map((entry) => [entry.stage, entry.status])).toEqual([
        ['collect', StageStatus.Succeeded],
        ['explain', StageStatus.Failed],
      ]);
      expect(result.failure?.error).toBeInstanceOf(CancellationError);
      expect(result.failure?.error.message).toBe('Run canceled: interrupted');
      expect(existsSync(path.join(dir, 'collected.json'))).toBe(true);
    });

    test('a signal aborted before the run fails the first stage', async () => {
      const abort = new AbortController();
      abort.abort('shutdown');
      const { collect, explain, report } = pipeline();
      const controller = new PipelineController({ modeManager: modeManager(), stages: [collect, explain, report] });

      const result = await controller.run({ projectId: 'demo-1', mode: 'mock', outputDir: dir, signal: abort.signal });

      expect(collect.calls).toBe(0);
      expect(result.failure?.result.stage).toBe('collect');
      expect(result.failure?.result.error?.code).toBe('RUN.CANCELED');
    });

    test('cancel() stops an active run by id', async () => {
      let accepted: boolean | undefined;
      let controller: PipelineController | undefined;
      const collect = scriptedStage('collect', undefined, ['collected'], async (_input, context) => {
        accepted = controller?.cancel(context.runId, 'operator request');
        return [collectedEntry];
      });
      const { explain, report } = pipeline();
      controller = new PipelineController({ modeManager: modeManager(), stages: [collect, explain, report] });

      const result = await controller.run({ projectId: 'demo-1', mode: 'mock', outputDir: dir });

      expect(accepted).toBe(true);
      expect(result.failure?.error.message).toBe('Run canceled: operator request');
      expect(controller.cancel(result.run.id)).toBe(false);
    });
  });

  describe('preconditions', () => {
    test('rejects a blank project id', async () => {
      const controller = new PipelineController({ modeManager: modeManager(), stages: [] });
      await expect(controller.run({ projectId: '  ', mode: 'mock', outputDir: dir })).rejects.toThrow(ConfigurationError);
    });

    test('rejects an empty stage list', async () => {
      const controller = new PipelineController({ modeManager: modeManager(), stages: [] });
      await expect(controller.run({ projectId: 'demo-1', mode: 'mock', outputDir: dir, stages: [] })).rejects.toThrow(
        'At least one stage must be requested',
      );
    });

    test('rejects stages that are not consecutive', async () => {
      const { collect, explain, report } = pipeline();
      const controller = new PipelineController({ modeManager: modeManager(), stages: [collect, explain, report] });

      await expect(
        controller.run({ projectId: 'demo-1', mode: 'mock', outputDir: dir, stages: ['report', 'collect'] }),
      ).rejects.toThrow(new ConfigurationError('Requested stages must be consecutive, got collect, report'));
      expect(collect.calls + report.calls).toBe(0);
      expect(existsSync(path.join(dir, 'collected.json'))).toBe(false);
    });

    test('rejects a stage with no implementation', async () => {
      const controller = new PipelineController({ modeManager: modeManager(), stages: [] });
      await expect(controller.run({ projectId: 'demo-1', mode: 'mock', outputDir: dir, stages: ['collect'] })).rejects.toThrow(
        'No implementation registered for the collect stage',
      );
    });

    test('an unusable output directory is a configuration error', async () => {
      const blocker = path.join(dir, 'file');
      writeFileSync(blocker, 'x');
      const { collect } = pipeline();
      const controller = new PipelineController({ modeManager: modeManager(), stages: [collect] });

      await expect(
        controller.run({ projectId: 'demo-1', mode: 'mock', outputDir: path.join(blocker, 'out') }),
      ).rejects.toThrow(ConfigurationError);
      expect(collect.calls).toBe(0);
    });

    test('live mode without a live adapter is a configuration error', async () => {
      const { collect } = pipeline();
      const controller = new PipelineController({ modeManager: modeManager(), stages: [collect] });
      await expect(controller.run({ projectId: 'demo-1', mode: 'live', outputDir: dir, stages: ['collect'] })).rejects.toThrow(ConfigurationError);
    });

    test('rejects a non-positive concurrency', () => {
      expect(() => new PipelineController({ modeManager: modeManager() }, { concurrency: 0 })).toThrow(ConfigurationError);
    });
  });
});
