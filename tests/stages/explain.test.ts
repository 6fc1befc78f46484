import { createCollectors } from '../../src/collectors';
import { ArtifactEntry, CollectedPayload } from '../../src/domain/artifact';
import { ArtifactValidationError, ExternalServiceError } from '../../src/domain/errors';
import { Finding, Resource } from '../../src/domain/resource';
import { ModelRequest } from '../../src/invocation/types';
import { LogLevel } from '../../src/logger';
import { MockStrategy, loadMockFixtures } from '../../src/mode/mock-strategy';
import { CollectStage } from '../../src/stages/collect';
import { ExplainStage, batchByType, dedupeFindings } from '../../src/stages/explain';
import { captureLogs, fakeStrategy, stageContext } from '../helpers';

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('expected the promise to reject');
}

function resource(id: string, type: Resource['type']): Resource {
  return { id, type, name: id, iamBindings: [], metadata: {} };
}

function collected(resources: Resource[], projectId = 'demo-1'): ArtifactEntry {
  const payload: CollectedPayload = { projectId, resources };
  return { slot: 'collected', payload };
}

function explainedFindings(entries: ArtifactEntry[]): Finding[] {
  const [entry] = entries;
  if (entry?.slot !== 'explained') throw new Error(`expected an explained entry, got ${entry?.slot}`);
  return entry.payload.findings;
}

/** Strategy answering every model call with the given completion. */
function modelReplying(text: string) {
  return fakeStrategy(() => ({ kind: 'model', text }));
}

describe('ExplainStage', () => {
  const logs = captureLogs();

  beforeEach(() => {
    logs.length = 0;
  });

  test('derives sorted findings from the mock fixtures', async () => {
    const strategy = new MockStrategy(loadMockFixtures(), 'demo-1');
    const [input] = await new CollectStage().execute(undefined, stageContext({ strategy }));
    const findings = explainedFindings(await new ExplainStage().execute(input, stageContext({ strategy })));

    expect(findings.map((finding) => [finding.id, finding.severity])).toEqual([
      ['projects/_/buckets/demo-1-public-assets#PUBLIC_BUCKET', 'CRITICAL'],
      ['projects/_/buckets/demo-1-tmp-exports#AUTHENTICATED_USERS_WRITE', 'HIGH'],
      ['projects/demo-1#PRIMITIVE_OWNER_ROLE', 'HIGH'],
      ['projects/demo-1/serviceAccounts/legacy-ci@demo-1.iam.gserviceaccount.com#STALE_PRIVILEGED_ACCOUNT', 'HIGH'],
      ['projects/demo-1#SERVICE_ACCOUNT_EDITOR', 'MEDIUM'],
      ['projects/_/buckets/demo-1-audit-logs#NO_RETENTION_POLICY', 'INFO'],
    ]);
  });

  test('explains Security Command Center findings alongside the configuration', async () => {
    const strategy = new MockStrategy(loadMockFixtures(), 'demo-1');
    const collect = new CollectStage(createCollectors({ organizationId: '123456789' }));
    const [input] = await collect.execute(undefined, stageContext({ strategy }));
    const findings = explainedFindings(await new ExplainStage().execute(input, stageContext({ strategy })));

    expect(findings).toHaveLength(8);
    expect(findings.slice(0, 3).map((finding) => [finding.id, finding.severity])).toEqual([
      ['organizations/123456789/sources/5550003/findings/demo-1-openssl#VULNERABLE_CONTAINER_IMAGE', 'CRITICAL'],
      ['projects/_/buckets/demo-1-public-assets#PUBLIC_BUCKET', 'CRITICAL'],
      ['organizations/123456789/sources/5550001/findings/demo-1-public-bucket#SCC_PUBLIC_BUCKET', 'HIGH'],
    ]);
  });

  test('makes one model call per resource type, in type order', async () => {
    const strategy = modelReplying('{"findings": []}');
    const input = collected([
      resource('b1', 'storage-bucket'),
      resource('p', 'project'),
      resource('b2', 'storage-bucket'),
    ]);

    await new ExplainStage().execute(input, stageContext({ strategy, concurrency: 1 }));

    const purposes = strategy.requests.map((request) => (request.kind === 'model' ? request.purpose : request.kind));
    expect(purposes).toEqual(['explain:project', 'explain:storage-bucket']);
    const bucketPrompt = strategy.requests[1];
    expect(bucketPrompt.kind === 'model' && bucketPrompt.prompt).toContain('"id": "b2"');
  });

  test('normalizes finding types and severities', async () => {
    const strategy = modelReplying(
      JSON.stringify({
        findings: [
          { resourceId: 'p', findingType: 'public bucket', severity: ' low ', title: 'T', description: 'D' },
        ],
      }),
    );
    const findings = explainedFindings(await new ExplainStage().execute(collected([resource('p', 'project')]), stageContext({ strategy })));

    expect(findings).toEqual([
      {
        id: 'p#PUBLIC_BUCKET',
        resourceId: 'p',
        findingType: 'PUBLIC_BUCKET',
        severity: 'LOW',
        title: 'T',
        description: 'D',
        recommendation: '',
      },
    ]);
  });

  test('drops findings about resources outside the batch', async () => {
    const strategy = modelReplying(
      '[{"resourceId": "ghost", "findingType": "X", "severity": "HIGH", "title": "T", "description": "D"}]',
    );
    const findings = explainedFindings(await new ExplainStage().execute(collected([resource('p', 'project')]), stageContext({ strategy })));

    expect(findings).toEqual([]);
    const warning = logs.find((entry) => entry.level === LogLevel.Warn);
    expect(warning?.message).toBe('Dropping finding for unknown resource');
    expect(warning?.context).toMatchObject({ resourceId: 'ghost', findingType: 'X' });
  });

  test('an unparseable completion fails the stage', async () => {
    const strategy = modelReplying('I could not analyse these resources.');
    const err = await rejection(new ExplainStage().execute(collected([resource('p', 'project')]), stageContext({ strategy })));

    expect(err).toBeInstanceOf(ExternalServiceError);
    expect(err instanceof Error && err.message).toBe(
      'explain:project returned unusable findings: No JSON object or array found in model output',
    );
  });

  test('an unknown severity from the model fails the stage', async () => {
    const strategy = modelReplying(
      '{"findings": [{"resourceId": "p", "findingType": "X", "severity": "URGENT", "title": "T", "description": "D"}]}',
    );
    const err = await rejection(new ExplainStage().execute(collected([resource('p', 'project')]), stageContext({ strategy })));

    expect(err instanceof ExternalServiceError && err.typedError.code).toBe('EXTERNAL.MALFORMED_RESPONSE');
  });

  test('a blank finding type from the model fails the stage', async () => {
    const strategy = modelReplying(
      '{"findings": [{"resourceId": "p", "findingType": "   ", "severity": "HIGH", "title": "T", "description": "D"}]}',
    );
    const err = await rejection(new ExplainStage().execute(collected([resource('p', 'project')]), stageContext({ strategy })));

    expect(err).toBeInstanceOf(ExternalServiceError);
    expect(err instanceof ExternalServiceError && err.exitCode).toBe(1);
    expect(err instanceof Error && err.message).toBe(
      'explain:project returned unusable findings: findings.0.findingType: must name a finding type',
    );
  });

  test('an empty inventory needs no model calls', async () => {
    const strategy = modelReplying('{}');
    const entries = await new ExplainStage().execute(collected([]), stageContext({ strategy }));

    expect(entries).toEqual([{ slot: 'explained', payload: { projectId: 'demo-1', findings: [] } }]);
    expect(strategy.requests).toHaveLength(0);
  });

  test('rejects an inventory of another project', async () => {
    const err = await rejection(new ExplainStage().execute(collected([], 'other'), stageContext()));
    expect(err).toBeInstanceOf(ArtifactValidationError);
    expect(err instanceof ArtifactValidationError && err.typedError.code).toBe('ARTIFACT.PROJECT_MISMATCH');
  });

  test('requires the collected artifact', async () => {
    const err = await rejection(new ExplainStage().execute(undefined, stageContext()));
    expect(err instanceof Error && err.message).toBe('explain stage expects collected input, received none');
  });

  test('completions are requested with the analyst system prompt', async () => {
    const strategy = modelReplying('{"findings": []}');
    await new ExplainStage().execute(collected([resource('p', 'project')]), stageContext({ strategy }));
    const [request] = strategy.requests;
    const model: ModelRequest | undefined = request?.kind === 'model' ? request : undefined;
    expect(model?.systemPrompt).toMatch(/^You are a cloud security auditor/);
  });
});

describe('batchByType', () => {
  test('skips empty types', () => {
    const batches = batchByType([resource('s', 'service-account')]);
    expect(batches.map((batch) => batch.type)).toEqual(['service-account']);
  });
});

describe('dedupeFindings', () => {
  const base: Finding = {
    id: 'r#T',
    resourceId: 'r',
    findingType: 'T',
    severity: 'LOW',
    title: 'low',
    description: 'd',
    recommendation: '',
  };

  test('keeps the most severe finding per id', () => {
    const high: Finding = { ...base, severity: 'HIGH', title: 'high' };
    expect(dedupeFindings([base, high])).toEqual([high]);
    expect(dedupeFindings([high, base])).toEqual([high]);
  });
});
