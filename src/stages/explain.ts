/**
 * Explain stage: derive security findings from collected resources.
 *
 * Resources are batched by type; each batch is one model call on the
 * bounded pool. Findings get the deterministic id `resourceId#findingType`
 * and are sorted by severity, resource and type.
 */

import { z } from 'zod';
import { ArtifactEntry } from '../domain/artifact';
import { ExternalServiceError } from '../domain/errors';
import {
  Finding,
  RESOURCE_TYPES,
  Resource,
  ResourceType,
  SeveritySchema,
  compareFindings,
  severityRank,
} from '../domain/resource';
import { Stage, StageContext, assertSameProject, unexpectedInput } from '../engine/stage';
import { runPool } from '../engine/worker-pool';
import { callModel } from '../invocation/calls';
import { ModelOutputError, parseModelJson } from '../llm/json';
import { SECURITY_ANALYST_SYSTEM_PROMPT, buildAnalysisPrompt } from '../llm/prompts';
import { Logger } from '../logger';

const RawFindingSchema = z.object({
  resourceId: z.string().min(1),
  findingType: z
    .string()
    .min(1)
    .transform((value) => value.trim().toUpperCase().replace(/[^A-Z0-9]+/g, '_').replace(/^_+|_+$/g, ''))
    .pipe(z.string().min(1, 'must name a finding type')),
  severity: z.preprocess((value) => (typeof value === 'string' ? value.trim().toUpperCase() : value), SeveritySchema),
  title: z.string().min(1),
  description: z.string().min(1),
  recommendation: z.string().default(''),
});

const ModelFindingsSchema = z.union([
  z.object({ findings: z.array(RawFindingSchema) }),
  z.array(RawFindingSchema).transform((findings) => ({ findings })),
]);

interface ResourceBatch {
  type: ResourceType;
  resources: Resource[];
}

export class ExplainStage implements Stage {
  readonly name = 'explain';
  readonly input = 'collected';
  readonly outputs = ['explained'] as const;

  async execute(input: ArtifactEntry | undefined, context: StageContext): Promise<ArtifactEntry[]> {
    if (input?.slot !== 'collected') throw unexpectedInput(this.name, this.input, input);
    const { projectId, resources } = input.payload;
    assertSameProject(this.name, input.slot, projectId, context.projectId);

    const batches = batchByType(resources);
    const results = await runPool(batches, (batch) => this.explainBatch(batch, context), {
      concurrency: context.concurrency,
      cancellation: context.cancellation,
    });

    const findings = dedupeFindings(results.flat()).sort(compareFindings);
    context.logger.info('Findings derived', { findings: findings.length, batches: batches.length });
    return [{ slot: 'explained', payload: { projectId, findings } }];
  }

  private async explainBatch(batch: ResourceBatch, context: StageContext): Promise<Finding[]> {
    const purpose = `explain:${batch.type}`;
    const text = await callModel(context.strategy, {
      purpose,
      systemPrompt: SECURITY_ANALYST_SYSTEM_PROMPT,
      prompt: buildAnalysisPrompt(batch.type, batch.resources),
    });
    return parseFindings(text, batch, purpose, context.logger);
  }
}

/** Non-empty batches in RESOURCE_TYPES order. */
export function batchByType(resources: readonly Resource[]): ResourceBatch[] {
  return RESOURCE_TYPES.map((type) => ({
    type,
    resources: resources.filter((resource) => resource.type === type),
  })).filter((batch) => batch.resources.length > 0);
}

/**
 * Turn a completion into findings for one batch. Unparseable output is a
 * fatal external error; findings about resources outside the batch are
 * dropped.
 */
export function parseFindings(text: string, batch: ResourceBatch, target: string, log: Logger): Finding[] {
  let document: unknown;
  try {
    document = parseModelJson(text);
  } catch (err) {
    if (err instanceof ModelOutputError) throw malformedCompletion(target, err.message);
    throw err;
  }

  const parsed = ModelFindingsSchema.safeParse(document);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw malformedCompletion(target, `${issue?.path.join('.') ?? ''}: ${issue?.message ?? 'invalid findings'}`);
  }

  const known = new Set(batch.resources.map((resource) => resource.id));
  const findings: Finding[] = [];
  for (const raw of parsed.data.findings) {
    if (!known.has(raw.resourceId)) {
      log.warn('Dropping finding for unknown resource', { resourceId: raw.resourceId, findingType: raw.findingType });
      continue;
    }
    findings.push({ id: `${raw.resourceId}#${raw.findingType}`, ...raw });
  }
  return findings;
}

/** One finding per id; the most severe wins, ties keep the first by content. */
export function dedupeFindings(findings: readonly Finding[]): Finding[] {
  const byId = new Map<string, Finding>();
  for (const finding of findings) {
    const existing = byId.get(finding.id);
    if (!existing || preferred(finding, existing)) byId.set(finding.id, finding);
  }
  return [...byId.values()];
}

function preferred(candidate: Finding, current: Finding): boolean {
  const rank = severityRank(candidate.severity) - severityRank(current.severity);
  if (rank !== 0) return rank < 0;
  return JSON.stringify(candidate) < JSON.stringify(current);
}

function malformedCompletion(target: string, detail: string): ExternalServiceError {
  return new ExternalServiceError({
    code: 'EXTERNAL.MALFORMED_RESPONSE',
    message: `${target} returned unusable findings: ${detail}`,
    transient: false,
    target,
  });
}
