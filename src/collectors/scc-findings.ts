import { z } from 'zod';
import { ExternalServiceError } from '../domain/errors';
import { Resource } from '../domain/resource';
import { throwIfCanceled } from '../engine/stage';
import { callCloud } from '../invocation/calls';
import { parseResponse } from '../invocation/transports/http';
import { CollectorContext, ResourceCollector } from './types';

export const LIST_SCC_FINDINGS = 'securitycenter.organizations.sources.findings.list';

/** Security Command Center scanners whose findings are collected. */
export const SCC_SOURCES = [
  { label: 'SHA', sourceId: 'SECURITY_HEALTH_ANALYTICS', optional: false },
  { label: 'WSS', sourceId: 'WEB_SECURITY_SCANNER', optional: true },
  { label: 'CONTAINER', sourceId: 'CONTAINER_SCANNER', optional: true },
] as const;
type SccSource = (typeof SCC_SOURCES)[number];

const SCC_SEVERITIES = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW'] as const;

const SccFindingSchema = z
  .object({
    name: z.string().min(1),
    category: z.string().min(1),
    resourceName: z.string().default(''),
    state: z.string().default('ACTIVE'),
    severity: z.string().optional(),
    findingClass: z.string().default('VULNERABILITY'),
    eventTime: z.string().optional(),
    description: z.string().optional(),
    externalUri: z.string().optional(),
    sourceProperties: z.record(z.unknown()).default({}),
  })
  .passthrough();
type SccFinding = z.infer<typeof SccFindingSchema>;

const ListFindingsSchema = z
  .object({
    listFindingsResults: z.array(z.object({ finding: SccFindingSchema }).passthrough()).default([]),
    nextPageToken: z.string().optional(),
  })
  .passthrough();

export interface SccCollectorOptions {
  /** Numeric organization id the findings are listed under. */
  organizationId: string;
  /** How far back `eventTime` may lie. */
  lookbackDays?: number;
  now?: () => Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Active vulnerability findings from Security Command Center, one list per
 * scanner, narrowed to the audited project by the list filter. A scanner that
 * is not enabled answers 400; for the optional scanners that is an empty list.
 */
export function createSccFindingsCollector(options: SccCollectorOptions): ResourceCollector {
  const lookbackDays = options.lookbackDays ?? 7;
  const now = options.now ?? (() => new Date());

  return {
    category: 'scc-findings',

    async collect(context: CollectorContext): Promise<Resource[]> {
      const since = new Date(now().getTime() - lookbackDays * DAY_MS).toISOString();
      const resources: Resource[] = [];

      for (const source of SCC_SOURCES) {
        try {
          const findings = await listFindings(context, options.organizationId, source, since);
          resources.push(...findings.map((finding) => toResource(finding, source)));
        } catch (err) {
          if (source.optional && err instanceof ExternalServiceError && err.statusCode === 400) {
            context.logger.warn('Scanner not enabled, skipping', { source: source.label });
            continue;
          }
          throw err;
        }
      }
      return resources;
    },
  };
}

async function listFindings(
  { projectId, strategy, cancellation }: CollectorContext,
  organizationId: string,
  source: SccSource,
  since: string,
): Promise<SccFinding[]> {
  const filter = [
    'state="ACTIVE"',
    'finding_class="VULNERABILITY"',
    `source_properties.source_id="${source.sourceId}"`,
    `resource.project_display_name="${projectId}"`,
    `event_time >= "${since}"`,
  ].join(' AND ');
  const parent = `organizations/${encodeURIComponent(organizationId)}/sources/-`;

  const findings: SccFinding[] = [];
  let pageToken: string | undefined;
  do {
    throwIfCanceled(cancellation);
    const query = new URLSearchParams({ filter, pageSize: '100' });
    if (pageToken) query.set('pageToken', pageToken);
    const body = await callCloud(strategy, {
      operation: LIST_SCC_FINDINGS,
      resource: pageToken ? `${source.label}:${pageToken}` : source.label,
      method: 'GET',
      url: `https://securitycenter.googleapis.com/v1/${parent}/findings?${query.toString()}`,
    });
    const page = parseResponse(ListFindingsSchema, body, LIST_SCC_FINDINGS);
    findings.push(...page.listFindingsResults.map((result) => result.finding));
    pageToken = page.nextPageToken || undefined;
  } while (pageToken);
  return findings;
}

function toResource(finding: SccFinding, source: SccSource): Resource {
  const severity = SCC_SEVERITIES.find((level) => level === finding.severity?.toUpperCase()) ?? 'MEDIUM';
  const recommendation = finding.sourceProperties.Recommendation ?? finding.sourceProperties.recommendation;

  const metadata: Record<string, unknown> = {
    source: source.label,
    category: finding.category,
    severity,
    state: finding.state,
    findingClass: finding.findingClass,
    resourceName: finding.resourceName,
  };
  if (finding.eventTime) metadata.eventTime = finding.eventTime;
  if (finding.description) metadata.description = finding.description;
  if (typeof recommendation === 'string' && recommendation) metadata.recommendation = recommendation;
  if (finding.externalUri) metadata.externalUri = finding.externalUri;

  return {
    id: finding.name,
    type: 'scc-finding',
    name: finding.category,
    iamBindings: [],
    metadata,
  };
}
