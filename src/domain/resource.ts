/**
 * Resource and Finding payload schemas.
 *
 * Resources are produced only by Collect; Findings only by Explain and
 * consumed only by Report. The schemas are what the Artifact Store
 * validates on every read and write.
 */

import { z } from 'zod';

export const RESOURCE_TYPES = ['project', 'service-account', 'storage-bucket', 'scc-finding'] as const;

export const ResourceTypeSchema = z.enum(RESOURCE_TYPES);
export type ResourceType = z.infer<typeof ResourceTypeSchema>;

export const IamBindingSchema = z
  .object({
    role: z.string().min(1),
    members: z.array(z.string().min(1)),
  })
  .strict();
export type IamBinding = z.infer<typeof IamBindingSchema>;

export const ResourceSchema = z
  .object({
    id: z.string().min(1),
    type: ResourceTypeSchema,
    name: z.string().min(1),
    iamBindings: z.array(IamBindingSchema),
    metadata: z.record(z.unknown()),
  })
  .strict();
export type Resource = z.infer<typeof ResourceSchema>;

/** Severity levels, most severe first. */
export const SEVERITIES = ['CRITICAL', 'HIGH', 'MEDIUM', 'LOW', 'INFO'] as const;

export const SeveritySchema = z.enum(SEVERITIES);
export type Severity = z.infer<typeof SeveritySchema>;

export const FindingSchema = z
  .object({
    id: z.string().min(1),
    resourceId: z.string().min(1),
    findingType: z.string().min(1),
    severity: SeveritySchema,
    title: z.string().min(1),
    description: z.string().min(1),
    recommendation: z.string(),
  })
  .strict();
export type Finding = z.infer<typeof FindingSchema>;

/** Rank of a severity; lower is more severe. */
export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

/** Deterministic finding order: severity, then resource, then finding type. */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    severityRank(a.severity) - severityRank(b.severity) ||
    compareKeys(a.resourceId, b.resourceId) ||
    compareKeys(a.findingType, b.findingType)
  );
}

/** Locale-independent string ordering. */
export function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
