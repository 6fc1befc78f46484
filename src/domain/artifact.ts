/**
 * Artifact domain model.
 *
 * Artifacts are the only channel between stages: named slots with a
 * registered schema, immutable once committed.
 */

import { z } from 'zod';
import { FindingSchema, ResourceSchema } from './resource';

export const ARTIFACT_SLOTS = ['collected', 'explained', 'report-markdown', 'report-html'] as const;

export type ArtifactSlot = (typeof ARTIFACT_SLOTS)[number];

export const CollectedPayloadSchema = z
  .object({
    projectId: z.string().min(1),
    resources: z.array(ResourceSchema),
  })
  .strict();
export type CollectedPayload = z.infer<typeof CollectedPayloadSchema>;

export const ExplainedPayloadSchema = z
  .object({
    projectId: z.string().min(1),
    findings: z.array(FindingSchema),
  })
  .strict();
export type ExplainedPayload = z.infer<typeof ExplainedPayloadSchema>;

/** Payload type carried by each slot. */
export interface ArtifactPayloads {
  collected: CollectedPayload;
  explained: ExplainedPayload;
  'report-markdown': string;
  'report-html': string;
}

/** A slot together with its payload; discriminated on `slot`. */
export type ArtifactEntry = {
  [S in ArtifactSlot]: { slot: S; payload: ArtifactPayloads[S] };
}[ArtifactSlot];
