/**
 * Schema registry for artifact slots.
 *
 * JSON slots are written as an envelope
 * `{ artifact, schemaVersion, producedBy, ...payload }` with no timestamps,
 * so identical payloads serialize to identical bytes. Text slots carry a
 * first-line marker comment with the same information.
 */

import { z } from 'zod';
import {
  ArtifactPayloads,
  ArtifactSlot,
  CollectedPayloadSchema,
  ExplainedPayloadSchema,
} from '../domain/artifact';
import { ArtifactValidationError } from '../domain/errors';
import type { StageName } from '../domain/run';

export interface ArtifactDefinition<T> {
  slot: ArtifactSlot;
  fileName: string;
  schemaVersion: number;
  producedBy: StageName;
  /** Validate a payload and render the file contents. */
  serialize(payload: unknown): string;
  /** Validate file contents and return the payload. */
  parse(raw: string): T;
}

export type ArtifactDefinitions = {
  [S in ArtifactSlot]: ArtifactDefinition<ArtifactPayloads[S]>;
};

const EnvelopeHeaderSchema = z
  .object({
    artifact: z.string(),
    schemaVersion: z.number().int(),
    producedBy: z.string(),
  })
  .passthrough();

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

function schemaError(slot: ArtifactSlot, error: z.ZodError): ArtifactValidationError {
  const issues = formatIssues(error);
  return new ArtifactValidationError(
    'ARTIFACT.SCHEMA',
    slot,
    `${slot} artifact failed schema validation: ${issues[0]}`,
    { issues },
  );
}

function jsonArtifact<T>(params: {
  slot: ArtifactSlot;
  fileName: string;
  schemaVersion: number;
  producedBy: StageName;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}): ArtifactDefinition<T> {
  const { slot, schemaVersion, producedBy, schema } = params;
  return {
    ...params,
    serialize(payload) {
      const result = schema.safeParse(payload);
      if (!result.success) throw schemaError(slot, result.error);
      const envelope = { artifact: slot, schemaVersion, producedBy, ...result.data };
      return `${JSON.stringify(envelope, null, 2)}\n`;
    },
    parse(raw) {
      let document: unknown;
      try {
        document = JSON.parse(raw);
      } catch (err) {
        throw new ArtifactValidationError(
          'ARTIFACT.MALFORMED',
          slot,
          `${slot} artifact is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
        );
      }
      const header = EnvelopeHeaderSchema.safeParse(document);
      if (!header.success) throw schemaError(slot, header.error);
      const { artifact, schemaVersion: version, producedBy: producer, ...payload } = header.data;
      if (artifact !== slot || producer !== producedBy) {
        throw new ArtifactValidationError(
          'ARTIFACT.SCHEMA',
          slot,
          `File holds a "${artifact}" artifact produced by "${producer}", expected "${slot}" from "${producedBy}"`,
        );
      }
      if (version !== schemaVersion) {
        throw new ArtifactValidationError(
          'ARTIFACT.SCHEMA_VERSION',
          slot,
          `${slot} artifact has schema version ${version}, expected ${schemaVersion}`,
          { found: version, expected: schemaVersion },
        );
      }
      const result = schema.safeParse(payload);
      if (!result.success) throw schemaError(slot, result.error);
      return result.data;
    },
  };
}

const MARKER_PATTERN = /^<!-- artifact: ([a-z-]+); schemaVersion: (\d+) -->$/;

function textArtifact(params: {
  slot: ArtifactSlot;
  fileName: string;
  schemaVersion: number;
  producedBy: StageName;
}): ArtifactDefinition<string> {
  const { slot, schemaVersion } = params;
  return {
    ...params,
    serialize(payload) {
      if (typeof payload !== 'string' || payload.trim().length === 0) {
        throw new ArtifactValidationError('ARTIFACT.SCHEMA', slot, `${slot} artifact must be a non-empty document`);
      }
      return `<!-- artifact: ${slot}; schemaVersion: ${schemaVersion} -->\n${payload}`;
    },
    parse(raw) {
      const newline = raw.indexOf('\n');
      const firstLine = newline === -1 ? raw : raw.slice(0, newline);
      const match = MARKER_PATTERN.exec(firstLine);
      if (!match || match[1] !== slot) {
        throw new ArtifactValidationError('ARTIFACT.MALFORMED', slot, `${slot} artifact is missing its artifact marker line`);
      }
      const version = Number(match[2]);
      if (version !== schemaVersion) {
        throw new ArtifactValidationError(
          'ARTIFACT.SCHEMA_VERSION',
          slot,
          `${slot} artifact has schema version ${version}, expected ${schemaVersion}`,
          { found: version, expected: schemaVersion },
        );
      }
      const body = newline === -1 ? '' : raw.slice(newline + 1);
      if (body.trim().length === 0) {
        throw new ArtifactValidationError('ARTIFACT.SCHEMA', slot, `${slot} artifact is empty`);
      }
      return body;
    },
  };
}

export const ARTIFACT_DEFINITIONS: ArtifactDefinitions = {
  collected: jsonArtifact({
    slot: 'collected',
    fileName: 'collected.json',
    schemaVersion: 1,
    producedBy: 'collect',
    schema: CollectedPayloadSchema,
  }),
  explained: jsonArtifact({
    slot: 'explained',
    fileName: 'explained.json',
    schemaVersion: 1,
    producedBy: 'explain',
    schema: ExplainedPayloadSchema,
  }),
  'report-markdown': textArtifact({
    slot: 'report-markdown',
    fileName: 'audit.md',
    schemaVersion: 1,
    producedBy: 'report',
  }),
  'report-html': textArtifact({
    slot: 'report-html',
    fileName: 'audit.html',
    schemaVersion: 1,
    producedBy: 'report',
  }),
};
