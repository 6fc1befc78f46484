/**
 * Prompt templates for security analysis.
 */

import { Resource, ResourceType, SEVERITIES } from '../domain/resource';

export const SECURITY_ANALYST_SYSTEM_PROMPT = [
  'You are a cloud security auditor specialising in Google Cloud IAM and storage configuration.',
  'Apply least privilege, separation of duties and CIS Google Cloud benchmark guidance.',
  'Report only risks supported by the configuration you are given. Every recommendation must be actionable.',
  'Respond with JSON only.',
].join('\n');

const FOCUS: Record<ResourceType, string> = {
  project: 'primitive roles (owner/editor), external or public members, over-broad bindings, privilege escalation paths',
  'service-account': 'privileged service accounts, unused or disabled accounts still holding roles, user-managed keys',
  'storage-bucket': 'public access (allUsers/allAuthenticatedUsers), uniform bucket-level access, public access prevention, retention',
  'scc-finding': 'the real-world impact of each Security Command Center finding on this project, its exploitability, and the remediation order',
};

/** Build the analysis prompt for one batch of resources of a single type. */
export function buildAnalysisPrompt(type: ResourceType, resources: readonly Resource[]): string {
  return [
    `Analyse the following ${resources.length} Google Cloud ${type} resource(s) for security risks.`,
    `Focus on: ${FOCUS[type]}.`,
    '',
    '## Resources',
    JSON.stringify(resources, null, 2),
    '',
    '## Output',
    'Return a JSON object of the form {"findings": [...]} where each finding has:',
    '- "resourceId": the id of the affected resource, copied exactly from the input',
    '- "findingType": an UPPER_SNAKE_CASE identifier of the risk, e.g. "PUBLIC_BUCKET"',
    `- "severity": one of ${SEVERITIES.join(', ')}`,
    '- "title": one line',
    '- "description": what is wrong and why it matters',
    '- "recommendation": the concrete fix, with a gcloud command where one exists',
    'Return {"findings": []} when nothing is wrong.',
  ].join('\n');
}
