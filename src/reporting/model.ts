import { ExplainedPayload } from '../domain/artifact';
import { Finding, SEVERITIES, Severity, compareFindings } from '../domain/resource';

/** Everything a renderer needs; derived only from the explained artifact. */
export interface ReportModel {
  projectId: string;
  findings: Finding[];
  /** Every severity, most severe first, including zero counts. */
  severityCounts: Array<{ severity: Severity; count: number }>;
  affectedResources: number;
}

export function buildReportModel(payload: ExplainedPayload): ReportModel {
  const findings = [...payload.findings].sort(compareFindings);
  return {
    projectId: payload.projectId,
    findings,
    severityCounts: SEVERITIES.map((severity) => ({
      severity,
      count: findings.filter((finding) => finding.severity === severity).length,
    })),
    affectedResources: new Set(findings.map((finding) => finding.resourceId)).size,
  };
}

export function summarySentence(model: ReportModel): string {
  const total = model.findings.length;
  if (total === 0) return 'No security findings were identified.';
  const noun = total === 1 ? 'finding' : 'findings';
  const resources = model.affectedResources === 1 ? 'resource' : 'resources';
  return `This audit identified ${total} ${noun} across ${model.affectedResources} ${resources}.`;
}
