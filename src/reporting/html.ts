import { Severity } from '../domain/resource';
import { ReportModel, summarySentence } from './model';

const SEVERITY_COLORS: Record<Severity, string> = {
  CRITICAL: '#d32f2f',
  HIGH: '#f44336',
  MEDIUM: '#ff9800',
  LOW: '#ffc107',
  INFO: '#2196f3',
};

const STYLE = `
  body { font-family: -apple-system, "Segoe UI", Roboto, sans-serif; color: #333; max-width: 960px; margin: 0 auto; padding: 24px; }
  h1 { color: #1a73e8; border-bottom: 3px solid #1a73e8; padding-bottom: 8px; }
  table { border-collapse: collapse; }
  th, td { border: 1px solid #e0e0e0; padding: 4px 12px; text-align: left; }
  .finding { background: #f8f9fa; border-left: 4px solid #e0e0e0; margin: 16px 0; padding: 12px 16px; }
  .badge { color: #fff; border-radius: 4px; padding: 2px 8px; font-size: 0.85em; }
  .recommendation { background: #e8f5e9; padding: 8px 12px; }
  code { background: #eceff1; padding: 1px 4px; }
`.trim();

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function renderHtml(model: ReportModel): string {
  const rows = model.severityCounts
    .map(({ severity, count }) => `      <tr><td>${severity}</td><td>${count}</td></tr>`)
    .join('\n');

  const findings = model.findings.map((finding, index) => {
    const color = SEVERITY_COLORS[finding.severity];
    const recommendation = finding.recommendation.trim()
      ? `\n    <p class="recommendation"><strong>Recommendation:</strong> ${escapeHtml(finding.recommendation.trim())}</p>`
      : '';
    return [
      `  <div class="finding" style="border-left-color: ${color}">`,
      `    <h3>${index + 1}. <span class="badge" style="background: ${color}">${finding.severity}</span> ${escapeHtml(finding.title)}</h3>`,
      `    <p>Resource: <code>${escapeHtml(finding.resourceId)}</code> · Type: <code>${escapeHtml(finding.findingType)}</code></p>`,
      `    <p>${escapeHtml(finding.description.trim())}</p>${recommendation}`,
      '  </div>',
    ].join('\n');
  });

  const title = `Security Audit Report: ${escapeHtml(model.projectId)}`;
  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '  <meta charset="utf-8">',
    `  <title>${title}</title>`,
    `  <style>\n${STYLE}\n  </style>`,
    '</head>',
    '<body>',
    `  <h1>${title}</h1>`,
    '  <h2>Summary</h2>',
    `  <p>${summarySentence(model)}</p>`,
    '  <table>',
    '    <thead><tr><th>Severity</th><th>Count</th></tr></thead>',
    '    <tbody>',
    rows,
    '    </tbody>',
    '  </table>',
    '  <h2>Findings</h2>',
    findings.length > 0 ? findings.join('\n') : '  <p>No findings.</p>',
    '</body>',
    '</html>',
    '',
  ].join('\n');
}
