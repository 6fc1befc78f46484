import { ReportModel, summarySentence } from './model';

/** Escape characters that would break a Markdown table cell or heading. */
function inline(text: string): string {
  return text.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|');
}

/** Inline code span whose fence is longer than any backtick run in the text. */
export function codeSpan(text: string): string {
  const content = text.replace(/\r?\n/g, ' ');
  const longestRun = Math.max(0, ...(content.match(/`+/g) ?? []).map((run) => run.length));
  const fence = '`'.repeat(longestRun + 1);
  const padding = content.startsWith('`') || content.endsWith('`') ? ' ' : '';
  return `${fence}${padding}${content}${padding}${fence}`;
}

export function renderMarkdown(model: ReportModel): string {
  const lines: string[] = [
    `# Security Audit Report: ${inline(model.projectId)}`,
    '',
    '## Summary',
    '',
    summarySentence(model),
    '',
    '| Severity | Count |',
    '| --- | --- |',
    ...model.severityCounts.map(({ severity, count }) => `| ${severity} | ${count} |`),
    '',
    '## Findings',
    '',
  ];

  if (model.findings.length === 0) {
    lines.push('No findings.', '');
  }

  model.findings.forEach((finding, index) => {
    lines.push(
      `### ${index + 1}. [${finding.severity}] ${inline(finding.title)}`,
      '',
      `- **Resource:** ${codeSpan(finding.resourceId)}`,
      `- **Type:** ${codeSpan(finding.findingType)}`,
      '',
      finding.description.trim(),
      '',
    );
    if (finding.recommendation.trim()) {
      lines.push(`**Recommendation:** ${finding.recommendation.trim()}`, '');
    }
  });

  return lines.join('\n');
}
