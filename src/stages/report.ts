/**
 * Report stage: render the explained findings for humans.
 *
 * Emits two renditions of the same report (Markdown and HTML). The
 * Controller validates both before committing either.
 */

import { ArtifactEntry } from '../domain/artifact';
import { Stage, StageContext, assertSameProject, throwIfCanceled, unexpectedInput } from '../engine/stage';
import { renderHtml } from '../reporting/html';
import { renderMarkdown } from '../reporting/markdown';
import { buildReportModel } from '../reporting/model';

export class ReportStage implements Stage {
  readonly name = 'report';
  readonly input = 'explained';
  readonly outputs = ['report-markdown', 'report-html'] as const;

  async execute(input: ArtifactEntry | undefined, context: StageContext): Promise<ArtifactEntry[]> {
    if (input?.slot !== 'explained') throw unexpectedInput(this.name, this.input, input);
    assertSameProject(this.name, input.slot, input.payload.projectId, context.projectId);

    const model = buildReportModel(input.payload);
    const markdown = renderMarkdown(model);
    throwIfCanceled(context.cancellation);
    const html = renderHtml(model);

    context.logger.info('Report rendered', { findings: model.findings.length });
    return [
      { slot: 'report-markdown', payload: markdown },
      { slot: 'report-html', payload: html },
    ];
  }
}
