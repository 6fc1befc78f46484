import { CollectorOptions, createCollectors } from '../collectors';
import { Stage } from '../engine/stage';
import { CollectStage } from './collect';
import { ExplainStage } from './explain';
import { ReportStage } from './report';

export { CollectStage, mergeResources } from './collect';
export { ExplainStage, batchByType, dedupeFindings, parseFindings } from './explain';
export { ReportStage } from './report';

/** The three pipeline stages with their production collaborators. */
export function createDefaultStages(options: CollectorOptions = {}): Stage[] {
  return [new CollectStage(createCollectors(options)), new ExplainStage(), new ReportStage()];
}
