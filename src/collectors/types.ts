import { Resource } from '../domain/resource';
import { CancellationToken } from '../engine/stage';
import { AdapterStrategy } from '../invocation/types';
import { Logger } from '../logger';

export interface CollectorContext {
  projectId: string;
  strategy: AdapterStrategy;
  cancellation: CancellationToken;
  logger: Logger;
}

/** One independent collection sub-task of the Collect stage. */
export interface ResourceCollector {
  /** Stable name used in logs. */
  readonly category: string;
  collect(context: CollectorContext): Promise<Resource[]>;
}
