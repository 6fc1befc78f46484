import { projectIamCollector } from './project-iam';
import { createSccFindingsCollector } from './scc-findings';
import { serviceAccountCollector } from './service-accounts';
import { storageBucketCollector } from './storage-buckets';
import { ResourceCollector } from './types';

export * from './types';
export { normalizeBindings } from './iam';
export { GET_PROJECT_IAM_POLICY, projectIamCollector } from './project-iam';
export { LIST_SCC_FINDINGS, SCC_SOURCES, createSccFindingsCollector } from './scc-findings';
export type { SccCollectorOptions } from './scc-findings';
export { LIST_SERVICE_ACCOUNTS, serviceAccountCollector } from './service-accounts';
export { GET_BUCKET_IAM_POLICY, LIST_BUCKETS, storageBucketCollector } from './storage-buckets';

export const DEFAULT_COLLECTORS: readonly ResourceCollector[] = [
  projectIamCollector,
  serviceAccountCollector,
  storageBucketCollector,
];

export interface CollectorOptions {
  /** Enables Security Command Center findings for this organization. */
  organizationId?: string;
}

/** The default collectors, plus Security Command Center when an organization is configured. */
export function createCollectors(options: CollectorOptions = {}): ResourceCollector[] {
  const collectors = [...DEFAULT_COLLECTORS];
  if (options.organizationId) {
    collectors.push(createSccFindingsCollector({ organizationId: options.organizationId }));
  }
  return collectors;
}
