import { z } from 'zod';
import { Resource } from '../domain/resource';
import { throwIfCanceled } from '../engine/stage';
import { callCloud } from '../invocation/calls';
import { parseResponse } from '../invocation/transports/http';
import { IamPolicySchema, normalizeBindings } from './iam';
import { CollectorContext, ResourceCollector } from './types';

export const LIST_BUCKETS = 'storage.buckets.list';
export const GET_BUCKET_IAM_POLICY = 'storage.buckets.getIamPolicy';

const BucketSchema = z
  .object({
    name: z.string(),
    location: z.string().optional(),
    storageClass: z.string().optional(),
    iamConfiguration: z
      .object({
        uniformBucketLevelAccess: z.object({ enabled: z.boolean().optional() }).passthrough().optional(),
        publicAccessPrevention: z.string().optional(),
      })
      .passthrough()
      .optional(),
    versioning: z.object({ enabled: z.boolean().optional() }).passthrough().optional(),
    retentionPolicy: z.object({ retentionPeriod: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();
type Bucket = z.infer<typeof BucketSchema>;

const BucketListSchema = z
  .object({
    items: z.array(BucketSchema).default([]),
    nextPageToken: z.string().optional(),
  })
  .passthrough();

const STORAGE_API = 'https://storage.googleapis.com/storage/v1';

/** Cloud Storage buckets with their access configuration and IAM policy. */
export const storageBucketCollector: ResourceCollector = {
  category: 'storage-buckets',

  async collect(context: CollectorContext): Promise<Resource[]> {
    const buckets = await listBuckets(context);
    const resources: Resource[] = [];

    // one policy call per bucket, sequential to stay inside the stage's concurrency bound
    for (const bucket of buckets) {
      throwIfCanceled(context.cancellation);
      const body = await callCloud(context.strategy, {
        operation: GET_BUCKET_IAM_POLICY,
        resource: bucket.name,
        method: 'GET',
        url: `${STORAGE_API}/b/${encodeURIComponent(bucket.name)}/iam`,
      });
      const policy = parseResponse(IamPolicySchema, body, GET_BUCKET_IAM_POLICY);
      resources.push(toResource(bucket, normalizeBindings(policy.bindings)));
    }
    return resources;
  },
};

async function listBuckets({ projectId, strategy, cancellation }: CollectorContext): Promise<Bucket[]> {
  const buckets: Bucket[] = [];
  let pageToken: string | undefined;
  do {
    throwIfCanceled(cancellation);
    const query = new URLSearchParams({ project: projectId });
    if (pageToken) query.set('pageToken', pageToken);
    const body = await callCloud(strategy, {
      operation: LIST_BUCKETS,
      resource: pageToken,
      method: 'GET',
      url: `${STORAGE_API}/b?${query.toString()}`,
    });
    const page = parseResponse(BucketListSchema, body, LIST_BUCKETS);
    buckets.push(...page.items);
    pageToken = page.nextPageToken || undefined;
  } while (pageToken);
  return buckets;
}

function toResource(bucket: Bucket, iamBindings: Resource['iamBindings']): Resource {
  return {
    id: `projects/_/buckets/${bucket.name}`,
    type: 'storage-bucket',
    name: bucket.name,
    iamBindings,
    metadata: {
      location: bucket.location ?? 'unknown',
      storageClass: bucket.storageClass ?? 'STANDARD',
      uniformBucketLevelAccess: bucket.iamConfiguration?.uniformBucketLevelAccess?.enabled ?? false,
      publicAccessPrevention: bucket.iamConfiguration?.publicAccessPrevention ?? 'inherited',
      versioning: bucket.versioning?.enabled ?? false,
      retentionPolicy: bucket.retentionPolicy?.retentionPeriod ?? null,
    },
  };
}
