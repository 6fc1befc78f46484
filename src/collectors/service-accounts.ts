import { z } from 'zod';
import { Resource } from '../domain/resource';
import { throwIfCanceled } from '../engine/stage';
import { callCloud } from '../invocation/calls';
import { parseResponse } from '../invocation/transports/http';
import { CollectorContext, ResourceCollector } from './types';

export const LIST_SERVICE_ACCOUNTS = 'iam.projects.serviceAccounts.list';

const ServiceAccountListSchema = z
  .object({
    accounts: z
      .array(
        z
          .object({
            name: z.string(),
            email: z.string(),
            displayName: z.string().optional(),
            description: z.string().optional(),
            disabled: z.boolean().optional(),
          })
          .passthrough(),
      )
      .default([]),
    nextPageToken: z.string().optional(),
  })
  .passthrough();

/** Service accounts of the project, following pagination. */
export const serviceAccountCollector: ResourceCollector = {
  category: 'service-accounts',

  async collect({ projectId, strategy, cancellation }: CollectorContext): Promise<Resource[]> {
    const resources: Resource[] = [];
    let pageToken: string | undefined;

    do {
      throwIfCanceled(cancellation);
      const query = new URLSearchParams({ pageSize: '100' });
      if (pageToken) query.set('pageToken', pageToken);

      const body = await callCloud(strategy, {
        operation: LIST_SERVICE_ACCOUNTS,
        resource: pageToken,
        method: 'GET',
        url: `https://iam.googleapis.com/v1/projects/${encodeURIComponent(projectId)}/serviceAccounts?${query.toString()}`,
      });
      const page = parseResponse(ServiceAccountListSchema, body, LIST_SERVICE_ACCOUNTS);

      for (const account of page.accounts) {
        const metadata: Record<string, unknown> = {
          email: account.email,
          disabled: account.disabled ?? false,
        };
        if (account.displayName) metadata.displayName = account.displayName;
        if (account.description) metadata.description = account.description;

        resources.push({
          id: account.name,
          type: 'service-account',
          name: account.email,
          iamBindings: [],
          metadata,
        });
      }
      pageToken = page.nextPageToken || undefined;
    } while (pageToken);

    return resources;
  },
};
