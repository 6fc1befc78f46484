import { Resource } from '../domain/resource';
import { callCloud } from '../invocation/calls';
import { parseResponse } from '../invocation/transports/http';
import { IamPolicySchema, conditionsOf, normalizeBindings } from './iam';
import { CollectorContext, ResourceCollector } from './types';

export const GET_PROJECT_IAM_POLICY = 'cloudresourcemanager.projects.getIamPolicy';

/** The project resource with its IAM policy. */
export const projectIamCollector: ResourceCollector = {
  category: 'project-iam',

  async collect({ projectId, strategy }: CollectorContext): Promise<Resource[]> {
    const body = await callCloud(strategy, {
      operation: GET_PROJECT_IAM_POLICY,
      method: 'POST',
      url: `https://cloudresourcemanager.googleapis.com/v3/projects/${encodeURIComponent(projectId)}:getIamPolicy`,
      body: { options: { requestedPolicyVersion: 3 } },
    });
    const policy = parseResponse(IamPolicySchema, body, GET_PROJECT_IAM_POLICY);
    const conditions = conditionsOf(policy.bindings);

    return [
      {
        id: `projects/${projectId}`,
        type: 'project',
        name: projectId,
        iamBindings: normalizeBindings(policy.bindings),
        metadata: {
          policyVersion: policy.version ?? 1,
          ...(conditions.length > 0 ? { conditions } : {}),
        },
      },
    ];
  },
};
