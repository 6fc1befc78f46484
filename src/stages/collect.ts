/**
 * Collect stage: gather resource configuration for a project.
 *
 * Each collector is an independent sub-task on the bounded pool. Their
 * outputs are merged as a union keyed by resource id and sorted by id, so
 * the artifact does not depend on which collector finished first.
 */

import { DEFAULT_COLLECTORS, ResourceCollector, normalizeBindings } from '../collectors';
import { ArtifactEntry } from '../domain/artifact';
import { Resource, compareKeys } from '../domain/resource';
import { Stage, StageContext, unexpectedInput } from '../engine/stage';
import { runPool } from '../engine/worker-pool';

export class CollectStage implements Stage {
  readonly name = 'collect';
  readonly outputs = ['collected'] as const;

  constructor(private readonly collectors: readonly ResourceCollector[] = DEFAULT_COLLECTORS) {}

  async execute(input: ArtifactEntry | undefined, context: StageContext): Promise<ArtifactEntry[]> {
    if (input) throw unexpectedInput(this.name, undefined, input);

    const batches = await runPool(
      this.collectors,
      async (collector) => {
        const log = context.logger.child({ collector: collector.category });
        const resources = await collector.collect({
          projectId: context.projectId,
          strategy: context.strategy,
          cancellation: context.cancellation,
          logger: log,
        });
        log.debug('Collector finished', { resources: resources.length });
        return resources;
      },
      { concurrency: context.concurrency, cancellation: context.cancellation },
    );

    const resources = mergeResources(batches.flat());
    context.logger.info('Resources collected', { resources: resources.length, collectors: this.collectors.length });
    return [{ slot: 'collected', payload: { projectId: context.projectId, resources } }];
  }
}

/**
 * Union of resources keyed by id, sorted by id.
 *
 * Resources sharing an id are combined: IAM bindings are unioned; for
 * name, type and each metadata key the value from the resource whose
 * canonical JSON sorts first wins. The result is independent of input order.
 */
export function mergeResources(resources: readonly Resource[]): Resource[] {
  const groups = new Map<string, Resource[]>();
  for (const resource of resources) {
    const group = groups.get(resource.id) ?? [];
    group.push(canonicalResource(resource));
    groups.set(resource.id, group);
  }

  return [...groups.entries()]
    .sort(([a], [b]) => compareKeys(a, b))
    .map(([, group]) => combine(group));
}

function combine(group: Resource[]): Resource {
  const ordered = group
    .map((resource) => ({ resource, key: JSON.stringify(resource) }))
    .sort((a, b) => compareKeys(a.key, b.key))
    .map(({ resource }) => resource);
  const [first, ...rest] = ordered;
  if (rest.length === 0) return first;

  const metadata: Record<string, unknown> = {};
  for (const resource of [...ordered].reverse()) {
    Object.assign(metadata, resource.metadata);
  }
  return {
    id: first.id,
    type: first.type,
    name: first.name,
    iamBindings: normalizeBindings(ordered.flatMap((resource) => resource.iamBindings)),
    metadata: sortKeys(metadata),
  };
}

function canonicalResource(resource: Resource): Resource {
  return {
    id: resource.id,
    type: resource.type,
    name: resource.name,
    iamBindings: normalizeBindings(resource.iamBindings),
    metadata: sortKeys(resource.metadata),
  };
}

function sortKeys(record: Record<string, unknown>): Record<string, unknown> {
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(record).sort(compareKeys)) {
    sorted[key] = record[key];
  }
  return sorted;
}
