/**
 * IAM policy shapes shared by the project and bucket collectors.
 */

import { z } from 'zod';
import { IamBinding, compareKeys } from '../domain/resource';

export const PolicyBindingSchema = z
  .object({
    role: z.string(),
    members: z.array(z.string()).default([]),
    condition: z
      .object({
        title: z.string().optional(),
        expression: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();
export type PolicyBinding = z.infer<typeof PolicyBindingSchema>;

export const IamPolicySchema = z
  .object({
    version: z.number().optional(),
    bindings: z.array(PolicyBindingSchema).default([]),
  })
  .passthrough();

/**
 * Canonical binding list: one entry per role, members de-duplicated, both
 * sorted. Conditional bindings are folded into their role; the conditions
 * are reported separately by conditionsOf().
 */
export function normalizeBindings(bindings: ReadonlyArray<{ role: string; members: readonly string[] }>): IamBinding[] {
  const byRole = new Map<string, Set<string>>();
  for (const binding of bindings) {
    const members = byRole.get(binding.role) ?? new Set<string>();
    for (const member of binding.members) members.add(member);
    byRole.set(binding.role, members);
  }
  return [...byRole.entries()]
    .sort(([a], [b]) => compareKeys(a, b))
    .map(([role, members]) => ({ role, members: [...members].sort(compareKeys) }));
}

export interface BindingCondition {
  role: string;
  title: string;
  expression: string;
}

export function conditionsOf(bindings: readonly PolicyBinding[]): BindingCondition[] {
  return bindings
    .filter((binding) => binding.condition !== undefined)
    .map((binding) => ({
      role: binding.role,
      title: binding.condition?.title ?? '',
      expression: binding.condition?.expression ?? '',
    }))
    .sort((a, b) => compareKeys(a.role, b.role) || compareKeys(a.title, b.title));
}
