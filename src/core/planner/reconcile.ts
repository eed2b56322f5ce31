/**
 * Compare a layout plan against the files that already exist.
 */
import type { RuleModel } from '../rules/model.js';
import type { LayoutPlan, PlannedFile } from './types.js';

export interface PlanReconciliation {
  /** Planned files that do not exist yet */
  create: PlannedFile[];
  /** Planned files already on disk */
  existing: PlannedFile[];
  /** Existing files inside layer directories that the plan does not name */
  extra: string[];
}

export function reconcilePlan(
  plan: LayoutPlan,
  model: RuleModel,
  existingPaths: Iterable<string>
): PlanReconciliation {
  const existingSet = new Set(existingPaths);
  const planned = new Set(plan.files.map((f) => f.path));

  const create: PlannedFile[] = [];
  const existing: PlannedFile[] = [];
  for (const file of plan.files) {
    (existingSet.has(file.path) ? existing : create).push(file);
  }

  const extra = [...existingSet]
    .filter((p) => !planned.has(p) && model.layerOf(p) !== null)
    .sort();

  return { create, existing, extra };
}
