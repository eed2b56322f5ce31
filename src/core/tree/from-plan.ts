import type { LayoutPlan } from '../planner/types.js';
import type { SourceFile, SourceTree } from './types.js';

/**
 * Build a virtual tree from a layout plan: one content-less file per planned
 * file, importing the targets of its outgoing edges.
 */
export function treeFromPlan(plan: LayoutPlan): SourceTree {
  const files: SourceFile[] = plan.files.map((file) => ({
    path: file.path,
    imports: [...new Set(plan.edges.filter((e) => e.from === file.path).map((e) => e.to))],
  }));
  return { files };
}
