export { planLayout, plannedFileName, entityFilePath } from './planner.js';
export { reconcilePlan } from './reconcile.js';
export type { PlanReconciliation } from './reconcile.js';
export {
  renderSkeleton,
  writeSkeletons,
  relativeSpecifier,
  SKELETON_MARKER,
  DEFAULT_GO_MODULE,
} from './skeleton.js';
export type { SkeletonOptions, WriteSkeletonsResult } from './skeleton.js';
export type { LayoutPlan, PlannedFile, PlanEdge, PlannedFileKind, EdgeReason } from './types.js';
