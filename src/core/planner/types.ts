/**
 * Layout plan types.
 */
import type { Language } from '../rules/schema.js';

export type PlannedFileKind = 'source' | 'test';

export interface PlannedFile {
  /** Project-relative posix path */
  path: string;
  layer: string;
  kind: PlannedFileKind;
  /** Entity the file belongs to (entity layers and their tests) */
  entity?: string;
  /** Source file a test covers */
  subject?: string;
  /** Operations the entity supports (empty for shared files) */
  operations: string[];
}

/**
 * Why one planned file imports another.
 * - layer: the importer's layer uses the target's layer
 * - reference: an entity field references another entity (models layers)
 * - test: a test imports its subject
 */
export type EdgeReason = 'layer' | 'reference' | 'test';

export interface PlanEdge {
  from: string;
  to: string;
  reason: EdgeReason;
}

export interface LayoutPlan {
  root: string;
  language: Language;
  /** Sorted by path */
  files: PlannedFile[];
  /** Every directory holding planned files, plus each layer directory; sorted */
  directories: string[];
  /** Sorted by from, to, reason */
  edges: PlanEdge[];
  /** Fingerprint of files and edges; equal inputs give equal digests */
  digest: string;
}
