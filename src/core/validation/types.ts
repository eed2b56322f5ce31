/**
 * Validation types.
 */
import type { ErrorCode } from '../../utils/errors.js';
import type { RuleModel } from '../rules/model.js';
import type { SourceFile, SourceTree } from '../tree/types.js';

export type ViolationSeverity = 'error' | 'warning';

export type CheckRule =
  | 'layer_direction'
  | 'layer_undeclared'
  | 'naming_convention'
  | 'missing_test'
  | 'orphan_test'
  | 'forbidden_construct'
  | 'unlayered_file'
  | 'import_cycle'
  | 'unexpected_shared_file';

export interface Violation {
  code: ErrorCode;
  rule: CheckRule;
  severity: ViolationSeverity;
  /** Project-relative path of the offending file */
  file: string;
  line: number | null;
  message: string;
  /** Rationale declared with the rule, when there is one */
  why?: string;
  fixHint?: string;
}

export interface CheckContext {
  model: RuleModel;
  tree: SourceTree;
  /** Tree files keyed by path */
  files: ReadonlyMap<string, SourceFile>;
}

export interface Check {
  readonly rule: CheckRule;
  readonly errorCode: ErrorCode;
  run(context: CheckContext): Violation[];
}

export interface ValidationSummary {
  files: number;
  errors: number;
  warnings: number;
}

export interface ValidationReport {
  passed: boolean;
  /** Paths of the files the report covers */
  files: string[];
  /** Sorted by file, line, code */
  violations: Violation[];
  summary: ValidationSummary;
}

export interface ValidateOptions {
  /** Treat warnings as failures */
  failOnWarning?: boolean;
  /**
   * Restrict reported files to these paths, directories or globs.
   * Checks still see the whole tree.
   */
  only?: string[];
}
