export { validateTree, createPathFilter } from './engine.js';
export * from './checks/index.js';
export type {
  Violation,
  ViolationSeverity,
  CheckRule,
  CheckContext,
  Check,
  ValidationReport,
  ValidationSummary,
  ValidateOptions,
} from './types.js';
