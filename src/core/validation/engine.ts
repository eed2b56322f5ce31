/**
 * Validation engine - runs every registered check over a source tree and
 * assembles the report.
 */
import { minimatch } from 'minimatch';
import { logger } from '../../utils/logger.js';
import type { RuleModel } from '../rules/model.js';
import type { SourceTree } from '../tree/types.js';
import { getAllChecks } from './checks/index.js';
import type { CheckContext, ValidateOptions, ValidationReport, Violation } from './types.js';

const log = logger.child('validate');

function compareViolations(a: Violation, b: Violation): number {
  if (a.file !== b.file) return a.file < b.file ? -1 : 1;
  const lineA = a.line ?? 0;
  const lineB = b.line ?? 0;
  if (lineA !== lineB) return lineA - lineB;
  if (a.code !== b.code) return a.code < b.code ? -1 : 1;
  return a.message < b.message ? -1 : a.message > b.message ? 1 : 0;
}

/**
 * Build a predicate for the `only` filter: exact paths, directory prefixes or globs.
 */
export function createPathFilter(only: string[] | undefined): (filePath: string) => boolean {
  if (!only || only.length === 0) return () => true;
  const targets = only.map((p) => p.replace(/\\/g, '/').replace(/^\.\//, '').replace(/\/+$/, ''));
  return (filePath) =>
    targets.some(
      (target) =>
        target === '' ||
        target === '.' ||
        filePath === target ||
        filePath.startsWith(`${target}/`) ||
        minimatch(filePath, target)
    );
}

export function validateTree(model: RuleModel, tree: SourceTree, options: ValidateOptions = {}): ValidationReport {
  const context: CheckContext = {
    model,
    tree,
    files: new Map(tree.files.map((f) => [f.path, f])),
  };
  const include = createPathFilter(options.only);

  const violations: Violation[] = [];
  for (const check of getAllChecks()) {
    const found = check.run(context).filter((v) => include(v.file));
    if (found.length > 0) {
      log.debug(`${check.rule}: ${found.length} violation(s)`);
    }
    violations.push(...found);
  }
  violations.sort(compareViolations);

  const files = tree.files.map((f) => f.path).filter(include);
  const errors = violations.filter((v) => v.severity === 'error').length;
  const warnings = violations.length - errors;

  return {
    passed: errors === 0 && !(options.failOnWarning && warnings > 0),
    files,
    violations,
    summary: { files: files.length, errors, warnings },
  };
}
