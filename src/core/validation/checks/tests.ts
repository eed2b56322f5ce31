/**
 * Co-located test coverage.
 */
import { ErrorCodes } from '../../../utils/errors.js';
import type { CheckContext, Violation } from '../types.js';
import { BaseCheck } from './base.js';

/**
 * Error code: E004
 */
export class MissingTestCheck extends BaseCheck {
  readonly rule = 'missing_test' as const;
  readonly errorCode = ErrorCodes.MISSING_TEST;
  readonly severity = 'warning' as const;

  run(context: CheckContext): Violation[] {
    const { model, tree, files } = context;
    if (!model.tests.colocated) return [];

    const violations: Violation[] = [];
    for (const file of tree.files) {
      if (model.isTestPath(file.path)) continue;
      const layer = model.layerOf(file.path);
      if (!layer || !layer.tests) continue;
      if (model.naming.exempt.includes(model.namingStem(file.path))) continue;

      const testPath = model.testPathFor(file.path);
      if (!files.has(testPath)) {
        violations.push(
          this.createViolation(file.path, `Missing test ${testPath}`, { actual: testPath })
        );
      }
    }
    return violations;
  }

  protected getFixHint(actual?: string): string {
    return `Create ${actual ?? 'the co-located test'}`;
  }
}

/**
 * Error code: E005
 */
export class OrphanTestCheck extends BaseCheck {
  readonly rule = 'orphan_test' as const;
  readonly errorCode = ErrorCodes.ORPHAN_TEST;
  readonly severity = 'warning' as const;

  run(context: CheckContext): Violation[] {
    const { model, tree, files } = context;
    const violations: Violation[] = [];
    for (const file of tree.files) {
      const subject = model.subjectPathFor(file.path);
      if (subject !== null && !files.has(subject)) {
        violations.push(
          this.createViolation(file.path, `Test has no subject: ${subject} does not exist`, { actual: subject })
        );
      }
    }
    return violations;
  }

  protected getFixHint(actual?: string): string {
    return `Rename the test to match its subject, or delete it if ${actual ?? 'the subject'} was removed`;
  }
}
