import type { ErrorCode } from '../../../utils/errors.js';
import type { Check, CheckContext, CheckRule, Violation, ViolationSeverity } from '../types.js';

export interface ViolationOptions {
  line?: number | null;
  severity?: ViolationSeverity;
  why?: string;
  /** Offending text, passed to getFixHint */
  actual?: string;
}

/**
 * Base class for checks. Provides common utilities for creating violations.
 */
export abstract class BaseCheck implements Check {
  abstract readonly rule: CheckRule;
  abstract readonly errorCode: ErrorCode;
  readonly severity: ViolationSeverity = 'error';

  abstract run(context: CheckContext): Violation[];

  protected createViolation(file: string, message: string, options: ViolationOptions = {}): Violation {
    const violation: Violation = {
      code: this.errorCode,
      rule: this.rule,
      severity: options.severity ?? this.severity,
      file,
      line: options.line ?? null,
      message,
      fixHint: this.getFixHint(options.actual),
    };
    if (options.why) {
      violation.why = options.why;
    }
    return violation;
  }

  /**
   * Suggested fix for a violation. Override in subclasses for specific hints.
   */
  protected getFixHint(_actual?: string): string {
    return `Fix the ${this.rule} violation`;
  }
}
