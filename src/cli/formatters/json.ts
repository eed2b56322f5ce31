import type { ValidationReport, Violation } from '../../core/validation/types.js';
import type { IFormatter, FormatOptions } from './types.js';

/**
 * JSON output formatter for machine consumption.
 */
export class JsonFormatter implements IFormatter {
  private errorsOnly: boolean;

  constructor(options: Partial<FormatOptions> = {}) {
    this.errorsOnly = options.errorsOnly ?? false;
  }

  private transformViolation(v: Violation): Record<string, unknown> {
    return {
      code: v.code,
      rule: v.rule,
      severity: v.severity,
      file: v.file,
      line: v.line,
      message: v.message,
      why: v.why,
      fix_hint: v.fixHint,
    };
  }

  formatReport(report: ValidationReport): string {
    const violations = this.errorsOnly
      ? report.violations.filter((v) => v.severity === 'error')
      : report.violations;
    return JSON.stringify(
      {
        passed: report.passed,
        summary: report.summary,
        violations: violations.map((v) => this.transformViolation(v)),
      },
      null,
      2
    );
  }
}
