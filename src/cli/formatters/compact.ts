/**
 * Compact output formatter for CI and pre-commit hooks.
 * Format: file:line: SEVERITY [code rule] message
 */
import type { ValidationReport, Violation } from '../../core/validation/types.js';
import type { IFormatter, FormatOptions } from './types.js';

export class CompactFormatter implements IFormatter {
  private errorsOnly: boolean;

  constructor(options: Partial<FormatOptions> = {}) {
    this.errorsOnly = options.errorsOnly ?? false;
  }

  formatReport(report: ValidationReport): string {
    const lines = report.violations
      .filter((v) => !this.errorsOnly || v.severity === 'error')
      .map((v) => this.formatViolation(v));
    lines.push(this.formatSummary(report));
    return lines.join('\n');
  }

  private formatViolation(violation: Violation): string {
    const severity = violation.severity === 'error' ? 'ERROR' : 'WARN';
    return `${violation.file}:${violation.line ?? 0}: ${severity} [${violation.code} ${violation.rule}] ${violation.message}`;
  }

  private formatSummary(report: ValidationReport): string {
    const { summary } = report;
    const parts: string[] = [];
    if (summary.errors > 0) {
      parts.push(`${summary.errors} error${summary.errors !== 1 ? 's' : ''}`);
    }
    if (summary.warnings > 0) {
      parts.push(`${summary.warnings} warning${summary.warnings !== 1 ? 's' : ''}`);
    }
    if (parts.length === 0) {
      parts.push('0 issues');
    }
    return `SUMMARY: ${parts.join(', ')} (${summary.files} file${summary.files !== 1 ? 's' : ''} checked)`;
  }
}
