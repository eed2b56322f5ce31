import chalk from 'chalk';
import type { ValidationReport, Violation } from '../../core/validation/types.js';
import type { IFormatter, FormatOptions } from './types.js';

type Color = 'red' | 'green' | 'yellow' | 'cyan' | 'dim';

/**
 * Human-readable output formatter: violations grouped by file, then a summary.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      verbose: options.verbose ?? false,
      errorsOnly: options.errorsOnly ?? false,
    };
  }

  formatReport(report: ValidationReport): string {
    const lines: string[] = [];
    const byFile = new Map<string, Violation[]>();
    for (const violation of report.violations) {
      if (this.options.errorsOnly && violation.severity === 'warning') continue;
      const list = byFile.get(violation.file) ?? [];
      list.push(violation);
      byFile.set(violation.file, list);
    }

    for (const [file, violations] of byFile) {
      const failed = violations.some((v) => v.severity === 'error');
      const status = failed ? this.colorize('✗ FAIL', 'red') : this.colorize('⚠ WARN', 'yellow');
      lines.push(`${status}: ${file}`);
      for (const violation of violations) {
        lines.push(...this.formatViolation(violation));
      }
      lines.push('');
    }

    lines.push(this.formatSummary(report));
    return lines.join('\n');
  }

  private formatViolation(violation: Violation): string[] {
    const location = violation.line ? `Line ${violation.line}` : 'File';
    const color: Color = violation.severity === 'error' ? 'red' : 'yellow';
    const lines = [
      `   ${location}: ${this.colorize(`${violation.code} ${violation.rule}`, color)}`,
      `     ${violation.message}`,
    ];
    if (violation.why) {
      lines.push(`     ${this.colorize(`Why: ${violation.why}`, 'dim')}`);
    }
    if (this.options.verbose && violation.fixHint) {
      lines.push(`     ${this.colorize(`Fix: ${violation.fixHint}`, 'cyan')}`);
    }
    return lines;
  }

  private formatSummary(report: ValidationReport): string {
    const { summary } = report;
    const errors = this.colorize(`${summary.errors} error${summary.errors === 1 ? '' : 's'}`, 'red');
    const warnings = this.colorize(`${summary.warnings} warning${summary.warnings === 1 ? '' : 's'}`, 'yellow');
    const result = report.passed ? this.colorize('PASSED', 'green') : this.colorize('FAILED', 'red');
    return [
      '═'.repeat(60),
      `SUMMARY: ${errors}, ${warnings}`,
      `Total files: ${summary.files}`,
      `Result: ${result}`,
    ].join('\n');
  }

  private colorize(text: string, color: Color): string {
    if (!this.options.colors) {
      return text;
    }
    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'cyan':
        return chalk.cyan(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}
