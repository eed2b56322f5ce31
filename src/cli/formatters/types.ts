/**
 * Formatter type definitions.
 */
import type { OutputFormat } from '../../core/config/schema.js';
import type { ValidationReport } from '../../core/validation/types.js';

export type { OutputFormat };

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Verbose output (why and fix hints in human output) */
  verbose: boolean;
  /** Only show errors, hide warnings */
  errorsOnly: boolean;
}

/**
 * Interface for validation report formatters.
 */
export interface IFormatter {
  formatReport(report: ValidationReport): string;
}
