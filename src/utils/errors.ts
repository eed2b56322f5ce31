/**
 * Error types and codes for layerkit.
 * All thrown errors extend LayerkitError so the CLI can report them uniformly.
 */

/**
 * Base error class for all layerkit errors.
 */
export class LayerkitError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LayerkitError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends LayerkitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Rule set errors (schema, unknown layers, dependency cycles, bad patterns).
 * Error codes: R001-R007
 */
export class RuleError extends LayerkitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RuleError';
  }
}

/**
 * Feature descriptor errors.
 * Error codes: F001-F005
 */
export class FeatureError extends LayerkitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'FeatureError';
  }
}

/**
 * Layout planning errors.
 * Error codes: P001-P002
 */
export class PlanError extends LayerkitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'PlanError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 * Error codes: S001-S002
 */
export class SystemError extends LayerkitError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Rule set errors (R001-R007)
  INVALID_RULES: 'R001',
  UNKNOWN_LAYER: 'R002',
  DEPENDENCY_CYCLE: 'R003',
  INVALID_PATTERN: 'R004',
  DUPLICATE_LAYER: 'R005',
  UNKNOWN_PRESET: 'R006',
  INVALID_CHAIN: 'R007',

  // Feature descriptor errors (F001-F005)
  INVALID_DESCRIPTOR: 'F001',
  INVALID_ENTITY_NAME: 'F002',
  UNKNOWN_FIELD_TYPE: 'F003',
  FIELD_TYPE_CONFLICT: 'F004',
  EMPTY_DESCRIPTOR: 'F005',

  // Planning errors
  PATH_COLLISION: 'P001',
  SOURCE_NAMED_AS_TEST: 'P002',

  // System errors
  PARSE_ERROR: 'S001',
  FILE_NOT_FOUND: 'S002',

  // Config errors
  CONFIG_LOAD_ERROR: 'C001',

  // Validation violations (E001-E009), reported rather than thrown
  LAYER_DIRECTION: 'E001',
  LAYER_UNDECLARED: 'E002',
  NAMING_CONVENTION: 'E003',
  MISSING_TEST: 'E004',
  ORPHAN_TEST: 'E005',
  FORBIDDEN_CONSTRUCT: 'E006',
  UNLAYERED_FILE: 'E007',
  IMPORT_CYCLE: 'E008',
  UNEXPECTED_SHARED_FILE: 'E009',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Extract a printable message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
