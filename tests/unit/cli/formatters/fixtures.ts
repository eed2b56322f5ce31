/**
 * Shared validation report for formatter tests.
 */
import type { ValidationReport } from '../../../../src/core/validation/types.js';

export function createReport(): ValidationReport {
  return {
    passed: false,
    files: [
      'src/domain/order.ts',
      'src/main.ts',
      'src/repositories/order-repository.ts',
      'src/services/order-service.test.ts',
      'src/services/order-service.ts',
    ],
    violations: [
      {
        code: 'E001',
        rule: 'layer_direction',
        severity: 'error',
        file: 'src/repositories/order-repository.ts',
        line: 3,
        message: 'Upward import',
        fixHint: 'Invert the dependency',
      },
      {
        code: 'E006',
        rule: 'forbidden_construct',
        severity: 'warning',
        file: 'src/services/order-service.ts',
        line: 2,
        message: "Forbidden construct 'no-console-log': console.log(",
        why: 'Use the logger',
        fixHint: "Remove the construct matched by 'no-console-log'",
      },
      {
        code: 'E007',
        rule: 'unlayered_file',
        severity: 'warning',
        file: 'src/main.ts',
        line: null,
        message: 'File is outside every layer directory',
      },
    ],
    summary: { files: 5, errors: 1, warnings: 2 },
  };
}

export function createCleanReport(): ValidationReport {
  return {
    passed: true,
    files: ['src/domain/order.ts'],
    violations: [],
    summary: { files: 1, errors: 0, warnings: 0 },
  };
}
