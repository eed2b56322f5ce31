/**
 * Tests for the compact formatter.
 */
import { describe, it, expect } from 'vitest';
import { CompactFormatter } from '../../../../src/cli/formatters/compact.js';
import { createFormatter, HumanFormatter, JsonFormatter } from '../../../../src/cli/formatters/index.js';
import { createCleanReport, createReport } from './fixtures.js';

describe('CompactFormatter', () => {
  it('should print one line per violation and a summary', () => {
    expect(new CompactFormatter().formatReport(createReport())).toBe(
      [
        'src/repositories/order-repository.ts:3: ERROR [E001 layer_direction] Upward import',
        "src/services/order-service.ts:2: WARN [E006 forbidden_construct] Forbidden construct 'no-console-log': console.log(",
        'src/main.ts:0: WARN [E007 unlayered_file] File is outside every layer directory',
        'SUMMARY: 1 error, 2 warnings (5 files checked)',
      ].join('\n')
    );
  });

  it('should keep only errors when errorsOnly is set', () => {
    const lines = new CompactFormatter({ errorsOnly: true }).formatReport(createReport()).split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^src\/repositories\/order-repository\.ts:3: ERROR/);
  });

  it('should report zero issues', () => {
    expect(new CompactFormatter().formatReport(createCleanReport())).toBe('SUMMARY: 0 issues (1 file checked)');
  });
});

describe('createFormatter', () => {
  it('should pick the formatter for each format', () => {
    expect(createFormatter('human')).toBeInstanceOf(HumanFormatter);
    expect(createFormatter('json')).toBeInstanceOf(JsonFormatter);
    expect(createFormatter('compact')).toBeInstanceOf(CompactFormatter);
  });
});
