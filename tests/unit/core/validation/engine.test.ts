/**
 * Tests for the validation engine.
 */
import { describe, it, expect } from 'vitest';
import { createPathFilter, validateTree } from '../../../../src/core/validation/engine.js';
import { getAllChecks, getCheck } from '../../../../src/core/validation/checks/index.js';
import type { SourceFile } from '../../../../src/core/tree/types.js';
import { resolveRules } from '../../../../src/core/rules/loader.js';

const model = resolveRules({
  root: 'src',
  chain: 'repository -> service',
  layers: [
    { name: 'domain', directory: 'domain', tests: false },
    { name: 'repository', directory: 'repositories', suffix: 'repository', can_import: ['domain'], tests: false },
    { name: 'service', directory: 'services', suffix: 'service', can_import: ['domain'] },
  ],
});

const files: SourceFile[] = [
  { path: 'src/domain/order.ts', imports: [] },
  {
    path: 'src/repositories/order-repository.ts',
    imports: ['src/services/order-service.ts'],
    importLines: new Map([['src/services/order-service.ts', 2]]),
  },
  { path: 'src/services/order-service.ts', imports: ['src/repositories/order-repository.ts'] },
  { path: 'src/main.ts', imports: [] },
];

describe('validation engine', () => {
  describe('check registry', () => {
    it('should register every check in report order', () => {
      expect(getAllChecks().map((c) => c.errorCode)).toEqual([
        'E001',
        'E002',
        'E003',
        'E004',
        'E005',
        'E006',
        'E007',
        'E008',
        'E009',
      ]);
      expect(getCheck('import_cycle')?.errorCode).toBe('E008');
    });
  });

  describe('createPathFilter', () => {
    it('should accept everything without targets', () => {
      expect(createPathFilter(undefined)('src/a.ts')).toBe(true);
      expect(createPathFilter([])('src/a.ts')).toBe(true);
    });

    it('should match exact paths, directories and globs', () => {
      const include = createPathFilter(['./src/services/', 'src/domain/order.ts', '**/*.tsx']);

      expect(include('src/services/order-service.ts')).toBe(true);
      expect(include('src/domain/order.ts')).toBe(true);
      expect(include('src/pages/home.tsx')).toBe(true);
      expect(include('src/domain/user.ts')).toBe(false);
      expect(include('src/servicesx/a.ts')).toBe(false);
    });

    it('should treat "." as the whole project', () => {
      expect(createPathFilter(['.'])('anything/at/all.ts')).toBe(true);
    });
  });

  describe('validateTree', () => {
    it('should collect and sort violations from every check', () => {
      const report = validateTree(model, { files });

      expect(report.violations.map((v) => [v.file, v.line, v.code])).toEqual([
        ['src/main.ts', null, 'E007'],
        ['src/repositories/order-repository.ts', 2, 'E001'],
        ['src/repositories/order-repository.ts', 2, 'E008'],
        ['src/services/order-service.ts', null, 'E004'],
      ]);
      expect(report.summary).toEqual({ files: 4, errors: 2, warnings: 2 });
      expect(report.passed).toBe(false);
    });

    it('should pass with warnings unless they are failures', () => {
      const clean = files.filter((f) => f.path !== 'src/repositories/order-repository.ts');

      expect(validateTree(model, { files: clean }).passed).toBe(true);
      expect(validateTree(model, { files: clean }, { failOnWarning: true }).passed).toBe(false);
    });

    it('should limit reported files while checking the whole tree', () => {
      const report = validateTree(model, { files }, { only: ['src/repositories'] });

      expect(report.files).toEqual(['src/repositories/order-repository.ts']);
      expect(report.violations.map((v) => v.code)).toEqual(['E001', 'E008']);
      expect(report.summary).toEqual({ files: 1, errors: 2, warnings: 0 });
    });
  });
});
