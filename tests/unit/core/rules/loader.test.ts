/**
 * Tests for rule loading.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { loadRules, parseRulesYaml, parseRules } from '../../../../src/core/rules/loader.js';
import { RuleError, SystemError } from '../../../../src/utils/errors.js';

const RULES_YAML = `
version: "1.0"
root: app
chain: "store -> logic"
layers:
  - name: store
    directory: store
  - name: logic
    directory: logic
`;

describe('rules loader', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'layerkit-rules-'));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('parseRules', () => {
    it('should apply defaults', () => {
      const rules = parseRules({ layers: [{ name: 'core', directory: 'core' }] });

      expect(rules.language).toBe('typescript');
      expect(rules.root).toBe('src');
      expect(rules.naming).toEqual({ files: 'kebab-case', exempt: ['index', 'main'] });
      expect(rules.tests).toEqual({ colocated: true });
      expect(rules.chain_mode).toBe('adjacent');
      expect(rules.unlayered).toBe('warn');
      expect(rules.layers[0]).toMatchObject({ scope: 'entity', prefix: '', suffix: '', tests: true, models: false });
    });

    it('should reject bad layer names with the issue path', () => {
      expect(() => parseRules({ layers: [{ name: 'Core', directory: 'core' }] })).toThrow(/layers\.0\.name/);
    });

    it('should reject parent directory segments', () => {
      expect(() => parseRules({ layers: [{ name: 'core', directory: '../core' }] })).toThrow(RuleError);
    });
  });

  describe('parseRulesYaml', () => {
    it('should build a model', () => {
      const model = parseRulesYaml(RULES_YAML);
      expect(model.root).toBe('app');
      expect(model.layers.map((l) => l.name)).toEqual(['store', 'logic']);
      expect(model.canImport('logic', 'store')).toBe(true);
    });

    it('should turn YAML syntax errors into R001', () => {
      expect(() => parseRulesYaml('layers: [', 'broken.yaml')).toThrow(RuleError);
      expect(() => parseRulesYaml('layers: [', 'broken.yaml')).toThrow(/broken\.yaml/);
    });
  });

  describe('loadRules', () => {
    it('should load the default rule file', async () => {
      await fs.mkdir(path.join(tempDir, '.layerkit'));
      await fs.writeFile(path.join(tempDir, '.layerkit', 'rules.yaml'), RULES_YAML);

      const model = await loadRules(tempDir);
      expect(model.getLayer('logic')?.directory).toBe('app/logic');
    });

    it('should load a custom rule path', async () => {
      await fs.writeFile(path.join(tempDir, 'layers.yaml'), RULES_YAML);

      const model = await loadRules(tempDir, { rulesPath: 'layers.yaml' });
      expect(model.layers).toHaveLength(2);
    });

    it('should fall back to the preset', async () => {
      const model = await loadRules(tempDir, { preset: 'web-go' });
      expect(model.language).toBe('go');
    });

    it('should fail with S002 when nothing is configured', async () => {
      await expect(loadRules(tempDir)).rejects.toBeInstanceOf(SystemError);
      await expect(loadRules(tempDir)).rejects.toMatchObject({ code: 'S002' });
    });
  });
});
