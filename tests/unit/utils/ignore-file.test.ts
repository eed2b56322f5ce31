/**
 * Tests for .layerkitignore support.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  createIgnoreFilter,
  loadIgnoreFile,
  parseIgnoreFile,
  IGNORE_FILENAME,
} from '../../../src/utils/ignore-file.js';

describe('ignore-file', () => {
  it('should parse patterns skipping comments and blanks', () => {
    expect(parseIgnoreFile('# comment\n\ndist/\n  *.gen.ts  \n!keep.gen.ts\n')).toEqual([
      'dist/',
      '*.gen.ts',
      '!keep.gen.ts',
    ]);
  });

  it('should filter with gitignore semantics', () => {
    const filter = createIgnoreFilter(['generated/', '*.gen.ts', '!keep.gen.ts']);

    expect(filter.ignores('src/generated/a.ts')).toBe(true);
    expect(filter.ignores('src/a.gen.ts')).toBe(true);
    expect(filter.ignores('src/keep.gen.ts')).toBe(false);
    expect(filter.filter(['src/a.ts', 'src/b.gen.ts'])).toEqual(['src/a.ts']);
    expect(filter.patterns()).toEqual(['generated/', '*.gen.ts', '!keep.gen.ts']);
  });

  describe('loadIgnoreFile', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'layerkit-ignore-'));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should return an empty filter without a file', async () => {
      const filter = await loadIgnoreFile(tempDir);
      expect(filter.patterns()).toEqual([]);
      expect(filter.ignores('src/a.ts')).toBe(false);
    });

    it('should load patterns from the project root', async () => {
      await fs.writeFile(path.join(tempDir, IGNORE_FILENAME), 'legacy/\n');
      const filter = await loadIgnoreFile(tempDir);

      expect(filter.ignores('src/legacy/old.ts')).toBe(true);
    });
  });
});
