/**
 * `.layerkitignore` support: gitignore-style patterns that remove files from
 * tree scans before any check runs.
 */
import * as path from 'node:path';
import ignore, { type Ignore } from 'ignore';
import { fileExists, readFile } from './file-system.js';

export const IGNORE_FILENAME = '.layerkitignore';

export interface IgnoreFilter {
  /**
   * Check if a project-relative path should be ignored.
   */
  ignores(filePath: string): boolean;

  /**
   * Keep only the paths that are not ignored.
   */
  filter(filePaths: string[]): string[];

  patterns(): string[];
}

/**
 * Load `.layerkitignore` from the project root.
 * A missing file yields an empty filter.
 */
export async function loadIgnoreFile(projectRoot: string): Promise<IgnoreFilter> {
  const ignorePath = path.join(projectRoot, IGNORE_FILENAME);
  if (!(await fileExists(ignorePath))) {
    return createIgnoreFilter([]);
  }
  const content = await readFile(ignorePath);
  return createIgnoreFilter(parseIgnoreFile(content));
}

export function createIgnoreFilter(patterns: string[]): IgnoreFilter {
  const ig: Ignore = ignore().add(patterns);

  const ignores = (filePath: string): boolean => ig.ignores(filePath.replace(/\\/g, '/'));

  return {
    ignores,
    filter: (filePaths) => filePaths.filter((fp) => !ignores(fp)),
    patterns: () => [...patterns],
  };
}

/**
 * Parse ignore file content: one pattern per line, `#` comments and blank
 * lines skipped, `!` negations kept.
 */
export function parseIgnoreFile(content: string): string[] {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}
