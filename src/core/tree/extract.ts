/**
 * Regex-based import extraction.
 *
 * Lightweight by intent: specifiers are read without parsing the file, so
 * commented-out imports are picked up as well.
 */
import type { ImportSpecifier } from './types.js';

const TS_IMPORT_PATTERNS: RegExp[] = [
  // import x from 'm', import { a } from 'm', import * as x from 'm', import 'm'
  /import\s+(?:type\s+)?(?:(?:\{[^}]*\}|\*\s+as\s+\w+|\w+)(?:\s*,\s*(?:\{[^}]*\}|\*\s+as\s+\w+|\w+))*\s+from\s+)?['"]([^'"]+)['"]/g,
  // import('m')
  /import\s*\(\s*['"]([^'"]+)['"]\s*\)/g,
  // require('m')
  /require\s*\(\s*['"]([^'"]+)['"]\s*\)/g,
  // export { a } from 'm', export * from 'm'
  /export\s+(?:type\s+)?(?:\{[^}]*\}|\*(?:\s+as\s+\w+)?)\s+from\s+['"]([^'"]+)['"]/g,
];

function lineAt(content: string, index: number): number {
  let line = 1;
  for (let i = 0; i < index; i++) {
    if (content.charCodeAt(i) === 10) line++;
  }
  return line;
}

function sortByLine(specifiers: ImportSpecifier[]): ImportSpecifier[] {
  return specifiers.sort((a, b) => a.line - b.line);
}

/**
 * Extract module specifiers from TypeScript or JavaScript source.
 */
export function extractTsImports(content: string): ImportSpecifier[] {
  const found: ImportSpecifier[] = [];
  for (const pattern of TS_IMPORT_PATTERNS) {
    for (const match of content.matchAll(pattern)) {
      if (match[1]) {
        found.push({ specifier: match[1], line: lineAt(content, match.index ?? 0) });
      }
    }
  }
  return sortByLine(found);
}

const GO_SINGLE_IMPORT = /^import\s+(?:[\w.]+\s+)?"([^"]+)"/gm;
const GO_IMPORT_BLOCK = /^import\s*\(([\s\S]*?)\)/gm;
const GO_BLOCK_ENTRY = /^\s*(?:[\w.]+\s+)?"([^"]+)"/;

/**
 * Extract package paths from Go `import` declarations, single or grouped.
 */
export function extractGoImports(content: string): ImportSpecifier[] {
  const found: ImportSpecifier[] = [];

  for (const match of content.matchAll(GO_SINGLE_IMPORT)) {
    found.push({ specifier: match[1], line: lineAt(content, match.index ?? 0) });
  }

  for (const match of content.matchAll(GO_IMPORT_BLOCK)) {
    const blockLine = lineAt(content, match.index ?? 0);
    match[1].split('\n').forEach((entry, offset) => {
      const withoutComment = entry.replace(/\/\/.*$/, '');
      const pkg = GO_BLOCK_ENTRY.exec(withoutComment);
      if (pkg) {
        found.push({ specifier: pkg[1], line: blockLine + offset });
      }
    });
  }

  return sortByLine(found);
}
