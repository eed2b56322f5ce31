/**
 * Import cycles among files, found by depth-first search.
 * Every group of mutually importing files yields at least one cycle, but not
 * every distinct cycle through the group: files are visited once, so a cycle
 * closed through an already finished file is not reported separately.
 * Each reported cycle appears once, on its lexicographically first file.
 *
 * Error code: E008
 */
import { ErrorCodes } from '../../../utils/errors.js';
import type { SourceTree } from '../../tree/types.js';
import type { CheckContext, Violation } from '../types.js';
import { BaseCheck } from './base.js';

/**
 * Find import cycles, at least one per strongly connected group of files.
 * Each cycle is returned as a closed path starting and ending at its smallest
 * file.
 */
export function detectCycles(tree: SourceTree): string[][] {
  const imports = new Map(tree.files.map((f) => [f.path, f.imports]));
  const cycles: string[][] = [];
  const seenKeys = new Set<string>();
  const visited = new Set<string>();
  const recursionStack = new Set<string>();
  const pathStack: string[] = [];

  const dfs = (filePath: string): void => {
    visited.add(filePath);
    recursionStack.add(filePath);
    pathStack.push(filePath);

    for (const importedPath of imports.get(filePath) ?? []) {
      if (!imports.has(importedPath)) continue;
      if (!visited.has(importedPath)) {
        dfs(importedPath);
      } else if (recursionStack.has(importedPath)) {
        const members = pathStack.slice(pathStack.indexOf(importedPath));
        // Same cycle entered at a different point has the same members
        const key = [...members].sort().join('|');
        if (!seenKeys.has(key)) {
          seenKeys.add(key);
          cycles.push(rotateToSmallest(members));
        }
      }
    }

    pathStack.pop();
    recursionStack.delete(filePath);
  };

  for (const file of tree.files) {
    if (!visited.has(file.path)) {
      dfs(file.path);
    }
  }

  return cycles;
}

function rotateToSmallest(members: string[]): string[] {
  let start = 0;
  members.forEach((member, i) => {
    if (member < members[start]) start = i;
  });
  const rotated = [...members.slice(start), ...members.slice(0, start)];
  return [...rotated, rotated[0]];
}

export class ImportCycleCheck extends BaseCheck {
  readonly rule = 'import_cycle' as const;
  readonly errorCode = ErrorCodes.IMPORT_CYCLE;

  run(context: CheckContext): Violation[] {
    return detectCycles(context.tree).map((cycle) => {
      const first = context.files.get(cycle[0]);
      return this.createViolation(cycle[0], `Import cycle: ${cycle.join(' -> ')}`, {
        line: first?.importLines?.get(cycle[1]) ?? null,
        actual: cycle[1],
      });
    });
  }

  protected getFixHint(actual?: string): string {
    return `Break the cycle, e.g. by removing the import of ${actual ?? 'the next file'}`;
  }
}
