import * as path from 'node:path';
import { fileExists, readFile } from '../../utils/file-system.js';

const MODULE_LINE = /^module\s+("?)([^\s"]+)\1\s*$/m;

export function parseGoModule(content: string): string | null {
  return MODULE_LINE.exec(content)?.[2] ?? null;
}

/**
 * Module path declared in the project's go.mod, or null without one.
 */
export async function readGoModule(projectRoot: string): Promise<string | null> {
  const goMod = path.join(projectRoot, 'go.mod');
  if (!(await fileExists(goMod))) return null;
  return parseGoModule(await readFile(goMod));
}
