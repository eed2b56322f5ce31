/**
 * Built-in rule sets shipped as YAML files in the package's `presets/` directory.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { fileExists, readFile } from '../../utils/file-system.js';
import { RuleError, ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_PRESET = 'web-typescript';

// Same relative location from src/core/rules and dist/core/rules
const PRESETS_DIR = fileURLToPath(new URL('../../../presets/', import.meta.url));

/**
 * Names of the available presets, sorted.
 */
export async function listPresets(): Promise<string[]> {
  const entries = await fs.promises.readdir(PRESETS_DIR);
  return entries
    .filter((entry) => entry.endsWith('.yaml'))
    .map((entry) => entry.slice(0, -'.yaml'.length))
    .sort();
}

/**
 * Raw YAML of a preset, as written by `layerkit init`.
 */
export async function readPresetSource(name: string): Promise<string> {
  const presetPath = path.join(PRESETS_DIR, `${name}.yaml`);
  if (!/^[a-z0-9-]+$/.test(name) || !(await fileExists(presetPath))) {
    const available = await listPresets();
    throw new RuleError(
      ErrorCodes.UNKNOWN_PRESET,
      `Unknown preset '${name}'. Available: ${available.join(', ')}`,
      { preset: name, available }
    );
  }
  return readFile(presetPath);
}
