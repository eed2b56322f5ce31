/**
 * Skeleton rendering - placeholder files that carry only a plan's imports.
 *
 * A written skeleton set reproduces the plan's import graph on disk, so the
 * scanner and validator see exactly what the planner intended.
 */
import * as path from 'node:path';
import { convertCase } from '../naming/case.js';
import { fileExists, writeFile } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import type { LayoutPlan, PlannedFile } from './types.js';

const log = logger.child('skeleton');

export const SKELETON_MARKER = 'layerkit skeleton';
export const DEFAULT_GO_MODULE = 'example.com/app';

export interface SkeletonOptions {
  /** Go module path used for package imports */
  goModule?: string;
}

export interface WriteSkeletonsResult {
  created: string[];
  skipped: string[];
}

function markerLine(file: PlannedFile): string {
  const parts = [`layer=${file.layer}`];
  if (file.entity) parts.push(`entity=${file.entity}`);
  if (file.kind === 'test') parts.push('kind=test');
  return `// ${SKELETON_MARKER}: ${parts.join(' ')}`;
}

/**
 * Relative ES import specifier from one planned file to another.
 * Every TypeScript/JavaScript source is imported through its `.js` output name.
 */
export function relativeSpecifier(from: string, to: string): string {
  const ext = path.posix.extname(to);
  const target = `${to.slice(0, to.length - ext.length)}.js`;
  const relative = path.posix.relative(path.posix.dirname(from), target);
  return relative.startsWith('.') ? relative : `./${relative}`;
}

function importBinding(target: string, taken: Set<string>): string {
  const base = convertCase(path.posix.basename(target, path.posix.extname(target)), 'camelCase') || 'mod';
  let name = base;
  for (let i = 2; taken.has(name); i++) {
    name = `${base}${i}`;
  }
  taken.add(name);
  return name;
}

function outgoing(file: PlannedFile, plan: LayoutPlan): string[] {
  return plan.edges.filter((e) => e.from === file.path).map((e) => e.to);
}

function renderTypeScript(file: PlannedFile, plan: LayoutPlan): string {
  const lines = [markerLine(file)];
  if (file.operations.length > 0) {
    lines.push(`// operations: ${file.operations.join(', ')}`);
  }
  const taken = new Set<string>();
  const targets = outgoing(file, plan);
  if (targets.length > 0) lines.push('');
  for (const target of targets) {
    lines.push(`import * as ${importBinding(target, taken)} from '${relativeSpecifier(file.path, target)}';`);
  }
  lines.push('', 'export {};', '');
  return lines.join('\n');
}

function goPackageName(dir: string): string {
  return path.posix.basename(dir).replace(/[^A-Za-z0-9_]/g, '_').toLowerCase() || 'main';
}

function renderGo(file: PlannedFile, plan: LayoutPlan, goModule: string): string {
  const dir = path.posix.dirname(file.path);
  const packages = new Set<string>();
  for (const target of outgoing(file, plan)) {
    const targetDir = path.posix.dirname(target);
    // Files of one directory share a package and never import each other
    if (targetDir !== dir) {
      packages.add(`${goModule}/${targetDir}`);
    }
  }

  const lines = [markerLine(file)];
  if (file.operations.length > 0) {
    lines.push(`// operations: ${file.operations.join(', ')}`);
  }
  lines.push(`package ${goPackageName(dir)}`);
  if (packages.size > 0) {
    lines.push('', 'import (');
    for (const pkg of [...packages].sort()) {
      lines.push(`\t_ "${pkg}"`);
    }
    lines.push(')');
  }
  lines.push('');
  return lines.join('\n');
}

export function renderSkeleton(file: PlannedFile, plan: LayoutPlan, options: SkeletonOptions = {}): string {
  return plan.language === 'go'
    ? renderGo(file, plan, options.goModule ?? DEFAULT_GO_MODULE)
    : renderTypeScript(file, plan);
}

/**
 * Write skeletons for planned files that do not exist yet.
 * Existing files are never touched.
 */
export async function writeSkeletons(
  projectRoot: string,
  plan: LayoutPlan,
  options: SkeletonOptions = {}
): Promise<WriteSkeletonsResult> {
  const created: string[] = [];
  const skipped: string[] = [];

  for (const file of plan.files) {
    const target = path.join(projectRoot, file.path);
    if (await fileExists(target)) {
      skipped.push(file.path);
      continue;
    }
    await writeFile(target, renderSkeleton(file, plan, options));
    log.debug(`Created ${file.path}`);
    created.push(file.path);
  }

  return { created, skipped };
}
