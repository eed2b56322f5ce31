/**
 * Source tree scanner - reads the files under the rule root and resolves
 * their imports against the scanned file set.
 */
import os from 'node:os';
import * as path from 'node:path';
import { globFiles, readFile, toPosix } from '../../utils/file-system.js';
import { loadIgnoreFile, type IgnoreFilter } from '../../utils/ignore-file.js';
import { logger } from '../../utils/logger.js';
import type { RuleModel } from '../rules/model.js';
import { extractGoImports, extractTsImports } from './extract.js';
import { readGoModule } from './go-module.js';
import type { ImportSpecifier, SourceFile, SourceTree } from './types.js';

const log = logger.child('scan');

export const DEFAULT_EXCLUDE = ['**/node_modules/**', '**/dist/**', '**/vendor/**'];

/** Default concurrency for file reads */
const DEFAULT_CONCURRENCY = Math.min(Math.max(Math.floor(os.cpus().length * 0.75), 4), 32);

export interface ScanOptions {
  /** Glob patterns excluded from the scan */
  exclude?: string[];
  /** Ignore filter; defaults to the project's `.layerkitignore` */
  ignore?: IgnoreFilter;
  concurrency?: number;
}

async function processInBatches<T, R>(
  items: T[],
  concurrency: number,
  processor: (item: T) => Promise<R>
): Promise<R[]> {
  const results: R[] = [];
  for (let i = 0; i < items.length; i += concurrency) {
    const batch = items.slice(i, i + concurrency);
    results.push(...(await Promise.all(batch.map(processor))));
  }
  return results;
}

/**
 * Resolve a relative TypeScript/JavaScript specifier against the file set.
 * `.js` specifiers are tried as their TypeScript sources first.
 */
export function resolveTsSpecifier(
  fromFile: string,
  specifier: string,
  known: ReadonlySet<string>,
  extensions: readonly string[]
): string | null {
  if (!specifier.startsWith('./') && !specifier.startsWith('../') && specifier !== '.' && specifier !== '..') {
    return null;
  }
  const direct = path.posix.join(path.posix.dirname(fromFile), specifier);
  const base = direct.endsWith('.js') ? direct.slice(0, -3) : direct;

  const candidates = [
    ...extensions.map((ext) => `${base}${ext}`),
    ...extensions.map((ext) => `${base}/index${ext}`),
    direct,
  ];
  return candidates.find((candidate) => known.has(candidate)) ?? null;
}

/**
 * Resolve a Go package path to the non-test files of its directory.
 */
export function resolveGoSpecifier(
  specifier: string,
  goModule: string | null,
  filesByDir: ReadonlyMap<string, string[]>
): string[] {
  if (!goModule || !specifier.startsWith(`${goModule}/`)) return [];
  return filesByDir.get(specifier.slice(goModule.length + 1)) ?? [];
}

function groupByDirectory(paths: string[], model: RuleModel): Map<string, string[]> {
  const byDir = new Map<string, string[]>();
  for (const p of paths) {
    if (model.isTestPath(p)) continue;
    const dir = path.posix.dirname(p);
    const files = byDir.get(dir) ?? [];
    files.push(p);
    byDir.set(dir, files);
  }
  return byDir;
}

/**
 * Project-relative paths of the language's source files under the rule root,
 * after excludes and `.layerkitignore`.
 */
export async function listSourceFiles(
  projectRoot: string,
  model: RuleModel,
  options: Pick<ScanOptions, 'exclude' | 'ignore'> = {}
): Promise<string[]> {
  const prefix = model.root ? `${model.root}/` : '';
  const patterns = model.extensions.map((ext) => `${prefix}**/*${ext}`);
  const exclude = [...(options.exclude ?? DEFAULT_EXCLUDE)];
  if (model.language === 'typescript') {
    exclude.push('**/*.d.ts');
  }

  const ignore = options.ignore ?? (await loadIgnoreFile(projectRoot));
  return ignore.filter((await globFiles(patterns, { cwd: projectRoot, ignore: exclude })).map(toPosix));
}

export async function scanTree(projectRoot: string, model: RuleModel, options: ScanOptions = {}): Promise<SourceTree> {
  const paths = await listSourceFiles(projectRoot, model, options);
  const known = new Set(paths);
  log.debug(`Scanning ${paths.length} files under ${model.root || '.'}`);

  const goModule = model.language === 'go' ? await readGoModule(projectRoot) : null;
  if (model.language === 'go' && !goModule) {
    log.warn('No module path found in go.mod; package imports will not be resolved');
  }
  const filesByDir = model.language === 'go' ? groupByDirectory(paths, model) : new Map<string, string[]>();

  const files = await processInBatches(paths, options.concurrency ?? DEFAULT_CONCURRENCY, async (filePath) => {
    const content = await readFile(path.join(projectRoot, filePath));
    const specifiers: ImportSpecifier[] =
      model.language === 'go' ? extractGoImports(content) : extractTsImports(content);

    const importLines = new Map<string, number>();
    for (const { specifier, line } of specifiers) {
      const targets =
        model.language === 'go'
          ? resolveGoSpecifier(specifier, goModule, filesByDir)
          : [resolveTsSpecifier(filePath, specifier, known, model.extensions)];
      for (const target of targets) {
        if (target && target !== filePath && !importLines.has(target)) {
          importLines.set(target, line);
        }
      }
    }

    const file: SourceFile = { path: filePath, content, imports: [...importLines.keys()], importLines };
    return file;
  });

  return { files };
}
