export { scanTree, listSourceFiles, resolveTsSpecifier, resolveGoSpecifier, DEFAULT_EXCLUDE } from './scanner.js';
export type { ScanOptions } from './scanner.js';
export { treeFromPlan } from './from-plan.js';
export { extractTsImports, extractGoImports } from './extract.js';
export { readGoModule, parseGoModule } from './go-module.js';
export type { SourceFile, SourceTree, ImportSpecifier } from './types.js';
