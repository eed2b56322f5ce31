/**
 * Types for the resolved rule model.
 */
import type { CaseStyle } from '../naming/case.js';
import type { ChainMode, Language, LayerScope, Severity, UnlayeredPolicy } from './schema.js';

/**
 * A forbidden construct with its pattern compiled.
 */
export interface ResolvedForbidden {
  id: string;
  pattern: string;
  regex: RegExp;
  why?: string;
  severity: Severity;
  /** Layers the rule applies to; null means every layer */
  layers: Set<string> | null;
}

/**
 * Layer with normalized directory and import rules.
 */
export interface ResolvedLayer {
  name: string;
  description?: string;
  /** Directory relative to the project root (posix, root-joined) */
  directory: string;
  scope: LayerScope;
  /** Prefix as lowercase words */
  prefix: string[];
  /** Suffix as lowercase words */
  suffix: string[];
  /** Extension of planned source files */
  extension: string;
  /** Declared file stems of a shared layer, as lowercase words */
  files: string[][];
  models: boolean;
  tests: boolean;
  /** Layers this layer may import directly */
  canImport: Set<string>;
  /** Layers planned files import, in dependency order */
  uses: string[];
  /** Longest dependency path down to a leaf layer (leaves are 0) */
  rank: number;
  forbid: ResolvedForbidden[];
}

/**
 * How an import between two layers relates to the allowed dependency graph.
 * - same: both files are in the same layer
 * - allowed: the importer may import the target layer
 * - reverse: the target layer depends on the importer (upward import)
 * - undeclared: no allowed path in either direction
 */
export type EdgeKind = 'same' | 'allowed' | 'reverse' | 'undeclared';

export interface NamingSettings {
  files: CaseStyle;
  exempt: string[];
}

export interface TestSettings {
  colocated: boolean;
  pattern: string;
}

export interface RuleModelInit {
  version: string;
  language: Language;
  root: string;
  naming: NamingSettings;
  tests: TestSettings;
  chainMode: ChainMode;
  unlayered: UnlayeredPolicy;
  layers: ResolvedLayer[];
  forbidden: ResolvedForbidden[];
}
