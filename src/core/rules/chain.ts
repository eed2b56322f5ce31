/**
 * Dependency chain expressions: "Repository → Service → Handler".
 *
 * A chain lists layers from the most depended-upon to the consumer, so every
 * layer may import the one before it (and, in transitive mode, all earlier ones).
 */
import { RuleError, ErrorCodes } from '../../utils/errors.js';
import type { ChainMode } from './schema.js';

const ARROW = /\s*(?:->|→|=>|>)\s*/;

/**
 * Split a chain expression into its raw layer names.
 */
export function parseChain(expression: string): string[] {
  const trimmed = expression.trim();
  if (!trimmed) {
    throw new RuleError(ErrorCodes.INVALID_CHAIN, 'Chain expression is empty');
  }

  const names = trimmed.split(ARROW).map((n) => n.trim());
  if (names.some((n) => n.length === 0)) {
    throw new RuleError(
      ErrorCodes.INVALID_CHAIN,
      `Chain "${expression}" has an empty segment`,
      { chain: expression }
    );
  }
  return names;
}

/**
 * Match a chain name to a declared layer name.
 * Case-insensitive; spaces become dashes; a plural form falls back to the
 * singular when only the singular is declared ("Repositories" → "repository").
 */
export function resolveChainName(name: string, layerNames: readonly string[]): string | null {
  const normalized = name.trim().toLowerCase().replace(/\s+/g, '-');
  const candidates = [normalized];
  if (normalized.endsWith('ies')) {
    candidates.push(`${normalized.slice(0, -3)}y`);
  }
  if (normalized.endsWith('es')) {
    candidates.push(normalized.slice(0, -2));
  }
  if (normalized.endsWith('s')) {
    candidates.push(normalized.slice(0, -1));
  }
  return candidates.find((c) => layerNames.includes(c)) ?? null;
}

/**
 * Turn resolved chain names into `[importer, imported]` pairs.
 */
export function expandChain(names: readonly string[], mode: ChainMode): Array<[string, string]> {
  const edges: Array<[string, string]> = [];
  for (let i = 1; i < names.length; i++) {
    const start = mode === 'transitive' ? 0 : i - 1;
    for (let j = start; j < i; j++) {
      edges.push([names[i], names[j]]);
    }
  }
  return edges;
}
