/**
 * Rule model - the resolved, validated form of a rule file.
 *
 * Layers form a DAG over their allowed imports. The model answers membership
 * ("which layer owns this path"), direction ("may layer A import layer B") and
 * naming questions for the planner and the validator.
 */
import * as path from 'node:path';
import { minimatch } from 'minimatch';
import { splitWords } from '../naming/case.js';
import { RuleError, ErrorCodes } from '../../utils/errors.js';
import { joinPosix } from '../../utils/file-system.js';
import { parseChain, resolveChainName, expandChain } from './chain.js';
import { LANGUAGE_PROFILES } from './languages.js';
import type { ChainMode, Language, LayerForbid, Rules, UnlayeredPolicy } from './schema.js';
import type {
  EdgeKind,
  NamingSettings,
  ResolvedForbidden,
  ResolvedLayer,
  RuleModelInit,
  TestSettings,
} from './types.js';

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class RuleModel {
  readonly version: string;
  readonly language: Language;
  readonly root: string;
  readonly naming: NamingSettings;
  readonly tests: TestSettings;
  readonly chainMode: ChainMode;
  readonly unlayered: UnlayeredPolicy;
  /** Layers in dependency order, leaves first */
  readonly layers: readonly ResolvedLayer[];
  readonly forbidden: readonly ResolvedForbidden[];

  private readonly byName: Map<string, ResolvedLayer>;
  /** Layers ordered by directory depth, most specific first */
  private readonly membershipOrder: ResolvedLayer[];
  /** Transitive closure of allowed imports */
  private readonly reach: Map<string, Set<string>>;
  private readonly testRegex: RegExp;

  constructor(init: RuleModelInit) {
    this.version = init.version;
    this.language = init.language;
    this.root = init.root;
    this.naming = init.naming;
    this.tests = init.tests;
    this.chainMode = init.chainMode;
    this.unlayered = init.unlayered;
    this.layers = init.layers;
    this.forbidden = init.forbidden;

    this.byName = new Map(init.layers.map((l) => [l.name, l]));
    this.membershipOrder = [...init.layers].sort(
      (a, b) => b.directory.split('/').length - a.directory.split('/').length
    );
    this.reach = this.computeReach();

    const body = escapeRegex(this.tests.pattern)
      .replace(escapeRegex('{stem}'), '(.+?)')
      .replace(escapeRegex('{ext}'), '(\\.[A-Za-z]+)');
    this.testRegex = new RegExp(`^${body}$`);
  }

  get extensions(): readonly string[] {
    return LANGUAGE_PROFILES[this.language].extensions;
  }

  getLayer(name: string): ResolvedLayer | undefined {
    return this.byName.get(name);
  }

  /**
   * Find the layer owning a project-relative posix path.
   * Nested layer directories resolve to the most specific one.
   */
  layerOf(filePath: string): ResolvedLayer | null {
    for (const layer of this.membershipOrder) {
      if (minimatch(filePath, `${layer.directory}/**`)) {
        return layer;
      }
    }
    return null;
  }

  /**
   * Whether `from` may import `to` directly.
   */
  canImport(from: string, to: string): boolean {
    if (from === to) return true;
    return this.byName.get(from)?.canImport.has(to) ?? false;
  }

  /**
   * Whether `from` reaches `to` through one or more allowed imports.
   */
  dependsOn(from: string, to: string): boolean {
    return this.reach.get(from)?.has(to) ?? false;
  }

  classifyEdge(from: string, to: string): EdgeKind {
    if (from === to) return 'same';
    if (this.canImport(from, to)) return 'allowed';
    if (this.dependsOn(to, from)) return 'reverse';
    return 'undeclared';
  }

  /**
   * Forbidden constructs that apply to files of a layer (null for unlayered files).
   */
  forbiddenFor(layer: ResolvedLayer | null): ResolvedForbidden[] {
    const global = this.forbidden.filter((f) => f.layers === null || (layer !== null && f.layers.has(layer.name)));
    return layer ? [...global, ...layer.forbid] : global;
  }

  isSourcePath(filePath: string): boolean {
    return this.extensions.includes(path.posix.extname(filePath));
  }

  isTestPath(filePath: string): boolean {
    return this.matchTest(filePath) !== null;
  }

  /**
   * Co-located test path for a source file.
   */
  testPathFor(sourcePath: string): string {
    const ext = path.posix.extname(sourcePath);
    const stem = path.posix.basename(sourcePath, ext);
    const name = this.tests.pattern.replace('{stem}', stem).replace('{ext}', ext);
    return joinPosix(path.posix.dirname(sourcePath), name);
  }

  /**
   * Source path a test file covers, or null when the path is not a test.
   */
  subjectPathFor(testPath: string): string | null {
    const match = this.matchTest(testPath);
    if (!match) return null;
    return joinPosix(path.posix.dirname(testPath), `${match.stem}${match.ext}`);
  }

  /**
   * File stem the naming convention applies to (the subject stem for tests).
   */
  namingStem(filePath: string): string {
    const match = this.matchTest(filePath);
    if (match) return match.stem;
    return path.posix.basename(filePath, path.posix.extname(filePath));
  }

  toJSON(): Record<string, unknown> {
    return {
      version: this.version,
      language: this.language,
      root: this.root,
      naming: this.naming,
      tests: this.tests,
      chain_mode: this.chainMode,
      unlayered: this.unlayered,
      layers: this.layers.map((l) => ({
        name: l.name,
        directory: l.directory,
        scope: l.scope,
        rank: l.rank,
        can_import: [...l.canImport].sort(),
        uses: l.uses,
        tests: l.tests,
        files: l.files.map((words) => words.join(' ')),
        prefix: l.prefix.join(' '),
        suffix: l.suffix.join(' '),
      })),
      forbidden: this.forbidden.map((f) => ({
        id: f.id,
        pattern: f.pattern,
        severity: f.severity,
        layers: f.layers ? [...f.layers].sort() : null,
      })),
    };
  }

  private matchTest(filePath: string): { stem: string; ext: string } | null {
    const match = this.testRegex.exec(path.posix.basename(filePath));
    if (!match || !this.extensions.includes(match[2])) return null;
    return { stem: match[1], ext: match[2] };
  }

  private computeReach(): Map<string, Set<string>> {
    const reach = new Map<string, Set<string>>();
    // Leaves come first, so every dependency's closure is complete before use
    for (const layer of this.layers) {
      const closure = new Set<string>();
      for (const dep of layer.canImport) {
        closure.add(dep);
        for (const transitive of reach.get(dep) ?? []) {
          closure.add(transitive);
        }
      }
      reach.set(layer.name, closure);
    }
    return reach;
  }
}

function compilePattern(rule: LayerForbid, owner: string): RegExp {
  try {
    return new RegExp(rule.pattern, 'gm');
  } catch (error) {
    throw new RuleError(
      ErrorCodes.INVALID_PATTERN,
      `Forbidden construct '${rule.id}' in ${owner} has an invalid pattern: ${error instanceof Error ? error.message : rule.pattern}`,
      { id: rule.id, pattern: rule.pattern }
    );
  }
}

/**
 * Find a cycle in the allowed-import graph, returned as a closed path.
 */
function findCycle(names: string[], edges: Map<string, Set<string>>): string[] | null {
  const state = new Map<string, 'visiting' | 'done'>();
  const stack: string[] = [];

  const visit = (name: string): string[] | null => {
    state.set(name, 'visiting');
    stack.push(name);
    for (const dep of edges.get(name) ?? []) {
      const depState = state.get(dep);
      if (depState === 'visiting') {
        return [...stack.slice(stack.indexOf(dep)), dep];
      }
      if (depState === undefined) {
        const cycle = visit(dep);
        if (cycle) return cycle;
      }
    }
    stack.pop();
    state.set(name, 'done');
    return null;
  };

  for (const name of names) {
    if (!state.has(name)) {
      const cycle = visit(name);
      if (cycle) return cycle;
    }
  }
  return null;
}

/**
 * Validate a parsed rule file and resolve it into a RuleModel.
 *
 * @throws RuleError on duplicate layers, unknown references, dependency cycles
 * or invalid patterns
 */
export function buildRuleModel(rules: Rules): RuleModel {
  const profile = LANGUAGE_PROFILES[rules.language];
  const normalizedRoot = joinPosix(rules.root).replace(/\/+$/, '');
  const root = normalizedRoot === '.' ? '' : normalizedRoot;
  const names = rules.layers.map((l) => l.name);

  const seenNames = new Set<string>();
  const seenDirs = new Map<string, string>();
  for (const layer of rules.layers) {
    if (seenNames.has(layer.name)) {
      throw new RuleError(ErrorCodes.DUPLICATE_LAYER, `Layer '${layer.name}' is declared more than once`, {
        layer: layer.name,
      });
    }
    seenNames.add(layer.name);

    const directory = joinPosix(root, layer.directory);
    const owner = seenDirs.get(directory);
    if (owner) {
      throw new RuleError(
        ErrorCodes.DUPLICATE_LAYER,
        `Layers '${owner}' and '${layer.name}' share the directory '${directory}'`,
        { layers: [owner, layer.name], directory }
      );
    }
    seenDirs.set(directory, layer.name);

    if (layer.scope === 'shared' && layer.files.length === 0) {
      throw new RuleError(ErrorCodes.INVALID_RULES, `Shared layer '${layer.name}' must declare its files`, {
        layer: layer.name,
      });
    }
    if (layer.scope === 'entity' && layer.files.length > 0) {
      throw new RuleError(
        ErrorCodes.INVALID_RULES,
        `Entity layer '${layer.name}' cannot declare files; use scope: shared`,
        { layer: layer.name }
      );
    }
    if (layer.scope === 'shared' && layer.models) {
      throw new RuleError(ErrorCodes.INVALID_RULES, `Shared layer '${layer.name}' cannot hold models`, {
        layer: layer.name,
      });
    }
    if (layer.extension && !profile.extensions.includes(layer.extension)) {
      throw new RuleError(
        ErrorCodes.INVALID_RULES,
        `Layer '${layer.name}' extension '${layer.extension}' is not a ${rules.language} extension (${profile.extensions.join(', ')})`,
        { layer: layer.name }
      );
    }
  }

  // Allowed imports: explicit can_import plus chain edges
  const edges = new Map<string, Set<string>>(names.map((n) => [n, new Set<string>()]));
  for (const layer of rules.layers) {
    for (const target of layer.can_import) {
      if (!seenNames.has(target)) {
        throw new RuleError(
          ErrorCodes.UNKNOWN_LAYER,
          `Layer '${layer.name}' can_import references unknown layer '${target}'`,
          { layer: layer.name, target, known: names }
        );
      }
      if (target === layer.name) {
        throw new RuleError(ErrorCodes.INVALID_RULES, `Layer '${layer.name}' cannot list itself in can_import`, {
          layer: layer.name,
        });
      }
      edges.get(layer.name)?.add(target);
    }
  }

  const chains = rules.chain === undefined ? [] : Array.isArray(rules.chain) ? rules.chain : [rules.chain];
  for (const expression of chains) {
    const resolved = parseChain(expression).map((raw) => {
      const name = resolveChainName(raw, names);
      if (!name) {
        throw new RuleError(
          ErrorCodes.UNKNOWN_LAYER,
          `Chain "${expression}" references unknown layer '${raw}'`,
          { chain: expression, name: raw, known: names }
        );
      }
      return name;
    });
    for (const [from, to] of expandChain(resolved, rules.chain_mode)) {
      if (from === to) {
        throw new RuleError(ErrorCodes.INVALID_CHAIN, `Chain "${expression}" repeats layer '${from}'`, {
          chain: expression,
        });
      }
      edges.get(from)?.add(to);
    }
  }

  const cycle = findCycle(names, edges);
  if (cycle) {
    throw new RuleError(
      ErrorCodes.DEPENDENCY_CYCLE,
      `Layer dependencies form a cycle: ${cycle.join(' -> ')}`,
      { cycle }
    );
  }

  // Rank = longest path to a leaf
  const ranks = new Map<string, number>();
  const rankOf = (name: string): number => {
    const known = ranks.get(name);
    if (known !== undefined) return known;
    let rank = 0;
    for (const dep of edges.get(name) ?? []) {
      rank = Math.max(rank, rankOf(dep) + 1);
    }
    ranks.set(name, rank);
    return rank;
  };

  const forbidden: ResolvedForbidden[] = rules.forbidden.map((rule) => {
    for (const layerName of rule.layers ?? []) {
      if (!seenNames.has(layerName)) {
        throw new RuleError(
          ErrorCodes.UNKNOWN_LAYER,
          `Forbidden construct '${rule.id}' references unknown layer '${layerName}'`,
          { id: rule.id, layer: layerName }
        );
      }
    }
    return {
      id: rule.id,
      pattern: rule.pattern,
      regex: compilePattern(rule, 'forbidden'),
      why: rule.why,
      severity: rule.severity,
      layers: rule.layers ? new Set(rule.layers) : null,
    };
  });

  const layers: ResolvedLayer[] = rules.layers.map((layer) => {
    const canImport = edges.get(layer.name) ?? new Set<string>();
    const uses = [...(layer.uses ?? canImport)];
    for (const used of uses) {
      if (!canImport.has(used)) {
        throw new RuleError(
          ErrorCodes.INVALID_RULES,
          `Layer '${layer.name}' uses '${used}' but may not import it`,
          { layer: layer.name, uses: used, canImport: [...canImport] }
        );
      }
    }
    return {
      name: layer.name,
      description: layer.description,
      directory: joinPosix(root, layer.directory),
      scope: layer.scope,
      prefix: splitWords(layer.prefix),
      suffix: splitWords(layer.suffix),
      extension: layer.extension ?? profile.extension,
      files: layer.files.map(splitWords),
      models: layer.models,
      tests: layer.tests,
      canImport,
      uses,
      rank: rankOf(layer.name),
      forbid: layer.forbid.map((rule) => ({
        id: rule.id,
        pattern: rule.pattern,
        regex: compilePattern(rule, `layer '${layer.name}'`),
        why: rule.why,
        severity: rule.severity,
        layers: new Set([layer.name]),
      })),
    };
  });

  const declared = new Map(names.map((n, i) => [n, i]));
  const ordered = [...layers].sort(
    (a, b) => a.rank - b.rank || (declared.get(a.name) ?? 0) - (declared.get(b.name) ?? 0)
  );
  // Keep `uses` in dependency order so planned imports are stable
  const position = new Map(ordered.map((l, i) => [l.name, i]));
  for (const layer of ordered) {
    layer.uses.sort((a, b) => (position.get(a) ?? 0) - (position.get(b) ?? 0));
  }

  return new RuleModel({
    version: rules.version,
    language: rules.language,
    root,
    naming: { files: rules.naming.files, exempt: rules.naming.exempt },
    tests: {
      colocated: rules.tests.colocated,
      pattern: rules.tests.pattern ?? profile.testPattern,
    },
    chainMode: rules.chain_mode,
    unlayered: rules.unlayered,
    layers: ordered,
    forbidden,
  });
}
