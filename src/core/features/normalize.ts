/**
 * Feature normalization: canonical entity names, operation aliases, field
 * types and references, merging of repeated entities.
 */
import { convertCase, splitWords, toCase } from '../naming/case.js';
import { ErrorCodes, FeatureError } from '../../utils/errors.js';
import {
  CRUD_OPERATIONS,
  FIELD_TYPES,
  type Entity,
  type FeatureIssue,
  type FeatureSet,
  type Field,
  type Operation,
  type RawFeature,
} from './types.js';

const CRUD_NAMES: ReadonlySet<string> = new Set(CRUD_OPERATIONS);
const SCALAR_TYPES: ReadonlySet<string> = new Set(FIELD_TYPES);

const OPERATION_ALIASES: Record<string, string> = {
  create: 'create',
  add: 'create',
  new: 'create',
  get: 'get',
  read: 'get',
  fetch: 'get',
  show: 'get',
  list: 'list',
  index: 'list',
  all: 'list',
  update: 'update',
  edit: 'update',
  modify: 'update',
  delete: 'delete',
  remove: 'delete',
  destroy: 'delete',
};

const FIELD_TYPE_ALIASES: Record<string, string> = {
  str: 'string',
  int: 'integer',
  bool: 'boolean',
  timestamp: 'datetime',
  double: 'float',
};

const ENTITY_NAME = /^[A-Za-z][A-Za-z0-9 _-]*$/;
const IDENTIFIER = /^[A-Za-z][A-Za-z0-9 _-]*$/;

export interface NormalizeOptions {
  /** Operations of entities that list none (default: crud) */
  defaultOperations?: string[];
}

/**
 * Expand one operation token to canonical names.
 * `crud` expands to all five CRUD operations; unknown verbs become camelCase
 * custom operations. Returns null for tokens that are not identifiers.
 */
export function normalizeOperation(token: string): string[] | null {
  const trimmed = token.trim();
  if (!IDENTIFIER.test(trimmed)) return null;

  const lower = trimmed.toLowerCase();
  if (lower === 'crud') return [...CRUD_OPERATIONS];
  const alias = OPERATION_ALIASES[lower];
  if (alias) return [alias];
  return [convertCase(trimmed, 'camelCase')];
}

/**
 * CRUD operations in canonical order, then custom ones in first-seen order.
 */
function orderOperations(names: string[]): Operation[] {
  const unique = [...new Set(names)];
  const crud: Operation[] = CRUD_OPERATIONS.filter((op) => unique.includes(op)).map((name) => ({
    name,
    kind: 'crud' as const,
  }));
  const custom: Operation[] = unique
    .filter((name) => !CRUD_NAMES.has(name))
    .map((name) => ({ name, kind: 'custom' as const }));
  return [...crud, ...custom];
}

interface EntityDraft {
  name: string;
  words: string[];
  description?: string;
  operations: string[];
  hasOperations: boolean;
  fields: Map<string, { type: string; line?: number }>;
  line?: number;
}

/**
 * Normalize raw features into a FeatureSet.
 *
 * @throws FeatureError listing every issue found (plus `extraIssues` from the
 * format-specific parser)
 */
export function normalizeFeatures(
  raw: RawFeature[],
  options: NormalizeOptions = {},
  extraIssues: FeatureIssue[] = []
): FeatureSet {
  const issues: FeatureIssue[] = [...extraIssues];
  const defaults = options.defaultOperations ?? ['crud'];

  if (raw.length === 0 && issues.length === 0) {
    throw new FeatureError(ErrorCodes.EMPTY_DESCRIPTOR, 'Feature descriptor declares no entities');
  }

  const drafts = new Map<string, EntityDraft>();
  for (const feature of raw) {
    const rawName = feature.entity.trim();
    if (!ENTITY_NAME.test(rawName)) {
      issues.push({
        code: ErrorCodes.INVALID_ENTITY_NAME,
        message: `Invalid entity name "${rawName}": must start with a letter and contain only letters, digits, spaces, _ or -`,
        line: feature.line,
      });
      continue;
    }

    const words = splitWords(rawName);
    const name = toCase(words, 'PascalCase');
    let draft = drafts.get(name);
    if (!draft) {
      draft = { name, words, operations: [], hasOperations: false, fields: new Map(), line: feature.line };
      drafts.set(name, draft);
    }
    draft.description = draft.description ?? feature.description;

    for (const token of feature.operations) {
      const expanded = normalizeOperation(token);
      if (!expanded) {
        issues.push({
          code: ErrorCodes.INVALID_DESCRIPTOR,
          message: `Invalid operation "${token}" on ${name}`,
          line: feature.line,
          entity: name,
        });
        continue;
      }
      draft.operations.push(...expanded);
      draft.hasOperations = true;
    }

    for (const field of feature.fields) {
      if (!IDENTIFIER.test(field.name)) {
        issues.push({
          code: ErrorCodes.INVALID_DESCRIPTOR,
          message: `Invalid field name "${field.name}" on ${name}`,
          line: field.line ?? feature.line,
          entity: name,
        });
        continue;
      }
      const fieldName = convertCase(field.name, 'camelCase');
      const existing = draft.fields.get(fieldName);
      const type = field.type.trim();
      if (existing && normalizeTypeKey(existing.type) !== normalizeTypeKey(type)) {
        issues.push({
          code: ErrorCodes.FIELD_TYPE_CONFLICT,
          message: `Field ${name}.${fieldName} is declared as both ${existing.type} and ${type}`,
          line: field.line ?? feature.line,
          entity: name,
        });
        continue;
      }
      if (!existing) {
        draft.fields.set(fieldName, { type, line: field.line ?? feature.line });
      }
    }
  }

  const entities: Entity[] = [];
  for (const draft of drafts.values()) {
    const fields: Field[] = [];
    for (const [fieldName, { type, line }] of draft.fields) {
      const resolved = resolveFieldType(type, drafts);
      if (!resolved) {
        issues.push({
          code: ErrorCodes.UNKNOWN_FIELD_TYPE,
          message: `Field ${draft.name}.${fieldName} has unknown type "${type}" (expected one of ${FIELD_TYPES.join(', ')} or an entity name)`,
          line,
          entity: draft.name,
        });
        continue;
      }
      fields.push({ name: fieldName, ...resolved });
    }

    const operations = draft.hasOperations
      ? draft.operations
      : defaults.flatMap((token) => normalizeOperation(token) ?? []);

    entities.push({
      name: draft.name,
      words: draft.words,
      description: draft.description,
      fields,
      operations: orderOperations(operations),
    });
  }

  if (issues.length > 0) {
    const first = issues[0];
    const lines = issues.map((i) => (i.line ? `line ${i.line}: ${i.message}` : i.message));
    throw new FeatureError(
      first.code,
      `Feature descriptor has ${issues.length} issue(s):\n  ${lines.join('\n  ')}`,
      { issues }
    );
  }

  entities.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  return { entities };
}

function normalizeTypeKey(type: string): string {
  const lower = type.trim().toLowerCase();
  return FIELD_TYPE_ALIASES[lower] ?? lower.replace(/[\s_-]/g, '');
}

function resolveFieldType(
  type: string,
  drafts: Map<string, EntityDraft>
): { type: string; reference?: string } | null {
  const key = normalizeTypeKey(type);
  if (SCALAR_TYPES.has(key)) {
    return { type: key };
  }
  if (!ENTITY_NAME.test(type.trim())) return null;
  const entityName = convertCase(type, 'PascalCase');
  if (drafts.has(entityName)) {
    return { type: entityName, reference: entityName };
  }
  return null;
}
