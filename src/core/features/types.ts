/**
 * Normalized feature model produced by the descriptor parser.
 */

export const CRUD_OPERATIONS = ['create', 'get', 'list', 'update', 'delete'] as const;

export type CrudOperation = (typeof CRUD_OPERATIONS)[number];

export const FIELD_TYPES = [
  'string',
  'text',
  'number',
  'integer',
  'float',
  'boolean',
  'date',
  'datetime',
  'uuid',
  'json',
] as const;

export type PrimitiveFieldType = (typeof FIELD_TYPES)[number];

export interface Operation {
  /** Canonical CRUD name or camelCase custom verb */
  name: string;
  kind: 'crud' | 'custom';
}

export interface Field {
  /** camelCase field name */
  name: string;
  /** Primitive type, or the referenced entity name */
  type: string;
  /** Set when the type names another entity */
  reference?: string;
}

export interface Entity {
  /** PascalCase name */
  name: string;
  /** Lowercase words of the name, used to build file stems */
  words: string[];
  description?: string;
  fields: Field[];
  operations: Operation[];
}

export interface FeatureSet {
  /** Entities sorted by name */
  entities: Entity[];
}

/**
 * A feature as read from the descriptor, before normalization.
 */
export interface RawFeature {
  entity: string;
  description?: string;
  operations: string[];
  fields: RawField[];
  /** 1-based source line (Markdown descriptors) */
  line?: number;
}

export interface RawField {
  name: string;
  type: string;
  line?: number;
}

/**
 * A problem found while parsing or normalizing a descriptor.
 */
export interface FeatureIssue {
  code: string;
  message: string;
  line?: number;
  entity?: string;
}
