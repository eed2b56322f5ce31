/**
 * Markdown / plain-text feature lists.
 *
 * ```markdown
 * # Features
 * - User: crud
 *   - fields: name:string, email:string
 * - Order (customer orders): create, list, cancel
 *   - fields: owner:User, total:number
 * ```
 *
 * Top-level bullets declare entities, nested bullets add fields, operations or
 * a description. Headings and prose lines are ignored.
 */
import { ErrorCodes } from '../../utils/errors.js';
import type { FeatureIssue, RawFeature, RawField } from './types.js';

const BULLET = /^(\s*)(?:[-*+]|\d+[.)])\s+(.*)$/;
const ENTITY_LINE = /^([^:()]+?)\s*(?:\(([^)]*)\))?\s*(?::\s*(.*))?$/;
const DETAIL_LINE = /^(fields?|operations?|ops|description)\s*:\s*(.*)$/i;

/**
 * Split a comma or semicolon separated list, dropping blanks.
 */
export function splitList(value: string): string[] {
  return value
    .split(/[,;]/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Parse `name:type`; a bare name is a string field.
 */
export function parseFieldSpec(spec: string, line?: number): RawField {
  const separator = spec.indexOf(':');
  if (separator === -1) {
    return { name: spec.trim(), type: 'string', line };
  }
  return {
    name: spec.slice(0, separator).trim(),
    type: spec.slice(separator + 1).trim() || 'string',
    line,
  };
}

export interface MarkdownParseResult {
  features: RawFeature[];
  issues: FeatureIssue[];
}

export function parseMarkdownFeatures(content: string): MarkdownParseResult {
  const features: RawFeature[] = [];
  const issues: FeatureIssue[] = [];
  let current: RawFeature | null = null;

  const lines = content.split(/\r?\n/);
  lines.forEach((rawLine, index) => {
    const lineNumber = index + 1;
    const bullet = BULLET.exec(rawLine.replace(/\t/g, '    '));
    if (!bullet) return;

    const indent = bullet[1].length;
    const text = bullet[2].trim();

    if (indent < 2) {
      const entity = ENTITY_LINE.exec(text.replace(/[*`]/g, ''));
      if (!entity) {
        current = null;
        issues.push({
          code: ErrorCodes.INVALID_DESCRIPTOR,
          message: `Cannot read feature line "${text}"; expected "Entity (description): operations"`,
          line: lineNumber,
        });
        return;
      }
      current = {
        entity: entity[1].trim(),
        description: entity[2]?.trim() || undefined,
        operations: entity[3] ? splitList(entity[3]) : [],
        fields: [],
        line: lineNumber,
      };
      features.push(current);
      return;
    }

    if (!current) {
      issues.push({
        code: ErrorCodes.INVALID_DESCRIPTOR,
        message: `Nested line "${text}" appears before any feature`,
        line: lineNumber,
      });
      return;
    }

    const detail = DETAIL_LINE.exec(text);
    if (!detail) {
      issues.push({
        code: ErrorCodes.INVALID_DESCRIPTOR,
        message: `Unrecognized detail "${text}"; expected fields:, operations: or description:`,
        line: lineNumber,
        entity: current.entity,
      });
      return;
    }

    const key = detail[1].toLowerCase();
    const value = detail[2];
    if (key.startsWith('field')) {
      current.fields.push(...splitList(value).map((spec) => parseFieldSpec(spec, lineNumber)));
    } else if (key === 'description') {
      current.description = value.trim() || current.description;
    } else {
      current.operations.push(...splitList(value));
    }
  });

  return { features, issues };
}
