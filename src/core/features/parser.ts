/**
 * Feature descriptor parsing: Markdown lists, YAML or JSON documents.
 */
import * as path from 'node:path';
import { parseMarkdownFeatures, parseFieldSpec } from './markdown.js';
import { normalizeFeatures, type NormalizeOptions } from './normalize.js';
import { FeatureDescriptorSchema, type FeatureEntry } from './schema.js';
import type { FeatureSet, RawFeature } from './types.js';
import { fileExists, readFile } from '../../utils/file-system.js';
import { parseYaml, formatZodError } from '../../utils/yaml.js';
import { ErrorCodes, FeatureError, SystemError } from '../../utils/errors.js';

export type DescriptorFormat = 'markdown' | 'yaml' | 'json';

/**
 * Pick the descriptor format from a file extension (YAML when unknown).
 */
export function detectFormat(filePath: string): DescriptorFormat {
  switch (path.extname(filePath).toLowerCase()) {
    case '.md':
    case '.markdown':
    case '.txt':
      return 'markdown';
    case '.json':
      return 'json';
    default:
      return 'yaml';
  }
}

function entryToRaw(entry: FeatureEntry): RawFeature {
  const operations =
    entry.operations === undefined
      ? []
      : typeof entry.operations === 'string'
        ? entry.operations.split(/[,;]/).map((o) => o.trim()).filter((o) => o.length > 0)
        : entry.operations;

  const fields =
    entry.fields === undefined
      ? []
      : Array.isArray(entry.fields)
        ? entry.fields.map((spec) => parseFieldSpec(spec))
        : Object.entries(entry.fields).map(([name, type]) => ({ name, type }));

  return { entity: entry.entity, description: entry.description, operations, fields };
}

function parseStructured(content: string, format: 'yaml' | 'json'): RawFeature[] {
  let raw: unknown;
  try {
    raw = format === 'json' ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : 'Unknown error';
    throw new FeatureError(ErrorCodes.INVALID_DESCRIPTOR, `Cannot parse ${format} descriptor: ${reason}`);
  }

  if (raw === null || raw === undefined) {
    return [];
  }

  const result = FeatureDescriptorSchema.safeParse(raw);
  if (!result.success) {
    throw new FeatureError(
      ErrorCodes.INVALID_DESCRIPTOR,
      `Invalid feature descriptor: ${formatZodError(result.error)}`,
      { issues: result.error.issues.map((i) => ({ path: i.path.map(String).join('.'), message: i.message })) }
    );
  }

  const entries = Array.isArray(result.data) ? result.data : result.data.features;
  return entries.map(entryToRaw);
}

/**
 * Parse descriptor text into a normalized FeatureSet.
 *
 * @throws FeatureError with every issue found
 */
export function parseFeatureDescriptor(
  content: string,
  format: DescriptorFormat,
  options: NormalizeOptions = {}
): FeatureSet {
  if (format === 'markdown') {
    const { features, issues } = parseMarkdownFeatures(content);
    return normalizeFeatures(features, options, issues);
  }
  return normalizeFeatures(parseStructured(content, format), options);
}

/**
 * Read and parse a descriptor file; the format follows the extension.
 */
export async function loadFeatureDescriptor(
  filePath: string,
  options: NormalizeOptions = {}
): Promise<FeatureSet> {
  if (!(await fileExists(filePath))) {
    throw new SystemError(ErrorCodes.FILE_NOT_FOUND, `Feature descriptor not found: ${filePath}`, { filePath });
  }
  const content = await readFile(filePath);
  return parseFeatureDescriptor(content, detectFormat(filePath), options);
}
