/**
 * YAML parsing utilities.
 */
import { parse } from 'yaml';
import type { z } from 'zod';
import { SystemError, ErrorCodes } from './errors.js';
import { readFile } from './file-system.js';

/**
 * Parse YAML content into an untyped value.
 */
export function parseYaml(content: string): unknown {
  try {
    return parse(content);
  } catch (error) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `Failed to parse YAML: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
}

/**
 * Parse and validate YAML content with a Zod schema.
 */
export function parseYamlWithSchema<T extends z.ZodType>(
  content: string,
  schema: T
): z.infer<T> {
  const parsed = parseYaml(content);
  const result = schema.safeParse(parsed ?? {});

  if (!result.success) {
    throw new SystemError(
      ErrorCodes.PARSE_ERROR,
      `YAML validation failed: ${formatZodError(result.error)}`,
      { issues: result.error.issues.map((i) => ({ path: i.path.map(String).join('.'), message: i.message })) }
    );
  }

  return result.data;
}

/**
 * Load and validate a YAML file with a Zod schema.
 * Errors are rethrown with the file path attached.
 */
export async function loadYamlWithSchema<T extends z.ZodType>(
  filePath: string,
  schema: T
): Promise<z.infer<T>> {
  let content: string;
  try {
    content = await readFile(filePath);
  } catch {
    throw new SystemError(ErrorCodes.FILE_NOT_FOUND, `Failed to read YAML file: ${filePath}`, { filePath });
  }

  try {
    return parseYamlWithSchema(content, schema);
  } catch (error) {
    if (error instanceof SystemError) {
      throw new SystemError(error.code, `${error.message} (file: ${filePath})`, { ...error.details, filePath });
    }
    throw error;
  }
}

/**
 * Format Zod issues into a single readable line.
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const issuePath = issue.path.map(String).join('.');
      return issuePath ? `${issuePath}: ${issue.message}` : issue.message;
    })
    .join('; ');
}
