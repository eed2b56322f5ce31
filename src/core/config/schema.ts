/**
 * Project configuration schema (`.layerkit/config.yaml`).
 */
import { z } from 'zod';

function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const OutputFormatSchema = z.enum(['human', 'json', 'compact']);

/** File scanning configuration. */
export const FilesConfigSchema = z.object({
  exclude: z.array(z.string()).default(['**/node_modules/**', '**/dist/**', '**/vendor/**']),
});

/** Feature descriptor defaults. */
export const FeaturesConfigSchema = z.object({
  default_operations: z.array(z.string()).min(1).default(['crud']),
});

/** Exit codes configuration. */
export const ExitCodesSchema = z.object({
  success: z.number().int().default(0),
  error: z.number().int().default(1),
  warning_only: z.number().int().default(0),
});

export const ValidationConfigSchema = z.object({
  fail_on_warning: z.boolean().default(false),
  exit_codes: withDefaults(ExitCodesSchema),
});

export const OutputConfigSchema = z.object({
  format: OutputFormatSchema.default('human'),
  colors: z.boolean().default(true),
});

export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  /** Rule file path, relative to the project root */
  rules: z.string().default('.layerkit/rules.yaml'),
  /** Preset used when the rule file does not exist */
  preset: z.string().nullable().default(null),
  files: withDefaults(FilesConfigSchema),
  features: withDefaults(FeaturesConfigSchema),
  validation: withDefaults(ValidationConfigSchema),
  output: withDefaults(OutputConfigSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type ExitCodes = z.infer<typeof ExitCodesSchema>;
