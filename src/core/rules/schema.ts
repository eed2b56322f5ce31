/**
 * Rule file schema (`.layerkit/rules.yaml`).
 */
import { z } from 'zod';
import { CASE_STYLES } from '../naming/case.js';

/**
 * Makes an object field optional and applies the inner schema's defaults when
 * it is missing (`undefined` or `null`).
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

const LayerNameSchema = z
  .string()
  .regex(/^[a-z][a-z0-9_-]*$/, 'layer names are lowercase identifiers');

const RelativePathSchema = z
  .string()
  .min(1)
  .refine(
    (p) => !p.startsWith('/') && !p.split('/').includes('..'),
    'must be a relative path without ".." segments'
  );

export const LanguageSchema = z.enum(['typescript', 'go']);

export const SeveritySchema = z.enum(['error', 'warning']);

export const LayerScopeSchema = z.enum(['entity', 'shared']);

export const ChainModeSchema = z.enum(['adjacent', 'transitive']);

export const UnlayeredPolicySchema = z.enum(['allow', 'warn', 'deny']);

/** A forbidden construct declared inside a layer. */
export const LayerForbidSchema = z.object({
  id: z.string().min(1),
  /** JavaScript regex, matched per line (`m` flag) */
  pattern: z.string().min(1),
  why: z.string().optional(),
  severity: SeveritySchema.default('error'),
});

/** A forbidden construct declared at the top level, optionally limited to layers. */
export const ForbiddenRuleSchema = LayerForbidSchema.extend({
  layers: z.array(LayerNameSchema).optional(),
});

export const LayerSchema = z.object({
  name: LayerNameSchema,
  description: z.string().optional(),
  /** Directory relative to `root` */
  directory: RelativePathSchema,
  scope: LayerScopeSchema.default('entity'),
  /** Words prepended to every file stem in this layer (e.g. "use") */
  prefix: z.string().default(''),
  /** Words appended to every file stem in this layer (e.g. "service") */
  suffix: z.string().default(''),
  /** File extension override (e.g. ".tsx" for components) */
  extension: z.string().regex(/^\.[a-z]+$/).optional(),
  /** Fixed file stems of a shared layer */
  files: z.array(z.string().min(1)).default([]),
  /** Entity field references become imports between this layer's files */
  models: z.boolean().default(false),
  /** Whether source files in this layer need a co-located test */
  tests: z.boolean().default(true),
  can_import: z.array(LayerNameSchema).default([]),
  /** Layers planned files import; defaults to `can_import` */
  uses: z.array(LayerNameSchema).optional(),
  forbid: z.array(LayerForbidSchema).default([]),
});

export const NamingRulesSchema = z.object({
  files: z.enum(CASE_STYLES).default('kebab-case'),
  /** Stems accepted regardless of case (barrels, entry points) */
  exempt: z.array(z.string()).default(['index', 'main']),
});

export const TestRulesSchema = z.object({
  colocated: z.boolean().default(true),
  /** Test file name; `{stem}` is the subject stem, `{ext}` its extension */
  pattern: z
    .string()
    .refine((p) => p.includes('{stem}') && p.includes('{ext}'), 'must contain {stem} and {ext}')
    .optional(),
});

export const RulesSchema = z.object({
  version: z.string().default('1.0'),
  language: LanguageSchema.default('typescript'),
  /** Base directory of every layer; "." is the project root */
  root: RelativePathSchema.default('src'),
  naming: withDefaults(NamingRulesSchema),
  /** Dependency chains such as "repository -> service -> handler" */
  chain: z.union([z.string(), z.array(z.string())]).optional(),
  chain_mode: ChainModeSchema.default('adjacent'),
  unlayered: UnlayeredPolicySchema.default('warn'),
  tests: withDefaults(TestRulesSchema),
  layers: z.array(LayerSchema).min(1, 'at least one layer is required'),
  forbidden: z.array(ForbiddenRuleSchema).default([]),
});

export type Language = z.infer<typeof LanguageSchema>;
export type Severity = z.infer<typeof SeveritySchema>;
export type LayerScope = z.infer<typeof LayerScopeSchema>;
export type ChainMode = z.infer<typeof ChainModeSchema>;
export type UnlayeredPolicy = z.infer<typeof UnlayeredPolicySchema>;
export type LayerForbid = z.infer<typeof LayerForbidSchema>;
export type ForbiddenRule = z.infer<typeof ForbiddenRuleSchema>;
export type LayerRule = z.infer<typeof LayerSchema>;
export type NamingRules = z.infer<typeof NamingRulesSchema>;
export type Rules = z.infer<typeof RulesSchema>;
/** Rule file as written, before defaults are applied. */
export type RulesInput = z.input<typeof RulesSchema>;
