/**
 * Rule loading: rule file on disk, built-in preset, or inline object.
 */
import * as path from 'node:path';
import { RulesSchema, type Rules } from './schema.js';
import { buildRuleModel, type RuleModel } from './model.js';
import { readPresetSource } from './presets.js';
import { fileExists, readFile } from '../../utils/file-system.js';
import { parseYaml, formatZodError } from '../../utils/yaml.js';
import { RuleError, SystemError, ErrorCodes } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export const DEFAULT_RULES_PATH = '.layerkit/rules.yaml';

const log = logger.child('rules');

/**
 * Validate an already-parsed rule document against the schema.
 */
export function parseRules(raw: unknown, source = 'rules'): Rules {
  const result = RulesSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new RuleError(
      ErrorCodes.INVALID_RULES,
      `Invalid rule set (${source}): ${formatZodError(result.error)}`,
      {
        source,
        issues: result.error.issues.map((i) => ({ path: i.path.map(String).join('.'), message: i.message })),
      }
    );
  }
  return result.data;
}

/**
 * Parse rule YAML and resolve it into a model.
 */
export function parseRulesYaml(content: string, source = 'rules'): RuleModel {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    if (error instanceof SystemError) {
      throw new RuleError(ErrorCodes.INVALID_RULES, `${error.message} (${source})`, { source });
    }
    throw error;
  }
  return buildRuleModel(parseRules(raw, source));
}

/**
 * Resolve an inline rule object (e.g. from tests or library callers).
 */
export function resolveRules(raw: unknown): RuleModel {
  return buildRuleModel(parseRules(raw));
}

export async function loadPreset(name: string): Promise<RuleModel> {
  const content = await readPresetSource(name);
  return parseRulesYaml(content, `preset ${name}`);
}

export interface LoadRulesOptions {
  /** Rule file path relative to the project root */
  rulesPath?: string;
  /** Preset used when the rule file does not exist */
  preset?: string | null;
}

/**
 * Load the project's rule model.
 * Falls back to the configured preset when the rule file is missing.
 */
export async function loadRules(projectRoot: string, options: LoadRulesOptions = {}): Promise<RuleModel> {
  const rulesPath = path.resolve(projectRoot, options.rulesPath ?? DEFAULT_RULES_PATH);

  if (await fileExists(rulesPath)) {
    log.debug(`Loading rules from ${rulesPath}`);
    const content = await readFile(rulesPath);
    return parseRulesYaml(content, path.relative(projectRoot, rulesPath) || rulesPath);
  }

  if (options.preset) {
    log.debug(`No rule file at ${rulesPath}, using preset '${options.preset}'`);
    return loadPreset(options.preset);
  }

  throw new SystemError(
    ErrorCodes.FILE_NOT_FOUND,
    `No rule file at ${rulesPath}. Run 'layerkit init' or set a preset in .layerkit/config.yaml`,
    { rulesPath }
  );
}
