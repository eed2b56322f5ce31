export * from './schema.js';
export * from './types.js';
export { parseChain, resolveChainName, expandChain } from './chain.js';
export { LANGUAGE_PROFILES, type LanguageProfile } from './languages.js';
export { RuleModel, buildRuleModel } from './model.js';
export { DEFAULT_PRESET, listPresets, readPresetSource } from './presets.js';
export {
  DEFAULT_RULES_PATH,
  parseRules,
  parseRulesYaml,
  resolveRules,
  loadPreset,
  loadRules,
  type LoadRulesOptions,
} from './loader.js';
