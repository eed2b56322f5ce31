export { ConfigSchema, OutputFormatSchema } from './schema.js';
export type { Config, OutputFormat, ExitCodes } from './schema.js';
export { loadConfig, getDefaultConfig, getConfigPath, DEFAULT_CONFIG_PATH } from './loader.js';
