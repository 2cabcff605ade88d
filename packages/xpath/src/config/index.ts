// packages/xpath/src/config/index.ts

export { DEFAULT_CONFIG, validateConfig, toEngineConfig } from './schema.js';
export type { TreequeryConfig, CacheSettings, LoggingSettings, ConfigIssue } from './schema.js';
export { CONFIG_FILES, findConfigFile, loadConfig, resolveConfig } from './loader.js';
export type { LoadedConfig } from './loader.js';
