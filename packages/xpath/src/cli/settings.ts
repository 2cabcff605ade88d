import { resolve } from 'node:path';
import { loadConfig, resolveConfig } from '../config/loader.js';
import { DEFAULT_CONFIG } from '../config/schema.js';
import type { TreequeryConfig } from '../config/schema.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export interface SettingsOptions {
  /** Explicit config file; otherwise the working directory is searched. */
  config?: string;
  verbose?: boolean;
  cwd?: string;
}

export interface Settings {
  config: TreequeryConfig;
  logger: Logger;
}

/**
 * Resolve the config for a command. An unreadable or invalid file is
 * reported through the logger and the defaults are used instead.
 */
export function loadSettings(options: SettingsOptions = {}): Settings {
  const cwd = options.cwd ?? process.cwd();
  const loaded = options.config ? loadConfig(resolve(cwd, options.config)) : resolveConfig(cwd);

  const level = options.verbose ? 'debug' : loaded.config?.logging?.level ?? 'info';
  const logger = createLogger(level);

  for (const issue of loaded.issues) {
    const field = issue.field === '' ? 'config' : issue.field;
    logger.warn(`Ignoring config file: ${field} ${issue.message}`, { path: loaded.path });
  }
  if (loaded.path !== null && loaded.config !== null) {
    logger.debug('Loaded config', { path: loaded.path });
  }

  return { config: loaded.config ?? DEFAULT_CONFIG, logger };
}
