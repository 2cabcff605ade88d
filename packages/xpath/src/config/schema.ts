// packages/xpath/src/config/schema.ts
// treequery.config.yaml schema and validation

import { DEFAULT_COMPILE_CACHE_SIZE, DEFAULT_PARSE_CACHE_SIZE } from '../engine/cache.js';
import type { EngineConfig } from '../engine/types.js';
import { isLogLevel, LOG_LEVELS } from '../utils/logger.js';
import type { LogLevel, Logger } from '../utils/logger.js';

export interface TreequeryConfig {
  version: 1;
  cache?: CacheSettings;
  namespaces?: Record<string, string>;
  logging?: LoggingSettings;
}

export interface CacheSettings {
  parse_size?: number;
  compile_size?: number;
}

export interface LoggingSettings {
  level?: LogLevel;
}

export interface ConfigIssue {
  /** Dotted path of the offending field, '' for the document itself. */
  field: string;
  message: string;
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: TreequeryConfig = {
  version: 1,
  cache: {
    parse_size: DEFAULT_PARSE_CACHE_SIZE,
    compile_size: DEFAULT_COMPILE_CACHE_SIZE,
  },
  namespaces: {},
  logging: { level: 'info' },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkSize(issues: ConfigIssue[], field: string, value: unknown): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    issues.push({ field, message: 'must be a positive integer' });
    return undefined;
  }
  return value;
}

/**
 * Validate a parsed config document. Returns the config when it is valid,
 * along with every problem found.
 */
export function validateConfig(value: unknown): { config: TreequeryConfig | null; issues: ConfigIssue[] } {
  const issues: ConfigIssue[] = [];

  if (!isRecord(value)) {
    return { config: null, issues: [{ field: '', message: 'must be a mapping' }] };
  }

  if (value.version !== 1) {
    issues.push({ field: 'version', message: 'must be 1' });
  }

  const config: TreequeryConfig = { version: 1 };

  if (value.cache !== undefined) {
    if (isRecord(value.cache)) {
      config.cache = {
        parse_size: checkSize(issues, 'cache.parse_size', value.cache.parse_size),
        compile_size: checkSize(issues, 'cache.compile_size', value.cache.compile_size),
      };
    } else {
      issues.push({ field: 'cache', message: 'must be a mapping' });
    }
  }

  if (value.namespaces !== undefined) {
    if (isRecord(value.namespaces)) {
      const namespaces: Record<string, string> = {};
      for (const [prefix, uri] of Object.entries(value.namespaces)) {
        if (typeof uri === 'string' && uri !== '') {
          namespaces[prefix] = uri;
        } else {
          issues.push({ field: `namespaces.${prefix}`, message: 'must be a non-empty string' });
        }
      }
      config.namespaces = namespaces;
    } else {
      issues.push({ field: 'namespaces', message: 'must be a mapping of prefix to URI' });
    }
  }

  if (value.logging !== undefined) {
    if (isRecord(value.logging)) {
      const { level } = value.logging;
      if (level === undefined || isLogLevel(level)) {
        config.logging = { level };
      } else {
        issues.push({ field: 'logging.level', message: `must be one of ${LOG_LEVELS.join(', ')}` });
      }
    } else {
      issues.push({ field: 'logging', message: 'must be a mapping' });
    }
  }

  return { config: issues.length === 0 ? config : null, issues };
}

/**
 * Engine settings for a config file
 */
export function toEngineConfig(config: TreequeryConfig, logger?: Logger): EngineConfig {
  return {
    parseCacheSize: config.cache?.parse_size ?? DEFAULT_PARSE_CACHE_SIZE,
    compileCacheSize: config.cache?.compile_size ?? DEFAULT_COMPILE_CACHE_SIZE,
    namespaces: { ...config.namespaces },
    logger,
  };
}
