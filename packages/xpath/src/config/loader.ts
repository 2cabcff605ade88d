// packages/xpath/src/config/loader.ts
// Find and load treequery configuration files

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { DEFAULT_CONFIG, validateConfig } from './schema.js';
import type { ConfigIssue, TreequeryConfig } from './schema.js';

export const CONFIG_FILES = [
  'treequery.config.yaml',
  '.treequery.yaml',
  '.treequery.yml',
  '.treequery.json',
] as const;

export interface LoadedConfig {
  /** The validated config, or null when the file is unreadable or invalid. */
  config: TreequeryConfig | null;
  issues: ConfigIssue[];
  /** null when no file was found and the defaults apply. */
  path: string | null;
}

/**
 * Find a config file in `dir`, first match wins
 */
export function findConfigFile(dir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILES) {
    const path = join(dir, name);
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

/**
 * Load and validate a config file. JSON files are read as JSON, anything
 * else as YAML. Problems are returned as issues rather than thrown.
 */
export function loadConfig(path: string): LoadedConfig {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    return { config: null, issues: [{ field: '', message: `cannot read file: ${errorMessage(err)}` }], path };
  }

  let document: unknown;
  try {
    document = path.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    return { config: null, issues: [{ field: '', message: `cannot parse file: ${errorMessage(err)}` }], path };
  }

  return { ...validateConfig(document), path };
}

/**
 * Config from the first config file in `dir`, or the defaults when there is none
 */
export function resolveConfig(dir: string = process.cwd()): LoadedConfig {
  const path = findConfigFile(dir);
  if (path === null) {
    return { config: DEFAULT_CONFIG, issues: [], path: null };
  }
  return loadConfig(path);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
