/**
 * Engine configuration and call options.
 *
 * @module engine/types
 */

import type { Logger } from '../utils/logger.js';
import type { NamespaceMap, Variables, XPathValue } from '../runtime/types.js';
import type { CacheStats } from './cache.js';

export interface EngineConfig {
  /** Capacity of the parsed-expression cache. Default 100. */
  parseCacheSize?: number;
  /** Capacity of the compiled-query cache. Default 1000. */
  compileCacheSize?: number;
  /** Prefix bindings applied to every query unless overridden per call. */
  namespaces?: NamespaceMap;
  logger?: Logger;
}

export interface EvaluateOptions<N> {
  /** Merged over the engine's default namespaces. */
  namespaces?: NamespaceMap;
  variables?: Variables<N>;
}

/** A compiled expression bound to an engine's adapter. */
export type BoundQuery<N> = (node: N, variables?: Variables<N>) => XPathValue<N>;

export interface EngineCacheStats {
  parse: CacheStats;
  compile: CacheStats;
}
