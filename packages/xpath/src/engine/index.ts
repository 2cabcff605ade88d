/**
 * @module engine
 */

export { XPathEngine, evaluate } from './engine.js';
export { LruCache, DEFAULT_PARSE_CACHE_SIZE, DEFAULT_COMPILE_CACHE_SIZE } from './cache.js';
export type { CacheStats } from './cache.js';
export type { EngineConfig, EvaluateOptions, BoundQuery, EngineCacheStats } from './types.js';
