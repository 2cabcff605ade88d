/**
 * treequery: XPath 1.0 expressions compiled to JavaScript and evaluated
 * over any tree through a `NodeAdapter`.
 *
 * @example
 * ```typescript
 * import { XPathEngine, parseXml, xmlAdapter } from 'treequery-xpath';
 *
 * const document = parseXml('<library><book lang="en">Dune</book></library>');
 * const engine = new XPathEngine(xmlAdapter);
 * engine.evaluate('string(//book[@lang="en"])', document); // 'Dune'
 * ```
 *
 * @module treequery-xpath
 */

export { XPathEngine, evaluate, LruCache, DEFAULT_PARSE_CACHE_SIZE, DEFAULT_COMPILE_CACHE_SIZE } from './engine/index.js';
export type { CacheStats, EngineConfig, EvaluateOptions, BoundQuery, EngineCacheStats } from './engine/index.js';

export {
  XPathError,
  XPathSyntaxError,
  EvaluationError,
  GeneratorError,
  FunctionError,
  NodeTypeError,
  XPathErrorCode,
  isXPathError,
} from './errors.js';
export type {
  XPathErrorOptions,
  SyntaxErrorOptions,
  EvaluationErrorOptions,
  FunctionErrorOptions,
  NodeTypeErrorOptions,
} from './errors.js';

export { parse, tokenize, formatAst, astKey } from './compiler/index.js';
export type { QueryAst, Token, AxisName } from './compiler/index.js';

export { QueryCompiler, CompiledQuery } from './codegen/index.js';
export type { QueryCompilerOptions } from './codegen/index.js';

export {
  NodeSet,
  isNodeSet,
  QueryRuntime,
  toXPathString,
  toXPathNumber,
  toXPathBoolean,
  formatNumber,
  functionNames,
} from './runtime/index.js';
export type {
  NodeAdapter,
  NodeKind,
  XPathValue,
  VariableValue,
  Variables,
  NamespaceMap,
} from './runtime/index.js';

export {
  doc,
  el,
  text,
  cdata,
  comment,
  pi,
  parseXml,
  XmlParseError,
  xmlAdapter,
  stringValue,
  qualifiedName,
} from './dom/index.js';
export type { XmlNode, XmlDocument, XmlElement, XmlAttribute } from './dom/index.js';

export { loadConfig, resolveConfig, validateConfig, toEngineConfig, DEFAULT_CONFIG } from './config/index.js';
export type { TreequeryConfig, ConfigIssue, LoadedConfig } from './config/index.js';

export { createLogger, silentLogger } from './utils/logger.js';
export type { Logger, LogLevel, LogContext } from './utils/logger.js';
