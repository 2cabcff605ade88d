/**
 * Engine facade: parse, compile and run XPath expressions against any tree
 * reachable through a `NodeAdapter`.
 *
 * Each engine owns its parse and compile caches. An engine is not meant to
 * be shared across owners that need isolated caches; create one per owner.
 *
 * @module engine/engine
 */

import { EvaluationError, XPathSyntaxError } from '../errors.js';
import { parseWithCache } from '../compiler/index.js';
import type { QueryAst } from '../compiler/ast.js';
import { QueryCompiler } from '../codegen/compiler.js';
import type { CompiledQuery } from '../codegen/compiler.js';
import { xmlAdapter } from '../dom/adapter.js';
import type { XmlNode } from '../dom/types.js';
import { NodeSet } from '../runtime/node-set.js';
import type { NamespaceMap, NodeAdapter, XPathValue } from '../runtime/types.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { DEFAULT_PARSE_CACHE_SIZE, LruCache } from './cache.js';
import type { BoundQuery, EngineCacheStats, EngineConfig, EvaluateOptions } from './types.js';

export class XPathEngine<N> {
  private readonly parseCache: LruCache<string, QueryAst>;
  private readonly compiler: QueryCompiler;
  private readonly namespaces: NamespaceMap;
  private readonly logger: Logger;

  constructor(
    readonly adapter: NodeAdapter<N>,
    config: EngineConfig = {},
  ) {
    this.logger = config.logger ?? silentLogger;
    this.namespaces = config.namespaces ?? {};
    this.parseCache = new LruCache(config.parseCacheSize ?? DEFAULT_PARSE_CACHE_SIZE);
    this.compiler = new QueryCompiler({ cacheSize: config.compileCacheSize, logger: this.logger });
  }

  /**
   * Evaluate `expression` with `node` as the context node.
   *
   * @throws XPathSyntaxError when the expression does not parse
   * @throws EvaluationError, FunctionError or NodeTypeError when it cannot run
   */
  evaluate(expression: string, node: N, options: EvaluateOptions<N> = {}): XPathValue<N> {
    const query = this.compiled(expression, options.namespaces);
    return query.run(node, this.adapter, options.variables);
  }

  /** Evaluate an expression that must select nodes; returns them in document order. */
  select(expression: string, node: N, options: EvaluateOptions<N> = {}): N[] {
    const result = this.evaluate(expression, node, options);
    if (!(result instanceof NodeSet)) {
      throw new EvaluationError(`Expression returned a ${typeof result}, not a node-set`, { expression });
    }
    return result.toArray();
  }

  /** Compile once and return a callable bound to this engine's adapter. */
  compile(expression: string, namespaces?: NamespaceMap): BoundQuery<N> {
    const query = this.compiled(expression, namespaces);
    return (node, variables) => query.run(node, this.adapter, variables);
  }

  parse(expression: string): QueryAst {
    if (!this.parseCache.has(expression)) {
      this.logger.debug('Parse cache miss', { expression });
    }
    return parseWithCache(expression, this.parseCache);
  }

  /** True when the expression parses. Does not check function names or arity. */
  isValid(expression: string): boolean {
    try {
      this.parse(expression);
      return true;
    } catch (err) {
      if (err instanceof XPathSyntaxError) return false;
      throw err;
    }
  }

  /** Generated JavaScript for an expression, for inspection. */
  source(expression: string, namespaces?: NamespaceMap): string {
    return this.compiled(expression, namespaces).source;
  }

  clearCache(): void {
    this.parseCache.clear();
    this.compiler.cache.clear();
  }

  get cacheStats(): EngineCacheStats {
    return { parse: this.parseCache.stats, compile: this.compiler.cache.stats };
  }

  private compiled(expression: string, namespaces?: NamespaceMap): CompiledQuery {
    const ast = this.parse(expression);
    const merged = namespaces ? { ...this.namespaces, ...namespaces } : this.namespaces;
    return this.compiler.compileWithCache(ast, merged);
  }
}

let defaultEngine: XPathEngine<XmlNode> | undefined;

/**
 * Evaluate against the built-in XML document model, through a shared
 * default engine.
 */
export function evaluate(
  expression: string,
  node: XmlNode,
  options: EvaluateOptions<XmlNode> = {},
): XPathValue<XmlNode> {
  defaultEngine ??= new XPathEngine(xmlAdapter);
  return defaultEngine.evaluate(expression, node, options);
}
