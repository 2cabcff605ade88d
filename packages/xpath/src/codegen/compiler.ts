/**
 * Query compiler: query AST → JavaScript source → loaded function.
 *
 * @module codegen/compiler
 */

import { EvaluationError, isXPathError } from '../errors.js';
import { astKey, formatAst } from '../compiler/ast.js';
import type { QueryAst } from '../compiler/ast.js';
import { DEFAULT_COMPILE_CACHE_SIZE, LruCache } from '../engine/cache.js';
import { QueryRuntime } from '../runtime/runtime.js';
import type { NamespaceMap, NodeAdapter, Variables, XPathValue } from '../runtime/types.js';
import { silentLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';
import { EvaluationContext } from './context.js';
import type { QueryFunction } from './context.js';
import { render } from './generator.js';
import { lowerQuery } from './lowering.js';

/**
 * A loaded query. Immutable and reentrant: every `run` gets a fresh
 * runtime, so nothing is shared between invocations.
 */
export class CompiledQuery {
  constructor(
    readonly ast: QueryAst,
    readonly source: string,
    private readonly query: QueryFunction,
  ) {}

  run<N>(node: N, adapter: NodeAdapter<N>, variables: Variables<N> = {}): XPathValue<N> {
    const expression = formatAst(this.ast);
    const rt = new QueryRuntime(adapter, variables, expression);
    try {
      return this.query(rt, node);
    } catch (err) {
      if (isXPathError(err)) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new EvaluationError(`Query failed: ${reason}`, { expression, cause: err });
    }
  }
}

export interface QueryCompilerOptions {
  /** Capacity of the compile cache. */
  cacheSize?: number;
  logger?: Logger;
}

/**
 * Canonical cache key for an AST compiled under `namespaces`.
 */
export function compileKey(ast: QueryAst, namespaces: NamespaceMap = {}): string {
  const entries = Object.entries(namespaces).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return `${astKey(ast)}\u0000${JSON.stringify(entries)}`;
}

export class QueryCompiler {
  readonly context = new EvaluationContext();
  readonly cache: LruCache<string, CompiledQuery>;
  private readonly logger: Logger;

  constructor(options: QueryCompilerOptions = {}) {
    this.cache = new LruCache(options.cacheSize ?? DEFAULT_COMPILE_CACHE_SIZE);
    this.logger = options.logger ?? silentLogger;
  }

  /** Lower and render without loading. */
  generate(ast: QueryAst, namespaces: NamespaceMap = {}): string {
    return render(lowerQuery(ast, namespaces));
  }

  compile(ast: QueryAst, namespaces: NamespaceMap = {}): CompiledQuery {
    let source: string;
    let query: QueryFunction;
    try {
      source = this.generate(ast, namespaces);
      query = this.context.load(source);
    } catch (err) {
      // hand-built ASTs skip the parser's depth limit
      if (err instanceof RangeError) {
        throw new EvaluationError('Expression is too deeply nested to compile', { cause: err });
      }
      throw err;
    }
    this.logger.debug('Compiled query', { kind: ast.kind, sourceLength: source.length });
    return new CompiledQuery(ast, source, query);
  }

  /** Like `compile`, memoized by AST structure and namespace map. */
  compileWithCache(ast: QueryAst, namespaces: NamespaceMap = {}): CompiledQuery {
    return this.cache.getOrSet(compileKey(ast, namespaces), () => {
      this.logger.debug('Compile cache miss', { expression: formatAst(ast) });
      return this.compile(ast, namespaces);
    });
  }
}
