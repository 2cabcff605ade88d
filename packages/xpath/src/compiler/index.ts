/**
 * XPath front end: tokenizer, parser and query AST.
 *
 * @module compiler
 *
 * @example
 * ```typescript
 * import { parse } from 'treequery-xpath/compiler';
 *
 * const ast = parse('//book[@lang="en"]/title');
 * // ast.kind === 'absolute_path'
 * ```
 */

export { tokenize, isAxisName, isNodeTypeName, AXIS_NAMES, NODE_TYPES } from './lexer.js';
export type { Token, TokenType, AxisName, NodeTypeName } from './lexer.js';

export { parseTokens, MAX_DEPTH } from './parser.js';

export { astDepth, astKey, exceedsDepth, formatAst, isBinaryNode } from './ast.js';
export type {
  QueryAst,
  AbsolutePathNode,
  RelativePathNode,
  PathNode,
  AxisNode,
  TestNode,
  WildcardNode,
  NodeTypeNode,
  NodeTest,
  PredicateNode,
  FilterNode,
  StringNode,
  NumberNode,
  VariableNode,
  FunctionNode,
  UnionNode,
  BinaryNode,
  BinaryKind,
  NegateNode,
} from './ast.js';

import { tokenize } from './lexer.js';
import { parseTokens } from './parser.js';
import type { QueryAst } from './ast.js';
import type { LruCache } from '../engine/cache.js';

/**
 * Parse an XPath expression into a query AST.
 */
export function parse(expression: string): QueryAst {
  return parseTokens(tokenize(expression), expression);
}

/**
 * Parse through `cache`: a repeated expression returns the identical AST
 * object. Failed parses are not cached.
 */
export function parseWithCache(expression: string, cache: LruCache<string, QueryAst>): QueryAst {
  return cache.getOrSet(expression, () => parse(expression));
}
