/**
 * Query AST produced by the parser.
 *
 * Nodes are plain immutable objects discriminated by `kind`. Two ASTs that
 * are structurally equal describe the same query, which is what the compile
 * cache keys on.
 *
 * @module compiler/ast
 */

import type { AxisName, NodeTypeName } from './lexer.js';

export type BinaryKind =
  | 'or'
  | 'and'
  | 'eq'
  | 'neq'
  | 'lt'
  | 'gt'
  | 'lte'
  | 'gte'
  | 'plus'
  | 'minus'
  | 'star'
  | 'div'
  | 'mod';

export interface AbsolutePathNode {
  readonly kind: 'absolute_path';
  /** Empty for `/`, which selects the document root. */
  readonly steps: readonly AxisNode[];
}

export interface RelativePathNode {
  readonly kind: 'relative_path';
  readonly steps: readonly AxisNode[];
}

/** A filter expression followed by location steps, e.g. `$items/name`. */
export interface PathNode {
  readonly kind: 'path';
  readonly filter: QueryAst;
  readonly steps: readonly AxisNode[];
}

export interface AxisNode {
  readonly kind: 'axis';
  readonly axis: AxisName;
  readonly test: NodeTest;
  readonly predicates: readonly PredicateNode[];
}

export interface TestNode {
  readonly kind: 'test';
  readonly prefix: string | null;
  readonly name: string;
}

export interface WildcardNode {
  readonly kind: 'wildcard';
  readonly prefix: string | null;
}

export interface NodeTypeNode {
  readonly kind: 'node_type';
  readonly type: NodeTypeName;
  /** Only set for `processing-instruction('target')`. */
  readonly target: string | null;
}

export type NodeTest = TestNode | WildcardNode | NodeTypeNode;

export interface PredicateNode {
  readonly kind: 'predicate';
  readonly expr: QueryAst;
}

export interface FilterNode {
  readonly kind: 'filter';
  readonly primary: QueryAst;
  readonly predicates: readonly PredicateNode[];
}

export interface StringNode {
  readonly kind: 'string';
  readonly value: string;
}

export interface NumberNode {
  readonly kind: 'number';
  readonly value: number;
}

export interface VariableNode {
  readonly kind: 'variable';
  readonly name: string;
}

export interface FunctionNode {
  readonly kind: 'function';
  readonly name: string;
  readonly args: readonly QueryAst[];
}

export interface UnionNode {
  readonly kind: 'union';
  readonly left: QueryAst;
  readonly right: QueryAst;
}

export interface BinaryNode {
  readonly kind: BinaryKind;
  readonly left: QueryAst;
  readonly right: QueryAst;
}

export interface NegateNode {
  readonly kind: 'negate';
  readonly operand: QueryAst;
}

export type QueryAst =
  | AbsolutePathNode
  | RelativePathNode
  | PathNode
  | AxisNode
  | TestNode
  | WildcardNode
  | NodeTypeNode
  | PredicateNode
  | FilterNode
  | StringNode
  | NumberNode
  | VariableNode
  | FunctionNode
  | UnionNode
  | BinaryNode
  | NegateNode;

const BINARY_KINDS: ReadonlySet<string> = new Set<BinaryKind>([
  'or',
  'and',
  'eq',
  'neq',
  'lt',
  'gt',
  'lte',
  'gte',
  'plus',
  'minus',
  'star',
  'div',
  'mod',
]);

export function isBinaryNode(node: QueryAst): node is BinaryNode {
  return BINARY_KINDS.has(node.kind);
}

const BINARY_SYMBOLS: Record<BinaryKind, string> = {
  or: 'or',
  and: 'and',
  eq: '=',
  neq: '!=',
  lt: '<',
  gt: '>',
  lte: '<=',
  gte: '>=',
  plus: '+',
  minus: '-',
  star: '*',
  div: 'div',
  mod: 'mod',
};

const keys = new WeakMap<object, string>();

/**
 * Canonical structural key of an AST. Equal trees give equal keys
 * regardless of object identity or property order.
 */
export function astKey(node: QueryAst): string {
  const cached = keys.get(node);
  if (cached !== undefined) return cached;
  const key = canonical(node);
  keys.set(node, key);
  return key;
}

function canonical(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonical).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const fields = Object.entries(value)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, field]) => `${JSON.stringify(name)}:${canonical(field)}`);
    return `{${fields.join(',')}}`;
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return String(value);
  }
  return JSON.stringify(value) ?? 'null';
}

/**
 * Render an AST back to unabbreviated XPath text. Used in error messages.
 */
export function formatAst(node: QueryAst): string {
  switch (node.kind) {
    case 'absolute_path':
      return `/${node.steps.map(formatAst).join('/')}`;
    case 'relative_path':
      return node.steps.map(formatAst).join('/');
    case 'path':
      return `${formatAst(node.filter)}/${node.steps.map(formatAst).join('/')}`;
    case 'axis':
      return `${node.axis}::${formatAst(node.test)}${node.predicates.map(formatAst).join('')}`;
    case 'test':
      return node.prefix === null ? node.name : `${node.prefix}:${node.name}`;
    case 'wildcard':
      return node.prefix === null ? '*' : `${node.prefix}:*`;
    case 'node_type':
      return node.target === null ? `${node.type}()` : `${node.type}(${JSON.stringify(node.target)})`;
    case 'predicate':
      return `[${formatAst(node.expr)}]`;
    case 'filter':
      return `${formatAst(node.primary)}${node.predicates.map(formatAst).join('')}`;
    case 'string':
      return JSON.stringify(node.value);
    case 'number':
      return String(node.value);
    case 'variable':
      return `$${node.name}`;
    case 'function':
      return `${node.name}(${node.args.map(formatAst).join(', ')})`;
    case 'union':
      return `${formatAst(node.left)} | ${formatAst(node.right)}`;
    case 'negate':
      return `-(${formatAst(node.operand)})`;
    default:
      return `(${formatAst(node.left)} ${BINARY_SYMBOLS[node.kind]} ${formatAst(node.right)})`;
  }
}

/**
 * Compute the depth of an AST tree. Each location step counts as one level
 * below the step before it, since steps run nested inside one another.
 */
export function astDepth(node: QueryAst): number {
  switch (node.kind) {
    case 'test':
    case 'wildcard':
    case 'node_type':
    case 'string':
    case 'number':
    case 'variable':
      return 1;
    case 'absolute_path':
    case 'relative_path':
      return 1 + stepsDepth(node.steps);
    case 'path':
      return 1 + Math.max(astDepth(node.filter), stepsDepth(node.steps));
    case 'axis':
      return 1 + Math.max(astDepth(node.test), maxDepth(node.predicates));
    case 'predicate':
      return 1 + astDepth(node.expr);
    case 'filter':
      return 1 + Math.max(astDepth(node.primary), maxDepth(node.predicates));
    case 'function':
      return 1 + maxDepth(node.args);
    case 'negate':
      return 1 + astDepth(node.operand);
    default:
      return 1 + Math.max(astDepth(node.left), astDepth(node.right));
  }
}

function maxDepth(nodes: readonly QueryAst[]): number {
  return nodes.reduce((max, child) => Math.max(max, astDepth(child)), 0);
}

function stepsDepth(steps: readonly QueryAst[]): number {
  return steps.reduce((max, step, index) => Math.max(max, index + astDepth(step)), 0);
}

/**
 * True when `astDepth(node)` would exceed `limit`. Stops descending once the
 * limit is passed, so arbitrarily long operator chains are safe to check.
 */
export function exceedsDepth(node: QueryAst, limit: number): boolean {
  if (limit < 1) return true;
  const below = limit - 1;
  switch (node.kind) {
    case 'test':
    case 'wildcard':
    case 'node_type':
    case 'string':
    case 'number':
    case 'variable':
      return false;
    case 'absolute_path':
    case 'relative_path':
      return stepsExceed(node.steps, below);
    case 'path':
      return exceedsDepth(node.filter, below) || stepsExceed(node.steps, below);
    case 'axis':
      return exceedsDepth(node.test, below) || node.predicates.some((p) => exceedsDepth(p, below));
    case 'predicate':
      return exceedsDepth(node.expr, below);
    case 'filter':
      return exceedsDepth(node.primary, below) || node.predicates.some((p) => exceedsDepth(p, below));
    case 'function':
      return node.args.some((arg) => exceedsDepth(arg, below));
    case 'negate':
      return exceedsDepth(node.operand, below);
    default:
      return exceedsDepth(node.left, below) || exceedsDepth(node.right, below);
  }
}

function stepsExceed(steps: readonly QueryAst[], limit: number): boolean {
  return steps.some((step, index) => exceedsDepth(step, limit - index));
}
