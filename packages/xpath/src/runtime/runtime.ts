/**
 * Helper object handed to every compiled query.
 *
 * Generated code never walks the tree or converts values on its own; it
 * calls back into a `QueryRuntime`, which is created fresh for each run so
 * that a compiled query keeps no state between invocations.
 *
 * @module runtime/runtime
 */

import { EvaluationError, FunctionError } from '../errors.js';
import { toCompatibleTypes, toXPathBoolean, toXPathNumber, toXPathString } from './conversion.js';
import type { Scalar } from './conversion.js';
import { lookupFunction } from './functions.js';
import { NodeSet } from './node-set.js';
import type {
  ComparisonOperator,
  NodeAdapter,
  NodeKind,
  Variables,
  XPathValue,
} from './types.js';

export type Fill<N> = (push: (node: N) => void) => void;

export type PredicateTest<N> = (node: N, position: number, size: number) => XPathValue<N>;

/**
 * Accumulates distinct nodes and hands them back as a document-ordered
 * node-set.
 */
export class NodeSetBuilder<N> {
  private readonly seen = new Set<N>();

  constructor(private readonly runtime: QueryRuntime<N>) {}

  add(node: N): void {
    this.seen.add(node);
  }

  addAll(nodes: Iterable<N>): void {
    for (const node of nodes) this.seen.add(node);
  }

  build(): NodeSet<N> {
    return new NodeSet(this.runtime.sortInDocumentOrder(this.seen));
  }
}

export class QueryRuntime<N> {
  private order: Map<N, number> | undefined;

  constructor(
    readonly adapter: NodeAdapter<N>,
    private readonly variables: Variables<N> = {},
    readonly expression?: string,
  ) {}

  // -- node properties used by node tests ---------------------------------

  kind(node: N): NodeKind {
    return this.adapter.kind(node);
  }

  name(node: N): string {
    return this.adapter.name(node);
  }

  namespacePrefix(node: N): string | null {
    return this.adapter.namespacePrefix(node);
  }

  namespaceUri(node: N): string | null {
    return this.adapter.namespaceUri(node);
  }

  // -- axes ---------------------------------------------------------------
  // Each returns nodes in axis order: reverse axes list the nearest node first.

  root(node: N): N {
    let current = node;
    let parent = this.adapter.parent(current);
    while (parent !== null) {
      current = parent;
      parent = this.adapter.parent(current);
    }
    return current;
  }

  parent(node: N): N | null {
    return this.adapter.parent(node);
  }

  children(node: N): readonly N[] {
    return this.adapter.children(node);
  }

  attributes(node: N): readonly N[] {
    return this.adapter.kind(node) === 'element' ? this.adapter.attributes(node) : [];
  }

  descendants(node: N): N[] {
    const result: N[] = [];
    const stack = [...this.adapter.children(node)].reverse();
    let current = stack.pop();
    while (current !== undefined) {
      result.push(current);
      const children = this.adapter.children(current);
      for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
      current = stack.pop();
    }
    return result;
  }

  descendantsOrSelf(node: N): N[] {
    return [node, ...this.descendants(node)];
  }

  ancestors(node: N): N[] {
    const result: N[] = [];
    let parent = this.adapter.parent(node);
    while (parent !== null) {
      result.push(parent);
      parent = this.adapter.parent(parent);
    }
    return result;
  }

  ancestorsOrSelf(node: N): N[] {
    return [node, ...this.ancestors(node)];
  }

  followingSiblings(node: N): N[] {
    const { siblings, index } = this.siblingsOf(node);
    return index < 0 ? [] : siblings.slice(index + 1);
  }

  precedingSiblings(node: N): N[] {
    const { siblings, index } = this.siblingsOf(node);
    return index < 0 ? [] : siblings.slice(0, index).reverse();
  }

  following(node: N): N[] {
    const result: N[] = [];
    let current = node;
    if (this.isAttached(node)) {
      const owner = this.adapter.parent(node);
      if (owner === null) return result;
      result.push(...this.descendants(owner));
      current = owner;
    }
    let walk: N | null = current;
    while (walk !== null) {
      for (const sibling of this.followingSiblings(walk)) {
        result.push(sibling, ...this.descendants(sibling));
      }
      walk = this.adapter.parent(walk);
    }
    return result;
  }

  preceding(node: N): N[] {
    const result: N[] = [];
    let walk: N | null = this.isAttached(node) ? this.adapter.parent(node) : node;
    while (walk !== null) {
      for (const sibling of this.precedingSiblings(walk)) {
        result.push(...this.descendants(sibling).reverse(), sibling);
      }
      walk = this.adapter.parent(walk);
    }
    return result;
  }

  // -- collecting ---------------------------------------------------------

  nodeSet(): NodeSetBuilder<N> {
    return new NodeSetBuilder(this);
  }

  /** Distinct nodes pushed by `fill`, in the order first seen. */
  collect(fill: Fill<N>): N[] {
    const seen = new Set<N>();
    fill((node) => seen.add(node));
    return [...seen];
  }

  /** Nodes pushed by `fill`, in the order pushed. */
  sequence(fill: Fill<N>): N[] {
    const result: N[] = [];
    fill((node) => result.push(node));
    return result;
  }

  /** Nodes pushed by `fill` as a document-ordered node-set. */
  select(fill: Fill<N>): NodeSet<N> {
    const builder = this.nodeSet();
    fill((node) => builder.add(node));
    return builder.build();
  }

  /**
   * Apply one predicate. Positions are 1-based and follow the order of
   * `candidates`. A numeric result selects by position, anything else is
   * converted to a boolean.
   */
  filter(candidates: readonly N[], test: PredicateTest<N>): N[] {
    const size = candidates.length;
    return candidates.filter((node, index) => {
      const value = test(node, index + 1, size);
      return typeof value === 'number' ? value === index + 1 : toXPathBoolean(value);
    });
  }

  /** Nodes of a value that must be a node-set, in document order. */
  nodes(value: XPathValue<N>): readonly N[] {
    if (value instanceof NodeSet) return value.toArray();
    throw new EvaluationError(`Expected a node-set, got ${describeValue(value)}`, {
      expression: this.expression,
    });
  }

  // -- values -------------------------------------------------------------

  string(value: XPathValue<N>): string {
    return toXPathString(value, this.adapter);
  }

  number(value: XPathValue<N>): number {
    return toXPathNumber(value, this.adapter);
  }

  boolean(value: XPathValue<N>): boolean {
    return toXPathBoolean(value);
  }

  /**
   * Compare two values. A node-set operand compares true when any of its
   * nodes does; against a boolean the node-set itself becomes a boolean.
   */
  compare(op: ComparisonOperator, left: XPathValue<N>, right: XPathValue<N>): boolean {
    if (!(left instanceof NodeSet) && !(right instanceof NodeSet)) {
      return compareScalars(op, left, right);
    }
    if (typeof left === 'boolean' || typeof right === 'boolean') {
      return compareScalars(op, toXPathBoolean(left), toXPathBoolean(right));
    }
    const lefts = this.scalars(left);
    const rights = this.scalars(right);
    return lefts.some((a) => rights.some((b) => compareScalars(op, a, b)));
  }

  call(name: string, node: N, args: readonly XPathValue<N>[]): XPathValue<N> {
    const definition = lookupFunction(name);
    if (!definition) {
      throw new FunctionError(`Unknown function: ${name}()`, {
        expression: this.expression,
        functionName: name,
        argumentCount: args.length,
      });
    }
    definition.checkArity(args.length, this.expression);
    return definition.fn(this, node, args);
  }

  variable(name: string): XPathValue<N> {
    if (!Object.hasOwn(this.variables, name)) {
      throw new EvaluationError(`Undefined variable: $${name}`, {
        expression: this.expression,
        step: `$${name}`,
      });
    }
    const value = this.variables[name];
    if (value instanceof NodeSet || typeof value !== 'object') return value;
    return new NodeSet(this.sortInDocumentOrder(new Set(value)));
  }

  // -- document order -----------------------------------------------------

  sortInDocumentOrder(nodes: Iterable<N>): N[] {
    return [...nodes].sort((a, b) => this.documentPosition(a) - this.documentPosition(b));
  }

  /**
   * Position of `node` in a pre-order walk of its tree, attributes right
   * after their element. The index is built on first use.
   */
  documentPosition(node: N): number {
    const order = (this.order ??= new Map<N, number>());
    let position = order.get(node);
    if (position === undefined) {
      this.indexTree(order, this.root(node));
      position = order.get(node);
    }
    if (position === undefined) {
      position = order.size;
      order.set(node, position);
    }
    return position;
  }

  private indexTree(order: Map<N, number>, root: N): void {
    if (order.has(root)) return;
    const stack: N[] = [root];
    let current = stack.pop();
    while (current !== undefined) {
      order.set(current, order.size);
      for (const attribute of this.attributes(current)) {
        order.set(attribute, order.size);
      }
      const children = this.adapter.children(current);
      for (let i = children.length - 1; i >= 0; i--) stack.push(children[i]);
      current = stack.pop();
    }
  }

  private isAttached(node: N): boolean {
    const kind = this.adapter.kind(node);
    return kind === 'attribute' || kind === 'namespace';
  }

  private siblingsOf(node: N): { siblings: readonly N[]; index: number } {
    const parent = this.adapter.parent(node);
    if (parent === null || this.isAttached(node)) return { siblings: [], index: -1 };
    const siblings = this.adapter.children(parent);
    return { siblings, index: siblings.indexOf(node) };
  }

  private scalars(value: XPathValue<N>): Scalar[] {
    if (value instanceof NodeSet) return value.map((node) => this.adapter.text(node));
    return [value];
  }
}

function compareScalars(op: ComparisonOperator, left: Scalar, right: Scalar): boolean {
  switch (op) {
    case 'eq':
    case 'neq': {
      const [a, b] = toCompatibleTypes(left, right);
      return op === 'eq' ? a === b : a !== b;
    }
    case 'lt':
      return toXPathNumber(left) < toXPathNumber(right);
    case 'gt':
      return toXPathNumber(left) > toXPathNumber(right);
    case 'lte':
      return toXPathNumber(left) <= toXPathNumber(right);
    case 'gte':
      return toXPathNumber(left) >= toXPathNumber(right);
  }
}

function describeValue(value: Scalar): string {
  return typeof value === 'string' ? `string ${JSON.stringify(value)}` : `${typeof value} ${String(value)}`;
}
