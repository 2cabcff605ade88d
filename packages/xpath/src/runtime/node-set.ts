/**
 * @module runtime/node-set
 */

/**
 * An ordered set of distinct nodes. Sets produced by the engine are in
 * document order; the constructor trusts its input and does not re-sort.
 */
export class NodeSet<N> implements Iterable<N> {
  private readonly nodes: readonly N[];

  constructor(nodes: Iterable<N> = []) {
    this.nodes = Object.freeze([...nodes]);
  }

  static empty<N>(): NodeSet<N> {
    return new NodeSet<N>();
  }

  get size(): number {
    return this.nodes.length;
  }

  isEmpty(): boolean {
    return this.nodes.length === 0;
  }

  first(): N | undefined {
    return this.nodes.length > 0 ? this.nodes[0] : undefined;
  }

  at(index: number): N | undefined {
    return this.nodes.at(index);
  }

  includes(node: N): boolean {
    return this.nodes.includes(node);
  }

  map<T>(fn: (node: N, index: number) => T): T[] {
    return this.nodes.map(fn);
  }

  toArray(): N[] {
    return [...this.nodes];
  }

  [Symbol.iterator](): Iterator<N> {
    return this.nodes[Symbol.iterator]();
  }
}

export function isNodeSet<N>(value: unknown): value is NodeSet<N> {
  return value instanceof NodeSet;
}
