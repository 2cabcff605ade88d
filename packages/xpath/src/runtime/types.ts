/**
 * Types shared by the runtime, the compiled queries and the engine.
 *
 * @module runtime/types
 */

import type { NodeSet } from './node-set.js';

export type NodeKind =
  | 'document'
  | 'element'
  | 'text'
  | 'cdata'
  | 'comment'
  | 'processing-instruction'
  | 'attribute'
  | 'namespace';

/**
 * Read-only view over a document tree. The engine never touches nodes
 * directly; every query goes through an adapter, so any tree whose nodes
 * have a stable identity can be queried.
 */
export interface NodeAdapter<N> {
  kind(node: N): NodeKind;
  parent(node: N): N | null;
  /** Child nodes in document order. Attributes are not children. */
  children(node: N): readonly N[];
  attributes(node: N): readonly N[];
  /** Local name of an element or attribute, target of a processing instruction, '' otherwise. */
  name(node: N): string;
  namespacePrefix(node: N): string | null;
  namespaceUri(node: N): string | null;
  attributeValue(node: N, name: string): string | null;
  /** XPath string value. */
  text(node: N): string;
}

export type XPathValue<N> = NodeSet<N> | string | number | boolean;

export type VariableValue<N> = XPathValue<N> | readonly N[];

export type Variables<N> = Readonly<Record<string, VariableValue<N>>>;

export type NamespaceMap = Readonly<Record<string, string>>;

export type ComparisonOperator = 'eq' | 'neq' | 'lt' | 'gt' | 'lte' | 'gte';
