/**
 * Runtime support for compiled queries: value conversions, node-sets and
 * the core function library.
 *
 * @module runtime
 */

export { NodeSet, isNodeSet } from './node-set.js';
export { QueryRuntime, NodeSetBuilder } from './runtime.js';
export type { Fill, PredicateTest } from './runtime.js';
export {
  formatNumber,
  toXPathString,
  toXPathNumber,
  toXPathBoolean,
  toCompatibleTypes,
} from './conversion.js';
export type { Scalar, TextSource } from './conversion.js';
export {
  FunctionDefinition,
  lookupFunction,
  functionNames,
  XML_NAMESPACE,
} from './functions.js';
export type { XPathFunction } from './functions.js';
export type {
  NodeAdapter,
  NodeKind,
  XPathValue,
  VariableValue,
  Variables,
  NamespaceMap,
  ComparisonOperator,
} from './types.js';
