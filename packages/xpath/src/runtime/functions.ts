/**
 * XPath 1.0 core function library.
 *
 * String functions count Unicode code points, not UTF-16 units.
 *
 * @module runtime/functions
 */

import { FunctionError } from '../errors.js';
import { NodeSet } from './node-set.js';
import type { QueryRuntime } from './runtime.js';
import type { XPathValue } from './types.js';

export type XPathFunction = <N>(
  rt: QueryRuntime<N>,
  node: N,
  args: readonly XPathValue<N>[],
) => XPathValue<N>;

export const XML_NAMESPACE = 'http://www.w3.org/XML/1998/namespace';

const WHITESPACE = /[\x20\t\r\n]+/g;

export class FunctionDefinition {
  constructor(
    readonly name: string,
    readonly minArgs: number,
    readonly maxArgs: number,
    readonly fn: XPathFunction,
  ) {}

  /** Throws FunctionError unless `count` arguments are accepted. */
  checkArity(count: number, expression?: string): void {
    if (count >= this.minArgs && count <= this.maxArgs) return;
    throw new FunctionError(
      `Function ${this.name}() expects ${this.describeArity()}, got ${count}`,
      { expression, functionName: this.name, argumentCount: count },
    );
  }

  private describeArity(): string {
    const plural = (n: number): string => (n === 1 ? 'argument' : 'arguments');
    if (this.maxArgs === Infinity) return `at least ${this.minArgs} ${plural(this.minArgs)}`;
    if (this.minArgs === this.maxArgs) return `${this.minArgs} ${plural(this.minArgs)}`;
    return `${this.minArgs} to ${this.maxArgs} arguments`;
  }
}

const functions = new Map<string, FunctionDefinition>();

function define(name: string, minArgs: number, maxArgs: number, fn: XPathFunction): void {
  functions.set(name, new FunctionDefinition(name, minArgs, maxArgs, fn));
}

export function lookupFunction(name: string): FunctionDefinition | undefined {
  return functions.get(name);
}

export function functionNames(): string[] {
  return [...functions.keys()].sort();
}

// -- argument helpers ---------------------------------------------------

function nodeSetArg<N>(name: string, args: readonly XPathValue<N>[], index = 0): NodeSet<N> {
  const value = args[index];
  if (value instanceof NodeSet) return value;
  throw new FunctionError(`Function ${name}() expects a node-set argument`, {
    functionName: name,
    argumentCount: args.length,
  });
}

/** The first node of the optional node-set argument, or the context node. */
function targetNode<N>(name: string, node: N, args: readonly XPathValue<N>[]): N | null {
  if (args.length === 0) return node;
  const nodes = nodeSetArg(name, args).toArray();
  return nodes.length > 0 ? nodes[0] : null;
}

/** The string value of argument `index`, or of the context node when absent. */
function stringArg<N>(
  rt: QueryRuntime<N>,
  node: N,
  args: readonly XPathValue<N>[],
  index = 0,
): string {
  return args.length > index ? rt.string(args[index]) : rt.adapter.text(node);
}

function positional(name: string): XPathFunction {
  return () => {
    throw new FunctionError(`${name}() can only be used in a predicate`, {
      functionName: name,
      argumentCount: 0,
    });
  };
}

// -- node-set functions -------------------------------------------------

define('last', 0, 0, positional('last'));
define('position', 0, 0, positional('position'));

define('count', 1, 1, (_rt, _node, args) => nodeSetArg('count', args).size);

define('id', 1, 1, (rt, node, args) => {
  const [value] = args;
  const texts = value instanceof NodeSet ? value.map((n) => rt.adapter.text(n)) : [rt.string(value)];
  const ids = new Set(texts.flatMap((text) => text.split(WHITESPACE)).filter((id) => id !== ''));
  const matches = rt.descendantsOrSelf(rt.root(node)).filter((candidate) => {
    if (rt.kind(candidate) !== 'element') return false;
    const id = rt.adapter.attributeValue(candidate, 'id');
    return id !== null && ids.has(id);
  });
  return new NodeSet(matches);
});

define('local-name', 0, 1, (rt, node, args) => {
  const target = targetNode('local-name', node, args);
  return target === null ? '' : rt.name(target);
});

define('namespace-uri', 0, 1, (rt, node, args) => {
  const target = targetNode('namespace-uri', node, args);
  return target === null ? '' : (rt.namespaceUri(target) ?? '');
});

define('name', 0, 1, (rt, node, args) => {
  const target = targetNode('name', node, args);
  if (target === null) return '';
  const prefix = rt.namespacePrefix(target);
  return prefix ? `${prefix}:${rt.name(target)}` : rt.name(target);
});

// -- string functions ---------------------------------------------------

define('string', 0, 1, (rt, node, args) => stringArg(rt, node, args));

define('concat', 2, Infinity, (rt, _node, args) => args.map((arg) => rt.string(arg)).join(''));

define('starts-with', 2, 2, (rt, _node, [s, prefix]) => rt.string(s).startsWith(rt.string(prefix)));

define('contains', 2, 2, (rt, _node, [s, part]) => rt.string(s).includes(rt.string(part)));

define('substring-before', 2, 2, (rt, _node, [s, part]) => {
  const text = rt.string(s);
  const index = text.indexOf(rt.string(part));
  return index < 0 ? '' : text.slice(0, index);
});

define('substring-after', 2, 2, (rt, _node, [s, part]) => {
  const text = rt.string(s);
  const search = rt.string(part);
  const index = text.indexOf(search);
  return index < 0 ? '' : text.slice(index + search.length);
});

define('substring', 2, 3, (rt, _node, args) => {
  const chars = Array.from(rt.string(args[0]));
  const start = Math.round(rt.number(args[1]));
  const end = args.length > 2 ? start + Math.round(rt.number(args[2])) : Infinity;
  // NaN bounds compare false and select nothing
  return chars.filter((_, i) => i + 1 >= start && i + 1 < end).join('');
});

define('string-length', 0, 1, (rt, node, args) => Array.from(stringArg(rt, node, args)).length);

define('normalize-space', 0, 1, (rt, node, args) =>
  stringArg(rt, node, args).replace(WHITESPACE, ' ').trim(),
);

define('translate', 3, 3, (rt, _node, [s, from, to]) => {
  const source = Array.from(rt.string(from));
  const target = Array.from(rt.string(to));
  const mapping = new Map<string, string>();
  source.forEach((char, i) => {
    if (!mapping.has(char)) mapping.set(char, i < target.length ? target[i] : '');
  });
  return Array.from(rt.string(s))
    .map((char) => mapping.get(char) ?? char)
    .join('');
});

// -- boolean functions --------------------------------------------------

define('boolean', 1, 1, (rt, _node, [value]) => rt.boolean(value));

define('not', 1, 1, (rt, _node, [value]) => !rt.boolean(value));

define('true', 0, 0, () => true);

define('false', 0, 0, () => false);

define('lang', 1, 1, (rt, node, [value]) => {
  const wanted = rt.string(value).toLowerCase();
  for (const candidate of rt.ancestorsOrSelf(node)) {
    for (const attribute of rt.attributes(candidate)) {
      const isXmlLang =
        rt.name(attribute) === 'lang' &&
        (rt.namespacePrefix(attribute) === 'xml' || rt.namespaceUri(attribute) === XML_NAMESPACE);
      if (isXmlLang) {
        const lang = rt.adapter.text(attribute).toLowerCase();
        return lang === wanted || lang.startsWith(`${wanted}-`);
      }
    }
  }
  return false;
});

// -- number functions ---------------------------------------------------

define('number', 0, 1, (rt, node, args) =>
  args.length > 0 ? rt.number(args[0]) : rt.number(rt.adapter.text(node)),
);

define('sum', 1, 1, (rt, _node, args) =>
  nodeSetArg('sum', args)
    .map((n) => rt.number(rt.adapter.text(n)))
    .reduce((total, n) => total + n, 0),
);

define('floor', 1, 1, (rt, _node, [value]) => Math.floor(rt.number(value)));

define('ceiling', 1, 1, (rt, _node, [value]) => Math.ceil(rt.number(value)));

define('round', 1, 1, (rt, _node, [value]) => Math.round(rt.number(value)));
