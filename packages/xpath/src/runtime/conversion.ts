/**
 * XPath 1.0 value conversions.
 *
 * Node-sets only convert through an adapter, which supplies the string
 * value of their first node. Scalar conversions need no adapter.
 *
 * @module runtime/conversion
 */

import { EvaluationError } from '../errors.js';
import { NodeSet } from './node-set.js';
import type { NodeAdapter, XPathValue } from './types.js';

export type Scalar = string | number | boolean;

export type TextSource<N> = Pick<NodeAdapter<N>, 'text'>;

const NUMERIC = /^\s*-?(\d+(\.\d*)?|\.\d+)\s*$/;

/**
 * Format a number the way XPath prints it: no exponent, no trailing `.0`,
 * and `0` for negative zero.
 */
export function formatNumber(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return 'Infinity';
  if (value === -Infinity) return '-Infinity';
  if (value === 0) return '0';

  const text = String(value);
  if (!text.includes('e')) return text;

  const [mantissa, exponent] = text.split('e');
  const sign = mantissa.startsWith('-') ? '-' : '';
  const [whole, fraction = ''] = mantissa.replace('-', '').split('.');
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);

  if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

function firstText<N>(set: NodeSet<N>, source: TextSource<N> | undefined): string {
  const nodes = set.toArray();
  if (nodes.length === 0) return '';
  if (!source) {
    throw new EvaluationError('Converting a node-set requires a node adapter');
  }
  return source.text(nodes[0]);
}

export function toXPathString(value: Scalar): string;
export function toXPathString<N>(value: XPathValue<N>, source: TextSource<N>): string;
export function toXPathString<N>(value: XPathValue<N>, source?: TextSource<N>): string {
  if (value instanceof NodeSet) return firstText(value, source);
  if (typeof value === 'number') return formatNumber(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  return value;
}

export function toXPathNumber(value: Scalar): number;
export function toXPathNumber<N>(value: XPathValue<N>, source: TextSource<N>): number;
export function toXPathNumber<N>(value: XPathValue<N>, source?: TextSource<N>): number {
  if (value instanceof NodeSet) return stringToNumber(firstText(value, source));
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  return stringToNumber(value);
}

function stringToNumber(value: string): number {
  return NUMERIC.test(value) ? Number(value.trim()) : NaN;
}

export function toXPathBoolean<N>(value: XPathValue<N>): boolean {
  if (value instanceof NodeSet) return !value.isEmpty();
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'boolean') return value;
  return value.length > 0;
}

/**
 * Coerce two operands to a common type for an equality test. Node-sets are
 * first reduced to the string value of their first node; then a boolean on
 * either side makes both booleans, else a number makes both numbers, else
 * both are strings.
 */
export function toCompatibleTypes(left: Scalar, right: Scalar): [Scalar, Scalar];
export function toCompatibleTypes<N>(
  left: XPathValue<N>,
  right: XPathValue<N>,
  source: TextSource<N>,
): [Scalar, Scalar];
export function toCompatibleTypes<N>(
  left: XPathValue<N>,
  right: XPathValue<N>,
  source?: TextSource<N>,
): [Scalar, Scalar] {
  const a = left instanceof NodeSet ? firstText(left, source) : left;
  const b = right instanceof NodeSet ? firstText(right, source) : right;

  if (typeof a === 'boolean' || typeof b === 'boolean') {
    return [toXPathBoolean(a), toXPathBoolean(b)];
  }
  if (typeof a === 'number' || typeof b === 'number') {
    return [toXPathNumber(a), toXPathNumber(b)];
  }
  return [a, b];
}
