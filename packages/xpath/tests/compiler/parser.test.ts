import { describe, it, expect } from 'vitest';
import { parse, parseWithCache, MAX_DEPTH } from '../../src/compiler/index.js';
import type { AxisNode, QueryAst } from '../../src/compiler/index.js';
import { LruCache } from '../../src/engine/cache.js';
import { XPathSyntaxError } from '../../src/errors.js';

const child = (name: string, predicates: AxisNode['predicates'] = []): AxisNode => ({
  kind: 'axis',
  axis: 'child',
  test: { kind: 'test', prefix: null, name },
  predicates,
});

const anyNode = (axis: AxisNode['axis']): AxisNode => ({
  kind: 'axis',
  axis,
  test: { kind: 'node_type', type: 'node', target: null },
  predicates: [],
});

function syntaxError(expression: string): XPathSyntaxError {
  try {
    parse(expression);
  } catch (err) {
    if (err instanceof XPathSyntaxError) return err;
    throw err;
  }
  throw new Error(`expected ${expression} to be rejected`);
}

describe('parse', () => {
  describe('location paths', () => {
    it('parses a lone slash as the root', () => {
      expect(parse('/')).toEqual({ kind: 'absolute_path', steps: [] });
    });

    it('parses absolute and relative paths', () => {
      expect(parse('/a/b')).toEqual({ kind: 'absolute_path', steps: [child('a'), child('b')] });
      expect(parse('a/b')).toEqual({ kind: 'relative_path', steps: [child('a'), child('b')] });
    });

    it('expands // to descendant-or-self::node()', () => {
      expect(parse('//a')).toEqual({
        kind: 'absolute_path',
        steps: [anyNode('descendant-or-self'), child('a')],
      });
      expect(parse('a//b')).toEqual({
        kind: 'relative_path',
        steps: [child('a'), anyNode('descendant-or-self'), child('b')],
      });
    });

    it('expands . and ..', () => {
      expect(parse('.')).toEqual({ kind: 'relative_path', steps: [anyNode('self')] });
      expect(parse('../a')).toEqual({ kind: 'relative_path', steps: [anyNode('parent'), child('a')] });
    });

    it('expands @ to the attribute axis', () => {
      expect(parse('@id')).toEqual({
        kind: 'relative_path',
        steps: [{ kind: 'axis', axis: 'attribute', test: { kind: 'test', prefix: null, name: 'id' }, predicates: [] }],
      });
    });

    it('parses explicit axes', () => {
      const ast = parse('ancestor-or-self::section');
      expect(ast).toEqual({
        kind: 'relative_path',
        steps: [{ kind: 'axis', axis: 'ancestor-or-self', test: { kind: 'test', prefix: null, name: 'section' }, predicates: [] }],
      });
    });

    it('parses wildcards and prefixed names', () => {
      expect(parse('*')).toEqual({
        kind: 'relative_path',
        steps: [{ kind: 'axis', axis: 'child', test: { kind: 'wildcard', prefix: null }, predicates: [] }],
      });
      expect(parse('dc:*')).toEqual({
        kind: 'relative_path',
        steps: [{ kind: 'axis', axis: 'child', test: { kind: 'wildcard', prefix: 'dc' }, predicates: [] }],
      });
      expect(parse('dc:title')).toEqual({
        kind: 'relative_path',
        steps: [{ kind: 'axis', axis: 'child', test: { kind: 'test', prefix: 'dc', name: 'title' }, predicates: [] }],
      });
    });

    it('parses node type tests', () => {
      expect(parse('text()')).toEqual({
        kind: 'relative_path',
        steps: [{ kind: 'axis', axis: 'child', test: { kind: 'node_type', type: 'text', target: null }, predicates: [] }],
      });
      expect(parse("processing-instruction('style')")).toEqual({
        kind: 'relative_path',
        steps: [
          {
            kind: 'axis',
            axis: 'child',
            test: { kind: 'node_type', type: 'processing-instruction', target: 'style' },
            predicates: [],
          },
        ],
      });
    });

    it('reads keywords and node type names as element names', () => {
      expect(parse('div/text')).toEqual({ kind: 'relative_path', steps: [child('div'), child('text')] });
    });

    it('attaches predicates to steps', () => {
      expect(parse('a[1]')).toEqual({
        kind: 'relative_path',
        steps: [child('a', [{ kind: 'predicate', expr: { kind: 'number', value: 1 } }])],
      });
    });
  });

  describe('filter expressions', () => {
    it('parses a predicate on a parenthesized path', () => {
      expect(parse('(a)[2]')).toEqual({
        kind: 'filter',
        primary: { kind: 'relative_path', steps: [child('a')] },
        predicates: [{ kind: 'predicate', expr: { kind: 'number', value: 2 } }],
      });
    });

    it('parses steps after a variable', () => {
      expect(parse('$items//name')).toEqual({
        kind: 'path',
        filter: { kind: 'variable', name: 'items' },
        steps: [anyNode('descendant-or-self'), child('name')],
      });
    });

    it('returns a primary without predicates unwrapped', () => {
      expect(parse('"x"')).toEqual({ kind: 'string', value: 'x' });
      expect(parse('(1)')).toEqual({ kind: 'number', value: 1 });
    });

    it('parses prefixed variable names', () => {
      expect(parse('$ns:v')).toEqual({ kind: 'variable', name: 'ns:v' });
    });

    it('parses function calls with arguments', () => {
      expect(parse('concat("a", "b", 1)')).toEqual({
        kind: 'function',
        name: 'concat',
        args: [
          { kind: 'string', value: 'a' },
          { kind: 'string', value: 'b' },
          { kind: 'number', value: 1 },
        ],
      });
      expect(parse('true()')).toEqual({ kind: 'function', name: 'true', args: [] });
    });
  });

  describe('operators', () => {
    const n = (value: number): QueryAst => ({ kind: 'number', value });

    it('binds multiplication tighter than addition', () => {
      expect(parse('1 + 2 * 3')).toEqual({
        kind: 'plus',
        left: n(1),
        right: { kind: 'star', left: n(2), right: n(3) },
      });
    });

    it('associates to the left', () => {
      expect(parse('8 - 2 - 1')).toEqual({
        kind: 'minus',
        left: { kind: 'minus', left: n(8), right: n(2) },
        right: n(1),
      });
    });

    it('binds and tighter than or', () => {
      expect(parse('1 or 2 and 3')).toEqual({
        kind: 'or',
        left: n(1),
        right: { kind: 'and', left: n(2), right: n(3) },
      });
    });

    it('binds relational tighter than equality', () => {
      expect(parse('1 = 2 < 3')).toEqual({
        kind: 'eq',
        left: n(1),
        right: { kind: 'lt', left: n(2), right: n(3) },
      });
    });

    it('parses unary minus and union', () => {
      expect(parse('--1')).toEqual({ kind: 'negate', operand: { kind: 'negate', operand: n(1) } });
      expect(parse('a | b')).toEqual({
        kind: 'union',
        left: { kind: 'relative_path', steps: [child('a')] },
        right: { kind: 'relative_path', steps: [child('b')] },
      });
    });

    it('reads * after an operand as multiplication', () => {
      expect(parse('2 * 3')).toEqual({ kind: 'star', left: n(2), right: n(3) });
    });
  });

  describe('errors', () => {
    it('rejects an empty expression', () => {
      const error = syntaxError('   ');
      expect(error.message).toBe('Empty expression at position 3');
      expect(error.token).toBeUndefined();
    });

    it('rejects trailing tokens', () => {
      const error = syntaxError('a b');
      expect(error.message).toBe("Unexpected token 'b' after expression at position 2");
      expect(error.position).toBe(2);
      expect(error.token).toBe('b');
    });

    it('rejects an unclosed predicate', () => {
      expect(syntaxError('a[1').message).toBe("Expected ']', got end of expression at position 3");
    });

    it('rejects an unknown axis', () => {
      expect(syntaxError('sideways::a').message).toBe("Unknown axis 'sideways' at position 0");
    });

    it('rejects a missing operand', () => {
      expect(syntaxError('1 +').message).toBe('Unexpected end of expression at position 3');
    });

    it('rejects nesting deeper than the limit', () => {
      const deep = `${'('.repeat(MAX_DEPTH + 1)}1${')'.repeat(MAX_DEPTH + 1)}`;
      expect(syntaxError(deep).message).toMatch(/^Expression exceeds maximum depth of 100 at position \d+$/);
    });

    it('accepts nesting at the limit', () => {
      const deep = `${'('.repeat(MAX_DEPTH - 1)}1${')'.repeat(MAX_DEPTH - 1)}`;
      expect(parse(deep)).toEqual({ kind: 'number', value: 1 });
    });

    it('counts operator chains toward the limit', () => {
      const terms = (n: number, separator: string) => Array(n).fill('1').join(separator);
      expect(parse(terms(MAX_DEPTH, ' + ')).kind).toBe('plus');
      expect(syntaxError(terms(MAX_DEPTH + 1, ' + ')).message).toMatch(/^Expression exceeds maximum depth of 100/);
      expect(syntaxError(terms(5000, '+')).message).toMatch(/^Expression exceeds maximum depth of 100/);
      expect(syntaxError(terms(20000, ' or ')).message).toMatch(/^Expression exceeds maximum depth of 100/);
    });

    it('counts unions toward the limit', () => {
      const union = Array(500).fill('a').join(' | ');
      expect(syntaxError(union).message).toMatch(/^Expression exceeds maximum depth of 100/);
    });

    it('counts location steps toward the limit', () => {
      const steps = (n: number) => Array(n).fill('a').join('/');
      expect(parse(steps(98)).kind).toBe('relative_path');
      expect(syntaxError(steps(99)).message).toMatch(/^Expression exceeds maximum depth of 100/);
      expect(syntaxError(steps(1500)).position).toBe(2999);
    });

    it('keeps the expression on the error', () => {
      expect(syntaxError('//a[').expression).toBe('//a[');
    });
  });
});

describe('parseWithCache', () => {
  it('returns the identical tree for a repeated expression', () => {
    const cache = new LruCache<string, QueryAst>(10);
    const first = parseWithCache('//b[1]', cache);
    expect(parseWithCache('//b[1]', cache)).toBe(first);
    expect(cache.stats).toEqual({ size: 1, capacity: 10, hits: 1, misses: 1 });
  });

  it('does not cache failed parses', () => {
    const cache = new LruCache<string, QueryAst>(10);
    expect(() => parseWithCache('1 +', cache)).toThrow(XPathSyntaxError);
    expect(cache.size).toBe(0);
  });
});
