import { describe, it, expect } from 'vitest';
import { astDepth, astKey, exceedsDepth, formatAst, isBinaryNode, parse } from '../../src/compiler/index.js';
import type { QueryAst } from '../../src/compiler/index.js';

describe('formatAst', () => {
  it('renders unabbreviated steps', () => {
    expect(formatAst(parse('//a[@id="x"]'))).toBe('/descendant-or-self::node()/child::a[(attribute::id = "x")]');
  });

  it('renders operators with explicit grouping', () => {
    expect(formatAst(parse('1 + 2 * 3'))).toBe('(1 + (2 * 3))');
    expect(formatAst(parse('-count(a)'))).toBe('-(count(child::a))');
    expect(formatAst(parse('a | b'))).toBe('child::a | child::b');
  });

  it('renders the root, variables and filters', () => {
    expect(formatAst(parse('/'))).toBe('/');
    expect(formatAst(parse('$v[2]/b'))).toBe('$v[2]/child::b');
    expect(formatAst(parse("processing-instruction('x')"))).toBe('child::processing-instruction("x")');
  });
});

describe('astKey', () => {
  it('is equal for structurally equal trees', () => {
    expect(astKey(parse('a + 1'))).toBe(astKey(parse('a+1')));
    expect(astKey(parse('a + 1'))).not.toBe(astKey(parse('a + 2')));
  });

  it('ignores property order', () => {
    const left: QueryAst = { kind: 'plus', left: { kind: 'number', value: 1 }, right: { kind: 'number', value: 2 } };
    const right: QueryAst = { right: { value: 2, kind: 'number' }, left: { value: 1, kind: 'number' }, kind: 'plus' };
    expect(astKey(left)).toBe(astKey(right));
  });

  it('distinguishes a number from a string of the same text', () => {
    expect(astKey({ kind: 'number', value: 1 })).not.toBe(astKey({ kind: 'string', value: '1' }));
  });
});

describe('astDepth', () => {
  it('counts nesting', () => {
    expect(astDepth(parse('1'))).toBe(1);
    expect(astDepth(parse('1 + 2'))).toBe(2);
    expect(astDepth(parse('a'))).toBe(3);
  });

  it('nests each location step below the previous one', () => {
    expect(astDepth(parse('a/b'))).toBe(4);
    expect(astDepth(parse('a/b/c'))).toBe(5);
  });
});

describe('exceedsDepth', () => {
  it('agrees with astDepth', () => {
    const ast = parse('a/b[1 + 2]');
    expect(astDepth(ast)).toBe(6);
    expect(exceedsDepth(ast, 6)).toBe(false);
    expect(exceedsDepth(ast, 5)).toBe(true);
  });
});

describe('isBinaryNode', () => {
  it('recognizes operator nodes only', () => {
    expect(isBinaryNode(parse('1 mod 2'))).toBe(true);
    expect(isBinaryNode(parse('a | b'))).toBe(false);
    expect(isBinaryNode(parse('-1'))).toBe(false);
  });
});
