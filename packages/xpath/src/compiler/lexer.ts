/**
 * Tokenizer for XPath expressions.
 *
 * @module compiler/lexer
 */

import { XPathSyntaxError } from '../errors.js';

export type TokenType =
  | 'SLASH'
  | 'DSLASH'
  | 'PIPE'
  | 'PLUS'
  | 'MINUS'
  | 'STAR'
  | 'EQ'
  | 'NEQ'
  | 'LT'
  | 'LTE'
  | 'GT'
  | 'GTE'
  | 'LPAREN'
  | 'RPAREN'
  | 'LBRACKET'
  | 'RBRACKET'
  | 'COMMA'
  | 'AT'
  | 'DOLLAR'
  | 'DOT'
  | 'DDOT'
  | 'COLON'
  | 'DCOLON'
  | 'STRING'
  | 'NUMBER'
  | 'NAME'
  | 'AXIS'
  | 'NODE_TYPE'
  | 'AND'
  | 'OR'
  | 'MOD'
  | 'DIV'
  | 'EOF';

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly pos: number;
}

export const AXIS_NAMES = [
  'ancestor',
  'ancestor-or-self',
  'attribute',
  'child',
  'descendant',
  'descendant-or-self',
  'following',
  'following-sibling',
  'namespace',
  'parent',
  'preceding',
  'preceding-sibling',
  'self',
] as const;

export type AxisName = (typeof AXIS_NAMES)[number];

export const NODE_TYPES = ['comment', 'text', 'processing-instruction', 'node'] as const;

export type NodeTypeName = (typeof NODE_TYPES)[number];

const KEYWORDS = new Map<string, TokenType>([
  ['and', 'AND'],
  ['or', 'OR'],
  ['mod', 'MOD'],
  ['div', 'DIV'],
]);

const SINGLE_CHAR: Record<string, TokenType> = {
  '|': 'PIPE',
  '+': 'PLUS',
  '-': 'MINUS',
  '*': 'STAR',
  '=': 'EQ',
  '(': 'LPAREN',
  ')': 'RPAREN',
  '[': 'LBRACKET',
  ']': 'RBRACKET',
  ',': 'COMMA',
  '@': 'AT',
  $: 'DOLLAR',
};

const ESCAPES: Record<string, string> = {
  t: '\t',
  n: '\n',
  r: '\r',
  '\\': '\\',
  '"': '"',
  "'": "'",
};

const NAME_START = /[\p{L}_]/u;
const NAME_CHAR = /[\p{L}\p{N}_\-.]/u;
const DIGIT = /[0-9]/;

export function isAxisName(value: string): value is AxisName {
  return AXIS_NAMES.some((name) => name === value);
}

export function isNodeTypeName(value: string): value is NodeTypeName {
  return NODE_TYPES.some((name) => name === value);
}

export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  const fail = (message: string, pos: number): never => {
    throw new XPathSyntaxError(`${message} at position ${pos}`, {
      expression: input,
      position: pos,
      token: input[pos],
    });
  };

  const push = (type: TokenType, value: string, pos: number): void => {
    tokens.push({ type, value, pos });
  };

  function scanString(start: number, quote: string): number {
    let pos = start + 1;
    let value = '';
    while (pos < input.length && input[pos] !== quote) {
      if (input[pos] === '\\' && pos + 1 < input.length) {
        pos++;
        value += ESCAPES[input[pos]] ?? input[pos];
      } else {
        value += input[pos];
      }
      pos++;
    }
    if (pos >= input.length) {
      fail('Unterminated string literal', start);
    }
    push('STRING', value, start);
    return pos + 1;
  }

  function scanNumber(start: number): number {
    let pos = start;
    while (pos < input.length && DIGIT.test(input[pos])) pos++;
    if (input[pos] === '.' && input[pos + 1] !== '.') {
      pos++;
      while (pos < input.length && DIGIT.test(input[pos])) pos++;
    }
    push('NUMBER', input.slice(start, pos), start);
    return pos;
  }

  function scanName(start: number): number {
    let pos = start;
    while (pos < input.length && NAME_CHAR.test(input[pos])) {
      // `..` after a name is an abbreviated step, never part of it
      if (input[pos] === '.' && input[pos + 1] === '.') break;
      pos++;
    }
    const value = input.slice(start, pos);
    const keyword = KEYWORDS.get(value);

    if (isAxisName(value) && input.startsWith('::', pos)) {
      push('AXIS', value, start);
    } else if (keyword) {
      push(keyword, value, start);
    } else if (isNodeTypeName(value)) {
      push('NODE_TYPE', value, start);
    } else {
      push('NAME', value, start);
    }
    return pos;
  }

  while (i < input.length) {
    const ch = input[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    const start = i;
    const next = input[i + 1];

    // two-char operators
    if (ch === '/') {
      if (next === '/') { push('DSLASH', '//', start); i += 2; } else { push('SLASH', '/', start); i++; }
      continue;
    }
    if (ch === ':') {
      if (next === ':') { push('DCOLON', '::', start); i += 2; } else { push('COLON', ':', start); i++; }
      continue;
    }
    if (ch === '<') {
      if (next === '=') { push('LTE', '<=', start); i += 2; } else { push('LT', '<', start); i++; }
      continue;
    }
    if (ch === '>') {
      if (next === '=') { push('GTE', '>=', start); i += 2; } else { push('GT', '>', start); i++; }
      continue;
    }
    if (ch === '!') {
      if (next !== '=') fail(`Unexpected '!'`, start);
      push('NEQ', '!=', start);
      i += 2;
      continue;
    }
    if (ch === '.') {
      if (next === '.') {
        push('DDOT', '..', start);
        i += 2;
      } else if (next !== undefined && DIGIT.test(next)) {
        i = scanNumber(start);
      } else {
        push('DOT', '.', start);
        i++;
      }
      continue;
    }

    const single = SINGLE_CHAR[ch];
    if (single) {
      push(single, ch, start);
      i++;
      continue;
    }

    if (ch === '"' || ch === "'") {
      i = scanString(start, ch);
      continue;
    }

    if (DIGIT.test(ch)) {
      i = scanNumber(start);
      continue;
    }

    if (NAME_START.test(ch)) {
      i = scanName(start);
      continue;
    }

    fail(`Unexpected character '${ch}'`, start);
  }

  push('EOF', '', i);
  return tokens;
}
