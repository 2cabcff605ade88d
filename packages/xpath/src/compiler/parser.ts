/**
 * Recursive descent parser for XPath 1.0 expressions.
 *
 * Grammar:
 *   expr           -> or_expr
 *   or_expr        -> and_expr ('or' and_expr)*
 *   and_expr       -> equality ('and' equality)*
 *   equality       -> relational (('=' | '!=') relational)*
 *   relational     -> additive (('<' | '>' | '<=' | '>=') additive)*
 *   additive       -> multiplicative (('+' | '-') multiplicative)*
 *   multiplicative -> unary (('*' | 'div' | 'mod') unary)*
 *   unary          -> '-' unary | union
 *   union          -> path_expr ('|' path_expr)*
 *   path_expr      -> '/' relative? | '//' relative
 *                   | filter (('/' | '//') relative)?
 *                   | relative
 *   filter         -> primary predicate*
 *   primary        -> '$' NAME | '(' expr ')' | STRING | NUMBER | NAME '(' args ')'
 *   relative       -> step (('/' | '//') step)*
 *   step           -> AXIS '::' node_test predicate* | '@' node_test predicate*
 *                   | '.' | '..' | node_test predicate*
 *   predicate      -> '[' expr ']'
 *
 * @module compiler/parser
 */

import { XPathSyntaxError } from '../errors.js';
import type { AxisName, Token, TokenType } from './lexer.js';
import { exceedsDepth } from './ast.js';
import type { AxisNode, BinaryKind, NodeTest, PredicateNode, QueryAst } from './ast.js';

export const MAX_DEPTH = 100;

const EQUALITY_OPS: Partial<Record<TokenType, BinaryKind>> = { EQ: 'eq', NEQ: 'neq' };

const RELATIONAL_OPS: Partial<Record<TokenType, BinaryKind>> = {
  LT: 'lt',
  GT: 'gt',
  LTE: 'lte',
  GTE: 'gte',
};

const ADDITIVE_OPS: Partial<Record<TokenType, BinaryKind>> = { PLUS: 'plus', MINUS: 'minus' };

const MULTIPLICATIVE_OPS: Partial<Record<TokenType, BinaryKind>> = {
  STAR: 'star',
  DIV: 'div',
  MOD: 'mod',
};

/** Tokens that read as a plain name where a node test is expected. */
const NAME_LIKE: ReadonlySet<TokenType> = new Set<TokenType>([
  'NAME',
  'NODE_TYPE',
  'AND',
  'OR',
  'MOD',
  'DIV',
]);

const STEP_START: ReadonlySet<TokenType> = new Set<TokenType>([
  ...NAME_LIKE,
  'AXIS',
  'AT',
  'DOT',
  'DDOT',
  'STAR',
]);

const DESCENDANT_OR_SELF: AxisNode = {
  kind: 'axis',
  axis: 'descendant-or-self',
  test: { kind: 'node_type', type: 'node', target: null },
  predicates: [],
};

/**
 * Parse a token stream produced by `tokenize`. `expression` is the source
 * text, attached to any syntax error.
 */
export function parseTokens(tokens: readonly Token[], expression: string): QueryAst {
  let cursor = 0;
  let depth = 0;

  function peek(offset = 0): Token {
    return tokens[Math.min(cursor + offset, tokens.length - 1)];
  }

  function advance(): Token {
    const tok = peek();
    if (cursor < tokens.length - 1) cursor++;
    return tok;
  }

  function fail(message: string, tok: Token): never {
    throw new XPathSyntaxError(`${message} at position ${tok.pos}`, {
      expression,
      position: tok.pos,
      token: tok.type === 'EOF' ? undefined : tok.value,
    });
  }

  function describe(tok: Token): string {
    return tok.type === 'EOF' ? 'end of expression' : `token '${tok.value}'`;
  }

  function expect(type: TokenType, what: string): Token {
    const tok = peek();
    if (tok.type !== type) {
      fail(`Expected ${what}, got ${describe(tok)}`, tok);
    }
    return advance();
  }

  function match(...types: TokenType[]): Token | null {
    if (types.includes(peek().type)) {
      return advance();
    }
    return null;
  }

  function enterDepth(): void {
    depth++;
    if (depth > MAX_DEPTH) {
      fail(`Expression exceeds maximum depth of ${MAX_DEPTH}`, peek());
    }
  }

  function exitDepth(): void {
    depth--;
  }

  function expr(): QueryAst {
    enterDepth();
    const node = orExpr();
    exitDepth();
    return node;
  }

  function orExpr(): QueryAst {
    let left = andExpr();
    while (match('OR')) {
      left = { kind: 'or', left, right: andExpr() };
    }
    return left;
  }

  function andExpr(): QueryAst {
    let left = binaryLevel(EQUALITY_OPS, relational);
    while (match('AND')) {
      left = { kind: 'and', left, right: binaryLevel(EQUALITY_OPS, relational) };
    }
    return left;
  }

  function relational(): QueryAst {
    return binaryLevel(RELATIONAL_OPS, additive);
  }

  function additive(): QueryAst {
    return binaryLevel(ADDITIVE_OPS, multiplicative);
  }

  function multiplicative(): QueryAst {
    return binaryLevel(MULTIPLICATIVE_OPS, unary);
  }

  function binaryLevel(
    ops: Partial<Record<TokenType, BinaryKind>>,
    operand: () => QueryAst,
  ): QueryAst {
    let left = operand();
    let kind = ops[peek().type];
    while (kind) {
      advance();
      left = { kind, left, right: operand() };
      kind = ops[peek().type];
    }
    return left;
  }

  function unary(): QueryAst {
    if (match('MINUS')) {
      enterDepth();
      const operand = unary();
      exitDepth();
      return { kind: 'negate', operand };
    }
    return union();
  }

  function union(): QueryAst {
    let left = pathExpr();
    while (match('PIPE')) {
      left = { kind: 'union', left, right: pathExpr() };
    }
    return left;
  }

  function pathExpr(): QueryAst {
    const tok = peek();

    if (tok.type === 'SLASH') {
      advance();
      if (!STEP_START.has(peek().type)) {
        return { kind: 'absolute_path', steps: [] };
      }
      return { kind: 'absolute_path', steps: relativeSteps() };
    }

    if (tok.type === 'DSLASH') {
      advance();
      return { kind: 'absolute_path', steps: [DESCENDANT_OR_SELF, ...relativeSteps()] };
    }

    if (startsPrimary()) {
      const filter = filterExpr();
      const separator = match('SLASH', 'DSLASH');
      if (!separator) return filter;
      const steps = relativeSteps();
      return {
        kind: 'path',
        filter,
        steps: separator.type === 'DSLASH' ? [DESCENDANT_OR_SELF, ...steps] : steps,
      };
    }

    if (STEP_START.has(tok.type)) {
      return { kind: 'relative_path', steps: relativeSteps() };
    }

    return fail(`Unexpected ${describe(tok)}`, tok);
  }

  function startsPrimary(): boolean {
    const tok = peek();
    switch (tok.type) {
      case 'DOLLAR':
      case 'LPAREN':
      case 'STRING':
      case 'NUMBER':
        return true;
      case 'NAME':
        return peek(1).type === 'LPAREN';
      default:
        return false;
    }
  }

  function filterExpr(): QueryAst {
    const primary = primaryExpr();
    const predicates = predicateList();
    return predicates.length === 0 ? primary : { kind: 'filter', primary, predicates };
  }

  function primaryExpr(): QueryAst {
    const tok = advance();

    switch (tok.type) {
      case 'STRING':
        return { kind: 'string', value: tok.value };
      case 'NUMBER':
        return { kind: 'number', value: Number(tok.value) };
      case 'DOLLAR':
        return { kind: 'variable', name: qualifiedName('variable name') };
      case 'LPAREN': {
        const node = expr();
        expect('RPAREN', "')'");
        return node;
      }
      case 'NAME': {
        expect('LPAREN', "'('");
        const args: QueryAst[] = [];
        if (peek().type !== 'RPAREN') {
          args.push(expr());
          while (match('COMMA')) {
            args.push(expr());
          }
        }
        expect('RPAREN', "')'");
        return { kind: 'function', name: tok.value, args };
      }
      default:
        return fail(`Unexpected ${describe(tok)}`, tok);
    }
  }

  function qualifiedName(what: string): string {
    const tok = peek();
    if (!NAME_LIKE.has(tok.type)) {
      fail(`Expected ${what}, got ${describe(tok)}`, tok);
    }
    advance();
    if (peek().type === 'COLON' && NAME_LIKE.has(peek(1).type)) {
      advance();
      return `${tok.value}:${advance().value}`;
    }
    return tok.value;
  }

  function relativeSteps(): AxisNode[] {
    const steps = [step()];
    let separator: Token | null;
    while ((separator = match('SLASH', 'DSLASH'))) {
      if (separator.type === 'DSLASH') steps.push(DESCENDANT_OR_SELF);
      steps.push(step());
    }
    return steps;
  }

  function step(): AxisNode {
    const tok = peek();

    if (tok.type === 'DOT') {
      advance();
      return abbreviated('self');
    }
    if (tok.type === 'DDOT') {
      advance();
      return abbreviated('parent');
    }

    let axis: AxisName = 'child';
    if (tok.type === 'AXIS') {
      advance();
      expect('DCOLON', "'::'");
      axis = axisOf(tok);
    } else if (match('AT')) {
      axis = 'attribute';
    }

    const test = nodeTest();
    return { kind: 'axis', axis, test, predicates: predicateList() };
  }

  function abbreviated(axis: AxisName): AxisNode {
    return {
      kind: 'axis',
      axis,
      test: { kind: 'node_type', type: 'node', target: null },
      predicates: [],
    };
  }

  function axisOf(tok: Token): AxisName {
    switch (tok.value) {
      case 'ancestor':
      case 'ancestor-or-self':
      case 'attribute':
      case 'child':
      case 'descendant':
      case 'descendant-or-self':
      case 'following':
      case 'following-sibling':
      case 'namespace':
      case 'parent':
      case 'preceding':
      case 'preceding-sibling':
      case 'self':
        return tok.value;
      default:
        return fail(`Unknown axis '${tok.value}'`, tok);
    }
  }

  function nodeTest(): NodeTest {
    const tok = peek();

    if (tok.type === 'STAR') {
      advance();
      return { kind: 'wildcard', prefix: null };
    }

    if (tok.type === 'NODE_TYPE' && peek(1).type === 'LPAREN') {
      advance();
      advance();
      let target: string | null = null;
      if (tok.value === 'processing-instruction' && peek().type === 'STRING') {
        target = advance().value;
      }
      expect('RPAREN', "')'");
      switch (tok.value) {
        case 'comment':
        case 'text':
        case 'node':
        case 'processing-instruction':
          return { kind: 'node_type', type: tok.value, target };
        default:
          return fail(`Unknown node type '${tok.value}'`, tok);
      }
    }

    if (!NAME_LIKE.has(tok.type)) {
      return fail(`Expected node test, got ${describe(tok)}`, tok);
    }
    advance();

    if (peek().type === 'DCOLON') {
      fail(`Unknown axis '${tok.value}'`, tok);
    }

    if (peek().type === 'COLON') {
      advance();
      const local = peek();
      if (local.type === 'STAR') {
        advance();
        return { kind: 'wildcard', prefix: tok.value };
      }
      if (!NAME_LIKE.has(local.type)) {
        fail(`Expected local name after '${tok.value}:', got ${describe(local)}`, local);
      }
      advance();
      return { kind: 'test', prefix: tok.value, name: local.value };
    }

    return { kind: 'test', prefix: null, name: tok.value };
  }

  function predicateList(): PredicateNode[] {
    const predicates: PredicateNode[] = [];
    while (match('LBRACKET')) {
      predicates.push({ kind: 'predicate', expr: expr() });
      expect('RBRACKET', "']'");
    }
    return predicates;
  }

  if (peek().type === 'EOF') {
    fail('Empty expression', peek());
  }

  const result = expr();
  if (peek().type !== 'EOF') {
    const tok = peek();
    fail(`Unexpected ${describe(tok)} after expression`, tok);
  }
  // operator chains and steps are parsed in loops, so measure the result too
  if (exceedsDepth(result, MAX_DEPTH)) {
    fail(`Expression exceeds maximum depth of ${MAX_DEPTH}`, peek());
  }
  return result;
}
