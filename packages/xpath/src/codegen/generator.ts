/**
 * Renders a code AST to JavaScript source.
 *
 * Purely syntactic: every semantic check happens during lowering. Binary
 * expressions are always parenthesized, so no precedence table is needed.
 *
 * @module codegen/generator
 */

import { GeneratorError } from '../errors.js';
import type { CodeNode, FunctionCode, LiteralCode } from './ir.js';

const INDENT = '  ';
const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

export function render(node: CodeNode): string {
  return statement(node, 0);
}

function statement(node: CodeNode, depth: number): string {
  const pad = INDENT.repeat(depth);

  switch (node.kind) {
    case 'declare':
      return `${pad}let ${name(node.name)} = ${expression(node.value, depth)};`;
    case 'assign':
      return `${pad}${name(node.name)} = ${expression(node.value, depth)};`;
    case 'sequence':
      return node.body
        .map((child) => statement(child, depth))
        .filter((line) => line !== '')
        .join('\n');
    case 'if': {
      const head = `${pad}if (${expression(node.condition, depth)}) ${braces(node.then, depth)}`;
      return node.otherwise === null ? head : `${head} else ${braces(node.otherwise, depth)}`;
    }
    case 'for_of':
      return `${pad}for (const ${name(node.variable)} of ${expression(node.iterable, depth)}) ${braces(node.body, depth)}`;
    case 'return':
      return node.value === null ? `${pad}return;` : `${pad}return ${expression(node.value, depth)};`;
    case 'function':
      // a leading `function` keyword would start a declaration
      return `${pad}(${expression(node, depth)});`;
    default:
      return `${pad}${expression(node, depth)};`;
  }
}

function braces(body: CodeNode, depth: number): string {
  const inner = statement(body, depth + 1);
  return inner === '' ? '{}' : `{\n${inner}\n${INDENT.repeat(depth)}}`;
}

function expression(node: CodeNode, depth: number): string {
  switch (node.kind) {
    case 'literal':
      return renderLiteral(node.value);
    case 'identifier':
      return name(node.name);
    case 'function':
      return renderFunction(node, depth);
    case 'call': {
      const callee = expression(node.callee, depth);
      const target = node.callee.kind === 'function' ? `(${callee})` : callee;
      return `${target}(${list(node.args, depth)})`;
    }
    case 'method': {
      const receiver = expression(node.receiver, depth);
      const target =
        node.receiver.kind === 'function' || node.receiver.kind === 'literal' ? `(${receiver})` : receiver;
      return `${target}.${name(node.name)}(${list(node.args, depth)})`;
    }
    case 'array':
      return `[${list(node.elements, depth)}]`;
    case 'binary':
      return `(${expression(node.left, depth)} ${node.operator} ${expression(node.right, depth)})`;
    case 'not':
      return `!${expression(node.operand, depth)}`;
    case 'negate':
      return `(-${expression(node.operand, depth)})`;
    case 'declare':
    case 'assign':
    case 'sequence':
    case 'if':
    case 'for_of':
    case 'return':
      throw new GeneratorError(`Cannot render '${node.kind}' statement in expression position`);
  }
}

function renderFunction(node: FunctionCode, depth: number): string {
  const label = node.name === null ? '' : ` ${name(node.name)}`;
  return `function${label}(${node.params.map(name).join(', ')}) ${braces(node.body, depth)}`;
}

function renderLiteral(value: LiteralCode['value']): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value !== 'number') return String(value);
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return 'Infinity';
  if (value === -Infinity) return '(-Infinity)';
  if (Object.is(value, -0)) return '(-0)';
  return value < 0 ? `(${value})` : String(value);
}

function list(nodes: readonly CodeNode[], depth: number): string {
  return nodes.map((node) => expression(node, depth)).join(', ');
}

function name(value: string): string {
  if (!IDENTIFIER.test(value)) {
    throw new GeneratorError(`Invalid identifier: ${JSON.stringify(value)}`);
  }
  return value;
}
