/**
 * Code AST: the imperative tree the lowering pass produces and the
 * generator renders to JavaScript.
 *
 * @module codegen/ir
 */

export type CodeOperator = '&&' | '||' | '===' | '!==' | '+' | '-' | '*' | '/' | '%';

export interface LiteralCode {
  readonly kind: 'literal';
  readonly value: string | number | boolean | null;
}

export interface IdentifierCode {
  readonly kind: 'identifier';
  readonly name: string;
}

export interface DeclareCode {
  readonly kind: 'declare';
  readonly name: string;
  readonly value: CodeNode;
}

export interface AssignCode {
  readonly kind: 'assign';
  readonly name: string;
  readonly value: CodeNode;
}

export interface SequenceCode {
  readonly kind: 'sequence';
  readonly body: readonly CodeNode[];
}

export interface IfCode {
  readonly kind: 'if';
  readonly condition: CodeNode;
  readonly then: CodeNode;
  readonly otherwise: CodeNode | null;
}

export interface ForOfCode {
  readonly kind: 'for_of';
  readonly variable: string;
  readonly iterable: CodeNode;
  readonly body: CodeNode;
}

export interface FunctionCode {
  readonly kind: 'function';
  readonly name: string | null;
  readonly params: readonly string[];
  readonly body: CodeNode;
}

export interface CallCode {
  readonly kind: 'call';
  readonly callee: CodeNode;
  readonly args: readonly CodeNode[];
}

export interface MethodCode {
  readonly kind: 'method';
  readonly receiver: CodeNode;
  readonly name: string;
  readonly args: readonly CodeNode[];
}

export interface ArrayCode {
  readonly kind: 'array';
  readonly elements: readonly CodeNode[];
}

export interface BinaryCode {
  readonly kind: 'binary';
  readonly operator: CodeOperator;
  readonly left: CodeNode;
  readonly right: CodeNode;
}

export interface NotCode {
  readonly kind: 'not';
  readonly operand: CodeNode;
}

export interface NegateCode {
  readonly kind: 'negate';
  readonly operand: CodeNode;
}

export interface ReturnCode {
  readonly kind: 'return';
  readonly value: CodeNode | null;
}

export type CodeNode =
  | LiteralCode
  | IdentifierCode
  | DeclareCode
  | AssignCode
  | SequenceCode
  | IfCode
  | ForOfCode
  | FunctionCode
  | CallCode
  | MethodCode
  | ArrayCode
  | BinaryCode
  | NotCode
  | NegateCode
  | ReturnCode;

// -- builders -----------------------------------------------------------

export const literal = (value: LiteralCode['value']): LiteralCode => ({ kind: 'literal', value });

export const identifier = (name: string): IdentifierCode => ({ kind: 'identifier', name });

export const declare = (name: string, value: CodeNode): DeclareCode => ({ kind: 'declare', name, value });

export const assign = (name: string, value: CodeNode): AssignCode => ({ kind: 'assign', name, value });

export const sequence = (...body: CodeNode[]): SequenceCode => ({ kind: 'sequence', body });

export const ifThen = (condition: CodeNode, then: CodeNode, otherwise: CodeNode | null = null): IfCode => ({
  kind: 'if',
  condition,
  then,
  otherwise,
});

export const forOf = (variable: string, iterable: CodeNode, body: CodeNode): ForOfCode => ({
  kind: 'for_of',
  variable,
  iterable,
  body,
});

export const fn = (params: readonly string[], body: CodeNode, name: string | null = null): FunctionCode => ({
  kind: 'function',
  name,
  params,
  body,
});

export const call = (callee: CodeNode, ...args: CodeNode[]): CallCode => ({ kind: 'call', callee, args });

export const method = (receiver: CodeNode, name: string, ...args: CodeNode[]): MethodCode => ({
  kind: 'method',
  receiver,
  name,
  args,
});

export const array = (...elements: CodeNode[]): ArrayCode => ({ kind: 'array', elements });

export const binary = (operator: CodeOperator, left: CodeNode, right: CodeNode): BinaryCode => ({
  kind: 'binary',
  operator,
  left,
  right,
});

export const not = (operand: CodeNode): NotCode => ({ kind: 'not', operand });

export const negate = (operand: CodeNode): NegateCode => ({ kind: 'negate', operand });

export const ret = (value: CodeNode | null = null): ReturnCode => ({ kind: 'return', value });
