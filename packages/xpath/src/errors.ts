/**
 * Error taxonomy for query compilation and evaluation.
 *
 * Every error raised by the engine extends {@link XPathError} and carries
 * the expression it was raised for, when known. `code` values are stable
 * and safe to match against.
 *
 * @module errors
 */

export const XPathErrorCode = {
  SYNTAX: 'XPATH_SYNTAX',
  EVALUATION: 'XPATH_EVALUATION',
  FUNCTION: 'XPATH_FUNCTION',
  NODE_TYPE: 'XPATH_NODE_TYPE',
} as const;

export type XPathErrorCode = (typeof XPathErrorCode)[keyof typeof XPathErrorCode];

export interface XPathErrorOptions {
  expression?: string;
  cause?: unknown;
}

export class XPathError extends Error {
  readonly expression: string | undefined;

  constructor(
    message: string,
    public readonly code: XPathErrorCode,
    options: XPathErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'XPathError';
    this.expression = options.expression;
  }

  /**
   * The message followed by one indented line per known detail.
   */
  describe(): string {
    const lines = [this.message];
    if (this.expression !== undefined) lines.push(`  Expression: ${this.expression}`);
    for (const [label, value] of this.details()) {
      lines.push(`  ${label}: ${value}`);
    }
    return lines.join('\n');
  }

  protected details(): Array<[string, string]> {
    return [];
  }
}

export interface SyntaxErrorOptions extends XPathErrorOptions {
  position?: number;
  token?: string;
}

/**
 * Raised by the lexer and parser. The expression is rejected as a whole;
 * there is no partial result.
 */
export class XPathSyntaxError extends XPathError {
  readonly position: number | undefined;
  readonly token: string | undefined;

  constructor(message: string, options: SyntaxErrorOptions = {}) {
    super(message, XPathErrorCode.SYNTAX, options);
    this.name = 'XPathSyntaxError';
    this.position = options.position;
    this.token = options.token;
  }

  protected override details(): Array<[string, string]> {
    const details: Array<[string, string]> = [];
    if (this.position !== undefined) details.push(['Position', String(this.position)]);
    if (this.token !== undefined) details.push(['Unexpected token', JSON.stringify(this.token)]);
    return details;
  }
}

export interface EvaluationErrorOptions extends XPathErrorOptions {
  step?: string;
}

/**
 * Raised when a query cannot be lowered, loaded or run.
 */
export class EvaluationError extends XPathError {
  readonly step: string | undefined;

  constructor(message: string, options: EvaluationErrorOptions = {}) {
    super(message, XPathErrorCode.EVALUATION, options);
    this.name = 'EvaluationError';
    this.step = options.step;
  }

  protected override details(): Array<[string, string]> {
    return this.step === undefined ? [] : [['Step', this.step]];
  }
}

/**
 * Raised when a code tree cannot be rendered, e.g. a statement placed where
 * an expression is required. Indicates a lowering bug, never bad input.
 */
export class GeneratorError extends EvaluationError {
  constructor(message: string, options: EvaluationErrorOptions = {}) {
    super(message, options);
    this.name = 'GeneratorError';
  }
}

export interface FunctionErrorOptions extends XPathErrorOptions {
  functionName?: string;
  argumentCount?: number;
}

export class FunctionError extends XPathError {
  readonly functionName: string | undefined;
  readonly argumentCount: number | undefined;

  constructor(message: string, options: FunctionErrorOptions = {}) {
    super(message, XPathErrorCode.FUNCTION, options);
    this.name = 'FunctionError';
    this.functionName = options.functionName;
    this.argumentCount = options.argumentCount;
  }

  protected override details(): Array<[string, string]> {
    const details: Array<[string, string]> = [];
    if (this.functionName !== undefined) details.push(['Function', this.functionName]);
    if (this.argumentCount !== undefined) details.push(['Arguments', String(this.argumentCount)]);
    return details;
  }
}

export interface NodeTypeErrorOptions extends XPathErrorOptions {
  nodeType?: string;
  operation?: string;
}

/**
 * Raised for operations the engine does not support on a kind of node,
 * such as walking the namespace axis.
 */
export class NodeTypeError extends XPathError {
  readonly nodeType: string | undefined;
  readonly operation: string | undefined;

  constructor(message: string, options: NodeTypeErrorOptions = {}) {
    super(message, XPathErrorCode.NODE_TYPE, options);
    this.name = 'NodeTypeError';
    this.nodeType = options.nodeType;
    this.operation = options.operation;
  }

  protected override details(): Array<[string, string]> {
    const details: Array<[string, string]> = [];
    if (this.nodeType !== undefined) details.push(['Node type', this.nodeType]);
    if (this.operation !== undefined) details.push(['Operation', this.operation]);
    return details;
  }
}

export function isXPathError(error: unknown): error is XPathError {
  return error instanceof XPathError;
}
