import { describe, it, expect } from 'vitest';
import {
  EvaluationError,
  FunctionError,
  GeneratorError,
  NodeTypeError,
  XPathError,
  XPathErrorCode,
  XPathSyntaxError,
  isXPathError,
} from '../src/errors.js';

describe('errors', () => {
  it('describes syntax errors with position and token', () => {
    const err = new XPathSyntaxError('Bad at position 2', { expression: 'a b', position: 2, token: 'b' });
    expect(err.code).toBe(XPathErrorCode.SYNTAX);
    expect(err.name).toBe('XPathSyntaxError');
    expect(err.describe()).toBe('Bad at position 2\n  Expression: a b\n  Position: 2\n  Unexpected token: "b"');
  });

  it('leaves out unknown details', () => {
    expect(new XPathSyntaxError('Bad').describe()).toBe('Bad');
    expect(new EvaluationError('Failed', { step: 'child::a' }).describe()).toBe('Failed\n  Step: child::a');
  });

  it('describes function and node type errors', () => {
    const fn = new FunctionError('Wrong arity', { functionName: 'concat', argumentCount: 1 });
    expect(fn.code).toBe('XPATH_FUNCTION');
    expect(fn.describe()).toBe('Wrong arity\n  Function: concat\n  Arguments: 1');

    const node = new NodeTypeError('Unsupported', { nodeType: 'attribute', operation: 'namespace axis' });
    expect(node.code).toBe('XPATH_NODE_TYPE');
    expect(node.describe()).toBe('Unsupported\n  Node type: attribute\n  Operation: namespace axis');
  });

  it('reports generator errors as evaluation errors', () => {
    const err = new GeneratorError('Cannot render');
    expect(err).toBeInstanceOf(EvaluationError);
    expect(err).toBeInstanceOf(XPathError);
    expect(err.code).toBe(XPathErrorCode.EVALUATION);
    expect(err.name).toBe('GeneratorError');
  });

  it('keeps the cause', () => {
    const cause = new TypeError('inner');
    expect(new EvaluationError('Query failed: inner', { cause }).cause).toBe(cause);
    expect(new EvaluationError('No cause').cause).toBeUndefined();
  });

  it('recognizes engine errors', () => {
    expect(isXPathError(new NodeTypeError('x'))).toBe(true);
    expect(isXPathError(new Error('x'))).toBe(false);
    expect(isXPathError('x')).toBe(false);
  });
});
