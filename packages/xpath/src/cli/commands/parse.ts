import { parse } from '../../compiler/index.js';
import type { QueryAst } from '../../compiler/ast.js';
import { isXPathError } from '../../errors.js';

export interface ParseOptions {
  expression: string;
}

export interface ParseResult {
  success: boolean;
  ast?: QueryAst;
  error?: string;
}

/**
 * Print the query AST as JSON.
 */
export function parseCommand(options: ParseOptions): ParseResult {
  try {
    const ast = parse(options.expression);
    console.log(JSON.stringify(ast, null, 2));
    return { success: true, ast };
  } catch (err) {
    if (!isXPathError(err)) throw err;
    const error = err.describe();
    console.error(error);
    return { success: false, error };
  }
}
