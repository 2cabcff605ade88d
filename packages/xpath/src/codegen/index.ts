/**
 * Code generation back end: lowering, rendering and loading of queries.
 *
 * @module codegen
 */

export { QueryCompiler, CompiledQuery, compileKey } from './compiler.js';
export type { QueryCompilerOptions } from './compiler.js';
export { EvaluationContext } from './context.js';
export type { QueryFunction } from './context.js';
export { render } from './generator.js';
export { lowerQuery, returnsNodeSet } from './lowering.js';
export * as code from './ir.js';
export type { CodeNode, CodeOperator } from './ir.js';
