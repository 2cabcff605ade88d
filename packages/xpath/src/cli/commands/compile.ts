import { parse } from '../../compiler/index.js';
import { QueryCompiler } from '../../codegen/compiler.js';
import { isXPathError } from '../../errors.js';
import { loadSettings } from '../settings.js';

export interface CompileOptions {
  expression: string;
  namespaces?: Record<string, string>;
  config?: string;
  verbose?: boolean;
  cwd?: string;
}

export interface CompileResult {
  success: boolean;
  source?: string;
  error?: string;
}

/**
 * Print the JavaScript generated for an expression. The source is loaded
 * too, so a lowering that renders but does not compile is reported.
 */
export function compileCommand(options: CompileOptions): CompileResult {
  const { config, logger } = loadSettings(options);
  const namespaces = { ...config.namespaces, ...options.namespaces };
  try {
    const compiler = new QueryCompiler({ cacheSize: 1, logger });
    const { source } = compiler.compile(parse(options.expression), namespaces);
    console.log(source);
    return { success: true, source };
  } catch (err) {
    if (!isXPathError(err)) throw err;
    const error = err.describe();
    console.error(error);
    return { success: false, error };
  }
}
