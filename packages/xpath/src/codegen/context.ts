/**
 * Loads generated query source into callable functions.
 *
 * Each context owns one `node:vm` context whose only global is the `define`
 * hook. Generated scripts are strict and declare no globals, so temporaries
 * of one query are never visible to another. Code generation from strings
 * is disabled inside the context.
 *
 * @module codegen/context
 */

import * as vm from 'node:vm';
import { EvaluationError } from '../errors.js';
import type { QueryRuntime } from '../runtime/runtime.js';
import type { XPathValue } from '../runtime/types.js';

export type QueryFunction = <N>(rt: QueryRuntime<N>, input: N) => XPathValue<N>;

export class EvaluationContext {
  private readonly sandbox: vm.Context;
  private defined: QueryFunction | undefined;
  private loaded = 0;

  constructor() {
    const define = (query: QueryFunction): void => {
      this.defined = query;
    };
    this.sandbox = vm.createContext(
      { define },
      { name: 'treequery', codeGeneration: { strings: false, wasm: false } },
    );
  }

  /** Number of scripts loaded so far. */
  get size(): number {
    return this.loaded;
  }

  /** Names of the global bindings visible to generated code. */
  globals(): string[] {
    return Object.keys(this.sandbox);
  }

  load(source: string): QueryFunction {
    let script: vm.Script;
    try {
      script = new vm.Script(source, { filename: `query-${this.loaded + 1}.js` });
    } catch (err) {
      throw new EvaluationError('Generated query source does not compile', { cause: err });
    }

    this.defined = undefined;
    try {
      script.runInContext(this.sandbox);
    } catch (err) {
      throw new EvaluationError('Generated query source failed to load', { cause: err });
    }

    const query = this.defined;
    this.defined = undefined;
    if (query === undefined) {
      throw new EvaluationError('Generated query source did not define a query');
    }
    this.loaded++;
    return query;
  }
}
