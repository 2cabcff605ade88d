import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { toEngineConfig } from '../../config/schema.js';
import { xmlAdapter } from '../../dom/adapter.js';
import { qualifiedName } from '../../dom/types.js';
import type { XmlNode } from '../../dom/types.js';
import { parseXml } from '../../dom/xml.js';
import { XPathEngine } from '../../engine/engine.js';
import { isXPathError } from '../../errors.js';
import { toXPathString } from '../../runtime/conversion.js';
import { NodeSet } from '../../runtime/node-set.js';
import type { XPathValue } from '../../runtime/types.js';
import { loadSettings } from '../settings.js';

export interface EvalOptions {
  expression: string;
  file: string;
  /** Prefix bindings from `--ns`, applied over the configured ones. */
  namespaces?: Record<string, string>;
  config?: string;
  json?: boolean;
  verbose?: boolean;
  cwd?: string;
}

export interface NodeSummary {
  kind: string;
  name: string | null;
  value: string;
}

export type EvalValue =
  | { type: 'node-set'; nodes: NodeSummary[] }
  | { type: 'string'; value: string }
  | { type: 'number'; value: number }
  | { type: 'boolean'; value: boolean };

export interface EvalResult {
  success: boolean;
  result?: EvalValue;
  error?: string;
}

function nodeName(node: XmlNode): string | null {
  switch (node.type) {
    case 'element':
    case 'attribute':
      return qualifiedName(node);
    case 'processing-instruction':
      return node.target;
    default:
      return null;
  }
}

function summarize(value: XPathValue<XmlNode>): EvalValue {
  if (value instanceof NodeSet) {
    return {
      type: 'node-set',
      nodes: value.map((node) => ({
        kind: node.type,
        name: nodeName(node),
        value: xmlAdapter.text(node),
      })),
    };
  }
  switch (typeof value) {
    case 'string':
      return { type: 'string', value };
    case 'number':
      return { type: 'number', value };
    default:
      return { type: 'boolean', value };
  }
}

/** One line per node: kind, name where it has one, string value. */
export function formatNode(node: NodeSummary): string {
  const label = node.name === null ? node.kind : `${node.kind} ${node.name}`;
  return `${label}: ${JSON.stringify(node.value)}`;
}

function report(result: EvalValue, json: boolean | undefined): void {
  if (json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }
  if (result.type !== 'node-set') {
    console.log(typeof result.value === 'number' ? toXPathString(result.value) : String(result.value));
    return;
  }
  for (const node of result.nodes) {
    console.log(formatNode(node));
  }
  console.log(`${result.nodes.length} node(s)`);
}

function errorMessage(err: unknown): string {
  if (isXPathError(err)) return err.describe();
  return err instanceof Error ? err.message : String(err);
}

export function evalCommand(options: EvalOptions): EvalResult {
  const { config, logger } = loadSettings(options);
  const path = resolve(options.cwd ?? process.cwd(), options.file);

  let xml: string;
  try {
    xml = readFileSync(path, 'utf-8');
  } catch (err) {
    const error = `Cannot read ${options.file}: ${errorMessage(err)}`;
    console.error(error);
    return { success: false, error };
  }

  try {
    const document = parseXml(xml);
    const engine = new XPathEngine(xmlAdapter, toEngineConfig(config, logger));
    const value = engine.evaluate(options.expression, document, { namespaces: options.namespaces });
    const result = summarize(value);
    report(result, options.json);
    return { success: true, result };
  } catch (err) {
    const error = errorMessage(err);
    console.error(error);
    return { success: false, error };
  }
}
