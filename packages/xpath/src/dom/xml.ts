/**
 * XML text loader built on fast-xml-parser.
 *
 * The input is validated first, then parsed in order-preserving mode and
 * handed to the tree builder, so namespaces resolve exactly as they do for
 * hand-built documents.
 *
 * @module dom/xml
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { cdata, comment, doc, el, pi, text } from './builder.js';
import type { NodeSpec } from './builder.js';
import type { XmlDocument } from './types.js';

export interface XmlParseErrorDetails {
  code?: string;
  line?: number;
  column?: number;
}

export class XmlParseError extends Error {
  readonly code: string | undefined;
  readonly line: number | undefined;
  readonly column: number | undefined;

  constructor(message: string, details: XmlParseErrorDetails = {}) {
    super(message);
    this.name = 'XmlParseError';
    this.code = details.code;
    this.line = details.line;
    this.column = details.column;
  }
}

const ATTRIBUTES = ':@';
const TEXT = '#text';
const COMMENT = '#comment';
const CDATA = '#cdata';

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  // processing instruction data is read as attributes; keep bare words
  allowBooleanAttributes: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  textNodeName: TEXT,
  commentPropName: COMMENT,
  cdataPropName: CDATA,
  ignoreDeclaration: true,
  ignorePiTags: false,
});

/**
 * Parse XML text into a document. Malformed input raises `XmlParseError`
 * with the line and column reported by the validator.
 */
export function parseXml(xml: string): XmlDocument {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { code, msg, line, col } = validation.err;
    throw new XmlParseError(`Invalid XML: ${msg} (line ${line}, column ${col})`, {
      code,
      line,
      column: col,
    });
  }
  const parsed: unknown = parser.parse(xml);
  return doc(...toSpecs(parsed));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function entries(value: unknown): unknown[] {
  if (!Array.isArray(value)) {
    throw new XmlParseError('Unexpected parser output: expected a node list');
  }
  const items: unknown[] = value;
  return items;
}

function toSpecs(value: unknown): NodeSpec[] {
  const specs: NodeSpec[] = [];
  for (const entry of entries(value)) {
    if (!isRecord(entry)) continue;
    const spec = toSpec(entry);
    if (spec) specs.push(spec);
  }
  return specs;
}

function toSpec(entry: Record<string, unknown>): NodeSpec | null {
  const key = Object.keys(entry).find((name) => name !== ATTRIBUTES);
  if (key === undefined) return null;
  const content = entry[key];

  switch (key) {
    case TEXT:
      return text(String(content));
    case COMMENT:
      return comment(innerText(content));
    case CDATA:
      return cdata(innerText(content));
  }

  if (key.startsWith('?')) {
    return pi(key.slice(1), instructionData(entry[ATTRIBUTES]));
  }
  return el(key, attributesOf(entry[ATTRIBUTES]), toSpecs(content));
}

function innerText(content: unknown): string {
  return entries(content)
    .map((item) => (isRecord(item) && TEXT in item ? String(item[TEXT]) : ''))
    .join('');
}

function attributesOf(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(value)) return attributes;
  for (const [name, raw] of Object.entries(value)) {
    attributes[name] = String(raw);
  }
  return attributes;
}

/** Rebuild processing instruction data from the pseudo-attributes read out of it. */
function instructionData(value: unknown): string {
  if (!isRecord(value)) return '';
  return Object.entries(value)
    .map(([name, raw]) => (raw === true ? name : `${name}="${String(raw)}"`))
    .join(' ');
}
