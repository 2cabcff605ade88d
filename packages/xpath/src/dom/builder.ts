/**
 * Tree builder for the XML document model.
 *
 * `el`, `text` and friends describe nodes; `doc` turns a description into
 * a linked, namespace-resolved document in one pass.
 *
 * @module dom/builder
 *
 * @example
 * ```typescript
 * const library = doc(
 *   el('library', { 'xmlns:dc': 'http://purl.org/dc/elements/1.1/' }, [
 *     el('book', { id: 'b1' }, [el('dc:title', {}, ['Dune'])]),
 *   ]),
 * );
 * ```
 */

import { XML_NAMESPACE } from '../runtime/functions.js';
import type {
  XmlAttribute,
  XmlChild,
  XmlDocument,
  XmlElement,
  XmlParent,
} from './types.js';

export interface ElementSpec {
  readonly type: 'element';
  readonly qname: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly children: readonly NodeSpec[];
}

export interface TextSpec {
  readonly type: 'text' | 'cdata' | 'comment';
  readonly value: string;
}

export interface ProcessingInstructionSpec {
  readonly type: 'processing-instruction';
  readonly target: string;
  readonly value: string;
}

export type NodeSpec = ElementSpec | TextSpec | ProcessingInstructionSpec;

/** Child descriptions; a bare string is a text node. */
export type ChildSpec = NodeSpec | string;

export function el(
  qname: string,
  attributes: Readonly<Record<string, string>> = {},
  children: readonly ChildSpec[] = [],
): ElementSpec {
  return { type: 'element', qname, attributes, children: children.map(toSpec) };
}

export function text(value: string): TextSpec {
  return { type: 'text', value };
}

export function cdata(value: string): TextSpec {
  return { type: 'cdata', value };
}

export function comment(value: string): TextSpec {
  return { type: 'comment', value };
}

export function pi(target: string, value = ''): ProcessingInstructionSpec {
  return { type: 'processing-instruction', target, value };
}

/**
 * Build a document from child descriptions, resolving namespace
 * declarations as it goes. The `xml` prefix is always bound.
 */
export function doc(...children: ChildSpec[]): XmlDocument {
  const nodes: XmlChild[] = [];
  const document: XmlDocument = { type: 'document', parent: null, children: nodes };
  buildChildren(children.map(toSpec), document, { xml: XML_NAMESPACE }, nodes);
  return document;
}

function toSpec(child: ChildSpec): NodeSpec {
  return typeof child === 'string' ? text(child) : child;
}

function splitName(qname: string): { prefix: string | null; local: string } {
  const colon = qname.indexOf(':');
  if (colon < 0) return { prefix: null, local: qname };
  return { prefix: qname.slice(0, colon), local: qname.slice(colon + 1) };
}

function buildChildren(
  specs: readonly NodeSpec[],
  parent: XmlParent,
  scope: Readonly<Record<string, string>>,
  into: XmlChild[],
): void {
  for (const spec of specs) {
    switch (spec.type) {
      case 'element':
        into.push(buildElement(spec, parent, scope));
        break;
      case 'text':
        into.push({ type: 'text', value: spec.value, parent });
        break;
      case 'cdata':
        into.push({ type: 'cdata', value: spec.value, parent });
        break;
      case 'comment':
        into.push({ type: 'comment', value: spec.value, parent });
        break;
      case 'processing-instruction':
        into.push({ type: spec.type, target: spec.target, value: spec.value, parent });
        break;
    }
  }
}

function buildElement(
  spec: ElementSpec,
  parent: XmlParent,
  inherited: Readonly<Record<string, string>>,
): XmlElement {
  const scope: Record<string, string> = { ...inherited };
  const plain: Array<[string, string]> = [];

  for (const [qname, value] of Object.entries(spec.attributes)) {
    if (qname === 'xmlns') {
      scope[''] = value;
    } else if (qname.startsWith('xmlns:')) {
      scope[qname.slice('xmlns:'.length)] = value;
    } else {
      plain.push([qname, value]);
    }
  }

  const { prefix, local } = splitName(spec.qname);
  const attributes: XmlAttribute[] = [];
  const children: XmlChild[] = [];
  const element: XmlElement = {
    type: 'element',
    name: local,
    prefix,
    namespaceUri: resolve(scope, prefix ?? ''),
    attributes,
    namespaces: scope,
    children,
    parent,
  };

  for (const [qname, value] of plain) {
    const name = splitName(qname);
    attributes.push({
      type: 'attribute',
      name: name.local,
      prefix: name.prefix,
      // unprefixed attributes are in no namespace
      namespaceUri: name.prefix === null ? null : resolve(scope, name.prefix),
      value,
      parent: element,
    });
  }

  buildChildren(spec.children, element, scope, children);
  return element;
}

function resolve(scope: Readonly<Record<string, string>>, prefix: string): string | null {
  const uri = Object.hasOwn(scope, prefix) ? scope[prefix] : '';
  return uri === '' ? null : uri;
}
