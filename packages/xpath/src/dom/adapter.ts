/**
 * `NodeAdapter` over the XML document model.
 *
 * @module dom/adapter
 */

import type { NodeAdapter } from '../runtime/types.js';
import { qualifiedName } from './types.js';
import type { XmlNode } from './types.js';

/**
 * XPath string value: the concatenated text and CDATA descendants of a
 * document or element, the value of anything else.
 */
export function stringValue(node: XmlNode): string {
  switch (node.type) {
    case 'document':
    case 'element': {
      let value = '';
      for (const child of node.children) {
        if (child.type === 'element') value += stringValue(child);
        else if (child.type === 'text' || child.type === 'cdata') value += child.value;
      }
      return value;
    }
    default:
      return node.value;
  }
}

export const xmlAdapter: NodeAdapter<XmlNode> = {
  kind: (node) => node.type,

  parent: (node) => node.parent,

  children: (node) => (node.type === 'document' || node.type === 'element' ? node.children : []),

  attributes: (node) => (node.type === 'element' ? node.attributes : []),

  name(node) {
    switch (node.type) {
      case 'element':
      case 'attribute':
        return node.name;
      case 'processing-instruction':
        return node.target;
      default:
        return '';
    }
  },

  namespacePrefix: (node) => (node.type === 'element' || node.type === 'attribute' ? node.prefix : null),

  namespaceUri: (node) => (node.type === 'element' || node.type === 'attribute' ? node.namespaceUri : null),

  attributeValue(node, name) {
    if (node.type !== 'element') return null;
    return node.attributes.find((attribute) => qualifiedName(attribute) === name)?.value ?? null;
  },

  text: stringValue,
};
