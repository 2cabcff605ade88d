import { cdata, comment, doc, el, pi } from '../src/dom/builder.js';
import type { XmlDocument, XmlElement, XmlNode } from '../src/dom/types.js';

export const DC = 'http://purl.org/dc/elements/1.1/';

/**
 * <?xml-stylesheet href="style.css"?>
 * <library xmlns:dc="...">
 *   <!-- catalogue -->
 *   <book id="b1" lang="en" xml:lang="en-GB"><dc:title>Dune</dc:title><price>9.5</price></book>
 *   <book id="b2" lang="fr"><dc:title>Vendredi</dc:title><price>12</price></book>
 *   <Book id="b3"><title>Emma</title><price>7</price><![CDATA[notes]]></Book>
 * </library>
 */
export function library(): XmlDocument {
  return doc(
    pi('xml-stylesheet', 'href="style.css"'),
    el('library', { 'xmlns:dc': DC }, [
      comment(' catalogue '),
      el('book', { id: 'b1', lang: 'en', 'xml:lang': 'en-GB' }, [
        el('dc:title', {}, ['Dune']),
        el('price', {}, ['9.5']),
      ]),
      el('book', { id: 'b2', lang: 'fr' }, [
        el('dc:title', {}, ['Vendredi']),
        el('price', {}, ['12']),
      ]),
      el('Book', { id: 'b3' }, [el('title', {}, ['Emma']), el('price', {}, ['7']), cdata('notes')]),
    ]),
  );
}

export function elementChildren(node: XmlDocument | XmlElement): XmlElement[] {
  return node.children.filter((child): child is XmlElement => child.type === 'element');
}

/** Short label for asserting on selected nodes. */
export function label(node: XmlNode): string {
  switch (node.type) {
    case 'document':
      return '/';
    case 'element':
      return node.prefix === null ? node.name : `${node.prefix}:${node.name}`;
    case 'attribute':
      return `@${node.name}=${node.value}`;
    case 'processing-instruction':
      return `?${node.target}`;
    default:
      return `${node.type}:${node.value}`;
  }
}
