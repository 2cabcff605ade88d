import { describe, it, expect } from 'vitest';
import { xmlAdapter, stringValue } from '../../src/dom/adapter.js';
import { cdata, comment, doc, el, pi } from '../../src/dom/builder.js';
import { elementChildren } from '../fixtures.js';

describe('xmlAdapter', () => {
  const document = doc(
    pi('style', 'x'),
    el('r', { 'xmlns:p': 'urn:p', 'p:k': 'v', id: '7' }, ['one ', el('i', {}, ['two']), comment('skip'), cdata(' three')]),
  );
  const [root] = elementChildren(document);

  it('concatenates text and CDATA descendants for the string value', () => {
    expect(stringValue(root)).toBe('one two three');
    expect(stringValue(document)).toBe('one two three');
  });

  it('uses the value of other nodes as their string value', () => {
    expect(stringValue(root.attributes[0])).toBe('v');
    expect(xmlAdapter.text(document.children[0])).toBe('x');
  });

  it('names elements, attributes and processing instructions', () => {
    expect(xmlAdapter.name(root)).toBe('r');
    expect(xmlAdapter.name(root.attributes[0])).toBe('k');
    expect(xmlAdapter.name(document.children[0])).toBe('style');
    expect(xmlAdapter.name(root.children[0])).toBe('');
  });

  it('reports namespace prefix and URI', () => {
    const attribute = root.attributes[0];
    expect(xmlAdapter.namespacePrefix(attribute)).toBe('p');
    expect(xmlAdapter.namespaceUri(attribute)).toBe('urn:p');
    expect(xmlAdapter.namespacePrefix(document)).toBeNull();
  });

  it('looks attributes up by qualified name', () => {
    expect(xmlAdapter.attributeValue(root, 'p:k')).toBe('v');
    expect(xmlAdapter.attributeValue(root, 'k')).toBeNull();
    expect(xmlAdapter.attributeValue(root, 'id')).toBe('7');
    expect(xmlAdapter.attributeValue(document, 'id')).toBeNull();
  });

  it('keeps attributes apart from children', () => {
    expect(xmlAdapter.children(root)).toHaveLength(4);
    expect(xmlAdapter.attributes(root)).toHaveLength(2);
    expect(xmlAdapter.children(root.attributes[0])).toEqual([]);
    expect(xmlAdapter.parent(root.attributes[0])).toBe(root);
    expect(xmlAdapter.parent(document)).toBeNull();
  });
});
