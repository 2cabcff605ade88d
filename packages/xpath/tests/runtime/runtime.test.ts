import { describe, it, expect } from 'vitest';
import { xmlAdapter } from '../../src/dom/adapter.js';
import type { XmlElement, XmlNode } from '../../src/dom/types.js';
import { EvaluationError, FunctionError } from '../../src/errors.js';
import { NodeSet } from '../../src/runtime/node-set.js';
import { QueryRuntime } from '../../src/runtime/runtime.js';
import { elementChildren, label, library } from '../fixtures.js';

function setup() {
  const document = library();
  const [root] = elementChildren(document);
  const [book1, book2, book3] = elementChildren(root);
  const rt = new QueryRuntime<XmlNode>(xmlAdapter);
  return { document, root, book1, book2, book3, rt };
}

const labels = (nodes: Iterable<XmlNode>) => [...nodes].map(label);

function firstText(element: XmlElement): XmlNode {
  const [first] = elementChildren(element);
  return first.children[0];
}

describe('QueryRuntime', () => {
  describe('axes', () => {
    it('finds the root from any node', () => {
      const { document, book1, rt } = setup();
      expect(rt.root(book1.attributes[0])).toBe(document);
      expect(rt.root(document)).toBe(document);
    });

    it('lists attributes of elements only', () => {
      const { document, book1, rt } = setup();
      expect(labels(rt.attributes(book1))).toEqual(['@id=b1', '@lang=en', '@lang=en-GB']);
      expect(rt.attributes(document)).toEqual([]);
    });

    it('walks descendants in document order', () => {
      const { book1, rt } = setup();
      expect(labels(rt.descendants(book1))).toEqual(['dc:title', 'text:Dune', 'price', 'text:9.5']);
      expect(labels(rt.descendantsOrSelf(book1))[0]).toBe('book');
    });

    it('lists ancestors nearest first', () => {
      const { book1, rt } = setup();
      expect(labels(rt.ancestors(firstText(book1)))).toEqual(['dc:title', 'book', 'library', '/']);
    });

    it('lists siblings in axis order', () => {
      const { book1, book3, rt } = setup();
      expect(labels(rt.followingSiblings(book1))).toEqual(['book', 'Book']);
      expect(labels(rt.precedingSiblings(book3))).toEqual(['book', 'book', 'comment: catalogue ']);
    });

    it('gives attributes no siblings', () => {
      const { book1, rt } = setup();
      expect(rt.followingSiblings(book1.attributes[0])).toEqual([]);
      expect(rt.precedingSiblings(book1.attributes[1])).toEqual([]);
    });

    it('walks following nodes in document order', () => {
      const { book2, book3, rt } = setup();
      const subtree = ['Book', 'title', 'text:Emma', 'price', 'text:7', 'cdata:notes'];
      expect(labels(rt.following(book2))).toEqual(subtree);
      expect(labels(rt.following(book3.attributes[0]))).toEqual(subtree.slice(1));
    });

    it('walks preceding nodes in reverse document order, skipping ancestors', () => {
      const { book2, rt } = setup();
      expect(labels(rt.preceding(book2))).toEqual([
        'text:9.5',
        'price',
        'text:Dune',
        'dc:title',
        'book',
        'comment: catalogue ',
        '?xml-stylesheet',
      ]);
    });
  });

  describe('collecting', () => {
    it('collect keeps distinct nodes in first-seen order', () => {
      const { book1, book2, rt } = setup();
      expect(rt.collect((push) => [book2, book1, book2].forEach(push))).toEqual([book2, book1]);
    });

    it('sequence keeps every node pushed', () => {
      const { book1, rt } = setup();
      expect(rt.sequence((push) => [book1, book1].forEach(push))).toEqual([book1, book1]);
    });

    it('select returns a document-ordered node-set', () => {
      const { book1, book3, rt } = setup();
      const selected = rt.select((push) => [book3, book1].forEach(push));
      expect(selected).toBeInstanceOf(NodeSet);
      expect(selected.toArray()).toEqual([book1, book3]);
    });

    it('filter selects by position for numbers and by truth otherwise', () => {
      const { book1, book2, book3, rt } = setup();
      const books = [book1, book2, book3];
      expect(rt.filter(books, () => 2)).toEqual([book2]);
      expect(rt.filter(books, (_node, position, size) => position === size)).toEqual([book3]);
      expect(rt.filter(books, (node) => rt.name(node) === 'book')).toEqual([book1, book2]);
    });

    it('rejects non node-sets where nodes are required', () => {
      const { rt } = setup();
      expect(() => rt.nodes('x')).toThrow('Expected a node-set, got string "x"');
      expect(() => rt.nodes(3)).toThrow(EvaluationError);
    });
  });

  describe('compare', () => {
    const prices = () => {
      const { document, rt } = setup();
      const nodes = rt.descendants(document).filter((node) => rt.name(node) === 'price');
      return { rt, set: new NodeSet(nodes) };
    };

    it('is true when any node compares true', () => {
      const { rt, set } = prices();
      expect(rt.compare('eq', set, 12)).toBe(true);
      expect(rt.compare('gt', set, 10)).toBe(true);
      expect(rt.compare('lt', set, 5)).toBe(false);
      expect(rt.compare('eq', set, '7')).toBe(true);
    });

    it('can make = and != both true for the same node-sets', () => {
      const { rt, set } = prices();
      expect(rt.compare('eq', set, set)).toBe(true);
      expect(rt.compare('neq', set, set)).toBe(true);
    });

    it('compares an empty node-set false against anything but a boolean', () => {
      const { rt } = setup();
      const empty = NodeSet.empty<XmlNode>();
      expect(rt.compare('eq', empty, '')).toBe(false);
      expect(rt.compare('neq', empty, '')).toBe(false);
      expect(rt.compare('eq', empty, false)).toBe(true);
    });

    it('converts scalars to a common type', () => {
      const { rt } = setup();
      expect(rt.compare('eq', '1', 1)).toBe(true);
      expect(rt.compare('eq', true, 'x')).toBe(true);
      expect(rt.compare('eq', 'abc', 'ABC')).toBe(false);
      expect(rt.compare('lte', '2', '10')).toBe(true);
    });
  });

  describe('variables', () => {
    it('sorts node arrays into node-sets', () => {
      const { book1, book3 } = setup();
      const rt = new QueryRuntime<XmlNode>(xmlAdapter, { books: [book3, book1], title: 'Dune' });
      const value = rt.variable('books');
      expect(value).toBeInstanceOf(NodeSet);
      expect(value instanceof NodeSet ? value.toArray() : []).toEqual([book1, book3]);
      expect(rt.variable('title')).toBe('Dune');
    });

    it('rejects undefined variables', () => {
      const { rt } = setup();
      expect(() => rt.variable('nope')).toThrow('Undefined variable: $nope');
      expect(() => rt.variable('toString')).toThrow('Undefined variable: $toString');
    });
  });

  describe('call', () => {
    it('rejects unknown functions', () => {
      const { document, rt } = setup();
      expect(() => rt.call('nope', document, [])).toThrow(FunctionError);
    });

    it('checks arity', () => {
      const { document, rt } = setup();
      expect(() => rt.call('not', document, [])).toThrow('Function not() expects 1 argument, got 0');
    });
  });

  describe('documentPosition', () => {
    it('numbers nodes in pre-order with attributes after their element', () => {
      const { document, root, book1, rt } = setup();
      expect(rt.documentPosition(document)).toBe(0);
      expect(rt.documentPosition(root)).toBe(2);
      expect(rt.documentPosition(book1)).toBe(4);
      expect(rt.documentPosition(book1.attributes[0])).toBe(5);
      expect(rt.documentPosition(book1.children[0])).toBe(8);
    });
  });
});
