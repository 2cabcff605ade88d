/**
 * Immutable XML document model.
 *
 * Nodes are plain objects with parent links. Namespaces are resolved when
 * the document is built: every element and attribute carries its prefix
 * and namespace URI, and `xmlns` declarations are not attributes.
 *
 * @module dom/types
 */

export type XmlParent = XmlDocument | XmlElement;

export type XmlChild = XmlElement | XmlText | XmlCData | XmlComment | XmlProcessingInstruction;

export type XmlNode = XmlDocument | XmlChild | XmlAttribute;

export interface XmlDocument {
  readonly type: 'document';
  readonly parent: null;
  readonly children: readonly XmlChild[];
}

export interface XmlElement {
  readonly type: 'element';
  /** Local name. */
  readonly name: string;
  readonly prefix: string | null;
  readonly namespaceUri: string | null;
  readonly attributes: readonly XmlAttribute[];
  /** Prefix → URI bindings in scope; the default namespace is under ''. */
  readonly namespaces: Readonly<Record<string, string>>;
  readonly children: readonly XmlChild[];
  readonly parent: XmlParent;
}

export interface XmlAttribute {
  readonly type: 'attribute';
  readonly name: string;
  readonly prefix: string | null;
  readonly namespaceUri: string | null;
  readonly value: string;
  readonly parent: XmlElement;
}

export interface XmlText {
  readonly type: 'text';
  readonly value: string;
  readonly parent: XmlParent;
}

export interface XmlCData {
  readonly type: 'cdata';
  readonly value: string;
  readonly parent: XmlParent;
}

export interface XmlComment {
  readonly type: 'comment';
  readonly value: string;
  readonly parent: XmlParent;
}

export interface XmlProcessingInstruction {
  readonly type: 'processing-instruction';
  readonly target: string;
  readonly value: string;
  readonly parent: XmlParent;
}

export function qualifiedName(node: XmlElement | XmlAttribute): string {
  return node.prefix === null ? node.name : `${node.prefix}:${node.name}`;
}
