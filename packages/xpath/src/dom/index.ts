/**
 * XML document model, builder and loader.
 *
 * @module dom
 */

export { doc, el, text, cdata, comment, pi } from './builder.js';
export type { ChildSpec, ElementSpec, NodeSpec, ProcessingInstructionSpec, TextSpec } from './builder.js';
export { xmlAdapter, stringValue } from './adapter.js';
export { parseXml, XmlParseError } from './xml.js';
export type { XmlParseErrorDetails } from './xml.js';
export { qualifiedName } from './types.js';
export type {
  XmlNode,
  XmlParent,
  XmlChild,
  XmlDocument,
  XmlElement,
  XmlAttribute,
  XmlText,
  XmlCData,
  XmlComment,
  XmlProcessingInstruction,
} from './types.js';
