/**
 * XML helpers over @xmldom/xmldom
 *
 * Parts are parsed into a DOM, edited with namespace-aware calls and
 * serialized back. New parts are written as templates with escapeXml.
 */

import { DOMParser, XMLSerializer } from '@xmldom/xmldom';
import { FormatError } from '../errors';
import { NS } from './namespaces';

export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

const ELEMENT_NODE = 1;
const TEXT_NODE = 3;

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8');

/** Escape XML special characters */
export function escapeXml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Remove characters XML 1.0 cannot represent (C0 controls other than tab,
 * newline and carriage return, lone surrogates, U+FFFE/U+FFFF)
 */
export function stripInvalidXmlChars(str: string): string {
  return str.replace(
    /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g,
    ''
  );
}

export function encodeXml(xml: string): Uint8Array {
  return encoder.encode(xml);
}

export function decodeXml(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

/**
 * Parse a part; anything that is not well-formed XML with the expected root
 * element is a CorruptPackage failure
 */
export function parseXmlPart(partName: string, xml: string, expectedRoot?: string): Document {
  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      warning: () => undefined,
      error: (msg: unknown) => {
        problems.push(String(msg));
      },
      fatalError: (msg: unknown) => {
        problems.push(String(msg));
      },
    },
  });

  let doc: Document;
  try {
    doc = parser.parseFromString(xml, 'text/xml');
  } catch (error) {
    throw corruptPart(partName, error instanceof Error ? error.message : String(error));
  }

  const root = doc.documentElement;
  if (problems.length > 0 || !root) {
    throw corruptPart(partName, problems[0] ?? 'no root element');
  }
  if (expectedRoot && root.localName !== expectedRoot) {
    throw corruptPart(partName, `expected <${expectedRoot}> root, found <${root.nodeName}>`);
  }
  return doc;
}

function corruptPart(partName: string, reason: string): FormatError {
  return new FormatError('CorruptPackage', `Part ${partName} is not well-formed: ${reason}`, {
    operation: 'parseXmlPart',
    component: 'xml',
    data: { partName },
  });
}

/** Serialize Document to XML string */
export function serializeXml(doc: Document): string {
  const xml = new XMLSerializer().serializeToString(doc);
  return xml.startsWith('<?xml') ? xml : `${XML_DECLARATION}\n${xml}`;
}

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export function isInNamespace(element: Element, namespace: string, localName: string): boolean {
  return element.namespaceURI === namespace && element.localName === localName;
}

/**
 * Direct element children
 */
export function childElements(parent: Node): Element[] {
  const result: Element[] = [];
  for (let node = parent.firstChild; node; node = node.nextSibling) {
    if (isElement(node)) {
      result.push(node);
    }
  }
  return result;
}

/**
 * First direct child with the given name, or null
 */
export function findChild(parent: Node, namespace: string, localName: string): Element | null {
  return childElements(parent).find((el) => isInNamespace(el, namespace, localName)) ?? null;
}

/**
 * All descendants matching any of the local names, in document order.
 * The result is a snapshot, safe to iterate while editing the tree.
 */
export function findDescendants(root: Node, namespace: string, localNames: readonly string[]): Element[] {
  const result: Element[] = [];
  const visit = (parent: Node): void => {
    for (let node = parent.firstChild; node; node = node.nextSibling) {
      if (!isElement(node)) continue;
      if (node.namespaceURI === namespace && localNames.includes(node.localName)) {
        result.push(node);
      }
      visit(node);
    }
  };
  visit(root);
  return result;
}

export function hasAncestorIn(node: Node, ancestors: ReadonlySet<Node>): boolean {
  for (let parent = node.parentNode; parent; parent = parent.parentNode) {
    if (ancestors.has(parent)) return true;
  }
  return false;
}

/**
 * Replace an element by its children
 */
export function unwrapElement(element: Element): void {
  const parent = element.parentNode;
  if (!parent) return;
  while (element.firstChild) {
    parent.insertBefore(element.firstChild, element);
  }
  parent.removeChild(element);
}

export function removeElement(element: Element): void {
  element.parentNode?.removeChild(element);
}

export function removeChildren(parent: Node): void {
  while (parent.firstChild) {
    parent.removeChild(parent.firstChild);
  }
}

/**
 * Concatenated text of descendant text nodes
 */
export function textOf(node: Node): string {
  let text = '';
  for (let child = node.firstChild; child; child = child.nextSibling) {
    if (child.nodeType === TEXT_NODE) {
      text += child.nodeValue ?? '';
    } else if (isElement(child)) {
      text += textOf(child);
    }
  }
  return text;
}

/**
 * Replace an element's content with a single text node
 */
export function setText(element: Element, value: string): void {
  removeChildren(element);
  if (value.length > 0 && element.ownerDocument) {
    element.appendChild(element.ownerDocument.createTextNode(value));
  }
}

/**
 * Create an element in the main wordprocessing namespace
 */
export function createW(doc: Document, localName: string): Element {
  return doc.createElementNS(NS.w, `w:${localName}`);
}

export function setW(element: Element, localName: string, value: string): void {
  element.setAttributeNS(NS.w, `w:${localName}`, value);
}

export function getW(element: Element, localName: string): string | null {
  return element.hasAttributeNS(NS.w, localName) ? element.getAttributeNS(NS.w, localName) : null;
}

/**
 * Build <w:r><w:t>text</w:t></w:r>, preserving edge whitespace
 */
export function createTextRun(doc: Document, text: string): Element {
  const run = createW(doc, 'r');
  const t = createW(doc, 't');
  const clean = stripInvalidXmlChars(text);
  if (clean !== clean.trim()) {
    t.setAttributeNS(NS.xml, 'xml:space', 'preserve');
  }
  t.appendChild(doc.createTextNode(clean));
  run.appendChild(t);
  return run;
}
