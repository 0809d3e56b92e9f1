import { DOMParser, XMLSerializer } from '@xmldom/xmldom';

import { MalformedXmlError } from '../errors';

export const ELEMENT_NODE = 1;
export const TEXT_NODE = 3;
export const PROCESSING_INSTRUCTION_NODE = 7;

/** Ordered raw attribute pairs, exactly as they appear on an element. */
export type AttributeList = ReadonlyArray<readonly [name: string, value: string]>;

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

export function isWhitespaceText(node: Node): boolean {
  return node.nodeType === TEXT_NODE && /^\s*$/.test(node.nodeValue ?? '');
}

/**
 * Parse XML text into a DOM document.
 * Every parser warning or error is treated as a well-formedness failure.
 */
export function parseXml(xml: string): Document {
  const problems: string[] = [];
  const collect = (msg: unknown) => {
    problems.push(String(msg).trim());
  };
  const parser = new DOMParser({
    locator: {},
    errorHandler: { warning: collect, error: collect, fatalError: collect },
  });

  let doc: Document;
  try {
    doc = parser.parseFromString(xml, 'text/xml');
  } catch (e) {
    throw new MalformedXmlError([e instanceof Error ? e.message : String(e)], { cause: e });
  }
  if (problems.length > 0) throw new MalformedXmlError(problems);
  if (!doc.documentElement) throw new MalformedXmlError(['document has no root element']);
  return doc;
}

/**
 * Serialize a document in a canonical layout: top-level nodes (XML declaration, comments, root)
 * one per line, trailing newline. Content inside the root element is written as parsed.
 */
export function serializeXml(doc: Document): string {
  const serializer = new XMLSerializer();
  const parts: string[] = [];
  for (let i = 0; i < doc.childNodes.length; i++) {
    const node = doc.childNodes.item(i);
    if (!node || isWhitespaceText(node)) continue;
    parts.push(serializer.serializeToString(node));
  }
  return parts.join('\n') + '\n';
}

export function childElements(node: Node, tagName?: string): Element[] {
  const out: Element[] = [];
  for (let i = 0; i < node.childNodes.length; i++) {
    const child = node.childNodes.item(i);
    if (child && isElement(child) && (tagName === undefined || child.tagName === tagName)) out.push(child);
  }
  return out;
}

export function readAttributes(el: Element): AttributeList {
  const out: Array<readonly [string, string]> = [];
  for (let i = 0; i < el.attributes.length; i++) {
    const attr = el.attributes.item(i);
    if (attr) out.push([attr.name, attr.value]);
  }
  return out;
}

/** Raw attribute value, or undefined when the attribute is absent. */
export function attributeValue(el: Element, name: string): string | undefined {
  return el.getAttributeNode(name)?.value;
}

/**
 * Make the element's attributes equal `attributes`.
 * Attributes that already exist keep their position; new ones are appended.
 */
export function syncAttributes(el: Element, attributes: AttributeList): void {
  const wanted = new Set(attributes.map(([name]) => name));
  for (const [name] of readAttributes(el)) {
    if (!wanted.has(name)) el.removeAttribute(name);
  }
  for (const [name, value] of attributes) {
    if (attributeValue(el, name) !== value) el.setAttribute(name, value);
  }
}

export function getAttribute(list: AttributeList, name: string): string | undefined {
  return list.find(([n]) => n === name)?.[1];
}

export function withAttribute(list: AttributeList, name: string, value: string | null): AttributeList {
  if (value === null) return list.filter(([n]) => n !== name);
  if (list.some(([n]) => n === name)) {
    return list.map(([n, v]): readonly [string, string] => (n === name ? [n, value] : [n, v]));
  }
  return [...list, [name, value]];
}
