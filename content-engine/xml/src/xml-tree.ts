import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { XmlParseError } from '../../shared/src/errors.js';

/**
 * Mutable element tree used by the loader and exporter.
 *
 * Text placement follows the usual element-tree convention: `text` is the character data
 * between the start tag and the first child, `tail` is the character data after the end tag
 * and before the next sibling. Attributes keep document order.
 */
export interface XmlElement {
  tag: string;
  attributes: Map<string, string>;
  text: string | null;
  tail: string | null;
  children: XmlElement[];
}

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

type OrderedNode = Record<string, unknown>;

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  processEntities: true,
  // Numeric character references are only decoded with the HTML entity table on.
  htmlEntities: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_KEY,
  suppressEmptyNode: true,
  processEntities: true,
  format: false,
});

export function createElement(
  tag: string,
  attributes: Record<string, string> = {},
  text: string | null = null
): XmlElement {
  return {
    tag,
    attributes: new Map(Object.entries(attributes)),
    text,
    tail: null,
    children: [],
  };
}

export function getAttribute(element: XmlElement, name: string): string | undefined {
  return element.attributes.get(name);
}

export function setAttribute(element: XmlElement, name: string, value: string): void {
  element.attributes.set(name, value);
}

export function deleteAttribute(element: XmlElement, name: string): void {
  element.attributes.delete(name);
}

export function attributeNames(element: XmlElement): Set<string> {
  return new Set(element.attributes.keys());
}

export function deepCopy(element: XmlElement): XmlElement {
  return {
    tag: element.tag,
    attributes: new Map(element.attributes),
    text: element.text,
    tail: element.tail,
    children: element.children.map(deepCopy),
  };
}

/** First direct child with the given tag. */
export function findChild(element: XmlElement, tag: string): XmlElement | undefined {
  return element.children.find(child => child.tag === tag);
}

export function findChildren(element: XmlElement, tag: string): XmlElement[] {
  return element.children.filter(child => child.tag === tag);
}

/**
 * Detach a direct child. The child's tail goes with it.
 */
export function removeChild(element: XmlElement, child: XmlElement): void {
  const index = element.children.indexOf(child);
  if (index >= 0) {
    element.children.splice(index, 1);
  }
}

export function hasNonWhitespaceText(element: XmlElement): boolean {
  return element.text !== null && element.text.trim().length > 0;
}

/**
 * Parse a document into its root element. Well-formedness is checked first so that
 * truncated or mismatched markup is reported instead of being silently repaired.
 */
export function parseXml(source: string): XmlElement {
  const validation = XMLValidator.validate(source);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new XmlParseError(`Invalid XML at line ${line}, column ${col}: ${msg}`, line, col);
  }

  const document: unknown = parser.parse(source);
  const holder = createElement('#document');
  appendNodes(holder, document);

  const root = holder.children[0];
  if (!root) {
    throw new XmlParseError('Document has no root element');
  }
  root.tail = null;
  return root;
}

function appendNodes(parent: XmlElement, nodes: unknown): void {
  if (!Array.isArray(nodes)) {
    return;
  }

  for (const node of nodes) {
    if (!isOrderedNode(node)) continue;

    const attributes = node[ATTRIBUTES_KEY];
    for (const [key, value] of Object.entries(node)) {
      if (key === ATTRIBUTES_KEY) continue;

      if (key === TEXT_KEY) {
        appendText(parent, String(value));
        continue;
      }

      const child = createElement(key);
      if (isOrderedNode(attributes)) {
        for (const [name, attributeValue] of Object.entries(attributes)) {
          child.attributes.set(name.slice(ATTRIBUTE_PREFIX.length), String(attributeValue));
        }
      }
      appendNodes(child, value);
      parent.children.push(child);
    }
  }
}

function appendText(parent: XmlElement, text: string): void {
  const last = parent.children[parent.children.length - 1];
  if (last) {
    last.tail = (last.tail ?? '') + text;
  } else {
    parent.text = (parent.text ?? '') + text;
  }
}

function isOrderedNode(value: unknown): value is OrderedNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toOrderedNodes(element: XmlElement, withTail: boolean): OrderedNode[] {
  const content: OrderedNode[] = [];
  if (element.text) {
    content.push({ [TEXT_KEY]: element.text });
  }
  for (const child of element.children) {
    content.push(...toOrderedNodes(child, true));
  }

  const node: OrderedNode = { [element.tag]: content };
  if (element.attributes.size > 0) {
    const attributes: Record<string, string> = {};
    for (const [name, value] of element.attributes) {
      attributes[ATTRIBUTE_PREFIX + name] = value;
    }
    node[ATTRIBUTES_KEY] = attributes;
  }

  const nodes = [node];
  if (withTail && element.tail) {
    nodes.push({ [TEXT_KEY]: element.tail });
  }
  return nodes;
}

/**
 * Serialize an element (and optionally its tail) to markup. Empty elements are written
 * self-closed.
 */
export function serializeXml(element: XmlElement, options: { withTail?: boolean } = {}): string {
  const built: unknown = builder.build(toOrderedNodes(element, options.withTail ?? false));
  return String(built);
}

/**
 * Everything inside an element without its own start and end tags: the leading text
 * followed by each child serialized with its tail.
 */
export function stringifyChildren(element: XmlElement): string {
  const parts: string[] = [];
  if (element.text) {
    parts.push(element.text);
  }
  for (const child of element.children) {
    parts.push(serializeXml(child, { withTail: true }));
  }
  return parts.join('');
}
