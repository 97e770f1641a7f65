/**
 * Minimal XML element tree and serializer for the export document.
 *
 * @module rekordbox/xmlElement
 */

/**
 * An XML element with ordered attributes.
 */
export interface XmlElement {
  name: string;
  attributes: Array<[string, string]>;
  children: XmlElement[];
}

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&apos;',
  '\t': '&#9;',
  '\n': '&#10;',
  '\r': '&#13;',
};

/**
 * Escape a value for use inside a double-quoted attribute.
 *
 * Control characters and the noncharacters U+FFFE/U+FFFF, which XML 1.0
 * cannot represent, are dropped.
 */
export function escapeXml(value: string): string {
  return value
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\uFFFE\uFFFF]/g, '')
    .replace(/[&<>"'\t\n\r]/g, ch => XML_ESCAPES[ch]);
}

/**
 * Create an element and append it to `parent`, if given.
 */
export function element(
  name: string,
  attributes: Record<string, string | number> = {},
  parent?: XmlElement
): XmlElement {
  const node: XmlElement = {
    name,
    attributes: Object.entries(attributes).map(([key, value]) => [key, String(value)]),
    children: [],
  };
  parent?.children.push(node);
  return node;
}

/**
 * Set or replace an attribute, keeping its position if it already exists.
 */
export function setAttribute(node: XmlElement, name: string, value: string | number): void {
  const existing = node.attributes.find(([key]) => key === name);
  if (existing) {
    existing[1] = String(value);
  } else {
    node.attributes.push([name, String(value)]);
  }
}

function renderElement(node: XmlElement, depth: number, lines: string[]): void {
  const indent = '  '.repeat(depth);
  const attrs = node.attributes
    .map(([key, value]) => ` ${key}="${escapeXml(value)}"`)
    .join('');

  if (node.children.length === 0) {
    lines.push(`${indent}<${node.name}${attrs}/>`);
    return;
  }

  lines.push(`${indent}<${node.name}${attrs}>`);
  for (const child of node.children) {
    renderElement(child, depth + 1, lines);
  }
  lines.push(`${indent}</${node.name}>`);
}

/**
 * Serialize a document with an XML declaration, two-space indentation and a
 * trailing newline.
 */
export function renderDocument(root: XmlElement): string {
  const lines = ['<?xml version="1.0" encoding="UTF-8"?>'];
  renderElement(root, 0, lines);
  return `${lines.join('\n')}\n`;
}
