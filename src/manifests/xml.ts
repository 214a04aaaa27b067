/**
 * ClaimScout - XML Helpers
 *
 * Thin typed tree over fast-xml-parser's ordered output, with namespace
 * prefixes removed so `pom:dependency` and `dependency` read the same.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { isRecord } from './base.js';

export interface XmlElement {
  name: string;
  /** Document path, e.g. /project[1]/dependencies[1]/dependency[2] */
  path: string;
  attributes: Record<string, string>;
  text: string;
  children: XmlElement[];
}

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: '',
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
});

/**
 * Parse an XML document into its top-level elements.
 * Throws on malformed input.
 */
export function parseXml(content: string): XmlElement[] {
  const validation = XMLValidator.validate(content);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new Error(`Invalid XML at line ${line}: ${msg}`);
  }

  const nodes: unknown = parser.parse(content);
  return toElements(nodes, '');
}

function toElements(nodes: unknown, parentPath: string): XmlElement[] {
  if (!Array.isArray(nodes)) return [];

  const seen = new Map<string, number>();
  const elements: XmlElement[] = [];

  for (const node of nodes) {
    if (!isRecord(node)) continue;

    for (const [key, value] of Object.entries(node)) {
      if (key === ':@' || key === '#text') continue;

      const index = (seen.get(key) ?? 0) + 1;
      seen.set(key, index);
      const path = `${parentPath}/${key}[${index}]`;

      elements.push({
        name: key,
        path,
        attributes: readAttributes(node[':@']),
        text: readText(value),
        children: toElements(value, path),
      });
    }
  }

  return elements;
}

function readAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) return attributes;

  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      attributes[key] = String(value);
    }
  }
  return attributes;
}

function readText(children: unknown): string {
  if (!Array.isArray(children)) return '';

  return children
    .map(child => (isRecord(child) && '#text' in child ? String(child['#text']) : ''))
    .join('')
    .trim();
}

export function childElement(element: XmlElement, name: string): XmlElement | undefined {
  return element.children.find(child => child.name === name);
}

export function childText(element: XmlElement, name: string): string | undefined {
  const text = childElement(element, name)?.text;
  return text ? text : undefined;
}

/**
 * All elements named `name` below the given roots, in document order
 */
export function findAll(roots: XmlElement[], name: string): XmlElement[] {
  const found: XmlElement[] = [];

  const walk = (element: XmlElement): void => {
    if (element.name === name) found.push(element);
    element.children.forEach(walk);
  };

  roots.forEach(walk);
  return found;
}
