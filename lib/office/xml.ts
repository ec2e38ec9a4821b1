/**
 * Order-preserving XML access for OOXML parts. fast-xml-parser's
 * `preserveOrder` output is a list of single-key objects; these helpers
 * walk it without assuming a shape.
 */

import { XMLParser } from "fast-xml-parser";

export type XmlNode = Record<string, unknown>;

const ATTRIBUTES = ":@";
const TEXT = "#text";

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
});

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asNodes(value: unknown): XmlNode[] {
  return Array.isArray(value) ? value.filter(isNode) : [];
}

export function parseXml(xml: string): XmlNode[] {
  const parsed: unknown = parser.parse(xml);
  return asNodes(parsed);
}

export function nameOf(node: XmlNode): string | undefined {
  return Object.keys(node).find((key) => key !== ATTRIBUTES);
}

export function childrenOf(node: XmlNode): XmlNode[] {
  const name = nameOf(node);
  return name === undefined ? [] : asNodes(node[name]);
}

export function attributeOf(node: XmlNode, name: string): string | undefined {
  const attributes = node[ATTRIBUTES];
  if (!isNode(attributes)) return undefined;
  const value = attributes[`@_${name}`];
  return typeof value === "string" ? value : undefined;
}

/** Direct text content of an element. */
export function textOf(node: XmlNode): string {
  let text = "";
  for (const child of childrenOf(node)) {
    const value = child[TEXT];
    if (typeof value === "string") text += value;
  }
  return text;
}

export function childElements(node: XmlNode, name: string): XmlNode[] {
  return childrenOf(node).filter((child) => nameOf(child) === name);
}

export function firstChild(node: XmlNode, name: string): XmlNode | undefined {
  return childrenOf(node).find((child) => nameOf(child) === name);
}

/**
 * Elements named `name` in document order. Matches are not searched for
 * nested matches.
 */
export function descendants(nodes: XmlNode[], name: string): XmlNode[] {
  const found: XmlNode[] = [];
  for (const node of nodes) {
    if (nameOf(node) === name) {
      found.push(node);
    } else {
      found.push(...descendants(childrenOf(node), name));
    }
  }
  return found;
}
