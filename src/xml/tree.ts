/**
 * Navigation over fast-xml-parser's `preserveOrder` output.
 *
 * Uses `preserveOrder: true` so interleaved text and elements keep their
 * document order, which section flattening and affiliation parsing rely on.
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { MalformedDocumentError } from "../errors.js";

/**
 * A node in the preserveOrder output.
 * Either a text node `{ "#text": string }` or an element node
 * `{ tagName: OrderedNode[], ":@"?: { "@_attr": value } }`.
 */
export type OrderedNode = Record<string, unknown>;

/** An element node resolved to its tag, children and attributes. */
export interface XmlElement {
  tag: string;
  children: OrderedNode[];
  attrs: Record<string, string>;
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  trimValues: false,
  parseTagValue: false,
  preserveOrder: true,
  processEntities: true,
  htmlEntities: true,
});

function isOrderedNode(value: unknown): value is OrderedNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNodes(value: unknown): OrderedNode[] {
  return Array.isArray(value) ? value.filter(isOrderedNode) : [];
}

/**
 * Parse an XML document into ordered nodes.
 * With `validate`, well-formedness is checked first and reported as a
 * {@link MalformedDocumentError} carrying line and column.
 */
export function parseXml(xml: string | Buffer, options: { validate?: boolean } = {}): OrderedNode[] {
  if (options.validate) {
    const result = XMLValidator.validate(typeof xml === "string" ? xml : xml.toString("utf-8"));
    if (result !== true) {
      throw new MalformedDocumentError(result.err.msg, {
        code: result.err.code,
        line: result.err.line,
        column: result.err.col,
      });
    }
  }
  const parsed: unknown = parser.parse(xml);
  return toNodes(parsed);
}

/** Get the tag name of an ordered node (the first key that isn't ":@" or "#text"). */
function getTagName(node: OrderedNode): string | undefined {
  for (const key of Object.keys(node)) {
    if (key !== ":@" && key !== "#text") return key;
  }
  return undefined;
}

/** Get attributes of an element node with the @_ prefix stripped. */
function getAttrs(node: OrderedNode): Record<string, string> {
  const attrs = node[":@"];
  if (!isOrderedNode(attrs)) return {};
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(attrs)) {
    if (key.startsWith("@_")) {
      result[key.slice(2)] = String(value);
    }
  }
  return result;
}

/** Resolve an element node. Text nodes and processing instructions give `undefined`. */
export function toElement(node: OrderedNode): XmlElement | undefined {
  const tag = getTagName(node);
  if (!tag || tag.startsWith("?")) return undefined;
  return { tag, children: toNodes(node[tag]), attrs: getAttrs(node) };
}

/** All element children of a node list, in document order. */
export function childElements(nodes: OrderedNode[]): XmlElement[] {
  const results: XmlElement[] = [];
  for (const node of nodes) {
    const element = toElement(node);
    if (element) results.push(element);
  }
  return results;
}

/** Find the first direct child element with the given tag name. */
export function findChild(parent: XmlElement, tag: string): XmlElement | undefined {
  return childElements(parent.children).find((child) => child.tag === tag);
}

/** Find all direct child elements with the given tag name. */
export function findChildren(parent: XmlElement, tag: string): XmlElement[] {
  return childElements(parent.children).filter((child) => child.tag === tag);
}

/** Walk every element below `nodes` depth-first in document order. */
export function* descendants(nodes: OrderedNode[]): Generator<XmlElement, void, undefined> {
  for (const node of nodes) {
    const element = toElement(node);
    if (!element) continue;
    yield element;
    yield* descendants(element.children);
  }
}

/** Find all descendant elements with the given tag name. */
export function findAll(parent: XmlElement, tag: string): XmlElement[] {
  const results: XmlElement[] = [];
  for (const element of descendants(parent.children)) {
    if (element.tag === tag) results.push(element);
  }
  return results;
}

/** Find the first descendant element with the given tag name. */
export function findFirst(parent: XmlElement, tag: string): XmlElement | undefined {
  for (const element of descendants(parent.children)) {
    if (element.tag === tag) return element;
  }
  return undefined;
}

/** Concatenate all text below `nodes`, without adding separators. */
export function textContent(nodes: OrderedNode[]): string {
  let text = "";
  for (const node of nodes) {
    if ("#text" in node) {
      const value = node["#text"];
      if (value != null) text += String(value);
      continue;
    }
    const element = toElement(node);
    if (element) text += textContent(element.children);
  }
  return text;
}
