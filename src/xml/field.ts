/**
 * Field extraction by tag path.
 */

import { clean } from "../text/clean.js";
import { stripMarkup } from "../text/markup.js";
import { type OrderedNode, type XmlElement, textContent, toElement } from "./tree.js";

/** True when `tag` closes the path and its nearest ancestors spell the preceding steps. */
function matchesPath(tag: string, ancestors: readonly string[], steps: readonly string[]): boolean {
  if (tag !== steps[steps.length - 1]) return false;
  const parents = steps.slice(0, -1);
  if (parents.length > ancestors.length) return false;
  const tail = ancestors.slice(ancestors.length - parents.length);
  return parents.every((step, i) => tail[i] === step);
}

function findPath(
  nodes: OrderedNode[],
  steps: readonly string[],
  ancestors: readonly string[]
): XmlElement | undefined {
  for (const node of nodes) {
    const element = toElement(node);
    if (!element) continue;
    if (matchesPath(element.tag, ancestors, steps)) return element;
    const nested = findPath(element.children, steps, [...ancestors, element.tag]);
    if (nested) return nested;
  }
  return undefined;
}

/**
 * Find the first descendant matching `path` and return its cleaned text.
 *
 * `path` is a tag name or a `/`-separated chain of direct parent/child tags,
 * e.g. `"title-group/article-title"`. Returns `undefined` when nothing
 * matches and `""` when the match has no text.
 */
export function getField(element: XmlElement, path: string): string | undefined {
  const steps = path.split("/").filter(Boolean);
  if (steps.length === 0) return undefined;
  const match = findPath(element.children, steps, []);
  return match ? clean(textContent(match.children)) : undefined;
}

/** Cleaned text of a node list with inline markup removed. */
export function plainText(nodes: OrderedNode[]): string {
  return clean(stripMarkup(textContent(nodes)));
}
