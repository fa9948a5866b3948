/**
 * Section hierarchy flattening.
 *
 * Walks the abstract and body subtrees and emits an ordered list of
 * `(name, text)` pairs:
 *
 * - `TITLE` — the full article title
 * - `ABSTRACT\<Section title>` — one entry per structured abstract section
 * - `<SECTION>` — one entry per sentence of a flat body section
 * - `<SECTION>\<SUBSECTION>` — one entry per sentence of a nested section
 *
 * Abstracts without `<sec>` children (plain or HTML-formatted text) produce
 * no entries.
 */

import { MissingRequiredFieldError } from "../errors.js";
import { clean } from "../text/clean.js";
import { defaultSentenceSegmenter, type SentenceSegmenter } from "../text/sentences.js";
import type { Section } from "../types.js";
import { type XmlElement, findChild, findChildren, textContent } from "../xml/tree.js";

export const TITLE_SECTION = "TITLE";
export const ABSTRACT_SECTION = "ABSTRACT";

/** Join section path parts with the backslash separator. */
export function sectionName(...parts: string[]): string {
  return parts.join("\\");
}

/** Cleaned text of a section's `<title>`. Titles are read unconditionally. */
function sectionTitle(sec: XmlElement, path: string[]): string {
  const title = findChild(sec, "title");
  if (!title) {
    throw new MissingRequiredFieldError("sec/title", { path: sectionName(...path) });
  }
  return clean(textContent(title.children));
}

/** Space-joined, cleaned text of a section's direct `<p>` children. */
function paragraphText(sec: XmlElement): string {
  return clean(
    findChildren(sec, "p")
      .map((p) => textContent(p.children))
      .join(" ")
  );
}

function sentenceSections(name: string, text: string, segmenter: SentenceSegmenter): Section[] {
  return segmenter.segment(text).map((sentence) => ({ name, text: sentence }));
}

function abstractSections(abstract: XmlElement): Section[] {
  const sections: Section[] = [];
  for (const sec of findChildren(abstract, "sec")) {
    const name = sectionName(ABSTRACT_SECTION, sectionTitle(sec, [ABSTRACT_SECTION]));
    const text = paragraphText(sec);
    if (text) sections.push({ name, text });
  }
  return sections;
}

function bodySections(body: XmlElement, segmenter: SentenceSegmenter): Section[] {
  const sections: Section[] = [];
  for (const sec of findChildren(body, "sec")) {
    const parent = sectionTitle(sec, []).toUpperCase();
    const nested = findChildren(sec, "sec");

    if (nested.length === 0) {
      sections.push(...sentenceSections(parent, paragraphText(sec), segmenter));
      continue;
    }

    for (const child of nested) {
      const name = sectionName(parent, sectionTitle(child, [parent]).toUpperCase());
      sections.push(...sentenceSections(name, paragraphText(child), segmenter));
    }
  }
  return sections;
}

/**
 * Flatten title, abstract and body into ordered sections.
 * Throws {@link MissingRequiredFieldError} when a `<sec>` has no `<title>`.
 */
export function flattenSections(
  title: string | undefined,
  abstract: XmlElement | undefined,
  body: XmlElement | undefined,
  segmenter: SentenceSegmenter = defaultSentenceSegmenter
): Section[] {
  const sections: Section[] = [];
  if (title !== undefined) sections.push({ name: TITLE_SECTION, text: title });
  if (abstract) sections.push(...abstractSections(abstract));
  if (body) sections.push(...bodySections(body, segmenter));
  return sections;
}
