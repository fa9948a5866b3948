/**
 * Document parser: one {@link Article} per `article` element.
 *
 * Records are produced lazily. The XML is parsed on the first `next()` call
 * and each article is assembled only when the caller advances, so a
 * returned generator can be consumed exactly once.
 */

import { createArticle } from "../article.js";
import { type ParseOptions, type ResolvedParseOptions, resolveParseOptions } from "../config.js";
import { MissingRequiredFieldError } from "../errors.js";
import type { Article } from "../types.js";
import { clean } from "../text/clean.js";
import { getField } from "../xml/field.js";
import {
  type XmlElement,
  descendants,
  findAll,
  findChild,
  findFirst,
  parseXml,
  textContent,
} from "../xml/tree.js";
import { parseContributors } from "./contributors.js";
import { parseDate } from "./date.js";
import { flattenSections } from "./sections.js";
import { parseTags } from "./tags.js";
import { deriveUid } from "./uid.js";

const REFERENCE_PATH = "article-id";
const TITLE_PATH = "title-group/article-title";
const PUBLISHED_PATH = "pub-date";
const PUBLICATION_PATH = "journal-title";

const DATE_PARTS = ["day", "month", "year"] as const;

/**
 * Raw text of the first `pub-date`: its `day`, `month` and `year` children
 * joined by spaces, or the element's own text when it has none of them.
 */
function publishedText(element: XmlElement): string | undefined {
  const pubDate = findFirst(element, PUBLISHED_PATH);
  if (!pubDate) return undefined;
  const parts = DATE_PARTS.flatMap((tag) => {
    const child = findChild(pubDate, tag);
    const text = child ? clean(textContent(child.children)) : "";
    return text ? [text] : [];
  });
  return parts.length > 0 ? parts.join(" ") : clean(textContent(pubDate.children));
}

/** Assemble one article. Throws {@link MissingRequiredFieldError} on structural gaps. */
function buildArticle(
  element: XmlElement,
  source: string | null,
  options: ResolvedParseOptions
): Article {
  const reference = getField(element, REFERENCE_PATH);
  if (!reference) throw new MissingRequiredFieldError(REFERENCE_PATH);

  const title = getField(element, TITLE_PATH);
  const { authors, affiliations } = parseContributors(
    findAll(element, "contrib-group"),
    findAll(element, "aff")
  );

  return createArticle(
    {
      uid: deriveUid(reference),
      source,
      published: parseDate(publishedText(element), options.logger),
      publication: getField(element, PUBLICATION_PATH) ?? null,
      authors,
      affiliations,
      affiliation: "",
      title: title ?? null,
      tags: parseTags(findAll(element, "article-categories"), options.sourceTag),
      reference,
      entry: null,
    },
    flattenSections(title, findFirst(element, "abstract"), findFirst(element, "body"), options.segmenter)
  );
}

/**
 * Parse an XML document and yield one article per `article` element, at any
 * depth, in document order.
 *
 * An article with a missing required field is reported through
 * `options.onError` and skipped; its siblings are still produced. Other
 * errors end the iteration.
 *
 * @param source - provenance label attached verbatim to every article
 */
export function* parseArticles(
  xml: string | Buffer,
  source: string | null = null,
  options: ParseOptions = {}
): Generator<Article, void, undefined> {
  const resolved = resolveParseOptions(options);
  const nodes = parseXml(xml, { validate: resolved.validate });

  let index = 0;
  for (const element of descendants(nodes)) {
    if (element.tag !== "article") continue;
    const position = index++;

    let article: Article;
    try {
      article = buildArticle(element, source, resolved);
    } catch (error) {
      if (!(error instanceof MissingRequiredFieldError)) throw error;
      resolved.onError({
        error,
        source,
        reference: getField(element, REFERENCE_PATH) || null,
        index: position,
      });
      continue;
    }

    resolved.logger.debug({ source, reference: article.reference, index: position }, "Parsed article");
    yield article;
  }
}
