/**
 * # article-etl
 *
 * Transforms JATS-style scholarly article XML into canonical records:
 * normalized metadata plus an ordered list of flat, sentence-level sections
 * ready for indexing or search.
 *
 * ## Workflow
 *
 * 1. **Parse** — {@link parseArticles} walks every `article` element and lazily
 *    yields one {@link Article} each.
 * 2. **Serialize** — {@link toRow} turns a record into a flat, JSON-friendly row.
 * 3. **Convert** — {@link convertXmlToJsonl} does both for a file and writes
 *    JSON Lines.
 *
 * ## Quick Example
 *
 * ```typescript
 * import { convertXmlToJsonl, parseArticles } from "article-etl";
 *
 * for (const article of parseArticles(xml, "jama/2020-03.xml")) {
 *   console.log(article.uid, article.title);
 *   for (const section of article.sections) {
 *     console.log(`${section.name}: ${section.text}`);
 *   }
 * }
 *
 * const result = await convertXmlToJsonl("in/article.xml", "out/article.jsonl");
 * ```
 *
 * ## Section names
 *
 * - `TITLE` — the article title
 * - `ABSTRACT\Objective` — one structured abstract section
 * - `RESULTS` — one sentence of a body section
 * - `METHODS\STUDY DESIGN` — one sentence of a body subsection
 *
 * ## Configuration
 *
 * - **sourceTag**: marker tag placed first in `tags`. Default: `"JAMA"`.
 * - **segmenter**: sentence segmenter. Default: `Intl.Segmenter` (English).
 * - **validate**: check well-formedness before parsing. Default: `false`.
 * - **logger** / **onError**: where skipped articles are reported.
 * - `LOG_LEVEL` environment variable sets the default logger's level.
 *
 * @module article-etl
 */

// === Parsing ===
export { parseArticles } from "./parse/document.js";
export { flattenSections, sectionName, TITLE_SECTION, ABSTRACT_SECTION } from "./parse/sections.js";
export { parseContributors } from "./parse/contributors.js";
export type { Contributors } from "./parse/contributors.js";
export { parseTags } from "./parse/tags.js";
export { parseDate, tryParseDate } from "./parse/date.js";
export type { DateParseResult } from "./parse/date.js";
export { deriveUid } from "./parse/uid.js";

// === Text & XML ===
export { clean } from "./text/clean.js";
export { stripMarkup } from "./text/markup.js";
export { createSentenceSegmenter, defaultSentenceSegmenter } from "./text/sentences.js";
export type { SentenceSegmenter } from "./text/sentences.js";
export { getField, plainText } from "./xml/field.js";
export { parseXml } from "./xml/tree.js";
export type { OrderedNode, XmlElement } from "./xml/tree.js";

// === Records & conversion ===
export { createArticle, toRow } from "./article.js";
export { convertXmlToJsonl, readArticles, streamArticles } from "./convert/index.js";
export type { ConvertResult, ReadOptions } from "./convert/index.js";

// === Configuration, errors, logging ===
export { DEFAULT_SOURCE_TAG, resolveParseOptions } from "./config.js";
export type { ArticleFailure, ParseOptions, ResolvedParseOptions } from "./config.js";
export { ArticleEtlError, MalformedDocumentError, MissingRequiredFieldError } from "./errors.js";
export { createChildLogger, logger } from "./logger.js";

// === Types ===
export type { Article, ArticleRow, Section } from "./types.js";
