/**
 * Article record construction and row serialization.
 */

import type { Article, ArticleRow, Section } from "./types.js";

/** Freeze an article and its sections so yielded records stay immutable. */
export function createArticle(fields: Omit<Article, "sections">, sections: Section[]): Article {
  return Object.freeze({
    ...fields,
    sections: Object.freeze(sections.map((section) => Object.freeze({ ...section }))),
  });
}

/** Render a date as YYYY-MM-DD (UTC). */
function formatDate(date: Date | null): string | null {
  return date ? date.toISOString().slice(0, 10) : null;
}

/** Flatten an article into its row form: `uid` becomes `id`, dates become strings. */
export function toRow(article: Article): ArticleRow {
  return {
    id: article.uid,
    source: article.source,
    published: formatDate(article.published),
    publication: article.publication,
    authors: article.authors,
    affiliations: article.affiliations,
    affiliation: article.affiliation,
    title: article.title,
    tags: article.tags,
    reference: article.reference,
    entry: formatDate(article.entry),
    sections: article.sections.map(({ name, text }) => ({ name, text })),
  };
}
