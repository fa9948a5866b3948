/**
 * Canonical record types produced by article conversion.
 */

/** One named, ordered unit of article text. */
export interface Section {
  /** Hierarchical path, parent and child joined with a backslash. */
  readonly name: string;
  /** One sentence, or the full title for the TITLE section. */
  readonly text: string;
}

/** Canonical output record for one `article` element. */
export interface Article {
  /** SHA-1 hex digest of `reference` */
  readonly uid: string;
  /** Caller-supplied provenance label */
  readonly source: string | null;
  readonly published: Date | null;
  /** Journal title */
  readonly publication: string | null;
  /** Display names, "Last, First", joined with "; " */
  readonly authors: string;
  /** Affiliation texts joined with "; " */
  readonly affiliations: string;
  /** Primary affiliation, filled by a later stage; always "" here */
  readonly affiliation: string;
  readonly title: string | null;
  /** Source marker tag followed by subject terms, joined with "; " */
  readonly tags: string;
  /** Raw article identifier */
  readonly reference: string;
  /** Last-updated date; always null here */
  readonly entry: Date | null;
  readonly sections: readonly Section[];
}

/**
 * Flat, JSON-friendly row for an {@link Article}.
 * Dates are rendered as YYYY-MM-DD.
 */
export interface ArticleRow {
  id: string;
  source: string | null;
  published: string | null;
  publication: string | null;
  authors: string;
  affiliations: string;
  affiliation: string;
  title: string | null;
  tags: string;
  reference: string;
  entry: string | null;
  sections: Array<{ name: string; text: string }>;
}
