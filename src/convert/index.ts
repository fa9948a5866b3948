/**
 * Conversion I/O for article XML.
 *
 * Thin wrappers that feed files and streams to the document parser and
 * write the resulting rows as JSON Lines.
 */

import { readFile, writeFile } from "node:fs/promises";
import { basename } from "node:path";
import { toRow } from "../article.js";
import { type ArticleFailure, type ParseOptions, resolveParseOptions } from "../config.js";
import { parseArticles } from "../parse/document.js";
import type { Article } from "../types.js";

export interface ReadOptions extends ParseOptions {
  /** Source label. Default: the file's base name; `null` leaves it absent. */
  source?: string | null;
}

export interface ConvertResult {
  success: boolean;
  error?: string;
  /** Articles written */
  articles?: number;
  /** Articles skipped because of a missing required field */
  failures?: number;
}

/**
 * Collect a byte or text stream (e.g. a Node `Readable`) and yield its
 * articles. The whole document is buffered before parsing starts.
 */
export async function* streamArticles(
  stream: AsyncIterable<string | Uint8Array>,
  source: string | null = null,
  options: ParseOptions = {}
): AsyncGenerator<Article, void, undefined> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk);
  }
  yield* parseArticles(Buffer.concat(chunks), source, options);
}

/** Read an XML file and return its lazy article sequence. */
export async function readArticles(
  xmlPath: string,
  options: ReadOptions = {}
): Promise<Generator<Article, void, undefined>> {
  const { source, ...parseOptions } = options;
  const xml = await readFile(xmlPath, "utf-8");
  return parseArticles(xml, source === undefined ? basename(xmlPath) : source, parseOptions);
}

/**
 * Convert an XML file into a JSON Lines file, one article row per line.
 *
 * Skipped articles are counted in `failures` and still reported through
 * `options.onError` (or the default warning). File-level failures are
 * returned, not thrown.
 */
export async function convertXmlToJsonl(
  xmlPath: string,
  outPath: string,
  options: ReadOptions = {}
): Promise<ConvertResult> {
  let failures = 0;
  const { onError } = resolveParseOptions(options);
  const recordFailure = (failure: ArticleFailure): void => {
    failures++;
    onError(failure);
  };

  try {
    const articles = await readArticles(xmlPath, { ...options, onError: recordFailure });
    const lines: string[] = [];
    for (const article of articles) {
      lines.push(JSON.stringify(toRow(article)));
    }

    await writeFile(outPath, lines.map((line) => `${line}\n`).join(""), "utf-8");

    return { success: true, articles: lines.length, failures };
  } catch (err) {
    const result: ConvertResult = { success: false };
    result.error = err instanceof Error ? err.message : String(err);
    return result;
  }
}
