/**
 * Parse options and their defaults.
 */

import type { Logger } from "pino";
import type { MissingRequiredFieldError } from "./errors.js";
import { logger as baseLogger } from "./logger.js";
import { defaultSentenceSegmenter, type SentenceSegmenter } from "./text/sentences.js";

/** Marker tag placed first in every article's tag list. */
export const DEFAULT_SOURCE_TAG = "JAMA";

/** An article skipped because a required field was missing. */
export interface ArticleFailure {
  error: MissingRequiredFieldError;
  /** Source label of the document */
  source: string | null;
  /** Article identifier, when it could be read */
  reference: string | null;
  /** Zero-based position among the document's article elements */
  index: number;
}

export interface ParseOptions {
  /** Marker tag placed first in `tags`. Default: {@link DEFAULT_SOURCE_TAG} */
  sourceTag?: string;
  segmenter?: SentenceSegmenter;
  /** Check XML well-formedness before parsing. Default: false */
  validate?: boolean;
  logger?: Logger;
  /** Called for each skipped article. Default: log a warning. */
  onError?: (failure: ArticleFailure) => void;
}

export interface ResolvedParseOptions {
  sourceTag: string;
  segmenter: SentenceSegmenter;
  validate: boolean;
  logger: Logger;
  onError: (failure: ArticleFailure) => void;
}

/** Fill in defaults for every parse option. */
export function resolveParseOptions(options: ParseOptions = {}): ResolvedParseOptions {
  const logger = options.logger ?? baseLogger;
  return {
    sourceTag: options.sourceTag ?? DEFAULT_SOURCE_TAG,
    segmenter: options.segmenter ?? defaultSentenceSegmenter,
    validate: options.validate ?? false,
    logger,
    onError:
      options.onError ??
      (({ error, source, reference, index }) => {
        logger.warn(
          { err: error, field: error.field, source, reference, index },
          "Skipping article with missing required field"
        );
      }),
  };
}
