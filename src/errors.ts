/**
 * Error hierarchy for article conversion.
 *
 * Every error carries a stable `code` and a `context` record so callers can
 * locate the offending document or article without parsing messages.
 */

/**
 * Base error class for all conversion errors
 */
export class ArticleEtlError extends Error {
  public readonly code: string;
  public readonly context: Record<string, unknown>;

  constructor(message: string, code: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * An element that is read unconditionally (article id, section title,
 * contributor name, affiliation content) is structurally absent.
 * Aborts the current article only.
 */
export class MissingRequiredFieldError extends ArticleEtlError {
  public readonly field: string;

  constructor(field: string, context: Record<string, unknown> = {}) {
    super(`Missing required field: ${field}`, "MISSING_REQUIRED_FIELD", { field, ...context });
    this.field = field;
  }
}

/** The input is not well-formed XML. Aborts the whole document. */
export class MalformedDocumentError extends ArticleEtlError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(`Malformed XML document: ${message}`, "MALFORMED_DOCUMENT", context);
  }
}
