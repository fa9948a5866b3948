/**
 * Best-effort publication date interpretation.
 *
 * Raw values look like "05 Mar 2020", "05Mar2020", "5 3 2020", "Mar 2020"
 * or "2020". Year-first values ("2020 3 5") are also accepted.
 */

import type { Logger } from "pino";

export type DateParseResult = { ok: true; date: Date } | { ok: false; reason: string };

const MONTH_NAMES = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

const YEAR_PATTERN = /^\d{4}$/;
const NUMBER_PATTERN = /^\d{1,2}$/;

/** Resolve a month token (name prefix of 3+ letters, or 1-12) to 1-12. */
function parseMonth(token: string): number | undefined {
  if (NUMBER_PATTERN.test(token)) {
    const month = Number(token);
    return month >= 1 && month <= 12 ? month : undefined;
  }
  const lower = token.toLowerCase();
  if (lower.length < 3) return undefined;
  const index = MONTH_NAMES.findIndex((name) => name.startsWith(lower));
  return index === -1 ? undefined : index + 1;
}

function parseDay(token: string): number | undefined {
  return NUMBER_PATTERN.test(token) ? Number(token) : undefined;
}

/** Split a date token list into day/month/year tokens by layout. */
function layout(tokens: string[]): { year: string; month?: string; day?: string } | undefined {
  const [first, second, third] = tokens;
  if (first === undefined || tokens.length > 3) return undefined;

  // Year first: YYYY [M [D]]
  if (YEAR_PATTERN.test(first) && tokens.length > 1) {
    return {
      year: first,
      ...(second !== undefined ? { month: second } : {}),
      ...(third !== undefined ? { day: third } : {}),
    };
  }

  const year = tokens[tokens.length - 1];
  if (year === undefined || !YEAR_PATTERN.test(year)) return undefined;
  if (tokens.length === 1) return { year };
  if (second === undefined || tokens.length === 2) return { year, month: first };

  // Mon D YYYY
  if (/^[A-Za-z]+$/.test(first)) return { year, month: first, day: second };
  // D Mon YYYY, D M YYYY
  return { year, month: second, day: first };
}

/**
 * Interpret a raw publication date. Never throws; failures carry a reason.
 * Missing day defaults to 1 and missing month to January. Dates are UTC
 * midnight.
 */
export function tryParseDate(raw: string): DateParseResult {
  const tokens = raw.match(/\d+|[A-Za-z]+/g) ?? [];
  const parts = layout(tokens);
  if (!parts) return { ok: false, reason: `unrecognized date layout: "${raw}"` };

  const year = Number(parts.year);
  const month = parts.month === undefined ? 1 : parseMonth(parts.month);
  if (month === undefined) return { ok: false, reason: `unknown month: "${parts.month ?? ""}"` };
  const day = parts.day === undefined ? 1 : parseDay(parts.day);
  if (day === undefined) return { ok: false, reason: `invalid day: "${parts.day ?? ""}"` };

  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return { ok: false, reason: `no such calendar date: "${raw}"` };
  }
  return { ok: true, date };
}

/**
 * Interpret a raw publication date, or `null` when absent or unparseable.
 * Failures are logged at debug level when a logger is given.
 */
export function parseDate(raw: string | undefined, logger?: Logger): Date | null {
  if (raw === undefined) return null;
  const result = tryParseDate(raw);
  if (result.ok) return result.date;
  logger?.debug({ raw, reason: result.reason }, "Unparseable publication date");
  return null;
}
