/**
 * Date Resolver Module
 * Resolves "3 days ago", "yesterday" or absolute dates into a posted timestamp
 */

export interface DateResolveOptions {
  /** UTC hour that day-granular dates are pinned to */
  referenceHour?: number;
}

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

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

const TODAY_PATTERN = /\b(?:today|just posted|just now)\b/;
const YESTERDAY_PATTERN = /\byesterday\b/;
const RELATIVE_PATTERN = /\b(\d+|an?|one)\+?\s*(minute|min|hour|hr|day|week|wk|month|mo)s?\s+ago\b/;
const COMPACT_PATTERN = /^(\d+)\s*([hdw])(?:\s+ago)?$/;
const ISO_PATTERN = /\b(\d{4})-(\d{2})-(\d{2})(T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?/i;
const NUMERIC_PATTERN = /\b(\d{1,2})[/.](\d{1,2})[/.](\d{4})\b/;
const DAY_MONTH_YEAR_PATTERN = /\b(\d{1,2})(?:st|nd|rd|th)?[\s-]+([a-z]{3,9})\.?,?[\s-]+(\d{4})\b/;
const MONTH_DAY_YEAR_PATTERN = /\b([a-z]{3,9})\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})\b/;
const POSTED_LABEL_PATTERN = /\b(?:date posted|posted on|posted|listed on|listed|job posting)\s*:?\s*([^\n]{1,40})/i;

function atReferenceHour(date: Date, referenceHour: number): Date {
  return new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate(), referenceHour, 0, 0, 0)
  );
}

function monthIndex(word: string): number {
  if (word.length < 3) return -1;
  return MONTH_NAMES.findIndex((name) => name.startsWith(word));
}

function calendarDate(year: number, month: number, day: number, referenceHour: number): Date | null {
  if (month < 0 || month > 11 || day < 1 || day > 31) return null;
  const date = new Date(Date.UTC(year, month, day, referenceHour, 0, 0, 0));
  // Rejects overflow such as 31 February
  return date.getUTCDate() === day ? date : null;
}

function parseQuantity(value: string): number {
  return /^\d+$/.test(value) ? parseInt(value, 10) : 1;
}

function resolveRelative(text: string, now: Date, referenceHour: number): Date | null {
  if (TODAY_PATTERN.test(text)) {
    return atReferenceHour(now, referenceHour);
  }
  if (YESTERDAY_PATTERN.test(text)) {
    return new Date(atReferenceHour(now, referenceHour).getTime() - DAY_MS);
  }

  let quantity: number;
  let unit: string;
  const relative = RELATIVE_PATTERN.exec(text);
  const compact = COMPACT_PATTERN.exec(text);
  if (relative) {
    quantity = parseQuantity(relative[1]);
    unit = relative[2];
  } else if (compact) {
    quantity = parseInt(compact[1], 10);
    unit = compact[2];
  } else {
    return null;
  }

  const dayStart = atReferenceHour(now, referenceHour).getTime();
  switch (unit) {
    case "minute":
    case "min":
      return new Date(now.getTime() - quantity * MINUTE_MS);
    case "hour":
    case "hr":
    case "h":
      return new Date(now.getTime() - quantity * HOUR_MS);
    case "day":
    case "d":
      return new Date(dayStart - quantity * DAY_MS);
    case "week":
    case "wk":
    case "w":
      return new Date(dayStart - quantity * 7 * DAY_MS);
    default:
      // Months are approximated as 30 days
      return new Date(dayStart - quantity * 30 * DAY_MS);
  }
}

function resolveAbsolute(text: string, referenceHour: number): Date | null {
  const iso = ISO_PATTERN.exec(text);
  if (iso) {
    if (iso[4]) {
      const timestamp = new Date(iso[0].toUpperCase());
      if (!Number.isNaN(timestamp.getTime())) return timestamp;
    }
    return calendarDate(parseInt(iso[1], 10), parseInt(iso[2], 10) - 1, parseInt(iso[3], 10), referenceHour);
  }

  const numeric = NUMERIC_PATTERN.exec(text);
  if (numeric) {
    // Day first
    return calendarDate(
      parseInt(numeric[3], 10),
      parseInt(numeric[2], 10) - 1,
      parseInt(numeric[1], 10),
      referenceHour
    );
  }

  const dayMonthYear = DAY_MONTH_YEAR_PATTERN.exec(text);
  if (dayMonthYear && monthIndex(dayMonthYear[2]) >= 0) {
    return calendarDate(
      parseInt(dayMonthYear[3], 10),
      monthIndex(dayMonthYear[2]),
      parseInt(dayMonthYear[1], 10),
      referenceHour
    );
  }

  const monthDayYear = MONTH_DAY_YEAR_PATTERN.exec(text);
  if (monthDayYear && monthIndex(monthDayYear[1]) >= 0) {
    return calendarDate(
      parseInt(monthDayYear[3], 10),
      monthIndex(monthDayYear[1]),
      parseInt(monthDayYear[2], 10),
      referenceHour
    );
  }

  return null;
}

/**
 * Resolves posted text to a date, or null when nothing in it is recognized
 */
export function matchPostedDate(
  text: string | null | undefined,
  now: Date,
  options: DateResolveOptions = {}
): Date | null {
  if (!text || !text.trim()) return null;
  const referenceHour = options.referenceHour ?? 9;

  try {
    const normalized = text
      .toLowerCase()
      .replace(/\s+/g, " ")
      .trim()
      .replace(/^(?:date posted|posted on|posted|listed on|listed|job posting)\s*:?\s*/, "");

    const relative = resolveRelative(normalized, now, referenceHour);
    if (relative) return relative;

    const absolute = resolveAbsolute(normalized, referenceHour);
    if (!absolute) return null;

    // Future dates are clamped to now
    return absolute.getTime() > now.getTime() ? new Date(now.getTime()) : absolute;
  } catch {
    return null;
  }
}

/**
 * Resolves posted text to a date; unrecognized or empty text yields `now`
 */
export function resolvePostedDate(
  text: string | null | undefined,
  now: Date,
  options: DateResolveOptions = {}
): Date {
  return matchPostedDate(text, now, options) ?? new Date(now.getTime());
}

/**
 * Finds the text after a "Posted" label inside a description
 */
export function findPostedTextInText(text: string | null | undefined): string {
  if (!text) return "";
  const match = POSTED_LABEL_PATTERN.exec(text);
  return match ? match[1].trim() : "";
}
