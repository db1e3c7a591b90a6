/**
 * Salary Parser Module
 * Parses salary text into min/max amounts, currency and pay period
 */

import type { SalaryInfo, SalaryPeriod } from "./types";

export interface SalaryParseOptions {
  defaultCurrency: string;
  /**
   * True for text taken from a dedicated salary field. Unlabeled text (a
   * description snippet) also drops numbers outside `plausibleRange`.
   */
  labeled?: boolean;
  plausibleRange?: { min: number; max: number };
}

interface AmountToken {
  value: number;
  start: number;
  end: number;
  hasK: boolean;
  anchored: boolean;
}

const DEFAULT_PLAUSIBLE_RANGE = { min: 1000, max: 1000000 };

const ISO_CURRENCIES = ["AUD", "USD", "GBP", "EUR", "NZD", "CAD"];

// Matches: 80000, 80,000, 100'000, 80,000.50, 80k, 80 K
const AMOUNT_PATTERN = /(?<![\d.,'])(\d{1,3}(?:[,']\d{3})+|\d+)(\.\d+)?(\s?[kK](?![a-zA-Z]))?(?![\d%])/g;
const CURRENCY_BEFORE_PATTERN = /(?:[$£€]|\b(?:AUD|USD|GBP|EUR|NZD|CAD))\s*$/;
const RANGE_GAP_PATTERN =
  /^\s*(?:[$£€]|(?:AUD|USD|GBP|EUR|NZD|CAD))?\s*(?:-|–|—|to)\s*(?:(?:AU|US|NZ|A)?\$|£|€|(?:AUD|USD|GBP|EUR|NZD|CAD))?\s*$/i;

/**
 * Period rules in priority order, first match wins
 */
const PERIOD_RULES: Array<{ pattern: RegExp; period: SalaryPeriod }> = [
  // "$70,000 pa, 38 hours per week" is an annual salary
  { pattern: /\bp\.?a\b|per\s+(?:annum|year)|\/\s*(?:yr|year|annum)\b|\bannually\b/i, period: "yearly" },
  { pattern: /hour|\bhrs?\b|\bp\/?h\b|\/h\b/i, period: "hourly" },
  { pattern: /\bday\b|\bdaily\b|\bp\/?d\b|per\s+diem/i, period: "daily" },
  { pattern: /week|\bp\/?w\b|\/wk\b/i, period: "weekly" },
  { pattern: /month|\bpcm\b|\bp\/?m\b|\/mo\b/i, period: "monthly" },
];

const CURRENCY_RULES: Array<{ pattern: RegExp; currency: string }> = [
  { pattern: /(?<![A-Za-z])AU?\$/, currency: "AUD" },
  { pattern: /(?<![A-Za-z])US\$/, currency: "USD" },
  { pattern: /(?<![A-Za-z])NZ\$/, currency: "NZD" },
  { pattern: /(?<![A-Za-z])C\$/, currency: "CAD" },
  { pattern: /£/, currency: "GBP" },
  { pattern: /€/, currency: "EUR" },
];

const PERIOD_LABELS: Record<SalaryPeriod, string> = {
  hourly: "per hour",
  daily: "per day",
  weekly: "per week",
  monthly: "per month",
  yearly: "per year",
};

export function detectPeriod(text: string): SalaryPeriod {
  for (const rule of PERIOD_RULES) {
    if (rule.pattern.test(text)) return rule.period;
  }
  return "yearly";
}

/**
 * ISO code first, then prefixed dollar signs, then £ and €. A bare "$" means the default currency.
 */
export function detectCurrency(text: string, defaultCurrency: string): string {
  const iso = new RegExp(`\\b(${ISO_CURRENCIES.join("|")})\\b`).exec(text);
  if (iso) return iso[1];

  for (const rule of CURRENCY_RULES) {
    if (rule.pattern.test(text)) return rule.currency;
  }
  return defaultCurrency;
}

function tokenize(text: string): AmountToken[] {
  const tokens: AmountToken[] = [];

  for (const match of text.matchAll(AMOUNT_PATTERN)) {
    const start = match.index ?? 0;
    const integerPart = match[1].replace(/[,']/g, "");
    const hasK = match[3] !== undefined;
    let value = parseFloat(integerPart + (match[2] ?? ""));
    if (Number.isNaN(value)) continue;
    if (hasK) value *= 1000;

    const before = text.slice(Math.max(0, start - 5), start);
    tokens.push({
      value: Math.round(value * 100) / 100,
      start,
      end: start + match[0].length,
      hasK,
      anchored: hasK || CURRENCY_BEFORE_PATTERN.test(before),
    });
  }

  return tokens;
}

function isRangeGap(text: string, left: AmountToken, right: AmountToken): boolean {
  return RANGE_GAP_PATTERN.test(text.slice(left.end, right.start));
}

/**
 * Picks the salary amounts out of the text. Currency-anchored or k-suffixed
 * tokens and their range partners win over bare numbers.
 */
export function extractAmounts(
  text: string,
  labeled: boolean,
  plausibleRange: { min: number; max: number } = DEFAULT_PLAUSIBLE_RANGE
): number[] {
  const tokens = tokenize(text);
  const partners = new Set<number>();

  for (let i = 0; i < tokens.length - 1; i++) {
    const left = tokens[i];
    const right = tokens[i + 1];
    if (!isRangeGap(text, left, right)) continue;

    // "75-85k": the suffix applies to both bounds
    if (right.hasK && !left.hasK && left.value < 1000) {
      left.value *= 1000;
    } else if (left.hasK && !right.hasK && right.value < 1000) {
      right.value *= 1000;
    }
    if (left.anchored || right.anchored) {
      partners.add(i);
      partners.add(i + 1);
    }
  }

  const anyAnchored = tokens.some((token) => token.anchored);
  return tokens
    .filter((token, index) => !anyAnchored || token.anchored || partners.has(index))
    .map((token) => token.value)
    .filter((value) => value > 0)
    .filter((value) => labeled || (value >= plausibleRange.min && value <= plausibleRange.max));
}

/**
 * Parses salary text. Text without an amount keeps null min/max; parsing never throws.
 */
export function parseSalary(text: string | null | undefined, options: SalaryParseOptions): SalaryInfo {
  const rawText = (text ?? "").replace(/\s+/g, " ").trim();
  const info: SalaryInfo = {
    min: null,
    max: null,
    currency: options.defaultCurrency,
    period: "yearly",
    rawText,
  };
  if (!rawText) return info;

  try {
    info.currency = detectCurrency(rawText, options.defaultCurrency);
    info.period = detectPeriod(rawText);

    if (!/\d/.test(rawText)) return info;

    const amounts = extractAmounts(rawText, options.labeled ?? true, options.plausibleRange);
    if (amounts.length > 0) {
      info.min = Math.min(...amounts);
      info.max = Math.max(...amounts);
    }
  } catch {
    info.min = null;
    info.max = null;
  }

  return info;
}

const SNIPPET_CURRENCY = String.raw`(?:(?:AUD|USD|GBP|EUR|NZD|CAD)\s?|(?:AU|US|NZ|A)?\$|£|€)`;
const SNIPPET_AMOUNT = String.raw`\d[\d,]*(?:\.\d+)?(?:\s?k(?![a-z]))?`;
const SNIPPET_UNIT = String.raw`(?:(?:per|an|a)\s*(?:hour|day|week|month|annum|year)|\/\s*(?:hour|hr|day|wk|week|mo|month|yr|year)|p\.?\s?a\.?(?![a-z])|p\.?\s?h\.?(?![a-z]))`;

const SNIPPET_PATTERNS = [
  new RegExp(
    `${SNIPPET_CURRENCY}\\s?${SNIPPET_AMOUNT}\\s*(?:-|–|to)\\s*${SNIPPET_CURRENCY}?\\s?${SNIPPET_AMOUNT}\\s*${SNIPPET_UNIT}`,
    "i"
  ),
  new RegExp(`${SNIPPET_CURRENCY}\\s?${SNIPPET_AMOUNT}\\s*${SNIPPET_UNIT}`, "i"),
];

/**
 * Finds a salary snippet in free text: a currency amount or range followed by a
 * time unit or "p.a.". Returns an empty string when none is present.
 */
export function findSalaryInText(text: string | null | undefined): string {
  if (!text) return "";
  const lower = text.toLowerCase();
  if (lower.includes("competitive") && !/[$£€]/.test(text)) return "";

  for (const pattern of SNIPPET_PATTERNS) {
    const match = pattern.exec(text);
    if (match) return match[0].trim();
  }
  return "";
}

function formatAmount(value: number): string {
  return value.toLocaleString("en-US", { maximumFractionDigits: 2 });
}

/**
 * Display string such as "AUD 80,000 - 100,000 per year"
 */
export function formatSalary(info: SalaryInfo): string {
  if (info.min === null || info.max === null) {
    return info.rawText || "Salary not specified";
  }

  const amount =
    info.min === info.max
      ? formatAmount(info.min)
      : `${formatAmount(info.min)} - ${formatAmount(info.max)}`;
  return `${info.currency} ${amount} ${PERIOD_LABELS[info.period]}`;
}
