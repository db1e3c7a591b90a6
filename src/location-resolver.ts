/**
 * Location Resolver Module
 * Splits free-form location text into city, state and country
 */

import type { LocationParts } from "./types";

export interface LocationOptions {
  homeCountry: string;
  /** State or territory code → full name */
  abbreviations: Record<string, string>;
  /** Country name or alias → canonical country name */
  countries: Record<string, string>;
}

const SEGMENT_SEPARATOR = /\s*[,|]\s*|\s+[-–—]\s+/;

function cleanSegment(segment: string): string {
  return segment
    .replace(/\s+/g, " ")
    .trim()
    // Trailing postcode, e.g. "Sydney NSW 2000"
    .replace(/\s+\d{3,6}$/, "")
    .trim();
}

function splitSegments(text: string): string[] {
  return text
    .split(SEGMENT_SEPARATOR)
    .map(cleanSegment)
    .filter((segment) => segment.length > 0 && !/^\d+$/.test(segment));
}

function lookupCode(token: string, abbreviations: Record<string, string>): string | null {
  const upper = token.toUpperCase();
  for (const [code, name] of Object.entries(abbreviations)) {
    if (code.toUpperCase() === upper) return name;
  }
  return null;
}

function lookupStateName(segment: string, abbreviations: Record<string, string>): string | null {
  const lower = segment.toLowerCase();
  for (const name of Object.values(abbreviations)) {
    if (name.toLowerCase() === lower) return name;
  }
  return null;
}

/**
 * Full state name for a state code or state name, null for anything else
 */
export function expandState(segment: string, abbreviations: Record<string, string>): string | null {
  return lookupCode(segment, abbreviations) ?? lookupStateName(segment, abbreviations);
}

function endsWithWords(text: string, suffix: string): boolean {
  const lowerText = text.toLowerCase();
  const lowerSuffix = suffix.toLowerCase();
  return lowerText.length > lowerSuffix.length && lowerText.endsWith(` ${lowerSuffix}`);
}

function endsWithStateName(segment: string, abbreviations: Record<string, string>): boolean {
  return Object.values(abbreviations).some(
    (name) => segment.toLowerCase() === name.toLowerCase() || endsWithWords(segment, name)
  );
}

/**
 * Removes a country from the segments, searching from the end. A segment that is
 * or ends with a full state name is never treated as a country ("South Australia").
 */
function peelCountry(
  segments: string[],
  options: LocationOptions
): { segments: string[]; country: string | null } {
  // Longest alias first so "United States of America" wins over "United States"
  const aliases = Object.entries(options.countries).sort(([a], [b]) => b.length - a.length);

  for (let index = segments.length - 1; index >= 0; index--) {
    const segment = segments[index];
    if (endsWithStateName(segment, options.abbreviations) || lookupCode(segment, options.abbreviations)) {
      continue;
    }

    for (const [alias, canonical] of aliases) {
      if (segment.toLowerCase() === alias.toLowerCase()) {
        return { segments: segments.filter((_, i) => i !== index), country: canonical };
      }
      if (endsWithWords(segment, alias)) {
        const remainder = segment.slice(0, segment.length - alias.length).trim();
        const next = [...segments];
        next[index] = remainder;
        return { segments: next, country: canonical };
      }
    }
  }

  return findCountryInside(segments, aliases, options.abbreviations);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Upper-case codes such as "UK" only match upper case, so "us" in plain words is not a country
function wordPattern(phrase: string): RegExp {
  const isCode = phrase === phrase.toUpperCase();
  return new RegExp(`(?<![A-Za-z0-9])${escapeRegExp(phrase)}(?![A-Za-z0-9])`, isCode ? "" : "i");
}

/**
 * Country mentioned anywhere in a segment, e.g. "Remote (New Zealand)". Mentions inside
 * a full state name are skipped.
 */
function findCountryInside(
  segments: string[],
  aliases: Array<[string, string]>,
  abbreviations: Record<string, string>
): { segments: string[]; country: string | null } {
  for (let index = segments.length - 1; index >= 0; index--) {
    const segment = segments[index];
    const stateSpans = Object.values(abbreviations).flatMap((name) => {
      const match = wordPattern(name).exec(segment);
      return match ? [{ start: match.index, end: match.index + match[0].length }] : [];
    });

    for (const [alias, canonical] of aliases) {
      const match = wordPattern(alias).exec(segment);
      if (!match) continue;
      const start = match.index;
      const end = start + match[0].length;
      if (stateSpans.some((span) => start >= span.start && end <= span.end)) continue;

      const next = [...segments];
      next[index] = (segment.slice(0, start) + segment.slice(end))
        .replace(/\(\s*\)|\[\s*\]/g, "")
        .replace(/\s+/g, " ")
        .replace(/^[\s,;:/(-]+|[\s,;:/(-]+$/g, "")
        .trim();
      return { segments: next, country: canonical };
    }
  }

  return { segments, country: null };
}

/**
 * Peels a trailing state name or code off a single segment ("Sydney NSW", "Sydney-NSW")
 */
function splitSingleSegment(
  segment: string,
  abbreviations: Record<string, string>
): { city: string; state: string } {
  const whole = expandState(segment, abbreviations);
  if (whole) {
    return { city: "", state: whole };
  }

  const names = Object.values(abbreviations).sort((a, b) => b.length - a.length);
  for (const name of names) {
    if (endsWithWords(segment, name)) {
      return { city: segment.slice(0, segment.length - name.length).trim(), state: name };
    }
  }

  const tokens = segment.split(" ");
  if (tokens.length > 1) {
    const expanded = lookupCode(tokens[tokens.length - 1], abbreviations);
    if (expanded) {
      return { city: tokens.slice(0, -1).join(" "), state: expanded };
    }
  }

  // "Sydney-NSW"
  const dashed = /^(.+?)\s*[-–—]\s*([A-Za-z]{2,4})$/.exec(segment);
  if (dashed) {
    const expanded = lookupCode(dashed[2], abbreviations);
    if (expanded) {
      return { city: dashed[1], state: expanded };
    }
  }

  return { city: segment, state: "" };
}

/**
 * Resolves location text such as "Parramatta, NSW" or "London - United Kingdom"
 */
export function resolveLocation(text: string | null | undefined, options: LocationOptions): LocationParts {
  const empty: LocationParts = { city: "", state: "", country: options.homeCountry };
  if (!text || !text.trim()) return empty;

  const peeled = peelCountry(splitSegments(text), options);
  const segments = peeled.segments.filter((segment) => segment.length > 0);
  const country = peeled.country ?? options.homeCountry;

  if (segments.length === 0) {
    return { ...empty, country };
  }

  if (segments.length === 1) {
    return { ...splitSingleSegment(segments[0], options.abbreviations), country };
  }

  const [first, ...rest] = segments;
  const firstAsState = expandState(first, options.abbreviations);
  if (firstAsState) {
    return { city: "", state: firstAsState, country };
  }

  let state = rest[0];
  for (const segment of rest) {
    const expanded = expandState(segment, options.abbreviations);
    if (expanded) {
      state = expanded;
      break;
    }
  }

  return { city: first, state, country };
}

/**
 * Display form "City, State", falling back to the country
 */
export function formatLocationName(location: LocationParts): string {
  const parts = [location.city, location.state].filter((part) => part.length > 0);
  return parts.length > 0 ? parts.join(", ") : location.country;
}
