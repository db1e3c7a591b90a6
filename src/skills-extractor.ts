/**
 * Skills Extractor Module
 * Matches the skill vocabulary against a job description and splits the hits
 * into required and preferred skills by the context they appear in
 */

import type { SkillVocabulary } from "./config";
import { cleanText, looksLikeHtml } from "./text-normalizer";
import type { SkillExtraction, SkillSource } from "./types";

type SkillKind = "technical" | "domain" | "soft";
type Context = "required" | "preferred";

export interface SkillExtractionOptions {
  vocabulary: SkillVocabulary;
  requiredCap?: number;
  preferredCap?: number;
  /** Maximum length of each list joined with ", " */
  charBudget?: number;
  /** Fill empty lists from the title map, then the defaults */
  fallback?: boolean;
  titleSkillMap?: Record<string, string[]>;
  defaultSkills?: { required: string[]; preferred: string[] };
  requiredIndicators?: string[];
  preferredIndicators?: string[];
}

interface SkillMatcher {
  name: string;
  kind: SkillKind;
  phrase: RegExp;
  /** Whole-word patterns for each significant word of a multi-word skill */
  words: RegExp[] | null;
}

interface SkillHit {
  name: string;
  kind: SkillKind;
  position: number;
  preferred: boolean;
}

export const REQUIRED_INDICATORS = [
  "required",
  "requirements",
  "requirement",
  "must have",
  "must",
  "essential",
  "mandatory",
  "necessary",
  "you will need",
  "minimum",
  "candidate must",
];

export const PREFERRED_INDICATORS = [
  "preferred",
  "desirable",
  "advantageous",
  "beneficial",
  "nice to have",
  "would be an advantage",
  "highly regarded",
  "bonus",
  "ideal candidate",
  "would be great",
  "a plus",
];

// Overflow from the required list moves the most specialized skills first
const SPECIALIZATION: Record<SkillKind, number> = {
  technical: 3,
  domain: 2,
  soft: 1,
};

const STOPWORDS = new Set(["and", "with", "the", "for", "of", "to", "in", "on"]);

const matcherCache = new WeakMap<SkillVocabulary, SkillMatcher[]>();
const phraseCache = new Map<string, RegExp>();

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function boundedPattern(phrase: string): RegExp {
  const key = phrase.toLowerCase();
  const cached = phraseCache.get(key);
  if (cached) return cached;

  const pattern = new RegExp(`(?<![a-z0-9])${escapeRegExp(key)}(?![a-z0-9])`, "i");
  phraseCache.set(key, pattern);
  return pattern;
}

function getMatchers(vocabulary: SkillVocabulary): SkillMatcher[] {
  const cached = matcherCache.get(vocabulary);
  if (cached) return cached;

  const matchers: SkillMatcher[] = [];
  const seen = new Set<string>();
  const kinds: SkillKind[] = ["technical", "domain", "soft"];

  for (const kind of kinds) {
    for (const name of vocabulary[kind]) {
      const key = name.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);

      const significant = key.split(/\s+/).filter((word) => word.length > 1 && !STOPWORDS.has(word));
      matchers.push({
        name,
        kind,
        phrase: boundedPattern(name),
        words: key.includes(" ") && significant.length >= 2 ? significant.map(boundedPattern) : null,
      });
    }
  }

  matcherCache.set(vocabulary, matchers);
  return matchers;
}

function findInUnit(matcher: SkillMatcher, unit: string): number {
  const exact = matcher.phrase.exec(unit);
  if (exact) return exact.index;
  if (!matcher.words) return -1;

  let first = Number.POSITIVE_INFINITY;
  for (const word of matcher.words) {
    const hit = word.exec(unit);
    if (!hit) return -1;
    first = Math.min(first, hit.index);
  }
  return first;
}

function containsIndicator(text: string, indicators: string[]): boolean {
  return indicators.some((indicator) => boundedPattern(indicator).test(text));
}

function classifyUnit(text: string, required: string[], preferred: string[]): Context | null {
  if (containsIndicator(text, preferred)) return "preferred";
  if (containsIndicator(text, required)) return "required";
  return null;
}

function isBulletLine(line: string): boolean {
  return /^(?:[-•*▪●]|\d+[.)])\s*/.test(line);
}

function isHeadingLine(line: string): boolean {
  if (isBulletLine(line) || /[.!?]$/.test(line)) return false;
  return line.split(/\s+/).length <= 8;
}

function mentionsSkill(line: string, matchers: SkillMatcher[]): boolean {
  return matchers.some((matcher) => findInUnit(matcher, line) >= 0);
}

/**
 * Scans the document unit by unit (title, then each sentence of each line) and
 * records the first position of every skill and whether any hit was in a preferred unit
 */
function collectHits(
  title: string,
  text: string,
  matchers: SkillMatcher[],
  requiredIndicators: string[],
  preferredIndicators: string[]
): SkillHit[] {
  const hits = new Map<string, SkillHit>();

  const record = (unit: string, offset: number, context: Context | null) => {
    for (const matcher of matchers) {
      const index = findInUnit(matcher, unit);
      if (index < 0) continue;

      const preferred = context === "preferred";
      const existing = hits.get(matcher.name);
      if (existing) {
        existing.preferred = existing.preferred || preferred;
      } else {
        hits.set(matcher.name, { name: matcher.name, kind: matcher.kind, position: offset + index, preferred });
      }
    }
  };

  if (title.trim()) {
    record(title, -title.length - 1, null);
  }

  // A heading's context lasts until the blank line that ends its block or the next neutral heading
  let heading: Context | null = null;
  let blockStarted = false;
  let offset = 0;
  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    const lineOffset = offset;
    offset += rawLine.length + 1;
    if (!line) {
      if (blockStarted) heading = null;
      continue;
    }

    const kind = isHeadingLine(line) ? classifyUnit(line, requiredIndicators, preferredIndicators) : null;
    if (kind) {
      heading = kind;
      blockStarted = false;
    } else if (isHeadingLine(line) && (line.endsWith(":") || !mentionsSkill(line, matchers))) {
      heading = null;
      blockStarted = false;
    } else {
      blockStarted = true;
    }

    let unitOffset = lineOffset;
    for (const unit of line.split(/(?<=[.!?;])\s+/)) {
      const context = classifyUnit(unit, requiredIndicators, preferredIndicators) ?? heading;
      record(unit, unitOffset, context);
      unitOffset += unit.length + 1;
    }
  }

  return Array.from(hits.values()).sort((a, b) => a.position - b.position);
}

/**
 * Keeps whole skills while the ", "-joined list fits in the budget
 */
export function fitToBudget(skills: string[], budget: number): { skills: string[]; truncated: boolean } {
  const kept: string[] = [];
  let length = 0;

  for (const skill of skills) {
    const added = (kept.length > 0 ? 2 : 0) + skill.length;
    if (length + added > budget) {
      return { skills: kept, truncated: true };
    }
    kept.push(skill);
    length += added;
  }

  return { skills: kept, truncated: false };
}

/**
 * Moves required overflow into preferred, most specialized and latest first
 */
function balance(
  required: SkillHit[],
  preferred: SkillHit[],
  requiredCap: number,
  preferredCap: number
): { required: SkillHit[]; preferred: SkillHit[] } {
  if (required.length <= requiredCap) {
    return { required, preferred: preferred.slice(0, preferredCap) };
  }

  const excess = required.length - requiredCap;
  const ranked = [...required].sort(
    (a, b) => SPECIALIZATION[b.kind] - SPECIALIZATION[a.kind] || b.position - a.position
  );
  const overflow = new Set(ranked.slice(0, excess).map((hit) => hit.name));
  const room = Math.max(0, preferredCap - preferred.length);

  const moved = ranked.slice(0, Math.min(excess, room));
  return {
    required: required.filter((hit) => !overflow.has(hit.name)),
    preferred: [...preferred, ...moved].sort((a, b) => a.position - b.position).slice(0, preferredCap),
  };
}

function skillsFromTitle(title: string, titleSkillMap: Record<string, string[]>): string[] {
  const skills: string[] = [];
  for (const [keyword, mapped] of Object.entries(titleSkillMap)) {
    if (!boundedPattern(keyword).test(title)) continue;
    for (const skill of mapped) {
      if (!skills.includes(skill)) skills.push(skill);
    }
  }
  return skills;
}

/**
 * Extracts required and preferred skills. The lists never share a skill and
 * each stays within the character budget. Internal errors yield empty lists.
 */
export function extractSkills(
  description: string | null | undefined,
  title: string | null | undefined,
  options: SkillExtractionOptions
): SkillExtraction {
  const requiredCap = options.requiredCap ?? 12;
  const preferredCap = options.preferredCap ?? 8;
  const charBudget = options.charBudget ?? 200;

  try {
    const rawText = description ?? "";
    const text = looksLikeHtml(rawText) ? cleanText(rawText) : rawText;
    const titleText = title ?? "";

    const hits = collectHits(
      titleText,
      text,
      getMatchers(options.vocabulary),
      options.requiredIndicators ?? REQUIRED_INDICATORS,
      options.preferredIndicators ?? PREFERRED_INDICATORS
    );
    const balanced = balance(
      hits.filter((hit) => !hit.preferred),
      hits.filter((hit) => hit.preferred),
      requiredCap,
      preferredCap
    );

    let required = balanced.required.map((hit) => hit.name);
    let preferred = balanced.preferred.map((hit) => hit.name);
    let source: SkillSource = hits.length > 0 ? "description" : "none";
    let fallbackUsed = false;

    if (options.fallback && required.length === 0) {
      const fromTitle = skillsFromTitle(titleText, options.titleSkillMap ?? {}).filter(
        (skill) => !preferred.includes(skill)
      );
      const defaults = (options.defaultSkills?.required ?? []).filter((skill) => !preferred.includes(skill));
      required = (fromTitle.length > 0 ? fromTitle : defaults).slice(0, requiredCap);
      if (required.length > 0) {
        fallbackUsed = true;
        if (source === "none") source = fromTitle.length > 0 ? "title" : "defaults";
      }
    }
    if (options.fallback && preferred.length === 0) {
      const fromTitle = skillsFromTitle(titleText, options.titleSkillMap ?? {}).filter(
        (skill) => !required.includes(skill)
      );
      const defaults = (options.defaultSkills?.preferred ?? []).filter((skill) => !required.includes(skill));
      preferred = (fromTitle.length > 0 ? fromTitle : defaults).slice(0, preferredCap);
      if (preferred.length > 0) {
        fallbackUsed = true;
        if (source === "none") source = fromTitle.length > 0 ? "title" : "defaults";
      }
    }

    const fittedRequired = fitToBudget(required, charBudget);
    const fittedPreferred = fitToBudget(preferred, charBudget);

    return {
      required: fittedRequired.skills,
      preferred: fittedPreferred.skills,
      truncated: fittedRequired.truncated || fittedPreferred.truncated,
      fallbackUsed,
      source,
    };
  } catch {
    return { required: [], preferred: [], truncated: false, fallbackUsed: false, source: "error" };
  }
}
