/**
 * Job Categorizer Module
 * Scores job categories by keyword occurrences in the title and description
 */

import { JOB_CATEGORIES, type JobCategory } from "./types";

export type CategoryKeywords = Partial<Record<JobCategory, string[]>>;

const TITLE_WEIGHT = 2;

const patternCache = new WeakMap<CategoryKeywords, Array<[JobCategory, RegExp[]]>>();

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Whole-word pattern that also works for keywords starting or ending in a symbol (".net", "ui/ux")
 */
export function keywordPattern(keyword: string): RegExp {
  return new RegExp(`(?<![a-z0-9])${escapeRegExp(keyword.toLowerCase())}(?![a-z0-9])`, "g");
}

function isJobCategoryEntry(entry: [string, string[] | undefined]): entry is [JobCategory, string[]] {
  return entry[1] !== undefined && JOB_CATEGORIES.some((category) => category === entry[0]);
}

function getPatterns(categoryKeywords: CategoryKeywords): Array<[JobCategory, RegExp[]]> {
  const cached = patternCache.get(categoryKeywords);
  if (cached) return cached;

  const compiled: Array<[JobCategory, RegExp[]]> = Object.entries(categoryKeywords)
    .filter(isJobCategoryEntry)
    .map(([category, keywords]): [JobCategory, RegExp[]] => [category, keywords.map(keywordPattern)]);
  patternCache.set(categoryKeywords, compiled);
  return compiled;
}

function countMatches(pattern: RegExp, text: string): number {
  if (!text) return 0;
  return Array.from(text.matchAll(pattern)).length;
}

/**
 * Score per category: keyword hits across title and description, with title hits counted three times
 */
export function scoreCategories(
  title: string,
  description: string,
  categoryKeywords: CategoryKeywords
): Array<{ category: JobCategory; score: number }> {
  const lowerTitle = title.toLowerCase();
  const combined = `${lowerTitle}\n${description.toLowerCase()}`;

  return getPatterns(categoryKeywords).map(([category, patterns]) => ({
    category,
    score: patterns.reduce(
      (total, pattern) =>
        total + countMatches(pattern, combined) + TITLE_WEIGHT * countMatches(pattern, lowerTitle),
      0
    ),
  }));
}

/**
 * Highest scoring category; ties go to the category listed first, no hits → "other"
 */
export function categorizeJob(
  title: string | null | undefined,
  description: string | null | undefined,
  categoryKeywords: CategoryKeywords
): JobCategory {
  let best: JobCategory = "other";
  let bestScore = 0;

  for (const { category, score } of scoreCategories(title ?? "", description ?? "", categoryKeywords)) {
    if (score > bestScore) {
      best = category;
      bestScore = score;
    }
  }

  return best;
}
