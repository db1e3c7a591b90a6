/**
 * Job Type Classifier Module
 * Ordered keyword rule tables for employment type and work mode
 */

import type { JobType, WorkMode } from "./types";

interface Rule<T> {
  pattern: RegExp;
  result: T;
}

/**
 * Evaluated top to bottom, first match wins ("full-time casual" is casual)
 */
export const JOB_TYPE_RULES: Rule<JobType>[] = [
  { pattern: /\bcasual\b/i, result: "casual" },
  { pattern: /\bpart[\s-]?time\b/i, result: "part_time" },
  { pattern: /\bcontract(?:or|ing)?\b|\bfixed[\s-]?term\b/i, result: "contract" },
  { pattern: /\btemporary\b|\btemp\b/i, result: "temporary" },
  { pattern: /\bintern(?:ship)?s?\b|\btrainee(?:ship)?s?\b|\bgraduate program\b/i, result: "internship" },
  { pattern: /\bfreelanc(?:e|er|ing)\b/i, result: "freelance" },
  { pattern: /\bfull[\s-]?time\b|\bpermanent\b/i, result: "full_time" },
];

/**
 * Hybrid is checked before remote since postings mentioning both are hybrid
 */
export const WORK_MODE_RULES: Rule<WorkMode>[] = [
  { pattern: /\bhybrid\b/i, result: "hybrid" },
  { pattern: /\bremote(?:ly)?\b|\bwork(?:ing)? from home\b|\bwfh\b|\btelecommut/i, result: "remote" },
  { pattern: /\bon[\s-]?site\b|\bin[\s-]office\b|\bin[\s-]person\b/i, result: "on_site" },
];

function firstMatch<T>(rules: Rule<T>[], text: string | null | undefined): T | null {
  if (!text) return null;
  for (const rule of rules) {
    if (rule.pattern.test(text)) return rule.result;
  }
  return null;
}

export function detectJobType(text: string | null | undefined): JobType | null {
  return firstMatch(JOB_TYPE_RULES, text);
}

export function detectWorkMode(text: string | null | undefined): WorkMode | null {
  return firstMatch(WORK_MODE_RULES, text);
}

export function classifyJobType(text: string | null | undefined): JobType {
  return detectJobType(text) ?? "full_time";
}

export function classifyWorkMode(text: string | null | undefined): WorkMode {
  return detectWorkMode(text) ?? "unspecified";
}
