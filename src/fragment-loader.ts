/**
 * Fragment Loader Module
 * Reads and validates a JSON array of raw job fragments exported by a scraper
 */

import { readFileSync } from "fs";
import type { RawJobFragment } from "./types";

const OPTIONAL_TEXT_FIELDS = [
  "externalId",
  "source",
  "titleText",
  "companyText",
  "locationText",
  "salaryText",
  "descriptionRaw",
  "postedText",
  "jobTypeHintText",
  "workModeHintText",
] as const;

export interface FragmentLoadResult {
  fragments: RawJobFragment[];
  /** Array index and reason for every entry that was skipped */
  rejected: Array<{ index: number; reason: string }>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toFragment(value: unknown): RawJobFragment | string {
  if (!isRecord(value)) return "entry is not an object";

  const url = value.url ?? "";
  if (typeof url !== "string") return "url must be a string";

  const fragment: RawJobFragment = { url };
  for (const field of OPTIONAL_TEXT_FIELDS) {
    const fieldValue = value[field];
    if (fieldValue === undefined || fieldValue === null) continue;
    if (typeof fieldValue === "number") {
      fragment[field] = String(fieldValue);
    } else if (typeof fieldValue === "string") {
      fragment[field] = fieldValue;
    } else {
      return `${field} must be a string`;
    }
  }
  return fragment;
}

/**
 * Validates parsed JSON. Invalid entries are reported, not thrown.
 */
export function parseFragments(data: unknown): FragmentLoadResult {
  if (!Array.isArray(data)) {
    throw new Error("Fragment file must contain a JSON array");
  }

  const result: FragmentLoadResult = { fragments: [], rejected: [] };
  data.forEach((entry: unknown, index) => {
    const fragment = toFragment(entry);
    if (typeof fragment === "string") {
      result.rejected.push({ index, reason: fragment });
    } else {
      result.fragments.push(fragment);
    }
  });
  return result;
}

export function readFragmentFile(filePath: string): FragmentLoadResult {
  const content = readFileSync(filePath, "utf-8");
  return parseFragments(JSON.parse(content));
}
