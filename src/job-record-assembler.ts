/**
 * Job Record Assembler Module
 * Runs every normalizer over a raw fragment and assembles the storage-ready record
 */

import { createHash } from "crypto";
import type { PipelineConfig } from "./config";
import { matchPostedDate, findPostedTextInText } from "./date-resolver";
import { categorizeJob } from "./job-categorizer";
import { detectJobType, detectWorkMode } from "./job-type-classifier";
import { formatLocationName, resolveLocation } from "./location-resolver";
import { findSalaryInText, parseSalary } from "./salary-parser";
import { extractSkills } from "./skills-extractor";
import { runStrategies } from "./strategy-chain";
import { cleanText, looksLikeHtml, toMinimalHtml } from "./text-normalizer";
import type {
  CleanDescription,
  JobCategory,
  JobType,
  LocationParts,
  NormalizationIssue,
  NormalizationResult,
  NormalizedJobRecord,
  RawJobFragment,
  SalaryInfo,
  SkillExtraction,
  WorkMode,
} from "./types";

export const UNTITLED_POSITION = "Untitled Position";
export const UNKNOWN_COMPANY = "Unknown Company";

/**
 * Query parameters that carry a job id, checked in order
 */
const ID_QUERY_PARAMS = ["jobId", "job_id", "jobid", "id", "jid", "adid"];

export interface NormalizedParts {
  title: string;
  companyName: string;
  location: LocationParts;
  description: CleanDescription;
  salary: SalaryInfo;
  jobType: JobType;
  workMode: WorkMode;
  jobCategory: JobCategory;
  postedAt: Date;
  postedAtDefaulted: boolean;
  postedAgo: string;
  skills: SkillExtraction;
}

export interface NormalizeOptions {
  now?: Date;
}

function sha256(value: string): string {
  return createHash("sha256").update(value).digest("hex");
}

function collapseWhitespace(value: string | null | undefined): string {
  return (value ?? "").replace(/\s+/g, " ").trim();
}

/**
 * Single-line text from a field that may hold markup
 */
function inlineText(value: string | null | undefined): string {
  const raw = value ?? "";
  return collapseWhitespace(looksLikeHtml(raw) ? cleanText(raw) : raw);
}

/**
 * Cuts text to the limit at the last word boundary, falling back to a hard cut
 * when the boundary would drop more than half of the text
 */
export function truncateAtWord(value: string, limit: number): { value: string; truncated: boolean } {
  if (value.length <= limit) return { value, truncated: false };

  const cut = value.slice(0, limit);
  const lastSpace = cut.lastIndexOf(" ");
  const atWord = lastSpace > limit / 2 ? cut.slice(0, lastSpace) : cut;
  return { value: atWord.replace(/[\s,;:\-–]+$/, ""), truncated: true };
}

export function slugify(value: string): string {
  return value
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

function idFromQuery(url: string): string | null {
  const parsed = new URL(url);
  for (const name of ID_QUERY_PARAMS) {
    const value = parsed.searchParams.get(name);
    if (value && value.trim()) return value.trim();
  }
  return null;
}

function idFromPath(url: string): string | null {
  const segments = new URL(url).pathname
    .split("/")
    .map((segment) => decodeURIComponent(segment).trim())
    .filter((segment) => segment.length > 0)
    .reverse();

  for (const segment of segments) {
    if (/^\d{4,}$/.test(segment)) return segment;
  }
  for (const segment of segments) {
    // Slug ending in a number: "senior-developer-123456"
    const trailing = /[-_](\d{4,})$/.exec(segment);
    if (trailing) return trailing[1];
  }
  for (const segment of segments) {
    const uuid = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i.test(segment);
    const opaque = /^(?=.*\d)(?=.*[a-z])[a-z0-9]{8,}$/i.test(segment);
    if (uuid || opaque) return segment;
  }
  return null;
}

/**
 * Stable id for the job: explicit id, then an id-like query parameter, then a
 * numeric or opaque path segment, then a 16-hex hash of the URL
 */
export function deriveExternalId(
  explicitId: string | null | undefined,
  url: string
): { id: string; hashed: boolean } {
  const outcome = runStrategies<string>([
    { name: "explicit", run: () => collapseWhitespace(explicitId) },
    { name: "query", run: () => idFromQuery(url) },
    { name: "path", run: () => idFromPath(url) },
  ]);

  if (outcome.value !== null) {
    return { id: outcome.value, hashed: false };
  }
  return { id: sha256(url).slice(0, 16), hashed: true };
}

function deriveSource(fragmentSource: string | undefined, url: string): string {
  const explicit = collapseWhitespace(fragmentSource);
  if (explicit) return explicit;

  try {
    const hostname = new URL(url).hostname.replace(/^www\./, "");
    return hostname || "unknown";
  } catch {
    return "unknown";
  }
}

function buildSlug(title: string, externalId: string, limit: number): string {
  const idPart = slugify(externalId) || sha256(externalId).slice(0, 16);
  const titlePart = slugify(title) || "job";
  const room = limit - idPart.length - 1;
  const trimmedTitle = titlePart.slice(0, Math.max(room, 0)).replace(/-+$/, "");
  return (trimmedTitle ? `${trimmedTitle}-${idPart}` : idPart).slice(0, limit);
}

/**
 * Applies field caps and sentinels, derives identifiers and reports data-quality issues
 */
export function assembleRecord(
  fragment: RawJobFragment,
  parts: NormalizedParts,
  config: PipelineConfig
): NormalizationResult {
  const issues: NormalizationIssue[] = [];
  const limits = config.fieldLimits;

  const capField = (field: string, value: string, limit: number): string => {
    const result = truncateAtWord(value, limit);
    if (result.truncated) issues.push(`field_truncated:${field}`);
    return result.value;
  };

  let title = parts.title;
  if (!title) {
    issues.push("title_missing");
    title = UNTITLED_POSITION;
  } else {
    const truncated = truncateAtWord(title, limits.title);
    if (truncated.truncated) issues.push("title_truncated");
    title = truncated.value;
  }

  let companyName = parts.companyName;
  if (!companyName) {
    issues.push("company_missing");
    companyName = UNKNOWN_COMPANY;
  } else {
    companyName = capField("company_name", companyName, limits.companyName);
  }

  const location: LocationParts = {
    city: capField("city", parts.location.city, limits.locationPart),
    state: capField("state", parts.location.state, limits.locationPart),
    country: capField("country", parts.location.country, limits.locationPart),
  };
  if (!location.city && !location.state) {
    issues.push("location_defaulted");
  }
  const locationName = capField("location_name", formatLocationName(location), limits.locationName);

  if (!parts.description.text) {
    issues.push("description_empty");
  }

  const salary: SalaryInfo = {
    ...parts.salary,
    rawText: capField("salary_raw_text", parts.salary.rawText, limits.salaryRawText),
  };
  if (salary.rawText && salary.min === null) {
    issues.push("salary_unparsed");
  }

  if (parts.postedAtDefaulted) {
    issues.push("posted_at_defaulted");
  }
  const postedAgo = capField("posted_ago", parts.postedAgo, limits.postedAgo);

  const { skills } = parts;
  if (skills.source === "error") {
    issues.push("skills_failed");
  } else if (skills.required.length === 0 && skills.preferred.length === 0) {
    issues.push("skills_empty");
  }
  if (skills.fallbackUsed) issues.push("skills_fallback_used");
  if (skills.truncated) issues.push("skills_truncated");

  let externalUrl = (fragment.url ?? "").trim();
  if (!externalUrl) {
    issues.push("external_url_synthesized");
    externalUrl = `urn:job:${sha256(`${title}|${companyName}|${locationName}`.toLowerCase()).slice(0, 32)}`;
  }

  const externalIdResult = deriveExternalId(fragment.externalId, externalUrl);
  if (externalIdResult.hashed) issues.push("external_id_hashed");
  const externalId = capField("external_id", externalIdResult.id, limits.externalId);
  const externalSource = capField("external_source", deriveSource(fragment.source, externalUrl), limits.externalSource);

  const record: NormalizedJobRecord = {
    title,
    companyName,
    location,
    locationName,
    description: parts.description.text,
    descriptionHtml: parts.description.html,
    salary,
    jobType: parts.jobType,
    workMode: parts.workMode,
    jobCategory: parts.jobCategory,
    postedAt: parts.postedAt,
    postedAgo,
    skills: skills.required,
    preferredSkills: skills.preferred,
    externalUrl,
    externalId,
    externalSource,
    slug: buildSlug(title, externalId, limits.slug),
  };

  return { record, issues };
}

/**
 * Normalizes one raw fragment into a record plus the issues found on the way
 */
export function normalizeFragment(
  fragment: RawJobFragment,
  config: PipelineConfig,
  options: NormalizeOptions = {}
): NormalizationResult {
  const now = options.now ?? new Date();

  const title = inlineText(fragment.titleText);
  const companyName = inlineText(fragment.companyText);
  const descriptionText = cleanText(fragment.descriptionRaw, { denylist: config.boilerplateDenylist });

  const location = resolveLocation(inlineText(fragment.locationText), {
    homeCountry: config.homeCountry,
    abbreviations: config.abbreviationTable,
    countries: config.countryAliases,
  });

  const salaryOptions = {
    defaultCurrency: config.defaultCurrency,
    plausibleRange: config.salaryPlausibleRange,
  };
  const salary =
    runStrategies<SalaryInfo>([
      {
        name: "salary_field",
        run: () => {
          const info = parseSalary(fragment.salaryText, { ...salaryOptions, labeled: true });
          return info.min !== null ? info : null;
        },
      },
      {
        name: "description_snippet",
        run: () => {
          const snippet = findSalaryInText(descriptionText);
          if (!snippet) return null;
          const info = parseSalary(snippet, { ...salaryOptions, labeled: false });
          return info.min !== null ? info : null;
        },
      },
    ]).value ?? parseSalary(fragment.salaryText, { ...salaryOptions, labeled: true });

  const jobType =
    runStrategies<JobType>([
      { name: "hint", run: () => detectJobType(fragment.jobTypeHintText) },
      { name: "title", run: () => detectJobType(title) },
      { name: "description", run: () => detectJobType(descriptionText) },
    ]).value ?? "full_time";

  const workMode =
    runStrategies<WorkMode>([
      { name: "hint", run: () => detectWorkMode(fragment.workModeHintText) },
      { name: "location", run: () => detectWorkMode(fragment.locationText) },
      { name: "title", run: () => detectWorkMode(title) },
      { name: "description", run: () => detectWorkMode(descriptionText) },
    ]).value ?? "unspecified";

  const dateOptions = { referenceHour: config.referenceHour };
  const postedAt = runStrategies<Date>([
    { name: "posted_text", run: () => matchPostedDate(fragment.postedText, now, dateOptions) },
    {
      name: "description",
      run: () => matchPostedDate(findPostedTextInText(descriptionText), now, dateOptions),
    },
  ]).value;

  const skills = extractSkills(descriptionText, title, {
    vocabulary: config.skillVocabulary,
    requiredCap: config.requiredSkillCap,
    preferredCap: config.preferredSkillCap,
    charBudget: config.skillCharBudget,
    fallback: config.skillFallback,
    titleSkillMap: config.titleSkillMap,
    defaultSkills: config.defaultSkills,
  });

  return assembleRecord(
    fragment,
    {
      title,
      companyName,
      location,
      description: { text: descriptionText, html: toMinimalHtml(descriptionText) },
      salary,
      jobType,
      workMode,
      jobCategory: categorizeJob(title, descriptionText, config.categoryKeywords),
      postedAt: postedAt ?? new Date(now.getTime()),
      postedAtDefaulted: postedAt === null,
      postedAgo: collapseWhitespace(fragment.postedText),
      skills,
    },
    config
  );
}
