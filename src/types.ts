/**
 * Shared pipeline types
 * Raw fragments coming from site adapters and the canonical records handed to storage
 */

export const JOB_TYPES = [
  "full_time",
  "part_time",
  "casual",
  "contract",
  "temporary",
  "internship",
  "freelance",
] as const;

export type JobType = (typeof JOB_TYPES)[number];

export type WorkMode = "remote" | "hybrid" | "on_site" | "unspecified";

export type SalaryPeriod = "hourly" | "daily" | "weekly" | "monthly" | "yearly";

export const JOB_CATEGORIES = [
  "technology",
  "finance",
  "healthcare",
  "marketing",
  "sales",
  "hr",
  "education",
  "retail",
  "hospitality",
  "construction",
  "manufacturing",
  "consulting",
  "legal",
  "other",
] as const;

export type JobCategory = (typeof JOB_CATEGORIES)[number];

/**
 * Raw per-job text captured by a site adapter. Every text field may be missing.
 */
export interface RawJobFragment {
  url?: string;
  externalId?: string;
  source?: string;
  titleText?: string;
  companyText?: string;
  locationText?: string;
  salaryText?: string;
  /** Plain text or an HTML fragment */
  descriptionRaw?: string;
  postedText?: string;
  jobTypeHintText?: string;
  workModeHintText?: string;
}

export interface LocationParts {
  city: string;
  state: string;
  country: string;
}

export interface SalaryInfo {
  min: number | null;
  max: number | null;
  currency: string;
  period: SalaryPeriod;
  rawText: string;
}

export type SkillSource = "description" | "title" | "defaults" | "none" | "error";

export interface SkillExtraction {
  required: string[];
  preferred: string[];
  truncated: boolean;
  /** True when the title map or generic defaults filled a list */
  fallbackUsed: boolean;
  source: SkillSource;
}

export interface CleanDescription {
  text: string;
  html: string;
}

export interface NormalizedJobRecord {
  title: string;
  companyName: string;
  location: LocationParts;
  locationName: string;
  description: string;
  descriptionHtml: string;
  salary: SalaryInfo;
  jobType: JobType;
  workMode: WorkMode;
  jobCategory: JobCategory;
  postedAt: Date;
  postedAgo: string;
  skills: string[];
  preferredSkills: string[];
  externalUrl: string;
  externalId: string;
  externalSource: string;
  slug: string;
}

export type NormalizationIssue =
  | "title_missing"
  | "title_truncated"
  | "company_missing"
  | "location_defaulted"
  | "salary_unparsed"
  | "posted_at_defaulted"
  | "skills_empty"
  | "skills_fallback_used"
  | "skills_truncated"
  | "skills_failed"
  | "description_empty"
  | "external_url_synthesized"
  | "external_id_hashed"
  | `field_truncated:${string}`;

export interface NormalizationResult {
  record: NormalizedJobRecord;
  issues: NormalizationIssue[];
}

export type UpsertResult =
  | { status: "created"; id: number }
  | { status: "duplicate"; id: number; matchedOn: "external_url" | "title_company" }
  | { status: "error"; error: string };

/**
 * Storage collaborator. Owns persistence and duplicate detection.
 */
export interface JobStore {
  upsertIfNew(record: NormalizedJobRecord): Promise<UpsertResult>;
}
