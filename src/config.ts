/**
 * Pipeline Configuration Module
 * Loads the lookup tables from data/ once and merges environment defaults and per-scraper overrides
 */

import { readFileSync } from "fs";
import { join } from "path";
import { JOB_CATEGORIES, type JobCategory } from "./types";

const DATA_DIR = join(__dirname, "..", "data");

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export interface SkillVocabulary {
  technical: string[];
  soft: string[];
  domain: string[];
}

export interface FieldLimits {
  title: number;
  companyName: number;
  locationName: number;
  locationPart: number;
  externalId: number;
  externalSource: number;
  salaryRawText: number;
  postedAgo: number;
  slug: number;
}

export interface PipelineConfig {
  homeCountry: string;
  defaultCurrency: string;
  skillVocabulary: SkillVocabulary;
  abbreviationTable: Record<string, string>;
  countryAliases: Record<string, string>;
  boilerplateDenylist: string[];
  titleSkillMap: Record<string, string[]>;
  defaultSkills: { required: string[]; preferred: string[] };
  categoryKeywords: Partial<Record<JobCategory, string[]>>;
  /** Fill empty skill lists from the title map and generic defaults */
  skillFallback: boolean;
  skillCharBudget: number;
  requiredSkillCap: number;
  preferredSkillCap: number;
  salaryPlausibleRange: { min: number; max: number };
  referenceHour: number;
  fieldLimits: FieldLimits;
}

export type PipelineConfigOverrides = Partial<Omit<PipelineConfig, "fieldLimits">> & {
  fieldLimits?: Partial<FieldLimits>;
};

// Column sizes of the job_postings table
export const DEFAULT_FIELD_LIMITS: FieldLimits = {
  title: 200,
  companyName: 200,
  locationName: 100,
  locationPart: 100,
  externalId: 100,
  externalSource: 100,
  salaryRawText: 200,
  postedAgo: 50,
  slug: 250,
};

interface DataTables {
  skillVocabulary: SkillVocabulary;
  abbreviationTable: Record<string, string>;
  countryAliases: Record<string, string>;
  boilerplateDenylist: string[];
  titleSkillMap: Record<string, string[]>;
  defaultSkills: { required: string[]; preferred: string[] };
  categoryKeywords: Partial<Record<JobCategory, string[]>>;
}

let cachedTables: DataTables | null = null;

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isJobCategory(value: string): value is JobCategory {
  return JOB_CATEGORIES.some((category) => category === value);
}

function readDataFile(fileName: string): unknown {
  const filePath = join(DATA_DIR, fileName);
  try {
    return JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read table ${fileName}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function toStringRecord(value: unknown, fileName: string): Record<string, string> {
  if (!isRecord(value)) {
    throw new ConfigurationError(`${fileName} must contain an object`);
  }
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== "string") {
      throw new ConfigurationError(`${fileName}: value for "${key}" must be a string`);
    }
    result[key] = entry;
  }
  return result;
}

function toStringListRecord(value: unknown, fileName: string): Record<string, string[]> {
  if (!isRecord(value)) {
    throw new ConfigurationError(`${fileName} must contain an object`);
  }
  const result: Record<string, string[]> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (!isStringArray(entry)) {
      throw new ConfigurationError(`${fileName}: value for "${key}" must be a list of strings`);
    }
    result[key] = entry;
  }
  return result;
}

function toStringList(value: unknown, fileName: string): string[] {
  if (!isStringArray(value)) {
    throw new ConfigurationError(`${fileName} must contain a list of strings`);
  }
  return value;
}

function loadDataTables(): DataTables {
  if (cachedTables) {
    return cachedTables;
  }

  const vocabulary = toStringListRecord(readDataFile("skill-vocabulary.json"), "skill-vocabulary.json");
  const defaults = toStringListRecord(readDataFile("default-skills.json"), "default-skills.json");

  const categoryKeywords: Partial<Record<JobCategory, string[]>> = {};
  const rawCategories = toStringListRecord(readDataFile("job-categories.json"), "job-categories.json");
  for (const [category, keywords] of Object.entries(rawCategories)) {
    if (!isJobCategory(category)) {
      throw new ConfigurationError(`job-categories.json: unknown category "${category}"`);
    }
    categoryKeywords[category] = keywords;
  }

  cachedTables = {
    skillVocabulary: {
      technical: vocabulary.technical ?? [],
      soft: vocabulary.soft ?? [],
      domain: vocabulary.domain ?? [],
    },
    abbreviationTable: toStringRecord(readDataFile("state-abbreviations.json"), "state-abbreviations.json"),
    countryAliases: toStringRecord(readDataFile("countries.json"), "countries.json"),
    boilerplateDenylist: toStringList(readDataFile("boilerplate-phrases.json"), "boilerplate-phrases.json"),
    titleSkillMap: toStringListRecord(readDataFile("title-skills.json"), "title-skills.json"),
    defaultSkills: {
      required: defaults.required ?? [],
      preferred: defaults.preferred ?? [],
    },
    categoryKeywords,
  };
  return cachedTables;
}

export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) return defaultValue;
  return ["true", "1", "yes"].includes(value.trim().toLowerCase());
}

/**
 * Throws ConfigurationError for settings no job can be normalized with
 */
export function validateConfig(config: PipelineConfig): void {
  if (!config.homeCountry.trim()) {
    throw new ConfigurationError("homeCountry must not be empty");
  }
  if (!/^[A-Z]{3}$/.test(config.defaultCurrency)) {
    throw new ConfigurationError(`defaultCurrency must be a 3-letter ISO code, got "${config.defaultCurrency}"`);
  }
  const { technical, soft, domain } = config.skillVocabulary;
  if (technical.length + soft.length + domain.length === 0) {
    throw new ConfigurationError("skillVocabulary is empty");
  }
  if (Object.keys(config.categoryKeywords).length === 0) {
    throw new ConfigurationError("categoryKeywords is empty");
  }

  const positive: Array<[string, number]> = [
    ["skillCharBudget", config.skillCharBudget],
    ["requiredSkillCap", config.requiredSkillCap],
    ["preferredSkillCap", config.preferredSkillCap],
    ...Object.entries(config.fieldLimits).map(
      ([field, limit]): [string, number] => [`fieldLimits.${field}`, limit]
    ),
  ];
  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value <= 0) {
      throw new ConfigurationError(`${name} must be a positive integer, got ${value}`);
    }
  }

  if (!Number.isInteger(config.referenceHour) || config.referenceHour < 0 || config.referenceHour > 23) {
    throw new ConfigurationError(`referenceHour must be between 0 and 23, got ${config.referenceHour}`);
  }
  if (config.salaryPlausibleRange.min >= config.salaryPlausibleRange.max) {
    throw new ConfigurationError("salaryPlausibleRange.min must be below salaryPlausibleRange.max");
  }
}

/**
 * Builds the configuration for one scraper. Tables come from data/, scalar
 * defaults from the environment, and explicit overrides win over both.
 */
export function loadPipelineConfig(overrides: PipelineConfigOverrides = {}): PipelineConfig {
  const tables = loadDataTables();
  const { fieldLimits, ...rest } = overrides;

  const config: PipelineConfig = {
    homeCountry: process.env.HOME_COUNTRY || "Australia",
    defaultCurrency: (process.env.DEFAULT_CURRENCY || "AUD").toUpperCase(),
    ...tables,
    skillFallback: parseBoolean(process.env.SKILL_FALLBACK, false),
    skillCharBudget: 200,
    requiredSkillCap: 12,
    preferredSkillCap: 8,
    salaryPlausibleRange: { min: 1000, max: 1000000 },
    referenceHour: 9,
    ...rest,
    fieldLimits: { ...DEFAULT_FIELD_LIMITS, ...fieldLimits },
  };

  validateConfig(config);
  return config;
}
