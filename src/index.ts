/**
 * Job Record Normalizer
 * Public API: turn raw scraped job fragments into canonical job records
 */

export * from './types';
export {
  ConfigurationError,
  DEFAULT_FIELD_LIMITS,
  loadPipelineConfig,
  validateConfig,
  type FieldLimits,
  type PipelineConfig,
  type PipelineConfigOverrides,
  type SkillVocabulary,
} from './config';
export { runStrategies, type Strategy, type StrategyFailure, type StrategyOutcome } from './strategy-chain';
export { cleanText, htmlToText, sanitizeHtml, toMinimalHtml, type CleanTextOptions } from './text-normalizer';
export { resolveLocation, formatLocationName, expandState, type LocationOptions } from './location-resolver';
export { parseSalary, findSalaryInText, formatSalary, type SalaryParseOptions } from './salary-parser';
export { resolvePostedDate, matchPostedDate, type DateResolveOptions } from './date-resolver';
export { classifyJobType, classifyWorkMode, detectJobType, detectWorkMode } from './job-type-classifier';
export { categorizeJob, scoreCategories, type CategoryKeywords } from './job-categorizer';
export { extractSkills, fitToBudget, type SkillExtractionOptions } from './skills-extractor';
export {
  assembleRecord,
  deriveExternalId,
  normalizeFragment,
  slugify,
  truncateAtWord,
  UNKNOWN_COMPANY,
  UNTITLED_POSITION,
  type NormalizeOptions,
  type NormalizedParts,
} from './job-record-assembler';
export { parseFragments, readFragmentFile, type FragmentLoadResult } from './fragment-loader';
export { postgresJobStore } from './database/job';
export { enqueueFragment, enqueueFragments } from './queue';
