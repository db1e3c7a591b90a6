/**
 * Job Posting Database Functions
 * Insert-if-new storage for normalized job records
 */

import { query } from './index';
import { logger } from '../logger';
import type { JobStore, NormalizedJobRecord, UpsertResult } from '../types';
import type { JobPostingRow } from './types';

/**
 * Find a job posting by its external URL
 */
export async function findJobIdByExternalUrl(externalUrl: string): Promise<number | null> {
  const result = await query<{ id: number }>(
    'SELECT id FROM job_postings WHERE external_url = $1 LIMIT 1',
    [externalUrl]
  );
  return result.rows[0]?.id ?? null;
}

/**
 * Get a stored job posting by id
 */
export async function getJobPostingById(id: number): Promise<JobPostingRow | null> {
  const result = await query<JobPostingRow>('SELECT * FROM job_postings WHERE id = $1', [id]);
  return result.rows[0] || null;
}

/**
 * Count stored job postings
 */
export async function countJobPostings(): Promise<number> {
  const result = await query<{ count: string }>('SELECT COUNT(*) as count FROM job_postings');
  return parseInt(result.rows[0]?.count ?? '0', 10);
}

/**
 * Find a job posting with the same title and company, ignoring case
 */
export async function findJobIdByTitleAndCompany(title: string, companyName: string): Promise<number | null> {
  const result = await query<{ id: number }>(
    `SELECT id FROM job_postings
     WHERE lower(title) = lower($1) AND lower(company_name) = lower($2)
     ORDER BY id
     LIMIT 1`,
    [title, companyName]
  );
  return result.rows[0]?.id ?? null;
}

/**
 * Insert a job posting. Returns null when another writer inserted the same URL first.
 */
export async function insertJobPosting(record: NormalizedJobRecord): Promise<number | null> {
  const result = await query<{ id: number }>(
    `INSERT INTO job_postings (
       title, company_name, city, state, country, location_name,
       description, description_html,
       salary_min, salary_max, salary_currency, salary_period, salary_raw_text,
       job_type, work_mode, job_category, posted_at, posted_ago,
       skills, preferred_skills, external_url, external_id, external_source, slug, created_at
     )
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19, $20, $21, $22, $23, $24, NOW())
     ON CONFLICT (external_url) DO NOTHING
     RETURNING id`,
    [
      record.title,
      record.companyName,
      record.location.city,
      record.location.state,
      record.location.country,
      record.locationName,
      record.description,
      record.descriptionHtml,
      record.salary.min,
      record.salary.max,
      record.salary.currency,
      record.salary.period,
      record.salary.rawText,
      record.jobType,
      record.workMode,
      record.jobCategory,
      record.postedAt,
      record.postedAgo,
      record.skills.join(', '),
      record.preferredSkills.join(', '),
      record.externalUrl,
      record.externalId,
      record.externalSource,
      record.slug,
    ]
  );
  return result.rows[0]?.id ?? null;
}

/**
 * Store the record unless it is already known by external URL or by title and company
 */
export async function upsertIfNew(record: NormalizedJobRecord): Promise<UpsertResult> {
  try {
    const byUrl = await findJobIdByExternalUrl(record.externalUrl);
    if (byUrl !== null) {
      return { status: 'duplicate', id: byUrl, matchedOn: 'external_url' };
    }

    const byTitle = await findJobIdByTitleAndCompany(record.title, record.companyName);
    if (byTitle !== null) {
      return { status: 'duplicate', id: byTitle, matchedOn: 'title_company' };
    }

    const insertedId = await insertJobPosting(record);
    if (insertedId !== null) {
      return { status: 'created', id: insertedId };
    }

    // Lost an insert race on the unique URL
    const racedId = await findJobIdByExternalUrl(record.externalUrl);
    if (racedId !== null) {
      return { status: 'duplicate', id: racedId, matchedOn: 'external_url' };
    }
    return { status: 'error', error: `Insert returned no row for ${record.externalUrl}` };
  } catch (error) {
    logger.errorFromException(error, {
      source: 'database.job',
      context: { externalUrl: record.externalUrl },
    });
    return { status: 'error', error: error instanceof Error ? error.message : String(error) };
  }
}

export const postgresJobStore: JobStore = { upsertIfNew };
