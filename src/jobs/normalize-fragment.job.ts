/**
 * Fragment Normalization Job Processor
 * Normalizes one raw fragment and hands the record to the job store
 */

import type Bull from 'bull';
import type { NormalizeFragmentJobData, NormalizeFragmentJobResult } from '../queue';
import { loadPipelineConfig } from '../config';
import { postgresJobStore } from '../database';
import { normalizeFragment } from '../job-record-assembler';
import { logger } from '../logger';
import type { JobStore } from '../types';

function resolveNow(scrapedAt: string | undefined): Date {
  if (!scrapedAt) return new Date();
  const parsed = new Date(scrapedAt);
  return Number.isNaN(parsed.getTime()) ? new Date() : parsed;
}

export async function processNormalizeFragmentJob(
  job: Pick<Bull.Job<NormalizeFragmentJobData>, 'id' | 'data'>,
  store: JobStore = postgresJobStore
): Promise<NormalizeFragmentJobResult> {
  const { fragment, source, scrapedAt, configOverrides } = job.data;
  const url = fragment.url ?? '';

  try {
    const config = loadPipelineConfig(configOverrides);
    const { record, issues } = normalizeFragment(
      { ...fragment, url, source: fragment.source ?? source },
      config,
      { now: resolveNow(scrapedAt) }
    );

    if (issues.length > 0) {
      logger.warning(`Normalized ${record.externalUrl} with ${issues.length} issue(s)`, {
        source: 'normalize-fragment.job',
        context: { jobId: job.id, externalUrl: record.externalUrl, issues },
      });
    }

    const result = await store.upsertIfNew(record);

    if (result.status === 'error') {
      logger.error(`Failed to store ${record.externalUrl}: ${result.error}`, {
        source: 'normalize-fragment.job',
        context: { jobId: job.id, externalUrl: record.externalUrl },
      });
      return { externalUrl: record.externalUrl, success: false, status: 'error', issues, error: result.error };
    }

    if (result.status === 'duplicate') {
      console.debug(`  ⊘ ${record.externalUrl} already stored (matched on ${result.matchedOn})`);
    } else {
      console.debug(`  ✓ Stored ${record.externalUrl} as job posting ${result.id}`);
    }
    return { externalUrl: record.externalUrl, success: true, status: result.status, id: result.id, issues };
  } catch (error) {
    logger.errorFromException(error, {
      source: 'normalize-fragment.job',
      context: { jobId: job.id, url },
    });
    return {
      externalUrl: url,
      success: false,
      status: 'error',
      issues: [],
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
