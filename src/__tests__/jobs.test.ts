/**
 * Tests for the Bull fragment normalization processor
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { processNormalizeFragmentJob } from '../jobs/normalize-fragment.job';
import type { NormalizeFragmentJobData } from '../queue';
import type { JobStore, NormalizedJobRecord, UpsertResult } from '../types';

vi.mock('../database', () => ({
  postgresJobStore: {
    upsertIfNew: vi.fn(),
  },
}));

function makeStore(result: UpsertResult): JobStore & { records: NormalizedJobRecord[] } {
  const records: NormalizedJobRecord[] = [];
  return {
    records,
    async upsertIfNew(record) {
      records.push(record);
      return result;
    },
  };
}

function makeJob(data: NormalizeFragmentJobData) {
  return { id: 1, data };
}

const FRAGMENT = {
  url: 'https://jobs.example.com/job/81234567',
  titleText: 'Casual Barista',
  companyText: 'Corner Cafe',
  locationText: 'Newtown, NSW',
  postedText: '2 days ago',
};

describe('Job Processors', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('processNormalizeFragmentJob', () => {
    it('should normalize the fragment and store a new record', async () => {
      const store = makeStore({ status: 'created', id: 42 });

      const result = await processNormalizeFragmentJob(
        makeJob({ fragment: FRAGMENT, scrapedAt: '2024-01-10T09:00:00Z' }),
        store
      );

      expect(result).toMatchObject({
        externalUrl: 'https://jobs.example.com/job/81234567',
        success: true,
        status: 'created',
        id: 42,
      });
      expect(store.records).toHaveLength(1);
      expect(store.records[0].jobType).toBe('casual');
      expect(store.records[0].location.state).toBe('New South Wales');
      expect(store.records[0].postedAt.toISOString()).toBe('2024-01-08T09:00:00.000Z');
    });

    it('should use the queued source when the fragment has none', async () => {
      const store = makeStore({ status: 'created', id: 1 });

      await processNormalizeFragmentJob(makeJob({ fragment: FRAGMENT, source: 'example-board' }), store);

      expect(store.records[0].externalSource).toBe('example-board');
    });

    it('should report duplicates as successful', async () => {
      const store = makeStore({ status: 'duplicate', id: 7, matchedOn: 'title_company' });

      const result = await processNormalizeFragmentJob(makeJob({ fragment: FRAGMENT }), store);

      expect(result.success).toBe(true);
      expect(result.status).toBe('duplicate');
      expect(result.id).toBe(7);
    });

    it('should report storage errors without throwing', async () => {
      const store = makeStore({ status: 'error', error: 'connection refused' });

      const result = await processNormalizeFragmentJob(makeJob({ fragment: FRAGMENT }), store);

      expect(result).toMatchObject({ success: false, status: 'error', error: 'connection refused' });
      expect(console.error).toHaveBeenCalled();
    });

    it('should return data-quality issues and log them as a warning', async () => {
      const store = makeStore({ status: 'created', id: 3 });

      const result = await processNormalizeFragmentJob(
        makeJob({ fragment: { url: 'https://jobs.example.com/job/5555', titleText: 'Chef' } }),
        store
      );

      expect(result.issues).toEqual([
        'company_missing',
        'location_defaulted',
        'description_empty',
        'posted_at_defaulted',
        'skills_empty',
      ]);
      expect(console.warn).toHaveBeenCalled();
    });

    it('should apply per-scraper configuration overrides', async () => {
      const store = makeStore({ status: 'created', id: 4 });

      await processNormalizeFragmentJob(
        makeJob({
          fragment: { url: 'https://jobs.example.com/job/6666', titleText: 'Chef', locationText: 'Wellington' },
          configOverrides: { homeCountry: 'New Zealand' },
        }),
        store
      );

      expect(store.records[0].location).toEqual({ city: 'Wellington', state: '', country: 'New Zealand' });
    });

    it('should fail the job result on an invalid configuration', async () => {
      const store = makeStore({ status: 'created', id: 5 });

      const result = await processNormalizeFragmentJob(
        makeJob({ fragment: FRAGMENT, configOverrides: { defaultCurrency: 'dollars' } }),
        store
      );

      expect(result).toMatchObject({
        externalUrl: 'https://jobs.example.com/job/81234567',
        success: false,
        status: 'error',
        issues: [],
      });
      expect(result.error).toContain('defaultCurrency');
      expect(store.records).toHaveLength(0);
    });
  });
});
