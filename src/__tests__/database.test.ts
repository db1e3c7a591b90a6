import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  countJobPostings,
  findJobIdByTitleAndCompany,
  getJobPostingById,
  postgresJobStore,
  upsertIfNew,
} from '../database/job';
import type { NormalizedJobRecord } from '../types';

const { mockQuery } = vi.hoisted(() => ({ mockQuery: vi.fn() }));

vi.mock('../database/index', () => ({
  query: (...args: unknown[]) => mockQuery(...args),
}));

function makeRecord(overrides: Partial<NormalizedJobRecord> = {}): NormalizedJobRecord {
  return {
    title: 'Data Engineer',
    companyName: 'Acme Analytics',
    location: { city: 'Sydney', state: 'New South Wales', country: 'Australia' },
    locationName: 'Sydney, New South Wales',
    description: 'Build pipelines.',
    descriptionHtml: '<p>Build pipelines.</p>',
    salary: { min: 120000, max: 140000, currency: 'AUD', period: 'yearly', rawText: '$120k - $140k' },
    jobType: 'full_time',
    workMode: 'hybrid',
    jobCategory: 'technology',
    postedAt: new Date('2024-01-07T09:00:00Z'),
    postedAgo: '3 days ago',
    skills: ['Python', 'SQL'],
    preferredSkills: ['AWS'],
    externalUrl: 'https://jobs.example.com/job/81234567',
    externalId: '81234567',
    externalSource: 'jobs.example.com',
    slug: 'data-engineer-81234567',
    ...overrides,
  };
}

describe('database', () => {
  beforeEach(() => {
    mockQuery.mockReset();
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('upsertIfNew', () => {
    it('should insert a new posting', async () => {
      mockQuery
        .mockResolvedValueOnce({ rows: [] })
        .mockResolvedValueOnce({ rows: [] })
        .mockResolvedValueOnce({ rows: [{ id: 42 }] });

      const result = await upsertIfNew(makeRecord());

      expect(result).toEqual({ status: 'created', id: 42 });
      expect(mockQuery).toHaveBeenCalledTimes(3);

      const insertParams = mockQuery.mock.calls[2][1];
      expect(insertParams).toHaveLength(24);
      expect(insertParams[0]).toBe('Data Engineer');
      expect(insertParams[8]).toBe(120000);
      expect(insertParams[18]).toBe('Python, SQL');
      expect(insertParams[19]).toBe('AWS');
      expect(insertParams[20]).toBe('https://jobs.example.com/job/81234567');
    });

    it('should report a duplicate external URL without inserting', async () => {
      mockQuery.mockResolvedValueOnce({ rows: [{ id: 7 }] });

      const result = await upsertIfNew(makeRecord());

      expect(result).toEqual({ status: 'duplicate', id: 7, matchedOn: 'external_url' });
      expect(mockQuery).toHaveBeenCalledTimes(1);
    });

    it('should report a duplicate title and company', async () => {
      mockQuery.mockResolvedValueOnce({ rows: [] }).mockResolvedValueOnce({ rows: [{ id: 9 }] });

      const result = await upsertIfNew(makeRecord());

      expect(result).toEqual({ status: 'duplicate', id: 9, matchedOn: 'title_company' });
      expect(mockQuery.mock.calls[1][1]).toEqual(['Data Engineer', 'Acme Analytics']);
    });

    it('should treat a lost insert race as a duplicate', async () => {
      mockQuery
        .mockResolvedValueOnce({ rows: [] })
        .mockResolvedValueOnce({ rows: [] })
        .mockResolvedValueOnce({ rows: [] })
        .mockResolvedValueOnce({ rows: [{ id: 11 }] });

      const result = await upsertIfNew(makeRecord());

      expect(result).toEqual({ status: 'duplicate', id: 11, matchedOn: 'external_url' });
    });

    it('should return an error when the insert yields no row at all', async () => {
      mockQuery.mockResolvedValue({ rows: [] });

      const result = await upsertIfNew(makeRecord());

      expect(result).toEqual({
        status: 'error',
        error: 'Insert returned no row for https://jobs.example.com/job/81234567',
      });
    });

    it('should return an error instead of throwing when the database fails', async () => {
      mockQuery.mockRejectedValueOnce(new Error('connection refused'));

      const result = await postgresJobStore.upsertIfNew(makeRecord());

      expect(result).toEqual({ status: 'error', error: 'connection refused' });
      expect(console.error).toHaveBeenCalledWith('[ERROR] [database.job] connection refused {"externalUrl":"https://jobs.example.com/job/81234567"}');
    });
  });

  describe('lookups', () => {
    it('should compare title and company case-insensitively in SQL', async () => {
      mockQuery.mockResolvedValueOnce({ rows: [] });

      expect(await findJobIdByTitleAndCompany('data engineer', 'ACME ANALYTICS')).toBeNull();
      expect(mockQuery.mock.calls[0][0]).toContain('lower(title) = lower($1)');
    });

    it('should return null for an unknown id', async () => {
      mockQuery.mockResolvedValueOnce({ rows: [] });

      expect(await getJobPostingById(404)).toBeNull();
    });

    it('should count stored postings', async () => {
      mockQuery.mockResolvedValueOnce({ rows: [{ count: '5' }] });

      expect(await countJobPostings()).toBe(5);
    });
  });
});
