import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { checkConnection, closeDatabase } from '../database/index';

const { mockPoolQuery, mockPoolEnd } = vi.hoisted(() => ({
  mockPoolQuery: vi.fn(),
  mockPoolEnd: vi.fn(),
}));

vi.mock('pg', () => ({
  Pool: class {
    query = mockPoolQuery;
    end = mockPoolEnd;
    on = vi.fn();
  },
}));

describe('database.index', () => {
  beforeEach(() => {
    mockPoolQuery.mockReset();
    mockPoolEnd.mockReset();
    mockPoolEnd.mockResolvedValue(undefined);
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    await closeDatabase();
    vi.restoreAllMocks();
  });

  describe('checkConnection', () => {
    it('should be ready when the job_postings table exists', async () => {
      mockPoolQuery.mockResolvedValueOnce({ rows: [{ ready: true }] });

      expect(await checkConnection()).toBe(true);
      expect(mockPoolQuery).toHaveBeenCalledWith(expect.stringContaining("to_regclass('job_postings')"), undefined);
    });

    it('should not be ready before the migrations have run', async () => {
      mockPoolQuery.mockResolvedValueOnce({ rows: [{ ready: false }] });

      expect(await checkConnection()).toBe(false);
    });

    it('should report an unreachable server', async () => {
      mockPoolQuery.mockRejectedValueOnce(new Error('connection refused'));

      expect(await checkConnection()).toBe(false);
      expect(console.error).toHaveBeenCalledWith('Job store check failed:', 'connection refused');
    });
  });

  describe('closeDatabase', () => {
    it('should end an open pool once', async () => {
      mockPoolQuery.mockResolvedValueOnce({ rows: [{ ready: true }] });
      await checkConnection();

      await closeDatabase();
      await closeDatabase();

      expect(mockPoolEnd).toHaveBeenCalledTimes(1);
    });
  });
});
