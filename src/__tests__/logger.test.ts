import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { formatLogLine, logger } from '../logger';
import { saveLog } from '../database/log';

vi.mock('../database/log', () => ({
  saveLog: vi.fn(),
}));

describe('logger', () => {
  beforeEach(() => {
    vi.mocked(saveLog).mockClear();
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  describe('formatLogLine', () => {
    it('should include level, source and context', () => {
      expect(formatLogLine('warning', 'Slow query', 'database', { ms: 1200 })).toBe(
        '[WARNING] [database] Slow query {"ms":1200}'
      );
    });

    it('should omit missing parts', () => {
      expect(formatLogLine('info', 'Started')).toBe('[INFO] Started');
    });
  });

  describe('console output', () => {
    it('should route each level to the matching console method', () => {
      logger.error('Failed', { source: 'test' });
      logger.warning('Careful', { source: 'test' });
      logger.info('Hello', { source: 'test' });
      logger.debug('Details', { source: 'test' });

      expect(console.error).toHaveBeenCalledWith('[ERROR] [test] Failed');
      expect(console.warn).toHaveBeenCalledWith('[WARNING] [test] Careful');
      expect(console.info).toHaveBeenCalledWith('[INFO] [test] Hello');
      expect(console.debug).toHaveBeenCalledWith('[DEBUG] [test] Details');
    });

    it('should skip the console when asked', () => {
      logger.info('Quiet', { source: 'test', skipConsole: true });

      expect(console.info).not.toHaveBeenCalled();
    });

    it('should print the message and stack of an exception', () => {
      const error = new Error('boom');

      logger.errorFromException(error, { source: 'test' });

      expect(console.error).toHaveBeenCalledWith('[ERROR] [test] boom');
      expect(console.error).toHaveBeenCalledWith(error.stack);
    });

    it('should stringify non-error exceptions', () => {
      logger.errorFromException('plain failure', { source: 'test' });

      expect(console.error).toHaveBeenCalledWith('[ERROR] [test] plain failure');
    });
  });

  describe('database persistence', () => {
    it('should not persist under test', () => {
      logger.error('Not stored', { source: 'test' });

      expect(saveLog).not.toHaveBeenCalled();
    });

    it('should persist when enabled', () => {
      vi.stubEnv('NODE_ENV', 'production');
      vi.stubEnv('LOG_TO_DATABASE', 'true');

      logger.info('Stored', { source: 'test', context: { id: 1 } });

      expect(saveLog).toHaveBeenCalledWith('info', 'Stored', {
        source: 'test',
        context: { id: 1 },
        stackTrace: undefined,
      });
    });

    it('should not persist when disabled by the environment', () => {
      vi.stubEnv('NODE_ENV', 'production');
      vi.stubEnv('LOG_TO_DATABASE', 'false');

      logger.info('Not stored', { source: 'test' });

      expect(saveLog).not.toHaveBeenCalled();
    });

    it('should not persist when the call opts out', () => {
      vi.stubEnv('NODE_ENV', 'production');
      vi.stubEnv('LOG_TO_DATABASE', 'true');

      logger.warning('Console only', { source: 'test', skipDatabase: true });

      expect(saveLog).not.toHaveBeenCalled();
    });

    it('should keep logging to the console when persistence throws', () => {
      vi.stubEnv('NODE_ENV', 'production');
      vi.stubEnv('LOG_TO_DATABASE', 'true');
      vi.mocked(saveLog).mockImplementationOnce(() => {
        throw new Error('pool closed');
      });

      expect(() => logger.info('Still printed', { source: 'test' })).not.toThrow();
      expect(console.info).toHaveBeenCalledWith('[INFO] [test] Still printed');
    });
  });
});
