/**
 * Log Database Functions
 * Persists pipeline log lines (normalization issues, store outcomes, worker events) to the logs table
 */

import { query } from './index';
import type { LogLevel } from './types';

// logs.source is VARCHAR(255)
const SOURCE_LIMIT = 255;

export interface LogEntryOptions {
  source?: string;
  /** Stored as JSONB, e.g. the external URL and issue list of a record */
  context?: Record<string, unknown>;
  stackTrace?: string;
}

/**
 * Save a log entry without waiting for the insert. A failed insert is reported on the console only.
 */
export function saveLog(level: LogLevel, message: string, options?: LogEntryOptions): void {
  query(
    `INSERT INTO logs (level, message, source, context, stack_trace)
     VALUES ($1, $2, $3, $4, $5)`,
    [
      level,
      message,
      options?.source ? options.source.slice(0, SOURCE_LIMIT) : null,
      options?.context ? JSON.stringify(options.context) : null,
      options?.stackTrace || null,
    ]
  ).catch((err: unknown) => {
    console.error('[LOGGER] Failed to save log to database:', err instanceof Error ? err.message : String(err));
  });
}
