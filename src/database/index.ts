/**
 * PostgreSQL Database Module - Main Entry Point
 * Pool and query helper behind the job posting store and the log table
 */

import { Pool, QueryResult, QueryResultRow } from 'pg';

// Database configuration from environment
export const DB_CONFIG = {
  host: process.env.POSTGRES_HOST || 'localhost',
  port: parseInt(process.env.POSTGRES_PORT || '5432', 10),
  database: process.env.NODE_ENV === 'test' ? 'job_records_test' : (process.env.POSTGRES_DB || 'job_records'),
  user: process.env.POSTGRES_USER || 'job_records',
  password: process.env.POSTGRES_PASSWORD || 'dev-password',
  max: 20, // Maximum number of clients in the pool
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 10000,
};

let pool: Pool | null = null;

/**
 * Gets or creates the PostgreSQL connection pool
 */
export function getPool(): Pool {
  if (!pool) {
    pool = new Pool(DB_CONFIG);

    pool.on('error', (err) => {
      console.error('Unexpected error on idle PostgreSQL client', err);
    });
  }
  return pool;
}

/**
 * Ends the pool so the worker and the batch CLI can exit. Safe to call when no pool was opened.
 */
export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/**
 * Execute a query with parameters
 */
export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  const client = getPool();
  return client.query<T>(text, params);
}

/**
 * True when the server answers and the job_postings table exists (migrations have run)
 */
export async function checkConnection(): Promise<boolean> {
  try {
    const result = await query<{ ready: boolean }>("SELECT to_regclass('job_postings') IS NOT NULL AS ready");
    return result.rows[0]?.ready === true;
  } catch (error) {
    console.error('Job store check failed:', error instanceof Error ? error.message : String(error));
    return false;
  }
}

// Re-export types
export * from './types';

// Re-export all entity modules
export * from './job';
export * from './log';
