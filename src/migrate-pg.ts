#!/usr/bin/env node
/**
 * PostgreSQL Migration Script
 * Reads SQL migration files from migrations-pg/ and applies them in order
 */

import { readFileSync, readdirSync } from "fs";
import { join } from "path";
import { Pool } from "pg";
import { DB_CONFIG } from "./database";
import { logger } from "./logger";

const pool = new Pool({ ...DB_CONFIG, max: 1 });

async function runMigrations() {
  const client = await pool.connect();

  try {
    console.log("PostgreSQL Migration Runner");
    console.log("===========================\n");

    await client.query(`
      CREATE TABLE IF NOT EXISTS migrations (
        id SERIAL PRIMARY KEY,
        filename VARCHAR(255) NOT NULL UNIQUE,
        applied_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `);

    const result = await client.query<{ filename: string }>(
      "SELECT filename FROM migrations ORDER BY filename"
    );
    const applied = new Set(result.rows.map((row) => row.filename));

    const migrationsDir = join(process.cwd(), "migrations-pg");
    const files = readdirSync(migrationsDir)
      .filter((f) => f.endsWith(".sql"))
      .sort();

    let newlyApplied = 0;

    for (const file of files) {
      if (applied.has(file)) {
        console.log(`⊘ ${file} (already applied)`);
        continue;
      }

      console.log(`→ Applying ${file}...`);

      try {
        await client.query("BEGIN");
        await client.query(readFileSync(join(migrationsDir, file), "utf-8"));
        await client.query("INSERT INTO migrations (filename) VALUES ($1)", [file]);
        await client.query("COMMIT");

        console.log(`✓ ${file} applied`);
        newlyApplied++;
      } catch (error) {
        await client.query("ROLLBACK");
        throw new Error(
          `Failed to apply ${file}: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }

    console.log(`\nMigrations: ${files.length} total, ${files.length - newlyApplied} already applied, ${newlyApplied} new\n`);
  } catch (error) {
    logger.errorFromException(error, { source: "migrate-pg", skipDatabase: true });
    process.exitCode = 1;
  } finally {
    client.release();
    await pool.end();
  }
}

runMigrations().catch((error) => {
  logger.errorFromException(error, { source: "migrate-pg", skipDatabase: true });
  process.exit(1);
});
