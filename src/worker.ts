#!/usr/bin/env node
/**
 * Queue Worker - Normalizes job fragments from the Redis queue using Bull
 * Run with: npm run worker
 */

import Bull from "bull";
import { getFragmentQueue, type NormalizeFragmentJobData } from "./queue";
import { loadPipelineConfig } from "./config";
import { checkConnection, closeDatabase } from "./database";
import { processNormalizeFragmentJob } from "./jobs/normalize-fragment.job";
import { logger } from "./logger";

// Configuration
const CONCURRENCY = parseInt(process.env.WORKER_CONCURRENCY || "4", 10);

async function main() {
  console.log("\n=== Job Record Normalizer Worker (Bull) ===\n");
  console.log(`Concurrency: ${CONCURRENCY}`);

  // Fail fast on broken lookup tables before taking jobs
  const config = loadPipelineConfig();
  console.log(`✓ Lookup tables loaded (home country: ${config.homeCountry}, currency: ${config.defaultCurrency})`);

  if (!(await checkConnection())) {
    throw new Error("PostgreSQL is not reachable or job_postings is missing (run npm run migrate)");
  }
  console.log("✓ PostgreSQL connection ready");

  console.log("Connecting to Redis...\n");
  const queue = getFragmentQueue();
  await queue.isReady();
  console.log("Fragment queue ready");

  console.log("Waiting for jobs...\n");

  // Track statistics
  let created = 0;
  let duplicates = 0;
  let failed = 0;
  let issues = 0;

  queue.process(CONCURRENCY, async (job: Bull.Job<NormalizeFragmentJobData>) => {
    const result = await processNormalizeFragmentJob(job);

    issues += result.issues.length;
    if (result.status === "created") {
      created++;
    } else if (result.status === "duplicate") {
      duplicates++;
    } else {
      failed++;
    }

    return result;
  });

  queue.on("failed", (job, err) => {
    logger.error(`Job ${job.id} failed after ${job.attemptsMade} attempts: ${err.message}`, {
      source: "worker",
      context: { jobId: job.id, attempts: job.attemptsMade },
    });
  });

  queue.on("stalled", (job) => {
    logger.warning(`Job ${job.id} stalled`, {
      source: "worker",
      context: { jobId: job.id },
    });
  });

  // Graceful shutdown
  const shutdown = async () => {
    console.log("\nShutting down worker...");

    await queue.close();
    await closeDatabase();

    console.log("\n--- Worker Statistics ---");
    console.log(`Records created: ${created}`);
    console.log(`Duplicates skipped: ${duplicates}`);
    console.log(`Failed: ${failed}`);
    console.log(`Data-quality issues: ${issues}`);

    process.exit(0);
  };

  process.on("SIGINT", () => {
    shutdown().catch((error) => {
      logger.errorFromException(error, { source: "worker" });
      process.exit(1);
    });
  });
  process.on("SIGTERM", () => {
    shutdown().catch((error) => {
      logger.errorFromException(error, { source: "worker" });
      process.exit(1);
    });
  });

  console.log("Worker is running. Press Ctrl+C to stop.\n");
}

main().catch(async (error) => {
  logger.errorFromException(error, { source: "worker" });
  await closeDatabase();
  process.exit(1);
});
