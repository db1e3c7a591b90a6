#!/usr/bin/env node
/**
 * Fragment Processing Script
 * Normalizes a JSON file of scraped job fragments and stores new records
 *
 * Usage: npm run process:fragments -- <file.json> [--source=<name>] [--enqueue] [--dry-run]
 */

import cliProgress from "cli-progress";
import { loadPipelineConfig } from "./config";
import { closeDatabase, countJobPostings, postgresJobStore } from "./database";
import { readFragmentFile } from "./fragment-loader";
import { normalizeFragment } from "./job-record-assembler";
import { logger } from "./logger";
import { closeQueues, enqueueFragments } from "./queue";
import type { NormalizationIssue } from "./types";

interface CliOptions {
  file: string;
  source?: string;
  enqueue: boolean;
  dryRun: boolean;
}

function parseArgs(argv: string[]): CliOptions | null {
  const file = argv.find((arg) => !arg.startsWith("--"));
  if (!file) return null;

  const sourceArg = argv.find((arg) => arg.startsWith("--source="));
  return {
    file,
    source: sourceArg ? sourceArg.slice("--source=".length) : undefined,
    enqueue: argv.includes("--enqueue"),
    dryRun: argv.includes("--dry-run"),
  };
}

async function main() {
  const options = parseArgs(process.argv.slice(2));
  if (!options) {
    console.error("Usage: process-fragments <file.json> [--source=<name>] [--enqueue] [--dry-run]");
    process.exit(1);
  }

  try {
    console.log("\n=== Job Fragment Processing ===\n");

    const { fragments, rejected } = readFragmentFile(options.file);
    if (rejected.length > 0) {
      logger.warning(`Skipped ${rejected.length} invalid fragment(s) in ${options.file}`, {
        source: "process-fragments",
        context: { rejected: rejected.slice(0, 10) },
      });
    }

    if (fragments.length === 0) {
      console.log("✓ No fragments to process.");
      return;
    }

    if (options.enqueue) {
      const count = await enqueueFragments(fragments, { source: options.source, scrapedAt: new Date().toISOString() });
      console.log(`✓ Enqueued ${count} fragments for the worker.`);
      await closeQueues();
      return;
    }

    const config = loadPipelineConfig();
    const now = new Date();

    const progressBar = new cliProgress.SingleBar({
      format: "Normalizing |{bar}| {percentage}% | {value}/{total} fragments",
      barCompleteChar: "█",
      barIncompleteChar: "░",
      hideCursor: true,
    });
    progressBar.start(fragments.length, 0);

    let created = 0;
    let duplicates = 0;
    let failures = 0;
    const issueCounts = new Map<NormalizationIssue, number>();
    const errors: Array<{ url: string; error: string }> = [];

    for (const fragment of fragments) {
      const { record, issues } = normalizeFragment(
        { ...fragment, source: fragment.source ?? options.source },
        config,
        { now }
      );
      for (const issue of issues) {
        issueCounts.set(issue, (issueCounts.get(issue) ?? 0) + 1);
      }

      if (!options.dryRun) {
        const result = await postgresJobStore.upsertIfNew(record);
        if (result.status === "created") {
          created++;
        } else if (result.status === "duplicate") {
          duplicates++;
        } else {
          failures++;
          errors.push({ url: record.externalUrl, error: result.error });
        }
      }

      progressBar.increment();
    }

    progressBar.stop();

    // Summary
    console.log("\n--- Processing Summary ---");
    console.log(`Fragments normalized: ${fragments.length}`);
    if (options.dryRun) {
      console.log("Dry run: nothing was stored");
    } else {
      console.log(`Created: ${created}`);
      console.log(`Duplicates: ${duplicates}`);
      console.log(`Failed: ${failures}`);
      console.log(`Stored postings: ${await countJobPostings()}`);
    }

    if (issueCounts.size > 0) {
      console.log("\n--- Data-quality issues ---");
      for (const [issue, count] of Array.from(issueCounts.entries()).sort((a, b) => b[1] - a[1])) {
        console.log(`  ${issue}: ${count}`);
      }
    }

    if (errors.length > 0) {
      console.log(`\n--- Errors (showing first ${Math.min(errors.length, 10)} of ${errors.length}) ---`);
      errors.slice(0, 10).forEach(({ url, error }) => {
        console.log(`✗ ${url}: ${error}`);
      });
    }

    console.log("\n✓ Fragment processing complete!");
  } catch (error) {
    logger.errorFromException(error, { source: "process-fragments" });
    process.exitCode = 1;
  } finally {
    await closeDatabase();
  }
}

main().catch((error) => {
  logger.errorFromException(error, { source: "process-fragments" });
  process.exit(1);
});
