/**
 * Queue module - Job queue for fragment normalization using Bull
 * Uses Redis for job storage and processing
 */

import Bull from 'bull';
import type { PipelineConfigOverrides } from './config';
import type { NormalizationIssue, RawJobFragment } from './types';

// Queue configuration
const REDIS_HOST = process.env.REDIS_HOST || 'localhost';
const REDIS_PORT = parseInt(process.env.REDIS_PORT || '6379', 10);

export const FRAGMENT_QUEUE_NAME = 'fragment-normalization';

// Job types
export interface NormalizeFragmentJobData {
  fragment: RawJobFragment;
  /** Scraper name, used as external source when the fragment has none */
  source?: string;
  /** ISO timestamp relative dates are resolved against */
  scrapedAt?: string;
  configOverrides?: Omit<PipelineConfigOverrides, 'skillVocabulary' | 'categoryKeywords'>;
}

export interface NormalizeFragmentJobResult {
  externalUrl: string;
  success: boolean;
  status: 'created' | 'duplicate' | 'error';
  id?: number;
  issues: NormalizationIssue[];
  error?: string;
}

// Queue instance (lazy initialized)
let fragmentQueue: Bull.Queue<NormalizeFragmentJobData> | null = null;

/**
 * Get or create the fragment normalization queue
 */
export function getFragmentQueue(): Bull.Queue<NormalizeFragmentJobData> {
  if (!fragmentQueue) {
    fragmentQueue = new Bull<NormalizeFragmentJobData>(FRAGMENT_QUEUE_NAME, {
      redis: {
        host: REDIS_HOST,
        port: REDIS_PORT,
      },
      defaultJobOptions: {
        removeOnComplete: true,
        removeOnFail: false,
        attempts: 3,
        backoff: {
          type: 'exponential',
          delay: 2000,
        },
        timeout: 30000,
      },
    });

    fragmentQueue.on('error', (err) => {
      console.error('Fragment queue error:', err);
    });
  }

  return fragmentQueue;
}

/**
 * Add a fragment to the normalization queue
 */
export async function enqueueFragment(
  fragment: RawJobFragment,
  options: Omit<NormalizeFragmentJobData, 'fragment'> = {}
): Promise<Bull.Job<NormalizeFragmentJobData>> {
  const queue = getFragmentQueue();
  return queue.add({ fragment, ...options });
}

/**
 * Add multiple fragments to the normalization queue
 */
export async function enqueueFragments(
  fragments: RawJobFragment[],
  options: Omit<NormalizeFragmentJobData, 'fragment'> = {}
): Promise<number> {
  const queue = getFragmentQueue();

  const bulkJobs = fragments.map((fragment) => ({
    data: { fragment, ...options },
  }));

  await queue.addBulk(bulkJobs);
  return bulkJobs.length;
}

/**
 * Get queue statistics
 */
export async function getQueueStats(): Promise<{
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}> {
  const queue = getFragmentQueue();

  const [waiting, active, completed, failed, delayed] = await Promise.all([
    queue.getWaitingCount(),
    queue.getActiveCount(),
    queue.getCompletedCount(),
    queue.getFailedCount(),
    queue.getDelayedCount(),
  ]);

  return { waiting, active, completed, failed, delayed };
}

/**
 * Close the queue connection
 */
export async function closeQueues(): Promise<void> {
  if (fragmentQueue) {
    await fragmentQueue.close();
    fragmentQueue = null;
  }
}
