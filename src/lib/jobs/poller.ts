import { setTimeout as delay } from 'node:timers/promises';
import { StoreTransportError, describeError } from '../errors';
import { createLogger, type Logger } from '../logging/logger';
import type { JobStatusView } from './model';

export const DEFAULT_POLL_INTERVAL_MS = 5_000;
export const DEFAULT_MAX_WAIT_MS = 300_000;

export type Clock = {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
};

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await delay(ms);
  },
};

export type PollOptions = {
  intervalMs?: number;
  maxWaitMs?: number;
  clock?: Clock;
  logger?: Logger;
};

export type JobObservation = {
  attempt: number;
  elapsedMs: number;
  status?: JobStatusView;
  /** Transport failure on this attempt. */
  error?: string;
};

export type StatusSource = {
  getStatus(jobId: string): Promise<JobStatusView>;
};

/**
 * Blocks until the job is `completed` or `failed`, or until `maxWaitMs` has
 * passed, in which case a synthetic `timeout` is returned. Timing out does not
 * touch the stored record or the worker; a later real status is simply never
 * observed by this call. Store outages are retried on the next interval.
 */
export async function waitForTerminal(
  source: StatusSource,
  jobId: string,
  options: PollOptions & { onPoll?: (observation: JobObservation) => void } = {}
): Promise<JobStatusView> {
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const maxWaitMs = options.maxWaitMs ?? DEFAULT_MAX_WAIT_MS;
  const clock = options.clock ?? systemClock;
  const log = options.logger ?? createLogger('poller');

  const started = clock.now();
  let last: JobStatusView | undefined;
  let attempt = 0;

  while (clock.now() - started < maxWaitMs) {
    attempt += 1;
    try {
      last = await source.getStatus(jobId);
      options.onPoll?.({ attempt, elapsedMs: clock.now() - started, status: last });
      log.debug('polled job', { jobId, attempt, status: last.status });

      if (last.status === 'completed' || last.status === 'failed' || last.status === 'not_found') {
        return last;
      }
    } catch (error) {
      if (!(error instanceof StoreTransportError)) throw error;
      options.onPoll?.({ attempt, elapsedMs: clock.now() - started, error: error.message });
      log.warn('status check failed, retrying', { jobId, attempt, error: describeError(error) });
    }

    await clock.sleep(intervalMs);
  }

  log.warn('job wait timed out', { jobId, maxWaitMs });
  return {
    ...(last ?? { jobId, tool: '' }),
    status: 'timeout',
    error: `Job took longer than ${Math.round(maxWaitMs / 1000)}s to complete`,
  };
}

export type ChunkProgress = {
  attempt: number;
  completed: number;
  total: number;
  fraction: number;
  error?: string;
};

export type CompletedChunkSource = {
  countCompletedChunks(runId: string, totalChunks: number): Promise<{ completed: number; error?: string }>;
};

export type ChunkWaitResult = {
  status: 'completed' | 'timeout';
  completed: number;
  total: number;
};

/**
 * Batch variant: waits until every chunk of the run is reported completed in
 * the progress ledger, reporting progress on each poll.
 */
export async function waitForChunks(
  source: CompletedChunkSource,
  runId: string,
  totalChunks: number,
  options: PollOptions & { onProgress?: (progress: ChunkProgress) => void } = {}
): Promise<ChunkWaitResult> {
  const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const maxWaitMs = options.maxWaitMs ?? DEFAULT_MAX_WAIT_MS;
  const clock = options.clock ?? systemClock;
  const log = options.logger ?? createLogger('poller');

  const started = clock.now();
  let completed = 0;
  let attempt = 0;

  while (clock.now() - started < maxWaitMs) {
    attempt += 1;
    const count = await source.countCompletedChunks(runId, totalChunks);
    completed = count.completed;
    options.onProgress?.({
      attempt,
      completed,
      total: totalChunks,
      fraction: totalChunks === 0 ? 1 : completed / totalChunks,
      error: count.error,
    });
    log.debug('polled ledger', { runId, attempt, completed, totalChunks });

    if (completed >= totalChunks) {
      return { status: 'completed', completed, total: totalChunks };
    }

    await clock.sleep(intervalMs);
  }

  log.warn('chunk wait timed out', { runId, completed, totalChunks, maxWaitMs });
  return { status: 'timeout', completed, total: totalChunks };
}
