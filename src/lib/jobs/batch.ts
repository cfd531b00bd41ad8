import { EmptyDatasetError, MergeError, StoreTransportError, SubmissionError, describeError } from '../errors';
import { parseCsv, serializeCsv, sliceRows } from '../csv/dataset';
import { createLogger, type Logger } from '../logging/logger';
import { getText, type BlobStore } from '../storage/types';
import { forEachLimited } from './concurrency';
import { generateSessionId } from './ids';
import { sanitizeFilename, sessionPaths } from './layout';
import type { MergeLease } from './lease';
import { ManifestWriter, loadManifest, newManifest } from './manifest';
import { mergeChunkResults, type MergedArtifact } from './merger';
import type { BatchManifest, ChunkRecord, JobStatus, JobStatusView, MergeSummary } from './model';
import { planChunks } from './planner';
import { waitForTerminal, type JobObservation, type PollOptions } from './poller';
import type { SessionRegistry } from './registry';
import type { JobRepo } from './repo';

export type ChunkEvent = {
  sessionId: string;
  chunkIndex: number;
  totalChunks: number;
  attempt: number;
  jobId?: string;
  status: JobStatus;
  error?: string;
};

export type BatchRunOptions = {
  chunkSize: number;
  /** Chunks submitted and awaited at once; 1 keeps the sequential behaviour. */
  maxInFlight?: number;
  /** Resubmissions allowed per chunk after a failure, timeout or lost record. */
  maxRetries?: number;
  poll?: PollOptions;
  onChunk?: (event: ChunkEvent) => void;
  onPoll?: (jobId: string, observation: JobObservation) => void;
};

export type ResumeOptions = Omit<BatchRunOptions, 'chunkSize'>;

export type SingleJobOutcome = {
  kind: 'job';
  jobId: string;
  status: JobStatusView;
};

export type BatchOutcome = {
  kind: 'batch';
  sessionId: string;
  status: 'completed' | 'failed';
  totalChunks: number;
  successfulChunks: number;
  excludedChunks: number[];
  merged?: MergedArtifact;
  error?: string;
};

export type ChunkSnapshot = {
  chunkIndex: number;
  rowRange: { start: number; end: number };
  attempts: number;
  jobId?: string;
  status: JobStatus;
  error?: string;
};

export type BatchSnapshot = {
  sessionId: string;
  tool: string;
  status: BatchManifest['status'];
  totalChunks: number;
  completedChunks: number;
  chunks: ChunkSnapshot[];
  merge: MergeSummary | null;
};

export type ChunkedJobRunnerDeps = {
  repo: JobRepo;
  registry: SessionRegistry;
  lease: MergeLease;
  now?: () => Date;
  logger?: Logger;
};

const SETTLED: ReadonlySet<JobStatus> = new Set(['completed', 'failed']);

/**
 * Runs a dataset as a batch of independent jobs, one per chunk, and merges
 * what completes. Everything needed to pick the batch back up lives in the
 * session manifest.
 */
export class ChunkedJobRunner {
  private readonly repo: JobRepo;
  private readonly store: BlobStore;
  private readonly registry: SessionRegistry;
  private readonly lease: MergeLease;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(deps: ChunkedJobRunnerDeps) {
    this.repo = deps.repo;
    this.store = deps.repo.store;
    this.registry = deps.registry;
    this.lease = deps.lease;
    this.now = deps.now ?? (() => new Date());
    this.log = deps.logger ?? createLogger('batch');
  }

  async run(
    payload: Uint8Array | string,
    filename: string,
    options: BatchRunOptions
  ): Promise<SingleJobOutcome | BatchOutcome> {
    const dataset = parseCsv(payload, filename);
    const plan = planChunks(dataset.rows.length, options.chunkSize);

    if (plan.totalChunks === 0) {
      throw new EmptyDatasetError(filename);
    }

    if (plan.unchunked) {
      const jobId = await this.repo.submit(payload, filename);
      await this.registry.register(jobId, 'job');
      const status = await waitForTerminal(this.repo, jobId, {
        ...options.poll,
        onPoll: (observation) => options.onPoll?.(jobId, observation),
      });
      return { kind: 'job', jobId, status };
    }

    const sessionId = generateSessionId();
    const manifest = newManifest({
      sessionId,
      tool: this.repo.tool.id,
      kind: 'batch',
      filename: sanitizeFilename(filename),
      plan,
      now: this.now(),
    });
    const writer = new ManifestWriter(this.store, manifest, this.now, this.log);
    await writer.save();
    await this.registry.register(sessionId, 'batch');
    this.log.info('batch started', { sessionId, totalRows: plan.totalRows, totalChunks: plan.totalChunks });

    // chunk inputs are stored up front; every submission, first or resumed, reads them back
    for (const chunk of plan.chunks) {
      await this.store.put(
        sessionPaths.chunk(sessionId, chunk.chunkIndex),
        serializeCsv(sliceRows(dataset, chunk.rowRange))
      );
    }

    await forEachLimited(manifest.chunks, options.maxInFlight ?? 1, async (chunk) => {
      await this.driveChunk(writer, chunk, options);
    });

    return await this.finish(writer);
  }

  /**
   * Continues a batch from its manifest: chunks without a settled status are
   * polled again (a chunk that timed out earlier may have finished since),
   * failed chunks with retries left are resubmitted, then the batch is merged.
   */
  async resume(sessionId: string, options: ResumeOptions = {}): Promise<BatchOutcome> {
    const manifest = await loadManifest(this.store, sessionId);
    const writer = new ManifestWriter(this.store, manifest, this.now, this.log);
    manifest.status = 'running';
    manifest.error = undefined;
    await writer.save();
    this.log.info('batch resumed', { sessionId });

    await forEachLimited(manifest.chunks, options.maxInFlight ?? 1, async (chunk) => {
      await this.driveChunk(writer, chunk, options);
    });

    return await this.finish(writer);
  }

  /** Current state without waiting; chunk statuses are read once each. */
  async snapshot(sessionId: string): Promise<BatchSnapshot> {
    const manifest = await loadManifest(this.store, sessionId);
    const chunks: ChunkSnapshot[] = [];

    for (const chunk of manifest.chunks) {
      const jobId = chunk.attempts[chunk.attempts.length - 1];
      let status = chunk.status;
      let error = chunk.error;
      if (jobId && !SETTLED.has(status)) {
        const view = await this.repo.getStatus(jobId);
        status = view.status;
        error = view.error;
      }
      chunks.push({
        chunkIndex: chunk.chunkIndex,
        rowRange: chunk.rowRange,
        attempts: chunk.attempts.length,
        jobId,
        status,
        error,
      });
    }

    return {
      sessionId,
      tool: manifest.tool,
      status: manifest.status,
      totalChunks: manifest.totalChunks,
      completedChunks: chunks.filter((chunk) => chunk.status === 'completed').length,
      chunks,
      merge: await this.readMergeSummary(sessionId),
    };
  }

  private async readMergeSummary(sessionId: string): Promise<MergeSummary | null> {
    const raw = await getText(this.store, sessionPaths.mergeSummary(sessionId));
    if (raw === null) return null;
    try {
      const parsed: unknown = JSON.parse(raw);
      return isMergeSummary(parsed) ? parsed : null;
    } catch {
      return null;
    }
  }

  private async driveChunk(
    writer: ManifestWriter,
    chunk: ChunkRecord,
    options: ResumeOptions
  ): Promise<void> {
    const { manifest } = writer;
    const maxRetries = options.maxRetries ?? 0;

    if (chunk.status === 'completed') return;
    if (chunk.status === 'failed' && chunk.attempts.length > maxRetries) return;

    let jobId: string | undefined = chunk.status === 'failed' ? undefined : chunk.attempts[chunk.attempts.length - 1];
    let submissions = chunk.attempts.length;

    for (;;) {
      if (jobId === undefined) {
        submissions += 1;
        jobId = await this.submitChunk(writer, chunk);
        if (jobId === undefined) {
          if (submissions > maxRetries) return;
          continue;
        }
      }

      const attemptId = jobId;
      const view = await waitForTerminal(this.repo, attemptId, {
        ...options.poll,
        onPoll: (observation) => options.onPoll?.(attemptId, observation),
      });

      chunk.status = view.status;
      chunk.error = view.error;
      chunk.resultKey = view.status === 'completed' ? this.repo.paths.results(attemptId) : undefined;
      await writer.save();
      options.onChunk?.({
        sessionId: manifest.sessionId,
        chunkIndex: chunk.chunkIndex,
        totalChunks: manifest.totalChunks,
        attempt: chunk.attempts.length,
        jobId: attemptId,
        status: view.status,
        error: view.error,
      });

      if (view.status === 'completed') {
        if (!view.resultsReady) {
          this.log.warn('chunk completed but results are not visible yet', {
            sessionId: manifest.sessionId,
            chunkIndex: chunk.chunkIndex,
            jobId: attemptId,
          });
        }
        return;
      }

      this.log.warn('chunk did not complete', {
        sessionId: manifest.sessionId,
        chunkIndex: chunk.chunkIndex,
        jobId: attemptId,
        status: view.status,
        retriesLeft: Math.max(0, maxRetries + 1 - submissions),
      });
      if (submissions > maxRetries) return;
      jobId = undefined;
    }
  }

  /** Resolves to the new job id, or undefined when the submission failed. */
  private async submitChunk(writer: ManifestWriter, chunk: ChunkRecord): Promise<string | undefined> {
    const { manifest } = writer;
    const filename = `chunk_${chunk.chunkIndex}_${manifest.filename}`;

    try {
      const body = await this.store.get(sessionPaths.chunk(manifest.sessionId, chunk.chunkIndex));
      if (body === null) {
        chunk.status = 'failed';
        chunk.error = 'Chunk input is no longer available for resubmission';
        await writer.save();
        return undefined;
      }

      const jobId = await this.repo.submit(body, filename);
      chunk.attempts.push(jobId);
      chunk.status = 'pending';
      chunk.error = undefined;
      await writer.save();
      return jobId;
    } catch (error) {
      if (!(error instanceof SubmissionError) && !(error instanceof StoreTransportError)) throw error;
      this.log.warn('chunk submission failed', {
        sessionId: manifest.sessionId,
        chunkIndex: chunk.chunkIndex,
        error: describeError(error),
      });
      chunk.status = 'failed';
      chunk.error = error.message;
      await writer.save();
      return undefined;
    }
  }

  private async finish(writer: ManifestWriter): Promise<BatchOutcome> {
    const { manifest } = writer;
    const { sessionId } = manifest;
    manifest.status = 'merging';
    await writer.save();

    const artifacts = manifest.chunks.map((chunk) => ({
      chunkIndex: chunk.chunkIndex,
      resultKey: chunk.status === 'completed' ? chunk.resultKey : undefined,
    }));

    try {
      const merged = await this.lease.withLease(sessionId, () =>
        mergeChunkResults(this.store, sessionId, artifacts, { now: this.now, logger: this.log })
      );
      manifest.status = 'completed';
      await writer.save();
      return {
        kind: 'batch',
        sessionId,
        status: 'completed',
        totalChunks: manifest.totalChunks,
        successfulChunks: merged.summary.successful_chunks,
        excludedChunks: merged.summary.excluded_chunks,
        merged,
      };
    } catch (error) {
      if (!(error instanceof MergeError)) throw error;
      manifest.status = 'failed';
      manifest.error = error.message;
      await writer.save();
      this.log.error('batch merge failed', { sessionId, error: error.message });
      return {
        kind: 'batch',
        sessionId,
        status: 'failed',
        totalChunks: manifest.totalChunks,
        successfulChunks: 0,
        excludedChunks: artifacts.map((artifact) => artifact.chunkIndex),
        error: error.message,
      };
    }
  }
}

function isMergeSummary(value: unknown): value is MergeSummary {
  return (
    typeof value === 'object' &&
    value !== null &&
    'session_id' in value &&
    'successful_chunks' in value &&
    'total_chunks' in value &&
    'merged_key' in value
  );
}
