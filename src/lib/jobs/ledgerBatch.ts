import { EmptyDatasetError, MergeError } from '../errors';
import { parseCsv, serializeCsv, sliceRows } from '../csv/dataset';
import { createLogger, type Logger } from '../logging/logger';
import type { BlobStore } from '../storage/types';
import { mergeSessionArchives, type ArchiveMergeResult } from './archive';
import { generateSessionId } from './ids';
import { sanitizeFilename, sessionPaths } from './layout';
import type { ProgressLedger } from './ledger';
import type { MergeLease } from './lease';
import { ManifestWriter, loadManifest, newManifest } from './manifest';
import { planByChunkCount, planChunks } from './planner';
import { waitForChunks, type ChunkProgress, type PollOptions } from './poller';
import type { SessionRegistry } from './registry';
import type { JobRepo } from './repo';

export type ChunkSizing = { chunkCount: number } | { chunkSize: number };

export type LedgerUpload =
  | { kind: 'job'; jobId: string; totalRows: number }
  | { kind: 'ledger_batch'; sessionId: string; totalRows: number; totalChunks: number; chunkKeys: string[] };

export type LedgerWatchOutcome = {
  sessionId: string;
  status: 'completed' | 'timeout' | 'failed';
  completedChunks: number;
  totalChunks: number;
  merge?: ArchiveMergeResult;
  error?: string;
};

export type LedgerBatchRunnerDeps = {
  repo: JobRepo;
  ledger: ProgressLedger;
  registry: SessionRegistry;
  lease: MergeLease;
  now?: () => Date;
  logger?: Logger;
};

/**
 * Session uploads whose chunks are picked up by workers from
 * `users/{session}/chunks/` and whose progress is reported through the shared
 * ledger rather than per-job status records.
 */
export class LedgerBatchRunner {
  private readonly repo: JobRepo;
  private readonly store: BlobStore;
  private readonly ledger: ProgressLedger;
  private readonly registry: SessionRegistry;
  private readonly lease: MergeLease;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(deps: LedgerBatchRunnerDeps) {
    this.repo = deps.repo;
    this.store = deps.repo.store;
    this.ledger = deps.ledger;
    this.registry = deps.registry;
    this.lease = deps.lease;
    this.now = deps.now ?? (() => new Date());
    this.log = deps.logger ?? createLogger('ledger-batch');
  }

  /**
   * Splits and uploads the dataset. A dataset that fits in a single chunk is
   * submitted as a plain job instead and never touches the ledger.
   */
  async upload(payload: Uint8Array | string, filename: string, sizing: ChunkSizing): Promise<LedgerUpload> {
    const dataset = parseCsv(payload, filename);
    const totalRows = dataset.rows.length;
    const plan = 'chunkCount' in sizing ? planByChunkCount(totalRows, sizing.chunkCount) : planChunks(totalRows, sizing.chunkSize);

    if (plan.totalChunks === 0) {
      throw new EmptyDatasetError(filename);
    }

    if (plan.unchunked) {
      const jobId = await this.repo.submit(payload, filename);
      await this.registry.register(jobId, 'job');
      return { kind: 'job', jobId, totalRows };
    }

    const sessionId = generateSessionId();
    await this.clearSession(sessionId);

    const chunkKeys: string[] = [];
    for (const chunk of plan.chunks) {
      const key = sessionPaths.chunk(sessionId, chunk.chunkIndex);
      await this.store.put(key, serializeCsv(sliceRows(dataset, chunk.rowRange)), 'text/csv; charset=utf-8');
      chunkKeys.push(key);
      this.log.debug('uploaded chunk', { sessionId, key, rows: chunk.rowRange.end - chunk.rowRange.start });
    }

    const manifest = newManifest({
      sessionId,
      tool: this.repo.tool.id,
      kind: 'ledger_batch',
      filename: sanitizeFilename(filename),
      plan,
      now: this.now(),
    });
    await new ManifestWriter(this.store, manifest, this.now, this.log).save();
    await this.registry.register(sessionId, 'ledger_batch');

    this.log.info('session uploaded', { sessionId, totalRows, totalChunks: plan.totalChunks });
    return { kind: 'ledger_batch', sessionId, totalRows, totalChunks: plan.totalChunks, chunkKeys };
  }

  /**
   * Waits for every chunk to show up as completed in the ledger, then merges
   * whatever result archives exist, also after a timeout.
   */
  async watch(
    sessionId: string,
    options: PollOptions & { onProgress?: (progress: ChunkProgress) => void } = {}
  ): Promise<LedgerWatchOutcome> {
    const manifest = await loadManifest(this.store, sessionId);
    const writer = new ManifestWriter(this.store, manifest, this.now, this.log);

    const wait = await waitForChunks(this.ledger, sessionId, manifest.totalChunks, options);
    const base = { sessionId, completedChunks: wait.completed, totalChunks: wait.total };

    manifest.status = 'merging';
    await writer.save();

    try {
      const merge = await this.lease.withLease(sessionId, () => mergeSessionArchives(this.store, sessionId, { logger: this.log }));
      manifest.status = wait.status === 'completed' ? 'completed' : 'running';
      await writer.save();
      return { ...base, status: wait.status, merge };
    } catch (error) {
      if (!(error instanceof MergeError)) throw error;
      manifest.status = 'failed';
      manifest.error = error.message;
      await writer.save();
      return { ...base, status: wait.status === 'timeout' ? 'timeout' : 'failed', error: error.message };
    }
  }

  private async clearSession(sessionId: string): Promise<void> {
    for (const prefix of [sessionPaths.chunksPrefix(sessionId), sessionPaths.resultsPrefix(sessionId)]) {
      for (const key of await this.store.list(prefix)) {
        await this.store.delete(key);
      }
    }
  }
}
