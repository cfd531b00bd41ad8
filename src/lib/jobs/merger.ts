import { MergeError, describeError } from '../errors';
import { concatDatasets, parseCsv, serializeCsv, type CsvDataset } from '../csv/dataset';
import { createLogger, type Logger } from '../logging/logger';
import { putJson, type BlobStore } from '../storage/types';
import { sessionPaths } from './layout';
import type { MergeSummary } from './model';

export type ChunkArtifact = {
  chunkIndex: number;
  /** Result object of the chunk's completed attempt; absent when it did not complete. */
  resultKey?: string;
};

export type MergedArtifact = {
  key: string;
  summaryKey: string;
  summary: MergeSummary;
};

export type MergeOptions = {
  now?: () => Date;
  logger?: Logger;
};

/**
 * Concatenates the result CSVs of every chunk whose artifact can be read, in
 * chunk order, and writes the merged CSV plus a summary beside it. Chunks
 * without a readable artifact are excluded and listed in the summary.
 */
export async function mergeChunkResults(
  store: BlobStore,
  sessionId: string,
  artifacts: ChunkArtifact[],
  options: MergeOptions = {}
): Promise<MergedArtifact> {
  const log = options.logger ?? createLogger('merger');
  const now = options.now ?? (() => new Date());
  const ordered = [...artifacts].sort((a, b) => a.chunkIndex - b.chunkIndex);

  const included: CsvDataset[] = [];
  const excluded: number[] = [];

  for (const artifact of ordered) {
    if (!artifact.resultKey) {
      excluded.push(artifact.chunkIndex);
      continue;
    }

    let bytes: Uint8Array | null;
    try {
      bytes = await store.get(artifact.resultKey);
    } catch (error) {
      throw new MergeError(sessionId, `Could not read results of chunk ${artifact.chunkIndex}`, error);
    }

    if (bytes === null) {
      log.warn('chunk result missing, excluding from merge', { sessionId, chunkIndex: artifact.chunkIndex });
      excluded.push(artifact.chunkIndex);
      continue;
    }

    try {
      included.push(parseCsv(bytes, artifact.resultKey));
    } catch (error) {
      log.warn('chunk result unreadable, excluding from merge', {
        sessionId,
        chunkIndex: artifact.chunkIndex,
        error: describeError(error),
      });
      excluded.push(artifact.chunkIndex);
    }
  }

  if (included.length === 0) {
    throw new MergeError(sessionId, 'No chunks processed successfully');
  }

  const merged = concatDatasets(included);
  const key = sessionPaths.merged(sessionId);
  const summaryKey = sessionPaths.mergeSummary(sessionId);
  const summary: MergeSummary = {
    session_id: sessionId,
    successful_chunks: included.length,
    total_chunks: ordered.length,
    ratio: `${included.length}/${ordered.length}`,
    excluded_chunks: excluded,
    row_count: merged.rows.length,
    merged_key: key,
    merged_at: now().toISOString(),
  };

  try {
    await store.put(key, serializeCsv(merged), 'text/csv; charset=utf-8');
    await putJson(store, summaryKey, summary);
  } catch (error) {
    throw new MergeError(sessionId, `Could not write merged results: ${describeError(error)}`, error);
  }

  log.info('merged session results', { sessionId, ratio: summary.ratio, rows: summary.row_count });
  return { key, summaryKey, summary };
}
