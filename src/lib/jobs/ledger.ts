import { describeError } from '../errors';
import { createLogger, type Logger } from '../logging/logger';
import { getText, type BlobStore } from '../storage/types';
import { ledgerKeyFor } from './layout';
import { progressEntrySchema, type ProgressEntry } from './model';

export type LedgerReadResult = {
  entries: ProgressEntry[];
  /** Set when the ledger could not be read or parsed; entries is then empty. */
  error?: string;
};

/**
 * Workers append one JSON object per record, not always newline separated.
 * Adjacent `}` `{` pairs get a comma so the whole log parses as one array.
 */
export function parseLedger(raw: string): LedgerReadResult {
  const body = raw.trim();
  if (!body) return { entries: [] };

  let records: unknown;
  try {
    records = JSON.parse(`[${body.replace(/}\s*{/g, '},{')}]`);
  } catch (error) {
    return { entries: [], error: `Progress ledger is malformed: ${describeError(error)}` };
  }

  const entries: ProgressEntry[] = [];
  for (const record of Array.isArray(records) ? records : []) {
    const parsed = progressEntrySchema.safeParse(record);
    if (!parsed.success) continue;
    const runId = parsed.data.run_id ?? parsed.data.session_id;
    if (runId === undefined) continue;
    entries.push({
      runId,
      chunkIndex: parsed.data.chunk_index,
      status: parsed.data.status,
      timestamp: parsed.data.timestamp,
    });
  }
  return { entries };
}

/**
 * Distinct chunk indexes in `1..totalChunks` the run has reported completed.
 * Retried chunks may log more than one completion; the set is what counts.
 */
export function completedChunkIndexes(entries: ProgressEntry[], runId: string, totalChunks: number): Set<number> {
  const seen = new Set<number>();
  for (const entry of entries) {
    if (entry.runId !== runId || entry.status !== 'completed') continue;
    if (entry.chunkIndex < 1 || entry.chunkIndex > totalChunks) continue;
    seen.add(entry.chunkIndex);
  }
  return seen;
}

export type ProgressLedgerOptions = {
  partitioned?: boolean;
  logger?: Logger;
};

export class ProgressLedger {
  private readonly partitioned: boolean;
  private readonly log: Logger;

  constructor(
    private readonly store: BlobStore,
    options: ProgressLedgerOptions = {}
  ) {
    this.partitioned = options.partitioned ?? false;
    this.log = options.logger ?? createLogger('ledger');
  }

  keyFor(runId: string): string {
    return ledgerKeyFor(runId, this.partitioned);
  }

  /** Never rejects: read failures come back as `error` with zero entries. */
  async read(runId: string): Promise<LedgerReadResult> {
    const key = this.keyFor(runId);
    let raw: string | null;
    try {
      raw = await getText(this.store, key);
    } catch (error) {
      const message = `Progress ledger unavailable: ${describeError(error)}`;
      this.log.warn(message, { key });
      return { entries: [], error: message };
    }
    if (raw === null) return { entries: [] };

    const result = parseLedger(raw);
    if (result.error) this.log.warn(result.error, { key });
    return result;
  }

  async countCompletedChunks(runId: string, totalChunks: number): Promise<{ completed: number; error?: string }> {
    const { entries, error } = await this.read(runId);
    return { completed: completedChunkIndexes(entries, runId, totalChunks).size, error };
  }
}
