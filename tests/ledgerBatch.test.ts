import JSZip from 'jszip';
import { describe, expect, it } from 'vitest';
import { getToolConfig } from '../src/config/tools';
import { EmptyDatasetError } from '../src/lib/errors';
import { MergeLease } from '../src/lib/jobs/lease';
import { ProgressLedger } from '../src/lib/jobs/ledger';
import { LedgerBatchRunner, type LedgerUpload } from '../src/lib/jobs/ledgerBatch';
import { loadManifest } from '../src/lib/jobs/manifest';
import { SessionRegistry } from '../src/lib/jobs/registry';
import { JobRepo } from '../src/lib/jobs/repo';
import { MemoryBlobStore } from '../src/lib/storage/memory';
import { getText } from '../src/lib/storage/types';
import { fakeClock, numberedRows } from './helpers';

const tool = getToolConfig('contact_scraper');

function setup(store = new MemoryBlobStore()) {
  const repo = new JobRepo(store, tool);
  const registry = new SessionRegistry(store, tool);
  const ledger = new ProgressLedger(store);
  const lease = new MergeLease(store, 60_000);
  return { store, registry, runner: new LedgerBatchRunner({ repo, ledger, registry, lease }) };
}

function sessionOf(upload: LedgerUpload) {
  if (upload.kind !== 'ledger_batch') throw new Error('expected a ledger session');
  return upload;
}

/**
 * Processes one chunk per step: appends a completion record to the shared
 * ledger and drops a results archive, up to `limit` chunks.
 */
function ledgerWorker(store: MemoryBlobStore, sessionId: string, options: { limit?: number; archives?: boolean } = {}) {
  let done = 0;
  return async () => {
    const chunks = await store.list(`users/${sessionId}/chunks/`);
    if (done >= chunks.length || done >= (options.limit ?? Infinity)) return;

    const chunkIndex = done + 1;
    done += 1;
    const rows = (await getText(store, `users/${sessionId}/chunks/chunk_${chunkIndex}.csv`)) ?? '';

    if (options.archives ?? true) {
      const zip = new JSZip();
      zip.file(`result_${chunkIndex}.csv`, rows);
      zip.file(`failures_${chunkIndex}.csv`, chunkIndex === 2 ? 'id,reason\n77,no website\n' : 'id,reason\n');
      await store.put(
        `users/${sessionId}/results/scrape_results_${chunkIndex}.zip`,
        await zip.generateAsync({ type: 'uint8array' })
      );
    }

    const ledger = (await getText(store, 'progress.jsonl')) ?? '';
    const record = JSON.stringify({ session_id: sessionId, chunk_index: chunkIndex, status: 'completed' });
    await store.put('progress.jsonl', ledger + record);
  };
}

describe('LedgerBatchRunner.upload', () => {
  it('writes one chunk object per planned chunk', async () => {
    const { store, runner, registry } = setup();

    const upload = sessionOf(await runner.upload(numberedRows(120), 'contacts.csv', { chunkCount: 3 }));

    expect(upload.totalRows).toBe(120);
    expect(upload.totalChunks).toBe(3);
    expect(upload.chunkKeys).toEqual([1, 2, 3].map((n) => `users/${upload.sessionId}/chunks/chunk_${n}.csv`));
    const lastChunkLines = ['id,company', ...numberedRows(120).split('\n').slice(81)];
    await expect(getText(store, upload.chunkKeys[2])).resolves.toBe(lastChunkLines.join('\n'));
    await expect(loadManifest(store, upload.sessionId)).resolves.toMatchObject({
      kind: 'ledger_batch',
      chunkSize: 40,
      totalChunks: 3,
      filename: 'contacts.csv',
    });
    await expect(registry.resolve(upload.sessionId)).resolves.toMatchObject({ kind: 'ledger_batch' });
  });

  it('plans by chunk size when asked to', async () => {
    const { runner } = setup();
    const upload = sessionOf(await runner.upload(numberedRows(120), 'contacts.csv', { chunkSize: 50 }));
    expect(upload.totalChunks).toBe(3);
  });

  it('submits a small dataset as a plain job', async () => {
    const { store, runner } = setup();

    const upload = await runner.upload(numberedRows(20), 'contacts.csv', { chunkSize: 50 });

    expect(upload.kind).toBe('job');
    await expect(store.list('users/')).resolves.toEqual([]);
    await expect(store.list('input/')).resolves.toHaveLength(1);
  });

  it('rejects datasets without rows', async () => {
    const { runner } = setup();
    await expect(runner.upload('id,company\n', 'contacts.csv', { chunkCount: 2 })).rejects.toBeInstanceOf(
      EmptyDatasetError
    );
  });
});

describe('LedgerBatchRunner.watch', () => {
  it('waits for every chunk and merges the result archives', async () => {
    const { store, runner } = setup();
    const upload = sessionOf(await runner.upload(numberedRows(120), 'contacts.csv', { chunkCount: 3 }));
    const work = ledgerWorker(store, upload.sessionId);
    const progress: number[] = [];

    const outcome = await runner.watch(upload.sessionId, {
      intervalMs: 1_000,
      maxWaitMs: 60_000,
      clock: fakeClock(work),
      onProgress: ({ completed }) => progress.push(completed),
    });

    expect(progress).toEqual([0, 1, 2, 3]);
    expect(outcome).toEqual({
      sessionId: upload.sessionId,
      status: 'completed',
      completedChunks: 3,
      totalChunks: 3,
      merge: {
        archives: [1, 2, 3].map((n) => `users/${upload.sessionId}/results/scrape_results_${n}.zip`),
        successRows: 120,
        failureRows: 1,
        skipped: [],
        successKey: `users/${upload.sessionId}/results/ALL_SUCCESS.csv`,
        failureKey: `users/${upload.sessionId}/results/ALL_FAILURES.csv`,
      },
    });
    await expect(getText(store, `users/${upload.sessionId}/results/ALL_SUCCESS.csv`)).resolves.toBe(numberedRows(120));
    await expect(getText(store, `users/${upload.sessionId}/results/ALL_FAILURES.csv`)).resolves.toBe(
      'id,reason\n77,no website'
    );
    await expect(loadManifest(store, upload.sessionId)).resolves.toMatchObject({ status: 'completed' });
  });

  it('merges what finished when the wait times out', async () => {
    const { store, runner } = setup();
    const upload = sessionOf(await runner.upload(numberedRows(120), 'contacts.csv', { chunkCount: 3 }));

    const outcome = await runner.watch(upload.sessionId, {
      intervalMs: 1_000,
      maxWaitMs: 10_000,
      clock: fakeClock(ledgerWorker(store, upload.sessionId, { limit: 2 })),
    });

    expect(outcome).toMatchObject({ status: 'timeout', completedChunks: 2, totalChunks: 3 });
    expect(outcome.merge?.successRows).toBe(80);
    await expect(loadManifest(store, upload.sessionId)).resolves.toMatchObject({ status: 'running' });
  });

  it('reports a failed merge when no archives were produced', async () => {
    const { store, runner } = setup();
    const upload = sessionOf(await runner.upload(numberedRows(120), 'contacts.csv', { chunkCount: 2 }));

    const outcome = await runner.watch(upload.sessionId, {
      intervalMs: 1_000,
      maxWaitMs: 60_000,
      clock: fakeClock(ledgerWorker(store, upload.sessionId, { archives: false })),
    });

    expect(outcome).toEqual({
      sessionId: upload.sessionId,
      status: 'failed',
      completedChunks: 2,
      totalChunks: 2,
      error: `No result archives found for session ${upload.sessionId}`,
    });
    await expect(loadManifest(store, upload.sessionId)).resolves.toMatchObject({ status: 'failed' });
  });

  it('rejects unknown sessions', async () => {
    const { runner } = setup();
    await expect(runner.watch('00000000')).rejects.toThrowError('No job or session found for 00000000');
  });
});
