import { describe, expect, it } from 'vitest';
import { getToolConfig } from '../src/config/tools';
import { EmptyDatasetError, MergeInProgressError } from '../src/lib/errors';
import { ChunkedJobRunner, type BatchOutcome, type SingleJobOutcome } from '../src/lib/jobs/batch';
import { MergeLease } from '../src/lib/jobs/lease';
import { loadManifest } from '../src/lib/jobs/manifest';
import { SessionRegistry } from '../src/lib/jobs/registry';
import { JobRepo } from '../src/lib/jobs/repo';
import { MemoryBlobStore } from '../src/lib/storage/memory';
import { getText, putJson } from '../src/lib/storage/types';
import { fakeClock, numberedRows } from './helpers';

const tool = getToolConfig('company_relationship');

type Verdict = 'complete' | 'fail' | 'hang';

/**
 * Stands in for the external worker: picks up pending inputs, echoes them back
 * as results and flips the status record.
 */
class FakeWorker {
  private readonly seen = new Set<string>();
  readonly attemptsByChunk = new Map<number, number>();
  peakPending = 0;

  constructor(
    private readonly store: MemoryBlobStore,
    private readonly verdict: (chunkIndex: number, attempt: number) => Verdict = () => 'complete'
  ) {}

  async step(): Promise<void> {
    let pending = 0;
    for (const key of await this.store.list('input/')) {
      const match = /^input\/(job_\d{8}_\d{6}_[a-f0-9]{8})_chunk_(\d+)_/u.exec(key);
      if (!match) continue;
      const [, jobId, chunk] = match;
      if (this.seen.has(jobId)) continue;

      const status = await getText(this.store, `status/${jobId}_status.json`);
      if (this.seen.has(jobId) || !status?.includes('"pending"')) continue;
      pending += 1;

      const chunkIndex = Number(chunk);
      const attempt = (this.attemptsByChunk.get(chunkIndex) ?? 0) + 1;
      const verdict = this.verdict(chunkIndex, attempt);
      if (verdict === 'hang') continue;

      this.seen.add(jobId);
      this.attemptsByChunk.set(chunkIndex, attempt);
      if (verdict === 'fail') {
        await putJson(this.store, `status/${jobId}_status.json`, { job_id: jobId, status: 'failed', error: 'worker crashed' });
        continue;
      }
      await this.store.put(`results/${jobId}_results.csv`, (await this.store.get(key)) ?? new Uint8Array());
      await putJson(this.store, `status/${jobId}_status.json`, { job_id: jobId, status: 'completed' });
    }
    this.peakPending = Math.max(this.peakPending, pending);
  }
}

function setup(store = new MemoryBlobStore()) {
  const repo = new JobRepo(store, tool);
  const registry = new SessionRegistry(store, tool);
  const lease = new MergeLease(store, 60_000);
  return { store, repo, registry, runner: new ChunkedJobRunner({ repo, registry, lease }) };
}

function batchOf(outcome: SingleJobOutcome | BatchOutcome): BatchOutcome {
  if (outcome.kind !== 'batch') throw new Error(`expected a batch outcome, got ${outcome.kind}`);
  return outcome;
}

describe('ChunkedJobRunner.run', () => {
  it('runs 120 rows as three chunk jobs and merges them in order', async () => {
    const { store, runner, registry } = setup();
    const worker = new FakeWorker(store);
    const clock = fakeClock(() => worker.step());
    const settled: number[] = [];

    const outcome = batchOf(
      await runner.run(numberedRows(120), 'leads.csv', {
        chunkSize: 50,
        poll: { intervalMs: 1_000, maxWaitMs: 60_000, clock },
        onChunk: (event) => settled.push(event.chunkIndex),
      })
    );

    expect(outcome).toMatchObject({
      status: 'completed',
      totalChunks: 3,
      successfulChunks: 3,
      excludedChunks: [],
    });
    expect(settled).toEqual([1, 2, 3]);
    await expect(getText(store, `users/${outcome.sessionId}/results/merged.csv`)).resolves.toBe(numberedRows(120));

    const manifest = await loadManifest(store, outcome.sessionId);
    expect(manifest.status).toBe('completed');
    expect(manifest.chunks.map((chunk) => [chunk.rowRange.start, chunk.rowRange.end])).toEqual([
      [0, 50],
      [50, 100],
      [100, 120],
    ]);
    await expect(registry.resolve(outcome.sessionId)).resolves.toMatchObject({ kind: 'batch' });
  });

  it('resubmits a failed chunk while retries remain', async () => {
    const { store, runner } = setup();
    const worker = new FakeWorker(store, (chunkIndex, attempt) => (chunkIndex === 2 && attempt === 1 ? 'fail' : 'complete'));
    const clock = fakeClock(() => worker.step());

    const outcome = batchOf(
      await runner.run(numberedRows(120), 'leads.csv', {
        chunkSize: 50,
        maxRetries: 1,
        poll: { intervalMs: 1_000, maxWaitMs: 60_000, clock },
      })
    );

    expect(outcome.successfulChunks).toBe(3);
    const manifest = await loadManifest(store, outcome.sessionId);
    expect(manifest.chunks.map((chunk) => chunk.attempts.length)).toEqual([1, 2, 1]);
    await expect(getText(store, `users/${outcome.sessionId}/results/merged.csv`)).resolves.toBe(numberedRows(120));
  });

  it('merges the remaining chunks when one keeps failing', async () => {
    const { store, runner } = setup();
    const worker = new FakeWorker(store, (chunkIndex) => (chunkIndex === 2 ? 'fail' : 'complete'));
    const clock = fakeClock(() => worker.step());

    const outcome = batchOf(
      await runner.run(numberedRows(120), 'leads.csv', {
        chunkSize: 50,
        poll: { intervalMs: 1_000, maxWaitMs: 60_000, clock },
      })
    );

    expect(outcome).toMatchObject({ status: 'completed', successfulChunks: 2, excludedChunks: [2] });
    expect(outcome.merged?.summary.ratio).toBe('2/3');
    expect(outcome.merged?.summary.row_count).toBe(70);

    const manifest = await loadManifest(store, outcome.sessionId);
    expect(manifest.chunks[1]).toMatchObject({ status: 'failed', error: 'worker crashed' });
  });

  it('reports a failed batch when no chunk completes', async () => {
    const { store, runner } = setup();
    const worker = new FakeWorker(store, () => 'fail');
    const clock = fakeClock(() => worker.step());

    const outcome = batchOf(
      await runner.run(numberedRows(60), 'leads.csv', {
        chunkSize: 30,
        poll: { intervalMs: 1_000, maxWaitMs: 60_000, clock },
      })
    );

    expect(outcome).toMatchObject({
      status: 'failed',
      successfulChunks: 0,
      excludedChunks: [1, 2],
      error: 'No chunks processed successfully',
    });
    await expect(loadManifest(store, outcome.sessionId)).resolves.toMatchObject({
      status: 'failed',
      error: 'No chunks processed successfully',
    });
  });

  it('keeps at most maxInFlight chunk jobs outstanding', async () => {
    const { store, runner } = setup();
    const worker = new FakeWorker(store);
    const clock = fakeClock(() => worker.step());

    const outcome = batchOf(
      await runner.run(numberedRows(200), 'leads.csv', {
        chunkSize: 20,
        maxInFlight: 3,
        poll: { intervalMs: 1_000, maxWaitMs: 600_000, clock },
      })
    );

    expect(outcome.successfulChunks).toBe(10);
    expect(worker.peakPending).toBeGreaterThan(0);
    expect(worker.peakPending).toBeLessThanOrEqual(3);
    await expect(getText(store, `users/${outcome.sessionId}/results/merged.csv`)).resolves.toBe(numberedRows(200));
  });

  it('submits a dataset that fits in one chunk as a plain job', async () => {
    const { store, runner, registry } = setup();
    const clock = fakeClock(async () => {
      for (const key of await store.list('status/')) {
        const jobId = key.replace('status/', '').replace('_status.json', '');
        await putJson(store, key, { job_id: jobId, status: 'completed' });
        await store.put(`results/${jobId}_results.csv`, 'id\n1\n');
      }
    });

    const outcome = await runner.run(numberedRows(30), 'leads.csv', {
      chunkSize: 50,
      poll: { intervalMs: 1_000, maxWaitMs: 60_000, clock },
    });

    if (outcome.kind !== 'job') throw new Error('expected a single job');
    expect(outcome.status).toMatchObject({ status: 'completed', resultsReady: true });
    await expect(registry.resolve(outcome.jobId)).resolves.toMatchObject({ kind: 'job' });
    await expect(store.list('users/')).resolves.toEqual([]);
  });

  it('rejects datasets without rows', async () => {
    const { runner } = setup();
    await expect(runner.run('id,company\n', 'empty.csv', { chunkSize: 50 })).rejects.toBeInstanceOf(EmptyDatasetError);
  });

  it('does not merge while another coordinator holds the lease', async () => {
    const { store, runner } = setup();
    const worker = new FakeWorker(store);
    const clock = fakeClock(() => worker.step());
    const other = new MergeLease(store, 600_000, undefined, 'other-coordinator');
    const originalPut = store.put.bind(store);
    // take the lease as soon as the session appears
    store.put = async (key, body, contentType) => {
      await originalPut(key, body, contentType);
      const match = /^users\/([a-f0-9]{8})\/manifest\.json$/u.exec(key);
      if (match && !(await store.exists(`users/${match[1]}/merge.lease`))) {
        await other.acquire(match[1]);
      }
    };

    await expect(
      runner.run(numberedRows(120), 'leads.csv', {
        chunkSize: 50,
        poll: { intervalMs: 1_000, maxWaitMs: 60_000, clock },
      })
    ).rejects.toBeInstanceOf(MergeInProgressError);
  });
});

describe('ChunkedJobRunner.resume', () => {
  it('picks a timed-out batch back up from a fresh runner', async () => {
    const store = new MemoryBlobStore();
    const first = setup(store);
    const stalled = new FakeWorker(store, (chunkIndex) => (chunkIndex === 3 ? 'hang' : 'complete'));

    const partial = batchOf(
      await first.runner.run(numberedRows(120), 'leads.csv', {
        chunkSize: 50,
        poll: { intervalMs: 1_000, maxWaitMs: 5_000, clock: fakeClock(() => stalled.step()) },
      })
    );
    expect(partial).toMatchObject({ status: 'completed', successfulChunks: 2, excludedChunks: [3] });
    await expect(loadManifest(store, partial.sessionId)).resolves.toMatchObject({
      chunks: [{ status: 'completed' }, { status: 'completed' }, { status: 'timeout' }],
    });

    const second = setup(store);
    const recovered = new FakeWorker(store);
    const resumed = await second.runner.resume(partial.sessionId, {
      poll: { intervalMs: 1_000, maxWaitMs: 60_000, clock: fakeClock(() => recovered.step()) },
    });

    expect(resumed).toMatchObject({ status: 'completed', successfulChunks: 3, excludedChunks: [] });
    await expect(getText(store, `users/${partial.sessionId}/results/merged.csv`)).resolves.toBe(numberedRows(120));
    const manifest = await loadManifest(store, partial.sessionId);
    expect(manifest.chunks.map((chunk) => chunk.attempts.length)).toEqual([1, 1, 1]);
  });

  it('submits the chunks a stopped coordinator never reached', async () => {
    const store = new MemoryBlobStore();
    const first = setup(store);
    const worker = new FakeWorker(store, () => 'hang');
    const stopping = fakeClock(async () => {
      await worker.step();
      throw new Error('coordinator stopped');
    });

    await expect(
      first.runner.run(numberedRows(120), 'leads.csv', {
        chunkSize: 50,
        poll: { intervalMs: 1_000, maxWaitMs: 60_000, clock: stopping },
      })
    ).rejects.toThrowError('coordinator stopped');

    const sessionKey = (await store.list('users/')).find((key) => key.endsWith('/manifest.json'));
    if (!sessionKey) throw new Error('manifest not written');
    const sessionId = sessionKey.split('/')[1];
    await expect(loadManifest(store, sessionId)).resolves.toMatchObject({
      chunks: [
        { status: 'pending', attempts: [expect.any(String)] },
        { status: 'pending', attempts: [] },
        { status: 'pending', attempts: [] },
      ],
    });

    const healthy = new FakeWorker(store);
    const resumed = await setup(store).runner.resume(sessionId, {
      poll: { intervalMs: 1_000, maxWaitMs: 60_000, clock: fakeClock(() => healthy.step()) },
    });

    expect(resumed).toMatchObject({ status: 'completed', successfulChunks: 3, excludedChunks: [] });
    await expect(getText(store, `users/${sessionId}/results/merged.csv`)).resolves.toBe(numberedRows(120));
    const manifest = await loadManifest(store, sessionId);
    expect(manifest.chunks.map((chunk) => chunk.attempts.length)).toEqual([1, 1, 1]);
  });

  it('resubmits a failed chunk from its stored input', async () => {
    const store = new MemoryBlobStore();
    const first = setup(store);
    const failing = new FakeWorker(store, (chunkIndex) => (chunkIndex === 1 ? 'fail' : 'complete'));

    const partial = batchOf(
      await first.runner.run(numberedRows(120), 'leads.csv', {
        chunkSize: 50,
        poll: { intervalMs: 1_000, maxWaitMs: 60_000, clock: fakeClock(() => failing.step()) },
      })
    );
    expect(partial.excludedChunks).toEqual([1]);

    const healthy = new FakeWorker(store);
    const resumed = await setup(store).runner.resume(partial.sessionId, {
      maxRetries: 1,
      poll: { intervalMs: 1_000, maxWaitMs: 60_000, clock: fakeClock(() => healthy.step()) },
    });

    expect(resumed.successfulChunks).toBe(3);
    await expect(getText(store, `users/${partial.sessionId}/results/merged.csv`)).resolves.toBe(numberedRows(120));
  });
});

describe('ChunkedJobRunner.snapshot', () => {
  it('reports chunk progress and the merge summary', async () => {
    const { store, runner } = setup();
    const worker = new FakeWorker(store);

    const outcome = batchOf(
      await runner.run(numberedRows(120), 'leads.csv', {
        chunkSize: 50,
        poll: { intervalMs: 1_000, maxWaitMs: 60_000, clock: fakeClock(() => worker.step()) },
      })
    );
    const snapshot = await runner.snapshot(outcome.sessionId);

    expect(snapshot).toMatchObject({
      sessionId: outcome.sessionId,
      tool: 'company_relationship',
      status: 'completed',
      totalChunks: 3,
      completedChunks: 3,
      merge: { ratio: '3/3', row_count: 120 },
    });
    expect(snapshot.chunks.map((chunk) => chunk.attempts)).toEqual([1, 1, 1]);
  });
});
