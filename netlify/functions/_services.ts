import { env } from '../../src/config/env';
import { ChunkedJobRunner } from '../../src/lib/jobs/batch';
import { MergeLease } from '../../src/lib/jobs/lease';
import { ProgressLedger } from '../../src/lib/jobs/ledger';
import { LedgerBatchRunner } from '../../src/lib/jobs/ledgerBatch';
import type { PollOptions } from '../../src/lib/jobs/poller';
import { SessionRegistry } from '../../src/lib/jobs/registry';
import { JobRepo } from '../../src/lib/jobs/repo';
import { createLogger } from '../../src/lib/logging/logger';
import { getBlobStore, resolveTool, type BlobStore } from '../../src/lib/storage';
import type { ToolConfig } from '../../src/config/tools';

export type ToolServices = {
  tool: ToolConfig;
  store: BlobStore;
  repo: JobRepo;
  registry: SessionRegistry;
  ledger: ProgressLedger;
  batches: ChunkedJobRunner;
  sessions: LedgerBatchRunner;
  poll: PollOptions;
};

export function getServices(toolId: string): ToolServices {
  const tool = resolveTool(toolId);
  const store = getBlobStore(toolId);
  const logger = createLogger(tool.id);

  const repo = new JobRepo(store, tool, { logger });
  const registry = new SessionRegistry(store, tool);
  const lease = new MergeLease(store, env.MERGE_LEASE_MS);
  const ledger = new ProgressLedger(store, { partitioned: env.LEDGER_PARTITIONED, logger });

  return {
    tool,
    store,
    repo,
    registry,
    ledger,
    batches: new ChunkedJobRunner({ repo, registry, lease, logger }),
    sessions: new LedgerBatchRunner({ repo, ledger, registry, lease, logger }),
    poll: { intervalMs: env.POLL_INTERVAL_MS, maxWaitMs: env.MAX_WAIT_MS, logger },
  };
}
