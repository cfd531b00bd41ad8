import { z } from 'zod';
import { JobNotFoundError } from '../../src/lib/errors';
import { sessionPaths } from '../../src/lib/jobs/layout';
import { loadManifest } from '../../src/lib/jobs/manifest';
import { getServices, type ToolServices } from './_services';
import { createHandler, parseQuery } from './_utils';
import { lookupIdField, toolField } from './_schemas';

const Q = z.object({ tool: toolField, id: lookupIdField });

async function ledgerProgress(services: ToolServices, sessionId: string) {
  const { store, ledger } = services;
  let totalChunks: number;
  try {
    totalChunks = (await loadManifest(store, sessionId)).totalChunks;
  } catch (error) {
    if (!(error instanceof JobNotFoundError)) throw error;
    // sessions uploaded without a manifest: the chunk objects are the plan
    totalChunks = (await store.list(sessionPaths.chunksPrefix(sessionId))).length;
  }
  const { completed, error } = await ledger.countCompletedChunks(sessionId, totalChunks);
  return { sessionId, totalChunks, completedChunks: completed, error };
}

export const handler = createHandler(['GET'], async (event, { json }) => {
  const { tool, id } = parseQuery(event, Q);
  const services = getServices(tool);

  const entry = await services.registry.resolve(id);
  if (!entry) throw new JobNotFoundError(id);

  switch (entry.kind) {
    case 'job':
      return json(200, { ok: true, entry, job: await services.repo.getStatus(id) });
    case 'batch':
      return json(200, { ok: true, entry, batch: await services.batches.snapshot(id) });
    case 'ledger_batch':
      return json(200, { ok: true, entry, progress: await ledgerProgress(services, id) });
  }
});
