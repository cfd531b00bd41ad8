import { z } from 'zod';
import { JobNotFoundError } from '../../src/lib/errors';
import { presignDownload } from '../../src/lib/storage';
import { getServices } from './_services';
import { createHandler, parseQuery } from './_utils';
import { jobIdField, toolField } from './_schemas';

const Q = z.object({ tool: toolField, jobId: jobIdField });

export const handler = createHandler(['GET'], async (event, { json }) => {
  const { tool, jobId } = parseQuery(event, Q);
  const { repo, store } = getServices(tool);

  const job = await repo.getStatus(jobId);
  if (job.status === 'not_found') throw new JobNotFoundError(jobId);

  // ephemeral download url once the results object exists
  const downloadUrl = job.resultsReady && job.resultKey ? await presignDownload(store, job.resultKey) : undefined;
  return json(200, { ok: true, job, downloadUrl });
});
