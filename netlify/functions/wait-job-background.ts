import { z } from 'zod';
import { waitForTerminal } from '../../src/lib/jobs/poller';
import { createLogger } from '../../src/lib/logging/logger';
import { getServices } from './_services';
import { createHandler, parseJsonBody } from './_utils';
import { jobIdField, pollOverrides, runTuningFields, toolField } from './_schemas';

const log = createLogger('wait-job');

const Body = z.object({ tool: toolField, jobId: jobIdField, maxWaitSeconds: runTuningFields.maxWaitSeconds });

export const handler = createHandler(['POST'], async (event, { json, requestId }) => {
  const { tool, jobId, maxWaitSeconds } = parseJsonBody(event, Body);
  const { repo, poll } = getServices(tool);

  const job = await waitForTerminal(repo, jobId, {
    ...poll,
    ...pollOverrides(maxWaitSeconds),
    onPoll: ({ attempt, status, error }) => {
      log.debug('poll', { requestId, jobId, attempt, status: status?.status, error });
    },
  });

  log.info('wait finished', { requestId, jobId, status: job.status });
  return json(200, { ok: job.status === 'completed', job });
});
