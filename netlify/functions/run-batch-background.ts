import { z } from 'zod';
import { env } from '../../src/config/env';
import { createLogger } from '../../src/lib/logging/logger';
import { getServices } from './_services';
import { createHandler, decodeBase64, parseJsonBody } from './_utils';
import { chunkSizeField, pollOverrides, runTuningFields, uploadFields } from './_schemas';

const log = createLogger('run-batch');

const Body = z.object({
  ...uploadFields,
  chunkSize: chunkSizeField.optional(),
  ...runTuningFields,
});

export const handler = createHandler(['POST'], async (event, { json, requestId }) => {
  const body = parseJsonBody(event, Body);
  const { batches, poll } = getServices(body.tool);

  const outcome = await batches.run(decodeBase64(body.file), body.filename, {
    chunkSize: body.chunkSize ?? env.CHUNK_SIZE,
    maxInFlight: body.maxInFlight ?? env.MAX_IN_FLIGHT,
    maxRetries: body.maxRetries ?? env.MAX_CHUNK_RETRIES,
    poll: { ...poll, ...pollOverrides(body.maxWaitSeconds) },
    onChunk: (chunk) => {
      log.info('chunk settled', { requestId, ...chunk });
    },
  });

  if (outcome.kind === 'job') {
    log.info('dataset ran as a single job', { requestId, jobId: outcome.jobId, status: outcome.status.status });
    return json(200, { ok: outcome.status.status === 'completed', ...outcome });
  }

  log.info('batch finished', {
    requestId,
    sessionId: outcome.sessionId,
    status: outcome.status,
    successfulChunks: outcome.successfulChunks,
    totalChunks: outcome.totalChunks,
  });
  return json(200, { ok: outcome.status === 'completed', ...outcome });
});
