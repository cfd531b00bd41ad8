import { z } from 'zod';
import { env } from '../../src/config/env';
import { createLogger } from '../../src/lib/logging/logger';
import { getServices } from './_services';
import { createHandler, parseJsonBody } from './_utils';
import { pollOverrides, runTuningFields, sessionIdField, toolField } from './_schemas';

const log = createLogger('resume-session');

const Body = z.object({ tool: toolField, sessionId: sessionIdField, ...runTuningFields });

export const handler = createHandler(['POST'], async (event, { json, requestId }) => {
  const body = parseJsonBody(event, Body);
  const { batches, poll } = getServices(body.tool);

  const outcome = await batches.resume(body.sessionId, {
    maxInFlight: body.maxInFlight ?? env.MAX_IN_FLIGHT,
    maxRetries: body.maxRetries ?? env.MAX_CHUNK_RETRIES,
    poll: { ...poll, ...pollOverrides(body.maxWaitSeconds) },
    onChunk: (chunk) => {
      log.info('chunk settled', { requestId, ...chunk });
    },
  });

  return json(200, { ok: outcome.status === 'completed', ...outcome });
});
