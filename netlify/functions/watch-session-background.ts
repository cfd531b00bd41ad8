import { z } from 'zod';
import { createLogger } from '../../src/lib/logging/logger';
import { getServices } from './_services';
import { createHandler, parseJsonBody } from './_utils';
import { pollOverrides, runTuningFields, sessionIdField, toolField } from './_schemas';

const log = createLogger('watch-session');

const Body = z.object({ tool: toolField, sessionId: sessionIdField, maxWaitSeconds: runTuningFields.maxWaitSeconds });

export const handler = createHandler(['POST'], async (event, { json, requestId }) => {
  const { tool, sessionId, maxWaitSeconds } = parseJsonBody(event, Body);
  const { sessions, poll } = getServices(tool);

  const outcome = await sessions.watch(sessionId, {
    ...poll,
    ...pollOverrides(maxWaitSeconds),
    onProgress: ({ completed, total, error }) => {
      log.debug('progress', { requestId, sessionId, completed, total, error });
    },
  });

  log.info('watch finished', { requestId, ...outcome, merge: outcome.merge?.successKey });
  return json(200, { ok: outcome.status === 'completed', ...outcome });
});
