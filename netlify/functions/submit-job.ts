import { z } from 'zod';
import { createLogger } from '../../src/lib/logging/logger';
import { getServices } from './_services';
import { createHandler, decodeBase64, parseJsonBody } from './_utils';
import { uploadFields } from './_schemas';

const log = createLogger('submit-job');

const Body = z.object(uploadFields);

export const handler = createHandler(['POST'], async (event, { json, requestId }) => {
  const { tool, filename, file } = parseJsonBody(event, Body);
  const { repo, registry } = getServices(tool);

  const jobId = await repo.submit(decodeBase64(file), filename);
  await registry.register(jobId, 'job');

  log.info('accepted job', { requestId, tool, jobId });
  return json(202, { ok: true, jobId, tool, status: 'pending' });
});
