import { z } from 'zod';
import { env } from '../../src/config/env';
import type { ChunkSizing } from '../../src/lib/jobs/ledgerBatch';
import { getServices } from './_services';
import { HttpError, createHandler, decodeBase64, parseJsonBody } from './_utils';
import { chunkSizeField, uploadFields } from './_schemas';

const Body = z.object({
  ...uploadFields,
  chunkCount: z.number().int().min(1).max(1000).optional(),
  chunkSize: chunkSizeField.optional(),
});

export const handler = createHandler(['POST'], async (event, { json }) => {
  const body = parseJsonBody(event, Body);
  if (body.chunkCount !== undefined && body.chunkSize !== undefined) {
    throw new HttpError(400, 'Send either chunkCount or chunkSize, not both');
  }

  const sizing: ChunkSizing =
    body.chunkCount !== undefined ? { chunkCount: body.chunkCount } : { chunkSize: body.chunkSize ?? env.CHUNK_SIZE };

  const { sessions } = getServices(body.tool);
  const upload = await sessions.upload(decodeBase64(body.file), body.filename, sizing);
  return json(201, { ok: true, tool: body.tool, ...upload });
});
