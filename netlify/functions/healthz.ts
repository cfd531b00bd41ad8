import { env } from '../../src/config/env';
import { TOOLS } from '../../src/config/tools';
import { createHandler } from './_utils';

export const handler = createHandler(['GET'], async (_event, { json }) =>
  json(200, {
    status: 'ok',
    store: env.STORE_PROVIDER,
    tools: Object.keys(TOOLS),
    time: new Date().toISOString(),
  })
);
