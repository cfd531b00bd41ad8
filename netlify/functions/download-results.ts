import { z } from 'zod';
import { JobNotFoundError } from '../../src/lib/errors';
import { sessionPaths } from '../../src/lib/jobs/layout';
import { getServices } from './_services';
import { createHandler, parseQuery } from './_utils';
import { lookupIdField, toolField } from './_schemas';

const Q = z.object({
  tool: toolField,
  id: lookupIdField,
  variant: z.enum(['success', 'failures']).default('success'),
});

export const handler = createHandler(['GET'], async (event, { binary }) => {
  const { tool, id, variant } = parseQuery(event, Q);
  const { registry, repo, store } = getServices(tool);

  const entry = await registry.resolve(id);
  if (!entry) throw new JobNotFoundError(id);

  let key: string;
  if (entry.kind === 'job') {
    key = repo.paths.results(id);
  } else if (entry.kind === 'batch') {
    key = sessionPaths.merged(id);
  } else {
    key = variant === 'failures' ? sessionPaths.allFailures(id) : sessionPaths.allSuccess(id);
  }

  const bytes = await store.get(key);
  if (bytes === null) throw new JobNotFoundError(id);

  const filename = key.split('/').pop() ?? `${id}.csv`;
  return binary(bytes, 'text/csv; charset=utf-8', {
    'Content-Disposition': `attachment; filename="${entry.kind === 'job' ? filename : `${id}_${filename}`}"`,
  });
});
