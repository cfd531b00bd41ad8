import type { ToolFolders } from '../../config/tools';

export const LEDGER_KEY = 'progress.jsonl';

/**
 * Object keys shared with the workers. Changing any of these breaks
 * compatibility with jobs already in flight.
 */
export function jobPaths(folders: ToolFolders) {
  return {
    input: (jobId: string, filename: string) => `${folders.input}/${jobId}_${filename}`,
    status: (jobId: string) => `${folders.status}/${jobId}_status.json`,
    results: (jobId: string) => `${folders.results}/${jobId}_results.csv`,
  };
}

export type JobPaths = ReturnType<typeof jobPaths>;

export const sessionPaths = {
  root: (sessionId: string) => `users/${sessionId}/`,
  chunksPrefix: (sessionId: string) => `users/${sessionId}/chunks/`,
  chunk: (sessionId: string, chunkIndex: number) => `users/${sessionId}/chunks/chunk_${chunkIndex}.csv`,
  resultsPrefix: (sessionId: string) => `users/${sessionId}/results/`,
  manifest: (sessionId: string) => `users/${sessionId}/manifest.json`,
  merged: (sessionId: string) => `users/${sessionId}/results/merged.csv`,
  mergeSummary: (sessionId: string) => `users/${sessionId}/results/merge_summary.json`,
  allSuccess: (sessionId: string) => `users/${sessionId}/results/ALL_SUCCESS.csv`,
  allFailures: (sessionId: string) => `users/${sessionId}/results/ALL_FAILURES.csv`,
  lease: (sessionId: string) => `users/${sessionId}/merge.lease`,
  ledger: (sessionId: string) => `users/${sessionId}/progress.jsonl`,
};

export const registryPath = (lookupId: string) => `registry/${lookupId}.json`;

export function ledgerKeyFor(runId: string, partitioned: boolean): string {
  return partitioned ? sessionPaths.ledger(runId) : LEDGER_KEY;
}

export const sanitizeFilename = (filename: string) =>
  (filename.replace(/\\/g, '/').split('/').pop() ?? '')
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .slice(-120) || 'upload.csv';
