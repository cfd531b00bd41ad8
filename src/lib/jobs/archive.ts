import JSZip from 'jszip';
import { MergeError, describeError } from '../errors';
import { concatDatasets, parseCsv, serializeCsv, type CsvDataset } from '../csv/dataset';
import { createLogger, type Logger } from '../logging/logger';
import type { BlobStore } from '../storage/types';
import { sessionPaths } from './layout';

export type ArchiveMergeResult = {
  archives: string[];
  successRows: number;
  failureRows: number;
  /** Archives and `archive:member` entries left out because they could not be read. */
  skipped: string[];
  successKey?: string;
  failureKey?: string;
};

const ARCHIVE_MARKER = 'scrape_results_';

function basename(path: string): string {
  return path.split('/').pop() ?? path;
}

/**
 * Unpacks the `scrape_results_*.zip` archives workers leave under a session's
 * results prefix and folds their `result_*` and `failures_*` CSVs into
 * `ALL_SUCCESS.csv` and `ALL_FAILURES.csv`. A side with no rows is not written.
 * Archives or members that cannot be read are skipped and listed in `skipped`.
 */
export async function mergeSessionArchives(
  store: BlobStore,
  sessionId: string,
  options: { logger?: Logger } = {}
): Promise<ArchiveMergeResult> {
  const log = options.logger ?? createLogger('archive');
  let keys: string[];
  try {
    keys = await store.list(sessionPaths.resultsPrefix(sessionId));
  } catch (error) {
    throw new MergeError(sessionId, `Could not list result archives: ${describeError(error)}`, error);
  }
  const archives = keys.filter((key) => key.endsWith('.zip') && basename(key).includes(ARCHIVE_MARKER));

  if (archives.length === 0) {
    throw new MergeError(sessionId, `No result archives found for session ${sessionId}`);
  }

  const successes: CsvDataset[] = [];
  const failures: CsvDataset[] = [];
  const skipped: string[] = [];

  for (const key of archives) {
    let bytes: Uint8Array | null;
    try {
      bytes = await store.get(key);
    } catch (error) {
      throw new MergeError(sessionId, `Could not read archive ${key}: ${describeError(error)}`, error);
    }
    if (bytes === null) continue;

    let zip: JSZip;
    try {
      zip = await JSZip.loadAsync(bytes);
    } catch (error) {
      log.warn('skipping unreadable archive', { sessionId, key, error: describeError(error) });
      skipped.push(key);
      continue;
    }

    const members = Object.values(zip.files)
      .filter((file) => !file.dir && file.name.endsWith('.csv'))
      .sort((a, b) => a.name.localeCompare(b.name));

    for (const member of members) {
      const name = basename(member.name);
      const target = name.includes('failures_') ? failures : name.includes('result_') ? successes : null;
      if (!target) continue;
      try {
        target.push(parseCsv(await member.async('string'), name));
      } catch (error) {
        log.warn('skipping unreadable archive member', { sessionId, key, member: name, error: describeError(error) });
        skipped.push(`${key}:${name}`);
      }
    }
  }

  const result: ArchiveMergeResult = { archives, successRows: 0, failureRows: 0, skipped };

  try {
    if (successes.length > 0) {
      const merged = concatDatasets(successes);
      if (merged.rows.length > 0) {
        result.successKey = sessionPaths.allSuccess(sessionId);
        result.successRows = merged.rows.length;
        await store.put(result.successKey, serializeCsv(merged), 'text/csv; charset=utf-8');
      }
    }
    if (failures.length > 0) {
      const merged = concatDatasets(failures);
      if (merged.rows.length > 0) {
        result.failureKey = sessionPaths.allFailures(sessionId);
        result.failureRows = merged.rows.length;
        await store.put(result.failureKey, serializeCsv(merged), 'text/csv; charset=utf-8');
      }
    }
  } catch (error) {
    throw new MergeError(sessionId, `Could not write merged archives: ${describeError(error)}`, error);
  }

  log.info('merged session archives', {
    sessionId,
    archives: archives.length,
    successRows: result.successRows,
    failureRows: result.failureRows,
    skipped: skipped.length,
  });
  return result;
}
