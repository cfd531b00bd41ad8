import type { ToolConfig } from '../../config/tools';
import { SubmissionError, describeError } from '../errors';
import { createLogger, type Logger } from '../logging/logger';
import { getText, putJson, type BlobStore } from '../storage/types';
import { generateJobId } from './ids';
import { jobPaths, sanitizeFilename, type JobPaths } from './layout';
import {
  isStoredStatus,
  statusRecordSchema,
  type JobStatusView,
  type StatusRecord,
  type StoredJobStatus,
} from './model';

export type JobRepoOptions = {
  now?: () => Date;
  logger?: Logger;
};

type StatusLookup =
  | { kind: 'missing' }
  | { kind: 'invalid'; reason: string }
  | { kind: 'found'; record: StatusRecord };

/**
 * Submission and status reads for one tool's bucket.
 */
export class JobRepo {
  readonly paths: JobPaths;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    readonly store: BlobStore,
    readonly tool: Pick<ToolConfig, 'id' | 'folders'>,
    options: JobRepoOptions = {}
  ) {
    this.paths = jobPaths(tool.folders);
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? createLogger('jobs');
  }

  /**
   * Publishes a payload for the workers and returns its job id.
   *
   * The status record goes through `uploading` before the input object is
   * written and is flipped to `pending` afterwards, so an interrupted
   * submission shows up as `uploading` rather than as a job that never existed
   * or one that looks healthy.
   */
  async submit(payload: Uint8Array | string, filename: string): Promise<string> {
    const submittedAt = this.now().toISOString();
    const jobId = generateJobId(this.now());
    const inputKey = this.paths.input(jobId, sanitizeFilename(filename));

    try {
      await this.writeStatus(jobId, 'uploading', submittedAt);
    } catch (error) {
      throw new SubmissionError(jobId, 'status', error);
    }

    try {
      await this.store.put(inputKey, payload);
    } catch (error) {
      await this.writeStatus(jobId, 'failed', submittedAt, { error: `Input upload failed: ${describeError(error)}` }).catch(
        (markError: unknown) => {
          this.log.error('could not mark failed submission', { jobId, error: describeError(markError) });
        }
      );
      throw new SubmissionError(jobId, 'input', error);
    }

    try {
      await this.writeStatus(jobId, 'pending', submittedAt);
    } catch (error) {
      throw new SubmissionError(jobId, 'finalize', error);
    }

    this.log.info('job submitted', { jobId, tool: this.tool.id, inputKey });
    return jobId;
  }

  async getStatus(jobId: string): Promise<JobStatusView> {
    const lookup = await this.readStatusRecord(jobId);
    if (lookup.kind === 'missing') {
      return { jobId, tool: this.tool.id, status: 'not_found' };
    }
    if (lookup.kind === 'invalid') {
      return { jobId, tool: this.tool.id, status: 'invalid', error: lookup.reason };
    }

    const { record } = lookup;
    const view: JobStatusView = {
      jobId,
      tool: record.tool ?? this.tool.id,
      status: isStoredStatus(record.status) ? record.status : 'invalid',
      submittedAt: record.timestamp,
      updatedAt: record.updated_at,
      error: isStoredStatus(record.status) ? record.error : `Unrecognised status "${record.status}"`,
      message: record.message,
    };

    if (view.status === 'completed') {
      // workers may flip the record before the result object is visible
      const resultKey = this.paths.results(jobId);
      view.resultsReady = await this.store.exists(resultKey);
      if (view.resultsReady) view.resultKey = resultKey;
    }

    return view;
  }

  async downloadResults(jobId: string): Promise<Uint8Array | null> {
    return await this.store.get(this.paths.results(jobId));
  }

  async readStatusRecord(jobId: string): Promise<StatusLookup> {
    const raw = await getText(this.store, this.paths.status(jobId));
    if (raw === null) return { kind: 'missing' };

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return { kind: 'invalid', reason: 'Status record is not valid JSON' };
    }

    const parsed = statusRecordSchema.safeParse(json);
    if (!parsed.success) {
      return { kind: 'invalid', reason: `Status record is malformed: ${parsed.error.issues[0]?.message ?? 'unknown'}` };
    }
    return { kind: 'found', record: parsed.data };
  }

  private async writeStatus(
    jobId: string,
    status: StoredJobStatus,
    submittedAt: string,
    extra: { error?: string } = {}
  ): Promise<void> {
    const record: StatusRecord = {
      job_id: jobId,
      tool: this.tool.id,
      status,
      timestamp: submittedAt,
      updated_at: this.now().toISOString(),
      ...extra,
    };
    await putJson(this.store, this.paths.status(jobId), record);
  }
}
