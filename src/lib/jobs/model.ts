import { z } from 'zod';

/** States a status record may hold in the store. */
export const STORED_STATUSES = ['uploading', 'pending', 'processing', 'completed', 'failed'] as const;
export type StoredJobStatus = (typeof STORED_STATUSES)[number];

/**
 * States a caller can observe. `timeout` is classified client-side and never
 * written; `not_found` and `invalid` describe the status record itself.
 */
export const JOB_STATUSES = [...STORED_STATUSES, 'timeout', 'not_found', 'invalid'] as const;
export type JobStatus = (typeof JOB_STATUSES)[number];

export function isStoredStatus(value: string): value is StoredJobStatus {
  return STORED_STATUSES.some((status) => status === value);
}

// Written by us and by the workers; extra worker fields pass through.
export const statusRecordSchema = z
  .object({
    job_id: z.string().min(1),
    tool: z.string().optional(),
    status: z.string().min(1),
    timestamp: z.string().optional(),
    updated_at: z.string().optional(),
    error: z.string().optional(),
    message: z.string().optional(),
  })
  .passthrough();

export type StatusRecord = z.infer<typeof statusRecordSchema>;

export interface JobStatusView {
  jobId: string;
  tool: string;
  status: JobStatus;
  submittedAt?: string;
  updatedAt?: string;
  error?: string;
  message?: string;
  /** Only set when status is `completed`. */
  resultsReady?: boolean;
  resultKey?: string;
}

export type RowRange = { start: number; end: number };

export interface ChunkDescriptor {
  /** 1-based, contiguous within a plan. */
  chunkIndex: number;
  /** Half-open. */
  rowRange: RowRange;
}

export interface ChunkPlan {
  totalRows: number;
  chunkSize: number;
  totalChunks: number;
  /** True when the whole dataset fits in one chunk. */
  unchunked: boolean;
  chunks: ChunkDescriptor[];
}

export const progressEntrySchema = z
  .object({
    run_id: z.string().min(1).optional(),
    session_id: z.string().min(1).optional(),
    chunk_index: z.number().int(),
    status: z.string(),
    timestamp: z.union([z.string(), z.number()]).optional(),
  })
  .passthrough()
  .refine((entry) => entry.run_id !== undefined || entry.session_id !== undefined, {
    message: 'run_id or session_id is required',
  });

export interface ProgressEntry {
  runId: string;
  chunkIndex: number;
  status: string;
  timestamp?: string | number;
}

export type BatchKind = 'job' | 'batch' | 'ledger_batch';

export const chunkRecordSchema = z.object({
  chunkIndex: z.number().int().positive(),
  rowRange: z.object({ start: z.number().int().nonnegative(), end: z.number().int().nonnegative() }),
  attempts: z.array(z.string()),
  status: z.enum(JOB_STATUSES),
  error: z.string().optional(),
  resultKey: z.string().optional(),
});

export type ChunkRecord = z.infer<typeof chunkRecordSchema>;

export const manifestSchema = z.object({
  sessionId: z.string().min(1),
  tool: z.string().min(1),
  kind: z.enum(['batch', 'ledger_batch']),
  filename: z.string(),
  chunkSize: z.number().int().positive(),
  totalRows: z.number().int().nonnegative(),
  totalChunks: z.number().int().nonnegative(),
  status: z.enum(['running', 'merging', 'completed', 'failed']),
  createdAt: z.string(),
  updatedAt: z.string(),
  error: z.string().optional(),
  chunks: z.array(chunkRecordSchema),
});

export type BatchManifest = z.infer<typeof manifestSchema>;

export interface MergeSummary {
  session_id: string;
  successful_chunks: number;
  total_chunks: number;
  ratio: string;
  excluded_chunks: number[];
  row_count: number;
  merged_key: string;
  merged_at: string;
}
