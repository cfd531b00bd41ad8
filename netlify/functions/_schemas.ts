import { z } from 'zod';
import { env } from '../../src/config/env';
import { JOB_ID_PATTERN, SESSION_ID_PATTERN } from '../../src/lib/jobs/ids';

export const toolField = z.string().min(1, 'tool is required');

export const jobIdField = z.string().regex(JOB_ID_PATTERN, 'jobId must look like job_YYYYMMDD_HHMMSS_xxxxxxxx');

export const sessionIdField = z.string().regex(SESSION_ID_PATTERN, 'sessionId is not a valid session identifier');

export const lookupIdField = z
  .string()
  .min(1)
  .refine((value) => JOB_ID_PATTERN.test(value) || SESSION_ID_PATTERN.test(value), 'id is not a job or session identifier');

export const uploadFields = {
  tool: toolField,
  filename: z.string().min(1).max(255),
  /** Base64 of the CSV bytes. */
  file: z.string().min(1, 'file is required'),
};

export const chunkSizeField = z
  .number()
  .int()
  .min(env.CHUNK_SIZE_MIN, `chunkSize must be at least ${env.CHUNK_SIZE_MIN}`)
  .max(env.CHUNK_SIZE_MAX, `chunkSize must be at most ${env.CHUNK_SIZE_MAX}`);

export const runTuningFields = {
  maxInFlight: z.number().int().min(1).max(32).optional(),
  maxRetries: z.number().int().min(0).max(10).optional(),
  maxWaitSeconds: z.number().positive().optional(),
};

export function pollOverrides(maxWaitSeconds: number | undefined): { maxWaitMs?: number } {
  return maxWaitSeconds === undefined ? {} : { maxWaitMs: maxWaitSeconds * 1000 };
}
