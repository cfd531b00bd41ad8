import { randomBytes } from 'crypto';

const pad = (value: number) => String(value).padStart(2, '0');

export function formatTimestamp(date: Date): string {
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

/**
 * `job_YYYYMMDD_HHMMSS_xxxxxxxx`. The random suffix keeps two submissions in
 * the same second apart.
 */
export function generateJobId(now: Date = new Date()): string {
  return `job_${formatTimestamp(now)}_${randomBytes(4).toString('hex')}`;
}

/** 8 lowercase hex characters, short enough to be typed back in. */
export function generateSessionId(): string {
  return randomBytes(4).toString('hex');
}

export const JOB_ID_PATTERN = /^job_\d{8}_\d{6}(_[a-f0-9]{8})?$/u;
export const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{4,64}$/u;
