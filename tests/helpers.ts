import type { HandlerEvent } from '@netlify/functions';
import { vi } from 'vitest';
import { StoreTransportError } from '../src/lib/errors';
import type { Clock } from '../src/lib/jobs/poller';
import { MemoryBlobStore } from '../src/lib/storage/memory';
import type { BlobStore } from '../src/lib/storage/types';

export const baseEnv = {
  ALLOWED_ORIGINS: 'https://frontend.test',
  STORE_PROVIDER: 'memory',
  STORE_S3_ENDPOINT: 'https://example.r2.cloudflarestorage.com',
  STORE_REGION: 'auto',
  STORE_ACCESS_KEY_ID: 'test-access-key',
  STORE_SECRET_ACCESS_KEY: 'test-secret',
  POLL_INTERVAL_SECONDS: '5',
  MAX_WAIT_SECONDS: '300',
  CHUNK_SIZE: '50',
  CHUNK_SIZE_MIN: '10',
  CHUNK_SIZE_MAX: '1000',
  PRESIGN_TTL: '900',
  NODE_ENV: 'test',
} as const;

type EnvOverrides = Partial<Record<string, string | undefined>>;

export async function loadModule<T>(path: string, overrides: EnvOverrides = {}): Promise<T> {
  vi.resetModules();
  const nextEnv: NodeJS.ProcessEnv = { ...baseEnv };

  for (const [key, value] of Object.entries(overrides)) {
    if (typeof value === 'undefined') {
      delete nextEnv[key];
    } else {
      nextEnv[key] = value;
    }
  }

  process.env = nextEnv;
  const module: T = await import(path);
  return module;
}

/** Clock whose sleep advances time instantly and runs `onSleep` first. */
export function fakeClock(onSleep?: (nowMs: number) => Promise<void> | void): Clock & { sleeps: number[] } {
  let current = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => current,
    sleep: async (ms) => {
      sleeps.push(ms);
      await onSleep?.(current);
      current += ms;
    },
  };
}

export function csv(header: string[], rows: Array<Array<string | number>>): string {
  return [header.join(','), ...rows.map((row) => row.join(','))].join('\n');
}

export function numberedRows(count: number): string {
  return csv(
    ['id', 'company'],
    Array.from({ length: count }, (_value, index) => [index + 1, `Company ${index + 1}`])
  );
}

/** Delegates to a memory store, failing selected operations with a transport error. */
export class FlakyStore implements BlobStore {
  readonly inner = new MemoryBlobStore('flaky');
  readonly bucket = 'flaky';
  failing: (operation: 'put' | 'get' | 'exists' | 'list' | 'delete', key: string) => boolean = () => false;

  private check(operation: 'put' | 'get' | 'exists' | 'list' | 'delete', key: string) {
    if (this.failing(operation, key)) {
      throw new StoreTransportError(operation, key, new Error('simulated outage'));
    }
  }

  async put(key: string, body: Uint8Array | string, contentType?: string): Promise<void> {
    this.check('put', key);
    await this.inner.put(key, body, contentType);
  }

  async get(key: string): Promise<Uint8Array | null> {
    this.check('get', key);
    return await this.inner.get(key);
  }

  async exists(key: string): Promise<boolean> {
    this.check('exists', key);
    return await this.inner.exists(key);
  }

  async list(prefix: string): Promise<string[]> {
    this.check('list', prefix);
    return await this.inner.list(prefix);
  }

  async delete(key: string): Promise<void> {
    this.check('delete', key);
    await this.inner.delete(key);
  }
}

export function buildEvent(overrides: Partial<HandlerEvent> = {}): HandlerEvent {
  return {
    rawUrl: 'https://relay.test/.netlify/functions/test',
    rawQuery: '',
    path: '/.netlify/functions/test',
    httpMethod: 'GET',
    headers: { origin: baseEnv.ALLOWED_ORIGINS },
    multiValueHeaders: {},
    queryStringParameters: null,
    multiValueQueryStringParameters: null,
    body: null,
    isBase64Encoded: false,
    ...overrides,
  };
}

export function jsonBody(response: { body?: string }): Record<string, unknown> {
  const parsed: unknown = JSON.parse(response.body ?? '{}');
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`expected a JSON object, got ${response.body}`);
  }
  return Object.fromEntries(Object.entries(parsed));
}
