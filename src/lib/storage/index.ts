import type { S3Client } from '@aws-sdk/client-s3';
import { env } from '../../config/env';
import { getToolConfig, type ToolConfig } from '../../config/tools';
import { createLogger } from '../logging/logger';
import { MemoryBlobStore } from './memory';
import { S3BlobStore, createS3Client } from './s3';
import type { BlobStore } from './types';

const log = createLogger('storage');

let client: S3Client | null = null;
const stores = new Map<string, BlobStore>();

export function getS3Client(): S3Client {
  if (!client) {
    client = createS3Client({
      endpoint: env.STORE_S3_ENDPOINT,
      region: env.STORE_REGION,
      accessKeyId: env.STORE_ACCESS_KEY_ID,
      secretAccessKey: env.STORE_SECRET_ACCESS_KEY,
    });
  }
  return client;
}

export function resolveTool(toolId: string): ToolConfig {
  return getToolConfig(toolId, env.TOOL_BUCKETS);
}

/**
 * Store bound to the tool's bucket, one instance per bucket.
 */
export function getBlobStore(toolId: string): BlobStore {
  const { bucket } = resolveTool(toolId);
  const existing = stores.get(bucket);
  if (existing) return existing;

  const store =
    env.STORE_PROVIDER === 'memory' ? new MemoryBlobStore(bucket) : new S3BlobStore(getS3Client(), bucket);
  if (env.STORE_PROVIDER === 'memory') {
    log.warn('STORE_PROVIDER is memory; objects will not outlive this process', { bucket });
  }
  stores.set(bucket, store);
  return store;
}

export async function presignDownload(store: BlobStore, key: string): Promise<string | undefined> {
  if (store instanceof S3BlobStore) {
    return await store.presignGet(key, env.PRESIGN_TTL);
  }
  return undefined;
}

export { MemoryBlobStore } from './memory';
export { S3BlobStore } from './s3';
export type { BlobStore } from './types';
