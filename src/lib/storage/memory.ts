import { contentTypeFor, toBytes, type BlobStore } from './types';

type StoredObject = { body: Uint8Array; contentType: string };

/**
 * In-process bucket. Used for local runs with `STORE_PROVIDER=memory` and as
 * the store behind the test suite.
 */
export class MemoryBlobStore implements BlobStore {
  private readonly objects = new Map<string, StoredObject>();

  constructor(readonly bucket = 'memory') {}

  async put(key: string, body: Uint8Array | string, contentType = contentTypeFor(key)): Promise<void> {
    // copy so callers cannot mutate what was stored
    this.objects.set(key, { body: Uint8Array.from(toBytes(body)), contentType });
  }

  async get(key: string): Promise<Uint8Array | null> {
    const object = this.objects.get(key);
    return object ? Uint8Array.from(object.body) : null;
  }

  async exists(key: string): Promise<boolean> {
    return this.objects.has(key);
  }

  async list(prefix: string): Promise<string[]> {
    return [...this.objects.keys()].filter((key) => key.startsWith(prefix)).sort();
  }

  async delete(key: string): Promise<void> {
    this.objects.delete(key);
  }

  keys(): string[] {
    return [...this.objects.keys()].sort();
  }
}
