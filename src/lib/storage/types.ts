/**
 * Minimal key/value view of an object store bucket.
 *
 * Keys are plain object names (no leading slash). A missing object is never an
 * error: `get` resolves to `null` and `exists` to `false`. Any other failure
 * rejects with a `StoreTransportError`.
 */
export interface BlobStore {
  readonly bucket: string;
  put(key: string, body: Uint8Array | string, contentType?: string): Promise<void>;
  get(key: string): Promise<Uint8Array | null>;
  exists(key: string): Promise<boolean>;
  /** Keys under `prefix`, sorted lexicographically. */
  list(prefix: string): Promise<string[]>;
  delete(key: string): Promise<void>;
}

export const textEncoder = new TextEncoder();
export const textDecoder = new TextDecoder('utf-8');

export function toBytes(body: Uint8Array | string): Uint8Array {
  return typeof body === 'string' ? textEncoder.encode(body) : body;
}

export async function getText(store: BlobStore, key: string): Promise<string | null> {
  const bytes = await store.get(key);
  return bytes === null ? null : textDecoder.decode(bytes);
}

export async function putJson(store: BlobStore, key: string, data: unknown): Promise<void> {
  await store.put(key, JSON.stringify(data, null, 2), 'application/json; charset=utf-8');
}

export function contentTypeFor(key: string): string {
  const ext = key.split('.').pop()?.toLowerCase();
  const types: Record<string, string> = {
    csv: 'text/csv; charset=utf-8',
    json: 'application/json; charset=utf-8',
    jsonl: 'application/x-ndjson',
    zip: 'application/zip',
  };
  return types[ext ?? ''] ?? 'application/octet-stream';
}
