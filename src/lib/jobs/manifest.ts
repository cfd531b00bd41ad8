import { JobNotFoundError, ManifestError, describeError } from '../errors';
import type { Logger } from '../logging/logger';
import { getText, putJson, type BlobStore } from '../storage/types';
import { sessionPaths } from './layout';
import { manifestSchema, type BatchManifest, type ChunkPlan } from './model';

export function newManifest(input: {
  sessionId: string;
  tool: string;
  kind: BatchManifest['kind'];
  filename: string;
  plan: ChunkPlan;
  now: Date;
}): BatchManifest {
  const at = input.now.toISOString();
  return {
    sessionId: input.sessionId,
    tool: input.tool,
    kind: input.kind,
    filename: input.filename,
    chunkSize: input.plan.chunkSize,
    totalRows: input.plan.totalRows,
    totalChunks: input.plan.totalChunks,
    status: 'running',
    createdAt: at,
    updatedAt: at,
    chunks: input.plan.chunks.map((chunk) => ({
      chunkIndex: chunk.chunkIndex,
      rowRange: { ...chunk.rowRange },
      attempts: [],
      status: 'pending',
    })),
  };
}

export async function loadManifest(store: BlobStore, sessionId: string): Promise<BatchManifest> {
  const raw = await getText(store, sessionPaths.manifest(sessionId));
  if (raw === null) throw new JobNotFoundError(sessionId);

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ManifestError(sessionId, 'not valid JSON');
  }
  const parsed = manifestSchema.safeParse(json);
  if (!parsed.success) {
    throw new ManifestError(sessionId, parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  return parsed.data;
}

/**
 * Serialises manifest writes for one session so a slower earlier write can
 * never land after a later one. Write failures are logged, not thrown: the
 * next save carries the full state again.
 */
export class ManifestWriter {
  private chain: Promise<void> = Promise.resolve();

  constructor(
    private readonly store: BlobStore,
    readonly manifest: BatchManifest,
    private readonly now: () => Date,
    private readonly log: Logger
  ) {}

  save(): Promise<void> {
    this.manifest.updatedAt = this.now().toISOString();
    const snapshot = structuredClone(this.manifest);
    const key = sessionPaths.manifest(snapshot.sessionId);
    this.chain = this.chain.then(() =>
      putJson(this.store, key, snapshot).catch((error: unknown) => {
        this.log.error('manifest write failed', { sessionId: snapshot.sessionId, error: describeError(error) });
      })
    );
    return this.chain;
  }
}
