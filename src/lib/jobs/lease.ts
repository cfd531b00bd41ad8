import { randomUUID } from 'crypto';
import { z } from 'zod';
import { MergeInProgressError } from '../errors';
import { getText, putJson, type BlobStore } from '../storage/types';
import { sessionPaths } from './layout';

const leaseSchema = z.object({
  owner: z.string(),
  acquired_at: z.string(),
  expires_at: z.string(),
});

export type Lease = z.infer<typeof leaseSchema>;

/**
 * Advisory merge lease. The store has no conditional writes, so two
 * coordinators starting in the same instant can both win; the lease only
 * keeps a second coordinator from merging while the first one is visibly busy.
 */
export class MergeLease {
  readonly owner: string;

  constructor(
    private readonly store: BlobStore,
    private readonly ttlMs: number,
    private readonly now: () => Date = () => new Date(),
    owner: string = randomUUID()
  ) {
    this.owner = owner;
  }

  async current(sessionId: string): Promise<Lease | null> {
    const raw = await getText(this.store, sessionPaths.lease(sessionId));
    if (raw === null) return null;
    try {
      const parsed = leaseSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  async acquire(sessionId: string): Promise<Lease> {
    const existing = await this.current(sessionId);
    const at = this.now();
    if (existing && existing.owner !== this.owner && Date.parse(existing.expires_at) > at.getTime()) {
      throw new MergeInProgressError(sessionId, existing.owner, existing.expires_at);
    }

    const lease: Lease = {
      owner: this.owner,
      acquired_at: at.toISOString(),
      expires_at: new Date(at.getTime() + this.ttlMs).toISOString(),
    };
    await putJson(this.store, sessionPaths.lease(sessionId), lease);
    return lease;
  }

  async release(sessionId: string): Promise<void> {
    const existing = await this.current(sessionId);
    if (existing && existing.owner === this.owner) {
      await this.store.delete(sessionPaths.lease(sessionId));
    }
  }

  /** Acquires, runs `fn`, and releases even when `fn` throws. */
  async withLease<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    await this.acquire(sessionId);
    try {
      return await fn();
    } finally {
      await this.release(sessionId);
    }
  }
}
