import { z } from 'zod';
import { describeError } from '../errors';
import { createLogger } from '../logging/logger';
import { getText, putJson, type BlobStore } from '../storage/types';
import { jobPaths, registryPath, sessionPaths } from './layout';
import { manifestSchema, type BatchKind } from './model';
import type { ToolFolders } from '../../config/tools';

const entrySchema = z.object({
  lookup_id: z.string().min(1),
  tool: z.string().min(1),
  kind: z.enum(['job', 'batch', 'ledger_batch']),
  prefix: z.string(),
  created_at: z.string(),
});

export type RegistryEntry = z.infer<typeof entrySchema>;

const log = createLogger('registry');

/**
 * Maps the short identifiers users copy down to where their artifacts live,
 * so a fresh process can pick a job or session back up.
 */
export class SessionRegistry {
  constructor(
    private readonly store: BlobStore,
    private readonly tool: { id: string; folders: ToolFolders },
    private readonly now: () => Date = () => new Date()
  ) {}

  async register(lookupId: string, kind: BatchKind): Promise<RegistryEntry> {
    const entry: RegistryEntry = {
      lookup_id: lookupId,
      tool: this.tool.id,
      kind,
      prefix: kind === 'job' ? jobPaths(this.tool.folders).status(lookupId) : sessionPaths.root(lookupId),
      created_at: this.now().toISOString(),
    };
    await putJson(this.store, registryPath(lookupId), entry);
    return entry;
  }

  /**
   * Registry record first; ids submitted before the registry existed are found
   * by probing the status record and the session prefix.
   */
  async resolve(lookupId: string): Promise<RegistryEntry | null> {
    const raw = await getText(this.store, registryPath(lookupId));
    if (raw !== null) {
      try {
        const parsed = entrySchema.safeParse(JSON.parse(raw));
        if (parsed.success) return parsed.data;
        log.warn('registry entry has an unexpected shape, probing instead', { lookupId });
      } catch (error) {
        log.warn('registry entry is not valid JSON, probing instead', { lookupId, error: describeError(error) });
      }
    }

    const statusKey = jobPaths(this.tool.folders).status(lookupId);
    if (await this.store.exists(statusKey)) {
      return { lookup_id: lookupId, tool: this.tool.id, kind: 'job', prefix: statusKey, created_at: '' };
    }

    if (await this.store.exists(sessionPaths.manifest(lookupId))) {
      const kind = await this.manifestKind(lookupId);
      return { lookup_id: lookupId, tool: this.tool.id, kind, prefix: sessionPaths.root(lookupId), created_at: '' };
    }

    const sessionKeys = await this.store.list(sessionPaths.root(lookupId));
    if (sessionKeys.length > 0) {
      return {
        lookup_id: lookupId,
        tool: this.tool.id,
        kind: 'ledger_batch',
        prefix: sessionPaths.root(lookupId),
        created_at: '',
      };
    }

    return null;
  }

  private async manifestKind(sessionId: string): Promise<BatchKind> {
    const raw = await getText(this.store, sessionPaths.manifest(sessionId));
    if (raw === null) return 'batch';
    try {
      const parsed = manifestSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data.kind : 'batch';
    } catch {
      return 'batch';
    }
  }
}
