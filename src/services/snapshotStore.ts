// Snapshot store: prior versions of config files, automations, scripts and dashboards

import { join } from 'node:path';
import { rm } from 'node:fs/promises';
import { z } from 'zod';
import type { Logger } from 'pino';
import { readFileIfExists, SerialQueue, writeFileAtomic } from './fileUtils.js';

const snapshotMetaSchema = z.object({
  id: z.string(),
  key: z.string(),
  createdAt: z.string(),
  size: z.number(),
  // false when the target did not exist yet; restoring removes it again
  existed: z.boolean(),
});

export type SnapshotMeta = z.infer<typeof snapshotMetaSchema>;

export interface Snapshot {
  meta: SnapshotMeta;
  content: string;
}

const indexSchema = z.object({ snapshots: z.array(snapshotMetaSchema) });

/**
 * File-backed snapshot history keyed by path (e.g. `configuration.yaml`,
 * `lovelace:energy`, `automation:1728373064590`), capped per key with
 * oldest-first eviction.
 */
export class SnapshotStore {
  private readonly dir: string;
  private readonly queue = new SerialQueue();
  private sequence = 0;

  constructor(
    dataDir: string,
    private readonly maxPerKey: number,
    private readonly logger: Logger,
  ) {
    this.dir = join(dataDir, 'snapshots');
  }

  save(key: string, content: string | null): Promise<SnapshotMeta> {
    return this.queue.run(async () => {
      const index = await this.readIndex();
      const now = new Date();
      const id = `${now.getTime()}-${(this.sequence++).toString().padStart(4, '0')}_${sanitizeKey(key)}`;
      const meta: SnapshotMeta = {
        id,
        key,
        createdAt: now.toISOString(),
        size: content === null ? 0 : Buffer.byteLength(content, 'utf8'),
        existed: content !== null,
      };

      await writeFileAtomic(this.contentPath(id), content ?? '');
      index.push(meta);

      const forKey = index.filter((s) => s.key === key);
      const evicted = forKey.slice(0, Math.max(0, forKey.length - this.maxPerKey));
      for (const old of evicted) {
        await rm(this.contentPath(old.id), { force: true });
      }
      const evictedIds = new Set(evicted.map((s) => s.id));
      await this.writeIndex(index.filter((s) => !evictedIds.has(s.id)));

      this.logger.info({ key, snapshotId: id, evicted: evicted.length }, 'Snapshot saved');
      return meta;
    });
  }

  /**
   * Newest first, optionally filtered by key.
   */
  async list(key?: string): Promise<SnapshotMeta[]> {
    const index = await this.queue.run(() => this.readIndex());
    return index.filter((s) => key === undefined || s.key === key).reverse();
  }

  async latest(key: string): Promise<Snapshot | null> {
    const [meta] = await this.list(key);
    return meta ? this.get(meta.id) : null;
  }

  async get(id: string): Promise<Snapshot | null> {
    const index = await this.queue.run(() => this.readIndex());
    const meta = index.find((s) => s.id === id);
    if (!meta) return null;
    const content = await readFileIfExists(this.contentPath(id));
    if (content === null) return null;
    return { meta, content };
  }

  private contentPath(id: string): string {
    return join(this.dir, `${id}.snap`);
  }

  private async readIndex(): Promise<SnapshotMeta[]> {
    const raw = await readFileIfExists(join(this.dir, 'index.json'));
    if (raw === null) return [];
    return indexSchema.parse(JSON.parse(raw)).snapshots;
  }

  private async writeIndex(snapshots: SnapshotMeta[]): Promise<void> {
    await writeFileAtomic(join(this.dir, 'index.json'), JSON.stringify({ snapshots }, null, 2));
  }
}

function sanitizeKey(key: string): string {
  return key.replace(/[^a-zA-Z0-9_-]+/g, '_').slice(0, 80);
}
