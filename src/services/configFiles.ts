// Config-directory access with mandatory pre-write snapshots

import { readdir, rm, stat } from 'node:fs/promises';
import { isAbsolute, join, relative, resolve } from 'node:path';
import type { Logger } from 'pino';
import { readFileIfExists, writeFileAtomic } from './fileUtils.js';
import type { SnapshotMeta, SnapshotStore } from './snapshotStore.js';

export interface ConfigEntry {
  name: string;
  type: 'file' | 'directory';
  size: number;
}

export interface ConfigWriteResult {
  path: string;
  bytes: number;
  snapshot: SnapshotMeta;
}

export class ConfigPathError extends Error {
  constructor(path: string) {
    super(`Path is outside the configuration directory: ${path}`);
    this.name = 'ConfigPathError';
  }
}

export class ConfigFileStore {
  private readonly root: string;

  constructor(
    configDir: string,
    private readonly snapshots: SnapshotStore,
    private readonly logger: Logger,
  ) {
    this.root = resolve(configDir);
  }

  resolvePath(relativePath: string): string {
    const target = resolve(this.root, relativePath);
    const rel = relative(this.root, target);
    if (rel === '' || rel.startsWith('..') || isAbsolute(rel)) {
      throw new ConfigPathError(relativePath);
    }
    return target;
  }

  async read(relativePath: string): Promise<string | null> {
    return readFileIfExists(this.resolvePath(relativePath));
  }

  async list(subdir = ''): Promise<ConfigEntry[]> {
    const dir = subdir ? this.resolvePath(subdir) : this.root;
    const entries = await readdir(dir, { withFileTypes: true });
    const result: ConfigEntry[] = [];
    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      if (entry.isDirectory()) {
        result.push({ name: entry.name, type: 'directory', size: 0 });
      } else if (entry.isFile()) {
        const info = await stat(join(dir, entry.name));
        result.push({ name: entry.name, type: 'file', size: info.size });
      }
    }
    return result.sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Snapshot the current content (or its absence), then replace the file atomically.
   */
  async write(relativePath: string, content: string): Promise<ConfigWriteResult> {
    const target = this.resolvePath(relativePath);
    const previous = await readFileIfExists(target);
    const snapshot = await this.snapshots.save(relativePath, previous);
    await writeFileAtomic(target, content);
    const bytes = Buffer.byteLength(content, 'utf8');
    this.logger.info({ path: relativePath, bytes, snapshotId: snapshot.id }, 'Config file written');
    return { path: relativePath, bytes, snapshot };
  }

  /**
   * Put a file back to a snapshotted state. The current content is itself
   * snapshotted first so a restore can be undone.
   */
  async restore(relativePath: string, content: string, existed: boolean): Promise<ConfigWriteResult | null> {
    if (existed) {
      return this.write(relativePath, content);
    }
    const target = this.resolvePath(relativePath);
    const previous = await readFileIfExists(target);
    if (previous !== null) {
      await this.snapshots.save(relativePath, previous);
    }
    await rm(target, { force: true });
    this.logger.info({ path: relativePath }, 'Config file removed by restore');
    return null;
  }
}
