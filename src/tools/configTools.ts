// Config directory files and snapshot restore

import { z } from 'zod';
import { parse, parseDocument } from 'yaml';
import type { SnapshotMeta } from '../services/snapshotStore.js';
import { asRecord, defineTool, fail, ok, type ToolDeps, type ToolOutcome } from './types.js';

const SECRET_LINE = /^(\s*[^#\s][^:]*):\s*\S.*$/gm;

function maskSecrets(content: string): string {
  return content.replace(SECRET_LINE, '$1: "***"');
}

function isYamlFile(path: string): boolean {
  return /\.ya?ml$/i.test(path);
}

export const listConfigFiles = defineTool({
  name: 'list_config_files',
  description: 'List files in the Home Assistant config directory or a subdirectory (dashboards, packages, includes).',
  access: 'read',
  input: z.object({
    path: z.string().default('').describe("Subdirectory, empty for the root (e.g. 'packages')."),
  }),
  async execute({ path }, { configFiles }) {
    return ok({ path: path || '.', entries: await configFiles.list(path) });
  },
});

export const readConfigFile = defineTool({
  name: 'read_config_file',
  description:
    'Read a configuration file (configuration.yaml, automations.yaml, scripts.yaml, ui-lovelace.yaml or any YAML/JSON file in the config directory).',
  access: 'read',
  largeResult: true,
  input: z.object({
    filename: z.string().min(1).describe("Path relative to the config dir (e.g. 'dashboards/energy.yaml')."),
  }),
  async execute({ filename }, { configFiles }) {
    const content = await configFiles.read(filename);
    if (content === null) {
      return fail(`File ${filename} not found`);
    }
    const visible = filename.endsWith('secrets.yaml') ? maskSecrets(content) : content;
    return ok({ filename, size: Buffer.byteLength(content, 'utf8'), content: visible });
  },
});

export const writeConfigFile = defineTool({
  name: 'write_config_file',
  description:
    'Write a configuration file. A snapshot of the previous content is created automatically. Call check_config afterwards.',
  access: 'write',
  input: z.object({
    filename: z.string().min(1),
    content: z.string().describe('The full file content.'),
  }),
  async execute({ filename, content }, { configFiles }) {
    if (isYamlFile(filename)) {
      const doc = parseDocument(content);
      if (doc.errors.length > 0) {
        return fail(`Invalid YAML, file not written: ${doc.errors.map((e) => e.message).join('; ')}`);
      }
    }
    const result = await configFiles.write(filename, content);
    return ok({ filename, bytes: result.bytes, snapshot_id: result.snapshot.id });
  },
});

export const checkConfig = defineTool({
  name: 'check_config',
  description: "Validate the Home Assistant configuration after editing YAML files. Returns 'valid' or the errors.",
  access: 'read',
  input: z.object({}),
  async execute(_input, { ha }) {
    const result = asRecord(await ha.rest('POST', 'config/core/check_config'));
    return ok({ result: result.result ?? 'unknown', errors: result.errors ?? null });
  },
});

export const listSnapshots = defineTool({
  name: 'list_snapshots',
  description: 'List configuration snapshots, newest first. Snapshots are created automatically before every modification.',
  access: 'read',
  input: z.object({
    key: z.string().optional().describe("Only snapshots of this file or object (e.g. 'configuration.yaml')."),
  }),
  async execute({ key }, { snapshots }) {
    const list = await snapshots.list(key);
    return ok({ count: list.length, snapshots: list });
  },
});

async function restoreObject(meta: SnapshotMeta, content: string, deps: ToolDeps): Promise<ToolOutcome> {
  const [kind, ...rest] = meta.key.split(':');
  const id = rest.join(':');

  if (kind === 'lovelace') {
    if (!meta.existed) {
      return fail(`Dashboard ${id} had no saved configuration at that time; nothing to restore.`);
    }
    await deps.ha.ws('lovelace/config/save', {
      url_path: id === 'lovelace' ? null : id,
      config: JSON.parse(content),
    });
    return ok({ restored: meta.key, snapshot_id: meta.id });
  }

  const base = kind === 'automation' ? 'config/automation/config' : 'config/script/config';
  if (meta.existed) {
    await deps.ha.rest('POST', `${base}/${id}`, parse(content));
  } else {
    await deps.ha.rest('DELETE', `${base}/${id}`);
  }
  return ok({ restored: meta.key, removed: !meta.existed, snapshot_id: meta.id });
}

export const restoreSnapshot = defineTool({
  name: 'restore_snapshot',
  description: 'Restore a file, automation, script or dashboard from a snapshot (ids from list_snapshots).',
  access: 'write',
  input: z.object({
    snapshot_id: z.string().min(1),
  }),
  async execute({ snapshot_id }, deps) {
    const snapshot = await deps.snapshots.get(snapshot_id);
    if (!snapshot) {
      return fail(`Snapshot ${snapshot_id} not found. Use list_snapshots.`);
    }
    const { meta, content } = snapshot;
    const [kind] = meta.key.split(':');
    if (kind === 'lovelace' || kind === 'automation' || kind === 'script') {
      return restoreObject(meta, content, deps);
    }
    const result = await deps.configFiles.restore(meta.key, content, meta.existed);
    return ok({ restored: meta.key, removed: result === null, snapshot_id: meta.id });
  },
});

export const configTools = [listConfigFiles, readConfigFile, writeConfigFile, checkConfig, listSnapshots, restoreSnapshot];
