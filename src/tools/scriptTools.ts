// Script CRUD and execution

import { z } from 'zod';
import { stringify } from 'yaml';
import { HomeAssistantError } from '../errors.js';
import type { HomeAssistantApi } from '../services/homeAssistant.js';
import { asRecord, defineTool, entityIdString, fail, ok } from './types.js';

const scriptIdSchema = z
  .string()
  .regex(/^[a-z0-9_]+$/, 'lowercase letters, digits and underscores only')
  .describe("Script id without the 'script.' prefix (e.g. 'goodnight_routine').");

function normalizeScriptId(id: string): string {
  return id.startsWith('script.') ? id.slice('script.'.length) : id;
}

async function readScriptConfig(ha: HomeAssistantApi, id: string): Promise<Record<string, unknown> | null> {
  try {
    return asRecord(await ha.rest('GET', `config/script/config/${encodeURIComponent(id)}`));
  } catch (err) {
    if (err instanceof HomeAssistantError && err.status === 404) return null;
    throw err;
  }
}

export const getScripts = defineTool({
  name: 'get_scripts',
  description: 'Get all available scripts in Home Assistant.',
  access: 'read',
  input: z.object({}),
  async execute(_input, { ha }) {
    const scripts = (await ha.getStates())
      .filter((s) => s.entity_id.startsWith('script.'))
      .map((s) => ({ entity_id: s.entity_id, alias: s.attributes.friendly_name, state: s.state }));
    return ok({ count: scripts.length, scripts });
  },
});

export const runScript = defineTool({
  name: 'run_script',
  description: 'Run a Home Assistant script with optional variables.',
  access: 'write',
  input: z.object({
    entity_id: entityIdString.describe("Script entity_id (e.g. 'script.goodnight')."),
    variables: z.record(z.unknown()).optional(),
  }),
  async execute({ entity_id, variables }, { ha }) {
    await ha.callService('script', 'turn_on', { entity_id, ...(variables ? { variables } : {}) });
    return ok({ started: entity_id });
  },
});

export const createScript = defineTool({
  name: 'create_script',
  description: 'Create a new Home Assistant script with a sequence of actions.',
  access: 'write',
  input: z.object({
    script_id: scriptIdSchema,
    alias: z.string().min(1),
    description: z.string().optional(),
    sequence: z.array(z.record(z.unknown())).min(1).describe('Actions executed in order.'),
    mode: z.enum(['single', 'restart', 'queued', 'parallel']).default('single'),
  }),
  async execute(input, { ha, snapshots }) {
    if (await readScriptConfig(ha, input.script_id)) {
      return fail(`Script ${input.script_id} already exists. Use update_script to change it.`);
    }
    const config = {
      alias: input.alias,
      description: input.description ?? '',
      sequence: input.sequence,
      mode: input.mode,
    };
    await snapshots.save(`script:${input.script_id}`, null);
    await ha.rest('POST', `config/script/config/${input.script_id}`, config);
    return ok({ script_id: input.script_id, entity_id: `script.${input.script_id}`, yaml: stringify(config) });
  },
});

export const updateScript = defineTool({
  name: 'update_script',
  description:
    'Update an existing script. Only the fields in changes are modified (e.g. {"alias": "New Name", "sequence": [...]}). A snapshot is created first.',
  access: 'write',
  input: z.object({
    script_id: z.string().min(1),
    changes: z.record(z.unknown()),
  }),
  async execute({ script_id, changes }, { ha, snapshots }) {
    const id = normalizeScriptId(script_id);
    const current = await readScriptConfig(ha, id);
    if (!current) {
      return fail(`Script ${id} not found. Use get_scripts to list scripts.`);
    }
    const updated = { ...current, ...changes };
    const snapshot = await snapshots.save(`script:${id}`, stringify(current));
    await ha.rest('POST', `config/script/config/${id}`, updated);
    return ok({ script_id: id, changed_fields: Object.keys(changes), snapshot_id: snapshot.id });
  },
});

export const deleteScript = defineTool({
  name: 'delete_script',
  description: 'Delete an existing script. A snapshot of its configuration is kept and can be restored.',
  access: 'write',
  destructive: true,
  input: z.object({
    script_id: z.string().min(1).describe("The script id (e.g. 'goodnight_routine')."),
  }),
  async execute({ script_id }, { ha, snapshots }) {
    const id = normalizeScriptId(script_id);
    const current = await readScriptConfig(ha, id);
    if (!current) {
      return fail(`Script ${id} not found or not editable from the UI.`);
    }
    const snapshot = await snapshots.save(`script:${id}`, stringify(current));
    await ha.rest('DELETE', `config/script/config/${id}`);
    return ok({ deleted: id, snapshot_id: snapshot.id });
  },
});

export const scriptTools = [getScripts, runScript, createScript, updateScript, deleteScript];
