// Automation CRUD through the Home Assistant config API

import { z } from 'zod';
import { stringify } from 'yaml';
import { HomeAssistantError } from '../errors.js';
import type { HomeAssistantApi } from '../services/homeAssistant.js';
import { asArray, asRecord, defineTool, entityIdString, fail, ok } from './types.js';

const modeSchema = z.enum(['single', 'restart', 'queued', 'parallel']);
const stepList = z.array(z.record(z.unknown()));

/**
 * Accepts either the config id or the automation entity_id and returns the config id.
 */
async function resolveAutomationId(ha: HomeAssistantApi, ref: string): Promise<string | null> {
  if (!ref.startsWith('automation.')) return ref;
  const state = await ha.getState(ref);
  const id = state?.attributes.id;
  return typeof id === 'string' || typeof id === 'number' ? String(id) : null;
}

async function readAutomationConfig(ha: HomeAssistantApi, id: string): Promise<Record<string, unknown> | null> {
  try {
    return asRecord(await ha.rest('GET', `config/automation/config/${encodeURIComponent(id)}`));
  } catch (err) {
    if (err instanceof HomeAssistantError && err.status === 404) return null;
    throw err;
  }
}

export const getAutomations = defineTool({
  name: 'get_automations',
  description:
    'Find existing automations. Optionally pass a query to search by alias or entity_id. Returns a compact list of matches. To modify one, use update_automation.',
  access: 'read',
  input: z.object({
    query: z.string().optional().describe('Search text (room, device, entity_id fragment, alias keywords).'),
    limit: z.number().int().min(1).max(50).default(10),
  }),
  async execute({ query, limit }, { ha }) {
    const needle = query?.toLowerCase().trim();
    const automations = (await ha.getStates())
      .filter((s) => s.entity_id.startsWith('automation.'))
      .map((s) => ({
        entity_id: s.entity_id,
        id: s.attributes.id,
        alias: typeof s.attributes.friendly_name === 'string' ? s.attributes.friendly_name : s.entity_id,
        state: s.state,
      }))
      .filter((a) => !needle || a.alias.toLowerCase().includes(needle) || a.entity_id.includes(needle));
    return ok({ total: automations.length, automations: automations.slice(0, limit) });
  },
});

export const createAutomation = defineTool({
  name: 'create_automation',
  description: 'Create a new Home Assistant automation with triggers, conditions, and actions.',
  access: 'write',
  input: z.object({
    alias: z.string().min(1).describe('Name for the automation.'),
    description: z.string().optional(),
    trigger: stepList.min(1).describe('List of triggers.'),
    condition: stepList.default([]).describe('Optional conditions.'),
    action: stepList.min(1).describe('List of actions.'),
    mode: modeSchema.default('single'),
  }),
  async execute(input, { ha, snapshots }) {
    const id = Date.now().toString();
    const config = {
      id,
      alias: input.alias,
      description: input.description ?? '',
      trigger: input.trigger,
      condition: input.condition,
      action: input.action,
      mode: input.mode,
    };
    await snapshots.save(`automation:${id}`, null);
    await ha.rest('POST', `config/automation/config/${id}`, config);
    return ok({ automation_id: id, alias: input.alias, yaml: stringify(config) });
  },
});

export const updateAutomation = defineTool({
  name: 'update_automation',
  description:
    "Update an existing automation by its id. Pass a 'changes' object with only the fields to change (alias, description, trigger, condition, action, mode), or 'add_condition' to append one condition.",
  access: 'write',
  input: z
    .object({
      automation_id: z.string().min(1).describe("The automation 'id' (or its automation.* entity_id)."),
      changes: z.record(z.unknown()).optional(),
      add_condition: z.record(z.unknown()).optional(),
    })
    .refine((v) => v.changes !== undefined || v.add_condition !== undefined, {
      message: 'Provide changes or add_condition',
    }),
  async execute({ automation_id, changes, add_condition }, { ha, snapshots }) {
    const id = await resolveAutomationId(ha, automation_id);
    const current = id === null ? null : await readAutomationConfig(ha, id);
    if (id === null || current === null) {
      return fail(`Automation ${automation_id} not found. Use get_automations to find the id.`);
    }

    const updated: Record<string, unknown> = { ...current, ...changes, id };
    if (add_condition) {
      updated.condition = [...asArray(updated.condition), add_condition];
    }
    const changedFields = Object.keys(updated).filter(
      (key) => JSON.stringify(updated[key]) !== JSON.stringify(current[key]),
    );
    if (changedFields.length === 0) {
      return ok({ automation_id: id, changed_fields: [], message: 'Nothing to change' }, { empty: true });
    }

    const snapshot = await snapshots.save(`automation:${id}`, stringify(current));
    await ha.rest('POST', `config/automation/config/${id}`, updated);
    return ok({
      automation_id: id,
      changed_fields: changedFields,
      snapshot_id: snapshot.id,
      before: Object.fromEntries(changedFields.map((key) => [key, current[key]])),
      after: Object.fromEntries(changedFields.map((key) => [key, updated[key]])),
    });
  },
});

export const deleteAutomation = defineTool({
  name: 'delete_automation',
  description: 'Delete an existing automation. A snapshot of its configuration is kept and can be restored.',
  access: 'write',
  destructive: true,
  input: z.object({
    automation_id: z.string().min(1).describe("The automation id or entity_id (e.g. 'automation.my_automation')."),
  }),
  async execute({ automation_id }, { ha, snapshots }) {
    const id = await resolveAutomationId(ha, automation_id);
    const current = id === null ? null : await readAutomationConfig(ha, id);
    if (id === null || current === null) {
      return fail(`Automation ${automation_id} not found or not editable from the UI.`);
    }
    const snapshot = await snapshots.save(`automation:${id}`, stringify(current));
    await ha.rest('DELETE', `config/automation/config/${id}`);
    return ok({ deleted: id, alias: current.alias, snapshot_id: snapshot.id });
  },
});

export const triggerAutomation = defineTool({
  name: 'trigger_automation',
  description: 'Manually trigger an existing automation.',
  access: 'write',
  input: z.object({
    entity_id: entityIdString.describe('Automation entity_id.'),
  }),
  async execute({ entity_id }, { ha }) {
    await ha.callService('automation', 'trigger', { entity_id });
    return ok({ triggered: entity_id });
  },
});

export const automationTools = [getAutomations, createAutomation, updateAutomation, deleteAutomation, triggerAutomation];
