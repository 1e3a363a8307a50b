// Areas, devices, entity registry and helpers (WebSocket registry API)

import { z } from 'zod';
import { asArray, asRecord, defineTool, entityIdString, fail, ok } from './types.js';

const HELPER_TYPES = ['input_boolean', 'input_number', 'input_select', 'input_text', 'input_datetime'] as const;

export const getAreas = defineTool({
  name: 'get_areas',
  description: "Get all areas/rooms and their entities. Useful for room-based requests like 'turn off everything in the bedroom'.",
  access: 'read',
  largeResult: true,
  input: z.object({}),
  async execute(_input, { ha }) {
    const areas = asArray(await ha.ws('config/area_registry/list')).map(asRecord);
    const entities = asArray(await ha.ws('config/entity_registry/list')).map(asRecord);
    return ok({
      areas: areas.map((area) => ({
        area_id: area.area_id,
        name: area.name,
        entities: entities.filter((e) => e.area_id === area.area_id).map((e) => e.entity_id),
      })),
    });
  },
});

export const manageAreas = defineTool({
  name: 'manage_areas',
  description: 'Manage areas/rooms: list, create, rename, or delete.',
  access: 'write_unless_list',
  destructive: (args) => args.action === 'delete',
  input: z.object({
    action: z.enum(['list', 'create', 'update', 'delete']),
    name: z.string().optional().describe('Area name (create/update).'),
    area_id: z.string().optional().describe('Area id (update/delete).'),
    icon: z.string().optional(),
  }),
  async execute({ action, name, area_id, icon }, { ha }) {
    switch (action) {
      case 'list': {
        const areas = asArray(await ha.ws('config/area_registry/list')).map((a) => {
          const record = asRecord(a);
          return { area_id: record.area_id, name: record.name, icon: record.icon };
        });
        return ok({ areas });
      }
      case 'create': {
        if (!name) return fail('name is required to create an area');
        const area = await ha.ws('config/area_registry/create', { name, ...(icon ? { icon } : {}) });
        return ok({ created: area });
      }
      case 'update': {
        if (!area_id) return fail('area_id is required to update an area');
        const area = await ha.ws('config/area_registry/update', {
          area_id,
          ...(name ? { name } : {}),
          ...(icon ? { icon } : {}),
        });
        return ok({ updated: area });
      }
      case 'delete': {
        if (!area_id) return fail('area_id is required to delete an area');
        await ha.ws('config/area_registry/delete', { area_id });
        return ok({ deleted: area_id });
      }
    }
  },
});

export const getDevices = defineTool({
  name: 'get_devices',
  description: 'Get all registered devices with manufacturer, model, and area.',
  access: 'read',
  largeResult: true,
  input: z.object({}),
  async execute(_input, { ha }) {
    const devices = asArray(await ha.ws('config/device_registry/list')).map((d) => {
      const record = asRecord(d);
      return {
        id: record.id,
        name: record.name_by_user ?? record.name,
        manufacturer: record.manufacturer,
        model: record.model,
        area_id: record.area_id,
      };
    });
    return ok({ count: devices.length, devices });
  },
});

export const manageEntity = defineTool({
  name: 'manage_entity',
  description: 'Update the entity registry: rename, assign to an area, enable or disable an entity.',
  access: 'write',
  input: z.object({
    entity_id: entityIdString,
    name: z.string().optional(),
    area_id: z.string().optional().describe('Area id (from manage_areas list).'),
    disabled_by: z.enum(['user', '']).optional().describe("'user' to disable, '' to enable."),
    icon: z.string().optional(),
  }),
  async execute({ entity_id, name, area_id, disabled_by, icon }, { ha }) {
    const changes: Record<string, unknown> = {};
    if (name !== undefined) changes.name = name;
    if (area_id !== undefined) changes.area_id = area_id;
    if (disabled_by !== undefined) changes.disabled_by = disabled_by === '' ? null : disabled_by;
    if (icon !== undefined) changes.icon = icon;
    if (Object.keys(changes).length === 0) {
      return fail('Nothing to update: pass name, area_id, disabled_by or icon');
    }
    const result = await ha.ws('config/entity_registry/update', { entity_id, ...changes });
    return ok({ entity_id, changes, entry: asRecord(result).entity_entry ?? result });
  },
});

export const manageHelpers = defineTool({
  name: 'manage_helpers',
  description: 'Create, update, delete, or list helpers (input_boolean, input_number, input_select, input_text, input_datetime).',
  access: 'write_unless_list',
  destructive: (args) => args.action === 'delete',
  input: z.object({
    action: z.enum(['list', 'create', 'update', 'delete']),
    helper_type: z.enum(HELPER_TYPES),
    helper_id: z.string().optional().describe("Id without domain (e.g. 'guest_mode'); required for update/delete."),
    name: z.string().optional(),
    icon: z.string().optional(),
    min: z.number().optional(),
    max: z.number().optional(),
    step: z.number().optional(),
    unit_of_measurement: z.string().optional(),
    mode: z.enum(['box', 'slider']).optional(),
    options: z.array(z.string()).optional(),
    initial: z.union([z.string(), z.number(), z.boolean()]).optional(),
    has_date: z.boolean().optional(),
    has_time: z.boolean().optional(),
    min_length: z.number().int().optional(),
    max_length: z.number().int().optional(),
    pattern: z.string().optional(),
  }),
  async execute(input, { ha }) {
    const { action, helper_type, helper_id, ...fields } = input;
    const settings = Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined));

    switch (action) {
      case 'list': {
        const helpers = asArray(await ha.ws(`${helper_type}/list`));
        return ok({ helper_type, count: helpers.length, helpers });
      }
      case 'create': {
        if (!input.name) return fail('name is required to create a helper');
        if (helper_type === 'input_select' && (input.options ?? []).length === 0) {
          return fail('options are required for input_select');
        }
        const created = await ha.ws(`${helper_type}/create`, settings);
        return ok({ helper_type, created });
      }
      case 'update': {
        if (!helper_id) return fail('helper_id is required to update a helper');
        const updated = await ha.ws(`${helper_type}/update`, { [`${helper_type}_id`]: helper_id, ...settings });
        return ok({ helper_type, updated });
      }
      case 'delete': {
        if (!helper_id) return fail('helper_id is required to delete a helper');
        await ha.ws(`${helper_type}/delete`, { [`${helper_type}_id`]: helper_id });
        return ok({ deleted: `${helper_type}.${helper_id}` });
      }
    }
  },
});

export const registryTools = [getAreas, manageAreas, getDevices, manageEntity, manageHelpers];
