// Entity state, services, scenes, history and statistics

import { z } from 'zod';
import { EntityIndex } from '../services/entityIndex.js';
import type { EntityState } from '../services/homeAssistant.js';
import { asArray, asRecord, defineTool, entityIdString, fail, ok } from './types.js';

function compactState(state: EntityState): Record<string, unknown> {
  const { friendly_name, unit_of_measurement, device_class } = state.attributes;
  return {
    entity_id: state.entity_id,
    state: state.state,
    ...(typeof friendly_name === 'string' ? { name: friendly_name } : {}),
    ...(typeof unit_of_measurement === 'string' ? { unit: unit_of_measurement } : {}),
    ...(typeof device_class === 'string' ? { device_class } : {}),
  };
}

export const getEntities = defineTool({
  name: 'get_entities',
  description:
    "Get the current state of all Home Assistant entities, or filter by domain (e.g. 'light', 'switch', 'sensor', 'automation', 'climate').",
  access: 'read',
  input: z.object({
    domain: z.string().optional().describe("Optional domain filter (e.g. 'light', 'switch', 'sensor')."),
  }),
  async execute({ domain }, { ha }) {
    const states = await ha.getStates();
    const filtered = domain ? states.filter((s) => s.entity_id.startsWith(`${domain}.`)) : states;
    return ok({ count: filtered.length, entities: filtered.map(compactState) });
  },
});

export const getEntityState = defineTool({
  name: 'get_entity_state',
  description: 'Get the current state and attributes of a specific entity.',
  access: 'read',
  input: z.object({
    entity_id: entityIdString.describe("The entity ID (e.g. 'light.living_room')."),
  }),
  async execute({ entity_id }, { ha }) {
    const state = await ha.getState(entity_id);
    if (!state) {
      return fail(`Entity ${entity_id} not found`);
    }
    return ok({ entity: state });
  },
});

export const searchEntities = defineTool({
  name: 'search_entities',
  description:
    'Search entities by keyword in entity_id or friendly_name. Use this to find specific devices, sensors, or integrations.',
  access: 'read',
  input: z.object({
    query: z.string().min(1).describe("Search keyword (e.g. 'kitchen', 'temperature', 'motion')."),
  }),
  async execute({ query }, { ha }) {
    const index = EntityIndex.fromStates(await ha.getStates());
    const terms = query.toLowerCase().split(/\s+/).filter(Boolean);
    const matches = index.search(terms, 50);
    return ok({
      count: matches.length,
      entities: matches.map((e) => ({
        entity_id: e.entityId,
        name: e.friendlyName,
        state: e.state,
        ...(e.deviceClass ? { device_class: e.deviceClass } : {}),
      })),
    });
  },
});

export const callService = defineTool({
  name: 'call_service',
  description:
    'Call a Home Assistant service to control devices: turn on/off lights, switches, set climate temperature, lock/unlock, open/close covers, etc.',
  access: 'write',
  input: z.object({
    domain: z.string().min(1).describe("Service domain (e.g. 'light', 'switch', 'climate', 'cover')."),
    service: z.string().min(1).describe("Service name (e.g. 'turn_on', 'turn_off', 'toggle')."),
    entity_id: z
      .union([z.string(), z.array(z.string())])
      .optional()
      .describe("Shortcut for the target entity (e.g. 'light.living_room'); merged into data.entity_id."),
    data: z.record(z.unknown()).optional().describe('Service data including target entity_id and parameters.'),
  }),
  async execute({ domain, service, entity_id, data }, { ha }) {
    const payload: Record<string, unknown> = { ...data };
    if (entity_id !== undefined && payload.entity_id === undefined) {
      payload.entity_id = entity_id;
    }
    const changed = await ha.callService(domain, service, payload);
    const states = asArray(changed).map((s) => {
      const state = asRecord(s);
      return { entity_id: state.entity_id, state: state.state };
    });
    return ok({ service: `${domain}.${service}`, data: payload, changed_states: states });
  },
});

export const getAvailableServices = defineTool({
  name: 'get_available_services',
  description: 'Get all available Home Assistant service domains and services.',
  access: 'read',
  largeResult: true,
  input: z.object({}),
  async execute(_input, { ha }) {
    const domains = asArray(await ha.rest('GET', 'services')).map((entry) => {
      const record = asRecord(entry);
      return { domain: record.domain, services: Object.keys(asRecord(record.services)) };
    });
    return ok({ domains });
  },
});

export const getEvents = defineTool({
  name: 'get_events',
  description: 'Get all available Home Assistant event types fired by integrations and add-ons.',
  access: 'read',
  input: z.object({}),
  async execute(_input, { ha }) {
    const events = asArray(await ha.rest('GET', 'events')).map((entry) => {
      const record = asRecord(entry);
      return { event: record.event, listeners: record.listener_count };
    });
    return ok({ events });
  },
});

export const getScenes = defineTool({
  name: 'get_scenes',
  description: 'Get all available scenes in Home Assistant.',
  access: 'read',
  input: z.object({}),
  async execute(_input, { ha }) {
    const scenes = (await ha.getStates()).filter((s) => s.entity_id.startsWith('scene.')).map(compactState);
    return ok({ count: scenes.length, scenes });
  },
});

export const activateScene = defineTool({
  name: 'activate_scene',
  description: 'Activate a Home Assistant scene.',
  access: 'write',
  input: z.object({
    entity_id: entityIdString.describe("Scene entity_id (e.g. 'scene.movie_night')."),
  }),
  async execute({ entity_id }, { ha }) {
    await ha.callService('scene', 'turn_on', { entity_id });
    return ok({ activated: entity_id });
  },
});

export const getHistory = defineTool({
  name: 'get_history',
  description: 'Get the state history of an entity over a time period. Useful for past values, trends, and when things changed.',
  access: 'read',
  largeResult: true,
  input: z.object({
    entity_id: entityIdString.describe('The entity ID to get history for.'),
    hours: z.number().positive().max(168).default(24).describe('Hours of history to retrieve (default 24, max 168).'),
  }),
  async execute({ entity_id, hours }, { ha }) {
    const end = new Date();
    const start = new Date(end.getTime() - hours * 3600 * 1000);
    const query = new URLSearchParams({
      filter_entity_id: entity_id,
      end_time: end.toISOString(),
    });
    const raw = await ha.rest(
      'GET',
      `history/period/${encodeURIComponent(start.toISOString())}?${query.toString()}&minimal_response&no_attributes`,
    );
    const series = asArray(asArray(raw)[0]).map((point) => {
      const record = asRecord(point);
      return { state: record.state, at: record.last_changed };
    });
    return ok({ entity_id, hours, points: series.length, history: series });
  },
});

export const getStatistics = defineTool({
  name: 'get_statistics',
  description: 'Get statistics (min, max, mean, sum) for a sensor over a time period. Useful for energy, temperature trends, averages.',
  access: 'read',
  largeResult: true,
  input: z.object({
    entity_id: entityIdString.describe("Sensor entity_id (e.g. 'sensor.temperature')."),
    period: z.enum(['5minute', 'hour', 'day', 'week', 'month']).default('hour'),
    hours: z.number().positive().max(720).default(24).describe('How many hours back to query (default 24, max 720).'),
  }),
  async execute({ entity_id, period, hours }, { ha }) {
    const end = new Date();
    const start = new Date(end.getTime() - hours * 3600 * 1000);
    const result = asRecord(
      await ha.ws('recorder/statistics_during_period', {
        start_time: start.toISOString(),
        end_time: end.toISOString(),
        statistic_ids: [entity_id],
        period,
      }),
    );
    const rows = asArray(result[entity_id]);
    if (rows.length === 0) {
      return fail(`No statistics recorded for ${entity_id}. The sensor may lack a state_class.`);
    }
    return ok({ entity_id, period, rows });
  },
});

export const createBackup = defineTool({
  name: 'create_backup',
  description: 'Create a full Home Assistant backup. This may take a few minutes.',
  access: 'write',
  input: z.object({}),
  async execute(_input, { ha }) {
    await ha.callService('backup', 'create');
    return ok({ message: 'Backup started' });
  },
});

export const entityTools = [
  getEntities,
  getEntityState,
  searchEntities,
  callService,
  getAvailableServices,
  getEvents,
  getScenes,
  activateScene,
  getHistory,
  getStatistics,
  createBackup,
];
