// In-memory stand-in for the Home Assistant REST/WebSocket API

import type { EntityState, HomeAssistantApi, RestMethod } from '../../src/services/homeAssistant.js';

export interface ServiceCall {
  domain: string;
  service: string;
  data: Record<string, unknown>;
}

export interface RecordedRequest {
  method: RestMethod | 'WS';
  path: string;
  body: unknown;
}

export function entityState(entityId: string, state: string, attributes: Record<string, unknown> = {}): EntityState {
  return { entity_id: entityId, state, attributes };
}

export function defaultStates(): EntityState[] {
  return [
    entityState('light.living_room', 'off', { friendly_name: 'Living Room Light' }),
    entityState('light.kitchen', 'on', { friendly_name: 'Kitchen Light' }),
    entityState('switch.existing_entity', 'off', { friendly_name: 'Existing Switch' }),
    entityState('sensor.outdoor_temperature', '18.5', {
      friendly_name: 'Outdoor Temperature',
      device_class: 'temperature',
      unit_of_measurement: '°C',
    }),
    entityState('sensor.phone_battery', '81', { friendly_name: 'Phone', device_class: 'battery', unit_of_measurement: '%' }),
    entityState('sensor.remote_battery', '15', { friendly_name: 'Remote', device_class: 'battery', unit_of_measurement: '%' }),
    entityState('automation.garage_lights', 'on', { friendly_name: 'Garage lights', id: '1700000000001' }),
  ];
}

export class FakeHomeAssistant implements HomeAssistantApi {
  readonly serviceCalls: ServiceCall[] = [];
  readonly requests: RecordedRequest[] = [];
  getStatesCalls = 0;
  getStateCalls = 0;
  /** WebSocket command handlers by message type */
  readonly wsHandlers = new Map<string, (payload: Record<string, unknown>) => unknown>();

  constructor(public states: EntityState[] = defaultStates()) {}

  async getStates(): Promise<EntityState[]> {
    this.getStatesCalls++;
    return this.states;
  }

  async getState(entityId: string): Promise<EntityState | null> {
    this.getStateCalls++;
    return this.states.find((s) => s.entity_id === entityId) ?? null;
  }

  async callService(domain: string, service: string, data: Record<string, unknown> = {}): Promise<unknown> {
    this.serviceCalls.push({ domain, service, data });
    return [];
  }

  async rest(method: RestMethod, path: string, body?: unknown): Promise<unknown> {
    this.requests.push({ method, path, body });
    return {};
  }

  async ws(type: string, payload: Record<string, unknown> = {}): Promise<unknown> {
    this.requests.push({ method: 'WS', path: type, body: payload });
    const handler = this.wsHandlers.get(type);
    return handler ? handler(payload) : null;
  }
}
