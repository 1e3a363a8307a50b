// Entity registry snapshot: reference validation, "did you mean" ranking and pre-search

import type { Logger } from 'pino';
import type { EntityState, HomeAssistantApi } from './homeAssistant.js';

export interface EntityReference {
  entityId: string;
  domain: string;
  deviceClass: string | null;
  friendlyName: string;
  state: string;
  attributes: Record<string, unknown>;
}

export interface MissingEntity {
  entityId: string;
  suggestions: string[];
}

const ENTITY_ID_PATTERN = /^[a-z_][a-z0-9_]*\.[a-z0-9_]+$/;
const ENTITY_KEYS = new Set(['entity_id', 'entity_ids', 'entity', 'entities']);
const SUGGESTION_THRESHOLD = 0.4;

export function toEntityReference(state: EntityState): EntityReference {
  const [domain = ''] = state.entity_id.split('.');
  const deviceClass = state.attributes.device_class;
  const friendlyName = state.attributes.friendly_name;
  return {
    entityId: state.entity_id,
    domain,
    deviceClass: typeof deviceClass === 'string' ? deviceClass : null,
    friendlyName: typeof friendlyName === 'string' ? friendlyName : state.entity_id,
    state: state.state,
    attributes: state.attributes,
  };
}

/**
 * Every entity id referenced under an entity key anywhere in `value`,
 * including nested trigger/condition/action lists. Order of first appearance.
 */
export function extractEntityIds(value: unknown): string[] {
  const found = new Set<string>();

  const collect = (candidate: unknown): void => {
    if (typeof candidate === 'string') {
      for (const part of candidate.split(',')) {
        const id = part.trim();
        if (ENTITY_ID_PATTERN.test(id)) found.add(id);
      }
    } else if (Array.isArray(candidate)) {
      candidate.forEach(collect);
    }
  };

  const walk = (node: unknown): void => {
    if (Array.isArray(node)) {
      node.forEach(walk);
      return;
    }
    if (node === null || typeof node !== 'object') return;
    for (const [key, child] of Object.entries(node)) {
      if (ENTITY_KEYS.has(key)) collect(child);
      walk(child);
    }
  };

  walk(value);
  return [...found];
}

function bigrams(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (let i = 0; i < text.length - 1; i++) {
    const gram = text.slice(i, i + 2);
    counts.set(gram, (counts.get(gram) ?? 0) + 1);
  }
  return counts;
}

/**
 * Dice coefficient over character bigrams (multiset).
 */
export function similarity(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length < 2 || b.length < 2) return 0;
  const left = bigrams(a);
  const right = bigrams(b);
  let overlap = 0;
  for (const [gram, count] of left) {
    overlap += Math.min(count, right.get(gram) ?? 0);
  }
  return (2 * overlap) / (a.length - 1 + (b.length - 1));
}

function objectId(entityId: string): string {
  const dot = entityId.indexOf('.');
  return dot === -1 ? entityId : entityId.slice(dot + 1);
}

export class EntityIndex {
  private readonly byId: Map<string, EntityReference>;

  constructor(readonly entities: readonly EntityReference[]) {
    this.byId = new Map(entities.map((e) => [e.entityId, e]));
  }

  static fromStates(states: readonly EntityState[]): EntityIndex {
    return new EntityIndex(states.map(toEntityReference));
  }

  get size(): number {
    return this.byId.size;
  }

  has(entityId: string): boolean {
    return this.byId.has(entityId);
  }

  get(entityId: string): EntityReference | undefined {
    return this.byId.get(entityId);
  }

  /**
   * Closest real ids by object-id similarity; same-domain candidates rank higher.
   */
  suggest(entityId: string, limit = 3): string[] {
    const [domain] = entityId.split('.');
    const target = objectId(entityId);
    return this.entities
      .map((e) => ({ id: e.entityId, score: similarity(target, objectId(e.entityId)), sameDomain: e.domain === domain }))
      .filter((c) => c.score >= SUGGESTION_THRESHOLD)
      .sort((a, b) => b.score + (b.sameDomain ? 0.1 : 0) - (a.score + (a.sameDomain ? 0.1 : 0)))
      .slice(0, limit)
      .map((c) => c.id);
  }

  validate(entityIds: readonly string[]): MissingEntity[] {
    return entityIds
      .filter((id) => !this.has(id))
      .map((id) => ({ entityId: id, suggestions: this.suggest(id) }));
  }

  byDeviceClass(deviceClasses: readonly string[]): EntityReference[] {
    const wanted = new Set(deviceClasses);
    return this.entities.filter((e) => e.deviceClass !== null && wanted.has(e.deviceClass));
  }

  /**
   * Substring search over entity id and friendly name. Results matching more
   * terms come first.
   */
  search(terms: readonly string[], limit: number): EntityReference[] {
    const needles = terms.map((term) => term.toLowerCase()).filter((term) => term.length > 0);
    if (needles.length === 0) return [];
    return this.entities
      .map((e) => {
        const haystack = `${e.entityId.replace(/_/g, ' ')} ${e.entityId} ${e.friendlyName}`.toLowerCase();
        return { entity: e, hits: needles.filter((n) => haystack.includes(n)).length };
      })
      .filter((c) => c.hits > 0)
      .sort((a, b) => b.hits - a.hits)
      .slice(0, limit)
      .map((c) => c.entity);
  }
}

/**
 * Loads a fresh index from the platform. Returns null when the platform is
 * unreachable so callers can fall back to the pre-search cache.
 */
export class EntityRegistry {
  constructor(
    private readonly ha: HomeAssistantApi,
    private readonly logger: Logger,
  ) {}

  async load(): Promise<EntityIndex | null> {
    try {
      return EntityIndex.fromStates(await this.ha.getStates());
    } catch (err) {
      this.logger.warn({ err }, 'Entity registry unavailable');
      return null;
    }
  }
}
