// Tool catalog lookup: focused sets per intent, full set for the generic fallback

import { UnknownToolError } from '../errors.js';
import { ALL_TOOLS, type ToolHandler } from '../tools/index.js';
import type { IntentName, IntentSpec } from '../types/intent.js';
import type { ToolDefinition, ToolParameters } from '../types/tools.js';
import { INTENT_CATALOG } from './intents.js';

export class ToolRegistry {
  private readonly handlers = new Map<string, ToolHandler>();
  private readonly definitions = new Map<string, ToolDefinition>();

  constructor(
    handlers: readonly ToolHandler[] = ALL_TOOLS,
    private readonly catalog: Record<IntentName, IntentSpec> = INTENT_CATALOG,
  ) {
    for (const handler of handlers) {
      this.handlers.set(handler.name, handler);
    }

    const membership = new Map<string, string[]>();
    for (const spec of Object.values(catalog)) {
      if (spec.tools === 'all') continue;
      for (const name of spec.tools) {
        if (!this.handlers.has(name)) {
          throw new UnknownToolError(name);
        }
        membership.set(name, [...(membership.get(name) ?? []), spec.name]);
      }
    }

    for (const handler of handlers) {
      this.definitions.set(handler.name, {
        name: handler.name,
        description: handler.description,
        parameters: handler.parameters,
        access: handler.access,
        intents: membership.get(handler.name) ?? [],
      });
    }
  }

  get size(): number {
    return this.handlers.size;
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  /**
   * Focused tool set for an intent, or the whole catalog for the generic fallback.
   */
  listTools(intent: IntentName): ToolDefinition[] {
    const spec = this.catalog[intent];
    if (spec.tools === 'all') {
      return [...this.definitions.values()];
    }
    return spec.tools.map((name) => this.definition(name));
  }

  getSchema(name: string): ToolParameters {
    return this.definition(name).parameters;
  }

  getHandler(name: string): ToolHandler | undefined {
    return this.handlers.get(name);
  }

  /**
   * Write tools that end the loop for an intent once they succeed.
   */
  autoStopTools(intent: IntentName): ReadonlySet<string> {
    const spec = this.catalog[intent];
    if (spec.autoStopTools === 'all_writes') {
      return new Set([...this.handlers.values()].filter((h) => h.access !== 'read').map((h) => h.name));
    }
    return new Set(spec.autoStopTools);
  }

  private definition(name: string): ToolDefinition {
    const definition = this.definitions.get(name);
    if (!definition) {
      throw new UnknownToolError(name);
    }
    return definition;
  }
}
