/**
 * Unit tests for ToolRegistry focused tool sets
 */

import { describe, it, expect } from 'vitest';
import { UnknownToolError } from '../../src/errors.js';
import { INTENT_CATALOG } from '../../src/services/intents.js';
import { ToolRegistry } from '../../src/services/toolRegistry.js';
import { ALL_TOOLS } from '../../src/tools/index.js';
import { INTENT_NAMES } from '../../src/types/intent.js';

describe('ToolRegistry', () => {
  const registry = new ToolRegistry();

  it('should register every tool of the catalog', () => {
    expect(registry.size).toBe(ALL_TOOLS.length);
    expect(new Set(ALL_TOOLS.map((tool) => tool.name)).size).toBe(ALL_TOOLS.length);
  });

  it('should give every focused intent a strict, non-empty subset of its declared tools', () => {
    for (const intent of INTENT_NAMES.filter((name) => name !== 'generic')) {
      const declared = INTENT_CATALOG[intent].tools;
      const tools = registry.listTools(intent);

      expect(tools.length, intent).toBeGreaterThan(0);
      expect(tools.length, intent).toBeLessThan(registry.size);
      for (const tool of tools) {
        expect(declared, intent).toContain(tool.name);
      }
    }
  });

  it('should give the generic intent the whole catalog', () => {
    expect(registry.listTools('generic')).toHaveLength(registry.size);
  });

  it('should record which intents use a tool', () => {
    const tool = registry.listTools('modify_automation').find((t) => t.name === 'update_automation');
    expect(tool?.intents).toEqual(['modify_automation']);
    expect(registry.getSchema('update_automation').type).toBe('object');
  });

  it('should reject a catalog that names a missing tool', () => {
    const catalog = {
      ...INTENT_CATALOG,
      chat: { ...INTENT_CATALOG.chat, tools: ['no_such_tool'] },
    };
    expect(() => new ToolRegistry(ALL_TOOLS, catalog)).toThrow(UnknownToolError);
  });

  it('should throw for an unknown schema but return undefined for an unknown handler', () => {
    expect(() => registry.getSchema('no_such_tool')).toThrow(UnknownToolError);
    expect(registry.getHandler('no_such_tool')).toBeUndefined();
  });

  it('should auto-stop on the declared write tools only', () => {
    expect([...registry.autoStopTools('create_automation')]).toEqual(['create_automation']);
    expect(registry.autoStopTools('query_state').size).toBe(0);
  });

  it('should auto-stop the generic intent on any write tool', () => {
    const tools = registry.autoStopTools('generic');
    expect(tools.has('call_service')).toBe(true);
    expect(tools.has('manage_helpers')).toBe(true);
    expect(tools.has('get_entities')).toBe(false);
  });
});
