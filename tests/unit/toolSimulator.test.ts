/**
 * Unit tests for simulated tool calling (text protocol for backends without native tools)
 */

import { describe, it, expect } from 'vitest';
import {
  buildToolProtocolPrompt,
  flattenHistory,
  formatToolsForPrompt,
  formatTranscript,
  parseSimulatedToolCalls,
} from '../../src/adapters/toolSimulator.js';
import type { Message } from '../../src/types/conversation.js';
import type { ToolDefinition } from '../../src/types/tools.js';

const lightTool: ToolDefinition = {
  name: 'get_entity_state',
  description: 'Get the current state of an entity.',
  access: 'read',
  intents: [],
  parameters: {
    type: 'object',
    properties: {
      entity_id: { type: 'string', description: 'The entity ID' },
      mode: { type: 'string', enum: ['fast', 'full'] },
      tags: { type: 'array', items: { type: 'string' } },
    },
    required: ['entity_id'],
  },
};

describe('formatToolsForPrompt', () => {
  it('should list parameters with type, requirement and choices', () => {
    expect(formatToolsForPrompt([lightTool])).toBe(
      [
        '1. get_entity_state',
        '   Description: Get the current state of an entity.',
        '   Parameters:',
        '  - entity_id (required): string - The entity ID',
        '  - mode: string one of "fast", "full"',
        '  - tags: array<string>',
      ].join('\n'),
    );
  });

  it('should mark tools without parameters', () => {
    const tool: ToolDefinition = { ...lightTool, name: 'check_config', parameters: { type: 'object', properties: {} } };
    expect(formatToolsForPrompt([tool])).toContain('   (no parameters)');
  });
});

describe('buildToolProtocolPrompt', () => {
  it('should forbid tool calls when no tools are offered', () => {
    expect(buildToolProtocolPrompt([])).toBe('Do not call any tool. Answer in plain text.');
  });

  it('should describe the marker format and the tools', () => {
    const prompt = buildToolProtocolPrompt([lightTool]);
    expect(prompt).toContain('<tool_call>{"name": "tool_name", "arguments": {"param": "value"}}</tool_call>');
    expect(prompt).toContain('1. get_entity_state');
  });
});

describe('parseSimulatedToolCalls', () => {
  it('should return plain text untouched when there are no markers', () => {
    expect(parseSimulatedToolCalls('The kitchen light is on.')).toEqual({
      text: 'The kitchen light is on.',
      calls: [],
    });
  });

  it('should extract calls and remove the markers from the text', () => {
    const response = parseSimulatedToolCalls(
      'Let me check.\n<tool_call>{"name": "get_entity_state", "arguments": {"entity_id": "light.kitchen"}}</tool_call>',
    );
    expect(response.text).toBe('Let me check.');
    expect(response.calls).toEqual([{ name: 'get_entity_state', arguments: { entity_id: 'light.kitchen' } }]);
  });

  it('should accept fenced JSON and missing arguments', () => {
    const response = parseSimulatedToolCalls('<tool_call>```json\n{"name": "check_config"}\n```</tool_call>');
    expect(response.calls).toEqual([{ name: 'check_config', arguments: {} }]);
  });

  it('should keep several calls in order', () => {
    const response = parseSimulatedToolCalls(
      '<tool_call>{"name": "a", "arguments": {}}</tool_call>\n<tool_call>{"name": "b", "arguments": {"x": 1}}</tool_call>',
    );
    expect(response.calls.map((call) => call.name)).toEqual(['a', 'b']);
  });

  it('should report broken JSON as a parse error when the name is recoverable', () => {
    const response = parseSimulatedToolCalls('<tool_call>{"name": "call_service", "arguments": {"domain": }</tool_call>');
    expect(response.calls).toHaveLength(1);
    expect(response.calls[0]?.name).toBe('call_service');
    expect(response.calls[0]?.arguments).toEqual({});
    expect(response.calls[0]?.parseError).toBeDefined();
  });

  it('should drop markers with no usable call', () => {
    expect(parseSimulatedToolCalls('<tool_call>not json</tool_call>Done').calls).toEqual([]);
    expect(parseSimulatedToolCalls('<tool_call>{"arguments": {}}</tool_call>').calls).toEqual([]);
  });
});

describe('flattenHistory', () => {
  it('should turn tool traffic into labelled plain turns', () => {
    const messages: Message[] = [
      { role: 'user', content: 'Is the kitchen light on?' },
      {
        role: 'assistant',
        content: null,
        toolCalls: [{ id: 'c1', name: 'get_entity_state', arguments: { entity_id: 'light.kitchen' } }],
      },
      { role: 'tool', toolCallId: 'c1', toolName: 'get_entity_state', content: '{"state":"on"}' },
      { role: 'assistant', content: 'Yes, it is on.' },
    ];

    expect(flattenHistory(messages)).toEqual([
      { role: 'user', content: 'Is the kitchen light on?' },
      { role: 'assistant', content: '[Called tools: get_entity_state]' },
      { role: 'user', content: '[TOOL RESULT: get_entity_state]\n{"state":"on"}\n[/TOOL RESULT]' },
      { role: 'assistant', content: 'Yes, it is on.' },
    ]);
  });

  it('should merge consecutive turns of the same role', () => {
    const messages: Message[] = [
      { role: 'user', content: 'first' },
      { role: 'user', content: 'second' },
    ];
    expect(flattenHistory(messages)).toEqual([{ role: 'user', content: 'first\n\nsecond' }]);
  });

  it('should inline attached context into the user turn', () => {
    const messages: Message[] = [
      { role: 'user', content: 'fix this', context: { kind: 'yaml', content: 'a: 1' } },
    ];
    expect(flattenHistory(messages)).toEqual([
      { role: 'user', content: 'fix this\n\nAttached yaml:\n```yaml\na: 1\n```' },
    ]);
  });
});

describe('formatTranscript', () => {
  it('should label each flattened turn', () => {
    const messages: Message[] = [
      { role: 'user', content: 'Is the kitchen light on?' },
      {
        role: 'assistant',
        content: 'Checking.',
        toolCalls: [{ id: 'c1', name: 'get_entity_state', arguments: { entity_id: 'light.kitchen' } }],
      },
      { role: 'tool', toolCallId: 'c1', toolName: 'get_entity_state', content: '{"state":"on"}' },
      { role: 'assistant', content: 'Yes, it is on.' },
    ];

    expect(formatTranscript(messages)).toBe(
      [
        'User: Is the kitchen light on?',
        'Assistant: Checking.\n[Called tools: get_entity_state]',
        'User: [TOOL RESULT: get_entity_state]\n{"state":"on"}\n[/TOOL RESULT]',
        'Assistant: Yes, it is on.',
      ].join('\n'),
    );
  });

  it('should return an empty transcript for an empty history', () => {
    expect(formatTranscript([])).toBe('');
  });
});
