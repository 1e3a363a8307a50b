/**
 * Unit tests for ConversationHelper
 *
 * Covers pairing-safe trimming, the tool-call pairing invariant and
 * persistence cleanup.
 */

import { describe, it, expect } from 'vitest';
import { ConversationHelper, stableStringify } from '../../src/services/conversationHelper.js';
import { ToolPairingError } from '../../src/errors.js';
import type { Message } from '../../src/types/conversation.js';

describe('ConversationHelper', () => {
  // Test fixtures

  const basicConversation: Message[] = [
    { role: 'user', content: 'Hello' },
    { role: 'assistant', content: 'Hi there!' },
    { role: 'user', content: 'How are you?' },
    { role: 'assistant', content: 'I am doing well, thanks!' },
  ];

  const conversationWithToolCall: Message[] = [
    { role: 'user', content: 'Turn on the light' },
    {
      role: 'assistant',
      content: null,
      toolCalls: [{ id: 'call_1', name: 'call_service', arguments: { domain: 'light', service: 'turn_on' } }],
    },
    { role: 'tool', toolCallId: 'call_1', toolName: 'call_service', content: '{"status":"success"}' },
    { role: 'assistant', content: 'The light is on.' },
    { role: 'user', content: 'Thanks' },
    { role: 'assistant', content: 'You are welcome!' },
  ];

  describe('trimMessages', () => {
    it('should return a copy when the history fits', () => {
      const result = ConversationHelper.trimMessages(basicConversation, 10);
      expect(result).toEqual(basicConversation);
      expect(result).not.toBe(basicConversation);
    });

    it('should move the window forward to the next user turn', () => {
      const result = ConversationHelper.trimMessages(conversationWithToolCall, 3);
      expect(result).toEqual([
        { role: 'user', content: 'Thanks' },
        { role: 'assistant', content: 'You are welcome!' },
      ]);
    });

    it('should never start on a tool result', () => {
      const result = ConversationHelper.trimMessages(conversationWithToolCall, 4);
      expect(result[0]?.role).toBe('user');
      expect(ConversationHelper.findUnpairedToolCalls(result)).toEqual([]);
    });

    it('should widen back to the last user turn when the window has none', () => {
      const history: Message[] = conversationWithToolCall.slice(0, 4);
      expect(ConversationHelper.trimMessages(history, 2)).toEqual(history);
    });
  });

  describe('tool pairing', () => {
    it('should find tool calls without a result', () => {
      const history = conversationWithToolCall.slice(0, 2);
      expect(ConversationHelper.findUnpairedToolCalls(history)).toEqual(['call_1']);
      expect(() => ConversationHelper.assertToolPairing(history)).toThrow(ToolPairingError);
    });

    it('should accept a fully paired history', () => {
      expect(() => ConversationHelper.assertToolPairing(conversationWithToolCall)).not.toThrow();
    });
  });

  describe('stripAttachedContext', () => {
    it('should drop attached context from user turns only', () => {
      const history: Message[] = [
        { role: 'user', content: 'Make it blue', context: { kind: 'html', content: '<html></html>' } },
        { role: 'assistant', content: 'Done' },
      ];
      expect(ConversationHelper.stripAttachedContext(history)).toEqual([
        { role: 'user', content: 'Make it blue' },
        { role: 'assistant', content: 'Done' },
      ]);
    });
  });

  describe('stableStringify', () => {
    it('should sort keys and drop undefined values', () => {
      expect(stableStringify({ b: 1, a: { d: undefined, c: [2, 1] } })).toBe('{"a":{"c":[2,1]},"b":1}');
    });
  });
});
