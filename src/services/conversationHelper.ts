/**
 * ConversationHelper
 *
 * Stateless utilities over the unified message history: trimming without
 * breaking tool-call pairing, the pairing invariant itself and persistence
 * cleanup.
 */

import { ToolPairingError } from '../errors.js';
import type { AssistantMessage, Message, ToolResultMessage } from '../types/conversation.js';

export class ConversationHelper {
  /**
   * Keep roughly the last `maxMessages` messages. The kept window always
   * starts at a user turn, so no tool result is separated from the
   * assistant turn that requested it.
   *
   * @example
   * // [user, assistant(tool_calls), tool, assistant, user, assistant], max 3
   * // Returns: [user, assistant] (the window is moved forward to the next user turn)
   */
  static trimMessages(history: readonly Message[], maxMessages: number): Message[] {
    if (history.length <= maxMessages) {
      return [...history];
    }
    let start = Math.max(0, history.length - maxMessages);
    while (start < history.length && history[start]?.role !== 'user') {
      start++;
    }
    if (start === history.length) {
      // no user turn inside the window: widen back to the last one
      start = history.length - 1;
      while (start > 0 && history[start]?.role !== 'user') {
        start--;
      }
    }
    return history.slice(start);
  }

  /**
   * Ids of assistant tool calls that have no tool result after them.
   */
  static findUnpairedToolCalls(history: readonly Message[]): string[] {
    const answered = new Set(
      history.filter((msg): msg is ToolResultMessage => msg.role === 'tool').map((msg) => msg.toolCallId),
    );
    return history
      .filter((msg): msg is AssistantMessage => msg.role === 'assistant')
      .flatMap((msg) => msg.toolCalls ?? [])
      .map((call) => call.id)
      .filter((id) => !answered.has(id));
  }

  static assertToolPairing(history: readonly Message[]): void {
    const unpaired = this.findUnpairedToolCalls(history);
    if (unpaired.length > 0) {
      throw new ToolPairingError(unpaired);
    }
  }

  /**
   * Copy of the history without attached context blobs, for persistence.
   */
  static stripAttachedContext(history: readonly Message[]): Message[] {
    return history.map((msg): Message => (msg.role === 'user' ? { role: 'user', content: msg.content } : msg));
  }
}

/**
 * JSON with object keys sorted, so equal arguments produce equal strings.
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}
