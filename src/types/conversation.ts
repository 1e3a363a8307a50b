/**
 * Unified conversation model shared by every provider adapter.
 *
 * Adapters translate these into their own wire formats; nothing outside
 * `src/adapters` should know what a provider expects.
 */

/**
 * Side-channel payload attached to a user turn (e.g. the HTML of a dashboard
 * the user wants edited). Sent to the provider for the round it belongs to,
 * never persisted and never seen by the intent classifier.
 */
export interface AttachedContext {
  kind: 'html' | 'yaml' | 'text';
  content: string;
}

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  /** Set when the provider emitted arguments that could not be parsed */
  parseError?: string;
}

export interface UserMessage {
  role: 'user';
  content: string;
  context?: AttachedContext;
}

export interface AssistantMessage {
  role: 'assistant';
  content: string | null;
  toolCalls?: ToolCall[];
}

export interface ToolResultMessage {
  role: 'tool';
  toolCallId: string;
  toolName: string;
  content: string;
}

export type Message = UserMessage | AssistantMessage | ToolResultMessage;

export interface ContinuityState {
  lastIntent: string | null;
  awaitingConfirmation: boolean;
}

export interface Conversation {
  id: string;
  title: string;
  messages: Message[];
  continuity: ContinuityState;
  createdAt: string;
  updatedAt: string;
}

export interface ConversationSummary {
  id: string;
  title: string;
  messageCount: number;
  updatedAt: string;
}
