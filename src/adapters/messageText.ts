// Text rendering shared by the adapters

import type { UserMessage } from '../types/conversation.js';

/**
 * User text with its attached context (a dashboard page, a YAML file) appended
 * for the round it belongs to.
 */
export function renderUserContent(message: UserMessage): string {
  const { context } = message;
  if (!context) {
    return message.content;
  }
  const fence = context.kind === 'text' ? '' : context.kind;
  return `${message.content}\n\nAttached ${context.kind}:\n\`\`\`${fence}\n${context.content}\n\`\`\``;
}
