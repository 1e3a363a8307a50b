// Tool catalog types exposed to the classifier, adapters and executor

import type { ToolAccess, ToolParameters } from '../tools/types.js';

export type { ToolAccess, ToolParameters } from '../tools/types.js';

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameters;
  access: ToolAccess;
  /** Intents whose focused set includes this tool */
  intents: readonly string[];
}

export interface ToolResult {
  toolCallId: string;
  name: string;
  /** Bounded text handed back to the model */
  text: string;
  success: boolean;
  write: boolean;
  partial: boolean;
  empty: boolean;
  truncated: boolean;
  /** Rejected by a guard (read-only, confirmation) or by entity validation */
  rejected?: 'read_only' | 'confirmation' | 'validation' | 'invalid_arguments';
}
