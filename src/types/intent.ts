// Intent classification types

import type { EntityReference } from '../services/entityIndex.js';
import type { ToolDefinition } from './tools.js';

export const INTENT_NAMES = [
  'chat',
  'find_automation',
  'modify_automation',
  'modify_script',
  'create_automation',
  'create_script',
  'create_dashboard',
  'create_html_dashboard',
  'modify_dashboard',
  'control_device',
  'query_state',
  'query_history',
  'delete',
  'config_edit',
  'areas',
  'notifications',
  'helpers',
  'query_repairs',
  'generic',
] as const;

export type IntentName = (typeof INTENT_NAMES)[number];

export interface IntentSpec {
  name: IntentName;
  /** Focused tool subset; 'all' only for the generic fallback */
  tools: readonly string[] | 'all';
  /** Prompt fragment appended to the base system prompt */
  prompt: string;
  /** Write tools whose successful execution ends the loop after one narration round */
  autoStopTools: readonly string[] | 'all_writes';
  maxRounds?: number;
  /** Pre-load matching entities into the prompt */
  entityPresearch: boolean;
}

/**
 * How the current message relates to a pending confirmation.
 * `confirmed`/`declined` mean the intent was inherited, not reclassified.
 */
export type Continuation = 'fresh' | 'confirmed' | 'declined';

export interface PresearchResult {
  mode: 'device_class' | 'keyword' | 'none';
  deviceClasses: string[];
  terms: string[];
  entities: EntityReference[];
}

export interface IntentDecision {
  intent: IntentName;
  tools: ToolDefinition[];
  promptFragment: string;
  autoStopTools: readonly string[] | 'all_writes';
  maxRounds: number | undefined;
  continuation: Continuation;
  /** Message text passed to the model; a bare "yes" becomes an explicit instruction */
  effectiveMessage: string;
  presearch: PresearchResult;
}
