// Static intent catalog: focused tool sets, prompt fragments and auto-stop policy

import type { IntentName, IntentSpec } from '../types/intent.js';

const CONFIRM_BEFORE_WRITE = `Before any change:
1. Identify exactly which object you will change (name and id).
2. Describe the change in plain language and show the complete YAML in a \`\`\`yaml block.
3. Ask for explicit confirmation ending with "(yes/no)".
4. Call the write tool only after the user confirms, exactly once.`;

export const INTENT_CATALOG: Record<IntentName, IntentSpec> = {
  chat: {
    name: 'chat',
    tools: ['get_entity_state', 'search_entities'],
    prompt: 'The user is greeting or chatting. Answer briefly and warmly. Do not call tools unless asked about a device.',
    autoStopTools: [],
    maxRounds: 2,
    entityPresearch: false,
  },
  find_automation: {
    name: 'find_automation',
    tools: ['get_automations'],
    prompt: `The user asks whether an automation exists. Do not guess.
Call get_automations once with a short query taken from the message (room, device, alias keywords).
If there are matches, list the best 1-5 (id + alias). If none, say so and propose a next step.`,
    autoStopTools: [],
    maxRounds: 2,
    entityPresearch: false,
  },
  modify_automation: {
    name: 'modify_automation',
    tools: ['get_automations', 'update_automation'],
    prompt: `The user wants to modify an automation. If it is not clearly identified, call get_automations once and ask which one they mean.
${CONFIRM_BEFORE_WRITE}
Never modify the wrong automation.`,
    autoStopTools: ['update_automation'],
    entityPresearch: true,
  },
  modify_script: {
    name: 'modify_script',
    tools: ['get_scripts', 'update_script'],
    prompt: `The user wants to modify a script.
${CONFIRM_BEFORE_WRITE}`,
    autoStopTools: ['update_script'],
    entityPresearch: true,
  },
  create_automation: {
    name: 'create_automation',
    tools: ['create_automation', 'search_entities', 'get_entity_state'],
    prompt: `The user wants a new automation. Use only entity ids from the ENTITIES section or from search_entities.
Show the automation as YAML, ask for confirmation "(yes/no)", then call create_automation once.`,
    autoStopTools: ['create_automation'],
    entityPresearch: true,
  },
  create_script: {
    name: 'create_script',
    tools: ['create_script', 'search_entities', 'get_entity_state'],
    prompt: `The user wants a new script. Use only real entity ids.
Show the script as YAML, ask for confirmation "(yes/no)", then call create_script once.`,
    autoStopTools: ['create_script'],
    entityPresearch: true,
  },
  create_dashboard: {
    name: 'create_dashboard',
    tools: ['create_dashboard', 'update_dashboard', 'search_entities', 'get_frontend_resources'],
    prompt: `The user wants a Lovelace dashboard. Find the entities first, then call create_dashboard with complete views and cards.
Never create a dashboard without cards. Only use custom cards listed by get_frontend_resources.`,
    autoStopTools: ['create_dashboard', 'update_dashboard'],
    entityPresearch: true,
  },
  create_html_dashboard: {
    name: 'create_html_dashboard',
    tools: ['create_html_dashboard', 'search_entities', 'get_frontend_resources'],
    prompt: `The user wants a custom HTML dashboard. Build one self-contained page that reads live states through the Home Assistant WebSocket API.
For large pages send the html in parts with draft "start", "append" and "finish".
If an existing page is attached, edit that page instead of starting over.`,
    autoStopTools: ['create_html_dashboard'],
    entityPresearch: true,
  },
  modify_dashboard: {
    name: 'modify_dashboard',
    tools: ['get_dashboards', 'get_dashboard_config', 'update_dashboard', 'get_frontend_resources'],
    prompt: `The user wants to change an existing dashboard. Call get_dashboard_config first, then send the complete new views with update_dashboard.`,
    autoStopTools: ['update_dashboard'],
    entityPresearch: true,
  },
  control_device: {
    name: 'control_device',
    tools: ['call_service', 'search_entities', 'get_entity_state'],
    prompt: `The user wants to control a device. Pick the entity from the ENTITIES section or search_entities, call call_service once, then confirm in one sentence.`,
    autoStopTools: ['call_service'],
    entityPresearch: true,
  },
  query_state: {
    name: 'query_state',
    tools: ['get_entities', 'get_entity_state', 'search_entities'],
    prompt: `The user asks about the current state of something. Answer with the values from the ENTITIES section when they are there; otherwise query once. Do not ask the user to repeat the request.`,
    autoStopTools: [],
    entityPresearch: true,
  },
  query_history: {
    name: 'query_history',
    tools: ['get_history', 'get_statistics', 'search_entities'],
    prompt: `The user asks about past values or trends. Use get_statistics for averages and totals, get_history for individual changes.`,
    autoStopTools: [],
    entityPresearch: true,
  },
  delete: {
    name: 'delete',
    tools: ['get_automations', 'get_scripts', 'get_dashboards', 'delete_automation', 'delete_script', 'delete_dashboard'],
    prompt: `The user wants to delete something. Identify exactly what will be deleted, then ask "Confirm deletion? (yes/no)".
Call the delete tool only after the user confirms.`,
    autoStopTools: ['delete_automation', 'delete_script', 'delete_dashboard'],
    entityPresearch: false,
  },
  config_edit: {
    name: 'config_edit',
    tools: ['list_config_files', 'read_config_file', 'write_config_file', 'check_config', 'list_snapshots', 'restore_snapshot'],
    prompt: `The user wants to edit configuration files. Read the file first, show the change, ask for confirmation, write the complete file, then run check_config.`,
    autoStopTools: ['restore_snapshot'],
    entityPresearch: false,
  },
  areas: {
    name: 'areas',
    tools: ['get_areas', 'manage_areas', 'get_devices', 'manage_entity'],
    prompt: `The user wants to inspect or organize areas, devices and entities.`,
    autoStopTools: ['manage_areas', 'manage_entity'],
    entityPresearch: false,
  },
  notifications: {
    name: 'notifications',
    tools: ['send_notification', 'search_entities'],
    prompt: `The user wants to send a notification. Use persistent notifications unless a device target is named.`,
    autoStopTools: ['send_notification'],
    entityPresearch: false,
  },
  helpers: {
    name: 'helpers',
    tools: ['manage_helpers', 'search_entities'],
    prompt: `The user wants to list or manage helpers (input_boolean, input_number, input_select, input_text, input_datetime).`,
    autoStopTools: ['manage_helpers'],
    entityPresearch: false,
  },
  query_repairs: {
    name: 'query_repairs',
    tools: ['get_repairs', 'dismiss_repair'],
    prompt: `The user asks about problems, repairs or warnings. List open issues clearly and explain what each one means.`,
    autoStopTools: ['dismiss_repair'],
    entityPresearch: false,
  },
  generic: {
    name: 'generic',
    tools: 'all',
    prompt: '',
    autoStopTools: 'all_writes',
    entityPresearch: true,
  },
};
