// Full tool catalog

import { automationTools } from './automationTools.js';
import { configTools } from './configTools.js';
import { dashboardTools } from './dashboardTools.js';
import { entityTools } from './entityTools.js';
import { notificationTools } from './notificationTools.js';
import { registryTools } from './registryTools.js';
import { scriptTools } from './scriptTools.js';
import type { ToolHandler } from './types.js';

export const ALL_TOOLS: readonly ToolHandler[] = [
  ...entityTools,
  ...automationTools,
  ...scriptTools,
  ...dashboardTools,
  ...configTools,
  ...registryTools,
  ...notificationTools,
];

export type { ToolDeps, ToolHandler, ToolOutcome } from './types.js';
