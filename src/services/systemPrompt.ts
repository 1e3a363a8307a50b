// System prompt assembly: base rules + intent fragment + pre-searched entities

import { t, type Language } from '../i18n.js';
import type { IntentDecision } from '../types/intent.js';
import type { EntityReference } from './entityIndex.js';

const BASE_PROMPT = `You are a Home Assistant assistant. You control and configure a smart home through the tools provided.

Rules:
- Use only real entity ids: from the ENTITIES section below or from a tool result. Never invent one.
- Call each read tool at most once with the same arguments; reuse earlier results.
- Before creating or changing configuration, show the YAML to the user.
- Keep answers short and practical.`;

function formatEntity(entity: EntityReference): string {
  const unit = entity.attributes.unit_of_measurement;
  const value = typeof unit === 'string' ? `${entity.state} ${unit}` : entity.state;
  const deviceClass = entity.deviceClass ? ` [${entity.deviceClass}]` : '';
  return `- ${entity.entityId} (${entity.friendlyName})${deviceClass}: ${value}`;
}

export interface PromptOptions {
  language: Language;
  readOnly: boolean;
}

export function buildSystemPrompt(decision: IntentDecision, options: PromptOptions): string {
  const sections = [BASE_PROMPT];
  if (decision.promptFragment) {
    sections.push(decision.promptFragment);
  }

  const { presearch } = decision;
  if (presearch.entities.length > 0) {
    const heading =
      presearch.mode === 'device_class'
        ? `ENTITIES (device_class: ${presearch.deviceClasses.join(', ')}):`
        : `ENTITIES (matching: ${presearch.terms.join(', ')}):`;
    sections.push([heading, ...presearch.entities.map(formatEntity)].join('\n'));
  }

  if (options.readOnly) {
    sections.push(t(options.language, 'read_only_prompt'));
  }
  sections.push(t(options.language, 'respond_instruction'));
  return sections.join('\n\n');
}
