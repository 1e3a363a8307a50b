/**
 * Unit tests for IntentClassifier routing, continuity and entity pre-search
 */

import { describe, it, expect } from 'vitest';
import { t } from '../../src/i18n.js';
import { EntityIndex } from '../../src/services/entityIndex.js';
import { IntentClassifier, normalizeText, stripContextBlobs, tokenize } from '../../src/services/intentClassifier.js';
import { ToolRegistry } from '../../src/services/toolRegistry.js';
import type { ContinuityState } from '../../src/types/conversation.js';
import { defaultStates } from '../helpers/fakeHomeAssistant.js';

const fresh: ContinuityState = { lastIntent: null, awaitingConfirmation: false };

describe('IntentClassifier', () => {
  const classifier = new IntentClassifier(new ToolRegistry());
  const entities = EntityIndex.fromStates(defaultStates());

  const classify = (message: string, continuity: ContinuityState = fresh) =>
    classifier.classify({ message, continuity, language: 'en', entities });

  describe('text helpers', () => {
    it('should lowercase and strip accents', () => {
      expect(normalizeText('Température')).toBe('temperature');
    });

    it('should split on punctuation and keep underscores', () => {
      expect(tokenize("Turn on light.living_room, please!")).toEqual(['turn', 'on', 'light', 'living_room', 'please']);
    });

    it('should remove a pasted page together with its visible text', () => {
      const text = 'add a sensor <!DOCTYPE html><html><style>body{}</style><script>const script = 1;</script><p>Hi</p></html> please';
      expect(stripContextBlobs(text)).toBe('add a sensor please');
    });

    it('should remove markup up to the last tag when the page is not closed', () => {
      expect(stripContextBlobs('show me <div><b>Automation</b> status</div> now')).toBe('show me now');
    });

    it('should keep comparisons that are not markup', () => {
      expect(stripContextBlobs('alert me when temperature < 20')).toBe('alert me when temperature < 20');
    });
  });

  describe('routing', () => {
    it('should route greetings to chat with a small round budget', () => {
      const decision = classify('hello there');
      expect(decision.intent).toBe('chat');
      expect(decision.maxRounds).toBe(2);
    });

    it('should route a delete request to delete before any read flow', () => {
      expect(classify('delete the automation for the garage lights').intent).toBe('delete');
    });

    it('should route a delete request that also mentions creating or changing', () => {
      expect(classify('delete the automation I created yesterday').intent).toBe('delete');
      expect(classify('remove the new automation').intent).toBe('delete');
      expect(classify('delete the script I updated this morning').intent).toBe('delete');
    });

    it('should route an Italian delete request using the Italian vocabulary', () => {
      const decision = classifier.classify({
        message: "elimina l'automazione del garage",
        continuity: fresh,
        language: 'it',
        entities,
      });
      expect(decision.intent).toBe('delete');
    });

    it('should route creation and modification of automations', () => {
      expect(classify('create an automation that turns on the porch light at sunset').intent).toBe('create_automation');
      expect(classify('change the garage automation to run at 7').intent).toBe('modify_automation');
    });

    it('should route device control', () => {
      const decision = classify('turn on the living room light');
      expect(decision.intent).toBe('control_device');
      expect(decision.tools.map((tool) => tool.name)).toEqual(['call_service', 'search_entities', 'get_entity_state']);
    });

    it('should fall back to the generic intent with every tool', () => {
      const decision = classify('bonjour tout le monde');
      expect(decision.intent).toBe('generic');
      expect(decision.tools).toHaveLength(new ToolRegistry().size);
    });

    it('should ignore words inside an embedded script blob', () => {
      const message = 'add a sensor <script>function updateScript() { return "script"; }</script>';
      const decision = classify(message);
      expect(decision.intent).not.toBe('modify_script');
      expect(decision.intent).not.toBe('create_script');
      expect(decision.intent).toBe('generic');
    });

    it('should ignore keywords in the visible text of a pasted page', () => {
      const decision = classify(
        'add a sensor to this page <!DOCTYPE html><html><body><h1>Script runner</h1><div class="card">Automation status</div></body></html>',
      );
      expect(decision.intent).toBe('generic');
    });

    it('should route a follow-up with attached HTML to the HTML dashboard flow', () => {
      const decision = classifier.classify({
        message: 'add a sensor',
        context: { kind: 'html', content: '<script>const script = true;</script>' },
        continuity: fresh,
        language: 'en',
        entities,
      });
      expect(decision.intent).toBe('create_html_dashboard');
    });
  });

  describe('continuity', () => {
    const pendingDelete: ContinuityState = { lastIntent: 'delete', awaitingConfirmation: true };

    it('should inherit the pending intent on a bare yes', () => {
      const decision = classify('yes', pendingDelete);
      expect(decision.intent).toBe('delete');
      expect(decision.continuation).toBe('confirmed');
      expect(decision.effectiveMessage).toBe(`yes\n\n${t('en', 'proceed_instruction')}`);
      expect(decision.tools.map((tool) => tool.name)).toContain('delete_automation');
    });

    it('should treat a negative reply as declined', () => {
      const decision = classify('no, cancel', pendingDelete);
      expect(decision.intent).toBe('delete');
      expect(decision.continuation).toBe('declined');
      expect(decision.effectiveMessage).toBe(`no, cancel\n\n${t('en', 'cancel_instruction')}`);
    });

    it('should reclassify when nothing is awaiting confirmation', () => {
      expect(classify('yes', { lastIntent: 'delete', awaitingConfirmation: false }).intent).toBe('generic');
    });

    it('should reclassify a long reply', () => {
      const decision = classify('yes but show me the kitchen light state first', pendingDelete);
      expect(decision.continuation).toBe('fresh');
    });

    it('should detect a confirmation question at the end of a reply', () => {
      expect(classifier.asksForConfirmation('I will delete automation.garage_lights. Confirm deletion? (yes/no)', 'en')).toBe(true);
      expect(classifier.asksForConfirmation('Procedo con la cancellazione? (sì/no)', 'it')).toBe(true);
      expect(classifier.asksForConfirmation('The automation was deleted.', 'en')).toBe(false);
    });
  });

  describe('entity pre-search', () => {
    it('should filter by device class for battery questions', () => {
      const decision = classify('show battery levels');
      expect(decision.intent).toBe('query_state');
      expect(decision.presearch.mode).toBe('device_class');
      expect(decision.presearch.deviceClasses).toEqual(['battery']);
      expect(decision.presearch.entities.map((e) => e.entityId)).toEqual(['sensor.phone_battery', 'sensor.remote_battery']);
    });

    it('should fall back to keyword search with aliases', () => {
      const decision = classify('turn on the living room light');
      expect(decision.presearch.mode).toBe('keyword');
      expect(decision.presearch.terms).toEqual(['living', 'lounge', 'room', 'light']);
      expect(decision.presearch.entities[0]?.entityId).toBe('light.living_room');
    });

    it('should skip pre-search for intents that do not need it', () => {
      expect(classify('hello').presearch.mode).toBe('none');
    });
  });
});
