/**
 * Chat sessions: one streaming run per request, abortable by session id.
 *
 * Per request: load the conversation, refresh the entity registry, classify,
 * build the prompt, run the orchestration loop, then append the new turns
 * (without attached context) and the continuity state for the next message.
 */

import type { Logger } from 'pino';
import type { ProviderAdapter } from '../adapters/providerAdapter.js';
import type { ProviderSelection } from '../config.js';
import { errorMessage } from '../errors.js';
import { t, type Language } from '../i18n.js';
import type { AttachedContext, Message, UserMessage } from '../types/conversation.js';
import type { ChatEvent } from '../types/events.js';
import { ConversationHelper } from './conversationHelper.js';
import type { ConversationStore } from './conversationStore.js';
import type { EntityIndex } from './entityIndex.js';
import type { IntentClassifier } from './intentClassifier.js';
import type { Orchestrator, RunOutcome } from './orchestrator.js';
import type { SelectionStore } from './selectionStore.js';
import { buildSystemPrompt } from './systemPrompt.js';

const TITLE_LENGTH = 60;

export interface ChatRequest {
  sessionId: string;
  message: string;
  context?: AttachedContext;
  /** Overrides the configured default for this request */
  readOnly?: boolean;
}

export interface EntitySource {
  load(): Promise<EntityIndex | null>;
}

export interface ChatServiceOptions {
  classifier: IntentClassifier;
  orchestrator: Orchestrator;
  entities: EntitySource;
  conversations: ConversationStore;
  selection: SelectionStore;
  createAdapter(selection: ProviderSelection): ProviderAdapter;
  language: Language;
  readOnlyDefault: boolean;
  maxHistoryMessages: number;
  logger: Logger;
}

export class ChatService {
  private readonly active = new Map<string, AbortController>();
  private readonly logger: Logger;

  constructor(private readonly options: ChatServiceOptions) {
    this.logger = options.logger.child({ component: 'chat' });
  }

  isActive(sessionId: string): boolean {
    return this.active.has(sessionId);
  }

  /**
   * Abort the in-flight run of a session. Tool calls already committed are not undone.
   */
  abort(sessionId: string): boolean {
    const controller = this.active.get(sessionId);
    if (!controller) return false;
    controller.abort();
    this.logger.info({ sessionId }, 'Chat aborted by user');
    return true;
  }

  async *chat(request: ChatRequest): AsyncGenerator<ChatEvent> {
    const { sessionId } = request;
    const { language } = this.options;
    const log = this.logger.child({ sessionId });

    // a new message supersedes a run still streaming for the same session
    this.abort(sessionId);
    const controller = new AbortController();
    this.active.set(sessionId, controller);

    try {
      const stored = await this.options.conversations.get(sessionId);
      const continuity = stored?.continuity ?? { lastIntent: null, awaitingConfirmation: false };

      const entities = await this.options.entities.load();
      const decision = this.options.classifier.classify({
        message: request.message,
        continuity,
        language,
        entities,
        ...(request.context ? { context: request.context } : {}),
      });
      const readOnly = request.readOnly ?? this.options.readOnlyDefault;
      const selection = await this.options.selection.get();
      const adapter = this.options.createAdapter(selection);
      log.info(
        { intent: decision.intent, continuation: decision.continuation, tools: decision.tools.length, ...selection },
        'Chat request classified',
      );

      const history: Message[] = ConversationHelper.trimMessages(
        stored?.messages ?? [],
        this.options.maxHistoryMessages,
      );
      const kept = history.length;
      const userTurn: UserMessage = {
        role: 'user',
        content: decision.effectiveMessage,
        ...(request.context ? { context: request.context } : {}),
      };
      history.push(userTurn);

      const outcome: RunOutcome = yield* this.options.orchestrator.run({
        history,
        decision,
        systemPrompt: buildSystemPrompt(decision, { language, readOnly }),
        adapter,
        model: selection.model,
        signal: controller.signal,
        execution: {
          sessionId,
          language,
          readOnly,
          destructiveConfirmed: decision.continuation === 'confirmed',
          entities,
          fallbackEntities: decision.presearch.entities,
        },
      });
      log.info({ status: outcome.status, rounds: outcome.rounds }, 'Chat run finished');

      // persist what the user typed, not the expanded confirmation instruction
      const produced = history.slice(kept);
      produced[0] = { role: 'user', content: request.message };
      const answered = outcome.status === 'completed' || outcome.status === 'auto_stopped';

      await this.options.conversations.appendExchange(sessionId, {
        title: request.message.slice(0, TITLE_LENGTH),
        messages: ConversationHelper.stripAttachedContext(produced),
        // a cancelled run leaves a pending confirmation pending
        ...(outcome.status === 'cancelled'
          ? {}
          : {
              continuity: {
                lastIntent: decision.intent,
                awaitingConfirmation: answered && this.options.classifier.asksForConfirmation(outcome.text, language),
              },
            }),
      });
    } catch (err) {
      log.error({ err }, 'Chat request failed');
      yield { type: 'error', kind: 'internal', message: `${t(language, 'error_internal')} (${errorMessage(err)})` };
    } finally {
      if (this.active.get(sessionId) === controller) {
        this.active.delete(sessionId);
      }
    }
  }
}
