// Executes one tool call: entity validation, safety guards, platform call, truncation

import { stringify } from 'yaml';
import type { Logger } from 'pino';
import { errorMessage, HomeAssistantError } from '../errors.js';
import { t, type Language } from '../i18n.js';
import { ToolInputError, type ToolDeps, type ToolHandler } from '../tools/types.js';
import type { ToolCall } from '../types/conversation.js';
import type { ToolResult } from '../types/tools.js';
import { EntityIndex, extractEntityIds, type EntityReference, type MissingEntity } from './entityIndex.js';
import type { ToolRegistry } from './toolRegistry.js';

export interface TruncationLimits {
  default: number;
  large: number;
}

export interface ExecutionContext {
  sessionId: string;
  language: Language;
  readOnly: boolean;
  /** The user explicitly confirmed the operation described in the previous turn */
  destructiveConfirmed: boolean;
  /** Live registry for this round; null when the platform could not be read */
  entities: EntityIndex | null;
  /** Pre-searched entities, authoritative when the live registry is unavailable */
  fallbackEntities: readonly EntityReference[];
}

export function truncateResult(text: string, limit: number): { text: string; truncated: boolean } {
  if (text.length <= limit) {
    return { text, truncated: false };
  }
  return { text: `${text.slice(0, limit)}\n... [TRUNCATED - ${text.length} chars total]`, truncated: true };
}

export class ToolExecutor {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly deps: ToolDeps,
    private readonly limits: TruncationLimits,
    private readonly logger: Logger,
  ) {}

  async execute(call: ToolCall, ctx: ExecutionContext): Promise<ToolResult> {
    const log = this.logger.child({ sessionId: ctx.sessionId, tool: call.name, toolCallId: call.id });
    const handler = this.registry.getHandler(call.name);
    if (!handler) {
      log.warn('Model called an unknown tool');
      return this.result(call, { status: 'error', error: `Unknown tool: ${call.name}` }, { limit: this.limits.default });
    }

    const write = handler.isWrite(call.arguments);
    const limit = handler.largeResult ? this.limits.large : this.limits.default;
    const base = { write, limit };

    if (call.parseError !== undefined) {
      return this.result(
        call,
        { status: 'error', error: `Arguments are not valid JSON: ${call.parseError}` },
        { ...base, rejected: 'invalid_arguments' },
      );
    }

    const missing = this.validateEntities(call.arguments, ctx);
    if (missing.length > 0) {
      log.info({ missing: missing.map((m) => m.entityId) }, 'Rejected call with unknown entities');
      return this.result(
        call,
        { status: 'error', error: this.describeMissing(missing, ctx.language), missing_entities: missing },
        { ...base, rejected: 'validation' },
      );
    }

    if (write && ctx.readOnly) {
      log.info('Write blocked by read-only mode');
      return this.result(
        call,
        {
          status: 'read_only',
          message: t(ctx.language, 'read_only_blocked', { tool: call.name }),
          yaml: stringify({ tool: call.name, arguments: call.arguments }),
        },
        { ...base, rejected: 'read_only' },
      );
    }

    if (handler.isDestructive(call.arguments) && !ctx.destructiveConfirmed) {
      log.info('Destructive call without confirmation');
      return this.result(
        call,
        { status: 'needs_confirmation', message: t(ctx.language, 'destructive_needs_confirmation', { tool: call.name }) },
        { ...base, rejected: 'confirmation' },
      );
    }

    return this.run(handler, call, base, log);
  }

  private async run(
    handler: ToolHandler,
    call: ToolCall,
    base: { write: boolean; limit: number },
    log: Logger,
  ): Promise<ToolResult> {
    const started = Date.now();
    try {
      const outcome = await handler.run(call.arguments, this.deps);
      log.info({ success: outcome.success, write: base.write, durationMs: Date.now() - started }, 'Tool executed');
      return this.result(call, outcome.data, {
        ...base,
        success: outcome.success,
        partial: outcome.partial ?? false,
        empty: outcome.empty ?? false,
      });
    } catch (err) {
      if (err instanceof ToolInputError) {
        log.info({ issues: err.issues }, 'Tool arguments failed validation');
        return this.result(
          call,
          { status: 'error', error: err.message, issues: err.issues },
          { ...base, rejected: 'invalid_arguments' },
        );
      }
      if (err instanceof HomeAssistantError) {
        log.warn({ err, path: err.path, status: err.status }, 'Home Assistant rejected the call');
        return this.result(call, { status: 'error', error: err.message, http_status: err.status ?? null }, base);
      }
      log.error({ err }, 'Tool execution failed');
      return this.result(call, { status: 'error', error: errorMessage(err) }, base);
    }
  }

  private validateEntities(args: Record<string, unknown>, ctx: ExecutionContext): MissingEntity[] {
    const ids = extractEntityIds(args);
    if (ids.length === 0) return [];
    if (ctx.entities) {
      return ctx.entities.validate(ids);
    }
    if (ctx.fallbackEntities.length > 0) {
      return new EntityIndex(ctx.fallbackEntities).validate(ids);
    }
    // nothing to validate against
    return [];
  }

  private describeMissing(missing: readonly MissingEntity[], language: Language): string {
    return missing
      .map((m) => {
        const notFound = t(language, 'entity_not_found', { entity: m.entityId });
        return m.suggestions.length > 0
          ? `${notFound} ${t(language, 'entity_suggestions', { suggestions: m.suggestions.join(', ') })}`
          : notFound;
      })
      .join(' ');
  }

  private result(
    call: ToolCall,
    data: unknown,
    options: {
      limit: number;
      write?: boolean;
      success?: boolean;
      partial?: boolean;
      empty?: boolean;
      rejected?: ToolResult['rejected'];
    },
  ): ToolResult {
    const { text, truncated } = truncateResult(JSON.stringify(data, null, 2), options.limit);
    return {
      toolCallId: call.id,
      name: call.name,
      text,
      success: options.success ?? false,
      write: options.write ?? false,
      partial: options.partial ?? false,
      empty: options.empty ?? false,
      truncated,
      ...(options.rejected ? { rejected: options.rejected } : {}),
    };
  }
}
