// Tool contract: zod input schema + handler, compiled once into a ToolHandler

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { Logger } from 'pino';
import type { HomeAssistantApi } from '../services/homeAssistant.js';
import type { ConfigFileStore } from '../services/configFiles.js';
import type { SnapshotStore } from '../services/snapshotStore.js';
import type { HtmlDraftStore } from '../services/htmlDraftStore.js';

/**
 * `write_unless_list` covers multi-action tools (manage_areas, shopping_list,
 * manage_helpers): a call is a read only when its `action` is `list`.
 */
export type ToolAccess = 'read' | 'write' | 'write_unless_list';

export type ToolParameters = Record<string, unknown>;

export interface ToolOutcome {
  success: boolean;
  data: unknown;
  /** One step of a multi-part submission (HTML dashboard drafts) */
  partial?: boolean;
  /** Succeeded but produced nothing usable yet (e.g. a dashboard with zero views) */
  empty?: boolean;
}

export interface ToolDeps {
  ha: HomeAssistantApi;
  configFiles: ConfigFileStore;
  snapshots: SnapshotStore;
  htmlDrafts: HtmlDraftStore;
  logger: Logger;
}

export interface ToolContract<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  access: ToolAccess;
  input: S;
  /** Results may be large (file reads, history); bounded by the large limit */
  largeResult?: boolean;
  destructive?: boolean | ((args: Record<string, unknown>) => boolean);
  execute(input: z.output<S>, deps: ToolDeps): Promise<ToolOutcome>;
}

export interface ToolHandler {
  name: string;
  description: string;
  access: ToolAccess;
  parameters: ToolParameters;
  largeResult: boolean;
  isWrite(args: Record<string, unknown>): boolean;
  isDestructive(args: Record<string, unknown>): boolean;
  run(args: Record<string, unknown>, deps: ToolDeps): Promise<ToolOutcome>;
}

export class ToolInputError extends Error {
  constructor(
    readonly toolName: string,
    readonly issues: string[],
  ) {
    super(`Invalid arguments for ${toolName}: ${issues.join('; ')}`);
    this.name = 'ToolInputError';
  }
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}

function compileParameters(schema: z.ZodTypeAny): ToolParameters {
  const { $schema: _schemaUri, ...parameters } = z
    .record(z.unknown())
    .parse(zodToJsonSchema(schema, { $refStrategy: 'none' }));
  return parameters;
}

export function defineTool<S extends z.ZodTypeAny>(contract: ToolContract<S>): ToolHandler {
  const { destructive } = contract;
  return {
    name: contract.name,
    description: contract.description,
    access: contract.access,
    parameters: compileParameters(contract.input),
    largeResult: contract.largeResult ?? false,
    isWrite(args) {
      if (contract.access === 'write_unless_list') {
        return args.action !== 'list';
      }
      return contract.access === 'write';
    },
    isDestructive(args) {
      return typeof destructive === 'function' ? destructive(args) : destructive === true;
    },
    async run(args, deps) {
      const parsed = contract.input.safeParse(args);
      if (!parsed.success) {
        throw new ToolInputError(contract.name, formatIssues(parsed.error));
      }
      return contract.execute(parsed.data, deps);
    },
  };
}

export function ok(data: Record<string, unknown>, flags: { partial?: boolean; empty?: boolean } = {}): ToolOutcome {
  return { success: true, data: { status: 'success', ...data }, ...flags };
}

export function fail(message: string, extra: Record<string, unknown> = {}): ToolOutcome {
  return { success: false, data: { status: 'error', error: message, ...extra } };
}

/**
 * Narrow an unknown platform payload to a plain object.
 */
export function asRecord(value: unknown): Record<string, unknown> {
  return z.record(z.unknown()).catch({}).parse(value);
}

export function asArray(value: unknown): unknown[] {
  return z.array(z.unknown()).catch([]).parse(value);
}

export const entityIdString = z.string().regex(/^[a-z_][a-z0-9_]*\.[a-z0-9_]+$/, 'must be an entity_id like light.kitchen');
