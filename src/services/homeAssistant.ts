// Home Assistant REST + WebSocket client
// REST for states and services, WebSocket for the registries, Lovelace and repairs

import WebSocket from 'ws';
import { z } from 'zod';
import type { Logger } from 'pino';
import { HomeAssistantError, errorMessage } from '../errors.js';

export const entityStateSchema = z.object({
  entity_id: z.string(),
  state: z.string(),
  attributes: z.record(z.unknown()).default({}),
  last_changed: z.string().optional(),
  last_updated: z.string().optional(),
});

export type EntityState = z.infer<typeof entityStateSchema>;

export type RestMethod = 'GET' | 'POST' | 'DELETE';

/**
 * Operations the engine needs from the platform. Tools only talk to this
 * interface, so tests can substitute an in-memory fake.
 */
export interface HomeAssistantApi {
  getStates(): Promise<EntityState[]>;
  getState(entityId: string): Promise<EntityState | null>;
  callService(domain: string, service: string, data?: Record<string, unknown>): Promise<unknown>;
  rest(method: RestMethod, path: string, body?: unknown): Promise<unknown>;
  ws(type: string, payload?: Record<string, unknown>): Promise<unknown>;
}

export interface HomeAssistantClientOptions {
  baseUrl: string;
  token: string | undefined;
  timeoutMs: number;
  logger: Logger;
}

const wsMessageSchema = z.object({
  type: z.string(),
  id: z.number().optional(),
  success: z.boolean().optional(),
  result: z.unknown().optional(),
  error: z.object({ code: z.string().optional(), message: z.string() }).optional(),
  message: z.string().optional(),
});

interface PendingCommand {
  type: string;
  resolve: (value: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export class HomeAssistantClient implements HomeAssistantApi {
  private readonly baseUrl: string;
  private socket: WebSocket | null = null;
  private connecting: Promise<WebSocket> | null = null;
  private nextId = 1;
  private readonly pending = new Map<number, PendingCommand>();

  constructor(private readonly options: HomeAssistantClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  async getStates(): Promise<EntityState[]> {
    const body = await this.rest('GET', 'states');
    return z.array(entityStateSchema).parse(body);
  }

  async getState(entityId: string): Promise<EntityState | null> {
    try {
      const body = await this.rest('GET', `states/${encodeURIComponent(entityId)}`);
      return entityStateSchema.parse(body);
    } catch (err) {
      if (err instanceof HomeAssistantError && err.status === 404) {
        return null;
      }
      throw err;
    }
  }

  async callService(domain: string, service: string, data: Record<string, unknown> = {}): Promise<unknown> {
    return this.rest('POST', `services/${domain}/${service}`, data);
  }

  async rest(method: RestMethod, path: string, body?: unknown): Promise<unknown> {
    const url = `${this.baseUrl}/api/${path.replace(/^\/+/, '')}`;
    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers: {
          ...(this.options.token ? { Authorization: `Bearer ${this.options.token}` } : {}),
          'Content-Type': 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      throw new HomeAssistantError(`Home Assistant unreachable: ${errorMessage(err)}`, path);
    }

    const text = await response.text();
    if (!response.ok) {
      throw new HomeAssistantError(
        `Home Assistant ${method} ${path} failed with ${response.status}: ${text.slice(0, 500)}`,
        path,
        response.status,
      );
    }
    if (!text) return null;
    try {
      return JSON.parse(text);
    } catch {
      // check_config and a few service endpoints answer with plain text
      return text;
    }
  }

  async ws(type: string, payload: Record<string, unknown> = {}): Promise<unknown> {
    const socket = await this.connect();
    const id = this.nextId++;

    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new HomeAssistantError(`WebSocket command ${type} timed out`, type));
      }, this.options.timeoutMs);
      this.pending.set(id, { type, resolve, reject, timer });
      socket.send(JSON.stringify({ ...payload, id, type }));
    });
  }

  close(): void {
    this.failPending(new HomeAssistantError('WebSocket closed', 'websocket'));
    if (this.socket && this.socket.readyState === WebSocket.OPEN) {
      this.socket.close();
    }
    this.socket = null;
    this.connecting = null;
  }

  private connect(): Promise<WebSocket> {
    if (this.socket && this.socket.readyState === WebSocket.OPEN) {
      return Promise.resolve(this.socket);
    }
    if (this.connecting) return this.connecting;

    const wsUrl = `${this.baseUrl.replace(/^http/, 'ws')}/api/websocket`;
    const log = this.options.logger;

    this.connecting = new Promise<WebSocket>((resolve, reject) => {
      const ws = new WebSocket(wsUrl);
      const timer = setTimeout(() => {
        ws.terminate();
        reject(new HomeAssistantError('WebSocket authentication timed out', 'websocket'));
      }, this.options.timeoutMs);

      ws.on('error', (err) => {
        clearTimeout(timer);
        this.connecting = null;
        log.warn({ err: err.message }, 'Home Assistant WebSocket error');
        reject(new HomeAssistantError(`WebSocket error: ${err.message}`, 'websocket'));
      });

      ws.on('close', () => {
        clearTimeout(timer);
        reject(new HomeAssistantError('WebSocket closed before authentication', 'websocket'));
        this.socket = null;
        this.connecting = null;
        this.failPending(new HomeAssistantError('WebSocket connection closed', 'websocket'));
      });

      ws.on('message', (data: WebSocket.RawData) => {
        let raw: unknown;
        try {
          raw = JSON.parse(data.toString());
        } catch {
          log.warn('Ignoring non-JSON WebSocket frame');
          return;
        }
        const parsed = wsMessageSchema.safeParse(raw);
        if (!parsed.success) return;
        const message = parsed.data;

        switch (message.type) {
          case 'auth_required':
            ws.send(JSON.stringify({ type: 'auth', access_token: this.options.token ?? '' }));
            return;
          case 'auth_ok':
            clearTimeout(timer);
            this.socket = ws;
            this.connecting = null;
            resolve(ws);
            return;
          case 'auth_invalid':
            clearTimeout(timer);
            ws.close();
            reject(new HomeAssistantError(`WebSocket authentication failed: ${message.message ?? 'invalid token'}`, 'websocket', 401));
            return;
          case 'result':
            this.settle(message);
            return;
          default:
            return;
        }
      });
    });

    return this.connecting;
  }

  private settle(message: z.infer<typeof wsMessageSchema>): void {
    if (message.id === undefined) return;
    const command = this.pending.get(message.id);
    if (!command) return;
    this.pending.delete(message.id);
    clearTimeout(command.timer);

    if (message.success) {
      command.resolve(message.result ?? null);
    } else {
      command.reject(
        new HomeAssistantError(
          message.error?.message ?? `WebSocket command ${command.type} failed`,
          command.type,
          undefined,
          message.error?.code,
        ),
      );
    }
  }

  private failPending(error: Error): void {
    for (const [id, command] of this.pending) {
      clearTimeout(command.timer);
      command.reject(error);
      this.pending.delete(id);
    }
  }
}
