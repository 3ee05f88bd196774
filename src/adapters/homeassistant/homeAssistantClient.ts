import WebSocket from 'ws';
import { createLogger } from '@/shared/logging/logger';
import { bestEffort, safeJsonParse } from '@/shared/bestEffort';
import { describeError, incomingMessageSchema, type IncomingMessage } from '@/adapters/homeassistant/messages';
import {
  HomeAssistantAuthError,
  type HomeAssistantConnection,
  type HomeAssistantEventCallback,
} from '@/adapters/homeassistant/types';

interface PendingEntry {
  resolve: (value: unknown) => void;
  reject: (reason: Error) => void;
}

interface Subscription {
  eventType: string;
  callback: HomeAssistantEventCallback;
  /** Message id of the live subscription; null while disconnected. */
  messageId: number | null;
}

export type HomeAssistantClientOptions = {
  requestTimeoutMs?: number;
  heartbeatIntervalMs?: number;
  reconnect?: boolean;
};

/**
 * WebSocket RPC client for Home Assistant: token auth, numbered requests,
 * event subscriptions that survive reconnects.
 */
export class HomeAssistantClient implements HomeAssistantConnection {
  private readonly log = createLogger('HomeAssistant', 'Client');
  private ws?: WebSocket;
  private connectPromise: Promise<void> | null = null;
  private authenticated = false;
  private closed = false;
  private readonly pending = new Map<number, PendingEntry>();
  private readonly subscriptions = new Set<Subscription>();
  private readonly connectedHandlers = new Set<() => void>();
  private nextMsgId = 0;
  private reconnectTimer?: NodeJS.Timeout;
  private heartbeatTimer?: NodeJS.Timeout;
  private lastPong = Date.now();
  private reconnectAttempts = 0;
  private nextLogAt = 0;
  private readonly requestTimeoutMs: number;
  private readonly heartbeatIntervalMs: number;
  private readonly reconnect: boolean;

  constructor(
    private readonly url: string,
    private readonly accessToken: string,
    options: HomeAssistantClientOptions = {},
  ) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? 15000;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? 10000;
    this.reconnect = options.reconnect ?? true;
  }

  public async connect(): Promise<void> {
    if (this.ws && this.ws.readyState === WebSocket.OPEN && this.authenticated) {
      return;
    }
    if (this.connectPromise) {
      await this.connectPromise;
      return;
    }
    this.closed = false;
    this.connectPromise = this.open();
    try {
      await this.connectPromise;
    } finally {
      this.connectPromise = null;
    }
  }

  public close(): void {
    this.closed = true;
    this.teardown('client closed');
    const ws = this.ws;
    this.ws = undefined;
    if (ws) {
      ws.removeAllListeners();
      ws.on('error', () => undefined);
      ws.terminate();
    }
  }

  public onConnected(callback: () => void): () => void {
    this.connectedHandlers.add(callback);
    return () => {
      this.connectedHandlers.delete(callback);
    };
  }

  public async sendCommand(type: string, payload: Record<string, unknown> = {}): Promise<unknown> {
    if (!this.ws || this.ws.readyState !== WebSocket.OPEN || !this.authenticated) {
      await this.connect();
    }
    return this.send(type, payload).response;
  }

  /** Assigns the message id synchronously so callers can correlate events. */
  private send(type: string, payload: Record<string, unknown>): { id: number; response: Promise<unknown> } {
    const id = ++this.nextMsgId;
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return { id, response: Promise.reject(new Error('home assistant socket not connected')) };
    }
    const response = new Promise<unknown>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.pending.delete(id);
        reject(new Error(`request timeout for ${type}`));
      }, this.requestTimeoutMs);

      this.pending.set(id, {
        resolve: (value) => {
          clearTimeout(timeout);
          resolve(value);
        },
        reject: (error) => {
          clearTimeout(timeout);
          reject(error);
        },
      });

      ws.send(JSON.stringify({ ...payload, id, type }), (error) => {
        if (!error) {
          return;
        }
        clearTimeout(timeout);
        this.pending.delete(id);
        reject(error);
      });
    });
    return { id, response };
  }

  public async subscribeEvents(
    eventType: string,
    callback: HomeAssistantEventCallback,
  ): Promise<() => void> {
    const subscription: Subscription = { eventType, callback, messageId: null };
    this.subscriptions.add(subscription);
    if (this.authenticated) {
      try {
        await this.activate(subscription);
      } catch (error) {
        this.subscriptions.delete(subscription);
        throw error;
      }
    }
    return () => {
      this.subscriptions.delete(subscription);
      const messageId = subscription.messageId;
      subscription.messageId = null;
      if (messageId === null || !this.authenticated) {
        return;
      }
      void bestEffort(
        () => this.send('unsubscribe_events', { subscription: messageId }).response,
        { fallback: undefined, onError: 'debug', log: this.log, label: 'unsubscribe failed', context: { eventType } },
      );
    };
  }

  private async activate(subscription: Subscription): Promise<void> {
    const { id, response } = this.send('subscribe_events', { event_type: subscription.eventType });
    subscription.messageId = id;
    try {
      await response;
    } catch (error) {
      subscription.messageId = null;
      throw error;
    }
  }

  private open(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const ws = new WebSocket(this.url);
      let settled = false;
      const settle = (error?: Error) => {
        if (settled) return;
        settled = true;
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      ws.on('open', () => {
        this.ws = ws;
        this.authenticated = false;
        this.lastPong = Date.now();
        this.log.debug('home assistant socket open', { url: this.url });
      });

      ws.on('message', (data) => {
        const message = this.parse(data.toString());
        if (!message) {
          return;
        }
        if (message.type === 'auth_required') {
          ws.send(JSON.stringify({ type: 'auth', access_token: this.accessToken }));
          return;
        }
        if (message.type === 'auth_invalid') {
          this.log.error('home assistant rejected the access token', { message: message.message });
          this.closed = true;
          settle(new HomeAssistantAuthError(`authentication failed: ${message.message ?? 'invalid token'}`));
          ws.close();
          return;
        }
        if (message.type === 'auth_ok') {
          this.authenticated = true;
          this.reconnectAttempts = 0;
          this.startHeartbeat(ws);
          this.log.info('home assistant connected', { url: this.url, version: message.ha_version });
          settle();
          void this.handleAuthenticated();
          return;
        }
        this.dispatch(message);
      });

      ws.on('pong', () => {
        this.lastPong = Date.now();
      });

      ws.on('close', () => {
        this.logConnectionIssue('home assistant socket closed', 'warn');
        this.teardown('connection lost');
        settle(new Error('socket closed'));
        this.scheduleReconnect();
      });

      ws.on('error', (error) => {
        this.logConnectionIssue('home assistant socket error', 'error', error.message);
        settle(error);
      });
    });
  }

  private parse(raw: string): IncomingMessage | null {
    const json = safeJsonParse<unknown>(raw, null, {
      onError: 'debug',
      log: this.log,
      label: 'unparsable message',
    });
    const result = incomingMessageSchema.safeParse(json);
    if (!result.success) {
      this.log.spam('ignored message', { raw: raw.slice(0, 200) });
      return null;
    }
    return result.data;
  }

  private dispatch(message: IncomingMessage): void {
    if (message.type === 'result') {
      const entry = this.pending.get(message.id);
      if (!entry) return;
      this.pending.delete(message.id);
      if (message.success) {
        entry.resolve(message.result ?? null);
      } else {
        entry.reject(new Error(describeError(message.error)));
      }
      return;
    }
    if (message.type === 'event') {
      for (const subscription of this.subscriptions) {
        if (subscription.messageId !== message.id) {
          continue;
        }
        try {
          subscription.callback({
            eventType: message.event.event_type ?? subscription.eventType,
            data: message.event.data,
          });
        } catch (error) {
          this.log.warn('event handler failed', {
            eventType: subscription.eventType,
            message: error instanceof Error ? error.message : String(error),
          });
        }
      }
    }
  }

  private async handleAuthenticated(): Promise<void> {
    for (const subscription of this.subscriptions) {
      if (subscription.messageId !== null) {
        continue;
      }
      await bestEffort(() => this.activate(subscription), {
        fallback: undefined,
        onError: 'warn',
        log: this.log,
        label: 'subscribe failed',
        context: { eventType: subscription.eventType },
      });
    }
    for (const handler of this.connectedHandlers) {
      try {
        handler();
      } catch (error) {
        this.log.warn('connected handler failed', {
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  private startHeartbeat(ws: WebSocket): void {
    this.stopHeartbeat();
    this.heartbeatTimer = setInterval(() => {
      if (ws.readyState !== WebSocket.OPEN) return;
      if (Date.now() - this.lastPong > this.heartbeatIntervalMs * 3) {
        this.log.warn('home assistant heartbeat lost, reconnecting', { url: this.url });
        ws.terminate();
        return;
      }
      ws.ping();
    }, this.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = undefined;
    }
  }

  private scheduleReconnect(): void {
    if (this.closed || !this.reconnect || this.reconnectTimer) return;
    const baseDelay = 2000;
    const maxDelay = 30000;
    const attempt = Math.min(this.reconnectAttempts, 6);
    const delay = Math.min(maxDelay, baseDelay * 2 ** attempt) + Math.round(Math.random() * 2000);
    this.reconnectAttempts += 1;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      void bestEffort(() => this.connect(), {
        fallback: undefined,
        onError: 'debug',
        log: this.log,
        label: 'reconnect attempt failed',
      });
    }, delay);
  }

  private logConnectionIssue(message: string, level: 'warn' | 'error', detail?: string): void {
    if (this.closed) return;
    const now = Date.now();
    if (this.nextLogAt > now) return;
    this.nextLogAt = now + 15000;
    this.log[level](message, detail ? { url: this.url, message: detail } : { url: this.url });
  }

  private teardown(reason: string): void {
    this.stopHeartbeat();
    if (this.reconnectTimer && this.closed) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
    this.authenticated = false;
    for (const subscription of this.subscriptions) {
      subscription.messageId = null;
    }
    for (const entry of this.pending.values()) {
      entry.reject(new Error(reason));
    }
    this.pending.clear();
  }
}
