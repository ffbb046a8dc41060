// packages/engine/src/realtime.ts
import { EventEmitter } from 'eventemitter3';
import { io } from 'socket.io-client';

import type { HandshakePayload } from '@cmsync/gateway';
import { isRecord } from '@cmsync/utils';

import type { Logger } from './log.js';

export type RealtimeState = 'disconnected' | 'connecting' | 'connected' | 'acknowledged';

/** Wildcard resource id in push events: resync everything. */
export const ALL_RESOURCES = '__ALL__';
export const HANDSHAKE_ACK_TIMEOUT_MS = 5_000;

/**
 * The part of a socket.io client socket the channel uses. `reconnect_attempt`
 * is a Manager event; the adapter forwards it through `on` like the socket's own.
 */
export interface RealtimeSocket {
  on(event: string, handler: (payload?: unknown) => void): void;
  emit(event: string, payload: unknown): void;
  connect(): void;
  disconnect(): void;
}

export type SocketFactory = (url: string) => RealtimeSocket;

export const socketIoFactory: SocketFactory = (url) => {
  const socket = io(url, {
    autoConnect: false,
    transports: ['websocket'],
    reconnection: true,
    reconnectionDelay: 1000,
    reconnectionDelayMax: 30_000,
  });

  return {
    on: (event, handler) => {
      if (event === 'reconnect_attempt') socket.io.on('reconnect_attempt', handler);
      else socket.on(event, handler);
    },
    emit: (event, payload) => {
      socket.emit(event, payload);
    },
    connect: () => {
      socket.connect();
    },
    disconnect: () => {
      socket.disconnect();
    },
  };
};

export type RealtimeChannelOptions = {
  url: string;
  logger: Logger;
  socketFactory?: SocketFactory;
  ackTimeoutMs?: number;

  handshake: () => HandshakePayload | null;
  onResourceUpdated: (resourceId: string) => void;
  onResyncAll: () => void;
  onAcknowledged: () => void;
};

type RealtimeEvents = {
  state: [state: RealtimeState];
};

/**
 * Push channel: handshake on every fresh connection, then map server events to
 * syncs. Reconnecting is left to socket.io.
 */
export class RealtimeChannel extends EventEmitter<RealtimeEvents> {
  private readonly opts: RealtimeChannelOptions;
  private readonly log: Logger;
  private readonly factory: SocketFactory;
  private socket: RealtimeSocket | null = null;
  private current: RealtimeState = 'disconnected';
  private ackTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(opts: RealtimeChannelOptions) {
    super();
    this.opts = opts;
    this.log = opts.logger;
    this.factory = opts.socketFactory ?? socketIoFactory;
  }

  get state(): RealtimeState {
    return this.current;
  }

  isConnected(): boolean {
    return this.current === 'connected' || this.current === 'acknowledged';
  }

  start(): void {
    if (this.socket) return;

    const socket = this.factory(this.opts.url);
    this.socket = socket;

    socket.on('connect', () => this.handleConnect(socket));
    socket.on('disconnect', (reason) => this.handleDisconnect(socket, reason));
    socket.on('reconnect_attempt', (attempt) => this.handleReconnectAttempt(socket, attempt));
    socket.on('connect_error', (err) => {
      this.log.debug(`connect error: ${err instanceof Error ? err.message : String(err)}`);
    });
    socket.on('handshake_ack', () => this.handleAck(socket));
    socket.on('resource-updated', (payload) => this.handlePush(socket, payload, 'resourceId'));
    socket.on('translationsUpdated', (payload) => this.handlePush(socket, payload, 'screenName'));

    this.setState('connecting');
    socket.connect();
  }

  stop(): void {
    const socket = this.socket;
    if (!socket) return;

    this.socket = null;
    this.clearAckTimer();
    socket.disconnect();
    this.setState('disconnected');
  }

  private handleConnect(socket: RealtimeSocket): void {
    if (socket !== this.socket) return;

    const payload = this.opts.handshake();
    if (!payload) {
      this.log.warn('connected without a project session; handshake not sent');
      this.setState('connected');
      return;
    }

    socket.emit('handshake', payload);
    this.setState('connected');

    this.clearAckTimer();
    const timer = setTimeout(() => {
      this.ackTimer = null;
      if (this.current === 'connected') {
        this.log.warn(`no handshake_ack within ${this.ackTimeoutMs}ms`);
      }
    }, this.ackTimeoutMs);
    timer.unref();
    this.ackTimer = timer;
  }

  private handleAck(socket: RealtimeSocket): void {
    if (socket !== this.socket) return;

    this.clearAckTimer();
    this.setState('acknowledged');
    this.opts.onAcknowledged();
  }

  private handleDisconnect(socket: RealtimeSocket, reason: unknown): void {
    if (socket !== this.socket) return;

    this.clearAckTimer();
    this.log.debug(`disconnected: ${String(reason)}`);
    this.setState('disconnected');
  }

  private handleReconnectAttempt(socket: RealtimeSocket, attempt: unknown): void {
    if (socket !== this.socket) return;

    this.log.debug(`reconnect attempt ${String(attempt)}`);
    this.setState('connecting');
  }

  private handlePush(socket: RealtimeSocket, payload: unknown, field: 'resourceId' | 'screenName'): void {
    if (socket !== this.socket) return;

    const id = isRecord(payload) ? payload[field] : undefined;
    if (typeof id !== 'string' || !id) {
      this.log.warn(`push event without "${field}" ignored`);
      return;
    }

    if (id === ALL_RESOURCES) this.opts.onResyncAll();
    else this.opts.onResourceUpdated(id);
  }

  private get ackTimeoutMs(): number {
    return this.opts.ackTimeoutMs ?? HANDSHAKE_ACK_TIMEOUT_MS;
  }

  private clearAckTimer(): void {
    if (this.ackTimer) clearTimeout(this.ackTimer);
    this.ackTimer = null;
  }

  private setState(next: RealtimeState): void {
    if (next === this.current) return;
    this.current = next;
    this.emit('state', next);
  }
}
