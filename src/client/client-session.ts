/**
 * Client side of the relay protocol for dashboards and Node agents.
 *
 * A session keeps one WebSocket to the relay, subscribes to a project,
 * remembers the last event id it applied and presents it on every
 * reconnect so the relay can replay what was missed. When the relay can
 * no longer replay (`gap`), the owner refetches full state and calls
 * `resyncComplete()`; live events arriving meanwhile are held and then
 * applied in order.
 */

import WebSocket, { type RawData } from 'ws';
import { logger } from '../utils/logger.js';
import { EventInputSchema, type EventKind, type ProjectEvent } from '../events/types.js';
import {
  decodeServerMessage,
  frameToString,
  type IncomingServerMessage,
  type OutgoingClientMessage,
} from '../protocol/messages.js';
import { Emitter } from './emitter.js';
import { DEFAULT_RECONNECT_CONFIG, ReconnectPolicy, type ReconnectConfig } from './reconnect-policy.js';
import { MemorySequenceStore, type SequenceStore } from './sequence-store.js';

export type SessionState = 'idle' | 'connecting' | 'open' | 'reconnecting' | 'closed' | 'disconnected';

const OPEN = 1;

/** The slice of a `ws` client socket the session uses */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  on(event: 'open', listener: () => void): unknown;
  on(event: 'message', listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
}

export type SocketFactory = (url: string) => ClientSocket;

const defaultSocketFactory: SocketFactory = (url) => new WebSocket(url);

export interface ClientSessionOptions {
  /** WebSocket endpoint, e.g. ws://localhost:3030/ws */
  url: string;
  projectId: string;
  /** Empty means every kind */
  eventTypes?: EventKind[];
  store?: SequenceStore;
  socketFactory?: SocketFactory;
  reconnect?: Partial<ReconnectConfig>;
  pingIntervalMs?: number;
  /** The relay's heartbeat timeout; pings must come more often than this */
  serverHeartbeatTimeoutMs?: number;
}

export const DEFAULT_PING_INTERVAL_MS = 25_000;
export const DEFAULT_SERVER_HEARTBEAT_TIMEOUT_MS = 30_000;

export interface ReceivedEvent {
  event: ProjectEvent;
  /** Catch-up copy sent on resubscribe */
  replay: boolean;
  /** Whether a UI should highlight it; replays are applied silently */
  animate: boolean;
}

export type ClientSessionEvents = {
  state: { state: SessionState; previous: SessionState };
  confirmed: { projectId: string; eventTypes: EventKind[]; gap: boolean };
  event: ReceivedEvent;
  gap: { projectId: string };
  error: { message: string };
};

export class ClientSession extends Emitter<ClientSessionEvents> {
  readonly projectId: string;
  private readonly url: string;
  private readonly eventTypes: EventKind[];
  private readonly store: SequenceStore;
  private readonly socketFactory: SocketFactory;
  private readonly policy: ReconnectPolicy;
  private readonly pingIntervalMs: number;

  private _state: SessionState = 'idle';
  private socket: ClientSocket | null = null;
  private pingTimer: ReturnType<typeof setInterval> | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private _connectionId: string | null = null;
  private resyncing = false;
  private held: ReceivedEvent[] = [];

  constructor(options: ClientSessionOptions) {
    super();
    this.url = options.url;
    this.projectId = options.projectId;
    this.eventTypes = options.eventTypes ?? [];
    this.store = options.store ?? new MemorySequenceStore();
    this.socketFactory = options.socketFactory ?? defaultSocketFactory;
    this.policy = new ReconnectPolicy({ ...DEFAULT_RECONNECT_CONFIG, ...options.reconnect });
    this.pingIntervalMs = options.pingIntervalMs ?? DEFAULT_PING_INTERVAL_MS;

    const serverTimeout = options.serverHeartbeatTimeoutMs ?? DEFAULT_SERVER_HEARTBEAT_TIMEOUT_MS;
    if (this.pingIntervalMs <= 0 || this.pingIntervalMs >= serverTimeout) {
      throw new Error(
        `pingIntervalMs (${this.pingIntervalMs}) must be positive and below the server heartbeat timeout (${serverTimeout})`,
      );
    }
    if (this.projectId.length === 0) {
      throw new Error('projectId must not be empty');
    }
  }

  get state(): SessionState {
    return this._state;
  }

  /** Id assigned by the relay for the current connection */
  get connectionId(): string | null {
    return this._connectionId;
  }

  /** Last event id applied, as presented on the next subscribe */
  get lastEventId(): number | undefined {
    return this.store.get(this.projectId);
  }

  get isResyncing(): boolean {
    return this.resyncing;
  }

  /** Open the connection. A no-op while already connecting or open. */
  connect(): void {
    if (this._state === 'connecting' || this._state === 'open') return;
    if (this._state === 'closed' || this._state === 'disconnected' || this._state === 'idle') {
      this.policy.reset();
    }
    this.clearReconnectTimer();
    this.openSocket();
  }

  /** Close for good; no reconnect follows. */
  close(): void {
    this.clearReconnectTimer();
    this.stopPing();
    const socket = this.socket;
    this.socket = null;
    this._connectionId = null;
    this.setState('closed');
    socket?.close(1000, 'client closing');
  }

  /**
   * The owner has reloaded full state after a `gap`. Held live events are
   * applied in arrival order.
   */
  resyncComplete(): void {
    if (!this.resyncing) return;
    this.resyncing = false;
    const held = this.held;
    this.held = [];
    for (const received of held) this.apply(received);
  }

  private openSocket(): void {
    this.setState('connecting');

    let socket: ClientSocket;
    try {
      socket = this.socketFactory(this.url);
    } catch (err) {
      logger.warn('Relay socket could not be created', { url: this.url, error: err });
      this.handleDisconnect();
      return;
    }
    this.socket = socket;

    socket.on('open', () => {
      if (socket !== this.socket) return;
      this.setState('open');
      this.subscribe(socket);
      this.startPing(socket);
    });

    socket.on('message', (data, isBinary) => {
      if (socket !== this.socket || isBinary) return;
      this.handleFrame(frameToString(data));
    });

    socket.on('error', (err) => {
      logger.warn('Relay socket error', { url: this.url, error: err });
    });

    socket.on('close', () => {
      if (socket !== this.socket) return;
      this.socket = null;
      this._connectionId = null;
      this.stopPing();
      this.handleDisconnect();
    });
  }

  private subscribe(socket: ClientSocket): void {
    const message: OutgoingClientMessage = {
      type: 'subscribe',
      project_id: this.projectId,
      event_types: this.eventTypes,
      last_event_id: this.store.get(this.projectId) ?? null,
    };
    socket.send(JSON.stringify(message));
  }

  private handleFrame(raw: string): void {
    const decoded = decodeServerMessage(raw);
    if (!decoded.ok) {
      logger.warn('Ignoring malformed relay frame', { error: decoded.error });
      return;
    }
    this.handleMessage(decoded.message);
  }

  private handleMessage(message: IncomingServerMessage): void {
    switch (message.type) {
      case 'connection_established':
        this._connectionId = message.connection_id;
        break;
      case 'subscription_confirmed': {
        this.policy.reset();
        const gap = message.gap === true;
        if (gap) {
          this.store.clear(this.projectId);
          this.resyncing = true;
          this.held = [];
          this.emit('gap', { projectId: this.projectId });
        }
        this.emit('confirmed', { projectId: message.project_id, eventTypes: message.event_types, gap });
        break;
      }
      case 'event': {
        if (message.project_id !== this.projectId) return;
        const input = EventInputSchema.safeParse({ kind: message.event_type, payload: message.data });
        if (!input.success) {
          logger.warn('Ignoring event with invalid payload', { eventId: message.event_id, kind: message.event_type });
          return;
        }
        const replay = message.is_replay === true;
        const event: ProjectEvent = {
          ...input.data,
          projectId: message.project_id,
          sequence: message.event_id,
          emittedAt: message.timestamp,
        };
        const received: ReceivedEvent = { event, replay, animate: !replay };
        if (this.resyncing && !replay) {
          this.held.push(received);
          return;
        }
        this.apply(received);
        break;
      }
      case 'error':
        this.emit('error', { message: message.message });
        break;
      case 'heartbeat':
      case 'pong':
        break;
    }
  }

  private apply(received: ReceivedEvent): void {
    const last = this.store.get(this.projectId);
    // Already applied on an earlier connection
    if (last !== undefined && received.event.sequence <= last) return;

    this.store.set(this.projectId, received.event.sequence);
    this.emit('event', received);
  }

  private handleDisconnect(): void {
    if (this._state === 'closed') return;

    const decision = this.policy.onDisconnect();
    if (decision.action === 'give-up') {
      logger.warn('Relay unreachable, giving up', { url: this.url, attempts: decision.attempt });
      this.setState('disconnected');
      return;
    }

    logger.info('Reconnecting to relay', { url: this.url, attempt: decision.attempt, delay: decision.delay });
    this.setState('reconnecting');
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      this.openSocket();
    }, decision.delay);
  }

  private startPing(socket: ClientSocket): void {
    this.stopPing();
    this.pingTimer = setInterval(() => {
      if (socket.readyState !== OPEN) return;
      const ping: OutgoingClientMessage = { type: 'ping', timestamp: Date.now() };
      socket.send(JSON.stringify(ping));
    }, this.pingIntervalMs);
  }

  private stopPing(): void {
    if (this.pingTimer) clearInterval(this.pingTimer);
    this.pingTimer = null;
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) clearTimeout(this.reconnectTimer);
    this.reconnectTimer = null;
  }

  private setState(next: SessionState): void {
    const previous = this._state;
    if (previous === next) return;
    this._state = next;
    this.emit('state', { state: next, previous });
  }
}
