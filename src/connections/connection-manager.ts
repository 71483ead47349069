/**
 * Owns every live connection: handshake, subscribe/replay, heartbeat
 * supervision, server heartbeats and teardown.
 *
 * Everything here runs on the event loop without awaiting, so a subscribe
 * (replay, confirm, attach live listener) is one uninterrupted step: no
 * publish can land between the replay snapshot and the live attach.
 */

import { randomUUID } from 'node:crypto';
import { logger } from '../utils/logger.js';
import type { EventBus } from '../events/event-bus.js';
import {
  decodeClientMessage,
  eventMessage,
  type SubscribeMessage,
  type ServerMessage,
  type SubscriptionConfirmedMessage,
} from '../protocol/messages.js';
import { Subscription, selectKinds } from '../subscriptions/subscription.js';
import { Connection, DEFAULT_OVERFLOW_CLOSE_THRESHOLD, type ConnectionInfo, type ConnectionState } from './connection.js';
import { DEFAULT_OUTBOUND_QUEUE_SIZE } from './outbound-queue.js';
import type { CloseReason, Transport } from './transport.js';

export interface ConnectionManagerOptions {
  heartbeatTimeoutMs: number;
  sweepIntervalMs: number;
  serverHeartbeatMs: number;
  outboundQueueSize: number;
  overflowCloseThreshold: number;
}

export const DEFAULT_MANAGER_OPTIONS: ConnectionManagerOptions = {
  heartbeatTimeoutMs: 30_000,
  sweepIntervalMs: 10_000,
  serverHeartbeatMs: 30_000,
  outboundQueueSize: DEFAULT_OUTBOUND_QUEUE_SIZE,
  overflowCloseThreshold: DEFAULT_OVERFLOW_CLOSE_THRESHOLD,
};

export interface OpenOptions {
  /** Defaults to true for WebSocket, false for SSE (which cannot ping) */
  supervised?: boolean;
}

export interface SubscribeOutcome {
  ok: boolean;
  gap: boolean;
  replayed: number;
}

export interface ConnectionStats {
  totalConnections: number;
  byState: Record<ConnectionState, number>;
  byTransport: Record<Transport['kind'], number>;
  subscriptionCounts: Record<string, number>;
  droppedEvents: number;
  closedByReason: Record<CloseReason, number>;
  connections: ConnectionInfo[];
}

export class ConnectionManager {
  private connections = new Map<string, Connection>();
  private readonly options: ConnectionManagerOptions;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private closedByReason: Record<CloseReason, number> = {
    client_closed: 0,
    heartbeat_timeout: 0,
    overflow: 0,
    transport_error: 0,
    shutdown: 0,
  };
  private droppedByClosed = 0;
  private stopped = false;

  constructor(
    private readonly bus: EventBus,
    options: Partial<ConnectionManagerOptions> = {},
  ) {
    this.options = { ...DEFAULT_MANAGER_OPTIONS, ...options };
  }

  /** Start the heartbeat sweep and the server heartbeat push. */
  start(): void {
    if (this.sweepTimer || this.stopped) return;

    this.sweepTimer = setInterval(() => this.sweep(), this.options.sweepIntervalMs);
    this.heartbeatTimer = setInterval(() => this.broadcastHeartbeat(), this.options.serverHeartbeatMs);
    logger.info('Connection manager started', {
      heartbeatTimeoutMs: this.options.heartbeatTimeoutMs,
      sweepIntervalMs: this.options.sweepIntervalMs,
    });
  }

  /**
   * Register a connection, open it and send the handshake acknowledgement.
   */
  open(transport: Transport, openOptions: OpenOptions = {}): Connection {
    if (this.stopped) {
      throw new Error('Connection manager is shut down');
    }

    const connectionId = `conn_${randomUUID()}`;
    const connection = new Connection(connectionId, transport, {
      queueSize: this.options.outboundQueueSize,
      overflowCloseThreshold: this.options.overflowCloseThreshold,
      supervised: openOptions.supervised ?? transport.kind === 'websocket',
      onClosed: (closed, reason) => this.forget(closed, reason),
    });

    this.connections.set(connectionId, connection);
    connection.open();
    connection.send({
      type: 'connection_established',
      message: 'Connection established',
      connection_id: connectionId,
    });

    logger.info('Connection opened', {
      connectionId,
      transport: transport.kind,
      total: this.connections.size,
    });
    return connection;
  }

  /**
   * Handle one raw client frame. Any frame counts as liveness; malformed
   * frames are answered with an `error` message and the connection stays open.
   */
  handleMessage(connectionId: string, raw: string): void {
    const connection = this.connections.get(connectionId);
    if (!connection || connection.state !== 'open') return;

    connection.touch();

    const decoded = decodeClientMessage(raw);
    if (!decoded.ok) {
      logger.debug('Rejected client message', { connectionId, error: decoded.error });
      connection.send({ type: 'error', message: decoded.error });
      return;
    }

    const { message } = decoded;
    switch (message.type) {
      case 'subscribe':
        this.subscribe(connectionId, message);
        break;
      case 'ping':
        connection.send({ type: 'pong', timestamp: new Date().toISOString() });
        break;
    }
  }

  /**
   * Create or replace the connection's subscription.
   *
   * With `last_event_id`: replay retained events after it (marked
   * `is_replay`), then confirm. If the buffer no longer covers the id,
   * confirm with `gap` and replay nothing. Live delivery starts right after.
   */
  subscribe(connectionId: string, request: SubscribeMessage): SubscribeOutcome {
    const connection = this.connections.get(connectionId);
    if (!connection || connection.state !== 'open') {
      return { ok: false, gap: false, replayed: 0 };
    }

    const { kinds, rejected } = selectKinds(request.event_types);
    if (rejected.length > 0) {
      logger.warn('Ignoring unknown event types in subscription', { connectionId, rejected });
    }
    if (request.event_types.length > 0 && kinds.length === 0) {
      connection.send({ type: 'error', message: `No known event types in subscription: ${rejected.join(', ')}` });
      return { ok: false, gap: false, replayed: 0 };
    }

    const lastEventId = request.last_event_id ?? undefined;
    const subscription = new Subscription(connectionId, request.project_id, kinds, lastEventId);

    // Stop the previous subscription's live feed before replaying for the new one
    connection.detach();

    let gap = false;
    const replay: ServerMessage[] = [];
    if (lastEventId !== undefined) {
      const result = this.bus.since(subscription.projectId, lastEventId);
      gap = result.truncated;
      for (const event of result.events) {
        if (subscription.matches(event)) replay.push(eventMessage(event, true));
      }
      // A replay that cannot fit the queue would be cut by drop-oldest; ask for a refetch instead
      if (replay.length >= connection.queueFree) {
        logger.warn('Replay larger than outbound queue, reporting gap', {
          connectionId,
          projectId: subscription.projectId,
          events: replay.length,
        });
        gap = true;
        replay.length = 0;
      }
    }

    for (const message of replay) connection.send(message);

    const confirmed: SubscriptionConfirmedMessage = {
      type: 'subscription_confirmed',
      project_id: subscription.projectId,
      event_types: subscription.eventTypes,
    };
    if (gap) confirmed.gap = true;
    connection.send(confirmed);

    const unsubscribe = this.bus.subscribe(subscription, event => connection.send(eventMessage(event)));
    connection.attach(subscription, unsubscribe);

    logger.info('Subscription updated', {
      connectionId,
      projectId: subscription.projectId,
      eventTypes: subscription.eventTypes,
      lastEventId,
      replayed: replay.length,
      gap,
    });
    return { ok: true, gap, replayed: replay.length };
  }

  close(connectionId: string, reason: CloseReason): void {
    this.connections.get(connectionId)?.close(reason);
  }

  /**
   * Close supervised connections whose last heartbeat is older than the
   * timeout, then let the bus drop idle buffers.
   */
  sweep(now = Date.now()): string[] {
    const closed: string[] = [];
    for (const connection of [...this.connections.values()]) {
      if (connection.isStale(now, this.options.heartbeatTimeoutMs)) {
        logger.info('Heartbeat timeout', {
          connectionId: connection.id,
          silentForMs: now - connection.lastHeartbeatAt,
        });
        connection.close('heartbeat_timeout');
        closed.push(connection.id);
      }
    }
    this.bus.sweepIdle(now);
    return closed;
  }

  broadcastHeartbeat(): void {
    const timestamp = new Date().toISOString();
    for (const connection of this.connections.values()) {
      connection.send({ type: 'heartbeat', timestamp });
    }
  }

  get(connectionId: string): Connection | undefined {
    return this.connections.get(connectionId);
  }

  get size(): number {
    return this.connections.size;
  }

  stats(): ConnectionStats {
    const byState: Record<ConnectionState, number> = { connecting: 0, open: 0, closing: 0, closed: 0 };
    const byTransport: Record<Transport['kind'], number> = { websocket: 0, sse: 0 };
    const subscriptionCounts: Record<string, number> = {};
    let droppedEvents = this.droppedByClosed;
    const connections: ConnectionInfo[] = [];

    for (const connection of this.connections.values()) {
      const info = connection.info();
      connections.push(info);
      byState[info.state]++;
      byTransport[info.transport]++;
      droppedEvents += info.droppedEventCount;

      if (connection.subscription) {
        const kinds = info.eventTypes.length > 0 ? info.eventTypes : ['*'];
        for (const kind of kinds) {
          subscriptionCounts[kind] = (subscriptionCounts[kind] ?? 0) + 1;
        }
      }
    }

    return {
      totalConnections: this.connections.size,
      byState,
      byTransport,
      subscriptionCounts,
      droppedEvents,
      closedByReason: { ...this.closedByReason },
      connections,
    };
  }

  /**
   * Stop timers and close every connection. Does not wait for clients:
   * in-flight writes finish or fail on their own.
   */
  shutdown(): void {
    if (this.stopped) return;
    this.stopped = true;

    if (this.sweepTimer) clearInterval(this.sweepTimer);
    if (this.heartbeatTimer) clearInterval(this.heartbeatTimer);
    this.sweepTimer = null;
    this.heartbeatTimer = null;

    const count = this.connections.size;
    for (const connection of [...this.connections.values()]) {
      connection.close('shutdown');
    }
    logger.info('Connection manager stopped', { closed: count });
  }

  private forget(connection: Connection, reason: CloseReason): void {
    this.connections.delete(connection.id);
    this.closedByReason[reason]++;
    this.droppedByClosed += connection.droppedEventCount;
    logger.info('Connection closed', {
      connectionId: connection.id,
      reason,
      dropped: connection.droppedEventCount,
      total: this.connections.size,
    });
  }
}
