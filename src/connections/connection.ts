/**
 * One client connection: lifecycle state, outbound queue and drain loop.
 *
 * State machine: connecting → open → closing → closed. `connecting` may
 * go straight to `closing`; nothing ever re-enters `open`, so a client
 * resumes by opening a new connection.
 */

import { logger } from '../utils/logger.js';
import type { ServerMessage } from '../protocol/messages.js';
import type { Subscription } from '../subscriptions/subscription.js';
import { DEFAULT_OUTBOUND_QUEUE_SIZE, OutboundQueue } from './outbound-queue.js';
import { CLOSE_CODES, type CloseReason, type Transport } from './transport.js';

export type ConnectionState = 'connecting' | 'open' | 'closing' | 'closed';

const TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  connecting: ['open', 'closing'],
  open: ['closing'],
  closing: ['closed'],
  closed: [],
};

export const DEFAULT_OVERFLOW_CLOSE_THRESHOLD = 1000;

// Handshake, subscription confirmations and errors must reach the client
const DROPPABLE_FRAMES = new Set<ServerMessage['type']>(['event', 'heartbeat', 'pong']);

const isDroppableFrame = (message: ServerMessage): boolean => DROPPABLE_FRAMES.has(message.type);

export interface ConnectionOptions {
  queueSize?: number;
  /** Consecutive drops (no successful write in between) that force a close */
  overflowCloseThreshold?: number;
  /** Heartbeat-supervised connections are closed when pings stop */
  supervised?: boolean;
  /** Called once, after the connection reaches `closed` */
  onClosed?: (connection: Connection, reason: CloseReason) => void;
}

export interface ConnectionInfo {
  connectionId: string;
  transport: Transport['kind'];
  state: ConnectionState;
  connectedAt: string;
  lastHeartbeatAt: string;
  droppedEventCount: number;
  queued: number;
  projectId: string | null;
  eventTypes: string[];
}

export class Connection {
  readonly connectedAt = Date.now();
  readonly supervised: boolean;
  private _state: ConnectionState = 'connecting';
  private _lastHeartbeatAt = this.connectedAt;
  private _droppedEventCount = 0;
  private _closeReason: CloseReason | undefined;
  private overflowStreak = 0;
  private readonly overflowCloseThreshold: number;
  private readonly queue: OutboundQueue<ServerMessage>;
  private readonly onClosed: ConnectionOptions['onClosed'];
  private drained: Promise<void> = Promise.resolve();
  private _subscription: Subscription | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(
    readonly id: string,
    private readonly transport: Transport,
    options: ConnectionOptions = {},
  ) {
    this.queue = new OutboundQueue(options.queueSize ?? DEFAULT_OUTBOUND_QUEUE_SIZE, isDroppableFrame);
    this.overflowCloseThreshold = options.overflowCloseThreshold ?? DEFAULT_OVERFLOW_CLOSE_THRESHOLD;
    this.supervised = options.supervised ?? true;
    this.onClosed = options.onClosed;
  }

  get state(): ConnectionState {
    return this._state;
  }

  get lastHeartbeatAt(): number {
    return this._lastHeartbeatAt;
  }

  get droppedEventCount(): number {
    return this._droppedEventCount;
  }

  get closeReason(): CloseReason | undefined {
    return this._closeReason;
  }

  get subscription(): Subscription | null {
    return this._subscription;
  }

  /** Room left in the outbound queue */
  get queueFree(): number {
    return this.queue.capacity - this.queue.size;
  }

  /** Resolves when the drain loop has stopped */
  get whenDrained(): Promise<void> {
    return this.drained;
  }

  open(): void {
    this.transition('open');
    this._lastHeartbeatAt = Date.now();
    this.drained = this.drain();
  }

  /**
   * Queue a frame for this client. Never blocks: a full queue drops its
   * oldest event or heartbeat, never a control frame. A control frame that
   * finds no room closes the connection with `overflow`. Frames for a
   * connection that is not open are ignored.
   */
  send(message: ServerMessage): void {
    if (this._state !== 'open') return;

    const { dropped, refused } = this.queue.push(message);
    if (refused) {
      logger.warn('Outbound queue full of control frames, closing connection', {
        connectionId: this.id,
        type: message.type,
      });
      this.close('overflow');
      return;
    }
    if (!dropped) return;

    this._droppedEventCount++;
    this.overflowStreak++;
    if (this.overflowStreak === 1) {
      logger.warn('Outbound queue full, dropping oldest frames', { connectionId: this.id });
    } else {
      logger.debug('Dropped outbound frame', { connectionId: this.id, dropped: this._droppedEventCount });
    }

    if (this.overflowStreak > this.overflowCloseThreshold) {
      logger.warn('Sustained outbound overflow, closing connection', {
        connectionId: this.id,
        dropped: this._droppedEventCount,
      });
      this.close('overflow');
    }
  }

  /** Record client liveness */
  touch(now = Date.now()): void {
    this._lastHeartbeatAt = now;
  }

  isStale(now: number, timeoutMs: number): boolean {
    return this.supervised && this._state === 'open' && now - this._lastHeartbeatAt > timeoutMs;
  }

  /** Bind a subscription, releasing the previous one first. */
  attach(subscription: Subscription, unsubscribe: () => void): void {
    this.detach();
    this._subscription = subscription;
    this.unsubscribe = unsubscribe;
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this._subscription = null;
  }

  /**
   * Release the subscription and queue, close the transport. Idempotent;
   * never waits on the client.
   */
  close(reason: CloseReason): void {
    if (this._state === 'closing' || this._state === 'closed') return;

    this.transition('closing');
    this._closeReason = reason;
    this.detach();
    this.queue.close();

    try {
      this.transport.close(CLOSE_CODES[reason], reason);
    } catch (err) {
      logger.warn('Transport close failed', { connectionId: this.id, error: err });
    }

    this.transition('closed');
    this.onClosed?.(this, reason);
  }

  info(): ConnectionInfo {
    return {
      connectionId: this.id,
      transport: this.transport.kind,
      state: this._state,
      connectedAt: new Date(this.connectedAt).toISOString(),
      lastHeartbeatAt: new Date(this._lastHeartbeatAt).toISOString(),
      droppedEventCount: this._droppedEventCount,
      queued: this.queue.size,
      projectId: this._subscription?.projectId ?? null,
      eventTypes: this._subscription?.eventTypes ?? [],
    };
  }

  private transition(next: ConnectionState): void {
    if (!TRANSITIONS[this._state].includes(next)) {
      throw new Error(`Connection ${this.id}: illegal transition ${this._state} → ${next}`);
    }
    this._state = next;
  }

  private async drain(): Promise<void> {
    for (;;) {
      const message = await this.queue.next();
      if (message === undefined) return;

      try {
        await this.transport.send(message);
        this.overflowStreak = 0;
      } catch (err) {
        logger.warn('Transport write failed', { connectionId: this.id, error: err });
        this.close('transport_error');
        return;
      }
    }
  }
}
