/**
 * In-process EventBus implementation using Node.js EventEmitter.
 * One channel and one replay buffer per project; buffers are created on
 * first use and discarded after sitting idle past the retention window.
 */

import { EventEmitter } from 'node:events';
import { logger } from '../utils/logger.js';
import type { Subscription } from '../subscriptions/subscription.js';
import { InvalidEventError } from './errors.js';
import type { EventBus, EventBusStats } from './event-bus.js';
import { DEFAULT_REPLAY_CAPACITY, ReplayBuffer, type ReplayResult } from './replay-buffer.js';
import { EventInputSchema, type EventKind, type EventPayload, type ProjectEvent, type ProjectEventCallback } from './types.js';

export const DEFAULT_RETENTION_MS = 60 * 60 * 1000;

export interface LocalEventBusOptions {
  replayCapacity?: number;
  /** How long a project with no events and no subscribers keeps its buffer */
  retentionMs?: number;
}

const channel = (projectId: string) => `project:${projectId}`;

export class LocalEventBus implements EventBus {
  private emitter = new EventEmitter();
  private buffers = new Map<string, ReplayBuffer>();
  /**
   * Last sequence of swept projects, so a recreated buffer never reuses ids.
   * Holds one number per project ever swept for the life of the process;
   * dropping an entry would restart that project at 1 and make a client's
   * stored id look current. An entry goes away when its project is recreated.
   */
  private sweptSequences = new Map<string, number>();
  private readonly replayCapacity: number;
  private readonly retentionMs: number;

  constructor(options: LocalEventBusOptions = {}) {
    this.replayCapacity = options.replayCapacity ?? DEFAULT_REPLAY_CAPACITY;
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
    // Every connection adds a listener; there is no sensible fixed cap
    this.emitter.setMaxListeners(0);
  }

  publish<K extends EventKind>(projectId: string, kind: K, payload: EventPayload<K>): ProjectEvent {
    assertProjectId(projectId);

    const parsed = EventInputSchema.safeParse({ kind, payload });
    if (!parsed.success) {
      throw new InvalidEventError(kind, parsed.error.issues);
    }

    // Buffer first: a replay issued from inside a listener already sees this event
    const event = this.buffer(projectId).append(parsed.data);
    this.emitter.emit(channel(projectId), event);
    return event;
  }

  subscribe(subscription: Subscription, deliver: ProjectEventCallback): () => void {
    assertProjectId(subscription.projectId);

    const listener = (event: ProjectEvent) => {
      if (!subscription.matches(event)) return;
      try {
        deliver(event);
      } catch (err) {
        logger.error('Subscriber delivery failed', {
          connectionId: subscription.connectionId,
          projectId: event.projectId,
          sequence: event.sequence,
          error: err,
        });
      }
    };

    this.buffer(subscription.projectId).touch();
    this.emitter.on(channel(subscription.projectId), listener);

    return () => {
      this.emitter.off(channel(subscription.projectId), listener);
      // Retention counts from the last subscriber leaving
      this.buffers.get(subscription.projectId)?.touch();
    };
  }

  since(projectId: string, lastEventId: number): ReplayResult {
    assertProjectId(projectId);
    return this.buffer(projectId).since(lastEventId);
  }

  sweepIdle(now = Date.now()): string[] {
    const dropped: string[] = [];

    for (const [projectId, buffer] of this.buffers) {
      if (this.emitter.listenerCount(channel(projectId)) > 0) continue;
      if (now - buffer.lastActivityAt <= this.retentionMs) continue;

      this.sweptSequences.set(projectId, buffer.latestSequence);
      this.buffers.delete(projectId);
      dropped.push(projectId);
    }

    if (dropped.length > 0) {
      logger.debug('Discarded idle replay buffers', { projects: dropped });
    }
    return dropped;
  }

  stats(): EventBusStats {
    const projects = [...this.buffers.values()].map(buffer => ({
      projectId: buffer.projectId,
      size: buffer.size,
      oldestSequence: buffer.oldestSequence,
      latestSequence: buffer.latestSequence,
      subscribers: this.emitter.listenerCount(channel(buffer.projectId)),
      lastActivityAt: new Date(buffer.lastActivityAt).toISOString(),
    }));

    return {
      projects,
      totalSubscribers: projects.reduce((sum, p) => sum + p.subscribers, 0),
    };
  }

  private buffer(projectId: string): ReplayBuffer {
    let buffer = this.buffers.get(projectId);
    if (!buffer) {
      buffer = new ReplayBuffer(projectId, this.replayCapacity, this.sweptSequences.get(projectId) ?? 0);
      this.sweptSequences.delete(projectId);
      this.buffers.set(projectId, buffer);
    }
    return buffer;
  }
}

function assertProjectId(projectId: string): void {
  if (typeof projectId !== 'string' || projectId.length === 0) {
    throw new Error('Event bus operations need a non-empty project id');
  }
}
