/**
 * EventBus interface for per-project event distribution.
 *
 * The interface is pluggable: LocalEventBus keeps everything in process
 * (one replay buffer per project, EventEmitter fan-out). A multi-node
 * deployment would swap in a broker-backed bus without touching the
 * connection manager.
 */

import type { Subscription } from '../subscriptions/subscription.js';
import type { ReplayResult } from './replay-buffer.js';
import type { EventKind, EventPayload, ProjectEvent, ProjectEventCallback } from './types.js';

export interface ProjectBufferStats {
  projectId: string;
  size: number;
  oldestSequence: number;
  latestSequence: number;
  subscribers: number;
  lastActivityAt: string;
}

export interface EventBusStats {
  projects: ProjectBufferStats[];
  totalSubscribers: number;
}

export interface EventBus {
  /**
   * Append to the project's replay buffer, then hand the event to every
   * matching subscriber before returning. Throws on an invalid payload
   * without appending anything.
   */
  publish<K extends EventKind>(projectId: string, kind: K, payload: EventPayload<K>): ProjectEvent;

  /** Start live delivery. Returns the unsubscribe function. */
  subscribe(subscription: Subscription, deliver: ProjectEventCallback): () => void;

  /** Retained events after `lastEventId`. Unknown projects get a fresh, empty buffer. */
  since(projectId: string, lastEventId: number): ReplayResult;

  /** Discard idle buffers. Returns the project ids that were dropped. */
  sweepIdle(now?: number): string[];

  stats(): EventBusStats;
}
