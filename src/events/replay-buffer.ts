/**
 * Bounded per-project ring of recently published events.
 *
 * The buffer is the single writer of sequence numbers for its project:
 * `append` assigns `last + 1`, so a subscriber that sees the buffer's
 * events in order never sees a gap or a duplicate. Oldest entries are
 * evicted first once capacity is reached.
 */

import type { EventInput, ProjectEvent } from './types.js';

export const DEFAULT_REPLAY_CAPACITY = 500;

export interface ReplayResult {
  events: ProjectEvent[];
  /**
   * True when events after the requested id are no longer retained.
   * The caller must fall back to a full-state refetch; `events` is empty.
   */
  truncated: boolean;
}

export class ReplayBuffer {
  private entries: ProjectEvent[] = [];
  private lastSequence: number;
  private lastActivity: number;

  /**
   * @param startSequence - Highest sequence already handed out for this project.
   *   A buffer recreated after an idle sweep continues from here so ids are never reused.
   */
  constructor(
    readonly projectId: string,
    private readonly capacity = DEFAULT_REPLAY_CAPACITY,
    startSequence = 0,
    now = Date.now(),
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`ReplayBuffer capacity must be a positive integer (received ${capacity})`);
    }
    if (!Number.isSafeInteger(startSequence) || startSequence < 0) {
      throw new Error(`ReplayBuffer start sequence must be a non-negative integer (received ${startSequence})`);
    }
    this.lastSequence = startSequence;
    this.lastActivity = now;
  }

  append(input: EventInput, now: Date = new Date()): ProjectEvent {
    const sequence = this.lastSequence + 1;
    if (!Number.isSafeInteger(sequence)) {
      throw new Error(`ReplayBuffer sequence overflow for project ${this.projectId}`);
    }

    // Every subscriber and every later replay shares this object
    const event: ProjectEvent = {
      ...structuredClone(input),
      projectId: this.projectId,
      sequence,
      emittedAt: now.toISOString(),
    };
    deepFreeze(event);

    // Drop oldest when full
    if (this.entries.length >= this.capacity) {
      this.entries.shift();
    }
    this.entries.push(event);
    this.lastSequence = sequence;
    this.lastActivity = now.getTime();

    return event;
  }

  since(lastEventId: number): ReplayResult {
    if (!Number.isSafeInteger(lastEventId) || lastEventId < 0) {
      throw new Error(`Replay request needs a non-negative integer id (received ${lastEventId})`);
    }

    // An id we never issued comes from an earlier process lifetime
    if (lastEventId > this.lastSequence) {
      return { events: [], truncated: true };
    }
    if (lastEventId < this.oldestSequence - 1) {
      return { events: [], truncated: true };
    }

    const idx = this.entries.findIndex(entry => entry.sequence > lastEventId);
    return { events: idx === -1 ? [] : this.entries.slice(idx), truncated: false };
  }

  /** Record non-publish activity (a subscribe) so the idle sweep keeps the buffer. */
  touch(now = Date.now()): void {
    this.lastActivity = now;
  }

  /** Oldest retained sequence, or `latestSequence + 1` when nothing is retained. */
  get oldestSequence(): number {
    return this.entries[0]?.sequence ?? this.lastSequence + 1;
  }

  get latestSequence(): number {
    return this.lastSequence;
  }

  get size(): number {
    return this.entries.length;
  }

  get lastActivityAt(): number {
    return this.lastActivity;
  }
}

function deepFreeze(value: unknown): void {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) return;
  Object.freeze(value);
  for (const child of Object.values(value)) deepFreeze(child);
}
