/**
 * Typed pub/sub base class.
 *
 * ```ts
 * class SessionEvents extends Emitter<{
 *   state: { state: string };
 *   gap: { projectId: string };
 * }> {}
 *
 * const events = new SessionEvents();
 * const off = events.on('gap', ({ projectId }) => refetch(projectId));
 * events.emit('gap', { projectId: 'alpha' });
 * off();
 * ```
 */

import { logger } from '../utils/logger.js';

type EventMap = Record<string, unknown>;
type Listener<T> = (payload: T) => void;

export class Emitter<Events extends EventMap> {
  private listeners: { [K in keyof Events]?: Set<Listener<Events[K]>> } = {};

  /**
   * Emit a typed event. All subscribers for this event name are called
   * synchronously. If a subscriber throws, other subscribers still fire.
   */
  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const set = this.listeners[event];
    if (!set) return;

    // Iterate a copy to allow unsubscribe during callback
    for (const fn of [...set]) {
      try {
        fn(payload);
      } catch (err) {
        logger.error(`Emitter: subscriber for '${String(event)}' threw`, { error: err });
      }
    }
  }

  /** Subscribe to a typed event. Returns an unsubscribe function. */
  on<K extends keyof Events>(event: K, fn: Listener<Events[K]>): () => void {
    const set = this.listeners[event] ?? new Set<Listener<Events[K]>>();
    this.listeners[event] = set;
    set.add(fn);

    return () => {
      set.delete(fn);
      if (set.size === 0 && this.listeners[event] === set) {
        delete this.listeners[event];
      }
    };
  }

  /** Subscribe for a single emission. */
  once<K extends keyof Events>(event: K, fn: Listener<Events[K]>): () => void {
    const off = this.on(event, (payload) => {
      off();
      fn(payload);
    });
    return off;
  }

  /** Remove all subscribers. */
  clear(): void {
    this.listeners = {};
  }
}
