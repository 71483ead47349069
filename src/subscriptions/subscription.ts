import { isEventKind, type EventKind, type ProjectEvent } from '../events/types.js';

/**
 * A client's declared interest: one project, optionally narrowed to a set
 * of event kinds. Bound to exactly one connection by id; the connection
 * manager replaces it wholesale when the same client subscribes again.
 */
export class Subscription {
  /** Empty set means every kind. */
  readonly kindFilter: ReadonlySet<EventKind>;

  constructor(
    readonly connectionId: string,
    readonly projectId: string,
    kinds: Iterable<EventKind> = [],
    readonly lastEventId?: number,
  ) {
    this.kindFilter = new Set(kinds);
  }

  matches(event: ProjectEvent): boolean {
    if (event.projectId !== this.projectId) return false;
    return this.kindFilter.size === 0 || this.kindFilter.has(event.kind);
  }

  /** Kinds as confirmed back to the client (empty = all). */
  get eventTypes(): EventKind[] {
    return [...this.kindFilter];
  }
}

export interface KindSelection {
  kinds: EventKind[];
  rejected: string[];
}

/**
 * Split requested kind names into known kinds and unknown names.
 * Duplicates collapse; order of first appearance is kept.
 */
export function selectKinds(requested: readonly string[]): KindSelection {
  const kinds: EventKind[] = [];
  const rejected: string[] = [];

  for (const raw of requested) {
    const name = raw.trim();
    if (isEventKind(name)) {
      if (!kinds.includes(name)) kinds.push(name);
    } else {
      rejected.push(raw);
    }
  }

  return { kinds, rejected };
}
