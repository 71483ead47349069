/**
 * Where a client keeps the last event id it has applied, per project, so
 * a reconnect can ask for exactly what it missed.
 */
export interface SequenceStore {
  get(projectId: string): number | undefined;
  set(projectId: string, sequence: number): void;
  clear(projectId: string): void;
}

export class MemorySequenceStore implements SequenceStore {
  private sequences = new Map<string, number>();

  get(projectId: string): number | undefined {
    return this.sequences.get(projectId);
  }

  set(projectId: string, sequence: number): void {
    this.sequences.set(projectId, sequence);
  }

  clear(projectId: string): void {
    this.sequences.delete(projectId);
  }
}

/** The part of the Web Storage API the adapter needs */
export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

/**
 * Persists sequences in `localStorage` (or anything shaped like it) under
 * `<prefix><projectId>`. Unreadable values count as absent.
 */
export class StorageSequenceStore implements SequenceStore {
  constructor(
    private readonly storage: KeyValueStorage,
    private readonly prefix = 'lastEventId:',
  ) {}

  get(projectId: string): number | undefined {
    const raw = this.storage.getItem(this.prefix + projectId);
    if (raw === null || !/^\d+$/.test(raw)) return undefined;
    const value = Number(raw);
    return Number.isSafeInteger(value) ? value : undefined;
  }

  set(projectId: string, sequence: number): void {
    this.storage.setItem(this.prefix + projectId, String(sequence));
  }

  clear(projectId: string): void {
    this.storage.removeItem(this.prefix + projectId);
  }
}
