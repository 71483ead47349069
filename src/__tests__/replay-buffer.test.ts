import { describe, it, expect } from 'vitest';
import { ReplayBuffer } from '../events/replay-buffer.js';
import type { EventInput } from '../events/types.js';

const change = (file: string): EventInput => ({
  kind: 'file_change',
  payload: { file_path: file, change_type: 'modified' },
});

function fill(buffer: ReplayBuffer, count: number) {
  for (let i = 1; i <= count; i++) {
    buffer.append(change(`src/file-${i}.ts`));
  }
}

describe('ReplayBuffer', () => {
  it('should assign sequences starting at 1', () => {
    const buffer = new ReplayBuffer('alpha');
    const first = buffer.append(change('a.ts'));
    const second = buffer.append(change('b.ts'));

    expect(first.sequence).toBe(1);
    expect(second.sequence).toBe(2);
    expect(first.projectId).toBe('alpha');
    expect(buffer.latestSequence).toBe(2);
  });

  it('should stamp emittedAt from the append time', () => {
    const buffer = new ReplayBuffer('alpha');
    const event = buffer.append(change('a.ts'), new Date('2024-05-01T10:00:00.000Z'));
    expect(event.emittedAt).toBe('2024-05-01T10:00:00.000Z');
    expect(buffer.lastActivityAt).toBe(Date.parse('2024-05-01T10:00:00.000Z'));
  });

  it('should freeze appended events', () => {
    const buffer = new ReplayBuffer('alpha');
    const event = buffer.append(change('a.ts'));
    expect(Object.isFrozen(event)).toBe(true);
    expect(Object.isFrozen(event.payload)).toBe(true);
  });

  it('should freeze nested payload values and leave the caller input alone', () => {
    const buffer = new ReplayBuffer('alpha');
    const input: EventInput = {
      kind: 'dashboard_update',
      payload: { metrics: { velocity: 3 }, alerts: ['late'], overview: { sprint: { name: 'S1' } } },
    };
    const event = buffer.append(input);
    if (event.kind !== 'dashboard_update') throw new Error('expected a dashboard_update');

    expect(Object.isFrozen(event.payload.metrics)).toBe(true);
    expect(Object.isFrozen(event.payload.alerts)).toBe(true);
    expect(Object.isFrozen(event.payload.overview)).toBe(true);
    expect(Object.isFrozen(event.payload.overview?.sprint)).toBe(true);
    expect(Object.isFrozen(input.payload)).toBe(false);
  });

  it('should evict the oldest entries once full', () => {
    const buffer = new ReplayBuffer('alpha', 3);
    fill(buffer, 5);

    expect(buffer.size).toBe(3);
    expect(buffer.oldestSequence).toBe(3);
    expect(buffer.latestSequence).toBe(5);
  });

  it('should continue from the start sequence', () => {
    const buffer = new ReplayBuffer('alpha', 10, 41);
    expect(buffer.append(change('a.ts')).sequence).toBe(42);
  });

  it('should report latest + 1 as oldest when empty', () => {
    expect(new ReplayBuffer('alpha', 10, 7).oldestSequence).toBe(8);
  });

  it('should reject invalid construction arguments', () => {
    expect(() => new ReplayBuffer('alpha', 0)).toThrow(/capacity/);
    expect(() => new ReplayBuffer('alpha', 1.5)).toThrow(/capacity/);
    expect(() => new ReplayBuffer('alpha', 10, -1)).toThrow(/start sequence/);
  });

  describe('since', () => {
    it('should return events after the given id', () => {
      const buffer = new ReplayBuffer('alpha');
      fill(buffer, 5);

      const result = buffer.since(3);
      expect(result.truncated).toBe(false);
      expect(result.events.map(e => e.sequence)).toEqual([4, 5]);
    });

    it('should return everything for id 0 while nothing was evicted', () => {
      const buffer = new ReplayBuffer('alpha');
      fill(buffer, 3);
      expect(buffer.since(0).events.map(e => e.sequence)).toEqual([1, 2, 3]);
    });

    it('should return nothing when the client is up to date', () => {
      const buffer = new ReplayBuffer('alpha');
      fill(buffer, 3);
      expect(buffer.since(3)).toEqual({ events: [], truncated: false });
    });

    it('should replay from the oldest retained when the id is just before it', () => {
      const buffer = new ReplayBuffer('alpha', 3);
      fill(buffer, 5);

      const result = buffer.since(2);
      expect(result.truncated).toBe(false);
      expect(result.events.map(e => e.sequence)).toEqual([3, 4, 5]);
    });

    it('should report truncation when the id was evicted', () => {
      const buffer = new ReplayBuffer('alpha', 3);
      fill(buffer, 5);
      expect(buffer.since(1)).toEqual({ events: [], truncated: true });
    });

    it('should report truncation for an id never issued', () => {
      const buffer = new ReplayBuffer('alpha');
      fill(buffer, 2);
      expect(buffer.since(9)).toEqual({ events: [], truncated: true });
    });

    it('should reject negative or fractional ids', () => {
      const buffer = new ReplayBuffer('alpha');
      expect(() => buffer.since(-1)).toThrow(/non-negative integer/);
      expect(() => buffer.since(1.5)).toThrow(/non-negative integer/);
    });
  });
});
