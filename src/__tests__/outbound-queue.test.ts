import { describe, it, expect } from 'vitest';
import { OutboundQueue } from '../connections/outbound-queue.js';

describe('OutboundQueue', () => {
  it('should deliver items in order', async () => {
    const queue = new OutboundQueue<number>(4);
    queue.push(1);
    queue.push(2);

    expect(await queue.next()).toBe(1);
    expect(await queue.next()).toBe(2);
    expect(queue.size).toBe(0);
  });

  it('should drop the oldest item when full', async () => {
    const queue = new OutboundQueue<number>(2);
    expect(queue.push(1)).toEqual({ dropped: false });
    expect(queue.push(2)).toEqual({ dropped: false });
    expect(queue.push(3)).toEqual({ dropped: true });

    expect(await queue.next()).toBe(2);
    expect(await queue.next()).toBe(3);
  });

  it('should evict only droppable items', async () => {
    const queue = new OutboundQueue<string>(3, item => item.startsWith('event'));
    queue.push('confirm');
    queue.push('event-1');
    queue.push('event-2');

    expect(queue.push('event-3')).toEqual({ dropped: true });
    expect(await queue.next()).toBe('confirm');
    expect(await queue.next()).toBe('event-2');
    expect(await queue.next()).toBe('event-3');
  });

  it('should refuse an undroppable item when nothing queued can make room', async () => {
    const queue = new OutboundQueue<string>(2, item => item.startsWith('event'));
    queue.push('hello');
    queue.push('confirm');

    expect(queue.push('event-1')).toEqual({ dropped: true });
    expect(queue.push('error')).toEqual({ dropped: false, refused: true });
    expect(queue.size).toBe(2);
    expect(await queue.next()).toBe('hello');
    expect(await queue.next()).toBe('confirm');
  });

  it('should hand an item straight to a waiting consumer', async () => {
    const queue = new OutboundQueue<string>(1);
    const pending = queue.next();

    expect(queue.push('a')).toEqual({ dropped: false });
    expect(queue.size).toBe(0);
    expect(await pending).toBe('a');
  });

  it('should allow only one waiting consumer', () => {
    const queue = new OutboundQueue<string>(1);
    void queue.next();
    expect(() => queue.next()).toThrow(/single consumer/);
  });

  it('should release the consumer and discard items on close', async () => {
    const queue = new OutboundQueue<string>(2);
    const pending = queue.next();
    queue.close();

    expect(await pending).toBeUndefined();
    expect(queue.isClosed).toBe(true);
    expect(queue.push('late')).toEqual({ dropped: true });
    expect(await queue.next()).toBeUndefined();
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new OutboundQueue(0)).toThrow(/positive integer/);
  });
});
