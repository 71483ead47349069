import { describe, it, expect } from 'vitest';
import {
  LastEventIdSchema,
  decodeClientMessage,
  decodeServerMessage,
  eventMessage,
  formatSseFrame,
  frameToString,
} from '../protocol/messages.js';
import { ReplayBuffer } from '../events/replay-buffer.js';

const AT = new Date('2024-05-01T10:00:00.000Z');

function healthEvent() {
  return new ReplayBuffer('alpha').append({ kind: 'health_check', payload: { status: 'healthy' } }, AT);
}

describe('decodeClientMessage', () => {
  it('should accept a subscribe and default the kind list', () => {
    const result = decodeClientMessage('{"type":"subscribe","project_id":"alpha"}');
    expect(result).toEqual({ ok: true, message: { type: 'subscribe', project_id: 'alpha', event_types: [] } });
  });

  it('should accept a stringified last_event_id', () => {
    const result = decodeClientMessage(
      '{"type":"subscribe","project_id":"alpha","event_types":["risk_alert"],"last_event_id":"42"}',
    );
    expect(result.ok && result.message.type === 'subscribe' && result.message.last_event_id).toBe(42);
  });

  it('should accept a null last_event_id', () => {
    const result = decodeClientMessage('{"type":"subscribe","project_id":"alpha","last_event_id":null}');
    expect(result.ok).toBe(true);
  });

  it('should accept a ping with or without a timestamp', () => {
    expect(decodeClientMessage('{"type":"ping"}')).toEqual({ ok: true, message: { type: 'ping' } });
    expect(decodeClientMessage('{"type":"ping","timestamp":1714557600000}')).toEqual({
      ok: true,
      message: { type: 'ping', timestamp: 1714557600000 },
    });
  });

  it('should reject text that is not JSON', () => {
    expect(decodeClientMessage('subscribe alpha')).toEqual({ ok: false, error: 'Message is not valid JSON' });
  });

  it('should reject an unknown message type', () => {
    const result = decodeClientMessage('{"type":"unsubscribe"}');
    expect(result.ok).toBe(false);
    expect(!result.ok && result.error).toMatch(/^type: Invalid discriminator value/);
  });

  it('should name the missing field', () => {
    expect(decodeClientMessage('{"type":"subscribe"}')).toEqual({ ok: false, error: 'project_id: Required' });
  });

  it('should reject a negative last_event_id', () => {
    const result = decodeClientMessage('{"type":"subscribe","project_id":"alpha","last_event_id":-3}');
    expect(result.ok).toBe(false);
  });
});

describe('LastEventIdSchema', () => {
  it('should parse digit strings and integers', () => {
    expect(LastEventIdSchema.parse('007')).toBe(7);
    expect(LastEventIdSchema.parse(12)).toBe(12);
  });

  it('should reject other values', () => {
    expect(LastEventIdSchema.safeParse('-1').success).toBe(false);
    expect(LastEventIdSchema.safeParse(1.5).success).toBe(false);
    expect(LastEventIdSchema.safeParse('abc').success).toBe(false);
  });
});

describe('eventMessage', () => {
  it('should map a sequenced event onto the wire shape', () => {
    expect(eventMessage(healthEvent())).toEqual({
      type: 'event',
      event_type: 'health_check',
      data: { status: 'healthy' },
      event_id: 1,
      project_id: 'alpha',
      timestamp: '2024-05-01T10:00:00.000Z',
    });
  });

  it('should mark replayed copies and leave live ones unmarked', () => {
    expect(eventMessage(healthEvent(), true).is_replay).toBe(true);
    expect('is_replay' in eventMessage(healthEvent())).toBe(false);
  });
});

describe('formatSseFrame', () => {
  it('should carry the sequence as the SSE id for events', () => {
    expect(formatSseFrame(eventMessage(healthEvent()))).toBe(
      'id: 1\n' +
        'data: {"type":"event","event_type":"health_check","data":{"status":"healthy"},"event_id":1,' +
        '"project_id":"alpha","timestamp":"2024-05-01T10:00:00.000Z"}\n\n',
    );
  });

  it('should omit the id for control frames', () => {
    expect(formatSseFrame({ type: 'heartbeat', timestamp: '2024-05-01T10:00:00.000Z' })).toBe(
      'data: {"type":"heartbeat","timestamp":"2024-05-01T10:00:00.000Z"}\n\n',
    );
  });
});

describe('decodeServerMessage', () => {
  it('should decode an event frame', () => {
    const raw = JSON.stringify(eventMessage(healthEvent(), true));
    const result = decodeServerMessage(raw);
    expect(result.ok).toBe(true);
    expect(result.ok && result.message.type === 'event' && result.message.is_replay).toBe(true);
  });

  it('should reject an event without a positive id', () => {
    const raw = JSON.stringify({ ...eventMessage(healthEvent()), event_id: 0 });
    expect(decodeServerMessage(raw).ok).toBe(false);
  });

  it('should reject a confirmation naming an unknown kind', () => {
    const raw = JSON.stringify({ type: 'subscription_confirmed', project_id: 'alpha', event_types: ['task_changed'] });
    expect(decodeServerMessage(raw).ok).toBe(false);
  });
});

describe('frameToString', () => {
  it('should read every ws buffer shape', () => {
    expect(frameToString(Buffer.from('{"type":"ping"}'))).toBe('{"type":"ping"}');
    expect(frameToString([Buffer.from('{"type":'), Buffer.from('"ping"}')])).toBe('{"type":"ping"}');

    const arrayBuffer = new ArrayBuffer(5);
    new Uint8Array(arrayBuffer).set([104, 101, 108, 108, 111]);
    expect(frameToString(arrayBuffer)).toBe('hello');
  });
});
