/**
 * Wire protocol between the relay and dashboard clients.
 *
 * Every frame is one JSON object with a `type` discriminator. Client
 * frames are validated with zod on the way in; server frames are built
 * from typed constructors so the shapes below are the only ones sent.
 */

import type { RawData } from 'ws';
import { z } from 'zod';
import { EVENT_KINDS, type EventKind, type ProjectEvent } from '../events/types.js';

// ── Client → server ─────────────────────────────────────────────────

/** Sequence ids arrive as numbers, or as strings from localStorage / Last-Event-ID */
export const LastEventIdSchema = z.union([
  z.number().int().nonnegative().safe(),
  z.string().regex(/^\d+$/, 'must be a non-negative integer').transform(Number).pipe(z.number().safe()),
]);

export const SubscribeMessageSchema = z.object({
  type: z.literal('subscribe'),
  project_id: z.string().min(1),
  event_types: z.array(z.string()).default([]),
  last_event_id: LastEventIdSchema.nullish(),
});

export const PingMessageSchema = z.object({
  type: z.literal('ping'),
  timestamp: z.number().optional(),
});

export const ClientMessageSchema = z.discriminatedUnion('type', [SubscribeMessageSchema, PingMessageSchema]);

export type SubscribeMessage = z.infer<typeof SubscribeMessageSchema>;
export type PingMessage = z.infer<typeof PingMessageSchema>;
export type ClientMessage = z.infer<typeof ClientMessageSchema>;
/** What a client sends, before defaults are applied */
export type OutgoingClientMessage = z.input<typeof ClientMessageSchema>;

export type DecodeResult<T> = { ok: true; message: T } | { ok: false; error: string };

export function decodeClientMessage(raw: string): DecodeResult<ClientMessage> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, error: 'Message is not valid JSON' };
  }

  const result = ClientMessageSchema.safeParse(json);
  if (!result.success) {
    return { ok: false, error: describeIssues(result.error) };
  }
  return { ok: true, message: result.data };
}

// ── Server → client ─────────────────────────────────────────────────

export interface ConnectionEstablishedMessage {
  type: 'connection_established';
  message: string;
  connection_id: string;
}

export interface SubscriptionConfirmedMessage {
  type: 'subscription_confirmed';
  project_id: string;
  event_types: EventKind[];
  /** Replay could not be satisfied; the client must refetch full state */
  gap?: true;
}

export interface EventMessage {
  type: 'event';
  event_type: EventKind;
  data: ProjectEvent['payload'];
  event_id: number;
  project_id: string;
  timestamp: string;
  /** Present only on catch-up copies */
  is_replay?: true;
}

export interface HeartbeatMessage {
  type: 'heartbeat';
  timestamp: string;
}

export interface PongMessage {
  type: 'pong';
  timestamp: string;
}

export interface ErrorMessage {
  type: 'error';
  message: string;
}

export type ServerMessage =
  | ConnectionEstablishedMessage
  | SubscriptionConfirmedMessage
  | EventMessage
  | HeartbeatMessage
  | PongMessage
  | ErrorMessage;

export function eventMessage(event: ProjectEvent, isReplay = false): EventMessage {
  const message: EventMessage = {
    type: 'event',
    event_type: event.kind,
    data: event.payload,
    event_id: event.sequence,
    project_id: event.projectId,
    timestamp: event.emittedAt,
  };
  if (isReplay) message.is_replay = true;
  return message;
}

export function encodeServerMessage(message: ServerMessage): string {
  return JSON.stringify(message);
}

/**
 * SSE frame for a server message. Event frames carry their sequence as
 * the SSE id so the browser's Last-Event-ID resumes from it.
 */
export function formatSseFrame(message: ServerMessage): string {
  const id = message.type === 'event' ? `id: ${message.event_id}\n` : '';
  return `${id}data: ${encodeServerMessage(message)}\n\n`;
}

// Client-side decoding of server frames

export const ServerMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('connection_established'), message: z.string(), connection_id: z.string() }),
  z.object({
    type: z.literal('subscription_confirmed'),
    project_id: z.string(),
    event_types: z.array(z.enum(EVENT_KINDS)),
    gap: z.literal(true).optional(),
  }),
  z.object({
    type: z.literal('event'),
    event_type: z.enum(EVENT_KINDS),
    data: z.unknown(),
    event_id: z.number().int().positive(),
    project_id: z.string(),
    timestamp: z.string(),
    is_replay: z.boolean().optional(),
  }),
  z.object({ type: z.literal('heartbeat'), timestamp: z.string() }),
  z.object({ type: z.literal('pong'), timestamp: z.string() }),
  z.object({ type: z.literal('error'), message: z.string() }),
]);

export type IncomingServerMessage = z.infer<typeof ServerMessageSchema>;

export function decodeServerMessage(raw: string): DecodeResult<IncomingServerMessage> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, error: 'Message is not valid JSON' };
  }

  const result = ServerMessageSchema.safeParse(json);
  if (!result.success) {
    return { ok: false, error: describeIssues(result.error) };
  }
  return { ok: true, message: result.data };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** Text of a `ws` frame, whichever buffer shape it arrived in */
export function frameToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}
