/**
 * Event kinds and payloads carried by the relay.
 *
 * The kind set is closed: producers (file watcher, commit automation,
 * progress calculator, risk assessment) can only publish one of these,
 * and each kind's payload is checked against its schema on publish.
 */

import { z } from 'zod';

export const EVENT_KINDS = [
  'file_change',
  'auto_commit_start',
  'auto_commit_result',
  'auto_commit_error',
  'progress_update',
  'risk_alert',
  'dashboard_update',
  'health_check',
] as const;

export type EventKind = (typeof EVENT_KINDS)[number];

export function isEventKind(value: unknown): value is EventKind {
  return EVENT_KINDS.some(kind => kind === value);
}

export const CHANGE_TYPES = ['created', 'modified', 'deleted', 'moved'] as const;
export const RISK_SEVERITIES = ['low', 'medium', 'high', 'critical'] as const;
export const HEALTH_STATUSES = ['healthy', 'degraded', 'unhealthy'] as const;

export const PAYLOAD_SCHEMAS = {
  file_change: z.object({
    file_path: z.string().min(1),
    change_type: z.enum(CHANGE_TYPES),
  }),
  auto_commit_start: z.object({
    changes_count: z.number().int().nonnegative(),
  }),
  auto_commit_result: z.object({
    success: z.boolean(),
    changes_count: z.number().int().nonnegative(),
    commit_hash: z.string().optional(),
  }),
  auto_commit_error: z.object({
    error: z.string(),
  }),
  progress_update: z.object({
    percent: z.number().min(0).max(100),
    completed_tasks: z.number().int().nonnegative().optional(),
    total_tasks: z.number().int().nonnegative().optional(),
  }),
  risk_alert: z.object({
    severity: z.enum(RISK_SEVERITIES),
    message: z.string(),
    risk_id: z.string().optional(),
  }),
  dashboard_update: z.object({
    metrics: z.record(z.number()).optional(),
    alerts: z.array(z.string()).optional(),
    overview: z.record(z.unknown()).optional(),
  }),
  health_check: z.object({
    status: z.enum(HEALTH_STATUSES),
  }),
} satisfies Record<EventKind, z.ZodTypeAny>;

/**
 * Publish input, discriminated on `kind`. Producers hand the bus a kind and
 * its payload; the bus validates the pair with this schema.
 */
export const EventInputSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('file_change'), payload: PAYLOAD_SCHEMAS.file_change }),
  z.object({ kind: z.literal('auto_commit_start'), payload: PAYLOAD_SCHEMAS.auto_commit_start }),
  z.object({ kind: z.literal('auto_commit_result'), payload: PAYLOAD_SCHEMAS.auto_commit_result }),
  z.object({ kind: z.literal('auto_commit_error'), payload: PAYLOAD_SCHEMAS.auto_commit_error }),
  z.object({ kind: z.literal('progress_update'), payload: PAYLOAD_SCHEMAS.progress_update }),
  z.object({ kind: z.literal('risk_alert'), payload: PAYLOAD_SCHEMAS.risk_alert }),
  z.object({ kind: z.literal('dashboard_update'), payload: PAYLOAD_SCHEMAS.dashboard_update }),
  z.object({ kind: z.literal('health_check'), payload: PAYLOAD_SCHEMAS.health_check }),
]);

export type EventInput = z.infer<typeof EventInputSchema>;

export type EventPayload<K extends EventKind> = Extract<EventInput, { kind: K }>['payload'];

export interface EventMeta {
  projectId: string;
  /** Strictly increasing per project, starting at 1 */
  sequence: number;
  /** ISO timestamp assigned when the event entered the replay buffer */
  emittedAt: string;
}

export type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/**
 * A sequenced event, frozen all the way down once buffered. Discriminated
 * on `kind`, so narrowing `kind` narrows `payload`.
 */
export type ProjectEvent = DeepReadonly<EventInput & EventMeta>;

export type ProjectEventOf<K extends EventKind> = Extract<ProjectEvent, { kind: K }>;

export type ProjectEventCallback = (event: ProjectEvent) => void;
