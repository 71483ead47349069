/**
 * Typed publish helpers for the automation producers.
 *
 * The file watcher, commit automation, progress calculator and risk
 * module call these instead of building payloads by hand. Each returns
 * the sequence the event was assigned.
 */

import type { EventBus } from './event-bus.js';
import type { EventPayload } from './types.js';

export function publishFileChange(bus: EventBus, projectId: string, payload: EventPayload<'file_change'>): number {
  return bus.publish(projectId, 'file_change', payload).sequence;
}

export function publishAutoCommitStart(bus: EventBus, projectId: string, changesCount: number): number {
  return bus.publish(projectId, 'auto_commit_start', { changes_count: changesCount }).sequence;
}

export function publishAutoCommitResult(
  bus: EventBus,
  projectId: string,
  payload: EventPayload<'auto_commit_result'>,
): number {
  return bus.publish(projectId, 'auto_commit_result', payload).sequence;
}

export function publishAutoCommitError(bus: EventBus, projectId: string, error: unknown): number {
  const message = error instanceof Error ? error.message : String(error);
  return bus.publish(projectId, 'auto_commit_error', { error: message }).sequence;
}

export function publishProgressUpdate(
  bus: EventBus,
  projectId: string,
  payload: EventPayload<'progress_update'>,
): number {
  return bus.publish(projectId, 'progress_update', payload).sequence;
}

export function publishRiskAlert(bus: EventBus, projectId: string, payload: EventPayload<'risk_alert'>): number {
  return bus.publish(projectId, 'risk_alert', payload).sequence;
}

export function publishDashboardUpdate(
  bus: EventBus,
  projectId: string,
  payload: EventPayload<'dashboard_update'>,
): number {
  return bus.publish(projectId, 'dashboard_update', payload).sequence;
}

export function publishHealthCheck(
  bus: EventBus,
  projectId: string,
  status: EventPayload<'health_check'>['status'] = 'healthy',
): number {
  return bus.publish(projectId, 'health_check', { status }).sequence;
}
