/**
 * Session Builder
 *
 * Pairs one employee-day's entry/exit events into work sessions.
 * Pure: no I/O, same input always gives the same sessions.
 */

import { secondsBetween } from '../utils/date-time';
import type { AccessEvent, SessionStatus, WorkSession } from '../../types/models';
import type { AnomalyCounts } from '../../types/services';

export type SessionEvent = Pick<AccessEvent, 'id' | 'sequence' | 'eventType' | 'timestamp'>;

export interface BuiltSession {
  startTime: string;
  endTime: string | null;
  status: Extract<SessionStatus, 'auto' | 'open'>;
  durationSeconds: number;
  /** Entry, duplicate entries and the closing exit, in scan order */
  eventIds: string[];
}

export type AnomalyKind = 'duplicate_entry' | 'orphan_exit' | 'non_attendance_event' | 'short_session';

export interface SessionAnomaly {
  kind: AnomalyKind;
  eventId: string;
  timestamp: string;
}

export interface SessionBuildResult {
  sessions: BuiltSession[];
  /** Every input event; all of them are consumed by one scan */
  processedEventIds: string[];
  anomalies: SessionAnomaly[];
  counts: AnomalyCounts;
}

export interface BuildOptions {
  /** Closed sessions shorter than this are dropped, 0 keeps all */
  minSessionSeconds?: number;
}

export function emptyAnomalyCounts(): AnomalyCounts {
  return { duplicateEntries: 0, orphanExits: 0, nonAttendanceEvents: 0, shortSessions: 0 };
}

export function addAnomalyCounts(target: AnomalyCounts, source: AnomalyCounts): void {
  target.duplicateEntries += source.duplicateEntries;
  target.orphanExits += source.orphanExits;
  target.nonAttendanceEvents += source.nonAttendanceEvents;
  target.shortSessions += source.shortSessions;
}

const COUNT_KEYS: Record<AnomalyKind, keyof AnomalyCounts> = {
  duplicate_entry: 'duplicateEntries',
  orphan_exit: 'orphanExits',
  non_attendance_event: 'nonAttendanceEvents',
  short_session: 'shortSessions',
};

export function countAnomalies(anomalies: readonly SessionAnomaly[]): AnomalyCounts {
  const counts = emptyAnomalyCounts();
  for (const anomaly of anomalies) counts[COUNT_KEYS[anomaly.kind]]++;
  return counts;
}

/**
 * Sort by timestamp, ties by insertion sequence. Returns a new array.
 */
export function sortEvents<T extends Pick<SessionEvent, 'sequence' | 'timestamp'>>(events: readonly T[]): T[] {
  return [...events].sort((a, b) => {
    if (a.timestamp < b.timestamp) return -1;
    if (a.timestamp > b.timestamp) return 1;
    return a.sequence - b.sequence;
  });
}

/**
 * Scan the day's events keeping one open-session slot.
 *
 * - entry, slot empty: opens a session
 * - entry, slot taken: duplicate, attached to the open session
 * - exit, slot taken: closes the session
 * - exit, slot empty: orphan, ignored
 * - denied / alarm: never touch sessions
 *
 * A session still open after the last event stays open.
 */
export function buildSessions(events: readonly SessionEvent[], options: BuildOptions = {}): SessionBuildResult {
  const minSessionSeconds = options.minSessionSeconds ?? 0;
  const sessions: BuiltSession[] = [];
  const anomalies: SessionAnomaly[] = [];
  const counts = emptyAnomalyCounts();
  const sorted = sortEvents(events);

  let open: { startTime: string; eventIds: string[] } | null = null;

  for (const event of sorted) {
    switch (event.eventType) {
      case 'entry':
        if (open) {
          open.eventIds.push(event.id);
          counts.duplicateEntries++;
          anomalies.push({ kind: 'duplicate_entry', eventId: event.id, timestamp: event.timestamp });
        } else {
          open = { startTime: event.timestamp, eventIds: [event.id] };
        }
        break;

      case 'exit':
        if (open) {
          const durationSeconds = secondsBetween(open.startTime, event.timestamp);
          if (durationSeconds < minSessionSeconds) {
            counts.shortSessions++;
            anomalies.push({ kind: 'short_session', eventId: event.id, timestamp: event.timestamp });
          } else {
            sessions.push({
              startTime: open.startTime,
              endTime: event.timestamp,
              status: 'auto',
              durationSeconds,
              eventIds: [...open.eventIds, event.id],
            });
          }
          open = null;
        } else {
          counts.orphanExits++;
          anomalies.push({ kind: 'orphan_exit', eventId: event.id, timestamp: event.timestamp });
        }
        break;

      case 'denied':
      case 'alarm':
        counts.nonAttendanceEvents++;
        anomalies.push({ kind: 'non_attendance_event', eventId: event.id, timestamp: event.timestamp });
        break;
    }
  }

  if (open) {
    sessions.push({
      startTime: open.startTime,
      endTime: null,
      status: 'open',
      durationSeconds: 0,
      eventIds: open.eventIds,
    });
  }

  return {
    sessions,
    processedEventIds: sorted.map((event) => event.id),
    anomalies,
    counts,
  };
}

// ============================================================================
// Reconciliation against stored sessions
// ============================================================================

export interface SessionUpdate {
  id: string;
  previous: Pick<WorkSession, 'endTime' | 'status'>;
  session: BuiltSession;
}

export interface SessionPlan {
  inserts: BuiltSession[];
  updates: SessionUpdate[];
  deletes: string[];
  /** Stored sessions that already match the derivation */
  unchanged: Array<{ id: string; session: BuiltSession }>;
  /** Manual and admin-closed sessions, never touched by derivation */
  retained: WorkSession[];
}

const DERIVED_STATUSES: readonly SessionStatus[] = ['auto', 'open'];

export function isDerivedSession(session: Pick<WorkSession, 'status'>): boolean {
  return DERIVED_STATUSES.includes(session.status);
}

/**
 * Work out the minimal writes that turn the stored sessions of a day into
 * the freshly built ones. Stored derived sessions are matched by start
 * time; a built session whose start is already covered by a manual or
 * admin-closed session is dropped so the override wins.
 */
export function reconcileSessions(existing: readonly WorkSession[], built: readonly BuiltSession[]): SessionPlan {
  const retained = existing.filter((session) => !isDerivedSession(session));
  const overridden = new Set(retained.map((session) => session.startTime));

  const candidates = new Map<string, WorkSession[]>();
  for (const session of existing) {
    if (!isDerivedSession(session)) continue;
    const bucket = candidates.get(session.startTime) ?? [];
    bucket.push(session);
    candidates.set(session.startTime, bucket);
  }

  const plan: SessionPlan = { inserts: [], updates: [], deletes: [], unchanged: [], retained };

  for (const session of built) {
    if (overridden.has(session.startTime)) continue;

    const match = candidates.get(session.startTime)?.shift();
    if (!match) {
      plan.inserts.push(session);
    } else if (match.endTime === session.endTime && match.status === session.status
      && match.durationSeconds === session.durationSeconds) {
      plan.unchanged.push({ id: match.id, session });
    } else {
      plan.updates.push({ id: match.id, previous: { endTime: match.endTime, status: match.status }, session });
    }
  }

  for (const leftovers of candidates.values()) {
    plan.deletes.push(...leftovers.map((session) => session.id));
  }

  return plan;
}

/**
 * True when an update turns an open session into a closed one
 */
export function isClosingUpdate(update: SessionUpdate): boolean {
  return update.previous.status === 'open' && update.session.endTime !== null;
}
