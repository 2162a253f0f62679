/**
 * WorkSession Repository
 * CRUD operations for work_sessions and their session_events links
 */

import { randomUUID } from 'crypto';
import { execute, select } from '../database';
import { chunk, oneOf } from '../utils/guards';
import { SESSION_STATUSES } from '../../types/models';
import type { WorkSession, SessionStatus } from '../../types/models';
import type { WorkSessionRow, CountRow } from '../../types/api';

const IDS_PER_STATEMENT = 500;

/**
 * Generate a unique ID for new sessions
 */
function generateId(): string {
  return randomUUID();
}

/**
 * Get current ISO timestamp
 */
function now(): string {
  return new Date().toISOString();
}

/**
 * Map database row to WorkSession model
 */
function mapRowToSession(row: WorkSessionRow): WorkSession {
  return {
    id: row.id,
    employeeId: row.employee_id,
    date: row.date,
    startTime: row.start_time,
    endTime: row.end_time,
    durationSeconds: row.duration_seconds,
    status: oneOf(SESSION_STATUSES, row.status, 'auto'),
    manualReason: row.manual_reason,
    correctedBy: row.corrected_by,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export interface NewSession {
  employeeId: string;
  date: string;
  startTime: string;
  endTime: string | null;
  durationSeconds: number;
  status: SessionStatus;
  manualReason?: string | null;
  correctedBy?: string | null;
  eventIds?: string[];
}

export interface SessionChanges {
  endTime: string | null;
  durationSeconds: number;
  status: SessionStatus;
  eventIds?: string[];
}

/**
 * Get a session by ID
 */
export async function getSessionById(id: string): Promise<WorkSession | null> {
  const rows = await select<WorkSessionRow>('SELECT * FROM work_sessions WHERE id = ?', [id]);
  const row = rows[0];
  return row ? mapRowToSession(row) : null;
}

/**
 * Sessions of one employee-day in start order
 */
export async function getSessionsForPair(employeeId: string, date: string): Promise<WorkSession[]> {
  const rows = await select<WorkSessionRow>(
    `SELECT * FROM work_sessions
     WHERE employee_id = ? AND date = ?
     ORDER BY start_time ASC, created_at ASC`,
    [employeeId, date]
  );
  return rows.map(mapRowToSession);
}

/**
 * Replace the event links of a session
 */
export async function linkEvents(sessionId: string, eventIds: string[]): Promise<void> {
  await execute('DELETE FROM session_events WHERE session_id = ?', [sessionId]);
  for (const ids of chunk(eventIds, IDS_PER_STATEMENT)) {
    const placeholders = ids.map(() => '(?, ?)').join(', ');
    await execute(
      `INSERT OR IGNORE INTO session_events (session_id, event_id) VALUES ${placeholders}`,
      ids.flatMap((eventId) => [sessionId, eventId])
    );
  }
}

export async function getSessionEventIds(sessionId: string): Promise<string[]> {
  const rows = await select<{ event_id: string }>(
    `SELECT se.event_id FROM session_events se
     JOIN access_events e ON e.id = se.event_id
     WHERE se.session_id = ?
     ORDER BY e.timestamp ASC, e.rowid ASC`,
    [sessionId]
  );
  return rows.map((row) => row.event_id);
}

/**
 * Insert a session and link its source events
 */
export async function insertSession(session: NewSession): Promise<string> {
  const id = generateId();
  const timestamp = now();
  await execute(
    `INSERT INTO work_sessions
     (id, employee_id, date, start_time, end_time, duration_seconds, status,
      manual_reason, corrected_by, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    [
      id,
      session.employeeId,
      session.date,
      session.startTime,
      session.endTime,
      session.durationSeconds,
      session.status,
      session.manualReason ?? null,
      session.correctedBy ?? null,
      timestamp,
      timestamp,
    ]
  );
  if (session.eventIds && session.eventIds.length > 0) {
    await linkEvents(id, session.eventIds);
  }
  return id;
}

/**
 * Update the derived fields of a session (end, duration, status)
 */
export async function updateSession(id: string, changes: SessionChanges): Promise<void> {
  await execute(
    `UPDATE work_sessions SET end_time = ?, duration_seconds = ?, status = ?, updated_at = ?
     WHERE id = ?`,
    [changes.endTime, changes.durationSeconds, changes.status, now(), id]
  );
  if (changes.eventIds) {
    await linkEvents(id, changes.eventIds);
  }
}

/**
 * Close an open session on behalf of an administrator
 */
export async function closeSessionManually(
  id: string,
  close: { endTime: string; durationSeconds: number; reason: string; correctedBy: string }
): Promise<void> {
  await execute(
    `UPDATE work_sessions
     SET end_time = ?, duration_seconds = ?, status = 'closed_manual',
         manual_reason = ?, corrected_by = ?, updated_at = ?
     WHERE id = ?`,
    [close.endTime, close.durationSeconds, close.reason, close.correctedBy, now(), id]
  );
}

export async function deleteSessions(ids: string[]): Promise<number> {
  let deleted = 0;
  for (const part of chunk(ids, IDS_PER_STATEMENT)) {
    const placeholders = part.map(() => '?').join(', ');
    const result = await execute(`DELETE FROM work_sessions WHERE id IN (${placeholders})`, part);
    deleted += result.rowsAffected;
  }
  return deleted;
}

/**
 * Delete every session of an employee-day, manual ones included
 */
export async function deleteSessionsForPair(employeeId: string, date: string): Promise<number> {
  const result = await execute(
    'DELETE FROM work_sessions WHERE employee_id = ? AND date = ?',
    [employeeId, date]
  );
  return result.rowsAffected;
}

/**
 * Open sessions, optionally narrowed to one employee and/or day
 */
export async function listOpenSessions(filter: { employeeId?: string; date?: string } = {}): Promise<WorkSession[]> {
  let query = "SELECT * FROM work_sessions WHERE status = 'open'";
  const params: unknown[] = [];
  if (filter.employeeId) {
    query += ' AND employee_id = ?';
    params.push(filter.employeeId);
  }
  if (filter.date) {
    query += ' AND date = ?';
    params.push(filter.date);
  }
  query += ' ORDER BY date ASC, employee_id ASC, start_time ASC';
  const rows = await select<WorkSessionRow>(query, params);
  return rows.map(mapRowToSession);
}

/**
 * Count sessions in a date range, optionally for a set of employees
 */
export async function countSessionsInRange(
  fromDate: string,
  toDate: string,
  employeeIds?: string[]
): Promise<number> {
  if (employeeIds && employeeIds.length === 0) return 0;
  if (!employeeIds) {
    const rows = await select<CountRow>(
      'SELECT COUNT(*) as count FROM work_sessions WHERE date >= ? AND date <= ?',
      [fromDate, toDate]
    );
    return rows[0]?.count ?? 0;
  }
  let total = 0;
  for (const ids of chunk(employeeIds, IDS_PER_STATEMENT)) {
    const placeholders = ids.map(() => '?').join(', ');
    const rows = await select<CountRow>(
      `SELECT COUNT(*) as count FROM work_sessions
       WHERE date >= ? AND date <= ? AND employee_id IN (${placeholders})`,
      [fromDate, toDate, ...ids]
    );
    total += rows[0]?.count ?? 0;
  }
  return total;
}

export async function countSessionsBefore(cutoffDate: string): Promise<number> {
  const rows = await select<CountRow>(
    'SELECT COUNT(*) as count FROM work_sessions WHERE date < ?',
    [cutoffDate]
  );
  return rows[0]?.count ?? 0;
}

export async function deleteSessionsBefore(cutoffDate: string): Promise<number> {
  const result = await execute('DELETE FROM work_sessions WHERE date < ?', [cutoffDate]);
  return result.rowsAffected;
}

export async function getSessionTotals(
  fromDate: string,
  toDate: string
): Promise<{ total: number; inPeriod: number; open: number }> {
  const [totalRows, periodRows, openRows] = await Promise.all([
    select<CountRow>('SELECT COUNT(*) as count FROM work_sessions'),
    select<CountRow>(
      'SELECT COUNT(*) as count FROM work_sessions WHERE date >= ? AND date <= ?',
      [fromDate, toDate]
    ),
    select<CountRow>("SELECT COUNT(*) as count FROM work_sessions WHERE status = 'open'"),
  ]);
  return {
    total: totalRows[0]?.count ?? 0,
    inPeriod: periodRows[0]?.count ?? 0,
    open: openRows[0]?.count ?? 0,
  };
}

export const workSessionRepository = {
  getSessionById,
  getSessionsForPair,
  getSessionEventIds,
  insertSession,
  updateSession,
  closeSessionManually,
  deleteSessions,
  deleteSessionsForPair,
  listOpenSessions,
  countSessionsInRange,
  countSessionsBefore,
  deleteSessionsBefore,
  getSessionTotals,
};
