/**
 * AuditLog Repository
 * Append-only trail of every mutating engine operation
 */

import { randomUUID } from 'crypto';
import { execute, select } from '../database';
import { formatTimestamp } from '../utils/date-time';
import { oneOf } from '../utils/guards';
import { AUDIT_ACTIONS } from '../../types/models';
import type { AuditAction, AuditLogEntry, CreateAuditEntryInput } from '../../types/models';
import type { AuditLogRow, CountRow } from '../../types/api';

export const SYSTEM_ACTOR = 'system';

function mapRowToEntry(row: AuditLogRow): AuditLogEntry {
  return {
    id: row.id,
    employeeId: row.employee_id,
    date: row.date,
    action: oneOf(AUDIT_ACTIONS, row.action, 'edit_summary'),
    description: row.description,
    oldValue: row.old_value,
    newValue: row.new_value,
    reason: row.reason,
    changedBy: row.changed_by,
    changedAt: row.changed_at,
  };
}

function serialize(value: unknown): string | null {
  if (value === undefined || value === null) return null;
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Append an entry. `changedAt` is wall-clock local time like every other
 * engine timestamp, so it compares directly against cutoff dates.
 */
export async function appendAuditEntry(
  input: CreateAuditEntryInput,
  changedAt: Date = new Date()
): Promise<AuditLogEntry> {
  const entry: AuditLogEntry = {
    id: randomUUID(),
    employeeId: input.employeeId ?? null,
    date: input.date ?? null,
    action: input.action,
    description: input.description,
    oldValue: serialize(input.oldValue),
    newValue: serialize(input.newValue),
    reason: input.reason ?? null,
    changedBy: input.changedBy ?? SYSTEM_ACTOR,
    changedAt: formatTimestamp(changedAt),
  };

  await execute(
    `INSERT INTO audit_log
     (id, employee_id, date, action, description, old_value, new_value, reason, changed_by, changed_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
    [
      entry.id,
      entry.employeeId,
      entry.date,
      entry.action,
      entry.description,
      entry.oldValue,
      entry.newValue,
      entry.reason,
      entry.changedBy,
      entry.changedAt,
    ]
  );
  return entry;
}

export async function listAuditEntries(
  filter: { action?: AuditAction; employeeId?: string; limit?: number } = {}
): Promise<AuditLogEntry[]> {
  let query = 'SELECT * FROM audit_log WHERE 1=1';
  const params: unknown[] = [];
  if (filter.action) {
    query += ' AND action = ?';
    params.push(filter.action);
  }
  if (filter.employeeId) {
    query += ' AND employee_id = ?';
    params.push(filter.employeeId);
  }
  query += ' ORDER BY changed_at DESC, rowid DESC';
  if (filter.limit !== undefined) {
    query += ' LIMIT ?';
    params.push(filter.limit);
  }
  const rows = await select<AuditLogRow>(query, params);
  return rows.map(mapRowToEntry);
}

export async function countAuditEntriesBefore(cutoffDate: string): Promise<number> {
  const rows = await select<CountRow>(
    'SELECT COUNT(*) as count FROM audit_log WHERE changed_at < ?',
    [cutoffDate]
  );
  return rows[0]?.count ?? 0;
}

export async function deleteAuditEntriesBefore(cutoffDate: string): Promise<number> {
  const result = await execute('DELETE FROM audit_log WHERE changed_at < ?', [cutoffDate]);
  return result.rowsAffected;
}

export async function countAuditEntriesInRange(fromDate: string, toDate: string): Promise<number> {
  // toDate is inclusive, so compare against the start of the following day
  const rows = await select<CountRow>(
    "SELECT COUNT(*) as count FROM audit_log WHERE changed_at >= ? AND changed_at < date(?, '+1 day')",
    [fromDate, toDate]
  );
  return rows[0]?.count ?? 0;
}

export const auditLogRepository = {
  appendAuditEntry,
  listAuditEntries,
  countAuditEntriesBefore,
  deleteAuditEntriesBefore,
  countAuditEntriesInRange,
};
