/**
 * DailySummary Repository
 * CRUD operations for daily_summaries table
 */

import { randomUUID } from 'crypto';
import { execute, select } from '../database';
import { chunk, oneOf, parseJsonList } from '../utils/guards';
import { DAY_STATUSES, SUMMARY_FLAGS } from '../../types/models';
import type { DailySummary, DayStatus, SummaryFlag } from '../../types/models';
import type { DailySummaryRow, CountRow } from '../../types/api';

const IDS_PER_STATEMENT = 500;

/**
 * Map database row to DailySummary model
 */
function mapRowToSummary(row: DailySummaryRow): DailySummary {
  return {
    id: row.id,
    employeeId: row.employee_id,
    date: row.date,
    firstEntry: row.first_entry,
    lastExit: row.last_exit,
    totalSeconds: row.total_seconds,
    expectedSeconds: row.expected_seconds,
    overtimeSeconds: row.overtime_seconds,
    underworkSeconds: row.underwork_seconds,
    sessionsCount: row.sessions_count,
    status: oneOf(DAY_STATUSES, row.status, 'problem'),
    hasMissingExit: row.has_missing_exit === 1,
    hasManualCorrections: row.has_manual_corrections === 1,
    flags: parseJsonList(row.flags, SUMMARY_FLAGS),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Everything a recomputation produces for one employee-day
 */
export interface SummaryValues {
  employeeId: string;
  date: string;
  firstEntry: string | null;
  lastExit: string | null;
  totalSeconds: number;
  expectedSeconds: number;
  overtimeSeconds: number;
  underworkSeconds: number;
  sessionsCount: number;
  status: DayStatus;
  hasMissingExit: boolean;
  hasManualCorrections: boolean;
  flags: SummaryFlag[];
}

/**
 * Get summary for an employee on a specific date
 */
export async function getSummaryForPair(employeeId: string, date: string): Promise<DailySummary | null> {
  const rows = await select<DailySummaryRow>(
    'SELECT * FROM daily_summaries WHERE employee_id = ? AND date = ?',
    [employeeId, date]
  );
  const row = rows[0];
  return row ? mapRowToSummary(row) : null;
}

/**
 * Create or fully replace the summary of an employee-day.
 * Every column is overwritten; nothing from the previous row survives
 * except its id and created_at.
 */
export async function upsertSummary(summary: SummaryValues): Promise<DailySummary> {
  const timestamp = new Date().toISOString();

  await execute(
    `INSERT INTO daily_summaries
     (id, employee_id, date, first_entry, last_exit, total_seconds, expected_seconds,
      overtime_seconds, underwork_seconds, sessions_count, status, has_missing_exit,
      has_manual_corrections, flags, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
     ON CONFLICT(employee_id, date) DO UPDATE SET
       first_entry = excluded.first_entry,
       last_exit = excluded.last_exit,
       total_seconds = excluded.total_seconds,
       expected_seconds = excluded.expected_seconds,
       overtime_seconds = excluded.overtime_seconds,
       underwork_seconds = excluded.underwork_seconds,
       sessions_count = excluded.sessions_count,
       status = excluded.status,
       has_missing_exit = excluded.has_missing_exit,
       has_manual_corrections = excluded.has_manual_corrections,
       flags = excluded.flags,
       updated_at = excluded.updated_at`,
    [
      randomUUID(),
      summary.employeeId,
      summary.date,
      summary.firstEntry,
      summary.lastExit,
      summary.totalSeconds,
      summary.expectedSeconds,
      summary.overtimeSeconds,
      summary.underworkSeconds,
      summary.sessionsCount,
      summary.status,
      summary.hasMissingExit ? 1 : 0,
      summary.hasManualCorrections ? 1 : 0,
      JSON.stringify(summary.flags),
      timestamp,
      timestamp,
    ]
  );

  const result = await getSummaryForPair(summary.employeeId, summary.date);
  if (!result) {
    throw new Error(`Summary for ${summary.employeeId} on ${summary.date} was not written`);
  }
  return result;
}

/**
 * Get summaries of one employee for a date range
 */
export async function getSummariesForDateRange(
  employeeId: string,
  startDate: string,
  endDate: string
): Promise<DailySummary[]> {
  const rows = await select<DailySummaryRow>(
    `SELECT * FROM daily_summaries
     WHERE employee_id = ? AND date >= ? AND date <= ?
     ORDER BY date ASC`,
    [employeeId, startDate, endDate]
  );
  return rows.map(mapRowToSummary);
}

/**
 * Summaries of every employee in a date range, optionally one department
 */
export async function listSummariesInRange(
  fromDate: string,
  toDate: string,
  filter: { departmentId?: string } = {}
): Promise<DailySummary[]> {
  let query = `SELECT s.* FROM daily_summaries s
     JOIN employees e ON e.id = s.employee_id
     WHERE s.date >= ? AND s.date <= ?`;
  const params: unknown[] = [fromDate, toDate];
  if (filter.departmentId) {
    query += ' AND e.department_id = ?';
    params.push(filter.departmentId);
  }
  query += ' ORDER BY s.date ASC, s.employee_id ASC';
  const rows = await select<DailySummaryRow>(query, params);
  return rows.map(mapRowToSummary);
}

/**
 * Get all summaries for a specific date (all employees)
 */
export async function getSummariesForDate(date: string): Promise<DailySummary[]> {
  const rows = await select<DailySummaryRow>(
    'SELECT * FROM daily_summaries WHERE date = ? ORDER BY employee_id ASC',
    [date]
  );
  return rows.map(mapRowToSummary);
}

export async function deleteSummaryForPair(employeeId: string, date: string): Promise<number> {
  const result = await execute(
    'DELETE FROM daily_summaries WHERE employee_id = ? AND date = ?',
    [employeeId, date]
  );
  return result.rowsAffected;
}

/**
 * Count summaries in a date range, optionally for a set of employees
 */
export async function countSummariesInRange(
  fromDate: string,
  toDate: string,
  employeeIds?: string[]
): Promise<number> {
  if (employeeIds && employeeIds.length === 0) return 0;
  if (!employeeIds) {
    const rows = await select<CountRow>(
      'SELECT COUNT(*) as count FROM daily_summaries WHERE date >= ? AND date <= ?',
      [fromDate, toDate]
    );
    return rows[0]?.count ?? 0;
  }
  let total = 0;
  for (const ids of chunk(employeeIds, IDS_PER_STATEMENT)) {
    const placeholders = ids.map(() => '?').join(', ');
    const rows = await select<CountRow>(
      `SELECT COUNT(*) as count FROM daily_summaries
       WHERE date >= ? AND date <= ? AND employee_id IN (${placeholders})`,
      [fromDate, toDate, ...ids]
    );
    total += rows[0]?.count ?? 0;
  }
  return total;
}

export async function countAllSummaries(): Promise<number> {
  const rows = await select<CountRow>('SELECT COUNT(*) as count FROM daily_summaries');
  return rows[0]?.count ?? 0;
}

export async function countSummariesBefore(cutoffDate: string): Promise<number> {
  const rows = await select<CountRow>(
    'SELECT COUNT(*) as count FROM daily_summaries WHERE date < ?',
    [cutoffDate]
  );
  return rows[0]?.count ?? 0;
}

export async function deleteSummariesBefore(cutoffDate: string): Promise<number> {
  const result = await execute('DELETE FROM daily_summaries WHERE date < ?', [cutoffDate]);
  return result.rowsAffected;
}

export const dailySummaryRepository = {
  getSummaryForPair,
  upsertSummary,
  getSummariesForDateRange,
  listSummariesInRange,
  getSummariesForDate,
  deleteSummaryForPair,
  countSummariesInRange,
  countAllSummaries,
  countSummariesBefore,
  deleteSummariesBefore,
};
