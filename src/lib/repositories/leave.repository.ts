/**
 * Leave Repository
 * Vacations and business trips that excuse an employee from work
 */

import { randomUUID } from 'crypto';
import { execute, select } from '../database';
import { oneOf } from '../utils/guards';
import { LEAVE_KINDS, LEAVE_STATUSES } from '../../types/models';
import type { Leave, LeaveKind, LeaveStatus, CreateLeaveInput } from '../../types/models';
import type { LeaveRow } from '../../types/api';

/**
 * Statuses under which a leave actually covers its days
 */
export const APPROVED_LEAVE_STATUSES: Record<LeaveKind, readonly LeaveStatus[]> = {
  vacation: ['approved', 'taken'],
  business_trip: ['approved', 'in_progress'],
};

function mapRowToLeave(row: LeaveRow): Leave {
  return {
    id: row.id,
    employeeId: row.employee_id,
    kind: oneOf(LEAVE_KINDS, row.kind, 'vacation'),
    startDate: row.start_date,
    endDate: row.end_date,
    status: oneOf(LEAVE_STATUSES, row.status, 'planned'),
    note: row.note,
    createdAt: row.created_at,
  };
}

export function isApprovedLeave(leave: Pick<Leave, 'kind' | 'status'>): boolean {
  return APPROVED_LEAVE_STATUSES[leave.kind].includes(leave.status);
}

export async function getLeaveById(id: string): Promise<Leave | null> {
  const rows = await select<LeaveRow>('SELECT * FROM leaves WHERE id = ?', [id]);
  const row = rows[0];
  return row ? mapRowToLeave(row) : null;
}

export async function createLeave(data: CreateLeaveInput): Promise<Leave> {
  const id = randomUUID();
  await execute(
    `INSERT INTO leaves (id, employee_id, kind, start_date, end_date, status, note, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
    [id, data.employeeId, data.kind, data.startDate, data.endDate, data.status, data.note ?? null, new Date().toISOString()]
  );
  const leave = await getLeaveById(id);
  if (!leave) {
    throw new Error('Failed to create leave');
  }
  return leave;
}

export async function updateLeaveStatus(id: string, status: LeaveStatus): Promise<void> {
  await execute('UPDATE leaves SET status = ? WHERE id = ?', [status, id]);
}

/**
 * Leaves of one employee overlapping [startDate, endDate]
 */
export async function getLeavesForEmployee(
  employeeId: string,
  startDate: string,
  endDate: string
): Promise<Leave[]> {
  const rows = await select<LeaveRow>(
    `SELECT * FROM leaves
     WHERE employee_id = ? AND start_date <= ? AND end_date >= ?
     ORDER BY start_date ASC`,
    [employeeId, endDate, startDate]
  );
  return rows.map(mapRowToLeave);
}

/**
 * True when an approved vacation or trip covers the date
 */
export async function hasApprovedLeaveOn(employeeId: string, date: string): Promise<boolean> {
  const leaves = await getLeavesForEmployee(employeeId, date, date);
  return leaves.some(isApprovedLeave);
}

export const leaveRepository = {
  getLeaveById,
  createLeave,
  updateLeaveStatus,
  getLeavesForEmployee,
  hasApprovedLeaveOn,
};
