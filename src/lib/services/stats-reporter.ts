/**
 * Stats Reporter
 * Read-only statistics over engine output for a date range
 */

import { ConfigurationError } from '../errors';
import { ErrorCodes } from '../../types/api';
import { parseOptions, statsPeriodSchema } from '../validation';
import { getEmployeeById, getEmployeeCounts } from '../repositories/employee.repository';
import { getDepartmentById, listDepartments } from '../repositories/department.repository';
import { listDevices } from '../repositories/device.repository';
import { getEventTotals, type EventTotals } from '../repositories/access-event.repository';
import { getSessionTotals } from '../repositories/work-session.repository';
import { countAllSummaries, getSummariesForDateRange, listSummariesInRange } from '../repositories/daily-summary.repository';
import { countAuditEntriesInRange } from '../repositories/audit-log.repository';
import { addDays, enumerateDates, formatDate } from '../utils/date-time';
import type { DailySummary, DayStatus } from '../../types/models';

export type StatusTally = Record<DayStatus, number>;

export interface StatsPeriod {
  fromDate: string;
  toDate: string;
}

/**
 * Totals over a set of daily summaries
 */
export interface SummaryTotals {
  days: number;
  byStatus: StatusTally;
  workedSeconds: number;
  expectedSeconds: number;
  overtimeSeconds: number;
  underworkSeconds: number;
  missingExitDays: number;
  manualCorrectionDays: number;
  /** Days with a missing exit or a manual correction */
  problemDays: number;
  averageWorkedSeconds: number;
  /** Worked over expected, in percent with one decimal */
  efficiency: number;
}

export interface SystemStats {
  period: StatsPeriod;
  employees: { active: number; inactive: number };
  devices: { active: number; inactive: number };
  events: EventTotals;
  sessions: { total: number; inPeriod: number; open: number };
  /** All stored summaries, whatever their date */
  summariesTotal: number;
  summaries: SummaryTotals;
  auditEntries: number;
}

export interface DepartmentStats {
  departmentId: string;
  name: string;
  memberCount: number;
  period: StatsPeriod;
  summaries: SummaryTotals;
  /** Share of work-day summaries that are present or partial, in percent */
  attendanceRate: number;
}

export interface EmployeeStats {
  employeeId: string;
  employeeCode: string;
  fullName: string;
  period: StatsPeriod;
  summaries: SummaryTotals;
  calendarDays: number;
  /** Worked seconds over every calendar day of the period */
  averageDailySeconds: number;
}

const DEFAULT_PERIOD_DAYS = 30;

export function emptyTally(): StatusTally {
  return { present: 0, absent: 0, excused: 0, partial: 0, problem: 0 };
}

/**
 * Count summaries by status
 */
export function tallyStatuses(summaries: readonly Pick<DailySummary, 'status'>[]): StatusTally {
  const tally = emptyTally();
  for (const summary of summaries) {
    tally[summary.status]++;
  }
  return tally;
}

export function calculateEfficiency(workedSeconds: number, expectedSeconds: number): number {
  if (expectedSeconds <= 0) return 0;
  return Math.round((workedSeconds / expectedSeconds) * 1000) / 10;
}

export function totalSummaries(summaries: readonly DailySummary[]): SummaryTotals {
  let workedSeconds = 0;
  let expectedSeconds = 0;
  let overtimeSeconds = 0;
  let underworkSeconds = 0;
  let missingExitDays = 0;
  let manualCorrectionDays = 0;
  let problemDays = 0;

  for (const summary of summaries) {
    workedSeconds += summary.totalSeconds;
    expectedSeconds += summary.expectedSeconds;
    overtimeSeconds += summary.overtimeSeconds;
    underworkSeconds += summary.underworkSeconds;
    if (summary.hasMissingExit) missingExitDays++;
    if (summary.hasManualCorrections) manualCorrectionDays++;
    if (summary.hasMissingExit || summary.hasManualCorrections) problemDays++;
  }

  return {
    days: summaries.length,
    byStatus: tallyStatuses(summaries),
    workedSeconds,
    expectedSeconds,
    overtimeSeconds,
    underworkSeconds,
    missingExitDays,
    manualCorrectionDays,
    problemDays,
    averageWorkedSeconds: summaries.length > 0 ? Math.round(workedSeconds / summaries.length) : 0,
    efficiency: calculateEfficiency(workedSeconds, expectedSeconds),
  };
}

/**
 * Present or partial days over days that were expected to be worked
 */
export function calculateAttendanceRate(tally: StatusTally): number {
  const attended = tally.present + tally.partial;
  const expected = attended + tally.absent + tally.problem;
  if (expected === 0) return 0;
  return Math.round((attended / expected) * 1000) / 10;
}

/**
 * Default to the last 30 days ending today
 */
export function resolvePeriod(period: Partial<StatsPeriod> = {}, now: Date = new Date()): StatsPeriod {
  const parsed = parseOptions(statsPeriodSchema, period, 'stats period');
  const toDate = parsed.toDate ?? formatDate(now);
  const fromDate = parsed.fromDate ?? addDays(toDate, -(DEFAULT_PERIOD_DAYS - 1));
  if (fromDate > toDate) {
    throw new ConfigurationError('fromDate must not be after toDate', { fromDate, toDate });
  }
  return { fromDate, toDate };
}

export async function getSystemStats(period: Partial<StatsPeriod> = {}): Promise<SystemStats> {
  const range = resolvePeriod(period);
  const [employees, devices, events, sessions, summariesTotal, summaries, auditEntries] = await Promise.all([
    getEmployeeCounts(),
    listDevices(),
    getEventTotals(range.fromDate, range.toDate),
    getSessionTotals(range.fromDate, range.toDate),
    countAllSummaries(),
    listSummariesInRange(range.fromDate, range.toDate),
    countAuditEntriesInRange(range.fromDate, range.toDate),
  ]);
  const activeDevices = devices.filter((device) => device.isActive).length;

  return {
    period: range,
    employees,
    devices: { active: activeDevices, inactive: devices.length - activeDevices },
    events,
    sessions,
    summariesTotal,
    summaries: totalSummaries(summaries),
    auditEntries,
  };
}

async function statsForDepartment(
  department: { id: string; name: string; memberCount: number },
  range: StatsPeriod
): Promise<DepartmentStats> {
  const summaries = totalSummaries(
    await listSummariesInRange(range.fromDate, range.toDate, { departmentId: department.id })
  );
  return {
    departmentId: department.id,
    name: department.name,
    memberCount: department.memberCount,
    period: range,
    summaries,
    attendanceRate: calculateAttendanceRate(summaries.byStatus),
  };
}

/**
 * Stats of every department, most worked first, or of one department
 */
export async function getDepartmentStats(
  period: Partial<StatsPeriod> = {},
  departmentId?: string
): Promise<DepartmentStats[]> {
  const range = resolvePeriod(period);
  if (departmentId) {
    const department = await getDepartmentById(departmentId);
    if (!department) {
      throw new ConfigurationError(`Unknown department: ${departmentId}`, { departmentId }, ErrorCodes.DB_NOT_FOUND);
    }
    return [await statsForDepartment(department, range)];
  }
  const departments = await listDepartments();
  const stats: DepartmentStats[] = [];
  for (const department of departments) {
    stats.push(await statsForDepartment(department, range));
  }
  return stats.sort((a, b) => b.summaries.workedSeconds - a.summaries.workedSeconds);
}

export async function getEmployeeStats(
  employeeId: string,
  period: Partial<StatsPeriod> = {}
): Promise<EmployeeStats> {
  const range = resolvePeriod(period);
  const employee = await getEmployeeById(employeeId);
  if (!employee) {
    throw new ConfigurationError(`Unknown employee: ${employeeId}`, { employeeId }, ErrorCodes.DB_NOT_FOUND);
  }
  const summaries = totalSummaries(await getSummariesForDateRange(employeeId, range.fromDate, range.toDate));
  const calendarDays = enumerateDates(range.fromDate, range.toDate).length;

  return {
    employeeId: employee.id,
    employeeCode: employee.employeeCode,
    fullName: employee.fullName,
    period: range,
    summaries,
    calendarDays,
    averageDailySeconds: Math.round(summaries.workedSeconds / calendarDays),
  };
}

export const statsReporter = {
  getSystemStats,
  getDepartmentStats,
  getEmployeeStats,
  tallyStatuses,
  calculateEfficiency,
  calculateAttendanceRate,
};
