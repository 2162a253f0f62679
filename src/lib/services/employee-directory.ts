/**
 * Employee Directory
 *
 * Answers the calendar questions the aggregator needs: is this a work day
 * for the employee, is it covered by leave, how many seconds are expected.
 * Backed by the employees, leaves, holidays and settings tables.
 */

import { getEmployeeById } from '../repositories/employee.repository';
import { hasApprovedLeaveOn } from '../repositories/leave.repository';
import { isHoliday } from '../repositories/holiday.repository';
import { getDayOfWeek } from '../utils/date-time';
import type { Employee, WorkCalendarSettings } from '../../types/models';
import type { EmployeeDirectory } from '../../types/services';
import type { DayContext } from './summary-aggregator';

/**
 * Expected seconds for a full work day of this employee
 */
export function fullDaySeconds(employee: Pick<Employee, 'dailyHours' | 'workFraction'>): number {
  return Math.round(employee.dailyHours * employee.workFraction * 3600);
}

export class DatabaseEmployeeDirectory implements EmployeeDirectory {
  private employees = new Map<string, Employee | null>();
  private holidays = new Map<string, boolean>();

  constructor(private readonly calendar: WorkCalendarSettings) {}

  private async employee(employeeId: string): Promise<Employee | null> {
    if (!this.employees.has(employeeId)) {
      this.employees.set(employeeId, await getEmployeeById(employeeId));
    }
    return this.employees.get(employeeId) ?? null;
  }

  private async holiday(date: string): Promise<boolean> {
    const cached = this.holidays.get(date);
    if (cached !== undefined) return cached;
    const result = await isHoliday(date);
    this.holidays.set(date, result);
    return result;
  }

  async hasApprovedLeave(employeeId: string, date: string): Promise<boolean> {
    return hasApprovedLeaveOn(employeeId, date);
  }

  async isWorkDay(employeeId: string, date: string): Promise<boolean> {
    if (!this.calendar.workdays.includes(getDayOfWeek(date))) return false;
    if (await this.holiday(date)) return false;
    return !(await this.hasApprovedLeave(employeeId, date));
  }

  async expectedDailySeconds(employeeId: string, date: string): Promise<number> {
    const employee = await this.employee(employeeId);
    if (!employee || !(await this.isWorkDay(employeeId, date))) return 0;
    return fullDaySeconds(employee);
  }
}

/**
 * Gather the day context for one pair from any directory
 */
export async function resolveDayContext(
  directory: EmployeeDirectory,
  employeeId: string,
  date: string
): Promise<DayContext> {
  const [expectedSeconds, isWorkDay, hasApprovedLeave] = await Promise.all([
    directory.expectedDailySeconds(employeeId, date),
    directory.isWorkDay(employeeId, date),
    directory.hasApprovedLeave(employeeId, date),
  ]);
  return { expectedSeconds, isWorkDay, hasApprovedLeave };
}
