import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import {
  initTestDatabase,
  closeTestDatabase,
  resetTestDatabase,
  seedDevice,
  seedEmployee,
  seedWorkInterval,
} from '../test-utils';
import {
  calculateAttendanceRate,
  calculateEfficiency,
  getDepartmentStats,
  getEmployeeStats,
  getSystemStats,
  resolvePeriod,
  tallyStatuses,
  totalSummaries,
} from './stats-reporter';
import { runBatch } from './batch-processor';
import { createDepartment } from '../repositories/department.repository';
import { ConfigurationError } from '../errors';
import type { DailySummary, Department, Employee } from '../../types';

const FRIDAY = '2025-09-19';
const THURSDAY = '2025-09-18';
const PERIOD = { fromDate: THURSDAY, toDate: FRIDAY };

function summary(overrides: Partial<DailySummary>): DailySummary {
  return {
    id: 'summary-1',
    employeeId: 'employee-1',
    date: FRIDAY,
    firstEntry: null,
    lastExit: null,
    totalSeconds: 0,
    expectedSeconds: 28800,
    overtimeSeconds: 0,
    underworkSeconds: 0,
    sessionsCount: 0,
    status: 'present',
    flags: [],
    hasMissingExit: false,
    hasManualCorrections: false,
    createdAt: '2025-09-19T18:00:00.000Z',
    updatedAt: '2025-09-19T18:00:00.000Z',
    ...overrides,
  };
}

describe('Stats Reporter', () => {
  describe('calculations', () => {
    it('should express efficiency as a percentage with one decimal', () => {
      expect(calculateEfficiency(25200, 28800)).toBe(87.5);
      expect(calculateEfficiency(39600, 57600)).toBe(68.8);
      expect(calculateEfficiency(3600, 0)).toBe(0);
    });

    it('should leave excused days out of the attendance rate', () => {
      expect(calculateAttendanceRate({ present: 3, partial: 1, absent: 1, problem: 0, excused: 2 })).toBe(80);
      expect(calculateAttendanceRate({ present: 0, partial: 0, absent: 0, problem: 0, excused: 4 })).toBe(0);
    });

    it('should tally summaries by status', () => {
      const tally = tallyStatuses([{ status: 'present' }, { status: 'absent' }, { status: 'present' }]);
      expect(tally).toEqual({ present: 2, absent: 1, excused: 0, partial: 0, problem: 0 });
    });

    it('should total worked time and problem days', () => {
      const totals = totalSummaries([
        summary({ totalSeconds: 28800 }),
        summary({ totalSeconds: 3600, status: 'problem', hasMissingExit: true, hasManualCorrections: true }),
      ]);

      expect(totals.days).toBe(2);
      expect(totals.workedSeconds).toBe(32400);
      expect(totals.expectedSeconds).toBe(57600);
      expect(totals.missingExitDays).toBe(1);
      expect(totals.manualCorrectionDays).toBe(1);
      expect(totals.problemDays).toBe(1);
      expect(totals.averageWorkedSeconds).toBe(16200);
      expect(totals.efficiency).toBe(56.3);
    });

    it('should default to the 30 days ending today', () => {
      expect(resolvePeriod({}, new Date(2025, 8, 30, 12, 0, 0))).toEqual({ fromDate: '2025-09-01', toDate: '2025-09-30' });
    });

    it('should reject a reversed period', () => {
      expect(() => resolvePeriod({ fromDate: FRIDAY, toDate: THURSDAY })).toThrow(ConfigurationError);
    });
  });

  describe('reports', () => {
    let department: Department;
    let employee: Employee;

    beforeAll(async () => {
      await initTestDatabase();
    });

    beforeEach(async () => {
      await resetTestDatabase();
      department = await createDepartment({ name: 'Operations' });
      employee = await seedEmployee({ departmentId: department.id });
      const device = await seedDevice();
      await seedWorkInterval(employee, device, THURSDAY, '09:00', '17:00');
      await seedWorkInterval(employee, device, FRIDAY, '09:00', '12:00');
      await runBatch();
    });

    afterAll(async () => {
      await closeTestDatabase();
    });

    it('should report a department over the period', async () => {
      const [stats] = await getDepartmentStats(PERIOD, department.id);

      expect(stats?.name).toBe('Operations');
      expect(stats?.memberCount).toBe(1);
      expect(stats?.summaries.days).toBe(2);
      expect(stats?.summaries.workedSeconds).toBe(39600);
      expect(stats?.summaries.byStatus).toEqual({ present: 1, absent: 0, excused: 0, partial: 1, problem: 0 });
      expect(stats?.summaries.efficiency).toBe(68.8);
      expect(stats?.attendanceRate).toBe(100);
    });

    it('should list every department', async () => {
      await createDepartment({ name: 'Archive' });

      const stats = await getDepartmentStats(PERIOD);

      expect(stats.map((entry) => entry.name)).toEqual(['Operations', 'Archive']);
    });

    it('should reject an unknown department', async () => {
      await expect(getDepartmentStats(PERIOD, 'missing')).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should average an employee over calendar days', async () => {
      const stats = await getEmployeeStats(employee.id, PERIOD);

      expect(stats.employeeCode).toBe(employee.employeeCode);
      expect(stats.calendarDays).toBe(2);
      expect(stats.summaries.workedSeconds).toBe(39600);
      expect(stats.averageDailySeconds).toBe(19800);
    });

    it('should count system-wide records', async () => {
      const stats = await getSystemStats(PERIOD);

      expect(stats.employees).toEqual({ active: 1, inactive: 0 });
      expect(stats.devices).toEqual({ active: 1, inactive: 0 });
      expect(stats.events.total).toBe(4);
      expect(stats.events.unprocessed).toBe(0);
      expect(stats.events.byType).toEqual({ entry: 2, exit: 2, denied: 0, alarm: 0 });
      expect(stats.sessions).toEqual({ total: 2, inPeriod: 2, open: 0 });
      expect(stats.summariesTotal).toBe(2);
      expect(stats.summaries.days).toBe(2);
    });
  });
});
