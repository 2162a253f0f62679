import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import {
  initTestDatabase,
  closeTestDatabase,
  resetTestDatabase,
  seedDevice,
  seedEmployee,
  seedEvent,
  seedWorkInterval,
} from '../test-utils';
import { closeOpenSessions, createManualSession } from './session-admin';
import { runBatch } from './batch-processor';
import { getSummaryForPair } from '../repositories/daily-summary.repository';
import { getSessionsForPair } from '../repositories/work-session.repository';
import { listAuditEntries } from '../repositories/audit-log.repository';
import { ConfigurationError } from '../errors';
import type { Device, Employee } from '../../types';

const FRIDAY = '2025-09-19';

describe('Session administration', () => {
  let employee: Employee;
  let device: Device;

  beforeAll(async () => {
    await initTestDatabase();
  });

  beforeEach(async () => {
    await resetTestDatabase();
    employee = await seedEmployee();
    device = await seedDevice();
  });

  afterAll(async () => {
    await closeTestDatabase();
  });

  describe('closeOpenSessions', () => {
    beforeEach(async () => {
      await seedEvent(employee, device, 'entry', `${FRIDAY}T09:00:00`);
      await runBatch();
    });

    it('should close the session, audit it and recompute the day', async () => {
      const result = await closeOpenSessions({
        employeeId: employee.id,
        reason: 'forgot to badge out',
        closedBy: 'admin',
        closedAt: `${FRIDAY}T17:00:00`,
      });

      expect(result.closed).toBe(1);
      expect(result.skipped).toBe(0);
      expect(result.summariesRecomputed).toBe(1);

      const sessions = await getSessionsForPair(employee.id, FRIDAY);
      expect(sessions).toHaveLength(1);
      expect(sessions[0]?.id).toBe(result.sessionIds[0]);
      expect(sessions[0]?.status).toBe('closed_manual');
      expect(sessions[0]?.endTime).toBe('2025-09-19T17:00:00');
      expect(sessions[0]?.durationSeconds).toBe(28800);
      expect(sessions[0]?.manualReason).toBe('forgot to badge out');
      expect(sessions[0]?.correctedBy).toBe('admin');

      const summary = await getSummaryForPair(employee.id, FRIDAY);
      expect(summary?.status).toBe('present');
      expect(summary?.hasMissingExit).toBe(false);
      expect(summary?.hasManualCorrections).toBe(true);
      expect(summary?.totalSeconds).toBe(28800);

      const entries = await listAuditEntries({ action: 'close_session' });
      expect(entries).toHaveLength(1);
      expect(entries[0]?.reason).toBe('forgot to badge out');
      expect(entries[0]?.changedBy).toBe('admin');
    });

    it('should keep the closed session on later reprocessing', async () => {
      await closeOpenSessions({ reason: 'forgot to badge out', closedBy: 'admin', closedAt: `${FRIDAY}T17:00:00` });

      await runBatch({ forceProcess: true });

      const sessions = await getSessionsForPair(employee.id, FRIDAY);
      expect(sessions.map((session) => session.status)).toEqual(['closed_manual']);
    });

    it('should skip sessions that start after the close time', async () => {
      const result = await closeOpenSessions({
        reason: 'end of shift',
        closedBy: 'admin',
        closedAt: `${FRIDAY}T08:00:00`,
      });

      expect(result).toEqual({ closed: 0, skipped: 1, sessionIds: [], summariesRecomputed: 0 });
      expect((await getSessionsForPair(employee.id, FRIDAY))[0]?.status).toBe('open');
    });

    it('should require a reason', async () => {
      await expect(closeOpenSessions({ reason: ' ', closedBy: 'admin' })).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should reject an unknown employee', async () => {
      await expect(closeOpenSessions({ employeeId: 'missing', reason: 'test', closedBy: 'admin' }))
        .rejects.toThrow('Unknown employee: missing');
    });
  });

  describe('createManualSession', () => {
    it('should record a manual session and summarize the day', async () => {
      const { session, outcome } = await createManualSession({
        employeeId: employee.id,
        startTime: `${FRIDAY}T09:00:00`,
        endTime: `${FRIDAY}T17:00:00`,
        reason: 'offsite workshop',
        createdBy: 'admin',
      });

      expect(session.status).toBe('manual');
      expect(session.date).toBe(FRIDAY);
      expect(session.durationSeconds).toBe(28800);
      expect(outcome.status).toBe('present');
      expect(await listAuditEntries({ action: 'create_session' })).toHaveLength(1);
    });

    it('should override a derived session with the same start', async () => {
      await seedWorkInterval(employee, device, FRIDAY, '09:00', '17:00');
      await runBatch();

      await createManualSession({
        employeeId: employee.id,
        startTime: `${FRIDAY}T09:00:00`,
        endTime: `${FRIDAY}T18:00:00`,
        reason: 'stayed for a release',
        createdBy: 'admin',
      });

      const sessions = await getSessionsForPair(employee.id, FRIDAY);
      expect(sessions.map((session) => session.status)).toEqual(['manual']);
      const summary = await getSummaryForPair(employee.id, FRIDAY);
      expect(summary?.totalSeconds).toBe(32400);
      expect(summary?.overtimeSeconds).toBe(3600);
    });

    it('should flag a manual session overlapping a derived one', async () => {
      await seedWorkInterval(employee, device, FRIDAY, '09:00', '17:00');
      await runBatch();

      const { outcome } = await createManualSession({
        employeeId: employee.id,
        startTime: `${FRIDAY}T16:00:00`,
        endTime: `${FRIDAY}T18:00:00`,
        reason: 'late meeting',
        createdBy: 'admin',
      });

      expect(outcome.status).toBe('problem');
    });

    it('should reject an end before the start', async () => {
      await expect(createManualSession({
        employeeId: employee.id,
        startTime: `${FRIDAY}T18:00:00`,
        endTime: `${FRIDAY}T09:00:00`,
        reason: 'typo',
        createdBy: 'admin',
      })).rejects.toBeInstanceOf(ConfigurationError);
    });
  });
});
