/**
 * Tests for Batch Processor
 *
 * Property 5: Incremental runs are idempotent
 * Property 6: A dry run reports what a real run writes
 */

import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import {
  initTestDatabase,
  closeTestDatabase,
  resetTestDatabase,
  countRows,
  seedDevice,
  seedEmployee,
  seedEvent,
  seedWorkInterval,
  testExecute,
} from '../test-utils';
import { getDatabase } from '../database';
import { runBatch } from './batch-processor';
import { getSummaryForPair } from '../repositories/daily-summary.repository';
import { getSessionsForPair } from '../repositories/work-session.repository';
import { listAuditEntries } from '../repositories/audit-log.repository';
import { fetchUnprocessed, recordEvent } from '../repositories/access-event.repository';
import { ConfigurationError } from '../errors';
import type { Device, Employee, ProgressUpdate } from '../../types';

const FRIDAY = '2025-09-19';
const THURSDAY = '2025-09-18';

describe('Batch Processor', () => {
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

  it('should turn a full day into one session and a present summary', async () => {
    await seedWorkInterval(employee, device, FRIDAY, '09:00', '17:00');

    const report = await runBatch();

    expect(report.status).toBe('success');
    expect(report.mode).toBe('incremental');
    expect(report.pairs).toEqual({ total: 1, processed: 1, skipped: 0, failed: 0 });
    expect(report.eventsProcessed).toBe(2);
    expect(report.sessionsCreated).toBe(1);
    expect(report.summariesCreated).toBe(1);

    const summary = await getSummaryForPair(employee.id, FRIDAY);
    expect(summary?.status).toBe('present');
    expect(summary?.totalSeconds).toBe(28800);
    expect(summary?.expectedSeconds).toBe(28800);
    expect(summary?.overtimeSeconds).toBe(0);
    expect(summary?.underworkSeconds).toBe(0);
  });

  it('should leave an entry without exit as an open session and a problem day', async () => {
    await seedEvent(employee, device, 'entry', `${FRIDAY}T09:00:00`);

    await runBatch();

    const sessions = await getSessionsForPair(employee.id, FRIDAY);
    expect(sessions).toHaveLength(1);
    expect(sessions[0]?.status).toBe('open');
    expect(sessions[0]?.endTime).toBeNull();

    const summary = await getSummaryForPair(employee.id, FRIDAY);
    expect(summary?.status).toBe('problem');
    expect(summary?.hasMissingExit).toBe(true);
  });

  it('should mark 09:00-12:00 plus 13:00-17:00 as partial with one hour underwork', async () => {
    await seedWorkInterval(employee, device, FRIDAY, '09:00', '12:00');
    await seedWorkInterval(employee, device, FRIDAY, '13:00', '17:00');

    await runBatch();

    const summary = await getSummaryForPair(employee.id, FRIDAY);
    expect(summary?.totalSeconds).toBe(25200);
    expect(summary?.status).toBe('partial');
    expect(summary?.underworkSeconds).toBe(3600);
    expect(summary?.sessionsCount).toBe(2);
  });

  it('should scale expected seconds by the work fraction', async () => {
    const halfTime = await seedEmployee({ workFraction: 0.5 });
    await seedWorkInterval(halfTime, device, FRIDAY, '09:00', '13:00');

    await runBatch();

    const summary = await getSummaryForPair(halfTime.id, FRIDAY);
    expect(summary?.expectedSeconds).toBe(14400);
    expect(summary?.status).toBe('present');
  });

  it('should close the open session when the exit arrives later', async () => {
    await seedEvent(employee, device, 'entry', `${FRIDAY}T09:00:00`);
    await runBatch();

    await seedEvent(employee, device, 'exit', `${FRIDAY}T17:00:00`);
    const report = await runBatch();

    expect(report.sessionsClosed).toBe(1);
    expect(report.sessionsCreated).toBe(0);
    expect(report.summariesReplaced).toBe(1);

    const sessions = await getSessionsForPair(employee.id, FRIDAY);
    expect(sessions).toHaveLength(1);
    expect(sessions[0]?.status).toBe('auto');
    expect(sessions[0]?.durationSeconds).toBe(28800);
    expect((await getSummaryForPair(employee.id, FRIDAY))?.status).toBe('present');
  });

  describe('Property 5: Incremental runs are idempotent', () => {
    it('should write nothing on a second run over the same input', async () => {
      await seedWorkInterval(employee, device, THURSDAY, '08:30', '17:15');
      await seedWorkInterval(employee, device, FRIDAY, '09:00', '17:00');

      await runBatch();
      const sessionsAfterFirst = await getSessionsForPair(employee.id, FRIDAY);
      const summaryAfterFirst = await getSummaryForPair(employee.id, FRIDAY);
      const auditAfterFirst = countRows('audit_log');

      const second = await runBatch();

      expect(second.pairs.total).toBe(0);
      expect(second.summariesWritten).toBe(0);
      expect(second.sessionsCreated).toBe(0);
      expect(await getSessionsForPair(employee.id, FRIDAY)).toEqual(sessionsAfterFirst);
      expect(await getSummaryForPair(employee.id, FRIDAY)).toEqual(summaryAfterFirst);
      expect(countRows('audit_log')).toBe(auditAfterFirst);
    });
  });

  describe('Property 6: A dry run reports what a real run writes', () => {
    it('should report the same counts and leave storage untouched', async () => {
      await seedWorkInterval(employee, device, FRIDAY, '09:00', '12:00');
      await seedEvent(employee, device, 'entry', `${FRIDAY}T13:00:00`);

      const dry = await runBatch({ dryRun: true });

      expect(dry.dryRun).toBe(true);
      expect(countRows('work_sessions')).toBe(0);
      expect(countRows('daily_summaries')).toBe(0);
      expect(countRows('audit_log')).toBe(0);

      const real = await runBatch();

      expect(dry.pairs).toEqual(real.pairs);
      expect(dry.eventsProcessed).toBe(real.eventsProcessed);
      expect(dry.sessionsCreated).toBe(real.sessionsCreated);
      expect(dry.summariesWritten).toBe(real.summariesWritten);
      expect(countRows('work_sessions')).toBe(2);
    });
  });

  it('should re-derive processed pairs when forced', async () => {
    await seedWorkInterval(employee, device, FRIDAY, '09:00', '17:00');
    await runBatch();

    const report = await runBatch({ forceProcess: true });

    expect(report.mode).toBe('reprocess');
    expect(report.pairs.processed).toBe(1);
    expect(report.sessionsCreated).toBe(0);
    expect(report.summariesReplaced).toBe(1);
    expect(countRows('work_sessions')).toBe(1);
  });

  it('should select only the pairs of the given device', async () => {
    const side = await seedDevice('Side door');
    await seedWorkInterval(employee, device, THURSDAY, '09:00', '17:00');
    await seedWorkInterval(employee, side, FRIDAY, '09:00', '17:00');

    const report = await runBatch({ selector: { deviceId: side.id } });

    expect(report.completedPairs).toEqual([{ employeeId: employee.id, date: FRIDAY }]);
    expect(await getSummaryForPair(employee.id, THURSDAY)).toBeNull();
  });

  it('should write one audit entry per batch that processed pairs', async () => {
    await seedWorkInterval(employee, device, THURSDAY, '09:00', '17:00');
    await seedWorkInterval(employee, device, FRIDAY, '09:00', '17:00');

    const report = await runBatch({ batchSize: 1, actor: 'scheduler' });

    expect(report.batches.map((batch) => batch.processed)).toEqual([1, 1]);
    const entries = await listAuditEntries({ action: 'batch_process' });
    expect(entries).toHaveLength(2);
    expect(entries.every((entry) => entry.changedBy === 'scheduler')).toBe(true);
  });

  it('should stop between batches when interrupted and keep the finished batch', async () => {
    await seedWorkInterval(employee, device, THURSDAY, '09:00', '17:00');
    await seedWorkInterval(employee, device, FRIDAY, '09:00', '17:00');
    const controller = new AbortController();
    const phases: ProgressUpdate['phase'][] = [];

    const report = await runBatch({
      batchSize: 1,
      signal: controller.signal,
      onProgress: (progress) => {
        phases.push(progress.phase);
        if (progress.phase === 'processing') controller.abort();
      },
    });

    expect(report.interrupted).toBe(true);
    expect(report.status).toBe('partial');
    expect(report.completedPairs).toEqual([{ employeeId: employee.id, date: THURSDAY }]);
    expect(await getSummaryForPair(employee.id, THURSDAY)).not.toBeNull();
    expect(await getSummaryForPair(employee.id, FRIDAY)).toBeNull();
    expect(phases).toEqual(['selecting', 'processing', 'complete']);
  });

  it('should roll back a failing pair and finish the others as partial', async () => {
    const other = await seedEmployee();
    await seedWorkInterval(employee, device, FRIDAY, '09:00', '17:00');
    await seedWorkInterval(other, device, FRIDAY, '09:00', '17:00');
    testExecute(`CREATE TRIGGER fail_summary BEFORE INSERT ON daily_summaries
      WHEN NEW.employee_id = '${other.id}' BEGIN SELECT RAISE(ABORT, 'summary blocked'); END`);
    try {
      const report = await runBatch();

      expect(report.status).toBe('partial');
      expect(report.pairs).toEqual({ total: 2, processed: 1, skipped: 0, failed: 1 });
      expect(report.failures).toHaveLength(1);
      expect(report.failures[0]?.employeeId).toBe(other.id);
      expect(report.failures[0]?.date).toBe(FRIDAY);
      expect(report.failures[0]?.error).toContain('summary blocked');
      expect(report.completedPairs).toEqual([{ employeeId: employee.id, date: FRIDAY }]);

      expect(await getSessionsForPair(other.id, FRIDAY)).toEqual([]);
      expect(await getSummaryForPair(other.id, FRIDAY)).toBeNull();
      expect(await fetchUnprocessed({ employeeId: other.id })).toHaveLength(2);
      expect((await getSummaryForPair(employee.id, FRIDAY))?.status).toBe('present');
      expect(countRows('work_sessions')).toBe(1);
    } finally {
      testExecute('DROP TRIGGER fail_summary');
    }
  });

  it('should abort when storage goes away and list the pairs finished before', async () => {
    await seedWorkInterval(employee, device, THURSDAY, '09:00', '17:00');
    await seedWorkInterval(employee, device, FRIDAY, '09:00', '17:00');

    try {
      const report = await runBatch({
        batchSize: 1,
        onProgress: (progress) => {
          if (progress.phase === 'processing' && progress.current === 1) getDatabase().close();
        },
      });

      expect(report.aborted).toBe(true);
      expect(report.abortReason).toContain('Database not initialized');
      expect(report.status).toBe('partial');
      expect(report.pairs.processed).toBe(1);
      expect(report.pairs.failed).toBe(0);
      expect(report.failures).toEqual([]);
      expect(report.completedPairs).toEqual([{ employeeId: employee.id, date: THURSDAY }]);
    } finally {
      await closeTestDatabase();
      await initTestDatabase();
    }
  });

  it('should count anomalies only for events processed in this run', async () => {
    await seedEvent(employee, device, 'entry', `${FRIDAY}T09:00:00`);
    await seedEvent(employee, device, 'entry', `${FRIDAY}T09:05:00`);
    const first = await runBatch();

    await seedEvent(employee, device, 'exit', `${FRIDAY}T17:00:00`);
    const second = await runBatch();

    expect(first.anomalies.duplicateEntries).toBe(1);
    expect(second.anomalies).toEqual({ duplicateEntries: 0, orphanExits: 0, nonAttendanceEvents: 0, shortSessions: 0 });
    expect(second.sessionsClosed).toBe(1);
  });

  it('should count events without an employee and leave them unprocessed', async () => {
    await recordEvent({ deviceId: device.id, cardNumber: 'UNKNOWN-CARD', eventType: 'entry', timestamp: `${FRIDAY}T09:00:00` });

    const report = await runBatch();

    expect(report.unassignedEvents).toBe(1);
    expect(report.pairs.total).toBe(0);
  });

  it('should resolve the employee from the card number', async () => {
    await recordEvent({ deviceId: device.id, cardNumber: employee.employeeCode, eventType: 'entry', timestamp: `${FRIDAY}T09:00:00` });
    await recordEvent({ deviceId: device.id, cardNumber: employee.employeeCode, eventType: 'exit', timestamp: `${FRIDAY}T10:00:00` });

    const report = await runBatch();

    expect(report.unassignedEvents).toBe(0);
    expect((await getSummaryForPair(employee.id, FRIDAY))?.totalSeconds).toBe(3600);
  });

  it('should reject an unknown employee before any write', async () => {
    await seedWorkInterval(employee, device, FRIDAY, '09:00', '17:00');

    await expect(runBatch({ selector: { employeeId: 'missing' } })).rejects.toBeInstanceOf(ConfigurationError);
    expect(countRows('work_sessions')).toBe(0);
  });

  it('should reject a non-positive batch size', async () => {
    await expect(runBatch({ batchSize: 0 })).rejects.toThrow('Invalid batch size');
  });
});
