/**
 * Property-based tests for Summary Aggregator
 *
 * Property 3: Total equals the sum of closed session durations
 * Property 4: Overtime and underwork balance
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  aggregateDay,
  classifyDay,
  hasManualInconsistency,
  STATUS_RULES,
  type AggregatedSession,
  type DayContext,
  type SummaryFacts,
} from './summary-aggregator';

const DATE = '2025-09-19';

const WORK_DAY: DayContext = { expectedSeconds: 28800, isWorkDay: true, hasApprovedLeave: false };
const LEAVE_DAY: DayContext = { expectedSeconds: 0, isWorkDay: false, hasApprovedLeave: true };
const REST_DAY: DayContext = { expectedSeconds: 0, isWorkDay: false, hasApprovedLeave: false };

function at(time: string): string {
  return `${DATE}T${time}:00`;
}

function closed(from: string, to: string, seconds: number, status: AggregatedSession['status'] = 'auto'): AggregatedSession {
  return { startTime: at(from), endTime: at(to), status, durationSeconds: seconds, manualReason: null };
}

function aggregate(sessions: AggregatedSession[], context: DayContext = WORK_DAY) {
  return aggregateDay({ employeeId: 'emp-1', date: DATE, sessions, context });
}

function facts(overrides: Partial<SummaryFacts>): SummaryFacts {
  return {
    sessionsCount: 1,
    totalSeconds: 28800,
    expectedSeconds: 28800,
    hasMissingExit: false,
    hasManualInconsistency: false,
    isWorkDay: true,
    hasApprovedLeave: false,
    ...overrides,
  };
}

describe('Summary Aggregator', () => {
  it('should mark a full day as present', () => {
    const summary = aggregate([closed('09:00', '17:00', 28800)]);

    expect(summary).toEqual({
      employeeId: 'emp-1',
      date: DATE,
      firstEntry: '2025-09-19T09:00:00',
      lastExit: '2025-09-19T17:00:00',
      totalSeconds: 28800,
      expectedSeconds: 28800,
      overtimeSeconds: 0,
      underworkSeconds: 0,
      sessionsCount: 1,
      status: 'present',
      hasMissingExit: false,
      hasManualCorrections: false,
      flags: [],
    });
  });

  it('should mark a day with an open session as a problem', () => {
    const summary = aggregate([
      { startTime: at('09:00'), endTime: null, status: 'open', durationSeconds: 0, manualReason: null },
    ]);

    expect(summary.status).toBe('problem');
    expect(summary.hasMissingExit).toBe(true);
    expect(summary.totalSeconds).toBe(0);
    expect(summary.firstEntry).toBe('2025-09-19T09:00:00');
    expect(summary.lastExit).toBeNull();
    expect(summary.flags).toEqual(['missing_exit']);
  });

  it('should mark two short sessions as partial with the missing hour as underwork', () => {
    const summary = aggregate([closed('09:00', '12:00', 10800), closed('13:00', '17:00', 14400)]);

    expect(summary.totalSeconds).toBe(25200);
    expect(summary.status).toBe('partial');
    expect(summary.underworkSeconds).toBe(3600);
    expect(summary.overtimeSeconds).toBe(0);
    expect(summary.sessionsCount).toBe(2);
    expect(summary.lastExit).toBe('2025-09-19T17:00:00');
  });

  it('should count overtime beyond the expected seconds', () => {
    const summary = aggregate([closed('08:00', '18:00', 36000)]);

    expect(summary.status).toBe('present');
    expect(summary.overtimeSeconds).toBe(7200);
    expect(summary.underworkSeconds).toBe(0);
  });

  it('should mark an empty work day as absent', () => {
    const summary = aggregate([]);

    expect(summary.status).toBe('absent');
    expect(summary.firstEntry).toBeNull();
    expect(summary.underworkSeconds).toBe(28800);
    expect(summary.flags).toEqual([]);
  });

  it('should excuse an empty day covered by approved leave', () => {
    const summary = aggregate([], LEAVE_DAY);

    expect(summary.status).toBe('excused');
    expect(summary.flags).toEqual(['approved_leave']);
  });

  it('should excuse an empty rest day', () => {
    const summary = aggregate([], REST_DAY);

    expect(summary.status).toBe('excused');
    expect(summary.flags).toEqual(['rest_day']);
  });

  it('should count work on a rest day as overtime and keep it present', () => {
    const summary = aggregate([closed('10:00', '12:00', 7200)], REST_DAY);

    expect(summary.status).toBe('present');
    expect(summary.overtimeSeconds).toBe(7200);
    expect(summary.flags).toEqual(['rest_day']);
  });

  it('should flag a manual session without a reason as a problem', () => {
    const summary = aggregate([closed('09:00', '17:00', 28800, 'manual')]);

    expect(summary.status).toBe('problem');
    expect(summary.hasManualCorrections).toBe(true);
    expect(summary.flags).toEqual(['manual_inconsistency']);
  });

  it('should accept a consistent manual session', () => {
    const summary = aggregate([{ ...closed('09:00', '17:00', 28800, 'closed_manual'), manualReason: 'forgot to badge out' }]);

    expect(summary.status).toBe('present');
    expect(summary.hasManualCorrections).toBe(true);
    expect(summary.flags).toEqual([]);
  });

  describe('hasManualInconsistency', () => {
    it('should detect a manual session overlapping another session', () => {
      const manual = { ...closed('11:00', '14:00', 10800, 'manual'), manualReason: 'meeting offsite' };
      expect(hasManualInconsistency([closed('09:00', '12:00', 10800), manual])).toBe(true);
    });

    it('should accept back-to-back sessions', () => {
      const manual = { ...closed('12:00', '14:00', 7200, 'manual'), manualReason: 'meeting offsite' };
      expect(hasManualInconsistency([closed('09:00', '12:00', 10800), manual])).toBe(false);
    });

    it('should ignore derived sessions', () => {
      expect(hasManualInconsistency([closed('09:00', '12:00', 10800), closed('11:00', '13:00', 7200)])).toBe(false);
    });
  });

  describe('classifyDay', () => {
    it('should let the first matching rule win', () => {
      expect(classifyDay(facts({ hasMissingExit: true, totalSeconds: 0 }))).toBe('problem');
      expect(classifyDay(facts({ sessionsCount: 0, totalSeconds: 0, isWorkDay: true, hasApprovedLeave: true }))).toBe('absent');
      expect(classifyDay(facts({ totalSeconds: 100 }))).toBe('partial');
    });

    it('should use a caller-supplied rule list', () => {
      expect(classifyDay(facts({}), [{ status: 'absent', description: 'always', applies: () => true }])).toBe('absent');
      expect(classifyDay(facts({}), [])).toBe('present');
    });

    it('should end with a catch-all present rule', () => {
      const last = STATUS_RULES[STATUS_RULES.length - 1];
      expect(last?.status).toBe('present');
      expect(last?.applies(facts({ totalSeconds: 0, expectedSeconds: 0 }))).toBe(true);
    });
  });

  describe('Property 3: Total equals the sum of closed session durations', () => {
    it('should add up closed sessions and ignore open ones', () => {
      fc.assert(
        fc.property(
          fc.array(fc.record({ seconds: fc.integer({ min: 0, max: 14400 }), open: fc.boolean() }), { maxLength: 8 }),
          (items) => {
            const sessions: AggregatedSession[] = items.map((item, index) => {
              const start = `${DATE}T${(6 + index).toString().padStart(2, '0')}:00:00`;
              return item.open
                ? { startTime: start, endTime: null, status: 'open', durationSeconds: 0, manualReason: null }
                : { startTime: start, endTime: start, status: 'auto', durationSeconds: item.seconds, manualReason: null };
            });
            const expected = items.filter((item) => !item.open).reduce((sum, item) => sum + item.seconds, 0);

            const summary = aggregate(sessions);

            expect(summary.totalSeconds).toBe(expected);
            expect(summary.sessionsCount).toBe(items.length);
            expect(summary.hasMissingExit).toBe(items.some((item) => item.open));
          }
        ),
        { numRuns: 100 }
      );
    });
  });

  describe('Property 4: Overtime and underwork balance', () => {
    it('should satisfy overtime - underwork = total - expected with one side zero', () => {
      fc.assert(
        fc.property(
          fc.integer({ min: 0, max: 50000 }),
          fc.integer({ min: 0, max: 50000 }),
          (worked, expectedSeconds) => {
            const summary = aggregate([closed('06:00', '20:00', worked)], { ...WORK_DAY, expectedSeconds });

            expect(summary.overtimeSeconds - summary.underworkSeconds).toBe(worked - expectedSeconds);
            expect(Math.min(summary.overtimeSeconds, summary.underworkSeconds)).toBe(0);
          }
        ),
        { numRuns: 100 }
      );
    });
  });
});
