/**
 * Property-based tests for Session Builder
 *
 * Property 1: Event order independence
 * Property 2: One session per entry/exit pair
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  buildSessions,
  sortEvents,
  reconcileSessions,
  isClosingUpdate,
  type BuiltSession,
  type SessionEvent,
} from './session-builder';
import type { AccessEventType, WorkSession } from '../../types';

const DATE = '2025-09-19';

let nextSequence = 1;

function event(eventType: AccessEventType, time: string, id?: string): SessionEvent {
  const sequence = nextSequence++;
  return {
    id: id ?? `ev-${sequence}`,
    sequence,
    eventType,
    timestamp: `${DATE}T${time.length === 5 ? `${time}:00` : time}`,
  };
}

function storedSession(overrides: Partial<WorkSession> & Pick<WorkSession, 'id' | 'startTime'>): WorkSession {
  return {
    employeeId: 'emp-1',
    date: DATE,
    endTime: null,
    durationSeconds: 0,
    status: 'auto',
    manualReason: null,
    correctedBy: null,
    createdAt: '2025-09-19T18:00:00',
    updatedAt: '2025-09-19T18:00:00',
    ...overrides,
  };
}

function builtSession(startTime: string, endTime: string | null, durationSeconds: number): BuiltSession {
  return {
    startTime,
    endTime,
    status: endTime === null ? 'open' : 'auto',
    durationSeconds,
    eventIds: [],
  };
}

function clock(minutes: number): string {
  const hours = Math.floor(minutes / 60).toString().padStart(2, '0');
  const rest = (minutes % 60).toString().padStart(2, '0');
  return `${hours}:${rest}`;
}

describe('Session Builder', () => {
  it('should build one closed session from an entry and an exit', () => {
    const entry = event('entry', '09:00', 'in');
    const exit = event('exit', '17:00', 'out');

    const result = buildSessions([entry, exit]);

    expect(result.sessions).toEqual([
      {
        startTime: '2025-09-19T09:00:00',
        endTime: '2025-09-19T17:00:00',
        status: 'auto',
        durationSeconds: 28800,
        eventIds: ['in', 'out'],
      },
    ]);
    expect(result.anomalies).toEqual([]);
    expect(result.processedEventIds).toEqual(['in', 'out']);
  });

  it('should attach a second entry to the open session', () => {
    const result = buildSessions([
      event('entry', '09:00', 'a'),
      event('entry', '09:05', 'b'),
      event('exit', '17:00', 'c'),
    ]);

    expect(result.sessions).toHaveLength(1);
    expect(result.sessions[0]?.startTime).toBe('2025-09-19T09:00:00');
    expect(result.sessions[0]?.durationSeconds).toBe(28800);
    expect(result.sessions[0]?.eventIds).toEqual(['a', 'b', 'c']);
    expect(result.counts.duplicateEntries).toBe(1);
    expect(result.anomalies).toEqual([
      { kind: 'duplicate_entry', eventId: 'b', timestamp: '2025-09-19T09:05:00' },
    ]);
  });

  it('should record an exit without an open session as an orphan and still consume it', () => {
    const result = buildSessions([
      event('entry', '09:00', 'in'),
      event('exit', '08:00', 'early'),
      event('exit', '12:00', 'out'),
    ]);

    expect(result.sessions).toHaveLength(1);
    expect(result.sessions[0]?.durationSeconds).toBe(10800);
    expect(result.counts.orphanExits).toBe(1);
    expect(result.processedEventIds).toEqual(['early', 'in', 'out']);
  });

  it('should leave the last session open when no exit follows', () => {
    const result = buildSessions([event('entry', '09:00', 'in')]);

    expect(result.sessions).toEqual([
      {
        startTime: '2025-09-19T09:00:00',
        endTime: null,
        status: 'open',
        durationSeconds: 0,
        eventIds: ['in'],
      },
    ]);
  });

  it('should ignore denied and alarm events for sessions', () => {
    const result = buildSessions([
      event('entry', '09:00'),
      event('denied', '10:00'),
      event('alarm', '11:00'),
      event('exit', '12:00'),
    ]);

    expect(result.sessions).toHaveLength(1);
    expect(result.sessions[0]?.durationSeconds).toBe(10800);
    expect(result.counts.nonAttendanceEvents).toBe(2);
    expect(result.processedEventIds).toHaveLength(4);
  });

  it('should break timestamp ties by insertion sequence', () => {
    const exitFirst: SessionEvent[] = [
      { id: 'entry', sequence: 2, eventType: 'entry', timestamp: '2025-09-19T09:00:00' },
      { id: 'exit', sequence: 1, eventType: 'exit', timestamp: '2025-09-19T09:00:00' },
    ];
    const entryFirst: SessionEvent[] = [
      { id: 'entry', sequence: 1, eventType: 'entry', timestamp: '2025-09-19T09:00:00' },
      { id: 'exit', sequence: 2, eventType: 'exit', timestamp: '2025-09-19T09:00:00' },
    ];

    const orphaned = buildSessions(exitFirst);
    expect(orphaned.counts.orphanExits).toBe(1);
    expect(orphaned.sessions[0]?.status).toBe('open');

    const closed = buildSessions(entryFirst);
    expect(closed.counts.orphanExits).toBe(0);
    expect(closed.sessions[0]?.status).toBe('auto');
    expect(closed.sessions[0]?.durationSeconds).toBe(0);
  });

  it('should drop closed sessions shorter than the minimum', () => {
    const result = buildSessions(
      [event('entry', '09:00:00'), event('exit', '09:00:30'), event('entry', '10:00:00'), event('exit', '11:00:00')],
      { minSessionSeconds: 60 }
    );

    expect(result.sessions).toHaveLength(1);
    expect(result.sessions[0]?.startTime).toBe('2025-09-19T10:00:00');
    expect(result.counts.shortSessions).toBe(1);
  });

  it('should return an empty result for no events', () => {
    const result = buildSessions([]);
    expect(result.sessions).toEqual([]);
    expect(result.processedEventIds).toEqual([]);
  });

  describe('Property 1: Event order independence', () => {
    const eventListArbitrary = fc
      .array(
        fc.record({
          eventType: fc.constantFrom<AccessEventType>('entry', 'exit', 'denied', 'alarm'),
          minute: fc.integer({ min: 360, max: 1200 }),
        }),
        { minLength: 0, maxLength: 12 }
      )
      .map((items) =>
        items.map((item, index): SessionEvent => ({
          id: `ev-${index}`,
          sequence: index + 1,
          eventType: item.eventType,
          timestamp: `${DATE}T${clock(item.minute)}:00`,
        }))
      );

    it('should build the same sessions for any arrival order', () => {
      fc.assert(
        fc.property(
          eventListArbitrary.chain((events) =>
            fc.tuple(fc.constant(events), fc.shuffledSubarray(events, { minLength: events.length, maxLength: events.length }))
          ),
          ([events, shuffled]) => {
            expect(buildSessions(shuffled)).toEqual(buildSessions(events));
          }
        ),
        { numRuns: 100 }
      );
    });

    it('should consume every event exactly once', () => {
      fc.assert(
        fc.property(eventListArbitrary, (events) => {
          const result = buildSessions(events);
          expect([...result.processedEventIds].sort()).toEqual(events.map((e) => e.id).sort());
        }),
        { numRuns: 100 }
      );
    });
  });

  describe('Property 2: One session per entry/exit pair', () => {
    it('should build N sessions whose durations add up for N alternating pairs', () => {
      fc.assert(
        fc.property(
          fc.array(fc.record({ gap: fc.integer({ min: 1, max: 60 }), length: fc.integer({ min: 1, max: 60 }) }), {
            minLength: 1,
            maxLength: 6,
          }),
          (intervals) => {
            const events: SessionEvent[] = [];
            let minute = 360;
            let expectedTotal = 0;
            intervals.forEach((interval, index) => {
              minute += interval.gap;
              events.push({ id: `in-${index}`, sequence: index * 2 + 1, eventType: 'entry', timestamp: `${DATE}T${clock(minute)}:00` });
              minute += interval.length;
              events.push({ id: `out-${index}`, sequence: index * 2 + 2, eventType: 'exit', timestamp: `${DATE}T${clock(minute)}:00` });
              expectedTotal += interval.length * 60;
            });

            const result = buildSessions(events);

            expect(result.sessions).toHaveLength(intervals.length);
            expect(result.sessions.every((session) => session.status === 'auto')).toBe(true);
            expect(result.sessions.reduce((sum, session) => sum + session.durationSeconds, 0)).toBe(expectedTotal);
          }
        ),
        { numRuns: 100 }
      );
    });
  });

  describe('sortEvents', () => {
    it('should not mutate its input', () => {
      const events = [event('exit', '17:00'), event('entry', '09:00')];
      const copy = [...events];
      sortEvents(events);
      expect(events).toEqual(copy);
    });
  });
});

describe('reconcileSessions', () => {
  it('should insert every built session when nothing is stored', () => {
    const built = [builtSession('2025-09-19T09:00:00', '2025-09-19T12:00:00', 10800)];
    const plan = reconcileSessions([], built);

    expect(plan.inserts).toEqual(built);
    expect(plan.updates).toEqual([]);
    expect(plan.deletes).toEqual([]);
  });

  it('should close a stored open session with the same start', () => {
    const stored = storedSession({ id: 's1', startTime: '2025-09-19T09:00:00', status: 'open' });
    const plan = reconcileSessions([stored], [builtSession('2025-09-19T09:00:00', '2025-09-19T17:00:00', 28800)]);

    expect(plan.inserts).toEqual([]);
    expect(plan.updates).toHaveLength(1);
    const update = plan.updates[0];
    expect(update?.id).toBe('s1');
    expect(update && isClosingUpdate(update)).toBe(true);
  });

  it('should leave an identical stored session unchanged', () => {
    const stored = storedSession({
      id: 's1',
      startTime: '2025-09-19T09:00:00',
      endTime: '2025-09-19T12:00:00',
      durationSeconds: 10800,
    });
    const plan = reconcileSessions([stored], [builtSession('2025-09-19T09:00:00', '2025-09-19T12:00:00', 10800)]);

    expect(plan.unchanged.map((entry) => entry.id)).toEqual(['s1']);
    expect(plan.updates).toEqual([]);
    expect(plan.inserts).toEqual([]);
  });

  it('should delete stored derived sessions that are no longer built', () => {
    const stored = storedSession({ id: 'stale', startTime: '2025-09-19T10:00:00', status: 'open' });
    const plan = reconcileSessions([stored], []);

    expect(plan.deletes).toEqual(['stale']);
  });

  it('should let a manual session override a built session with the same start', () => {
    const manual = storedSession({
      id: 'm1',
      startTime: '2025-09-19T09:00:00',
      endTime: '2025-09-19T17:30:00',
      durationSeconds: 30600,
      status: 'manual',
      manualReason: 'badge forgotten',
    });
    const plan = reconcileSessions([manual], [builtSession('2025-09-19T09:00:00', '2025-09-19T17:00:00', 28800)]);

    expect(plan.inserts).toEqual([]);
    expect(plan.updates).toEqual([]);
    expect(plan.deletes).toEqual([]);
    expect(plan.retained).toEqual([manual]);
  });
});
