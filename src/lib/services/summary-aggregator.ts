/**
 * Summary Aggregator
 *
 * Folds one employee-day's sessions and calendar facts into a daily
 * summary. Status comes from an ordered rule list: the first rule whose
 * predicate holds wins.
 */

import type { DayStatus, SessionStatus, SummaryFlag, WorkSession } from '../../types/models';
import type { SummaryValues } from '../repositories/daily-summary.repository';

export type AggregatedSession = Pick<WorkSession, 'startTime' | 'endTime' | 'status' | 'durationSeconds' | 'manualReason'>;

/**
 * Calendar facts for the day, supplied by the employee directory
 */
export interface DayContext {
  expectedSeconds: number;
  isWorkDay: boolean;
  hasApprovedLeave: boolean;
}

export interface SummaryFacts {
  sessionsCount: number;
  totalSeconds: number;
  expectedSeconds: number;
  hasMissingExit: boolean;
  hasManualInconsistency: boolean;
  isWorkDay: boolean;
  hasApprovedLeave: boolean;
}

export interface StatusRule {
  status: DayStatus;
  description: string;
  applies: (facts: SummaryFacts) => boolean;
}

export const STATUS_RULES: readonly StatusRule[] = [
  {
    status: 'problem',
    description: 'a session has no exit',
    applies: (facts) => facts.hasMissingExit,
  },
  {
    status: 'problem',
    description: 'a manual correction is inconsistent',
    applies: (facts) => facts.hasManualInconsistency,
  },
  {
    status: 'absent',
    description: 'no sessions on a work day',
    applies: (facts) => facts.sessionsCount === 0 && facts.isWorkDay,
  },
  {
    status: 'excused',
    description: 'no sessions, covered by approved leave',
    applies: (facts) => facts.sessionsCount === 0 && facts.hasApprovedLeave,
  },
  {
    status: 'excused',
    description: 'no sessions on a rest day',
    applies: (facts) => facts.sessionsCount === 0 && !facts.isWorkDay,
  },
  {
    status: 'partial',
    description: 'worked less than expected',
    applies: (facts) => facts.totalSeconds > 0 && facts.totalSeconds < facts.expectedSeconds,
  },
  {
    status: 'present',
    description: 'otherwise',
    applies: () => true,
  },
];

/**
 * First matching rule of `rules`
 */
export function classifyDay(facts: SummaryFacts, rules: readonly StatusRule[] = STATUS_RULES): DayStatus {
  const rule = rules.find((candidate) => candidate.applies(facts));
  return rule ? rule.status : 'present';
}

const MANUAL_STATUSES: readonly SessionStatus[] = ['manual', 'closed_manual'];

export function isManualSession(session: Pick<WorkSession, 'status'>): boolean {
  return MANUAL_STATUSES.includes(session.status);
}

/**
 * A manual or admin-closed session is inconsistent when it has no end,
 * ends before it starts, carries no reason, or overlaps another session
 */
export function hasManualInconsistency(sessions: readonly AggregatedSession[]): boolean {
  const sorted = [...sessions].sort((a, b) => (a.startTime < b.startTime ? -1 : a.startTime > b.startTime ? 1 : 0));

  for (let i = 0; i < sorted.length; i++) {
    const session = sorted[i];
    if (!session || !isManualSession(session)) continue;

    if (session.endTime === null || session.endTime < session.startTime) return true;
    if (!session.manualReason || session.manualReason.trim() === '') return true;

    for (let j = 0; j < sorted.length; j++) {
      const other = sorted[j];
      if (!other || j === i) continue;
      const otherEnd = other.endTime ?? other.startTime;
      if (other.startTime < session.endTime && session.startTime < otherEnd) return true;
    }
  }
  return false;
}

/**
 * Compute the full summary of one employee-day
 */
export function aggregateDay(input: {
  employeeId: string;
  date: string;
  sessions: readonly AggregatedSession[];
  context: DayContext;
}): SummaryValues {
  const { employeeId, date, sessions, context } = input;

  let totalSeconds = 0;
  let hasMissingExit = false;
  let firstEntry: string | null = null;
  let lastExit: string | null = null;

  for (const session of sessions) {
    if (firstEntry === null || session.startTime < firstEntry) {
      firstEntry = session.startTime;
    }
    if (session.endTime === null) {
      hasMissingExit = true;
      continue;
    }
    totalSeconds += Math.max(0, session.durationSeconds);
    if (lastExit === null || session.endTime > lastExit) {
      lastExit = session.endTime;
    }
  }

  const expectedSeconds = context.expectedSeconds;
  const manualInconsistency = hasManualInconsistency(sessions);

  const facts: SummaryFacts = {
    sessionsCount: sessions.length,
    totalSeconds,
    expectedSeconds,
    hasMissingExit,
    hasManualInconsistency: manualInconsistency,
    isWorkDay: context.isWorkDay,
    hasApprovedLeave: context.hasApprovedLeave,
  };

  const flags: SummaryFlag[] = [];
  if (hasMissingExit) flags.push('missing_exit');
  if (manualInconsistency) flags.push('manual_inconsistency');
  if (context.hasApprovedLeave) flags.push('approved_leave');
  if (!context.isWorkDay && !context.hasApprovedLeave) flags.push('rest_day');

  return {
    employeeId,
    date,
    firstEntry,
    lastExit,
    totalSeconds,
    expectedSeconds,
    overtimeSeconds: Math.max(0, totalSeconds - expectedSeconds),
    underworkSeconds: Math.max(0, expectedSeconds - totalSeconds),
    sessionsCount: sessions.length,
    status: classifyDay(facts),
    hasMissingExit,
    hasManualCorrections: sessions.some(isManualSession),
    flags,
  };
}
