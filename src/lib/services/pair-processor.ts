/**
 * Pair Processor
 *
 * Runs Session Builder and Summary Aggregator for one (employee, date) pair.
 * Reads happen inside the same write transaction as the writes, so the
 * skip decision, the processed flags, the sessions and the summary of a
 * pair always commit together. Dry runs build the same plan with reads only.
 */

import { withTransaction } from '../database';
import {
  getEventsForPair,
  markProcessed,
  resetProcessed,
} from '../repositories/access-event.repository';
import {
  getSessionsForPair,
  insertSession,
  updateSession,
  deleteSessions,
  deleteSessionsForPair,
  linkEvents,
} from '../repositories/work-session.repository';
import {
  getSummaryForPair,
  upsertSummary,
  deleteSummaryForPair,
  type SummaryValues,
} from '../repositories/daily-summary.repository';
import { buildSessions, reconcileSessions, isClosingUpdate, countAnomalies, emptyAnomalyCounts, type SessionPlan } from './session-builder';
import { aggregateDay, type AggregatedSession } from './summary-aggregator';
import { resolveDayContext } from './employee-directory';
import { rulesFor } from './processing-policy';
import type { EmployeeDirectory, PairKey, PairOutcome, PairSkipReason, ProcessingPolicy } from '../../types/services';

export interface PairContext {
  policy: ProcessingPolicy;
  directory: EmployeeDirectory;
  minSessionSeconds: number;
}

export interface PairPlan {
  outcome: PairOutcome;
  purge: boolean;
  resetEventIds: string[];
  sessionPlan: SessionPlan | null;
  markEventIds: string[];
  summary: SummaryValues | null;
}

export function emptyOutcome(pair: PairKey): PairOutcome {
  return {
    employeeId: pair.employeeId,
    date: pair.date,
    skipped: false,
    eventsScanned: 0,
    eventsProcessed: 0,
    eventsReset: 0,
    sessionsCreated: 0,
    sessionsUpdated: 0,
    sessionsClosed: 0,
    sessionsDeleted: 0,
    summaryWritten: false,
    summaryReplaced: false,
    summaryDeleted: false,
    status: null,
    anomalies: emptyAnomalyCounts(),
  };
}

function skip(plan: PairPlan, reason: PairSkipReason): PairPlan {
  plan.outcome.skipped = true;
  plan.outcome.skipReason = reason;
  return plan;
}

/**
 * Decide everything that processing this pair would write
 */
export async function planPair(pair: PairKey, context: PairContext): Promise<PairPlan> {
  const rules = rulesFor(context.policy);
  const [events, existingSessions, existingSummary] = await Promise.all([
    getEventsForPair(pair.employeeId, pair.date),
    getSessionsForPair(pair.employeeId, pair.date),
    getSummaryForPair(pair.employeeId, pair.date),
  ]);

  const plan: PairPlan = {
    outcome: emptyOutcome(pair),
    purge: false,
    resetEventIds: [],
    sessionPlan: null,
    markEventIds: [],
    summary: null,
  };
  const outcome = plan.outcome;
  outcome.eventsScanned = events.length;

  const unprocessed = events.filter((event) => !event.processed);

  if (rules.skipWhenUpToDate && unprocessed.length === 0 && existingSummary) {
    return skip(plan, 'up_to_date');
  }
  if (rules.skipWhenDataExists && (existingSessions.length > 0 || existingSummary)) {
    return skip(plan, 'existing_data');
  }

  if (rules.purgeExisting) {
    plan.purge = true;
    outcome.sessionsDeleted = existingSessions.length;
  }
  if (rules.resetProcessedFlags) {
    plan.resetEventIds = events.filter((event) => event.processed).map((event) => event.id);
    outcome.eventsReset = plan.resetEventIds.length;
  }
  if (rules.skipWhenNoEvents && events.length === 0) {
    outcome.summaryDeleted = plan.purge && existingSummary !== null;
    return skip(plan, 'no_events');
  }

  const build = buildSessions(events, { minSessionSeconds: context.minSessionSeconds });
  plan.markEventIds = (rules.resetProcessedFlags ? events : unprocessed).map((event) => event.id);
  outcome.eventsProcessed = plan.markEventIds.length;

  // Anomalies of events an earlier run already reported are not counted again
  const marking = new Set(plan.markEventIds);
  outcome.anomalies = countAnomalies(build.anomalies.filter((anomaly) => marking.has(anomaly.eventId)));

  const sessionPlan = reconcileSessions(plan.purge ? [] : existingSessions, build.sessions);
  plan.sessionPlan = sessionPlan;

  const closing = sessionPlan.updates.filter(isClosingUpdate).length;
  outcome.sessionsCreated = sessionPlan.inserts.length;
  outcome.sessionsClosed = closing;
  outcome.sessionsUpdated = sessionPlan.updates.length - closing;
  outcome.sessionsDeleted += sessionPlan.deletes.length;

  const finalSessions: AggregatedSession[] = [
    ...sessionPlan.retained,
    ...sessionPlan.unchanged.map(({ session }) => ({ ...session, manualReason: null })),
    ...sessionPlan.updates.map(({ session }) => ({ ...session, manualReason: null })),
    ...sessionPlan.inserts.map((session) => ({ ...session, manualReason: null })),
  ];

  const dayContext = await resolveDayContext(context.directory, pair.employeeId, pair.date);
  plan.summary = aggregateDay({
    employeeId: pair.employeeId,
    date: pair.date,
    sessions: finalSessions,
    context: dayContext,
  });

  outcome.summaryWritten = true;
  outcome.summaryReplaced = existingSummary !== null;
  outcome.status = plan.summary.status;
  return plan;
}

/**
 * Write a plan. Must run inside a transaction.
 */
export async function applyPlan(pair: PairKey, plan: PairPlan): Promise<void> {
  if (plan.purge) {
    await deleteSessionsForPair(pair.employeeId, pair.date);
    await deleteSummaryForPair(pair.employeeId, pair.date);
  }
  if (plan.resetEventIds.length > 0) {
    await resetProcessed(plan.resetEventIds);
  }
  if (plan.outcome.skipped || !plan.sessionPlan || !plan.summary) {
    return;
  }

  const sessionPlan = plan.sessionPlan;
  const newlyProcessed = new Set(plan.markEventIds);

  if (sessionPlan.deletes.length > 0) {
    await deleteSessions(sessionPlan.deletes);
  }
  for (const update of sessionPlan.updates) {
    await updateSession(update.id, {
      endTime: update.session.endTime,
      durationSeconds: update.session.durationSeconds,
      status: update.session.status,
      eventIds: update.session.eventIds,
    });
  }
  for (const { id, session } of sessionPlan.unchanged) {
    // A late duplicate entry can join a session without changing it
    if (session.eventIds.some((eventId) => newlyProcessed.has(eventId))) {
      await linkEvents(id, session.eventIds);
    }
  }
  for (const session of sessionPlan.inserts) {
    await insertSession({
      employeeId: pair.employeeId,
      date: pair.date,
      startTime: session.startTime,
      endTime: session.endTime,
      durationSeconds: session.durationSeconds,
      status: session.status,
      eventIds: session.eventIds,
    });
  }

  if (plan.markEventIds.length > 0) {
    await markProcessed(plan.markEventIds);
  }
  await upsertSummary(plan.summary);
}

/**
 * Plan and write one pair inside the caller's transaction
 */
export async function processPairInTransaction(pair: PairKey, context: PairContext): Promise<PairOutcome> {
  const plan = await planPair(pair, context);
  await applyPlan(pair, plan);
  return plan.outcome;
}

/**
 * Process one pair as a single atomic unit, or only plan it on a dry run
 */
export async function processPair(pair: PairKey, context: PairContext): Promise<PairOutcome> {
  if (context.policy.dryRun) {
    const plan = await planPair(pair, context);
    return plan.outcome;
  }
  return withTransaction(() => processPairInTransaction(pair, context));
}
