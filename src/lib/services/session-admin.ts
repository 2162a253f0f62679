/**
 * Administrative session corrections: closing sessions left open and
 * recording manual sessions. Each correction is audited and the affected
 * day's summary is recomputed in the same transaction.
 */

import { withTransaction } from '../database';
import { ConfigurationError, StorageError } from '../errors';
import { ErrorCodes } from '../../types/api';
import { parseOptions, closeSessionsSchema, manualSessionSchema } from '../validation';
import { getEmployeeById } from '../repositories/employee.repository';
import {
  closeSessionManually,
  getSessionById,
  insertSession,
  listOpenSessions,
} from '../repositories/work-session.repository';
import { appendAuditEntry } from '../repositories/audit-log.repository';
import { getEngineSettings } from '../repositories/settings.repository';
import { extractLocalDate, formatTimestamp, secondsBetween } from '../utils/date-time';
import { DatabaseEmployeeDirectory } from './employee-directory';
import { createPolicy } from './processing-policy';
import { processPairInTransaction, type PairContext } from './pair-processor';
import type { WorkSession } from '../../types/models';
import type { CloseSessionsOptions, CloseSessionsResult, PairKey, PairOutcome } from '../../types/services';

const TAG = '[SessionAdmin]';

async function recomputeContext(): Promise<PairContext> {
  const settings = await getEngineSettings();
  return {
    policy: createPolicy('reprocess'),
    directory: new DatabaseEmployeeDirectory(settings.calendar),
    minSessionSeconds: settings.processing.minSessionSeconds,
  };
}

function pairId(pair: PairKey): string {
  return `${pair.employeeId}|${pair.date}`;
}

/**
 * Close open sessions at `closedAt` (default now). Sessions that start
 * after `closedAt` are left open and counted as skipped.
 */
export async function closeOpenSessions(options: CloseSessionsOptions): Promise<CloseSessionsResult> {
  const parsed = parseOptions(closeSessionsSchema, options, 'close options');
  if (parsed.employeeId && !(await getEmployeeById(parsed.employeeId))) {
    throw new ConfigurationError(`Unknown employee: ${parsed.employeeId}`, { employeeId: parsed.employeeId }, ErrorCodes.DB_NOT_FOUND);
  }
  const closedAt = parsed.closedAt ?? formatTimestamp(new Date());
  const context = await recomputeContext();

  const result = await withTransaction(async () => {
    const open = await listOpenSessions({ employeeId: parsed.employeeId, date: parsed.date });
    const closed: string[] = [];
    const touched = new Map<string, PairKey>();
    let skipped = 0;

    for (const session of open) {
      if (closedAt < session.startTime) {
        skipped++;
        continue;
      }
      const durationSeconds = secondsBetween(session.startTime, closedAt);
      await closeSessionManually(session.id, {
        endTime: closedAt,
        durationSeconds,
        reason: parsed.reason,
        correctedBy: parsed.closedBy,
      });
      await appendAuditEntry({
        employeeId: session.employeeId,
        date: session.date,
        action: 'close_session',
        description: `Closed open session started ${session.startTime}`,
        oldValue: { sessionId: session.id, endTime: null, status: session.status },
        newValue: { sessionId: session.id, endTime: closedAt, status: 'closed_manual', durationSeconds },
        reason: parsed.reason,
        changedBy: parsed.closedBy,
      });
      closed.push(session.id);
      const pair = { employeeId: session.employeeId, date: session.date };
      touched.set(pairId(pair), pair);
    }

    for (const pair of touched.values()) {
      await processPairInTransaction(pair, context);
    }

    return { closed: closed.length, skipped, sessionIds: closed, summariesRecomputed: touched.size };
  });

  console.log(`${TAG} Closed ${result.closed} sessions, skipped ${result.skipped}`);
  return result;
}

export interface ManualSessionInput {
  employeeId: string;
  startTime: string;
  endTime: string;
  reason: string;
  createdBy: string;
}

/**
 * Record a session by hand. It is attributed to the start date and wins
 * over a derived session with the same start.
 */
export async function createManualSession(
  input: ManualSessionInput
): Promise<{ session: WorkSession; outcome: PairOutcome }> {
  const parsed = parseOptions(manualSessionSchema, input, 'manual session');
  if (!(await getEmployeeById(parsed.employeeId))) {
    throw new ConfigurationError(`Unknown employee: ${parsed.employeeId}`, { employeeId: parsed.employeeId }, ErrorCodes.DB_NOT_FOUND);
  }
  const context = await recomputeContext();
  const date = extractLocalDate(parsed.startTime);
  const durationSeconds = secondsBetween(parsed.startTime, parsed.endTime);

  const { id, outcome } = await withTransaction(async () => {
    const sessionId = await insertSession({
      employeeId: parsed.employeeId,
      date,
      startTime: parsed.startTime,
      endTime: parsed.endTime,
      durationSeconds,
      status: 'manual',
      manualReason: parsed.reason,
      correctedBy: parsed.createdBy,
    });
    await appendAuditEntry({
      employeeId: parsed.employeeId,
      date,
      action: 'create_session',
      description: `Manual session ${parsed.startTime} to ${parsed.endTime}`,
      newValue: { sessionId, startTime: parsed.startTime, endTime: parsed.endTime, durationSeconds },
      reason: parsed.reason,
      changedBy: parsed.createdBy,
    });
    const pairOutcome = await processPairInTransaction({ employeeId: parsed.employeeId, date }, context);
    return { id: sessionId, outcome: pairOutcome };
  });

  const session = await getSessionById(id);
  if (!session) {
    throw new StorageError(`Session ${id} not found after insert`, ErrorCodes.DB_NOT_FOUND);
  }
  return { session, outcome };
}
