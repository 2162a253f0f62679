/**
 * Retention Cleaner
 *
 * Deletes engine data older than a cutoff date. Sessions and summaries are
 * always pruned; raw events and audit entries can be kept. A real run
 * needs confirmation and ends with one cleanup entry in the audit log,
 * written after the deletions so the run never prunes its own record.
 */

import { withTransaction } from '../database';
import { DestructiveOperationError } from '../errors';
import { parseOptions, cleanupOptionsSchema } from '../validation';
import { countSessionsBefore, deleteSessionsBefore } from '../repositories/work-session.repository';
import { countSummariesBefore, deleteSummariesBefore } from '../repositories/daily-summary.repository';
import { countEventsBefore, deleteEventsBefore } from '../repositories/access-event.repository';
import {
  appendAuditEntry,
  countAuditEntriesBefore,
  deleteAuditEntriesBefore,
  SYSTEM_ACTOR,
} from '../repositories/audit-log.repository';
import { getEngineSettings } from '../repositories/settings.repository';
import { addDays, formatDate } from '../utils/date-time';
import type { CleanupCounts, CleanupOptions, CleanupReport } from '../../types/services';

const TAG = '[RetentionCleaner]';

export function emptyCleanupCounts(): CleanupCounts {
  return { sessions: 0, summaries: 0, events: 0, auditEntries: 0 };
}

export function totalCount(counts: CleanupCounts): number {
  return counts.sessions + counts.summaries + counts.events + counts.auditEntries;
}

/**
 * First date that is kept: today minus `olderThanDays`
 */
export function cutoffFor(now: Date, olderThanDays: number): string {
  return addDays(formatDate(now), -olderThanDays);
}

async function countEligible(
  cutoffDate: string,
  keep: { keepAuditLogs: boolean; keepEvents: boolean }
): Promise<CleanupCounts> {
  return {
    sessions: await countSessionsBefore(cutoffDate),
    summaries: await countSummariesBefore(cutoffDate),
    events: keep.keepEvents ? 0 : await countEventsBefore(cutoffDate),
    auditEntries: keep.keepAuditLogs ? 0 : await countAuditEntriesBefore(cutoffDate),
  };
}

export async function cleanup(options: CleanupOptions = {}): Promise<CleanupReport> {
  const parsed = parseOptions(cleanupOptionsSchema, {
    olderThanDays: options.olderThanDays,
    keepAuditLogs: options.keepAuditLogs,
    keepEvents: options.keepEvents,
    dryRun: options.dryRun,
  }, 'cleanup options');

  const settings = await getEngineSettings();
  const olderThanDays = parsed.olderThanDays ?? settings.retention.olderThanDays;
  const keep = { keepAuditLogs: parsed.keepAuditLogs ?? false, keepEvents: parsed.keepEvents ?? false };
  const cutoffDate = cutoffFor(options.now ?? new Date(), olderThanDays);

  const counts = await countEligible(cutoffDate, keep);
  const report: CleanupReport = {
    status: 'dry_run',
    cutoffDate,
    olderThanDays,
    ...keep,
    counts,
    deleted: emptyCleanupCounts(),
    auditEntryId: null,
  };

  console.log(
    `${TAG} Before ${cutoffDate}: ${counts.sessions} sessions, ${counts.summaries} summaries, `
    + `${counts.events} events, ${counts.auditEntries} audit entries`
  );

  if (parsed.dryRun) {
    return report;
  }
  if (totalCount(counts) === 0) {
    report.status = 'nothing_to_delete';
    return report;
  }
  if (!options.confirm) {
    throw new DestructiveOperationError(
      `Cleanup deletes ${totalCount(counts)} rows older than ${cutoffDate}; confirm it or run it as a dry run`,
      { cutoffDate, ...counts }
    );
  }
  if (!(await options.confirm({ cutoffDate, counts }))) {
    console.log(`${TAG} Cancelled before any change`);
    report.status = 'cancelled';
    return report;
  }

  const actor = options.actor ?? SYSTEM_ACTOR;
  const { deleted, auditEntryId } = await withTransaction(async () => {
    const removed: CleanupCounts = {
      sessions: await deleteSessionsBefore(cutoffDate),
      summaries: await deleteSummariesBefore(cutoffDate),
      events: keep.keepEvents ? 0 : await deleteEventsBefore(cutoffDate),
      auditEntries: keep.keepAuditLogs ? 0 : await deleteAuditEntriesBefore(cutoffDate),
    };
    const entry = await appendAuditEntry({
      action: 'cleanup',
      description: `Deleted ${totalCount(removed)} rows older than ${cutoffDate}`,
      newValue: { cutoffDate, olderThanDays, ...keep, deleted: removed },
      changedBy: actor,
    });
    return { deleted: removed, auditEntryId: entry.id };
  });

  report.status = 'completed';
  report.deleted = deleted;
  report.auditEntryId = auditEntryId;
  console.log(`${TAG} Deleted ${totalCount(deleted)} rows`);
  return report;
}
