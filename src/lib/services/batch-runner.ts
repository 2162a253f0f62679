/**
 * Batch Runner
 *
 * Shared loop behind batch processing, rebuilds and reprocessing:
 * partitions pairs into batches, runs each pair as its own transaction,
 * checks for interruption between batches and writes one audit entry per
 * batch that committed work.
 */

import { appendAuditEntry } from '../repositories/audit-log.repository';
import { errorMessage, isConnectivityFault, EngineError } from '../errors';
import { chunk } from '../utils/guards';
import { addAnomalyCounts, emptyAnomalyCounts } from './session-builder';
import { processPair, type PairContext } from './pair-processor';
import type { AuditAction, Employee } from '../../types/models';
import type {
  BatchStats,
  PairKey,
  PairOutcome,
  ProcessingMode,
  ProcessingReport,
  ProgressCallback,
  RunStatus,
} from '../../types/services';

export interface BatchRunConfig {
  /** Log prefix, e.g. "[BatchProcessor]" */
  tag: string;
  pairs: PairKey[];
  batchSize: number;
  context: PairContext;
  /** Per-batch audit entry; null to leave auditing to the caller */
  audit: { action: AuditAction; label: string } | null;
  actor: string;
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
}

/**
 * Pairs ordered by date, then employee, the same order listPairs returns
 */
export function expandPairs(employees: readonly Pick<Employee, 'id'>[], dates: readonly string[]): PairKey[] {
  const pairs: PairKey[] = [];
  for (const date of dates) {
    for (const employee of employees) {
      pairs.push({ employeeId: employee.id, date });
    }
  }
  return pairs;
}

export function createReport(mode: ProcessingMode, dryRun: boolean, startedAt: Date = new Date()): ProcessingReport {
  return {
    status: 'success',
    mode,
    dryRun,
    interrupted: false,
    aborted: false,
    eventsScanned: 0,
    eventsProcessed: 0,
    eventsReset: 0,
    unassignedEvents: 0,
    sessionsCreated: 0,
    sessionsUpdated: 0,
    sessionsClosed: 0,
    sessionsDeleted: 0,
    summariesWritten: 0,
    summariesCreated: 0,
    summariesReplaced: 0,
    summariesDeleted: 0,
    anomalies: emptyAnomalyCounts(),
    pairs: { total: 0, processed: 0, skipped: 0, failed: 0 },
    completedPairs: [],
    failures: [],
    warnings: [],
    batches: [],
    startedAt: startedAt.toISOString(),
    finishedAt: startedAt.toISOString(),
    elapsedMs: 0,
  };
}

/**
 * Fold one pair's outcome into the run totals
 */
export function accumulateOutcome(report: ProcessingReport, outcome: PairOutcome): void {
  report.eventsScanned += outcome.eventsScanned;
  report.eventsProcessed += outcome.eventsProcessed;
  report.eventsReset += outcome.eventsReset;
  report.sessionsCreated += outcome.sessionsCreated;
  report.sessionsUpdated += outcome.sessionsUpdated;
  report.sessionsClosed += outcome.sessionsClosed;
  report.sessionsDeleted += outcome.sessionsDeleted;
  if (outcome.summaryWritten) {
    report.summariesWritten++;
    if (outcome.summaryReplaced) report.summariesReplaced++;
    else report.summariesCreated++;
  }
  if (outcome.summaryDeleted) report.summariesDeleted++;
  addAnomalyCounts(report.anomalies, outcome.anomalies);

  if (outcome.skipped) report.pairs.skipped++;
  else report.pairs.processed++;
  report.completedPairs.push({ employeeId: outcome.employeeId, date: outcome.date });
}

export function resolveStatus(report: ProcessingReport): RunStatus {
  const completed = report.pairs.processed + report.pairs.skipped;
  if (report.aborted || report.pairs.failed > 0) {
    return completed > 0 ? 'partial' : 'failure';
  }
  return report.interrupted ? 'partial' : 'success';
}

export function finishReport(report: ProcessingReport, finishedAt: Date = new Date()): ProcessingReport {
  report.status = resolveStatus(report);
  report.finishedAt = finishedAt.toISOString();
  report.elapsedMs = finishedAt.getTime() - new Date(report.startedAt).getTime();
  return report;
}

function describeOutcome(outcome: PairOutcome): string {
  if (outcome.skipped) {
    return `skipped (${outcome.skipReason ?? 'unknown'})`;
  }
  return `${outcome.status ?? 'no summary'}, ${outcome.eventsProcessed} events, `
    + `+${outcome.sessionsCreated} sessions, ${outcome.sessionsClosed} closed`;
}

/**
 * Run every pair in batches and fill `report`
 */
export async function runPairBatches(config: BatchRunConfig, report: ProcessingReport): Promise<ProcessingReport> {
  const { tag, context, signal, onProgress } = config;
  const batches = chunk(config.pairs, Math.max(1, config.batchSize));
  const total = config.pairs.length;
  report.pairs.total += total;

  console.log(`${tag} ${total} pairs in ${batches.length} batch(es)${context.policy.dryRun ? ' [dry run]' : ''}`);

  let done = 0;
  for (let index = 0; index < batches.length; index++) {
    if (signal?.aborted) {
      report.interrupted = true;
      console.log(`${tag} Interrupted before batch ${index + 1}/${batches.length}`);
      break;
    }

    const batch = batches[index] ?? [];
    const batchStartedAt = Date.now();
    const stats: BatchStats = {
      index: index + 1,
      pairs: batch.length,
      processed: 0,
      skipped: 0,
      failed: 0,
      sessionsCreated: 0,
      summariesWritten: 0,
      elapsedMs: 0,
    };

    for (const pair of batch) {
      try {
        const outcome = await processPair(pair, context);
        accumulateOutcome(report, outcome);
        if (outcome.skipped) stats.skipped++;
        else stats.processed++;
        stats.sessionsCreated += outcome.sessionsCreated;
        if (outcome.summaryWritten) stats.summariesWritten++;
        if (context.policy.verbose) {
          console.log(`${tag} ${pair.employeeId} ${pair.date}: ${describeOutcome(outcome)}`);
        }
      } catch (error) {
        if (isConnectivityFault(error)) {
          report.aborted = true;
          report.abortReason = errorMessage(error);
          console.error(`${tag} Storage unavailable, aborting run at ${pair.employeeId} ${pair.date}:`, errorMessage(error));
          break;
        }
        stats.failed++;
        report.pairs.failed++;
        report.failures.push({
          employeeId: pair.employeeId,
          date: pair.date,
          error: errorMessage(error),
          ...(error instanceof EngineError ? { code: error.code } : {}),
        });
        console.warn(`${tag} Pair ${pair.employeeId} ${pair.date} failed:`, errorMessage(error));
      }
      done++;
    }

    stats.elapsedMs = Date.now() - batchStartedAt;
    report.batches.push(stats);

    if (report.aborted) break;

    console.log(
      `${tag} Batch ${stats.index}/${batches.length}: ${stats.processed} processed, `
      + `${stats.skipped} skipped, ${stats.failed} failed (${stats.elapsedMs}ms)`
    );

    if (config.audit && !context.policy.dryRun && stats.processed > 0) {
      try {
        await appendAuditEntry({
          action: config.audit.action,
          description: `${config.audit.label}: batch ${stats.index}/${batches.length}, `
            + `${stats.processed} pairs processed, ${stats.skipped} skipped, ${stats.failed} failed`,
          newValue: { mode: context.policy.mode, ...stats },
          changedBy: config.actor,
        });
      } catch (error) {
        if (isConnectivityFault(error)) {
          report.aborted = true;
          report.abortReason = errorMessage(error);
          console.error(`${tag} Storage unavailable while auditing batch ${stats.index}:`, errorMessage(error));
          break;
        }
        report.warnings.push(`Audit entry for batch ${stats.index} not written: ${errorMessage(error)}`);
        console.warn(`${tag} Audit entry for batch ${stats.index} not written:`, errorMessage(error));
      }
    }

    onProgress?.({
      phase: 'processing',
      current: done,
      total,
      message: `Processed batch ${stats.index} of ${batches.length}`,
      details: {
        batchIndex: stats.index,
        batchCount: batches.length,
        pairsProcessed: report.pairs.processed,
        pairsFailed: report.pairs.failed,
        startedAt: report.startedAt,
      },
    });
  }

  return report;
}
