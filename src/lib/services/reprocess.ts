/**
 * On-demand recomputation of one employee-day or a short range.
 *
 * Re-derives sessions and summaries from every stored event of each pair,
 * whether or not the events were processed before. Manual sessions are
 * kept. Used by the `reprocess` CLI command and the POST /reprocess route.
 */

import { ConfigurationError, errorMessage } from '../errors';
import { ErrorCodes } from '../../types/api';
import { parseOptions, reprocessTargetSchema } from '../validation';
import { getEmployeeById, listEmployees } from '../repositories/employee.repository';
import { getEngineSettings } from '../repositories/settings.repository';
import { appendAuditEntry, SYSTEM_ACTOR } from '../repositories/audit-log.repository';
import { enumerateDates } from '../utils/date-time';
import { DatabaseEmployeeDirectory } from './employee-directory';
import { createPolicy } from './processing-policy';
import { createReport, expandPairs, finishReport, runPairBatches } from './batch-runner';
import type { Employee } from '../../types/models';
import type { ProcessingReport, ReprocessOptions } from '../../types/services';

const TAG = '[Reprocess]';

export interface ReprocessResult extends ProcessingReport {
  fromDate: string;
  toDate: string;
}

function resolveRange(target: { date?: string; fromDate?: string; toDate?: string }): { fromDate: string; toDate: string } {
  if (target.date) {
    return { fromDate: target.date, toDate: target.date };
  }
  if (target.fromDate && target.toDate) {
    return { fromDate: target.fromDate, toDate: target.toDate };
  }
  throw new ConfigurationError('Give a date or both fromDate and toDate');
}

async function resolveEmployees(employeeId: string | undefined): Promise<Employee[]> {
  if (!employeeId) {
    return listEmployees();
  }
  const employee = await getEmployeeById(employeeId);
  if (!employee) {
    throw new ConfigurationError(`Unknown employee: ${employeeId}`, { employeeId }, ErrorCodes.DB_NOT_FOUND);
  }
  return [employee];
}

export async function reprocess(options: ReprocessOptions): Promise<ReprocessResult> {
  const target = parseOptions(reprocessTargetSchema, {
    employeeId: options.employeeId,
    date: options.date,
    fromDate: options.fromDate,
    toDate: options.toDate,
  }, 'reprocess target');
  const { fromDate, toDate } = resolveRange(target);

  const employees = await resolveEmployees(target.employeeId);
  const pairs = expandPairs(employees, enumerateDates(fromDate, toDate));
  const settings = await getEngineSettings();
  const policy = createPolicy('reprocess');
  const actor = options.actor ?? SYSTEM_ACTOR;

  const report = createReport(policy.mode, policy.dryRun);
  await runPairBatches(
    {
      tag: TAG,
      pairs,
      batchSize: settings.processing.batchSize,
      context: {
        policy,
        directory: new DatabaseEmployeeDirectory(settings.calendar),
        minSessionSeconds: settings.processing.minSessionSeconds,
      },
      audit: null,
      actor,
      signal: options.signal,
      onProgress: options.onProgress,
    },
    report
  );
  finishReport(report);

  if (report.pairs.processed > 0) {
    try {
      await appendAuditEntry({
        employeeId: target.employeeId ?? null,
        date: fromDate === toDate ? fromDate : null,
        action: 'reprocess_day',
        description: `Reprocessed ${report.pairs.processed} employee-days from ${fromDate} to ${toDate}`,
        newValue: {
          fromDate,
          toDate,
          sessionsCreated: report.sessionsCreated,
          sessionsUpdated: report.sessionsUpdated,
          sessionsClosed: report.sessionsClosed,
          summariesWritten: report.summariesWritten,
          failed: report.pairs.failed,
        },
        changedBy: actor,
      });
    } catch (error) {
      report.warnings.push(`Audit entry not written: ${errorMessage(error)}`);
      console.warn(`${TAG} Audit entry not written:`, errorMessage(error));
    }
  }

  return { ...report, fromDate, toDate };
}
