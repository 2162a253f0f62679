/**
 * Rebuild Controller
 *
 * Re-derives sessions and summaries for every active employee on every
 * day of an explicit historical range. A plain rebuild only fills pairs
 * that have no data yet; a forced rebuild deletes each pair's sessions and
 * summary, clears the processed flags and derives everything again from
 * the raw events. Forced rebuilds need confirmation unless dry-run.
 */

import { ConfigurationError, DestructiveOperationError } from '../errors';
import { ErrorCodes } from '../../types/api';
import { parseOptions, rebuildRangeSchema } from '../validation';
import { getEmployeeById, listEmployees } from '../repositories/employee.repository';
import { getDepartmentById } from '../repositories/department.repository';
import { countSessionsInRange } from '../repositories/work-session.repository';
import { countSummariesInRange } from '../repositories/daily-summary.repository';
import { getEngineSettings } from '../repositories/settings.repository';
import { SYSTEM_ACTOR } from '../repositories/audit-log.repository';
import { enumerateDates, formatDate } from '../utils/date-time';
import { DatabaseEmployeeDirectory } from './employee-directory';
import { resolveRebuildPolicy, requiresConfirmation, rulesFor } from './processing-policy';
import { createReport, expandPairs, finishReport, runPairBatches } from './batch-runner';
import type { Employee } from '../../types/models';
import type { RebuildOptions, RebuildPreview, RebuildReport } from '../../types/services';

const TAG = '[RebuildController]';

async function resolveEmployees(target: { employeeId?: string; departmentId?: string }): Promise<Employee[]> {
  if (target.employeeId) {
    const employee = await getEmployeeById(target.employeeId);
    if (!employee) {
      throw new ConfigurationError(`Unknown employee: ${target.employeeId}`, { employeeId: target.employeeId }, ErrorCodes.DB_NOT_FOUND);
    }
    return [employee];
  }
  if (target.departmentId && !(await getDepartmentById(target.departmentId))) {
    throw new ConfigurationError(`Unknown department: ${target.departmentId}`, { departmentId: target.departmentId }, ErrorCodes.DB_NOT_FOUND);
  }
  const employees = await listEmployees({ departmentId: target.departmentId });
  if (employees.length === 0) {
    throw new ConfigurationError('No active employees in the rebuild scope');
  }
  return employees;
}

/**
 * Rebuild a date range. Both ends are required and inclusive.
 */
export async function rebuild(options: RebuildOptions): Promise<RebuildReport> {
  const range = parseOptions(rebuildRangeSchema, {
    fromDate: options.fromDate,
    toDate: options.toDate,
    employeeId: options.employeeId,
    departmentId: options.departmentId,
    batchSize: options.batchSize,
  }, 'rebuild options');

  const today = formatDate(options.now ?? new Date());
  if (range.fromDate > today) {
    throw new ConfigurationError(`fromDate ${range.fromDate} is in the future`, { fromDate: range.fromDate, today });
  }
  const toDate = range.toDate > today ? today : range.toDate;

  const employees = await resolveEmployees(range);
  const employeeIds = employees.map((employee) => employee.id);
  const pairs = expandPairs(employees, enumerateDates(range.fromDate, toDate));

  const settings = await getEngineSettings();
  const policy = resolveRebuildPolicy(options);
  const purging = rulesFor(policy).purgeExisting;

  const preview: RebuildPreview = {
    fromDate: range.fromDate,
    toDate,
    employees: employees.length,
    pairs: pairs.length,
    sessionsToDelete: purging ? await countSessionsInRange(range.fromDate, toDate, employeeIds) : 0,
    summariesToDelete: purging ? await countSummariesInRange(range.fromDate, toDate, employeeIds) : 0,
  };

  console.log(
    `${TAG} ${policy.mode} ${preview.fromDate} to ${preview.toDate}: ${preview.employees} employees, `
    + `${preview.pairs} pairs${policy.dryRun ? ' [dry run]' : ''}`
  );

  if (requiresConfirmation(policy)) {
    if (!options.confirm) {
      throw new DestructiveOperationError(
        'A forced rebuild deletes existing sessions and summaries; confirm it or run it as a dry run',
        { ...preview }
      );
    }
    if (!(await options.confirm(preview))) {
      console.log(`${TAG} Cancelled before any change`);
      const cancelled = finishReport(createReport(policy.mode, policy.dryRun));
      return { ...cancelled, status: 'cancelled', fromDate: range.fromDate, toDate, pairsRebuilt: 0 };
    }
  }

  const report = createReport(policy.mode, policy.dryRun);
  await runPairBatches(
    {
      tag: TAG,
      pairs,
      batchSize: range.batchSize ?? settings.processing.rebuildBatchSize,
      context: {
        policy,
        directory: new DatabaseEmployeeDirectory(settings.calendar),
        minSessionSeconds: settings.processing.minSessionSeconds,
      },
      audit: { action: 'rebuild', label: `Rebuild ${range.fromDate} to ${toDate} (${policy.mode})` },
      actor: options.actor ?? SYSTEM_ACTOR,
      signal: options.signal,
      onProgress: options.onProgress,
    },
    report
  );
  finishReport(report);

  options.onProgress?.({
    phase: 'complete',
    current: report.pairs.processed + report.pairs.skipped,
    total: report.pairs.total,
    message: `Rebuild ${report.status}`,
  });
  console.log(
    `${TAG} Done: ${report.status}, ${report.pairs.processed} rebuilt, ${report.summariesReplaced} summaries replaced, `
    + `${report.sessionsCreated} sessions created in ${report.elapsedMs}ms`
  );

  return { ...report, fromDate: range.fromDate, toDate, pairsRebuilt: report.pairs.processed };
}
