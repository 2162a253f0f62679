/**
 * Batch Processor
 *
 * Selects the (employee, date) pairs that have events matching a selector
 * and derives sessions and summaries for each of them, batch by batch.
 * Incremental runs only select pairs with unprocessed events, so running
 * twice on the same input writes nothing the second time.
 */

import { ConfigurationError } from '../errors';
import { ErrorCodes } from '../../types/api';
import { parseOptions, batchSelectorSchema, batchSizeSchema } from '../validation';
import { getEmployeeById } from '../repositories/employee.repository';
import { getDeviceById } from '../repositories/device.repository';
import { listPairs, countUnassigned } from '../repositories/access-event.repository';
import { getEngineSettings } from '../repositories/settings.repository';
import { SYSTEM_ACTOR } from '../repositories/audit-log.repository';
import { DatabaseEmployeeDirectory } from './employee-directory';
import { resolveBatchPolicy } from './processing-policy';
import { createReport, finishReport, runPairBatches } from './batch-runner';
import type { BatchOptions, BatchSelector, ProcessingReport } from '../../types/services';

const TAG = '[BatchProcessor]';

/**
 * Employee and device filters must name existing records
 */
export async function assertKnownTargets(selector: BatchSelector): Promise<void> {
  if (selector.employeeId && !(await getEmployeeById(selector.employeeId))) {
    throw new ConfigurationError(`Unknown employee: ${selector.employeeId}`, { employeeId: selector.employeeId }, ErrorCodes.DB_NOT_FOUND);
  }
  if (selector.deviceId && !(await getDeviceById(selector.deviceId))) {
    throw new ConfigurationError(`Unknown device: ${selector.deviceId}`, { deviceId: selector.deviceId }, ErrorCodes.DB_NOT_FOUND);
  }
}

function describeSelector(selector: BatchSelector): string {
  const parts: string[] = [];
  if (selector.employeeId) parts.push(`employee ${selector.employeeId}`);
  if (selector.deviceId) parts.push(`device ${selector.deviceId}`);
  if (selector.fromDate || selector.toDate) {
    parts.push(`${selector.fromDate ?? '...'} to ${selector.toDate ?? '...'}`);
  }
  return parts.length > 0 ? parts.join(', ') : 'all events';
}

/**
 * Process every pair the selector matches
 */
export async function runBatch(options: BatchOptions = {}): Promise<ProcessingReport> {
  const selector = parseOptions(batchSelectorSchema, options.selector ?? {}, 'selector');
  const settings = await getEngineSettings();
  const batchSize = parseOptions(batchSizeSchema, options.batchSize ?? settings.processing.batchSize, 'batch size');
  await assertKnownTargets(selector);

  const policy = resolveBatchPolicy(options);
  const unprocessedOnly = policy.mode === 'incremental';
  const report = createReport(policy.mode, policy.dryRun);

  console.log(`${TAG} Selecting pairs (${describeSelector(selector)}, mode ${policy.mode})`);
  options.onProgress?.({ phase: 'selecting', current: 0, total: 0, message: 'Selecting employee-days' });

  const pairs = await listPairs(selector, { unprocessedOnly });
  report.unassignedEvents = await countUnassigned(selector, { unprocessedOnly });
  if (report.unassignedEvents > 0) {
    console.warn(`${TAG} ${report.unassignedEvents} events have no employee and were left unprocessed`);
  }

  await runPairBatches(
    {
      tag: TAG,
      pairs,
      batchSize,
      context: {
        policy,
        directory: new DatabaseEmployeeDirectory(settings.calendar),
        minSessionSeconds: settings.processing.minSessionSeconds,
      },
      audit: { action: 'batch_process', label: `Batch processing (${describeSelector(selector)})` },
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
    message: `Batch processing ${report.status}`,
  });
  console.log(
    `${TAG} Done: ${report.status}, ${report.pairs.processed} processed, ${report.pairs.skipped} skipped, `
    + `${report.pairs.failed} failed in ${report.elapsedMs}ms`
  );
  return report;
}
