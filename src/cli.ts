#!/usr/bin/env node
/**
 * worktime command line
 *
 *   worktime process         [--employee ID] [--device ID] [--from DATE] [--to DATE]
 *                            [--batch-size N] [--force] [--dry-run] [--verbose]
 *   worktime rebuild         --from DATE --to DATE [--employee ID] [--department ID]
 *                            [--batch-size N] [--force] [--dry-run] [--verbose] [--yes]
 *   worktime reprocess       [--employee ID] (--date DATE | --from DATE --to DATE)
 *   worktime cleanup         [--older-than-days N] [--keep-audit-logs] [--keep-events]
 *                            [--dry-run] [--yes]
 *   worktime close-sessions  --reason TEXT --by NAME [--employee ID] [--date DATE] [--at TIMESTAMP]
 *   worktime stats           [--employee ID | --department ID | --departments] [--from DATE] [--to DATE]
 *
 * Every command takes --db PATH (default WORKTIME_DB_PATH) and prints its
 * report as JSON.
 */

import { parseArgs } from 'util';
import { createInterface } from 'readline/promises';
import { initDatabase, closeDatabase } from './lib/database';
import { loadRuntimeConfig } from './lib/config';
import { ConfigurationError, errorMessage, toApiError } from './lib/errors';
import { runBatch } from './lib/services/batch-processor';
import { rebuild } from './lib/services/rebuild-controller';
import { reprocess } from './lib/services/reprocess';
import { cleanup } from './lib/services/retention-cleaner';
import { closeOpenSessions } from './lib/services/session-admin';
import { getDepartmentStats, getEmployeeStats, getSystemStats, type DepartmentStats } from './lib/services/stats-reporter';
import type { CleanupPreview, RebuildPreview } from './types/services';

export const COMMANDS = ['process', 'rebuild', 'reprocess', 'cleanup', 'close-sessions', 'stats'] as const;
export type Command = typeof COMMANDS[number];

const OPTIONS = {
  db: { type: 'string' },
  employee: { type: 'string' },
  device: { type: 'string' },
  department: { type: 'string' },
  departments: { type: 'boolean' },
  from: { type: 'string' },
  to: { type: 'string' },
  date: { type: 'string' },
  at: { type: 'string' },
  reason: { type: 'string' },
  by: { type: 'string' },
  'batch-size': { type: 'string' },
  'older-than-days': { type: 'string' },
  force: { type: 'boolean' },
  'dry-run': { type: 'boolean' },
  verbose: { type: 'boolean' },
  yes: { type: 'boolean', short: 'y' },
  'keep-audit-logs': { type: 'boolean' },
  'keep-events': { type: 'boolean' },
} as const;

export interface CliFlags {
  db?: string;
  employee?: string;
  device?: string;
  department?: string;
  departments?: boolean;
  from?: string;
  to?: string;
  date?: string;
  at?: string;
  reason?: string;
  by?: string;
  'batch-size'?: string;
  'older-than-days'?: string;
  force?: boolean;
  'dry-run'?: boolean;
  verbose?: boolean;
  yes?: boolean;
  'keep-audit-logs'?: boolean;
  'keep-events'?: boolean;
}

export interface ParsedCommand {
  command: Command;
  flags: CliFlags;
}

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parse argv (without the node and script entries)
 */
export function parseCommand(argv: string[]): ParsedCommand {
  const { values, positionals } = parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
  const [command, ...rest] = positionals;
  if (!isCommand(command)) {
    throw new ConfigurationError(`Unknown command: ${command ?? '(none)'}. Expected one of ${COMMANDS.join(', ')}`);
  }
  if (rest.length > 0) {
    throw new ConfigurationError(`Unexpected arguments: ${rest.join(' ')}`);
  }
  return { command, flags: values };
}

/**
 * Integer option, or undefined when absent. Range checks happen in the engine.
 */
export function integerFlag(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigurationError(`--${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

async function askConfirmation(question: string): Promise<boolean> {
  const prompt = createInterface({ input: process.stdin, output: process.stderr });
  try {
    const answer = await prompt.question(`${question} [y/N] `);
    return /^y(es)?$/i.test(answer.trim());
  } finally {
    prompt.close();
  }
}

function confirmer<T>(flags: CliFlags, describe: (preview: T) => string): (preview: T) => Promise<boolean> {
  return async (preview) => {
    if (flags.yes) return true;
    return askConfirmation(describe(preview));
  };
}

/**
 * Run one parsed command against the open database
 */
export async function runCommand(parsed: ParsedCommand, signal?: AbortSignal): Promise<{ status: string; departments?: DepartmentStats[] }> {
  const { command, flags } = parsed;
  const actor = 'cli';

  switch (command) {
    case 'process':
      return runBatch({
        selector: { employeeId: flags.employee, deviceId: flags.device, fromDate: flags.from, toDate: flags.to },
        batchSize: integerFlag(flags['batch-size'], 'batch-size'),
        forceProcess: flags.force,
        dryRun: flags['dry-run'],
        verbose: flags.verbose,
        actor,
        signal,
      });

    case 'rebuild':
      if (!flags.from || !flags.to) {
        throw new ConfigurationError('rebuild needs both --from and --to');
      }
      return rebuild({
        fromDate: flags.from,
        toDate: flags.to,
        employeeId: flags.employee,
        departmentId: flags.department,
        batchSize: integerFlag(flags['batch-size'], 'batch-size'),
        forceRebuild: flags.force,
        dryRun: flags['dry-run'],
        verbose: flags.verbose,
        actor,
        signal,
        confirm: confirmer<RebuildPreview>(flags, (preview) =>
          `Delete ${preview.sessionsToDelete} sessions and ${preview.summariesToDelete} summaries `
          + `for ${preview.pairs} employee-days (${preview.fromDate} to ${preview.toDate}) and rebuild them?`),
      });

    case 'reprocess':
      return reprocess({
        employeeId: flags.employee,
        date: flags.date,
        fromDate: flags.from,
        toDate: flags.to,
        actor,
        signal,
      });

    case 'cleanup':
      return cleanup({
        olderThanDays: integerFlag(flags['older-than-days'], 'older-than-days'),
        keepAuditLogs: flags['keep-audit-logs'],
        keepEvents: flags['keep-events'],
        dryRun: flags['dry-run'],
        actor,
        confirm: confirmer<CleanupPreview>(flags, (preview) =>
          `Delete ${preview.counts.sessions} sessions, ${preview.counts.summaries} summaries, `
          + `${preview.counts.events} events and ${preview.counts.auditEntries} audit entries `
          + `older than ${preview.cutoffDate}?`),
      });

    case 'close-sessions': {
      const result = await closeOpenSessions({
        employeeId: flags.employee,
        date: flags.date,
        reason: flags.reason ?? '',
        closedBy: flags.by ?? '',
        closedAt: flags.at,
      });
      return { status: 'completed', ...result };
    }

    case 'stats': {
      const period = { fromDate: flags.from, toDate: flags.to };
      if (flags.employee) {
        return { status: 'completed', ...(await getEmployeeStats(flags.employee, period)) };
      }
      if (flags.department || flags.departments) {
        return { status: 'completed', departments: await getDepartmentStats(period, flags.department) };
      }
      return { status: 'completed', ...(await getSystemStats(period)) };
    }
  }
}

export function exitCodeFor(status: string): number {
  switch (status) {
    case 'partial':
      return 2;
    case 'failure':
      return 1;
    default:
      return 0;
  }
}

async function main(): Promise<number> {
  let parsed: ParsedCommand;
  try {
    parsed = parseCommand(process.argv.slice(2));
  } catch (error) {
    console.error(`[cli] ${errorMessage(error)}`);
    return 1;
  }

  const controller = new AbortController();
  process.on('SIGINT', () => {
    if (controller.signal.aborted) {
      console.error('[cli] Interrupted twice, exiting');
      process.exit(130);
    }
    console.error('[cli] Interrupt requested, finishing the current batch...');
    controller.abort();
  });

  try {
    const config = loadRuntimeConfig();
    await initDatabase(parsed.flags.db ?? config.dbPath);
    const result = await runCommand(parsed, controller.signal);
    process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
    return exitCodeFor(result.status);
  } catch (error) {
    process.stderr.write(`${JSON.stringify({ success: false, error: toApiError(error) }, null, 2)}\n`);
    return 1;
  } finally {
    await closeDatabase();
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('[cli] Fatal:', error);
      process.exitCode = 1;
    }
  );
}
