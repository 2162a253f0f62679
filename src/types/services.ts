/**
 * Service interface types for the work-time engine
 */

import type { AccessEvent, DayStatus } from './models';

// ============================================================================
// External interfaces the engine depends on
// ============================================================================

export interface EventFilter {
  employeeId?: string;
  deviceId?: string;
  fromDate?: string;
  toDate?: string;
}

/**
 * Durable log of raw access events
 */
export interface EventStore {
  fetchUnprocessed(filter?: EventFilter): Promise<AccessEvent[]>;
  markProcessed(eventIds: string[]): Promise<number>;
}

/**
 * Work calendar and contract data for one employee
 */
export interface EmployeeDirectory {
  expectedDailySeconds(employeeId: string, date: string): Promise<number>;
  isWorkDay(employeeId: string, date: string): Promise<boolean>;
  hasApprovedLeave(employeeId: string, date: string): Promise<boolean>;
}

// ============================================================================
// Processing
// ============================================================================

/** One employee on one calendar day: the unit of atomic work */
export interface PairKey {
  employeeId: string;
  date: string;
}

export type ProcessingMode = 'incremental' | 'reprocess' | 'rebuild' | 'force_rebuild';

export interface ProcessingPolicy {
  readonly mode: ProcessingMode;
  readonly dryRun: boolean;
  readonly verbose: boolean;
}

export interface AnomalyCounts {
  duplicateEntries: number;
  orphanExits: number;
  nonAttendanceEvents: number;
  shortSessions: number;
}

export type PairSkipReason = 'up_to_date' | 'existing_data' | 'no_events';

export interface PairOutcome extends PairKey {
  skipped: boolean;
  skipReason?: PairSkipReason;
  eventsScanned: number;
  eventsProcessed: number;
  eventsReset: number;
  sessionsCreated: number;
  sessionsUpdated: number;
  sessionsClosed: number;
  sessionsDeleted: number;
  summaryWritten: boolean;
  /** A summary already existed and was replaced */
  summaryReplaced: boolean;
  /** A summary was removed without a replacement (forced rebuild of an empty day) */
  summaryDeleted: boolean;
  status: DayStatus | null;
  anomalies: AnomalyCounts;
}

export interface PairFailure extends PairKey {
  error: string;
  code?: string;
}

export interface ProgressUpdate {
  phase: 'selecting' | 'processing' | 'complete';
  current: number;
  total: number;
  message: string;
  details?: {
    batchIndex?: number;
    batchCount?: number;
    pairsProcessed?: number;
    pairsFailed?: number;
    startedAt?: string;
  };
}

export type ProgressCallback = (progress: ProgressUpdate) => void;

export interface BatchStats {
  index: number;
  pairs: number;
  processed: number;
  skipped: number;
  failed: number;
  sessionsCreated: number;
  summariesWritten: number;
  elapsedMs: number;
}

export type RunStatus = 'success' | 'partial' | 'failure';

/**
 * Structured result of any processing run
 */
export interface ProcessingReport {
  status: RunStatus;
  mode: ProcessingMode;
  dryRun: boolean;
  /** Stopped between batches on request */
  interrupted: boolean;
  /** Stopped by a connection-level storage fault */
  aborted: boolean;
  abortReason?: string;
  eventsScanned: number;
  eventsProcessed: number;
  eventsReset: number;
  unassignedEvents: number;
  sessionsCreated: number;
  sessionsUpdated: number;
  sessionsClosed: number;
  sessionsDeleted: number;
  summariesWritten: number;
  summariesCreated: number;
  summariesReplaced: number;
  summariesDeleted: number;
  anomalies: AnomalyCounts;
  pairs: {
    total: number;
    processed: number;
    skipped: number;
    failed: number;
  };
  completedPairs: PairKey[];
  failures: PairFailure[];
  /** Non-fatal problems outside any single pair, such as a failed audit write */
  warnings: string[];
  batches: BatchStats[];
  startedAt: string;
  finishedAt: string;
  elapsedMs: number;
}

export interface RunOptions {
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
  /** Recorded as changed_by in the audit log */
  actor?: string;
}

// ============================================================================
// Batch, rebuild, reprocess
// ============================================================================

export type BatchSelector = EventFilter;

export interface BatchOptions extends RunOptions {
  selector?: BatchSelector;
  batchSize?: number;
  forceProcess?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
}

export interface RebuildPreview {
  fromDate: string;
  toDate: string;
  employees: number;
  pairs: number;
  sessionsToDelete: number;
  summariesToDelete: number;
}

export type ConfirmHandler<T> = (preview: T) => boolean | Promise<boolean>;

export interface RebuildOptions extends RunOptions {
  fromDate: string;
  toDate: string;
  employeeId?: string;
  departmentId?: string;
  batchSize?: number;
  forceRebuild?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  confirm?: ConfirmHandler<RebuildPreview>;
  /** Injected clock, defaults to the current time */
  now?: Date;
}

export interface RebuildReport extends Omit<ProcessingReport, 'status'> {
  status: RunStatus | 'cancelled';
  fromDate: string;
  toDate: string;
  pairsRebuilt: number;
}

export interface ReprocessOptions extends RunOptions {
  employeeId?: string;
  date?: string;
  fromDate?: string;
  toDate?: string;
}

// ============================================================================
// Retention
// ============================================================================

export interface CleanupCounts {
  sessions: number;
  summaries: number;
  events: number;
  auditEntries: number;
}

export interface CleanupOptions {
  olderThanDays?: number;
  keepAuditLogs?: boolean;
  keepEvents?: boolean;
  dryRun?: boolean;
  confirm?: ConfirmHandler<CleanupPreview>;
  actor?: string;
  now?: Date;
}

export interface CleanupPreview {
  cutoffDate: string;
  counts: CleanupCounts;
}

export type CleanupStatus = 'completed' | 'dry_run' | 'cancelled' | 'nothing_to_delete';

export interface CleanupReport {
  status: CleanupStatus;
  cutoffDate: string;
  olderThanDays: number;
  keepAuditLogs: boolean;
  keepEvents: boolean;
  counts: CleanupCounts;
  deleted: CleanupCounts;
  auditEntryId: string | null;
}

// ============================================================================
// Administrative session close
// ============================================================================

export interface CloseSessionsOptions {
  employeeId?: string;
  date?: string;
  reason: string;
  closedBy: string;
  /** End time for the closed sessions, defaults to now */
  closedAt?: string;
}

export interface CloseSessionsResult {
  closed: number;
  skipped: number;
  sessionIds: string[];
  summariesRecomputed: number;
}
