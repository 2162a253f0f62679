/**
 * Type exports for the work-time engine
 */

// Data models
export type {
  Department,
  CreateDepartmentInput,
  Employee,
  CreateEmployeeInput,
  UpdateEmployeeInput,
  EmployeeFilter,
  Device,
  CreateDeviceInput,
  LeaveKind,
  LeaveStatus,
  Leave,
  CreateLeaveInput,
  Holiday,
  CreateHolidayInput,
  AccessEventType,
  AccessEvent,
  RecordEventInput,
  SessionStatus,
  WorkSession,
  DayStatus,
  SummaryFlag,
  DailySummary,
  AuditAction,
  AuditLogEntry,
  CreateAuditEntryInput,
  WorkCalendarSettings,
  ProcessingSettings,
  RetentionSettings,
  EngineSettings,
} from './models';

export {
  LEAVE_KINDS,
  LEAVE_STATUSES,
  ACCESS_EVENT_TYPES,
  SESSION_STATUSES,
  DAY_STATUSES,
  SUMMARY_FLAGS,
  AUDIT_ACTIONS,
} from './models';

// Service interfaces
export type {
  EventFilter,
  EventStore,
  EmployeeDirectory,
  PairKey,
  ProcessingMode,
  ProcessingPolicy,
  AnomalyCounts,
  PairSkipReason,
  PairOutcome,
  PairFailure,
  ProgressUpdate,
  ProgressCallback,
  BatchStats,
  RunStatus,
  ProcessingReport,
  RunOptions,
  BatchSelector,
  BatchOptions,
  RebuildPreview,
  ConfirmHandler,
  RebuildOptions,
  RebuildReport,
  ReprocessOptions,
  CleanupCounts,
  CleanupOptions,
  CleanupPreview,
  CleanupStatus,
  CleanupReport,
  CloseSessionsOptions,
  CloseSessionsResult,
} from './services';

// API types
export type {
  ApiResponse,
  ApiError,
  ErrorCode,
} from './api';

export { ErrorCodes } from './api';
