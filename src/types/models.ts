/**
 * Data models for the work-time engine
 */

// ============================================================================
// Organisation
// ============================================================================

export interface Department {
  id: string;
  name: string;
  createdAt: string;
  memberCount: number;
}

export interface CreateDepartmentInput {
  name: string;
}

export interface Employee {
  id: string;
  employeeCode: string;
  fullName: string;
  departmentId: string | null;
  /** Share of a full-time position, 0.25 to 2.00 */
  workFraction: number;
  /** Contracted hours for a full-time day, 1 to 24 */
  dailyHours: number;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface CreateEmployeeInput {
  employeeCode: string;
  fullName: string;
  departmentId?: string | null;
  workFraction?: number;
  dailyHours?: number;
  isActive?: boolean;
}

export interface UpdateEmployeeInput {
  fullName?: string;
  departmentId?: string | null;
  workFraction?: number;
  dailyHours?: number;
  isActive?: boolean;
}

export interface EmployeeFilter {
  departmentId?: string;
  activeOnly?: boolean;
}

export interface Device {
  id: string;
  name: string;
  location: string | null;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface CreateDeviceInput {
  name: string;
  location?: string | null;
  isActive?: boolean;
}

export const LEAVE_KINDS = ['vacation', 'business_trip'] as const;
export type LeaveKind = typeof LEAVE_KINDS[number];

export const LEAVE_STATUSES = [
  'planned',
  'approved',
  'taken',
  'in_progress',
  'completed',
  'rejected',
  'cancelled',
] as const;
export type LeaveStatus = typeof LEAVE_STATUSES[number];

export interface Leave {
  id: string;
  employeeId: string;
  kind: LeaveKind;
  startDate: string;
  endDate: string;
  status: LeaveStatus;
  note: string | null;
  createdAt: string;
}

export interface CreateLeaveInput {
  employeeId: string;
  kind: LeaveKind;
  startDate: string;
  endDate: string;
  status: LeaveStatus;
  note?: string | null;
}

export interface Holiday {
  id: string;
  date: string;
  name: string | null;
  createdAt: string;
}

export interface CreateHolidayInput {
  date: string;
  name?: string;
}

// ============================================================================
// Access events
// ============================================================================

export const ACCESS_EVENT_TYPES = ['entry', 'exit', 'denied', 'alarm'] as const;
export type AccessEventType = typeof ACCESS_EVENT_TYPES[number];

/**
 * A raw event from an access-control device.
 * Timestamps are device wall-clock time, `YYYY-MM-DDTHH:mm:ss`.
 */
export interface AccessEvent {
  id: string;
  /** Insertion order, used to break ties between identical timestamps */
  sequence: number;
  employeeId: string | null;
  deviceId: string;
  cardNumber: string | null;
  eventType: AccessEventType;
  timestamp: string;
  eventDate: string;
  rawPayload: string | null;
  processed: boolean;
  createdAt: string;
}

export interface RecordEventInput {
  employeeId?: string | null;
  deviceId: string;
  cardNumber?: string | null;
  eventType: AccessEventType;
  timestamp: string;
  rawPayload?: string | null;
}

// ============================================================================
// Sessions and summaries
// ============================================================================

export const SESSION_STATUSES = ['auto', 'manual', 'open', 'closed_manual'] as const;
export type SessionStatus = typeof SESSION_STATUSES[number];

export interface WorkSession {
  id: string;
  employeeId: string;
  date: string;
  startTime: string;
  endTime: string | null;
  durationSeconds: number;
  status: SessionStatus;
  manualReason: string | null;
  correctedBy: string | null;
  createdAt: string;
  updatedAt: string;
}

export const DAY_STATUSES = ['present', 'absent', 'excused', 'partial', 'problem'] as const;
export type DayStatus = typeof DAY_STATUSES[number];

export const SUMMARY_FLAGS = ['missing_exit', 'manual_inconsistency', 'approved_leave', 'rest_day'] as const;
export type SummaryFlag = typeof SUMMARY_FLAGS[number];

export interface DailySummary {
  id: string;
  employeeId: string;
  date: string;
  firstEntry: string | null;
  lastExit: string | null;
  totalSeconds: number;
  expectedSeconds: number;
  overtimeSeconds: number;
  underworkSeconds: number;
  sessionsCount: number;
  status: DayStatus;
  hasMissingExit: boolean;
  hasManualCorrections: boolean;
  flags: SummaryFlag[];
  createdAt: string;
  updatedAt: string;
}

// ============================================================================
// Audit
// ============================================================================

export const AUDIT_ACTIONS = [
  'create_session',
  'edit_session',
  'delete_session',
  'close_session',
  'create_summary',
  'edit_summary',
  'reprocess_day',
  'bulk_import',
  'batch_process',
  'rebuild',
  'cleanup',
] as const;
export type AuditAction = typeof AUDIT_ACTIONS[number];

export interface AuditLogEntry {
  id: string;
  employeeId: string | null;
  date: string | null;
  action: AuditAction;
  description: string;
  oldValue: string | null;
  newValue: string | null;
  reason: string | null;
  changedBy: string;
  changedAt: string;
}

export interface CreateAuditEntryInput {
  employeeId?: string | null;
  date?: string | null;
  action: AuditAction;
  description: string;
  oldValue?: unknown;
  newValue?: unknown;
  reason?: string | null;
  changedBy?: string;
}

// ============================================================================
// Settings
// ============================================================================

export interface WorkCalendarSettings {
  /** Days of week counted as work days, 0 = Sunday */
  workdays: number[];
  /** Default contracted hours for new employees */
  standardDailyHours: number;
}

export interface ProcessingSettings {
  batchSize: number;
  rebuildBatchSize: number;
  /** Closed sessions shorter than this are discarded; 0 keeps all */
  minSessionSeconds: number;
}

export interface RetentionSettings {
  olderThanDays: number;
}

export interface EngineSettings {
  calendar: WorkCalendarSettings;
  processing: ProcessingSettings;
  retention: RetentionSettings;
}
