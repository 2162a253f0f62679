/**
 * API response, error and row types for the work-time engine
 */

// ============================================================================
// Generic API Response Types
// ============================================================================

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// Error Codes
// ============================================================================

export const ErrorCodes = {
  // Database errors
  DB_CONNECTION_ERROR: 'DB_CONNECTION_ERROR',
  DB_QUERY_ERROR: 'DB_QUERY_ERROR',
  DB_CONSTRAINT_VIOLATION: 'DB_CONSTRAINT_VIOLATION',
  DB_NOT_FOUND: 'DB_NOT_FOUND',

  // Processing errors
  PROCESSING_FAILED: 'PROCESSING_FAILED',
  PROCESSING_PARTIAL_FAILURE: 'PROCESSING_PARTIAL_FAILURE',
  CONFIRMATION_REQUIRED: 'CONFIRMATION_REQUIRED',

  // Validation errors
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_INPUT: 'INVALID_INPUT',
  DUPLICATE_ENTRY: 'DUPLICATE_ENTRY',

  // General errors
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

// ============================================================================
// Database Row Types (for SQLite queries)
// ============================================================================

export interface DepartmentRow {
  id: string;
  name: string;
  created_at: string;
  member_count?: number;
}

export interface EmployeeRow {
  id: string;
  employee_code: string;
  full_name: string;
  department_id: string | null;
  work_fraction: number;
  daily_hours: number;
  is_active: number;
  created_at: string;
  updated_at: string;
}

export interface DeviceRow {
  id: string;
  name: string;
  location: string | null;
  is_active: number;
  created_at: string;
  updated_at: string;
}

export interface LeaveRow {
  id: string;
  employee_id: string;
  kind: string;
  start_date: string;
  end_date: string;
  status: string;
  note: string | null;
  created_at: string;
}

export interface AccessEventRow {
  id: string;
  sequence: number;
  employee_id: string | null;
  device_id: string;
  card_number: string | null;
  event_type: string;
  timestamp: string;
  event_date: string;
  raw_payload: string | null;
  processed: number;
  created_at: string;
}

export interface WorkSessionRow {
  id: string;
  employee_id: string;
  date: string;
  start_time: string;
  end_time: string | null;
  duration_seconds: number;
  status: string;
  manual_reason: string | null;
  corrected_by: string | null;
  created_at: string;
  updated_at: string;
}

export interface DailySummaryRow {
  id: string;
  employee_id: string;
  date: string;
  first_entry: string | null;
  last_exit: string | null;
  total_seconds: number;
  expected_seconds: number;
  overtime_seconds: number;
  underwork_seconds: number;
  sessions_count: number;
  status: string;
  has_missing_exit: number;
  has_manual_corrections: number;
  flags: string | null;
  created_at: string;
  updated_at: string;
}

export interface AuditLogRow {
  id: string;
  employee_id: string | null;
  date: string | null;
  action: string;
  description: string;
  old_value: string | null;
  new_value: string | null;
  reason: string | null;
  changed_by: string;
  changed_at: string;
}

export interface SettingsRow {
  key: string;
  value: string;
  updated_at: string;
}

export interface CountRow {
  count: number;
}
