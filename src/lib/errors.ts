/**
 * Engine error types
 *
 * Every failure the engine raises on purpose carries one of the
 * `ErrorCodes`, so callers (CLI, HTTP) can map it without parsing messages.
 */

import { ErrorCodes, type ApiError, type ErrorCode } from '../types/api';

export class EngineError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    if (details) {
      this.details = details;
    }
  }
}

/**
 * Bad options or unknown filter targets. Always raised before any write.
 */
export class ConfigurationError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>, code: ErrorCode = ErrorCodes.VALIDATION_ERROR) {
    super(code, message, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * A destructive operation was requested without confirmation.
 */
export class DestructiveOperationError extends EngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(ErrorCodes.CONFIRMATION_REQUIRED, message, details);
    this.name = 'DestructiveOperationError';
  }
}

export class StorageError extends EngineError {
  constructor(message: string, code: ErrorCode = ErrorCodes.DB_QUERY_ERROR, cause?: unknown) {
    super(code, message);
    this.name = 'StorageError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

const CONNECTIVITY_SQLITE_CODES = ['SQLITE_CANTOPEN', 'SQLITE_NOTADB', 'SQLITE_CORRUPT', 'SQLITE_FULL'];

function sqliteCode(error: unknown): string | null {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return null;
}

/**
 * True for faults that make every further pair fail too: the database file
 * is gone, unreadable or the connection was closed underneath us.
 */
export function isConnectivityFault(error: unknown): boolean {
  if (error instanceof StorageError) {
    return error.code === ErrorCodes.DB_CONNECTION_ERROR;
  }
  const code = sqliteCode(error);
  if (code && (CONNECTIVITY_SQLITE_CODES.includes(code) || code.startsWith('SQLITE_IOERR'))) {
    return true;
  }
  const message = error instanceof Error ? error.message : String(error);
  return message.includes('database connection is not open')
    || message.includes('Database not initialized');
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Convert any thrown value into the API error shape
 */
export function toApiError(error: unknown): ApiError {
  if (error instanceof EngineError) {
    const apiError: ApiError = { code: error.code, message: error.message };
    if (error.details) {
      apiError.details = error.details;
    }
    return apiError;
  }
  const code = sqliteCode(error);
  if (code === 'SQLITE_CONSTRAINT' || code?.startsWith('SQLITE_CONSTRAINT_')) {
    return { code: ErrorCodes.DB_CONSTRAINT_VIOLATION, message: errorMessage(error) };
  }
  if (isConnectivityFault(error)) {
    return { code: ErrorCodes.DB_CONNECTION_ERROR, message: errorMessage(error) };
  }
  return { code: ErrorCodes.UNKNOWN_ERROR, message: errorMessage(error) };
}
