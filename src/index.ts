/**
 * worktime-engine
 *
 * Derives work sessions and daily attendance summaries from access-control
 * events stored in SQLite.
 */

export { initDatabase, closeDatabase, getDatabase, withTransaction } from './lib/database';
export { loadRuntimeConfig } from './lib/config';
export type { RuntimeConfig } from './lib/config';
export {
  EngineError,
  ConfigurationError,
  DestructiveOperationError,
  StorageError,
  isConnectivityFault,
  toApiError,
} from './lib/errors';

export * from './lib/services';

export { eventStore, recordEvent, recordEvents } from './lib/repositories/access-event.repository';
export { employeeRepository } from './lib/repositories/employee.repository';
export { departmentRepository } from './lib/repositories/department.repository';
export { deviceRepository } from './lib/repositories/device.repository';
export { leaveRepository } from './lib/repositories/leave.repository';
export { holidayRepository } from './lib/repositories/holiday.repository';
export { settingsRepository } from './lib/repositories/settings.repository';
export { auditLogRepository } from './lib/repositories/audit-log.repository';
export { workSessionRepository } from './lib/repositories/work-session.repository';
export { dailySummaryRepository } from './lib/repositories/daily-summary.repository';

export * from './types';
