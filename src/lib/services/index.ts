/**
 * Services exports
 */

export {
  buildSessions,
  sortEvents,
  reconcileSessions,
  isDerivedSession,
  isClosingUpdate,
  emptyAnomalyCounts,
  addAnomalyCounts,
} from './session-builder';

export type {
  SessionEvent,
  BuiltSession,
  AnomalyKind,
  SessionAnomaly,
  SessionBuildResult,
  BuildOptions,
  SessionUpdate,
  SessionPlan,
} from './session-builder';

export {
  STATUS_RULES,
  classifyDay,
  aggregateDay,
  hasManualInconsistency,
  isManualSession,
} from './summary-aggregator';

export type {
  AggregatedSession,
  DayContext,
  SummaryFacts,
  StatusRule,
} from './summary-aggregator';

export {
  MODE_RULES,
  rulesFor,
  createPolicy,
  resolveBatchPolicy,
  resolveRebuildPolicy,
  requiresConfirmation,
} from './processing-policy';

export type { ModeRules } from './processing-policy';

export {
  DatabaseEmployeeDirectory,
  fullDaySeconds,
  resolveDayContext,
} from './employee-directory';

export {
  planPair,
  applyPlan,
  processPair,
  processPairInTransaction,
} from './pair-processor';

export type { PairContext, PairPlan } from './pair-processor';

export { runBatch } from './batch-processor';
export { rebuild } from './rebuild-controller';
export { reprocess } from './reprocess';
export type { ReprocessResult } from './reprocess';
export { cleanup, cutoffFor } from './retention-cleaner';
export { closeOpenSessions, createManualSession } from './session-admin';
export type { ManualSessionInput } from './session-admin';

export {
  statsReporter,
  getSystemStats,
  getDepartmentStats,
  getEmployeeStats,
  tallyStatuses,
  calculateEfficiency,
  calculateAttendanceRate,
} from './stats-reporter';

export type {
  StatusTally,
  StatsPeriod,
  SummaryTotals,
  SystemStats,
  DepartmentStats,
  EmployeeStats,
} from './stats-reporter';
