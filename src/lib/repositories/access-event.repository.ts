/**
 * AccessEvent Repository
 * Event Store over the access_events table
 */

import { randomUUID } from 'crypto';
import { execute, select, withTransaction } from '../database';
import { ConfigurationError } from '../errors';
import { normalizeTimestamp, extractLocalDate } from '../utils/date-time';
import { chunk, oneOf } from '../utils/guards';
import { ACCESS_EVENT_TYPES } from '../../types/models';
import type { AccessEvent, AccessEventType, RecordEventInput } from '../../types/models';
import type { AccessEventRow, CountRow } from '../../types/api';
import type { EventFilter, EventStore, PairKey } from '../../types/services';

// rowid is the insertion sequence
const EVENT_COLUMNS = `rowid AS sequence, id, employee_id, device_id, card_number, event_type,
  timestamp, event_date, raw_payload, processed, created_at`;

// Keeps "IN (...)" lists well under SQLite's bound-parameter limit
const IDS_PER_STATEMENT = 500;

/**
 * Map database row to AccessEvent model
 */
function mapRowToEvent(row: AccessEventRow): AccessEvent {
  return {
    id: row.id,
    sequence: row.sequence,
    employeeId: row.employee_id,
    deviceId: row.device_id,
    cardNumber: row.card_number,
    eventType: oneOf(ACCESS_EVENT_TYPES, row.event_type, 'denied'),
    timestamp: row.timestamp,
    eventDate: row.event_date,
    rawPayload: row.raw_payload,
    processed: row.processed === 1,
    createdAt: row.created_at,
  };
}

/**
 * Build the WHERE clause shared by the filter-based queries
 */
function buildFilterClause(
  filter: EventFilter,
  options: { unprocessedOnly: boolean; assigned?: boolean }
): { clause: string; params: unknown[] } {
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (options.unprocessedOnly) {
    conditions.push('processed = 0');
  }
  if (options.assigned === true) {
    conditions.push('employee_id IS NOT NULL');
  } else if (options.assigned === false) {
    conditions.push('employee_id IS NULL');
  }
  if (filter.employeeId) {
    conditions.push('employee_id = ?');
    params.push(filter.employeeId);
  }
  if (filter.deviceId) {
    conditions.push('device_id = ?');
    params.push(filter.deviceId);
  }
  if (filter.fromDate) {
    conditions.push('event_date >= ?');
    params.push(filter.fromDate);
  }
  if (filter.toDate) {
    conditions.push('event_date <= ?');
    params.push(filter.toDate);
  }

  return {
    clause: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
    params,
  };
}

/**
 * Resolve the employee for an event that only carries a badge number
 */
async function resolveEmployeeId(input: RecordEventInput): Promise<string | null> {
  if (input.employeeId) return input.employeeId;
  if (!input.cardNumber) return null;
  const rows = await select<{ id: string }>(
    'SELECT id FROM employees WHERE employee_code = ?',
    [input.cardNumber]
  );
  return rows[0]?.id ?? null;
}

/**
 * Record one event. Duplicates (same device, employee, type and time)
 * are ignored and reported with the existing row's ID.
 */
export async function recordEvent(input: RecordEventInput): Promise<{ inserted: boolean; id: string }> {
  const timestamp = normalizeTimestamp(input.timestamp);
  if (!timestamp) {
    throw new ConfigurationError(`Invalid event timestamp: ${input.timestamp}`, { timestamp: input.timestamp });
  }
  const id = randomUUID();
  const employeeId = await resolveEmployeeId(input);

  const result = await execute(
    `INSERT OR IGNORE INTO access_events
     (id, employee_id, device_id, card_number, event_type, timestamp, event_date, raw_payload, processed, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?, ?, 0, ?)`,
    [
      id,
      employeeId,
      input.deviceId,
      input.cardNumber ?? null,
      input.eventType,
      timestamp,
      extractLocalDate(timestamp),
      input.rawPayload ?? null,
      new Date().toISOString(),
    ]
  );

  if (result.rowsAffected > 0) {
    return { inserted: true, id };
  }

  const existing = await select<{ id: string }>(
    `SELECT id FROM access_events
     WHERE device_id = ? AND employee_id IS ? AND event_type = ? AND timestamp = ?`,
    [input.deviceId, employeeId, input.eventType, timestamp]
  );
  return { inserted: false, id: existing[0]?.id ?? id };
}

async function rowExists(table: 'devices' | 'employees', id: string): Promise<boolean> {
  const rows = await select<CountRow>(`SELECT COUNT(*) as count FROM ${table} WHERE id = ?`, [id]);
  return (rows[0]?.count ?? 0) > 0;
}

/**
 * Record many events in order, all or nothing. Events with an invalid
 * timestamp, an unknown device or an unknown employee are counted as
 * rejected and skipped; any other failure rolls back the whole import.
 */
export async function recordEvents(
  inputs: RecordEventInput[],
  onProgress?: (processed: number, total: number) => void
): Promise<{ inserted: number; duplicates: number; rejected: number }> {
  const known = new Map<string, boolean>();
  const exists = async (table: 'devices' | 'employees', id: string): Promise<boolean> => {
    const key = `${table}:${id}`;
    const cached = known.get(key);
    if (cached !== undefined) return cached;
    const found = await rowExists(table, id);
    known.set(key, found);
    return found;
  };

  return withTransaction(async () => {
    let inserted = 0;
    let duplicates = 0;
    let rejected = 0;

    for (let i = 0; i < inputs.length; i++) {
      const input = inputs[i];
      if (!input) continue;
      const valid = normalizeTimestamp(input.timestamp) !== null
        && (await exists('devices', input.deviceId))
        && (!input.employeeId || (await exists('employees', input.employeeId)));

      if (!valid) {
        rejected++;
      } else if ((await recordEvent(input)).inserted) {
        inserted++;
      } else {
        duplicates++;
      }

      if (onProgress && ((i + 1) % 100 === 0 || i + 1 === inputs.length)) {
        onProgress(i + 1, inputs.length);
      }
    }

    return { inserted, duplicates, rejected };
  });
}

/**
 * Get an event by ID
 */
export async function getEventById(id: string): Promise<AccessEvent | null> {
  const rows = await select<AccessEventRow>(
    `SELECT ${EVENT_COLUMNS} FROM access_events WHERE id = ?`,
    [id]
  );
  const row = rows[0];
  return row ? mapRowToEvent(row) : null;
}

/**
 * All events of one employee on one day, processed or not, in arrival order
 */
export async function getEventsForPair(employeeId: string, date: string): Promise<AccessEvent[]> {
  const rows = await select<AccessEventRow>(
    `SELECT ${EVENT_COLUMNS} FROM access_events
     WHERE employee_id = ? AND event_date = ?
     ORDER BY timestamp ASC, rowid ASC`,
    [employeeId, date]
  );
  return rows.map(mapRowToEvent);
}

/**
 * Unprocessed events matching the filter, ordered by time then insertion
 */
export async function fetchUnprocessed(filter: EventFilter = {}): Promise<AccessEvent[]> {
  const { clause, params } = buildFilterClause(filter, { unprocessedOnly: true });
  const rows = await select<AccessEventRow>(
    `SELECT ${EVENT_COLUMNS} FROM access_events ${clause}
     ORDER BY timestamp ASC, rowid ASC`,
    params
  );
  return rows.map(mapRowToEvent);
}

/**
 * Distinct (employee, date) pairs that have events matching the filter.
 * The device filter only selects pairs; processing a pair always reads
 * every event of that employee-day.
 */
export async function listPairs(
  filter: EventFilter,
  options: { unprocessedOnly: boolean }
): Promise<PairKey[]> {
  const { clause, params } = buildFilterClause(filter, { unprocessedOnly: options.unprocessedOnly, assigned: true });
  const rows = await select<{ employee_id: string; event_date: string }>(
    `SELECT employee_id, event_date FROM access_events ${clause}
     GROUP BY employee_id, event_date
     ORDER BY event_date ASC, employee_id ASC`,
    params
  );
  return rows.map((row) => ({ employeeId: row.employee_id, date: row.event_date }));
}

/**
 * Events that no employee could be resolved for
 */
export async function countUnassigned(
  filter: EventFilter,
  options: { unprocessedOnly: boolean }
): Promise<number> {
  const { clause, params } = buildFilterClause(
    { deviceId: filter.deviceId, fromDate: filter.fromDate, toDate: filter.toDate },
    { unprocessedOnly: options.unprocessedOnly, assigned: false }
  );
  const rows = await select<CountRow>(`SELECT COUNT(*) as count FROM access_events ${clause}`, params);
  return rows[0]?.count ?? 0;
}

async function setProcessed(eventIds: string[], processed: 0 | 1): Promise<number> {
  let affected = 0;
  for (const ids of chunk(eventIds, IDS_PER_STATEMENT)) {
    const placeholders = ids.map(() => '?').join(', ');
    const result = await execute(
      `UPDATE access_events SET processed = ? WHERE id IN (${placeholders}) AND processed != ?`,
      [processed, ...ids, processed]
    );
    affected += result.rowsAffected;
  }
  return affected;
}

/**
 * Flag events as processed. Returns how many changed.
 */
export async function markProcessed(eventIds: string[]): Promise<number> {
  return setProcessed(eventIds, 1);
}

/**
 * Clear the processed flag, used before a forced rebuild
 */
export async function resetProcessed(eventIds: string[]): Promise<number> {
  return setProcessed(eventIds, 0);
}

/**
 * Count events dated before the cutoff date
 */
export async function countEventsBefore(cutoffDate: string): Promise<number> {
  const rows = await select<CountRow>(
    'SELECT COUNT(*) as count FROM access_events WHERE event_date < ?',
    [cutoffDate]
  );
  return rows[0]?.count ?? 0;
}

export async function deleteEventsBefore(cutoffDate: string): Promise<number> {
  const result = await execute('DELETE FROM access_events WHERE event_date < ?', [cutoffDate]);
  return result.rowsAffected;
}

export interface EventTotals {
  total: number;
  inPeriod: number;
  unprocessed: number;
  byType: Record<AccessEventType, number>;
}

/**
 * Event counts for reporting; `byType` covers the period only
 */
export async function getEventTotals(fromDate: string, toDate: string): Promise<EventTotals> {
  const [totalRows, periodRows, unprocessedRows, typeRows] = await Promise.all([
    select<CountRow>('SELECT COUNT(*) as count FROM access_events'),
    select<CountRow>(
      'SELECT COUNT(*) as count FROM access_events WHERE event_date >= ? AND event_date <= ?',
      [fromDate, toDate]
    ),
    select<CountRow>('SELECT COUNT(*) as count FROM access_events WHERE processed = 0'),
    select<{ event_type: string; count: number }>(
      `SELECT event_type, COUNT(*) as count FROM access_events
       WHERE event_date >= ? AND event_date <= ?
       GROUP BY event_type`,
      [fromDate, toDate]
    ),
  ]);

  const byType: Record<AccessEventType, number> = { entry: 0, exit: 0, denied: 0, alarm: 0 };
  for (const row of typeRows) {
    byType[oneOf(ACCESS_EVENT_TYPES, row.event_type, 'denied')] += row.count;
  }

  return {
    total: totalRows[0]?.count ?? 0,
    inPeriod: periodRows[0]?.count ?? 0,
    unprocessed: unprocessedRows[0]?.count ?? 0,
    byType,
  };
}

export const accessEventRepository = {
  recordEvent,
  recordEvents,
  getEventById,
  getEventsForPair,
  fetchUnprocessed,
  listPairs,
  countUnassigned,
  markProcessed,
  resetProcessed,
  countEventsBefore,
  deleteEventsBefore,
  getEventTotals,
};

/**
 * The engine-facing view of the store
 */
export const eventStore: EventStore = {
  fetchUnprocessed,
  markProcessed,
};
