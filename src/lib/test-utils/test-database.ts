/**
 * Test database utilities using better-sqlite3
 * Runs the real schema and repositories against a private in-memory database
 */

import { initDatabase, closeDatabase, flushDatabase, getDatabase } from '../database';

/**
 * Initialize an in-memory test database
 */
export async function initTestDatabase(): Promise<void> {
  await initDatabase(':memory:');
}

/**
 * Close the test database
 */
export async function closeTestDatabase(): Promise<void> {
  await closeDatabase();
}

/**
 * Reset the test database (clear all data but keep schema)
 */
export async function resetTestDatabase(): Promise<void> {
  await flushDatabase();
}

/**
 * Execute a SQL statement directly, bypassing the repositories
 */
export function testExecute(query: string, bindValues: unknown[] = []): { rowsAffected: number } {
  const result = getDatabase().prepare(query).run(...bindValues);
  return { rowsAffected: result.changes };
}

/**
 * Execute a SQL query directly, bypassing the repositories
 */
export function testSelect<T>(query: string, bindValues: unknown[] = []): T[] {
  return getDatabase().prepare<unknown[], T>(query).all(...bindValues);
}

/**
 * Row count of one table
 */
export function countRows(table: string): number {
  const rows = testSelect<{ count: number }>(`SELECT COUNT(*) as count FROM ${table}`);
  return rows[0]?.count ?? 0;
}
