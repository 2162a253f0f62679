import Database from 'better-sqlite3';
import { SCHEMA, TABLES } from './schema';
import { StorageError } from './errors';
import { ErrorCodes } from '../types/api';

let db: Database.Database | null = null;

// Transaction units share the single connection, so they run one at a time
let transactionQueue: Promise<void> = Promise.resolve();

/**
 * Initialize the database connection and apply the schema.
 * `:memory:` gives a private in-process database (used by tests).
 */
export async function initDatabase(path: string): Promise<Database.Database> {
  if (db) {
    return db;
  }

  let connection: Database.Database;
  try {
    connection = new Database(path);
  } catch (error) {
    throw new StorageError(`Cannot open database at ${path}`, ErrorCodes.DB_CONNECTION_ERROR, error);
  }
  // WAL lets a live ingester read while a batch run writes
  connection.pragma('journal_mode = WAL');
  // Wait up to 30 seconds on a lock held by another process before failing
  connection.pragma('busy_timeout = 30000');
  connection.pragma('synchronous = NORMAL');
  // SQLite has foreign keys off by default
  connection.pragma('foreign_keys = ON');
  connection.exec(SCHEMA);

  db = connection;
  transactionQueue = Promise.resolve();
  return db;
}

/**
 * Get the database instance.
 * Throws if database is not initialized.
 */
export function getDatabase(): Database.Database {
  if (!db || !db.open) {
    throw new StorageError(
      'Database not initialized. Call initDatabase() first.',
      ErrorCodes.DB_CONNECTION_ERROR
    );
  }
  return db;
}

/**
 * Close the database connection.
 */
export async function closeDatabase(): Promise<void> {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Execute a SQL statement that doesn't return results (INSERT, UPDATE, DELETE).
 * Retries on "database is locked" errors.
 */
export async function execute(
  query: string,
  bindValues: unknown[] = []
): Promise<{ rowsAffected: number; lastInsertId: number }> {
  const database = getDatabase();
  return retryOnLock(() => {
    const result = database.prepare(query).run(...bindValues);
    return { rowsAffected: result.changes, lastInsertId: Number(result.lastInsertRowid) };
  });
}

/**
 * Execute a SQL query that returns results (SELECT).
 */
export async function select<T>(query: string, bindValues: unknown[] = []): Promise<T[]> {
  const database = getDatabase();
  return retryOnLock(() => database.prepare<unknown[], T>(query).all(...bindValues));
}

function isLockError(error: unknown): boolean {
  if (error instanceof Error && 'code' in error && (error.code === 'SQLITE_BUSY' || error.code === 'SQLITE_LOCKED')) {
    return true;
  }
  const msg = error instanceof Error ? error.message : String(error);
  return msg.includes('database is locked');
}

/**
 * Retry a database operation if it fails with "database is locked".
 * Uses exponential backoff with jitter.
 */
async function retryOnLock<T>(fn: () => T, maxRetries = 5): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return fn();
    } catch (error) {
      if (!isLockError(error) || attempt >= maxRetries) {
        throw error;
      }
      // Exponential backoff: 100ms, 200ms, 400ms, 800ms, 1600ms + jitter
      const delay = Math.min(100 * Math.pow(2, attempt), 2000) + Math.random() * 100;
      console.warn(`[database] Locked, retrying in ${Math.round(delay)}ms (attempt ${attempt + 1}/${maxRetries})`);
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
}

/**
 * Run `fn` inside one write transaction.
 *
 * BEGIN IMMEDIATE takes the database write lock up front, so a second
 * process working on the same employee-day waits instead of interleaving.
 * Commits when `fn` resolves, rolls back and rethrows when it rejects.
 * Units must not nest: `fn` must not call withTransaction again.
 */
export function withTransaction<T>(fn: () => Promise<T>): Promise<T> {
  const run = async (): Promise<T> => {
    const database = getDatabase();
    await retryOnLock(() => database.exec('BEGIN IMMEDIATE'));
    try {
      const result = await fn();
      database.exec('COMMIT');
      return result;
    } catch (error) {
      if (database.open && database.inTransaction) {
        database.exec('ROLLBACK');
      }
      throw error;
    }
  };

  const result = transactionQueue.then(run, run);
  transactionQueue = result.then(() => {}, () => {});
  return result;
}

/**
 * Delete all records but keep the schema intact.
 */
export async function flushDatabase(): Promise<void> {
  const database = getDatabase();
  // TABLES is ordered children first
  for (const table of TABLES) {
    database.exec(`DELETE FROM ${table}`);
  }
  console.log('[database] Flushed all tables');
}
