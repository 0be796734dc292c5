import Database from 'better-sqlite3';
import logger from '../utils/logger';

/**
 * SQLite Database Configuration
 * One long-lived connection per process, opened at startup
 */

let dbInstance: Database.Database | null = null;

/**
 * Open a connection with the pragmas the service relies on.
 * Pass ':memory:' for an ephemeral database.
 */
export function openDatabase(filePath: string): Database.Database {
  try {
    const db = new Database(filePath, {
      verbose: process.env.NODE_ENV === 'development' ? (message) => logger.debug(String(message)) : undefined,
    });

    db.pragma('foreign_keys = ON');

    // WAL for concurrent readers alongside the single writer
    if (filePath !== ':memory:') {
      db.pragma('journal_mode = WAL');
    }
    db.pragma('busy_timeout = 5000');

    logger.info('Database connection established', { path: filePath });
    return db;
  } catch (error) {
    logger.error('Failed to connect to database', {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}

/**
 * Open the process-wide connection (no-op when already open)
 */
export function initDatabase(filePath: string): Database.Database {
  if (!dbInstance) {
    dbInstance = openDatabase(filePath);
  }
  return dbInstance;
}

/**
 * Close the process-wide connection
 */
export function closeDatabase(): void {
  if (dbInstance) {
    try {
      dbInstance.close();
      dbInstance = null;
      logger.info('Database connection closed');
    } catch (error) {
      logger.error('Error closing database', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/**
 * Run a function inside a transaction; rolled back if it throws
 */
export function transaction<T>(db: Database.Database, fn: (db: Database.Database) => T): T {
  const txn = db.transaction(fn);
  return txn(db);
}

process.on('exit', () => {
  closeDatabase();
});
