import type Database from 'better-sqlite3';
import logger from '../../utils/logger';

/**
 * Migration 001: Create bookings table
 *
 * Creates the table with its current column set. Databases created by
 * earlier releases already have the table and are upgraded by 002.
 */

const MIGRATION_ID = '001_create_bookings';

export function run(db: Database.Database): void {
  const tableExists = db.prepare(
    "SELECT name FROM sqlite_master WHERE type='table' AND name='bookings'"
  ).get();

  if (tableExists) {
    logger.info(`Migration ${MIGRATION_ID}: already applied, skipping`);
    return;
  }

  logger.info(`Migration ${MIGRATION_ID}: applying...`);

  db.exec(`
    CREATE TABLE IF NOT EXISTS bookings (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      nome TEXT NOT NULL,
      cognome TEXT NOT NULL,
      telefono TEXT NOT NULL,
      email TEXT NOT NULL,
      data_ora TEXT,
      data TEXT,
      ora TEXT,
      note TEXT,
      status TEXT DEFAULT 'booked',
      token TEXT,
      created_at TEXT NOT NULL,
      canceled_at TEXT,
      attended INTEGER NOT NULL DEFAULT 0,
      paid INTEGER NOT NULL DEFAULT 0,
      thanked_at TEXT
    )
  `);

  logger.info(`Migration ${MIGRATION_ID}: applied successfully`);
}
