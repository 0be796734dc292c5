import type Database from 'better-sqlite3';
import { transaction } from '../../config/database';
import logger from '../../utils/logger';

/**
 * Migration 002: Add booking columns introduced after the first release
 *
 * Additive only. Missing columns are appended and legacy rows backfilled:
 * a null status becomes 'booked', null attended/paid flags become 0.
 */

const MIGRATION_ID = '002_add_booking_columns';

const OPTIONAL_COLUMNS: ReadonlyArray<[name: string, definition: string]> = [
  ['data_ora', 'TEXT'],
  ['data', 'TEXT'],
  ['note', 'TEXT'],
  ['ora', 'TEXT'],
  ['status', "TEXT DEFAULT 'booked'"],
  ['token', 'TEXT'],
  ['canceled_at', 'TEXT'],
  ['attended', 'INTEGER DEFAULT 0'],
  ['paid', 'INTEGER DEFAULT 0'],
  ['thanked_at', 'TEXT'],
];

export function run(db: Database.Database): void {
  const columns = db.prepare<[], { name: string }>("PRAGMA table_info('bookings')").all();
  const existing = new Set(columns.map((c) => c.name));
  const missing = OPTIONAL_COLUMNS.filter(([name]) => !existing.has(name));

  const backfilledStatus = transaction(db, () => {
    for (const [name, definition] of missing) {
      db.exec(`ALTER TABLE bookings ADD COLUMN ${name} ${definition}`);
    }

    const backfilled = db.prepare("UPDATE bookings SET status = 'booked' WHERE status IS NULL").run();
    db.exec('UPDATE bookings SET attended = 0 WHERE attended IS NULL');
    db.exec('UPDATE bookings SET paid = 0 WHERE paid IS NULL');
    return backfilled.changes;
  });

  if (missing.length === 0 && backfilledStatus === 0) {
    logger.info(`Migration ${MIGRATION_ID}: already applied, skipping`);
    return;
  }

  logger.info(`Migration ${MIGRATION_ID}: applied successfully`, {
    addedColumns: missing.map(([name]) => name),
    backfilledStatus,
  });
}
