import Database from 'better-sqlite3';
import logger from '../../utils/logger';

/**
 * Migration 003: Booking indexes
 *
 * - token is unique (cancellation links address exactly one booking)
 * - at most one 'booked' row per (data, ora), enforced by a partial unique index
 *
 * A legacy database that already holds a double booking cannot get the slot
 * index; the error is logged and the service keeps relying on the
 * transactional existence check in BookingModel.insertIfSlotFree.
 */

const MIGRATION_ID = '003_booking_indexes';

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Database.SqliteError && error.code.startsWith('SQLITE_CONSTRAINT');
}

function createIndex(db: Database.Database, name: string, sql: string): boolean {
  try {
    db.exec(sql);
    return true;
  } catch (error) {
    if (!isUniqueViolation(error)) {
      throw error;
    }
    logger.error(`Migration ${MIGRATION_ID}: cannot create ${name}, existing rows violate it`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

export function run(db: Database.Database): void {
  const created = [
    createIndex(
      db,
      'idx_bookings_token',
      'CREATE UNIQUE INDEX IF NOT EXISTS idx_bookings_token ON bookings(token)'
    ),
    createIndex(
      db,
      'idx_bookings_booked_slot',
      "CREATE UNIQUE INDEX IF NOT EXISTS idx_bookings_booked_slot ON bookings(data, ora) WHERE status = 'booked'"
    ),
  ];

  db.exec('CREATE INDEX IF NOT EXISTS idx_bookings_schedule ON bookings(data, ora, created_at)');

  logger.info(`Migration ${MIGRATION_ID}: checked`, {
    tokenIndex: created[0],
    bookedSlotIndex: created[1],
  });
}
