import type Database from 'better-sqlite3';
import logger from '../utils/logger';
import { run as runCreateBookingsMigration } from './migrations/001_create_bookings';
import { run as runBookingColumnsMigration } from './migrations/002_add_booking_columns';
import { run as runBookingIndexesMigration } from './migrations/003_booking_indexes';

/**
 * Run every schema migration in order. Each one is idempotent.
 */
export function runMigrations(db: Database.Database): void {
  runCreateBookingsMigration(db);
  runBookingColumnsMigration(db);
  runBookingIndexesMigration(db);
  logger.info('Schema migration check completed');
}
