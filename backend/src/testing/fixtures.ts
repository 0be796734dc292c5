import type Database from 'better-sqlite3';
import { openDatabase } from '../config/database';
import { runMigrations } from '../database/migrate';
import type { BookingNotifier, EmailResult } from '../services/emailService';
import type { Booking } from '../types/booking';
import type { BookingInput } from '../services/bookingService';

/**
 * Test helpers: in-memory database, controllable clock, recording notifier
 */

export function createTestDatabase(): Database.Database {
  const db = openDatabase(':memory:');
  runMigrations(db);
  return db;
}

export class TestClock {
  private current: Date;

  constructor(iso: string) {
    this.current = new Date(iso);
  }

  readonly now = (): Date => new Date(this.current.getTime());

  set(iso: string): void {
    this.current = new Date(iso);
  }
}

export class FakeNotifier implements BookingNotifier {
  readonly confirmations: { booking: Booking; cancelUrl: string }[] = [];
  readonly thankYous: Booking[] = [];
  confirmationResult: EmailResult = { status: 'sent', messageId: 'confirmation-1' };
  thankYouResult: EmailResult = { status: 'sent', messageId: 'thank-you-1' };

  async sendConfirmation(booking: Booking, cancelUrl: string): Promise<EmailResult> {
    this.confirmations.push({ booking, cancelUrl });
    return this.confirmationResult;
  }

  async sendThankYou(booking: Booking): Promise<EmailResult> {
    this.thankYous.push(booking);
    return this.thankYouResult;
  }
}

export function bookingInput(overrides: BookingInput = {}): BookingInput {
  return {
    nome: 'Mario',
    cognome: 'Rossi',
    telefono: '+39 333 0000000',
    email: 'mario.rossi@example.com',
    data: '2025-03-10',
    ora: '09:00',
    note: '',
    privacy: 'on',
    ...overrides,
  };
}
