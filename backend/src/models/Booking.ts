import Database from 'better-sqlite3';
import { transaction } from '../config/database';
import { loggers } from '../utils/logger';
import type { Booking, BookingFlagsUpdate, BookingRow, NewBooking } from '../types/booking';

/**
 * Booking Model
 * SQL access to the bookings table. Business rules live in BookingService.
 */

export function formatSlot(date: string, time: string): string {
  return `${date} ${time}`;
}

export function toBooking(row: BookingRow): Booking {
  return {
    id: row.id,
    nome: row.nome,
    cognome: row.cognome,
    telefono: row.telefono,
    email: row.email,
    data: row.data,
    ora: row.ora,
    data_ora: row.data && row.ora ? formatSlot(row.data, row.ora) : row.data_ora,
    note: row.note ?? '',
    status: row.status === 'canceled' ? 'canceled' : 'booked',
    token: row.token,
    created_at: row.created_at,
    canceled_at: row.canceled_at,
    attended: Boolean(row.attended),
    paid: Boolean(row.paid),
    thanked_at: row.thanked_at,
  };
}

function isSlotTakenError(error: unknown): boolean {
  return (
    error instanceof Database.SqliteError &&
    error.code === 'SQLITE_CONSTRAINT_UNIQUE' &&
    error.message.includes('bookings.data')
  );
}

export class BookingModel {
  constructor(private readonly db: Database.Database) {}

  /**
   * All bookings in schedule order; rows without date or time go last
   */
  listAll(): Booking[] {
    const rows = this.db.prepare<[], BookingRow>(`
      SELECT * FROM bookings
      ORDER BY data IS NULL, data ASC, ora IS NULL, ora ASC, created_at ASC, id ASC
    `).all();

    loggers.dbOperation('SELECT', 'bookings', { count: rows.length });

    return rows.map(toBooking);
  }

  findById(id: number): Booking | null {
    const row = this.db.prepare<[number], BookingRow>('SELECT * FROM bookings WHERE id = ?').get(id);
    return row ? toBooking(row) : null;
  }

  findByToken(token: string): Booking | null {
    const row = this.db.prepare<[string], BookingRow>('SELECT * FROM bookings WHERE token = ?').get(token);
    return row ? toBooking(row) : null;
  }

  /**
   * (data, ora) pairs currently held by a booked row
   */
  listBookedSlots(): { data: string; ora: string }[] {
    return this.db.prepare<[], { data: string; ora: string }>(`
      SELECT data, ora FROM bookings
      WHERE status = 'booked' AND data IS NOT NULL AND ora IS NOT NULL
    `).all();
  }

  isSlotBooked(date: string, time: string): boolean {
    const row = this.db.prepare(`
      SELECT 1 FROM bookings
      WHERE data = ? AND ora = ? AND status = 'booked'
      LIMIT 1
    `).get(date, time);
    return row !== undefined;
  }

  /**
   * Insert a booked row unless the slot is already held.
   * Returns null when the slot is taken.
   */
  insertIfSlotFree(input: NewBooking): Booking | null {
    const insert = (db: Database.Database): number | null => {
      if (this.isSlotBooked(input.data, input.ora)) {
        return null;
      }

      const result = db.prepare(`
        INSERT INTO bookings (
          nome, cognome, telefono, email, data_ora, data, ora, note,
          status, token, created_at, attended, paid
        ) VALUES (
          @nome, @cognome, @telefono, @email, @data_ora, @data, @ora, @note,
          'booked', @token, @created_at, 0, 0
        )
      `).run({ ...input, data_ora: formatSlot(input.data, input.ora) });

      return Number(result.lastInsertRowid);
    };

    let id: number | null;
    try {
      id = transaction(this.db, insert);
    } catch (error) {
      if (isSlotTakenError(error)) {
        return null;
      }
      throw error;
    }

    if (id === null) {
      return null;
    }

    loggers.dbOperation('INSERT', 'bookings', { id, data: input.data, ora: input.ora });

    const created = this.findById(id);
    if (!created) {
      throw new Error(`Booking ${id} missing right after insert`);
    }
    return created;
  }

  /**
   * Move a booked row to canceled. Returns false when it was not in 'booked' state.
   */
  markCanceled(id: number, canceledAt: string): boolean {
    const result = this.db.prepare(`
      UPDATE bookings SET status = 'canceled', canceled_at = ?
      WHERE id = ? AND status = 'booked'
    `).run(canceledAt, id);

    loggers.dbOperation('UPDATE', 'bookings', { id, status: 'canceled', changes: result.changes });

    return result.changes > 0;
  }

  delete(id: number): boolean {
    const result = this.db.prepare('DELETE FROM bookings WHERE id = ?').run(id);

    loggers.dbOperation('DELETE', 'bookings', { id, changes: result.changes });

    return result.changes > 0;
  }

  /**
   * Apply only the flags present in `update`
   */
  updateFlags(id: number, update: BookingFlagsUpdate): void {
    const assignments: string[] = [];
    const params: Record<string, number> = { id };

    if (update.attended !== undefined) {
      assignments.push('attended = @attended');
      params.attended = update.attended ? 1 : 0;
    }
    if (update.paid !== undefined) {
      assignments.push('paid = @paid');
      params.paid = update.paid ? 1 : 0;
    }

    if (assignments.length === 0) {
      return;
    }

    this.db.prepare(`UPDATE bookings SET ${assignments.join(', ')} WHERE id = @id`).run(params);

    loggers.dbOperation('UPDATE', 'bookings', { id, ...update });
  }

  /**
   * Record the thank-you email. Only the first call has an effect.
   */
  setThankedAt(id: number, thankedAt: string): boolean {
    const result = this.db.prepare(`
      UPDATE bookings SET thanked_at = ?
      WHERE id = ? AND thanked_at IS NULL
    `).run(thankedAt, id);

    return result.changes > 0;
  }

  /**
   * Undo a setThankedAt claim, only if it still holds the same timestamp
   */
  clearThankedAt(id: number, thankedAt: string): boolean {
    const result = this.db.prepare(`
      UPDATE bookings SET thanked_at = NULL
      WHERE id = ? AND thanked_at = ?
    `).run(id, thankedAt);

    return result.changes > 0;
  }
}
