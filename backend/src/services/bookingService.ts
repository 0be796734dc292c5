import { randomBytes } from 'crypto';
import { z } from 'zod';
import { BOOKING_WINDOW_DAYS, isValidTimeSlot } from '../config/slots';
import { ConflictError, NotFoundError, ValidationError } from '../middleware/errorHandler';
import type { BookingModel } from '../models/Booking';
import type { Booking, BookingFlagsUpdate } from '../types/booking';
import { type Clock, nowIso, parseDateKey, systemClock, todayUtc } from '../utils/dates';
import logger from '../utils/logger';
import type { BookingNotifier } from './emailService';

/**
 * Booking Service
 * Validation and lifecycle rules for bookings: creation with slot conflict
 * detection, cancellation by token or id, admin flag updates and the
 * thank-you email that follows a first attendance.
 */

const requiredText = z.string().trim().min(1);

const DECLINED_CONSENT = new Set(['false', '0', 'off', 'no']);

const BookingFieldsSchema = z.object({
  nome: requiredText,
  cognome: requiredText,
  telefono: requiredText,
  email: requiredText,
  data: requiredText,
  ora: requiredText,
  note: z.string().trim().optional().default(''),
});

const PublicBookingFieldsSchema = BookingFieldsSchema.extend({
  privacy: requiredText.refine((value) => !DECLINED_CONSENT.has(value.toLowerCase())),
});

export type BookingInput = Record<string, string | undefined>;

export interface CreateBookingOptions {
  /** Public bookings must carry the privacy consent flag */
  requireConsent: boolean;
}

export interface CancelResult {
  booking: Booking;
  alreadyCanceled: boolean;
}

export interface UpdateResult {
  booking: Booking;
  thankYouSent: boolean;
}

/** 24 random bytes, URL-safe */
export function generateCancelToken(): string {
  return randomBytes(24).toString('base64url');
}

export function buildCancelUrl(baseUrl: string, token: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/annulla?token=${encodeURIComponent(token)}`;
}

export class BookingService {
  constructor(
    private readonly bookings: BookingModel,
    private readonly notifier: BookingNotifier,
    private readonly clock: Clock = systemClock
  ) {}

  list(): Booking[] {
    return this.bookings.listAll();
  }

  /**
   * Validate and store a new booking
   */
  create(input: BookingInput, options: CreateBookingOptions): Booking {
    const schema = options.requireConsent ? PublicBookingFieldsSchema : BookingFieldsSchema;
    const parsed = schema.safeParse(input);
    if (!parsed.success) {
      throw new ValidationError('Compila tutti i campi obbligatori.', 'Dati mancanti');
    }
    const fields = parsed.data;

    const date = parseDateKey(fields.data);
    if (!date) {
      throw new ValidationError('Seleziona una data corretta.', 'Data non valida');
    }

    const minDate = todayUtc(this.clock);
    const maxDate = minDate.plus({ days: BOOKING_WINDOW_DAYS - 1 });
    if (date.toMillis() < minDate.toMillis() || date.toMillis() > maxDate.toMillis()) {
      throw new ValidationError('Seleziona una data entro 2 mesi.', 'Data fuori intervallo');
    }

    if (!isValidTimeSlot(fields.ora)) {
      throw new ValidationError('Seleziona un orario valido.', 'Orario non valido');
    }

    const created = this.bookings.insertIfSlotFree({
      nome: fields.nome,
      cognome: fields.cognome,
      telefono: fields.telefono,
      email: fields.email,
      data: fields.data,
      ora: fields.ora,
      note: fields.note,
      token: generateCancelToken(),
      created_at: nowIso(this.clock),
    });

    if (!created) {
      throw new ConflictError('Seleziona un altro orario.', 'Slot non disponibile');
    }

    logger.info('Booking created', { id: created.id, data: created.data, ora: created.ora });
    return created;
  }

  /**
   * Send the confirmation email. Returns whether it went out.
   */
  async sendConfirmation(booking: Booking, baseUrl: string): Promise<boolean> {
    if (!booking.token) {
      return false;
    }
    const result = await this.notifier.sendConfirmation(booking, buildCancelUrl(baseUrl, booking.token));
    return result.status === 'sent';
  }

  /**
   * Public cancellation through the link in the confirmation email
   */
  cancelByToken(rawToken: string | undefined): CancelResult {
    const token = rawToken?.trim() ?? '';
    if (!token) {
      throw new ValidationError('Impossibile annullare.', 'Token mancante');
    }

    const booking = this.bookings.findByToken(token);
    if (!booking) {
      throw new NotFoundError('Richiesta non trovata.', 'Token non valido');
    }

    return this.cancel(booking);
  }

  cancelById(id: number): CancelResult {
    return this.cancel(this.requireBooking(id));
  }

  deleteById(id: number): void {
    if (!this.bookings.delete(id)) {
      throw new NotFoundError('Prenotazione non trovata.');
    }
    logger.info('Booking deleted', { id });
  }

  /**
   * Partial update of the admin flags. The first time a booking is marked as
   * attended a thank-you email is sent. thanked_at is claimed before sending,
   * so overlapping updates cannot send twice, and released again when the
   * send fails so a later false -> true transition retries.
   */
  async update(id: number, flags: BookingFlagsUpdate): Promise<UpdateResult> {
    const before = this.requireBooking(id);
    this.bookings.updateFlags(id, flags);

    const becameAttended = flags.attended === true && !before.attended;
    if (!becameAttended) {
      return { booking: this.requireBooking(id), thankYouSent: false };
    }

    const claimedAt = nowIso(this.clock);
    if (!this.bookings.setThankedAt(id, claimedAt)) {
      return { booking: this.requireBooking(id), thankYouSent: false };
    }

    const result = await this.notifier.sendThankYou(this.requireBooking(id));
    const thankYouSent = result.status === 'sent';
    if (!thankYouSent) {
      this.bookings.clearThankedAt(id, claimedAt);
    }

    return { booking: this.requireBooking(id), thankYouSent };
  }

  private cancel(booking: Booking): CancelResult {
    if (booking.status === 'canceled') {
      return { booking, alreadyCanceled: true };
    }

    const changed = this.bookings.markCanceled(booking.id, nowIso(this.clock));
    if (changed) {
      logger.info('Booking canceled', { id: booking.id, data: booking.data, ora: booking.ora });
    }

    return { booking: this.requireBooking(booking.id), alreadyCanceled: !changed };
  }

  private requireBooking(id: number): Booking {
    const booking = this.bookings.findById(id);
    if (!booking) {
      throw new NotFoundError('Prenotazione non trovata.');
    }
    return booking;
  }
}
