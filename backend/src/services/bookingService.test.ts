import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type Database from 'better-sqlite3';
import { ConflictError, NotFoundError, ValidationError } from '../middleware/errorHandler';
import { BookingModel } from '../models/Booking';
import { FakeNotifier, TestClock, bookingInput, createTestDatabase } from '../testing/fixtures';
import { BookingService, buildCancelUrl } from './bookingService';

describe('BookingService', () => {
  let db: Database.Database;
  let clock: TestClock;
  let notifier: FakeNotifier;
  let service: BookingService;

  beforeEach(() => {
    db = createTestDatabase();
    clock = new TestClock('2025-03-03T10:00:00.000Z');
    notifier = new FakeNotifier();
    service = new BookingService(new BookingModel(db), notifier, clock.now);
  });

  afterEach(() => {
    db.close();
  });

  const publicOptions = { requireConsent: true };
  const adminOptions = { requireConsent: false };

  function expectRejection(fn: () => unknown, errorClass: typeof ValidationError | typeof ConflictError | typeof NotFoundError, title: string) {
    let caught: unknown;
    try {
      fn();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(errorClass);
    expect(caught).toMatchObject({ title });
  }

  describe('create', () => {
    it('stores a trimmed booking with a fresh token', () => {
      const booking = service.create(
        bookingInput({ nome: '  Mario ', email: ' mario.rossi@example.com ', note: '  citofono 3 ' }),
        publicOptions
      );

      expect(booking).toMatchObject({
        id: 1,
        nome: 'Mario',
        cognome: 'Rossi',
        email: 'mario.rossi@example.com',
        data: '2025-03-10',
        ora: '09:00',
        data_ora: '2025-03-10 09:00',
        note: 'citofono 3',
        status: 'booked',
        created_at: '2025-03-03T10:00:00.000Z',
        canceled_at: null,
        attended: false,
        paid: false,
        thanked_at: null,
      });
      expect(booking.token).toMatch(/^[A-Za-z0-9_-]{32}$/);
    });

    it('issues a different token for every booking', () => {
      const first = service.create(bookingInput(), publicOptions);
      const second = service.create(bookingInput({ ora: '09:30' }), publicOptions);
      expect(first.token).not.toBe(second.token);
    });

    it('defaults the note to an empty string', () => {
      const { note, ...withoutNote } = bookingInput();
      expect(note).toBe('');
      expect(service.create(withoutNote, publicOptions).note).toBe('');
    });

    it('requires every person and scheduling field', () => {
      for (const field of ['nome', 'cognome', 'telefono', 'email', 'data', 'ora']) {
        expectRejection(() => service.create(bookingInput({ [field]: '   ' }), publicOptions), ValidationError, 'Dati mancanti');
        expectRejection(() => service.create(bookingInput({ [field]: undefined }), adminOptions), ValidationError, 'Dati mancanti');
      }
    });

    it('requires privacy consent for public bookings only', () => {
      expectRejection(() => service.create(bookingInput({ privacy: undefined }), publicOptions), ValidationError, 'Dati mancanti');
      expectRejection(() => service.create(bookingInput({ privacy: 'false' }), publicOptions), ValidationError, 'Dati mancanti');

      expect(service.create(bookingInput({ privacy: undefined }), adminOptions).status).toBe('booked');
    });

    it('rejects malformed dates', () => {
      expectRejection(() => service.create(bookingInput({ data: '10/03/2025' }), publicOptions), ValidationError, 'Data non valida');
      expectRejection(() => service.create(bookingInput({ data: '2025-02-30' }), publicOptions), ValidationError, 'Data non valida');
    });

    it('accepts today and today+59 and rejects the days just outside', () => {
      expect(service.create(bookingInput({ data: '2025-03-03' }), publicOptions).data).toBe('2025-03-03');
      expect(service.create(bookingInput({ data: '2025-05-01' }), publicOptions).data).toBe('2025-05-01');

      expectRejection(() => service.create(bookingInput({ data: '2025-03-02' }), publicOptions), ValidationError, 'Data fuori intervallo');
      expectRejection(() => service.create(bookingInput({ data: '2025-05-02' }), publicOptions), ValidationError, 'Data fuori intervallo');
    });

    it('rejects times outside the slot catalog', () => {
      for (const ora of ['12:00', '9:00', '17:30', 'mattina']) {
        expectRejection(() => service.create(bookingInput({ ora }), publicOptions), ValidationError, 'Orario non valido');
      }
    });

    it('reports a conflict for a slot that is already booked, until it is canceled', () => {
      const first = service.create(bookingInput(), publicOptions);

      expectRejection(() => service.create(bookingInput({ nome: 'Giulia' }), publicOptions), ConflictError, 'Slot non disponibile');
      expectRejection(() => service.create(bookingInput({ nome: 'Giulia' }), adminOptions), ConflictError, 'Slot non disponibile');

      service.cancelById(first.id);
      const second = service.create(bookingInput({ nome: 'Giulia' }), publicOptions);
      expect(second).toMatchObject({ id: 2, nome: 'Giulia', status: 'booked' });
    });
  });

  describe('sendConfirmation', () => {
    it('sends the cancellation link built from the base url', async () => {
      const booking = service.create(bookingInput(), publicOptions);

      await expect(service.sendConfirmation(booking, 'https://prenota.example.com/')).resolves.toBe(true);
      expect(notifier.confirmations).toHaveLength(1);
      expect(notifier.confirmations[0].cancelUrl).toBe(`https://prenota.example.com/annulla?token=${booking.token}`);
    });

    it('returns false when the email was not sent', async () => {
      const booking = service.create(bookingInput(), publicOptions);

      notifier.confirmationResult = { status: 'not_configured' };
      await expect(service.sendConfirmation(booking, 'http://localhost:8000')).resolves.toBe(false);

      notifier.confirmationResult = { status: 'failed', error: 'connection refused' };
      await expect(service.sendConfirmation(booking, 'http://localhost:8000')).resolves.toBe(false);
    });
  });

  describe('cancelByToken', () => {
    it('cancels once and is idempotent afterwards', () => {
      const booking = service.create(bookingInput(), publicOptions);
      const token = booking.token ?? '';

      clock.set('2025-03-04T08:00:00.000Z');
      const first = service.cancelByToken(token);
      expect(first.alreadyCanceled).toBe(false);
      expect(first.booking).toMatchObject({ status: 'canceled', canceled_at: '2025-03-04T08:00:00.000Z' });

      clock.set('2025-03-05T08:00:00.000Z');
      const second = service.cancelByToken(token);
      expect(second.alreadyCanceled).toBe(true);
      expect(second.booking).toMatchObject({ status: 'canceled', canceled_at: '2025-03-04T08:00:00.000Z' });
    });

    it('trims the token', () => {
      const booking = service.create(bookingInput(), publicOptions);
      expect(service.cancelByToken(`  ${booking.token} `).booking.status).toBe('canceled');
    });

    it('rejects a missing token and an unknown token', () => {
      expectRejection(() => service.cancelByToken(undefined), ValidationError, 'Token mancante');
      expectRejection(() => service.cancelByToken('  '), ValidationError, 'Token mancante');
      expectRejection(() => service.cancelByToken('nope'), NotFoundError, 'Token non valido');
    });
  });

  describe('cancelById', () => {
    it('cancels by id with the same idempotent semantics', () => {
      const booking = service.create(bookingInput(), adminOptions);

      expect(service.cancelById(booking.id)).toMatchObject({
        alreadyCanceled: false,
        booking: { status: 'canceled', canceled_at: '2025-03-03T10:00:00.000Z' },
      });
      expect(service.cancelById(booking.id).alreadyCanceled).toBe(true);
    });

    it('fails for an unknown id', () => {
      expect(() => service.cancelById(99)).toThrow(NotFoundError);
    });
  });

  describe('deleteById', () => {
    it('hard-deletes the row', () => {
      const booking = service.create(bookingInput(), adminOptions);
      service.deleteById(booking.id);

      expect(service.list()).toEqual([]);
      expect(() => service.deleteById(booking.id)).toThrow(NotFoundError);
    });
  });

  describe('update', () => {
    it('sends exactly one thank-you email across repeated attended updates', async () => {
      const booking = service.create(bookingInput(), adminOptions);
      clock.set('2025-03-10T09:45:00.000Z');

      const first = await service.update(booking.id, { attended: true });
      expect(first.thankYouSent).toBe(true);
      expect(first.booking).toMatchObject({ attended: true, thanked_at: '2025-03-10T09:45:00.000Z' });

      const repeat = await service.update(booking.id, { attended: true });
      expect(repeat.thankYouSent).toBe(false);

      await service.update(booking.id, { attended: false });
      const again = await service.update(booking.id, { attended: true });
      expect(again.thankYouSent).toBe(false);
      expect(again.booking.thanked_at).toBe('2025-03-10T09:45:00.000Z');

      expect(notifier.thankYous).toHaveLength(1);
      expect(notifier.thankYous[0]).toMatchObject({ id: booking.id, attended: true });
    });

    it('leaves thanked_at unset after a failed send so a later transition retries', async () => {
      const booking = service.create(bookingInput(), adminOptions);

      notifier.thankYouResult = { status: 'failed', error: 'auth failed' };
      const failed = await service.update(booking.id, { attended: true });
      expect(failed.thankYouSent).toBe(false);
      expect(failed.booking).toMatchObject({ attended: true, thanked_at: null });

      notifier.thankYouResult = { status: 'sent', messageId: 'retry' };
      await service.update(booking.id, { attended: false });
      const retried = await service.update(booking.id, { attended: true });

      expect(retried.thankYouSent).toBe(true);
      expect(retried.booking.thanked_at).toBe('2025-03-03T10:00:00.000Z');
      expect(notifier.thankYous).toHaveLength(2);
    });

    it('sends one thank-you when attended toggles while a send is still pending', async () => {
      const booking = service.create(bookingInput(), adminOptions);

      let deliver: () => void = () => {};
      const delivered = new Promise<void>((resolve) => {
        deliver = resolve;
      });
      const sendThankYou = notifier.sendThankYou.bind(notifier);
      notifier.sendThankYou = async (sent) => {
        const result = await sendThankYou(sent);
        await delivered;
        return result;
      };

      const pending = service.update(booking.id, { attended: true });
      await service.update(booking.id, { attended: false });
      const overlapping = await service.update(booking.id, { attended: true });
      expect(overlapping.thankYouSent).toBe(false);

      deliver();
      const first = await pending;

      expect(first.thankYouSent).toBe(true);
      expect(first.booking.thanked_at).toBe('2025-03-03T10:00:00.000Z');
      expect(notifier.thankYous).toHaveLength(1);
    });

    it('releases the claim when a pending send fails', async () => {
      const booking = service.create(bookingInput(), adminOptions);
      notifier.thankYouResult = { status: 'failed', error: 'timeout' };

      const failed = await service.update(booking.id, { attended: true });
      expect(failed.booking.thanked_at).toBeNull();

      const repeated = await service.update(booking.id, { attended: true });
      expect(repeated.thankYouSent).toBe(false);
      expect(notifier.thankYous).toHaveLength(1);
    });

    it('does not record a thank-you when email is not configured', async () => {
      const booking = service.create(bookingInput(), adminOptions);
      notifier.thankYouResult = { status: 'not_configured' };

      const result = await service.update(booking.id, { attended: true });
      expect(result.thankYouSent).toBe(false);
      expect(result.booking.thanked_at).toBeNull();
    });

    it('updates only the flags provided', async () => {
      const booking = service.create(bookingInput(), adminOptions);

      const paid = await service.update(booking.id, { paid: true });
      expect(paid.booking).toMatchObject({ paid: true, attended: false });
      expect(paid.thankYouSent).toBe(false);

      const unchanged = await service.update(booking.id, {});
      expect(unchanged.booking).toMatchObject({ paid: true, attended: false });
      expect(notifier.thankYous).toHaveLength(0);
    });

    it('fails for an unknown id', async () => {
      await expect(service.update(99, { paid: true })).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  it('builds cancel urls without doubled slashes', () => {
    expect(buildCancelUrl('http://127.0.0.1:8000/', 'abc_-1')).toBe('http://127.0.0.1:8000/annulla?token=abc_-1');
  });
});
