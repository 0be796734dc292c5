import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type Database from 'better-sqlite3';
import { TIME_SLOTS } from '../config/slots';
import { BookingModel } from '../models/Booking';
import { TestClock, createTestDatabase } from '../testing/fixtures';
import { AvailabilityService } from './availabilityService';

describe('AvailabilityService', () => {
  let db: Database.Database;
  let model: BookingModel;
  let clock: TestClock;
  let service: AvailabilityService;

  const book = (data: string, ora: string, token: string) => {
    const booking = model.insertIfSlotFree({
      nome: 'Mario',
      cognome: 'Rossi',
      telefono: '0303',
      email: 'mario@example.com',
      data,
      ora,
      note: '',
      token,
      created_at: '2025-03-03T10:00:00.000Z',
    });
    if (!booking) {
      throw new Error(`slot ${data} ${ora} already taken`);
    }
    return booking;
  };

  beforeEach(() => {
    db = createTestDatabase();
    model = new BookingModel(db);
    clock = new TestClock('2025-03-03T10:00:00.000Z');
    service = new AvailabilityService(model, clock.now);
  });

  afterEach(() => {
    db.close();
  });

  it('covers sixty days starting today', () => {
    const availability = service.getAvailability();

    expect(availability.dates).toHaveLength(60);
    expect(availability.minDate).toBe('2025-03-03');
    expect(availability.maxDate).toBe('2025-05-01');
    expect(availability.timeSlots).toEqual([...TIME_SLOTS]);
    expect(availability.dates[0]).toEqual({
      date: '2025-03-03',
      label: 'lun 03 mar',
      available: [...TIME_SLOTS],
    });
    expect(availability.dates[59].date).toBe('2025-05-01');
    expect(availability.dates[59].label).toBe('gio 01 mag');
  });

  it('removes booked times from their date only', () => {
    book('2025-03-10', '09:00', 't1');
    book('2025-03-10', '16:30', 't2');

    const { dates } = service.getAvailability();
    const tenth = dates.find((d) => d.date === '2025-03-10');
    const eleventh = dates.find((d) => d.date === '2025-03-11');

    expect(tenth?.available).toEqual(TIME_SLOTS.filter((slot) => slot !== '09:00' && slot !== '16:30'));
    expect(eleventh?.available).toEqual([...TIME_SLOTS]);
  });

  it('never removes a slot for a canceled booking', () => {
    const booking = book('2025-03-10', '09:00', 't1');
    model.markCanceled(booking.id, '2025-03-04T08:00:00.000Z');

    const tenth = service.getAvailability().dates.find((d) => d.date === '2025-03-10');
    expect(tenth?.available).toEqual([...TIME_SLOTS]);
  });

  it('equals the catalog minus booked times for every day', () => {
    book('2025-03-03', '09:00', 't1');
    book('2025-03-20', '11:30', 't2');
    book('2025-04-30', '17:00', 't3');
    const canceled = book('2025-04-30', '09:00', 't4');
    model.markCanceled(canceled.id, '2025-03-04T08:00:00.000Z');

    const bookedByDate = new Map<string, Set<string>>();
    for (const slot of model.listBookedSlots()) {
      const set = bookedByDate.get(slot.data) ?? new Set<string>();
      set.add(slot.ora);
      bookedByDate.set(slot.data, set);
    }

    for (const day of service.getAvailability().dates) {
      const taken = bookedByDate.get(day.date) ?? new Set<string>();
      expect(day.available).toEqual(TIME_SLOTS.filter((slot) => !taken.has(slot)));
    }
  });

  it('ignores bookings outside the window', () => {
    book('2025-03-02', '09:00', 't1');
    book('2025-05-02', '09:00', 't2');

    const { dates } = service.getAvailability();
    expect(dates.every((d) => d.available.length === TIME_SLOTS.length)).toBe(true);
  });

  it('crosses year boundaries', () => {
    clock.set('2025-12-20T08:00:00.000Z');
    const availability = service.getAvailability();

    expect(availability.minDate).toBe('2025-12-20');
    expect(availability.maxDate).toBe('2026-02-17');
    expect(availability.dates.find((d) => d.date === '2026-01-01')?.label).toBe('gio 01 gen');
  });

  it('accepts a custom window size', () => {
    const availability = service.getAvailability(3);
    expect(availability.dates.map((d) => d.date)).toEqual(['2025-03-03', '2025-03-04', '2025-03-05']);
    expect(availability.maxDate).toBe('2025-03-05');
  });

  it('rejects an empty window', () => {
    expect(() => service.getAvailability(0)).toThrow(RangeError);
  });
});
