import { BOOKING_WINDOW_DAYS, TIME_SLOTS } from '../config/slots';
import type { BookingModel } from '../models/Booking';
import type { AvailabilityResponse, DayAvailability } from '../types/booking';
import { type Clock, formatDateLabel, systemClock, toDateKey, todayUtc } from '../utils/dates';

/**
 * Availability Service
 * Free slots per day for the booking window: the slot catalog minus the
 * times already held by a booked row on that date.
 */
export class AvailabilityService {
  constructor(
    private readonly bookings: BookingModel,
    private readonly clock: Clock = systemClock
  ) {}

  getAvailability(days: number = BOOKING_WINDOW_DAYS): AvailabilityResponse {
    if (!Number.isInteger(days) || days < 1) {
      throw new RangeError(`Availability window must be a positive integer, got ${days}`);
    }

    const today = todayUtc(this.clock);
    const calendar = Array.from({ length: days }, (_, offset) => today.plus({ days: offset }));
    const dateKeys = calendar.map(toDateKey);

    const booked = new Map(dateKeys.map((key): [string, Set<string>] => [key, new Set()]));
    for (const slot of this.bookings.listBookedSlots()) {
      booked.get(slot.data)?.add(slot.ora);
    }

    const dates: DayAvailability[] = calendar.map((day, index) => {
      const key = dateKeys[index];
      const taken = booked.get(key) ?? new Set<string>();
      return {
        date: key,
        label: formatDateLabel(day),
        available: TIME_SLOTS.filter((slot) => !taken.has(slot)),
      };
    });

    return {
      dates,
      timeSlots: [...TIME_SLOTS],
      minDate: dateKeys[0],
      maxDate: dateKeys[dateKeys.length - 1],
    };
  }
}
