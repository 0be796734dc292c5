/**
 * Bookable times of day. Half-hour slots with a lunch break between 12:00 and 14:00.
 */
export const TIME_SLOTS: readonly string[] = Object.freeze([
  '09:00',
  '09:30',
  '10:00',
  '10:30',
  '11:00',
  '11:30',
  '14:00',
  '14:30',
  '15:00',
  '15:30',
  '16:00',
  '16:30',
  '17:00',
]);

/** Number of calendar days, starting today, open for booking. */
export const BOOKING_WINDOW_DAYS = 60;

export function isValidTimeSlot(value: string): boolean {
  return TIME_SLOTS.includes(value);
}
