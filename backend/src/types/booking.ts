/**
 * Booking types shared by the model, services and controllers
 */

export type BookingStatus = 'booked' | 'canceled';

/**
 * Row as stored in the bookings table
 */
export interface BookingRow {
  id: number;
  nome: string;
  cognome: string;
  telefono: string;
  email: string;
  data_ora: string | null;
  data: string | null;
  ora: string | null;
  note: string | null;
  status: string | null;
  token: string | null;
  created_at: string;
  canceled_at: string | null;
  attended: number | null;
  paid: number | null;
  thanked_at: string | null;
}

/**
 * Booking as returned by the API
 */
export interface Booking {
  id: number;
  nome: string;
  cognome: string;
  telefono: string;
  email: string;
  data: string | null;
  ora: string | null;
  /** Display string derived from data + ora; legacy rows keep their stored value */
  data_ora: string | null;
  note: string;
  status: BookingStatus;
  token: string | null;
  created_at: string;
  canceled_at: string | null;
  attended: boolean;
  paid: boolean;
  thanked_at: string | null;
}

export interface NewBooking {
  nome: string;
  cognome: string;
  telefono: string;
  email: string;
  data: string;
  ora: string;
  note: string;
  token: string;
  created_at: string;
}

export interface BookingFlagsUpdate {
  attended?: boolean;
  paid?: boolean;
}

export interface DayAvailability {
  date: string;
  label: string;
  available: string[];
}

export interface AvailabilityResponse {
  dates: DayAvailability[];
  timeSlots: string[];
  minDate: string;
  maxDate: string;
}
