import type { Request, Response } from 'express';
import { z } from 'zod';
import { ValidationError, asyncHandler } from '../middleware/errorHandler';
import type { BookingService } from '../services/bookingService';
import { normalizeBody } from '../utils/requestBody';
import { resolveBaseUrl } from './bookingController';

/**
 * Admin Controller
 * Booking management endpoints under /api/bookings (session required)
 */

const BookingIdSchema = z.object({
  id: z.coerce.number().int().positive(),
});

const flag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0', 'on', 'off']))
  .transform((value) => value === 'true' || value === '1' || value === 'on')
  .optional();

const UpdateBookingSchema = BookingIdSchema.extend({
  attended: flag,
  paid: flag,
});

function parseBookingId(body: unknown): number {
  const parsed = BookingIdSchema.safeParse(normalizeBody(body));
  if (!parsed.success) {
    throw new ValidationError('ID prenotazione non valido.');
  }
  return parsed.data.id;
}

export interface AdminControllerDeps {
  bookingService: BookingService;
  publicBaseUrl?: string;
}

export function createAdminController(deps: AdminControllerDeps) {
  const { bookingService } = deps;

  return {
    /**
     * GET /api/bookings
     */
    listBookings: (_req: Request, res: Response) => {
      res.json({ bookings: bookingService.list() });
    },

    /**
     * POST /api/bookings/create
     * Manual booking; no privacy consent needed
     */
    createBooking: asyncHandler(async (req: Request, res: Response) => {
      const booking = bookingService.create(normalizeBody(req.body), { requireConsent: false });
      const sent = await bookingService.sendConfirmation(booking, resolveBaseUrl(req, deps.publicBaseUrl));

      res.status(201).json({ booking, confirmation_email: { sent } });
    }),

    /**
     * POST /api/bookings/cancel
     */
    cancelBooking: (req: Request, res: Response) => {
      const { booking } = bookingService.cancelById(parseBookingId(req.body));
      res.json({ booking });
    },

    /**
     * POST /api/bookings/delete
     */
    deleteBooking: (req: Request, res: Response) => {
      const id = parseBookingId(req.body);
      bookingService.deleteById(id);
      res.json({ deleted: true, id });
    },

    /**
     * POST /api/bookings/update
     * Partial update of attended / paid
     */
    updateBooking: asyncHandler(async (req: Request, res: Response) => {
      const parsed = UpdateBookingSchema.safeParse(normalizeBody(req.body));
      if (!parsed.success) {
        throw new ValidationError('Dati di aggiornamento non validi.');
      }

      const { id, attended, paid } = parsed.data;
      const { booking, thankYouSent } = await bookingService.update(id, { attended, paid });

      res.json({ booking, thank_you_email: { sent: thankYouSent } });
    }),
  };
}
