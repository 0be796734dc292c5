import type { Request, Response } from 'express';
import { asyncHandler } from '../middleware/errorHandler';
import type { AvailabilityService } from '../services/availabilityService';
import type { BookingService } from '../services/bookingService';
import { renderConfirmationPage, renderMessagePage } from '../views/pages';
import { firstString, normalizeBody } from '../utils/requestBody';

/**
 * Booking Controller
 * Public endpoints: availability, booking form submission, cancellation link
 */

export interface BookingControllerDeps {
  bookingService: BookingService;
  availabilityService: AvailabilityService;
  publicBaseUrl?: string;
}

/**
 * Origin used in cancellation links: PUBLIC_BASE_URL when set, otherwise the
 * scheme and Host header of the incoming request
 */
export function resolveBaseUrl(req: Request, publicBaseUrl?: string): string {
  if (publicBaseUrl) {
    return publicBaseUrl;
  }
  return `${req.protocol}://${req.get('host') ?? '127.0.0.1:8000'}`;
}

export function createBookingController(deps: BookingControllerDeps) {
  const { bookingService, availabilityService } = deps;

  return {
    /**
     * GET /api/availability
     */
    getAvailability: (_req: Request, res: Response) => {
      res.json(availabilityService.getAvailability());
    },

    /**
     * POST /prenota
     * Stores the booking, then tries to email the confirmation
     */
    submitBooking: asyncHandler(async (req: Request, res: Response) => {
      const booking = bookingService.create(normalizeBody(req.body), { requireConsent: true });
      const emailSent = await bookingService.sendConfirmation(booking, resolveBaseUrl(req, deps.publicBaseUrl));

      res.type('html').send(
        renderConfirmationPage({
          fullName: `${booking.nome} ${booking.cognome}`,
          slot: booking.data_ora ?? '',
          emailSent,
          cancelPath: `/annulla?token=${encodeURIComponent(booking.token ?? '')}`,
        })
      );
    }),

    /**
     * GET /annulla?token=...
     */
    cancelBooking: (req: Request, res: Response) => {
      const { alreadyCanceled } = bookingService.cancelByToken(firstString(req.query.token));

      const page = alreadyCanceled
        ? renderMessagePage('Prenotazione gia annullata', 'Nessuna azione necessaria.')
        : renderMessagePage('Prenotazione annullata', 'Lo slot e di nuovo disponibile.');

      res.type('html').send(page);
    },
  };
}
