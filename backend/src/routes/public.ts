import { Router } from 'express';
import { type BookingControllerDeps, createBookingController } from '../controllers/bookingController';

/**
 * Public Routes
 */
export function createPublicRoutes(deps: BookingControllerDeps): Router {
  const router = Router();
  const bookingController = createBookingController(deps);

  // GET /api/availability
  router.get('/api/availability', bookingController.getAvailability);

  // POST /prenota
  router.post('/prenota', bookingController.submitBooking);

  // GET /annulla?token=...
  router.get('/annulla', bookingController.cancelBooking);

  return router;
}
