import { Router } from 'express';
import { type AdminControllerDeps, createAdminController } from '../controllers/adminController';

/**
 * Booking Management Routes
 * /api/bookings/* (mounted behind requireAdminSession)
 */
export function createBookingRoutes(deps: AdminControllerDeps): Router {
  const router = Router();
  const adminController = createAdminController(deps);

  // GET /api/bookings
  router.get('/', adminController.listBookings);

  // POST /api/bookings/create
  router.post('/create', adminController.createBooking);

  // POST /api/bookings/cancel
  router.post('/cancel', adminController.cancelBooking);

  // POST /api/bookings/delete
  router.post('/delete', adminController.deleteBooking);

  // POST /api/bookings/update
  router.post('/update', adminController.updateBooking);

  return router;
}
