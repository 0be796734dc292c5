import express, { type Application, type Request, type Response } from 'express';
import cookieParser from 'cookie-parser';
import type { AppConfig } from './config/env';
import { requireAdminSession } from './middleware/adminSession';
import { createCorsMiddleware } from './middleware/cors';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import type { AvailabilityService } from './services/availabilityService';
import type { BookingService } from './services/bookingService';
import type { SessionStore } from './services/sessionStore';
import { loggers } from './utils/logger';

import { createPublicRoutes } from './routes/public';
import { createBookingRoutes } from './routes/bookings';
import { createAdminRoutes } from './routes/admin';
import { createStaticRoutes } from './routes/static';

/**
 * Express Application Setup
 */

export interface AppDependencies {
  config: Pick<AppConfig, 'publicBaseUrl' | 'staticDir' | 'corsOrigins' | 'admin'>;
  bookingService: BookingService;
  availabilityService: AvailabilityService;
  sessions: SessionStore;
}

export function createApp(deps: AppDependencies): Application {
  const { config, bookingService, availabilityService, sessions } = deps;

  const app: Application = express();

  // ===========================================
  // Middleware
  // ===========================================

  app.disable('x-powered-by');
  app.use(createCorsMiddleware(config.corsOrigins));

  // Request logging middleware
  app.use((req: Request, res: Response, next) => {
    const startTime = Date.now();

    loggers.httpRequest(req.method, req.path, req.ip);

    res.on('finish', () => {
      const duration = Date.now() - startTime;
      loggers.httpResponse(req.method, req.path, res.statusCode, duration);
    });

    next();
  });

  app.use(cookieParser());

  // Admin API is gated before body parsing: no session means 401, whatever the payload
  app.use('/api/bookings', requireAdminSession(sessions));

  // Body parsers
  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: false, limit: '100kb' }));

  // ===========================================
  // Routes
  // ===========================================

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  app.use(
    createPublicRoutes({
      bookingService,
      availabilityService,
      publicBaseUrl: config.publicBaseUrl,
    })
  );
  app.use(
    '/api/bookings',
    createBookingRoutes({
      bookingService,
      publicBaseUrl: config.publicBaseUrl,
    })
  );
  app.use(
    '/admin',
    createAdminRoutes({
      admin: config.admin,
      sessions,
      staticDir: config.staticDir,
    })
  );
  app.use(createStaticRoutes(config.staticDir));

  // ===========================================
  // Error Handling
  // ===========================================

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
