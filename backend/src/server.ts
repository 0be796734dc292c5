import dotenv from 'dotenv';
import { createApp } from './app';
import { loadConfig } from './config/env';
import { closeDatabase, initDatabase } from './config/database';
import { runMigrations } from './database/migrate';
import { BookingModel } from './models/Booking';
import { AvailabilityService } from './services/availabilityService';
import { BookingService } from './services/bookingService';
import { EmailService } from './services/emailService';
import { SessionStore } from './services/sessionStore';
import logger from './utils/logger';

// Load environment variables
dotenv.config();

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

let config: ReturnType<typeof loadConfig>;
try {
  config = loadConfig();
} catch (error) {
  logger.error('Invalid configuration', { error: errorMessage(error) });
  process.exit(1);
}

// Initialize database connection and schema
let bookingModel: BookingModel;
try {
  const db = initDatabase(config.databasePath);
  runMigrations(db);
  bookingModel = new BookingModel(db);
  logger.info('Database initialized successfully');
} catch (error) {
  logger.error('Failed to initialize database', { error: errorMessage(error) });
  process.exit(1);
}

const emailService = new EmailService(config.smtp);
if (!emailService.isConfigured) {
  logger.warn('SMTP not configured; bookings are stored without confirmation emails');
}
if (!config.admin.username || !config.admin.password) {
  logger.warn('ADMIN_USERNAME / ADMIN_PASSWORD not set; admin login is disabled');
}

const app = createApp({
  config,
  bookingService: new BookingService(bookingModel, emailService),
  availabilityService: new AvailabilityService(bookingModel),
  sessions: new SessionStore({
    ttlMs: config.admin.sessionTtlMs,
    maxSessions: config.admin.maxSessions,
  }),
});

const server = app.listen(config.port, config.host, () => {
  logger.info('Server started successfully', {
    url: `http://${config.host}:${config.port}`,
    environment: process.env.NODE_ENV || 'development',
    nodeVersion: process.version,
  });
});

// Graceful shutdown
const gracefulShutdown = (signal: string) => {
  logger.info(`Received ${signal}, shutting down gracefully...`);

  server.close(() => {
    closeDatabase();
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force shutdown after 10 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
};

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Promise Rejection', {
    reason: errorMessage(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
  });
});

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception', {
    message: error.message,
    stack: error.stack,
  });

  // Exit process (let process manager restart it)
  process.exit(1);
});

export default server;
