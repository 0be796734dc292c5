import winston from 'winston';
import path from 'path';
import fs from 'fs';

/**
 * Winston Logger Configuration
 * Structured logging with a console transport and, outside tests, log files
 */

const isTest = process.env.NODE_ENV === 'test';

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.printf(
    ({ timestamp, level, message, stack, ...metadata }) => {
      let msg = `${timestamp} [${level.toUpperCase()}]: ${message}`;

      if (stack) {
        msg += `\n${stack}`;
      }

      if (Object.keys(metadata).length > 0) {
        msg += `\n${JSON.stringify(metadata, null, 2)}`;
      }

      return msg;
    }
  )
);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      logFormat
    ),
    silent: isTest,
  }),
];

if (!isTest) {
  const logsDir = process.env.LOG_DIR || path.join(process.cwd(), 'logs');
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  transports.push(
    new winston.transports.File({
      filename: path.join(logsDir, 'combined.log'),
      format: logFormat,
    }),
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      format: logFormat,
    })
  );
}

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  transports,
  exitOnError: false,
});

/**
 * Helper functions for common logging scenarios
 */

export const loggers = {
  /**
   * Log database operation
   */
  dbOperation: (operation: string, table: string, details?: Record<string, unknown>) => {
    logger.debug('Database Operation', {
      operation,
      table,
      details: details ? JSON.stringify(details) : undefined,
    });
  },

  /**
   * Log the outcome of an outbound email
   */
  emailDelivery: (kind: string, bookingId: number, status: string, error?: string) => {
    if (error) {
      logger.warn('Email Delivery Failed', { kind, bookingId, status, error });
    } else {
      logger.info('Email Delivery', { kind, bookingId, status });
    }
  },

  adminAuth: (event: 'login' | 'login_failed' | 'logout', ip?: string) => {
    const level = event === 'login_failed' ? 'warn' : 'info';
    logger.log(level, 'Admin Auth', { event, ip });
  },

  httpRequest: (method: string, path: string, ip?: string) => {
    logger.info('HTTP Request', {
      method,
      path,
      ip,
    });
  },

  httpResponse: (method: string, path: string, statusCode: number, duration: number) => {
    logger.info('HTTP Response', {
      method,
      path,
      statusCode,
      duration: `${duration}ms`,
    });
  },
};

export default logger;
