import type { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';
import { renderMessagePage } from '../views/pages';

/**
 * Custom Error class with status code.
 * `title` is the heading shown when the error is rendered as an HTML page.
 */
export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;
  title: string;

  constructor(message: string, statusCode: number = 500, title: string = 'Errore') {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = true;
    this.title = title;

    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, title: string = 'Dati non validi') {
    super(message, 400, title);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message: string = 'Authentication required', title: string = 'Accesso negato') {
    super(message, 401, title);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, title: string = 'Non trovato') {
    super(message, 404, title);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, title: string = 'Conflitto') {
    super(message, 409, title);
  }
}

/**
 * Status carried by errors from body-parser and other http-errors producers
 */
function clientErrorStatus(err: Error): number | null {
  const status: unknown = Reflect.get(err, 'status');
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

function wantsJson(req: Request): boolean {
  return req.path.startsWith('/api/');
}

/**
 * Global error handling middleware.
 * API routes answer with JSON, page routes with a small HTML page.
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const parserStatus = clientErrorStatus(err);
  const appError =
    err instanceof AppError
      ? err
      : parserStatus !== null
        ? new AppError('Richiesta non valida.', parserStatus, 'Richiesta non valida')
        : null;
  const statusCode = appError ? appError.statusCode : 500;

  const meta = {
    message: err.message,
    statusCode,
    path: req.path,
    method: req.method,
    isOperational: appError !== null,
  };
  if (statusCode >= 500) {
    logger.error('Error occurred', { ...meta, stack: err.stack });
  } else {
    logger.warn('Request rejected', meta);
  }

  const message = appError ? appError.message : 'Errore interno del server';

  if (wantsJson(req)) {
    res.status(statusCode).json({
      status: 'error',
      message,
      ...(process.env.NODE_ENV === 'development' && { stack: err.stack }),
    });
    return;
  }

  res
    .status(statusCode)
    .type('html')
    .send(renderMessagePage(appError ? appError.title : 'Errore interno', message));
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  if (wantsJson(req)) {
    res.status(404).json({
      status: 'error',
      message: `Route ${req.originalUrl} not found`,
    });
    return;
  }

  res.status(404).type('html').send(renderMessagePage('Pagina non trovata', 'La risorsa richiesta non esiste.'));
}

/**
 * Async route wrapper to catch errors in async functions
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
