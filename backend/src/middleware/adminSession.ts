import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { SessionStore } from '../services/sessionStore';
import { UnauthorizedError } from './errorHandler';

export const SESSION_COOKIE = 'admin_session';

export function readSessionToken(req: Request): string | undefined {
  const cookies: unknown = req.cookies;
  if (cookies === null || typeof cookies !== 'object') {
    return undefined;
  }
  const token: unknown = Reflect.get(cookies, SESSION_COOKIE);
  return typeof token === 'string' && token !== '' ? token : undefined;
}

/**
 * Rejects the request with 401 unless it carries a live admin session cookie.
 * Runs before any body validation.
 */
export function requireAdminSession(sessions: SessionStore): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    if (!sessions.has(readSessionToken(req))) {
      next(new UnauthorizedError('Sessione non valida o scaduta.'));
      return;
    }
    next();
  };
}
