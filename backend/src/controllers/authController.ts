import { createHash, timingSafeEqual } from 'crypto';
import path from 'path';
import type { NextFunction, Request, Response } from 'express';
import type { AdminConfig } from '../config/env';
import { SESSION_COOKIE, readSessionToken } from '../middleware/adminSession';
import { NotFoundError } from '../middleware/errorHandler';
import type { SessionStore } from '../services/sessionStore';
import { loggers } from '../utils/logger';
import { normalizeBody } from '../utils/requestBody';
import { renderLoginPage } from '../views/pages';

/**
 * Auth Controller
 * Admin login/logout with an opaque session cookie
 */

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

function safeEqual(a: string, b: string): boolean {
  return timingSafeEqual(digest(a), digest(b));
}

export interface AuthControllerDeps {
  admin: AdminConfig;
  sessions: SessionStore;
  staticDir: string;
}

export function createAuthController(deps: AuthControllerDeps) {
  const { admin, sessions } = deps;

  function credentialsMatch(username: string, password: string): boolean {
    if (!admin.username || !admin.password) {
      return false;
    }
    // Evaluate both comparisons so timing does not reveal which one failed
    const userOk = safeEqual(username, admin.username);
    const passOk = safeEqual(password, admin.password);
    return userOk && passOk;
  }

  return {
    /**
     * GET /admin/login
     */
    showLogin: (_req: Request, res: Response) => {
      res.type('html').send(renderLoginPage());
    },

    /**
     * POST /admin/login
     */
    login: (req: Request, res: Response) => {
      const { username = '', password = '' } = normalizeBody(req.body);

      if (!credentialsMatch(username, password)) {
        loggers.adminAuth('login_failed', req.ip);
        res.status(401).type('html').send(renderLoginPage('Credenziali non valide.'));
        return;
      }

      const token = sessions.create();
      loggers.adminAuth('login', req.ip);

      res.cookie(SESSION_COOKIE, token, {
        httpOnly: true,
        sameSite: 'lax',
        path: '/',
        maxAge: sessions.ttlMs,
      });
      res.redirect(303, '/admin');
    },

    /**
     * GET /admin/logout
     */
    logout: (req: Request, res: Response) => {
      sessions.revoke(readSessionToken(req));
      loggers.adminAuth('logout', req.ip);

      res.clearCookie(SESSION_COOKIE, { path: '/' });
      res.redirect(303, '/admin/login');
    },

    /**
     * GET /admin
     * Admin panel page; anonymous visitors are sent to the login form
     */
    showPanel: (req: Request, res: Response, next: NextFunction) => {
      if (!sessions.has(readSessionToken(req))) {
        res.redirect(303, '/admin/login');
        return;
      }

      res.sendFile(path.join(deps.staticDir, 'admin.html'), (error) => {
        if (error) {
          next(new NotFoundError('Pannello non disponibile.', 'Pagina non trovata'));
        }
      });
    },
  };
}
