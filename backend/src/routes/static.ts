import path from 'path';
import express, { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { NotFoundError } from '../middleware/errorHandler';

/**
 * Static Routes
 * The landing page plus the /css, /js and /public asset folders.
 * Content types come from the file extension.
 */

const ASSET_PREFIXES = ['css', 'js', 'public'];

export function createStaticRoutes(staticDir: string): Router {
  const router = Router();

  const sendIndex = (_req: Request, res: Response, next: NextFunction) => {
    res.sendFile(path.join(staticDir, 'index.html'), (error) => {
      if (error) {
        next(new NotFoundError('File non trovato.', 'Pagina non trovata'));
      }
    });
  };

  router.get(['/', '/index.html'], sendIndex);

  for (const prefix of ASSET_PREFIXES) {
    router.use(`/${prefix}`, express.static(path.join(staticDir, prefix), { index: false }));
  }

  return router;
}
