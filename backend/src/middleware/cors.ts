import cors from 'cors';
import type { RequestHandler } from 'express';

/**
 * CORS Configuration
 * Only the origins listed in CORS_ORIGINS may call the API from a browser;
 * with an empty list no CORS headers are sent (same-origin pages only).
 */
export function createCorsMiddleware(allowedOrigins: string[]): RequestHandler {
  const corsOptions: cors.CorsOptions = {
    origin: (origin, callback) => {
      // Requests without an Origin header (curl, server-to-server) are not CORS requests
      if (!origin) {
        return callback(null, true);
      }
      callback(null, allowedOrigins.includes(origin));
    },
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  };

  return cors(corsOptions);
}
