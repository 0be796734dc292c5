import path from 'path';
import { z } from 'zod';

/**
 * Environment configuration
 * Read once at startup from process.env (populated by dotenv in server.ts)
 */

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

/** Numeric variable; unset or blank falls back to `fallback` */
function numberVar(schema: z.ZodNumber, fallback: number) {
  return z.preprocess(blankToUndefined, z.coerce.number().pipe(schema).default(fallback));
}

const EnvSchema = z.object({
  BOOKING_DB: optionalString,
  BOOKING_HOST: z.string().trim().min(1).default('127.0.0.1'),
  BOOKING_PORT: numberVar(z.number().int().min(0).max(65535), 8000),
  PUBLIC_BASE_URL: optionalString,
  STATIC_DIR: optionalString,
  CORS_ORIGINS: optionalString,

  SMTP_HOST: optionalString,
  SMTP_PORT: numberVar(z.number().int().min(1).max(65535), 587),
  SMTP_USER: optionalString,
  SMTP_PASS: optionalString,
  SMTP_FROM: optionalString,
  SMTP_NOTIFY: optionalString,
  SMTP_TIMEOUT_MS: numberVar(z.number().int().positive(), 10_000),

  ADMIN_USERNAME: optionalString,
  ADMIN_PASSWORD: optionalString,
  ADMIN_SESSION_TTL_MS: numberVar(z.number().int().positive(), 12 * 60 * 60 * 1000),
  ADMIN_MAX_SESSIONS: numberVar(z.number().int().positive(), 1000),
});

export interface SmtpConfig {
  host?: string;
  port: number;
  user?: string;
  password?: string;
  from?: string;
  notify?: string;
  timeoutMs: number;
}

export interface AdminConfig {
  username?: string;
  password?: string;
  sessionTtlMs: number;
  maxSessions: number;
}

export interface AppConfig {
  databasePath: string;
  host: string;
  port: number;
  publicBaseUrl?: string;
  staticDir: string;
  corsOrigins: string[];
  smtp: SmtpConfig;
  admin: AdminConfig;
}

/**
 * Parse and validate configuration. Throws a ZodError on invalid values.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const env = EnvSchema.parse(source);
  const cwd = process.cwd();

  return {
    databasePath: env.BOOKING_DB ?? path.join(cwd, 'bookings.db'),
    host: env.BOOKING_HOST,
    port: env.BOOKING_PORT,
    publicBaseUrl: env.PUBLIC_BASE_URL?.replace(/\/+$/, ''),
    staticDir: path.resolve(cwd, env.STATIC_DIR ?? 'backend/public'),
    corsOrigins: (env.CORS_ORIGINS ?? '')
      .split(',')
      .map((origin) => origin.trim())
      .filter(Boolean),
    smtp: {
      host: env.SMTP_HOST,
      port: env.SMTP_PORT,
      user: env.SMTP_USER,
      password: env.SMTP_PASS,
      from: env.SMTP_FROM ?? env.SMTP_USER,
      notify: env.SMTP_NOTIFY,
      timeoutMs: env.SMTP_TIMEOUT_MS,
    },
    admin: {
      username: env.ADMIN_USERNAME,
      password: env.ADMIN_PASSWORD,
      sessionTtlMs: env.ADMIN_SESSION_TTL_MS,
      maxSessions: env.ADMIN_MAX_SESSIONS,
    },
  };
}
