import 'dotenv/config';

import { join } from 'path';

import { z } from 'zod';

export const DEFAULT_COMPOSE_URL =
  'https://raw.githubusercontent.com/Rh8831/Valhallabot/refs/heads/main/docker-compose.yml';

const optionalString = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}, z.string().optional());

// The app's .env may use its own level names (INFO, WARNING, CRITICAL).
const LOG_LEVEL_ALIASES: Record<string, string> = { warning: 'warn', critical: 'fatal' };

const logLevel = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value;
  }

  const lowered = value.trim().toLowerCase();
  if (!lowered) {
    return undefined;
  }
  return LOG_LEVEL_ALIASES[lowered] ?? lowered;
}, z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'));

const schema = z.object({
  VALHALLA_APP_DIR: z.string().min(1).default('/app'),
  VALHALLA_ENV_FILE: optionalString,
  VALHALLA_COMPOSE_FILE: optionalString,
  VALHALLA_COMPOSE_URL: z.string().url().default(DEFAULT_COMPOSE_URL),
  VALHALLA_CERTS_DIR: optionalString,
  LOG_LEVEL: logLevel,
  READINESS_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(3600).default(60),
  READINESS_INTERVAL_MS: z.coerce.number().int().min(0).max(60_000).default(1000),
  ADMIN_ID_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(1000).default(10),
});

export type ToolEnv = ReturnType<typeof parseToolEnv>;

export const parseToolEnv = (source: NodeJS.ProcessEnv) => {
  const parsed = schema.parse(source);

  return {
    ...parsed,
    VALHALLA_ENV_FILE: parsed.VALHALLA_ENV_FILE ?? join(parsed.VALHALLA_APP_DIR, '.env'),
    VALHALLA_COMPOSE_FILE:
      parsed.VALHALLA_COMPOSE_FILE ?? join(parsed.VALHALLA_APP_DIR, 'docker-compose.yml'),
    VALHALLA_CERTS_DIR: parsed.VALHALLA_CERTS_DIR ?? join(parsed.VALHALLA_APP_DIR, 'certs'),
  };
};

export const env = parseToolEnv(process.env);
