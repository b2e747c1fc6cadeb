import { z } from 'zod';

import type { ParsedEnvEntry } from '../store/env-record.js';

const blankAsUnset = (value: unknown) => {
  if (typeof value !== 'string') {
    return value;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const optionalString = z.preprocess(blankAsUnset, z.string().optional());
const optionalCount = z.preprocess(blankAsUnset, z.coerce.number().int().min(1).optional());

const schema = z.object({
  SERVICE: z.preprocess(blankAsUnset, z.string().default('app')),
  WORKERS: optionalCount,
  ASYNC_WORKERS: optionalCount,
  // 0 disables the worker timeout.
  GUNICORN_TIMEOUT: z.preprocess(blankAsUnset, z.coerce.number().int().min(0).default(120)),
  FLASK_HOST: z.preprocess(blankAsUnset, z.string().default('0.0.0.0')),
  FLASK_PORT: z.preprocess(blankAsUnset, z.coerce.number().int().min(1).max(65535).default(5000)),
  SSL_CERT_PATH: optionalString,
  SSL_KEY_PATH: optionalString,
  MYSQL_HOST: z.preprocess(blankAsUnset, z.string().default('mysql')),
  MYSQL_PORT: z.preprocess(blankAsUnset, z.coerce.number().int().min(1).max(65535).default(3306)),
});

export type SupervisorSettings = z.infer<typeof schema>;

/**
 * Process environment first; the environment record fills in keys the
 * process does not set (or sets to an empty string).
 */
export const resolveSupervisorSettings = (
  processEnv: NodeJS.ProcessEnv,
  record: ParsedEnvEntry[] = [],
): SupervisorSettings => {
  const merged: Record<string, string | undefined> = {};
  for (const { key, value } of record) {
    merged[key] = value;
  }
  for (const [key, value] of Object.entries(processEnv)) {
    if (value !== undefined && value.trim() !== '') {
      merged[key] = value;
    }
  }
  return schema.parse(merged);
};
