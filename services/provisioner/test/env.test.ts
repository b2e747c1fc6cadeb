import { describe, expect, it } from 'vitest';

import { DEFAULT_COMPOSE_URL, parseToolEnv } from '../src/core/env.js';

describe('parseToolEnv', () => {
  it('derives file locations from the app directory', () => {
    const parsed = parseToolEnv({ VALHALLA_APP_DIR: '/srv/valhalla' });

    expect(parsed.VALHALLA_ENV_FILE).toBe('/srv/valhalla/.env');
    expect(parsed.VALHALLA_COMPOSE_FILE).toBe('/srv/valhalla/docker-compose.yml');
    expect(parsed.VALHALLA_CERTS_DIR).toBe('/srv/valhalla/certs');
    expect(parsed.VALHALLA_COMPOSE_URL).toBe(DEFAULT_COMPOSE_URL);
    expect(parsed.READINESS_MAX_ATTEMPTS).toBe(60);
    expect(parsed.READINESS_INTERVAL_MS).toBe(1000);
    expect(parsed.ADMIN_ID_MAX_ATTEMPTS).toBe(10);
  });

  it('keeps explicit paths and coerces numbers', () => {
    const parsed = parseToolEnv({
      VALHALLA_ENV_FILE: '/etc/valhalla.env',
      READINESS_MAX_ATTEMPTS: '5',
      LOG_LEVEL: 'debug',
    });

    expect(parsed.VALHALLA_ENV_FILE).toBe('/etc/valhalla.env');
    expect(parsed.VALHALLA_COMPOSE_FILE).toBe('/app/docker-compose.yml');
    expect(parsed.READINESS_MAX_ATTEMPTS).toBe(5);
    expect(parsed.LOG_LEVEL).toBe('debug');
  });

  it('accepts upper-case and long-form level names', () => {
    expect(parseToolEnv({ LOG_LEVEL: 'INFO' }).LOG_LEVEL).toBe('info');
    expect(parseToolEnv({ LOG_LEVEL: 'WARNING' }).LOG_LEVEL).toBe('warn');
    expect(parseToolEnv({ LOG_LEVEL: 'Critical' }).LOG_LEVEL).toBe('fatal');
    expect(parseToolEnv({ LOG_LEVEL: ' ' }).LOG_LEVEL).toBe('info');
  });

  it('rejects out-of-range values', () => {
    expect(() => parseToolEnv({ READINESS_MAX_ATTEMPTS: '0' })).toThrow();
    expect(() => parseToolEnv({ LOG_LEVEL: 'verbose' })).toThrow();
  });
});
