#!/usr/bin/env node
import { env } from './core/env.js';
import { describeError } from './core/errors.js';
import { componentLogger } from './core/logger.js';
import { waitFor } from './readiness/readiness-prober.js';
import { EnvFileStore } from './store/key-value-store.js';
import { resolveSupervisorSettings } from './supervisor/settings.js';

const log = componentLogger('readiness');

const main = async () => {
  const record = await new EnvFileStore(env.VALHALLA_ENV_FILE).entries();
  const { MYSQL_HOST, MYSQL_PORT } = resolveSupervisorSettings(process.env, record);

  process.stdout.write(`⏳ Waiting for MySQL at ${MYSQL_HOST}:${MYSQL_PORT} ...\n`);
  await waitFor(MYSQL_HOST, MYSQL_PORT, {
    maxAttempts: env.READINESS_MAX_ATTEMPTS,
    intervalMs: env.READINESS_INTERVAL_MS,
    logger: log,
  });
  process.stdout.write('✅ MySQL is up.\n');
};

main().catch((error: unknown) => {
  log.error({ err: error }, 'Readiness wait failed');
  process.stderr.write(`❌ MySQL did not become ready in time. ${describeError(error)}\n`);
  process.exit(1);
});
