#!/usr/bin/env node
import { env } from './core/env.js';
import { ProvisionerError, describeError } from './core/errors.js';
import { componentLogger } from './core/logger.js';
import { EnvFileStore } from './store/key-value-store.js';
import { ForegroundProcessLauncher } from './supervisor/process-launcher.js';
import { supervise } from './supervisor/process-supervisor.js';
import { resolveSupervisorSettings } from './supervisor/settings.js';

const log = componentLogger('supervisor');

const main = async () => {
  const record = await new EnvFileStore(env.VALHALLA_ENV_FILE).entries();
  const settings = resolveSupervisorSettings(process.env, record);

  const { exitCode } = await supervise({
    settings,
    launcher: new ForegroundProcessLauncher(),
    logger: log,
    readiness: {
      maxAttempts: env.READINESS_MAX_ATTEMPTS,
      intervalMs: env.READINESS_INTERVAL_MS,
    },
  });

  process.exit(exitCode);
};

main().catch((error: unknown) => {
  log.error({ err: error }, 'Start failed');
  process.stderr.write(`${describeError(error)}\n`);
  process.exit(error instanceof ProvisionerError ? error.exitCode : 1);
});
