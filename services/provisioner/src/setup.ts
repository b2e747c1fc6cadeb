#!/usr/bin/env node
import { availableParallelism } from 'os';

import { env } from './core/env.js';
import { ProvisionerError, describeError } from './core/errors.js';
import { logger } from './core/logger.js';
import { ShellCommandRunner } from './core/run-command.js';
import { InquirerPrompter } from './prompts/prompter.js';
import { detectOsFamily } from './runtime/host-os.js';
import { runSetup } from './setup/setup-workflow.js';
import { EnvFileStore } from './store/key-value-store.js';

const main = async () => {
  const result = await runSetup({
    store: new EnvFileStore(env.VALHALLA_ENV_FILE),
    prompter: new InquirerPrompter(),
    runner: new ShellCommandRunner(),
    logger,
    paths: {
      envFile: env.VALHALLA_ENV_FILE,
      composeFile: env.VALHALLA_COMPOSE_FILE,
      composeUrl: env.VALHALLA_COMPOSE_URL,
      certsDir: env.VALHALLA_CERTS_DIR,
    },
    osFamily: await detectOsFamily(),
    cpus: availableParallelism(),
    maxAdminIdAttempts: env.ADMIN_ID_MAX_ATTEMPTS,
  });

  logger.info(
    { runtime: result.runtime, started: result.started, tls: Boolean(result.certificate) },
    'Setup finished',
  );
};

main().catch((error: unknown) => {
  logger.error({ err: error }, 'Setup failed');
  process.stderr.write(`${describeError(error)}\n`);
  process.exit(error instanceof ProvisionerError ? error.exitCode : 1);
});
