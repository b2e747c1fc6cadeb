import { availableParallelism } from 'os';

import type { ServerCommand } from '@valhalla/shared';

import type { Logger } from '../core/logger.js';
import { waitFor, type WaitForOptions } from '../readiness/readiness-prober.js';
import type { ProcessLauncher } from './process-launcher.js';
import { buildServerCommand } from './server-command.js';
import type { SupervisorSettings } from './settings.js';

export interface SuperviseOptions {
  settings: SupervisorSettings;
  launcher: ProcessLauncher;
  logger: Logger;
  readiness?: Omit<WaitForOptions, 'logger'>;
  cpus?: number;
}

export interface SuperviseResult {
  command: ServerCommand;
  exitCode: number;
}

/**
 * Container start: wait for the database, then hand over to the server. The
 * server is never launched before the database accepts connections; a
 * readiness timeout propagates as `ReadinessTimeoutError`.
 */
export const supervise = async (options: SuperviseOptions): Promise<SuperviseResult> => {
  const { settings, launcher, logger } = options;

  await waitFor(settings.MYSQL_HOST, settings.MYSQL_PORT, { ...options.readiness, logger });

  const command = buildServerCommand(settings, options.cpus ?? availableParallelism());
  logger.info({ role: settings.SERVICE, command: command.command, args: command.args }, 'Launching server');

  const exitCode = await launcher.launch(command);
  logger.info({ exitCode }, 'Server exited');
  return { command, exitCode };
};
