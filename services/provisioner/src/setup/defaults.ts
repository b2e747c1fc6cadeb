import type { EnvKey } from '@valhalla/shared';

import { defaultWorkerCount } from '../supervisor/server-command.js';

export const DEFAULT_IMAGE = 'ghcr.io/rh8831/valhalla:latest';

export const setupDefaults = (cpus: number): Partial<Record<EnvKey, string>> => ({
  MYSQL_HOST: 'mysql',
  MYSQL_PORT: '3306',
  MYSQL_DATABASE: 'valhalla',
  FLASK_HOST: '0.0.0.0',
  FLASK_PORT: '5000',
  WORKERS: String(defaultWorkerCount(cpus)),
  USAGE_SYNC_INTERVAL: '60',
  IMAGE: DEFAULT_IMAGE,
});
