import pino, { type Logger } from 'pino';

import { env } from './env.js';

export type { Logger };

// stdout belongs to the interactive prompts.
export const logger: Logger = pino(
  {
    name: 'valhalla',
    level: env.LOG_LEVEL,
  },
  pino.destination(2),
);

export const componentLogger = (component: string, parent: Logger = logger): Logger =>
  parent.child({ component });
