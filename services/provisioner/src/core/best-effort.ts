import { BestEffortFailure } from './errors.js';
import type { Logger } from './logger.js';

/**
 * Runs an optional step. A failure is logged as a warning and turned into
 * `undefined`; setup carries on.
 */
export const runBestEffort = async <T>(
  step: string,
  fn: () => Promise<T>,
  log: Logger,
): Promise<T | undefined> => {
  try {
    return await fn();
  } catch (error) {
    const failure = new BestEffortFailure(step, error);
    log.warn({ step, code: failure.code }, failure.message);
    return undefined;
  }
};
