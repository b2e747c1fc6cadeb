import { spawn } from 'child_process';
import { constants } from 'os';

import type { ServerCommand } from '@valhalla/shared';

const SIGNAL_NUMBERS: Partial<Record<NodeJS.Signals, number>> = constants.signals;

export const FORWARDED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP', 'SIGQUIT'];

export interface ProcessLauncher {
  /** Runs the command in the foreground and resolves with its exit code. */
  launch(command: ServerCommand): Promise<number>;
}

export const exitCodeFor = (code: number | null, signal: NodeJS.Signals | null): number => {
  if (code !== null) {
    return code;
  }
  if (signal) {
    return 128 + (SIGNAL_NUMBERS[signal] ?? 0);
  }
  return 1;
};

/**
 * Node cannot replace its own process image, so the server runs as the only
 * child with inherited stdio. Lifecycle signals sent to this process are
 * passed straight through to it.
 */
export class ForegroundProcessLauncher implements ProcessLauncher {
  launch({ command, args }: ServerCommand): Promise<number> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: 'inherit', env: process.env });

      const forward = (signal: NodeJS.Signals) => {
        child.kill(signal);
      };
      FORWARDED_SIGNALS.forEach((signal) => process.on(signal, forward));
      const detach = () => FORWARDED_SIGNALS.forEach((signal) => process.off(signal, forward));

      child.on('error', (error) => {
        detach();
        reject(error);
      });
      child.on('exit', (code, signal) => {
        detach();
        resolve(exitCodeFor(code, signal));
      });
    });
  }
}
