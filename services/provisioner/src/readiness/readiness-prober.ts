import net from 'net';

import { ReadinessTimeoutError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { withRetry } from '../core/retry.js';

export type TcpConnector = (host: string, port: number, timeoutMs: number) => Promise<boolean>;

export interface WaitForOptions {
  maxAttempts?: number;
  intervalMs?: number;
  connectTimeoutMs?: number;
  connector?: TcpConnector;
  logger?: Logger;
}

export const DEFAULT_MAX_ATTEMPTS = 60;
export const DEFAULT_INTERVAL_MS = 1000;

/**
 * Attempts a raw TCP connection. Resolves true if the handshake completes,
 * false on error or timeout.
 */
export const tcpProbe: TcpConnector = (host, port, timeoutMs) =>
  new Promise((resolve) => {
    try {
      const socket = net.createConnection({ host, port }, () => {
        socket.destroy();
        resolve(true);
      });
      socket.setTimeout(timeoutMs);
      socket.on('timeout', () => { socket.destroy(); resolve(false); });
      socket.on('error', () => { socket.destroy(); resolve(false); });
    } catch {
      resolve(false);
    }
  });

class ConnectRefused extends Error {}

/**
 * Blocks until `host:port` accepts a TCP connection. Makes at most
 * `maxAttempts` attempts, `intervalMs` apart, and resolves with the number of
 * attempts used.
 */
export const waitFor = async (
  host: string,
  port: number,
  options: WaitForOptions = {},
): Promise<number> => {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
  const connectTimeoutMs = options.connectTimeoutMs ?? 2000;
  const connector = options.connector ?? tcpProbe;
  let attempts = 0;

  options.logger?.info({ host, port, maxAttempts }, 'Waiting for endpoint');

  try {
    await withRetry(
      async () => {
        attempts += 1;
        if (!(await connector(host, port, connectTimeoutMs))) {
          throw new ConnectRefused(`${host}:${port} refused attempt ${attempts}`);
        }
      },
      {
        retries: maxAttempts - 1,
        delayMs: intervalMs,
        factor: 1,
        onRetry: (_error, attempt) => {
          if (attempt % 10 === 0) {
            options.logger?.debug({ host, port, attempt }, 'Endpoint not ready yet');
          }
        },
      },
    );
  } catch (error) {
    if (error instanceof ConnectRefused) {
      throw new ReadinessTimeoutError(host, port, attempts);
    }
    throw error;
  }

  options.logger?.info({ host, port, attempts }, 'Endpoint is up');
  return attempts;
};
