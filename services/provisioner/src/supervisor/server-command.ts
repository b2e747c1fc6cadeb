import type { ServerCommand } from '@valhalla/shared';

import type { SupervisorSettings } from './settings.js';

export const APP_ROLE = 'app';
export const WSGI_TARGET = 'app:app';
export const ASYNC_WORKER_CLASS = 'gevent';

export const defaultWorkerCount = (cpus: number): number => 2 * Math.max(1, cpus) + 1;

/**
 * Command line for the configured service role. The `app` role gets the WSGI
 * server; every other role is run as a module.
 */
export const buildServerCommand = (settings: SupervisorSettings, cpus: number): ServerCommand => {
  if (settings.SERVICE !== APP_ROLE) {
    return { command: 'python', args: ['-m', settings.SERVICE] };
  }

  const args: string[] = [];

  if (settings.ASYNC_WORKERS !== undefined) {
    args.push('--workers', String(settings.ASYNC_WORKERS), '--worker-class', ASYNC_WORKER_CLASS);
  } else {
    args.push('--workers', String(settings.WORKERS ?? defaultWorkerCount(cpus)));
  }

  args.push('--timeout', String(settings.GUNICORN_TIMEOUT));
  args.push('--bind', `${settings.FLASK_HOST}:${settings.FLASK_PORT}`);

  if (settings.SSL_CERT_PATH && settings.SSL_KEY_PATH) {
    args.push('--certfile', settings.SSL_CERT_PATH, '--keyfile', settings.SSL_KEY_PATH);
  }

  args.push(WSGI_TARGET);
  return { command: 'gunicorn', args };
};
