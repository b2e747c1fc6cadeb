import { mkdir } from 'fs/promises';

import type { CertificateBundle, RuntimeKind } from '@valhalla/shared';

import { runBestEffort } from '../core/best-effort.js';
import { ValidationError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { shellEscape, type CommandRunner } from '../core/run-command.js';
import type { KeyValueStore } from '../store/key-value-store.js';

const HOSTNAME_PATTERN =
  /^(?=.{1,253}$)(?!-)(?:[a-z0-9](?:[a-z0-9-]{0,61}[a-z0-9])?\.)+[a-z]{2,63}$/i;

export const CERTBOT_IMAGE = 'docker.io/certbot/certbot';
/** Where the certs directory is mounted inside the app container. */
export const CONTAINER_CERTS_DIR = '/app/certs';
export const PORT_80_SERVICES = ['nginx', 'apache2', 'httpd'];

export const assertValidDomain = (value: string): string => {
  const normalized = value.trim().toLowerCase().replace(/\.$/, '');
  if (!HOSTNAME_PATTERN.test(normalized)) {
    throw new ValidationError(`Invalid domain: ${value}`, { domain: value });
  }
  return normalized;
};

export const certificatePaths = (domain: string): CertificateBundle => ({
  domain,
  certPath: `${CONTAINER_CERTS_DIR}/live/${domain}/fullchain.pem`,
  keyPath: `${CONTAINER_CERTS_DIR}/live/${domain}/privkey.pem`,
});

export interface CertificateIssuer {
  issue(domain: string): Promise<void>;
}

/**
 * Runs certbot from its container image with a standalone listener on :80.
 * The listener lives only as long as the certbot container.
 */
export class StandaloneCertbotIssuer implements CertificateIssuer {
  constructor(
    private readonly runtime: RuntimeKind,
    private readonly certsDir: string,
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
  ) {}

  async issue(domain: string): Promise<void> {
    await this.freePort80();
    await mkdir(this.certsDir, { recursive: true });

    const command = [
      `${this.runtime} run --rm -p 80:80`,
      `-v ${shellEscape(`${this.certsDir}:/etc/letsencrypt`)}`,
      CERTBOT_IMAGE,
      'certonly --standalone',
      '--non-interactive',
      '--agree-tos',
      '--register-unsafely-without-email',
      `-d ${shellEscape(domain)}`,
    ].join(' ');

    await this.runner.stream(command, (line) => this.logger.info({ domain }, line));
  }

  private async freePort80(): Promise<void> {
    if (!(await this.runner.hasExecutable('systemctl'))) {
      return;
    }
    await runBestEffort(
      'stop port 80 services',
      () => this.runner.run(`systemctl stop ${PORT_80_SERVICES.join(' ')}`),
      this.logger,
    );
  }
}

export class CertificateProvisioner {
  constructor(
    private readonly store: KeyValueStore,
    private readonly issuer: CertificateIssuer,
    private readonly logger: Logger,
  ) {}

  /**
   * Obtains a certificate and records its paths. An invalid domain or a failed
   * issuance is logged and yields `undefined`, leaving the store untouched.
   */
  async provision(domain: string): Promise<CertificateBundle | undefined> {
    const bundle = await runBestEffort(
      `certificate issuance for ${domain}`,
      async () => {
        const normalized = assertValidDomain(domain);
        this.logger.info({ domain: normalized }, 'Obtaining SSL certificate');
        await this.issuer.issue(normalized);
        return certificatePaths(normalized);
      },
      this.logger,
    );
    if (!bundle) {
      return undefined;
    }

    await this.store.set('SSL_CERT_PATH', bundle.certPath);
    await this.store.set('SSL_KEY_PATH', bundle.keyPath);
    return bundle;
  }
}
