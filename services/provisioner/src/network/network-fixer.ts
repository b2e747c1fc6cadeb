import { constants } from 'fs';
import { access, readdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';

import type { NetworkBackend } from '@valhalla/shared';

import { runBestEffort } from '../core/best-effort.js';
import type { Logger } from '../core/logger.js';
import { shellEscape, type CommandRunner } from '../core/run-command.js';
import type { PackageInstaller } from '../runtime/host-os.js';
import { patchConflistFile } from './cni-conflist.js';

export const APP_NETWORK = 'app_default';
export const CNI_CONFIG_DIR = '/etc/cni/net.d';
export const DNSNAME_CANDIDATES = [
  '/opt/cni/bin/dnsname',
  '/usr/lib/cni/dnsname',
  '/usr/libexec/cni/dnsname',
];

/** One install step: the first package set that installs wins. */
type InstallStep = string[][];

const DNSNAME_PACKAGES: Record<'debian' | 'rhel', InstallStep[]> = {
  debian: [
    [['containernetworking-plugins']],
    // Package name varies by release.
    [['golang-github-containernetworking-plugin-dnsname'], ['cni-plugin-dnsname']],
    [['dnsmasq-base']],
  ],
  rhel: [[['containernetworking-plugins', 'podman-plugins', 'dnsmasq']]],
};

const NETAVARK_PACKAGES: InstallStep[] = [[['netavark', 'aardvark-dns']]];

export const parseNetworkBackend = (podmanInfo: string): NetworkBackend => {
  const match = /networkBackend:\s*(\S+)/.exec(podmanInfo);
  return match?.[1] === 'netavark' ? 'netavark' : 'cni';
};

export const detectNetworkBackend = async (runner: CommandRunner): Promise<NetworkBackend> => {
  try {
    return parseNetworkBackend(await runner.run('podman info'));
  } catch {
    return 'cni';
  }
};

const isExecutable = async (path: string): Promise<boolean> => {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
};

export const hasDnsnamePlugin = async (candidates = DNSNAME_CANDIDATES): Promise<boolean> => {
  for (const candidate of candidates) {
    if (await isExecutable(candidate)) {
      return true;
    }
  }
  return false;
};

export const findNetworkConflist = async (
  network = APP_NETWORK,
  configDir = CNI_CONFIG_DIR,
): Promise<string | undefined> => {
  let names: string[];
  try {
    names = await readdir(configDir);
  } catch {
    return undefined;
  }
  const match = names
    .filter((name) => name.includes(network) && name.endsWith('.conflist'))
    .sort()[0];
  return match ? join(configDir, match) : undefined;
};

/**
 * Podman refuses short image names without a registries.conf alias.
 */
export const qualifyMysqlImage = async (composeFile: string): Promise<boolean> => {
  const source = await readFile(composeFile, 'utf8');
  const next = source.replace(/image:[ \t]*mysql:8\.0/g, 'image: docker.io/library/mysql:8.0');
  if (next === source) {
    return false;
  }
  await writeFile(composeFile, next, 'utf8');
  return true;
};

export interface NetworkFixerOptions {
  runner: CommandRunner;
  installer?: PackageInstaller;
  logger: Logger;
  network?: string;
  cniConfigDir?: string;
  dnsnameCandidates?: string[];
}

/**
 * Makes container-to-container name resolution work on Podman. Safe to run
 * repeatedly: an existing dnsname entry is never duplicated.
 */
export class NetworkFixer {
  private readonly runner: CommandRunner;
  private readonly installer?: PackageInstaller;
  private readonly logger: Logger;
  private readonly network: string;
  private readonly cniConfigDir: string;
  private readonly dnsnameCandidates: string[];

  constructor(options: NetworkFixerOptions) {
    this.runner = options.runner;
    this.installer = options.installer;
    this.logger = options.logger;
    this.network = options.network ?? APP_NETWORK;
    this.cniConfigDir = options.cniConfigDir ?? CNI_CONFIG_DIR;
    this.dnsnameCandidates = options.dnsnameCandidates ?? DNSNAME_CANDIDATES;
  }

  async ensureDns(): Promise<NetworkBackend> {
    const backend = await detectNetworkBackend(this.runner);
    this.logger.info({ backend }, 'Podman network backend');

    if (backend === 'netavark') {
      await this.installPackages(NETAVARK_PACKAGES);
      await this.recreateNetwork();
      return backend;
    }

    if (!(await hasDnsnamePlugin(this.dnsnameCandidates))) {
      const family = this.installer?.family;
      if (family === 'debian' || family === 'rhel') {
        await this.installPackages(DNSNAME_PACKAGES[family]);
      }
    }

    await this.recreateNetwork();

    const conflist = await findNetworkConflist(this.network, this.cniConfigDir);
    if (!conflist) {
      this.logger.warn(
        { network: this.network, dir: this.cniConfigDir },
        'Could not find CNI conflist for network',
      );
      return backend;
    }

    if (await patchConflistFile(conflist)) {
      this.logger.info({ conflist }, 'Patched conflist with dnsname plugin');
    } else {
      this.logger.info({ conflist }, 'dnsname already present');
    }
    return backend;
  }

  private async installPackages(steps: InstallStep[]): Promise<void> {
    const installer = this.installer;
    if (!installer) {
      return;
    }
    for (const alternatives of steps) {
      const label = alternatives.map((group) => group.join(' ')).join(' | ');
      await runBestEffort(`install ${label}`, () => this.installFirst(installer, alternatives), this.logger);
    }
  }

  private async installFirst(installer: PackageInstaller, alternatives: string[][]): Promise<void> {
    let lastError: unknown = new Error('No packages to install');
    for (const packages of alternatives) {
      try {
        await installer.install(packages);
        return;
      } catch (error) {
        this.logger.debug({ packages, err: error }, 'Package install failed; trying next');
        lastError = error;
      }
    }
    throw lastError;
  }

  private async recreateNetwork(): Promise<void> {
    await this.runner.succeeds(`podman network rm ${shellEscape(this.network)}`);
    await this.runner.run(`podman network create ${shellEscape(this.network)}`);
  }
}
