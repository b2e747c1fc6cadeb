import { readFile } from 'fs/promises';

import type { OsFamily } from '@valhalla/shared';

import { shellJoin, type CommandRunner } from '../core/run-command.js';

export const OS_RELEASE_PATH = '/etc/os-release';

export const osFamilyFromRelease = (osRelease: string): OsFamily => {
  if (/ubuntu|debian/i.test(osRelease)) {
    return 'debian';
  }
  if (/rhel|centos|rocky|alma|oracle/i.test(osRelease)) {
    return 'rhel';
  }
  return 'unknown';
};

export const detectOsFamily = async (path = OS_RELEASE_PATH): Promise<OsFamily> => {
  try {
    return osFamilyFromRelease(await readFile(path, 'utf8'));
  } catch {
    return 'unknown';
  }
};

export interface PackageInstaller {
  readonly family: OsFamily;
  install(packages: string[]): Promise<void>;
}

export class AptInstaller implements PackageInstaller {
  readonly family = 'debian' as const;

  constructor(private readonly runner: CommandRunner) {}

  async install(packages: string[]): Promise<void> {
    await this.runner.run(
      [
        'DEBIAN_FRONTEND=noninteractive apt-get update -y',
        `DEBIAN_FRONTEND=noninteractive apt-get install -y ${shellJoin(packages)}`,
      ].join(' && '),
    );
  }
}

export class DnfInstaller implements PackageInstaller {
  readonly family = 'rhel' as const;

  constructor(private readonly runner: CommandRunner) {}

  async install(packages: string[]): Promise<void> {
    await this.runner.run(`dnf install -y ${shellJoin(packages)}`);
  }
}

export const createPackageInstaller = (
  family: OsFamily,
  runner: CommandRunner,
): PackageInstaller | undefined => {
  switch (family) {
    case 'debian':
      return new AptInstaller(runner);
    case 'rhel':
      return new DnfInstaller(runner);
    default:
      return undefined;
  }
};
