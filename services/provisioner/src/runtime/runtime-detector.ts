import type { ComposeFrontEnd, RuntimeKind } from '@valhalla/shared';

import { ToolMissingError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { CommandRunner } from '../core/run-command.js';
import type { Prompter } from '../prompts/prompter.js';
import type { PackageInstaller } from './host-os.js';

interface ComposeProbe {
  frontEnd: ComposeFrontEnd;
  executable: string;
  checks: string[];
}

/** Probed in order; the first one that answers wins. */
export const COMPOSE_PROBES: readonly ComposeProbe[] = [
  {
    frontEnd: { runtime: 'docker', flavor: 'native', command: ['docker', 'compose'] },
    executable: 'docker',
    checks: ['docker compose version'],
  },
  {
    frontEnd: { runtime: 'docker', flavor: 'legacy', command: ['docker-compose'] },
    executable: 'docker-compose',
    checks: ['docker-compose version'],
  },
  {
    frontEnd: { runtime: 'podman', flavor: 'native', command: ['podman', 'compose'] },
    executable: 'podman',
    checks: ['podman compose version', 'podman compose --help'],
  },
  {
    frontEnd: { runtime: 'podman', flavor: 'legacy', command: ['podman-compose'] },
    executable: 'podman-compose',
    checks: ['podman-compose version'],
  },
];

export const composeCommandLine = (frontEnd: ComposeFrontEnd): string => frontEnd.command.join(' ');

/**
 * Finds a usable compose front-end. `undefined` means none is installed, which
 * callers report rather than treat as fatal.
 */
export const detectCompose = async (
  runner: CommandRunner,
): Promise<ComposeFrontEnd | undefined> => {
  for (const probe of COMPOSE_PROBES) {
    if (!(await runner.hasExecutable(probe.executable))) {
      continue;
    }
    for (const check of probe.checks) {
      if (await runner.succeeds(check)) {
        return probe.frontEnd;
      }
    }
  }
  return undefined;
};

export const parseRuntime = (answer: string): RuntimeKind | undefined => {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'docker' || normalized === 'podman' ? normalized : undefined;
};

/**
 * Asks until the answer is docker or podman. There is no attempt limit.
 */
export const chooseRuntime = async (prompter: Prompter): Promise<RuntimeKind> => {
  for (;;) {
    const runtime = parseRuntime(await prompter.input('Choose container runtime (docker/podman)'));
    if (runtime) {
      return runtime;
    }
  }
};

export interface EnsureRuntimeOptions {
  runner: CommandRunner;
  prompter: Prompter;
  installer?: PackageInstaller;
  logger: Logger;
}

export const ensureRuntimeInstalled = async (
  runtime: RuntimeKind,
  options: EnsureRuntimeOptions,
): Promise<void> => {
  const { runner, prompter, installer, logger } = options;

  if (await runner.hasExecutable(runtime)) {
    return;
  }

  prompter.say(`${runtime} is not installed.`);
  const install = await prompter.confirm(`Install ${runtime} now?`, false);
  if (!install) {
    throw new ToolMissingError(runtime, 'Aborting.');
  }

  if (!installer) {
    throw new ToolMissingError(runtime, `Unknown distro; install ${runtime} manually.`);
  }

  logger.info({ runtime, family: installer.family }, 'Installing container runtime');
  await installer.install([runtime]);
};
