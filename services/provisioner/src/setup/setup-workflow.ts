import type { CertificateBundle, ComposeFrontEnd, OsFamily, RuntimeKind } from '@valhalla/shared';

import { runBestEffort } from '../core/best-effort.js';
import type { Logger } from '../core/logger.js';
import type { CommandRunner } from '../core/run-command.js';
import { ensureComposeFile, fileExists, type FetchLike } from '../compose/compose-file.js';
import { ComposeLauncher } from '../compose/compose-launcher.js';
import { NetworkFixer, qualifyMysqlImage } from '../network/network-fixer.js';
import type { Prompter } from '../prompts/prompter.js';
import { CredentialProvisioner } from '../provisioning/credential-provisioner.js';
import { createPackageInstaller } from '../runtime/host-os.js';
import {
  chooseRuntime,
  composeCommandLine,
  detectCompose,
  ensureRuntimeInstalled,
} from '../runtime/runtime-detector.js';
import { applyDefaults, type KeyValueStore } from '../store/key-value-store.js';
import {
  CertificateProvisioner,
  StandaloneCertbotIssuer,
  type CertificateIssuer,
} from '../tls/certificate-provisioner.js';
import { setupDefaults } from './defaults.js';

export const TLS_PORT = '443';

export interface SetupPaths {
  envFile: string;
  composeFile: string;
  composeUrl: string;
  certsDir: string;
}

export interface SetupDependencies {
  store: KeyValueStore;
  prompter: Prompter;
  runner: CommandRunner;
  logger: Logger;
  paths: SetupPaths;
  osFamily: OsFamily;
  cpus: number;
  maxAdminIdAttempts?: number;
  fetchImpl?: FetchLike;
  createIssuer?: (runtime: RuntimeKind) => CertificateIssuer;
}

export interface SetupResult {
  runtime: RuntimeKind;
  certificate?: CertificateBundle;
  compose?: ComposeFrontEnd;
  started: boolean;
}

/**
 * First-run host setup. Required steps throw; TLS issuance and Podman DNS
 * repair only log their failures.
 */
export const runSetup = async (deps: SetupDependencies): Promise<SetupResult> => {
  const { store, prompter, runner, logger, paths } = deps;
  const installer = createPackageInstaller(deps.osFamily, runner);

  const runtime = await chooseRuntime(prompter);
  await ensureRuntimeInstalled(runtime, { runner, prompter, installer, logger });

  const defaulted = await applyDefaults(store, setupDefaults(deps.cpus));
  if (defaulted.length > 0) {
    logger.debug({ keys: defaulted }, 'Applied defaults');
  }

  const credentials = new CredentialProvisioner({
    store,
    prompter,
    logger,
    maxAdminIdAttempts: deps.maxAdminIdAttempts,
  });

  prompter.say('---- Telegram ----');
  await credentials.askRequired('BOT_TOKEN', 'What is your Telegram bot token');
  await credentials.askAdminIds();

  await credentials.askRequired(
    'PUBLIC_BASE_URL',
    'What is your public base URL (e.g. https://example.com)',
  );

  let certificate: CertificateBundle | undefined;
  const port = await credentials.askRequired('FLASK_PORT', 'Which port should the app listen on');
  if (port === TLS_PORT) {
    const domain = await credentials.askRequired('SSL_DOMAIN', 'What domain should be used for HTTPS');
    const issuer = deps.createIssuer
      ? deps.createIssuer(runtime)
      : new StandaloneCertbotIssuer(runtime, paths.certsDir, runner, logger);
    certificate = await new CertificateProvisioner(store, issuer, logger).provision(domain);
  }

  prompter.say('---- MySQL (blank = random) ----');
  await credentials.askGenerated('MYSQL_USER', 'MySQL app username', 'user');
  await credentials.askGenerated('MYSQL_PASSWORD', 'MySQL app password', 'password');
  await credentials.askGenerated('MYSQL_ROOT_PASSWORD', 'MySQL ROOT password', 'password');

  prompter.say(`✓ Saved to ${paths.envFile}.`);

  if (await ensureComposeFile(paths.composeFile, paths.composeUrl, deps.fetchImpl)) {
    logger.info({ url: paths.composeUrl, file: paths.composeFile }, 'Fetched compose descriptor');
  }

  if (runtime === 'podman') {
    await runBestEffort('qualify mysql image', () => qualifyMysqlImage(paths.composeFile), logger);
    await runBestEffort(
      'podman DNS setup',
      () => new NetworkFixer({ runner, installer, logger }).ensureDns(),
      logger,
    );
  }

  const compose = await detectCompose(runner);
  if (!compose || !(await fileExists(paths.composeFile))) {
    prompter.say(`compose not found or ${paths.composeFile} missing. Start services manually later.`);
    return { runtime, certificate, compose, started: false };
  }

  const launcher = new ComposeLauncher(compose, paths.composeFile, runner, logger);
  await launcher.pullAndStart();
  prompter.say(`Done. Use '${launcher.logsHint()}' to follow logs.`);
  logger.debug({ compose: composeCommandLine(compose) }, 'Services started');

  if (runtime === 'podman') {
    const dnsOk = await launcher.verifyDatabaseDns();
    prompter.say(
      dnsOk ? 'DNS OK' : 'DNS check failed (run: podman exec -it valhalla-app getent hosts mysql)',
    );
  }

  return { runtime, certificate, compose, started: true };
};
