import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  addDnsnamePlugin,
  parseConflist,
  patchConflistFile,
} from '../src/network/cni-conflist.js';
import {
  NetworkFixer,
  findNetworkConflist,
  parseNetworkBackend,
  qualifyMysqlImage,
} from '../src/network/network-fixer.js';
import { RecordingInstaller, RecordingRunner, silentLogger } from './helpers/fakes.js';

const BRIDGE_CONFLIST = {
  cniVersion: '0.4.0',
  name: 'app_default',
  plugins: [{ type: 'bridge', bridge: 'cni-podman1' }, { type: 'portmap' }],
};

const dnsnameEntries = (raw: string) =>
  parseConflist(raw).plugins.filter((plugin) => plugin.type === 'dnsname');

describe('dnsname conflist patch', () => {
  it('adds the plugin only once', () => {
    const once = addDnsnamePlugin(parseConflist(JSON.stringify(BRIDGE_CONFLIST)));
    const twice = addDnsnamePlugin(once.conflist);

    expect(once.changed).toBe(true);
    expect(twice.changed).toBe(false);
    expect(twice.conflist.plugins.map((plugin) => plugin.type)).toEqual(['bridge', 'portmap', 'dnsname']);
    expect(twice.conflist.plugins[2]).toEqual({
      type: 'dnsname',
      domainName: 'dns.podman',
      capabilities: { aliases: true },
    });
  });

  describe('on disk', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'valhalla-cni-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('keeps a backup and stays idempotent across runs', async () => {
      const path = join(dir, '87-app_default.conflist');
      const original = JSON.stringify(BRIDGE_CONFLIST);
      await writeFile(path, original, 'utf8');

      await expect(patchConflistFile(path)).resolves.toBe(true);
      await expect(patchConflistFile(path)).resolves.toBe(false);

      const patched = await readFile(path, 'utf8');
      expect(dnsnameEntries(patched)).toHaveLength(1);
      expect(JSON.parse(patched)).toMatchObject({ cniVersion: '0.4.0', name: 'app_default' });
      expect(await readFile(`${path}.bak`, 'utf8')).toBe(original);
    });

    it('finds the conflist belonging to the network', async () => {
      await writeFile(join(dir, 'other.conflist'), '{}', 'utf8');
      await writeFile(join(dir, '87-app_default.conflist'), '{}', 'utf8');

      await expect(findNetworkConflist('app_default', dir)).resolves.toBe(join(dir, '87-app_default.conflist'));
      await expect(findNetworkConflist('missing', dir)).resolves.toBeUndefined();
      await expect(findNetworkConflist('app_default', join(dir, 'nope'))).resolves.toBeUndefined();
    });

    it('qualifies the mysql image once', async () => {
      const composeFile = join(dir, 'docker-compose.yml');
      await writeFile(composeFile, 'services:\n  mysql:\n    image:   mysql:8.0\n', 'utf8');

      await expect(qualifyMysqlImage(composeFile)).resolves.toBe(true);
      await expect(qualifyMysqlImage(composeFile)).resolves.toBe(false);
      expect(await readFile(composeFile, 'utf8')).toBe(
        'services:\n  mysql:\n    image: docker.io/library/mysql:8.0\n',
      );
    });
  });
});

describe('parseNetworkBackend', () => {
  it('reads the backend from podman info', () => {
    expect(parseNetworkBackend('host:\n  networkBackend: netavark\n')).toBe('netavark');
    expect(parseNetworkBackend('host:\n  networkBackend: cni\n')).toBe('cni');
    expect(parseNetworkBackend('')).toBe('cni');
  });
});

describe('NetworkFixer', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'valhalla-net-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('installs dnsname, recreates the network and patches the conflist on cni', async () => {
    const conflist = join(dir, 'app_default.conflist');
    await writeFile(conflist, JSON.stringify(BRIDGE_CONFLIST), 'utf8');
    const runner = new RecordingRunner({ outputs: { 'podman info': 'networkBackend: cni' } });
    const installer = new RecordingInstaller('debian');
    const fixer = new NetworkFixer({
      runner,
      installer,
      logger: silentLogger,
      cniConfigDir: dir,
      dnsnameCandidates: [join(dir, 'dnsname')],
    });

    await expect(fixer.ensureDns()).resolves.toBe('cni');
    await fixer.ensureDns();

    expect(installer.installs.slice(0, 3)).toEqual([
      ['containernetworking-plugins'],
      ['golang-github-containernetworking-plugin-dnsname'],
      ['dnsmasq-base'],
    ]);
    expect(runner.commands.slice(0, 3)).toEqual([
      'podman info',
      "podman network rm 'app_default'",
      "podman network create 'app_default'",
    ]);
    expect(dnsnameEntries(await readFile(conflist, 'utf8'))).toHaveLength(1);
  });

  it('falls back to the alternative dnsname package only when the first is unavailable', async () => {
    const runner = new RecordingRunner({ outputs: { 'podman info': 'networkBackend: cni' } });
    const installer = new RecordingInstaller('debian', [
      'golang-github-containernetworking-plugin-dnsname',
    ]);
    const fixer = new NetworkFixer({
      runner,
      installer,
      logger: silentLogger,
      cniConfigDir: dir,
      dnsnameCandidates: [join(dir, 'dnsname')],
    });

    await expect(fixer.ensureDns()).resolves.toBe('cni');

    expect(installer.installs).toEqual([
      ['containernetworking-plugins'],
      ['golang-github-containernetworking-plugin-dnsname'],
      ['cni-plugin-dnsname'],
      ['dnsmasq-base'],
    ]);
  });

  it('carries on when neither dnsname package installs', async () => {
    const runner = new RecordingRunner({ outputs: { 'podman info': 'networkBackend: cni' } });
    const installer = new RecordingInstaller('debian', [
      'golang-github-containernetworking-plugin-dnsname',
      'cni-plugin-dnsname',
    ]);
    const fixer = new NetworkFixer({
      runner,
      installer,
      logger: silentLogger,
      cniConfigDir: dir,
      dnsnameCandidates: [join(dir, 'dnsname')],
    });

    await expect(fixer.ensureDns()).resolves.toBe('cni');

    expect(installer.installs.at(-1)).toEqual(['dnsmasq-base']);
    expect(runner.commands).toContain("podman network create 'app_default'");
  });

  it('installs aardvark-dns and recreates the network on netavark', async () => {
    const runner = new RecordingRunner({ outputs: { 'podman info': 'networkBackend: netavark' } });
    const installer = new RecordingInstaller('rhel');

    await expect(
      new NetworkFixer({ runner, installer, logger: silentLogger, cniConfigDir: dir }).ensureDns(),
    ).resolves.toBe('netavark');

    expect(installer.installs).toEqual([['netavark', 'aardvark-dns']]);
    expect(runner.commands).toEqual([
      'podman info',
      "podman network rm 'app_default'",
      "podman network create 'app_default'",
    ]);
  });
});
