import { randomBytes } from 'crypto';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';

import type { EnvKey } from '@valhalla/shared';

import {
  assertEnvKey,
  parseEnvRecord,
  readEnvValue,
  upsertEnvValue,
  type ParsedEnvEntry,
} from './env-record.js';

export type StoreKey = EnvKey | (string & {});

export interface KeyValueStore {
  get(key: StoreKey): Promise<string | undefined>;
  set(key: StoreKey, value: string): Promise<void>;
  entries(): Promise<ParsedEnvEntry[]>;
}

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * The environment file on disk. Nothing is cached: every call re-reads the
 * file, so edits made between calls are picked up. Concurrent writers are not
 * coordinated; the last rename wins.
 */
export class EnvFileStore implements KeyValueStore {
  constructor(readonly path: string) {}

  private async read(): Promise<string> {
    try {
      return await readFile(this.path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return '';
      }
      throw error;
    }
  }

  async get(key: StoreKey): Promise<string | undefined> {
    return readEnvValue(await this.read(), assertEnvKey(key));
  }

  async set(key: StoreKey, value: string): Promise<void> {
    const next = upsertEnvValue(await this.read(), key, value);
    const tmpPath = `${this.path}.${randomBytes(4).toString('hex')}.tmp`;

    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(tmpPath, next, 'utf8');
    await rename(tmpPath, this.path);
  }

  async entries(): Promise<ParsedEnvEntry[]> {
    return parseEnvRecord(await this.read());
  }

}

export class MemoryEnvStore implements KeyValueStore {
  constructor(private text = '') {}

  async get(key: StoreKey): Promise<string | undefined> {
    return readEnvValue(this.text, assertEnvKey(key));
  }

  async set(key: StoreKey, value: string): Promise<void> {
    this.text = upsertEnvValue(this.text, key, value);
  }

  async entries(): Promise<ParsedEnvEntry[]> {
    return parseEnvRecord(this.text);
  }

  toString(): string {
    return this.text;
  }
}

/**
 * Writes each default whose key is missing or blank. Returns the keys written.
 */
export const applyDefaults = async (
  store: KeyValueStore,
  defaults: Readonly<Partial<Record<string, string>>>,
): Promise<string[]> => {
  const written: string[] = [];

  for (const [key, value] of Object.entries(defaults)) {
    if (value === undefined) {
      continue;
    }
    const current = await store.get(key);
    if (!current) {
      await store.set(key, value);
      written.push(key);
    }
  }

  return written;
};
