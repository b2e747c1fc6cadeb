import { describe, expect, it } from 'vitest';

import { ValidationError } from '../src/core/errors.js';
import { ADMIN_IDS_HINT, isValidAdminIds } from '../src/provisioning/admin-ids.js';
import { CredentialProvisioner } from '../src/provisioning/credential-provisioner.js';
import { MemoryEnvStore } from '../src/store/key-value-store.js';
import { ScriptedPrompter, silentLogger } from './helpers/fakes.js';

const setup = (answers: string[], record = '', maxAdminIdAttempts?: number) => {
  const store = new MemoryEnvStore(record);
  const prompter = new ScriptedPrompter(answers);
  const provisioner = new CredentialProvisioner({
    store,
    prompter,
    logger: silentLogger,
    maxAdminIdAttempts,
  });
  return { store, prompter, provisioner };
};

describe('CredentialProvisioner.askRequired', () => {
  it('asks again until a non-empty answer arrives', async () => {
    const { store, prompter, provisioner } = setup(['', '   ', 'test-token']);

    await expect(provisioner.askRequired('BOT_TOKEN', 'What is your Telegram bot token')).resolves.toBe(
      'test-token',
    );
    expect(prompter.asked).toEqual([
      'What is your Telegram bot token',
      'What is your Telegram bot token',
      'What is your Telegram bot token',
    ]);
    expect(prompter.said).toEqual(['This value is required.', 'This value is required.']);
    expect(await store.get('BOT_TOKEN')).toBe('test-token');
  });

  it('offers the stored value as the default and keeps it on empty input', async () => {
    const { store, prompter, provisioner } = setup([''], 'FLASK_PORT=5000\n');

    await expect(provisioner.askRequired('FLASK_PORT', 'Which port')).resolves.toBe('5000');
    expect(prompter.asked).toEqual(['Which port [5000]']);
    expect(store.toString()).toBe('FLASK_PORT=5000\n');
  });
});

describe('CredentialProvisioner.askGenerated', () => {
  it('generates a 24 character alphanumeric password on blank input', async () => {
    const { store, prompter, provisioner } = setup(['']);

    const value = await provisioner.askGenerated('MYSQL_PASSWORD', 'MySQL app password', 'password');

    expect(value).toMatch(/^[A-Za-z0-9]{24}$/);
    expect(await store.get('MYSQL_PASSWORD')).toBe(value);
    expect(prompter.asked).toEqual(['MySQL app password (blank = random)']);
    expect(prompter.said).toEqual([`→ generated: ${value}`]);
  });

  it('generates a prefixed username', async () => {
    const { provisioner } = setup(['']);

    await expect(provisioner.askGenerated('MYSQL_USER', 'MySQL app username', 'user')).resolves.toMatch(
      /^user_[a-z0-9]{10}$/,
    );
  });

  it('reuses the stored value before generating a new one', async () => {
    const { prompter, provisioner } = setup([''], 'MYSQL_USER=alice\n');

    await expect(provisioner.askGenerated('MYSQL_USER', 'MySQL app username', 'user')).resolves.toBe('alice');
    expect(prompter.asked).toEqual(['MySQL app username [alice] (blank = random)']);
    expect(prompter.said).toEqual([]);
  });

  it('stores an explicit answer', async () => {
    const { store, provisioner } = setup(['s3cret-placeholder']);

    await provisioner.askGenerated('MYSQL_ROOT_PASSWORD', 'MySQL ROOT password', 'password');

    expect(await store.get('MYSQL_ROOT_PASSWORD')).toBe('s3cret-placeholder');
  });
});

describe('admin id validation', () => {
  it('accepts comma-separated digits once whitespace is stripped', () => {
    expect(isValidAdminIds('123,456')).toBe(true);
    expect(isValidAdminIds(' 7 ')).toBe(true);
    expect(isValidAdminIds('1, 2 ,3')).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isValidAdminIds('')).toBe(false);
    expect(isValidAdminIds('123;456')).toBe(false);
    expect(isValidAdminIds('12a')).toBe(false);
    expect(isValidAdminIds(',1')).toBe(false);
    expect(isValidAdminIds('1,,2')).toBe(false);
  });

  it('re-prompts after an invalid list and stores the normalized value', async () => {
    const { store, prompter, provisioner } = setup(['12a,3', ' 123, 456 ']);

    await expect(provisioner.askAdminIds()).resolves.toBe('123,456');
    expect(prompter.said).toEqual([ADMIN_IDS_HINT]);
    expect(prompter.asked).toEqual([
      'What are your Telegram admin IDs (comma-separated)',
      'What are your Telegram admin IDs (comma-separated)',
    ]);
    expect(await store.get('ADMIN_IDS')).toBe('123,456');
  });

  it('gives up with a ValidationError once the attempt cap is reached', async () => {
    const { prompter, provisioner } = setup(['x', 'y', 'z'], '', 3);

    await expect(provisioner.askAdminIds()).rejects.toBeInstanceOf(ValidationError);
    expect(prompter.said).toEqual([ADMIN_IDS_HINT, ADMIN_IDS_HINT, ADMIN_IDS_HINT]);
  });
});
