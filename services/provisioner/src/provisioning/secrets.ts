import { randomInt } from 'crypto';

const ALPHANUMERIC = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
const LOWER_ALPHANUMERIC = 'abcdefghijklmnopqrstuvwxyz0123456789';

export const PASSWORD_LENGTH = 24;
export const USERNAME_PREFIX = 'user_';
export const USERNAME_SUFFIX_LENGTH = 10;

export type GeneratedKind = 'user' | 'password';

const randomString = (alphabet: string, length: number): string => {
  let out = '';
  for (let i = 0; i < length; i += 1) {
    out += alphabet.charAt(randomInt(alphabet.length));
  }
  return out;
};

export const generatePassword = (length = PASSWORD_LENGTH): string =>
  randomString(ALPHANUMERIC, length);

export const generateUsername = (): string =>
  `${USERNAME_PREFIX}${randomString(LOWER_ALPHANUMERIC, USERNAME_SUFFIX_LENGTH)}`;

export const generateValue = (kind: GeneratedKind): string =>
  kind === 'user' ? generateUsername() : generatePassword();
