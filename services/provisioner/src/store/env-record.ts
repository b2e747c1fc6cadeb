import { EnvRecordError } from '../core/errors.js';

const ENV_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface ParsedEnvEntry {
  key: string;
  value: string;
}

export const assertEnvKey = (key: string): string => {
  if (!ENV_KEY_PATTERN.test(key)) {
    throw new EnvRecordError(`Invalid environment key "${key}".`, { key });
  }
  return key;
};

export const assertEnvValue = (key: string, value: string): string => {
  if (/[\r\n]/.test(value)) {
    throw new EnvRecordError(`Value for ${key} must fit on a single line.`, { key });
  }
  return value;
};

interface RecordLine {
  text: string;
  eol: string;
}

const BOM = '\uFEFF';

const splitLines = (source: string): RecordLine[] => {
  const body = source.startsWith(BOM) ? source.slice(BOM.length) : source;
  const segments = body.split('\n');
  const last = segments.pop() ?? '';
  const lines = segments.map((segment) =>
    segment.endsWith('\r')
      ? { text: segment.slice(0, -1), eol: '\r\n' }
      : { text: segment, eol: '\n' },
  );
  if (last) {
    lines.push({ text: last, eol: '' });
  }
  return lines;
};

const entryOf = (line: string): ParsedEnvEntry | null => {
  if (!line.trim() || line.trimStart().startsWith('#')) {
    return null;
  }

  const separator = line.indexOf('=');
  if (separator <= 0) {
    return null;
  }

  const key = line.slice(0, separator);
  if (!ENV_KEY_PATTERN.test(key)) {
    return null;
  }

  return { key, value: line.slice(separator + 1) };
};

/**
 * Entries in first-definition order. Later duplicates of a key are ignored,
 * as are blank lines, comments and anything that is not `KEY=VALUE`.
 */
export const parseEnvRecord = (source: string): ParsedEnvEntry[] => {
  const seen = new Set<string>();
  const entries: ParsedEnvEntry[] = [];

  for (const { text } of splitLines(source)) {
    const entry = entryOf(text);
    if (!entry || seen.has(entry.key)) {
      continue;
    }
    seen.add(entry.key);
    entries.push(entry);
  }

  return entries;
};

export const readEnvValue = (source: string, key: string): string | undefined =>
  parseEnvRecord(source).find((entry) => entry.key === key)?.value;

/**
 * Replaces the value of the first `key=` line in place, or appends a new line.
 * Every other line keeps its text and line ending; written lines use the
 * record's first line ending, and the result always ends with one.
 */
export const upsertEnvValue = (source: string, key: string, value: string): string => {
  assertEnvKey(key);
  assertEnvValue(key, value);

  const bom = source.startsWith(BOM) ? BOM : '';
  const lines = splitLines(source);
  const newline = lines.find((line) => line.eol)?.eol ?? '\n';
  const rendered = `${key}=${value}`;
  const existing = lines.find((line) => entryOf(line.text)?.key === key);

  const tail = lines[lines.length - 1];
  if (tail && !tail.eol) {
    tail.eol = newline;
  }

  if (existing) {
    existing.text = rendered;
  } else {
    lines.push({ text: rendered, eol: newline });
  }

  return bom + lines.map((line) => line.text + line.eol).join('');
};
