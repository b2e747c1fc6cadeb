import { access, mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';

import { ComposeFetchError, describeError } from '../core/errors.js';

export type FetchLike = (url: string) => Promise<Pick<Response, 'ok' | 'status' | 'statusText' | 'text'>>;

export const fileExists = async (path: string): Promise<boolean> => {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
};

/**
 * Downloads the compose descriptor unless the file already exists. An
 * existing file is never overwritten. Returns true when a download happened.
 */
export const ensureComposeFile = async (
  path: string,
  url: string,
  fetchImpl: FetchLike = fetch,
): Promise<boolean> => {
  if (await fileExists(path)) {
    return false;
  }

  let body: string;
  try {
    const response = await fetchImpl(url);
    if (!response.ok) {
      throw new ComposeFetchError(url, `HTTP ${response.status} ${response.statusText}`.trim());
    }
    body = await response.text();
  } catch (error) {
    if (error instanceof ComposeFetchError) {
      throw error;
    }
    throw new ComposeFetchError(url, describeError(error));
  }

  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, body, 'utf8');
  return true;
};
