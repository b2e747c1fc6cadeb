import { copyFile, readFile, writeFile } from 'fs/promises';

import { z } from 'zod';

export const DNSNAME_PLUGIN = {
  type: 'dnsname',
  domainName: 'dns.podman',
  capabilities: { aliases: true },
} as const;

const conflistSchema = z
  .object({
    plugins: z.array(z.object({ type: z.string() }).passthrough()).default([]),
  })
  .passthrough();

export type Conflist = z.infer<typeof conflistSchema>;

export const parseConflist = (raw: string): Conflist => conflistSchema.parse(JSON.parse(raw));

export const hasDnsnameEntry = (conflist: Conflist): boolean =>
  conflist.plugins.some((plugin) => plugin.type === DNSNAME_PLUGIN.type);

/** Appends the dnsname plugin unless one is already listed. */
export const addDnsnamePlugin = (conflist: Conflist): { conflist: Conflist; changed: boolean } => {
  if (hasDnsnameEntry(conflist)) {
    return { conflist, changed: false };
  }
  return {
    conflist: {
      ...conflist,
      plugins: [...conflist.plugins, { ...DNSNAME_PLUGIN, capabilities: { ...DNSNAME_PLUGIN.capabilities } }],
    },
    changed: true,
  };
};

/**
 * Patches a conflist file in place, keeping the previous content at
 * `<path>.bak`. Returns false when the entry was already present; the file
 * and any existing backup are left alone in that case.
 */
export const patchConflistFile = async (path: string): Promise<boolean> => {
  const { conflist, changed } = addDnsnamePlugin(parseConflist(await readFile(path, 'utf8')));
  if (!changed) {
    return false;
  }

  await copyFile(path, `${path}.bak`);
  await writeFile(path, `${JSON.stringify(conflist, null, 2)}\n`, 'utf8');
  return true;
};
