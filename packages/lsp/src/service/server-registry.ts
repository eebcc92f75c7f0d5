import { z } from 'zod';

import {
  CAPABILITY_NAMES,
  createCapabilities,
  type ServerConfig,
} from '../types.js';
import builtinServerData from './builtin-servers.json' with { type: 'json' };

/**
 * A server entry as written in `builtin-servers.json` or an `lsp.json`
 * config file. `capabilities` lists the features the server may serve;
 * leaving it out allows all of them.
 */
export const ServerEntrySchema = z.object({
  name: z.string().min(1),
  language: z.string().min(1),
  command: z.array(z.string()),
  capabilities: z.array(z.enum(CAPABILITY_NAMES)).optional(),
});

export type ServerEntry = z.infer<typeof ServerEntrySchema>;

const BuiltinServersSchema = z.object({
  servers: z.array(ServerEntrySchema),
});

const BUILTIN_SERVERS: readonly ServerEntry[] =
  BuiltinServersSchema.parse(builtinServerData).servers;

const entryKey = (entry: { language: string; name: string }): string =>
  `${entry.language}\u0000${entry.name}`;

export const toServerConfig = (entry: ServerEntry): ServerConfig => ({
  name: entry.name,
  language: entry.language,
  command: [...entry.command],
  capabilities: createCapabilities(entry.capabilities ?? true),
});

const cloneEntry = (entry: ServerEntry): ServerEntry => ({
  ...entry,
  command: [...entry.command],
  capabilities: entry.capabilities ? [...entry.capabilities] : undefined,
});

export const getBuiltinServers = (): ServerEntry[] =>
  BUILTIN_SERVERS.map(cloneEntry);

/**
 * Overlays user entries on `builtins`. An entry with the same language and
 * name replaces the built-in in place, an empty `command` removes it, and
 * anything else is appended.
 */
export const mergeUserConfig = (
  builtins: readonly ServerEntry[],
  userConfig?: readonly ServerEntry[],
): ServerEntry[] => {
  if (!userConfig || userConfig.length === 0) {
    return builtins.map(cloneEntry);
  }

  const merged = new Map<string, ServerEntry>();
  for (const builtin of builtins) {
    merged.set(entryKey(builtin), cloneEntry(builtin));
  }

  for (const userEntry of userConfig) {
    const key = entryKey(userEntry);
    if (userEntry.command.length === 0) {
      merged.delete(key);
      continue;
    }

    merged.set(key, cloneEntry(userEntry));
  }

  return [...merged.values()];
};

/** Entries for `language`, in registration order. */
export const getServersForLanguage = (
  language: string,
  entries: readonly ServerEntry[] = BUILTIN_SERVERS,
): ServerEntry[] =>
  entries.filter((entry) => entry.language === language).map(cloneEntry);

export const describeCapabilities = (entry: ServerEntry): string =>
  entry.capabilities === undefined ||
  entry.capabilities.length === CAPABILITY_NAMES.length
    ? 'all'
    : entry.capabilities.join(', ');
