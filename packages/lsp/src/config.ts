import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import {
  DebugLogger,
  getErrorMessage,
  getGlobalQuireDir,
  getProjectQuireDir,
} from '@quire/core';
import stripJsonComments from 'strip-json-comments';
import { z } from 'zod';

import { LspConfigError } from './errors.js';
import {
  getBuiltinServers,
  mergeUserConfig,
  ServerEntrySchema,
  type ServerEntry,
} from './service/server-registry.js';

const logger = new DebugLogger('quire:lsp:config');

export const LSP_CONFIG_FILENAME = 'lsp.json';

const LspConfigFileSchema = z
  .object({
    servers: z.array(ServerEntrySchema),
    disabledServers: z.array(z.string()),
    includeDefaults: z.boolean(),
    readyPollAttempts: z.number().int().min(0),
    readyPollIntervalMs: z.number().int().min(0),
    shutdownDelayMs: z.number().int().min(0),
    clientName: z.string().min(1),
  })
  .partial()
  .strict();

export type LspConfigFile = z.infer<typeof LspConfigFileSchema>;

export interface LspConfig {
  /** Resolved candidates, built-ins first unless turned off. */
  servers: ServerEntry[];
  disabledServers: string[];
  includeDefaults: boolean;
  readyPollAttempts: number;
  readyPollIntervalMs: number;
  shutdownDelayMs: number;
  clientName: string;
}

export const defaultLspConfig: Readonly<Omit<LspConfig, 'servers'>> = {
  disabledServers: [],
  includeDefaults: true,
  readyPollAttempts: 50,
  readyPollIntervalMs: 100,
  shutdownDelayMs: 100,
  clientName: 'quire',
};

export interface LoadLspConfigOptions {
  workspaceRoot: string;
  homeDir?: string;
}

export function getLspConfigPaths(options: LoadLspConfigOptions): {
  user: string;
  project: string;
} {
  return {
    user: path.join(getGlobalQuireDir(options.homeDir), LSP_CONFIG_FILENAME),
    project: path.join(
      getProjectQuireDir(options.workspaceRoot),
      LSP_CONFIG_FILENAME,
    ),
  };
}

/** Reads and validates one config file. A missing file yields `undefined`. */
export function readLspConfigFile(filePath: string): LspConfigFile | undefined {
  if (!fs.existsSync(filePath)) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(stripJsonComments(fs.readFileSync(filePath, 'utf-8')));
  } catch (error: unknown) {
    throw new LspConfigError(filePath, getErrorMessage(error));
  }

  const result = LspConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    throw new LspConfigError(filePath, `${where}: ${issue.message}`);
  }
  return result.data;
}

/**
 * Loads `~/.quire/lsp.json` and then `<workspace>/.quire/lsp.json`, the
 * project file winning. Server entries from both files are overlaid on the
 * built-in table in that order.
 */
export function loadLspConfig(options: LoadLspConfigOptions): LspConfig {
  const homeDir = options.homeDir ?? os.homedir();
  const paths = getLspConfigPaths({ ...options, homeDir });
  const layers = [paths.user, paths.project]
    .map((filePath) => {
      const layer = readLspConfigFile(filePath);
      if (layer) {
        logger.debug(() => `loaded ${filePath}`);
      }
      return layer;
    })
    .filter((layer): layer is LspConfigFile => layer !== undefined);

  let settings: Omit<LspConfig, 'servers'> = { ...defaultLspConfig };
  for (const layer of layers) {
    settings = {
      disabledServers: layer.disabledServers ?? settings.disabledServers,
      includeDefaults: layer.includeDefaults ?? settings.includeDefaults,
      readyPollAttempts: layer.readyPollAttempts ?? settings.readyPollAttempts,
      readyPollIntervalMs:
        layer.readyPollIntervalMs ?? settings.readyPollIntervalMs,
      shutdownDelayMs: layer.shutdownDelayMs ?? settings.shutdownDelayMs,
      clientName: layer.clientName ?? settings.clientName,
    };
  }

  let servers: ServerEntry[] = settings.includeDefaults
    ? getBuiltinServers()
    : [];
  for (const layer of layers) {
    servers = mergeUserConfig(servers, layer.servers);
  }

  const disabled = new Set(settings.disabledServers);
  return {
    ...settings,
    disabledServers: [...settings.disabledServers],
    servers: servers.filter((entry) => !disabled.has(entry.name)),
  };
}
