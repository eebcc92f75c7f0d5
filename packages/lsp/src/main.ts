#!/usr/bin/env node
import * as fs from 'node:fs';
import * as path from 'node:path';
import { stderr } from 'node:process';
import { setTimeout as delay } from 'node:timers/promises';
import { pathToFileURL } from 'node:url';

import { DebugLogger, getErrorMessage } from '@quire/core';
import yargs, { type Argv, type CommandModule } from 'yargs';
import { hideBin } from 'yargs/helpers';

import { loadLspConfig, type LspConfig } from './config.js';
import { formatFileDiagnostics } from './service/diagnostics.js';
import { detectLanguage } from './service/language-map.js';
import { LspClient } from './service/lsp-client.js';
import { describeCapabilities } from './service/server-registry.js';

const logger = new DebugLogger('quire:lsp:cli');

const PUMP_INTERVAL_MS = 50;

/** One line per candidate, grouped by language in priority order. */
export function handleServers(config: LspConfig, language?: string): string {
  const entries = config.servers.filter(
    (entry) => language === undefined || entry.language === language,
  );
  if (entries.length === 0) {
    return language === undefined
      ? 'No language servers configured.'
      : `No language servers configured for '${language}'.`;
  }

  const byLanguage = new Map<string, string[]>();
  for (const entry of entries) {
    const line = `  ${entry.name}: ${entry.command.join(' ')} [${describeCapabilities(entry)}]`;
    const lines = byLanguage.get(entry.language);
    if (lines) {
      lines.push(line);
    } else {
      byLanguage.set(entry.language, [line]);
    }
  }

  return [...byLanguage.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, lines]) => [`${name}:`, ...lines].join('\n'))
    .join('\n');
}

export interface CheckOptions {
  client: LspClient;
  workspaceRoot: string;
  files: readonly string[];
  waitMs: number;
  readFile?: (filePath: string) => string;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Opens each file, pumps server traffic for `waitMs`, and reports the
 * diagnostics that arrived. Files that cannot be served get a one-line
 * explanation instead.
 */
export async function handleCheck(options: CheckOptions): Promise<string> {
  const readFile =
    options.readFile ?? ((filePath) => fs.readFileSync(filePath, 'utf-8'));
  const sleep = options.sleep ?? ((ms) => delay(ms));
  const notes = new Map<string, string>();
  const opened: string[] = [];

  for (const file of options.files) {
    const absolute = path.resolve(options.workspaceRoot, file);
    if (detectLanguage(absolute) === undefined) {
      notes.set(file, `${file}: unsupported file type`);
      continue;
    }
    try {
      options.client.openDocument(absolute, readFile(absolute));
      opened.push(file);
    } catch (error) {
      notes.set(file, `${file}: ${getErrorMessage(error)}`);
    }
  }

  if (opened.length > 0) {
    for (let waited = 0; waited < options.waitMs; waited += PUMP_INTERVAL_MS) {
      options.client.processMessages();
      await sleep(PUMP_INTERVAL_MS);
    }
    options.client.processMessages();
  }

  return options.files
    .map(
      (file) =>
        notes.get(file) ??
        formatFileDiagnostics(
          file,
          options.client.getDiagnostics(
            path.resolve(options.workspaceRoot, file),
          ),
        ),
    )
    .join('\n');
}

const DEFAULT_WAIT_MS = 3000;

const stringList = (value: unknown): string[] =>
  Array.isArray(value)
    ? value.filter((item): item is string => typeof item === 'string')
    : [];

export const serversCommand: CommandModule = {
  command: 'servers [language]',
  describe: 'Lists the configured language servers.',
  builder: (argv) =>
    argv.positional('language', {
      type: 'string',
      describe: 'Only list servers for this language id',
    }),
  handler: (argv) => {
    const language =
      typeof argv['language'] === 'string' ? argv['language'] : undefined;
    const config = loadLspConfig({ workspaceRoot: process.cwd() });
    console.log(handleServers(config, language));
  },
};

export const checkCommand: CommandModule = {
  command: 'check <files..>',
  describe: 'Opens files and prints the diagnostics their servers publish.',
  builder: (argv) =>
    argv
      .positional('files', {
        type: 'string',
        array: true,
        describe: 'Files to check, relative to the current directory',
      })
      .option('wait-ms', {
        type: 'number',
        default: DEFAULT_WAIT_MS,
        describe: 'How long to wait for diagnostics',
      }),
  handler: async (argv) => {
    const workspaceRoot = process.cwd();
    const client = new LspClient({ workspaceRoot });
    const shutdown = installExitHooks(client);
    try {
      console.log(
        await handleCheck({
          client,
          workspaceRoot,
          files: stringList(argv['files']),
          waitMs:
            typeof argv['wait-ms'] === 'number'
              ? argv['wait-ms']
              : DEFAULT_WAIT_MS,
        }),
      );
    } finally {
      await shutdown();
    }
  },
};

/**
 * Stops every server on SIGINT, SIGTERM or an uncaught exception, and
 * force-kills whatever is left when the process exits. Returns the
 * shutdown routine for the normal exit path.
 */
export function installExitHooks(client: LspClient): () => Promise<void> {
  let stopping: Promise<void> | undefined;
  const shutdown = (): Promise<void> => {
    stopping ??= client.shutdown().catch((error: unknown) => {
      logger.error(() => `shutdown failed: ${getErrorMessage(error)}`);
    });
    return stopping;
  };

  const exitAfterShutdown = (code: number) => {
    void shutdown().then(() => process.exit(code));
  };

  process.once('SIGINT', () => exitAfterShutdown(130));
  process.once('SIGTERM', () => exitAfterShutdown(143));
  process.once('uncaughtException', (error) => {
    stderr.write(`Uncaught exception in quire-lsp: ${String(error)}\n`);
    exitAfterShutdown(1);
  });
  process.once('exit', () => client.manager.killAll());

  return shutdown;
}

export function createCli(argv: string[]): Argv {
  return yargs(argv)
    .scriptName('quire-lsp')
    .command(serversCommand)
    .command(checkCommand)
    .demandCommand(1)
    .strict()
    .help();
}

export async function main(argv: string[] = hideBin(process.argv)): Promise<void> {
  await createCli(argv).parseAsync();
}

const isMainModule = (): boolean => {
  const argvEntry = process.argv[1];
  if (!argvEntry || !import.meta.url.startsWith('file://')) {
    return false;
  }

  try {
    return import.meta.url === pathToFileURL(fs.realpathSync(argvEntry)).href;
  } catch (error) {
    logger.debug(() => `entry check failed: ${getErrorMessage(error)}`);
    return false;
  }
};

if (isMainModule()) {
  main().catch((error: unknown) => {
    stderr.write(`quire-lsp: ${getErrorMessage(error)}\n`);
    process.exit(1);
  });
}
