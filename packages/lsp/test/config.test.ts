import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  defaultLspConfig,
  getLspConfigPaths,
  loadLspConfig,
  readLspConfigFile,
} from '../src/config.js';
import { LspConfigError } from '../src/errors.js';
import { getBuiltinServers } from '../src/service/server-registry.js';

describe('lsp config', () => {
  let root: string;
  let homeDir: string;
  let workspaceRoot: string;

  const writeConfig = (dir: string, contents: string): string => {
    const file = path.join(dir, '.quire', 'lsp.json');
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, contents);
    return file;
  };

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'quire-lsp-config-'));
    homeDir = path.join(root, 'home');
    workspaceRoot = path.join(root, 'project');
    fs.mkdirSync(homeDir);
    fs.mkdirSync(workspaceRoot);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('locates the user and project files', () => {
    expect(getLspConfigPaths({ workspaceRoot, homeDir })).toEqual({
      user: path.join(homeDir, '.quire', 'lsp.json'),
      project: path.join(workspaceRoot, '.quire', 'lsp.json'),
    });
  });

  it('uses the defaults and the built-in servers without config files', () => {
    const config = loadLspConfig({ workspaceRoot, homeDir });
    expect(config).toEqual({ ...defaultLspConfig, servers: getBuiltinServers() });
  });

  it('returns undefined for a missing file', () => {
    expect(readLspConfigFile(path.join(root, 'absent.json'))).toBeUndefined();
  });

  it('accepts comments', () => {
    const file = writeConfig(
      workspaceRoot,
      '{\n  // wait longer for slow servers\n  "readyPollAttempts": 80\n}',
    );
    expect(readLspConfigFile(file)).toEqual({ readyPollAttempts: 80 });
  });

  it('lets the project file override the user file', () => {
    writeConfig(homeDir, JSON.stringify({ readyPollAttempts: 10, shutdownDelayMs: 5 }));
    writeConfig(workspaceRoot, JSON.stringify({ readyPollAttempts: 20 }));

    const config = loadLspConfig({ workspaceRoot, homeDir });
    expect(config.readyPollAttempts).toBe(20);
    expect(config.shutdownDelayMs).toBe(5);
    expect(config.readyPollIntervalMs).toBe(100);
  });

  it('overlays server entries from both files on the built-ins', () => {
    writeConfig(
      homeDir,
      JSON.stringify({
        servers: [{ name: 'pylsp', language: 'python', command: ['pylsp'] }],
      }),
    );
    writeConfig(
      workspaceRoot,
      JSON.stringify({
        servers: [{ name: 'pyright', language: 'python', command: [] }],
      }),
    );

    const python = loadLspConfig({ workspaceRoot, homeDir }).servers.filter(
      (server) => server.language === 'python',
    );
    expect(python.map((server) => server.name)).toEqual(['ruff', 'pylsp']);
  });

  it('drops the built-ins when asked to', () => {
    writeConfig(
      workspaceRoot,
      JSON.stringify({
        includeDefaults: false,
        servers: [{ name: 'zls', language: 'zig', command: ['zls'] }],
      }),
    );
    expect(loadLspConfig({ workspaceRoot, homeDir }).servers).toEqual([
      { name: 'zls', language: 'zig', command: ['zls'], capabilities: undefined },
    ]);
  });

  it('filters out disabled servers by name', () => {
    writeConfig(homeDir, JSON.stringify({ disabledServers: ['pyright'] }));
    const config = loadLspConfig({ workspaceRoot, homeDir });
    expect(config.servers.some((server) => server.name === 'pyright')).toBe(false);
    expect(config.servers.some((server) => server.name === 'ruff')).toBe(true);
  });

  it('reports malformed JSON with the file name', () => {
    const file = writeConfig(workspaceRoot, '{ "servers": ');
    expect(() => loadLspConfig({ workspaceRoot, homeDir })).toThrow(LspConfigError);
    expect(() => readLspConfigFile(file)).toThrow(
      `Invalid language server config in ${file}`,
    );
  });

  it('reports the path of an invalid value', () => {
    const file = writeConfig(
      workspaceRoot,
      JSON.stringify({ servers: [{ name: 'x', language: 'go', command: 'gopls' }] }),
    );
    expect(() => readLspConfigFile(file)).toThrow(
      `Invalid language server config in ${file}: servers.0.command: Expected array, received string`,
    );
  });

  it('rejects unknown keys', () => {
    const file = writeConfig(workspaceRoot, JSON.stringify({ timeout: 5 }));
    expect(() => readLspConfigFile(file)).toThrow(/\(root\): Unrecognized key/);
  });
});
