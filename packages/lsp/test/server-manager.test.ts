import { describe, expect, it, vi } from 'vitest';

import { NoServerAvailableError, WriteFailedError } from '../src/errors.js';
import { didOpenNotification, hoverRequest } from '../src/protocol/requests.js';
import type { ResponseResult } from '../src/service/message-router.js';
import {
  ServerManager,
  type ServerManagerOptions,
} from '../src/service/server-manager.js';
import { createCapabilities, type ServerConfig } from '../src/types.js';
import {
  createFakeSpawner,
  type FakeLanguageServer,
  type FakeServerOptions,
} from './fixtures/fake-lsp-server.js';

const tick = (): Promise<void> =>
  new Promise((resolve) => {
    setImmediate(resolve);
  });

const serverConfig = (
  name: string,
  language: string,
  command: string[],
): ServerConfig => ({
  name,
  language,
  command,
  capabilities: createCapabilities(true),
});

const PYRIGHT = serverConfig('pyright', 'python', ['pyright-langserver', '--stdio']);
const RUFF = serverConfig('ruff', 'python', ['ruff', 'server']);
const GOPLS = serverConfig('gopls', 'go', ['gopls']);

const URI = 'file:///w/main.py';
const position = { line: 0, character: 0 };

function setup(
  spawnerConfig: Parameters<typeof createFakeSpawner>[0] = {},
  options: Partial<ServerManagerOptions> = {},
): { manager: ServerManager; spawner: ReturnType<typeof createFakeSpawner> } {
  const spawner = createFakeSpawner(spawnerConfig);
  const manager = new ServerManager({
    workspaceRoot: '/w',
    spawnProcess: spawner.spawn,
    sleep: tick,
    shutdownDelayMs: 0,
    ...options,
  });
  manager.registerConfigs([PYRIGHT, RUFF, GOPLS]);
  return { manager, spawner };
}

const only = (servers: FakeLanguageServer[]): FakeLanguageServer => {
  const [server] = servers;
  if (!server || servers.length !== 1) {
    throw new Error(`expected one fake server, got ${String(servers.length)}`);
  }
  return server;
};

async function startReady(
  manager: ServerManager,
  language: string,
): Promise<void> {
  manager.startServer(language);
  await vi.waitFor(() => {
    manager.processMessages();
    expect(manager.hasServer(language)).toBe(true);
  });
}

describe('ServerManager registration', () => {
  it('keeps candidates in registration order', () => {
    const { manager } = setup();
    expect(manager.configsFor('python').map((config) => config.name)).toEqual([
      'pyright',
      'ruff',
    ]);
    expect(manager.languages()).toEqual(['go', 'python']);
    expect(manager.configsFor('cobol')).toEqual([]);
  });

  it('freezes registered configs', () => {
    const { manager } = setup();
    const [config] = manager.configsFor('go');
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config?.command)).toBe(true);
  });

  it('registers the built-in table', () => {
    const manager = new ServerManager({ workspaceRoot: '/w' });
    manager.registerDefaults();
    expect(manager.configsFor('rust').map((config) => config.name)).toEqual([
      'rust-analyzer',
    ]);
  });
});

describe('ServerManager startup', () => {
  it('falls back to the next candidate when one cannot start', () => {
    const { manager, spawner } = setup({ missing: ['pyright-langserver'] });
    manager.startServer('python');

    expect(spawner.calls.map((call) => call.program)).toEqual([
      'pyright-langserver',
      'ruff',
    ]);
    expect(spawner.calls[1]).toEqual({ program: 'ruff', args: ['server'], cwd: '/w' });
    expect(manager.serversFor('python').map((server) => server.config.name)).toEqual([
      'ruff',
    ]);
  });

  it('lists every failed candidate when none start', () => {
    const { manager } = setup({ missing: ['pyright-langserver', 'ruff'] });
    expect(() => manager.startServer('python')).toThrow(
      "No language server available for 'python' (pyright: Failed to start 'pyright-langserver': no process id assigned; ruff: Failed to start 'ruff': no process id assigned)",
    );
  });

  it('fails for a language without candidates', () => {
    const { manager } = setup();
    expect(() => manager.startServer('cobol')).toThrow(NoServerAvailableError);
    expect(() => manager.startServer('cobol')).toThrow(
      "No language server available for 'cobol' (no servers configured)",
    );
  });

  it('does not start a candidate twice', () => {
    const { manager, spawner } = setup();
    manager.startServer('go');
    manager.startServer('go');
    expect(spawner.calls).toHaveLength(1);
  });

  it('starts every candidate on request', () => {
    const { manager } = setup();
    manager.startAllServers('python');
    expect(manager.serversFor('python').map((server) => server.config.name)).toEqual([
      'pyright',
      'ruff',
    ]);
  });

  it('writes initialize right away and reports the server as initializing', async () => {
    const { manager, spawner } = setup();
    manager.startServer('go');
    const fake = only(spawner.serversFor('gopls'));

    expect(manager.serverStatus()).toEqual([
      { language: 'go', name: 'gopls', state: 'initializing', pid: fake.pid },
    ]);
    await vi.waitFor(() => expect(fake.methods()).toEqual(['initialize']));
    expect(fake.messagesFor('initialize')[0]?.params).toMatchObject({
      rootUri: 'file:///w',
      clientInfo: { name: 'quire', version: '0.1.0' },
    });
  });

  it('becomes ready and sends initialized after the initialize response', async () => {
    const { manager, spawner } = setup();
    await startReady(manager, 'go');
    const fake = only(spawner.serversFor('gopls'));
    await vi.waitFor(() =>
      expect(fake.methods()).toEqual(['initialize', 'initialized']),
    );
    expect(manager.serverStatus()[0]?.state).toBe('ready');
  });

  it('stays initializing when initialize fails', async () => {
    const { manager, spawner } = setup({
      optionsFor: () => ({ autoInitialize: false }),
    });
    manager.startServer('go');
    const fake = only(spawner.serversFor('gopls'));
    await vi.waitFor(() => expect(fake.initializeId()).toBeDefined());
    const id = fake.initializeId() ?? 0;
    fake.respondError(id, -32603, 'cannot index');

    await tick();
    await tick();
    manager.processMessages();
    expect(manager.hasServer('go')).toBe(false);
    expect(fake.methods()).toEqual(['initialize']);
  });
});

describe('ServerManager requests', () => {
  it('waits for the handshake before writing a request', async () => {
    const { manager, spawner } = setup({
      optionsFor: (): FakeServerOptions => ({
        handlers: { 'textDocument/hover': () => ({ contents: 'doc' }) },
      }),
    });
    const results: Array<[number | string, ResponseResult]> = [];
    const request = hoverRequest(URI, position);

    await manager.sendRequest('go', request, (id, result) => {
      results.push([id, result]);
    });

    const fake = only(spawner.serversFor('gopls'));
    expect(manager.hasServer('go')).toBe(true);
    await vi.waitFor(() =>
      expect(fake.methods()).toEqual([
        'initialize',
        'initialized',
        'textDocument/hover',
      ]),
    );
    await vi.waitFor(() => {
      manager.processMessages();
      expect(results).toEqual([[request.id, { ok: true, value: { contents: 'doc' } }]]);
    });
  });

  it('sends the request anyway when the server never becomes ready', async () => {
    const { manager, spawner } = setup(
      { optionsFor: () => ({ autoInitialize: false }) },
      { readyPollAttempts: 2 },
    );
    const request = hoverRequest(URI, position);
    await manager.sendRequest('go', request, () => undefined);

    const fake = only(spawner.serversFor('gopls'));
    expect(manager.hasServer('go')).toBe(false);
    await vi.waitFor(() =>
      expect(fake.methods()).toEqual(['initialize', 'textDocument/hover']),
    );
  });

  it('routes responses that arrive out of order and drops unknown ids', async () => {
    const { manager, spawner } = setup({ optionsFor: () => ({ hold: true }) });
    await startReady(manager, 'go');
    const fake = only(spawner.serversFor('gopls'));

    const seen: Array<number | string> = [];
    const first = hoverRequest(URI, position);
    const second = hoverRequest(URI, { line: 4, character: 2 });
    await manager.sendRequest('go', first, (id) => seen.push(id));
    await manager.sendRequest('go', second, (id) => seen.push(id));
    await vi.waitFor(() => expect(fake.held).toHaveLength(2));

    fake.respond(second.id, 'second');
    fake.respond(987_654, 'stray');
    fake.respond(first.id, 'first');

    await vi.waitFor(() => {
      manager.processMessages();
      expect(seen).toEqual([second.id, first.id]);
    });
    expect(manager.serversFor('go')[0]?.router.pendingCount()).toBe(0);
  });

  it('removes the callback when the request cannot be written', async () => {
    const { manager } = setup();
    await startReady(manager, 'go');
    const server = manager.serversFor('go')[0];
    server?.process.kill();

    const callback = vi.fn();
    await expect(
      manager.sendRequest('go', hoverRequest(URI, position), callback),
    ).rejects.toThrow(WriteFailedError);
    expect(server?.router.pendingCount()).toBe(0);
    expect(callback).not.toHaveBeenCalled();
  });

  it('answers requests made by the server', async () => {
    const { manager, spawner } = setup();
    await startReady(manager, 'go');
    const fake = only(spawner.serversFor('gopls'));

    fake.request('cfg-1', 'workspace/configuration', { items: [{ section: 'go' }] });
    fake.request('cap-1', 'client/registerCapability', { registrations: [] });
    fake.request('edit-1', 'workspace/applyEdit', { edit: {} });

    await vi.waitFor(() => {
      manager.processMessages();
      expect(fake.received.filter((message) => message.method === undefined)).toEqual([
        { id: 'cfg-1', result: [] },
        { id: 'cap-1', result: null },
        {
          id: 'edit-1',
          error: { code: -32601, message: 'Method not found: workspace/applyEdit' },
        },
      ]);
    });
  });
});

describe('ServerManager notifications', () => {
  it('holds opens until ready and flushes them once after initialized', async () => {
    const { manager, spawner } = setup({
      optionsFor: () => ({ autoInitialize: false }),
    });
    manager.sendNotification('python', didOpenNotification(URI, 'python', 1, 'x = 1'));
    const fake = only(spawner.serversFor('pyright-langserver'));

    await vi.waitFor(() => expect(fake.initializeId()).toBeDefined());
    await tick();
    expect(fake.methods()).toEqual(['initialize']);
    expect(manager.serversFor('python')[0]?.deferredCount).toBe(1);

    fake.completeInitialize();
    await vi.waitFor(() => {
      manager.processMessages();
      expect(manager.hasServer('python')).toBe(true);
    });
    manager.processMessages();

    await vi.waitFor(() =>
      expect(fake.methods()).toEqual([
        'initialize',
        'initialized',
        'textDocument/didOpen',
      ]),
    );
  });

  it('delivers published diagnostics to the callback', async () => {
    const { manager } = setup();
    const onDiagnostics = vi.fn();
    manager.setDiagnosticsCallback(onDiagnostics);

    manager.sendNotification(
      'python',
      didOpenNotification(URI, 'python', 1, 'ok\nvalue = TYPE_ERROR'),
    );

    await vi.waitFor(() => {
      manager.processMessages();
      expect(onDiagnostics).toHaveBeenCalledTimes(1);
    });
    expect(onDiagnostics).toHaveBeenCalledWith(URI, [
      {
        range: { start: { line: 1, character: 8 }, end: { line: 1, character: 18 } },
        severity: 1,
        code: 'FAKE1001',
        message: 'Simulated type error',
      },
    ]);
  });
});

describe('ServerManager shutdown', () => {
  it('sends shutdown then exit and kills the process', async () => {
    const { manager, spawner } = setup();
    await startReady(manager, 'go');
    const fake = only(spawner.serversFor('gopls'));
    const [server] = manager.serversFor('go');

    await manager.stopServer('go');

    expect(server?.state).toBe('stopped');
    expect(manager.serversFor('go')).toEqual([]);
    expect(manager.hasServer('go')).toBe(false);
    expect(fake.killCount).toBe(1);
    await vi.waitFor(() =>
      expect(fake.methods()).toEqual(['initialize', 'initialized', 'shutdown', 'exit']),
    );
  });

  it('ignores languages that are not running', async () => {
    const { manager } = setup();
    await expect(manager.stopServer('go')).resolves.toBeUndefined();
  });

  it('stops every language', async () => {
    const { manager } = setup();
    await startReady(manager, 'go');
    await startReady(manager, 'python');
    await manager.stopAll();
    expect(manager.serverStatus()).toEqual([]);
  });

  it('kills everything without the shutdown exchange', async () => {
    const { manager, spawner } = setup();
    manager.startServer('go');
    manager.startServer('python');
    const servers = [...manager.serversFor('go'), ...manager.serversFor('python')];

    manager.killAll();

    expect(manager.serverStatus()).toEqual([]);
    expect(servers.map((server) => server.state)).toEqual(['stopped', 'stopped']);
    expect(spawner.servers.map((fake) => fake.killCount)).toEqual([1, 1]);
    await tick();
    expect(spawner.servers.flatMap((fake) => fake.messagesFor('shutdown'))).toEqual([]);
  });
});

describe('ServerManager capabilities', () => {
  it('finds a ready server that supports a feature', async () => {
    const { manager } = setup({
      optionsFor: (program) => ({
        capabilities:
          program === 'ruff'
            ? { documentFormattingProvider: true }
            : { hoverProvider: true },
      }),
    });
    manager.startAllServers('python');
    await vi.waitFor(() => {
      manager.processMessages();
      expect(manager.serversFor('python').every((server) => server.isReady())).toBe(
        true,
      );
    });

    expect(manager.getServerWithCapability('python', 'formatting')?.config.name).toBe(
      'ruff',
    );
    expect(manager.getServerWithCapability('python', 'hover')?.config.name).toBe(
      'pyright',
    );
    expect(manager.getServerWithCapability('python', 'rename')).toBeUndefined();
  });
});
