import { describe, expect, it, vi } from 'vitest';

import { parseMessage } from '../src/protocol/codec.js';
import { didChangeNotification, didOpenNotification } from '../src/protocol/requests.js';
import { ManagedServer } from '../src/service/managed-server.js';
import { ServerProcess } from '../src/service/server-process.js';
import { createCapabilities, type ServerConfig } from '../src/types.js';
import { FakeLanguageServer } from './fixtures/fake-lsp-server.js';

const config: ServerConfig = {
  name: 'ruff',
  language: 'python',
  command: ['ruff', 'server'],
  capabilities: createCapabilities(['diagnostics', 'formatting']),
};

function createServer(): { managed: ManagedServer; fake: FakeLanguageServer } {
  const fake = new FakeLanguageServer({ autoInitialize: false });
  const process = ServerProcess.spawn(config.command, { spawnProcess: () => fake });
  return { managed: new ManagedServer(config, process), fake };
}

describe('ManagedServer', () => {
  it('starts out starting with no capabilities', () => {
    const { managed } = createServer();
    expect(managed.state).toBe('starting');
    expect(managed.isReady()).toBe(false);
    expect(managed.isLive()).toBe(true);
    expect(Object.values(managed.capabilities).some(Boolean)).toBe(false);
  });

  it('moves to initializing once initialize is written', async () => {
    const { managed, fake } = createServer();
    managed.beginHandshake({
      workspaceRoot: '/w',
      clientName: 'quire',
      clientVersion: '0.1.0',
    });
    expect(managed.state).toBe('initializing');
    await vi.waitFor(() => expect(fake.methods()).toEqual(['initialize']));
  });

  it('recognises only the response to its own initialize', async () => {
    const { managed, fake } = createServer();
    managed.beginHandshake({ workspaceRoot: '/w', clientName: 'quire', clientVersion: '0' });
    await vi.waitFor(() => expect(fake.initializeId()).toBeDefined());
    const initializeId = fake.initializeId();
    const other = parseMessage('{"jsonrpc":"2.0","id":-1,"result":null}');
    const own = parseMessage(`{"jsonrpc":"2.0","id":${String(initializeId)},"result":null}`);
    expect(other === undefined ? undefined : managed.isInitializeResponse(other)).toBe(false);
    expect(own === undefined ? undefined : managed.isInitializeResponse(own)).toBe(true);
  });

  it('defers opens until the handshake completes and replays them once', async () => {
    const { managed, fake } = createServer();
    managed.beginHandshake({ workspaceRoot: '/w', clientName: 'quire', clientVersion: '0' });

    managed.notify(didOpenNotification('file:///w/a.py', 'python', 1, 'a'));
    managed.notify(didOpenNotification('file:///w/b.py', 'python', 1, 'b'));
    managed.notify(didChangeNotification('file:///w/a.py', 2, 'aa'));
    expect(managed.deferredCount).toBe(2);

    managed.completeHandshake({ capabilities: { documentFormattingProvider: true } });

    expect(managed.deferredCount).toBe(0);
    await vi.waitFor(() =>
      expect(fake.methods()).toEqual([
        'initialize',
        'textDocument/didChange',
        'initialized',
        'textDocument/didOpen',
        'textDocument/didOpen',
      ]),
    );
    const uris = fake
      .messagesFor('textDocument/didOpen')
      .map((message) => JSON.stringify(message.params));
    expect(uris[0]).toContain('file:///w/a.py');
    expect(uris[1]).toContain('file:///w/b.py');
  });

  it('empties the deferred queue even when the process has died', () => {
    const { managed, fake } = createServer();
    managed.beginHandshake({ workspaceRoot: '/w', clientName: 'quire', clientVersion: '0' });
    managed.notify(didOpenNotification('file:///w/a.py', 'python', 1, 'a'));
    fake.crash();

    expect(() =>
      managed.completeHandshake({ capabilities: { documentFormattingProvider: true } }),
    ).not.toThrow();
    expect(managed.state).toBe('ready');
    expect(managed.deferredCount).toBe(0);
    expect(managed.supports('formatting')).toBe(true);
  });

  it('supports a feature only when negotiated and allowed', () => {
    const { managed } = createServer();
    managed.beginHandshake({ workspaceRoot: '/w', clientName: 'quire', clientVersion: '0' });
    managed.completeHandshake({
      capabilities: { hoverProvider: true, documentFormattingProvider: true },
    });
    expect(managed.supports('formatting')).toBe(true);
    expect(managed.supports('hover')).toBe(false);
    expect(managed.supports('diagnostics')).toBe(true);
    expect(managed.supports('completion')).toBe(false);
  });

  it('reports its status', () => {
    const { managed, fake } = createServer();
    managed.markShuttingDown();
    expect(managed.isLive()).toBe(false);
    managed.markStopped();
    expect(managed.status()).toEqual({
      language: 'python',
      name: 'ruff',
      state: 'stopped',
      pid: fake.pid,
    });
  });
});
