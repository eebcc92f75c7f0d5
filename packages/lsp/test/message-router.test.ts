import { describe, expect, it, vi } from 'vitest';
import * as fc from 'fast-check';

import { MessageRouter, type ResponseResult } from '../src/service/message-router.js';

describe('MessageRouter responses', () => {
  it('invokes the callback registered for the response id once', () => {
    const router = new MessageRouter();
    const callback = vi.fn();
    router.registerCallback(3, callback);

    router.handleMessage({ kind: 'response', id: 3, result: { ok: 1 } });
    router.handleMessage({ kind: 'response', id: 3, result: { ok: 2 } });

    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback).toHaveBeenCalledWith(3, { ok: true, value: { ok: 1 } });
    expect(router.hasPending(3)).toBe(false);
  });

  it('delivers null when the response has no result', () => {
    const router = new MessageRouter();
    const callback = vi.fn();
    router.registerCallback(4, callback);
    router.handleMessage({ kind: 'response', id: 4 });
    expect(callback).toHaveBeenCalledWith(4, { ok: true, value: null });
  });

  it('delivers error responses as failures', () => {
    const router = new MessageRouter();
    const callback = vi.fn();
    router.registerCallback(5, callback);
    router.handleMessage({
      kind: 'response',
      id: 5,
      error: { code: -32603, message: 'boom' },
    });
    expect(callback).toHaveBeenCalledWith(5, {
      ok: false,
      error: { code: -32603, message: 'boom' },
    });
  });

  it('discards responses for unknown ids without touching other callbacks', () => {
    const router = new MessageRouter();
    const callback = vi.fn();
    router.registerCallback(6, callback);

    expect(router.handleMessage({ kind: 'response', id: 7, result: 1 })).toBeUndefined();
    expect(callback).not.toHaveBeenCalled();
    expect(router.pendingCount()).toBe(1);
  });

  it('keeps routing after a callback throws', () => {
    const router = new MessageRouter();
    const next = vi.fn();
    router.registerCallback(1, () => {
      throw new Error('callback failure');
    });
    router.registerCallback(2, next);

    router.handleMessage({ kind: 'response', id: 1, result: null });
    router.handleMessage({ kind: 'response', id: 2, result: null });

    expect(next).toHaveBeenCalledTimes(1);
    expect(router.pendingCount()).toBe(0);
  });

  it('matches responses to callbacks in any arrival order', () => {
    fc.assert(
      fc.property(
        fc.uniqueArray(fc.integer({ min: 1, max: 10_000 }), {
          minLength: 1,
          maxLength: 20,
        }),
        fc.integer(),
        (ids, seed) => {
          const router = new MessageRouter();
          const seen = new Map<number | string, ResponseResult>();
          for (const id of ids) {
            router.registerCallback(id, (responseId, result) => {
              seen.set(responseId, result);
            });
          }

          const order = [...ids].sort(
            (a, b) => ((a * 31 + seed) % 97) - ((b * 31 + seed) % 97),
          );
          for (const id of order) {
            router.handleMessage({ kind: 'response', id, result: id * 2 });
          }

          expect(seen.size).toBe(ids.length);
          for (const id of ids) {
            expect(seen.get(id)).toEqual({ ok: true, value: id * 2 });
          }
          expect(router.pendingCount()).toBe(0);
        },
      ),
    );
  });
});

describe('MessageRouter notifications', () => {
  it('hands published diagnostics to the diagnostics callback', () => {
    const router = new MessageRouter();
    const onDiagnostics = vi.fn();
    router.setDiagnosticsCallback(onDiagnostics);

    router.handleMessage({
      kind: 'notification',
      method: 'textDocument/publishDiagnostics',
      params: {
        uri: 'file:///w/a.py',
        diagnostics: [
          {
            range: { start: { line: 0, character: 0 }, end: { line: 0, character: 1 } },
            severity: 1,
            message: 'undefined name',
          },
        ],
      },
    });

    expect(onDiagnostics).toHaveBeenCalledWith('file:///w/a.py', [
      {
        range: { start: { line: 0, character: 0 }, end: { line: 0, character: 1 } },
        severity: 1,
        message: 'undefined name',
      },
    ]);
  });

  it('ignores log messages and unknown notifications', () => {
    const router = new MessageRouter();
    const onDiagnostics = vi.fn();
    router.setDiagnosticsCallback(onDiagnostics);

    expect(
      router.handleMessage({
        kind: 'notification',
        method: 'window/logMessage',
        params: { type: 3, message: 'indexing' },
      }),
    ).toBeUndefined();
    expect(
      router.handleMessage({ kind: 'notification', method: '$/progress', params: {} }),
    ).toBeUndefined();
    expect(onDiagnostics).not.toHaveBeenCalled();
  });
});

describe('MessageRouter server requests', () => {
  it('answers workspace/configuration with an empty list', () => {
    const router = new MessageRouter();
    expect(
      router.handleMessage({
        kind: 'request',
        id: 'cfg-1',
        method: 'workspace/configuration',
        params: { items: [{ section: 'python' }] },
      }),
    ).toEqual({ kind: 'response', id: 'cfg-1', result: [] });
  });

  it.each([
    'client/registerCapability',
    'client/unregisterCapability',
    'window/workDoneProgress/create',
  ])('acknowledges %s with null', (method) => {
    const router = new MessageRouter();
    expect(router.handleMessage({ kind: 'request', id: 8, method })).toEqual({
      kind: 'response',
      id: 8,
      result: null,
    });
  });

  it('rejects anything else as method not found', () => {
    const router = new MessageRouter();
    expect(
      router.handleMessage({ kind: 'request', id: 9, method: 'workspace/applyEdit' }),
    ).toEqual({
      kind: 'response',
      id: 9,
      error: { code: -32601, message: 'Method not found: workspace/applyEdit' },
    });
  });
});
