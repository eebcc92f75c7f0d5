import { DebugLogger, getErrorMessage } from '@quire/core';

import {
  ErrorCodes,
  isRecord,
  type LspMessage,
  type NotificationMessage,
  type RequestId,
  type RequestMessage,
  type ResponseError,
  type ResponseMessage,
} from '../protocol/codec.js';
import { parsePublishDiagnostics } from '../protocol/responses.js';
import type { Diagnostic } from '../types.js';

const logger = new DebugLogger('quire:lsp:router');

export type ResponseResult =
  | { ok: true; value: unknown }
  | { ok: false; error: ResponseError };

export type ResponseCallback = (id: RequestId, result: ResponseResult) => void;

export type DiagnosticsCallback = (
  uri: string,
  diagnostics: Diagnostic[],
) => void;

const MESSAGE_TYPES: Record<number, string> = {
  1: 'error',
  2: 'warning',
  3: 'info',
  4: 'log',
};

/**
 * Dispatches inbound traffic for one server: responses to their pending
 * callbacks, diagnostics to the installed sink, and server requests to
 * canned replies.
 */
export class MessageRouter {
  private readonly pending = new Map<RequestId, ResponseCallback>();
  private diagnosticsCallback: DiagnosticsCallback | undefined;

  constructor(private readonly label = 'server') {}

  registerCallback(id: RequestId, callback: ResponseCallback): void {
    this.pending.set(id, callback);
  }

  unregisterCallback(id: RequestId): boolean {
    return this.pending.delete(id);
  }

  setDiagnosticsCallback(callback: DiagnosticsCallback | undefined): void {
    this.diagnosticsCallback = callback;
  }

  pendingCount(): number {
    return this.pending.size;
  }

  hasPending(id: RequestId): boolean {
    return this.pending.has(id);
  }

  /**
   * Handles one inbound message. Returns the reply to write back when the
   * message was a request from the server.
   */
  handleMessage(message: LspMessage): ResponseMessage | undefined {
    switch (message.kind) {
      case 'response':
        this.handleResponse(message);
        return undefined;
      case 'notification':
        this.handleNotification(message);
        return undefined;
      case 'request':
        return this.handleServerRequest(message);
      default: {
        const exhaustive: never = message;
        return exhaustive;
      }
    }
  }

  private handleResponse(message: ResponseMessage): void {
    const callback = this.pending.get(message.id);
    if (!callback) {
      logger.debug(
        () => `${this.label}: no pending request for id ${String(message.id)}`,
      );
      return;
    }
    this.pending.delete(message.id);

    const result: ResponseResult = message.error
      ? { ok: false, error: message.error }
      : { ok: true, value: message.result ?? null };
    try {
      callback(message.id, result);
    } catch (error) {
      logger.error(
        () =>
          `${this.label}: callback for id ${String(message.id)} threw: ${getErrorMessage(error)}`,
      );
    }
  }

  private handleNotification(message: NotificationMessage): void {
    switch (message.method) {
      case 'textDocument/publishDiagnostics': {
        const published = parsePublishDiagnostics(message.params);
        if (published.uri === '') {
          logger.debug(() => `${this.label}: publishDiagnostics without uri`);
          return;
        }
        if (!this.diagnosticsCallback) {
          return;
        }
        try {
          this.diagnosticsCallback(published.uri, published.diagnostics);
        } catch (error) {
          logger.error(
            () =>
              `${this.label}: diagnostics callback threw: ${getErrorMessage(error)}`,
          );
        }
        return;
      }
      case 'window/logMessage':
      case 'window/showMessage': {
        const params = isRecord(message.params) ? message.params : {};
        const type =
          typeof params.type === 'number'
            ? (MESSAGE_TYPES[params.type] ?? 'log')
            : 'log';
        logger.debug(
          () => `${this.label} [${type}] ${String(params.message ?? '')}`,
        );
        return;
      }
      default:
        logger.debug(
          () => `${this.label}: ignored notification ${message.method}`,
        );
    }
  }

  private handleServerRequest(message: RequestMessage): ResponseMessage {
    switch (message.method) {
      case 'workspace/configuration':
        return { kind: 'response', id: message.id, result: [] };
      case 'client/registerCapability':
      case 'client/unregisterCapability':
      case 'window/workDoneProgress/create':
        return { kind: 'response', id: message.id, result: null };
      default:
        logger.debug(
          () => `${this.label}: unsupported server request ${message.method}`,
        );
        return {
          kind: 'response',
          id: message.id,
          error: {
            code: ErrorCodes.MethodNotFound,
            message: `Method not found: ${message.method}`,
          },
        };
    }
  }
}
