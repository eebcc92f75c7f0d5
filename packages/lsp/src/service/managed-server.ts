import { DebugLogger, getErrorMessage } from '@quire/core';

import {
  encodeMessage,
  type LspMessage,
  type NotificationMessage,
  type RequestId,
  type ResponseMessage,
} from '../protocol/codec.js';
import {
  initializedNotification,
  initializeRequest,
  type InitializeOptions,
} from '../protocol/requests.js';
import { parseCapabilities } from '../protocol/responses.js';
import {
  createCapabilities,
  type Capabilities,
  type CapabilityName,
  type ServerConfig,
  type ServerState,
  type ServerStatus,
} from '../types.js';
import { MessageRouter } from './message-router.js';
import type { ServerProcess } from './server-process.js';

const logger = new DebugLogger('quire:lsp:manager');

/**
 * One running language server together with its handshake state. Opens
 * sent before the server is ready are held back and replayed once, in
 * order, when the handshake completes.
 */
export class ManagedServer {
  readonly router: MessageRouter;
  private currentState: ServerState = 'starting';
  private negotiated: Capabilities = createCapabilities(false);
  private readonly deferred: NotificationMessage[] = [];
  private initializeId: RequestId | undefined;

  constructor(
    readonly config: ServerConfig,
    readonly process: ServerProcess,
  ) {
    this.router = new MessageRouter(`${config.language}/${config.name}`);
  }

  get state(): ServerState {
    return this.currentState;
  }

  get capabilities(): Capabilities {
    return { ...this.negotiated };
  }

  get deferredCount(): number {
    return this.deferred.length;
  }

  isReady(): boolean {
    return this.currentState === 'ready';
  }

  isLive(): boolean {
    return (
      this.currentState !== 'shutting-down' && this.currentState !== 'stopped'
    );
  }

  write(message: LspMessage): void {
    this.process.send(encodeMessage(message));
  }

  /** Writes `initialize` and moves to `initializing`. */
  beginHandshake(options: InitializeOptions): void {
    const request = initializeRequest(options);
    this.initializeId = request.id;
    this.write(request);
    this.currentState = 'initializing';
  }

  isInitializeResponse(message: LspMessage): message is ResponseMessage {
    return (
      this.currentState === 'initializing' &&
      message.kind === 'response' &&
      this.initializeId !== undefined &&
      message.id === this.initializeId
    );
  }

  /**
   * Applies the initialize result: records capabilities, becomes `ready`,
   * sends `initialized` and replays deferred opens.
   */
  completeHandshake(result: unknown): void {
    this.negotiated = parseCapabilities(result);
    this.currentState = 'ready';
    this.initializeId = undefined;
    // Best effort: the queue is emptied even when a write fails.
    for (const message of [initializedNotification(), ...this.deferred.splice(0)]) {
      try {
        this.write(message);
      } catch (error) {
        logger.warn(
          () =>
            `${this.config.name}: could not send ${message.method}: ${getErrorMessage(error)}`,
        );
      }
    }
    logger.debug(
      () =>
        `${this.config.language}/${this.config.name} ready (pid ${String(this.process.pid)})`,
    );
  }

  notify(message: NotificationMessage): void {
    if (!this.isReady() && message.method === 'textDocument/didOpen') {
      this.deferred.push(message);
      return;
    }
    this.write(message);
  }

  /** Negotiated with the server and allowed by the configuration. */
  supports(feature: CapabilityName): boolean {
    return this.negotiated[feature] && this.config.capabilities[feature];
  }

  markShuttingDown(): void {
    this.currentState = 'shutting-down';
  }

  markStopped(): void {
    this.currentState = 'stopped';
  }

  status(): ServerStatus {
    return {
      language: this.config.language,
      name: this.config.name,
      state: this.currentState,
      pid: this.process.pid,
    };
  }
}
