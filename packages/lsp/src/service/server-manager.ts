import { setTimeout as delay } from 'node:timers/promises';

import { DebugLogger, getErrorMessage } from '@quire/core';

import type { LspConfig } from '../config.js';
import {
  type LspMessage,
  type NotificationMessage,
  parseMessage,
  type RequestMessage,
} from '../protocol/codec.js';
import { exitNotification, shutdownRequest } from '../protocol/requests.js';
import { NoServerAvailableError, type CandidateFailure } from '../errors.js';
import type {
  CapabilityName,
  ServerConfig,
  ServerStatus,
} from '../types.js';
import { ManagedServer } from './managed-server.js';
import type {
  DiagnosticsCallback,
  ResponseCallback,
} from './message-router.js';
import { ServerProcess, type SpawnProcess } from './server-process.js';
import { getBuiltinServers, toServerConfig } from './server-registry.js';

const logger = new DebugLogger('quire:lsp:manager');

export const DEFAULT_READY_POLL_ATTEMPTS = 50;
export const DEFAULT_READY_POLL_INTERVAL_MS = 100;
export const DEFAULT_SHUTDOWN_DELAY_MS = 100;
export const DEFAULT_CLIENT_NAME = 'quire';
export const CLIENT_VERSION = '0.1.0';

export interface ServerManagerOptions {
  workspaceRoot: string;
  clientName?: string;
  clientVersion?: string;
  /** Pump/sleep iterations a request waits for a server to become ready. */
  readyPollAttempts?: number;
  readyPollIntervalMs?: number;
  /** Pause between the shutdown request and the exit notification. */
  shutdownDelayMs?: number;
  spawnProcess?: SpawnProcess;
  sleep?: (ms: number) => Promise<void>;
}

const freezeConfig = (config: ServerConfig): ServerConfig =>
  Object.freeze({
    name: config.name,
    language: config.language,
    command: Object.freeze([...config.command]),
    capabilities: Object.freeze({ ...config.capabilities }),
  });

/**
 * Owns every language server process: which candidates exist per language,
 * which are running, and the traffic to and from them. Nothing here reads
 * from a server on its own; callers pump with `processMessages`.
 */
export class ServerManager {
  private readonly configs = new Map<string, ServerConfig[]>();
  private readonly servers = new Map<string, ManagedServer[]>();
  private diagnosticsCallback: DiagnosticsCallback | undefined;
  private readonly sleep: (ms: number) => Promise<void>;
  readonly workspaceRoot: string;
  private readonly clientName: string;
  private readonly clientVersion: string;
  private readonly readyPollAttempts: number;
  private readonly readyPollIntervalMs: number;
  private readonly shutdownDelayMs: number;
  private readonly spawnProcess: SpawnProcess | undefined;

  constructor(options: ServerManagerOptions) {
    this.workspaceRoot = options.workspaceRoot;
    this.clientName = options.clientName ?? DEFAULT_CLIENT_NAME;
    this.clientVersion = options.clientVersion ?? CLIENT_VERSION;
    this.readyPollAttempts =
      options.readyPollAttempts ?? DEFAULT_READY_POLL_ATTEMPTS;
    this.readyPollIntervalMs =
      options.readyPollIntervalMs ?? DEFAULT_READY_POLL_INTERVAL_MS;
    this.shutdownDelayMs = options.shutdownDelayMs ?? DEFAULT_SHUTDOWN_DELAY_MS;
    this.spawnProcess = options.spawnProcess;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  /** Builds a manager whose candidates and timings come from `config`. */
  static fromConfig(
    config: LspConfig,
    options: Pick<
      ServerManagerOptions,
      'workspaceRoot' | 'clientVersion' | 'spawnProcess' | 'sleep'
    >,
  ): ServerManager {
    const manager = new ServerManager({
      ...options,
      clientName: config.clientName,
      readyPollAttempts: config.readyPollAttempts,
      readyPollIntervalMs: config.readyPollIntervalMs,
      shutdownDelayMs: config.shutdownDelayMs,
    });
    manager.registerConfigs(config.servers.map(toServerConfig));
    return manager;
  }

  registerConfig(config: ServerConfig): void {
    const list = this.configs.get(config.language);
    const frozen = freezeConfig(config);
    if (list) {
      list.push(frozen);
    } else {
      this.configs.set(config.language, [frozen]);
    }
  }

  registerConfigs(configs: Iterable<ServerConfig>): void {
    for (const config of configs) {
      this.registerConfig(config);
    }
  }

  /** Registers the built-in candidate table. */
  registerDefaults(): void {
    this.registerConfigs(getBuiltinServers().map(toServerConfig));
  }

  configsFor(language: string): readonly ServerConfig[] {
    return [...(this.configs.get(language) ?? [])];
  }

  languages(): string[] {
    return [...this.configs.keys()].sort();
  }

  serversFor(language: string): readonly ManagedServer[] {
    return [...(this.servers.get(language) ?? [])];
  }

  /**
   * Starts the first candidate for `language` that launches. A candidate
   * that is already running counts as started.
   */
  startServer(language: string): void {
    const failures: CandidateFailure[] = [];
    for (const config of this.configs.get(language) ?? []) {
      const failure = this.startWithConfig(config);
      if (failure === undefined) {
        return;
      }
      failures.push(failure);
    }
    throw new NoServerAvailableError(language, failures);
  }

  /** Starts every candidate for `language`; at least one must launch. */
  startAllServers(language: string): void {
    const failures: CandidateFailure[] = [];
    let started = 0;
    for (const config of this.configs.get(language) ?? []) {
      const failure = this.startWithConfig(config);
      if (failure === undefined) {
        started += 1;
      } else {
        failures.push(failure);
      }
    }
    if (started === 0) {
      throw new NoServerAvailableError(language, failures);
    }
  }

  getOrStart(language: string): ManagedServer {
    const existing = this.servers.get(language)?.[0];
    if (existing) {
      return existing;
    }
    this.startServer(language);
    const started = this.servers.get(language)?.[0];
    if (!started) {
      throw new NoServerAvailableError(language);
    }
    return started;
  }

  getServerWithCapability(
    language: string,
    feature: CapabilityName,
  ): ManagedServer | undefined {
    return this.servers
      .get(language)
      ?.find((server) => server.isReady() && server.supports(feature));
  }

  /**
   * Sends a request to the language's first server, starting it if needed.
   * A server still handshaking gets a bounded wait; the request is written
   * when the wait ends whether or not the server became ready.
   */
  async sendRequest(
    language: string,
    request: RequestMessage,
    callback: ResponseCallback,
  ): Promise<void> {
    const server = this.getOrStart(language);

    for (
      let attempt = 0;
      attempt < this.readyPollAttempts && !server.isReady();
      attempt++
    ) {
      this.pumpServer(server);
      if (server.isReady()) {
        break;
      }
      await this.sleep(this.readyPollIntervalMs);
    }

    if (!server.isReady()) {
      logger.warn(
        () =>
          `${language}/${server.config.name} not ready; sending ${request.method} anyway`,
      );
    }

    server.router.registerCallback(request.id, callback);
    try {
      server.write(request);
    } catch (error) {
      server.router.unregisterCallback(request.id);
      throw error;
    }
  }

  /**
   * Sends a notification to the language's first server, starting it if
   * needed. Opens are held until the server is ready.
   */
  sendNotification(language: string, notification: NotificationMessage): void {
    this.getOrStart(language).notify(notification);
  }

  /** Drains and dispatches everything every server has sent so far. */
  processMessages(): void {
    for (const list of [...this.servers.values()]) {
      for (const server of [...list]) {
        this.pumpServer(server);
      }
    }
  }

  async stopServer(language: string): Promise<void> {
    const list = this.servers.get(language);
    if (!list) {
      return;
    }
    this.servers.delete(language);
    for (const server of list) {
      await this.shutdownServer(server);
    }
  }

  async stopAll(): Promise<void> {
    for (const language of [...this.servers.keys()]) {
      await this.stopServer(language);
    }
  }

  /** Forcibly kills every server without the shutdown exchange. */
  killAll(): void {
    for (const list of this.servers.values()) {
      for (const server of list) {
        server.process.kill();
        server.markStopped();
      }
    }
    this.servers.clear();
  }

  hasServer(language: string): boolean {
    return this.servers.get(language)?.some((server) => server.isReady()) ?? false;
  }

  setDiagnosticsCallback(callback: DiagnosticsCallback | undefined): void {
    this.diagnosticsCallback = callback;
    for (const list of this.servers.values()) {
      for (const server of list) {
        server.router.setDiagnosticsCallback(callback);
      }
    }
  }

  serverStatus(): ServerStatus[] {
    return [...this.servers.values()].flatMap((list) =>
      list.map((server) => server.status()),
    );
  }

  private startWithConfig(config: ServerConfig): CandidateFailure | undefined {
    const running = this.servers
      .get(config.language)
      ?.some((server) => server.config.name === config.name);
    if (running) {
      return undefined;
    }

    let server: ManagedServer;
    try {
      const serverProcess = ServerProcess.spawn(config.command, {
        cwd: this.workspaceRoot,
        spawnProcess: this.spawnProcess,
      });
      server = new ManagedServer(config, serverProcess);
    } catch (error) {
      const reason = getErrorMessage(error);
      logger.debug(() => `${config.language}/${config.name}: ${reason}`);
      return { server: config.name, reason };
    }

    server.router.setDiagnosticsCallback(this.diagnosticsCallback);
    try {
      server.beginHandshake({
        workspaceRoot: this.workspaceRoot,
        clientName: this.clientName,
        clientVersion: this.clientVersion,
      });
    } catch (error) {
      server.process.kill();
      const reason = getErrorMessage(error);
      logger.debug(() => `${config.language}/${config.name}: ${reason}`);
      return { server: config.name, reason };
    }

    const list = this.servers.get(config.language);
    if (list) {
      list.push(server);
    } else {
      this.servers.set(config.language, [server]);
    }
    logger.debug(
      () =>
        `${config.language}/${config.name} started (pid ${String(server.process.pid)})`,
    );
    return undefined;
  }

  private pumpServer(server: ManagedServer): void {
    let payload = server.process.tryReceive();
    while (payload !== undefined) {
      const message = parseMessage(payload);
      if (message) {
        this.dispatch(server, message);
      } else {
        logger.debug(
          () => `${server.config.name}: dropped malformed frame: ${payload}`,
        );
      }
      payload = server.process.tryReceive();
    }
  }

  private dispatch(server: ManagedServer, message: LspMessage): void {
    if (server.isInitializeResponse(message)) {
      const { error, result } = message;
      if (error) {
        logger.warn(
          () => `${server.config.name}: initialize failed: ${error.message}`,
        );
      } else {
        this.write(server, () => server.completeHandshake(result ?? null));
      }
    }

    const reply = server.router.handleMessage(message);
    if (reply) {
      this.write(server, () => server.write(reply));
    }
  }

  private write(server: ManagedServer, send: () => void): void {
    try {
      send();
    } catch (error) {
      logger.warn(
        () => `${server.config.name}: write failed: ${getErrorMessage(error)}`,
      );
    }
  }

  private async shutdownServer(server: ManagedServer): Promise<void> {
    server.markShuttingDown();
    this.write(server, () => server.write(shutdownRequest()));
    await this.sleep(this.shutdownDelayMs);
    this.write(server, () => server.write(exitNotification()));
    server.process.kill();
    server.markStopped();
    logger.debug(() => `${server.config.language}/${server.config.name} stopped`);
  }
}
