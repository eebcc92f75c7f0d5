import createDebug from 'debug';
import type { Debugger } from 'debug';
import { expandHome } from '../utils/paths.js';
import { ConfigurationManager } from './ConfigurationManager.js';
import { FileOutput } from './FileOutput.js';
import type { LogEntry, LogLevel } from './types.js';

type Message = string | (() => string);

const LEVEL_RANK: Record<string, number> = {
  debug: 0,
  log: 1,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Namespaced logger over the `debug` package. Disabled loggers do no work:
 * message functions are only evaluated once a logger is enabled.
 *
 * ```ts
 * const logger = DebugLogger.getLogger('quire:lsp:manager');
 * logger.debug(() => `started ${name}`);
 * ```
 */
export class DebugLogger {
  private static instances: Map<string, DebugLogger> = new Map();

  private readonly debugInstance: Debugger;
  private readonly _namespace: string;
  private readonly _configManager: ConfigurationManager;
  private readonly _fileOutput: FileOutput;
  private _enabled: boolean;
  private _level = 'debug';
  private readonly boundOnConfigChange: () => void;

  /**
   * Returns the cached logger for `namespace`, creating it on first use.
   */
  static getLogger(namespace: string): DebugLogger {
    let logger = DebugLogger.instances.get(namespace);
    if (!logger) {
      logger = new DebugLogger(namespace);
      DebugLogger.instances.set(namespace, logger);
    }
    return logger;
  }

  static disposeAll(): void {
    for (const logger of DebugLogger.instances.values()) {
      logger._configManager.unsubscribe(logger.boundOnConfigChange);
    }
    DebugLogger.instances.clear();
  }

  constructor(namespace: string) {
    this._namespace = namespace;
    this.debugInstance = createDebug(namespace);
    this._configManager = ConfigurationManager.getInstance();
    const directory = this._configManager.getOutputDirectory();
    this._fileOutput = FileOutput.getInstance(
      directory
        ? expandHome(directory, this._configManager.homeDir)
        : undefined,
    );
    this._enabled = this.checkEnabled();
    this.syncDebugInstance();
    this.boundOnConfigChange = () => this.onConfigChange();
    this._configManager.subscribe(this.boundOnConfigChange);
  }

  get namespace(): string {
    return this._namespace;
  }

  get enabled(): boolean {
    return this._enabled;
  }

  set enabled(value: boolean) {
    this._enabled = value;
    this.syncDebugInstance();
  }

  get level(): string {
    return this._level;
  }

  set level(value: string) {
    this._level = value;
  }

  get fileOutput(): FileOutput {
    return this._fileOutput;
  }

  log(messageOrFn: Message, ...args: unknown[]): void {
    this.emit('log', messageOrFn, args);
  }

  debug(messageOrFn: Message, ...args: unknown[]): void {
    this.emit('debug', messageOrFn, args);
  }

  warn(messageOrFn: Message, ...args: unknown[]): void {
    this.emit('warn', messageOrFn, args);
  }

  error(messageOrFn: Message, ...args: unknown[]): void {
    this.emit('error', messageOrFn, args);
  }

  checkEnabled(): boolean {
    const config = this._configManager.getEffectiveConfig();
    if (!config.enabled) {
      return false;
    }

    const namespaces = Array.isArray(config.namespaces)
      ? config.namespaces
      : Object.keys(config.namespaces);

    return namespaces.some((pattern) =>
      this.matchesPattern(this._namespace, pattern),
    );
  }

  private emit(level: LogLevel, messageOrFn: Message, args: unknown[]): void {
    if (!this._enabled) {
      return;
    }
    if ((LEVEL_RANK[level] ?? 0) < (LEVEL_RANK[this._level] ?? 0)) {
      return;
    }

    let message: string;
    if (typeof messageOrFn === 'function') {
      try {
        message = messageOrFn();
      } catch (_error) {
        message = '[Error evaluating log function]';
      }
    } else {
      message = messageOrFn;
    }

    message = this.redactSensitive(message);

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      namespace: this._namespace,
      level,
      message,
      args: args.length > 0 ? args : undefined,
      runId: this._fileOutput.runId,
      pid: process.pid,
    };

    const target = this._configManager.getOutputTarget();
    if (target.includes('file')) {
      void this._fileOutput.write(entry);
    }
    if (target.includes('stderr')) {
      this.debugInstance(`[${level}] ${message}`, ...args);
    }
  }

  // `*` matches any run of characters; everything else is literal.
  private matchesPattern(namespace: string, pattern: string): boolean {
    if (pattern === namespace) {
      return true;
    }
    if (!pattern.includes('*')) {
      return false;
    }
    const regexPattern = pattern
      .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
      .replace(/\*/g, '.*');
    return new RegExp(`^${regexPattern}$`, 's').test(namespace);
  }

  private redactSensitive(message: string): string {
    let result = message;
    for (const pattern of this._configManager.getRedactPatterns()) {
      const regex = new RegExp(`${pattern}["']?:\\s*["']?([^"'\\s]+)`, 'gi');
      result = result.replace(regex, `${pattern}: [REDACTED]`);
    }
    return result;
  }

  // `debug` keeps its own enable list; mirror ours into the instance.
  private syncDebugInstance(): void {
    this.debugInstance.enabled = this._enabled;
  }

  private onConfigChange(): void {
    this._enabled = this.checkEnabled();
    this.syncDebugInstance();
  }

  async dispose(): Promise<void> {
    this._configManager.unsubscribe(this.boundOnConfigChange);
    if (DebugLogger.instances.get(this._namespace) === this) {
      DebugLogger.instances.delete(this._namespace);
    }
    await this._fileOutput.dispose();
  }
}
