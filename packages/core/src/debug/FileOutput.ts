import { promises as fs, type Stats } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { QUIRE_DIR } from '../utils/paths.js';
import type { LogEntry } from './types.js';

interface QueuedEntry {
  entry: LogEntry;
  timestamp: number;
}

const LOG_FILE_DATE_LENGTH = 10;

/**
 * Batched JSONL sink for debug log entries. One file per run, rotated by
 * size and by day.
 */
export class FileOutput {
  private static instance: FileOutput | undefined;
  private readonly debugDir: string;
  private currentLogFile: string;
  private writeQueue: QueuedEntry[] = [];
  private isWriting = false;
  private disposed = false;
  private flushTimeout: NodeJS.Timeout | null = null;
  private readonly maxFileSize = 10 * 1024 * 1024; // 10MB
  private readonly maxQueueSize = 1000;
  private readonly batchSize = 50;
  private readonly flushInterval = 1000;
  private readonly debugRunId: string;

  constructor(debugDir?: string) {
    const home = homedir();
    this.debugDir =
      debugDir ??
      (home
        ? join(home, QUIRE_DIR, 'debug')
        : join(process.cwd(), QUIRE_DIR, 'debug'));
    this.debugRunId = process.env.QUIRE_DEBUG_RUN_ID || String(process.pid);
    this.currentLogFile = this.generateLogFileName();
  }

  get runId(): string {
    return this.debugRunId;
  }

  get logFile(): string {
    return this.currentLogFile;
  }

  /**
   * The first caller decides the directory; later calls share that sink.
   */
  static getInstance(debugDir?: string): FileOutput {
    if (!FileOutput.instance) {
      FileOutput.instance = new FileOutput(debugDir);
    }
    return FileOutput.instance;
  }

  static resetForTesting(): void {
    FileOutput.instance = undefined;
  }

  async write(entry: LogEntry): Promise<void> {
    if (this.disposed) {
      return;
    }

    if (!this.flushTimeout) {
      this.startFlushTimer();
    }

    this.writeQueue.push({ entry, timestamp: Date.now() });

    if (this.writeQueue.length > this.maxQueueSize) {
      this.writeQueue = this.writeQueue.slice(-this.maxQueueSize);
    }

    if (this.writeQueue.length >= this.batchSize || !this.isWriting) {
      await this.flushQueue();
    }
  }

  async dispose(): Promise<void> {
    if (this.flushTimeout) {
      clearTimeout(this.flushTimeout);
      this.flushTimeout = null;
    }

    await this.flushQueue();
    this.disposed = true;
  }

  private startFlushTimer(): void {
    if (this.disposed || this.flushTimeout) {
      return;
    }

    this.flushTimeout = setTimeout(() => {
      void this.flushQueue().then(() => {
        this.flushTimeout = null;
        if (this.writeQueue.length > 0) {
          this.startFlushTimer();
        }
      });
    }, this.flushInterval);
    // A pending flush must not keep the process alive.
    this.flushTimeout.unref();
  }

  private async flushQueue(): Promise<void> {
    if (this.isWriting || this.writeQueue.length === 0 || this.disposed) {
      return;
    }

    this.isWriting = true;
    let entriesToWrite: QueuedEntry[] = [];

    try {
      await fs.mkdir(this.debugDir, { recursive: true, mode: 0o700 });
      await this.checkFileRotation();

      entriesToWrite = this.writeQueue.splice(0, this.batchSize);
      if (entriesToWrite.length === 0) {
        return;
      }

      const jsonlData =
        entriesToWrite.map(({ entry }) => JSON.stringify(entry)).join('\n') +
        '\n';

      await fs.appendFile(this.currentLogFile, jsonlData, {
        encoding: 'utf8',
        mode: 0o600,
      });
    } catch (error) {
      console.error('FileOutput: Failed to write log entries:', error);

      if (this.writeQueue.length < this.maxQueueSize / 2) {
        this.writeQueue.unshift(...entriesToWrite);
      }
    } finally {
      this.isWriting = false;
    }
  }

  private async checkFileRotation(): Promise<void> {
    let stats: Stats;
    try {
      stats = await fs.stat(this.currentLogFile);
    } catch {
      return; // not created yet
    }

    if (stats.size >= this.maxFileSize) {
      this.currentLogFile = this.generateLogFileName();
      return;
    }

    // Some filesystems report no birth time.
    const fileDate = stats.birthtimeMs > 0 ? stats.birthtime : stats.mtime;
    if (fileDate.toDateString() !== new Date().toDateString()) {
      this.currentLogFile = this.generateLogFileName();
    }
  }

  private generateLogFileName(): string {
    const now = new Date();
    const datePart = now.toISOString().slice(0, LOG_FILE_DATE_LENGTH);
    const timePart = now.toTimeString().slice(0, 8).replace(/:/g, '-');
    return join(
      this.debugDir,
      `quire-debug-${this.debugRunId}-${datePart}-${timePart}.jsonl`,
    );
  }
}
