import { spawn } from 'node:child_process';
import type { Readable, Writable } from 'node:stream';

import { DebugLogger, getErrorMessage } from '@quire/core';

import { FrameBuffer } from '../protocol/codec.js';
import { SpawnFailedError, WriteFailedError } from '../errors.js';

const logger = new DebugLogger('quire:lsp:process');

/**
 * The parts of a child process the supervisor relies on. Node's
 * `ChildProcess` satisfies it; tests pass in-process stand-ins.
 */
export interface ChildHandle {
  readonly pid?: number;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  on(
    event: 'exit',
    listener: (code: number | null, signal: NodeJS.Signals | null) => void,
  ): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

export type SpawnProcess = (
  program: string,
  args: readonly string[],
  options: { cwd?: string },
) => ChildHandle;

export const spawnChildProcess: SpawnProcess = (program, args, options) =>
  spawn(program, [...args], {
    cwd: options.cwd,
    stdio: ['pipe', 'pipe', 'pipe'],
    shell: false,
  });

export interface SpawnOptions {
  cwd?: string;
  spawnProcess?: SpawnProcess;
}

/**
 * One language server child process. The stdout listener only queues raw
 * chunks; framing happens when the owner pulls with `tryReceive`.
 */
export class ServerProcess {
  private readonly inbound: Buffer[] = [];
  private readonly frames: FrameBuffer;
  private readonly waiters = new Set<() => void>();
  private exited = false;
  private stdoutEnded = false;
  private stdinFailed = false;
  private killed = false;

  private constructor(
    private readonly child: ChildHandle,
    readonly command: readonly string[],
  ) {
    this.frames = new FrameBuffer({
      onMalformedHeader: (header) =>
        logger.debug(
          () => `pid ${String(this.pid)}: dropped header without length: ${header}`,
        ),
    });
    this.attach();
  }

  /**
   * Launches `command[0]` with the remaining elements as arguments. Throws
   * `SpawnFailedError` when the program cannot be started.
   */
  static spawn(
    command: readonly string[],
    options: SpawnOptions = {},
  ): ServerProcess {
    const [program, ...args] = command;
    if (program === undefined || program.length === 0) {
      throw new SpawnFailedError(command, 'empty command');
    }

    const spawnProcess = options.spawnProcess ?? spawnChildProcess;
    let child: ChildHandle;
    try {
      child = spawnProcess(program, args, { cwd: options.cwd });
    } catch (error) {
      throw new SpawnFailedError(command, getErrorMessage(error));
    }

    if (child.pid === undefined) {
      // The ENOENT 'error' event is emitted on a later tick.
      child.on('error', (error) =>
        logger.debug(() => `spawn of '${program}' failed: ${error.message}`),
      );
      throw new SpawnFailedError(command, 'no process id assigned');
    }

    logger.debug(() => `started '${command.join(' ')}' as pid ${String(child.pid)}`);
    return new ServerProcess(child, command);
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  isRunning(): boolean {
    return (
      !this.exited &&
      !this.killed &&
      this.child.exitCode === null &&
      this.child.signalCode === null
    );
  }

  /**
   * Writes one encoded frame. Fails when the process is gone or its stdin
   * can no longer be written.
   */
  send(frame: string): void {
    const stdin = this.child.stdin;
    if (!this.isRunning()) {
      throw new WriteFailedError(this.pid, 'process is not running');
    }
    if (
      stdin === null ||
      this.stdinFailed ||
      stdin.destroyed ||
      stdin.writableEnded
    ) {
      throw new WriteFailedError(this.pid, 'stdin is closed');
    }
    try {
      stdin.write(frame);
    } catch (error) {
      this.stdinFailed = true;
      throw new WriteFailedError(this.pid, getErrorMessage(error));
    }
  }

  /** Returns the next complete frame payload without waiting. */
  tryReceive(): string | undefined {
    for (const chunk of this.inbound.splice(0)) {
      this.frames.push(chunk);
    }
    return this.frames.next();
  }

  /**
   * Waits up to `timeoutMs` for a complete frame. Resolves `undefined` on
   * timeout or once stdout has closed with nothing left buffered.
   */
  async receiveWithTimeout(timeoutMs: number): Promise<string | undefined> {
    const immediate = this.tryReceive();
    if (immediate !== undefined || this.stdoutEnded) {
      return immediate;
    }

    const deadline = Date.now() + timeoutMs;
    while (Date.now() < deadline) {
      await new Promise<void>((resolve) => {
        const wake = (): void => {
          clearTimeout(timer);
          this.waiters.delete(wake);
          resolve();
        };
        const timer = setTimeout(wake, Math.max(0, deadline - Date.now()));
        this.waiters.add(wake);
      });
      const frame = this.tryReceive();
      if (frame !== undefined || this.stdoutEnded) {
        return frame;
      }
    }
    return undefined;
  }

  /** Forcibly terminates the process. Safe to call more than once. */
  kill(): void {
    if (this.killed) {
      return;
    }
    this.killed = true;
    if (this.exited) {
      return;
    }
    try {
      this.child.kill('SIGKILL');
    } catch (error) {
      logger.debug(
        () => `kill of pid ${String(this.pid)} failed: ${getErrorMessage(error)}`,
      );
    }
  }

  private attach(): void {
    const { stdout, stderr, stdin } = this.child;

    stdout?.on('data', (chunk: Buffer | string) => {
      this.inbound.push(
        typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk,
      );
      this.wakeWaiters();
    });
    stdout?.on('end', () => {
      this.stdoutEnded = true;
      this.wakeWaiters();
    });
    stdout?.on('error', (error: Error) =>
      logger.debug(() => `pid ${String(this.pid)} stdout: ${error.message}`),
    );

    stderr?.on('data', (chunk: Buffer | string) =>
      logger.debug(
        () => `pid ${String(this.pid)} stderr: ${String(chunk).trimEnd()}`,
      ),
    );

    stdin?.on('error', (error: Error) => {
      this.stdinFailed = true;
      logger.debug(() => `pid ${String(this.pid)} stdin: ${error.message}`);
    });

    this.child.on('exit', (code, signal) => {
      this.exited = true;
      logger.debug(
        () =>
          `pid ${String(this.pid)} exited (code ${String(code)}, signal ${String(signal)})`,
      );
      this.wakeWaiters();
    });
    this.child.on('error', (error) =>
      logger.debug(() => `pid ${String(this.pid)} error: ${error.message}`),
    );
  }

  private wakeWaiters(): void {
    for (const wake of [...this.waiters]) {
      wake();
    }
  }
}
