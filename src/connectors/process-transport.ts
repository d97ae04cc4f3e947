import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';
import { silentLogger } from '../logger.js';
import {
  PathResolutionError,
  ReadError,
  ReadTimeoutError,
  SpawnError,
  UnexpectedExitError,
  WriteError
} from '../mcp/error-mapper.js';
import { DEFAULT_STOP_GRACE_MS } from './protocol-constants.js';

export interface ProcessLaunchOptions {
  command: readonly string[];
  cwd?: string;
  env?: Readonly<Record<string, string>>;
}

interface LineWaiter {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout | null;
}

const STDERR_TAIL_CHARS = 4096;
// Unread stdout lines kept per process; older ones are dropped first.
export const MAX_QUEUED_LINES = 1000;
// Upper bound on how long EOF handling waits for stderr and the exit status.
const EOF_DRAIN_MS = 500;

async function assertDirectory(path: string): Promise<void> {
  try {
    const info = await stat(path);
    if (!info.isDirectory()) throw new PathResolutionError(path);
  } catch (error) {
    if (error instanceof PathResolutionError) throw error;
    throw new PathResolutionError(path, { cause: error });
  }
}

/**
 * Owns one child process and its three pipes. Stdout is split into
 * newline-delimited lines that callers pull with `readLine`.
 */
export class ProcessTransport {
  private child: ChildProcessWithoutNullStreams | null = null;
  private readBuffer = '';
  private readonly lines: string[] = [];
  private waiter: LineWaiter | null = null;
  private stderrTail = '';
  private eofError: UnexpectedExitError | null = null;
  private exited: Promise<void> = Promise.resolve();
  private stderrClosed: Promise<void> = Promise.resolve();
  private terminating: Promise<void> | null = null;
  private droppedLines = 0;

  constructor(
    private readonly logger: Logger = silentLogger,
    private readonly maxQueuedLines: number = MAX_QUEUED_LINES
  ) {}

  get pid(): number | undefined {
    return this.child?.pid;
  }

  isAlive(): boolean {
    return this.child !== null && this.child.exitCode === null && this.child.signalCode === null;
  }

  async start(options: ProcessLaunchOptions): Promise<void> {
    if (this.child) throw new SpawnError('Transport already started');
    const [file, ...args] = options.command;
    if (!file) throw new SpawnError('Tool server command is empty');

    const cwd = options.cwd ? resolve(options.cwd) : undefined;
    if (cwd) await assertDirectory(cwd);
    if (this.terminating) throw new SpawnError('Transport was terminated before the process started');

    const child = spawn(file, args, {
      cwd,
      env: { ...process.env, ...options.env },
      stdio: ['pipe', 'pipe', 'pipe']
    });
    this.child = child;
    this.attach(child);

    try {
      await new Promise<void>((resolveSpawn, rejectSpawn) => {
        child.once('spawn', () => resolveSpawn());
        child.once('error', rejectSpawn);
      });
    } catch (error) {
      // A child that never spawned emits no exit event; drop it so terminate() is a no-op.
      this.child = null;
      const reason = error instanceof Error ? error.message : String(error);
      throw new SpawnError(`Failed to start tool server "${file}": ${reason}`, { command: [...options.command] }, { cause: error });
    }

    this.logger.debug({ pid: child.pid, command: options.command }, 'tool server process started');
  }

  async writeLine(text: string): Promise<void> {
    const child = this.child;
    if (!child || !this.isAlive() || child.stdin.destroyed || child.stdin.writableEnded) {
      throw new WriteError('Tool server stdin is closed');
    }

    await new Promise<void>((resolveWrite, rejectWrite) => {
      child.stdin.write(`${text}\n`, (error) => {
        if (error) {
          rejectWrite(new WriteError(`Failed to write to tool server: ${error.message}`, { cause: error }));
        } else {
          resolveWrite();
        }
      });
    });
  }

  readLine(timeoutMs?: number): Promise<string> {
    const queued = this.lines.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.eofError) return Promise.reject(this.eofError);
    if (!this.child) return Promise.reject(new ReadError('Transport is not started'));
    if (this.waiter) return Promise.reject(new ReadError('Another read is already pending'));

    return new Promise<string>((resolveRead, rejectRead) => {
      const waiter: LineWaiter = { resolve: resolveRead, reject: rejectRead, timeout: null };
      if (timeoutMs !== undefined) {
        waiter.timeout = setTimeout(() => {
          if (this.waiter === waiter) this.waiter = null;
          rejectRead(new ReadTimeoutError(timeoutMs));
        }, Math.max(0, timeoutMs));
      }
      this.waiter = waiter;
    });
  }

  /**
   * SIGTERM, then SIGKILL once `graceMs` has passed. Concurrent and repeated
   * calls share the same shutdown.
   */
  terminate(graceMs: number = DEFAULT_STOP_GRACE_MS): Promise<void> {
    if (!this.terminating) {
      this.terminating = this.shutdown(graceMs);
    }
    return this.terminating;
  }

  private async shutdown(graceMs: number): Promise<void> {
    const child = this.child;
    if (!child || !this.isAlive()) return;

    child.stdin.end();
    child.kill('SIGTERM');
    const exitedInTime = await Promise.race([
      this.exited.then(() => true),
      delay(graceMs, false, { ref: false })
    ]);

    if (!exitedInTime && this.isAlive()) {
      this.logger.warn({ pid: child.pid, graceMs }, 'tool server ignored SIGTERM, killing');
      child.kill('SIGKILL');
      await this.exited;
    }
  }

  private attach(child: ChildProcessWithoutNullStreams): void {
    this.exited = new Promise<void>((resolveExit) => {
      child.once('exit', () => resolveExit());
    });
    this.stderrClosed = new Promise<void>((resolveClose) => {
      child.stderr.once('close', () => resolveClose());
    });

    child.stdout.setEncoding('utf-8');
    child.stdout.on('data', (chunk: string) => {
      this.readBuffer += chunk;
      this.consumeBuffer();
    });
    child.stdout.once('end', () => {
      void this.handleEof(child);
    });

    child.stderr.setEncoding('utf-8');
    child.stderr.on('data', (chunk: string) => {
      this.stderrTail = (this.stderrTail + chunk).slice(-STDERR_TAIL_CHARS);
      this.logger.debug({ pid: child.pid, stderr: chunk.trimEnd() }, 'tool server stderr');
    });

    child.stdin.on('error', (error) => {
      this.logger.debug({ pid: child.pid, err: error }, 'tool server stdin error');
    });
    child.on('error', (error) => {
      this.logger.warn({ pid: child.pid, err: error }, 'tool server process error');
    });
  }

  private consumeBuffer(): void {
    const parts = this.readBuffer.split('\n');
    this.readBuffer = parts.pop() ?? '';
    for (const part of parts) {
      this.pushLine(part);
    }
  }

  private pushLine(raw: string): void {
    const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
    if (!line.trim()) return;

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      if (waiter.timeout) clearTimeout(waiter.timeout);
      waiter.resolve(line);
      return;
    }
    this.lines.push(line);
    if (this.lines.length > this.maxQueuedLines) {
      this.lines.shift();
      this.droppedLines += 1;
      if (this.droppedLines === 1) {
        this.logger.warn(
          { pid: this.child?.pid, maxQueuedLines: this.maxQueuedLines },
          'tool server output backlog full, dropping oldest lines'
        );
      }
    }
  }

  private async handleEof(child: ChildProcessWithoutNullStreams): Promise<void> {
    const rest = this.readBuffer;
    this.readBuffer = '';
    this.pushLine(rest);

    await Promise.race([Promise.all([this.stderrClosed, this.exited]), delay(EOF_DRAIN_MS, undefined, { ref: false })]);

    this.eofError = new UnexpectedExitError(child.exitCode, child.signalCode, this.stderrTail);
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      if (waiter.timeout) clearTimeout(waiter.timeout);
      waiter.reject(this.eofError);
    }
  }
}
