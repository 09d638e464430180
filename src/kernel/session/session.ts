import {
  CancelledError,
  RuntimeError,
  SandboxError,
  SessionClosedError,
  SessionTimeoutError,
  errorMessage,
  type ErrorContext,
} from '../errors.ts';
import type { Logger } from '../logger.ts';
import type { AttachedStream } from '../container/types.ts';
import { SentinelFramer, newToken, sentinelLine, type Frame } from './framer.ts';
import { ExecutionLock } from './lock.ts';

export type SessionHealth = 'healthy' | 'unknown' | 'corrupted' | 'closed';

export interface SessionResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface SessionOptions {
  sandboxId?: string;
  execTimeoutMs?: number;
  probeTimeoutMs?: number;
  logger?: Logger;
}

export interface SessionExecOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Runs before the lock is released, so callbacks observe lock order. */
  onResult?: (result: SessionResult) => void;
  /** Runs under the lock when a command was sent but no result came back. */
  onFailure?: (err: SandboxError) => void;
}

interface PendingFrame {
  token: string;
  resolve: (frame: Frame) => void;
  reject: (err: Error) => void;
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * One long-lived shell inside a container. Commands are written to the
 * shell's standard input and their completion is detected by a sentinel
 * line carrying a per-command random token and the exit status.
 */
export class ShellSession {
  private readonly stream: AttachedStream;
  private readonly framer = new SentinelFramer();
  private readonly lock = new ExecutionLock();
  private readonly context: ErrorContext;
  private readonly execTimeoutMs: number;
  private readonly probeTimeoutMs: number;
  private readonly logger: Logger;
  private state: SessionHealth = 'unknown';
  private closeReason = '';
  private pending: PendingFrame | undefined;
  private executed = 0;

  constructor(stream: AttachedStream, opts: SessionOptions = {}) {
    this.stream = stream;
    this.context = opts.sandboxId ? { sandboxId: opts.sandboxId } : {};
    this.execTimeoutMs = opts.execTimeoutMs ?? 30_000;
    this.probeTimeoutMs = opts.probeTimeoutMs ?? 10_000;
    this.logger = opts.logger ?? console;

    stream.output.setEncoding('utf8');
    stream.output.on('data', (chunk: string) => {
      this.framer.push(chunk);
      this.deliver();
    });
    stream.output.on('end', () => this.markClosed('output stream ended'));
    stream.output.on('close', () => this.markClosed('output stream closed'));
    stream.output.on('error', (err) => this.markClosed(err.message));
    stream.input.on('error', (err) => this.markClosed(`input stream failed: ${err.message}`));
  }

  get health(): SessionHealth {
    return this.state;
  }

  get commandCount(): number {
    return this.executed;
  }

  /** Merges stderr into the session output, enters the working directory and waits for the shell to answer. */
  async initialize(workdir: string): Promise<void> {
    const release = await this.lock.acquire();
    try {
      this.write(`exec 2>&1\ncd ${shellQuote(workdir)}\n`);
      const frame = await this.probe();
      if (frame.exitCode !== 0) {
        this.state = 'corrupted';
        throw new RuntimeError('initialize', `cannot enter ${workdir}: ${frame.output.trim()}`, this.context);
      }
      this.state = 'healthy';
    } catch (err) {
      if (err instanceof SessionTimeoutError) this.state = 'corrupted';
      throw err;
    } finally {
      release();
    }
  }

  async exec(command: string, opts: SessionExecOptions = {}): Promise<SessionResult> {
    this.assertUsable();
    const release = await this.lock.acquire(opts.signal);
    try {
      this.assertUsable();
      if (this.state === 'unknown') {
        await this.recover(opts.signal);
      }

      const token = newToken();
      this.write(`${command}\n${sentinelLine(token)}`);
      this.executed += 1;

      let frame: Frame;
      try {
        frame = await this.awaitFrame(token, opts.timeoutMs ?? this.execTimeoutMs, opts.signal);
      } catch (err) {
        if (err instanceof CancelledError) this.state = 'unknown';
        if (err instanceof SessionTimeoutError) this.state = 'corrupted';
        if (err instanceof SandboxError) opts.onFailure?.(err);
        throw err;
      }

      const result: SessionResult = { stdout: frame.output, stderr: '', exitCode: frame.exitCode };
      opts.onResult?.(result);
      return result;
    } finally {
      release();
    }
  }

  close(): void {
    this.markClosed('session closed');
    try {
      this.stream.close();
    } catch (err) {
      this.logger.warn(`[session] closing stream failed: ${errorMessage(err)}`);
    }
  }

  // After a cancelled command the shell may still be running it; a fresh
  // probe drains whatever it printed before the session is trusted again.
  private async recover(signal?: AbortSignal): Promise<void> {
    try {
      await this.probe(signal);
      this.state = 'healthy';
    } catch (err) {
      if (err instanceof SessionTimeoutError) this.state = 'corrupted';
      throw err;
    }
  }

  private probe(signal?: AbortSignal): Promise<Frame> {
    const token = newToken();
    this.write(sentinelLine(token));
    return this.awaitFrame(token, this.probeTimeoutMs, signal);
  }

  private awaitFrame(token: string, timeoutMs: number, signal?: AbortSignal): Promise<Frame> {
    return new Promise<Frame>((resolve, reject) => {
      if (this.state === 'closed') {
        reject(new SessionClosedError(this.closeReason, this.context));
        return;
      }

      const cleanup = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        if (this.pending?.token === token) this.pending = undefined;
      };
      const onAbort = (): void => {
        cleanup();
        reject(new CancelledError('exec', this.context));
      };
      const timer = setTimeout(() => {
        cleanup();
        reject(new SessionTimeoutError(timeoutMs, this.context));
      }, timeoutMs);

      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });

      this.pending = {
        token,
        resolve: (frame) => {
          cleanup();
          resolve(frame);
        },
        reject: (err) => {
          cleanup();
          reject(err);
        },
      };
      this.deliver();
    });
  }

  private deliver(): void {
    if (!this.pending) return;
    const frame = this.framer.extract(this.pending.token);
    if (frame) this.pending.resolve(frame);
  }

  private write(text: string): void {
    if (this.state === 'closed' || this.stream.input.destroyed) {
      throw new SessionClosedError(this.closeReason || 'input stream is not writable', this.context);
    }
    this.stream.input.write(text);
  }

  private assertUsable(): void {
    if (this.state === 'closed') {
      throw new SessionClosedError(this.closeReason, this.context);
    }
    if (this.state === 'corrupted') {
      throw new SessionClosedError('session is corrupted after a timed out command', this.context);
    }
  }

  private markClosed(reason: string): void {
    if (this.state === 'closed') return;
    this.state = 'closed';
    this.closeReason = reason;
    this.pending?.reject(new SessionClosedError(reason, this.context));
  }
}
