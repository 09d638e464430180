import { spawn } from 'node:child_process';

export interface ExecResult {
  stdout: string;
  stderr: string;
  status: number;
  timedOut?: boolean;
  aborted?: boolean;
}

export interface ExecOptions {
  stdin?: string;
  timeoutMs?: number;
  maxCaptureBytes?: number;
  signal?: AbortSignal;
}

export const TRUNCATION_MARKER = '...[truncated]';

interface CaptureState {
  text: string;
  bytes: number;
  truncated: boolean;
}

function createCapture(): CaptureState {
  return { text: '', bytes: 0, truncated: false };
}

function appendChunk(state: CaptureState, chunk: string, maxBytes: number): void {
  if (state.truncated || maxBytes <= 0) {
    state.truncated = true;
    return;
  }

  const chunkBytes = Buffer.byteLength(chunk, 'utf8');
  const remaining = maxBytes - state.bytes;
  if (chunkBytes <= remaining) {
    state.text += chunk;
    state.bytes += chunkBytes;
    return;
  }

  state.text += Buffer.from(chunk, 'utf8').subarray(0, remaining).toString('utf8');
  state.bytes = maxBytes;
  state.truncated = true;
}

function finalize(state: CaptureState): string {
  return state.truncated ? `${state.text}${TRUNCATION_MARKER}` : state.text;
}

// Never rejects: spawn failures, timeouts and aborts all come back as a status.
// The argument vector goes straight to the binary, no shell in between.
export function execFileNoThrow(
  command: string,
  args: string[],
  options: ExecOptions = {},
): Promise<ExecResult> {
  const maxBytes = options.maxCaptureBytes ?? 1024 * 1024;

  return new Promise((resolve) => {
    const stdout = createCapture();
    const stderr = createCapture();
    let settled = false;
    let timedOut = false;
    let aborted = false;
    let timer: NodeJS.Timeout | undefined;

    const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });

    const onAbort = (): void => {
      aborted = true;
      child.kill('SIGKILL');
    };

    const finish = (status: number): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
      const result: ExecResult = { stdout: finalize(stdout), stderr: finalize(stderr), status };
      if (timedOut) result.timedOut = true;
      if (aborted) result.aborted = true;
      resolve(result);
    };

    if (options.timeoutMs && options.timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, options.timeoutMs);
      timer.unref();
    }

    if (options.signal) {
      if (options.signal.aborted) {
        onAbort();
      } else {
        options.signal.addEventListener('abort', onAbort, { once: true });
      }
    }

    child.stdout.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => appendChunk(stdout, chunk, maxBytes));
    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => appendChunk(stderr, chunk, maxBytes));

    // EPIPE when the child exits before reading its input
    child.stdin.on('error', () => {});

    child.on('error', (error: NodeJS.ErrnoException) => {
      if (!stderr.text) appendChunk(stderr, error.message, maxBytes);
      finish(error.code === 'ENOENT' ? 127 : 1);
    });

    child.on('close', (code) => {
      if (timedOut) {
        const prefix = stderr.bytes > 0 ? '\n' : '';
        appendChunk(stderr, `${prefix}Command timed out after ${options.timeoutMs}ms`, maxBytes);
        finish(124);
        return;
      }
      if (aborted) {
        finish(130);
        return;
      }
      finish(typeof code === 'number' ? code : 1);
    });

    if (typeof options.stdin === 'string') {
      child.stdin.end(options.stdin);
      return;
    }
    child.stdin.end();
  });
}
