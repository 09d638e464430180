export type SandboxErrorCode =
  | 'ADMISSION_EXHAUSTED'
  | 'INVALID_TRANSITION'
  | 'RUNTIME_ERROR'
  | 'SESSION_TIMEOUT'
  | 'SESSION_CLOSED'
  | 'NOT_FOUND'
  | 'SETUP_FAILED'
  | 'CANCELLED'
  | 'INVALID_REQUEST';

export interface ErrorContext {
  sandboxId?: string;
  operation?: string;
  container?: string;
}

export class SandboxError extends Error {
  readonly code: SandboxErrorCode;
  readonly retryable: boolean;
  readonly context: ErrorContext;

  constructor(
    code: SandboxErrorCode,
    message: string,
    opts: { retryable?: boolean; context?: ErrorContext; cause?: unknown } = {},
  ) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.retryable = opts.retryable ?? false;
    this.context = opts.context ?? {};
  }
}

export class AdmissionExhaustedError extends SandboxError {
  constructor(capacity: number, waitedMs = 0) {
    const suffix = waitedMs > 0 ? ` after waiting ${waitedMs}ms` : '';
    super('ADMISSION_EXHAUSTED', `All ${capacity} sandbox slots are in use${suffix}`, {
      retryable: true,
    });
  }
}

export class InvalidTransitionError extends SandboxError {
  readonly from: string;
  readonly to: string;

  constructor(sandboxId: string, from: string, to: string, detail?: string) {
    const base = `Invalid transition: ${from} -> ${to} for sandbox ${sandboxId}`;
    super('INVALID_TRANSITION', detail ? `${base} (${detail})` : base, {
      context: { sandboxId },
    });
    this.from = from;
    this.to = to;
  }
}

export class RuntimeError extends SandboxError {
  constructor(operation: string, detail: string, context: ErrorContext = {}, cause?: unknown) {
    const target = context.container ? ` ${context.container}` : '';
    super('RUNTIME_ERROR', `container ${operation}${target} failed: ${detail}`, {
      retryable: true,
      context: { ...context, operation },
      cause,
    });
  }
}

export class SessionTimeoutError extends SandboxError {
  constructor(timeoutMs: number, context: ErrorContext = {}) {
    super('SESSION_TIMEOUT', `No command completion observed within ${timeoutMs}ms`, { context });
  }
}

export class SessionClosedError extends SandboxError {
  constructor(reason: string, context: ErrorContext = {}) {
    super('SESSION_CLOSED', `Shell session closed: ${reason}`, { context });
  }
}

export class NotFoundError extends SandboxError {
  constructor(sandboxId: string) {
    super('NOT_FOUND', `Sandbox ${sandboxId} not found`, { context: { sandboxId } });
  }
}

export class SetupFailedError extends SandboxError {
  readonly exitCode: number;
  readonly output: string;

  constructor(sandboxId: string, exitCode: number, output: string) {
    super('SETUP_FAILED', `Setup commands exited with ${exitCode}: ${output.trim()}`, {
      context: { sandboxId, operation: 'setup' },
    });
    this.exitCode = exitCode;
    this.output = output;
  }
}

export class CancelledError extends SandboxError {
  constructor(operation: string, context: ErrorContext = {}) {
    super('CANCELLED', `${operation} was cancelled`, { context: { ...context, operation } });
  }
}

export class InvalidRequestError extends SandboxError {
  constructor(message: string) {
    super('INVALID_REQUEST', message);
  }
}

export function isSandboxError(err: unknown): err is SandboxError {
  return err instanceof SandboxError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
