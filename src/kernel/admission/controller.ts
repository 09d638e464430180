import { AdmissionExhaustedError, CancelledError } from '../errors.ts';

export interface AdmissionTicket {
  readonly id: number;
  readonly acquiredAt: Date;
}

export interface AcquireOptions {
  signal?: AbortSignal;
  /** 0 fails at once when no slot is free. */
  timeoutMs?: number;
}

export interface AdmissionStats {
  capacity: number;
  inUse: number;
  waiting: number;
}

interface Waiter {
  grant: (ticket: AdmissionTicket) => void;
  fail: (err: Error) => void;
}

/**
 * Bounds the number of sandboxes holding a slot. Waiters are served in
 * arrival order and a freed slot goes to the head of the queue, never to a
 * caller that arrives later.
 */
export class AdmissionController {
  private readonly capacity: number;
  private readonly defaultTimeoutMs: number;
  private readonly held = new Set<number>();
  private readonly queue: Waiter[] = [];
  private nextId = 1;
  private closed = false;

  constructor(capacity: number, opts: { timeoutMs?: number } = {}) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`admission capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.defaultTimeoutMs = opts.timeoutMs ?? 0;
  }

  acquire(opts: AcquireOptions = {}): Promise<AdmissionTicket> {
    const { signal } = opts;
    if (this.closed) return Promise.reject(new CancelledError('admission'));
    if (signal?.aborted) return Promise.reject(new CancelledError('admission'));

    if (this.held.size < this.capacity && this.queue.length === 0) {
      return Promise.resolve(this.issue());
    }

    const timeoutMs = opts.timeoutMs ?? this.defaultTimeoutMs;
    if (timeoutMs <= 0) {
      return Promise.reject(new AdmissionExhaustedError(this.capacity));
    }

    return new Promise<AdmissionTicket>((resolve, reject) => {
      const leave = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        const index = this.queue.indexOf(waiter);
        if (index !== -1) this.queue.splice(index, 1);
      };
      const onAbort = (): void => {
        leave();
        reject(new CancelledError('admission'));
      };
      const timer = setTimeout(() => {
        leave();
        reject(new AdmissionExhaustedError(this.capacity, timeoutMs));
      }, timeoutMs);
      const waiter: Waiter = {
        grant: (ticket) => {
          leave();
          resolve(ticket);
        },
        fail: (err) => {
          leave();
          reject(err);
        },
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(waiter);
    });
  }

  /** Returns false when the ticket was already released. */
  release(ticket: AdmissionTicket): boolean {
    if (!this.held.delete(ticket.id)) return false;

    const next = this.queue[0];
    if (next && !this.closed) {
      next.grant(this.issue());
    }
    return true;
  }

  close(): void {
    this.closed = true;
    for (const waiter of [...this.queue]) {
      waiter.fail(new CancelledError('admission'));
    }
  }

  stats(): AdmissionStats {
    return {
      capacity: this.capacity,
      inUse: this.held.size,
      waiting: this.queue.length,
    };
  }

  private issue(): AdmissionTicket {
    const ticket: AdmissionTicket = { id: this.nextId++, acquiredAt: new Date() };
    this.held.add(ticket.id);
    return ticket;
  }
}
