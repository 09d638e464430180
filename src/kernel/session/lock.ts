import { CancelledError } from '../errors.ts';

type Release = () => void;

interface Waiter {
  grant: (release: Release) => void;
}

// FIFO mutex. The release function is safe to call more than once.
export class ExecutionLock {
  private held = false;
  private readonly queue: Waiter[] = [];

  get locked(): boolean {
    return this.held;
  }

  get waiting(): number {
    return this.queue.length;
  }

  acquire(signal?: AbortSignal): Promise<Release> {
    if (signal?.aborted) return Promise.reject(new CancelledError('exec'));

    if (!this.held && this.queue.length === 0) {
      this.held = true;
      return Promise.resolve(this.releaser());
    }

    return new Promise<Release>((resolve, reject) => {
      const onAbort = (): void => {
        const index = this.queue.indexOf(waiter);
        if (index !== -1) this.queue.splice(index, 1);
        reject(new CancelledError('exec'));
      };
      const waiter: Waiter = {
        grant: (release) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(release);
        },
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.queue.push(waiter);
    });
  }

  private releaser(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.queue.shift();
      if (next) {
        next.grant(this.releaser());
      } else {
        this.held = false;
      }
    };
  }
}
