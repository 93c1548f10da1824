import { ConfigError } from './errors.js';
import { FifoQueue } from './fifo-queue.js';

export const DEFAULT_MAX_SIMULTANEOUS_CONNECTIONS = 20;

export interface Permit {
  /** Returns the permit to the pool. Calls after the first are no-ops. */
  readonly release: () => void;
  readonly released: () => boolean;
}

interface Waiter {
  readonly grant: () => void;
}

function abortReason(signal: AbortSignal | undefined): unknown {
  if (signal?.reason !== undefined) return signal.reason;
  const error = new Error('Permit wait aborted');
  error.name = 'AbortError';
  return error;
}

/**
 * Counting-permit pool with a capacity fixed at construction. `acquire()`
 * suspends until a permit is free; waiters are granted in arrival order.
 */
export class ConnectionAdmission {
  private held = 0;
  private readonly waiters = new FifoQueue<Waiter>();

  constructor(readonly capacity = DEFAULT_MAX_SIMULTANEOUS_CONNECTIONS) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ConfigError(
        `Admission capacity must be a positive integer, got ${capacity}`
      );
    }
  }

  get inUse(): number {
    return this.held;
  }

  get available(): number {
    return this.capacity - this.held;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  async acquire(signal?: AbortSignal): Promise<Permit> {
    signal?.throwIfAborted();

    if (this.held < this.capacity) {
      this.held += 1;
      return this.createPermit();
    }

    await new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        this.waiters.remove(waiter);
        reject(abortReason(signal));
      };
      const waiter: Waiter = {
        grant: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
      };

      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });

    // The releasing holder handed its slot straight to this waiter.
    return this.createPermit();
  }

  /** Pairs 1:1 with a prior `acquire()`; prefer `Permit.release()`. */
  release(): void {
    if (this.held === 0) {
      throw new Error('release() called without a matching acquire()');
    }

    const next = this.waiters.shift();
    if (next) {
      next.grant();
      return;
    }
    this.held -= 1;
  }

  private createPermit(): Permit {
    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.release();
      },
      released: () => released,
    };
  }
}
