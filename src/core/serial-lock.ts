/**
 * SerialLock -- the global serialization point for mutating operations
 *
 * Cast, undo, registration and issuance all contend for this one lock, so
 * sequence assignment, duplicate checks and the highest-sequence slot that
 * undo touches are never observed half-written.  Waiters are served in
 * FIFO order.  A waiter gives up after `timeoutMs` (TRANSIENT_CONFLICT)
 * or when its AbortSignal fires (CANCELLED); either way it never held the
 * lock and caused no side effects.
 *
 * @module serial-lock
 * @license AGPL-3.0-or-later
 */

import { VotingError } from "./errors";

interface Waiter {
  grant: () => void;
}

export interface AcquireOptions {
  /** Longest time to wait for the lock */
  timeoutMs: number;
  signal?: AbortSignal;
}

export class SerialLock {
  private held = false;

  private queue: Waiter[] = [];

  /** Whether an operation currently holds the lock */
  get isLocked(): boolean {
    return this.held;
  }

  /** Number of operations waiting */
  get pending(): number {
    return this.queue.length;
  }

  /**
   * Runs `fn` while holding the lock, releasing it however `fn` exits.
   */
  async runExclusive<T>(fn: () => T | Promise<T>, options: AcquireOptions): Promise<T> {
    await this.acquire(options);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire({ timeoutMs, signal }: AcquireOptions): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new VotingError("CANCELLED", "Operation was cancelled"));
    }

    if (!this.held) {
      this.held = true;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const leave = (): void => {
        this.queue = this.queue.filter((w) => w !== waiter);
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };

      const waiter: Waiter = {
        grant: () => {
          leave();
          resolve();
        },
      };

      const timer = setTimeout(() => {
        leave();
        reject(
          new VotingError(
            "TRANSIENT_CONFLICT",
            `Timed out after ${timeoutMs}ms waiting for another operation`
          )
        );
      }, timeoutMs);

      const onAbort = (): void => {
        leave();
        reject(new VotingError("CANCELLED", "Operation was cancelled"));
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.queue.push(waiter);
    });
  }

  private release(): void {
    const next = this.queue[0];
    if (next) {
      // ownership passes directly; `held` stays true
      next.grant();
    } else {
      this.held = false;
    }
  }
}
