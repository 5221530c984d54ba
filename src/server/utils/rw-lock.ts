/**
 * Multi-reader / single-writer lock for async critical sections.
 *
 * Readers share the lock; a writer waits for active readers to drain and then
 * holds it alone. Waiters are served in arrival order, so a queued writer is
 * not starved by readers arriving after it.
 *
 * A critical section that throws poisons the lock: the section may have left
 * the guarded data half-updated, so every later acquisition fails with
 * PoisonedCacheError instead of exposing it.
 */

import { PoisonedCacheError } from './errors';

type Waiter = { mode: 'read' | 'write'; grant: () => void };

export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private queue: Waiter[] = [];
  private poisonCause: unknown = null;
  private poisoned = false;

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('read');
    try {
      return await this.run(fn);
    } finally {
      this.releaseRead();
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('write');
    try {
      return await this.run(fn);
    } finally {
      this.releaseWrite();
    }
  }

  private async run<T>(fn: () => T | Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      this.poisoned = true;
      this.poisonCause = error;
      throw error;
    }
  }

  private acquire(mode: 'read' | 'write'): Promise<void> {
    if (this.poisoned) {
      return Promise.reject(new PoisonedCacheError(this.poisonCause));
    }

    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.queue.push({
        mode,
        grant: () => {
          if (this.poisoned) {
            reject(new PoisonedCacheError(this.poisonCause));
            return;
          }
          this.take(mode);
          resolve();
        },
      });
    });
  }

  private canGrant(mode: 'read' | 'write'): boolean {
    if (mode === 'read') {
      return !this.writing;
    }
    return !this.writing && this.readers === 0;
  }

  private take(mode: 'read' | 'write'): void {
    if (mode === 'read') {
      this.readers += 1;
    } else {
      this.writing = true;
    }
  }

  private releaseRead(): void {
    this.readers -= 1;
    this.drain();
  }

  private releaseWrite(): void {
    this.writing = false;
    this.drain();
  }

  private drain(): void {
    // Poisoned: wake everyone so they fail instead of waiting forever
    if (this.poisoned) {
      const waiters = this.queue;
      this.queue = [];
      waiters.forEach(waiter => waiter.grant());
      return;
    }

    while (this.queue.length > 0 && this.canGrant(this.queue[0].mode)) {
      const next = this.queue.shift();
      if (!next) {
        break;
      }
      next.grant();
      if (next.mode === 'write') {
        break;
      }
    }
  }
}
