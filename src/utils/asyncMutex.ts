/**
 * Async Mutex
 *
 * FIFO lock for async critical sections. The parser uses it to load one
 * grammar at a time, since the wasm runtime links grammars into a shared
 * module and overlapping loads corrupt each other.
 *
 * @module asyncMutex
 */

import { getLogger } from './logger.js';

/**
 * Async mutex with FIFO hand-off
 *
 * @example
 * ```typescript
 * const mutex = new AsyncMutex('grammars');
 * const grammar = await mutex.withLock(() => loadGrammar('java'));
 * ```
 */
export class AsyncMutex {
  private locked = false;
  private readonly waiters: Array<() => void> = [];
  private readonly name: string;

  constructor(name?: string) {
    this.name = name ?? 'AsyncMutex';
  }

  get isLocked(): boolean {
    return this.locked;
  }

  /** Callers waiting for the lock */
  get queueLength(): number {
    return this.waiters.length;
  }

  /**
   * Wait until the lock is held by the caller
   */
  acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Hand the lock to the oldest waiter, or unlock
   */
  release(): void {
    if (!this.locked) {
      getLogger().warn(this.name, 'release() called when mutex is not locked');
      return;
    }

    const next = this.waiters.shift();
    if (next) {
      // Lock stays held; ownership moves to the waiter
      next();
      return;
    }
    this.locked = false;
  }

  /**
   * Run `fn` while holding the lock, releasing it even when `fn` throws
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
