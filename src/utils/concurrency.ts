/**
 * Cooperative concurrency primitives for logical tasks sharing the event loop:
 * an exclusive lock, a set/clear signal and an async FIFO queue.
 */

/**
 * Exclusive async lock. Waiters are served in FIFO order and the lock is released
 * on every exit path of `runExclusive`, including rejections.
 */
export class AsyncLock {
  private locked = false;
  private waiters: Array<() => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const grant = (): void => {
        this.locked = true;
        let released = false;
        resolve(() => {
          if (released) return;
          released = true;
          this.release();
        });
      };

      if (!this.locked) {
        grant();
      } else {
        this.waiters.push(grant);
      }
    });
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }
}

/**
 * A manual-reset event. `wait()` resolves immediately while the signal is set and
 * otherwise parks the caller until `set()`.
 */
export class Signal {
  private isSetFlag: boolean;
  private waiters: Array<() => void> = [];

  constructor(initiallySet: boolean = false) {
    this.isSetFlag = initiallySet;
  }

  get isSet(): boolean {
    return this.isSetFlag;
  }

  set(): void {
    this.isSetFlag = true;
    const waiters = this.waiters;
    this.waiters = [];
    waiters.forEach((wake) => wake());
  }

  clear(): void {
    this.isSetFlag = false;
  }

  wait(): Promise<void> {
    if (this.isSetFlag) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }
}

interface PendingRead<T> {
  resolve: (value: T | null) => void;
  reject: (error: Error) => void;
}

/**
 * Unbounded async FIFO. `next()` resolves with the next item, with `null` once the
 * queue is closed and drained, or rejects once the queue has failed.
 */
export class AsyncQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private readers: PendingRead<T>[] = [];
  private closed = false;
  private failure: Error | null = null;

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed || this.failure !== null;
  }

  push(item: T): boolean {
    if (this.isClosed) return false;
    const reader = this.readers.shift();
    if (reader) {
      reader.resolve(item);
    } else {
      this.items.push(item);
    }
    return true;
  }

  /**
   * Removes and returns the oldest queued item
   */
  shift(): T | undefined {
    return this.items.shift();
  }

  clear(): void {
    this.items = [];
  }

  close(): void {
    if (this.isClosed) return;
    this.closed = true;
    const readers = this.readers;
    this.readers = [];
    readers.forEach((reader) => reader.resolve(null));
  }

  fail(error: Error): void {
    if (this.isClosed) return;
    this.failure = error;
    const readers = this.readers;
    this.readers = [];
    readers.forEach((reader) => reader.reject(error));
  }

  next(): Promise<T | null> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      if (item !== undefined) return Promise.resolve(item);
    }
    if (this.failure) return Promise.reject(this.failure);
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve, reject) => {
      this.readers.push({ resolve, reject });
    });
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      const item = await this.next();
      if (item === null) return;
      yield item;
    }
  }
}
