/** Async mutual exclusion; waiters are served in arrival order. */
export class Mutex {
  private locked = false;
  private readonly waiters: Array<() => void> = [];

  private acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    this.locked = false;
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

type LockMode = "read" | "write";

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

/**
 * Shared/exclusive lock. Requests are granted in arrival order, so a reader
 * that arrives while a writer is queued waits behind it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writer = false;
  private readonly queue: Waiter[] = [];

  get activeReaders(): number {
    return this.readers;
  }

  get writeLocked(): boolean {
    return this.writer;
  }

  private canGrant(mode: LockMode): boolean {
    return mode === "read" ? !this.writer : !this.writer && this.readers === 0;
  }

  private take(mode: LockMode): void {
    if (mode === "read") {
      this.readers += 1;
    } else {
      this.writer = true;
    }
  }

  private acquire(mode: LockMode): Promise<void> {
    if (this.queue.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.queue.push({ mode, grant: resolve });
    });
  }

  private release(mode: LockMode): void {
    if (mode === "read") {
      this.readers -= 1;
    } else {
      this.writer = false;
    }

    let head = this.queue[0];
    while (head && this.canGrant(head.mode)) {
      this.queue.shift();
      this.take(head.mode);
      head.grant();
      if (head.mode === "write") {
        break;
      }
      head = this.queue[0];
    }
  }

  private async run<T>(mode: LockMode, fn: () => Promise<T> | T): Promise<T> {
    await this.acquire(mode);
    try {
      return await fn();
    } finally {
      this.release(mode);
    }
  }

  runRead<T>(fn: () => Promise<T> | T): Promise<T> {
    return this.run("read", fn);
  }

  runWrite<T>(fn: () => Promise<T> | T): Promise<T> {
    return this.run("write", fn);
  }
}
