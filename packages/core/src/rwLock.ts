type Release = () => void;

/**
 * FIFO exclusive lock. Serializes whole debug runs: a new run waits here until
 * the previous run's ingestion task has returned.
 */
export class AsyncMutex {
  private locked = false;
  private queue: Array<() => void> = [];

  async acquire(): Promise<Release> {
    if (!this.locked) {
      this.locked = true;
      return this.createRelease();
    }
    return new Promise<Release>((resolve) => {
      this.queue.push(() => {
        resolve(this.createRelease());
      });
    });
  }

  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get isLocked(): boolean {
    return this.locked;
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.queue.shift();
      if (next) {
        queueMicrotask(next);
      } else {
        this.locked = false;
      }
    };
  }
}

/**
 * Reader/writer lock with writer preference: once a writer is queued, new
 * readers wait behind it. Ownership is assigned when a waiter is woken, so the
 * lock is never observed free between a release and the next holder.
 */
export class AsyncRWLock {
  private readers = 0;
  private writer = false;
  private readerQueue: Array<(release: Release) => void> = [];
  private writerQueue: Array<(release: Release) => void> = [];

  async acquireRead(): Promise<Release> {
    if (!this.writer && this.writerQueue.length === 0) {
      this.readers += 1;
      return this.createReadRelease();
    }
    return new Promise<Release>((resolve) => {
      this.readerQueue.push(resolve);
    });
  }

  async acquireWrite(): Promise<Release> {
    if (!this.writer && this.readers === 0) {
      this.writer = true;
      return this.createWriteRelease();
    }
    return new Promise<Release>((resolve) => {
      this.writerQueue.push(resolve);
    });
  }

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireRead();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquireWrite();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  get readerCount(): number {
    return this.readers;
  }

  get isWriteLocked(): boolean {
    return this.writer;
  }

  private createReadRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.readers -= 1;
      this.processQueue();
    };
  }

  private createWriteRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.writer = false;
      this.processQueue();
    };
  }

  private processQueue(): void {
    if (this.writer) return;
    if (this.readers === 0) {
      const nextWriter = this.writerQueue.shift();
      if (nextWriter) {
        this.writer = true;
        const release = this.createWriteRelease();
        queueMicrotask(() => nextWriter(release));
        return;
      }
    }
    if (this.writerQueue.length > 0) return;
    const readers = this.readerQueue;
    this.readerQueue = [];
    for (const reader of readers) {
      this.readers += 1;
      const release = this.createReadRelease();
      queueMicrotask(() => reader(release));
    }
  }
}
