type Release = () => void;

/**
 * FIFO mutual-exclusion lock. `acquire` resolves with a release function that must be called
 * exactly once.
 */
export class Mutex {
  private locked = false;
  private readonly queue: Array<() => void> = [];

  async acquire(): Promise<Release> {
    if (!this.locked) {
      this.locked = true;
      return this.createRelease();
    }

    return new Promise((resolve) => {
      this.queue.push(() => resolve(this.createRelease()));
    });
  }

  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;

      const next = this.queue.shift();
      if (next) {
        next();
      } else {
        this.locked = false;
      }
    };
  }
}

/**
 * Many concurrent readers or one writer. Once a writer is waiting, new readers queue behind it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readonly waitingReaders: Array<() => void> = [];
  private readonly waitingWriters: Array<() => void> = [];

  async read<T>(task: () => Promise<T> | T): Promise<T> {
    await this.acquireRead();
    try {
      return await task();
    } finally {
      this.releaseRead();
    }
  }

  async write<T>(task: () => Promise<T> | T): Promise<T> {
    await this.acquireWrite();
    try {
      return await task();
    } finally {
      this.releaseWrite();
    }
  }

  private acquireRead(): Promise<void> {
    if (!this.writing && this.waitingWriters.length === 0) {
      this.readers += 1;
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.waitingReaders.push(() => {
        this.readers += 1;
        resolve();
      });
    });
  }

  private releaseRead(): void {
    this.readers -= 1;
    if (this.readers === 0) {
      this.wakeWriter();
    }
  }

  private acquireWrite(): Promise<void> {
    if (!this.writing && this.readers === 0) {
      this.writing = true;
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      this.waitingWriters.push(() => {
        this.writing = true;
        resolve();
      });
    });
  }

  private releaseWrite(): void {
    this.writing = false;
    if (this.waitingWriters.length > 0) {
      this.wakeWriter();
      return;
    }

    const readers = this.waitingReaders.splice(0);
    readers.forEach((wake) => wake());
  }

  private wakeWriter(): void {
    const next = this.waitingWriters.shift();
    if (next) {
      next();
    }
  }
}
