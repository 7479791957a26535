/**
 * In-process reader/writer lock for engine state
 *
 * Readers share the lock; a writer holds it alone. Grants are FIFO and a
 * queued writer blocks readers that arrive after it, so a steady stream of
 * reads cannot starve a write.
 */

type Waiter = { mode: "read" | "write"; resolve: () => void };

export class ReadWriteLock {
  #readers = 0;
  #writer = false;
  #queue: Waiter[] = [];

  async acquireRead(): Promise<void> {
    if (!this.#writer && this.#queue.length === 0) {
      this.#readers++;
      return;
    }

    await new Promise<void>((resolve) => {
      this.#queue.push({ mode: "read", resolve });
    });
  }

  async acquireWrite(): Promise<void> {
    if (!this.#writer && this.#readers === 0 && this.#queue.length === 0) {
      this.#writer = true;
      return;
    }

    await new Promise<void>((resolve) => {
      this.#queue.push({ mode: "write", resolve });
    });
  }

  releaseRead(): void {
    if (this.#readers === 0) {
      throw new Error("releaseRead() called without a held read lock");
    }
    this.#readers--;
    this.#grant();
  }

  releaseWrite(): void {
    if (!this.#writer) {
      throw new Error("releaseWrite() called without a held write lock");
    }
    this.#writer = false;
    this.#grant();
  }

  /**
   * Hand the lock to the next waiters: one writer, or every reader up to the next writer
   */
  #grant(): void {
    if (this.#writer) return;

    while (this.#queue.length > 0) {
      const next = this.#queue[0];
      if (!next) return;

      if (next.mode === "write") {
        if (this.#readers > 0) return;
        this.#queue.shift();
        this.#writer = true;
        next.resolve();
        return;
      }

      this.#queue.shift();
      this.#readers++;
      next.resolve();
    }
  }

  async withRead<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquireRead();
    try {
      return await fn();
    } finally {
      this.releaseRead();
    }
  }

  async withWrite<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquireWrite();
    try {
      return await fn();
    } finally {
      this.releaseWrite();
    }
  }

  /**
   * Current holders, for diagnostics and tests
   */
  get state(): { readers: number; writer: boolean; waiting: number } {
    return { readers: this.#readers, writer: this.#writer, waiting: this.#queue.length };
  }
}
