type Consumer<T> = (item: T | undefined) => void;

/**
 * Unbounded FIFO shared by async tasks.
 *
 * `tryDequeue` never waits and returns `undefined` when empty. `dequeue` waits
 * for an item and resolves `undefined` once the queue is closed or the
 * caller's signal aborts. `join` resolves when every enqueued item has been
 * marked with `taskDone`.
 */
export class AsyncQueue<T extends object> {
  private readonly items: T[] = [];
  private readonly consumers: Array<Consumer<T>> = [];
  private joiners: Array<() => void> = [];
  private unfinished = 0;
  private closed = false;

  get size(): number {
    return this.items.length;
  }

  get pending(): number {
    return this.unfinished;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  enqueue(item: T): void {
    if (this.closed) {
      throw new Error("cannot enqueue on a closed queue");
    }
    this.unfinished += 1;
    const consumer = this.consumers.shift();
    if (consumer) {
      consumer(item);
      return;
    }
    this.items.push(item);
  }

  tryDequeue(): T | undefined {
    return this.items.shift();
  }

  dequeue(signal?: AbortSignal): Promise<T | undefined> {
    const next = this.items.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.closed || signal?.aborted) return Promise.resolve(undefined);

    return new Promise<T | undefined>((resolve) => {
      const onAbort = () => {
        const index = this.consumers.indexOf(consumer);
        if (index >= 0) this.consumers.splice(index, 1);
        resolve(undefined);
      };
      const consumer: Consumer<T> = (item) => {
        signal?.removeEventListener("abort", onAbort);
        resolve(item);
      };
      this.consumers.push(consumer);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  taskDone(): void {
    if (this.unfinished === 0) {
      throw new Error("taskDone() called more times than items were enqueued");
    }
    this.unfinished -= 1;
    if (this.unfinished === 0) {
      const joiners = this.joiners;
      this.joiners = [];
      for (const wake of joiners) wake();
    }
  }

  join(): Promise<void> {
    if (this.unfinished === 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.joiners.push(resolve);
    });
  }

  /** Wakes every waiting consumer with `undefined`; queued items stay poppable. */
  close(): void {
    this.closed = true;
    const consumers = this.consumers.splice(0);
    for (const consumer of consumers) consumer(undefined);
  }
}
