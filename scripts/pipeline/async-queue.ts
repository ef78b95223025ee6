/**
 * Bounded FIFO shared by producers and one consumer. Producers wait for space
 * instead of buffering without limit; waits on either side can be cancelled
 * with an `AbortSignal`. `undefined` is reserved as the "nothing" value, so
 * `T` should not include it.
 */
export class AsyncQueue<T> {
  private readonly items: T[] = [];
  private readonly takers: Array<(item: T) => void> = [];
  private readonly spaceWaiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /**
   * Adds `item`, waiting while the queue is full. Resolves to false when
   * `signal` aborts before space frees up; an item that fits right away is
   * always accepted.
   */
  async push(item: T, signal?: AbortSignal): Promise<boolean> {
    for (;;) {
      const taker = this.takers.shift();
      if (taker) {
        taker(item);
        return true;
      }
      if (this.items.length < this.capacity) {
        this.items.push(item);
        return true;
      }
      if (signal?.aborted) return false;
      if (!(await this.waitForSpace(signal))) return false;
    }
  }

  /** Takes the head without waiting. */
  poll(): T | undefined {
    if (this.items.length === 0) return undefined;
    const item = this.items.shift();
    this.spaceWaiters.shift()?.();
    return item;
  }

  /** Takes the head, waiting for one; `undefined` on abort or timeout. */
  shift(options: { signal?: AbortSignal; timeoutMs?: number } = {}): Promise<T | undefined> {
    const ready = this.poll();
    if (ready !== undefined) return Promise.resolve(ready);
    const { signal, timeoutMs } = options;
    if (signal?.aborted) return Promise.resolve(undefined);

    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined;
      const cleanup = () => {
        const index = this.takers.indexOf(taker);
        if (index >= 0) this.takers.splice(index, 1);
        if (timer) clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };
      const taker = (item: T) => {
        cleanup();
        resolve(item);
      };
      const onAbort = () => {
        cleanup();
        resolve(undefined);
      };
      this.takers.push(taker);
      signal?.addEventListener("abort", onAbort, { once: true });
      if (timeoutMs !== undefined) {
        timer = setTimeout(onAbort, Math.max(0, timeoutMs));
      }
    });
  }

  private waitForSpace(signal?: AbortSignal): Promise<boolean> {
    return new Promise((resolve) => {
      const wake = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve(true);
      };
      const onAbort = () => {
        const index = this.spaceWaiters.indexOf(wake);
        if (index >= 0) this.spaceWaiters.splice(index, 1);
        resolve(false);
      };
      this.spaceWaiters.push(wake);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
