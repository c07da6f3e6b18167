/** Reserved queue item telling a worker there is no more work. */
export const END_OF_WORK: unique symbol = Symbol('end-of-work');
export type EndOfWork = typeof END_OF_WORK;

interface Taker<T> {
  resolve(item: T | undefined): void;
  timer: NodeJS.Timeout;
}

interface Putter<T> {
  item: T;
  resolve(): void;
}

/**
 * Bounded FIFO shared by the subscriber (producer) and the workers (consumers).
 *
 * `put` never drops: when the queue is full the producer waits for a slot.
 * `take` waits at most `timeoutMs` and resolves `undefined` on timeout, so an
 * idle consumer gets a chance to look at its stop signal.
 */
export class FrameQueue<T> {
  private readonly items: T[] = [];
  private readonly takers: Taker<T>[] = [];
  private readonly putters: Putter<T>[] = [];

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  /** Producers currently blocked on a full queue. */
  get blockedProducers(): number {
    return this.putters.length;
  }

  put(item: T): Promise<void> {
    const taker = this.takers.shift();
    if (taker) {
      clearTimeout(taker.timer);
      taker.resolve(item);
      return Promise.resolve();
    }
    if (this.items.length < this.capacity) {
      this.items.push(item);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.putters.push({ item, resolve });
    });
  }

  /**
   * Enqueue without waiting for a free slot. Reserved for the handful of
   * end-of-work sentinels, which must never block shutdown.
   */
  push(item: T): void {
    const taker = this.takers.shift();
    if (taker) {
      clearTimeout(taker.timer);
      taker.resolve(item);
      return;
    }
    this.items.push(item);
  }

  take(timeoutMs: number): Promise<T | undefined> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      this.admitPutter();
      return Promise.resolve(item);
    }
    return new Promise<T | undefined>((resolve) => {
      const taker: Taker<T> = {
        resolve,
        timer: setTimeout(() => {
          const i = this.takers.indexOf(taker);
          if (i !== -1) this.takers.splice(i, 1);
          resolve(undefined);
        }, timeoutMs),
      };
      this.takers.push(taker);
    });
  }

  // A slot just freed up: move the longest-waiting producer's item in.
  private admitPutter(): void {
    const putter = this.putters.shift();
    if (!putter) return;
    this.items.push(putter.item);
    putter.resolve();
  }
}
