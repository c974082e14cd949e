import { AbortError } from '../errors.js';

/**
 * Reserved queue value meaning "no more items will arrive"
 */
export const END_OF_LANE: unique symbol = Symbol('END_OF_LANE');

export type LaneItem<T> = T | typeof END_OF_LANE;

interface Waiter<T> {
  resolve: (item: LaneItem<T>) => void;
  detach: () => void;
}

/**
 * Unbounded in-process FIFO with a terminating sentinel.
 *
 * One producer, one consumer. `put` never blocks. `close` enqueues the
 * sentinel once; after the consumer has seen it every further `get`
 * resolves to END_OF_LANE immediately, so a consumer can never block on
 * a finished lane.
 */
export class LaneQueue<T> {
  readonly name: string;
  private items: Array<LaneItem<T>> = [];
  private waiters: Array<Waiter<T>> = [];
  private closed = false;
  private drained = false;

  constructor(name: string) {
    this.name = name;
  }

  /** Number of real items waiting */
  get size(): number {
    return this.closed ? this.items.length - 1 : this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  put(item: T): void {
    if (this.closed) {
      throw new Error(`[LaneQueue] ${this.name} is closed`);
    }
    this.deliver(item);
  }

  /**
   * Enqueue the sentinel. Idempotent: only the first call enqueues.
   * Returns true when this call closed the queue.
   */
  close(): boolean {
    if (this.closed) return false;
    this.closed = true;
    this.deliver(END_OF_LANE);
    return true;
  }

  get(signal?: AbortSignal): Promise<LaneItem<T>> {
    if (this.drained) {
      return Promise.resolve(END_OF_LANE);
    }

    const head = this.items.shift();
    if (head !== undefined) {
      if (head === END_OF_LANE) this.drained = true;
      return Promise.resolve(head);
    }

    if (signal?.aborted) {
      return Promise.reject(new AbortError(`${this.name}: get aborted`));
    }

    return new Promise<LaneItem<T>>((resolve, reject) => {
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        reject(new AbortError(`${this.name}: get aborted`));
      };

      const waiter: Waiter<T> = {
        resolve: (item) => {
          if (item === END_OF_LANE) this.drained = true;
          resolve(item);
        },
        detach: () => signal?.removeEventListener('abort', onAbort),
      };

      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /**
   * Yield real items in order until the sentinel is seen
   */
  async *drain(signal?: AbortSignal): AsyncGenerator<T, void, undefined> {
    while (true) {
      const item = await this.get(signal);
      if (item === END_OF_LANE) return;
      yield item;
    }
  }

  private deliver(item: LaneItem<T>): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.detach();
      waiter.resolve(item);
      return;
    }
    this.items.push(item);
  }
}
