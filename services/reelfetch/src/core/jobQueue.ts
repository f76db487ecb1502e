import { QueueSaturatedError } from './errors.js';

type Waiter<T> = (item: T | undefined) => void;

/**
 * Bounded FIFO intake buffer shared by the submission path and every worker.
 * `submit` never waits: a full buffer is reported back to the caller.
 * Each item is handed to exactly one `dequeue` caller.
 */
export class JobQueue<T extends { readonly id: string }> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error('capacity must be an integer >= 1');
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  submit(item: T): void {
    if (this.closed) {
      throw new Error('Job queue is closed');
    }
    if (this.waiters.length === 0 && this.items.length >= this.capacity) {
      throw new QueueSaturatedError(this.capacity);
    }
    this.push(item);
  }

  /** Re-admits a retried item at the back of the queue, regardless of capacity. */
  requeue(item: T): void {
    if (this.closed) {
      throw new Error('Job queue is closed');
    }
    this.push(item);
  }

  dequeue(): Promise<T | undefined> {
    const next = this.items.shift();
    if (next) return Promise.resolve(next);
    if (this.closed) return Promise.resolve(undefined);
    return new Promise<T | undefined>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  cancel(id: string): boolean {
    const index = this.items.findIndex((item) => item.id === id);
    if (index === -1) return false;
    this.items.splice(index, 1);
    return true;
  }

  has(id: string): boolean {
    return this.items.some((item) => item.id === id);
  }

  /** Stops the queue; pending `dequeue` calls resolve with `undefined`. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }

  private push(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
      return;
    }
    this.items.push(item);
  }
}
