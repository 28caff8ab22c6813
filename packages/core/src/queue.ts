export type Take<T> =
  | { status: 'item'; value: T }
  | { status: 'timeout' }
  | { status: 'closed' };

export const DEFAULT_QUEUE_CAPACITY = 100;

/**
 * Bounded FIFO with a single consumer.
 * `offer` never waits: a full queue rejects the item and counts the drop.
 */
export class SubscriberQueue<T = string> {
  private readonly items: T[] = [];
  private waiter: ((r: Take<T>) => void) | null = null;
  private closed = false;
  private dropped = 0;
  private consecutiveDrops = 0;
  private closedSignal: Promise<void> | null = null;
  private signalClosed: (() => void) | null = null;

  constructor(readonly capacity = DEFAULT_QUEUE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`queue capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Items rejected because the queue was full, over its lifetime. */
  get droppedCount(): number {
    return this.dropped;
  }

  /** Drops since the last accepted item; resets whenever the consumer catches up. */
  get consecutiveDropCount(): number {
    return this.consecutiveDrops;
  }

  /** Enqueue without waiting. Returns false when the item was dropped. */
  offer(item: T): boolean {
    if (this.closed) return false;
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      this.consecutiveDrops = 0;
      waiter({ status: 'item', value: item });
      return true;
    }
    if (this.items.length >= this.capacity) {
      this.dropped++;
      this.consecutiveDrops++;
      return false;
    }
    this.items.push(item);
    this.consecutiveDrops = 0;
    return true;
  }

  /** Wait up to `timeoutMs` for the next item. */
  take(timeoutMs: number): Promise<Take<T>> {
    if (this.items.length > 0) {
      const [value] = this.items.splice(0, 1);
      return Promise.resolve({ status: 'item', value });
    }
    if (this.closed) return Promise.resolve({ status: 'closed' });
    if (this.waiter) return Promise.reject(new Error('queue already has a pending consumer'));
    return new Promise(resolve => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const settle = (r: Take<T>) => {
        clearTimeout(timer);
        resolve(r);
      };
      this.waiter = settle;
      timer = setTimeout(() => {
        if (this.waiter !== settle) return;
        this.waiter = null;
        resolve({ status: 'timeout' });
      }, timeoutMs);
    });
  }

  /** Resolves once the queue has been closed. */
  whenClosed(): Promise<void> {
    if (this.closed) return Promise.resolve();
    this.closedSignal ??= new Promise(resolve => {
      this.signalClosed = resolve;
    });
    return this.closedSignal;
  }

  /** Discard pending items and wake a waiting consumer. Idempotent. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.items.length = 0;
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.({ status: 'closed' });
    this.signalClosed?.();
    this.signalClosed = null;
  }
}
