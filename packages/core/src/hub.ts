import { dataFrame } from './frames';
import { DEFAULT_QUEUE_CAPACITY, SubscriberQueue } from './queue';
import type { Notification, Tenant } from './types';

export type BroadcastResult = { delivered: number; dropped: number };

export type HubOptions = {
  /** Per-subscriber queue bound. */
  capacity?: number;
};

/**
 * Per-tenant fan-out of serialized frames to subscriber queues.
 *
 * All mutation happens synchronously inside a single call, so subscribe,
 * unsubscribe and broadcast interleave on the event loop without lost updates.
 * A tenant entry exists only while it has at least one subscriber.
 */
export class BroadcastHub {
  private readonly subscribers = new Map<Tenant, Set<SubscriberQueue>>();
  private readonly capacity: number;

  constructor(opts: HubOptions = {}) {
    this.capacity = opts.capacity ?? DEFAULT_QUEUE_CAPACITY;
  }

  subscribe(tenant: Tenant): SubscriberQueue {
    const queue = new SubscriberQueue(this.capacity);
    let set = this.subscribers.get(tenant);
    if (!set) {
      set = new Set();
      this.subscribers.set(tenant, set);
    }
    set.add(queue);
    return queue;
  }

  /** Remove and close `queue`. Calling it again for the same queue does nothing. */
  unsubscribe(tenant: Tenant, queue: SubscriberQueue): void {
    queue.close();
    const set = this.subscribers.get(tenant);
    if (!set) return;
    set.delete(queue);
    if (set.size === 0) this.subscribers.delete(tenant);
  }

  /**
   * Serialize once and offer the frame to every queue of `tenant`.
   * Full queues drop the frame and stay subscribed.
   */
  broadcast(tenant: Tenant, n: Notification): BroadcastResult {
    const set = this.subscribers.get(tenant);
    if (!set) return { delivered: 0, dropped: 0 };
    if (set.size === 0) {
      this.subscribers.delete(tenant);
      return { delivered: 0, dropped: 0 };
    }
    const frame = dataFrame(n);
    let delivered = 0;
    let dropped = 0;
    for (const queue of Array.from(set)) {
      if (queue.offer(frame)) delivered++;
      else dropped++;
    }
    return { delivered, dropped };
  }

  has(tenant: Tenant): boolean {
    return this.subscribers.has(tenant);
  }

  /** Subscriber count for one tenant, or across all tenants when omitted. */
  subscriberCount(tenant?: Tenant): number {
    if (tenant !== undefined) return this.subscribers.get(tenant)?.size ?? 0;
    let n = 0;
    for (const set of this.subscribers.values()) n += set.size;
    return n;
  }

  tenants(): Tenant[] {
    return Array.from(this.subscribers.keys());
  }

  /** Queues of one tenant, for status reporting. */
  queues(tenant: Tenant): readonly SubscriberQueue[] {
    return Array.from(this.subscribers.get(tenant) ?? []);
  }

  /** Close every queue and forget all tenants. */
  clear(): void {
    for (const set of this.subscribers.values()) {
      for (const queue of set) queue.close();
    }
    this.subscribers.clear();
  }
}
