import { NotifyError } from './errors';
import { CONNECTED_FRAME, HEARTBEAT_FRAME } from './frames';
import type { BroadcastHub } from './hub';
import type { SubscriberQueue } from './queue';
import type { Tenant } from './types';

export const DEFAULT_HEARTBEAT_MS = 1000;

/** Outbound side of one client connection. */
export interface StreamTransport {
  /** Returns false when the connection's buffer is full; wait for `drained()` before writing again. */
  write(frame: string): boolean;
  /** Resolves once buffered output has been flushed or the connection is gone. */
  drained(): Promise<void>;
  /** Non-blocking check of the connection state. */
  readonly disconnected: boolean;
}

export type SessionState = 'connecting' | 'streaming' | 'closed';

export type StreamSessionOptions = {
  /** Longest idle gap before a heartbeat frame is written. */
  heartbeatMs?: number;
};

/**
 * Connecting → Streaming → Closed.
 *
 * `run()` subscribes, writes the connected frame, then forwards queued frames
 * and heartbeats until the transport reports a disconnect or the session is
 * closed. While the transport is saturated nothing is taken from the queue.
 * The subscription is released on every exit path.
 */
export class StreamSession {
  private current: SessionState = 'connecting';
  private queue: SubscriberQueue | null = null;
  private readonly heartbeatMs: number;

  constructor(
    private readonly hub: BroadcastHub,
    readonly tenant: Tenant,
    private readonly transport: StreamTransport,
    opts: StreamSessionOptions = {},
  ) {
    this.heartbeatMs = opts.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
  }

  get state(): SessionState {
    return this.current;
  }

  async run(): Promise<void> {
    if (this.current !== 'connecting') throw new NotifyError(`session cannot start from state ${this.current}`);
    const queue = this.hub.subscribe(this.tenant);
    this.queue = queue;
    try {
      let flushed = this.transport.write(CONNECTED_FRAME);
      this.current = 'streaming';
      while (!this.transport.disconnected) {
        // a saturated client stops draining its queue, so the hub drops for it
        if (!flushed) {
          await Promise.race([this.transport.drained(), queue.whenClosed()]);
          if (queue.isClosed || this.transport.disconnected) break;
        }
        const next = await queue.take(this.heartbeatMs);
        if (next.status === 'closed' || this.transport.disconnected) break;
        flushed = this.transport.write(next.status === 'item' ? next.value : HEARTBEAT_FRAME);
      }
    } finally {
      this.hub.unsubscribe(this.tenant, queue);
      this.queue = null;
      this.current = 'closed';
    }
  }

  /** End the session from the server side; a pending `run()` settles promptly. */
  close(): void {
    if (this.queue) {
      this.hub.unsubscribe(this.tenant, this.queue);
      return;
    }
    if (this.current === 'connecting') this.current = 'closed';
  }
}
