import { DetectionError, abortError, isAbortError, messageOf } from './errors';
import type { BroadcastHub, BroadcastResult } from './hub';
import type { DetectorRegistry } from './registry';
import { sleep } from './timers';
import type { Detection, Tenant } from './types';

export const DEFAULT_POLL_INTERVAL_MS = 3000;

/** Hooks for logging and metrics; the loop itself never logs. */
export interface PollObserver {
  tick?(tenants: number): void;
  broadcast?(tenant: Tenant, topics: readonly string[], result: BroadcastResult): void;
  detectionFailed?(err: DetectionError): void;
  loopFailed?(err: unknown): void;
}

export type PollLoopOptions = {
  intervalMs?: number;
  /** Wait before the next tick after a failure outside a single detector. Defaults to the interval. */
  backoffMs?: number;
  observer?: PollObserver;
};

/**
 * Single background task that polls every registered detector on a fixed
 * cadence and broadcasts non-empty deltas. Tenants are polled one after
 * another, so a tenant never has two polls in flight.
 */
export class PollLoop {
  private readonly intervalMs: number;
  private readonly backoffMs: number;
  private readonly observer: PollObserver;
  private controller: AbortController | null = null;
  private task: Promise<void> | null = null;
  private inFlight: Promise<number> | null = null;

  constructor(
    private readonly detectors: DetectorRegistry,
    private readonly hub: BroadcastHub,
    opts: PollLoopOptions = {},
  ) {
    this.intervalMs = opts.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.backoffMs = opts.backoffMs ?? this.intervalMs;
    this.observer = opts.observer ?? {};
  }

  get running(): boolean {
    return this.task !== null;
  }

  /** Start the loop. A second call while running is ignored. */
  start(): void {
    if (this.task) return;
    const controller = new AbortController();
    this.controller = controller;
    this.task = this.run(controller.signal);
  }

  /** Cancel the loop and wait until its current iteration has finished. */
  async stop(): Promise<void> {
    const task = this.task;
    if (!task) return;
    this.controller?.abort();
    try {
      await task;
    } finally {
      this.task = null;
      this.controller = null;
    }
  }

  /**
   * Poll every registered tenant once. Returns the number of broadcasts.
   * Concurrent callers share the tick already in flight.
   */
  pollOnce(signal?: AbortSignal): Promise<number> {
    if (this.inFlight) return this.inFlight;
    const tick = this.tick(signal).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = tick;
    return tick;
  }

  private async run(signal: AbortSignal): Promise<void> {
    let delay = this.intervalMs;
    while (!signal.aborted) {
      try {
        await sleep(delay, signal);
        delay = this.intervalMs;
        await this.pollOnce(signal);
      } catch (err) {
        if (isAbortError(err)) break;
        this.reportLoopFailure(err);
        delay = this.backoffMs;
      }
    }
  }

  /** Hand a loop failure to the observer; a throwing hook becomes a process warning. */
  private reportLoopFailure(err: unknown): void {
    try {
      this.observer.loopFailed?.(err);
    } catch (hookErr) {
      process.emitWarning(`poll loop failure hook threw: ${messageOf(hookErr)}`, {
        type: 'PollLoopWarning',
        detail: messageOf(err),
      });
    }
  }

  private async tick(signal?: AbortSignal): Promise<number> {
    const entries = this.detectors.entries();
    this.observer.tick?.(entries.length);
    let broadcasts = 0;
    for (const [tenant, detector] of entries) {
      if (signal?.aborted) throw abortError();
      let detection: Detection;
      try {
        detection = await detector.detect();
      } catch (err) {
        this.observer.detectionFailed?.(err instanceof DetectionError ? err : new DetectionError(tenant, err));
        continue;
      }
      if (!detection.changed || detection.topics.length === 0) continue;
      const result = this.hub.broadcast(tenant, {
        type: 'parameter_values_changed',
        parameters: [...detection.topics],
      });
      this.observer.broadcast?.(tenant, detection.topics, result);
      broadcasts++;
    }
    return broadcasts;
  }
}
