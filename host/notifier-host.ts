import {
  BroadcastHub,
  DetectorRegistry,
  PollLoop,
  StreamSession,
  describeTenant,
  type ChangeSource,
  type PollObserver,
  type StreamTransport,
  type Tenant,
} from "@labframe/notify-core";
import type { OpenStream, StreamHost } from "../adapters/types";
import { createLogger, type Logger } from "./logger";
import { metrics as sharedMetrics, type Metrics } from "./metrics";

export type NotifierHostOptions = {
  pollIntervalMs?: number;
  backoffMs?: number;
  heartbeatMs?: number;
  queueCapacity?: number;
  logger?: Logger;
  metrics?: Metrics;
};

export type TenantStatus = {
  project: string | null;
  highWaterMark: number | null;
  subscribers: number;
  dropped: number;
  /** Longest current run of drops on any one queue of the project. */
  maxConsecutiveDrops: number;
};

export type HostStatus = {
  running: boolean;
  subscribers: number;
  tenants: TenantStatus[];
};

/**
 * Process-wide owner of the detector registry, broadcast hub and poll loop.
 * Created once at start-up and handed to the HTTP layer.
 */
export class NotifierHost implements StreamHost {
  readonly hub: BroadcastHub;
  readonly detectors = new DetectorRegistry();
  private readonly loop: PollLoop;
  private readonly sessions = new Map<StreamSession, Promise<void>>();
  private readonly log: Logger;
  private readonly metrics: Metrics;
  private readonly heartbeatMs?: number;
  private stopping = false;

  constructor(
    private readonly sourceFor: (tenant: Tenant) => ChangeSource,
    opts: NotifierHostOptions = {},
  ) {
    this.log = opts.logger ?? createLogger({ scope: "notifier" });
    this.metrics = opts.metrics ?? sharedMetrics;
    this.heartbeatMs = opts.heartbeatMs;
    this.hub = new BroadcastHub({ capacity: opts.queueCapacity });
    this.loop = new PollLoop(this.detectors, this.hub, {
      intervalMs: opts.pollIntervalMs,
      backoffMs: opts.backoffMs,
      observer: this.observer(),
    });
  }

  get running(): boolean {
    return this.loop.running;
  }

  /** Start the poll loop; calling it again while running has no effect. */
  start(): void {
    if (this.loop.running) return;
    this.stopping = false;
    this.loop.start();
    this.log.info("change polling started");
  }

  /** Register the tenant's detector if this is its first access. */
  ensureTenant(tenant: Tenant): void {
    if (this.detectors.has(tenant)) return;
    this.detectors.ensure(tenant, () => this.sourceFor(tenant));
    this.metrics.set("detectors", this.detectors.size);
    this.log.debug("detector registered", { project: tenant });
  }

  stream(tenant: Tenant, transport: StreamTransport): OpenStream {
    this.ensureTenant(tenant);
    const session = new StreamSession(this.hub, tenant, transport, { heartbeatMs: this.heartbeatMs });
    const done = session.run().finally(() => {
      this.sessions.delete(session);
      this.updateGauges();
      this.log.debug("stream closed", { project: tenant });
    });
    // a stream opened mid-shutdown gets its connected frame and then ends
    if (this.stopping) session.close();
    this.sessions.set(session, done);
    this.updateGauges();
    this.log.debug("stream opened", { project: tenant });
    return { session, done };
  }

  /**
   * Cancel and await the poll loop, then close every stream and forget all
   * registry entries.
   */
  async shutdown(): Promise<void> {
    this.stopping = true;
    await this.loop.stop();
    const open = Array.from(this.sessions.entries());
    for (const [session] of open) session.close();
    const results = await Promise.allSettled(open.map(([, done]) => done));
    for (const r of results) {
      if (r.status === "rejected") this.log.warn("stream ended with an error during shutdown", { error: r.reason });
    }
    this.hub.clear();
    this.detectors.clear();
    this.updateGauges();
    this.metrics.set("detectors", 0);
    this.log.info("change polling stopped", { streamsClosed: open.length });
  }

  /** Poll every registered tenant once, outside the loop's cadence. */
  pollNow(): Promise<number> {
    return this.loop.pollOnce();
  }

  status(): HostStatus {
    const tenants = new Set<Tenant>([...this.detectors.entries().map(([t]) => t), ...this.hub.tenants()]);
    return {
      running: this.loop.running,
      subscribers: this.hub.subscriberCount(),
      tenants: Array.from(tenants, tenant => ({
        project: tenant,
        highWaterMark: this.detectors.get(tenant)?.highWaterMark ?? null,
        subscribers: this.hub.subscriberCount(tenant),
        dropped: this.hub.queues(tenant).reduce((n, q) => n + q.droppedCount, 0),
        maxConsecutiveDrops: this.hub.queues(tenant).reduce((n, q) => Math.max(n, q.consecutiveDropCount), 0),
      })),
    };
  }

  private updateGauges(): void {
    this.metrics.set("subscribers", this.hub.subscriberCount());
    this.metrics.set("tenants", this.hub.tenants().length);
  }

  private observer(): PollObserver {
    return {
      tick: () => this.metrics.inc("polls_total"),
      broadcast: (tenant, topics, result) => {
        this.metrics.inc("broadcasts_total");
        this.metrics.inc("deliveries_total", result.delivered);
        if (result.dropped) {
          this.metrics.inc("dropped_total", result.dropped, { project: tenant ?? "" });
          this.log.warn("subscriber queue full; notification dropped", { project: tenant, dropped: result.dropped });
        }
        this.log.info("parameter values changed", { project: tenant, parameters: topics, delivered: result.delivered });
      },
      detectionFailed: err => {
        this.metrics.inc("poll_failures_total");
        this.log.warn(`polling ${describeTenant(err.tenant)} failed`, { error: err.cause ?? err });
      },
      loopFailed: err => {
        this.metrics.inc("loop_failures_total");
        this.log.error("poll loop failed; backing off", { error: err });
      },
    };
  }
}
