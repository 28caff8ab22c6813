import { SseAdapter } from "../adapters/sse";
import { ensureSchema } from "../adapters/sqlite/db";
import { NotifierHost } from "../host/notifier-host";
import { createLogger, shouldColor, type Logger } from "../host/logger";
import { metrics as sharedMetrics, type Metrics } from "../host/metrics";
import type { AppConfig } from "./config";
import { ProjectDirectory } from "./projects";

export type BootstrapOptions = {
  logger?: Logger;
  metrics?: Metrics;
};

export type App = ReturnType<typeof bootstrap>;

/** Wire the notifier for one process. Creates the default database if it is missing. */
export function bootstrap(config: AppConfig, opts: BootstrapOptions = {}) {
  const logger =
    opts.logger ?? createLogger({ level: config.logLevel, colors: !config.noColor && shouldColor() });
  const metrics = opts.metrics ?? sharedMetrics;
  ensureSchema(config.defaultDbPath);
  const projects = new ProjectDirectory({
    dataDir: config.dataDir,
    defaultDbPath: config.defaultDbPath,
    activeProject: config.activeProject,
  });
  const host = new NotifierHost(tenant => projects.source(tenant), {
    pollIntervalMs: config.pollIntervalMs,
    heartbeatMs: config.heartbeatMs,
    queueCapacity: config.queueCapacity,
    logger: logger.child("notifier"),
    metrics,
  });
  const sse = new SseAdapter(host);
  return { config, logger, metrics, projects, host, sse };
}
