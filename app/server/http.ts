import http from "http";
import { messageOf } from "@labframe/notify-core";
import type { SseResponse } from "../../adapters/sse";
import { formatAccessLine } from "../../host/logger";
import { bootstrap, type App } from "../bootstrap";
import type { AppConfig } from "../config";
import { InvalidProjectNameError, ProjectNotFoundError } from "../errors";

export interface HttpRequest {
  method?: string;
  url?: string;
  headers: Record<string, string | string[] | undefined>;
  socket?: { remoteAddress?: string };
}

export interface HttpResponse extends SseResponse {
  statusCode: number;
  readonly headersSent: boolean;
  writeHead(statusCode: number, headers?: Record<string, string>): unknown;
  end(body?: string): unknown;
}

const ENDPOINTS = ["/events/database-changes", "/health", "/metrics", "/status.json", "/projects"];

export function createRequestListener(app: App) {
  const { config, host, sse, projects, metrics, logger } = app;
  const access = logger.child("access");

  return async (req: HttpRequest, res: HttpResponse): Promise<void> => {
    const started = Date.now();
    const method = req.method ?? "GET";
    const rawUrl = req.url ?? "/";
    res.on("close", () => {
      const client = req.socket?.remoteAddress ?? "-";
      access.info(formatAccessLine({ client, method, url: rawUrl }, res.statusCode, Date.now() - started, access.colors));
    });
    try {
      const url = new URL(rawUrl, "http://localhost");
      res.setHeader("Access-Control-Allow-Origin", config.corsOrigin);
      if (method === "OPTIONS") {
        res.setHeader("Access-Control-Allow-Methods", "GET, OPTIONS");
        res.setHeader("Access-Control-Allow-Headers", "X-Project");
        res.writeHead(204);
        res.end();
        return;
      }
      if (method !== "GET") return notFound(res);
      switch (url.pathname) {
        case "/events/database-changes": {
          const tenant = projects.resolveTenant(url.searchParams.get("project"), header(req, "x-project"));
          host.ensureTenant(tenant);
          await sse.handler(res, tenant);
          return;
        }
        case "/health": {
          const database = await projects.source(null).health();
          return json(res, database.ok ? 200 : 503, { status: database.ok ? "ok" : "degraded", database });
        }
        case "/metrics":
          res.writeHead(200, { "content-type": "text/plain; version=0.0.4" });
          res.end(metrics.render());
          return;
        case "/status.json":
          return json(res, 200, {
            ...host.status(),
            streams: sse.activeSessions,
            node: process.version,
            pid: process.pid,
            uptimeSec: Math.round(process.uptime()),
            time: new Date().toISOString(),
            endpoints: ENDPOINTS,
          });
        case "/projects":
          return json(
            res,
            200,
            projects.list().map(name => ({
              name,
              db_path: projects.dbPath(name),
              is_active: name === config.activeProject,
            })),
          );
        default:
          return notFound(res);
      }
    } catch (err) {
      if (res.headersSent) {
        logger.error("request failed after the response started", { url: rawUrl, error: err });
        if (!res.writableEnded) res.end();
        return;
      }
      const status = err instanceof InvalidProjectNameError ? 400 : err instanceof ProjectNotFoundError ? 404 : 500;
      if (status === 500) logger.error("request failed", { url: rawUrl, error: err });
      json(res, status, { ok: false, error: messageOf(err) });
    }
  };
}

export type RunningServer = { app: App; server: http.Server; stop: () => Promise<void> };

/** Bootstrap, start polling, listen, and install signal handlers for a graceful stop. */
export async function startServer(config: AppConfig): Promise<RunningServer> {
  const app = bootstrap(config);
  const { host, logger } = app;
  const listener = createRequestListener(app);
  const server = http.createServer((req, res) => {
    listener(req, res).catch(err => logger.error("unhandled request error", { error: err }));
  });
  host.start();
  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(config.port, config.host, () => {
      server.off("error", reject);
      resolve();
    });
  });

  let stopping: Promise<void> | null = null;
  const stop = () => {
    stopping ??= (async () => {
      logger.info("shutting down");
      const closed = new Promise<void>(resolve => server.close(() => resolve()));
      await host.shutdown();
      await closed;
      logger.info("shutdown complete");
    })();
    return stopping;
  };
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`received ${signal}`);
    stop().then(
      () => process.exit(0),
      err => {
        logger.error("shutdown failed", { error: err });
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  return { app, server, stop };
}

function header(req: HttpRequest, name: string): string | null {
  const v = req.headers[name];
  return Array.isArray(v) ? (v[0] ?? null) : (v ?? null);
}

function json(res: HttpResponse, status: number, body: unknown): void {
  res.writeHead(status, { "content-type": "application/json" });
  res.end(JSON.stringify(body));
}

function notFound(res: HttpResponse): void {
  res.writeHead(404, { "content-type": "text/plain" });
  res.end("Not Found");
}
