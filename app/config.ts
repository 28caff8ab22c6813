import { join } from "path";
import { z } from "zod";
import { LEVELS, type Level } from "../host/logger";
import { ConfigError } from "./errors";

export const PROJECT_NAME = /^[A-Za-z0-9_-]{1,64}$/;

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

export const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  LABFRAME_DATA_DIR: z.string().min(1).default("data"),
  LABFRAME_DEFAULT_DB: z.string().min(1).optional(),
  LABFRAME_ACTIVE_PROJECT: z.string().regex(PROJECT_NAME, "must match [A-Za-z0-9_-]{1,64}").optional(),
  LABFRAME_POLL_INTERVAL_MS: positiveInt(3000),
  LABFRAME_HEARTBEAT_MS: positiveInt(1000),
  LABFRAME_QUEUE_CAPACITY: positiveInt(100),
  LABFRAME_CORS_ORIGIN: z.string().default("http://localhost:3000"),
  LOG_LEVEL: z.preprocess(v => (typeof v === "string" ? v.toLowerCase() : v), z.enum(LEVELS)).default("info"),
  NO_COLOR: z.string().optional(),
});

export type AppConfig = {
  port: number;
  host: string;
  dataDir: string;
  defaultDbPath: string;
  activeProject: string | null;
  pollIntervalMs: number;
  heartbeatMs: number;
  queueCapacity: number;
  corsOrigin: string;
  logLevel: Level;
  noColor: boolean;
};

/** Read and validate configuration from the environment. Throws ConfigError listing every bad key. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    dataDir: e.LABFRAME_DATA_DIR,
    defaultDbPath: e.LABFRAME_DEFAULT_DB ?? join(e.LABFRAME_DATA_DIR, "labframe.sqlite"),
    activeProject: e.LABFRAME_ACTIVE_PROJECT ?? null,
    pollIntervalMs: e.LABFRAME_POLL_INTERVAL_MS,
    heartbeatMs: e.LABFRAME_HEARTBEAT_MS,
    queueCapacity: e.LABFRAME_QUEUE_CAPACITY,
    corsOrigin: e.LABFRAME_CORS_ORIGIN,
    logLevel: e.LOG_LEVEL,
    noColor: e.NO_COLOR !== undefined && e.NO_COLOR !== "",
  };
}
