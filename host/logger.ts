export const LEVELS = ["debug", "info", "warn", "error"] as const;
export type Level = (typeof LEVELS)[number];

const levelPriority: Record<Level, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const RESET = "\x1b[0m";
const levelColor: Record<Level, string> = {
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
};

export type LogContext = Record<string, unknown>;
export type Sink = (level: Level, line: string) => void;

export interface Logger {
  readonly colors: boolean;
  debug(message: string, ctx?: LogContext): void;
  info(message: string, ctx?: LogContext): void;
  warn(message: string, ctx?: LogContext): void;
  error(message: string, ctx?: LogContext): void;
  child(scope: string): Logger;
}

export type LoggerOptions = {
  level?: Level;
  scope?: string;
  colors?: boolean;
  sink?: Sink;
  clock?: () => Date;
};

const consoleSink: Sink = (level, line) => {
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
};

/** `YYYY-MM-DD HH:MM:SS` in local time. */
export function formatTimestamp(d: Date): string {
  const p = (n: number) => String(n).padStart(2, "0");
  return `${d.getFullYear()}-${p(d.getMonth() + 1)}-${p(d.getDate())} ${p(d.getHours())}:${p(d.getMinutes())}:${p(d.getSeconds())}`;
}

function paint(color: string, text: string, on: boolean): string {
  return on ? `${color}${text}${RESET}` : text;
}

const jsonSafe = (_k: string, v: unknown) => {
  if (typeof v === "bigint") return v.toString();
  if (v instanceof Error) return { name: v.name, message: v.message };
  return v;
};

/** `<timestamp> - <scope> - <LEVEL> - <message> {ctx}`; timestamp and level share the level colour. */
export function formatLine(level: Level, scope: string, message: string, ctx: LogContext | undefined, at: Date, colors: boolean): string {
  const c = levelColor[level];
  const ts = paint(c, formatTimestamp(at), colors);
  const lvl = paint(c, level.toUpperCase(), colors);
  const tail = ctx && Object.keys(ctx).length ? ` ${JSON.stringify(ctx, jsonSafe)}` : "";
  return `${ts} - ${scope} - ${lvl} - ${message}${tail}`;
}

/** Colour for an HTTP status by class; empty outside 2xx–5xx. */
export function statusColor(status: number): string {
  if (status >= 200 && status < 300) return "\x1b[32m";
  if (status >= 300 && status < 400) return "\x1b[36m";
  if (status >= 400 && status < 500) return "\x1b[33m";
  if (status >= 500 && status < 600) return "\x1b[31m";
  return "";
}

/** Access log message: `<client> - "<METHOD> <url>" <status> <ms>ms`. */
export function formatAccessLine(
  req: { client: string; method: string; url: string },
  status: number,
  elapsedMs: number,
  colors: boolean,
): string {
  const color = statusColor(status);
  const code = color ? paint(color, String(status), colors) : String(status);
  return `${req.client} - "${req.method} ${req.url}" ${code} ${Math.round(elapsedMs)}ms`;
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const threshold = levelPriority[opts.level ?? "info"];
  const scope = opts.scope ?? "labframe";
  const colors = opts.colors ?? false;
  const sink = opts.sink ?? consoleSink;
  const clock = opts.clock ?? (() => new Date());

  const write = (level: Level, message: string, ctx?: LogContext) => {
    if (levelPriority[level] < threshold) return;
    sink(level, formatLine(level, scope, message, ctx, clock(), colors));
  };

  return {
    colors,
    debug: (message, ctx) => write("debug", message, ctx),
    info: (message, ctx) => write("info", message, ctx),
    warn: (message, ctx) => write("warn", message, ctx),
    error: (message, ctx) => write("error", message, ctx),
    child: child => createLogger({ ...opts, scope: `${scope}.${child}` }),
  };
}

/** Colour only when stdout is a terminal and NO_COLOR is unset. */
export function shouldColor(env: NodeJS.ProcessEnv = process.env): boolean {
  return !env.NO_COLOR && process.stdout.isTTY === true;
}
