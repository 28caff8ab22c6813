import { join } from "path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "../config";
import { ConfigError } from "../errors";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      host: "0.0.0.0",
      dataDir: "data",
      defaultDbPath: join("data", "labframe.sqlite"),
      activeProject: null,
      pollIntervalMs: 3000,
      heartbeatMs: 1000,
      queueCapacity: 100,
      corsOrigin: "http://localhost:3000",
      logLevel: "info",
      noColor: false,
    });
  });

  it("coerces numbers and normalises the log level", () => {
    const config = loadConfig({
      PORT: "8080",
      LABFRAME_POLL_INTERVAL_MS: "500",
      LABFRAME_ACTIVE_PROJECT: "lab1",
      LOG_LEVEL: "WARN",
      NO_COLOR: "1",
    });
    expect(config.port).toBe(8080);
    expect(config.pollIntervalMs).toBe(500);
    expect(config.activeProject).toBe("lab1");
    expect(config.logLevel).toBe("warn");
    expect(config.noColor).toBe(true);
  });

  it("lists every invalid key", () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: "abc", LABFRAME_QUEUE_CAPACITY: "0", LOG_LEVEL: "loud" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    const problems = caught instanceof ConfigError ? caught.problems : [];
    expect(problems.map(p => p.split(":")[0])).toEqual(["PORT", "LABFRAME_QUEUE_CAPACITY", "LOG_LEVEL"]);
  });
});
