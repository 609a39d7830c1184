import { describe, it, expect } from "vitest";
import { loadConfig, ConfigError } from "../config.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      port: 3100,
      host: "0.0.0.0",
      logLevel: "info",
      redisUrl: undefined,
      policyPath: undefined,
      serviceName: "regguard-sidecar",
      sweepIntervalMs: 60_000,
      requestTimeoutMs: 10_000,
    });
  });

  it("reads the environment", () => {
    const config = loadConfig({
      PORT: "8080",
      LOG_LEVEL: "debug",
      REDIS_URL: "redis://localhost:6379",
      POLICY_PATH: "./policy.json",
      REQUEST_TIMEOUT_MS: "5000",
    });
    expect(config.port).toBe(8080);
    expect(config.logLevel).toBe("debug");
    expect(config.redisUrl).toBe("redis://localhost:6379");
    expect(config.policyPath).toBe("./policy.json");
    expect(config.requestTimeoutMs).toBe(5000);
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrow(new ConfigError('PORT must be an integer >= 0, got "abc"'));
  });

  it("rejects a zero sweep interval", () => {
    expect(() => loadConfig({ SWEEP_INTERVAL_MS: "0" })).toThrow('SWEEP_INTERVAL_MS must be an integer >= 1, got "0"');
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(ConfigError);
  });
});
