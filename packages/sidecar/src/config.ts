export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export interface SidecarConfig {
  /** Server port. Default: 3100 */
  port: number;
  /** Server host. Default: 0.0.0.0 */
  host: string;
  /** Default: info */
  logLevel: LogLevel;
  /** Redis URL for the shared reputation store. If not set, counters live in memory. */
  redisUrl?: string;
  /** JSON policy file. If not set, the built-in default policy applies. */
  policyPath?: string;
  /** Service name attached to every log line. */
  serviceName: string;
  /** Interval of the in-memory reputation sweep. Default: 60000 */
  sweepIntervalMs: number;
  /** Upper bound on handling one HTTP request. Default: 10000 */
  requestTimeoutMs: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function positiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min = 1): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Read sidecar configuration from the environment.
 *
 *   PORT, HOST, LOG_LEVEL, REDIS_URL, POLICY_PATH, SERVICE_NAME,
 *   SWEEP_INTERVAL_MS, REQUEST_TIMEOUT_MS
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SidecarConfig {
  const logLevel = env.LOG_LEVEL || "info";
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got "${logLevel}"`);
  }

  return {
    port: positiveInt(env, "PORT", 3100, 0),
    host: env.HOST || "0.0.0.0",
    logLevel,
    redisUrl: env.REDIS_URL || undefined,
    policyPath: env.POLICY_PATH || undefined,
    serviceName: env.SERVICE_NAME || "regguard-sidecar",
    sweepIntervalMs: positiveInt(env, "SWEEP_INTERVAL_MS", 60_000),
    requestTimeoutMs: positiveInt(env, "REQUEST_TIMEOUT_MS", 10_000),
  };
}
