/**
 * Health checks and readiness probes
 */

export interface HealthStatus {
  status: "ok" | "degraded";
  version: string;
  uptime: number;
  checks: {
    redis?: { status: "ok" | "error"; latencyMs?: number; error?: string };
    policy?: { status: "ok"; ruleCount: number };
  };
}

export interface ReadinessStatus {
  ready: boolean;
  reason?: string;
}

export interface HealthDependencies {
  redis?: { ping: () => Promise<string> };
  policy?: { ruleCount: () => number };
}

const startTime = Date.now();

export async function getHealth(deps: HealthDependencies, version: string): Promise<HealthStatus> {
  const checks: HealthStatus["checks"] = {};

  if (deps.redis) {
    try {
      const start = Date.now();
      await deps.redis.ping();
      checks.redis = { status: "ok", latencyMs: Date.now() - start };
    } catch (error) {
      checks.redis = { status: "error", error: error instanceof Error ? error.message : String(error) };
    }
  }

  if (deps.policy) {
    checks.policy = { status: "ok", ruleCount: deps.policy.ruleCount() };
  }

  return {
    status: checks.redis?.status === "error" ? "degraded" : "ok",
    version,
    uptime: Math.floor((Date.now() - startTime) / 1000),
    checks,
  };
}

/**
 * Ready once a policy is loaded and, when configured, Redis answers.
 */
export async function getReadiness(deps: HealthDependencies): Promise<ReadinessStatus> {
  if (!deps.policy) {
    return { ready: false, reason: "No policy loaded" };
  }

  if (deps.redis) {
    try {
      await deps.redis.ping();
    } catch {
      return { ready: false, reason: "Redis not connected" };
    }
  }

  return { ready: true };
}
