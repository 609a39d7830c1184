import Fastify, { type FastifyInstance } from "fastify";
import {
  PolicyEngine,
  InputError,
  MemoryReputationStore,
  createRedisReputationStore,
  defaultPolicy,
  type Decision,
  type PolicySet,
  type ReputationStore,
} from "@regguard/pdp";
import type { SidecarConfig } from "./config.js";
import { getHealth, getReadiness, type HealthDependencies } from "./health.js";
import { getMetrics, recordDecision, recordError, recordPolicyRules, recordUp } from "./metrics.js";
import { VERSION } from "./version.js";

export interface SidecarDependencies {
  /** Policy to enforce. Default: the built-in default policy. */
  policy?: PolicySet;
  /** Overrides the store selected from `redisUrl`. */
  reputationStore?: ReputationStore;
}

export interface Sidecar {
  server: FastifyInstance;
  /** Swap the active policy; in-flight evaluations finish on the old one. */
  setPolicy(policy: PolicySet): void;
}

export interface InvalidInputResponse {
  error: "invalid_input";
  message: string;
  issues: string[];
}

/**
 * Create and configure the decision service.
 */
export async function createSidecar(config: SidecarConfig, deps: SidecarDependencies = {}): Promise<Sidecar> {
  const fastify = Fastify({
    logger: {
      level: config.logLevel,
      name: config.serviceName,
      redact: ["req.headers.authorization", "req.headers.cookie"],
    },
    requestTimeout: config.requestTimeoutMs,
  });

  const healthDeps: HealthDependencies = {};
  let store = deps.reputationStore;

  if (!store && config.redisUrl) {
    try {
      const { createClient, commandOptions } = await import("redis");
      const client = createClient({ url: config.redisUrl });
      client.on("error", error => fastify.log.error({ err: error }, "Redis client error"));
      await client.connect();
      store = createRedisReputationStore({
        client: {
          eval: (script, options, signal) =>
            signal ? client.eval(commandOptions({ signal }), script, options) : client.eval(script, options),
        },
      });
      healthDeps.redis = { ping: () => client.ping() };
      fastify.addHook("onClose", async () => {
        await client.quit();
      });
      fastify.log.info("Connected to Redis for reputation counters");
    } catch (error) {
      fastify.log.warn({ err: error }, "Failed to connect to Redis, using memory store");
    }
  }

  if (!store) {
    const memory = new MemoryReputationStore();
    memory.startSweeper(config.sweepIntervalMs);
    fastify.addHook("onClose", async () => memory.stop());
    store = memory;
  }

  const reputationStore = store;
  const buildEngine = (policy: PolicySet) =>
    PolicyEngine.fromPolicy(policy, {
      reputationStore,
      logger: fastify.log,
      onRuleError: () => recordError("rule_evaluation"),
    });

  let engine = buildEngine(deps.policy ?? defaultPolicy);
  recordPolicyRules(engine.ruleIds.length);
  healthDeps.policy = { ruleCount: () => engine.ruleIds.length };
  recordUp(true);

  /**
   * Evaluate one registration request.
   * POST /evaluate
   */
  fastify.post("/evaluate", async (request, reply): Promise<Decision | InvalidInputResponse> => {
    const start = Date.now();
    let decision: Decision;
    try {
      decision = await engine.evaluate(request.body);
    } catch (error) {
      if (error instanceof InputError) {
        recordError("invalid_input");
        reply.status(400);
        return { error: "invalid_input", message: error.message, issues: error.issues };
      }
      throw error;
    }

    recordDecision(decision.verdict, Date.now() - start);
    if (decision.verdict !== "allow") {
      request.log.info(
        { verdict: decision.verdict, violations: decision.violations, warnings: decision.warnings },
        "Registration not plainly allowed"
      );
    }
    return decision;
  });

  fastify.get("/rules", async () => ({ rules: engine.ruleIds }));

  fastify.get("/health", async () => getHealth(healthDeps, VERSION));

  fastify.get("/live", async () => ({ alive: true }));

  fastify.get("/ready", async (_request, reply) => {
    const readiness = await getReadiness(healthDeps);
    if (!readiness.ready) reply.status(503);
    return readiness;
  });

  /**
   * Metrics endpoint (Prometheus format).
   * GET /metrics
   */
  fastify.get("/metrics", async (_request, reply) => {
    reply.type("text/plain; version=0.0.4");
    return getMetrics();
  });

  fastify.setErrorHandler((error, request, reply) => {
    request.log.error({ err: error }, "Request failed");
    const status = error.statusCode ?? 500;
    if (status >= 500) recordError("internal");
    reply.status(status).send({ error: status >= 500 ? "internal_error" : "bad_request", message: error.message });
  });

  fastify.addHook("onClose", async () => {
    recordUp(false);
  });

  return {
    server: fastify,
    setPolicy(policy) {
      engine = buildEngine(policy);
      recordPolicyRules(engine.ruleIds.length);
      fastify.log.info({ rules: engine.ruleIds }, "Policy updated");
    },
  };
}

/**
 * Start the decision service and listen on HTTP.
 */
export async function startSidecar(
  config: SidecarConfig,
  deps: SidecarDependencies = {}
): Promise<Sidecar & { close: () => Promise<void> }> {
  const sidecar = await createSidecar(config, deps);
  await sidecar.server.listen({ port: config.port, host: config.host });
  return {
    ...sidecar,
    close: () => sidecar.server.close(),
  };
}

export { loadConfig, ConfigError, type SidecarConfig, type LogLevel } from "./config.js";
export { loadPolicyFile } from "./policyFile.js";
export { PolicyWatcher, type PolicyWatcherOptions } from "./policyWatcher.js";
export { getHealth, getReadiness } from "./health.js";
export { getMetrics, recordDecision, recordUp, recordPolicyRules, recordError } from "./metrics.js";
