import type {
  Decision,
  FailureMode,
  Logger,
  PdpOptions,
  PolicyInput,
  PolicySet,
  ReputationHandle,
  ReputationStore,
  Rule,
  RuleOutcome,
  RuleResult,
} from "./types.js";
import { InputError, ReputationUnavailableError, RuleEvaluationError } from "./errors.js";
import { normalizeInput } from "./normalize/input.js";
import { aggregate } from "./aggregate.js";
import { compilePolicy } from "./policy.js";
import { MemoryReputationStore } from "./stores/memoryReputationStore.js";
import { createConsoleLogger } from "./logger.js";
import { withTimeout } from "./utils/timeout.js";

export const DEFAULT_REPUTATION_TIMEOUT_MS = 250;

/** Reason reported by a rule that failed under the fail-closed policy. */
export const EVALUATION_UNAVAILABLE = "evaluation_unavailable";

/**
 * Evaluates registration requests against a fixed, ordered rule list.
 * The reputation store is the only state shared between evaluations.
 */
export class PolicyEngine {
  private readonly rules: readonly Rule[];
  private readonly store: ReputationStore;
  private readonly failureMode: FailureMode;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly clock: () => number;
  private readonly onRuleError: (error: RuleEvaluationError) => void;

  constructor(rules: readonly Rule[], opts: PdpOptions = {}) {
    this.rules = [...rules];
    this.store = opts.reputationStore ?? new MemoryReputationStore();
    this.failureMode = opts.failureMode ?? "fail-closed";
    this.timeoutMs = opts.reputationTimeoutMs ?? DEFAULT_REPUTATION_TIMEOUT_MS;
    this.logger = opts.logger ?? createConsoleLogger();
    this.clock = opts.clock ?? Date.now;
    this.onRuleError = opts.onRuleError ?? (() => {});
  }

  /** Build an engine from a policy document; `opts` take precedence over the policy defaults. */
  static fromPolicy(policy: PolicySet, opts: PdpOptions = {}): PolicyEngine {
    return new PolicyEngine(compilePolicy(policy), {
      ...opts,
      failureMode: opts.failureMode ?? policy.defaults?.failureMode,
      reputationTimeoutMs: opts.reputationTimeoutMs ?? policy.defaults?.reputationTimeoutMs,
    });
  }

  get ruleIds(): string[] {
    return this.rules.map(r => r.id);
  }

  /**
   * Decide on one raw registration request.
   *
   * @throws InputError when the request violates the input contract; this is
   *   the only error that leaves this method.
   */
  async evaluate(raw: unknown): Promise<Decision> {
    let input: PolicyInput;
    try {
      input = normalizeInput(raw);
    } catch (error) {
      if (error instanceof InputError) throw error;
      throw new InputError(`Invalid registration request: ${messageOf(error)}`);
    }
    return this.decide(input);
  }

  /** Decide on an already-normalized input. Never throws. */
  async decide(input: PolicyInput): Promise<Decision> {
    const now = this.clock();
    // every rule runs, even after a fatal result, so diagnostics are complete
    const outcomes = await Promise.all(this.rules.map(rule => this.runRule(rule, input, now)));
    return aggregate(outcomes);
  }

  private async runRule(rule: Rule, input: PolicyInput, now: number): Promise<RuleOutcome> {
    const reputation = this.reputationFor(rule.id, now);
    try {
      const result = await rule.evaluate(input, { now, reputation });
      return { ruleId: rule.id, result };
    } catch (error) {
      const failure =
        error instanceof RuleEvaluationError
          ? error
          : new RuleEvaluationError(rule.id, `Rule ${rule.id} failed: ${messageOf(error)}`, { cause: error });
      return { ruleId: rule.id, result: this.applyFailureMode(failure) };
    }
  }

  private applyFailureMode(error: RuleEvaluationError): RuleResult {
    const result: RuleResult =
      this.failureMode === "fail-open"
        ? { outcome: "pass" }
        : { outcome: "reject", reason: EVALUATION_UNAVAILABLE, fatal: true };

    this.logError(
      { ruleId: error.ruleId, failureMode: this.failureMode, err: error, cause: error.cause },
      `Rule evaluation failed, applying ${this.failureMode}`
    );
    try {
      this.onRuleError(error);
    } catch (hookError) {
      this.logError({ ruleId: error.ruleId, err: hookError }, "onRuleError hook threw");
    }
    return result;
  }

  /** A broken logger must not turn a decision into a rejection. */
  private logError(obj: Record<string, unknown>, msg: string): void {
    try {
      this.logger.error(obj, msg);
    } catch (logFailure) {
      console.error("[regguard]", msg, obj, "logger failed:", logFailure);
    }
  }

  /**
   * The only path from a rule to the store: bounded by the timeout, failures
   * typed, keys scoped by rule id so two rate limits never share a counter.
   */
  private reputationFor(ruleId: string, now: number): ReputationHandle {
    return {
      incrementAndCheck: async (key, windowMs) => {
        try {
          return await withTimeout(
            signal => this.store.incrementAndCheck({ key: `${ruleId}:${key}`, windowMs, now, signal }),
            this.timeoutMs,
            () => new ReputationUnavailableError(`Reputation store did not answer within ${this.timeoutMs}ms`, { timedOut: true })
          );
        } catch (error) {
          throw new RuleEvaluationError(ruleId, `Reputation store unavailable: ${messageOf(error)}`, { cause: error });
        }
      },
    };
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const engines = new WeakMap<PolicySet, PolicyEngine>();

/**
 * One-shot evaluation. Without `opts` the engine built for `policy` is cached
 * per policy object, so its in-memory rate-limit counters persist across
 * calls; with `opts` a new engine is built each time (pass a
 * `reputationStore` to share counters).
 */
export async function evaluate(policy: PolicySet, raw: unknown, opts?: PdpOptions): Promise<Decision> {
  if (opts) return PolicyEngine.fromPolicy(policy, opts).evaluate(raw);
  let engine = engines.get(policy);
  if (!engine) {
    engine = PolicyEngine.fromPolicy(policy);
    engines.set(policy, engine);
  }
  return engine.evaluate(raw);
}
