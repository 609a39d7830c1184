import type { RuleEvaluationError } from "./errors.js";

export type Verdict = "allow" | "deny" | "flag";

/** How a rule's finding is classified: fatal reject, non-fatal reject, or warning. */
export type RuleAction = "deny" | "flag" | "warn";

export type FailureMode = "fail-closed" | "fail-open";

/**
 * Registration metadata as submitted by the client.
 * Open by design: rules look keys up explicitly and check their types.
 */
export type ClientMetadata = Record<string, unknown>;

export interface Requester {
  /** Canonical IPv4/IPv6 literal; undefined when the caller did not supply one. */
  ipAddress?: string;
  userAgent?: string;
}

export interface PolicyInput {
  clientMetadata: ClientMetadata;
  requester: Requester;
}

/** Wire shape of the request contract, before normalization. */
export interface RawPolicyInput {
  client_metadata: Record<string, unknown>;
  requester: {
    ip_address?: string;
    user_agent?: string;
  };
}

export type RuleResult =
  | { outcome: "pass" }
  | { outcome: "warn"; reason: string }
  | { outcome: "reject"; reason: string; fatal: boolean };

export interface Diagnostic {
  rule: string;
  message: string;
}

export interface Decision {
  verdict: Verdict;
  violations: Diagnostic[];
  warnings: Diagnostic[];
}

export interface RuleOutcome {
  ruleId: string;
  result: RuleResult;
}

/** Read-plus-increment view of the reputation tracker handed to rules. */
export interface ReputationHandle {
  /** Records one attempt for `key` (scoped to the calling rule) and resolves to the count inside the current window. */
  incrementAndCheck(key: string, windowMs: number): Promise<number>;
}

export interface RuleContext {
  /** Evaluation time (epoch ms), identical for every rule of one evaluation. */
  now: number;
  reputation: ReputationHandle;
}

export interface Rule {
  readonly id: string;
  evaluate(input: PolicyInput, ctx: RuleContext): RuleResult | Promise<RuleResult>;
}

export interface IncrementArgs {
  key: string;
  windowMs: number;
  now: number;
  signal?: AbortSignal;
}

export interface ReputationStore {
  /** Atomically records one attempt and returns the attempt count within the current window. */
  incrementAndCheck(args: IncrementArgs): Promise<number>;
}

/** pino-compatible logging surface. */
export interface Logger {
  debug(obj: Record<string, unknown>, msg?: string): void;
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
}

// ============================================================================
// Policy configuration
// ============================================================================

export interface RedirectUrisConfig {
  /** Permit `http` redirect URIs on loopback hosts (native apps). Default: true */
  allowLoopbackHttp?: boolean;
  /** Permit private-use schemes in reverse-domain form, e.g. `com.example.app`. Default: true */
  allowReverseDomainSchemes?: boolean;
  /** Extra custom schemes accepted verbatim. */
  allowedCustomSchemes?: string[];
}

export interface ClientNameConfig {
  /** Default: 1 */
  minLength?: number;
  /** Default: 100 */
  maxLength?: number;
}

export interface RateLimitConfig {
  /** Attempts allowed per window; the next one is rejected. */
  limit: number;
  windowMs: number;
  /** Reputation key. Default: "ip" */
  keyBy?: "ip" | "ip+user_agent";
}

export interface UserAgentConfig {
  /** Glob patterns (`*` wildcard), matched case-insensitively against the whole user agent. */
  patterns?: string[];
  /** Report requests without a user agent. Default: false */
  flagMissing?: boolean;
}

export interface MetadataUrisConfig {
  /** Default: false */
  requireClientUri?: boolean;
  /** Default: true */
  requireHttps?: boolean;
  /** Other URIs must share client_uri's host (or be a subdomain of it). Default: true */
  requireSameHost?: boolean;
}

export interface GrantTypesConfig {
  allowed?: string[];
}

interface PolicyRuleBase {
  /** Overrides the rule type's default id in diagnostics. */
  id?: string;
  action?: RuleAction;
}

interface PolicyRuleOf<T extends string, C> extends PolicyRuleBase {
  type: T;
  config?: C;
}

export type PolicyRule =
  | PolicyRuleOf<"redirect-uris", RedirectUrisConfig>
  | PolicyRuleOf<"client-name", ClientNameConfig>
  | (PolicyRuleBase & { type: "rate-limit"; config: RateLimitConfig })
  | PolicyRuleOf<"user-agent", UserAgentConfig>
  | PolicyRuleOf<"metadata-uris", MetadataUrisConfig>
  | PolicyRuleOf<"grant-types", GrantTypesConfig>;

export type PolicyRuleType = PolicyRule["type"];

export interface PolicySet {
  policyVersion: "0.1";
  defaults?: {
    /** Outcome for a rule whose evaluation failed. Default: "fail-closed" */
    failureMode?: FailureMode;
    /** Upper bound on one reputation store call. Default: 250 */
    reputationTimeoutMs?: number;
  };
  /** Evaluated in this order; order only affects diagnostic ordering. */
  rules: PolicyRule[];
}

export interface PdpOptions {
  /** Reputation tracker shared by stateful rules. Default: an in-process MemoryReputationStore. */
  reputationStore?: ReputationStore;
  /** Overrides the policy's failure mode. */
  failureMode?: FailureMode;
  /** Overrides the policy's reputation timeout. */
  reputationTimeoutMs?: number;
  logger?: Logger;
  /** Clock used for `RuleContext.now`. Default: Date.now */
  clock?: () => number;
  /** Called for every rule whose evaluation failed, after the failure mode is applied. */
  onRuleError?: (error: RuleEvaluationError) => void;
}
