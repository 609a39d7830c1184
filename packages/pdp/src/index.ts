export * from "./types.js";
export { PolicyEngine, evaluate, DEFAULT_REPUTATION_TIMEOUT_MS, EVALUATION_UNAVAILABLE } from "./pdp.js";
export { aggregate } from "./aggregate.js";
export { normalizeInput } from "./normalize/input.js";
export { parsePolicy, compilePolicy, defaultPolicy } from "./policy.js";
export { InputError, RuleEvaluationError, ReputationUnavailableError, PolicyError } from "./errors.js";
export { createConsoleLogger, silentLogger } from "./logger.js";
export { MemoryReputationStore } from "./stores/memoryReputationStore.js";
export { RedisReputationStore, createRedisReputationStore, INCREMENT_SCRIPT } from "./stores/redisReputationStore.js";
export type { RedisEvalClient, RedisReputationStoreOptions } from "./stores/redisReputationStore.js";

// Built-in rules
export {
  buildRule,
  redirectUrisRule,
  clientNameRule,
  rateLimitRule,
  userAgentRule,
  metadataUrisRule,
  grantTypesRule,
  requesterKey,
  globToRegExp,
  finding,
  PASS,
  REDIRECT_URIS_RULE_ID,
  CLIENT_NAME_RULE_ID,
  RATE_LIMIT_RULE_ID,
  USER_AGENT_RULE_ID,
  METADATA_URIS_RULE_ID,
  GRANT_TYPES_RULE_ID,
  UNKNOWN_REQUESTER,
  DEFAULT_USER_AGENT_PATTERNS,
  DEFAULT_ALLOWED_GRANT_TYPES,
} from "./rules/index.js";
export type { RuleOptions } from "./rules/index.js";
