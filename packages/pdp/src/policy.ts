import type { PolicySet, Rule } from "./types.js";
import { PolicyError } from "./errors.js";
import { buildRule } from "./rules/index.js";
import { ajv, describeErrors, readSchema } from "./utils/schemas.js";

const validatePolicySet = ajv.compile<PolicySet>(readSchema("policy.schema.json"));

/**
 * Validate a policy document (typically parsed JSON).
 * @throws PolicyError listing every schema issue.
 */
export function parsePolicy(raw: unknown): PolicySet {
  if (!validatePolicySet(raw)) {
    const issues = describeErrors(validatePolicySet.errors);
    throw new PolicyError(`Invalid policy: ${issues.join("; ")}`, issues);
  }

  const ids = new Set<string>();
  for (const rule of compilePolicy(raw)) {
    if (ids.has(rule.id)) {
      throw new PolicyError(`Invalid policy: duplicate rule id "${rule.id}"`, [`/rules: duplicate rule id "${rule.id}"`]);
    }
    ids.add(rule.id);
  }
  return raw;
}

/** Instantiate the policy's rules in declaration order. */
export function compilePolicy(policy: PolicySet): Rule[] {
  return policy.rules.map(buildRule);
}

/**
 * Policy used when no policy file is configured.
 * Mirrors the usual homeserver registration checks plus a per-IP rate limit.
 */
export const defaultPolicy: PolicySet = {
  policyVersion: "0.1",
  defaults: {
    failureMode: "fail-closed",
    reputationTimeoutMs: 250,
  },
  rules: [
    { type: "redirect-uris" },
    { type: "grant-types" },
    { type: "metadata-uris" },
    { type: "client-name" },
    { type: "rate-limit", config: { limit: 10, windowMs: 60_000 } },
    { type: "user-agent" },
  ],
};
