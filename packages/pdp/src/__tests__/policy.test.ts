import { describe, it, expect } from "vitest";
import { compilePolicy, defaultPolicy, parsePolicy } from "../policy.js";
import { PolicyError } from "../errors.js";

function issuesOf(raw: unknown): string[] {
  try {
    parsePolicy(raw);
  } catch (error) {
    if (error instanceof PolicyError) return error.issues;
    throw error;
  }
  throw new Error("expected PolicyError");
}

describe("parsePolicy", () => {
  it("accepts the default policy", () => {
    expect(parsePolicy(defaultPolicy)).toBe(defaultPolicy);
  });

  it("accepts a policy parsed from JSON", () => {
    const raw = JSON.parse(
      JSON.stringify({
        policyVersion: "0.1",
        defaults: { failureMode: "fail-open", reputationTimeoutMs: 100 },
        rules: [
          { type: "user-agent", action: "flag", config: { patterns: ["curl/*"], flagMissing: true } },
          { type: "rate-limit", id: "per_ip", config: { limit: 5, windowMs: 60000, keyBy: "ip+user_agent" } },
        ],
      })
    );
    expect(parsePolicy(raw).rules).toHaveLength(2);
  });

  it("rejects an unknown policy version", () => {
    expect(issuesOf({ policyVersion: "2", rules: [] })).toEqual(["/policyVersion: must be equal to constant"]);
  });

  it("rejects unknown rule types", () => {
    expect(issuesOf({ policyVersion: "0.1", rules: [{ type: "bogus" }] })).toContain(
      "/rules/0/type: must be equal to one of the allowed values"
    );
  });

  it("requires rate-limit config", () => {
    expect(issuesOf({ policyVersion: "0.1", rules: [{ type: "rate-limit" }] })).toContain(
      "/rules/0: must have required property 'config'"
    );
  });

  it("rejects config keys a rule does not know", () => {
    expect(
      issuesOf({ policyVersion: "0.1", rules: [{ type: "client-name", config: { maxLen: 3 } }] })
    ).toContain("/rules/0/config: must NOT have additional properties");
  });

  it("rejects duplicate rule ids", () => {
    expect(() => parsePolicy({ policyVersion: "0.1", rules: [{ type: "user-agent" }, { type: "user-agent" }] })).toThrow(
      'duplicate rule id "blocked_user_agent_pattern"'
    );
  });

  it("allows the same rule type twice under distinct ids", () => {
    const policy = parsePolicy({
      policyVersion: "0.1",
      rules: [
        { type: "rate-limit", id: "burst", config: { limit: 3, windowMs: 1000 } },
        { type: "rate-limit", id: "hourly", config: { limit: 50, windowMs: 3_600_000 } },
      ],
    });
    expect(compilePolicy(policy).map(r => r.id)).toEqual(["burst", "hourly"]);
  });
});
