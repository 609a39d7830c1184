import { createHash } from "crypto";
import type { PolicyInput, RateLimitConfig, Rule, RuleResult } from "../types.js";
import { PASS, finding, type RuleOptions } from "./result.js";

export const RATE_LIMIT_RULE_ID = "requester_rate_limit";

/** Bucket shared by every request that arrives without an IP address. */
export const UNKNOWN_REQUESTER = "unknown";

export function requesterKey(input: PolicyInput, keyBy: RateLimitConfig["keyBy"] = "ip"): string {
  const ip = input.requester.ipAddress ?? UNKNOWN_REQUESTER;
  if (keyBy === "ip") return `ip:${ip}`;
  const ua = input.requester.userAgent;
  const uaHash = ua === undefined ? UNKNOWN_REQUESTER : createHash("sha256").update(ua).digest("hex").slice(0, 16);
  return `ip+ua:${ip}:${uaHash}`;
}

/**
 * Rejects the (limit+1)-th registration attempt from one requester within
 * `windowMs`. Each evaluation counts as one attempt.
 */
export function rateLimitRule(opts: RuleOptions<RateLimitConfig> & { config: RateLimitConfig }): Rule {
  const id = opts.id ?? RATE_LIMIT_RULE_ID;
  const action = opts.action ?? "deny";
  const { limit, windowMs, keyBy } = opts.config;

  return {
    id,
    async evaluate(input, ctx): Promise<RuleResult> {
      const key = requesterKey(input, keyBy);
      const count = await ctx.reputation.incrementAndCheck(key, windowMs);
      if (count <= limit) return PASS;
      const who = input.requester.ipAddress ?? "an unknown address";
      return finding(action, `${count} registration attempts from ${who} within ${windowMs}ms exceeds limit of ${limit}`);
    },
  };
}
