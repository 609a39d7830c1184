import type { Rule, RuleResult, UserAgentConfig } from "../types.js";
import { PASS, finding, type RuleOptions } from "./result.js";

export const USER_AGENT_RULE_ID = "blocked_user_agent_pattern";

/** Scripted HTTP clients that rarely register on behalf of a real application. */
export const DEFAULT_USER_AGENT_PATTERNS = [
  "curl/*",
  "Wget/*",
  "python-requests/*",
  "python-urllib/*",
  "Go-http-client/*",
  "libwww-perl/*",
  "okhttp/*",
];

export function globToRegExp(pattern: string): RegExp {
  const body = pattern
    .split("*")
    .map(part => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(`^${body}$`, "i");
}

/** Reports user agents matching a blocklisted glob pattern. */
export function userAgentRule(opts: RuleOptions<UserAgentConfig> = {}): Rule {
  const id = opts.id ?? USER_AGENT_RULE_ID;
  const action = opts.action ?? "warn";
  const flagMissing = opts.config?.flagMissing ?? false;
  const patterns = (opts.config?.patterns ?? DEFAULT_USER_AGENT_PATTERNS).map(p => ({
    source: p,
    re: globToRegExp(p),
  }));

  return {
    id,
    evaluate(input): RuleResult {
      const ua = input.requester.userAgent;
      if (ua === undefined) {
        return flagMissing ? finding(action, "user agent not supplied") : PASS;
      }
      const hit = patterns.find(p => p.re.test(ua));
      if (!hit) return PASS;
      return finding(action, `user agent "${ua}" matches blocked pattern "${hit.source}"`);
    },
  };
}
