import type { RuleAction, RuleResult } from "../types.js";

export const PASS: RuleResult = { outcome: "pass" };

/** Map a policy action onto the rule result that reports `reason`. */
export function finding(action: RuleAction, reason: string): RuleResult {
  switch (action) {
    case "deny":
      return { outcome: "reject", reason, fatal: true };
    case "flag":
      return { outcome: "reject", reason, fatal: false };
    case "warn":
      return { outcome: "warn", reason };
  }
}

/** Options every built-in rule factory accepts. */
export interface RuleOptions<C> {
  id?: string;
  action?: RuleAction;
  config?: C;
}
