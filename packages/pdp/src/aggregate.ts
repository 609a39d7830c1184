import type { Decision, Diagnostic, RuleOutcome } from "./types.js";

/**
 * Reduce per-rule results to one decision.
 *
 * - any fatal reject: deny, every reject listed as a violation
 * - otherwise any non-fatal reject or warning: flag, all listed as warnings
 * - otherwise: allow
 *
 * Diagnostics keep the order of `outcomes` (rule registration order).
 */
export function aggregate(outcomes: readonly RuleOutcome[]): Decision {
  const rejects: Diagnostic[] = [];
  const warns: Diagnostic[] = [];
  const findings: Diagnostic[] = [];
  let fatal = false;

  for (const { ruleId, result } of outcomes) {
    if (result.outcome === "pass") continue;
    const diag = { rule: ruleId, message: result.reason };
    findings.push(diag);
    if (result.outcome === "reject") {
      rejects.push(diag);
      if (result.fatal) fatal = true;
    } else {
      warns.push(diag);
    }
  }

  if (fatal) return { verdict: "deny", violations: rejects, warnings: warns };
  if (findings.length > 0) return { verdict: "flag", violations: [], warnings: findings };
  return { verdict: "allow", violations: [], warnings: [] };
}
