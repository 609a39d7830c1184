import type { ClientNameConfig, Rule, RuleResult } from "../types.js";
import { PASS, finding, type RuleOptions } from "./result.js";

export const CLIENT_NAME_RULE_ID = "client_name_length";

/** Bounds `client_name` and its localized `client_name#<tag>` variants. */
export function clientNameRule(opts: RuleOptions<ClientNameConfig> = {}): Rule {
  const id = opts.id ?? CLIENT_NAME_RULE_ID;
  const action = opts.action ?? "flag";
  const minLength = opts.config?.minLength ?? 1;
  const maxLength = opts.config?.maxLength ?? 100;

  return {
    id,
    evaluate(input): RuleResult {
      const problems: string[] = [];
      for (const [key, value] of Object.entries(input.clientMetadata)) {
        if (key !== "client_name" && !key.startsWith("client_name#")) continue;
        if (typeof value !== "string") {
          problems.push(`${key} must be a string`);
          continue;
        }
        // count code points, not UTF-16 units
        const length = [...value].length;
        if (length < minLength) problems.push(`${key} length ${length} is below minimum ${minLength}`);
        else if (length > maxLength) problems.push(`${key} length ${length} exceeds maximum ${maxLength}`);
      }
      return problems.length === 0 ? PASS : finding(action, problems.join("; "));
    },
  };
}
