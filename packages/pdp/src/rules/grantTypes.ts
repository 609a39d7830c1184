import type { GrantTypesConfig, Rule, RuleResult } from "../types.js";
import { PASS, finding, type RuleOptions } from "./result.js";
import { stringListField } from "../utils/metadata.js";

export const GRANT_TYPES_RULE_ID = "grant_type_policy";

export const DEFAULT_ALLOWED_GRANT_TYPES = [
  "authorization_code",
  "refresh_token",
  "urn:ietf:params:oauth:grant-type:device_code",
  "client_credentials",
];

/**
 * Restricts `grant_types` to an allow-list. An omitted `grant_types` means
 * `["authorization_code"]`, which needs at least one redirect URI.
 */
export function grantTypesRule(opts: RuleOptions<GrantTypesConfig> = {}): Rule {
  const id = opts.id ?? GRANT_TYPES_RULE_ID;
  const action = opts.action ?? "deny";
  const allowed = new Set(opts.config?.allowed ?? DEFAULT_ALLOWED_GRANT_TYPES);

  return {
    id,
    evaluate(input): RuleResult {
      const meta = input.clientMetadata;
      const declared = stringListField(meta, "grant_types");
      if (declared === null) return finding(action, "grant_types must be an array of strings");
      const grantTypes = declared ?? ["authorization_code"];

      const problems = grantTypes
        .filter(g => !allowed.has(g))
        .map(g => `grant type "${g}" is not allowed`);

      if (grantTypes.includes("authorization_code")) {
        const redirectUris = stringListField(meta, "redirect_uris");
        if (!redirectUris || redirectUris.length === 0) {
          problems.push("authorization_code grant requires at least one redirect_uri");
        }
      }

      return problems.length === 0 ? PASS : finding(action, problems.join("; "));
    },
  };
}
