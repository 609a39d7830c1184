import type { PolicyRule, Rule } from "../types.js";
import { redirectUrisRule } from "./redirectUris.js";
import { clientNameRule } from "./clientName.js";
import { rateLimitRule } from "./rateLimit.js";
import { userAgentRule } from "./userAgent.js";
import { metadataUrisRule } from "./metadataUris.js";
import { grantTypesRule } from "./grantTypes.js";

export { redirectUrisRule, REDIRECT_URIS_RULE_ID } from "./redirectUris.js";
export { clientNameRule, CLIENT_NAME_RULE_ID } from "./clientName.js";
export { rateLimitRule, requesterKey, RATE_LIMIT_RULE_ID, UNKNOWN_REQUESTER } from "./rateLimit.js";
export { userAgentRule, globToRegExp, USER_AGENT_RULE_ID, DEFAULT_USER_AGENT_PATTERNS } from "./userAgent.js";
export { metadataUrisRule, METADATA_URIS_RULE_ID } from "./metadataUris.js";
export { grantTypesRule, GRANT_TYPES_RULE_ID, DEFAULT_ALLOWED_GRANT_TYPES } from "./grantTypes.js";
export { PASS, finding } from "./result.js";
export type { RuleOptions } from "./result.js";

/** Instantiate one policy entry. */
export function buildRule(entry: PolicyRule): Rule {
  switch (entry.type) {
    case "redirect-uris":
      return redirectUrisRule(entry);
    case "client-name":
      return clientNameRule(entry);
    case "rate-limit":
      return rateLimitRule(entry);
    case "user-agent":
      return userAgentRule(entry);
    case "metadata-uris":
      return metadataUrisRule(entry);
    case "grant-types":
      return grantTypesRule(entry);
  }
}
