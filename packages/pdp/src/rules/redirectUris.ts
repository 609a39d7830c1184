import type { RedirectUrisConfig, Rule, RuleResult } from "../types.js";
import { PASS, finding, type RuleOptions } from "./result.js";
import { isLoopbackHost, parseUrl, stringListField } from "../utils/metadata.js";

export const REDIRECT_URIS_RULE_ID = "redirect_uri_scheme";

// RFC 8252 private-use schemes use reverse domain names, e.g. com.example.app
const REVERSE_DOMAIN_SCHEME = /^[a-z][a-z0-9+-]*(\.[a-z0-9+-]+)+$/;

/**
 * Redirect URIs must be https, http on a loopback host, or an accepted
 * custom scheme. Fragments are never allowed.
 */
export function redirectUrisRule(opts: RuleOptions<RedirectUrisConfig> = {}): Rule {
  const id = opts.id ?? REDIRECT_URIS_RULE_ID;
  const action = opts.action ?? "deny";
  const allowLoopbackHttp = opts.config?.allowLoopbackHttp ?? true;
  const allowReverseDomain = opts.config?.allowReverseDomainSchemes ?? true;
  const customSchemes = new Set((opts.config?.allowedCustomSchemes ?? []).map(s => s.toLowerCase().replace(/:$/, "")));

  function problemWith(uri: string): string | undefined {
    const url = parseUrl(uri);
    if (!url) return `redirect_uri "${uri}" is not a valid URL`;
    if (url.hash) return `redirect_uri "${uri}" must not contain a fragment`;

    const scheme = url.protocol.slice(0, -1);
    if (scheme === "https") return undefined;
    if (scheme === "http") {
      if (allowLoopbackHttp && isLoopbackHost(url.hostname)) return undefined;
      return `redirect_uri "${uri}" must use https`;
    }
    if (customSchemes.has(scheme)) return undefined;
    if (allowReverseDomain && REVERSE_DOMAIN_SCHEME.test(scheme)) return undefined;
    return `redirect_uri "${uri}" uses disallowed scheme "${scheme}"`;
  }

  return {
    id,
    evaluate(input): RuleResult {
      const uris = stringListField(input.clientMetadata, "redirect_uris");
      if (uris === undefined) return PASS;
      if (uris === null) return finding(action, "redirect_uris must be an array of strings");

      const problems = uris.map(problemWith).filter((p): p is string => p !== undefined);
      if (problems.length === 0) return PASS;
      return finding(action, problems.join("; "));
    },
  };
}
