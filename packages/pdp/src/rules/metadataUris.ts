import type { MetadataUrisConfig, Rule, RuleResult } from "../types.js";
import { PASS, finding, type RuleOptions } from "./result.js";
import { parseUrl, stringField } from "../utils/metadata.js";

export const METADATA_URIS_RULE_ID = "metadata_uri_policy";

/** URIs shown to end users on consent screens; they must point at the client's own site. */
const HOSTED_URI_FIELDS = ["logo_uri", "tos_uri", "policy_uri"] as const;

function sameSite(host: string, clientHost: string): boolean {
  return host === clientHost || host.endsWith(`.${clientHost}`);
}

export function metadataUrisRule(opts: RuleOptions<MetadataUrisConfig> = {}): Rule {
  const id = opts.id ?? METADATA_URIS_RULE_ID;
  const action = opts.action ?? "deny";
  const requireClientUri = opts.config?.requireClientUri ?? false;
  const requireHttps = opts.config?.requireHttps ?? true;
  const requireSameHost = opts.config?.requireSameHost ?? true;

  return {
    id,
    evaluate(input): RuleResult {
      const meta = input.clientMetadata;
      const problems: string[] = [];

      function check(field: string): URL | undefined {
        const value = stringField(meta, field);
        if (value === undefined) return undefined;
        if (value === null) {
          problems.push(`${field} must be a string`);
          return undefined;
        }
        const url = parseUrl(value);
        if (!url) {
          problems.push(`${field} "${value}" is not a valid URL`);
          return undefined;
        }
        if (requireHttps && url.protocol !== "https:") {
          problems.push(`${field} "${value}" must use https`);
        }
        return url;
      }

      const clientUri = check("client_uri");
      if (requireClientUri && stringField(meta, "client_uri") === undefined) {
        problems.push("client_uri is required");
      }

      for (const field of HOSTED_URI_FIELDS) {
        const url = check(field);
        if (!url || !clientUri || !requireSameHost) continue;
        if (!sameSite(url.hostname, clientUri.hostname)) {
          problems.push(`${field} host "${url.hostname}" does not match client_uri host "${clientUri.hostname}"`);
        }
      }

      return problems.length === 0 ? PASS : finding(action, problems.join("; "));
    },
  };
}
