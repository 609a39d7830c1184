import ipaddr from "ipaddr.js";
import type { PolicyInput, RawPolicyInput, Requester } from "../types.js";
import { InputError } from "../errors.js";
import { ajv, describeErrors, readSchema } from "../utils/schemas.js";

const validateRaw = ajv.compile<RawPolicyInput>(readSchema("client-registration-input.schema.json"));

/**
 * Validate a raw registration request against the input contract and
 * produce the canonical form rules see.
 *
 * @throws InputError when a required key is missing, a value has the wrong
 *   shape, or `ip_address` is not an IPv4/IPv6 literal.
 */
export function normalizeInput(raw: unknown): PolicyInput {
  if (!validateRaw(raw)) {
    const issues = describeErrors(validateRaw.errors);
    throw new InputError(`Invalid registration request: ${issues.join("; ")}`, issues);
  }

  const requester: Requester = {};
  const ip = raw.requester.ip_address;
  if (ip !== undefined) requester.ipAddress = canonicalIp(ip);
  const userAgent = raw.requester.user_agent;
  if (userAgent !== undefined) requester.userAgent = userAgent;

  return {
    clientMetadata: { ...raw.client_metadata },
    requester,
  };
}

/**
 * One spelling per address: IPv6 in RFC 5952 form, IPv4-mapped IPv6
 * unmapped to dotted IPv4. Reputation keys depend on it.
 */
function canonicalIp(ip: string): string {
  if (!ipaddr.isValid(ip)) {
    const issue = `/requester/ip_address: "${ip}" is not an IP address`;
    throw new InputError(`Invalid registration request: ${issue}`, [issue]);
  }
  return ipaddr.process(ip).toString();
}
