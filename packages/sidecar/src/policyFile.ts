import { readFileSync } from "fs";
import { resolve } from "path";
import { parsePolicy, PolicyError, type PolicySet } from "@regguard/pdp";

/**
 * Read and validate a JSON policy file.
 * @throws PolicyError for unreadable files, malformed JSON and schema violations.
 */
export function loadPolicyFile(path: string): PolicySet {
  const resolved = resolve(path);
  let content: string;
  try {
    content = readFileSync(resolved, "utf8");
  } catch (error) {
    throw new PolicyError(`Cannot read policy file ${resolved}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new PolicyError(`Policy file ${resolved} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parsePolicy(raw);
}
