import { readFileSync } from "fs";
import { InputError, PolicyEngine, defaultPolicy, silentLogger, type PolicySet } from "@regguard/pdp";
import { loadPolicyFile } from "./policyFile.js";

export const EXIT_ALLOWED = 0;
export const EXIT_DENIED = 1;
export const EXIT_INVALID_INPUT = 2;

export interface CheckResult {
  exitCode: number;
  output: string;
}

/**
 * Evaluate a single request file. Allow and flag exit 0, deny exits 1,
 * an unreadable or invalid request exits 2.
 */
export async function runCheck(inputPath: string, policyPath?: string): Promise<CheckResult> {
  const policy: PolicySet = policyPath ? loadPolicyFile(policyPath) : defaultPolicy;
  const engine = PolicyEngine.fromPolicy(policy, { logger: silentLogger });

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(inputPath, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { exitCode: EXIT_INVALID_INPUT, output: `Cannot read ${inputPath}: ${message}` };
  }

  try {
    const decision = await engine.evaluate(raw);
    return {
      exitCode: decision.verdict === "deny" ? EXIT_DENIED : EXIT_ALLOWED,
      output: JSON.stringify(decision, null, 2),
    };
  } catch (error) {
    if (error instanceof InputError) {
      return { exitCode: EXIT_INVALID_INPUT, output: [error.message, ...error.issues.map(i => `  ${i}`)].join("\n") };
    }
    throw error;
  }
}
