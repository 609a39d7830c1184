import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import type { Decision } from "@regguard/pdp";
import { runCheck, EXIT_ALLOWED, EXIT_DENIED, EXIT_INVALID_INPUT } from "../check.js";

describe("runCheck", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "regguard-check-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function file(name: string, content: unknown): string {
    const path = join(dir, name);
    writeFileSync(path, typeof content === "string" ? content : JSON.stringify(content));
    return path;
  }

  it("exits 0 for a flagged request and prints the decision", async () => {
    const input = file("input.json", {
      client_metadata: { redirect_uris: ["https://example.com/cb"] },
      requester: { user_agent: "Wget/1.21" },
    });
    const result = await runCheck(input);
    expect(result.exitCode).toBe(EXIT_ALLOWED);
    expect(JSON.parse(result.output)).toEqual({
      verdict: "flag",
      violations: [],
      warnings: [{ rule: "blocked_user_agent_pattern", message: 'user agent "Wget/1.21" matches blocked pattern "Wget/*"' }],
    });
  });

  it("exits 1 for a denied request", async () => {
    const input = file("input.json", { client_metadata: { grant_types: ["password"] }, requester: {} });
    const result = await runCheck(input);
    expect(result.exitCode).toBe(EXIT_DENIED);
    const decision: Decision = JSON.parse(result.output);
    expect(decision.verdict).toBe("deny");
    expect(decision.violations).toContainEqual({ rule: "grant_type_policy", message: 'grant type "password" is not allowed' });
  });

  it("applies a policy file", async () => {
    const policy = file("policy.json", { policyVersion: "0.1", rules: [{ type: "user-agent", config: { flagMissing: true } }] });
    const input = file("input.json", { client_metadata: {}, requester: {} });
    const result = await runCheck(input, policy);
    expect(JSON.parse(result.output)).toEqual({
      verdict: "flag",
      violations: [],
      warnings: [{ rule: "blocked_user_agent_pattern", message: "user agent not supplied" }],
    });
  });

  it("exits 2 for a request that breaks the contract", async () => {
    const input = file("input.json", { client_metadata: {} });
    const result = await runCheck(input);
    expect(result.exitCode).toBe(EXIT_INVALID_INPUT);
    expect(result.output.startsWith("Invalid registration request")).toBe(true);
  });

  it("exits 2 for a file that is not JSON", async () => {
    const input = file("input.json", "{");
    const result = await runCheck(input);
    expect(result.exitCode).toBe(EXIT_INVALID_INPUT);
    expect(result.output.startsWith(`Cannot read ${input}:`)).toBe(true);
  });
});
