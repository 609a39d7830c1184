#!/usr/bin/env node
/**
 * regguard sidecar CLI
 *
 * Environment variables (serve):
 *   PORT               - Server port (default: 3100)
 *   HOST               - Server host (default: 0.0.0.0)
 *   LOG_LEVEL          - Log level (default: info)
 *   REDIS_URL          - Redis URL for shared reputation counters (optional)
 *   POLICY_PATH        - JSON policy file (optional, --policy wins)
 *   SERVICE_NAME       - Service name for logging (default: regguard-sidecar)
 *   SWEEP_INTERVAL_MS  - In-memory counter sweep interval (default: 60000)
 *   REQUEST_TIMEOUT_MS - Per-request timeout (default: 10000)
 */

import { Command } from "commander";
import { defaultPolicy, type PolicySet } from "@regguard/pdp";
import { loadConfig } from "./config.js";
import { startSidecar } from "./server.js";
import { PolicyWatcher } from "./policyWatcher.js";
import { recordError } from "./metrics.js";
import { runCheck } from "./check.js";
import { VERSION } from "./version.js";

const program = new Command();

program
  .name("regguard-sidecar")
  .description("Client registration policy decision service")
  .version(VERSION);

program
  .command("serve", { isDefault: true })
  .description("Start the HTTP decision service")
  .option("-p, --policy <path>", "JSON policy file")
  .option("-w, --watch", "Reload the policy file when it changes", false)
  .action(async (options: { policy?: string; watch: boolean }) => {
    const config = loadConfig();
    const policyPath = options.policy ?? config.policyPath;

    const watcher = policyPath ? new PolicyWatcher(policyPath) : null;
    const sidecar = await startSidecar(config, { policy: watcher?.current ?? defaultPolicy });
    const log = sidecar.server.log;

    if (watcher && options.watch) {
      watcher.on("reload", (policy: PolicySet) => sidecar.setPolicy(policy));
      watcher.on("error", (error: Error) => {
        recordError("policy_reload");
        log.error({ err: error }, "Policy reload failed, keeping previous policy");
      });
      watcher.start();
      log.info({ policyPath }, "Watching policy file for changes");
    }

    const shutdown = async (signal: string) => {
      log.info(`Got ${signal}, shutting down`);
      watcher?.stop();
      await sidecar.close();
    };
    for (const signal of ["SIGTERM", "SIGINT"] as const) {
      process.once(signal, () => {
        shutdown(signal).catch((error: unknown) => {
          log.error({ err: error }, "Shutdown failed");
          process.exitCode = 1;
        });
      });
    }
  });

program
  .command("check")
  .description("Evaluate one registration request file and print the decision")
  .argument("<input>", "JSON file with {client_metadata, requester}")
  .option("-p, --policy <path>", "JSON policy file")
  .action(async (input: string, options: { policy?: string }) => {
    const result = await runCheck(input, options.policy);
    if (result.exitCode === 2) console.error(result.output);
    else console.log(result.output);
    process.exitCode = result.exitCode;
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error("regguard-sidecar:", error instanceof Error ? error.message : error);
  process.exit(1);
});
