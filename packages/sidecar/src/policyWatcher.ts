/**
 * Policy Hot Reload
 * Watches the policy file and swaps in new versions as they are saved
 */

import { watch, existsSync, type FSWatcher } from "fs";
import { EventEmitter } from "events";
import { resolve } from "path";
import type { PolicySet } from "@regguard/pdp";
import { loadPolicyFile } from "./policyFile.js";

export interface PolicyWatcherOptions {
  /** Debounce delay in ms (default: 500) */
  debounceMs?: number;
  onReload?: (policy: PolicySet) => void;
  onError?: (error: Error) => void;
}

/**
 * Emits `reload` with each new valid policy and `error` when a save cannot
 * be loaded; the last good policy stays current in that case.
 */
export class PolicyWatcher extends EventEmitter {
  private watcher: FSWatcher | null = null;
  private debounceTimer: NodeJS.Timeout | null = null;
  private currentPolicy: PolicySet;
  private readonly resolvedPath: string;
  private readonly debounceMs: number;
  private readonly onReload: (policy: PolicySet) => void;
  private readonly onError: (error: Error) => void;

  /** @throws PolicyError when the initial load fails */
  constructor(policyPath: string, options: PolicyWatcherOptions = {}) {
    super();
    this.resolvedPath = resolve(policyPath);
    this.debounceMs = options.debounceMs ?? 500;
    this.onReload = options.onReload ?? (() => {});
    this.onError = options.onError ?? (() => {});
    this.currentPolicy = loadPolicyFile(this.resolvedPath);
  }

  get current(): PolicySet {
    return this.currentPolicy;
  }

  start(): void {
    if (this.watcher) return;

    if (!existsSync(this.resolvedPath)) {
      this.fail(new Error(`Policy file not found: ${this.resolvedPath}`));
      return;
    }

    this.watcher = watch(this.resolvedPath, eventType => {
      // editors that save by rename emit "rename" rather than "change"
      if (eventType === "change" || eventType === "rename") {
        this.scheduleReload();
      }
    });
    this.watcher.on("error", error => this.fail(error));
  }

  stop(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
    if (this.watcher) {
      this.watcher.close();
      this.watcher = null;
    }
  }

  /** Load the file now. Returns whether the new policy was accepted. */
  reload(): boolean {
    let next: PolicySet;
    try {
      next = loadPolicyFile(this.resolvedPath);
    } catch (error) {
      this.fail(error instanceof Error ? error : new Error(String(error)));
      return false;
    }
    this.currentPolicy = next;
    this.onReload(next);
    this.emit("reload", next);
    return true;
  }

  private scheduleReload(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.reload();
    }, this.debounceMs);
  }

  private fail(error: Error): void {
    this.onError(error);
    // EventEmitter throws on "error" without listeners
    if (this.listenerCount("error") > 0) this.emit("error", error);
  }
}
