import { describe, it, expect } from "vitest";
import { INCREMENT_SCRIPT, RedisReputationStore, type RedisEvalClient } from "../stores/redisReputationStore.js";
import { ReputationUnavailableError } from "../errors.js";

/** In-process stand-in that executes the increment script's semantics. */
class FakeRedis implements RedisEvalClient {
  now = 0;
  keys = new Map<string, { count: number; expiresAt: number | null }>();

  async eval(script: string, options: { keys: string[]; arguments: string[] }): Promise<unknown> {
    if (script !== INCREMENT_SCRIPT) throw new Error("NOSCRIPT");
    const key = options.keys[0] ?? "";
    const ttl = Number(options.arguments[0]);

    let entry = this.keys.get(key);
    if (entry && entry.expiresAt !== null && entry.expiresAt <= this.now) {
      this.keys.delete(key);
      entry = undefined;
    }
    if (!entry) {
      entry = { count: 0, expiresAt: null };
      this.keys.set(key, entry);
    }
    entry.count += 1;
    if (entry.count === 1 || entry.expiresAt === null) entry.expiresAt = this.now + ttl;
    return entry.count;
  }
}

describe("RedisReputationStore", () => {
  it("increments under the configured prefix", async () => {
    const redis = new FakeRedis();
    const store = new RedisReputationStore({ client: redis, prefix: "test:" });

    expect(await store.incrementAndCheck({ key: "ip:203.0.113.5", windowMs: 1000, now: 0 })).toBe(1);
    expect(await store.incrementAndCheck({ key: "ip:203.0.113.5", windowMs: 1000, now: 0 })).toBe(2);
    expect([...redis.keys.keys()]).toEqual(["test:ip:203.0.113.5"]);
  });

  it("uses the default prefix", async () => {
    const redis = new FakeRedis();
    await new RedisReputationStore({ client: redis }).incrementAndCheck({ key: "ip:a", windowMs: 1000, now: 0 });
    expect([...redis.keys.keys()]).toEqual(["regguard:reputation:ip:a"]);
  });

  it("restarts the count after the key expires", async () => {
    const redis = new FakeRedis();
    const store = new RedisReputationStore({ client: redis });
    await store.incrementAndCheck({ key: "ip:a", windowMs: 1000, now: 0 });
    redis.now = 1000;
    expect(await store.incrementAndCheck({ key: "ip:a", windowMs: 1000, now: 1000 })).toBe(1);
  });

  it("accepts integer replies encoded as strings", async () => {
    const client: RedisEvalClient = { eval: async () => "7" };
    expect(await new RedisReputationStore({ client }).incrementAndCheck({ key: "k", windowMs: 1, now: 0 })).toBe(7);
  });

  it("wraps client failures", async () => {
    const client: RedisEvalClient = {
      eval: async () => {
        throw new Error("ECONNREFUSED");
      },
    };
    const store = new RedisReputationStore({ client });
    await expect(store.incrementAndCheck({ key: "k", windowMs: 1, now: 0 })).rejects.toThrow(
      new ReputationUnavailableError("Redis increment failed")
    );
  });

  it("rejects replies that are not integers", async () => {
    const client: RedisEvalClient = { eval: async () => null };
    await expect(
      new RedisReputationStore({ client }).incrementAndCheck({ key: "k", windowMs: 1, now: 0 })
    ).rejects.toBeInstanceOf(ReputationUnavailableError);
  });

  it("hands the abort signal to the client", async () => {
    let seen: AbortSignal | undefined;
    const client: RedisEvalClient = {
      eval: async (_script, _options, signal) => {
        seen = signal;
        return 1;
      },
    };
    const controller = new AbortController();
    await new RedisReputationStore({ client }).incrementAndCheck({ key: "k", windowMs: 1, now: 0, signal: controller.signal });
    expect(seen).toBe(controller.signal);
  });

  it("rejects when the signal aborts after the call was sent", async () => {
    const client: RedisEvalClient = { eval: () => new Promise<unknown>(() => {}) };
    const controller = new AbortController();
    const pending = new RedisReputationStore({ client }).incrementAndCheck({
      key: "k",
      windowMs: 1,
      now: 0,
      signal: controller.signal,
    });
    controller.abort();

    const error = await pending.then(
      () => undefined,
      (reason: unknown) => reason
    );
    expect(error).toBeInstanceOf(ReputationUnavailableError);
    expect(error).toMatchObject({ message: "Reputation lookup aborted", timedOut: true });
  });

  it("reports a client's own abort error as an aborted lookup", async () => {
    const controller = new AbortController();
    const client: RedisEvalClient = {
      eval: async () => {
        controller.abort();
        throw new Error("The command was aborted");
      },
    };
    await expect(
      new RedisReputationStore({ client }).incrementAndCheck({ key: "k", windowMs: 1, now: 0, signal: controller.signal })
    ).rejects.toThrow(new ReputationUnavailableError("Reputation lookup aborted"));
  });

  it("does not call Redis once the signal is aborted", async () => {
    const redis = new FakeRedis();
    const controller = new AbortController();
    controller.abort();
    await expect(
      new RedisReputationStore({ client: redis }).incrementAndCheck({
        key: "k",
        windowMs: 1,
        now: 0,
        signal: controller.signal,
      })
    ).rejects.toBeInstanceOf(ReputationUnavailableError);
    expect(redis.keys.size).toBe(0);
  });
});
