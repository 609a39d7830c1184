import type { IncrementArgs, ReputationStore } from "../types.js";
import { ReputationUnavailableError } from "../errors.js";

/**
 * Minimal Redis client surface, matching node-redis v4's
 * `client.eval(script, { keys, arguments })`. Adapters forward `signal`
 * with `commandOptions({ signal })` so an abandoned call leaves the queue.
 */
export interface RedisEvalClient {
  eval(script: string, options: { keys: string[]; arguments: string[] }, signal?: AbortSignal): Promise<unknown>;
}

export interface RedisReputationStoreOptions {
  client: RedisEvalClient;
  /** Key prefix. Default: 'regguard:reputation:' */
  prefix?: string;
}

/**
 * Fixed window: INCR and start the key's expiry on the first hit, in one round trip.
 * Redis runs scripts atomically, so concurrent increments are never lost.
 */
export const INCREMENT_SCRIPT = `
local count = redis.call('INCR', KEYS[1])
if count == 1 or redis.call('PTTL', KEYS[1]) < 0 then
  redis.call('PEXPIRE', KEYS[1], ARGV[1])
end
return count
`;

/**
 * Redis-backed reputation counters shared by every sidecar replica.
 * Windows are timed by Redis key expiry, not by the caller's clock.
 *
 * @example
 * ```typescript
 * import { createClient } from 'redis';
 * import { createRedisReputationStore, PolicyEngine, compilePolicy } from '@regguard/pdp';
 *
 * const client = createClient({ url: process.env.REDIS_URL });
 * await client.connect();
 *
 * const engine = new PolicyEngine(compilePolicy(policy), {
 *   reputationStore: createRedisReputationStore({ client }),
 * });
 * ```
 */
export class RedisReputationStore implements ReputationStore {
  private client: RedisEvalClient;
  private prefix: string;

  constructor(options: RedisReputationStoreOptions) {
    this.client = options.client;
    this.prefix = options.prefix ?? "regguard:reputation:";
  }

  async incrementAndCheck(args: IncrementArgs): Promise<number> {
    const { signal } = args;
    if (signal?.aborted) throw aborted();

    let reply: unknown;
    try {
      reply = await untilAborted(
        this.client.eval(INCREMENT_SCRIPT, { keys: [this.prefix + args.key], arguments: [String(args.windowMs)] }, signal),
        signal
      );
    } catch (error) {
      if (error instanceof ReputationUnavailableError) throw error;
      if (signal?.aborted) throw aborted(error);
      throw new ReputationUnavailableError("Redis increment failed", { cause: error });
    }

    const count = typeof reply === "string" ? Number(reply) : reply;
    if (typeof count !== "number" || !Number.isInteger(count)) {
      throw new ReputationUnavailableError(`Unexpected Redis reply: ${String(reply)}`);
    }
    return count;
  }
}

function aborted(cause?: unknown): ReputationUnavailableError {
  return new ReputationUnavailableError("Reputation lookup aborted", { cause, timedOut: true });
}

/** Settle with `call`, or reject as soon as `signal` aborts, whichever comes first. */
function untilAborted<T>(call: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return call;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(aborted());
    signal.addEventListener("abort", onAbort, { once: true });
    void call.then(resolve, reject).finally(() => signal.removeEventListener("abort", onAbort));
  });
}

export function createRedisReputationStore(options: RedisReputationStoreOptions): RedisReputationStore {
  return new RedisReputationStore(options);
}
