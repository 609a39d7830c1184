import type { ClientMetadata } from "../types.js";

/** `undefined` when absent, the string when it is one, `null` when present with another type. */
export function stringField(meta: ClientMetadata, key: string): string | null | undefined {
  if (!Object.prototype.hasOwnProperty.call(meta, key)) return undefined;
  const value = meta[key];
  return typeof value === "string" ? value : null;
}

/** Same contract as stringField for arrays of strings. */
export function stringListField(meta: ClientMetadata, key: string): string[] | null | undefined {
  if (!Object.prototype.hasOwnProperty.call(meta, key)) return undefined;
  const value = meta[key];
  if (!Array.isArray(value)) return null;
  const out: string[] = [];
  for (const item of value) {
    if (typeof item !== "string") return null;
    out.push(item);
  }
  return out;
}

export function parseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

const LOOPBACK_HOSTS = new Set(["localhost", "127.0.0.1", "[::1]"]);

export function isLoopbackHost(hostname: string): boolean {
  return LOOPBACK_HOSTS.has(hostname);
}
