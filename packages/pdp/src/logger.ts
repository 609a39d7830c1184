import type { Logger } from "./types.js";

/**
 * Console-backed logger used when the host application does not pass one.
 * Output: `<prefix> <msg> {json fields}` on the matching console method.
 */
export function createConsoleLogger(prefix = "[regguard]", opts: { debug?: boolean } = {}): Logger {
  const write = (fn: (...args: unknown[]) => void, obj: Record<string, unknown>, msg?: string) => {
    fn(prefix, msg ?? "", JSON.stringify(obj, errorReplacer));
  };

  return {
    debug: (obj, msg) => {
      if (opts.debug) write(console.debug, obj, msg);
    },
    info: (obj, msg) => write(console.info, obj, msg),
    warn: (obj, msg) => write(console.warn, obj, msg),
    error: (obj, msg) => write(console.error, obj, msg),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}
