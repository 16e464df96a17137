export type LogLevel = "info" | "debug";

export interface Logger {
  log: (...a: unknown[]) => void;
  err: (...a: unknown[]) => void;
  warn: (...a: unknown[]) => void;
  debug: (...a: unknown[]) => void;
}

const PREFIX = "[gctf]";

export function createLogger(level: LogLevel = "info"): Logger {
  const log = (...a: unknown[]) => console.log(PREFIX, ...a);
  const err = (...a: unknown[]) => console.error(PREFIX, ...a);
  const warn = (...a: unknown[]) => console.error(PREFIX, "warning:", ...a);
  const debug = level === "debug"
    ? (...a: unknown[]) => console.log(PREFIX, "debug:", ...a)
    : () => {};
  return { log, err, warn, debug };
}

// For library callers and tests that do not care about output
export const silentLogger: Logger = {
  log: () => {},
  err: () => {},
  warn: () => {},
  debug: () => {},
};
