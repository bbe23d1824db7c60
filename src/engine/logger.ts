export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Console logger writing `[Prefix] message` lines to stderr.
 */
export function createConsoleLogger(prefix: string, level: LogLevel = "warn"): Logger {
  const threshold = LEVEL_ORDER[level];
  const write = (at: Exclude<LogLevel, "silent">, message: string): void => {
    if (LEVEL_ORDER[at] < threshold) return;
    const line = `[${prefix}] ${message}`;
    if (at === "error") console.error(line);
    else console.warn(line);
  };
  return {
    debug: (m) => write("debug", m),
    info: (m) => write("info", m),
    warn: (m) => write("warn", m),
    error: (m) => write("error", m),
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
