// Console logging with a level threshold. Components take a Logger so tests can
// pass a recording one.

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function createConsoleLogger(scope: string, level: LogLevel = "info"): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (l: LogLevel): boolean => LEVEL_ORDER[l] >= threshold;
  const prefix = `[${scope}]`;

  return {
    debug(msg, ...args) {
      if (enabled("debug")) console.log(`${prefix} ${msg}`, ...args);
    },
    info(msg, ...args) {
      if (enabled("info")) console.log(`${prefix} ${msg}`, ...args);
    },
    warn(msg, ...args) {
      if (enabled("warn")) console.warn(`${prefix} ${msg}`, ...args);
    },
    error(msg, ...args) {
      if (enabled("error")) console.error(`${prefix} ${msg}`, ...args);
    },
  };
}

/** Derive a child logger that tags every line with an extra scope segment. */
export function childLogger(parent: Logger, scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    debug: (msg, ...args) => parent.debug(`${tag} ${msg}`, ...args),
    info: (msg, ...args) => parent.info(`${tag} ${msg}`, ...args),
    warn: (msg, ...args) => parent.warn(`${tag} ${msg}`, ...args),
    error: (msg, ...args) => parent.error(`${tag} ${msg}`, ...args),
  };
}
