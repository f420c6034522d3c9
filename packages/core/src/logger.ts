/**
 * Scoped console logging.
 *
 * Messages are prefixed with `[lawkit/<scope>]` and filtered against the
 * configured `log.level` at the time of the call, so `config.set()` takes
 * effect without recreating loggers.
 *
 * @example
 * ```typescript
 * const log = createLogger("variants");
 * log.warn(`duplicate variant name "${name}"`);
 * ```
 */

import { config, type LogLevel } from "./config.js";

export interface Logger {
  readonly scope: string;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

type EmitLevel = Exclude<LogLevel, "silent">;

const severity: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Whether a message at `level` passes the configured threshold.
 */
export function isLevelEnabled(level: EmitLevel): boolean {
  return severity[level] >= severity[config.getLogLevel()];
}

export function createLogger(scope: string): Logger {
  const prefix = `[lawkit/${scope}]`;

  const emit = (level: EmitLevel, message: string, details: unknown[]): void => {
    if (!isLevelEnabled(level)) return;
    switch (level) {
      case "debug":
        console.debug(`${prefix} ${message}`, ...details);
        break;
      case "info":
        console.info(`${prefix} ${message}`, ...details);
        break;
      case "warn":
        console.warn(`${prefix} ${message}`, ...details);
        break;
      case "error":
        console.error(`${prefix} ${message}`, ...details);
        break;
    }
  };

  return {
    scope,
    debug: (message, ...details) => emit("debug", message, details),
    info: (message, ...details) => emit("info", message, details),
    warn: (message, ...details) => emit("warn", message, details),
    error: (message, ...details) => emit("error", message, details),
  };
}
