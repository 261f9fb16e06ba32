import type { Logger } from "../../text-sync/src/logger.mjs";
import type { LogLevel } from "./config.mjs";

const rank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

/**
 * Console logger with a `[scope]` prefix that drops everything below
 * `level`.
 */
export function createLogger(level: LogLevel, scope = "text-sync", sink: Logger = console): Logger {
  const prefix = `[${scope}]`;
  const enabled = (at: LogLevel) => rank[at] >= rank[level];

  return {
    debug: (...args) => {
      if (enabled("debug")) sink.debug(prefix, ...args);
    },
    info: (...args) => {
      if (enabled("info")) sink.info(prefix, ...args);
    },
    warn: (...args) => {
      if (enabled("warn")) sink.warn(prefix, ...args);
    },
    error: (...args) => {
      if (enabled("error")) sink.error(prefix, ...args);
    }
  };
}
