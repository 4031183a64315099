import { readAlchemyConfig, type AlchemyLogLevel } from "./alchemy-config";

type LogMethod = "error" | "warn" | "info" | "debug";

const LEVEL_RANK: Record<AlchemyLogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface AlchemyLogger {
  error: (message: string, payload?: Record<string, unknown>) => void;
  warn: (message: string, payload?: Record<string, unknown>) => void;
  info: (message: string, payload?: Record<string, unknown>) => void;
  debug: (message: string, payload?: Record<string, unknown>) => void;
}

export const shouldLog = (method: LogMethod, level: AlchemyLogLevel): boolean =>
  LEVEL_RANK[level] >= LEVEL_RANK[method];

/**
 * Tagged console logger. The level is read from ALCHEMY_LOG_LEVEL on every
 * call so a batch run can be quieted without rebuilding loggers.
 */
export const createAlchemyLogger = (tag: string): AlchemyLogger => {
  const prefix = `[alchemy:${tag}]`;
  const emit = (method: LogMethod, message: string, payload?: Record<string, unknown>) => {
    if (!shouldLog(method, readAlchemyConfig().logLevel)) return;
    if (payload) {
      console[method](`${prefix} ${message}`, payload);
    } else {
      console[method](`${prefix} ${message}`);
    }
  };
  return {
    error: (message, payload) => emit("error", message, payload),
    warn: (message, payload) => emit("warn", message, payload),
    info: (message, payload) => emit("info", message, payload),
    debug: (message, payload) => emit("debug", message, payload),
  };
};
