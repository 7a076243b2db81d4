export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(message: string, fields?: Record<string, unknown>): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(ORDER, value);
}

/** Writes to the console, dropping anything below `level`. */
export function createConsoleLogger(level: LogLevel = "info", scope = "provenance-mark"): Logger {
  const enabled = (l: LogLevel) => ORDER[l] >= ORDER[level];
  const line = (message: string, fields?: Record<string, unknown>) =>
    fields && Object.keys(fields).length > 0 ? `[${scope}] ${message} ${JSON.stringify(fields)}` : `[${scope}] ${message}`;

  return {
    debug: (m, f) => { if (enabled("debug")) console.debug(line(m, f)); },
    info: (m, f) => { if (enabled("info")) console.log(line(m, f)); },
    warn: (m, f) => { if (enabled("warn")) console.warn(line(m, f)); },
    error: (m, f) => { if (enabled("error")) console.error(line(m, f)); },
  };
}

export const silentLogger: Logger = createConsoleLogger("silent");
