import type { LogLevel } from "./config";

export type Logger = {
  debug: (message: string, data?: unknown) => void;
  info: (message: string, data?: unknown) => void;
  warn: (message: string, data?: unknown) => void;
  error: (message: string, data?: unknown) => void;
  child: (scope: string) => Logger;
};

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const threshold = RANK[level];

  const write = (at: Exclude<LogLevel, "silent">, message: string, data?: unknown) => {
    if (RANK[at] < threshold) return;
    const line = `[${scope}] ${message}`;
    const sink = at === "error" ? console.error : at === "warn" ? console.warn : console.log;
    if (data === undefined) sink(line);
    else sink(line, data);
  };

  return {
    debug: (message, data) => write("debug", message, data),
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
    child: (child) => createLogger(`${scope}:${child}`, level),
  };
}
