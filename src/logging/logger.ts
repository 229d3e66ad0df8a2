// src/logging/logger.ts
// Levelled console logger shared by the machines and the CLI

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some(level => level === value);
}

/**
 * Where formatted lines go. `console` satisfies this.
 */
export interface LogSink {
  debug(line: string): void;
  info(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Same sink and level, messages prefixed with `[scope]`. */
  child(scope: string): Logger;
}

export type LoggerOptions = {
  level?: LogLevel;
  scope?: string;
  sink?: LogSink;
};

export function formatLine(message: string, scope?: string, data?: Record<string, unknown>): string {
  const prefix = scope ? `[${scope}] ` : "";
  const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : "";
  return `${prefix}${message}${suffix}`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? "info";
  const sink = options.sink ?? console;
  const scope = options.scope;

  const emit = (at: Exclude<LogLevel, "silent">, message: string, data?: Record<string, unknown>) => {
    if (LEVEL_RANK[at] < LEVEL_RANK[level]) return;
    sink[at](formatLine(message, scope, data));
  };

  return {
    level,
    debug: (message, data) => emit("debug", message, data),
    info: (message, data) => emit("info", message, data),
    warn: (message, data) => emit("warn", message, data),
    error: (message, data) => emit("error", message, data),
    child: (childScope) =>
      createLogger({ level, sink, scope: scope ? `${scope}:${childScope}` : childScope }),
  };
}

export const silentLogger: Logger = createLogger({ level: "silent" });
