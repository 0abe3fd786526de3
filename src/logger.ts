/**
 * Logging.
 *
 * Components receive a Logger instead of writing to the console directly.
 * The console implementation prefixes lines with a `[Scope]` tag.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"] as const;

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Logger for a sub-component, e.g. `MailRules:Engine` */
  child(scope: string): Logger;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Sink the console logger writes to. Swappable in tests.
 */
export interface LogSink {
  log(line: string, ...rest: unknown[]): void;
  warn(line: string, ...rest: unknown[]): void;
  error(line: string, ...rest: unknown[]): void;
}

export function createConsoleLogger(
  scope: string,
  level: LogLevel = "info",
  sink: LogSink = console
): Logger {
  const threshold = LEVEL_RANK[level];

  const write = (lvl: LogLevel, message: string, context?: LogContext): void => {
    if (LEVEL_RANK[lvl] < threshold) return;
    const line = `[${scope}] ${message}`;
    const rest = context && Object.keys(context).length > 0 ? [context] : [];
    if (lvl === "error") sink.error(line, ...rest);
    else if (lvl === "warn") sink.warn(line, ...rest);
    else sink.log(line, ...rest);
  };

  return {
    debug: (message, context) => write("debug", message, context),
    info: (message, context) => write("info", message, context),
    warn: (message, context) => write("warn", message, context),
    error: (message, context) => write("error", message, context),
    child: (child) => createConsoleLogger(`${scope}:${child}`, level, sink),
  };
}

export function createSilentLogger(): Logger {
  const noop = (): void => {};
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}
