/**
 * Structured logging for item and batch operations.
 *
 * The library never decides where logs go; callers pass a {@link Logger}
 * in the client config, or get a console logger at `warn`.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Context attached to a log entry. Rendered as JSON by the console logger. */
export type LogContext = Readonly<Record<string, unknown>>;

export interface Logger {
  readonly debug: (message: string, context?: LogContext) => void;
  readonly info: (message: string, context?: LogContext) => void;
  readonly warn: (message: string, context?: LogContext) => void;
  readonly error: (message: string, context?: LogContext) => void;
}

const LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Formats one entry as `[timestamp] [LEVEL] message {context}`. */
export const formatLogLine = (
  level: LogLevel,
  message: string,
  context?: LogContext,
  now: Date = new Date(),
): string => {
  const contextText = context ? ` ${JSON.stringify(context)}` : "";
  return `[${now.toISOString()}] [${level.toUpperCase()}] ${message}${contextText}`;
};

/**
 * Creates a logger that writes entries at or above `minLevel` to the console.
 *
 * @example
 * ```ts
 * const client = createClient({ transport, logger: createConsoleLogger("debug") });
 * ```
 */
export const createConsoleLogger = (minLevel: LogLevel = "info"): Logger => {
  const write = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) return;
    const line = formatLogLine(level, message, context);
    switch (level) {
      case "error":
        console.error(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "debug":
        console.debug(line);
        break;
      default:
        console.info(line);
    }
  };

  return Object.freeze({
    debug: (message: string, context?: LogContext) => write("debug", message, context),
    info: (message: string, context?: LogContext) => write("info", message, context),
    warn: (message: string, context?: LogContext) => write("warn", message, context),
    error: (message: string, context?: LogContext) => write("error", message, context),
  });
};

const noop = (): void => {};

/** Discards every entry. */
export const silentLogger: Logger = Object.freeze({
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
});
