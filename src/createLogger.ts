import pino from "pino";

export type LogLevel =
  | "trace"
  | "debug"
  | "info"
  | "warn"
  | "error"
  | "fatal"
  | "silent";

export type Logger = pino.Logger;

export type LoggerOptions = {
  level?: LogLevel;
  name?: string;
  pretty?: boolean;
};

const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Creates the pino logger handed to data contexts, sessions and event
 * managers.
 *
 * @param options - Logger settings
 * @param options.level - Minimum level; falls back to `LOG_LEVEL`, then `info`
 * @param options.name - Logger name, `datacontext` by default
 * @param options.pretty - Pretty-print through pino-pretty instead of JSON lines
 * @param destination - Where JSON lines are written (stdout by default)
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: "trace" });
 * const context = createDataContext(session, { logger });
 * ```
 *
 * @since 1.0.0
 */
export function createLogger(
  options: LoggerOptions = {},
  destination?: pino.DestinationStream,
): Logger {
  const envLevel = process.env.LOG_LEVEL;
  const level = options.level ?? (isLogLevel(envLevel) ? envLevel : "info");

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options.name ?? "datacontext",
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (options.pretty) {
    return pino({
      ...pinoOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return destination ? pino(pinoOptions, destination) : pino(pinoOptions);
}
