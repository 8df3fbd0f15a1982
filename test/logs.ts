import { createLogger, type Logger } from "../src";

export type LogRecord = {
  level: string;
  msg: string;
  [key: string]: unknown;
};

/**
 * Logger at trace level that keeps every record in memory.
 */
export function createCapturingLogger(): {
  logger: Logger;
  records: LogRecord[];
} {
  const records: LogRecord[] = [];
  const logger = createLogger(
    { level: "trace" },
    {
      write(line: string) {
        records.push(JSON.parse(line));
      },
    },
  );

  return { logger, records };
}

export const silentLogger = createLogger({ level: "silent" });
