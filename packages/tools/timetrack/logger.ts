import pino from "pino";

export const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const;

export type LogLevel = typeof LOG_LEVELS[number];

let rootLogger: pino.Logger | undefined;

/**
 * Root logger. Writes JSON lines to stderr so stdout stays reserved for
 * command output.
 */
export function getLogger(): pino.Logger {
  if (!rootLogger) {
    rootLogger = pino(
      { name: "timetrack", level: process.env.LOG_LEVEL || "warn" },
      pino.destination({ dest: 2, sync: true }),
    );
  }
  return rootLogger;
}

export function setLogLevel(level: LogLevel): void {
  getLogger().level = level;
}

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  return getLogger().child({ ...context });
}
