import pino from "pino";

export type Logger = pino.Logger;

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Diagnostics logger. Writes synchronously to stderr so stdout carries only
 * command output.
 */
export function createLogger(
  level: LogLevel = "warn",
  context: Record<string, unknown> = {},
): Logger {
  return pino(
    { level, base: { name: "noteref", ...context } },
    pino.destination({ fd: 2, sync: true }),
  );
}

/** Logger that drops everything; used by tests and library callers. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
