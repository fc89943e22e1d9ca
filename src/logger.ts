import pino from "pino";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
const DEFAULT_LOG_LEVEL: LogLevel = "info";

function shouldColorizeLogs(): boolean {
  if (process.env.NO_COLOR === "1" || process.env.NO_COLOR === "true") {
    return false;
  }
  return process.stderr.isTTY === true;
}

// Diagnostics go to stderr so stdout stays free for command output.
export const logger = pino({
  name: "cmdwire",
  level: process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL,
  transport: {
    target: "pino-pretty",
    options: {
      colorize: shouldColorizeLogs(),
      destination: 2,
    },
  },
});

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function configureLogger(level?: string): void {
  const normalized = (level || process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL).trim().toLowerCase();
  if (isLogLevel(normalized)) {
    logger.level = normalized;
    return;
  }
  logger.warn({ level }, "Invalid logger level in config; keeping current level");
}
