import { pino, type Logger } from "pino";

let logger: Logger | undefined;

/**
 * Module-level logger, silent unless `GROK_LOG_LEVEL` sets a level.
 */
export function getLogger(): Logger {
  if (!logger) {
    logger = pino({
      name: "grok-client",
      level: process.env.GROK_LOG_LEVEL ?? "silent",
      redact: {
        paths: ["apiKey", "authorization", "*.apiKey", "*.authorization"],
        censor: "[redacted]",
      },
    });
  }
  return logger;
}

/** Route the client's logs through the application's own pino instance. */
export function setLogger(next: Logger): void {
  logger = next;
}

export function setLogLevel(level: string): void {
  getLogger().level = level;
}
