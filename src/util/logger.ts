import { config } from "dotenv";
config();

import { destination, pino } from "pino";

const VALID_LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

// stdout carries the report, so logs go to stderr
const STDERR = 2;

function getLogLevel(): string {
  const envLogLevel = process.env.LOG_LEVEL?.toLowerCase();

  if (envLogLevel && VALID_LOG_LEVELS.includes(envLogLevel)) {
    return envLogLevel;
  }

  return "info";
}

/**
 * The logger instance we're going to use
 * Configured differently for dev, test and production
 */
export let log = pino({ level: "silent" });

if (process.env.NODE_ENV === "production") {
  log = pino({ level: getLogLevel() }, destination(STDERR));
} else if (process.env.NODE_ENV !== "test") {
  log = pino({
    transport: {
      // Enable pretty print when dev dependencies are installed
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss.l",
        ignore: "pid,hostname",
        destination: STDERR,
      },
    },
    base: null, // avoid adding pid, hostname and name properties to each log.
    level: getLogLevel(),
  });
}
