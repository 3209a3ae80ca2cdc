import { type Logger, type LoggerOptions, pino } from "pino";

/**
 * Builds the options of the package logger for a `COINRPC_LOG_LEVEL` value.
 * Output goes through pino-pretty only when a level other than `silent` is asked for;
 * otherwise the logger writes plain JSON lines at `info` and starts no worker thread.
 */
const loggerOptions = (level: string | undefined): LoggerOptions => {
  if (level === undefined || level === "silent") {
    return { name: "coinrpc", level: level ?? "info" };
  }

  return {
    name: "coinrpc",
    level,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: true,
      },
    },
  };
};

/**
 * The package logger. Its level is read from `COINRPC_LOG_LEVEL` once, at import time.
 */
const logger: Logger = pino(loggerOptions(process.env.COINRPC_LOG_LEVEL));

export { logger, loggerOptions };
export type { Logger };
