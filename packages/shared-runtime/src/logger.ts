import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger } from "pino";

type Env = Record<string, string | undefined>;

// Pretty print unless running in production or under the test runner.
const resolveTransport = (env: Env): LoggerOptions["transport"] => {
  if (env.NODE_ENV === "production" || env.NODE_ENV === "test") {
    return undefined;
  }
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      ignore: "pid,hostname",
      translateTime: "SYS:standard",
    },
  };
};

/**
 * Creates an application logger; `LOG_LEVEL` sets the default level.
 */
export const createLogger = (options: LoggerOptions = {}, env: Env = process.env): Logger =>
  pino({
    level: env.LOG_LEVEL || "info",
    transport: resolveTransport(env),
    ...options,
  });

/**
 * Application logger.
 */
export const logger = createLogger();
