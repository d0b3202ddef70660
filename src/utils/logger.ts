import { pino, type Logger } from "pino";

/**
 * One logger instance for the entire Node service.
 * - Pretty‑prints in dev, pure JSON in production.
 * - Log level is driven by LOG_LEVEL, defaults to “info”.
 * - Tests run silent unless LOG_LEVEL says otherwise.
 */
const isTest = process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;

const logger: Logger = pino({
  level: process.env.LOG_LEVEL || (isTest ? "silent" : "info"),
  transport:
    process.env.NODE_ENV !== "production" && !isTest
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "yyyy‑mm‑dd HH:MM:ss.l",
            ignore: "pid,hostname",
          },
        }
      : undefined,
});

/** Child logger tagged with the emitting module. */
export const moduleLogger = (module: string): Logger => logger.child({ module });

export type { Logger };
export default logger;
