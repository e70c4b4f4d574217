import { pino, type Logger, type LoggerOptions } from "pino";

const isDev = process.env.NODE_ENV !== "production";

/**
 * Build the process logger.
 * Development: pretty-printed. Production: structured JSON.
 */
export function createLogger(options?: LoggerOptions): Logger {
  return pino({
    level: process.env.LOG_LEVEL || "info",
    ...(isDev
      ? {
          transport: {
            target: "pino-pretty",
            options: { colorize: true },
          },
        }
      : {}),
    ...options,
  });
}

export type { Logger };
