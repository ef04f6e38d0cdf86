import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger };

type CreateLoggerOptions = {
  name?: string;
  level?: string;
};

const defaultOptions: LoggerOptions = {
  level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info"),
  transport:
    process.env.NODE_ENV === "development"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            singleLine: true
          }
        }
      : undefined
};

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino({
    ...defaultOptions,
    name: options.name ?? "newsdesk",
    level: options.level ?? defaultOptions.level
  });
}
