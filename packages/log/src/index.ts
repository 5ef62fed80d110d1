import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger };

export function createLogger(name: string, opts: LoggerOptions = {}): Logger {
  // no transport worker thread under vitest
  const pretty = process.env.NODE_ENV !== "production" && !process.env.VITEST;
  return pino({
    name,
    level: process.env.LOG_LEVEL ?? (process.env.VITEST ? "silent" : "info"),
    ...(pretty
      ? { transport: { target: "pino-pretty", options: { colorize: true, translateTime: "SYS:standard" } } }
      : {}),
    ...opts,
  });
}
