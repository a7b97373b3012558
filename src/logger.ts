import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger } from "pino";

export interface CreateLoggerOpts {
  level?: string;
  pretty?: boolean;
  name?: string;
}

/**
 * Build a pino logger. `pretty` routes output through pino-pretty
 * (a worker-thread transport), which is meant for local runs only.
 */
export function createLogger(opts: CreateLoggerOpts = {}): Logger {
  const options: LoggerOptions = {
    level: opts.level ?? process.env.LOG_LEVEL ?? "info",
    name: opts.name,
  };
  if (opts.pretty) {
    options.transport = {
      target: "pino-pretty",
      options: { colorize: true },
    };
  }
  return pino(options);
}

export const logger = createLogger({
  pretty: process.env.LOG_PRETTY === "true" || process.env.LOG_PRETTY === "1",
});
