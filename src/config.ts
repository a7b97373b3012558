import path from "node:path";
import { z } from "zod";

const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

const BooleanFlag = z
  .enum(["true", "false", "1", "0", ""])
  .transform((v) => v === "true" || v === "1");

const EnvSchema = z.object({
  A2A_STORE_ROOT: z.string().min(1).default("./data/artifacts"),
  A2A_DB_PATH: z.string().min(1).default("./data/artifacts.db"),
  A2A_CACHE_SIZE: z.coerce.number().int().positive().default(100),
  A2A_MESSAGE_TTL_SECONDS: z.coerce.number().int().positive().default(1800),
  A2A_MAX_RETRIES: z.coerce.number().int().nonnegative().default(3),
  A2A_MAX_TASKS: z.coerce.number().int().positive().default(1000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  LOG_PRETTY: BooleanFlag.default("false"),
});

export interface AppConfig {
  storeRoot: string;
  dbPath: string; // ":memory:" keeps the index in-process
  cacheSize: number;
  messageTtlSeconds: number;
  maxRetries: number;
  maxTasks: number;
  logLevel: (typeof LOG_LEVELS)[number];
  logPretty: boolean;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly keys: string[],
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Read configuration from environment variables.
 * Paths are resolved against the current working directory.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Readonly<AppConfig> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join("."));
    throw new ConfigError(
      `Invalid configuration: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`,
      keys,
    );
  }

  const e = parsed.data;
  return Object.freeze({
    storeRoot: path.resolve(e.A2A_STORE_ROOT),
    dbPath:
      e.A2A_DB_PATH === ":memory:" ? e.A2A_DB_PATH : path.resolve(e.A2A_DB_PATH),
    cacheSize: e.A2A_CACHE_SIZE,
    messageTtlSeconds: e.A2A_MESSAGE_TTL_SECONDS,
    maxRetries: e.A2A_MAX_RETRIES,
    maxTasks: e.A2A_MAX_TASKS,
    logLevel: e.LOG_LEVEL,
    logPretty: e.LOG_PRETTY,
  });
}
