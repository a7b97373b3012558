import { SqliteArtifactStore } from "./artifacts/index.js";
import { type AppConfig, loadConfig } from "./config.js";
import { createLogger, type Logger } from "./logger.js";
import { type MetricsSink, noopMetrics } from "./metrics.js";
import { MessageRouter, type MessageOpts } from "./protocol/index.js";
import { TaskManager } from "./tasks/index.js";

export interface A2AContextOpts {
  env?: Record<string, string | undefined>; // default: process.env
  config?: Partial<AppConfig>; // applied over the env values
  logger?: Logger;
  metrics?: MetricsSink;
}

/**
 * Everything an agent needs, built once at process start and passed in
 * at construction. There is no module-level router or store.
 */
export interface A2AContext {
  config: Readonly<AppConfig>;
  logger: Logger;
  metrics: MetricsSink;
  router: MessageRouter;
  artifacts: SqliteArtifactStore;
  /** Resolves attached artifact ids against `artifacts`. */
  tasks: TaskManager;
  /** Configured request TTL and retry budget, for the message factories. */
  messageDefaults: Pick<MessageOpts, "ttl_seconds" | "max_retries">;
  /** Stop task cleanup, close mailboxes and the database. Idempotent. */
  shutdown(): void;
}

export function createA2AContext(opts: A2AContextOpts = {}): A2AContext {
  const config: Readonly<AppConfig> = Object.freeze({
    ...loadConfig(opts.env),
    ...opts.config,
  });
  const logger =
    opts.logger ??
    createLogger({
      level: config.logLevel,
      pretty: config.logPretty,
      name: "agentpost",
    });
  const metrics = opts.metrics ?? noopMetrics;

  const router = new MessageRouter({ logger, metrics });
  const artifacts = new SqliteArtifactStore({
    dbPath: config.dbPath,
    storageRoot: config.storeRoot,
    cacheSize: config.cacheSize,
    logger,
    metrics,
  });
  const tasks = new TaskManager({
    maxTasks: config.maxTasks,
    artifacts,
    logger,
    metrics,
  });

  let closed = false;
  return {
    config,
    logger,
    metrics,
    router,
    artifacts,
    tasks,
    messageDefaults: {
      ttl_seconds: config.messageTtlSeconds,
      max_retries: config.maxRetries,
    },
    shutdown() {
      if (closed) return;
      closed = true;
      tasks.shutdown();
      router.shutdown();
      artifacts.close();
      logger.debug("Context shut down");
    },
  };
}
