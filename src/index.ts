export * from "./artifacts/index.js";
export * from "./protocol/index.js";
export * from "./tasks/index.js";
export {
  ARTIFACT_STATUSES,
  ARTIFACT_TYPES,
  ArtifactMetadataSchema,
  ArtifactPrioritySchema,
  ArtifactRecordSchema,
  ArtifactStatusSchema,
  ArtifactTypeSchema,
  ArtifactVersionSchema,
  ContentEncodingSchema,
  ExportDocumentSchema,
  ImportDocumentSchema,
  isMessageType,
  isPartType,
  isPriority,
  isStatusCode,
  isTaskState,
  MESSAGE_TYPES,
  MessageHeadersSchema,
  MessageTypeSchema,
  PART_TYPES,
  PartTypeSchema,
  PermissionsSchema,
  PrioritySchema,
  StatusCodeSchema,
  TASK_STATES,
  TaskAssignmentSchema,
  TaskStateSchema,
  type WireMessage,
  WireMessageSchema,
  type WirePart,
  WirePartSchema,
} from "./schemas/index.js";
export {
  ARTIFACT_TYPE_TTL,
  defaultExpiryFor,
  storeWithExpiryPolicy,
  TTL,
} from "./policies/ttl.js";
export { renderArtifactSummary } from "./renderers/artifact-summary.js";
export { type AppConfig, ConfigError, loadConfig } from "./config.js";
export {
  createLogger,
  type CreateLoggerOpts,
  type Logger,
  logger,
} from "./logger.js";
export {
  emitMetric,
  InMemoryMetrics,
  type MetricLabels,
  type MetricsSink,
  noopMetrics,
} from "./metrics.js";
export {
  type A2AContext,
  type A2AContextOpts,
  createA2AContext,
} from "./context.js";
