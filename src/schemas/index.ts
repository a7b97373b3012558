export {
  isMessageType,
  isPartType,
  isPriority,
  isStatusCode,
  MESSAGE_TYPES,
  type MessageType,
  MessageTypeSchema,
  PART_TYPES,
  type PartType,
  PartTypeSchema,
  Priority,
  PrioritySchema,
  StatusCode,
  StatusCodeSchema,
} from "./protocol.js";
export {
  MessageHeadersSchema,
  type WireMessage,
  WireMessageSchema,
  type WirePart,
  WirePartSchema,
} from "./message.js";
export {
  ARTIFACT_STATUSES,
  ARTIFACT_TYPES,
  type ArtifactMetadata,
  ArtifactMetadataSchema,
  type ArtifactPriority,
  ArtifactPrioritySchema,
  type ArtifactRecord,
  ArtifactRecordSchema,
  type ArtifactStatus,
  ArtifactStatusSchema,
  type ArtifactType,
  ArtifactTypeSchema,
  type ArtifactVersion,
  ArtifactVersionSchema,
  type ContentEncoding,
  ContentEncodingSchema,
  type ExportDocument,
  ExportDocumentSchema,
  ImportDocumentSchema,
  PermissionsSchema,
} from "./artifact.js";
export {
  isTaskState,
  TASK_STATES,
  type TaskAssignment,
  TaskAssignmentSchema,
  type TaskState,
  TaskStateSchema,
} from "./task.js";
