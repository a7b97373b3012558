// Types
export { BROADCAST } from "./types.js";
export type {
  JsonObject,
  Message,
  MessageContent,
  MessageHeaders,
  MessageOpts,
  MessageType,
  Part,
  PartContent,
  PartType,
} from "./types.js";
export { Priority, StatusCode } from "../schemas/protocol.js";

// Errors
export { ProtocolError } from "./errors.js";
export type { ProtocolErrorCode } from "./errors.js";

// Status codes
export {
  getStatusDescription,
  isSuccessStatus,
  STATUS_DESCRIPTIONS,
} from "./status.js";

// Messages
export {
  canRetry,
  cloneMessage,
  createDiscoveryMessage,
  createErrorMessage,
  createHeartbeatMessage,
  createMessage,
  createNotificationMessage,
  createRequestMessage,
  createResponseMessage,
  getCustomHeader,
  incrementRetry,
  isMessage,
  isMessageExpired,
  parsePriority,
  parseWireMessage,
  setCustomHeader,
  toWireMessage,
  validateMessage,
} from "./message.js";
export type { MessageInit, ResponseOpts } from "./message.js";

// Parts and content handlers
export {
  contentSize,
  contentTypeForPath,
  createBinaryPart,
  createDataPart,
  createFilePart,
  createPart,
  createTextPart,
  DEFAULT_CONTENT_TYPES,
  fromWirePart,
  partContentAsBytes,
  partContentAsData,
  partContentAsText,
  toWirePart,
  validatePart,
} from "./parts.js";
export type { PartOpts } from "./parts.js";
export {
  binaryHandler,
  dataHandler,
  getContentHandler,
  handlerForPartType,
  isJsonObject,
  textHandler,
} from "./content-handlers.js";
export type { ContentHandler } from "./content-handlers.js";

// Multi-part
export {
  addDataPart,
  addPart,
  addTextPart,
  createMultipartMessage,
  createMultipartResponse,
  getBoundary,
  getDataParts,
  getFileParts,
  getMainContent,
  getPart,
  getPartCount,
  getPartsByType,
  getTextContent,
  getTextParts,
  getTotalSize,
  hasParts,
  isSinglePart,
  removePart,
} from "./multipart.js";

// Artifact announcements
export {
  createArtifactCreatedMessage,
  createArtifactRequestedMessage,
} from "./notifications.js";

// Routing
export { Mailbox } from "./mailbox.js";
export { MessageRouter, ROUTER_ID } from "./router.js";
export type {
  AgentEntry,
  AgentInfo,
  AgentStatus,
  HandlerResult,
  MessageHandler,
  MessageRouterOpts,
  RegisterOpts,
  RoutingStats,
} from "./router.js";
