// Types
export type {
  ArtifactContent,
  ArtifactInit,
  ArtifactMetadata,
  ArtifactPriority,
  ArtifactRecord,
  ArtifactStatistics,
  ArtifactStatus,
  ArtifactType,
  ArtifactUpdates,
  ArtifactVersion,
  CleanupResult,
  ContentEncoding,
  ExportDocument,
  ImportResult,
  MetadataUpdates,
  Permissions,
  SearchFilters,
} from "./types.js";

// Errors
export { ArtifactError } from "./errors.js";
export type { ArtifactErrorDetails, ErrorCode } from "./errors.js";

// Model
export { Artifact, defaultFormat, hasContent } from "./artifact.js";
export {
  parseArtifactPriority,
  parseArtifactStatus,
  parseArtifactType,
} from "./enums.js";
export {
  createArtifact,
  createRecommendationArtifact,
  createReportArtifact,
  createVisualizationArtifact,
} from "./factories.js";
export type { CreateArtifactOpts } from "./factories.js";
export {
  assertTransition,
  canTransition,
  nextStatuses,
} from "./transitions.js";
export {
  bumpPatch,
  compareVersions,
  formatVersion,
  INITIAL_VERSION,
  isVersionString,
  parseVersion,
} from "./version.js";
export type { SemVer } from "./version.js";

// Interface
export type { ArtifactStore } from "./store.js";

// Implementation
export { SqliteArtifactStore } from "./sqlite.js";
export type { SqliteArtifactStoreOptions } from "./sqlite.js";

// Utilities
export {
  canonicalBytes,
  contentMetrics,
  sha256Hex,
  stableStringify,
} from "./canonical.js";
export { KeyedWriteQueue } from "./lock.js";
export { normalize, normalizeTags } from "./normalize.js";
