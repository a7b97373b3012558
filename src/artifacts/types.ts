import type {
  ArtifactMetadata,
  ArtifactPriority,
  ArtifactStatus,
  ArtifactType,
  ArtifactVersion,
} from "../schemas/artifact.js";

export type {
  ArtifactMetadata,
  ArtifactPriority,
  ArtifactRecord,
  ArtifactStatus,
  ArtifactType,
  ArtifactVersion,
  ContentEncoding,
  ExportDocument,
} from "../schemas/artifact.js";

/** Text, structured JSON (object or array), or raw bytes. */
export type ArtifactContent =
  | string
  | Uint8Array
  | Record<string, unknown>
  | unknown[];

/** user id -> granted permissions. Modelled and persisted, not enforced. */
export type Permissions = Record<string, string[]>;

/**
 * Constructor input. Enum fields take the typed value or a raw scalar
 * (any-case string, priority number or name).
 */
export interface ArtifactInit {
  id?: string;
  artifact_type: ArtifactType | string;
  status?: ArtifactStatus | string;
  priority?: ArtifactPriority | number | string;
  content: ArtifactContent;
  metadata?: Partial<ArtifactMetadata>;
  versions?: ArtifactVersion[];
  current_version?: string;
  access_count?: number;
  permissions?: Permissions;
  expires_at?: number | null; // epoch ms
}

export type MetadataUpdates = Partial<
  Pick<
    ArtifactMetadata,
    "title" | "description" | "tags" | "category" | "language" | "custom_fields"
  >
>;

/**
 * Field-level updates for ArtifactStore.updateArtifact().
 * Applied through the model's mutators in this order:
 * content, metadata, status, priority, expires_at.
 */
export interface ArtifactUpdates {
  content?: ArtifactContent;
  changes?: string[]; // change log for a content update
  metadata?: MetadataUpdates;
  status?: ArtifactStatus | string;
  priority?: ArtifactPriority | number | string;
  expires_at?: number | null;
}

export interface SearchFilters {
  artifact_type?: ArtifactType | string;
  status?: ArtifactStatus | string;
  author?: string;
  tags?: string[]; // every tag must be present
  created_after?: number; // epoch ms, inclusive
  created_before?: number; // epoch ms, inclusive
  include_deleted?: boolean;
  limit?: number; // default: 100
  offset?: number;
}

export interface ArtifactStatistics {
  total_artifacts: number;
  by_type: Record<string, number>;
  by_status: Record<string, number>;
  top_authors: Array<{ author: string; count: number }>;
  total_size: number;
  average_size: number;
}

export interface CleanupResult {
  purged: string[];
  failed: string[];
}

export interface ImportResult {
  imported: string[];
  skipped: string[];
  failed: string[];
}
