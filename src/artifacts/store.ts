import type { Artifact } from "./artifact.js";
import type {
  ArtifactStatistics,
  ArtifactUpdates,
  CleanupResult,
  ImportResult,
  SearchFilters,
} from "./types.js";

/**
 * Interface for artifact storage operations.
 * Implementation: SqliteArtifactStore (SQLite index + content blobs on disk)
 */
export interface ArtifactStore {
  /**
   * Validate and persist an artifact (insert or replace). Returns its id.
   * @throws ArtifactError VALIDATION_ERROR | STORAGE_ERROR
   */
  storeArtifact(artifact: Artifact): Promise<string>;

  /**
   * Load an artifact and record the access.
   * @throws ArtifactError NOT_FOUND | STORAGE_ERROR
   */
  retrieveArtifact(id: string, user?: string): Promise<Artifact>;

  /**
   * Filtered search, newest first. Soft-deleted artifacts are excluded
   * unless `include_deleted` is set or `status` is "deleted".
   */
  searchArtifacts(filters?: SearchFilters): Promise<Artifact[]>;

  /**
   * Apply updates through the model's mutators and re-store.
   * @throws ArtifactError NOT_FOUND | VALIDATION_ERROR | INVALID_TRANSITION
   */
  updateArtifact(
    id: string,
    updates: ArtifactUpdates,
    author: string,
    user?: string,
  ): Promise<Artifact>;

  /** Soft delete: status becomes "deleted", content is kept. */
  deleteArtifact(id: string, author?: string): Promise<boolean>;

  /** Hard delete of every row and the content directory. Irreversible. */
  purgeArtifact(id: string): Promise<boolean>;

  /** Purge artifacts whose expires_at is before `now`. Best effort. */
  cleanupExpiredArtifacts(now?: number): Promise<CleanupResult>;

  exportArtifacts(ids: string[], filePath: string): Promise<number>;

  importArtifacts(
    filePath: string,
    opts?: { overwrite?: boolean },
  ): Promise<ImportResult>;

  getArtifactStatistics(): Promise<ArtifactStatistics>;

  clearCache(): void;

  close(): void;
}
