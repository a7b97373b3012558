/**
 * Error codes for artifact model and store operations.
 */
export type ErrorCode =
  | "VALIDATION_ERROR" // malformed artifact or record, never persisted
  | "NOT_FOUND" // unknown id
  | "STORAGE_ERROR" // I/O or index failure, root cause in `cause`
  | "PERMISSION_DENIED" // reserved, access is not enforced
  | "INVALID_TRANSITION" // status change outside the lifecycle graph
  | "INVALID_VERSION"; // not MAJOR.MINOR.PATCH

export interface ArtifactErrorDetails {
  artifact_id?: string;
  operation?: string;
  errors?: string[];
}

/**
 * Custom error class for artifact operations.
 * Enables typed error handling via error.code.
 */
export class ArtifactError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details: ArtifactErrorDetails = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ArtifactError";
  }
}
