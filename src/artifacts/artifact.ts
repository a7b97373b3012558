import { ulid } from "ulid";
import {
  type ArtifactRecord,
  ArtifactRecordSchema,
} from "../schemas/artifact.js";
import { contentMetrics } from "./canonical.js";
import {
  parseArtifactPriority,
  parseArtifactStatus,
  parseArtifactType,
} from "./enums.js";
import { ArtifactError } from "./errors.js";
import { assertTransition } from "./transitions.js";
import type {
  ArtifactContent,
  ArtifactInit,
  ArtifactMetadata,
  ArtifactPriority,
  ArtifactStatus,
  ArtifactType,
  ArtifactVersion,
  ContentEncoding,
  MetadataUpdates,
  Permissions,
} from "./types.js";
import { bumpPatch, compareVersions, INITIAL_VERSION } from "./version.js";

export function defaultFormat(content: ArtifactContent): string {
  if (typeof content === "string") return "txt";
  if (content instanceof Uint8Array) return "bin";
  return "json";
}

export function hasContent(content: ArtifactContent): boolean {
  if (typeof content === "string") return content.length > 0;
  if (content instanceof Uint8Array) return content.length > 0;
  if (Array.isArray(content)) return content.length > 0;
  return Object.keys(content).length > 0;
}

function cloneContent(content: ArtifactContent): ArtifactContent {
  if (typeof content === "string") return content;
  if (content instanceof Uint8Array) return Buffer.from(content);
  return structuredClone(content);
}

function cloneMetadata(metadata: ArtifactMetadata): ArtifactMetadata {
  return {
    ...metadata,
    tags: [...metadata.tags],
    custom_fields: structuredClone(metadata.custom_fields),
  };
}

function cloneVersion(version: ArtifactVersion): ArtifactVersion {
  return {
    ...version,
    changes: [...version.changes],
    metadata: cloneMetadata(version.metadata),
  };
}

function clonePermissions(permissions: Permissions): Permissions {
  return Object.fromEntries(
    Object.entries(permissions).map(([user, perms]) => [user, [...perms]]),
  );
}

/**
 * A versioned, checksummed unit of agent output with a lifecycle status.
 *
 * Content and metadata changes record a new PATCH version. Status changes
 * annotate the latest version instead. Timestamps are epoch milliseconds.
 */
export class Artifact {
  readonly id: string;
  artifact_type: ArtifactType;
  status: ArtifactStatus;
  priority: ArtifactPriority;
  content: ArtifactContent;
  metadata: ArtifactMetadata;
  versions: ArtifactVersion[];
  current_version: string;
  access_count: number;
  quality_score = 0;
  permissions: Permissions;
  expires_at?: number;

  /**
   * @throws ArtifactError VALIDATION_ERROR for unknown enum values, or a
   * version history supplied without `current_version`
   */
  constructor(init: ArtifactInit) {
    const now = Date.now();
    const meta = init.metadata ?? {};

    this.id = init.id ?? ulid();
    this.artifact_type = parseArtifactType(init.artifact_type);
    this.status = parseArtifactStatus(init.status ?? "draft");
    this.priority = parseArtifactPriority(init.priority ?? 2);
    this.content = init.content;
    this.metadata = {
      title: meta.title ?? "",
      description: meta.description ?? "",
      author: meta.author ?? "unknown",
      created_at: meta.created_at ?? now,
      modified_at: meta.modified_at ?? now,
      tags: [...(meta.tags ?? [])],
      language: meta.language ?? "en",
      format: meta.format ?? defaultFormat(init.content),
      size: 0,
      checksum: "",
      custom_fields: { ...(meta.custom_fields ?? {}) },
    };
    if (meta.accessed_at !== undefined) {
      this.metadata.accessed_at = meta.accessed_at;
    }
    if (meta.category !== undefined) this.metadata.category = meta.category;
    this.access_count = init.access_count ?? 0;
    this.permissions = clonePermissions(init.permissions ?? {});
    if (init.expires_at !== undefined && init.expires_at !== null) {
      this.expires_at = init.expires_at;
    }

    this.updateContentMetrics();

    if (init.versions !== undefined && init.versions.length > 0) {
      if (init.current_version === undefined) {
        throw new ArtifactError(
          "VALIDATION_ERROR",
          "current_version is required when a version history is supplied",
          { artifact_id: this.id, operation: "construct" },
        );
      }
      this.versions = init.versions.map(cloneVersion);
      this.current_version = init.current_version;
    } else {
      this.current_version = INITIAL_VERSION;
      this.versions = [
        this.snapshot(
          INITIAL_VERSION,
          this.metadata.author,
          ["Initial version"],
          this.metadata.created_at,
        ),
      ];
    }

    this.calculateQualityScore();
  }

  /** Recompute size and checksum from the canonical content bytes. */
  updateContentMetrics(): void {
    const { size, checksum } = contentMetrics(this.content);
    this.metadata.size = size;
    this.metadata.checksum = checksum;
  }

  /**
   * Record a new PATCH version of the latest recorded version.
   * Returns the new version string.
   */
  createNewVersion(author: string, changes: string[]): string {
    this.updateContentMetrics();
    const next = bumpPatch(this.getLatestVersion().version);
    const now = Date.now();
    this.metadata.modified_at = now;
    this.versions.push(this.snapshot(next, author, changes, now));
    this.current_version = next;
    this.calculateQualityScore();
    return next;
  }

  updateContent(
    content: ArtifactContent,
    author: string,
    changes: string[] = ["Content updated"],
  ): string {
    if (defaultFormat(content) !== defaultFormat(this.content)) {
      this.metadata.format = defaultFormat(content);
    }
    this.content = content;
    return this.createNewVersion(author, changes);
  }

  /** Apply metadata updates (custom_fields are merged) as a new version. */
  updateMetadata(updates: MetadataUpdates, author: string): string {
    if (updates.title !== undefined) this.metadata.title = updates.title;
    if (updates.description !== undefined) {
      this.metadata.description = updates.description;
    }
    if (updates.tags !== undefined) this.metadata.tags = [...updates.tags];
    if (updates.category !== undefined) {
      this.metadata.category = updates.category;
    }
    if (updates.language !== undefined) {
      this.metadata.language = updates.language;
    }
    if (updates.custom_fields !== undefined) {
      this.metadata.custom_fields = {
        ...this.metadata.custom_fields,
        ...updates.custom_fields,
      };
    }
    return this.createNewVersion(author, ["Metadata updated"]);
  }

  /**
   * Move along the lifecycle graph. Logged on the latest version rather
   * than creating a new one; re-applying the current status does nothing.
   * @throws ArtifactError INVALID_TRANSITION
   */
  updateStatus(status: ArtifactStatus | string, author: string): void {
    const next = parseArtifactStatus(status);
    if (next === this.status) return;
    assertTransition(this.status, next, this.id);

    this.status = next;
    this.metadata.modified_at = Date.now();
    this.getLatestVersion().changes.push(
      `Status changed to ${next} (${author})`,
    );
    this.calculateQualityScore();
  }

  setPriority(priority: ArtifactPriority | number | string): void {
    this.priority = parseArtifactPriority(priority);
  }

  setExpiresAt(expiresAt: number | null): void {
    if (expiresAt === null) delete this.expires_at;
    else this.expires_at = expiresAt;
  }

  grantPermission(user: string, permission: string): void {
    const granted = this.permissions[user] ?? [];
    if (!granted.includes(permission)) granted.push(permission);
    this.permissions[user] = granted;
  }

  /** Revoke one permission, or every permission of `user` when omitted. */
  revokePermission(user: string, permission?: string): boolean {
    const granted = this.permissions[user];
    if (!granted) return false;
    if (permission === undefined) {
      delete this.permissions[user];
      return true;
    }
    const remaining = granted.filter((p) => p !== permission);
    if (remaining.length === granted.length) return false;
    if (remaining.length === 0) delete this.permissions[user];
    else this.permissions[user] = remaining;
    return true;
  }

  hasPermission(user: string, permission: string): boolean {
    return this.permissions[user]?.includes(permission) ?? false;
  }

  /** Telemetry only: bumps access_count and accessed_at. */
  access(): void {
    this.access_count += 1;
    this.metadata.accessed_at = Date.now();
    this.calculateQualityScore();
  }

  isExpired(now = Date.now()): boolean {
    return this.expires_at !== undefined && now > this.expires_at;
  }

  getVersion(version: string): ArtifactVersion | undefined {
    return this.versions.find((v) => v.version === version);
  }

  getLatestVersion(): ArtifactVersion {
    return this.versions.reduce((latest, v) =>
      compareVersions(v.version, latest.version) > 0 ? v : latest,
    );
  }

  /**
   * Restore metadata from a recorded version's snapshot and record the
   * rollback as a new version. Content is not restored: versions keep
   * only its hash and size, so checksum, size and format stay those of
   * the current content. accessed_at is telemetry and is kept as well.
   */
  rollbackToVersion(version: string, author: string): boolean {
    const target = this.getVersion(version);
    if (!target) return false;

    const { accessed_at, format } = this.metadata;
    this.metadata = cloneMetadata(target.metadata);
    this.metadata.format = format;
    if (accessed_at === undefined) delete this.metadata.accessed_at;
    else this.metadata.accessed_at = accessed_at;
    this.createNewVersion(author, [`Rolled back to version ${version}`]);
    return true;
  }

  /** Advisory 0-100 heuristic. Never used to gate access. */
  calculateQualityScore(): number {
    let score = 0;
    if (hasContent(this.content)) score += 20;
    if (this.metadata.title && this.metadata.description) score += 15;
    if (this.versions.length > 1) score += 10;
    score += Math.min(10, this.access_count * 0.1);
    if (this.status === "published") score += 20;
    else if (this.status === "review") score += 15;
    score += Math.min(10, this.metadata.tags.length * 2);
    score += Math.min(
      15,
      Object.keys(this.metadata.custom_fields).length * 1.5,
    );

    this.quality_score = Math.min(100, score);
    return this.quality_score;
  }

  /** Human-readable problems; empty means valid. Never throws. */
  validate(now = Date.now()): string[] {
    const errors: string[] = [];
    if (!this.id) errors.push("Artifact ID is required");
    if (!this.metadata.title.trim()) errors.push("Title is required");
    if (!hasContent(this.content)) errors.push("Content is required");
    if (this.isExpired(now)) errors.push("Artifact has expired");
    if (this.quality_score < 0 || this.quality_score > 100) {
      errors.push("Quality score must be between 0 and 100");
    }
    if (!this.getVersion(this.current_version)) {
      errors.push(
        `Current version ${this.current_version} is not in the version history`,
      );
    }
    return errors;
  }

  toRecord(): ArtifactRecord {
    let content: ArtifactRecord["content"];
    let encoding: ContentEncoding;
    if (typeof this.content === "string") {
      content = this.content;
      encoding = "text";
    } else if (this.content instanceof Uint8Array) {
      content = Buffer.from(this.content).toString("base64");
      encoding = "base64";
    } else {
      content = structuredClone(this.content);
      encoding = "json";
    }

    return {
      id: this.id,
      artifact_type: this.artifact_type,
      status: this.status,
      priority: this.priority,
      content,
      content_encoding: encoding,
      metadata: cloneMetadata(this.metadata),
      versions: this.versions.map(cloneVersion),
      current_version: this.current_version,
      access_count: this.access_count,
      quality_score: this.quality_score,
      permissions: clonePermissions(this.permissions),
      expires_at: this.expires_at ?? null,
    };
  }

  /**
   * Rebuild from a record (export file, cache snapshot).
   * @throws ArtifactError VALIDATION_ERROR on a malformed record or a
   * checksum that does not match the content
   */
  static fromRecord(input: unknown): Artifact {
    const parsed = ArtifactRecordSchema.safeParse(input);
    if (!parsed.success) {
      const errors = parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`,
      );
      throw new ArtifactError(
        "VALIDATION_ERROR",
        `Invalid artifact record: ${errors.join("; ")}`,
        { operation: "from_record", errors },
      );
    }
    const record = parsed.data;

    let content: ArtifactContent = record.content;
    if (
      record.content_encoding === "base64" &&
      typeof record.content === "string"
    ) {
      content = Buffer.from(record.content, "base64");
    }

    const artifact = new Artifact({
      id: record.id,
      artifact_type: record.artifact_type,
      status: record.status,
      priority: record.priority,
      content,
      metadata: record.metadata,
      versions: record.versions,
      current_version: record.current_version,
      access_count: record.access_count,
      permissions: record.permissions,
      expires_at: record.expires_at,
    });

    if (
      record.metadata.checksum &&
      record.metadata.checksum !== artifact.metadata.checksum
    ) {
      throw new ArtifactError(
        "VALIDATION_ERROR",
        `Checksum mismatch for artifact ${record.id}`,
        { artifact_id: record.id, operation: "from_record" },
      );
    }
    return artifact;
  }

  clone(): Artifact {
    return new Artifact({
      id: this.id,
      artifact_type: this.artifact_type,
      status: this.status,
      priority: this.priority,
      content: cloneContent(this.content),
      metadata: cloneMetadata(this.metadata),
      versions: this.versions,
      current_version: this.current_version,
      access_count: this.access_count,
      permissions: this.permissions,
      expires_at: this.expires_at,
    });
  }

  private snapshot(
    version: string,
    author: string,
    changes: string[],
    createdAt: number,
  ): ArtifactVersion {
    return {
      version,
      created_at: createdAt,
      author,
      changes: [...changes],
      content_hash: this.metadata.checksum,
      size: this.metadata.size,
      metadata: cloneMetadata(this.metadata),
    };
  }
}
