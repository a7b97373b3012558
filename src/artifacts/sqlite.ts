import { mkdirSync } from "node:fs";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import Database, {
  type Database as DatabaseType,
  type Statement,
} from "better-sqlite3";
import { LRUCache } from "lru-cache";
import { z } from "zod";
import { type Logger, logger as rootLogger } from "../logger.js";
import { emitMetric, type MetricsSink, noopMetrics } from "../metrics.js";
import {
  ArtifactMetadataSchema,
  type ExportDocument,
  ImportDocumentSchema,
} from "../schemas/artifact.js";
import { Artifact } from "./artifact.js";
import { BlobStore, contentKindOf } from "./blobs.js";
import { parseArtifactStatus, parseArtifactType } from "./enums.js";
import { ArtifactError } from "./errors.js";
import { KeyedWriteQueue } from "./lock.js";
import { normalizeTags } from "./normalize.js";
import type { ArtifactStore } from "./store.js";
import type {
  ArtifactRecord,
  ArtifactStatistics,
  ArtifactStatus,
  ArtifactUpdates,
  ArtifactVersion,
  CleanupResult,
  ImportResult,
  Permissions,
  SearchFilters,
} from "./types.js";

const DEFAULT_CACHE_SIZE = 100;
const DEFAULT_LIMIT = 100;
const MAX_LIMIT = 1000;
const TOP_AUTHORS_LIMIT = 10;

function jsonColumn<T extends z.ZodTypeAny>(schema: T) {
  return z
    .string()
    .transform((text, ctx): unknown => {
      try {
        return JSON.parse(text);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Invalid JSON" });
        return z.NEVER;
      }
    })
    .pipe(schema);
}

const ArtifactRowSchema = z.object({
  id: z.string(),
  artifact_type: z.string(),
  status: z.string(),
  priority: z.number().int(),
  title: z.string(),
  description: z.string(),
  author: z.string(),
  tags_json: jsonColumn(z.array(z.string())),
  category: z.string().nullable(),
  language: z.string(),
  format: z.string(),
  custom_fields_json: jsonColumn(z.record(z.unknown())),
  size: z.number().int(),
  checksum: z.string(),
  content_kind: z.enum(["text", "json", "binary"]),
  content_path: z.string(),
  current_version: z.string(),
  access_count: z.number().int(),
  quality_score: z.number(),
  created_at: z.number().int(),
  modified_at: z.number().int(),
  accessed_at: z.number().int().nullable(),
  expires_at: z.number().int().nullable(),
});

const VersionRowSchema = z.object({
  version: z.string(),
  author: z.string(),
  changes_json: jsonColumn(z.array(z.string())),
  content_hash: z.string(),
  size: z.number().int(),
  metadata_json: jsonColumn(ArtifactMetadataSchema),
  created_at: z.number().int(),
});

const PermissionRowSchema = z.object({
  user_id: z.string(),
  permission: z.string(),
});

const IdRowSchema = z.object({ id: z.string() });

const CountRowSchema = z.object({ key: z.string(), count: z.number().int() });

const TotalsRowSchema = z.object({
  count: z.number().int(),
  total_size: z.number(),
  average_size: z.number(),
});

type StatementName =
  | "fetchById"
  | "exists"
  | "fetchVersions"
  | "fetchPermissions"
  | "upsertArtifact"
  | "deleteVersions"
  | "insertVersion"
  | "deletePermissions"
  | "insertPermission"
  | "deleteTags"
  | "insertTag"
  | "deleteArtifact"
  | "recordAccess"
  | "selectExpired";

export interface SqliteArtifactStoreOptions {
  dbPath: string; // ":memory:" for tests, file path for production
  storageRoot: string; // content blobs live under here
  cacheSize?: number; // default: 100 artifacts
  logger?: Logger;
  metrics?: MetricsSink;
}

/**
 * SQLite implementation of ArtifactStore.
 *
 * Index rows, version rows, permission rows and tag rows live in SQLite
 * (WAL mode); content is one blob per version on disk. Writes for one
 * artifact id are serialized, and the blob is always written before the
 * index transaction commits.
 */
export class SqliteArtifactStore implements ArtifactStore {
  private db: DatabaseType;
  private blobs: BlobStore;
  private cache: LRUCache<string, Artifact>;
  private locks = new KeyedWriteQueue();
  private readonly log: Logger;
  private readonly metrics: MetricsSink;
  private stmts: Record<StatementName, Statement>;

  constructor(opts: SqliteArtifactStoreOptions) {
    if (opts.dbPath !== ":memory:") {
      mkdirSync(path.dirname(opts.dbPath), { recursive: true });
    }
    this.db = new Database(opts.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 3000");
    this.db.pragma("foreign_keys = ON");
    this.initSchema();
    this.stmts = this.prepareStatements();

    this.blobs = new BlobStore(opts.storageRoot);
    this.cache = new LRUCache<string, Artifact>({
      max: opts.cacheSize ?? DEFAULT_CACHE_SIZE,
    });
    this.log = (opts.logger ?? rootLogger).child({ module: "artifact-store" });
    this.metrics = opts.metrics ?? noopMetrics;
  }

  close(): void {
    this.cache.clear();
    this.db.close();
  }

  clearCache(): void {
    this.cache.clear();
  }

  /** Number of artifacts currently held in the cache. */
  get cachedCount(): number {
    return this.cache.size;
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS artifacts (
        id                  TEXT PRIMARY KEY,
        artifact_type       TEXT NOT NULL,
        status              TEXT NOT NULL,
        priority            INTEGER NOT NULL,

        -- Metadata
        title               TEXT NOT NULL,
        description         TEXT NOT NULL DEFAULT '',
        author              TEXT NOT NULL,
        tags_json           TEXT NOT NULL DEFAULT '[]',
        category            TEXT,
        language            TEXT NOT NULL DEFAULT 'en',
        format              TEXT NOT NULL,
        custom_fields_json  TEXT NOT NULL DEFAULT '{}',

        -- Content pointer (always the current_version blob)
        size                INTEGER NOT NULL,
        checksum            TEXT NOT NULL,
        content_kind        TEXT NOT NULL,
        content_path        TEXT NOT NULL,

        -- Lifecycle
        current_version     TEXT NOT NULL,
        access_count        INTEGER NOT NULL DEFAULT 0,
        quality_score       REAL NOT NULL DEFAULT 0,
        created_at          INTEGER NOT NULL,
        modified_at         INTEGER NOT NULL,
        accessed_at         INTEGER,
        expires_at          INTEGER
      );

      CREATE INDEX IF NOT EXISTS idx_artifacts_type ON artifacts(artifact_type);
      CREATE INDEX IF NOT EXISTS idx_artifacts_status ON artifacts(status);
      CREATE INDEX IF NOT EXISTS idx_artifacts_author ON artifacts(author);
      CREATE INDEX IF NOT EXISTS idx_artifacts_created ON artifacts(created_at DESC);
      CREATE INDEX IF NOT EXISTS idx_artifacts_expires ON artifacts(expires_at) WHERE expires_at IS NOT NULL;

      CREATE TABLE IF NOT EXISTS artifact_versions (
        artifact_id     TEXT NOT NULL REFERENCES artifacts(id) ON DELETE CASCADE,
        version         TEXT NOT NULL,
        author          TEXT NOT NULL,
        changes_json    TEXT NOT NULL,
        content_hash    TEXT NOT NULL,
        size            INTEGER NOT NULL,
        metadata_json   TEXT NOT NULL,
        created_at      INTEGER NOT NULL,
        PRIMARY KEY (artifact_id, version)
      );

      CREATE TABLE IF NOT EXISTS artifact_permissions (
        artifact_id     TEXT NOT NULL REFERENCES artifacts(id) ON DELETE CASCADE,
        user_id         TEXT NOT NULL,
        permission      TEXT NOT NULL,
        granted_at      INTEGER NOT NULL,
        PRIMARY KEY (artifact_id, user_id, permission)
      );

      CREATE TABLE IF NOT EXISTS artifact_tags (
        artifact_id     TEXT NOT NULL REFERENCES artifacts(id) ON DELETE CASCADE,
        tag_norm        TEXT NOT NULL,
        PRIMARY KEY (artifact_id, tag_norm)
      );

      CREATE INDEX IF NOT EXISTS idx_artifact_tags_tag ON artifact_tags(tag_norm);
    `);
  }

  private prepareStatements(): Record<StatementName, Statement> {
    return {
      fetchById: this.db.prepare(`
        SELECT * FROM artifacts WHERE id = ?
      `),
      exists: this.db.prepare(`
        SELECT id FROM artifacts WHERE id = ?
      `),
      fetchVersions: this.db.prepare(`
        SELECT version, author, changes_json, content_hash, size, metadata_json, created_at
        FROM artifact_versions
        WHERE artifact_id = ?
        ORDER BY rowid
      `),
      fetchPermissions: this.db.prepare(`
        SELECT user_id, permission FROM artifact_permissions
        WHERE artifact_id = ?
        ORDER BY rowid
      `),
      upsertArtifact: this.db.prepare(`
        INSERT INTO artifacts (
          id, artifact_type, status, priority,
          title, description, author, tags_json, category, language, format, custom_fields_json,
          size, checksum, content_kind, content_path,
          current_version, access_count, quality_score,
          created_at, modified_at, accessed_at, expires_at
        ) VALUES (
          @id, @artifact_type, @status, @priority,
          @title, @description, @author, @tags_json, @category, @language, @format, @custom_fields_json,
          @size, @checksum, @content_kind, @content_path,
          @current_version, @access_count, @quality_score,
          @created_at, @modified_at, @accessed_at, @expires_at
        )
        ON CONFLICT(id) DO UPDATE SET
          artifact_type = excluded.artifact_type,
          status = excluded.status,
          priority = excluded.priority,
          title = excluded.title,
          description = excluded.description,
          author = excluded.author,
          tags_json = excluded.tags_json,
          category = excluded.category,
          language = excluded.language,
          format = excluded.format,
          custom_fields_json = excluded.custom_fields_json,
          size = excluded.size,
          checksum = excluded.checksum,
          content_kind = excluded.content_kind,
          content_path = excluded.content_path,
          current_version = excluded.current_version,
          access_count = excluded.access_count,
          quality_score = excluded.quality_score,
          created_at = excluded.created_at,
          modified_at = excluded.modified_at,
          accessed_at = excluded.accessed_at,
          expires_at = excluded.expires_at
      `),
      deleteVersions: this.db.prepare(`
        DELETE FROM artifact_versions WHERE artifact_id = ?
      `),
      insertVersion: this.db.prepare(`
        INSERT INTO artifact_versions (
          artifact_id, version, author, changes_json, content_hash, size, metadata_json, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      `),
      deletePermissions: this.db.prepare(`
        DELETE FROM artifact_permissions WHERE artifact_id = ?
      `),
      insertPermission: this.db.prepare(`
        INSERT INTO artifact_permissions (artifact_id, user_id, permission, granted_at)
        VALUES (?, ?, ?, ?)
      `),
      deleteTags: this.db.prepare(`
        DELETE FROM artifact_tags WHERE artifact_id = ?
      `),
      insertTag: this.db.prepare(`
        INSERT INTO artifact_tags (artifact_id, tag_norm) VALUES (?, ?)
      `),
      deleteArtifact: this.db.prepare(`
        DELETE FROM artifacts WHERE id = ?
      `),
      // Read-modify-write: the count comes from the caller's copy, so a
      // concurrent bump from another store instance on the same database
      // can be lost.
      recordAccess: this.db.prepare(`
        UPDATE artifacts SET
          access_count = @access_count,
          accessed_at = @accessed_at,
          quality_score = @quality_score
        WHERE id = @id
      `),
      selectExpired: this.db.prepare(`
        SELECT id FROM artifacts
        WHERE expires_at IS NOT NULL AND expires_at < ?
        ORDER BY expires_at
      `),
    };
  }

  /** Convert SQL null to undefined for optional fields */
  private nullToUndefined<T>(value: T | null): T | undefined {
    return value === null ? undefined : value;
  }

  private storageError(
    operation: string,
    artifactId: string | undefined,
    err: unknown,
  ): ArtifactError {
    if (err instanceof ArtifactError) return err;
    const reason = err instanceof Error ? err.message : String(err);
    return new ArtifactError(
      "STORAGE_ERROR",
      `${operation} failed${artifactId ? ` for artifact ${artifactId}` : ""}: ${reason}`,
      { artifact_id: artifactId, operation },
      { cause: err },
    );
  }

  private exists(id: string): boolean {
    return this.stmts.exists.get(id) !== undefined;
  }

  async storeArtifact(artifact: Artifact): Promise<string> {
    const errors = artifact.validate();
    if (errors.length > 0) {
      throw new ArtifactError(
        "VALIDATION_ERROR",
        `Invalid artifact: ${errors.join("; ")}`,
        { artifact_id: artifact.id, operation: "store", errors },
      );
    }

    await this.locks.run(artifact.id, () => this.persist(artifact, "store"));

    emitMetric(this.metrics, this.log, "artifact.stored");
    this.log.info(
      {
        artifact_id: artifact.id,
        artifact_type: artifact.artifact_type,
        version: artifact.current_version,
      },
      "Artifact stored",
    );
    return artifact.id;
  }

  async retrieveArtifact(id: string, user?: string): Promise<Artifact> {
    return this.locks.run(id, async () => {
      const cached = this.cache.get(id);
      emitMetric(
        this.metrics,
        this.log,
        cached ? "artifact.cache_hit" : "artifact.cache_miss",
      );
      const artifact = cached ? cached.clone() : await this.load(id);

      artifact.access();
      try {
        this.stmts.recordAccess.run({
          id,
          access_count: artifact.access_count,
          accessed_at: artifact.metadata.accessed_at ?? null,
          quality_score: artifact.quality_score,
        });
      } catch (err) {
        throw this.storageError("retrieve", id, err);
      }
      this.cache.set(id, artifact.clone());

      this.log.debug(
        { artifact_id: id, user, cache_hit: cached !== undefined },
        "Artifact retrieved",
      );
      return artifact;
    });
  }

  async searchArtifacts(filters: SearchFilters = {}): Promise<Artifact[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    let status: ArtifactStatus | undefined;

    if (filters.artifact_type !== undefined) {
      conditions.push("artifact_type = ?");
      params.push(parseArtifactType(filters.artifact_type));
    }

    if (filters.status !== undefined) {
      status = parseArtifactStatus(filters.status);
      conditions.push("status = ?");
      params.push(status);
    }

    if (!filters.include_deleted && status !== "deleted") {
      conditions.push("status != 'deleted'");
    }

    if (filters.author !== undefined) {
      conditions.push("author = ?");
      params.push(filters.author);
    }

    if (filters.created_after !== undefined) {
      conditions.push("created_at >= ?");
      params.push(filters.created_after);
    }

    if (filters.created_before !== undefined) {
      conditions.push("created_at <= ?");
      params.push(filters.created_before);
    }

    const tags = normalizeTags(filters.tags ?? []);
    if (tags.length > 0) {
      conditions.push(`id IN (
        SELECT artifact_id FROM artifact_tags
        WHERE tag_norm IN (${tags.map(() => "?").join(", ")})
        GROUP BY artifact_id
        HAVING COUNT(*) = ?
      )`);
      params.push(...tags, tags.length);
    }

    // Negative LIMIT means unbounded in SQLite
    const limit = Math.max(
      0,
      Math.min(Math.floor(filters.limit ?? DEFAULT_LIMIT), MAX_LIMIT),
    );
    const offset = Math.max(0, Math.floor(filters.offset ?? 0));
    const whereClause =
      conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const sql = `
      SELECT id FROM artifacts
      ${whereClause}
      ORDER BY created_at DESC, id DESC
      LIMIT ? OFFSET ?
    `;
    params.push(limit, offset);

    let ids: string[];
    try {
      ids = this.db
        .prepare(sql)
        .all(...params)
        .map((row) => IdRowSchema.parse(row).id);
    } catch (err) {
      throw this.storageError("search", undefined, err);
    }

    // Hydrate one by one so each hit goes through the cache and access path
    const results: Artifact[] = [];
    for (const id of ids) {
      try {
        results.push(await this.retrieveArtifact(id));
      } catch (err) {
        this.log.warn(
          { err, artifact_id: id },
          "Skipping artifact that failed to load",
        );
      }
    }
    return results;
  }

  async updateArtifact(
    id: string,
    updates: ArtifactUpdates,
    author: string,
    user?: string,
  ): Promise<Artifact> {
    return this.locks.run(id, async () => {
      const artifact = await this.current(id, "update");

      if (updates.content !== undefined) {
        artifact.updateContent(updates.content, author, updates.changes);
      }
      if (updates.metadata !== undefined) {
        artifact.updateMetadata(updates.metadata, author);
      }
      if (updates.status !== undefined) {
        artifact.updateStatus(updates.status, author);
      }
      if (updates.priority !== undefined) {
        artifact.setPriority(updates.priority);
      }
      if (updates.expires_at !== undefined) {
        artifact.setExpiresAt(updates.expires_at);
      }

      const errors = artifact.validate();
      if (errors.length > 0) {
        throw new ArtifactError(
          "VALIDATION_ERROR",
          `Invalid artifact: ${errors.join("; ")}`,
          { artifact_id: id, operation: "update", errors },
        );
      }

      await this.persist(artifact, "update");
      this.log.info(
        { artifact_id: id, version: artifact.current_version, author, user },
        "Artifact updated",
      );
      return artifact;
    });
  }

  async deleteArtifact(id: string, author = "system"): Promise<boolean> {
    return this.locks.run(id, async () => {
      if (!this.exists(id)) return false;

      const artifact = await this.current(id, "delete");
      artifact.updateStatus("deleted", author);
      await this.persist(artifact, "delete");

      emitMetric(this.metrics, this.log, "artifact.deleted");
      this.log.info({ artifact_id: id, author }, "Artifact soft-deleted");
      return true;
    });
  }

  async purgeArtifact(id: string): Promise<boolean> {
    return this.locks.run(id, async () => {
      let removed: boolean;
      try {
        // Rows go first: no row may point at a removed blob
        const tx = this.db.transaction(() => {
          this.stmts.deleteTags.run(id);
          this.stmts.deletePermissions.run(id);
          this.stmts.deleteVersions.run(id);
          return this.stmts.deleteArtifact.run(id).changes > 0;
        });
        removed = tx();
      } catch (err) {
        throw this.storageError("purge", id, err);
      }
      this.cache.delete(id);
      if (!removed) return false;

      try {
        await this.blobs.removeArtifact(id);
      } catch (err) {
        throw this.storageError("purge", id, err);
      }

      emitMetric(this.metrics, this.log, "artifact.purged");
      this.log.info({ artifact_id: id }, "Artifact purged");
      return true;
    });
  }

  async cleanupExpiredArtifacts(now = Date.now()): Promise<CleanupResult> {
    let ids: string[];
    try {
      ids = this.stmts.selectExpired
        .all(now)
        .map((row) => IdRowSchema.parse(row).id);
    } catch (err) {
      throw this.storageError("cleanup", undefined, err);
    }

    const result: CleanupResult = { purged: [], failed: [] };
    for (const id of ids) {
      try {
        if (await this.purgeArtifact(id)) result.purged.push(id);
      } catch (err) {
        result.failed.push(id);
        this.log.error(
          { err, artifact_id: id, operation: "cleanup" },
          "Failed to purge expired artifact",
        );
      }
    }

    this.log.info(
      { purged: result.purged.length, failed: result.failed.length },
      "Expired artifact cleanup finished",
    );
    return result;
  }

  /**
   * Write `{ exported_at, artifacts }` to `filePath`. Unknown ids are
   * skipped. Returns the number of artifacts written.
   */
  async exportArtifacts(ids: string[], filePath: string): Promise<number> {
    const records: ArtifactRecord[] = [];
    for (const id of ids) {
      try {
        const artifact = await this.locks.run(id, () =>
          this.current(id, "export"),
        );
        records.push(artifact.toRecord());
      } catch (err) {
        if (err instanceof ArtifactError && err.code === "NOT_FOUND") {
          this.log.warn({ artifact_id: id }, "Skipping unknown artifact");
          continue;
        }
        throw err;
      }
    }

    const document: ExportDocument = {
      exported_at: new Date().toISOString(),
      artifacts: records,
    };
    try {
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(filePath, JSON.stringify(document, null, 2));
    } catch (err) {
      throw this.storageError("export", undefined, err);
    }

    this.log.info(
      { count: records.length, file: filePath },
      "Artifacts exported",
    );
    return records.length;
  }

  /**
   * Load an export document. Existing ids are skipped unless `overwrite`;
   * invalid records are reported in `failed` and do not stop the import.
   */
  async importArtifacts(
    filePath: string,
    opts: { overwrite?: boolean } = {},
  ): Promise<ImportResult> {
    let text: string;
    try {
      text = await readFile(filePath, "utf8");
    } catch (err) {
      throw this.storageError("import", undefined, err);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new ArtifactError(
        "VALIDATION_ERROR",
        `Export file ${filePath} is not valid JSON`,
        { operation: "import" },
        { cause: err },
      );
    }
    const parsed = ImportDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ArtifactError(
        "VALIDATION_ERROR",
        `Export file ${filePath} has no artifacts list`,
        { operation: "import" },
      );
    }

    const result: ImportResult = { imported: [], skipped: [], failed: [] };
    for (const entry of parsed.data.artifacts) {
      const idRow = IdRowSchema.safeParse(entry);
      const entryId = idRow.success ? idRow.data.id : "<unknown>";
      try {
        const artifact = Artifact.fromRecord(entry);
        const errors = artifact.validate();
        if (errors.length > 0) {
          throw new ArtifactError(
            "VALIDATION_ERROR",
            `Invalid artifact: ${errors.join("; ")}`,
            { artifact_id: artifact.id, operation: "import", errors },
          );
        }

        const written = await this.locks.run(artifact.id, async () => {
          if (this.exists(artifact.id) && !opts.overwrite) return false;
          await this.persist(artifact, "import");
          return true;
        });
        (written ? result.imported : result.skipped).push(artifact.id);
      } catch (err) {
        result.failed.push(entryId);
        this.log.warn(
          { err, artifact_id: entryId, operation: "import" },
          "Skipping artifact that failed to import",
        );
      }
    }

    this.log.info(
      {
        file: filePath,
        imported: result.imported.length,
        skipped: result.skipped.length,
        failed: result.failed.length,
      },
      "Artifacts imported",
    );
    return result;
  }

  async getArtifactStatistics(): Promise<ArtifactStatistics> {
    try {
      const totals = TotalsRowSchema.parse(
        this.db
          .prepare(`
            SELECT COUNT(*) AS count,
                   COALESCE(SUM(size), 0) AS total_size,
                   COALESCE(AVG(size), 0) AS average_size
            FROM artifacts
          `)
          .get(),
      );
      const topAuthors = this.db
        .prepare(`
          SELECT author AS key, COUNT(*) AS count FROM artifacts
          GROUP BY author
          ORDER BY count DESC, author ASC
          LIMIT ?
        `)
        .all(TOP_AUTHORS_LIMIT)
        .map((row) => CountRowSchema.parse(row));

      return {
        total_artifacts: totals.count,
        by_type: this.countBy("artifact_type"),
        by_status: this.countBy("status"),
        top_authors: topAuthors.map((r) => ({ author: r.key, count: r.count })),
        total_size: totals.total_size,
        average_size: totals.average_size,
      };
    } catch (err) {
      throw this.storageError("statistics", undefined, err);
    }
  }

  private countBy(column: "artifact_type" | "status"): Record<string, number> {
    const rows = this.db
      .prepare(`
        SELECT ${column} AS key, COUNT(*) AS count FROM artifacts
        GROUP BY ${column}
        ORDER BY ${column}
      `)
      .all()
      .map((row) => CountRowSchema.parse(row));
    return Object.fromEntries(rows.map((r) => [r.key, r.count]));
  }

  /** Cached snapshot or a fresh load, without recording an access. */
  private async current(id: string, operation: string): Promise<Artifact> {
    const cached = this.cache.get(id);
    if (cached) return cached.clone();
    return this.load(id, operation);
  }

  /**
   * Rebuild an artifact from its rows and current blob.
   * @throws ArtifactError NOT_FOUND | STORAGE_ERROR
   */
  private async load(id: string, operation = "retrieve"): Promise<Artifact> {
    const raw = this.stmts.fetchById.get(id);
    if (raw === undefined) {
      throw new ArtifactError("NOT_FOUND", `Artifact ${id} not found`, {
        artifact_id: id,
        operation,
      });
    }

    try {
      const row = ArtifactRowSchema.parse(raw);
      const versions: ArtifactVersion[] = this.stmts.fetchVersions
        .all(id)
        .map((r) => {
          const v = VersionRowSchema.parse(r);
          return {
            version: v.version,
            created_at: v.created_at,
            author: v.author,
            changes: v.changes_json,
            content_hash: v.content_hash,
            size: v.size,
            metadata: v.metadata_json,
          };
        });

      const permissions: Permissions = {};
      for (const r of this.stmts.fetchPermissions.all(id)) {
        const grant = PermissionRowSchema.parse(r);
        const granted = permissions[grant.user_id] ?? [];
        granted.push(grant.permission);
        permissions[grant.user_id] = granted;
      }

      const content = await this.blobs.read(row.content_path, row.content_kind);
      const artifact = new Artifact({
        id: row.id,
        artifact_type: row.artifact_type,
        status: row.status,
        priority: row.priority,
        content,
        metadata: {
          title: row.title,
          description: row.description,
          author: row.author,
          created_at: row.created_at,
          modified_at: row.modified_at,
          accessed_at: this.nullToUndefined(row.accessed_at),
          tags: row.tags_json,
          category: this.nullToUndefined(row.category),
          language: row.language,
          format: row.format,
          custom_fields: row.custom_fields_json,
        },
        versions,
        current_version: row.current_version,
        access_count: row.access_count,
        permissions,
        expires_at: row.expires_at,
      });

      if (artifact.metadata.checksum !== row.checksum) {
        throw new ArtifactError(
          "STORAGE_ERROR",
          `Checksum mismatch for artifact ${id}: content does not match the index`,
          { artifact_id: id, operation },
        );
      }
      return artifact;
    } catch (err) {
      throw this.storageError(operation, id, err);
    }
  }

  /**
   * Blob first, then every row in one transaction, then the cache.
   * Callers hold the write lock for `artifact.id`.
   */
  private async persist(artifact: Artifact, operation: string): Promise<void> {
    const id = artifact.id;
    const meta = artifact.metadata;

    let contentPath: string;
    try {
      contentPath = await this.blobs.write(
        id,
        artifact.current_version,
        meta.format,
        artifact.content,
      );
    } catch (err) {
      throw this.storageError(operation, id, err);
    }

    try {
      const now = Date.now();
      const tx = this.db.transaction(() => {
        this.stmts.upsertArtifact.run({
          id,
          artifact_type: artifact.artifact_type,
          status: artifact.status,
          priority: artifact.priority,
          title: meta.title,
          description: meta.description,
          author: meta.author,
          tags_json: JSON.stringify(meta.tags),
          category: meta.category ?? null,
          language: meta.language,
          format: meta.format,
          custom_fields_json: JSON.stringify(meta.custom_fields),
          size: meta.size,
          checksum: meta.checksum,
          content_kind: contentKindOf(artifact.content),
          content_path: contentPath,
          current_version: artifact.current_version,
          access_count: artifact.access_count,
          quality_score: artifact.quality_score,
          created_at: meta.created_at,
          modified_at: meta.modified_at,
          accessed_at: meta.accessed_at ?? null,
          expires_at: artifact.expires_at ?? null,
        });

        this.stmts.deleteVersions.run(id);
        for (const v of artifact.versions) {
          this.stmts.insertVersion.run(
            id,
            v.version,
            v.author,
            JSON.stringify(v.changes),
            v.content_hash,
            v.size,
            JSON.stringify(v.metadata),
            v.created_at,
          );
        }

        this.stmts.deletePermissions.run(id);
        for (const [user, perms] of Object.entries(artifact.permissions)) {
          for (const permission of new Set(perms)) {
            this.stmts.insertPermission.run(id, user, permission, now);
          }
        }

        this.stmts.deleteTags.run(id);
        for (const tag of normalizeTags(meta.tags)) {
          this.stmts.insertTag.run(id, tag);
        }
      });
      tx();
    } catch (err) {
      throw this.storageError(operation, id, err);
    }

    this.cache.set(id, artifact.clone());
    this.log.debug(
      { artifact_id: id, operation, version: artifact.current_version },
      "Artifact persisted",
    );
  }
}
