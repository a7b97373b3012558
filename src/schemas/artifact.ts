import { z } from "zod";
import { lowercaseString, type Priority, PrioritySchema } from "./protocol.js";

export const ARTIFACT_TYPES = [
  "report",
  "recommendation",
  "visualization",
  "data_export",
  "analysis",
  "validation",
  "notification",
  "audit_log",
] as const;

export const ARTIFACT_STATUSES = [
  "draft",
  "review",
  "published",
  "archived",
  "expired",
  "deleted",
] as const;

export const ArtifactTypeSchema = z.preprocess(
  lowercaseString,
  z.enum(ARTIFACT_TYPES),
);
export type ArtifactType = z.infer<typeof ArtifactTypeSchema>;

export const ArtifactStatusSchema = z.preprocess(
  lowercaseString,
  z.enum(ARTIFACT_STATUSES),
);
export type ArtifactStatus = z.infer<typeof ArtifactStatusSchema>;

export const ArtifactPrioritySchema = PrioritySchema;
export type ArtifactPriority = Priority;

const VERSION_PATTERN = /^\d+\.\d+\.\d+$/;

export const ArtifactMetadataSchema = z.object({
  title: z.string(),
  description: z.string().default(""),
  author: z.string(),
  created_at: z.number().int(),
  modified_at: z.number().int(),
  accessed_at: z.number().int().optional(),
  tags: z.array(z.string()).default([]),
  category: z.string().optional(),
  language: z.string().default("en"),
  format: z.string().min(1),
  size: z.number().int().nonnegative(),
  checksum: z.string(),
  custom_fields: z.record(z.unknown()).default({}),
});
export type ArtifactMetadata = z.infer<typeof ArtifactMetadataSchema>;

export const ArtifactVersionSchema = z.object({
  version: z.string().regex(VERSION_PATTERN, "Expected MAJOR.MINOR.PATCH"),
  created_at: z.number().int(),
  author: z.string(),
  changes: z.array(z.string()),
  content_hash: z.string(),
  size: z.number().int().nonnegative(),
  metadata: ArtifactMetadataSchema,
});
export type ArtifactVersion = z.infer<typeof ArtifactVersionSchema>;

/** How `content` is written in a record. Bytes travel as base64. */
export const ContentEncodingSchema = z.enum(["text", "json", "base64"]);
export type ContentEncoding = z.infer<typeof ContentEncodingSchema>;

export const PermissionsSchema = z.record(z.array(z.string()));

/**
 * JSON-safe artifact snapshot used by export/import and the store cache.
 */
export const ArtifactRecordSchema = z
  .object({
    id: z.string().min(1),
    artifact_type: ArtifactTypeSchema,
    status: ArtifactStatusSchema,
    priority: ArtifactPrioritySchema,
    content: z.union([
      z.string(),
      z.array(z.unknown()),
      z.record(z.unknown()),
    ]),
    content_encoding: ContentEncodingSchema,
    metadata: ArtifactMetadataSchema,
    versions: z.array(ArtifactVersionSchema).min(1),
    current_version: z.string().regex(VERSION_PATTERN),
    access_count: z.number().int().nonnegative().default(0),
    quality_score: z.number().min(0).max(100).default(0),
    permissions: PermissionsSchema.default({}),
    expires_at: z.number().int().nullable().optional(),
  })
  .superRefine((record, ctx) => {
    if (!record.versions.some((v) => v.version === record.current_version)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["current_version"],
        message: `Version ${record.current_version} is not in the history`,
      });
    }
    if (
      record.content_encoding !== "json" &&
      typeof record.content !== "string"
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["content"],
        message: `${record.content_encoding} content must be a string`,
      });
    }
  });
export type ArtifactRecord = z.infer<typeof ArtifactRecordSchema>;

export const ExportDocumentSchema = z.object({
  exported_at: z.string().datetime(),
  artifacts: z.array(ArtifactRecordSchema),
});
export type ExportDocument = z.infer<typeof ExportDocumentSchema>;

/** Envelope only; each artifact is validated on its own during import. */
export const ImportDocumentSchema = z.object({
  exported_at: z.string(),
  artifacts: z.array(z.unknown()),
});
