import type { SafeParseReturnType } from "zod";
import {
  type ArtifactPriority,
  ArtifactPrioritySchema,
  type ArtifactStatus,
  ArtifactStatusSchema,
  type ArtifactType,
  ArtifactTypeSchema,
} from "../schemas/artifact.js";
import { ArtifactError } from "./errors.js";

function parseOrThrow<T>(
  schema: { safeParse(value: unknown): SafeParseReturnType<unknown, T> },
  value: unknown,
  label: string,
): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ArtifactError(
      "VALIDATION_ERROR",
      `Invalid ${label}: ${String(value)}`,
      { operation: "parse" },
    );
  }
  return parsed.data;
}

/** Accepts the typed value or a raw scalar in any case ("REPORT"). */
export function parseArtifactType(value: unknown): ArtifactType {
  return parseOrThrow(ArtifactTypeSchema, value, "artifact type");
}

export function parseArtifactStatus(value: unknown): ArtifactStatus {
  return parseOrThrow(ArtifactStatusSchema, value, "artifact status");
}

/** 1-5, "3", or a level name such as "HIGH". */
export function parseArtifactPriority(value: unknown): ArtifactPriority {
  return parseOrThrow(ArtifactPrioritySchema, value, "artifact priority");
}
