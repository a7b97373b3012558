import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import path from "node:path";
import { ulid } from "ulid";
import { z } from "zod";
import { ArtifactError } from "./errors.js";
import type { ArtifactContent } from "./types.js";

export type ContentKind = "text" | "json" | "binary";

const SAFE_ID = /^[A-Za-z0-9_-][A-Za-z0-9._-]*$/;
const SAFE_FORMAT = /^[A-Za-z0-9]+$/;

const JsonContentSchema = z.union([
  z.array(z.unknown()),
  z.record(z.unknown()),
]);

export function contentKindOf(content: ArtifactContent): ContentKind {
  if (typeof content === "string") return "text";
  if (content instanceof Uint8Array) return "binary";
  return "json";
}

function encode(content: ArtifactContent): string | Uint8Array {
  if (typeof content === "string" || content instanceof Uint8Array) {
    return content;
  }
  return JSON.stringify(content, null, 2);
}

/**
 * One file per artifact version:
 * `<root>/<artifact_id>/content_<version>.<format>`.
 * Paths handed back and accepted are relative to `root`.
 */
export class BlobStore {
  constructor(readonly root: string) {}

  relativePath(artifactId: string, version: string, format: string): string {
    this.assertSafe(artifactId, format);
    return path.join(artifactId, `content_${version}.${format}`);
  }

  /** Writes via a temp file and rename so readers never see a partial blob. */
  async write(
    artifactId: string,
    version: string,
    format: string,
    content: ArtifactContent,
  ): Promise<string> {
    const relative = this.relativePath(artifactId, version, format);
    const target = path.join(this.root, relative);
    const temp = `${target}.${ulid()}.tmp`;

    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(temp, encode(content));
    await rename(temp, target);
    return relative;
  }

  async read(relative: string, kind: ContentKind): Promise<ArtifactContent> {
    const bytes = await readFile(path.join(this.root, relative));
    if (kind === "binary") return bytes;
    if (kind === "text") return bytes.toString("utf8");
    return JsonContentSchema.parse(JSON.parse(bytes.toString("utf8")));
  }

  async removeArtifact(artifactId: string): Promise<void> {
    this.assertSafe(artifactId);
    await rm(path.join(this.root, artifactId), {
      recursive: true,
      force: true,
    });
  }

  private assertSafe(artifactId: string, format?: string): void {
    if (!SAFE_ID.test(artifactId)) {
      throw new ArtifactError(
        "VALIDATION_ERROR",
        `Artifact id "${artifactId}" cannot be used as a storage path`,
        { artifact_id: artifactId, operation: "blob_path" },
      );
    }
    if (format !== undefined && !SAFE_FORMAT.test(format)) {
      throw new ArtifactError(
        "VALIDATION_ERROR",
        `Format "${format}" must be alphanumeric`,
        { artifact_id: artifactId, operation: "blob_path" },
      );
    }
  }
}
