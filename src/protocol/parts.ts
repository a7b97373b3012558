import { readFile } from "node:fs/promises";
import path from "node:path";
import { ulid } from "ulid";
import type { WirePart } from "../schemas/message.js";
import { isPartType } from "../schemas/protocol.js";
import {
  dataHandler,
  handlerForPartType,
  isJsonObject,
} from "./content-handlers.js";
import type { JsonObject, Part, PartContent, PartType } from "./types.js";

export const DEFAULT_CONTENT_TYPES: Readonly<Record<PartType, string>> = {
  text: "text/plain",
  data: "application/json",
  file: "application/octet-stream",
  image: "image/png",
  audio: "audio/wav",
  video: "video/mp4",
  binary: "application/octet-stream",
};

const EXTENSION_CONTENT_TYPES: Readonly<Record<string, string>> = {
  ".txt": "text/plain",
  ".md": "text/markdown",
  ".csv": "text/csv",
  ".json": "application/json",
  ".pdf": "application/pdf",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".svg": "image/svg+xml",
  ".wav": "audio/wav",
  ".mp3": "audio/mpeg",
  ".mp4": "video/mp4",
  ".webm": "video/webm",
};

export interface PartOpts {
  id?: string;
  content_type?: string;
  filename?: string;
  metadata?: JsonObject;
}

export function contentSize(content: PartContent): number {
  if (typeof content === "string") return Buffer.byteLength(content, "utf8");
  if (content instanceof Uint8Array) return content.byteLength;
  return Buffer.byteLength(JSON.stringify(content), "utf8");
}

export function createPart(
  type: PartType,
  content: PartContent,
  opts: PartOpts = {},
): Part {
  const part: Part = {
    id: opts.id ?? ulid(),
    type,
    content,
    content_type: opts.content_type ?? DEFAULT_CONTENT_TYPES[type],
    size: contentSize(content),
  };
  if (opts.filename !== undefined) part.filename = opts.filename;
  if (opts.metadata !== undefined) part.metadata = opts.metadata;
  return part;
}

export function createTextPart(content: string, opts?: PartOpts): Part {
  return createPart("text", content, opts);
}

export function createDataPart(content: JsonObject, opts?: PartOpts): Part {
  return createPart("data", content, opts);
}

export function createBinaryPart(content: Uint8Array, opts?: PartOpts): Part {
  return createPart("binary", content, opts);
}

export function contentTypeForPath(filePath: string): string {
  return (
    EXTENSION_CONTENT_TYPES[path.extname(filePath).toLowerCase()] ??
    "application/octet-stream"
  );
}

function partTypeForContentType(contentType: string): PartType {
  if (contentType.startsWith("image/")) return "image";
  if (contentType.startsWith("audio/")) return "audio";
  if (contentType.startsWith("video/")) return "video";
  return "file";
}

/**
 * Read a file into a part. Image/audio/video content types produce parts
 * of that type; everything else is a `file` part.
 */
export async function createFilePart(
  filePath: string,
  opts: PartOpts = {},
): Promise<Part> {
  const content = await readFile(filePath);
  const contentType = opts.content_type ?? contentTypeForPath(filePath);
  return createPart(partTypeForContentType(contentType), content, {
    ...opts,
    content_type: contentType,
    filename: opts.filename ?? path.basename(filePath),
  });
}

export function partContentAsText(part: Part): string {
  const { content } = part;
  if (typeof content === "string") return content;
  if (content instanceof Uint8Array) {
    return Buffer.from(content).toString("utf8");
  }
  return JSON.stringify(content, null, 2);
}

export function partContentAsBytes(part: Part): Uint8Array {
  const { content } = part;
  if (content instanceof Uint8Array) return content;
  if (typeof content === "string") return Buffer.from(content, "utf8");
  return Buffer.from(JSON.stringify(content), "utf8");
}

/** Structured view of the content, or undefined when it is not an object. */
export function partContentAsData(part: Part): JsonObject | undefined {
  const { content } = part;
  if (isJsonObject(content)) return content;
  if (typeof content !== "string") return undefined;
  try {
    const parsed: unknown = JSON.parse(content);
    return isJsonObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

function isEmptyContent(content: PartContent): boolean {
  if (typeof content === "string") return content.length === 0;
  if (content instanceof Uint8Array) return content.byteLength === 0;
  return Object.keys(content).length === 0;
}

export function validatePart(part: Part): string[] {
  const errors: string[] = [];

  if (!part.id) {
    errors.push("Part ID is required");
  }
  if (!isPartType(part.type)) {
    errors.push(`Unsupported part type: ${String(part.type)}`);
    return errors;
  }
  if (isEmptyContent(part.content)) {
    errors.push("Part content is required");
    return errors;
  }
  errors.push(...handlerForPartType(part.type).validate(part.content));

  return errors;
}

export function toWirePart(part: Part): WirePart {
  const wire: WirePart = {
    id: part.id,
    type: part.type,
    content:
      part.content instanceof Uint8Array
        ? Buffer.from(part.content).toString("base64")
        : part.content,
    content_type: part.content_type,
    encoding: part.content instanceof Uint8Array ? "base64" : "utf-8",
    size: part.size,
  };
  if (part.filename !== undefined) wire.filename = part.filename;
  if (part.metadata !== undefined) wire.metadata = part.metadata;
  return wire;
}

export function fromWirePart(wire: WirePart): Part {
  let content: PartContent = wire.content;
  if (wire.encoding === "base64" && typeof wire.content === "string") {
    content = Buffer.from(wire.content, "base64");
  } else if (wire.type === "data" && typeof wire.content === "string") {
    content = dataHandler.deserialize(wire.content);
  }

  return createPart(wire.type, content, {
    id: wire.id,
    content_type: wire.content_type,
    filename: wire.filename,
    metadata: wire.metadata,
  });
}
