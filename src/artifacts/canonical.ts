import { createHash } from "node:crypto";
import type { ArtifactContent } from "./types.js";

/** SHA-256 hash as hex string (64 characters) */
export function sha256Hex(data: string | Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

function hasToJSON(value: object): value is { toJSON: () => unknown } {
  return "toJSON" in value && typeof value.toJSON === "function";
}

function toJsonValue(value: unknown): unknown {
  return value !== null && typeof value === "object" && hasToJSON(value)
    ? value.toJSON()
    : value;
}

// Values JSON.stringify drops from objects and writes as null in arrays
function isOmitted(value: unknown): boolean {
  return (
    value === undefined ||
    typeof value === "function" ||
    typeof value === "symbol"
  );
}

function serialize(json: unknown): string {
  if (isOmitted(json)) {
    return "null";
  }
  if (json === null || typeof json !== "object") {
    return JSON.stringify(json);
  }
  if (Array.isArray(json)) {
    return `[${json.map((v) => serialize(toJsonValue(v))).join(",")}]`;
  }
  const pairs = Object.entries(json)
    .map(([k, v]): [string, unknown] => [k, toJsonValue(v)])
    .filter(([, v]) => !isOmitted(v))
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([k, v]) => `${JSON.stringify(k)}:${serialize(v)}`);
  return `{${pairs.join(",")}}`;
}

/**
 * Deterministic JSON serialization with sorted keys (recursive).
 *
 * Matches JSON.stringify apart from key order:
 * - `toJSON()` is applied first, so a Date hashes as its ISO string
 * - Arrays keep their order; dropped values become null
 * - Object keys are sorted, keys with undefined, function or symbol
 *   values are dropped
 * - Circular references are unsupported
 */
export function stableStringify(value: unknown): string {
  return serialize(toJsonValue(value));
}

/**
 * Canonical bytes of artifact content: UTF-8 for text, sorted-key compact
 * JSON for structured content, the bytes themselves for binary.
 */
export function canonicalBytes(content: ArtifactContent): Buffer {
  if (typeof content === "string") return Buffer.from(content, "utf8");
  if (content instanceof Uint8Array) return Buffer.from(content);
  return Buffer.from(stableStringify(content), "utf8");
}

export function contentMetrics(content: ArtifactContent): {
  size: number;
  checksum: string;
} {
  const bytes = canonicalBytes(content);
  return { size: bytes.length, checksum: sha256Hex(bytes) };
}
