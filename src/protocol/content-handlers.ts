import type { JsonObject, PartContent, PartType } from "./types.js";

export function isJsonObject(value: unknown): value is JsonObject {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Uint8Array)
  );
}

/**
 * Serializes, parses and checks the content of one family of content types.
 */
export interface ContentHandler {
  readonly name: "text" | "data" | "binary";
  canHandle(contentType: string): boolean;
  serialize(content: PartContent): string;
  deserialize(raw: string): PartContent;
  validate(content: PartContent): string[];
}

function bytesToUtf8(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("utf8");
}

export const textHandler: ContentHandler = {
  name: "text",
  canHandle: (contentType) => contentType.startsWith("text/"),
  serialize(content) {
    if (typeof content === "string") return content;
    if (content instanceof Uint8Array) return bytesToUtf8(content);
    return JSON.stringify(content);
  },
  deserialize: (raw) => raw,
  validate(content) {
    if (typeof content !== "string") return ["Content must be a string"];
    if (content.trim() === "") return ["Content cannot be empty"];
    return [];
  },
};

const DATA_CONTENT_TYPES = [
  "application/json",
  "application/xml",
  "application/yaml",
  "text/csv",
];

export const dataHandler: ContentHandler = {
  name: "data",
  canHandle: (contentType) =>
    DATA_CONTENT_TYPES.includes(contentType.split(";")[0]?.trim() ?? ""),
  serialize(content) {
    if (typeof content === "string") return content;
    if (content instanceof Uint8Array) return bytesToUtf8(content);
    return JSON.stringify(content);
  },
  deserialize(raw) {
    try {
      const parsed: unknown = JSON.parse(raw);
      return isJsonObject(parsed) ? parsed : raw;
    } catch {
      // not JSON (xml, yaml, csv): keep the raw string
      return raw;
    }
  },
  validate(content) {
    if (isJsonObject(content)) return [];
    if (typeof content === "string") {
      return isJsonObject(dataHandler.deserialize(content))
        ? []
        : ["Data content must be a JSON object"];
    }
    return ["Data content must be a JSON object"];
  },
};

export const binaryHandler: ContentHandler = {
  name: "binary",
  canHandle: () => true,
  serialize(content) {
    if (content instanceof Uint8Array) {
      return Buffer.from(content).toString("base64");
    }
    const text =
      typeof content === "string" ? content : JSON.stringify(content);
    return Buffer.from(text, "utf8").toString("base64");
  },
  deserialize: (raw) => Buffer.from(raw, "base64"),
  validate(content) {
    return content instanceof Uint8Array
      ? []
      : ["Binary content must be bytes"];
  },
};

const HANDLERS: readonly ContentHandler[] = [
  dataHandler,
  textHandler,
  binaryHandler,
];

/** First handler that claims the content type; binary is the catch-all. */
export function getContentHandler(contentType: string): ContentHandler {
  return HANDLERS.find((h) => h.canHandle(contentType)) ?? binaryHandler;
}

/** Handler that governs the content shape of a part type. */
export function handlerForPartType(type: PartType): ContentHandler {
  switch (type) {
    case "text":
      return textHandler;
    case "data":
      return dataHandler;
    default:
      return binaryHandler;
  }
}
