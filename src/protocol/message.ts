import { ulid } from "ulid";
import { TTL } from "../policies/ttl.js";
import { type WireMessage, WireMessageSchema } from "../schemas/message.js";
import {
  isMessageType,
  isPriority,
  PrioritySchema,
  StatusCode,
} from "../schemas/protocol.js";
import { ProtocolError } from "./errors.js";
import { fromWirePart, toWirePart, validatePart } from "./parts.js";
import { getStatusDescription } from "./status.js";
import {
  BROADCAST,
  type Message,
  type MessageContent,
  type MessageHeaders,
  type MessageOpts,
  type MessageType,
  type Part,
  type Priority,
} from "./types.js";

export interface MessageInit extends MessageOpts {
  sender: string;
  recipients: string[];
  content?: MessageContent;
  parts?: Part[];
  reply_to?: string;
  content_type?: string;
  status_code?: StatusCode;
  error_message?: string;
}

export interface ResponseOpts {
  sender?: string; // defaults to the original's first recipient
  status_code?: StatusCode;
  error_message?: string;
  message_type?: MessageType;
}

function expiryFrom(ttlSeconds: number | null | undefined): string | undefined {
  if (ttlSeconds === null || ttlSeconds === undefined) return undefined;
  return new Date(Date.now() + ttlSeconds * 1000).toISOString();
}

export function createMessage(init: MessageInit): Message {
  const headers: MessageHeaders = {
    content_type: init.content_type ?? "application/json",
    encoding: "utf-8",
    retry_count: 0,
    max_retries: init.max_retries ?? 3,
    custom_headers: {},
  };
  if (init.correlation_id !== undefined) {
    headers.correlation_id = init.correlation_id;
  }
  if (init.reply_to !== undefined) headers.reply_to = init.reply_to;

  const message: Message = {
    id: ulid(),
    sender: init.sender,
    recipients: [...init.recipients],
    message_type: init.message_type ?? "request",
    priority: init.priority ?? 2,
    timestamp: new Date().toISOString(),
    headers,
  };
  if (init.content !== undefined) message.content = init.content;
  if (init.parts !== undefined) message.parts = [...init.parts];
  const expiresAt = expiryFrom(init.ttl_seconds);
  if (expiresAt !== undefined) message.expires_at = expiresAt;
  if (init.status_code !== undefined) message.status_code = init.status_code;
  if (init.error_message !== undefined) {
    message.error_message = init.error_message;
  }
  return message;
}

/**
 * Build a REQUEST (or other typed) message. Requests expire after
 * TTL.REQUEST_MESSAGE seconds unless `ttl_seconds` says otherwise.
 */
export function createRequestMessage(
  sender: string,
  recipients: string[],
  content: MessageContent,
  opts: MessageOpts = {},
): Message {
  return createMessage({
    ...opts,
    sender,
    recipients,
    content,
    ttl_seconds:
      opts.ttl_seconds !== undefined ? opts.ttl_seconds : TTL.REQUEST_MESSAGE,
  });
}

/**
 * Reply to `original`: sender and recipient are swapped and the original
 * id becomes the correlation id.
 */
export function createResponseMessage(
  original: Message,
  content: MessageContent,
  opts: ResponseOpts = {},
): Message {
  return createMessage({
    sender: opts.sender ?? original.recipients[0] ?? "",
    recipients: [original.sender],
    message_type: opts.message_type ?? "response",
    priority: original.priority,
    content,
    correlation_id: original.id,
    reply_to: original.sender,
    status_code: opts.status_code ?? StatusCode.OK,
    error_message: opts.error_message,
  });
}

export function createErrorMessage(
  original: Message,
  statusCode: StatusCode,
  errorMessage: string,
  opts: { sender?: string } = {},
): Message {
  return createResponseMessage(
    original,
    {
      error: errorMessage,
      status_code: statusCode,
      description: getStatusDescription(statusCode),
    },
    {
      sender: opts.sender,
      message_type: "error",
      status_code: statusCode,
      error_message: errorMessage,
    },
  );
}

export function createNotificationMessage(
  sender: string,
  recipients: string[],
  content: MessageContent,
  opts: MessageOpts = {},
): Message {
  return createMessage({
    ...opts,
    sender,
    recipients,
    content,
    message_type: "notification",
  });
}

export function createHeartbeatMessage(sender: string): Message {
  return createMessage({
    sender,
    recipients: [BROADCAST],
    message_type: "heartbeat",
    priority: 1,
    content: { at: new Date().toISOString() },
  });
}

export function createDiscoveryMessage(sender: string): Message {
  return createMessage({
    sender,
    recipients: [BROADCAST],
    message_type: "discovery",
    content: {},
  });
}

/**
 * Check envelope and parts. Returns human-readable errors; empty means valid.
 * Expiry is not a format error and is checked separately.
 */
export function validateMessage(message: Message): string[] {
  const errors: string[] = [];

  if (typeof message.sender !== "string" || message.sender.trim() === "") {
    errors.push("Sender is required");
  }

  if (!Array.isArray(message.recipients) || message.recipients.length === 0) {
    errors.push("At least one recipient is required");
  } else if (
    message.recipients.some((r) => typeof r !== "string" || r.trim() === "")
  ) {
    errors.push("Recipient ids must be non-empty strings");
  }

  if (!isMessageType(message.message_type)) {
    errors.push(`Invalid message type: ${String(message.message_type)}`);
  }

  if (!isPriority(message.priority)) {
    errors.push(`Invalid priority: ${String(message.priority)}`);
  }

  if (message.parts !== undefined) {
    if (message.parts.length === 0) {
      errors.push("Parts must not be empty when declared");
    }
    for (const part of message.parts) {
      for (const error of validatePart(part)) {
        errors.push(`Part ${part.id || "<missing id>"}: ${error}`);
      }
    }
    const ids = message.parts.map((p) => p.id);
    if (new Set(ids).size !== ids.length) {
      errors.push("Duplicate part IDs found");
    }
  }

  return errors;
}

/**
 * Accepts 1-5, "3", or a level name such as "HIGH".
 * @throws ProtocolError MESSAGE_FORMAT_ERROR
 */
export function parsePriority(value: unknown): Priority {
  const parsed = PrioritySchema.safeParse(value);
  if (!parsed.success) {
    throw new ProtocolError(
      "MESSAGE_FORMAT_ERROR",
      `Invalid priority: ${String(value)}`,
    );
  }
  return parsed.data;
}

export function isMessageExpired(message: Message, now = Date.now()): boolean {
  if (message.expires_at === undefined) return false;
  return now > Date.parse(message.expires_at);
}

export function canRetry(message: Message): boolean {
  return message.headers.retry_count < message.headers.max_retries;
}

export function incrementRetry(message: Message): void {
  message.headers.retry_count += 1;
}

export function setCustomHeader(
  message: Message,
  key: string,
  value: string,
): void {
  message.headers.custom_headers[key] = value;
}

export function getCustomHeader(
  message: Message,
  key: string,
): string | undefined {
  return message.headers.custom_headers[key];
}

function copyPart(part: Part): Part {
  const { content } = part;
  let copied: Part["content"];
  if (Buffer.isBuffer(content)) copied = Buffer.from(content);
  else if (content instanceof Uint8Array) copied = new Uint8Array(content);
  else copied = structuredClone(content);
  return {
    ...part,
    content: copied,
    metadata: part.metadata && structuredClone(part.metadata),
  };
}

/** Independent copy handed to each recipient. */
export function cloneMessage(message: Message): Message {
  const copy: Message = {
    ...message,
    recipients: [...message.recipients],
    headers: {
      ...message.headers,
      custom_headers: { ...message.headers.custom_headers },
    },
  };
  if (message.content !== undefined) {
    copy.content = structuredClone(message.content);
  }
  if (message.parts !== undefined) copy.parts = message.parts.map(copyPart);
  return copy;
}

export function toWireMessage(message: Message): WireMessage {
  const { parts, ...envelope } = message;
  const wire: WireMessage = { ...envelope };
  if (parts !== undefined) wire.parts = parts.map(toWirePart);
  return wire;
}

/**
 * Decode a wire message (already JSON-parsed).
 * @throws ProtocolError MESSAGE_FORMAT_ERROR when the shape is wrong
 */
export function parseWireMessage(input: unknown): Message {
  const parsed = WireMessageSchema.safeParse(input);
  if (!parsed.success) {
    const errors = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`,
    );
    throw new ProtocolError(
      "MESSAGE_FORMAT_ERROR",
      `Malformed message: ${errors.join("; ")}`,
      { errors },
    );
  }

  const { parts, ...envelope } = parsed.data;
  const message: Message = { ...envelope };
  if (parts !== undefined) message.parts = parts.map(fromWirePart);
  return message;
}

export function isMessage(value: unknown): value is Message {
  return WireMessageSchema.safeParse(value).success;
}
