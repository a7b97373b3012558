import type {
  MessageType,
  PartType,
  Priority,
  StatusCode,
} from "../schemas/protocol.js";

export type { MessageType, PartType, Priority, StatusCode };

/** Recipient meaning "every registered agent except the sender". */
export const BROADCAST = "broadcast";

export type JsonObject = Record<string, unknown>;

/** Scalar payload of a single-part message. */
export type MessageContent = string | JsonObject;

export type PartContent = string | Uint8Array | JsonObject;

/**
 * One typed chunk of a multi-part message.
 * `size` is the byte length of the canonical encoding (UTF-8 / JSON / raw).
 */
export interface Part {
  id: string;
  type: PartType;
  content: PartContent;
  content_type: string;
  size: number;
  filename?: string;
  metadata?: JsonObject;
}

export interface MessageHeaders {
  content_type: string;
  encoding: string;
  correlation_id?: string;
  reply_to?: string;
  retry_count: number;
  max_retries: number;
  custom_headers: Record<string, string>;
}

/**
 * A2A message envelope. Carries either scalar `content` or an ordered
 * list of `parts`. Timestamps are ISO-8601 strings.
 */
export interface Message {
  id: string;
  sender: string;
  recipients: string[];
  message_type: MessageType;
  priority: Priority;
  content?: MessageContent;
  parts?: Part[];
  timestamp: string;
  expires_at?: string;
  headers: MessageHeaders;
  status_code?: StatusCode;
  error_message?: string;
}

/** Options shared by the message factories. */
export interface MessageOpts {
  message_type?: MessageType;
  priority?: Priority;
  correlation_id?: string;
  ttl_seconds?: number | null; // null = no expiry
  max_retries?: number;
}
