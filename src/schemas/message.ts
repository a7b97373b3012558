import { z } from "zod";
import {
  MessageTypeSchema,
  PartTypeSchema,
  PrioritySchema,
  StatusCodeSchema,
} from "./protocol.js";

const JsonObjectSchema = z.record(z.string(), z.unknown());

/**
 * Part as it travels on the wire. Binary content is a base64 string
 * flagged with `encoding: "base64"`.
 */
export const WirePartSchema = z
  .object({
    id: z.string(),
    type: PartTypeSchema,
    content: z.union([z.string(), JsonObjectSchema]),
    content_type: z.string().optional(),
    encoding: z.enum(["utf-8", "base64"]).optional(),
    size: z.number().int().nonnegative().optional(),
    filename: z.string().optional(),
    metadata: JsonObjectSchema.optional(),
  })
  .strict();

export type WirePart = z.infer<typeof WirePartSchema>;

export const MessageHeadersSchema = z
  .object({
    content_type: z.string().default("application/json"),
    encoding: z.string().default("utf-8"),
    correlation_id: z.string().optional(),
    reply_to: z.string().optional(),
    retry_count: z.number().int().nonnegative().default(0),
    max_retries: z.number().int().nonnegative().default(3),
    custom_headers: z.record(z.string(), z.string()).default({}),
  })
  .strict();

export const WireMessageSchema = z
  .object({
    id: z.string().min(1),
    sender: z.string(),
    recipients: z.array(z.string()),
    message_type: MessageTypeSchema,
    priority: PrioritySchema,
    content: z.union([z.string(), JsonObjectSchema]).optional(),
    parts: z.array(WirePartSchema).optional(),
    timestamp: z.string().datetime({ offset: true }),
    expires_at: z.string().datetime({ offset: true }).optional(),
    headers: MessageHeadersSchema.default({}),
    status_code: StatusCodeSchema.optional(),
    error_message: z.string().optional(),
  })
  .strict();

export type WireMessage = z.infer<typeof WireMessageSchema>;
