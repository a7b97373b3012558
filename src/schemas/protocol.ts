import { z } from "zod";

export const MESSAGE_TYPES = [
  "request",
  "response",
  "notification",
  "error",
  "heartbeat",
  "discovery",
  "task_assignment",
  "task_update",
  "task_completion",
  "artifact_created",
  "artifact_requested",
] as const;

export const PART_TYPES = [
  "text",
  "data",
  "file",
  "image",
  "audio",
  "video",
  "binary",
] as const;

export const Priority = {
  LOW: 1,
  NORMAL: 2,
  HIGH: 3,
  URGENT: 4,
  CRITICAL: 5,
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const StatusCode = {
  OK: 200,
  CREATED: 201,
  ACCEPTED: 202,
  BAD_REQUEST: 400,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  NOT_FOUND: 404,
  CONFLICT: 409,
  INTERNAL_ERROR: 500,
  NOT_IMPLEMENTED: 501,
  SERVICE_UNAVAILABLE: 503,
  AGENT_NOT_FOUND: 1001,
  MESSAGE_FORMAT_ERROR: 1002,
  ROUTING_ERROR: 1003,
  TASK_NOT_FOUND: 1004,
  ARTIFACT_NOT_FOUND: 1005,
} as const;

export type StatusCode = (typeof StatusCode)[keyof typeof StatusCode];

const PRIORITY_BY_NAME = new Map<string, Priority>(Object.entries(Priority));

export function lowercaseString(value: unknown): unknown {
  return typeof value === "string" ? value.trim().toLowerCase() : value;
}

/** Accepts 1-5, "3", or a level name such as "HIGH" / "high". */
function priorityScalar(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  const byName = PRIORITY_BY_NAME.get(trimmed.toUpperCase());
  if (byName !== undefined) return byName;
  return /^\d+$/.test(trimmed) ? Number(trimmed) : value;
}

export const MessageTypeSchema = z.preprocess(
  lowercaseString,
  z.enum(MESSAGE_TYPES),
);
export type MessageType = z.infer<typeof MessageTypeSchema>;

export const PartTypeSchema = z.preprocess(lowercaseString, z.enum(PART_TYPES));
export type PartType = z.infer<typeof PartTypeSchema>;

export const PrioritySchema = z.preprocess(
  priorityScalar,
  z.union([
    z.literal(Priority.LOW),
    z.literal(Priority.NORMAL),
    z.literal(Priority.HIGH),
    z.literal(Priority.URGENT),
    z.literal(Priority.CRITICAL),
  ]),
);

const STATUS_CODE_VALUES: readonly StatusCode[] = Object.values(StatusCode);

export function isStatusCode(value: unknown): value is StatusCode {
  return STATUS_CODE_VALUES.some((code) => code === value);
}

export const StatusCodeSchema = z.custom<StatusCode>(isStatusCode, {
  message: "Unknown status code",
});

export function isMessageType(value: unknown): value is MessageType {
  return MESSAGE_TYPES.some((t) => t === value);
}

export function isPartType(value: unknown): value is PartType {
  return PART_TYPES.some((t) => t === value);
}

export function isPriority(value: unknown): value is Priority {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= Priority.LOW &&
    value <= Priority.CRITICAL
  );
}
