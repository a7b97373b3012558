import { StatusCode } from "../schemas/protocol.js";

export const STATUS_DESCRIPTIONS: Readonly<Record<StatusCode, string>> = {
  [StatusCode.OK]: "Request completed successfully",
  [StatusCode.CREATED]: "Resource created successfully",
  [StatusCode.ACCEPTED]: "Request accepted for processing",
  [StatusCode.BAD_REQUEST]: "Invalid request format or parameters",
  [StatusCode.UNAUTHORIZED]: "Authentication required",
  [StatusCode.FORBIDDEN]: "Access denied",
  [StatusCode.NOT_FOUND]: "Resource not found",
  [StatusCode.CONFLICT]: "Resource conflict",
  [StatusCode.INTERNAL_ERROR]: "Internal server error",
  [StatusCode.NOT_IMPLEMENTED]: "Feature not implemented",
  [StatusCode.SERVICE_UNAVAILABLE]: "Service temporarily unavailable",
  [StatusCode.AGENT_NOT_FOUND]: "Target agent not found",
  [StatusCode.MESSAGE_FORMAT_ERROR]: "Invalid message format",
  [StatusCode.ROUTING_ERROR]: "Message routing failed",
  [StatusCode.TASK_NOT_FOUND]: "Task not found",
  [StatusCode.ARTIFACT_NOT_FOUND]: "Artifact not found",
};

export function getStatusDescription(code: number): string {
  for (const [key, description] of Object.entries(STATUS_DESCRIPTIONS)) {
    if (Number(key) === code) return description;
  }
  return "Unknown status code";
}

export function isSuccessStatus(code: number): boolean {
  return code >= 200 && code < 300;
}
