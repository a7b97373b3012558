import { StatusCode } from "../schemas/protocol.js";

/**
 * Error codes for protocol operations.
 */
export type ProtocolErrorCode =
  | "MESSAGE_FORMAT_ERROR" // malformed envelope or part
  | "AGENT_NOT_FOUND" // no agent registered under the id
  | "ROUTING_ERROR"; // message could not be delivered

const STATUS_FOR_CODE: Record<ProtocolErrorCode, StatusCode> = {
  MESSAGE_FORMAT_ERROR: StatusCode.MESSAGE_FORMAT_ERROR,
  AGENT_NOT_FOUND: StatusCode.AGENT_NOT_FOUND,
  ROUTING_ERROR: StatusCode.ROUTING_ERROR,
};

export class ProtocolError extends Error {
  public readonly statusCode: StatusCode;

  constructor(
    public readonly code: ProtocolErrorCode,
    message: string,
    public readonly details?: {
      message_id?: string;
      agent_id?: string;
      errors?: string[];
    },
  ) {
    super(message);
    this.name = "ProtocolError";
    this.statusCode = STATUS_FOR_CODE[code];
  }
}
