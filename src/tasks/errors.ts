import { StatusCode } from "../schemas/protocol.js";

/**
 * Error codes for task operations.
 */
export type TaskErrorCode =
  | "TASK_NOT_FOUND" // unknown task id
  | "INVALID_TRANSITION" // state change outside the task lifecycle
  | "INVALID_REQUEST" // malformed assignment or argument
  | "CAPACITY_EXCEEDED" // max_tasks reached and nothing finished to evict
  | "ARTIFACT_NOT_FOUND"; // attached artifact id is not in the store

const STATUS_FOR_CODE: Record<TaskErrorCode, StatusCode> = {
  TASK_NOT_FOUND: StatusCode.TASK_NOT_FOUND,
  INVALID_TRANSITION: StatusCode.CONFLICT,
  INVALID_REQUEST: StatusCode.BAD_REQUEST,
  CAPACITY_EXCEEDED: StatusCode.SERVICE_UNAVAILABLE,
  ARTIFACT_NOT_FOUND: StatusCode.ARTIFACT_NOT_FOUND,
};

export class TaskError extends Error {
  public readonly statusCode: StatusCode;

  constructor(
    public readonly code: TaskErrorCode,
    message: string,
    public readonly details: {
      task_id?: string;
      artifact_id?: string;
      message_id?: string;
      errors?: string[];
    } = {},
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "TaskError";
    this.statusCode = STATUS_FOR_CODE[code];
  }
}
