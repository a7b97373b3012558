import {
  createDataPart,
  createMessage,
  createMultipartMessage,
  isJsonObject,
  type JsonObject,
  type Message,
  type MessageOpts,
  partContentAsData,
} from "../protocol/index.js";
import {
  type TaskAssignment,
  TaskAssignmentSchema,
} from "../schemas/task.js";
import { TaskError } from "./errors.js";
import { isTerminalState } from "./transitions.js";
import type { Task, TaskRecord } from "./types.js";

export function toTaskRecord(task: Task): TaskRecord {
  return {
    kind: "task",
    id: task.id,
    description: task.description,
    status: {
      state: task.state,
      created_at: new Date(task.created_at).toISOString(),
      updated_at: new Date(task.updated_at).toISOString(),
    },
    priority: task.priority,
    artifacts: task.artifacts.map((ref) => ({ ...ref })),
    metadata: structuredClone(task.metadata),
    result: task.result ? structuredClone(task.result) : null,
    error: task.error ?? null,
    timeout_seconds: task.timeout_seconds ?? null,
  };
}

/**
 * Assignment carried by a TASK_ASSIGNMENT message, plus the description
 * resolved from its text.
 */
export interface ParsedAssignment extends TaskAssignment {
  description: string;
  metadata: JsonObject;
}

function parseAssignmentData(
  data: JsonObject,
  message: Message,
): TaskAssignment {
  const parsed = TaskAssignmentSchema.safeParse(data);
  if (!parsed.success) {
    const errors = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`,
    );
    throw new TaskError(
      "INVALID_REQUEST",
      `Invalid task assignment: ${errors.join("; ")}`,
      { message_id: message.id, errors },
    );
  }
  return parsed.data;
}

/**
 * Read the assignment from a message. Text parts (or string content) set
 * the description; data parts (or object content) may override it and
 * contribute type, timeout, priority, artifact ids and merged metadata.
 * Later parts win.
 * @throws TaskError INVALID_REQUEST on a malformed data payload
 */
export function readTaskAssignment(message: Message): ParsedAssignment {
  const result: ParsedAssignment = { description: "", metadata: {} };

  const apply = (data: JsonObject) => {
    const assignment = parseAssignmentData(data, message);
    if (assignment.description !== undefined) {
      result.description = assignment.description;
    }
    if (assignment.metadata) {
      Object.assign(result.metadata, assignment.metadata);
    }
    if (assignment.type !== undefined) result.type = assignment.type;
    if (assignment.timeout_seconds !== undefined) {
      result.timeout_seconds = assignment.timeout_seconds;
    }
    if (assignment.priority !== undefined) {
      result.priority = assignment.priority;
    }
    if (assignment.artifact_ids !== undefined) {
      result.artifact_ids = [...assignment.artifact_ids];
    }
  };

  if (typeof message.content === "string") {
    result.description = message.content;
  } else if (isJsonObject(message.content)) {
    apply(message.content);
  }

  for (const part of message.parts ?? []) {
    if (part.type === "text" && typeof part.content === "string") {
      result.description = part.content;
    } else if (part.type === "data") {
      const data = partContentAsData(part);
      if (data) apply(data);
    }
  }

  if (result.description.trim() === "") {
    result.description = `Task from message ${message.id}`;
  }
  return result;
}

export function createTaskAssignmentMessage(
  sender: string,
  recipients: string[],
  assignment: TaskAssignment,
  opts: MessageOpts = {},
): Message {
  const content: JsonObject = {};
  for (const [key, value] of Object.entries(assignment)) {
    if (value !== undefined) content[key] = value;
  }
  return createMessage({
    ...opts,
    sender,
    recipients,
    content,
    message_type: "task_assignment",
    priority: opts.priority ?? assignment.priority,
  });
}

/**
 * Report a task's state: TASK_COMPLETION once the task is finished
 * (completed, failed, cancelled or timed out), TASK_UPDATE before that.
 * The task record travels as a single data part.
 */
export function createTaskMessage(
  task: Task,
  sender: string,
  recipients: string[],
  opts: MessageOpts = {},
): Message {
  return createMultipartMessage(
    sender,
    recipients,
    [createDataPart(toTaskRecord(task))],
    {
      ...opts,
      priority: opts.priority ?? task.priority,
      correlation_id: opts.correlation_id ?? task.correlation_id,
      message_type: isTerminalState(task.state)
        ? "task_completion"
        : "task_update",
    },
  );
}
