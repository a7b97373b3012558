import type { TaskState } from "../schemas/task.js";
import { TaskError } from "./errors.js";

/**
 * Task lifecycle. completed, failed, cancelled and timeout are terminal.
 */
const TASK_TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  created: ["running", "completed", "failed", "cancelled", "timeout"],
  running: ["completed", "failed", "cancelled", "timeout"],
  completed: [],
  failed: [],
  cancelled: [],
  timeout: [],
};

export function isTerminalState(state: TaskState): boolean {
  return TASK_TRANSITIONS[state].length === 0;
}

export function canTransitionTask(from: TaskState, to: TaskState): boolean {
  return TASK_TRANSITIONS[from].includes(to);
}

export function assertTaskTransition(
  from: TaskState,
  to: TaskState,
  taskId?: string,
): void {
  if (!canTransitionTask(from, to)) {
    throw new TaskError(
      "INVALID_TRANSITION",
      `Invalid task state transition ${from} -> ${to}`,
      { task_id: taskId },
    );
  }
}
