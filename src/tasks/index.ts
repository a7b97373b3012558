// Types
export type {
  CreateTaskInit,
  ListTasksFilters,
  Task,
  TaskArtifactRef,
  TaskAssignment,
  TaskHandler,
  TaskRecord,
  TaskState,
  TaskStats,
} from "./types.js";

// Errors
export { TaskError } from "./errors.js";
export type { TaskErrorCode } from "./errors.js";

// Lifecycle
export {
  assertTaskTransition,
  canTransitionTask,
  isTerminalState,
} from "./transitions.js";

// Messages
export {
  createTaskAssignmentMessage,
  createTaskMessage,
  readTaskAssignment,
  toTaskRecord,
} from "./messages.js";
export type { ParsedAssignment } from "./messages.js";

// Manager
export {
  DEFAULT_CLEANUP_INTERVAL_MS,
  DEFAULT_MAX_TASKS,
  DEFAULT_TASK_MAX_AGE_MS,
  isTaskTimedOut,
  TaskManager,
} from "./manager.js";
export type { TaskManagerOpts } from "./manager.js";
