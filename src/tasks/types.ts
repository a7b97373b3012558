import type { ArtifactType } from "../artifacts/index.js";
import type { JsonObject, Priority } from "../protocol/index.js";
import type { TaskState } from "../schemas/task.js";

export type { TaskAssignment, TaskState } from "../schemas/task.js";

/** Pointer to a stored artifact, pinned to the version seen when attached. */
export interface TaskArtifactRef {
  artifact_id: string;
  artifact_type: ArtifactType;
  version: string;
  checksum: string;
  attached_at: number; // epoch ms
}

/**
 * Unit of assigned work. Timestamps are epoch milliseconds.
 * `metadata.type` selects the registered handler ("default" when unset).
 */
export interface Task {
  id: string;
  description: string;
  state: TaskState;
  priority: Priority;
  created_at: number;
  updated_at: number;
  artifacts: TaskArtifactRef[];
  metadata: JsonObject;
  result?: JsonObject;
  error?: string;
  timeout_seconds?: number;
  assigned_by?: string; // sender of the assignment message
  correlation_id?: string; // id of the assignment message
}

export interface CreateTaskInit {
  description: string;
  priority?: Priority;
  metadata?: JsonObject;
  timeout_seconds?: number;
  assigned_by?: string;
  correlation_id?: string;
}

export interface ListTasksFilters {
  state?: TaskState | string;
  limit?: number;
}

export interface TaskStats {
  total_tasks: number;
  state_counts: Record<TaskState, number>;
  max_tasks: number;
  available_slots: number;
}

/** Returns the task result, or undefined when there is none (a failure). */
export type TaskHandler = (
  task: Task,
) => JsonObject | undefined | Promise<JsonObject | undefined>;

/** JSON shape carried in TASK_UPDATE / TASK_COMPLETION data parts. */
export type TaskRecord = {
  kind: "task";
  id: string;
  description: string;
  status: { state: TaskState; created_at: string; updated_at: string };
  priority: Priority;
  artifacts: TaskArtifactRef[];
  metadata: JsonObject;
  result: JsonObject | null;
  error: string | null;
  timeout_seconds: number | null;
};
