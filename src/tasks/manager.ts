import { ulid } from "ulid";
import {
  Artifact,
  ArtifactError,
  type ArtifactStore,
} from "../artifacts/index.js";
import { type Logger, logger as rootLogger } from "../logger.js";
import { emitMetric, type MetricsSink, noopMetrics } from "../metrics.js";
import {
  createErrorMessage,
  type JsonObject,
  type Message,
  type MessageHandler,
  Priority,
} from "../protocol/index.js";
import { type TaskState, TaskStateSchema } from "../schemas/task.js";
import { TaskError } from "./errors.js";
import { createTaskMessage, readTaskAssignment } from "./messages.js";
import { assertTaskTransition, isTerminalState } from "./transitions.js";
import type {
  CreateTaskInit,
  ListTasksFilters,
  Task,
  TaskArtifactRef,
  TaskHandler,
  TaskStats,
} from "./types.js";

export const DEFAULT_MAX_TASKS = 1000;
export const DEFAULT_TASK_MAX_AGE_MS = 24 * 3600 * 1000;
export const DEFAULT_CLEANUP_INTERVAL_MS = 3600 * 1000;

export interface TaskManagerOpts {
  maxTasks?: number;
  /** Resolves artifact ids attached to tasks. */
  artifacts?: ArtifactStore;
  logger?: Logger;
  metrics?: MetricsSink;
}

function cloneTask(task: Task): Task {
  return structuredClone(task);
}

function parseState(state: TaskState | string, taskId?: string): TaskState {
  const parsed = TaskStateSchema.safeParse(state);
  if (!parsed.success) {
    throw new TaskError("INVALID_REQUEST", `Invalid task state: ${state}`, {
      task_id: taskId,
    });
  }
  return parsed.data;
}

export function isTaskTimedOut(task: Task, now = Date.now()): boolean {
  return (
    task.timeout_seconds !== undefined &&
    now - task.created_at > task.timeout_seconds * 1000
  );
}

/**
 * In-process task registry with lifecycle tracking.
 *
 * Tasks move created -> running -> completed | failed | cancelled | timeout.
 * A task past its timeout is moved to `timeout` the next time it is read.
 * Callers always get copies; mutate through the manager.
 */
export class TaskManager {
  readonly maxTasks: number;
  private tasks = new Map<string, Task>();
  private handlers = new Map<string, TaskHandler>();
  private cleanupTimer?: NodeJS.Timeout;
  private readonly artifacts?: ArtifactStore;
  private readonly log: Logger;
  private readonly metrics: MetricsSink;

  constructor(opts: TaskManagerOpts = {}) {
    this.maxTasks = opts.maxTasks ?? DEFAULT_MAX_TASKS;
    this.artifacts = opts.artifacts;
    this.log = (opts.logger ?? rootLogger).child({ module: "tasks" });
    this.metrics = opts.metrics ?? noopMetrics;
  }

  /**
   * @throws TaskError INVALID_REQUEST for an empty description or a bad
   * timeout, CAPACITY_EXCEEDED when full of unfinished tasks
   */
  createTask(init: CreateTaskInit): Task {
    if (init.description.trim() === "") {
      throw new TaskError("INVALID_REQUEST", "Task description is required");
    }
    if (
      init.timeout_seconds !== undefined &&
      !(Number.isInteger(init.timeout_seconds) && init.timeout_seconds > 0)
    ) {
      throw new TaskError(
        "INVALID_REQUEST",
        "timeout_seconds must be a positive integer",
      );
    }
    if (this.tasks.size >= this.maxTasks) {
      this.evictFinished(this.tasks.size - this.maxTasks + 1);
      if (this.tasks.size >= this.maxTasks) {
        throw new TaskError(
          "CAPACITY_EXCEEDED",
          `Task limit of ${this.maxTasks} reached`,
        );
      }
    }

    const now = Date.now();
    const task: Task = {
      id: ulid(),
      description: init.description,
      state: "created",
      priority: init.priority ?? Priority.LOW,
      created_at: now,
      updated_at: now,
      artifacts: [],
      metadata: structuredClone(init.metadata ?? {}),
    };
    if (init.timeout_seconds !== undefined) {
      task.timeout_seconds = init.timeout_seconds;
    }
    if (init.assigned_by !== undefined) task.assigned_by = init.assigned_by;
    if (init.correlation_id !== undefined) {
      task.correlation_id = init.correlation_id;
    }

    this.tasks.set(task.id, task);
    this.count("task.created");
    this.log.info(
      { task_id: task.id, description: task.description },
      "Task created",
    );
    return cloneTask(task);
  }

  getTask(taskId: string): Task | undefined {
    const task = this.tasks.get(taskId);
    if (!task) return undefined;
    this.applyTimeout(task);
    return cloneTask(task);
  }

  /**
   * Move a task along its lifecycle. Setting the current state again is
   * a no-op.
   * @throws TaskError TASK_NOT_FOUND | INVALID_TRANSITION | INVALID_REQUEST
   */
  updateTaskState(
    taskId: string,
    state: TaskState | string,
    error?: string,
  ): Task {
    const task = this.requireTask(taskId);
    const next = parseState(state, taskId);
    if (next !== task.state) {
      this.transition(task, next, error);
    }
    return cloneTask(task);
  }

  /**
   * Attach a stored artifact, pinned to its current version. An artifact
   * already attached is re-pinned.
   * @throws TaskError TASK_NOT_FOUND | ARTIFACT_NOT_FOUND, or
   * INVALID_REQUEST for an id with no artifact store configured
   */
  async addTaskArtifact(
    taskId: string,
    artifact: Artifact | string,
  ): Promise<TaskArtifactRef> {
    this.requireTask(taskId);
    const ref = await this.resolveArtifact(artifact, taskId);

    const task = this.requireTask(taskId);
    const existing = task.artifacts.findIndex(
      (r) => r.artifact_id === ref.artifact_id,
    );
    if (existing >= 0) task.artifacts[existing] = ref;
    else task.artifacts.push(ref);
    task.updated_at = ref.attached_at;

    this.log.debug(
      { task_id: taskId, artifact_id: ref.artifact_id, version: ref.version },
      "Artifact attached to task",
    );
    return { ...ref };
  }

  /**
   * Record the result and complete the task.
   * @throws TaskError TASK_NOT_FOUND | INVALID_TRANSITION
   */
  setTaskResult(taskId: string, result: JsonObject): Task {
    const task = this.requireTask(taskId);
    assertTaskTransition(task.state, "completed", taskId);
    task.result = structuredClone(result);
    this.transition(task, "completed");
    return cloneTask(task);
  }

  /**
   * Cancel an unfinished task. False when it has already finished.
   * @throws TaskError TASK_NOT_FOUND
   */
  cancelTask(taskId: string): boolean {
    const task = this.requireTask(taskId);
    if (isTerminalState(task.state)) return false;
    this.transition(task, "cancelled");
    return true;
  }

  /** Highest priority first, then newest first. */
  listTasks(filters: ListTasksFilters = {}): Task[] {
    const state =
      filters.state !== undefined ? parseState(filters.state) : undefined;
    const now = Date.now();

    const tasks = [...this.tasks.values()]
      .map((task) => {
        this.applyTimeout(task, now);
        return task;
      })
      .filter((task) => state === undefined || task.state === state)
      .sort(
        (a, b) =>
          b.priority - a.priority ||
          b.created_at - a.created_at ||
          (a.id < b.id ? 1 : a.id > b.id ? -1 : 0),
      );

    const limited =
      filters.limit !== undefined
        ? tasks.slice(0, Math.max(0, Math.floor(filters.limit)))
        : tasks;
    return limited.map(cloneTask);
  }

  getTaskStats(): TaskStats {
    const state_counts: Record<TaskState, number> = {
      created: 0,
      running: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
      timeout: 0,
    };
    const now = Date.now();
    for (const task of this.tasks.values()) {
      this.applyTimeout(task, now);
      state_counts[task.state] += 1;
    }
    return {
      total_tasks: this.tasks.size,
      state_counts,
      max_tasks: this.maxTasks,
      available_slots: Math.max(0, this.maxTasks - this.tasks.size),
    };
  }

  /**
   * Forget finished tasks last updated more than `maxAgeMs` before `now`.
   * Returns how many were removed.
   */
  cleanupOldTasks(
    maxAgeMs = DEFAULT_TASK_MAX_AGE_MS,
    now = Date.now(),
  ): number {
    const cutoff = now - maxAgeMs;
    let removed = 0;
    for (const [id, task] of this.tasks) {
      this.applyTimeout(task, now);
      if (isTerminalState(task.state) && task.updated_at < cutoff) {
        this.tasks.delete(id);
        removed += 1;
      }
    }
    if (removed > 0) {
      this.count("task.cleaned_up", removed);
      this.log.info({ removed }, "Old tasks cleaned up");
    }
    return removed;
  }

  /** Run cleanupOldTasks on an unref'd interval. */
  startCleanupScheduler(
    intervalMs = DEFAULT_CLEANUP_INTERVAL_MS,
    maxAgeMs = DEFAULT_TASK_MAX_AGE_MS,
  ): void {
    if (this.cleanupTimer) {
      this.log.debug("Task cleanup already scheduled");
      return;
    }
    this.cleanupTimer = setInterval(() => {
      try {
        this.cleanupOldTasks(maxAgeMs);
      } catch (err) {
        this.log.error({ err }, "Task cleanup failed");
      }
    }, intervalMs);
    this.cleanupTimer.unref();
    this.log.info({ interval_ms: intervalMs }, "Task cleanup scheduled");
  }

  stopCleanupScheduler(): void {
    if (!this.cleanupTimer) return;
    clearInterval(this.cleanupTimer);
    this.cleanupTimer = undefined;
    this.log.info("Task cleanup stopped");
  }

  /** Handler for tasks whose `metadata.type` is `taskType`. */
  registerTaskHandler(taskType: string, handler: TaskHandler): void {
    this.handlers.set(taskType, handler);
    this.log.info({ task_type: taskType }, "Task handler registered");
  }

  /**
   * Run a created task through the handler registered for its type.
   * Handler failures and missing results fail the task; nothing is thrown
   * for them. A task cancelled or timed out while its handler ran keeps
   * that state.
   * @throws TaskError TASK_NOT_FOUND | INVALID_TRANSITION
   */
  async processTask(taskId: string): Promise<Task> {
    const task = this.requireTask(taskId);
    this.transition(task, "running");

    const taskType =
      typeof task.metadata.type === "string" ? task.metadata.type : "default";
    const handler = this.handlers.get(taskType);
    if (!handler) {
      this.transition(
        task,
        "failed",
        `No handler registered for task type: ${taskType}`,
      );
      return cloneTask(task);
    }

    let result: JsonObject | undefined;
    try {
      result = await handler(cloneTask(task));
    } catch (err) {
      this.log.error({ err, task_id: taskId }, "Task handler failed");
      if (this.isStillRunning(task)) {
        this.transition(
          task,
          "failed",
          err instanceof Error ? err.message : String(err),
        );
      }
      return cloneTask(task);
    }

    if (!this.isStillRunning(task)) {
      this.log.warn(
        { task_id: taskId, state: task.state },
        "Task finished while its handler ran",
      );
    } else if (result === undefined) {
      this.transition(task, "failed", "Task handler returned no result");
    } else {
      task.result = structuredClone(result);
      this.transition(task, "completed");
    }
    return cloneTask(task);
  }

  /**
   * Create a task from a TASK_ASSIGNMENT message. Artifact ids in the
   * assignment are resolved against the store before the task exists.
   * @throws TaskError INVALID_REQUEST | ARTIFACT_NOT_FOUND | CAPACITY_EXCEEDED
   */
  async createTaskFromMessage(message: Message): Promise<Task> {
    if (message.message_type !== "task_assignment") {
      throw new TaskError(
        "INVALID_REQUEST",
        `Expected a task_assignment message, got ${message.message_type}`,
        { message_id: message.id },
      );
    }
    const assignment = readTaskAssignment(message);

    const refs: TaskArtifactRef[] = [];
    for (const artifactId of assignment.artifact_ids ?? []) {
      refs.push(await this.resolveArtifact(artifactId));
    }

    const metadata: JsonObject = { ...assignment.metadata };
    if (assignment.type !== undefined) metadata.type = assignment.type;

    const created = this.createTask({
      description: assignment.description,
      priority: assignment.priority ?? message.priority,
      metadata,
      timeout_seconds: assignment.timeout_seconds,
      assigned_by: message.sender,
      correlation_id: message.id,
    });
    const task = this.requireTask(created.id);
    task.artifacts.push(...refs);
    return cloneTask(task);
  }

  /**
   * Router handler for an agent that executes tasks: each TASK_ASSIGNMENT
   * becomes a task, is processed, and is answered with a TASK_COMPLETION
   * message. A rejected assignment is answered with an ERROR message.
   * Other message types are ignored.
   */
  asMessageHandler(agentId: string): MessageHandler {
    return async (message) => {
      if (message.message_type !== "task_assignment") return undefined;

      let task: Task;
      try {
        task = await this.createTaskFromMessage(message);
      } catch (err) {
        if (!(err instanceof TaskError)) throw err;
        this.log.warn(
          { err, message_id: message.id },
          "Task assignment rejected",
        );
        return createErrorMessage(message, err.statusCode, err.message, {
          sender: agentId,
        });
      }

      const done = await this.processTask(task.id);
      return createTaskMessage(done, agentId, [message.sender]);
    };
  }

  /** Stop the cleanup scheduler. Tasks are kept. */
  shutdown(): void {
    this.stopCleanupScheduler();
  }

  private requireTask(taskId: string): Task {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new TaskError("TASK_NOT_FOUND", `Task ${taskId} not found`, {
        task_id: taskId,
      });
    }
    this.applyTimeout(task);
    return task;
  }

  private isStillRunning(task: Task): boolean {
    this.applyTimeout(task);
    return this.tasks.get(task.id) === task && task.state === "running";
  }

  private applyTimeout(task: Task, now = Date.now()): void {
    if (!isTerminalState(task.state) && isTaskTimedOut(task, now)) {
      this.transition(task, "timeout", "Task timed out");
    }
  }

  private transition(task: Task, next: TaskState, error?: string): void {
    assertTaskTransition(task.state, next, task.id);
    task.state = next;
    task.updated_at = Date.now();
    if (error !== undefined) task.error = error;
    this.count(`task.${next}`);
    this.log.info({ task_id: task.id, state: next }, "Task state changed");
  }

  /** Drop up to `count` finished tasks, least recently updated first. */
  private evictFinished(count: number): void {
    const finished = [...this.tasks.values()]
      .filter((task) => {
        this.applyTimeout(task);
        return isTerminalState(task.state);
      })
      .sort((a, b) => a.updated_at - b.updated_at)
      .slice(0, count);
    for (const task of finished) this.tasks.delete(task.id);
    if (finished.length > 0) {
      this.log.info({ evicted: finished.length }, "Finished tasks evicted");
    }
  }

  private async resolveArtifact(
    artifact: Artifact | string,
    taskId?: string,
  ): Promise<TaskArtifactRef> {
    let resolved: Artifact;
    if (artifact instanceof Artifact) {
      resolved = artifact;
    } else if (!this.artifacts) {
      throw new TaskError(
        "INVALID_REQUEST",
        "No artifact store configured to resolve artifact ids",
        { task_id: taskId, artifact_id: artifact },
      );
    } else {
      try {
        resolved = await this.artifacts.retrieveArtifact(artifact);
      } catch (err) {
        if (err instanceof ArtifactError && err.code === "NOT_FOUND") {
          throw new TaskError(
            "ARTIFACT_NOT_FOUND",
            `Artifact ${artifact} not found`,
            { task_id: taskId, artifact_id: artifact },
            { cause: err },
          );
        }
        throw err;
      }
    }
    return {
      artifact_id: resolved.id,
      artifact_type: resolved.artifact_type,
      version: resolved.current_version,
      checksum: resolved.metadata.checksum,
      attached_at: Date.now(),
    };
  }

  private count(name: string, value = 1): void {
    emitMetric(this.metrics, this.log, name, value);
  }
}
