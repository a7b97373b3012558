import { mkdtempSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { createArtifact } from "../../artifacts/factories.js";
import { SqliteArtifactStore } from "../../artifacts/sqlite.js";
import { InMemoryMetrics } from "../../metrics.js";
import {
  createDataPart,
  createMessage,
  createMultipartMessage,
  createTextPart,
  getDataParts,
} from "../../protocol/index.js";
import { MessageRouter } from "../../protocol/router.js";
import { TaskError } from "../errors.js";
import { TaskManager } from "../manager.js";
import { createTaskAssignmentMessage } from "../messages.js";

const NOW = Date.parse("2026-04-01T00:00:00.000Z");

function expectTaskError(fn: () => unknown, code: string): void {
  try {
    fn();
    expect.unreachable("expected a TaskError");
  } catch (err) {
    expect(err).toBeInstanceOf(TaskError);
    if (err instanceof TaskError) expect(err.code).toBe(code);
  }
}

describe("TaskManager", () => {
  let manager: TaskManager;
  let metrics: InMemoryMetrics;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["Date"] });
    vi.setSystemTime(NOW);
    metrics = new InMemoryMetrics();
    manager = new TaskManager({ maxTasks: 5, metrics });
  });

  afterEach(() => {
    manager.shutdown();
    vi.useRealTimers();
  });

  describe("create and read", () => {
    test("new task defaults", () => {
      const task = manager.createTask({ description: "Summarize logs" });

      expect(task.id).toMatch(/^[0-9A-Z]{26}$/);
      expect(task).toMatchObject({
        description: "Summarize logs",
        state: "created",
        priority: 1,
        created_at: NOW,
        updated_at: NOW,
        artifacts: [],
        metadata: {},
      });
      expect(task.timeout_seconds).toBeUndefined();
      expect(metrics.get("task.created")).toBe(1);
    });

    test("callers get copies", () => {
      const task = manager.createTask({
        description: "Summarize logs",
        metadata: { lang: "en" },
      });

      task.metadata.lang = "fr";
      task.state = "completed";

      expect(manager.getTask(task.id)).toMatchObject({
        state: "created",
        metadata: { lang: "en" },
      });
    });

    test("unknown id reads as undefined", () => {
      expect(manager.getTask("missing")).toBeUndefined();
    });

    test("empty description and bad timeout are rejected", () => {
      expectTaskError(
        () => manager.createTask({ description: "  " }),
        "INVALID_REQUEST",
      );
      expectTaskError(
        () => manager.createTask({ description: "x", timeout_seconds: 0 }),
        "INVALID_REQUEST",
      );
    });
  });

  describe("lifecycle", () => {
    test("created -> running -> failed keeps the error", () => {
      const { id } = manager.createTask({ description: "Fetch data" });

      manager.updateTaskState(id, "RUNNING");
      vi.setSystemTime(NOW + 500);
      const failed = manager.updateTaskState(id, "failed", "upstream down");

      expect(failed).toMatchObject({
        state: "failed",
        error: "upstream down",
        updated_at: NOW + 500,
      });
      expect(metrics.get("task.running")).toBe(1);
      expect(metrics.get("task.failed")).toBe(1);
    });

    test("setting the current state again is a no-op", () => {
      const { id } = manager.createTask({ description: "Fetch data" });
      manager.updateTaskState(id, "running");

      vi.setSystemTime(NOW + 500);
      const task = manager.updateTaskState(id, "running");

      expect(task.updated_at).toBe(NOW);
      expect(metrics.get("task.running")).toBe(1);
    });

    test("finished tasks cannot move again", () => {
      const { id } = manager.createTask({ description: "Fetch data" });
      manager.setTaskResult(id, { rows: 3 });

      expectTaskError(
        () => manager.updateTaskState(id, "running"),
        "INVALID_TRANSITION",
      );
      expectTaskError(
        () => manager.setTaskResult(id, { rows: 4 }),
        "INVALID_TRANSITION",
      );
      expect(manager.getTask(id)?.result).toEqual({ rows: 3 });
    });

    test("unknown state and unknown task", () => {
      const { id } = manager.createTask({ description: "Fetch data" });

      expectTaskError(
        () => manager.updateTaskState(id, "paused"),
        "INVALID_REQUEST",
      );
      try {
        manager.updateTaskState("missing", "running");
        expect.unreachable("expected TASK_NOT_FOUND");
      } catch (err) {
        expect(err).toBeInstanceOf(TaskError);
        if (err instanceof TaskError) {
          expect(err.code).toBe("TASK_NOT_FOUND");
          expect(err.statusCode).toBe(1004);
        }
      }
    });

    test("cancel only unfinished tasks", () => {
      const { id } = manager.createTask({ description: "Fetch data" });

      expect(manager.cancelTask(id)).toBe(true);
      expect(manager.cancelTask(id)).toBe(false);
      expect(manager.getTask(id)?.state).toBe("cancelled");
      expectTaskError(() => manager.cancelTask("missing"), "TASK_NOT_FOUND");
    });

    test("timeout applies strictly after the deadline", () => {
      const { id } = manager.createTask({
        description: "Fetch data",
        timeout_seconds: 60,
      });

      vi.setSystemTime(NOW + 60_000);
      expect(manager.getTask(id)?.state).toBe("created");

      vi.setSystemTime(NOW + 60_001);
      expect(manager.getTask(id)).toMatchObject({
        state: "timeout",
        error: "Task timed out",
        updated_at: NOW + 60_001,
      });
      expect(manager.cancelTask(id)).toBe(false);
    });
  });

  describe("listing and stats", () => {
    test("highest priority first, then newest", () => {
      const a = manager.createTask({ description: "a" });
      vi.setSystemTime(NOW + 1);
      const b = manager.createTask({ description: "b", priority: 3 });
      vi.setSystemTime(NOW + 2);
      const c = manager.createTask({ description: "c" });

      expect(manager.listTasks().map((t) => t.id)).toEqual([b.id, c.id, a.id]);
      expect(manager.listTasks({ limit: 2 }).map((t) => t.id)).toEqual([
        b.id,
        c.id,
      ]);
      expect(manager.listTasks({ limit: -1 })).toEqual([]);
    });

    test("state filter", () => {
      const a = manager.createTask({ description: "a" });
      manager.createTask({ description: "b" });
      manager.cancelTask(a.id);

      const cancelled = manager.listTasks({ state: "cancelled" });
      expect(cancelled.map((t) => t.id)).toEqual([a.id]);
    });

    test("stats count every state", () => {
      const a = manager.createTask({ description: "a" });
      manager.createTask({ description: "b" });
      manager.createTask({ description: "c" });
      manager.cancelTask(a.id);

      expect(manager.getTaskStats()).toEqual({
        total_tasks: 3,
        state_counts: {
          created: 2,
          running: 0,
          completed: 0,
          failed: 0,
          cancelled: 1,
          timeout: 0,
        },
        max_tasks: 5,
        available_slots: 2,
      });
    });
  });

  describe("cleanup and capacity", () => {
    test("old finished tasks are removed", () => {
      const done = manager.createTask({ description: "done" });
      const open = manager.createTask({ description: "open" });
      manager.setTaskResult(done.id, { ok: true });

      expect(manager.cleanupOldTasks(1000, NOW + 1000)).toBe(0);
      expect(manager.cleanupOldTasks(1000, NOW + 1001)).toBe(1);

      expect(manager.getTask(done.id)).toBeUndefined();
      expect(manager.getTask(open.id)?.state).toBe("created");
      expect(metrics.get("task.cleaned_up")).toBe(1);
    });

    test("a full manager evicts the oldest finished task", () => {
      const small = new TaskManager({ maxTasks: 2 });
      const a = small.createTask({ description: "a" });
      small.createTask({ description: "b" });
      small.setTaskResult(a.id, { ok: true });

      small.createTask({ description: "c" });

      expect(small.getTask(a.id)).toBeUndefined();
      expect(small.getTaskStats().total_tasks).toBe(2);
      expectTaskError(
        () => small.createTask({ description: "d" }),
        "CAPACITY_EXCEEDED",
      );
    });

    test("the cleanup scheduler starts once and stops", () => {
      manager.startCleanupScheduler(60_000);
      manager.startCleanupScheduler(60_000);

      expect(() => manager.stopCleanupScheduler()).not.toThrow();
      expect(() => manager.stopCleanupScheduler()).not.toThrow();
    });
  });

  describe("processTask", () => {
    test("runs the handler registered for the task type", async () => {
      const seen: string[] = [];
      manager.registerTaskHandler("summarize", (task) => {
        seen.push(task.state);
        return { summary: `${task.description}: ok` };
      });
      const { id } = manager.createTask({
        description: "logs",
        metadata: { type: "summarize" },
      });

      const task = await manager.processTask(id);

      expect(seen).toEqual(["running"]);
      expect(task.state).toBe("completed");
      expect(task.result).toEqual({ summary: "logs: ok" });
      expect(metrics.get("task.completed")).toBe(1);
    });

    test("untyped tasks use the default handler", async () => {
      manager.registerTaskHandler("default", async () => ({ done: true }));
      const { id } = manager.createTask({ description: "anything" });

      expect((await manager.processTask(id)).result).toEqual({ done: true });
    });

    test("missing handler fails the task", async () => {
      const { id } = manager.createTask({
        description: "x",
        metadata: { type: "translate" },
      });

      const task = await manager.processTask(id);

      expect(task.state).toBe("failed");
      expect(task.error).toBe("No handler registered for task type: translate");
    });

    test("no result fails the task", async () => {
      manager.registerTaskHandler("default", () => undefined);
      const { id } = manager.createTask({ description: "x" });

      const task = await manager.processTask(id);

      expect(task.state).toBe("failed");
      expect(task.error).toBe("Task handler returned no result");
    });

    test("a throwing handler fails the task", async () => {
      manager.registerTaskHandler("default", () => {
        throw new Error("boom");
      });
      const { id } = manager.createTask({ description: "x" });

      const task = await manager.processTask(id);

      expect(task.state).toBe("failed");
      expect(task.error).toBe("boom");
    });

    test("cancelled while the handler runs stays cancelled", async () => {
      manager.registerTaskHandler("default", (task) => {
        manager.cancelTask(task.id);
        return { late: true };
      });
      const { id } = manager.createTask({ description: "x" });

      const task = await manager.processTask(id);

      expect(task.state).toBe("cancelled");
      expect(task.result).toBeUndefined();
    });

    test("finished tasks are not processed again", async () => {
      manager.registerTaskHandler("default", () => ({ ok: true }));
      const { id } = manager.createTask({ description: "x" });
      await manager.processTask(id);

      await expect(manager.processTask(id)).rejects.toMatchObject({
        code: "INVALID_TRANSITION",
      });
    });
  });

  describe("artifacts", () => {
    let dir: string;
    let store: SqliteArtifactStore;
    let withStore: TaskManager;

    beforeEach(() => {
      dir = mkdtempSync(path.join(os.tmpdir(), "agentpost-tasks-"));
      store = new SqliteArtifactStore({ dbPath: ":memory:", storageRoot: dir });
      withStore = new TaskManager({ artifacts: store });
    });

    afterEach(() => {
      store.close();
      rmSync(dir, { recursive: true, force: true });
    });

    function report() {
      return createArtifact("report", "Latency is down.", {
        title: "Latency",
        author: "analyst",
      });
    }

    test("an attached id is pinned to the stored version", async () => {
      const artifact = report();
      await store.storeArtifact(artifact);
      const { id } = withStore.createTask({ description: "Review" });

      vi.setSystemTime(NOW + 10);
      const ref = await withStore.addTaskArtifact(id, artifact.id);

      expect(ref).toEqual({
        artifact_id: artifact.id,
        artifact_type: "report",
        version: "1.0.0",
        checksum: artifact.metadata.checksum,
        attached_at: NOW + 10,
      });
      expect(withStore.getTask(id)?.updated_at).toBe(NOW + 10);
    });

    test("attaching again re-pins the newer version", async () => {
      const artifact = report();
      await store.storeArtifact(artifact);
      const { id } = withStore.createTask({ description: "Review" });
      await withStore.addTaskArtifact(id, artifact.id);
      await store.updateArtifact(artifact.id, { content: "v2" }, "editor");

      await withStore.addTaskArtifact(id, artifact.id);

      const refs = withStore.getTask(id)?.artifacts ?? [];
      expect(refs).toHaveLength(1);
      expect(refs[0]?.version).toBe("1.0.1");
    });

    test("unknown artifact id", async () => {
      const { id } = withStore.createTask({ description: "Review" });

      try {
        await withStore.addTaskArtifact(id, "missing");
        expect.unreachable("expected ARTIFACT_NOT_FOUND");
      } catch (err) {
        expect(err).toBeInstanceOf(TaskError);
        if (err instanceof TaskError) {
          expect(err.code).toBe("ARTIFACT_NOT_FOUND");
          expect(err.statusCode).toBe(1005);
        }
      }
      expect(withStore.getTask(id)?.artifacts).toEqual([]);
    });

    test("artifact objects attach without a store, ids need one", async () => {
      const artifact = report();
      const { id } = manager.createTask({ description: "Review" });

      const ref = await manager.addTaskArtifact(id, artifact);

      expect(ref.artifact_id).toBe(artifact.id);
      await expect(
        manager.addTaskArtifact(id, artifact.id),
      ).rejects.toMatchObject({ code: "INVALID_REQUEST" });
    });

    test("assignment messages resolve their artifact ids", async () => {
      const artifact = report();
      await store.storeArtifact(artifact);
      const message = createTaskAssignmentMessage("planner", ["worker"], {
        description: "Summarize",
        type: "summarize",
        metadata: { lang: "en" },
        timeout_seconds: 120,
        priority: 3,
        artifact_ids: [artifact.id],
      });

      const task = await withStore.createTaskFromMessage(message);

      expect(task).toMatchObject({
        description: "Summarize",
        priority: 3,
        timeout_seconds: 120,
        metadata: { lang: "en", type: "summarize" },
        assigned_by: "planner",
        correlation_id: message.id,
      });
      expect(task.artifacts.map((r) => r.artifact_id)).toEqual([artifact.id]);
    });

    test("an unknown artifact id creates no task", async () => {
      const message = createTaskAssignmentMessage("planner", ["worker"], {
        description: "Summarize",
        artifact_ids: ["missing"],
      });

      await expect(
        withStore.createTaskFromMessage(message),
      ).rejects.toMatchObject({ code: "ARTIFACT_NOT_FOUND" });
      expect(withStore.listTasks()).toEqual([]);
    });
  });

  describe("createTaskFromMessage", () => {
    test("text part sets the description, data part the metadata", async () => {
      const message = createMultipartMessage(
        "planner",
        ["worker"],
        [
          createTextPart("Translate the report"),
          createDataPart({ metadata: { lang: "fr" } }),
        ],
        { message_type: "task_assignment", priority: 4 },
      );

      const task = await manager.createTaskFromMessage(message);

      expect(task.description).toBe("Translate the report");
      expect(task.metadata).toEqual({ lang: "fr" });
      expect(task.priority).toBe(4);
    });

    test("other message types are refused", async () => {
      const message = createMessage({
        sender: "planner",
        recipients: ["worker"],
        content: "do it",
      });

      await expect(
        manager.createTaskFromMessage(message),
      ).rejects.toMatchObject({ code: "INVALID_REQUEST" });
    });

    test("malformed payload lists the failing fields", async () => {
      const message = createMessage({
        sender: "planner",
        recipients: ["worker"],
        message_type: "task_assignment",
        content: { timeout_seconds: -5 },
      });

      try {
        await manager.createTaskFromMessage(message);
        expect.unreachable("expected INVALID_REQUEST");
      } catch (err) {
        expect(err).toBeInstanceOf(TaskError);
        if (err instanceof TaskError) {
          expect(err.code).toBe("INVALID_REQUEST");
          expect(err.details.errors).toEqual([
            "timeout_seconds: Number must be greater than 0",
          ]);
        }
      }
    });
  });

  describe("as a router handler", () => {
    let router: MessageRouter;

    beforeEach(() => {
      router = new MessageRouter();
      router.registerAgent("planner");
      router.registerAgent(
        "worker",
        {},
        { handler: manager.asMessageHandler("worker") },
      );
    });

    test("assignment is answered with a task completion", async () => {
      manager.registerTaskHandler("default", (task) => ({
        done: task.description,
      }));
      const assignment = createTaskAssignmentMessage("planner", ["worker"], {
        description: "Lint",
      });

      expect(await router.routeMessage(assignment)).toBe(true);

      const reply = router.tryReceive("planner");
      expect(reply?.message_type).toBe("task_completion");
      expect(reply?.sender).toBe("worker");
      expect(reply?.headers.correlation_id).toBe(assignment.id);
      const record = reply ? getDataParts(reply)[0]?.content : undefined;
      expect(record).toMatchObject({
        kind: "task",
        description: "Lint",
        status: { state: "completed" },
        result: { done: "Lint" },
        error: null,
      });
    });

    test("a rejected assignment is answered with an error", async () => {
      const assignment = createMessage({
        sender: "planner",
        recipients: ["worker"],
        message_type: "task_assignment",
        content: { timeout_seconds: -5 },
      });

      await router.routeMessage(assignment);

      const reply = router.tryReceive("planner");
      expect(reply?.message_type).toBe("error");
      expect(reply?.status_code).toBe(400);
      expect(reply?.headers.correlation_id).toBe(assignment.id);
      expect(manager.listTasks()).toEqual([]);
    });

    test("other messages get no reply", async () => {
      await router.routeMessage(
        createMessage({
          sender: "planner",
          recipients: ["worker"],
          message_type: "notification",
          content: "fyi",
        }),
      );

      expect(router.pendingCount("planner")).toBe(0);
      expect(manager.listTasks()).toEqual([]);
    });
  });
});
