import { z } from "zod";
import { lowercaseString, PrioritySchema } from "./protocol.js";

export const TASK_STATES = [
  "created",
  "running",
  "completed",
  "failed",
  "cancelled",
  "timeout",
] as const;

export const TaskStateSchema = z.preprocess(
  lowercaseString,
  z.enum(TASK_STATES),
);
export type TaskState = z.infer<typeof TaskStateSchema>;

/**
 * Payload of a TASK_ASSIGNMENT data part (or object content).
 * Unknown keys are ignored.
 */
export const TaskAssignmentSchema = z.object({
  description: z.string().optional(),
  type: z.string().min(1).optional(),
  metadata: z.record(z.unknown()).optional(),
  timeout_seconds: z.number().int().positive().optional(),
  priority: PrioritySchema.optional(),
  artifact_ids: z.array(z.string().min(1)).optional(),
});
export type TaskAssignment = z.infer<typeof TaskAssignmentSchema>;

export function isTaskState(value: unknown): value is TaskState {
  return TASK_STATES.some((s) => s === value);
}
