import type { ArtifactStatus } from "../schemas/artifact.js";
import { ArtifactError } from "./errors.js";

/**
 * Lifecycle graph. Every non-deleted status may also move to `deleted`,
 * which is terminal.
 */
const VALID_TRANSITIONS: Record<ArtifactStatus, readonly ArtifactStatus[]> = {
  draft: ["review", "deleted"],
  review: ["published", "deleted"],
  published: ["archived", "deleted"],
  archived: ["expired", "deleted"],
  expired: ["deleted"],
  deleted: [],
};

/** Re-applying the current status counts as allowed (a no-op). */
export function canTransition(
  from: ArtifactStatus,
  to: ArtifactStatus,
): boolean {
  return from === to || VALID_TRANSITIONS[from].includes(to);
}

export function nextStatuses(from: ArtifactStatus): readonly ArtifactStatus[] {
  return VALID_TRANSITIONS[from];
}

export function assertTransition(
  from: ArtifactStatus,
  to: ArtifactStatus,
  artifactId?: string,
): void {
  if (!canTransition(from, to)) {
    throw new ArtifactError(
      "INVALID_TRANSITION",
      `Invalid status transition ${from} -> ${to}`,
      { artifact_id: artifactId, operation: "update_status" },
    );
  }
}
