import { describe, expect, test } from "vitest";
import { ArtifactError } from "../errors.js";
import {
  assertTransition,
  canTransition,
  nextStatuses,
} from "../transitions.js";

describe("status transitions", () => {
  test("forward path through the lifecycle", () => {
    expect(canTransition("draft", "review")).toBe(true);
    expect(canTransition("review", "published")).toBe(true);
    expect(canTransition("published", "archived")).toBe(true);
    expect(canTransition("archived", "expired")).toBe(true);
  });

  test("every live status may be deleted", () => {
    for (const from of [
      "draft",
      "review",
      "published",
      "archived",
      "expired",
    ] as const) {
      expect(canTransition(from, "deleted")).toBe(true);
    }
  });

  test("no way back and no way out of deleted", () => {
    expect(canTransition("published", "draft")).toBe(false);
    expect(canTransition("draft", "published")).toBe(false);
    expect(nextStatuses("deleted")).toEqual([]);
  });

  test("same status is allowed", () => {
    expect(canTransition("archived", "archived")).toBe(true);
  });

  test("assertTransition carries the artifact id", () => {
    try {
      assertTransition("expired", "published", "A1");
      expect.unreachable("expected INVALID_TRANSITION");
    } catch (err) {
      expect(err).toBeInstanceOf(ArtifactError);
      if (err instanceof ArtifactError) {
        expect(err.code).toBe("INVALID_TRANSITION");
        expect(err.message).toBe(
          "Invalid status transition expired -> published",
        );
        expect(err.details).toEqual({
          artifact_id: "A1",
          operation: "update_status",
        });
      }
    }
  });
});
