import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { Artifact } from "../artifact.js";
import { sha256Hex } from "../canonical.js";
import { ArtifactError } from "../errors.js";
import {
  createArtifact,
  createRecommendationArtifact,
  createVisualizationArtifact,
} from "../factories.js";

const NOW = Date.parse("2026-02-01T12:00:00.000Z");

function draft(content: string | Record<string, unknown> = "hello") {
  return createArtifact("report", content, {
    title: "Weekly report",
    author: "analyst",
  });
}

function expectArtifactError(fn: () => unknown, code: string): void {
  try {
    fn();
    expect.unreachable("expected an ArtifactError");
  } catch (err) {
    expect(err).toBeInstanceOf(ArtifactError);
    if (err instanceof ArtifactError) expect(err.code).toBe(code);
  }
}

beforeEach(() => {
  vi.useFakeTimers({ toFake: ["Date"] });
  vi.setSystemTime(NOW);
});

afterEach(() => {
  vi.useRealTimers();
});

describe("construction", () => {
  test("defaults and the initial version", () => {
    const artifact = draft();

    expect(artifact.id).toMatch(/^[0-9A-Z]{26}$/);
    expect(artifact.status).toBe("draft");
    expect(artifact.priority).toBe(2);
    expect(artifact.current_version).toBe("1.0.0");
    expect(artifact.metadata).toMatchObject({
      author: "analyst",
      created_at: NOW,
      modified_at: NOW,
      format: "txt",
      language: "en",
      size: 5,
      checksum: sha256Hex("hello"),
    });
    expect(artifact.versions).toHaveLength(1);
    expect(artifact.versions[0]).toMatchObject({
      version: "1.0.0",
      author: "analyst",
      changes: ["Initial version"],
      content_hash: sha256Hex("hello"),
      size: 5,
      created_at: NOW,
    });
  });

  test("structured content checksum ignores key order", () => {
    const a = draft({ b: 1, a: { d: 2, c: 3 } });
    const b = draft({ a: { c: 3, d: 2 }, b: 1 });

    expect(a.metadata.checksum).toBe(b.metadata.checksum);
    expect(a.metadata.checksum).toBe(sha256Hex('{"a":{"c":3,"d":2},"b":1}'));
    expect(a.metadata.format).toBe("json");
  });

  test("raw enum values are normalized", () => {
    const artifact = new Artifact({
      artifact_type: "AUDIT_LOG",
      status: "Review",
      priority: "HIGH",
      content: "entry",
    });

    expect(artifact.artifact_type).toBe("audit_log");
    expect(artifact.status).toBe("review");
    expect(artifact.priority).toBe(3);
    expect(artifact.metadata.author).toBe("unknown");
  });

  test("unknown type is a validation error", () => {
    expect(() => new Artifact({ artifact_type: "memo", content: "x" })).toThrow(
      "Invalid artifact type: memo",
    );
  });

  test("history without current_version is rejected", () => {
    const base = draft();

    expectArtifactError(
      () =>
        new Artifact({
          artifact_type: "report",
          content: "hello",
          versions: base.versions,
        }),
      "VALIDATION_ERROR",
    );
  });

  test("factories set the type and format", () => {
    const rec = createRecommendationArtifact(
      { action: "scale up" },
      { title: "Capacity", author: "planner" },
    );
    const viz = createVisualizationArtifact(new Uint8Array([1, 2]), {
      title: "Chart",
      author: "plotter",
    });

    expect(rec.artifact_type).toBe("recommendation");
    expect(viz.artifact_type).toBe("visualization");
    expect(viz.metadata.format).toBe("png");
    expect(viz.metadata.size).toBe(2);
  });
});

describe("versioning", () => {
  test("content update records a new patch version", () => {
    const artifact = draft();

    vi.setSystemTime(NOW + 1000);
    const version = artifact.updateContent("hello again", "editor", [
      "Reworded",
    ]);

    expect(version).toBe("1.0.1");
    expect(artifact.current_version).toBe("1.0.1");
    expect(artifact.metadata.checksum).toBe(sha256Hex("hello again"));
    expect(artifact.metadata.modified_at).toBe(NOW + 1000);
    expect(artifact.getVersion("1.0.1")).toMatchObject({
      author: "editor",
      changes: ["Reworded"],
      content_hash: sha256Hex("hello again"),
      size: 11,
    });
    expect(artifact.getVersion("1.0.0")?.content_hash).toBe(sha256Hex("hello"));
  });

  test("metadata update merges custom fields", () => {
    const artifact = createArtifact("analysis", "body", {
      title: "Churn",
      author: "analyst",
      custom_fields: { region: "eu" },
    });

    artifact.updateMetadata(
      { title: "Churn (Q3)", custom_fields: { quarter: 3 } },
      "editor",
    );

    expect(artifact.metadata.title).toBe("Churn (Q3)");
    expect(artifact.metadata.custom_fields).toEqual({
      region: "eu",
      quarter: 3,
    });
    expect(artifact.getLatestVersion().changes).toEqual(["Metadata updated"]);
  });

  test("latest version compares numerically", () => {
    const artifact = draft();
    for (let i = 0; i < 10; i++) artifact.updateContent(`v${i}`, "editor");

    expect(artifact.current_version).toBe("1.0.10");
    expect(artifact.getLatestVersion().version).toBe("1.0.10");
    expect(artifact.updateContent("next", "editor")).toBe("1.0.11");
  });

  test("rollback restores metadata as a new version", () => {
    const artifact = draft();
    artifact.updateMetadata({ title: "Renamed", tags: ["x"] }, "editor");

    expect(artifact.rollbackToVersion("1.0.0", "reviewer")).toBe(true);

    expect(artifact.metadata.title).toBe("Weekly report");
    expect(artifact.metadata.tags).toEqual([]);
    expect(artifact.current_version).toBe("1.0.2");
    expect(artifact.getLatestVersion()).toMatchObject({
      author: "reviewer",
      changes: ["Rolled back to version 1.0.0"],
    });
  });

  test("rollback keeps access telemetry and the current format", () => {
    const artifact = draft();
    artifact.updateContent({ rows: [1] }, "editor");
    vi.setSystemTime(NOW + 5000);
    artifact.access();

    artifact.rollbackToVersion("1.0.0", "reviewer");

    expect(artifact.metadata.format).toBe("json");
    expect(artifact.metadata.accessed_at).toBe(NOW + 5000);
    expect(artifact.metadata.checksum).toBe(sha256Hex('{"rows":[1]}'));
    expect(artifact.getLatestVersion().metadata.format).toBe("json");
  });

  test("content of another kind switches the default format", () => {
    const artifact = draft();
    const chart = createVisualizationArtifact(new Uint8Array([1]), {
      title: "Chart",
      author: "plotter",
    });

    artifact.updateContent({ rows: [1] }, "editor");
    chart.updateContent(new Uint8Array([2]), "plotter");

    expect(artifact.metadata.format).toBe("json");
    expect(chart.metadata.format).toBe("png");
  });

  test("rollback to an unknown version does nothing", () => {
    const artifact = draft();

    expect(artifact.rollbackToVersion("9.9.9", "reviewer")).toBe(false);
    expect(artifact.versions).toHaveLength(1);
  });
});

describe("status lifecycle", () => {
  test("transitions annotate the latest version", () => {
    const artifact = draft();

    artifact.updateStatus("review", "editor");
    artifact.updateStatus("PUBLISHED", "lead");

    expect(artifact.status).toBe("published");
    expect(artifact.versions).toHaveLength(1);
    expect(artifact.versions[0]?.changes).toEqual([
      "Initial version",
      "Status changed to review (editor)",
      "Status changed to published (lead)",
    ]);
  });

  test("skipping review is rejected", () => {
    const artifact = draft();

    expectArtifactError(
      () => artifact.updateStatus("published", "lead"),
      "INVALID_TRANSITION",
    );
    expect(artifact.status).toBe("draft");
  });

  test("re-applying the current status is a no-op", () => {
    const artifact = draft();

    artifact.updateStatus("draft", "editor");

    expect(artifact.versions[0]?.changes).toEqual(["Initial version"]);
  });

  test("deleted is terminal", () => {
    const artifact = draft();
    artifact.updateStatus("deleted", "editor");

    expectArtifactError(
      () => artifact.updateStatus("draft", "editor"),
      "INVALID_TRANSITION",
    );
  });
});

describe("quality score", () => {
  test("content alone scores 20", () => {
    expect(draft().quality_score).toBe(20);
  });

  test("weights add up across signals", () => {
    const artifact = createArtifact("report", "body", {
      title: "Title",
      description: "What it covers",
      author: "analyst",
      tags: ["a", "b"],
      custom_fields: { team: "core" },
    });
    expect(artifact.quality_score).toBe(40.5);

    artifact.updateStatus("review", "editor");
    expect(artifact.quality_score).toBe(55.5);

    artifact.updateContent("body v2", "editor");
    expect(artifact.quality_score).toBe(65.5);
  });

  test("publishing a minimal draft adds exactly 20", () => {
    const artifact = createArtifact("report", { risk: "high" }, {
      title: "T",
      author: "a1",
    });
    const draftScore = artifact.quality_score;

    artifact.updateStatus("review", "a1");
    artifact.updateStatus("published", "a1");

    expect(draftScore).toBeGreaterThanOrEqual(20);
    expect(draftScore).toBeLessThan(35);
    expect(artifact.quality_score).toBe(draftScore + 20);
  });

  test("access contribution is capped at 10", () => {
    const artifact = new Artifact({
      artifact_type: "report",
      content: "x",
      access_count: 500,
    });

    expect(artifact.quality_score).toBe(30);
  });
});

describe("permissions", () => {
  test("grant, check and revoke", () => {
    const artifact = draft();
    artifact.grantPermission("bob", "read");
    artifact.grantPermission("bob", "write");
    artifact.grantPermission("bob", "read");

    expect(artifact.permissions).toEqual({ bob: ["read", "write"] });
    expect(artifact.hasPermission("bob", "write")).toBe(true);

    expect(artifact.revokePermission("bob", "write")).toBe(true);
    expect(artifact.revokePermission("bob", "write")).toBe(false);
    expect(artifact.hasPermission("bob", "write")).toBe(false);

    expect(artifact.revokePermission("bob")).toBe(true);
    expect(artifact.permissions).toEqual({});
  });
});

describe("access and expiry", () => {
  test("access bumps the counter and timestamp", () => {
    const artifact = draft();

    vi.setSystemTime(NOW + 5000);
    artifact.access();

    expect(artifact.access_count).toBe(1);
    expect(artifact.metadata.accessed_at).toBe(NOW + 5000);
  });

  test("expiry is strictly after expires_at", () => {
    const artifact = draft();
    artifact.setExpiresAt(NOW + 1000);

    expect(artifact.isExpired(NOW + 1000)).toBe(false);
    expect(artifact.isExpired(NOW + 1001)).toBe(true);

    artifact.setExpiresAt(null);
    expect(artifact.expires_at).toBeUndefined();
  });
});

describe("validate", () => {
  test("valid draft", () => {
    expect(draft().validate()).toEqual([]);
  });

  test("reports every problem", () => {
    const artifact = new Artifact({
      artifact_type: "report",
      content: "",
      expires_at: NOW - 1,
    });

    expect(artifact.validate()).toEqual([
      "Title is required",
      "Content is required",
      "Artifact has expired",
    ]);
  });
});

describe("records", () => {
  test("binary content is base64 encoded", () => {
    const artifact = createVisualizationArtifact(new Uint8Array([0, 1, 255]), {
      title: "Heatmap",
      author: "plotter",
    });

    const record = artifact.toRecord();

    expect(record.content).toBe("AAH/");
    expect(record.content_encoding).toBe("base64");
    expect(record.expires_at).toBeNull();

    const restored = Artifact.fromRecord(JSON.parse(JSON.stringify(record)));
    expect(restored.content).toBeInstanceOf(Uint8Array);
    expect(restored.metadata.checksum).toBe(artifact.metadata.checksum);
    expect(restored.versions).toEqual(artifact.versions);
  });

  test("tampered content fails the checksum", () => {
    const record = draft().toRecord();
    record.content = "hello!";

    expect(() => Artifact.fromRecord(record)).toThrow(
      /^Checksum mismatch for artifact/,
    );
  });

  test("malformed record lists the failing fields", () => {
    try {
      Artifact.fromRecord({ id: "a1", artifact_type: "report" });
      expect.unreachable("expected fromRecord to throw");
    } catch (err) {
      expect(err).toBeInstanceOf(ArtifactError);
      if (err instanceof ArtifactError) {
        expect(err.code).toBe("VALIDATION_ERROR");
        expect(err.details.errors).toContain("status: Required");
      }
    }
  });

  test("clone is independent", () => {
    const artifact = draft({ rows: [1, 2] });

    const copy = artifact.clone();
    copy.updateMetadata({ title: "Copy" }, "editor");

    expect(artifact.metadata.title).toBe("Weekly report");
    expect(artifact.versions).toHaveLength(1);
    expect(copy.versions).toHaveLength(2);
  });
});
