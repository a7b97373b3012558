import { existsSync, mkdtempSync, readdirSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { BlobStore, contentKindOf } from "../blobs.js";
import { ArtifactError } from "../errors.js";

describe("BlobStore", () => {
  let dir: string;
  let blobs: BlobStore;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), "agentpost-blobs-"));
    blobs = new BlobStore(dir);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test("one file per version under the artifact directory", async () => {
    const relative = await blobs.write("A1", "1.0.0", "txt", "hello");

    expect(relative).toBe(path.join("A1", "content_1.0.0.txt"));
    expect(readdirSync(path.join(dir, "A1"))).toEqual(["content_1.0.0.txt"]);
    await expect(blobs.read(relative, "text")).resolves.toBe("hello");
  });

  test("structured content reads back as JSON", async () => {
    const relative = await blobs.write("A1", "1.0.1", "json", {
      rows: [1, 2],
    });

    await expect(blobs.read(relative, "json")).resolves.toEqual({
      rows: [1, 2],
    });
  });

  test("binary content reads back as bytes", async () => {
    const relative = await blobs.write(
      "A1",
      "1.0.0",
      "bin",
      new Uint8Array([0, 255]),
    );

    const content = await blobs.read(relative, "binary");

    expect(content).toBeInstanceOf(Uint8Array);
    expect(content).toEqual(Buffer.from([0, 255]));
  });

  test("unsafe ids and formats are refused", () => {
    expect(() => blobs.relativePath("../escape", "1.0.0", "txt")).toThrow(
      ArtifactError,
    );
    expect(() => blobs.relativePath("A1", "1.0.0", "t/x")).toThrow(
      'Format "t/x" must be alphanumeric',
    );
  });

  test("removeArtifact deletes every version", async () => {
    await blobs.write("A1", "1.0.0", "txt", "a");
    await blobs.write("A1", "1.0.1", "txt", "b");

    await blobs.removeArtifact("A1");

    expect(existsSync(path.join(dir, "A1"))).toBe(false);
    await expect(blobs.removeArtifact("A1")).resolves.toBeUndefined();
  });

  test("content kind follows the value", () => {
    expect(contentKindOf("x")).toBe("text");
    expect(contentKindOf(new Uint8Array())).toBe("binary");
    expect(contentKindOf([1])).toBe("json");
  });
});
