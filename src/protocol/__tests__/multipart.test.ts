import { describe, expect, test } from "vitest";
import { createRequestMessage } from "../message.js";
import {
  addDataPart,
  addTextPart,
  createMultipartMessage,
  createMultipartResponse,
  getBoundary,
  getDataParts,
  getFileParts,
  getMainContent,
  getPart,
  getPartCount,
  getTextContent,
  getTotalSize,
  hasParts,
  isSinglePart,
  removePart,
} from "../multipart.js";
import { createDataPart, createPart, createTextPart } from "../parts.js";

describe("createMultipartMessage", () => {
  test("content type carries the boundary", () => {
    const msg = createMultipartMessage(
      "planner",
      ["coder"],
      [createTextPart("hello")],
      { boundary: "xyz", priority: 3 },
    );

    expect(msg.headers.content_type).toBe('multipart/mixed; boundary="xyz"');
    expect(getBoundary(msg)).toBe("xyz");
    expect(msg.priority).toBe(3);
    expect(msg.content).toBeUndefined();
  });

  test("generated boundaries are prefixed", () => {
    const msg = createMultipartMessage("a", ["b"]);

    expect(getBoundary(msg)).toMatch(/^boundary_[0-9A-Z]{26}$/);
    expect(hasParts(msg)).toBe(false);
  });

  test("plain messages have no boundary", () => {
    expect(getBoundary(createRequestMessage("a", ["b"], "x"))).toBeUndefined();
  });
});

describe("part management", () => {
  test("adding a part to a plain message makes it multipart", () => {
    const msg = createRequestMessage("a", ["b"], "x");

    const part = addTextPart(msg, "first");

    expect(getPartCount(msg)).toBe(1);
    expect(isSinglePart(msg)).toBe(true);
    expect(getPart(msg, part.id)).toBe(part);
    expect(getBoundary(msg)).toMatch(/^boundary_/);
  });

  test("parts keep insertion order and can be removed", () => {
    const msg = createMultipartMessage("a", ["b"]);
    addTextPart(msg, "one", { id: "t1" });
    addDataPart(msg, { n: 1 }, { id: "d1" });
    addTextPart(msg, "two", { id: "t2" });

    expect(msg.parts?.map((p) => p.id)).toEqual(["t1", "d1", "t2"]);
    expect(removePart(msg, "d1")).toBe(true);
    expect(removePart(msg, "d1")).toBe(false);
    expect(msg.parts?.map((p) => p.id)).toEqual(["t1", "t2"]);
  });

  test("total size sums part sizes", () => {
    const msg = createMultipartMessage("a", ["b"], [
      createTextPart("abc"),
      createDataPart({ a: 1 }),
    ]);

    expect(getTotalSize(msg)).toBe(10);
  });

  test("type filters", () => {
    const msg = createMultipartMessage("a", ["b"], [
      createTextPart("t"),
      createPart("file", new Uint8Array([1]), { filename: "a.bin" }),
      createDataPart({ k: 1 }),
    ]);

    expect(getDataParts(msg)).toHaveLength(1);
    expect(getFileParts(msg).map((p) => p.filename)).toEqual(["a.bin"]);
  });
});

describe("content accessors", () => {
  test("main content prefers the first data part", () => {
    const msg = createMultipartMessage("a", ["b"], [
      createTextPart("summary"),
      createDataPart({ rows: 3 }),
      createDataPart({ rows: 4 }),
    ]);

    expect(getMainContent(msg)).toEqual({ rows: 3 });
  });

  test("main content falls back to the first text part", () => {
    const msg = createMultipartMessage("a", ["b"], [
      createTextPart("first"),
      createTextPart("second"),
    ]);

    expect(getMainContent(msg)).toBe("first");
    expect(getTextContent(msg)).toBe("first\nsecond");
  });

  test("non-object data part yields its text", () => {
    const msg = createMultipartMessage("a", ["b"], [
      createPart("data", "a,b\n1,2", { content_type: "text/csv" }),
    ]);

    expect(getMainContent(msg)).toBe("a,b\n1,2");
  });

  test("no text or data parts", () => {
    const msg = createMultipartMessage("a", ["b"], [
      createPart("image", new Uint8Array([1])),
    ]);

    expect(getMainContent(msg)).toBeUndefined();
    expect(getTextContent(msg)).toBe("");
  });
});

describe("createMultipartResponse", () => {
  test("replies with parts instead of content", () => {
    const request = createRequestMessage("planner", ["coder"], "report?");

    const response = createMultipartResponse(request, [
      createTextPart("done", { id: "r1" }),
    ]);

    expect(response.content).toBeUndefined();
    expect(response.parts?.map((p) => p.id)).toEqual(["r1"]);
    expect(response.sender).toBe("coder");
    expect(response.headers.correlation_id).toBe(request.id);
    expect(getBoundary(response)).toMatch(/^boundary_/);
  });
});
