import { describe, expect, it } from "vitest";
import { buildObjectKey, isMissingObjectError } from "../r2";

describe("buildObjectKey", () => {
  it("joins the prefix and the normalized path", () => {
    expect(buildObjectKey("gelbooru_full", "./images/0042.tar")).toBe("gelbooru_full/images/0042.tar");
    expect(buildObjectKey("gelbooru_full/", "images/0042.json")).toBe("gelbooru_full/images/0042.json");
    expect(buildObjectKey("", "/posts.jsonl")).toBe("posts.jsonl");
  });

  it("rejects keys that climb out of the prefix", () => {
    expect(() => buildObjectKey("repo", "../other/0001.tar")).toThrow("Invalid R2 key: repo/../other/0001.tar");
  });
});

describe("isMissingObjectError", () => {
  it("recognizes S3 not-found errors by name or status", () => {
    expect(isMissingObjectError({ name: "NoSuchKey" })).toBe(true);
    expect(isMissingObjectError({ name: "Unknown", $metadata: { httpStatusCode: 404 } })).toBe(true);
    expect(isMissingObjectError({ name: "AccessDenied", $metadata: { httpStatusCode: 403 } })).toBe(false);
    expect(isMissingObjectError(new Error("socket hang up"))).toBe(false);
    expect(isMissingObjectError(null)).toBe(false);
  });
});
