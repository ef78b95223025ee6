import { describe, expect, it } from "vitest";
import { ArchiveStoreError } from "@shared/errors";
import type { TarIndex } from "@shared/schema";
import { TarIndexCache, indexPathFor, normalizeMemberPath } from "../storage";

describe("normalizeMemberPath", () => {
  it("strips leading ./ and / and collapses separators", () => {
    expect(normalizeMemberPath("./a/./b//c.png")).toBe("a/b/c.png");
    expect(normalizeMemberPath("/a.png")).toBe("a.png");
    expect(normalizeMemberPath("a\\b.png")).toBe("a/b.png");
    expect(normalizeMemberPath(".")).toBe("");
    expect(normalizeMemberPath("")).toBe("");
  });
});

describe("indexPathFor", () => {
  it("swaps the extension for .json", () => {
    expect(indexPathFor("images/1/0234.tar")).toBe("images/1/0234.json");
    expect(indexPathFor("noext")).toBe("noext.json");
  });
});

describe("TarIndexCache", () => {
  const index: TarIndex = { files: { "./x/1.png": { offset: 512, size: 10 } } };

  it("fetches each archive's index once", async () => {
    let fetches = 0;
    const cache = new TarIndexCache(async () => {
      fetches++;
      return index;
    });
    await Promise.all([cache.get("a.tar"), cache.get("./a.tar")]);
    expect(await cache.locate("a.tar", "x/1.png")).toEqual({ offset: 512, size: 10 });
    expect(fetches).toBe(1);
    cache.clear();
    await cache.get("a.tar");
    expect(fetches).toBe(2);
  });

  it("retries after a failed fetch", async () => {
    let fetches = 0;
    const cache = new TarIndexCache(async () => {
      fetches++;
      if (fetches === 1) throw new Error("timeout");
      return index;
    });
    await expect(cache.get("a.tar")).rejects.toThrow("timeout");
    expect((await cache.get("a.tar")).size).toBe(1);
  });

  it("raises a 404 store error for unknown members", async () => {
    const cache = new TarIndexCache(async () => index);
    await expect(cache.locate("a.tar", "x/2.png")).rejects.toBeInstanceOf(ArchiveStoreError);
    await expect(cache.locate("a.tar", "x/2.png")).rejects.toMatchObject({ status: 404 });
  });
});
