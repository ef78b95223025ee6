import * as fs from "fs/promises";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { PathUnrecognizableError, ResourceNotFoundError } from "../../../shared/errors";
import {
  ArchivePool,
  FallbackPool,
  TablePool,
  incrementIdRecognizer,
  tableRecognizer,
} from "../data-pool";
import { moduloCutShards } from "../locator";
import { MemoryArchiveStore, exists, makeTempDir } from "./memory-store";

let scratchDir: string;

beforeEach(async () => {
  scratchDir = await makeTempDir();
});

afterEach(async () => {
  await fs.rm(scratchDir, { recursive: true, force: true });
});

function levelThreePool(store: MemoryArchiveStore, options: { useIdAsFilename?: boolean } = {}) {
  return new ArchivePool({
    store,
    locator: (id) => moduloCutShards(id, { baseLevel: 3 }),
    scratchDir,
    ...options,
  });
}

describe("incrementIdRecognizer", () => {
  it("reads the id from the basename", () => {
    expect(incrementIdRecognizer("images/0042.tar", "sub/1042.webp")).toBe(1042);
    expect(incrementIdRecognizer("images/0042.tar", "42")).toBe(42);
  });

  it("rejects names that are not integers", () => {
    expect(() => incrementIdRecognizer("a.tar", "cover.jpg")).toThrow(PathUnrecognizableError);
    expect(() => incrementIdRecognizer("a.tar", "12a.jpg")).toThrow(PathUnrecognizableError);
  });
});

describe("ArchivePool.resolve", () => {
  it("returns every member of the resource in its shard", async () => {
    const store = new MemoryArchiveStore({
      "images/0042.tar": { "42.webp": "img", "42.json": "{}", "1042.png": "other" },
    });
    const pool = levelThreePool(store);
    expect(await pool.resolve(42)).toEqual([
      { resourceId: 42, archive: "images/0042.tar", filename: "42.webp" },
      { resourceId: 42, archive: "images/0042.tar", filename: "42.json" },
    ]);
  });

  it("lists a shard once for concurrent and repeated lookups", async () => {
    const store = new MemoryArchiveStore({ "images/0042.tar": { "42.webp": "a", "1042.webp": "b" } }, {}, 15);
    const pool = levelThreePool(store);
    await Promise.all([pool.resolve(42), pool.resolve(42), pool.resolve(1042)]);
    await pool.resolve(42);
    expect(store.listCalls).toEqual(["images/0042.tar"]);
  });

  it("moves on when a candidate shard is missing", async () => {
    const store = new MemoryArchiveStore({ "images/1/0234.tar": { "1234.png": "x" } });
    const pool = new ArchivePool({ store, locator: (id) => moduloCutShards(id, { baseLevel: [3, 4] }) });
    expect(await pool.resolve(1234)).toEqual([{ resourceId: 1234, archive: "images/1/0234.tar", filename: "1234.png" }]);
    expect(store.listCalls).toEqual(["images/0234.tar", "images/1/0234.tar"]);
  });

  it("tries generated candidates after the deterministic ones", async () => {
    const store = new MemoryArchiveStore({
      "original/data-0042.tar": {},
      "updates/2024/data-2.tar": { "42.jpg": "x" },
    });
    const pool = new ArchivePool({
      store,
      locator: () => ["original/data-0042.tar"],
      candidateGenerators: [async () => ["original/data-0042.tar", "updates/2024/data-2.tar"]],
    });
    const [location] = await pool.resolve(42);
    expect(location.archive).toBe("updates/2024/data-2.tar");
    expect(store.listCalls).toEqual(["original/data-0042.tar", "updates/2024/data-2.tar"]);
  });

  it("throws ResourceNotFoundError when no shard holds the id", async () => {
    const store = new MemoryArchiveStore({ "images/0042.tar": { "1042.webp": "a" } });
    const pool = levelThreePool(store);
    await expect(pool.resolve(42)).rejects.toBeInstanceOf(ResourceNotFoundError);
    await expect(pool.resolve(7)).rejects.toBeInstanceOf(ResourceNotFoundError);
    await expect(pool.resolve("not-a-number")).rejects.toBeInstanceOf(ResourceNotFoundError);
  });
});

describe("ArchivePool.withResource", () => {
  it("hands over a directory with the files and removes it afterwards", async () => {
    const store = new MemoryArchiveStore({ "images/0042.tar": { "42.webp": "img", "42.json": '{"a":1}' } });
    const pool = levelThreePool(store);
    let seen = "";
    const names = await pool.withResource(42, { rating: "s" }, async ({ directory, metainfo }) => {
      seen = directory;
      expect(metainfo).toEqual({ rating: "s" });
      expect(await fs.readFile(path.join(directory, "42.webp"), "utf-8")).toBe("img");
      return (await fs.readdir(directory)).sort();
    });
    expect(names).toEqual(["42.json", "42.webp"]);
    expect(await exists(seen)).toBe(false);
  });

  it("removes the directory when the callback throws", async () => {
    const store = new MemoryArchiveStore({ "images/0042.tar": { "42.webp": "img" } });
    const pool = levelThreePool(store);
    let seen = "";
    await expect(
      pool.withResource(42, null, (handle) => {
        seen = handle.directory;
        throw new Error("consumer failed");
      }),
    ).rejects.toThrow("consumer failed");
    expect(seen).not.toBe("");
    expect(await exists(seen)).toBe(false);
  });

  it("leaves nothing behind when resolution or download fails", async () => {
    const store = new MemoryArchiveStore({ "images/0042.tar": { "42.webp": "img" } });
    store.failingMembers.add("42.webp");
    const pool = levelThreePool(store);
    await expect(pool.withResource(7, null, () => "never")).rejects.toBeInstanceOf(ResourceNotFoundError);
    await expect(pool.withResource(42, null, () => "never")).rejects.toThrow("connection reset");
    expect(await fs.readdir(scratchDir)).toEqual([]);
  });

  it("renames files after the id when asked to", () => {
    const pool = levelThreePool(new MemoryArchiveStore(), { useIdAsFilename: true });
    expect(pool.destinationName({ resourceId: 42, archive: "images/0042.tar", filename: "sub/Cover.PNG" })).toBe("42.png");
    const plain = levelThreePool(new MemoryArchiveStore());
    expect(plain.destinationName({ resourceId: 42, archive: "images/0042.tar", filename: "sub/Cover.PNG" })).toBe(
      "Cover.PNG",
    );
  });
});

describe("FallbackPool", () => {
  const stable = new MemoryArchiveStore({ "images/0001.tar": { "1.jpg": "stable" } });
  const newest = new MemoryArchiveStore({ "images/0002.tar": { "2.jpg": "newest" } });

  it("uses the first pool that has the resource", async () => {
    const pool = new FallbackPool([levelThreePool(stable), levelThreePool(newest)]);
    const read = (id: number) =>
      pool.withResource(id, null, ({ directory }) => fs.readFile(path.join(directory, `${id}.jpg`), "utf-8"));
    expect(await read(1)).toBe("stable");
    expect(await read(2)).toBe("newest");
    expect((await pool.resolve(2))[0].archive).toBe("images/0002.tar");
    await expect(read(3)).rejects.toBeInstanceOf(ResourceNotFoundError);
  });

  it("does not retry when the callback itself reports a missing resource", async () => {
    const second = new MemoryArchiveStore({ "images/0001.tar": { "1.jpg": "other" } });
    const pool = new FallbackPool([levelThreePool(stable), levelThreePool(second)]);
    await expect(
      pool.withResource(1, null, () => {
        throw new ResourceNotFoundError(1, "no usable image");
      }),
    ).rejects.toThrow("no usable image");
    expect(second.listCalls).toEqual([]);
  });
});

describe("tableRecognizer", () => {
  it("recognizes only listed members", () => {
    const recognize = tableRecognizer([{ resourceId: "a1", archive: "data/0001.tar", filename: "x/cat.png" }]);
    expect(recognize("./data/0001.tar", "./x/cat.png")).toBe("a1");
    expect(() => recognize("data/0001.tar", "x/dog.png")).toThrow(PathUnrecognizableError);
  });
});

describe("TablePool", () => {
  const table = [
    { id: "a1", archive: "data/0001.tar", file: "x/cat.png" },
    { id: 15, archive: "data/0001.tar", file: "x/dog.JPG" },
  ];

  it("locates resources through the table and loads it once", async () => {
    const store = new MemoryArchiveStore(
      { "data/0001.tar": { "x/cat.png": "meow", "x/dog.JPG": "woof", "x/bird.png": "tweet" } },
      { "table.json": JSON.stringify(table) },
    );
    const pool = new TablePool({ store, tableFile: "table.json", archiveColumn: "archive", fileColumn: "file", scratchDir });
    expect(await pool.resolve("a1")).toEqual([{ resourceId: "a1", archive: "data/0001.tar", filename: "x/cat.png" }]);
    expect(await pool.resolve("15")).toEqual([{ resourceId: 15, archive: "data/0001.tar", filename: "x/dog.JPG" }]);
    const names = await pool.withResource(15, null, ({ directory }) => fs.readdir(directory));
    expect(names).toEqual(["15.jpg"]);
    await expect(pool.resolve("zz")).rejects.toBeInstanceOf(ResourceNotFoundError);
    expect(store.listCalls).toEqual(["data/0001.tar"]);
  });

  it("reads JSON Lines tables", async () => {
    const store = new MemoryArchiveStore(
      { "data/0001.tar": { "x/cat.png": "meow" } },
      { "table.jsonl": `${JSON.stringify(table[0])}\n\n${JSON.stringify(table[1])}\n` },
    );
    const pool = new TablePool({ store, tableFile: "table.jsonl", archiveColumn: "archive", fileColumn: "file" });
    expect((await pool.resolve("a1"))[0].filename).toBe("x/cat.png");
  });
});
