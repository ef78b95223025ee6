import { describe, expect, it } from "vitest";
import { StoreClientCache } from "../../../server/clients";
import { loadConfig } from "../../../server/config";
import { CompositePool } from "../composite-pool";
import { ArchivePool, FallbackPool, TablePool } from "../data-pool";
import { createPresetPool, loadPresets, parsePresets } from "../presets";

function context(presets?: ReturnType<typeof parsePresets>) {
  return { stores: new StoreClientCache(loadConfig({})), presets };
}

describe("bundled presets", () => {
  const presets = loadPresets();

  it("parse and resolve every reference", () => {
    expect(Object.keys(presets)).toContain("danbooru");
    for (const name of Object.keys(presets)) {
      expect(() => createPresetPool(name, context())).not.toThrow();
    }
  });

  it("build the pool type each preset describes", () => {
    expect(createPresetPool("gelbooru", context())).toBeInstanceOf(ArchivePool);
    expect(createPresetPool("danbooru-newest", context())).toBeInstanceOf(FallbackPool);
    expect(createPresetPool("nhentai-manga", context())).toBeInstanceOf(CompositePool);
  });

  it("fill in defaults", () => {
    const gelbooru = presets["gelbooru"];
    expect(gelbooru.type === "archive" && gelbooru.revision).toBe("main");
    expect(gelbooru.type === "archive" && gelbooru.useIdAsFilename).toBe(false);
  });
});

describe("createPresetPool", () => {
  it("shares one store between pools of the same repository", () => {
    const presets = parsePresets({
      a: { type: "archive", repoId: "org/data", locator: { type: "modulo-cut" } },
      b: { type: "archive", repoId: "org/data", locator: { type: "modulo-cut", baseLevel: 4 } },
      both: { type: "fallback", pools: ["a", "b"] },
    });
    const stores = new StoreClientCache(loadConfig({}));
    const a = createPresetPool("a", { stores, presets });
    const b = createPresetPool("b", { stores, presets });
    expect(a instanceof ArchivePool && b instanceof ArchivePool && a.store === b.store).toBe(true);
  });

  it("builds table pools", () => {
    const presets = parsePresets({
      t: { type: "table", repoId: "org/table", tableFile: "table.jsonl", archiveColumn: "archive", fileColumn: "file" },
    });
    expect(createPresetPool("t", context(presets))).toBeInstanceOf(TablePool);
  });

  it("rejects unknown names and cycles", () => {
    const presets = parsePresets({
      a: { type: "fallback", pools: ["b"] },
      b: { type: "fallback", pools: ["a"] },
    });
    expect(() => createPresetPool("missing", context(presets))).toThrow('Unknown pool preset "missing"');
    expect(() => createPresetPool("a", context(presets))).toThrow("Preset cycle: a -> b -> a");
  });

  it("refuses composite pools inside fallback chains", () => {
    const presets = parsePresets({
      images: { type: "archive", repoId: "org/images", locator: { type: "modulo-cut" } },
      manga: { type: "composite", childPool: "images", repoId: "org/images", mapFile: "posts.jsonl" },
      chain: { type: "fallback", pools: ["manga"] },
    });
    expect(() => createPresetPool("chain", context(presets))).toThrow('Pool "manga" cannot be part of a fallback chain');
  });
});

describe("parsePresets", () => {
  it("rejects references to missing pools", () => {
    expect(() => parsePresets({ chain: { type: "fallback", pools: ["nowhere"] } })).toThrow(
      'Preset "chain" refers to unknown pool "nowhere"',
    );
  });

  it("rejects malformed presets", () => {
    expect(() => parsePresets({ broken: { type: "archive" } })).toThrow("Invalid presets at broken");
  });
});
