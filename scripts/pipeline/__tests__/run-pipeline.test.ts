import { describe, expect, it } from "vitest";
import { parseArgs, parseIdsFile } from "../run-pipeline";

describe("parseArgs", () => {
  it("reads the command, pool, ids and flags", () => {
    const options = parseArgs([
      "retrieve",
      "danbooru",
      "7000000",
      "abc",
      "--out",
      "data/out",
      "--workers",
      "4",
      "--max-count",
      "10",
      "--count-errors",
      "--retriever",
      "image-with-json",
      "--store",
      "local",
      "--silent",
    ]);
    expect(options).toEqual({
      command: "retrieve",
      pool: "danbooru",
      requests: [7000000, "abc"],
      outDir: "data/out",
      store: "local",
      workers: 4,
      maxCount: 10,
      countErrors: true,
      saveMetainfo: true,
      retriever: "image-with-json",
      silent: true,
    });
  });

  it("needs no pool to list presets", () => {
    expect(parseArgs(["presets"]).command).toBe("presets");
  });

  it("rejects bad input", () => {
    expect(() => parseArgs([])).toThrow("No command specified.");
    expect(() => parseArgs(["fetch"])).toThrow("Unknown command: fetch");
    expect(() => parseArgs(["resolve"])).toThrow("resolve needs a pool preset name.");
    expect(() => parseArgs(["download", "gelbooru", "1"])).toThrow("download needs --out DIR.");
    expect(() => parseArgs(["resolve", "gelbooru", "--workers", "0"])).toThrow(
      '--workers expects a positive integer, got "0"',
    );
    expect(() => parseArgs(["resolve", "gelbooru", "--out"])).toThrow("--out expects a value");
    expect(() => parseArgs(["resolve", "gelbooru", "--store", "ftp"])).toThrow("Unknown store: ftp");
    expect(() => parseArgs(["resolve", "gelbooru", "--bogus"])).toThrow("Unknown argument: --bogus");
  });

  it("turns off sidecars with --no-metainfo", () => {
    const options = parseArgs(["download", "gelbooru", "1", "--out", "x", "--no-metainfo", "--max-downloads", "5"]);
    expect(options.saveMetainfo).toBe(false);
    expect(options.maxDownloads).toBe(5);
  });

  it("validates the log level", () => {
    expect(parseArgs(["presets", "--log-level", "debug"]).logLevel).toBe("debug");
    expect(() => parseArgs(["presets", "--log-level", "loud"])).toThrow("Unknown log level: loud");
  });
});

describe("parseIdsFile", () => {
  it("reads one id per line and skips comments", () => {
    expect(parseIdsFile("# header\n12\n\n  0034 \nfoo-bar\r\n")).toEqual([12, 34, "foo-bar"]);
  });

  it("reads JSON lists of ids and [id, metainfo] pairs", () => {
    expect(parseIdsFile('[1, "2", ["x", {"a": 1}], [3, null]]')).toEqual([1, 2, ["x", { a: 1 }], [3, null]]);
  });

  it("rejects malformed JSON lists", () => {
    expect(() => parseIdsFile("[{}]")).toThrow("Invalid ID list");
  });
});
