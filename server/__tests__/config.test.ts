import * as os from "os";
import { describe, expect, it } from "vitest";
import { isR2Configured, loadConfig } from "../config";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});
    expect(config).toEqual({
      hfToken: undefined,
      hfEndpoint: "https://huggingface.co",
      r2: undefined,
      scratchDir: os.tmpdir(),
      localRoot: undefined,
      logLevel: "info",
    });
    expect(isR2Configured(config)).toBe(false);
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ HF_TOKEN: "  ", HF_ENDPOINT: "", LOG_LEVEL: "" });
    expect(config.hfToken).toBeUndefined();
    expect(config.hfEndpoint).toBe("https://huggingface.co");
    expect(config.logLevel).toBe("info");
  });

  it("enables R2 only when every credential is present", () => {
    const partial = loadConfig({ R2_ACCOUNT_ID: "acct", R2_BUCKET_NAME: "bucket" });
    expect(isR2Configured(partial)).toBe(false);

    const full = loadConfig({
      R2_ACCOUNT_ID: "acct",
      R2_ACCESS_KEY_ID: "test-key",
      R2_SECRET_ACCESS_KEY: "test-secret",
      R2_BUCKET_NAME: "bucket",
      HF_ENDPOINT: "https://mirror.test/",
      TARSHARD_SCRATCH_DIR: "/tmp/scratch",
    });
    expect(full.r2).toEqual({
      accountId: "acct",
      accessKeyId: "test-key",
      secretAccessKey: "test-secret",
      bucket: "bucket",
    });
    expect(full.hfEndpoint).toBe("https://mirror.test");
    expect(full.scratchDir).toBe("/tmp/scratch");
  });

  it("rejects malformed values", () => {
    expect(() => loadConfig({ HF_ENDPOINT: "not a url" })).toThrow("Invalid environment configuration: HF_ENDPOINT");
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow("LOG_LEVEL");
  });
});
