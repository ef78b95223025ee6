import "dotenv/config";
import * as os from "os";
import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const envSchema = z.object({
  HF_TOKEN: optionalString,
  HF_ENDPOINT: z.preprocess(blankToUndefined, z.string().url().default("https://huggingface.co")),
  R2_ACCOUNT_ID: optionalString,
  R2_ACCESS_KEY_ID: optionalString,
  R2_SECRET_ACCESS_KEY: optionalString,
  R2_BUCKET_NAME: optionalString,
  TARSHARD_SCRATCH_DIR: optionalString,
  TARSHARD_LOCAL_ROOT: optionalString,
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  ),
});

export interface R2Config {
  accountId: string;
  accessKeyId: string;
  secretAccessKey: string;
  bucket: string;
}

export interface AppConfig {
  hfToken?: string;
  hfEndpoint: string;
  r2?: R2Config;
  scratchDir: string;
  localRoot?: string;
  logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  const e = parsed.data;

  let r2: R2Config | undefined;
  if (e.R2_ACCOUNT_ID && e.R2_ACCESS_KEY_ID && e.R2_SECRET_ACCESS_KEY && e.R2_BUCKET_NAME) {
    r2 = {
      accountId: e.R2_ACCOUNT_ID,
      accessKeyId: e.R2_ACCESS_KEY_ID,
      secretAccessKey: e.R2_SECRET_ACCESS_KEY,
      bucket: e.R2_BUCKET_NAME,
    };
  }

  return {
    hfToken: e.HF_TOKEN,
    hfEndpoint: e.HF_ENDPOINT.replace(/\/+$/, ""),
    r2,
    scratchDir: e.TARSHARD_SCRATCH_DIR ?? os.tmpdir(),
    localRoot: e.TARSHARD_LOCAL_ROOT,
    logLevel: e.LOG_LEVEL,
  };
}

export function isR2Configured(config: AppConfig): boolean {
  return !!config.r2;
}
