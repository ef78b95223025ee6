import "dotenv/config";
import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { errorMessage, formatId } from "../../shared/errors";
import type { ResourceRequest } from "../../shared/schema";
import { StoreClientCache, type StoreKind } from "../../server/clients";
import { loadConfig } from "../../server/config";
import { type LogLevel, formatBytes, isLogLevel, setLogLevel } from "../../server/log";
import { downloadToDirectory } from "./batch-downloader";
import { isResolvingPool } from "./data-pool";
import { Pipe } from "./pipe";
import { loadPresets, createPresetPool } from "./presets";
import {
  type ImageFile,
  RETRIEVER_KINDS,
  type RetrieverKind,
  createRetriever,
  isRetrieverKind,
} from "./retrievers";
import { canonicalId, resourceIdSchema } from "./table";

const __filename = fileURLToPath(import.meta.url);

const COMMANDS = ["resolve", "download", "retrieve", "presets"] as const;
type Command = (typeof COMMANDS)[number];

export interface CliOptions {
  command: Command;
  pool?: string;
  requests: ResourceRequest[];
  idsFile?: string;
  outDir?: string;
  store: StoreKind;
  workers?: number;
  maxDownloads?: number;
  maxCount?: number;
  countErrors: boolean;
  saveMetainfo: boolean;
  retriever: RetrieverKind;
  logLevel?: LogLevel;
  silent: boolean;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function isStoreKind(value: string): value is StoreKind {
  return value === "hf" || value === "r2" || value === "local";
}

function printUsage() {
  console.log(`
tarshard: fetch files out of sharded tar archives by resource ID

USAGE:
  npx tsx scripts/pipeline/run-pipeline.ts <command> [pool] [ids...] [options]

COMMANDS:
  presets          List the bundled pool presets
  resolve          Print the archive and member path(s) holding each ID
  download         Download every file of each ID into --out
  retrieve         Stream IDs through the pipeline and save the payloads into --out

OPTIONS:
  --out DIR              Destination directory (download, retrieve)
  --ids-file FILE        Read IDs from FILE: one per line, or a JSON array of IDs / [id, metainfo] pairs
  --store hf|r2|local    Archive store backend (default: hf)
  --workers N            Concurrent workers (default: 12)
  --max-downloads N      Soft cap on downloaded resources (download)
  --max-count N          Stop after N payloads (retrieve)
  --count-errors         Count failed IDs towards --max-count
  --retriever KIND       ${RETRIEVER_KINDS.join(" | ")} (default: image-only)
  --no-metainfo          Do not write metainfo sidecars (download)
  --log-level LEVEL      debug | info | warn | error | silent
  --silent               No progress output

EXAMPLES:
  npx tsx scripts/pipeline/run-pipeline.ts resolve danbooru 7000000 7000001
  npx tsx scripts/pipeline/run-pipeline.ts download gelbooru 1234567 --out data/gelbooru
  npx tsx scripts/pipeline/run-pipeline.ts retrieve nhentai-manga 12345 --retriever composite --out data/manga
`);
}

function parseCount(flag: string, value: string): number {
  const parsed = parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${flag} expects a positive integer, got ${JSON.stringify(value)}`);
  }
  return parsed;
}

function parseId(value: string) {
  return canonicalId(value);
}

const requestListSchema = z.array(z.union([resourceIdSchema, z.tuple([resourceIdSchema, z.unknown()])]));

/** One ID per line, or a JSON array of IDs and `[id, metainfo]` pairs. */
export function parseIdsFile(text: string): ResourceRequest[] {
  const trimmed = text.trim();
  if (trimmed.startsWith("[")) {
    const parsed = requestListSchema.safeParse(JSON.parse(trimmed));
    if (!parsed.success) {
      throw new Error(`Invalid ID list: ${parsed.error.issues[0]?.message}`);
    }
    return parsed.data.map(
      (request): ResourceRequest =>
        Array.isArray(request) ? [canonicalId(request[0]), request[1]] : canonicalId(request),
    );
  }
  return trimmed
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith("#"))
    .map(parseId);
}

export function parseArgs(args: string[]): CliOptions {
  const [first, ...rest] = args;
  if (!first || !isCommand(first)) {
    throw new Error(first ? `Unknown command: ${first}` : "No command specified.");
  }
  const options: CliOptions = {
    command: first,
    requests: [],
    store: "hf",
    countErrors: false,
    saveMetainfo: true,
    retriever: "image-only",
    silent: false,
  };

  let i = 0;
  while (i < rest.length) {
    const arg = rest[i++];
    const value = () => {
      const next = rest[i++];
      if (next === undefined) throw new Error(`${arg} expects a value`);
      return next;
    };

    if (arg === "--out") {
      options.outDir = value();
    } else if (arg === "--ids-file") {
      options.idsFile = value();
    } else if (arg === "--store") {
      const store = value();
      if (!isStoreKind(store)) throw new Error(`Unknown store: ${store}`);
      options.store = store;
    } else if (arg === "--workers") {
      options.workers = parseCount(arg, value());
    } else if (arg === "--max-downloads") {
      options.maxDownloads = parseCount(arg, value());
    } else if (arg === "--max-count") {
      options.maxCount = parseCount(arg, value());
    } else if (arg === "--count-errors") {
      options.countErrors = true;
    } else if (arg === "--retriever") {
      const kind = value();
      if (!isRetrieverKind(kind)) throw new Error(`Unknown retriever: ${kind}`);
      options.retriever = kind;
    } else if (arg === "--no-metainfo") {
      options.saveMetainfo = false;
    } else if (arg === "--log-level") {
      const level = value();
      if (!isLogLevel(level)) throw new Error(`Unknown log level: ${level}`);
      options.logLevel = level;
    } else if (arg === "--silent") {
      options.silent = true;
    } else if (arg.startsWith("--")) {
      throw new Error(`Unknown argument: ${arg}`);
    } else if (options.pool === undefined && options.command !== "presets") {
      options.pool = arg;
    } else {
      options.requests.push(parseId(arg));
    }
  }

  if (options.command !== "presets" && !options.pool) {
    throw new Error(`${options.command} needs a pool preset name.`);
  }
  if ((options.command === "download" || options.command === "retrieve") && !options.outDir) {
    throw new Error(`${options.command} needs --out DIR.`);
  }
  return options;
}

function extensionFor(image: ImageFile): string {
  return path.extname(image.filename).toLowerCase() || ".bin";
}

async function main() {
  const args = process.argv.slice(2);
  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    printUsage();
    return;
  }

  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (err: unknown) {
    console.error(errorMessage(err));
    printUsage();
    process.exitCode = 1;
    return;
  }

  if (options.command === "presets") {
    for (const [name, preset] of Object.entries(loadPresets())) {
      console.log(`  ${name.padEnd(30)} ${preset.type.padEnd(10)} ${preset.description ?? ""}`.trimEnd());
    }
    return;
  }

  if (options.idsFile) {
    options.requests.push(...parseIdsFile(fs.readFileSync(options.idsFile, "utf-8")));
  }
  if (options.requests.length === 0) {
    console.error("No resource IDs given.");
    process.exitCode = 1;
    return;
  }

  const config = loadConfig();
  setLogLevel(options.logLevel ?? config.logLevel);
  const stores = new StoreClientCache(config, options.store);
  const pool = createPresetPool(options.pool ?? "", { stores, scratchDir: config.scratchDir });
  const startTime = Date.now();

  try {
    switch (options.command) {
      case "resolve": {
        if (!isResolvingPool(pool)) {
          throw new Error(`Pool ${options.pool} does not support resolve.`);
        }
        for (const request of options.requests) {
          const resourceId = Array.isArray(request) ? request[0] : request;
          try {
            for (const location of await pool.resolve(resourceId)) {
              console.log(`${formatId(resourceId)}\t${location.archive}\t${location.filename}`);
            }
          } catch (err: unknown) {
            console.error(`${formatId(resourceId)}\t${errorMessage(err)}`);
          }
        }
        break;
      }

      case "download": {
        const outDir = path.resolve(options.outDir ?? ".");
        const result = await downloadToDirectory(pool, options.requests, outDir, {
          maxWorkers: options.workers,
          maxDownloads: options.maxDownloads,
          saveMetainfo: options.saveMetainfo,
          silent: options.silent,
        });
        console.log("\n=== Download Summary ===");
        console.log(`Requested:     ${result.total}`);
        console.log(`Downloaded:    ${result.downloaded} (${result.files} files)`);
        console.log(`Not found:     ${result.notFound}`);
        console.log(`Failed:        ${result.failed}`);
        console.log(`Skipped:       ${result.skipped}`);
        break;
      }

      case "retrieve": {
        const outDir = path.resolve(options.outDir ?? ".");
        fs.mkdirSync(outDir, { recursive: true });
        const pipe = new Pipe(pool, createRetriever({ kind: options.retriever }));
        const session = pipe.batchRetrieve(options.requests, {
          maxWorkers: options.workers,
          maxCount: options.maxCount,
          countErrors: options.countErrors,
          silent: options.silent,
        });

        let saved = 0;
        let totalBytes = 0;
        const write = (name: string, data: Buffer | string) => {
          fs.writeFileSync(path.join(outDir, name), data);
          totalBytes += Buffer.byteLength(data);
        };
        for await (const item of session) {
          const payload = item.data;
          if (Array.isArray(payload)) {
            payload.forEach((page) => write(path.basename(page.filename), page.data));
          } else if ("image" in payload) {
            write(`${item.id}${extensionFor(payload.image)}`, payload.image.data);
            if (payload.data !== null) write(`${item.id}.json`, JSON.stringify(payload.data, null, 2));
          } else {
            write(`${item.id}${extensionFor(payload)}`, payload.data);
          }
          saved++;
        }
        console.log("\n=== Retrieve Summary ===");
        console.log(`Saved:         ${saved} (${formatBytes(totalBytes)})`);
        console.log(`Errors:        ${session.errors.length}`);
        break;
      }
    }
  } finally {
    stores.clear();
  }

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log(`Time elapsed:  ${elapsed}s`);
}

if (process.argv[1]?.includes(path.basename(__filename))) {
  main().catch((error: unknown) => {
    console.error("Pipeline error:", error);
    process.exit(1);
  });
}
