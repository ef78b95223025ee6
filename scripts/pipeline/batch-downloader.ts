import * as fs from "fs/promises";
import * as path from "path";
import pLimit from "p-limit";
import { ResourceNotFoundError, errorMessage, formatId } from "../../shared/errors";
import { type ResourceRequest, splitRequest } from "../../shared/schema";
import { log, logError, warn } from "../../server/log";
import type { DataPool } from "./data-pool";

export interface BatchDownloadOptions {
  maxWorkers?: number;
  /** Soft cap: checked when an item starts, so running workers may overshoot it. */
  maxDownloads?: number;
  saveMetainfo?: boolean;
  /** Sidecar name; `{resource_id}` is replaced with the ID. */
  metainfoFormat?: string;
  silent?: boolean;
}

export interface BatchDownloadResult {
  total: number;
  downloaded: number;
  files: number;
  notFound: number;
  failed: number;
  skipped: number;
}

/** Recursively sorts object keys so sidecars are byte-stable across runs. */
export function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (value !== null && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    const entries: [string, unknown][] = Object.entries(value);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, child] of entries) {
      sorted[key] = sortKeysDeep(child);
    }
    return sorted;
  }
  return value;
}

export function formatMetainfo(metainfo: unknown): string {
  return JSON.stringify(sortKeysDeep(metainfo), null, 4);
}

/** Relative paths (forward slashes) of every regular file under `root`. */
export async function walkFiles(root: string): Promise<string[]> {
  const results: string[] = [];
  const visit = async (dir: string) => {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await visit(fullPath);
      } else if (entry.isFile()) {
        results.push(path.relative(root, fullPath).split(path.sep).join("/"));
      }
    }
  };
  await visit(root);
  return results.sort();
}

/**
 * Materializes every request and copies its files into `destDir`, keeping the
 * layout the pool produced. One bad resource never fails the batch: it is
 * logged and counted instead.
 */
export async function downloadToDirectory(
  pool: DataPool,
  requests: Iterable<ResourceRequest>,
  destDir: string,
  options: BatchDownloadOptions = {},
): Promise<BatchDownloadResult> {
  const maxWorkers = options.maxWorkers ?? 12;
  const saveMetainfo = options.saveMetainfo ?? true;
  const metainfoFormat = options.metainfoFormat ?? "{resource_id}_metainfo.json";
  const silent = options.silent ?? false;

  const items = Array.from(requests, splitRequest);
  const result: BatchDownloadResult = {
    total: items.length,
    downloaded: 0,
    files: 0,
    notFound: 0,
    failed: 0,
    skipped: 0,
  };

  await fs.mkdir(destDir, { recursive: true });
  const limit = pLimit(maxWorkers);
  let settled = 0;
  const startTime = Date.now();

  const tasks = items.map(([resourceId, metainfo]) =>
    limit(async () => {
      if (options.maxDownloads !== undefined && result.downloaded >= options.maxDownloads) {
        result.skipped++;
        return;
      }

      try {
        const copied = await pool.withResource(resourceId, metainfo, async (handle) => {
          const files = await walkFiles(handle.directory);
          for (const file of files) {
            const target = path.join(destDir, ...file.split("/"));
            await fs.mkdir(path.dirname(target), { recursive: true });
            await fs.copyFile(path.join(handle.directory, file), target);
          }
          return files.length;
        });

        if (copied === 0) {
          warn(`No files found for resource ${formatId(resourceId)}.`, "batch");
        }
        if (saveMetainfo && metainfo !== null && metainfo !== undefined) {
          const sidecar = path.join(destDir, metainfoFormat.split("{resource_id}").join(String(resourceId)));
          await fs.mkdir(path.dirname(sidecar), { recursive: true });
          await fs.writeFile(sidecar, formatMetainfo(metainfo));
        }
        result.downloaded++;
        result.files += copied;
      } catch (err: unknown) {
        if (err instanceof ResourceNotFoundError) {
          result.notFound++;
          warn(`Resource ${formatId(resourceId)} not found, skipped: ${errorMessage(err)}`, "batch");
        } else {
          result.failed++;
          logError(`Error occurred when downloading resource ${formatId(resourceId)}, skipped`, err, "batch");
        }
      } finally {
        settled++;
        if (!silent && settled % 10 === 0) {
          const elapsed = (Date.now() - startTime) / 1000;
          log(
            `Progress: ${settled}/${items.length} processed, ${result.downloaded} downloaded, ` +
              `${result.notFound} not found, ${result.failed} failed | ${(settled / elapsed).toFixed(1)} items/sec`,
            "batch",
          );
        }
      }
    }),
  );

  await Promise.all(tasks);

  if (!silent) {
    log(
      `Batch complete: ${result.downloaded}/${result.total} downloaded (${result.files} files), ` +
        `${result.notFound} not found, ${result.failed} failed, ${result.skipped} skipped`,
      "batch",
    );
  }
  return result;
}
