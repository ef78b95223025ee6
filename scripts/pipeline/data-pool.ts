import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { z } from "zod";
import {
  ArchiveNotFoundError,
  PathUnrecognizableError,
  ResourceNotFoundError,
  formatId,
} from "../../shared/errors";
import type { DataLocation, Metainfo, ResourceId } from "../../shared/schema";
import { type IArchiveStore, normalizeMemberPath } from "../../server/storage";
import { debug } from "../../server/log";
import type { CandidateGenerator, Locator } from "./locator";
import { type Recognizer, type ShardIndex, ShardIndexCache, normalizeShardPath } from "./shard-index";
import { canonicalId, lazyTable, readColumn, resourceIdSchema } from "./table";

export interface ResourceHandle {
  /** Scratch directory holding the resource's files; deleted when the callback settles. */
  directory: string;
  metainfo: Metainfo;
}

export type ResourceCallback<R> = (handle: ResourceHandle) => Promise<R> | R;

export interface DataPool {
  /**
   * Downloads every file of `resourceId` into a fresh scratch directory, runs
   * `fn` on it and removes the directory afterwards, whatever the outcome.
   */
  withResource<R>(resourceId: ResourceId, metainfo: Metainfo, fn: ResourceCallback<R>): Promise<R>;
}

export interface ResolvingPool extends DataPool {
  resolve(resourceId: ResourceId): Promise<DataLocation[]>;
}

// --- Recognizers ---

/** Member basename without extension must be a non-negative integer: `images/7/1234567.webp` → 1234567. */
export const incrementIdRecognizer: Recognizer = (archive, filename) => {
  const base = path.posix.basename(filename);
  const ext = path.posix.extname(base);
  const body = ext ? base.slice(0, -ext.length) : base;
  if (!/^\d+$/.test(body)) {
    throw new PathUnrecognizableError(archive, filename);
  }
  const id = Number(body);
  if (!Number.isSafeInteger(id)) {
    throw new PathUnrecognizableError(archive, filename);
  }
  return id;
};

// --- Scratch directories ---

export async function withScratchDirectory<R>(
  scratchRoot: string | undefined,
  fn: (directory: string) => Promise<R>,
): Promise<R> {
  const root = scratchRoot ?? os.tmpdir();
  await fs.mkdir(root, { recursive: true });
  const directory = await fs.mkdtemp(path.join(root, "tarshard-"));
  try {
    return await fn(directory);
  } finally {
    await fs.rm(directory, { recursive: true, force: true });
  }
}

// --- Archive pool ---

export interface ArchivePoolOptions {
  store: IArchiveStore;
  locator: Locator;
  candidateGenerators?: CandidateGenerator[];
  recognizer?: Recognizer;
  /** Name downloaded files `${resourceId}${ext}` instead of keeping the member basename. */
  useIdAsFilename?: boolean;
  /** Parent directory for scratch directories; defaults to the OS temp dir. */
  scratchDir?: string;
}

export class ArchivePool implements ResolvingPool {
  readonly store: IArchiveStore;
  readonly shardIndex: ShardIndexCache;
  private readonly locator: Locator;
  private readonly candidateGenerators: CandidateGenerator[];
  private readonly useIdAsFilename: boolean;
  private readonly scratchDir?: string;

  constructor(options: ArchivePoolOptions) {
    this.store = options.store;
    this.locator = options.locator;
    this.candidateGenerators = options.candidateGenerators ?? [];
    this.shardIndex = new ShardIndexCache(options.store, options.recognizer ?? incrementIdRecognizer);
    this.useIdAsFilename = options.useIdAsFilename ?? false;
    this.scratchDir = options.scratchDir;
  }

  /** Shard lookup for one candidate; `null` when the shard is missing or lacks the resource. */
  private async lookup(resourceId: ResourceId, archive: string): Promise<DataLocation[] | null> {
    let index: ShardIndex;
    try {
      index = await this.shardIndex.get(archive);
    } catch (err: unknown) {
      if (err instanceof ArchiveNotFoundError) {
        debug(`Shard ${archive} does not exist, skipped`, "resolver");
        return null;
      }
      throw err;
    }
    const files = index.get(resourceId);
    if (!files || files.length === 0) return null;
    return files.map((filename) => ({ resourceId, archive, filename }));
  }

  async resolve(resourceId: ResourceId): Promise<DataLocation[]> {
    const tried = new Set<string>();
    const attempt = async (archives: string[]) => {
      for (const archive of archives) {
        if (tried.has(archive)) continue;
        tried.add(archive);
        const found = await this.lookup(resourceId, archive);
        if (found) return found;
      }
      return null;
    };

    const direct = await attempt(this.locator(resourceId));
    if (direct) return direct;

    for (const generate of this.candidateGenerators) {
      const found = await attempt(await generate(resourceId));
      if (found) return found;
    }
    throw new ResourceNotFoundError(resourceId);
  }

  destinationName(location: DataLocation): string {
    const base = path.posix.basename(location.filename);
    if (this.useIdAsFilename) {
      return `${location.resourceId}${path.posix.extname(base).toLowerCase()}`;
    }
    return base;
  }

  async withResource<R>(resourceId: ResourceId, metainfo: Metainfo, fn: ResourceCallback<R>): Promise<R> {
    return withScratchDirectory(this.scratchDir, async (directory) => {
      const locations = await this.resolve(resourceId);
      for (const location of locations) {
        const target = path.join(directory, this.destinationName(location));
        await this.store.downloadFile(location.archive, location.filename, target);
      }
      debug(`Materialized ${formatId(resourceId)} (${locations.length} file(s))`, "materializer");
      return fn({ directory, metainfo });
    });
  }
}

// --- Fallback chain ---

/**
 * Tries each pool in turn; the first one that has the resource wins. Used for
 * datasets split into a frozen snapshot plus a rolling "newest" repository.
 */
export class FallbackPool implements ResolvingPool {
  constructor(readonly pools: readonly ResolvingPool[]) {}

  async resolve(resourceId: ResourceId): Promise<DataLocation[]> {
    for (const pool of this.pools) {
      try {
        return await pool.resolve(resourceId);
      } catch (err: unknown) {
        if (!(err instanceof ResourceNotFoundError)) throw err;
      }
    }
    throw new ResourceNotFoundError(resourceId);
  }

  async withResource<R>(resourceId: ResourceId, metainfo: Metainfo, fn: ResourceCallback<R>): Promise<R> {
    for (const pool of this.pools) {
      let entered = false;
      try {
        return await pool.withResource(resourceId, metainfo, (handle) => {
          entered = true;
          return fn(handle);
        });
      } catch (err: unknown) {
        // a not-found raised by the callback itself belongs to the caller
        if (entered || !(err instanceof ResourceNotFoundError)) throw err;
      }
    }
    throw new ResourceNotFoundError(resourceId);
  }
}

// --- Table-driven layouts ---

function tableKey(archive: string, filename: string): string {
  return `${normalizeShardPath(archive)}\u0000${normalizeMemberPath(filename)}`;
}

/** Recognizes exactly the `(archive, file)` pairs listed in `entries`. */
export function tableRecognizer(entries: Iterable<DataLocation>): Recognizer {
  const lookup = new Map<string, ResourceId>();
  for (const entry of entries) {
    lookup.set(tableKey(entry.archive, entry.filename), entry.resourceId);
  }
  return (archive, filename) => {
    const resourceId = lookup.get(tableKey(archive, filename));
    if (resourceId === undefined) {
      throw new PathUnrecognizableError(archive, filename);
    }
    return resourceId;
  };
}

export interface TablePoolOptions {
  store: IArchiveStore;
  /** JSON or JSONL file in the store with one row per archived file. */
  tableFile: string;
  idColumn?: string;
  archiveColumn: string;
  fileColumn: string;
  useIdAsFilename?: boolean;
  scratchDir?: string;
}

/**
 * For datasets whose file names carry no ID: a table maps every resource to
 * its shard and member path. The table is read once, on first use.
 */
export class TablePool implements ResolvingPool {
  private readonly inner: () => Promise<ArchivePool>;

  constructor(options: TablePoolOptions) {
    const idColumn = options.idColumn ?? "id";
    this.inner = lazyTable(options.store, options.tableFile, (rows) => {
      const shards = new Map<ResourceId, string[]>();
      const entries: DataLocation[] = [];
      for (const row of rows) {
        const resourceId = canonicalId(readColumn(row, idColumn, resourceIdSchema, options.tableFile));
        const archive = readColumn(row, options.archiveColumn, z.string().min(1), options.tableFile);
        const filename = readColumn(row, options.fileColumn, z.string().min(1), options.tableFile);
        entries.push({ resourceId, archive, filename });
        const known = shards.get(resourceId);
        if (!known) {
          shards.set(resourceId, [archive]);
        } else if (!known.includes(archive)) {
          known.push(archive);
        }
      }
      debug(`Loaded ${options.tableFile}: ${entries.length} rows, ${shards.size} resources`, "table-pool");
      return new ArchivePool({
        store: options.store,
        locator: (resourceId) => shards.get(canonicalId(resourceId)) ?? [],
        recognizer: tableRecognizer(entries),
        useIdAsFilename: options.useIdAsFilename ?? true,
        scratchDir: options.scratchDir,
      });
    });
  }

  async resolve(resourceId: ResourceId): Promise<DataLocation[]> {
    const pool = await this.inner();
    return pool.resolve(canonicalId(resourceId));
  }

  async withResource<R>(resourceId: ResourceId, metainfo: Metainfo, fn: ResourceCallback<R>): Promise<R> {
    const pool = await this.inner();
    return pool.withResource(canonicalId(resourceId), metainfo, fn);
  }
}

export function isResolvingPool(pool: DataPool): pool is ResolvingPool {
  return pool instanceof ArchivePool || pool instanceof FallbackPool || pool instanceof TablePool;
}
