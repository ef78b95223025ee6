import * as fs from "fs/promises";
import * as path from "path";
import { z } from "zod";
import { ResourceNotFoundError, formatId } from "../../shared/errors";
import type { Metainfo, ResourceId } from "../../shared/schema";
import type { IArchiveStore } from "../../server/storage";
import { debug, warn } from "../../server/log";
import { downloadToDirectory } from "./batch-downloader";
import { type DataPool, type ResourceCallback, withScratchDirectory } from "./data-pool";
import { canonicalId, lazyTable, readColumn, resourceIdSchema } from "./table";

const childIdsSchema = z.array(resourceIdSchema);

/** Children may be stored as a real array or as a JSON-encoded string of one. */
function parseChildIds(value: unknown, source: string): ResourceId[] {
  const raw: unknown = typeof value === "string" ? JSON.parse(value) : value;
  const parsed = childIdsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid child list in ${source}: ${parsed.error.issues[0]?.message}`);
  }
  return parsed.data;
}

export function pageFilename(resourceId: ResourceId, page: number, ext: string): string {
  return `${resourceId}_p${page}${ext}`;
}

export interface CompositePoolOptions {
  childPool: DataPool;
  /** Store holding the map file. */
  store: IArchiveStore;
  mapFile: string;
  idColumn?: string;
  childrenColumn?: string;
  maxWorkers?: number;
  scratchDir?: string;
}

/**
 * A resource made of other resources, such as a gallery of page images. The
 * children are fetched from `childPool` and handed over as
 * `{id}_p1.jpg`, `{id}_p2.png`, ... in the order the map lists them.
 */
export class CompositePool implements DataPool {
  private readonly childPool: DataPool;
  private readonly maxWorkers: number;
  private readonly scratchDir?: string;
  private readonly children: () => Promise<Map<ResourceId, ResourceId[]>>;

  constructor(options: CompositePoolOptions) {
    this.childPool = options.childPool;
    this.maxWorkers = options.maxWorkers ?? 12;
    this.scratchDir = options.scratchDir;
    const idColumn = options.idColumn ?? "id";
    const childrenColumn = options.childrenColumn ?? "image_ids";
    this.children = lazyTable(options.store, options.mapFile, (rows) => {
      const map = new Map<ResourceId, ResourceId[]>();
      for (const row of rows) {
        const resourceId = canonicalId(readColumn(row, idColumn, resourceIdSchema, options.mapFile));
        map.set(resourceId, parseChildIds(row[childrenColumn], options.mapFile));
      }
      debug(`Loaded ${options.mapFile}: ${map.size} composite resources`, "composite-pool");
      return map;
    });
  }

  async childIds(resourceId: ResourceId): Promise<ResourceId[]> {
    const map = await this.children();
    const ids = map.get(canonicalId(resourceId));
    if (!ids) throw new ResourceNotFoundError(resourceId);
    return ids;
  }

  async withResource<R>(resourceId: ResourceId, metainfo: Metainfo, fn: ResourceCallback<R>): Promise<R> {
    const ids = await this.childIds(resourceId);
    return withScratchDirectory(this.scratchDir, async (directory) => {
      const origin = path.join(directory, "origin");
      const pages = path.join(directory, "pages");
      await fs.mkdir(pages, { recursive: true });

      await downloadToDirectory(this.childPool, ids, origin, {
        maxWorkers: this.maxWorkers,
        saveMetainfo: false,
        silent: true,
      });

      const byChild = new Map<ResourceId, string>();
      for (const name of await fs.readdir(origin)) {
        const ext = path.extname(name);
        byChild.set(canonicalId(ext ? name.slice(0, -ext.length) : name), name);
      }

      let found = 0;
      for (let i = 0; i < ids.length; i++) {
        const name = byChild.get(canonicalId(ids[i]));
        if (name === undefined) {
          warn(`Page ${i + 1} (${formatId(ids[i])}) of resource ${formatId(resourceId)} is missing.`, "composite-pool");
          continue;
        }
        await fs.rename(path.join(origin, name), path.join(pages, pageFilename(resourceId, i + 1, path.extname(name))));
        found++;
      }
      if (found === 0) {
        throw new ResourceNotFoundError(resourceId, `No pages of resource ${formatId(resourceId)} could be found.`);
      }
      return fn({ directory: pages, metainfo });
    });
  }
}
