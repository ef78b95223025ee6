import * as path from "path";
import { PathUnrecognizableError } from "../../shared/errors";
import type { ResourceId } from "../../shared/schema";
import type { IArchiveStore } from "../../server/storage";
import { debug } from "../../server/log";

/** Maps an archive member to the resource it belongs to, or throws {@link PathUnrecognizableError}. */
export type Recognizer = (archive: string, filename: string) => ResourceId;

export type ShardIndex = ReadonlyMap<ResourceId, readonly string[]>;

export function normalizeShardPath(archive: string): string {
  return path.posix.normalize(path.posix.join("/", archive));
}

/**
 * Per-shard `resource id → member paths` maps, built on first use and kept for
 * the lifetime of the cache. Concurrent requests for the same uncached shard
 * share a single listing; different shards never wait on each other.
 */
export class ShardIndexCache {
  private readonly ready = new Map<string, ShardIndex>();
  private readonly inflight = new Map<string, Promise<ShardIndex>>();

  constructor(
    private readonly store: IArchiveStore,
    private readonly recognizer: Recognizer,
  ) {}

  peek(archive: string): ShardIndex | undefined {
    return this.ready.get(normalizeShardPath(archive));
  }

  async get(archive: string, options: { force?: boolean } = {}): Promise<ShardIndex> {
    const key = normalizeShardPath(archive);
    if (!options.force) {
      const cached = this.ready.get(key);
      if (cached) return cached;
    }

    const pending = this.inflight.get(key);
    if (pending) return pending;

    // a listing dropped by `invalidate` still answers its callers but is not cached
    const build: Promise<ShardIndex> = this.build(archive).then(
      (index) => {
        if (this.inflight.get(key) === build) {
          this.ready.set(key, index);
          this.inflight.delete(key);
        }
        return index;
      },
      (err: unknown) => {
        if (this.inflight.get(key) === build) this.inflight.delete(key);
        throw err;
      },
    );
    this.inflight.set(key, build);
    return build;
  }

  invalidate(archive?: string): void {
    if (archive === undefined) {
      this.ready.clear();
      this.inflight.clear();
    } else {
      const key = normalizeShardPath(archive);
      this.ready.delete(key);
      this.inflight.delete(key);
    }
  }

  get size(): number {
    return this.ready.size;
  }

  private async build(archive: string): Promise<ShardIndex> {
    const files = await this.store.listArchiveFiles(archive);
    const index = new Map<ResourceId, string[]>();
    let skipped = 0;
    for (const file of files) {
      let resourceId: ResourceId;
      try {
        resourceId = this.recognizer(archive, file);
      } catch (err: unknown) {
        if (err instanceof PathUnrecognizableError) {
          skipped++;
          continue;
        }
        throw err;
      }
      const existing = index.get(resourceId);
      if (existing) {
        existing.push(file);
      } else {
        index.set(resourceId, [file]);
      }
    }
    debug(`Indexed ${archive}: ${index.size} resources, ${skipped} unrecognized files`, "shard-index");
    return index;
  }
}
