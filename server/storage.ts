import * as path from "path";
import { ArchiveStoreError } from "@shared/errors";
import type { TarIndex } from "@shared/schema";

/**
 * Remote (or local) home of the sharded tar archives.
 *
 * Implementations must raise `ArchiveNotFoundError` when the archive or
 * the repository holding it does not exist, so resolvers can move on to the
 * next candidate shard. Every other failure propagates unchanged.
 */
export interface IArchiveStore {
  /** Paths of every file inside `archive`, normalized without a leading `./`. */
  listArchiveFiles(archive: string): Promise<string[]>;

  /** Writes one archive member to `localFile`; returns the number of bytes written. */
  downloadFile(archive: string, filename: string, localFile: string): Promise<number>;

  /** Every `.tar` archive whose path starts with `prefix`. */
  listArchives(prefix: string): Promise<string[]>;

  /** Reads a plain (non-archived) file stored next to the archives. */
  readFile(file: string): Promise<Buffer>;
}

export function normalizeMemberPath(filename: string): string {
  if (!filename) return "";
  const normalized = path.posix.normalize(filename.replace(/\\/g, "/"));
  return normalized === "." ? "" : normalized.replace(/^(\.\/)+/, "").replace(/^\/+/, "");
}

/** `images/1/0234.tar` → `images/1/0234.json` */
export function indexPathFor(archive: string): string {
  const ext = path.posix.extname(archive);
  return `${ext ? archive.slice(0, -ext.length) : archive}.json`;
}

/**
 * Index-backed stores (Hugging Face, R2) share this lookup: the index is fetched
 * once per archive and member paths are matched after normalization.
 */
export class TarIndexCache {
  private readonly indexes = new Map<string, Promise<Map<string, { offset: number; size: number }>>>();

  constructor(private readonly fetchIndex: (archive: string) => Promise<TarIndex>) {}

  get(archive: string): Promise<Map<string, { offset: number; size: number }>> {
    const key = path.posix.normalize(`/${archive}`);
    let pending = this.indexes.get(key);
    if (!pending) {
      pending = this.fetchIndex(archive).then((index) => {
        const files = new Map<string, { offset: number; size: number }>();
        for (const [name, entry] of Object.entries(index.files)) {
          files.set(normalizeMemberPath(name), { offset: entry.offset, size: entry.size });
        }
        return files;
      });
      // failed lookups are retried on the next call
      pending.catch(() => {
        if (this.indexes.get(key) === pending) this.indexes.delete(key);
      });
      this.indexes.set(key, pending);
    }
    return pending;
  }

  async locate(archive: string, filename: string): Promise<{ offset: number; size: number }> {
    const files = await this.get(archive);
    const entry = files.get(normalizeMemberPath(filename));
    if (!entry) {
      throw new ArchiveStoreError(`File ${JSON.stringify(filename)} not found in archive ${JSON.stringify(archive)}.`, {
        status: 404,
      });
    }
    return entry;
  }

  clear(): void {
    this.indexes.clear();
  }
}
