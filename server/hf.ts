import * as fs from "fs/promises";
import * as path from "path";
import { z } from "zod";
import { ArchiveNotFoundError, ArchiveStoreError } from "@shared/errors";
import { tarIndexSchema, type TarIndex } from "@shared/schema";
import { debug } from "./log";
import { type IArchiveStore, TarIndexCache, indexPathFor, normalizeMemberPath } from "./storage";

export interface HfRepoOptions {
  repoId: string;
  revision?: string;
  /** Repository holding the `.json` tar indexes; defaults to `repoId`. */
  idxRepoId?: string;
  idxRevision?: string;
  repoType?: "dataset" | "model";
  token?: string;
  endpoint?: string;
  /** Transport hook; retries, proxies and rate limiting belong here. */
  fetchImpl?: typeof fetch;
}

const treeEntrySchema = z.object({
  type: z.string(),
  path: z.string(),
});

function encodePath(file: string): string {
  return file.split("/").map(encodeURIComponent).join("/");
}

function nextLink(header: string | null): string | undefined {
  if (!header) return undefined;
  const match = header.match(/<([^>]+)>\s*;\s*rel="next"/);
  return match ? match[1] : undefined;
}

/**
 * Archives hosted in a Hugging Face Hub repository. Every `x.tar` is paired with
 * an `x.json` index giving each member's byte offset, so single files are fetched
 * with HTTP range requests instead of downloading whole shards.
 */
export class HfArchiveStore implements IArchiveStore {
  readonly repoId: string;
  readonly revision: string;
  readonly idxRepoId: string;
  readonly idxRevision: string;
  private readonly repoType: "dataset" | "model";
  private readonly token?: string;
  private readonly endpoint: string;
  private readonly fetchImpl: typeof fetch;
  private readonly indexes: TarIndexCache;

  constructor(options: HfRepoOptions) {
    this.repoId = options.repoId;
    this.revision = options.revision ?? "main";
    this.idxRepoId = options.idxRepoId ?? options.repoId;
    this.idxRevision = options.idxRevision ?? (options.idxRepoId ? "main" : this.revision);
    this.repoType = options.repoType ?? "dataset";
    this.token = options.token;
    this.endpoint = (options.endpoint ?? "https://huggingface.co").replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.indexes = new TarIndexCache((archive) => this.fetchIndex(archive));
  }

  private get repoPrefix(): string {
    return this.repoType === "dataset" ? "datasets/" : "";
  }

  resolveUrl(repoId: string, revision: string, file: string): string {
    return `${this.endpoint}/${this.repoPrefix}${repoId}/resolve/${encodeURIComponent(revision)}/${encodePath(file)}`;
  }

  private headers(extra: Record<string, string> = {}): Record<string, string> {
    const headers: Record<string, string> = { ...extra };
    if (this.token) {
      headers["Authorization"] = `Bearer ${this.token}`;
    }
    return headers;
  }

  private async request(url: string, target: string, extraHeaders?: Record<string, string>): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { headers: this.headers(extraHeaders), redirect: "follow" });
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new ArchiveStoreError(`Request for ${target} failed: ${msg}`, { cause: err });
    }

    if (response.ok) return response;

    const errorCode = response.headers.get("x-error-code");
    if (
      response.status === 404 ||
      errorCode === "RepoNotFound" ||
      errorCode === "EntryNotFound" ||
      errorCode === "RevisionNotFound"
    ) {
      throw new ArchiveNotFoundError(target);
    }
    throw new ArchiveStoreError(`HTTP ${response.status} for ${target}`, { status: response.status });
  }

  private async fetchIndex(archive: string): Promise<TarIndex> {
    const indexFile = indexPathFor(archive);
    debug(`Fetching index ${indexFile} from ${this.idxRepoId}@${this.idxRevision}`, "hf");
    const response = await this.request(this.resolveUrl(this.idxRepoId, this.idxRevision, indexFile), archive);
    const parsed = tarIndexSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ArchiveStoreError(`Malformed index for ${archive}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async listArchiveFiles(archive: string): Promise<string[]> {
    const files = await this.indexes.get(archive);
    return [...files.keys()];
  }

  async downloadFile(archive: string, filename: string, localFile: string): Promise<number> {
    const { offset, size } = await this.indexes.locate(archive, filename);
    const target = `${archive}#${normalizeMemberPath(filename)}`;

    let data: Buffer;
    if (size === 0) {
      data = Buffer.alloc(0);
    } else {
      const response = await this.request(this.resolveUrl(this.repoId, this.revision, archive), target, {
        Range: `bytes=${offset}-${offset + size - 1}`,
      });
      const body = Buffer.from(await response.arrayBuffer());
      // a server that ignores Range sends the whole archive
      data = response.status === 206 ? body : body.subarray(offset, offset + size);
    }

    if (data.length !== size) {
      throw new ArchiveStoreError(`Size mismatch for ${target}: expected ${size} bytes, got ${data.length}`);
    }

    await fs.mkdir(path.dirname(localFile), { recursive: true });
    await fs.writeFile(localFile, data);
    return data.length;
  }

  async listArchives(prefix: string): Promise<string[]> {
    const dir = prefix.includes("/") ? prefix.slice(0, prefix.lastIndexOf("/")) : "";
    const results: string[] = [];
    let url: string | undefined =
      `${this.endpoint}/api/${this.repoPrefix}${this.repoId}/tree/${encodeURIComponent(this.revision)}` +
      `${dir ? `/${encodePath(dir)}` : ""}?recursive=true`;

    while (url) {
      const response: Response = await this.request(url, prefix || "/");
      const entries = z.array(treeEntrySchema).safeParse(await response.json());
      if (!entries.success) {
        throw new ArchiveStoreError(`Malformed tree listing for ${prefix}: ${entries.error.message}`);
      }
      for (const entry of entries.data) {
        if (entry.type === "file" && entry.path.startsWith(prefix) && entry.path.endsWith(".tar")) {
          results.push(entry.path);
        }
      }
      url = nextLink(response.headers.get("link"));
    }
    return results;
  }

  async readFile(file: string): Promise<Buffer> {
    const response = await this.request(this.resolveUrl(this.repoId, this.revision, file), file);
    return Buffer.from(await response.arrayBuffer());
  }
}
