import * as fs from "fs/promises";
import * as path from "path";
import { GetObjectCommand, ListObjectsV2Command, S3Client } from "@aws-sdk/client-s3";
import { ArchiveNotFoundError, ArchiveStoreError } from "@shared/errors";
import { tarIndexSchema, type TarIndex } from "@shared/schema";
import type { R2Config } from "./config";
import { debug } from "./log";
import { type IArchiveStore, TarIndexCache, indexPathFor, normalizeMemberPath } from "./storage";

export interface R2StoreOptions {
  client: S3Client;
  bucket: string;
  /** Key prefix under which the repository is mirrored, e.g. `gelbooru_full/`. */
  keyPrefix?: string;
}

export function createR2Client(config: R2Config): S3Client {
  return new S3Client({
    region: "auto",
    endpoint: `https://${config.accountId}.r2.cloudflarestorage.com`,
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
  });
}

export function buildObjectKey(keyPrefix: string, file: string): string {
  const prefix = keyPrefix && !keyPrefix.endsWith("/") ? `${keyPrefix}/` : keyPrefix;
  const key = `${prefix}${normalizeMemberPath(file)}`;
  if (key.split("/").includes("..") || key.length > 1024) {
    throw new Error(`Invalid R2 key: ${key}`);
  }
  return key;
}

export function isMissingObjectError(err: unknown): boolean {
  if (typeof err !== "object" || err === null) return false;
  const name = "name" in err ? err.name : undefined;
  if (name === "NoSuchKey" || name === "NotFound" || name === "NoSuchBucket") return true;
  const metadata = "$metadata" in err ? err.$metadata : undefined;
  return (
    typeof metadata === "object" &&
    metadata !== null &&
    "httpStatusCode" in metadata &&
    metadata.httpStatusCode === 404
  );
}

/**
 * Archives mirrored into an S3-compatible bucket (Cloudflare R2) with the same
 * `x.tar` + `x.json` layout as the Hub; members are read with ranged GETs.
 */
export class R2ArchiveStore implements IArchiveStore {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly keyPrefix: string;
  private readonly indexes: TarIndexCache;

  constructor(options: R2StoreOptions) {
    this.client = options.client;
    this.bucket = options.bucket;
    this.keyPrefix = options.keyPrefix ?? "";
    this.indexes = new TarIndexCache((archive) => this.fetchIndex(archive));
  }

  private async getObject(file: string, target: string, range?: string): Promise<Uint8Array> {
    try {
      const resp = await this.client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: buildObjectKey(this.keyPrefix, file), Range: range }),
      );
      if (!resp.Body) {
        throw new ArchiveStoreError(`Empty response body for ${target}`);
      }
      return await resp.Body.transformToByteArray();
    } catch (err: unknown) {
      if (isMissingObjectError(err)) {
        throw new ArchiveNotFoundError(target, { cause: err });
      }
      throw err;
    }
  }

  private async fetchIndex(archive: string): Promise<TarIndex> {
    const indexFile = indexPathFor(archive);
    debug(`Fetching index ${indexFile} from bucket ${this.bucket}`, "r2");
    const raw = await this.getObject(indexFile, archive);
    const parsed = tarIndexSchema.safeParse(JSON.parse(Buffer.from(raw).toString("utf-8")));
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
    const data = size === 0 ? new Uint8Array(0) : await this.getObject(archive, target, `bytes=${offset}-${offset + size - 1}`);
    if (data.length !== size) {
      throw new ArchiveStoreError(`Size mismatch for ${target}: expected ${size} bytes, got ${data.length}`);
    }
    await fs.mkdir(path.dirname(localFile), { recursive: true });
    await fs.writeFile(localFile, data);
    return data.length;
  }

  async listArchives(prefix: string): Promise<string[]> {
    const fullPrefix = buildObjectKey(this.keyPrefix, prefix);
    const strip = fullPrefix.length - normalizeMemberPath(prefix).length;
    const results: string[] = [];
    let token: string | undefined;
    do {
      const resp = await this.client.send(
        new ListObjectsV2Command({ Bucket: this.bucket, Prefix: fullPrefix, ContinuationToken: token }),
      );
      for (const object of resp.Contents ?? []) {
        if (object.Key && object.Key.endsWith(".tar")) {
          results.push(object.Key.slice(strip));
        }
      }
      token = resp.IsTruncated ? resp.NextContinuationToken : undefined;
    } while (token);
    return results;
  }

  async readFile(file: string): Promise<Buffer> {
    return Buffer.from(await this.getObject(file, file));
  }
}
