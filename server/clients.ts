import * as path from "path";
import type { S3Client } from "@aws-sdk/client-s3";
import type { AppConfig, R2Config } from "./config";
import { HfArchiveStore } from "./hf";
import { LocalArchiveStore } from "./local";
import { R2ArchiveStore, createR2Client } from "./r2";
import type { IArchiveStore } from "./storage";

export type StoreKind = "hf" | "r2" | "local";

export interface RepositoryRef {
  repoId: string;
  revision: string;
  idxRepoId?: string;
  idxRevision?: string;
}

/**
 * Owns every remote client and store created by the application. One instance
 * lives at the composition root; stores are shared by every pool asking for
 * the same repository, so their index caches are shared too.
 */
export class StoreClientCache {
  private s3Client: S3Client | null = null;
  private readonly stores = new Map<string, IArchiveStore>();

  constructor(
    private readonly config: AppConfig,
    private readonly kind: StoreKind = "hf",
    private readonly fetchImpl?: typeof fetch,
  ) {}

  private requireR2(): R2Config {
    if (!this.config.r2) {
      throw new Error(
        "R2 is not configured. Set R2_ACCOUNT_ID, R2_ACCESS_KEY_ID, R2_SECRET_ACCESS_KEY, R2_BUCKET_NAME.",
      );
    }
    return this.config.r2;
  }

  private getS3Client(): S3Client {
    if (!this.s3Client) {
      this.s3Client = createR2Client(this.requireR2());
    }
    return this.s3Client;
  }

  storeFor(repo: RepositoryRef): IArchiveStore {
    const key = [this.kind, repo.repoId, repo.revision, repo.idxRepoId ?? "", repo.idxRevision ?? ""].join("\u0000");
    const existing = this.stores.get(key);
    if (existing) return existing;

    let store: IArchiveStore;
    switch (this.kind) {
      case "hf":
        store = new HfArchiveStore({
          repoId: repo.repoId,
          revision: repo.revision,
          idxRepoId: repo.idxRepoId,
          idxRevision: repo.idxRevision,
          token: this.config.hfToken,
          endpoint: this.config.hfEndpoint,
          fetchImpl: this.fetchImpl,
        });
        break;
      case "r2": {
        store = new R2ArchiveStore({
          client: this.getS3Client(),
          bucket: this.requireR2().bucket,
          keyPrefix: `${repo.repoId}/`,
        });
        break;
      }
      case "local": {
        if (!this.config.localRoot) {
          throw new Error("Local store requested but TARSHARD_LOCAL_ROOT is not set.");
        }
        store = new LocalArchiveStore(path.join(this.config.localRoot, ...repo.repoId.split("/")));
        break;
      }
    }
    this.stores.set(key, store);
    return store;
  }

  clear(): void {
    this.stores.clear();
    this.s3Client?.destroy();
    this.s3Client = null;
  }
}
