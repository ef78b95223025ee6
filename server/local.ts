import type { Dirent } from "fs";
import * as fs from "fs/promises";
import * as path from "path";
import { extract, list } from "tar";
import { ArchiveNotFoundError, ArchiveStoreError } from "@shared/errors";
import { type IArchiveStore, normalizeMemberPath } from "./storage";

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

/**
 * Archives kept in a directory tree on disk. No index files are needed: listings
 * come straight from the tar headers and members are extracted one at a time.
 */
export class LocalArchiveStore implements IArchiveStore {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  private archivePath(archive: string): string {
    const normalized = normalizeMemberPath(archive);
    if (normalized.split("/").includes("..")) {
      throw new ArchiveStoreError(`Archive path escapes the store root: ${archive}`);
    }
    return path.join(this.root, ...normalized.split("/"));
  }

  private async ensureArchive(archive: string): Promise<string> {
    const file = this.archivePath(archive);
    try {
      const stat = await fs.stat(file);
      if (!stat.isFile()) throw new ArchiveNotFoundError(archive);
    } catch (err: unknown) {
      if (isNotFound(err)) throw new ArchiveNotFoundError(archive, { cause: err });
      throw err;
    }
    return file;
  }

  async listArchiveFiles(archive: string): Promise<string[]> {
    const file = await this.ensureArchive(archive);
    const files: string[] = [];
    await list({
      file,
      onReadEntry: (entry) => {
        if (entry.type === "File" || entry.type === "OldFile" || entry.type === "ContiguousFile") {
          files.push(normalizeMemberPath(entry.path));
        }
      },
    });
    return files;
  }

  async downloadFile(archive: string, filename: string, localFile: string): Promise<number> {
    const file = await this.ensureArchive(archive);
    const wanted = normalizeMemberPath(filename);
    const targetDir = path.dirname(localFile);
    await fs.mkdir(targetDir, { recursive: true });

    const workDir = await fs.mkdtemp(path.join(targetDir, ".extract-"));
    try {
      let matched: string | undefined;
      await extract({
        file,
        cwd: workDir,
        filter: (entryPath) => {
          if (matched === undefined && normalizeMemberPath(entryPath) === wanted) {
            matched = entryPath;
            return true;
          }
          return false;
        },
      });
      if (matched === undefined) {
        throw new ArchiveStoreError(`File ${JSON.stringify(filename)} not found in archive ${JSON.stringify(archive)}.`, {
          status: 404,
        });
      }
      await fs.rename(path.join(workDir, wanted), localFile);
      const stat = await fs.stat(localFile);
      return stat.size;
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  }

  async listArchives(prefix: string): Promise<string[]> {
    const wanted = normalizeMemberPath(prefix);
    const results: string[] = [];
    const stack = [this.root];
    while (stack.length > 0) {
      const current = stack.pop();
      if (current === undefined) break;
      let entries: Dirent[];
      try {
        entries = await fs.readdir(current, { withFileTypes: true });
      } catch (err: unknown) {
        if (isNotFound(err)) continue;
        throw err;
      }
      for (const entry of entries) {
        const fullPath = path.join(current, entry.name);
        if (entry.isDirectory()) {
          stack.push(fullPath);
        } else if (entry.isFile() && entry.name.endsWith(".tar")) {
          const relative = path.relative(this.root, fullPath).split(path.sep).join("/");
          if (relative.startsWith(wanted)) results.push(relative);
        }
      }
    }
    return results.sort();
  }

  async readFile(file: string): Promise<Buffer> {
    try {
      return await fs.readFile(this.archivePath(file));
    } catch (err: unknown) {
      if (isNotFound(err)) throw new ArchiveNotFoundError(file, { cause: err });
      throw err;
    }
  }
}
