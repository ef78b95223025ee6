import type { ResourceId } from "./schema";

/** Resource was found but its files do not match what the consumer expects. */
export class InvalidResourceDataError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InvalidResourceDataError";
  }
}

/** No candidate archive contains the resource. Expected and never fatal in batch work. */
export class ResourceNotFoundError extends InvalidResourceDataError {
  readonly resourceId: ResourceId;

  constructor(resourceId: ResourceId, message = `Resource ${formatId(resourceId)} not found.`) {
    super(message);
    this.name = "ResourceNotFoundError";
    this.resourceId = resourceId;
  }
}

/** Raised by recognizers for archive entries that do not encode a resource ID. */
export class PathUnrecognizableError extends Error {
  constructor(archive: string, filename: string) {
    super(`File ${JSON.stringify(filename)} in archive ${JSON.stringify(archive)} is unrecognizable.`);
    this.name = "PathUnrecognizableError";
  }
}

/** The archive (or the repository holding it) does not exist in the store. */
export class ArchiveNotFoundError extends Error {
  readonly archive: string;

  constructor(archive: string, options?: { cause?: unknown }) {
    super(`Archive ${JSON.stringify(archive)} not found.`, options);
    this.name = "ArchiveNotFoundError";
    this.archive = archive;
  }
}

export class ArchiveStoreError extends Error {
  readonly status?: number;

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "ArchiveStoreError";
    this.status = options?.status;
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function formatId(resourceId: ResourceId): string {
  return typeof resourceId === "string" ? JSON.stringify(resourceId) : String(resourceId);
}
