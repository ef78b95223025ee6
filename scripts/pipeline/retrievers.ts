import * as fs from "fs/promises";
import * as path from "path";
import mime from "mime-types";
import { InvalidResourceDataError, ResourceNotFoundError, formatId } from "../../shared/errors";
import type { ResourceId } from "../../shared/schema";
import { warn } from "../../server/log";
import { walkFiles } from "./batch-downloader";
import type { ResourceHandle } from "./data-pool";
import type { Retriever } from "./pipe";

export interface ImageFile {
  filename: string;
  mimeType: string;
  data: Buffer;
}

export interface ImageWithData {
  image: ImageFile;
  /** Parsed JSON sidecar, or null when the resource has none. */
  data: unknown;
}

// extensions the mime database does not know
const EXTRA_TYPES: Record<string, string> = {
  jfif: "image/jpeg",
  npy: "application/octet-stream",
  npz: "application/octet-stream",
};

// --- Magic byte signatures, used when the extension says nothing ---

const IMAGE_SIGNATURES: { offset: number; bytes: number[]; mime: string }[] = [
  { offset: 0, bytes: [0xff, 0xd8, 0xff], mime: "image/jpeg" },
  { offset: 0, bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a], mime: "image/png" },
  { offset: 0, bytes: [0x47, 0x49, 0x46, 0x38], mime: "image/gif" },
  { offset: 8, bytes: [0x57, 0x45, 0x42, 0x50], mime: "image/webp" },
  { offset: 0, bytes: [0x42, 0x4d], mime: "image/bmp" },
];

/** MIME type from the extension, or null when the extension is unknown. */
export function mimeFromExtension(filename: string): string | null {
  const ext = path.extname(filename).toLowerCase().slice(1);
  if (!ext) return null;
  return EXTRA_TYPES[ext] ?? (mime.lookup(ext) || null);
}

export function sniffImageMime(data: Buffer): string | null {
  for (const sig of IMAGE_SIGNATURES) {
    if (sig.offset + sig.bytes.length > data.length) continue;
    if (sig.bytes.every((byte, i) => data[sig.offset + i] === byte)) return sig.mime;
  }
  return null;
}

/** Files of a known non-image type are skipped; unknown ones are kept as candidates. */
export function isImageCandidate(filename: string): boolean {
  const type = mimeFromExtension(filename);
  return type === null || type.startsWith("image/");
}

function isJsonFile(filename: string): boolean {
  return mimeFromExtension(filename) === "application/json";
}

export async function loadImage(directory: string, relative: string): Promise<ImageFile> {
  const data = await fs.readFile(path.join(directory, relative));
  return {
    filename: relative,
    mimeType: mimeFromExtension(relative) ?? sniffImageMime(data) ?? "application/octet-stream",
    data,
  };
}

/** Exactly one image per resource. */
export class ImageRetriever implements Retriever<ImageFile> {
  async retrieve(handle: ResourceHandle, resourceId: ResourceId): Promise<ImageFile> {
    const images = (await walkFiles(handle.directory)).filter(isImageCandidate);
    if (images.length === 0) {
      throw new ResourceNotFoundError(resourceId, `Image not found for resource ${formatId(resourceId)}.`);
    }
    if (images.length > 1) {
      throw new InvalidResourceDataError(
        `Image file not unique for resource ${formatId(resourceId)}: ${images.join(", ")}.`,
      );
    }
    return loadImage(handle.directory, images[0]);
  }
}

/** One image plus an optional JSON document describing it. */
export class ImageWithJsonRetriever implements Retriever<ImageWithData> {
  async retrieve(handle: ResourceHandle, resourceId: ResourceId): Promise<ImageWithData> {
    const files = await walkFiles(handle.directory);
    const jsonFiles = files.filter(isJsonFile);
    const images = files.filter((file) => !isJsonFile(file) && isImageCandidate(file));

    if (images.length === 0) {
      throw new ResourceNotFoundError(resourceId, `Image not found for resource ${formatId(resourceId)}.`);
    }
    if (images.length > 1) {
      throw new InvalidResourceDataError(`Image file not unique for resource ${formatId(resourceId)}.`);
    }
    if (jsonFiles.length > 1) {
      throw new InvalidResourceDataError(`JSON data file not unique for resource ${formatId(resourceId)}.`);
    }

    let data: unknown = null;
    if (jsonFiles.length === 0) {
      warn(`No JSON data found for resource ${formatId(resourceId)}.`, "retriever");
    } else {
      const text = await fs.readFile(path.join(handle.directory, jsonFiles[0]), "utf-8");
      try {
        data = JSON.parse(text);
      } catch (err: unknown) {
        throw new InvalidResourceDataError(`Malformed JSON data for resource ${formatId(resourceId)}.`, {
          cause: err,
        });
      }
    }
    return { image: await loadImage(handle.directory, images[0]), data };
  }
}

function pageNumber(filename: string): number {
  const match = /_p(\d+)\.[^.]*$|_p(\d+)$/.exec(path.basename(filename));
  const digits = match?.[1] ?? match?.[2];
  return digits === undefined ? Number.MAX_SAFE_INTEGER : Number(digits);
}

/** Every page of a composite resource, in page order. */
export class CompositeRetriever implements Retriever<ImageFile[]> {
  async retrieve(handle: ResourceHandle, resourceId: ResourceId): Promise<ImageFile[]> {
    const pages = (await walkFiles(handle.directory))
      .filter(isImageCandidate)
      .sort((a, b) => pageNumber(a) - pageNumber(b) || a.localeCompare(b));
    if (pages.length === 0) {
      throw new ResourceNotFoundError(resourceId, `No pages found for resource ${formatId(resourceId)}.`);
    }
    const result: ImageFile[] = [];
    for (const page of pages) {
      result.push(await loadImage(handle.directory, page));
    }
    return result;
  }
}

export interface RetrieverPayloads {
  "image-only": ImageFile;
  "image-with-json": ImageWithData;
  composite: ImageFile[];
}

export type RetrieverKind = keyof RetrieverPayloads;

const RETRIEVERS: { [K in RetrieverKind]: Retriever<RetrieverPayloads[K]> } = {
  "image-only": new ImageRetriever(),
  "image-with-json": new ImageWithJsonRetriever(),
  composite: new CompositeRetriever(),
};

export const RETRIEVER_KINDS: readonly RetrieverKind[] = ["image-only", "image-with-json", "composite"];

export function isRetrieverKind(value: string): value is RetrieverKind {
  return Object.prototype.hasOwnProperty.call(RETRIEVERS, value);
}

export function createRetriever<K extends RetrieverKind>(choice: { kind: K }): Retriever<RetrieverPayloads[K]> {
  return RETRIEVERS[choice.kind];
}
