import * as path from "path";
import type { CandidateGeneratorConfig, LocatorConfig, ResourceId } from "../../shared/schema";
import type { IArchiveStore } from "../../server/storage";

/** Deterministic candidate shards for one resource, most likely first. */
export type Locator = (resourceId: ResourceId) => string[];

/** Extra candidates discovered at run time, tried after the deterministic ones. */
export type CandidateGenerator = (resourceId: ResourceId) => Promise<string[]>;

function toBigInt(resourceId: ResourceId): bigint | null {
  if (typeof resourceId === "number") {
    return Number.isSafeInteger(resourceId) && resourceId >= 0 ? BigInt(resourceId) : null;
  }
  return /^\d+$/.test(resourceId) ? BigInt(resourceId) : null;
}

/** `(id mod 10^width)` as a zero-padded decimal string, or null for non-numeric IDs. */
export function paddedModulo(resourceId: ResourceId, width: number): string | null {
  const id = toBigInt(resourceId);
  if (id === null) return null;
  return (id % 10n ** BigInt(width)).toString().padStart(width, "0");
}

/**
 * Cuts a digit string into groups of three counted from the right, so the
 * leftmost group may be shorter: `"1234"` → `["1", "234"]`.
 */
export function moduloCut(digits: string): string[] {
  const groups: string[] = [];
  for (let end = digits.length; end > 0; end -= 3) {
    groups.unshift(digits.slice(Math.max(0, end - 3), end));
  }
  return groups;
}

export interface ModuloCutOptions {
  baseDir?: string | string[];
  baseLevel?: number | number[];
  /** Prefix the last path segment with a literal `0`; the published layouts depend on it. */
  zeroPrefix?: boolean;
}

/**
 * `images/1/0234.tar` style shard paths. With `baseLevel = 4` the resource
 * `561234` lands in `images/1/0234.tar`; with `baseLevel = 3` it lands in
 * `images/0234.tar`. Lists of levels or base directories produce one candidate
 * per combination, levels outermost, in the order given.
 */
export function moduloCutShards(resourceId: ResourceId, options: ModuloCutOptions = {}): string[] {
  const levels = Array.isArray(options.baseLevel) ? options.baseLevel : [options.baseLevel ?? 3];
  const baseDirs = Array.isArray(options.baseDir) ? options.baseDir : [options.baseDir ?? "images"];
  const zeroPrefix = options.zeroPrefix ?? true;

  const shards: string[] = [];
  for (const level of levels) {
    const modulo = paddedModulo(resourceId, level);
    if (modulo === null) continue;
    const segments = moduloCut(modulo);
    if (zeroPrefix) {
      segments[segments.length - 1] = `0${segments[segments.length - 1]}`;
    }
    const relative = `${segments.join("/")}.tar`;
    for (const baseDir of baseDirs) {
      shards.push(baseDir ? path.posix.join(baseDir, relative) : relative);
    }
  }
  return shards;
}

/** `original/data-0{modulo}.tar` style shard paths. */
export function moduloTemplateShards(resourceId: ResourceId, templates: readonly string[], digits = 3): string[] {
  const modulo = paddedModulo(resourceId, digits);
  if (modulo === null) return [];
  return templates.map((template) => template.split("{modulo}").join(modulo));
}

export function createLocator(config: LocatorConfig): Locator {
  switch (config.type) {
    case "modulo-cut":
      return (resourceId) =>
        moduloCutShards(resourceId, {
          baseDir: config.baseDir,
          baseLevel: config.baseLevel,
          zeroPrefix: config.zeroPrefix,
        });
    case "modulo-template":
      return (resourceId) => moduloTemplateShards(resourceId, config.templates, config.digits);
  }
}

const naturalCollator = new Intl.Collator(undefined, { numeric: true, sensitivity: "base" });

export function naturalSort(values: readonly string[]): string[] {
  return [...values].sort(naturalCollator.compare);
}

/**
 * Incremental "update" archives (`updates/2024-05/data-xxx-7.tar`) hold resources
 * whose last digit matches the number after the final dash. The listing is fetched
 * once per generator and shared by every lookup.
 */
export function updateArchivesGenerator(store: IArchiveStore, prefix: string): CandidateGenerator {
  const listing = cachedListing(() => store.listArchives(prefix).then(naturalSort));

  return async (resourceId) => {
    const digit = paddedModulo(resourceId, 1);
    if (digit === null) return [];
    const suffix = `-${digit}.tar`;
    return (await listing()).filter((file) => path.posix.basename(file).endsWith(suffix));
  };
}

/**
 * For repositories that spread shards over batch directories
 * (`part1/0789.tar`, `part2/0789.tar`): every directory under `prefix` that
 * holds archives is a base directory for the modulo cut, and only shards that
 * actually exist are returned.
 */
export function archiveDirectoriesGenerator(
  store: IArchiveStore,
  options: Omit<ModuloCutOptions, "baseDir"> & { prefix?: string } = {},
): CandidateGenerator {
  const { prefix = "", ...cut } = options;
  const listing = cachedListing(() => store.listArchives(prefix).then(naturalSort));

  return async (resourceId) => {
    const archives = await listing();
    const existing = new Set(archives);
    const baseDir = [...new Set(archives.map((file) => path.posix.dirname(file)))].map((dir) =>
      dir === "." ? "" : dir,
    );
    if (baseDir.length === 0) return [];
    return moduloCutShards(resourceId, { ...cut, baseDir }).filter((shard) => existing.has(shard));
  };
}

/** Runs `load` once and shares the result; a failure is retried by the next caller. */
function cachedListing(load: () => Promise<string[]>): () => Promise<string[]> {
  let listing: Promise<string[]> | null = null;
  return () => {
    if (!listing) {
      const pending = load();
      pending.catch(() => {
        if (listing === pending) listing = null;
      });
      listing = pending;
    }
    return listing;
  };
}

export function createCandidateGenerator(store: IArchiveStore, config: CandidateGeneratorConfig): CandidateGenerator {
  switch (config.type) {
    case "updates":
      return updateArchivesGenerator(store, config.prefix);
    case "archive-dirs":
      return archiveDirectoriesGenerator(store, {
        prefix: config.prefix,
        baseLevel: config.baseLevel,
        zeroPrefix: config.zeroPrefix,
      });
  }
}
