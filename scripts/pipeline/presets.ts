import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import { type PoolPreset, presetFileSchema } from "../../shared/schema";
import type { StoreClientCache } from "../../server/clients";
import { CompositePool } from "./composite-pool";
import { ArchivePool, type DataPool, FallbackPool, type ResolvingPool, TablePool, isResolvingPool } from "./data-pool";
import { createCandidateGenerator, createLocator } from "./locator";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const PRESETS_FILE = path.join(__dirname, "presets.json");

export type PresetMap = Record<string, PoolPreset>;

/** Validates a preset document, including that every referenced pool exists. */
export function parsePresets(raw: unknown): PresetMap {
  const parsed = presetFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid presets at ${issue.path.join(".")}: ${issue.message}`);
  }
  const presets = parsed.data;
  for (const [name, preset] of Object.entries(presets)) {
    const refs = preset.type === "fallback" ? preset.pools : preset.type === "composite" ? [preset.childPool] : [];
    for (const ref of refs) {
      if (!presets[ref]) {
        throw new Error(`Preset ${JSON.stringify(name)} refers to unknown pool ${JSON.stringify(ref)}`);
      }
    }
  }
  return presets;
}

let bundled: PresetMap | null = null;

export function loadPresets(file?: string): PresetMap {
  if (file === undefined && bundled) return bundled;
  const raw: unknown = JSON.parse(fs.readFileSync(file ?? PRESETS_FILE, "utf-8"));
  const presets = parsePresets(raw);
  if (file === undefined) bundled = presets;
  return presets;
}

export interface PresetContext {
  stores: StoreClientCache;
  scratchDir?: string;
  presets?: PresetMap;
}

/**
 * Builds the pool a preset describes. Pools referenced several times inside
 * one call (the children of a fallback chain, say) are built once.
 */
export function createPresetPool(name: string, context: PresetContext): DataPool {
  const presets = context.presets ?? loadPresets();
  const built = new Map<string, DataPool>();
  const building: string[] = [];

  const build = (current: string): DataPool => {
    const existing = built.get(current);
    if (existing) return existing;
    const preset = presets[current];
    if (!preset) {
      throw new Error(`Unknown pool preset ${JSON.stringify(current)}. Known presets: ${Object.keys(presets).join(", ")}`);
    }
    if (building.includes(current)) {
      throw new Error(`Preset cycle: ${[...building, current].join(" -> ")}`);
    }
    building.push(current);
    const pool = instantiate(preset, context, build);
    building.pop();
    built.set(current, pool);
    return pool;
  };

  return build(name);
}

function instantiate(preset: PoolPreset, context: PresetContext, build: (name: string) => DataPool): DataPool {
  switch (preset.type) {
    case "archive": {
      const store = context.stores.storeFor(preset);
      const locator = preset.locator ? createLocator(preset.locator) : () => [];
      return new ArchivePool({
        store,
        locator,
        candidateGenerators: preset.generators.map((config) => createCandidateGenerator(store, config)),
        useIdAsFilename: preset.useIdAsFilename,
        scratchDir: context.scratchDir,
      });
    }
    case "table":
      return new TablePool({
        store: context.stores.storeFor(preset),
        tableFile: preset.tableFile,
        idColumn: preset.idColumn,
        archiveColumn: preset.archiveColumn,
        fileColumn: preset.fileColumn,
        useIdAsFilename: preset.useIdAsFilename,
        scratchDir: context.scratchDir,
      });
    case "fallback": {
      const pools: ResolvingPool[] = [];
      for (const name of preset.pools) {
        const pool = build(name);
        if (!isResolvingPool(pool)) {
          throw new Error(`Pool ${JSON.stringify(name)} cannot be part of a fallback chain`);
        }
        pools.push(pool);
      }
      return new FallbackPool(pools);
    }
    case "composite":
      return new CompositePool({
        childPool: build(preset.childPool),
        store: context.stores.storeFor({ repoId: preset.repoId, revision: preset.revision }),
        mapFile: preset.mapFile,
        idColumn: preset.idColumn,
        childrenColumn: preset.childrenColumn,
        scratchDir: context.scratchDir,
      });
  }
}
