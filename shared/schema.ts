import { z } from "zod";

// --- Core types ---

export type ResourceId = number | string;

export type Metainfo = unknown;

/** A bare ID, or an `[id, metainfo]` pair. */
export type ResourceRequest = ResourceId | readonly [ResourceId, Metainfo];

export interface DataLocation {
  resourceId: ResourceId;
  archive: string;
  filename: string;
}

export function splitRequest(request: ResourceRequest): [ResourceId, Metainfo] {
  if (typeof request === "number" || typeof request === "string") {
    return [request, null];
  }
  return [request[0], request[1] ?? null];
}

// --- Tar index files (`<archive>.json` next to every `<archive>.tar`) ---

export const tarIndexEntrySchema = z.object({
  offset: z.number().int().nonnegative(),
  size: z.number().int().nonnegative(),
  sha256: z.string().optional(),
});

export const tarIndexSchema = z.object({
  filesize: z.number().int().nonnegative().optional(),
  hash: z.string().optional(),
  files: z.record(tarIndexEntrySchema),
});

export type TarIndexEntry = z.infer<typeof tarIndexEntrySchema>;
export type TarIndex = z.infer<typeof tarIndexSchema>;

// --- Pool presets ---

const baseLevelSchema = z.union([z.number().int().positive(), z.array(z.number().int().positive()).nonempty()]);

export const locatorConfigSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("modulo-cut"),
    baseDir: z.union([z.string(), z.array(z.string()).nonempty()]).default("images"),
    baseLevel: baseLevelSchema.default(3),
    zeroPrefix: z.boolean().default(true),
  }),
  z.object({
    type: z.literal("modulo-template"),
    digits: z.number().int().positive().default(3),
    templates: z.array(z.string()).nonempty(),
  }),
]);

export type LocatorConfig = z.infer<typeof locatorConfigSchema>;

const repositorySchema = z.object({
  repoId: z.string(),
  revision: z.string().default("main"),
  idxRepoId: z.string().optional(),
  idxRevision: z.string().optional(),
});

export const candidateGeneratorConfigSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("updates"),
    prefix: z.string().default("updates/"),
  }),
  z.object({
    type: z.literal("archive-dirs"),
    prefix: z.string().default(""),
    baseLevel: baseLevelSchema.default(3),
    zeroPrefix: z.boolean().default(true),
  }),
]);

export type CandidateGeneratorConfig = z.infer<typeof candidateGeneratorConfigSchema>;

export const archivePresetSchema = repositorySchema.extend({
  type: z.literal("archive"),
  description: z.string().optional(),
  locator: locatorConfigSchema.optional(),
  generators: z.array(candidateGeneratorConfigSchema).default([]),
  useIdAsFilename: z.boolean().default(false),
});

export const tablePresetSchema = repositorySchema.extend({
  type: z.literal("table"),
  description: z.string().optional(),
  tableFile: z.string(),
  idColumn: z.string().default("id"),
  archiveColumn: z.string(),
  fileColumn: z.string(),
  useIdAsFilename: z.boolean().default(true),
});

export const fallbackPresetSchema = z.object({
  type: z.literal("fallback"),
  description: z.string().optional(),
  pools: z.array(z.string()).nonempty(),
});

export const compositePresetSchema = z.object({
  type: z.literal("composite"),
  description: z.string().optional(),
  childPool: z.string(),
  repoId: z.string(),
  revision: z.string().default("main"),
  mapFile: z.string(),
  idColumn: z.string().default("id"),
  childrenColumn: z.string().default("image_ids"),
});

export const poolPresetSchema = z.discriminatedUnion("type", [
  archivePresetSchema,
  tablePresetSchema,
  fallbackPresetSchema,
  compositePresetSchema,
]);

export const presetFileSchema = z.record(poolPresetSchema);

export type ArchivePreset = z.infer<typeof archivePresetSchema>;
export type TablePreset = z.infer<typeof tablePresetSchema>;
export type FallbackPreset = z.infer<typeof fallbackPresetSchema>;
export type CompositePreset = z.infer<typeof compositePresetSchema>;
export type PoolPreset = z.infer<typeof poolPresetSchema>;
