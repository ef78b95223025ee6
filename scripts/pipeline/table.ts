import * as path from "path";
import { parse as parseCsv } from "csv-parse/sync";
import { z } from "zod";
import type { ResourceId } from "../../shared/schema";
import type { IArchiveStore } from "../../server/storage";

export type TableRow = Record<string, unknown>;

const rowSchema = z.record(z.unknown());
const rowsSchema = z.array(rowSchema);

export const resourceIdSchema = z.union([z.number().int().nonnegative(), z.string().min(1)]);

/**
 * Digit strings and numbers name the same resource: `"123"` and `123` both
 * become `123`. Anything else stays a string.
 */
export function canonicalId(resourceId: ResourceId): ResourceId {
  if (typeof resourceId === "string" && /^\d+$/.test(resourceId)) {
    const numeric = Number(resourceId);
    if (Number.isSafeInteger(numeric)) return numeric;
  }
  return resourceId;
}

/**
 * `.csv` sources are read with a header row; every cell stays a string.
 * Anything else is a JSON array of objects or JSON Lines (one object per line).
 */
export function parseTable(text: string, source = "table"): TableRow[] {
  const trimmed = text.trim();
  if (!trimmed) return [];
  if (path.posix.extname(source).toLowerCase() === ".csv") {
    const records: unknown = parseCsv(trimmed, { columns: true, skip_empty_lines: true, bom: true });
    const parsed = rowsSchema.safeParse(records);
    if (!parsed.success) {
      throw new Error(`Invalid table ${source}: ${parsed.error.message}`);
    }
    return parsed.data;
  }
  if (trimmed.startsWith("[")) {
    const parsed = rowsSchema.safeParse(JSON.parse(trimmed));
    if (!parsed.success) {
      throw new Error(`Invalid table ${source}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  const rows: TableRow[] = [];
  const lines = trimmed.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line) continue;
    const parsed = rowSchema.safeParse(JSON.parse(line));
    if (!parsed.success) {
      throw new Error(`Invalid row ${i + 1} in ${source}: ${parsed.error.message}`);
    }
    rows.push(parsed.data);
  }
  return rows;
}

export function readColumn<T>(row: TableRow, column: string, schema: z.ZodType<T>, source: string): T {
  const parsed = schema.safeParse(row[column]);
  if (!parsed.success) {
    throw new Error(`Column ${JSON.stringify(column)} of ${source} is invalid: ${parsed.error.issues[0]?.message}`);
  }
  return parsed.data;
}

/** Loads `file` from the store once; a failed load is retried by the next caller. */
export function lazyTable<T>(
  store: IArchiveStore,
  file: string,
  build: (rows: TableRow[]) => T,
): () => Promise<T> {
  let loading: Promise<T> | null = null;
  return () => {
    if (!loading) {
      const pending = store.readFile(file).then((buffer) => build(parseTable(buffer.toString("utf-8"), file)));
      pending.catch(() => {
        if (loading === pending) loading = null;
      });
      loading = pending;
    }
    return loading;
  };
}
