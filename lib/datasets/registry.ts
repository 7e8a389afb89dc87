import { createHash } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import type { ColumnMappings } from "@/lib/analysis/columns";
import { normalizeRows, type RawRow } from "@/lib/analysis/normalize";
import {
  SOURCE_TYPES,
  type DatasetSnapshot,
  type Datasets,
  type SourceType,
} from "@/lib/analysis/types";
import { analysisPrefix } from "@/lib/cache/fingerprint";
import type { CacheManager } from "@/lib/cache/manager";
import { DatasetReadError } from "@/lib/errors";

/**
 * File names written by the ingestion layer under the data directory,
 * one JSON array of row objects per source type.
 */
export const DATASET_FILES: Record<SourceType, string> = {
  Payable: "payable.json",
  Receivable: "receivable.json",
  Invoice: "invoices.json",
  Proforma: "proforma.json",
};

export type DatasetRegistryOptions = {
  dataDir: string;
  // Used to drop analyses of reloaded sources.
  cache?: CacheManager;
  columns?: ColumnMappings;
  readFileFn?: (filePath: string) => Promise<string>;
  now?: () => Date;
  logger?: Pick<Console, "warn">;
};

export type ReloadOutcome = {
  reloaded: SourceType[];
  invalidated: number;
  snapshots: DatasetSnapshot[];
};

export type DatasetRegistry = {
  getSnapshot(sourceType: SourceType): Promise<DatasetSnapshot>;
  getDatasets(): Promise<Datasets>;
  reload(sourceType?: SourceType): Promise<ReloadOutcome>;
};

function hasErrnoCode(err: unknown, code: string) {
  return typeof err === "object" && err !== null && "code" in err && err.code === code;
}

function isRawRow(value: unknown): value is RawRow {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseRows(filePath: string, raw: string): RawRow[] {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err: unknown) {
    throw new DatasetReadError(filePath, `${path.basename(filePath)} is not valid JSON`, err);
  }
  if (!Array.isArray(data)) {
    throw new DatasetReadError(filePath, `${path.basename(filePath)} must hold a JSON array of rows`);
  }

  const rows: RawRow[] = [];
  data.forEach((row: unknown, index) => {
    if (!isRawRow(row)) {
      throw new DatasetReadError(filePath, `${path.basename(filePath)} row ${index} is not an object`);
    }
    rows.push(row);
  });
  return rows;
}

/**
 * Holds the latest snapshot per source type. Files are read lazily on first
 * use; a missing file is an empty dataset. Snapshots are replaced whole on
 * reload and never mutated.
 */
export function createDatasetRegistry(options: DatasetRegistryOptions): DatasetRegistry {
  const readFileFn = options.readFileFn || ((filePath: string) => fs.readFile(filePath, "utf8"));
  const now = options.now || (() => new Date());
  const loaded = new Map<SourceType, Promise<DatasetSnapshot>>();

  async function readSource(sourceType: SourceType): Promise<DatasetSnapshot> {
    const filePath = path.join(options.dataDir, DATASET_FILES[sourceType]);
    let raw: string | null = null;
    try {
      raw = await readFileFn(filePath);
    } catch (err: unknown) {
      if (!hasErrnoCode(err, "ENOENT")) {
        throw new DatasetReadError(filePath, `Failed to read ${path.basename(filePath)}`, err);
      }
    }

    const rows = raw === null ? [] : parseRows(filePath, raw);
    const { records, warnings } = normalizeRows(rows, sourceType, {
      columns: options.columns,
      logger: options.logger,
    });

    return Object.freeze({
      sourceType,
      records,
      version: createHash("sha1").update(raw ?? "").digest("hex").slice(0, 16),
      loadedAt: now().toISOString(),
      warnings: Object.freeze(warnings),
    });
  }

  function getSnapshot(sourceType: SourceType) {
    const existing = loaded.get(sourceType);
    if (existing) return existing;

    const pending = readSource(sourceType);
    loaded.set(sourceType, pending);
    // A failed read is not remembered; the next call tries the file again.
    pending.catch(() => {
      if (loaded.get(sourceType) === pending) loaded.delete(sourceType);
    });
    return pending;
  }

  async function getDatasets() {
    const snapshots = await Promise.all(SOURCE_TYPES.map((sourceType) => getSnapshot(sourceType)));
    const datasets: Datasets = {};
    for (const snapshot of snapshots) {
      datasets[snapshot.sourceType] = snapshot;
    }
    return datasets;
  }

  async function reload(sourceType?: SourceType): Promise<ReloadOutcome> {
    const targets = sourceType ? [sourceType] : [...SOURCE_TYPES];
    for (const target of targets) loaded.delete(target);
    const snapshots = await Promise.all(targets.map((target) => getSnapshot(target)));

    let invalidated = 0;
    if (options.cache) {
      for (const scope of [...targets, "all" as const]) {
        invalidated += await options.cache.invalidate(analysisPrefix(scope));
      }
    }

    return { reloaded: targets, invalidated, snapshots };
  }

  return { getSnapshot, getDatasets, reload };
}
