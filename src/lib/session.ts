// src/lib/session.ts
import { DEFAULT_CONFIG, type InsightsConfig } from "./config";
import { NoDatasetError } from "./errors";
import { applyFilters, resolveFilters, type FilterInput } from "./filters";
import { inferTypes } from "./infer";
import { parseCsv, readNamedDataset } from "./parse";
import { sample } from "./sample";
import { classifyColumns, columnInventory, profileMissing, summarize } from "./stats";
import type {
  ColumnClassification, ColumnInfo, MissingValueReport, SampleView, SummaryTable, Table, View,
} from "./types";

export type DatasetSource =
  | { kind: "upload"; name: string; bytes: Uint8Array | string }
  | { kind: "sample"; name?: string };

export type LoadedDataset = {
  token: string;
  table: Table;
  changes: string[];
  inventory: ColumnInfo[];
  missing: MissingValueReport;
  classification: ColumnClassification;
};

export type FilteredView = { view: View; notes: string[] };

export function identityToken(source: DatasetSource, config: InsightsConfig = DEFAULT_CONFIG) {
  return source.kind === "upload" ? source.name : `sample:${source.name ?? config.sampleDataset}`;
}

/** Order-independent key for a filter set. Selections keep their JSON type: 1 and "1" differ. */
export function filterKey(filters: readonly FilterInput[]) {
  return filters
    .map((f) => JSON.stringify(f.kind === "categorical"
      ? [f.kind, f.column, f.values === undefined ? null : f.values.map((v) => JSON.stringify(v)).sort()]
      : [f.kind, f.column, f.min ?? null, f.max ?? null]))
    .sort()
    .join("|");
}

/** Map that keeps at most `limit` entries, evicting the least recently used. */
class LruCache<V> {
  private entries = new Map<string, V>();

  constructor(private readonly limit: number) {}

  get size() {
    return this.entries.size;
  }

  get(key: string): V | undefined {
    const hit = this.entries.get(key);
    if (hit !== undefined) {
      this.entries.delete(key);
      this.entries.set(key, hit);
    }
    return hit;
  }

  set(key: string, value: V) {
    this.entries.delete(key);
    this.entries.set(key, value);
    for (const oldest of this.entries.keys()) {
      if (this.entries.size <= this.limit) break;
      this.entries.delete(oldest);
    }
  }

  clear() {
    this.entries.clear();
  }
}

/**
 * Holds the one canonical table for the current dataset token plus derivations
 * memoized per filter set, up to `config.viewCacheSize` filter sets each. A
 * different token replaces everything; a failed load replaces nothing.
 */
export class DatasetSession {
  private dataset: LoadedDataset | null = null;
  private readonly views: LruCache<FilteredView>;
  private readonly summaries: LruCache<SummaryTable>;
  private readonly samples: LruCache<SampleView>;

  constructor(readonly config: InsightsConfig = DEFAULT_CONFIG) {
    this.views = new LruCache(config.viewCacheSize);
    this.summaries = new LruCache(config.viewCacheSize);
    this.samples = new LruCache(config.viewCacheSize);
  }

  /** Number of memoized filtered views. */
  get cachedViews() {
    return this.views.size;
  }

  load(source: DatasetSource): LoadedDataset {
    const token = identityToken(source, this.config);
    if (this.dataset?.token === token) {
      console.info(`[session] reusing cached dataset ${token}`);
      return this.dataset;
    }

    const bytes = source.kind === "upload"
      ? source.bytes
      : readNamedDataset(this.config.datasetDir, source.name ?? this.config.sampleDataset);
    const { table, changes } = inferTypes(parseCsv(bytes), this.config);

    const dataset: LoadedDataset = {
      token,
      table,
      changes,
      inventory: columnInventory(table),
      missing: profileMissing(table),
      classification: classifyColumns(table),
    };
    this.clear();
    this.dataset = dataset;
    console.info(`[session] loaded ${token}: ${table.rowCount} rows x ${table.columns.length} columns`);
    return dataset;
  }

  current(): LoadedDataset | null {
    return this.dataset;
  }

  require(): LoadedDataset {
    if (!this.dataset) throw new NoDatasetError();
    return this.dataset;
  }

  view(inputs: readonly FilterInput[] = []): FilteredView {
    const { table } = this.require();
    const key = filterKey(inputs);
    let hit = this.views.get(key);
    if (!hit) {
      const { filters, notes } = resolveFilters(table, inputs);
      hit = { view: applyFilters(table, filters), notes };
      this.views.set(key, hit);
    }
    return hit;
  }

  sample(inputs: readonly FilterInput[] = []): SampleView {
    const key = filterKey(inputs);
    let hit = this.samples.get(key);
    if (!hit) {
      hit = sample(this.view(inputs).view, this.config.sampleCap, this.config.sampleSeed);
      this.samples.set(key, hit);
    }
    return hit;
  }

  summary(inputs: readonly FilterInput[] = []): SummaryTable {
    const key = filterKey(inputs);
    let hit = this.summaries.get(key);
    if (!hit) {
      hit = summarize(this.view(inputs).view);
      this.summaries.set(key, hit);
    }
    return hit;
  }

  clear() {
    this.dataset = null;
    this.views.clear();
    this.summaries.clear();
    this.samples.clear();
  }
}
