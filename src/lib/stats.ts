// src/lib/stats.ts
import { formatCell, cellKey } from "./literals";
import type {
  CellValue, Column, ColumnClassification, ColumnInfo, MissingValueReport,
  SemanticType, StatName, SummaryRow, SummaryTable, Table, View, ViewStats,
} from "./types";

/** ======================= Helpers ======================= */

/** Rounds half to even on the scaled value: round(6.25, 1) is 6.2. */
export function round(x: number, digits: number) {
  const scale = 10 ** digits;
  const scaled = x * scale;
  const floor = Math.floor(scaled);
  const n = scaled - floor === 0.5 ? (floor % 2 === 0 ? floor : floor + 1) : Math.round(scaled);
  return n / scale + 0;
}

export function isNumericType(type: SemanticType) {
  return type === "integer" || type === "float";
}

export function numbersOf(values: readonly CellValue[]): number[] {
  return values.filter((v): v is number => typeof v === "number" && Number.isFinite(v));
}

/** Linear interpolation between closest ranks. */
export function quantile(sortedNums: number[], q: number) {
  if (sortedNums.length === 0) return NaN;
  const pos = (sortedNums.length - 1) * q;
  const base = Math.floor(pos);
  const rest = pos - base;
  if (sortedNums[base + 1] !== undefined) return sortedNums[base] + rest * (sortedNums[base + 1] - sortedNums[base]);
  return sortedNums[base];
}

export function mean(nums: number[]) {
  return nums.length ? nums.reduce((a, x) => a + x, 0) / nums.length : NaN;
}

/** Sample standard deviation (n - 1); undefined below two values. */
export function stdev(nums: number[], m = mean(nums)) {
  if (nums.length <= 1) return NaN;
  const v = nums.reduce((a, x) => a + (x - m) ** 2, 0) / (nums.length - 1);
  return Math.sqrt(v);
}

export function histogram(values: number[], bins = 20) {
  const nums = values.filter(Number.isFinite);
  if (nums.length === 0) return { bins: [] as number[], counts: [] as number[], edges: [] as number[] };
  const min = nums.reduce((a, v) => Math.min(a, v), Infinity);
  const max = nums.reduce((a, v) => Math.max(a, v), -Infinity);
  const width = (max - min) || 1;
  const edges = Array.from({ length: bins + 1 }, (_, i) => min + (i * width) / bins);
  const counts: number[] = Array(bins).fill(0);
  for (const v of nums) {
    const idx = Math.min(bins - 1, Math.max(0, Math.floor(((v - min) / width) * bins)));
    counts[idx]++;
  }
  const centers = counts.map((_, i) => (edges[i] + edges[i + 1]) / 2);
  return { bins: centers, counts, edges };
}

/** Distinct non-null values with their counts, in first-seen order. */
export function valueCounts(values: readonly CellValue[]) {
  const counts = new Map<string, { value: CellValue; count: number }>();
  for (const v of values) {
    if (v === null) continue;
    const k = cellKey(v);
    const hit = counts.get(k);
    if (hit) hit.count++;
    else counts.set(k, { value: v, count: 1 });
  }
  return [...counts.values()];
}

function finite(x: number): number | null {
  return Number.isFinite(x) ? round(x, 2) : null;
}

/** ======================= Classification ======================= */

export function classifyColumns(table: Table): ColumnClassification {
  const numeric: string[] = [];
  const categorical: string[] = [];
  for (const c of table.columns) (isNumericType(c.type) ? numeric : categorical).push(c.name);
  return { numeric, categorical };
}

/** ======================= Missing values ======================= */

export function profileMissing(table: Table): MissingValueReport {
  if (table.rowCount === 0) return [];
  return table.columns
    .map((c) => {
      const missingCount = c.values.filter((v) => v === null).length;
      return { column: c.name, missingCount, missingPercent: round((missingCount / table.rowCount) * 100, 1) };
    })
    .filter((r) => r.missingCount > 0)
    .sort((a, b) => b.missingCount - a.missingCount);
}

/** ======================= Overview ======================= */

export function columnInventory(table: Table): ColumnInfo[] {
  return table.columns.map((c) => {
    const present = c.values.filter((v) => v !== null);
    return {
      name: c.name,
      type: c.type,
      nonNullCount: present.length,
      sampleValue: present.length ? formatCell(present[0], c.type) : "N/A",
    };
  });
}

/** First n rows as rendered records. */
export function head(table: Table, n: number, indices?: readonly number[]): Record<string, string>[] {
  const idx = (indices ?? Array.from({ length: table.rowCount }, (_, i) => i)).slice(0, n);
  return idx.map((r) => {
    const out: Record<string, string> = {};
    for (const c of table.columns) out[c.name] = formatCell(c.values[r], c.type);
    return out;
  });
}

/** Approximate in-memory size: 8 bytes per number or date, 1 per boolean, a reference plus UTF-16 text per string. */
export function memoryBytes(table: Table) {
  let bytes = 0;
  for (const c of table.columns) {
    if (c.type === "boolean") bytes += c.values.length;
    else if (c.type !== "text") bytes += 8 * c.values.length;
    else for (const v of c.values) bytes += 8 + (typeof v === "string" ? 2 * v.length : 0);
  }
  return bytes;
}

export function viewStats(view: View): ViewStats {
  const rowCount = view.rowIndices.length;
  const sourceRowCount = view.source.rowCount;
  const percent = sourceRowCount ? round((rowCount / sourceRowCount) * 100, 1) : 0;
  return { rowCount, sourceRowCount, percent };
}

/** ======================= Summary statistics ======================= */

const NUMERIC_STATS: StatName[] = ["count", "mean", "std", "min", "25%", "50%", "75%", "max"];
const OTHER_STATS: StatName[] = ["count", "unique", "top", "freq"];
const STAT_ORDER: StatName[] = ["count", "unique", "top", "freq", "mean", "std", "min", "25%", "50%", "75%", "max"];

function numericSummary(values: CellValue[]): SummaryRow["stats"] {
  const nums = numbersOf(values);
  if (nums.length === 0) {
    return { count: 0, mean: null, std: null, min: null, "25%": null, "50%": null, "75%": null, max: null };
  }
  const sorted = [...nums].sort((a, b) => a - b);
  const m = mean(nums);
  return {
    count: nums.length,
    mean: finite(m),
    std: finite(stdev(nums, m)),
    min: finite(sorted[0]),
    "25%": finite(quantile(sorted, 0.25)),
    "50%": finite(quantile(sorted, 0.5)),
    "75%": finite(quantile(sorted, 0.75)),
    max: finite(sorted[sorted.length - 1]),
  };
}

function categoricalSummary(values: CellValue[]): SummaryRow["stats"] {
  const counts = valueCounts(values);
  const count = counts.reduce((a, c) => a + c.count, 0);
  if (count === 0) return { count: 0, unique: 0, top: null, freq: null };
  let top = counts[0];
  for (const c of counts) if (c.count > top.count) top = c;
  return { count, unique: counts.length, top: top.value, freq: top.count };
}

function columnOf(view: View, col: Column): CellValue[] {
  return view.rowIndices.map((r) => col.values[r]);
}

export function summarize(view: View): SummaryTable {
  const rows: SummaryRow[] = view.source.columns.map((c) => {
    const values = columnOf(view, c);
    return {
      column: c.name,
      type: c.type,
      stats: isNumericType(c.type) ? numericSummary(values) : categoricalSummary(values),
    };
  });
  const used = new Set<StatName>();
  for (const c of view.source.columns) {
    for (const s of isNumericType(c.type) ? NUMERIC_STATS : OTHER_STATS) used.add(s);
  }
  return { statNames: STAT_ORDER.filter((s) => used.has(s)), rows };
}
