// src/lib/filters.ts
import { FilterSpecError } from "./errors";
import { cellKey, formatCell } from "./literals";
import { isNumericType, numbersOf, valueCounts } from "./stats";
import type { CellValue, Column, FilterSpec, Table, View } from "./types";

/** A selection as it arrives from a request: JSON primitives. */
export type SelectionValue = string | number | boolean;

export type FilterInput =
  | { kind: "categorical"; column: string; values?: SelectionValue[] }
  | { kind: "range"; column: string; min?: number; max?: number };

export type ResolvedFilters = { filters: FilterSpec[]; notes: string[] };

export function findColumn(table: Table, name: string): Column {
  const col = table.columns.find((c) => c.name === name);
  if (!col) throw new FilterSpecError(`Unknown column '${name}'`);
  return col;
}

/** ======================= Predicates ======================= */

function survivors(table: Table, filter: FilterSpec): Uint8Array {
  const col = findColumn(table, filter.column);
  const keep = new Uint8Array(table.rowCount);

  if (filter.kind === "categorical") {
    const allowed = new Set(filter.allowed.map(cellKey));
    col.values.forEach((v, i) => {
      if (v !== null && allowed.has(cellKey(v))) keep[i] = 1;
    });
    return keep;
  }

  if (!isNumericType(col.type)) {
    throw new FilterSpecError(`Range filter needs a numeric column; '${col.name}' is ${col.type}`);
  }
  col.values.forEach((v, i) => {
    if (typeof v === "number" && filter.min <= v && v <= filter.max) keep[i] = 1;
  });
  return keep;
}

/**
 * Every filter is evaluated against the full table and the survivor sets are
 * intersected, so the result does not depend on filter order. Rows keep their
 * source order.
 */
export function applyFilters(table: Table, filters: readonly FilterSpec[]): View {
  const masks = filters.map((f) => survivors(table, f));
  const rowIndices: number[] = [];
  for (let i = 0; i < table.rowCount; i++) {
    if (masks.every((m) => m[i] === 1)) rowIndices.push(i);
  }
  return { source: table, filters: [...filters], rowIndices };
}

export function materialize(view: View): Table {
  const columns = view.source.columns.map((c) => ({
    name: c.name,
    type: c.type,
    values: view.rowIndices.map((r) => c.values[r]),
  }));
  return { columns, rowCount: view.rowIndices.length };
}

/** ======================= Construction ======================= */

export function categoricalOptions(table: Table, column: string, limit = 50) {
  const values = valueCounts(findColumn(table, column).values).map((c) => c.value);
  return { values, tooMany: values.length > limit };
}

function matchesSelection(v: CellValue, type: Column["type"], wanted: Set<string>) {
  if (v === null) return false;
  if (wanted.has(cellKey(v)) || wanted.has(`text:${formatCell(v, type)}`)) return true;
  return v instanceof Date && wanted.has(`text:${v.toISOString()}`);
}

/** No selection means every observed value, so an unset filter keeps all non-null rows. */
export function buildCategoricalFilter(table: Table, column: string, selection?: readonly SelectionValue[]): FilterSpec {
  const col = findColumn(table, column);
  const observed = valueCounts(col.values).map((c) => c.value);
  if (selection === undefined) return { kind: "categorical", column, allowed: observed };

  const wanted = new Set<string>();
  for (const s of selection) {
    wanted.add(cellKey(s));
    wanted.add(`text:${String(s)}`);
  }
  return { kind: "categorical", column, allowed: observed.filter((v) => matchesSelection(v, col.type, wanted)) };
}

export type RangeBuild = { ok: true; filter: FilterSpec } | { ok: false; note: string };

/** A constant column has nothing to slide over: no filter, just a note. */
export function buildRangeFilter(table: Table, column: string, bounds: { min?: number; max?: number } = {}): RangeBuild {
  const col = findColumn(table, column);
  if (!isNumericType(col.type)) {
    throw new FilterSpecError(`Range filter needs a numeric column; '${column}' is ${col.type}`);
  }
  const nums = numbersOf(col.values);
  if (nums.length === 0) return { ok: false, note: `'${column}' has no values to filter` };

  const lo = nums.reduce((a, v) => Math.min(a, v), Infinity);
  const hi = nums.reduce((a, v) => Math.max(a, v), -Infinity);
  if (lo === hi) return { ok: false, note: `All values in '${column}' are ${formatCell(lo, col.type)}` };

  const min = bounds.min ?? lo;
  const max = bounds.max ?? hi;
  if (min > max) throw new FilterSpecError(`Range for '${column}' has min ${min} above max ${max}`);
  return { ok: true, filter: { kind: "range", column, min, max } };
}

export function resolveFilters(table: Table, inputs: readonly FilterInput[]): ResolvedFilters {
  const filters: FilterSpec[] = [];
  const notes: string[] = [];
  for (const input of inputs) {
    if (input.kind === "categorical") {
      filters.push(buildCategoricalFilter(table, input.column, input.values));
      continue;
    }
    const built = buildRangeFilter(table, input.column, input);
    if (built.ok) filters.push(built.filter);
    else notes.push(built.note);
  }
  return { filters, notes };
}
