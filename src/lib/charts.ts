// src/lib/charts.ts
import { FilterSpecError } from "./errors";
import { findColumn } from "./filters";
import { formatCell } from "./literals";
import { histogram, isNumericType, mean, numbersOf, quantile, round, stdev, valueCounts } from "./stats";
import type { CellValue, Column, SampleView, View } from "./types";

export type ChartRequest =
  | { type: "distribution"; column: string; bins?: number }
  | { type: "breakdown"; column: string; limit?: number }
  | { type: "relationship"; x: string; y: string; color?: string };

const MAX_COLOR_CATEGORIES = 10;

function valuesIn(view: View, col: Column, rows: readonly number[] = view.rowIndices): CellValue[] {
  return rows.map((r) => col.values[r]);
}

function numericColumn(view: View, name: string): Column {
  const col = findColumn(view.source, name);
  if (!isNumericType(col.type)) throw new FilterSpecError(`'${name}' is not a numeric column`);
  return col;
}

const stat = (x: number) => (Number.isFinite(x) ? round(x, 2) : null);

// -------- builders --------

export function distribution(view: View, column: string, bins = 20) {
  const col = numericColumn(view, column);
  const nums = numbersOf(valuesIn(view, col));
  const { bins: centers, counts } = histogram(nums, bins);
  const sorted = [...nums].sort((a, b) => a - b);
  const m = mean(nums);
  return {
    column,
    data: centers.map((c, i) => ({ bin: c, count: counts[i] })),
    metrics: {
      mean: stat(m),
      median: stat(quantile(sorted, 0.5)),
      std: stat(stdev(nums, m)),
      range: sorted.length ? stat(sorted[sorted.length - 1] - sorted[0]) : null,
    },
  };
}

export function categoryBreakdown(view: View, column: string, limit = 20) {
  const col = findColumn(view.source, column);
  if (isNumericType(col.type)) throw new FilterSpecError(`'${column}' is not a categorical column`);
  const counts = valueCounts(valuesIn(view, col))
    .map((c, i) => ({ name: formatCell(c.value, col.type), count: c.count, i }))
    .sort((a, b) => b.count - a.count || a.i - b.i);
  return {
    column,
    data: counts.slice(0, limit).map(({ name, count }) => ({ name, count })),
    truncated: counts.length > limit,
  };
}

/** Points come from the sampled rows; the colour cardinality check uses the whole view. */
export function relationship(shown: SampleView, x: string, y: string, color?: string) {
  const { view } = shown;
  const xc = numericColumn(view, x);
  const yc = numericColumn(view, y);

  let colorCol: Column | null = null;
  let note: string | undefined;
  if (color) {
    const cc = findColumn(view.source, color);
    if (isNumericType(cc.type)) throw new FilterSpecError(`'${color}' is not a categorical column`);
    if (valueCounts(valuesIn(view, cc)).length <= MAX_COLOR_CATEGORIES) colorCol = cc;
    else note = `'${color}' has too many unique values for colouring. Showing without colour.`;
  }

  const points = shown.rowIndices
    .map((r) => ({
      x: xc.values[r],
      y: yc.values[r],
      ...(colorCol ? { color: formatCell(colorCol.values[r], colorCol.type) } : {}),
    }))
    .filter((p): p is { x: number; y: number; color?: string } => typeof p.x === "number" && typeof p.y === "number");

  return { x, y, color: colorCol?.name ?? null, points, sampled: shown.sampled, note };
}

export function buildChart(shown: SampleView, req: ChartRequest) {
  switch (req.type) {
    case "distribution": return distribution(shown.view, req.column, req.bins);
    case "breakdown": return categoryBreakdown(shown.view, req.column, req.limit);
    case "relationship": return relationship(shown, req.x, req.y, req.color);
  }
}
