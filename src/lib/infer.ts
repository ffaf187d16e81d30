// src/lib/infer.ts
import { DEFAULT_CONFIG } from "./config";
import { isExactInteger, isIntegerLiteral, parseDate, parseNumber } from "./literals";
import type { CellValue, Column, InferenceResult, Table } from "./types";

export type InferenceThresholds = { minSuccessRatio: number; maxMissingRatio: number };

type Trial = { values: CellValue[]; parsed: number };

function trial(values: readonly CellValue[], parse: (raw: string) => CellValue): Trial {
  let parsed = 0;
  const out = values.map((v) => {
    if (v === null) return null;
    const p = parse(String(v));
    if (p !== null) parsed++;
    return p;
  });
  return { values: out, parsed };
}

function convertColumn(col: Column, t: InferenceThresholds): { column: Column; change: string } | null {
  const total = col.values.length;
  const nonNull = col.values.filter((v) => v !== null).length;
  if (total === 0 || nonNull === 0) return null;
  if ((total - nonNull) / total > t.maxMissingRatio) return null;

  const numeric = trial(col.values, parseNumber);
  const integral = col.values.every((v, i) => numeric.values[i] === null || isIntegerLiteral(String(v)));
  const exact = !integral || col.values.every((v, i) => numeric.values[i] === null || isExactInteger(String(v)));
  if (exact && numeric.parsed / nonNull > t.minSuccessRatio) {
    return {
      column: { name: col.name, type: integral ? "integer" : "float", values: numeric.values },
      change: `${col.name} → numeric`,
    };
  }

  const temporal = trial(col.values, parseDate);
  if (temporal.parsed / nonNull > t.minSuccessRatio) {
    return { column: { name: col.name, type: "datetime", values: temporal.values }, change: `${col.name} → datetime` };
  }

  return null;
}

/**
 * Upgrades text columns to numeric or datetime when nearly every present value
 * parses. Returns a new table; the input is left as it was.
 */
export function inferTypes(
  table: Table,
  thresholds: InferenceThresholds = DEFAULT_CONFIG,
): InferenceResult {
  const changes: string[] = [];
  const columns = table.columns.map((col) => {
    if (col.type !== "text") return col;
    const converted = convertColumn(col, thresholds);
    if (!converted) return col;
    changes.push(converted.change);
    console.info(`[infer] ${converted.change}`);
    return converted.column;
  });
  return { table: { columns, rowCount: table.rowCount }, changes };
}
