// src/lib/types.ts
export type SemanticType = "integer" | "float" | "text" | "datetime" | "boolean";

export type CellValue = number | string | boolean | Date | null;

export type Column = { name: string; type: SemanticType; values: readonly CellValue[] };

export type Table = { columns: readonly Column[]; rowCount: number };

export type MissingValueRow = { column: string; missingCount: number; missingPercent: number };
export type MissingValueReport = MissingValueRow[];

export type FilterSpec =
  | { kind: "categorical"; column: string; allowed: readonly CellValue[] }
  | { kind: "range"; column: string; min: number; max: number };

/** Surviving source row indices, always in source order. */
export type View = { source: Table; filters: readonly FilterSpec[]; rowIndices: readonly number[] };

export type SampleView = {
  view: View;
  rowIndices: readonly number[];
  seed: number;
  cap: number;
  sampled: boolean;
};

export type ColumnClassification = { numeric: string[]; categorical: string[] };

export type StatName =
  | "count" | "unique" | "top" | "freq"
  | "mean" | "std" | "min" | "25%" | "50%" | "75%" | "max";

export type SummaryRow = {
  column: string;
  type: SemanticType;
  stats: Partial<Record<StatName, CellValue>>;
};

export type SummaryTable = { statNames: StatName[]; rows: SummaryRow[] };

export type ColumnInfo = { name: string; type: SemanticType; nonNullCount: number; sampleValue: string };

export type ViewStats = { rowCount: number; sourceRowCount: number; percent: number };

export type InferenceResult = { table: Table; changes: string[] };
