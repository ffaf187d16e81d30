// src/lib/export.ts
import Papa from "papaparse";
import { formatCell } from "./literals";
import type { SummaryTable, Table } from "./types";

export function tableToCsv(table: Table): string {
  const fields = table.columns.map((c) => c.name);
  const data = Array.from({ length: table.rowCount }, (_, r) =>
    table.columns.map((c) => formatCell(c.values[r], c.type)),
  );
  return Papa.unparse({ fields, data }, { newline: "\n" });
}

/** One row per source column; statistics that do not apply stay empty. */
export function summaryToCsv(summary: SummaryTable): string {
  const fields = ["Column", ...summary.statNames];
  const data = summary.rows.map((row) => [
    row.column,
    ...summary.statNames.map((s) => {
      const v = row.stats[s];
      if (v === undefined || v === null) return "";
      // only `top` carries a value of the column's own type
      return s === "top" ? formatCell(v, row.type) : formatCell(v, "integer");
    }),
  ]);
  return Papa.unparse({ fields, data }, { newline: "\n" });
}

export function toCsvBytes(csv: string) {
  return new TextEncoder().encode(`${csv}\n`);
}
