import { beforeEach, describe, it, expect, vi } from "vitest";
import { inferTypes } from "./infer";
import { profileMissing } from "./stats";
import type { CellValue, Column, Table } from "./types";

const text = (name: string, values: (string | null)[]): Column => ({ name, type: "text", values });
const tableOf = (...columns: Column[]): Table => ({ columns, rowCount: columns[0]?.values.length ?? 0 });

describe("inferTypes", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
  });

  it("converts a fully numeric text column", () => {
    const { table, changes } = inferTypes(tableOf(text("col", ["1", "2", "3", "4", "5"])));
    expect(changes).toEqual(["col → numeric"]);
    expect(table.columns[0].type).toBe("integer");
    expect(table.columns[0].values).toEqual([1, 2, 3, 4, 5]);
  });

  it("leaves a column at 4/5 parsed as text without a log entry", () => {
    const source = tableOf(text("col", ["1", "2", "x", "4", "5"]));
    const { table, changes } = inferTypes(source);
    expect(changes).toEqual([]);
    expect(table.columns[0]).toBe(source.columns[0]);
  });

  it("leaves integers a number cannot hold exactly as text", () => {
    const source = tableOf(text("id", ["9007199254740993", "1"]));
    const { table, changes } = inferTypes(source);
    expect(changes).toEqual([]);
    expect(table.columns[0]).toBe(source.columns[0]);
  });

  it("requires strictly more than 0.9 parsed", () => {
    const nine = ["1", "2", "3", "4", "5", "6", "7", "8", "9", "x"];
    expect(inferTypes(tableOf(text("c", nine))).changes).toEqual([]);

    const ten = [...nine, "10"];
    const { table, changes } = inferTypes(tableOf(text("c", ten)));
    expect(changes).toEqual(["c → numeric"]);
    expect(table.columns[0].values[9]).toBeNull();
    expect(table.columns[0].type).toBe("integer");
  });

  it("converts the three-row scenario and reports its one missing value", () => {
    const { table, changes } = inferTypes(tableOf(text("a", ["1", "2", null]), text("b", ["x", "y", "z"])));
    expect(changes).toEqual(["a → numeric"]);
    expect(table.columns[0].values).toEqual([1, 2, null]);
    expect(table.columns[1].type).toBe("text");
    expect(profileMissing(table)).toEqual([{ column: "a", missingCount: 1, missingPercent: 33.3 }]);
  });

  it("skips columns that are more than half missing", () => {
    expect(inferTypes(tableOf(text("s", ["1", null, null]))).changes).toEqual([]);
    expect(inferTypes(tableOf(text("s", ["1", "2", null, null]))).changes).toEqual(["s → numeric"]);
  });

  it("prefers numeric over datetime and falls back to datetime", () => {
    expect(inferTypes(tableOf(text("y", ["2020", "2021", "2022"]))).changes).toEqual(["y → numeric"]);

    const { table, changes } = inferTypes(tableOf(text("d", ["2024-01-01", "2024-02-01", "2024-03-01"])));
    expect(changes).toEqual(["d → datetime"]);
    expect(table.columns[0].type).toBe("datetime");
    const times = table.columns[0].values.map((v: CellValue) => (v instanceof Date ? v.getTime() : v));
    expect(times).toEqual([Date.UTC(2024, 0, 1), Date.UTC(2024, 1, 1), Date.UTC(2024, 2, 1)]);
  });

  it("marks fractional conversions as float", () => {
    const { table } = inferTypes(tableOf(text("f", ["1.5", "2", "3"])));
    expect(table.columns[0].type).toBe("float");
  });

  it("does not touch non-text columns or the input table", () => {
    const source = tableOf({ name: "n", type: "integer", values: [1, 2] }, text("t", ["3", "4"]));
    const { table } = inferTypes(source);
    expect(table).not.toBe(source);
    expect(table.columns[0]).toBe(source.columns[0]);
    expect(source.columns[1].type).toBe("text");
    expect(source.columns[1].values).toEqual(["3", "4"]);
  });

  it("honours custom thresholds", () => {
    const { changes } = inferTypes(tableOf(text("col", ["1", "2", "x", "4", "5"])), {
      minSuccessRatio: 0.7,
      maxMissingRatio: 0.5,
    });
    expect(changes).toEqual(["col → numeric"]);
  });

  it("converts nothing in an empty table", () => {
    expect(inferTypes(tableOf(text("e", []))).changes).toEqual([]);
  });
});
