import { describe, it, expect } from "vitest";
import { FilterSpecError } from "./errors";
import {
  applyFilters, buildCategoricalFilter, buildRangeFilter, categoricalOptions, materialize, resolveFilters,
} from "./filters";
import { parseCsv } from "./parse";
import type { FilterSpec, Table } from "./types";

// city: Paris, Rome, null, Paris, Oslo · temp: 10, 20, 30, 40, null
const cities = (): Table => parseCsv("city,temp,flag\nParis,10,True\nRome,20,False\n,30,True\nParis,40,False\nOslo,,True");

describe("applyFilters", () => {
  it("is a no-op for a categorical filter allowing every observed value", () => {
    const t = cities();
    const v = applyFilters(t, [buildCategoricalFilter(t, "flag")]);
    expect(v.rowIndices).toEqual([0, 1, 2, 3, 4]);
    expect(materialize(v)).toEqual(t);
  });

  it("never matches null in a categorical filter", () => {
    const t = cities();
    expect(applyFilters(t, [buildCategoricalFilter(t, "city")]).rowIndices).toEqual([0, 1, 3, 4]);
  });

  it("returns no rows for an empty allowed set", () => {
    const t = cities();
    expect(applyFilters(t, [{ kind: "categorical", column: "city", allowed: [] }]).rowIndices).toEqual([]);
  });

  it("keeps range bounds inclusive and drops nulls", () => {
    const t = cities();
    expect(applyFilters(t, [{ kind: "range", column: "temp", min: 20, max: 30 }]).rowIndices).toEqual([1, 2]);
    expect(applyFilters(t, [{ kind: "range", column: "temp", min: -100, max: 100 }]).rowIndices).toEqual([0, 1, 2, 3]);
  });

  it("gives the same rows whatever the filter order", () => {
    const t = cities();
    const a: FilterSpec = { kind: "categorical", column: "city", allowed: ["Paris", "Rome"] };
    const b: FilterSpec = { kind: "range", column: "temp", min: 10, max: 30 };
    const ab = applyFilters(t, [a, b]).rowIndices;
    expect(ab).toEqual([0, 1]);
    expect(applyFilters(t, [b, a]).rowIndices).toEqual(ab);
  });

  it("keeps surviving rows in source order", () => {
    const t = cities();
    const { rowIndices } = applyFilters(t, [{ kind: "categorical", column: "city", allowed: ["Oslo", "Paris"] }]);
    expect(rowIndices).toEqual([0, 3, 4]);
  });

  it("materializes the surviving rows", () => {
    const t = cities();
    const out = materialize(applyFilters(t, [{ kind: "categorical", column: "city", allowed: ["Rome"] }]));
    expect(out.rowCount).toBe(1);
    expect(out.columns.map((c) => c.values[0])).toEqual(["Rome", 20, false]);
  });

  it("rejects unknown columns and ranges over text", () => {
    const t = cities();
    expect(() => applyFilters(t, [{ kind: "categorical", column: "nope", allowed: [] }])).toThrow(FilterSpecError);
    expect(() => applyFilters(t, [{ kind: "range", column: "city", min: 0, max: 1 }])).toThrow(FilterSpecError);
  });
});

describe("buildCategoricalFilter", () => {
  it("resolves a selection against observed values", () => {
    const t = cities();
    expect(buildCategoricalFilter(t, "city", ["Paris", "Lima"])).toEqual({
      kind: "categorical", column: "city", allowed: ["Paris"],
    });
    expect(buildCategoricalFilter(t, "flag", ["True"])).toEqual({ kind: "categorical", column: "flag", allowed: [true] });
    expect(buildCategoricalFilter(t, "temp", [20, "40"])).toEqual({ kind: "categorical", column: "temp", allowed: [20, 40] });
  });

  it("matches dates by their text form", () => {
    const t: Table = {
      columns: [{ name: "d", type: "datetime", values: [new Date(Date.UTC(2024, 0, 5)), new Date(Date.UTC(2024, 0, 6))] }],
      rowCount: 2,
    };
    const f = buildCategoricalFilter(t, "d", ["2024-01-05"]);
    expect(applyFilters(t, [f]).rowIndices).toEqual([0]);
  });
});

describe("categoricalOptions", () => {
  it("lists distinct values in first-seen order and flags long lists", () => {
    expect(categoricalOptions(cities(), "city", 2)).toEqual({ values: ["Paris", "Rome", "Oslo"], tooMany: true });
    expect(categoricalOptions(cities(), "city").tooMany).toBe(false);
  });
});

describe("buildRangeFilter", () => {
  it("defaults to the column's own bounds", () => {
    expect(buildRangeFilter(cities(), "temp")).toEqual({
      ok: true, filter: { kind: "range", column: "temp", min: 10, max: 40 },
    });
  });

  it("is not constructed for a constant column", () => {
    const t = parseCsv("x\n10\n10\n10");
    expect(buildRangeFilter(t, "x")).toEqual({ ok: false, note: "All values in 'x' are 10" });
  });

  it("is not constructed for a column without values", () => {
    expect(buildRangeFilter(parseCsv("a,b\n1,\n2,"), "b")).toEqual({ ok: false, note: "'b' has no values to filter" });
  });

  it("rejects inverted bounds", () => {
    expect(() => buildRangeFilter(cities(), "temp", { min: 30, max: 20 })).toThrow(FilterSpecError);
  });
});

describe("resolveFilters", () => {
  it("turns request inputs into filters and notes", () => {
    const t = parseCsv("x,y,c\n10,1,a\n10,2,b\n10,3,a");
    const { filters, notes } = resolveFilters(t, [
      { kind: "range", column: "x" },
      { kind: "range", column: "y", min: 2 },
      { kind: "categorical", column: "c" },
    ]);
    expect(notes).toEqual(["All values in 'x' are 10"]);
    expect(filters).toEqual([
      { kind: "range", column: "y", min: 2, max: 3 },
      { kind: "categorical", column: "c", allowed: ["a", "b"] },
    ]);
    expect(applyFilters(t, filters).rowIndices).toEqual([1, 2]);
  });
});
