import { describe, it, expect } from "vitest";
import { summaryToCsv, tableToCsv, toCsvBytes } from "./export";
import { applyFilters } from "./filters";
import { inferTypes } from "./infer";
import { parseCsv } from "./parse";
import { summarize } from "./stats";
import type { Table } from "./types";

describe("tableToCsv", () => {
  it("writes every type in a form the parser reads back", () => {
    const t = parseCsv('id,name,score,ok\n1,"Smith, J",2.5,True\n2,Ann,3,False');
    const csv = tableToCsv(t);
    expect(csv).toBe('id,name,score,ok\n1,"Smith, J",2.5,True\n2,Ann,3.0,False');
    expect(parseCsv(csv)).toEqual(t);
  });

  it("writes large integer ids back unchanged", () => {
    expect(tableToCsv(inferTypes(parseCsv("id\n9007199254740993")).table)).toBe("id\n9007199254740993");
  });

  it("leaves nulls empty and renders dates", () => {
    const t: Table = {
      columns: [
        { name: "a", type: "integer", values: [1, null] },
        { name: "d", type: "datetime", values: [new Date(Date.UTC(2024, 0, 5)), new Date(Date.UTC(2024, 0, 5, 8, 30))] },
      ],
      rowCount: 2,
    };
    expect(tableToCsv(t)).toBe("a,d\n1,2024-01-05\n,2024-01-05 08:30:00");
  });
});

describe("summaryToCsv", () => {
  it("writes one row per column with inapplicable statistics empty", () => {
    const t: Table = {
      columns: [
        { name: "x", type: "integer", values: [1, 2, 3, 4] },
        { name: "c", type: "text", values: ["a", "b", "a", null] },
      ],
      rowCount: 4,
    };
    expect(summaryToCsv(summarize(applyFilters(t, [])))).toBe([
      "Column,count,unique,top,freq,mean,std,min,25%,50%,75%,max",
      "x,4,,,,2.5,1.29,1,1.75,2.5,3.25,4",
      "c,3,2,a,2,,,,,,,",
    ].join("\n"));
  });
});

describe("toCsvBytes", () => {
  it("encodes UTF-8 with a trailing newline", () => {
    expect(new TextDecoder().decode(toCsvBytes("a\nü"))).toBe("a\nü\n");
  });
});
