// src/lib/parse.ts
import fs from "node:fs";
import path from "node:path";
import Papa from "papaparse";
import { ParseError, ResourceNotFoundError } from "./errors";
import { isExactInteger, isIntegerLiteral, isMissingToken, parseBoolean, parseNumber } from "./literals";
import type { Column, Table } from "./types";

const utf8 = new TextDecoder("utf-8", { fatal: true });

function decode(input: Uint8Array | string): string {
  if (typeof input === "string") return input;
  try {
    return utf8.decode(input);
  } catch (e) {
    throw new ParseError("File is not valid UTF-8 text", { cause: e });
  }
}

/** "Unnamed: i" for blank headers, "name.1", "name.2" ... for repeats. */
function headerNames(raw: string[]): string[] {
  const seen = new Set<string>();
  return raw.map((h, i) => {
    const base = h.trim() === "" ? `Unnamed: ${i}` : h;
    let name = base;
    for (let k = 1; seen.has(name); k++) name = `${base}.${k}`;
    seen.add(name);
    return name;
  });
}

/** Types a column of raw literals the same way the inference step reads numbers. */
export function typeColumn(name: string, raw: (string | null)[]): Column {
  const present = raw.filter((v): v is string => v !== null);
  if (present.length === 0) {
    return { name, type: raw.length ? "float" : "text", values: raw.map(() => null) };
  }

  const nums = present.map(parseNumber);
  if (nums.every((n) => n !== null)) {
    if (!present.every(isIntegerLiteral)) {
      return { name, type: "float", values: raw.map((v) => (v === null ? null : parseNumber(v))) };
    }
    // integers past 2^53 stay text so they are written back unchanged
    if (present.every(isExactInteger)) {
      return { name, type: "integer", values: raw.map((v) => (v === null ? null : parseNumber(v))) };
    }
    return { name, type: "text", values: raw };
  }

  if (present.every((v) => parseBoolean(v) !== null)) {
    return { name, type: "boolean", values: raw.map((v) => (v === null ? null : parseBoolean(v))) };
  }

  return { name, type: "text", values: raw };
}

const isBlankRecord = (rec: string[]) => rec.length === 1 && rec[0].trim() === "";

/** Lines a record spans: its own line plus any newlines quoted inside its fields. */
const linesOf = (rec: string[]) => 1 + rec.reduce((n, f) => n + (f.match(/\n/g)?.length ?? 0), 0);

/**
 * Comma-separated, header row first, UTF-8. Empty lines are skipped; a line of
 * bare delimiters is a row whose every value is missing.
 */
export function parseCsv(input: Uint8Array | string): Table {
  const text = decode(input);
  const res = Papa.parse<string[]>(text, { header: false, delimiter: ",", skipEmptyLines: false });

  const fatal = res.errors.find((e) => e.type === "Quotes");
  if (fatal) {
    throw new ParseError(`Could not read file: ${fatal.message} (row ${fatal.row ?? "?"})`);
  }

  const records: { rec: string[]; line: number }[] = [];
  let line = 1;
  for (const rec of res.data) {
    if (!isBlankRecord(rec)) records.push({ rec, line });
    line += linesOf(rec);
  }

  const [first, ...rows] = records;
  const header = first?.rec;
  if (!header || header.length === 0 || (header.length === 1 && header[0].trim() === "")) {
    throw new ParseError("No columns to parse from file");
  }

  const names = headerNames(header);
  const raw: (string | null)[][] = names.map(() => []);
  for (const { rec, line: at } of rows) {
    if (rec.length > names.length) {
      throw new ParseError(`Expected ${names.length} fields in line ${at}, saw ${rec.length}`);
    }
    for (let c = 0; c < names.length; c++) {
      const cell = c < rec.length ? rec[c] : "";
      raw[c].push(isMissingToken(cell) ? null : cell);
    }
  }

  const columns = names.map((name, c) => typeColumn(name, raw[c]));
  return { columns, rowCount: rows.length };
}

export function readNamedDataset(dir: string, name: string): Buffer {
  const file = path.join(dir, path.basename(name));
  try {
    return fs.readFileSync(file);
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") throw new ResourceNotFoundError(name);
    throw new ParseError(`Could not read ${name}`, { cause: e });
  }
}
