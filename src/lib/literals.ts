// src/lib/literals.ts
import type { CellValue, SemanticType } from "./types";

/** ======================= Missing tokens ======================= */

export const MISSING_TOKENS: ReadonlySet<string> = new Set([
  "", "NA", "N/A", "n/a", "NaN", "nan", "-NaN", "-nan", "null", "NULL", "None",
  "#N/A", "#NA", "<NA>", "-1.#IND", "1.#IND", "-1.#QNAN", "1.#QNAN", "#N/A N/A",
]);

export function isMissingToken(raw: string) {
  return MISSING_TOKENS.has(raw);
}

/** ======================= Numbers & booleans ======================= */

const NUMERIC_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INTEGER_RE = /^[+-]?\d+$/;

export function parseNumber(raw: string): number | null {
  const s = raw.trim();
  if (!NUMERIC_RE.test(s)) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

export function isIntegerLiteral(raw: string) {
  return INTEGER_RE.test(raw.trim());
}

/** Integer literal that a JS number holds exactly (|n| <= 2^53 - 1). */
export function isExactInteger(raw: string) {
  return isIntegerLiteral(raw) && Number.isSafeInteger(Number(raw.trim()));
}

const TRUE_LITERALS = new Set(["true", "True", "TRUE"]);
const FALSE_LITERALS = new Set(["false", "False", "FALSE"]);

export function parseBoolean(raw: string): boolean | null {
  const s = raw.trim();
  if (TRUE_LITERALS.has(s)) return true;
  if (FALSE_LITERALS.has(s)) return false;
  return null;
}

/** ======================= Dates ======================= */

const MONTHS = [
  "january", "february", "march", "april", "may", "june",
  "july", "august", "september", "october", "november", "december",
];

function monthIndex(name: string) {
  const key = name.toLowerCase().replace(/\.$/, "");
  if (key.length < 3) return -1;
  return MONTHS.findIndex((m) => m === key || (key.length === 3 && m.startsWith(key)) || (key === "sept" && m === "september"));
}

const ISO_RE = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?\s*(Z|[+-]\d{2}:?\d{2})?)?$/;
const YMD_SLASH_RE = /^(\d{4})\/(\d{1,2})\/(\d{1,2})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const MDY_SLASH_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;
const DAY_MONTH_RE = /^(\d{1,2})\s+([A-Za-z]{3,9}\.?),?\s+(\d{4})$/;
const MONTH_DAY_RE = /^([A-Za-z]{3,9}\.?)\s+(\d{1,2}),?\s+(\d{4})$/;

type DateParts = { y: number; mo: number; d: number; h?: number; mi?: number; s?: number; ms?: number; offsetMin?: number };

function toNumberOr(raw: string | undefined, fallback: number) {
  return raw === undefined ? fallback : Number(raw);
}

function buildDate(p: DateParts): Date | null {
  const { y, mo, d } = p;
  const h = p.h ?? 0, mi = p.mi ?? 0, s = p.s ?? 0, ms = p.ms ?? 0;
  if (mo < 1 || mo > 12 || d < 1 || d > 31 || h > 23 || mi > 59 || s > 59) return null;
  const t = Date.UTC(y, mo - 1, d, h, mi, s, ms);
  const probe = new Date(t);
  // reject rolled-over dates such as Feb 30
  if (probe.getUTCFullYear() !== y || probe.getUTCMonth() !== mo - 1 || probe.getUTCDate() !== d) return null;
  return new Date(t - (p.offsetMin ?? 0) * 60_000);
}

function parseOffset(raw: string | undefined): number {
  if (!raw || raw === "Z") return 0;
  const sign = raw.startsWith("-") ? -1 : 1;
  const digits = raw.slice(1).replace(":", "");
  return sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2, 4)));
}

/** Naive values are read as UTC. */
export function parseDate(raw: string): Date | null {
  const s = raw.trim();
  let m = ISO_RE.exec(s);
  if (m) {
    const frac = m[7] ? Math.round(Number(`0.${m[7]}`) * 1000) : 0;
    return buildDate({
      y: Number(m[1]), mo: Number(m[2]), d: Number(m[3]),
      h: toNumberOr(m[4], 0), mi: toNumberOr(m[5], 0), s: toNumberOr(m[6], 0), ms: frac,
      offsetMin: parseOffset(m[8]),
    });
  }
  m = YMD_SLASH_RE.exec(s);
  if (m) {
    return buildDate({ y: Number(m[1]), mo: Number(m[2]), d: Number(m[3]), h: toNumberOr(m[4], 0), mi: toNumberOr(m[5], 0), s: toNumberOr(m[6], 0) });
  }
  m = MDY_SLASH_RE.exec(s);
  if (m) {
    return buildDate({ y: Number(m[3]), mo: Number(m[1]), d: Number(m[2]), h: toNumberOr(m[4], 0), mi: toNumberOr(m[5], 0), s: toNumberOr(m[6], 0) });
  }
  m = DAY_MONTH_RE.exec(s);
  if (m) {
    const mo = monthIndex(m[2]);
    return mo < 0 ? null : buildDate({ y: Number(m[3]), mo: mo + 1, d: Number(m[1]) });
  }
  m = MONTH_DAY_RE.exec(s);
  if (m) {
    const mo = monthIndex(m[1]);
    return mo < 0 ? null : buildDate({ y: Number(m[3]), mo: mo + 1, d: Number(m[2]) });
  }
  return null;
}

/** ======================= Rendering & identity ======================= */

const pad = (n: number, w = 2) => String(n).padStart(w, "0");

export function formatDate(d: Date) {
  const date = `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
  const h = d.getUTCHours(), mi = d.getUTCMinutes(), s = d.getUTCSeconds(), ms = d.getUTCMilliseconds();
  if (h === 0 && mi === 0 && s === 0 && ms === 0) return date;
  const time = `${pad(h)}:${pad(mi)}:${pad(s)}`;
  return ms ? `${date} ${time}.${pad(ms, 3)}` : `${date} ${time}`;
}

export function formatNumber(n: number, type: SemanticType = "float") {
  const s = String(n);
  if (type === "float" && Number.isInteger(n) && !/e/i.test(s)) return `${s}.0`;
  return s;
}

export function formatCell(v: CellValue, type?: SemanticType): string {
  if (v === null) return "";
  if (v instanceof Date) return formatDate(v);
  if (typeof v === "boolean") return v ? "True" : "False";
  if (typeof v === "number") return formatNumber(v, type ?? (Number.isInteger(v) ? "integer" : "float"));
  return v;
}

/** Identity key: Dates compare by instant, other values by type and value. */
export function cellKey(v: CellValue): string {
  if (v === null) return "null";
  if (v instanceof Date) return `d:${v.getTime()}`;
  return `${typeof v}:${String(v)}`;
}
