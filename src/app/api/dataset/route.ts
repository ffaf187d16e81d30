// src/app/api/dataset/route.ts
export const runtime = "nodejs";
export const dynamic = "force-dynamic";

import { err, fail, ok, readJson, session } from "@/lib/http";
import { loadBodySchema } from "@/lib/schemas";
import { categoricalOptions } from "@/lib/filters";
import { formatCell } from "@/lib/literals";
import type { DatasetSource, LoadedDataset } from "@/lib/session";
import { head, memoryBytes, round } from "@/lib/stats";

const PREVIEW_ROWS = 10;

async function sourceFrom(req: Request): Promise<DatasetSource | null> {
  const type = req.headers.get("content-type") ?? "";
  if (type.startsWith("multipart/form-data")) {
    const form = await req.formData();
    const file = form.get("file");
    if (!file || typeof file === "string") return null;
    return { kind: "upload", name: file.name, bytes: new Uint8Array(await file.arrayBuffer()) };
  }
  const body = await readJson(req, loadBodySchema);
  return "sample" in body ? { kind: "sample", name: body.name } : { kind: "upload", name: body.name, bytes: body.content };
}

/** Observed values per categorical column; an unset filter selects all of them. */
function filterOptions(ds: LoadedDataset, limit: number) {
  return ds.classification.categorical.map((column) => {
    const col = ds.table.columns.find((c) => c.name === column);
    const { values, tooMany } = categoricalOptions(ds.table, column, limit);
    return {
      column,
      tooMany,
      values: tooMany ? [] : values.map((v) => formatCell(v, col?.type)),
      distinct: values.length,
    };
  });
}

/** Upload a CSV (multipart `file` or JSON `{ name, content }`) or load the bundled sample. */
export async function POST(req: Request) {
  try {
    const source = await sourceFrom(req);
    if (!source) return err("Missing 'file' in form data.");

    const ds = session.load(source);
    return ok({
      token: ds.token,
      rowCount: ds.table.rowCount,
      columnCount: ds.table.columns.length,
      memoryKB: round(memoryBytes(ds.table) / 1024, 1),
      columns: ds.inventory,
      conversions: ds.changes,
      missing: ds.missing,
      numericColumns: ds.classification.numeric,
      categoricalColumns: ds.classification.categorical,
      filterOptions: filterOptions(ds, session.config.categoryOptionLimit),
      preview: head(ds.table, PREVIEW_ROWS),
    });
  } catch (e) {
    return fail("dataset", e);
  }
}
