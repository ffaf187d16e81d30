// src/app/api/view/route.ts
export const runtime = "nodejs";
export const dynamic = "force-dynamic";

import { materialize } from "@/lib/filters";
import { fail, ok, readJson, session } from "@/lib/http";
import { viewBodySchema } from "@/lib/schemas";
import { classifyColumns, head, viewStats } from "@/lib/stats";

const PREVIEW_ROWS = 100;

export async function POST(req: Request) {
  try {
    const { filters } = await readJson(req, viewBodySchema);
    const { view, notes } = session.view(filters);
    // classification follows the filtered data, not the source
    const { numeric, categorical } = classifyColumns(materialize(view));
    return ok({
      ...viewStats(view),
      notes,
      numericColumns: numeric,
      categoricalColumns: categorical,
      preview: head(view.source, PREVIEW_ROWS, view.rowIndices),
      truncated: view.rowIndices.length > PREVIEW_ROWS,
    });
  } catch (e) {
    return fail("view", e);
  }
}
