// src/app/api/export/route.ts
export const runtime = "nodejs";
export const dynamic = "force-dynamic";

import { summaryToCsv, tableToCsv, toCsvBytes } from "@/lib/export";
import { materialize } from "@/lib/filters";
import { fail, readJson, session } from "@/lib/http";
import { exportBodySchema } from "@/lib/schemas";

const FILE_NAMES = { view: "filtered_data.csv", summary: "summary_statistics.csv" } as const;

export async function POST(req: Request) {
  try {
    const { filters, kind } = await readJson(req, exportBodySchema);
    const csv = kind === "view"
      ? tableToCsv(materialize(session.view(filters).view))
      : summaryToCsv(session.summary(filters));
    console.info(`[export] ${FILE_NAMES[kind]} (${csv.length} chars)`);
    return new Response(toCsvBytes(csv), {
      status: 200,
      headers: {
        "Content-Type": "text/csv; charset=utf-8",
        "Content-Disposition": `attachment; filename="${FILE_NAMES[kind]}"`,
      },
    });
  } catch (e) {
    return fail("export", e);
  }
}
