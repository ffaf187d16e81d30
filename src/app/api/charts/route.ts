// src/app/api/charts/route.ts
export const runtime = "nodejs";
export const dynamic = "force-dynamic";

import { buildChart } from "@/lib/charts";
import { fail, ok, readJson, session } from "@/lib/http";
import { chartBodySchema } from "@/lib/schemas";

export async function POST(req: Request) {
  try {
    const { filters, chart } = await readJson(req, chartBodySchema);
    return ok(buildChart(session.sample(filters), chart));
  } catch (e) {
    return fail("charts", e);
  }
}
