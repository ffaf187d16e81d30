// src/lib/http.ts
import { NextResponse } from "next/server";
import { ZodError, type ZodType, type ZodTypeDef } from "zod";
import { loadConfig } from "./config";
import { InsightsError } from "./errors";
import { DatasetSession } from "./session";

/** The one dataset cache the route handlers share. */
export const session = new DatasetSession(loadConfig());

export function ok<T>(data: T, status = 200) { return NextResponse.json(data, { status }); }
export function err(message: string, status = 400) { return NextResponse.json({ error: message }, { status }); }

export async function readJson<T>(req: Request, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
  const body: unknown = await req.json().catch(() => ({}));
  return schema.parse(body);
}

export function fail(tag: string, e: unknown) {
  if (e instanceof ZodError) {
    const issue = e.issues[0];
    return err(issue ? `Invalid request: ${issue.path.join(".") || "body"} ${issue.message}` : "Invalid request.");
  }
  if (e instanceof InsightsError) {
    if (e.status >= 500) console.error(`[${tag}] ${e.message}`, e);
    return err(e.message, e.status);
  }
  console.error(`[${tag}] Unexpected error`, e);
  return err("Unexpected error", 500);
}
