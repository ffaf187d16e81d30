// src/lib/schemas.ts
import { z } from "zod";

const selectionValue = z.union([z.string(), z.number(), z.boolean()]);

export const filterInputSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("categorical"),
    column: z.string().min(1),
    values: z.array(selectionValue).optional(),
  }),
  z.object({
    kind: z.literal("range"),
    column: z.string().min(1),
    min: z.number().finite().optional(),
    max: z.number().finite().optional(),
  }),
]);

const filters = z.array(filterInputSchema).default([]);

export const loadBodySchema = z.union([
  z.object({ sample: z.literal(true), name: z.string().min(1).optional() }),
  z.object({ name: z.string().min(1), content: z.string() }),
]);

export const viewBodySchema = z.object({ filters });

export const chartRequestSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("distribution"), column: z.string().min(1), bins: z.number().int().min(1).max(200).optional() }),
  z.object({ type: z.literal("breakdown"), column: z.string().min(1), limit: z.number().int().min(1).optional() }),
  z.object({ type: z.literal("relationship"), x: z.string().min(1), y: z.string().min(1), color: z.string().min(1).optional() }),
]);

export const chartBodySchema = z.object({ filters, chart: chartRequestSchema });

export const exportBodySchema = z.object({ filters, kind: z.enum(["view", "summary"]).default("view") });
