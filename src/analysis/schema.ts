import { z } from "zod";
import { INDICATOR_KEYS } from "../domain/types";
import { configurationErrorFromZod } from "../util/errors";
import type { StockInput } from "./stock_cycle_analyzer";

const count = z.number().int().min(0);

export const HeadlineAggregateSchema = z
  .object({
    totalHeadlines: count,
    positiveHeadlines: count,
    newsRiskScore: z.number().min(0).max(100).default(0),
    capexMentions: count.default(0),
    positiveOutcomes: z.array(z.boolean()).default([]),
  })
  .refine(h => h.positiveHeadlines <= h.totalHeadlines, {
    message: "positiveHeadlines cannot exceed totalHeadlines",
    path: ["positiveHeadlines"],
  });

export const IndicatorSnapshotSchema = z.object({
  ticker: z
    .string()
    .trim()
    .min(1)
    .transform(t => t.toUpperCase()),
  lookbackDays: count,
  indicators: z.record(z.enum(INDICATOR_KEYS), z.number().nullable()),
});

export const StockInputSchema = z.object({
  snapshot: IndicatorSnapshotSchema,
  headlines: HeadlineAggregateSchema.optional(),
});

export function parseStockInputs(raw: unknown): StockInput[] {
  const parsed = z.array(StockInputSchema).safeParse(raw);
  if (!parsed.success) {
    throw configurationErrorFromZod("stock inputs", parsed.error);
  }
  return parsed.data;
}
