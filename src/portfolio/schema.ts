import { z } from "zod";
import { BucketLimitsSchema, type BucketLimits } from "../engine/config";
import { configurationErrorFromZod } from "../util/errors";
import type { PositionInput } from "./types";

export const PositionInputSchema = z.object({
  ticker: z
    .string()
    .trim()
    .min(1)
    .transform(t => t.toUpperCase()),
  marketValue: z.number().finite().min(0),
  weight: z.number().finite().min(0).max(1),
  bucket: z.string().trim().min(1),
  profile: z.string().trim().default("unknown"),
  storyTags: z.array(z.string().trim().min(1)).default([]),
});

export const PositionListSchema = z.array(PositionInputSchema);

export function parsePositions(raw: unknown): PositionInput[] {
  const parsed = PositionListSchema.safeParse(raw);
  if (!parsed.success) {
    throw configurationErrorFromZod("positions", parsed.error);
  }
  return parsed.data.map(p => ({ ...p, storyTags: dedupe(p.storyTags) }));
}

export function parseBucketLimits(raw: unknown): BucketLimits {
  const parsed = BucketLimitsSchema.safeParse(raw);
  if (!parsed.success) {
    throw configurationErrorFromZod("bucket limits", parsed.error);
  }
  return parsed.data;
}

/**
 * Derives weights from market values when a caller only has values.
 */
export function withWeightsFromMarketValue(
  positions: readonly Omit<PositionInput, "weight">[]
): PositionInput[] {
  const total = positions.reduce((acc, p) => acc + p.marketValue, 0);
  return positions.map(p => ({
    ...p,
    weight: total > 0 ? p.marketValue / total : 0,
  }));
}

function dedupe(values: readonly string[]): string[] {
  return [...new Set(values)];
}
