import type { CyclePhase } from "../domain/types";
import { normalizeTicker } from "../domain/types";
import { DEFAULT_ENGINE_CONFIG, type BucketLimits, type EngineConfig } from "../engine/config";
import type { StockCycleAnalysis } from "../analysis/stock_cycle_analyzer";
import { ConfigurationError } from "../util/errors";
import { getLogger } from "../util/logger";
import { clipScore } from "../util/math";
import type { BucketAggregate, BucketContributor, PositionInput } from "./types";

export type BucketConfig = EngineConfig["bucket"];

/**
 * Rolls weighted per-stock results up into one aggregate per bucket, in order of first
 * appearance. Weights are portfolio weights, not renormalized within the bucket.
 *
 *   P_b = sum(w_i * pressure_i)
 *   S_b = sum(w_i * phaseScore_i)
 *   B_b = sum(w_i * hasCritical_i) / sum(w_i)
 *   R_b = clip(clip(2 * P_b) * (1 + 0.8 * B_b))
 */
export function aggregateBuckets(
  positions: readonly PositionInput[],
  analyses: ReadonlyMap<string, StockCycleAnalysis>,
  limits: BucketLimits,
  config: BucketConfig = DEFAULT_ENGINE_CONFIG.bucket
): BucketAggregate[] {
  assertKnownBuckets(positions, limits);

  const grouped = new Map<string, PositionInput[]>();
  for (const position of positions) {
    const list = grouped.get(position.bucket) ?? [];
    list.push(position);
    grouped.set(position.bucket, list);
  }

  const logger = getLogger("portfolio/bucket_aggregator");
  const buckets = [...grouped.entries()].map(([bucket, members]) =>
    aggregateBucket(bucket, members, analyses, limitFor(limits, bucket) ?? 1, config)
  );
  logger.debug(
    {
      buckets: buckets.map(b => ({
        bucket: b.bucket,
        weight: b.weight,
        pressure: b.pressure,
        phase: b.phase,
        transitionRisk: b.transitionRisk,
      })),
    },
    "buckets aggregated"
  );
  return buckets;
}

export function aggregateBucket(
  bucket: string,
  positions: readonly PositionInput[],
  analyses: ReadonlyMap<string, StockCycleAnalysis>,
  limit: number,
  config: BucketConfig = DEFAULT_ENGINE_CONFIG.bucket
): BucketAggregate {
  const logger = getLogger("portfolio/bucket_aggregator");
  const weight = positions.reduce((acc, p) => acc + p.weight, 0);

  let pressure = 0;
  let phaseScore = 0;
  let criticalWeight = 0;
  const contributors: BucketContributor[] = [];

  for (const position of positions) {
    const analysis = analyses.get(normalizeTicker(position.ticker));
    if (!analysis) {
      if (bucket !== config.cashBucket) {
        logger.warn({ ticker: position.ticker, bucket }, "position has no cycle analysis");
      }
      continue;
    }
    const contribution = position.weight * analysis.cyclePressure;
    pressure += contribution;
    phaseScore += position.weight * phaseScoreOf(analysis.phase, config.phaseScores);
    if (analysis.criticalSignalsFired.length > 0) {
      criticalWeight += position.weight;
    }
    contributors.push({
      ticker: normalizeTicker(position.ticker),
      weight: position.weight,
      pressure: analysis.cyclePressure,
      contribution,
      phase: analysis.phase,
      criticalSignals: analysis.criticalSignalsFired,
    });
  }

  contributors.sort((a, b) => b.contribution - a.contribution);

  // Zero bucket weight leaves every sum at 0: neutral pressure, MID phase, no breadth
  const criticalBreadth = weight > 0 ? criticalWeight / weight : 0;
  const baseRisk = clipScore(config.pressureRiskScale * pressure);
  const riskMultiplier = 1 + config.criticalBreadthMultiplier * criticalBreadth;

  return {
    bucket,
    weight,
    limit,
    overage: Math.max(0, weight - limit),
    pressure,
    phaseScore,
    phase: phaseFromScore(phaseScore, config.phaseThresholds),
    criticalBreadth,
    baseRisk,
    riskMultiplier,
    transitionRisk: clipScore(baseRisk * riskMultiplier),
    contributors,
    topContributors: contributors.slice(0, config.topContributors),
  };
}

export function phaseScoreOf(
  phase: CyclePhase,
  scores: BucketConfig["phaseScores"]
): number {
  return scores[phase];
}

/** Maps a weighted phase score back onto the phase scale; shared by buckets and the portfolio. */
export function phaseFromScore(
  score: number,
  thresholds: BucketConfig["phaseThresholds"]
): CyclePhase {
  if (Number.isNaN(score)) return "MID";
  if (score < thresholds.earlyBelow) return "EARLY";
  if (score < thresholds.midBelow) return "MID";
  if (score < thresholds.lateBelow) return "LATE";
  if (score < thresholds.peakingBelow) return "PEAKING";
  return "DOWNTURN";
}

/** Own-key lookup, so names such as "constructor" never resolve to inherited members. */
export function limitFor(limits: BucketLimits, bucket: string): number | undefined {
  return Object.hasOwn(limits, bucket) ? limits[bucket] : undefined;
}

export function assertKnownBuckets(
  positions: readonly PositionInput[],
  limits: BucketLimits
): void {
  const unknown = [
    ...new Set(positions.map(p => p.bucket).filter(b => limitFor(limits, b) === undefined)),
  ];
  if (unknown.length > 0) {
    throw new ConfigurationError(
      "Unknown bucket",
      unknown.map(b => `no weight limit configured for bucket ${b}`)
    );
  }
}
