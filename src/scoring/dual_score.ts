import type { OverallBias, SignalCategory } from "../domain/types";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../engine/config";
import { assertNever } from "../util/errors";
import { clip, clipScore } from "../util/math";
import type { ClusterResult } from "./cluster_evaluator";

export type ScoringConfig = EngineConfig["scoring"];

export interface KeyFactor {
  clusterId: string;
  category: SignalCategory;
  label: string;
  strength: number;
}

export interface DualScore {
  opportunityScore: number;
  sellRiskScore: number;
  /** opportunityScore - sellRiskScore */
  differential: number;
  overallBias: OverallBias;
  confidence: number;
  triggeredClusters: number;
  keyFactors: KeyFactor[];
}

/** Cluster results together with the score derived from them. */
export interface ScoreCard {
  clusters: ClusterResult[];
  score: DualScore;
}

export function scoreClusters(
  results: readonly ClusterResult[],
  categoryMaxWeights: Record<SignalCategory, number>,
  config: ScoringConfig = DEFAULT_ENGINE_CONFIG.scoring
): DualScore {
  const opportunityScore = categoryScore(
    results,
    "opportunity",
    categoryMaxWeights.opportunity,
    config.epsilon
  );
  const sellRiskScore = categoryScore(
    results,
    "sell_risk",
    categoryMaxWeights.sell_risk,
    config.epsilon
  );
  const differential = opportunityScore - sellRiskScore;

  return {
    opportunityScore,
    sellRiskScore,
    differential,
    overallBias: determineBias(differential, config.bias),
    confidence: computeConfidence(results, differential, config),
    triggeredClusters: results.filter(r => r.triggered).length,
    keyFactors: extractKeyFactors(results, config),
  };
}

/**
 * 100 * sum(strength * weight) / (sum(weight) * heaviest weight), over triggered clusters.
 * Normalizing by the heaviest cluster lets one maximal cluster saturate the score.
 */
export function categoryScore(
  results: readonly ClusterResult[],
  category: SignalCategory,
  maxWeight: number,
  epsilon: number
): number {
  let raw = 0;
  let totalWeight = 0;
  for (const r of results) {
    if (!r.triggered || r.category !== category) continue;
    raw += r.strength * r.weight;
    totalWeight += r.weight;
  }
  if (totalWeight === 0) return 0;
  return clipScore((100 * raw) / Math.max(totalWeight * maxWeight, epsilon));
}

export function determineBias(
  differential: number,
  thresholds: ScoringConfig["bias"]
): OverallBias {
  if (differential >= thresholds.strongBuy) return "STRONG_BUY";
  if (differential >= thresholds.buy) return "BUY";
  if (differential <= thresholds.strongSell) return "STRONG_SELL";
  if (differential <= thresholds.sell) return "SELL";
  return "HOLD";
}

/** STRONG_* calls fall back one notch; everything else is unchanged. */
export function demoteBias(bias: OverallBias): OverallBias {
  switch (bias) {
    case "STRONG_BUY":
      return "BUY";
    case "STRONG_SELL":
      return "SELL";
    case "BUY":
    case "HOLD":
    case "SELL":
      return bias;
    default:
      return assertNever(bias, "overall bias");
  }
}

/**
 * Weighted blend of average triggered strength, share of clusters triggered and the
 * size of the opportunity/sell-risk gap. Zero when nothing triggered.
 */
export function computeConfidence(
  results: readonly ClusterResult[],
  differential: number,
  config: ScoringConfig
): number {
  const triggered = results.filter(r => r.triggered);
  if (triggered.length === 0 || results.length === 0) return 0;

  const avgStrength =
    triggered.reduce((acc, r) => acc + r.strength, 0) / triggered.length;
  const share = triggered.length / results.length;
  const gap = clip(Math.abs(differential) / 100, 0, 1);
  const w = config.confidenceWeights;
  const totalWeight = w.strength + w.count + w.differential;
  if (totalWeight === 0) return 0;

  return clipScore(
    (100 * (w.strength * avgStrength + w.count * share + w.differential * gap)) /
      totalWeight
  );
}

export function extractKeyFactors(
  results: readonly ClusterResult[],
  config: ScoringConfig
): KeyFactor[] {
  const factors: KeyFactor[] = [];
  for (const r of results) {
    if (!r.triggered || r.strength <= config.keyFactorMinStrength) continue;
    for (const label of r.signals.slice(0, config.signalsPerKeyFactorCluster)) {
      factors.push({
        clusterId: r.clusterId,
        category: r.category,
        label,
        strength: r.strength,
      });
    }
  }
  // stable sort keeps catalog order among equal strengths
  return factors
    .sort((a, b) => b.strength - a.strength)
    .slice(0, config.maxKeyFactors);
}
