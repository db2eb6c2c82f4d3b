import type { CyclePhase, PortfolioMode } from "../domain/types";
import { isPeakingOrWorse, isPhaseAtMost, normalizeTicker } from "../domain/types";
import { DEFAULT_ENGINE_CONFIG, type BucketLimits, type EngineConfig } from "../engine/config";
import type { StockCycleAnalysis } from "../analysis/stock_cycle_analyzer";
import { ConfigurationError } from "../util/errors";
import { getLogger } from "../util/logger";
import { clipScore } from "../util/math";
import { assertKnownBuckets, limitFor, phaseFromScore, phaseScoreOf } from "./bucket_aggregator";
import type { BucketAggregate, PortfolioRiskResult, PositionInput } from "./types";

export type PortfolioConfig = EngineConfig["portfolio"];

export interface PortfolioRiskComponents {
  pressureRisk: number;
  phaseConcentrationRisk: number;
  concentrationRisk: number;
  storyConcentrationRisk: number;
}

export interface AggregatePortfolioOptions {
  /** Known story tags; when given, any other tag is rejected. */
  storyTags?: readonly string[];
  config?: EngineConfig;
}

const WEIGHT_SUM_TOLERANCE = 1e-6;

export function aggregatePortfolio(
  positions: readonly PositionInput[],
  analyses: ReadonlyMap<string, StockCycleAnalysis>,
  buckets: readonly BucketAggregate[],
  limits: BucketLimits,
  options: AggregatePortfolioOptions = {}
): PortfolioRiskResult {
  const logger = getLogger("portfolio/portfolio_risk");
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  assertKnownBuckets(positions, limits);
  if (options.storyTags) assertKnownStoryTags(positions, options.storyTags);

  const totalWeight = positions.reduce((acc, p) => acc + p.weight, 0);
  if (totalWeight > 1 + WEIGHT_SUM_TOLERANCE) {
    logger.warn({ totalWeight }, "position weights sum above 1");
  }

  let pressure = 0;
  let phaseScore = 0;
  let peakingWeight = 0;
  const peakingTickers: string[] = [];

  for (const position of positions) {
    if (position.bucket === config.bucket.cashBucket) continue;
    const analysis = analyses.get(normalizeTicker(position.ticker));
    if (!analysis) continue;
    pressure += position.weight * analysis.cyclePressure;
    phaseScore += position.weight * phaseScoreOf(analysis.phase, config.bucket.phaseScores);
    if (isPeakingOrWorse(analysis.phase)) {
      peakingWeight += position.weight;
      peakingTickers.push(normalizeTicker(position.ticker));
    }
  }

  // Phase follows weighted pressure; phaseScore is reported alongside
  const phase = phaseFromScore(pressure, config.bucket.phaseThresholds);

  const totalOverage = buckets.reduce(
    (acc, b) => acc + Math.max(0, b.weight - (limitFor(limits, b.bucket) ?? b.limit)),
    0
  );
  const stories = storyWeights(positions);
  const dominant = dominantStory(stories);

  const components: PortfolioRiskComponents = {
    pressureRisk: clipScore(config.bucket.pressureRiskScale * pressure),
    phaseConcentrationRisk: clipScore(config.portfolio.phaseConcentrationScale * peakingWeight),
    concentrationRisk: clipScore(config.portfolio.concentrationScale * totalOverage),
    storyConcentrationRisk: clipScore(
      config.portfolio.storyConcentrationScale * (dominant?.weight ?? 0)
    ),
  };
  const transitionRisk = blendTransitionRisk(components, config.portfolio.blend);
  const mode = determineMode(transitionRisk, phase, config.portfolio);

  logger.debug(
    { pressure, phase, transitionRisk, mode, ...components },
    "portfolio risk aggregated"
  );

  return {
    pressure,
    phaseScore,
    phase,
    ...components,
    transitionRisk,
    mode,
    totalOverage,
    peakingWeight,
    peakingTickers,
    storyWeights: stories,
    maxStoryWeight: dominant?.weight ?? 0,
    dominantStory: dominant?.story ?? null,
  };
}

export function blendTransitionRisk(
  components: PortfolioRiskComponents,
  blend: PortfolioConfig["blend"]
): number {
  return clipScore(
    blend.pressure * components.pressureRisk +
      blend.phase * components.phaseConcentrationRisk +
      blend.concentration * components.concentrationRisk +
      blend.story * components.storyConcentrationRisk
  );
}

export function determineMode(
  transitionRisk: number,
  phase: CyclePhase,
  config: PortfolioConfig = DEFAULT_ENGINE_CONFIG.portfolio
): PortfolioMode {
  if (transitionRisk > config.defenseMinRisk || isPeakingOrWorse(phase)) {
    return "DEFENSE";
  }
  if (transitionRisk < config.offenseMaxRisk && isPhaseAtMost(phase, config.offenseMaxPhase)) {
    return "OFFENSE";
  }
  return "BALANCED";
}

export function storyWeights(
  positions: readonly PositionInput[]
): Record<string, number> {
  const weights = new Map<string, number>();
  for (const position of positions) {
    for (const story of new Set(position.storyTags)) {
      weights.set(story, (weights.get(story) ?? 0) + position.weight);
    }
  }
  return Object.fromEntries(weights);
}

function dominantStory(
  weights: Record<string, number>
): { story: string; weight: number } | null {
  let best: { story: string; weight: number } | null = null;
  for (const [story, weight] of Object.entries(weights)) {
    if (!best || weight > best.weight) best = { story, weight };
  }
  return best;
}

function assertKnownStoryTags(
  positions: readonly PositionInput[],
  known: readonly string[]
): void {
  const vocabulary = new Set(known);
  const unknown = [
    ...new Set(positions.flatMap(p => p.storyTags).filter(t => !vocabulary.has(t))),
  ];
  if (unknown.length > 0) {
    throw new ConfigurationError(
      "Unknown story tag",
      unknown.map(t => `story tag ${t} is not in the configured vocabulary`)
    );
  }
}
