/**
 * Data-quality gate.
 *
 * Restrictions are derived from lookback length, missing indicators and headline volume,
 * then applied to an already computed score card. The raw card is never modified; the
 * gated card is a new value, so both stay inspectable. Applying the same restrictions to
 * a gated card returns an equal card.
 */
import type { IndicatorKey, IndicatorValues, SignalCategory } from "../domain/types";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../engine/config";
import type { CycleClassification, CycleConfig } from "../cycle/cycle_phase_classifier";
import { classifyComponents } from "../cycle/cycle_phase_classifier";
import type { MovingAverageWindow, RuleFeature } from "../scoring/catalog";
import { buildClusterResult, type ClusterResult, type RuleMatch } from "../scoring/cluster_evaluator";
import { demoteBias, scoreClusters, type ScoreCard, type ScoringConfig } from "../scoring/dual_score";
import { getLogger } from "../util/logger";
import { isPresent } from "../util/math";

export type QualityConfig = EngineConfig["quality"];

export interface DataQualityInput {
  indicators: IndicatorValues;
  lookbackDays: number;
  totalHeadlines: number;
  positiveHeadlines: number;
}

export interface Restrictions {
  lookbackDays: number;
  nanFraction: number;
  totalHeadlines: number;
  positiveHeadlines: number;
  disabledWindows: MovingAverageWindow[];
  disabledFeatures: RuleFeature[];
  newsClustersDisabled: boolean;
  newsContributionReduced: boolean;
  confidenceCap: number | null;
  strongBiasForbidden: boolean;
  notes: string[];
}

export interface GatedScoreCard {
  raw: ScoreCard;
  gated: ScoreCard;
  restrictions: Restrictions;
}

export interface GateContext {
  categoryMaxWeights: Record<SignalCategory, number>;
  scoring?: ScoringConfig;
  quality?: QualityConfig;
}

export function gateDataQuality(
  input: DataQualityInput,
  config: QualityConfig = DEFAULT_ENGINE_CONFIG.quality
): Restrictions {
  const nanFraction = missingFraction(input.indicators, config.keyIndicators);
  const restrictions: Restrictions = {
    lookbackDays: input.lookbackDays,
    nanFraction,
    totalHeadlines: input.totalHeadlines,
    positiveHeadlines: input.positiveHeadlines,
    disabledWindows: [],
    disabledFeatures: [],
    newsClustersDisabled: false,
    newsContributionReduced: false,
    confidenceCap: null,
    strongBiasForbidden: false,
    notes: [],
  };

  if (input.lookbackDays < config.sma50MinLookback) {
    restrictions.disabledWindows.push("sma50");
    restrictions.notes.push(
      `50DMA rules disabled - lookback ${input.lookbackDays}d < ${config.sma50MinLookback}d`
    );
  }
  if (input.lookbackDays < config.sma200MinLookback) {
    restrictions.disabledWindows.push("sma200");
    restrictions.notes.push(
      `200DMA rules disabled - lookback ${input.lookbackDays}d < ${config.sma200MinLookback}d`
    );
  }
  if (nanFraction > config.confidenceCapNanFraction) {
    restrictions.confidenceCap = config.confidenceCap;
    restrictions.notes.push(
      `Confidence capped at ${config.confidenceCap} - ${formatPercent(nanFraction)} of key indicators missing`
    );
  }
  if (nanFraction > config.strongBiasNanFraction) {
    restrictions.strongBiasForbidden = true;
    restrictions.notes.push("STRONG_* calls disabled - most key indicators missing");
  }
  if (input.positiveHeadlines < config.minPositiveHeadlines) {
    restrictions.disabledFeatures.push("good_news_not_working");
    restrictions.notes.push(
      `Good news not working disabled - ${input.positiveHeadlines} positive headlines`
    );
  }
  if (input.totalHeadlines < config.minHeadlinesForNews) {
    restrictions.newsClustersDisabled = true;
    restrictions.notes.push(
      `News clusters disabled - ${input.totalHeadlines} headlines`
    );
  }
  if (input.totalHeadlines < config.fullNewsConfidenceHeadlines) {
    restrictions.newsContributionReduced = true;
    restrictions.notes.push("News contribution reduced - limited headline coverage");
  }

  return restrictions;
}

/** Share of the key indicators that are absent, null or NaN. */
export function missingFraction(
  indicators: IndicatorValues,
  keys: readonly IndicatorKey[]
): number {
  if (keys.length === 0) return 0;
  const missing = keys.filter(k => !isPresent(indicators[k])).length;
  return missing / keys.length;
}

export function applyRestrictions(
  card: ScoreCard,
  restrictions: Restrictions,
  context: GateContext
): ScoreCard {
  const scoring = context.scoring ?? DEFAULT_ENGINE_CONFIG.scoring;
  const quality = context.quality ?? DEFAULT_ENGINE_CONFIG.quality;

  const clusters = card.clusters.map(cluster =>
    gateCluster(cluster, restrictions, scoring.minMatchedRules, quality.reducedNewsStrength)
  );

  const score = scoreClusters(clusters, context.categoryMaxWeights, scoring);
  const confidence =
    restrictions.confidenceCap === null
      ? score.confidence
      : Math.min(score.confidence, restrictions.confidenceCap);
  const overallBias = restrictions.strongBiasForbidden
    ? demoteBias(score.overallBias)
    : score.overallBias;

  return { clusters, score: { ...score, confidence, overallBias } };
}

export function gateScoreCard(
  raw: ScoreCard,
  restrictions: Restrictions,
  context: GateContext
): GatedScoreCard {
  const logger = getLogger("quality/data_quality_gate");
  const gated = applyRestrictions(raw, restrictions, context);
  if (restrictions.notes.length > 0) {
    logger.debug(
      {
        notes: restrictions.notes,
        rawBias: raw.score.overallBias,
        gatedBias: gated.score.overallBias,
      },
      "data quality restrictions applied"
    );
  }
  return { raw, gated, restrictions };
}

/**
 * Drops the news-derived cycle components when news clusters are disabled and
 * re-classifies from what remains.
 */
export function applyCycleRestrictions(
  cycle: CycleClassification,
  restrictions: Restrictions,
  config: CycleConfig = DEFAULT_ENGINE_CONFIG.cycle
): CycleClassification {
  if (!restrictions.newsClustersDisabled) return cycle;
  return classifyComponents(
    { ...cycle.components, negative_news_shift: 0, capex_mentions: 0 },
    config
  );
}

export function isDataQualityOk(restrictions: Restrictions): boolean {
  return (
    restrictions.confidenceCap === null &&
    !restrictions.strongBiasForbidden &&
    !restrictions.disabledWindows.includes("sma50")
  );
}

function gateCluster(
  cluster: ClusterResult,
  restrictions: Restrictions,
  minMatchedRules: number,
  reducedNewsStrength: number
): ClusterResult {
  const disabled = restrictions.newsClustersDisabled && cluster.newsDerived;
  const matches = disabled
    ? []
    : cluster.matches.filter(m => isMatchAllowed(m, restrictions));
  const strengthCap =
    cluster.newsDerived && restrictions.newsContributionReduced
      ? reducedNewsStrength
      : 1;
  return buildClusterResult(cluster, matches, { minMatchedRules, strengthCap });
}

function isMatchAllowed(match: RuleMatch, restrictions: Restrictions): boolean {
  if (match.dependsOn.some(w => restrictions.disabledWindows.includes(w))) {
    return false;
  }
  if (match.feature && restrictions.disabledFeatures.includes(match.feature)) {
    return false;
  }
  if (match.newsDerived && restrictions.newsClustersDisabled) {
    return false;
  }
  return true;
}

function formatPercent(value: number): string {
  return `${Math.round(value * 100)}%`;
}
