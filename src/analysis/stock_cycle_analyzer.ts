import type {
  CyclePhase,
  HeadlineAggregate,
  IndicatorSnapshot,
} from "../domain/types";
import { EMPTY_HEADLINES, normalizeTicker } from "../domain/types";
import {
  applyCycleRestrictions,
  gateDataQuality,
  gateScoreCard,
  isDataQualityOk,
  type GatedScoreCard,
} from "../quality/data_quality_gate";
import {
  classifyCyclePhase,
  type CycleClassification,
} from "../cycle/cycle_phase_classifier";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../engine/config";
import {
  DEFAULT_CLUSTER_CATALOG,
  maxWeightByCategory,
  type ClusterCatalog,
} from "../scoring/catalog";
import { evaluateClusters, type ClusterResult } from "../scoring/cluster_evaluator";
import { scoreClusters } from "../scoring/dual_score";
import { getLogger } from "../util/logger";
import {
  summarizeNewsEffectiveness,
  type NewsEffectiveness,
} from "./news_effectiveness";

/**
 * Per-stock result consumed by bucket and portfolio aggregation.
 */
export interface StockCycleAnalysis {
  ticker: string;
  riskTotal: number;
  opportunityTotal: number;
  /** riskTotal - opportunityTotal; positive favors selling */
  cyclePressure: number;
  phase: CyclePhase;
  transitionRisk: number;
  criticalSignalsFired: readonly string[];
  dataQualityOk: boolean;
}

/** Full per-stock output, including the raw and gated intermediate records. */
export interface StockAnalysisReport extends StockCycleAnalysis {
  scores: GatedScoreCard;
  cycle: {
    raw: CycleClassification;
    gated: CycleClassification;
  };
  newsEffectiveness: NewsEffectiveness;
}

export interface StockInput {
  snapshot: IndicatorSnapshot;
  headlines?: HeadlineAggregate;
}

export interface AnalyzerContext {
  config?: EngineConfig;
  catalog?: ClusterCatalog;
}

export function analyzeStock(
  input: StockInput,
  context: AnalyzerContext = {}
): StockAnalysisReport {
  const logger = getLogger("analysis/stock_cycle_analyzer");
  const config = context.config ?? DEFAULT_ENGINE_CONFIG;
  const catalog = context.catalog ?? DEFAULT_CLUSTER_CATALOG;
  const headlines = input.headlines ?? EMPTY_HEADLINES;
  const { snapshot } = input;

  // Raw computation first; gating only ever reads these values
  const clusters = evaluateClusters(snapshot, headlines, catalog, {
    minMatchedRules: config.scoring.minMatchedRules,
  });
  const categoryMaxWeights = maxWeightByCategory(catalog);
  const rawCard = {
    clusters,
    score: scoreClusters(clusters, categoryMaxWeights, config.scoring),
  };
  const newsEffectiveness = summarizeNewsEffectiveness(headlines);
  const rawCycle = classifyCyclePhase(
    snapshot.indicators,
    headlines.newsRiskScore,
    newsEffectiveness.effectivenessScore,
    { capexMentions: headlines.capexMentions, config: config.cycle }
  );

  const restrictions = gateDataQuality(
    {
      indicators: snapshot.indicators,
      lookbackDays: snapshot.lookbackDays,
      totalHeadlines: headlines.totalHeadlines,
      positiveHeadlines: headlines.positiveHeadlines,
    },
    config.quality
  );
  const scores = gateScoreCard(rawCard, restrictions, {
    categoryMaxWeights,
    scoring: config.scoring,
    quality: config.quality,
  });
  const gatedCycle = applyCycleRestrictions(rawCycle, restrictions, config.cycle);

  const riskTotal = scores.gated.score.sellRiskScore;
  const opportunityTotal = scores.gated.score.opportunityScore;
  const report: StockAnalysisReport = {
    ticker: snapshot.ticker,
    riskTotal,
    opportunityTotal,
    cyclePressure: riskTotal - opportunityTotal,
    phase: gatedCycle.phase,
    transitionRisk: gatedCycle.transitionRisk,
    criticalSignalsFired: collectCriticalSignals(scores.gated.clusters),
    dataQualityOk: isDataQualityOk(restrictions),
    scores,
    cycle: { raw: rawCycle, gated: gatedCycle },
    newsEffectiveness,
  };

  logger.debug(
    {
      ticker: report.ticker,
      riskTotal: report.riskTotal,
      opportunityTotal: report.opportunityTotal,
      phase: report.phase,
      bias: scores.gated.score.overallBias,
      critical: report.criticalSignalsFired,
    },
    "stock analyzed"
  );
  return report;
}

export function collectCriticalSignals(
  clusters: readonly ClusterResult[]
): string[] {
  const fired = new Set<string>();
  for (const cluster of clusters) {
    if (cluster.triggered && cluster.critical) fired.add(cluster.critical);
  }
  return [...fired];
}

export function indexAnalyses(
  analyses: readonly StockCycleAnalysis[]
): Map<string, StockCycleAnalysis> {
  const byTicker = new Map<string, StockCycleAnalysis>();
  for (const analysis of analyses) {
    byTicker.set(normalizeTicker(analysis.ticker), analysis);
  }
  return byTicker;
}
