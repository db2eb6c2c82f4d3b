/**
 * End-to-end run: per-stock analysis, bucket and portfolio aggregation,
 * action generation and the rotation schedule.
 */
import { randomUUID } from "node:crypto";
import {
  analyzeStock,
  indexAnalyses,
  type StockAnalysisReport,
  type StockInput,
} from "../analysis/stock_cycle_analyzer";
import { generateActions } from "../portfolio/action_generator";
import { aggregateBuckets } from "../portfolio/bucket_aggregator";
import { aggregatePortfolio } from "../portfolio/portfolio_risk";
import { planRotation, type RotationPlan } from "../portfolio/rotation_plan";
import type {
  Action,
  BucketAggregate,
  PortfolioRiskResult,
  PositionInput,
} from "../portfolio/types";
import type { ClusterCatalog } from "../scoring/catalog";
import { withRunContext } from "../util/logger";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "./config";

export interface AnalyzePortfolioInput {
  positions: readonly PositionInput[];
  stocks: readonly StockInput[];
  /** Known story tags; positions carrying any other tag are rejected. */
  storyTags?: readonly string[];
  portfolio?: string;
  asOf?: string;
  runId?: string;
}

export interface AnalyzePortfolioDependencies {
  config?: EngineConfig;
  catalog?: ClusterCatalog;
}

export interface PortfolioAnalysis {
  runId: string;
  analyses: StockAnalysisReport[];
  buckets: BucketAggregate[];
  portfolio: PortfolioRiskResult;
  actions: Action[];
  plan: RotationPlan;
}

export function analyzePortfolio(
  input: AnalyzePortfolioInput,
  deps: AnalyzePortfolioDependencies = {}
): PortfolioAnalysis {
  const runId = input.runId ?? randomUUID();
  const logger = withRunContext("engine/analyze_portfolio", {
    runId,
    portfolio: input.portfolio,
    asOf: input.asOf,
  });
  const config = deps.config ?? DEFAULT_ENGINE_CONFIG;
  const limits = config.bucketLimits;

  const analyses = input.stocks.map(stock =>
    analyzeStock(stock, { config, catalog: deps.catalog })
  );
  const byTicker = indexAnalyses(analyses);

  const buckets = aggregateBuckets(input.positions, byTicker, limits, config.bucket);
  const portfolio = aggregatePortfolio(input.positions, byTicker, buckets, limits, {
    storyTags: input.storyTags,
    config,
  });
  const actions = generateActions(buckets, portfolio, input.positions, byTicker, {
    config,
  });
  const plan = planRotation(actions);

  logger.info(
    {
      stocks: analyses.length,
      buckets: buckets.length,
      transitionRisk: portfolio.transitionRisk,
      mode: portfolio.mode,
      actions: actions.length,
      turnover: plan.totals.turnover,
    },
    "portfolio analyzed"
  );

  return { runId, analyses, buckets, portfolio, actions, plan };
}
