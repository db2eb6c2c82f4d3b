/**
 * Domain types shared across scoring, cycle classification and portfolio aggregation.
 */
import { assertNever } from "../util/errors";

/** Cycle phases in ascending order of lateness. */
export const CYCLE_PHASES = [
  "EARLY",
  "MID",
  "LATE",
  "PEAKING",
  "DOWNTURN",
] as const;

export type CyclePhase = (typeof CYCLE_PHASES)[number];

export function phaseRank(phase: CyclePhase): number {
  switch (phase) {
    case "EARLY":
      return 0;
    case "MID":
      return 1;
    case "LATE":
      return 2;
    case "PEAKING":
      return 3;
    case "DOWNTURN":
      return 4;
    default:
      return assertNever(phase, "cycle phase");
  }
}

export function isPhaseAtMost(phase: CyclePhase, ceiling: CyclePhase): boolean {
  return phaseRank(phase) <= phaseRank(ceiling);
}

export function isPeakingOrWorse(phase: CyclePhase): boolean {
  return phaseRank(phase) >= phaseRank("PEAKING");
}

/** Overall bias, bearish to bullish. */
export const OVERALL_BIASES = [
  "STRONG_SELL",
  "SELL",
  "HOLD",
  "BUY",
  "STRONG_BUY",
] as const;

export type OverallBias = (typeof OVERALL_BIASES)[number];

export type PortfolioMode = "OFFENSE" | "BALANCED" | "DEFENSE";

export type SignalCategory = "opportunity" | "sell_risk";

export const INDICATOR_KEYS = [
  "rsi_14",
  "ret_5d",
  "ret_21d",
  "ret_63d",
  "volatility_20d",
  "volatility_50d",
  "volume_z_score",
  "atr_pct",
  "current_drawdown",
  "downside_deviation",
  "position_20d_high",
  "price_vs_high_20d",
  "price_vs_sma_50",
  "price_vs_sma_200",
  "sma_50_vs_sma_200",
  "high_volume_win_rate",
  "failed_breakout_frequency",
  "avg_intraday_weakness",
  "gap_down_frequency",
  "news_sentiment_total",
] as const;

export type IndicatorKey = (typeof INDICATOR_KEYS)[number];

export type IndicatorValues = Readonly<
  Partial<Record<IndicatorKey, number | null>>
>;

/**
 * Pre-computed indicators for one ticker. Missing values may be absent, null or NaN.
 */
export interface IndicatorSnapshot {
  ticker: string;
  lookbackDays: number;
  indicators: IndicatorValues;
}

/**
 * Headline statistics for one ticker, produced by the news collaborator.
 * `positiveOutcomes` holds one entry per positive headline, oldest first:
 * true when the forward return confirmed the headline.
 */
export interface HeadlineAggregate {
  totalHeadlines: number;
  positiveHeadlines: number;
  newsRiskScore: number;
  capexMentions: number;
  positiveOutcomes: readonly boolean[];
}

export const EMPTY_HEADLINES: HeadlineAggregate = {
  totalHeadlines: 0,
  positiveHeadlines: 0,
  newsRiskScore: 0,
  capexMentions: 0,
  positiveOutcomes: [],
};

/** Critical signals a cluster can raise when it triggers. */
export type CriticalSignal =
  | "GOOD_NEWS_EFFECTIVENESS"
  | "FIRST_50DMA_FAILURE"
  | "DISTRIBUTION_BREADTH"
  | "RSI_DIVERGENCE";

export function normalizeTicker(raw: string): string {
  return String(raw ?? "")
    .trim()
    .toUpperCase();
}
