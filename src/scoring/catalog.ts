/**
 * Signal cluster catalog.
 *
 * Each cluster is a named, weighted group of rules. A rule lists the indicators it needs,
 * the moving-average windows it depends on, and ordered tiers; the first tier whose
 * predicate holds contributes its fixed strength. New clusters are added here as data,
 * the evaluator never changes.
 */
import type {
  CriticalSignal,
  HeadlineAggregate,
  IndicatorKey,
  SignalCategory,
} from "../domain/types";
import type { NewsEffectiveness } from "../analysis/news_effectiveness";

export type MovingAverageWindow = "sma50" | "sma200";

export type RuleFeature = "good_news_not_working";

/** Reads a required indicator. Only keys listed in `requires` are guaranteed to be finite. */
export type IndicatorReader = (key: IndicatorKey) => number;

export interface NewsContext {
  headlines: HeadlineAggregate;
  effectiveness: NewsEffectiveness;
}

export interface RuleTier {
  label: string;
  delta: number;
  when: (read: IndicatorReader, news: NewsContext) => boolean;
}

export interface SignalRule {
  id: string;
  requires: readonly IndicatorKey[];
  dependsOn?: readonly MovingAverageWindow[];
  /** Rule reads headline data rather than price indicators. */
  newsDerived?: boolean;
  feature?: RuleFeature;
  tiers: readonly RuleTier[];
}

export interface SignalCluster {
  id: string;
  name: string;
  category: SignalCategory;
  weight: number;
  newsDerived?: boolean;
  critical?: CriticalSignal;
  rules: readonly SignalRule[];
}

export type ClusterCatalog = readonly SignalCluster[];

const opportunityClusters: ClusterCatalog = [
  {
    id: "technical_momentum",
    name: "Technical Momentum",
    category: "opportunity",
    weight: 0.35,
    rules: [
      {
        id: "momentum_21d",
        requires: ["ret_21d"],
        tiers: [
          { label: "Strong 21D momentum", delta: 0.3, when: r => r("ret_21d") > 0.05 },
          { label: "Moderate 21D momentum", delta: 0.2, when: r => r("ret_21d") > 0.02 },
        ],
      },
      {
        id: "rsi_oversold",
        requires: ["rsi_14"],
        tiers: [
          { label: "RSI oversold (<30)", delta: 0.4, when: r => r("rsi_14") < 30 },
          { label: "RSI near oversold (<35)", delta: 0.2, when: r => r("rsi_14") < 35 },
        ],
      },
      {
        id: "bullish_trend",
        requires: ["sma_50_vs_sma_200"],
        dependsOn: ["sma50", "sma200"],
        tiers: [
          { label: "Bullish trend (50>200)", delta: 0.3, when: r => r("sma_50_vs_sma_200") > 0 },
        ],
      },
      {
        id: "volume_confirms_upside",
        requires: ["volume_z_score", "ret_5d"],
        tiers: [
          {
            label: "Volume confirms upside",
            delta: 0.2,
            when: r => r("volume_z_score") > 1.5 && r("ret_5d") > 0,
          },
        ],
      },
    ],
  },
  {
    id: "value_reversal",
    name: "Value/Reversal",
    category: "opportunity",
    weight: 0.25,
    rules: [
      {
        id: "drawdown",
        requires: ["current_drawdown"],
        tiers: [
          { label: "Deep drawdown (>25%)", delta: 0.4, when: r => r("current_drawdown") < -0.25 },
          { label: "Moderate drawdown (>15%)", delta: 0.2, when: r => r("current_drawdown") < -0.15 },
        ],
      },
      {
        id: "low_volatility",
        requires: ["volatility_20d"],
        tiers: [
          { label: "Low volatility regime", delta: 0.2, when: r => r("volatility_20d") < 0.15 },
        ],
      },
      {
        id: "near_support",
        requires: ["position_20d_high"],
        tiers: [
          { label: "Near 20D support", delta: 0.2, when: r => r("position_20d_high") < 0.2 },
        ],
      },
      {
        id: "positive_news_sentiment",
        requires: ["news_sentiment_total"],
        newsDerived: true,
        tiers: [
          { label: "Positive news sentiment", delta: 0.3, when: r => r("news_sentiment_total") > 2 },
        ],
      },
    ],
  },
  {
    id: "breakout_potential",
    name: "Breakout Potential",
    category: "opportunity",
    weight: 0.2,
    rules: [
      {
        id: "near_20d_high",
        requires: ["price_vs_high_20d"],
        tiers: [
          { label: "Near 20D high", delta: 0.3, when: r => r("price_vs_high_20d") >= -0.02 },
        ],
      },
      {
        id: "volume_surge",
        requires: ["volume_z_score"],
        tiers: [{ label: "Volume surge", delta: 0.3, when: r => r("volume_z_score") > 2 }],
      },
      {
        id: "volatility_expansion",
        requires: ["volatility_20d", "volatility_50d"],
        tiers: [
          {
            label: "Volatility expansion",
            delta: 0.2,
            when: r => r("volatility_20d") > r("volatility_50d") * 1.2,
          },
        ],
      },
      {
        id: "momentum_acceleration",
        requires: ["ret_5d", "ret_21d"],
        tiers: [
          {
            label: "Momentum acceleration",
            delta: 0.2,
            when: r => r("ret_5d") > 0 && r("ret_5d") > r("ret_21d") * 2,
          },
        ],
      },
    ],
  },
];

const sellRiskClusters: ClusterCatalog = [
  {
    id: "technical_overheating",
    name: "Technical Overheating",
    category: "sell_risk",
    weight: 0.35,
    critical: "RSI_DIVERGENCE",
    rules: [
      {
        id: "rsi_overbought",
        requires: ["rsi_14"],
        tiers: [
          { label: "RSI extremely overbought (>80)", delta: 0.4, when: r => r("rsi_14") > 80 },
          { label: "RSI overbought (>70)", delta: 0.3, when: r => r("rsi_14") > 70 },
        ],
      },
      {
        id: "rsi_divergence",
        requires: ["rsi_14", "ret_21d"],
        tiers: [
          {
            label: "Potential RSI divergence",
            delta: 0.3,
            when: r => r("rsi_14") > 70 && r("ret_21d") > 0.1,
          },
        ],
      },
      {
        id: "extended_gains",
        requires: ["ret_63d"],
        tiers: [
          { label: "Extended gains (>50% in 3mo)", delta: 0.3, when: r => r("ret_63d") > 0.5 },
          { label: "Strong gains (>30% in 3mo)", delta: 0.2, when: r => r("ret_63d") > 0.3 },
        ],
      },
      {
        id: "volatile_gains",
        requires: ["volatility_20d", "ret_21d"],
        tiers: [
          {
            label: "High volatility with gains",
            delta: 0.2,
            when: r => r("volatility_20d") > 0.4 && r("ret_21d") > 0.05,
          },
        ],
      },
      {
        id: "thin_volume_overbought",
        requires: ["rsi_14", "volume_z_score"],
        tiers: [
          {
            label: "High RSI with low volume",
            delta: 0.2,
            when: r => r("rsi_14") > 70 && r("volume_z_score") < -1,
          },
        ],
      },
    ],
  },
  {
    id: "trend_deterioration",
    name: "Trend Deterioration",
    category: "sell_risk",
    weight: 0.3,
    critical: "FIRST_50DMA_FAILURE",
    rules: [
      {
        id: "below_50dma",
        requires: ["price_vs_sma_50"],
        dependsOn: ["sma50"],
        tiers: [
          { label: "Trading below 50DMA", delta: 0.3, when: r => r("price_vs_sma_50") < -0.05 },
        ],
      },
      {
        id: "50dma_resistance",
        requires: ["price_vs_sma_50", "ret_21d"],
        dependsOn: ["sma50"],
        tiers: [
          {
            label: "50DMA resistance",
            delta: 0.3,
            when: r => r("price_vs_sma_50") < 0 && r("ret_21d") < -0.02,
          },
        ],
      },
      {
        id: "bearish_trend",
        requires: ["sma_50_vs_sma_200"],
        dependsOn: ["sma50", "sma200"],
        tiers: [
          { label: "Bearish trend (50<200)", delta: 0.4, when: r => r("sma_50_vs_sma_200") < 0 },
        ],
      },
      {
        id: "ma_cross_threat",
        requires: ["price_vs_sma_50", "price_vs_sma_200"],
        dependsOn: ["sma50", "sma200"],
        tiers: [
          {
            label: "MA cross threat",
            delta: 0.2,
            when: r => r("price_vs_sma_50") < 0 && r("price_vs_sma_200") > 0,
          },
        ],
      },
    ],
  },
  {
    id: "distribution_behavior",
    name: "Distribution Behavior",
    category: "sell_risk",
    weight: 0.25,
    critical: "DISTRIBUTION_BREADTH",
    rules: [
      {
        id: "high_volume_distribution",
        requires: ["high_volume_win_rate"],
        tiers: [
          { label: "High volume distribution", delta: 0.4, when: r => r("high_volume_win_rate") < 0.3 },
          { label: "Volume-based selling", delta: 0.2, when: r => r("high_volume_win_rate") < 0.4 },
        ],
      },
      {
        id: "failed_breakouts",
        requires: ["failed_breakout_frequency"],
        tiers: [
          {
            label: "High failed breakout rate",
            delta: 0.3,
            when: r => r("failed_breakout_frequency") > 0.3,
          },
          {
            label: "Failed breakout pattern",
            delta: 0.2,
            when: r => r("failed_breakout_frequency") > 0.2,
          },
        ],
      },
      {
        id: "intraday_weakness",
        requires: ["avg_intraday_weakness"],
        tiers: [
          {
            label: "Strong intraday weakness",
            delta: 0.3,
            when: r => r("avg_intraday_weakness") < -0.3,
          },
          {
            label: "Intraday selling pressure",
            delta: 0.2,
            when: r => r("avg_intraday_weakness") < -0.2,
          },
        ],
      },
      {
        id: "gap_downs",
        requires: ["gap_down_frequency"],
        tiers: [
          { label: "Frequent gap downs", delta: 0.2, when: r => r("gap_down_frequency") > 0.1 },
        ],
      },
    ],
  },
  {
    id: "volatility_regime_shift",
    name: "Volatility Regime Shift",
    category: "sell_risk",
    weight: 0.2,
    rules: [
      {
        id: "atr_flat_returns",
        requires: ["atr_pct", "ret_21d"],
        tiers: [
          {
            label: "High ATR, flat returns",
            delta: 0.4,
            when: r => r("atr_pct") > 0.05 && Math.abs(r("ret_21d")) < 0.02,
          },
        ],
      },
      {
        id: "volatility_regime",
        requires: ["volatility_20d"],
        tiers: [
          { label: "High volatility regime", delta: 0.3, when: r => r("volatility_20d") > 0.35 },
          { label: "Elevated volatility", delta: 0.2, when: r => r("volatility_20d") > 0.25 },
        ],
      },
      {
        id: "rapid_volatility_expansion",
        requires: ["volatility_20d", "volatility_50d"],
        tiers: [
          {
            label: "Rapid volatility expansion",
            delta: 0.3,
            when: r => r("volatility_20d") > r("volatility_50d") * 1.3,
          },
        ],
      },
      {
        id: "downside_deviation",
        requires: ["downside_deviation"],
        tiers: [
          { label: "High downside deviation", delta: 0.2, when: r => r("downside_deviation") > 0.02 },
        ],
      },
    ],
  },
  {
    id: "news_exhaustion",
    name: "News Exhaustion",
    category: "sell_risk",
    weight: 0.25,
    newsDerived: true,
    critical: "GOOD_NEWS_EFFECTIVENESS",
    rules: [
      {
        id: "good_news_not_working",
        requires: [],
        newsDerived: true,
        feature: "good_news_not_working",
        tiers: [
          {
            label: "Good news not working",
            delta: 0.4,
            when: (_r, n) => n.effectiveness.sampleSize > 0 && n.effectiveness.failureRate >= 0.6,
          },
          {
            label: "Good news fading",
            delta: 0.2,
            when: (_r, n) => n.effectiveness.sampleSize > 0 && n.effectiveness.failureRate >= 0.4,
          },
        ],
      },
      {
        id: "consecutive_news_failures",
        requires: [],
        newsDerived: true,
        feature: "good_news_not_working",
        tiers: [
          {
            label: "Consecutive positive-news failures",
            delta: 0.3,
            when: (_r, n) => n.effectiveness.consecutiveFailures >= 2,
          },
        ],
      },
      {
        id: "negative_cycle_news",
        requires: [],
        newsDerived: true,
        tiers: [
          {
            label: "Negative cycle keywords in news",
            delta: 0.3,
            when: (_r, n) => n.headlines.newsRiskScore > 60,
          },
          {
            label: "Rising negative news risk",
            delta: 0.2,
            when: (_r, n) => n.headlines.newsRiskScore > 40,
          },
        ],
      },
      {
        id: "capex_expansion",
        requires: [],
        newsDerived: true,
        tiers: [
          {
            label: "Capex expansion headlines",
            delta: 0.2,
            when: (_r, n) => n.headlines.capexMentions > 2,
          },
        ],
      },
    ],
  },
];

export const DEFAULT_CLUSTER_CATALOG: ClusterCatalog = [
  ...opportunityClusters,
  ...sellRiskClusters,
];

/**
 * Heaviest cluster weight per category; the dual score normalizes against it.
 */
export function maxWeightByCategory(
  catalog: ClusterCatalog
): Record<SignalCategory, number> {
  const out: Record<SignalCategory, number> = { opportunity: 0, sell_risk: 0 };
  for (const cluster of catalog) {
    out[cluster.category] = Math.max(out[cluster.category], cluster.weight);
  }
  return out;
}
