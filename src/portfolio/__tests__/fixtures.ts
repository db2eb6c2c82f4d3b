import type { StockCycleAnalysis } from "@src/analysis/stock_cycle_analyzer";
import type { CyclePhase } from "@src/domain/types";
import type { PositionInput } from "@src/portfolio/types";

export function position(
  ticker: string,
  weight: number,
  bucket: string,
  storyTags: string[] = []
): PositionInput {
  return {
    ticker,
    marketValue: weight * 100_000,
    weight,
    bucket,
    profile: "test",
    storyTags,
  };
}

export function analysis(
  ticker: string,
  cyclePressure: number,
  phase: CyclePhase,
  criticalSignalsFired: string[] = [],
  totals: { riskTotal?: number; opportunityTotal?: number } = {}
): StockCycleAnalysis {
  return {
    ticker,
    riskTotal: totals.riskTotal ?? Math.max(0, cyclePressure),
    opportunityTotal: totals.opportunityTotal ?? Math.max(0, -cyclePressure),
    cyclePressure,
    phase,
    transitionRisk: 0,
    criticalSignalsFired,
    dataQualityOk: true,
  };
}

export function analysisMap(list: StockCycleAnalysis[]): Map<string, StockCycleAnalysis> {
  return new Map(list.map(a => [a.ticker, a]));
}
