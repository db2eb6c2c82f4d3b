/**
 * Cycle phase classification for a single stock.
 *
 * Six components, each scaled to 0-100, describe how late in its cycle a stock looks.
 * The composite score is their weighted mean over the news shift, which always counts,
 * and every other component that fired. It is banded into a phase:
 *
 *   composite < 20          early     -> EARLY
 *   20 <= composite < 40    mid       -> MID
 *   40 <= composite < 60    late-mid  -> configurable (LATE by default)
 *   60 <= composite < 80    late      -> LATE
 *   composite >= 80         rollover  -> configurable (DOWNTURN by default)
 */
import type { CyclePhase, IndicatorValues } from "../domain/types";
import {
  CYCLE_COMPONENTS,
  DEFAULT_ENGINE_CONFIG,
  type CycleComponent,
  type EngineConfig,
} from "../engine/config";
import { assertNever } from "../util/errors";
import { clipScore, isPresent } from "../util/math";

export type CycleConfig = EngineConfig["cycle"];

export type CycleBand = "early" | "mid" | "late_mid" | "late" | "rollover";

export type CycleComponents = Record<CycleComponent, number>;

export interface CycleNewsInputs {
  newsRiskScore: number;
  effectivenessScore: number;
  capexMentions: number;
}

export interface CycleClassification {
  components: CycleComponents;
  composite: number;
  band: CycleBand;
  phase: CyclePhase;
  transitionRisk: number;
  confidence: number;
  /** Components at or above the trigger threshold, strongest first. */
  triggeredComponents: CycleComponent[];
}

const NEUTRAL_EFFECTIVENESS = 50;

/** Counted in the composite even at zero, so a single fired component cannot stand alone. */
const ALWAYS_COUNTED: readonly CycleComponent[] = ["negative_news_shift"];

export function classifyCyclePhase(
  indicators: IndicatorValues,
  newsRiskScore: number,
  effectivenessScore: number,
  options: { capexMentions?: number; config?: CycleConfig } = {}
): CycleClassification {
  const components = computeCycleComponents(indicators, {
    newsRiskScore,
    effectivenessScore,
    capexMentions: options.capexMentions ?? 0,
  });
  return classifyComponents(components, options.config);
}

export function computeCycleComponents(
  indicators: IndicatorValues,
  news: CycleNewsInputs
): CycleComponents {
  const rsi = indicators.rsi_14;
  const ret21 = indicators.ret_21d;
  const ret63 = indicators.ret_63d;
  const vol20 = indicators.volatility_20d;
  const vol50 = indicators.volatility_50d;

  let rsiOverheat = 0;
  if (isPresent(rsi) && rsi > 70) {
    rsiOverheat = clipScore((rsi - 70) * 4);
  }

  let priceExtension = 0;
  if (isPresent(ret63)) {
    if (ret63 > 0.5) priceExtension = clipScore(ret63 * 100);
    else if (ret63 > 0.3) priceExtension = clipScore(ret63 * 133);
  }

  // Only effectiveness below neutral counts as a negative shift
  const newsRisk = isPresent(news.newsRiskScore) ? clipScore(news.newsRiskScore) : 0;
  const effectiveness = isPresent(news.effectivenessScore)
    ? clipScore(news.effectivenessScore)
    : NEUTRAL_EFFECTIVENESS;
  const negativeNewsShift = clipScore(
    0.6 * newsRisk + 0.8 * Math.max(0, NEUTRAL_EFFECTIVENESS - effectiveness)
  );

  let volExpansion = 0;
  if (isPresent(vol20) && isPresent(vol50) && vol50 > 0 && vol20 > vol50 * 1.3) {
    volExpansion = clipScore((vol20 / vol50 - 1) * 333);
  }

  const capex = isPresent(news.capexMentions) ? news.capexMentions : 0;
  const capexMentions = capex > 2 ? clipScore(capex * 20) : 0;

  let divergence = 0;
  if (isPresent(ret21) && isPresent(vol20)) {
    const momentum = Math.abs(ret21);
    if (momentum < 0.05 && vol20 > 0.3) {
      divergence = clipScore(vol20 * 200 - momentum * 100);
    }
  }

  return {
    rsi_overheat: rsiOverheat,
    price_extension: priceExtension,
    negative_news_shift: negativeNewsShift,
    vol_expansion: volExpansion,
    capex_mentions: capexMentions,
    momentum_vol_divergence: divergence,
  };
}

export function classifyComponents(
  components: CycleComponents,
  config: CycleConfig = DEFAULT_ENGINE_CONFIG.cycle
): CycleClassification {
  const composite = compositeScore(components, config.componentWeights);
  const band = bandFor(composite, config.bands);
  const triggeredComponents = CYCLE_COMPONENTS.filter(
    c => components[c] >= config.componentTriggerThreshold
  ).sort((a, b) => components[b] - components[a]);

  return {
    components,
    composite,
    band,
    phase: phaseForBand(band, config),
    transitionRisk: transitionRiskFor(composite, band, config.bands),
    confidence: cycleConfidence(components, triggeredComponents.length),
    triggeredComponents,
  };
}

export function compositeScore(
  components: CycleComponents,
  weights: CycleConfig["componentWeights"]
): number {
  let weighted = 0;
  let totalWeight = 0;
  for (const c of CYCLE_COMPONENTS) {
    if (components[c] <= 0 && !ALWAYS_COUNTED.includes(c)) continue;
    weighted += weights[c] * components[c];
    totalWeight += weights[c];
  }
  if (totalWeight === 0) return 0;
  return clipScore(weighted / totalWeight);
}

export function bandFor(composite: number, bands: CycleConfig["bands"]): CycleBand {
  if (composite < bands.earlyBelow) return "early";
  if (composite < bands.midBelow) return "mid";
  if (composite < bands.lateMidBelow) return "late_mid";
  if (composite < bands.lateBelow) return "late";
  return "rollover";
}

export function phaseForBand(band: CycleBand, config: CycleConfig): CyclePhase {
  switch (band) {
    case "early":
      return "EARLY";
    case "mid":
      return "MID";
    case "late_mid":
      return config.lateMidPhase;
    case "late":
      return "LATE";
    case "rollover":
      return config.rolloverPhase;
    default:
      return assertNever(band, "cycle band");
  }
}

/**
 * Proximity to the next phase: zero through the mid band, then ramping within each later band.
 */
export function transitionRiskFor(
  composite: number,
  band: CycleBand,
  bands: CycleConfig["bands"]
): number {
  switch (band) {
    case "early":
    case "mid":
      return clipScore((composite - bands.midBelow) * 1.5);
    case "late_mid":
      return clipScore((composite - (bands.midBelow + bands.lateMidBelow) / 2) * 3);
    case "late":
      return clipScore((composite - bands.lateMidBelow) * 2.5);
    case "rollover":
      return clipScore(composite * 1.2);
    default:
      return assertNever(band, "cycle band");
  }
}

export function cycleConfidence(
  components: CycleComponents,
  triggeredCount: number
): number {
  const ordered = CYCLE_COMPONENTS.map(c => components[c]).sort((a, b) => b - a);
  const top = ordered[0] ?? 0;
  const second = ordered[1] ?? 0;
  return clipScore(30 + 12 * triggeredCount + 0.4 * (top - second));
}
